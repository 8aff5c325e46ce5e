import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { SignatureStore, buildSignature } from "./store.js";

describe("SignatureStore", () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "signatures-"));
    file = join(dir, "nested", "signatures.json");
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("reads a missing file as empty", async () => {
    const store = new SignatureStore(file);
    expect(await store.list()).toEqual({});
    expect(await store.get("work")).toBeNull();
  });

  it("saves, creating the directory, and reads back", async () => {
    const store = new SignatureStore(file);
    await store.save("work", "--\nJane");
    await store.save("home", "<p>J</p>");

    expect(await store.get("work")).toBe("--\nJane");
    expect(await store.list()).toEqual({ work: "--\nJane", home: "<p>J</p>" });
    expect(await readFile(file, "utf-8")).toBe(
      '{\n  "work": "--\\nJane",\n  "home": "<p>J</p>"\n}\n'
    );
  });

  it("overwrites a signature with the same name", async () => {
    const store = new SignatureStore(file);
    await store.save("work", "old");
    await store.save("work", "new");

    expect(await store.list()).toEqual({ work: "new" });
  });

  it("deletes signatures and reports whether one existed", async () => {
    const store = new SignatureStore(file);
    await store.save("work", "x");

    expect(await store.delete("work")).toBe(true);
    expect(await store.delete("work")).toBe(false);
    expect(await store.list()).toEqual({});
  });

  it("deletes one signature and leaves the others untouched", async () => {
    const store = new SignatureStore(file);
    await store.save("a", "first");
    await store.save("b", "--\nsecond");

    expect(await store.delete("a")).toBe(true);

    expect(await store.get("a")).toBeNull();
    expect(await store.get("b")).toBe("--\nsecond");
    expect(await new SignatureStore(file).list()).toEqual({ b: "--\nsecond" });
  });

  it("does not treat inherited properties as signatures", async () => {
    const store = new SignatureStore(file);
    expect(await store.get("toString")).toBeNull();
  });

  it("reads corrupt JSON as empty and logs a warning", async () => {
    const path = join(dir, "bad.json");
    await writeFile(path, "{not json", "utf-8");

    expect(await new SignatureStore(path).list()).toEqual({});
    expect(process.stderr.write).toHaveBeenCalledWith(
      expect.stringContaining("WARN signatures: Ignoring corrupt")
    );
  });

  it("reads a JSON document of the wrong shape as empty", async () => {
    const path = join(dir, "array.json");
    await writeFile(path, '["a", "b"]', "utf-8");

    expect(await new SignatureStore(path).list()).toEqual({});

    await writeFile(path, '{"work": 42}', "utf-8");
    expect(await new SignatureStore(path).list()).toEqual({});
  });
});

describe("buildSignature", () => {
  it("includes every provided line", () => {
    expect(
      buildSignature({
        fullName: "Jane Doe",
        email: "jane@example.com",
        role: "Engineer",
        company: "Example Corp",
        phone: "+1 555 0100",
      })
    ).toBe(
      "--\nJane Doe\nEngineer\nExample Corp\nEmail: jane@example.com\nPhone: +1 555 0100"
    );
  });

  it("omits optional lines that were not given", () => {
    expect(buildSignature({ fullName: "Jane Doe", email: "jane@example.com" })).toBe(
      "--\nJane Doe\nEmail: jane@example.com"
    );
  });
});
