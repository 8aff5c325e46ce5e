import { describe, it, expect, beforeEach, vi } from "vitest";
import { simpleParser } from "mailparser";
import { sendEmail, type SendDeps } from "./send.js";
import type { VerificationResult } from "./verify.js";
import type { ImapClient } from "../imap/index.js";
import type { SignatureStore } from "../signatures/store.js";
import { InvalidAddressError, NotFoundError } from "../errors.js";

const NOW = new Date("2026-02-02T09:30:00.000Z");

function verified(email: string, exists: VerificationResult["exists"]): VerificationResult {
  return {
    email,
    exists,
    reason: exists === false ? "Mailbox rejected by server (550)" : "checked",
    method: "smtp",
  };
}

function createDeps(signatures: Record<string, string> = {}) {
  const mockClient = {
    list: vi.fn().mockResolvedValue([]),
    append: vi.fn().mockResolvedValue({ destination: "Sent", uid: 9 }),
  };
  const imapClient = {
    user: "me@example.com",
    connect: vi.fn().mockResolvedValue(mockClient),
  } as unknown as ImapClient;

  const transport = {
    submit: vi.fn().mockResolvedValue({ messageId: "<m1@example.com>" }),
  };
  const verify = vi.fn(async (email: string) => verified(email, true));
  const store = {
    get: vi.fn(async (name: string) => signatures[name] ?? null),
  } as unknown as SignatureStore;

  const deps: SendDeps = {
    imapClient,
    transport,
    verify,
    signatures: store,
    sentFolder: "Sent",
    now: () => NOW,
  };
  return { deps, mockClient, transport, verify };
}

describe("sendEmail", () => {
  beforeEach(() => {
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);
  });

  it("verifies, submits and files the message", async () => {
    const { deps, transport, mockClient, verify } = createDeps();

    const result = await sendEmail(deps, {
      to: "bob@example.org",
      subject: "Hello",
      body: "Hi Bob",
    });

    expect(verify).toHaveBeenCalledWith("bob@example.org");
    expect(transport.submit).toHaveBeenCalledWith(expect.any(String), {
      from: "me@example.com",
      to: ["bob@example.org"],
    });
    expect(result).toEqual({
      status: "sent",
      to: "bob@example.org",
      cc: [],
      subject: "Hello",
      from: "me@example.com",
      messageId: "<m1@example.com>",
      savedToSent: true,
      verification: [verified("bob@example.org", true)],
    });

    const [raw] = transport.submit.mock.calls[0];
    expect(mockClient.append).toHaveBeenCalledWith(
      "Sent",
      Buffer.from(raw, "utf-8"),
      ["\\Seen"],
      NOW
    );
  });

  it("does not submit when a recipient does not exist", async () => {
    const { deps, transport, mockClient, verify } = createDeps();
    verify.mockResolvedValueOnce(verified("ghost@example.org", false));

    const result = await sendEmail(deps, {
      to: "ghost@example.org",
      subject: "Hello",
      body: "Hi",
    });

    expect(transport.submit).not.toHaveBeenCalled();
    expect(mockClient.append).not.toHaveBeenCalled();
    expect(result.status).toBe("failed");
    expect(result.savedToSent).toBe(false);
    expect(result.error).toBe(
      "Recipient ghost@example.org does not exist: Mailbox rejected by server (550)"
    );
  });

  it("sends anyway when verification is inconclusive", async () => {
    const { deps, transport, verify } = createDeps();
    verify.mockResolvedValueOnce(verified("bob@example.org", "unknown"));

    const result = await sendEmail(deps, {
      to: "bob@example.org",
      subject: "Hello",
      body: "Hi",
    });

    expect(transport.submit).toHaveBeenCalledTimes(1);
    expect(result.status).toBe("sent");
    expect(result.verification?.[0].exists).toBe("unknown");
  });

  it("verifies every To address but not Cc", async () => {
    const { deps, transport, verify } = createDeps();

    await sendEmail(deps, {
      to: "a@example.org, b@example.org",
      cc: ["c@example.org"],
      subject: "s",
      body: "b",
    });

    expect(verify.mock.calls.map(([email]) => email)).toEqual([
      "a@example.org",
      "b@example.org",
    ]);
    expect(transport.submit).toHaveBeenCalledWith(expect.any(String), {
      from: "me@example.com",
      to: ["a@example.org", "b@example.org", "c@example.org"],
    });
  });

  it("sends to named recipients whose names contain commas", async () => {
    const { deps, transport, verify } = createDeps();

    const result = await sendEmail(deps, {
      to: '"Doe, John" <john@example.org>, Bob <bob@example.org>',
      subject: "s",
      body: "b",
    });

    expect(result.status).toBe("sent");
    expect(verify.mock.calls.map(([email]) => email)).toEqual([
      "john@example.org",
      "bob@example.org",
    ]);
    expect(transport.submit).toHaveBeenCalledWith(expect.any(String), {
      from: "me@example.com",
      to: ["john@example.org", "bob@example.org"],
    });
  });

  it("throws on an unusable To address before verifying or sending", async () => {
    const { deps, transport, verify } = createDeps();

    await expect(
      sendEmail(deps, { to: "Bob Example", subject: "s", body: "b" })
    ).rejects.toThrow(new InvalidAddressError('Invalid To address: "Bob Example"'));
    expect(verify).not.toHaveBeenCalled();
    expect(transport.submit).not.toHaveBeenCalled();
  });

  it("skips verification when asked", async () => {
    const { deps, verify } = createDeps();

    const result = await sendEmail(deps, {
      to: "bob@example.org",
      subject: "s",
      body: "b",
      verifyRecipient: false,
    });

    expect(verify).not.toHaveBeenCalled();
    expect(result.verification).toBeUndefined();
  });

  it("appends a stored signature", async () => {
    const { deps, transport } = createDeps({ work: "--\nMe" });

    await sendEmail(deps, {
      to: "bob@example.org",
      subject: "s",
      body: "Hi",
      signatureName: "work",
      fromName: "Me Example",
    });

    const [raw] = transport.submit.mock.calls[0];
    const parsed = await simpleParser(raw);
    expect(parsed.text?.replace(/\r\n/g, "\n").trim()).toBe("Hi\n\n--\nMe");
    expect(parsed.from?.value[0].name).toBe("Me Example");
  });

  it("throws NotFoundError for an unknown signature before sending", async () => {
    const { deps, transport } = createDeps();

    await expect(
      sendEmail(deps, { to: "bob@example.org", subject: "s", body: "b", signatureName: "nope" })
    ).rejects.toThrow(new NotFoundError("Signature 'nope' not found."));
    expect(transport.submit).not.toHaveBeenCalled();
  });

  it("reports a failed Sent copy without failing the send", async () => {
    const { deps, mockClient } = createDeps();
    mockClient.append.mockRejectedValue(new Error("Mailbox is read-only"));

    const result = await sendEmail(deps, {
      to: "bob@example.org",
      subject: "s",
      body: "b",
    });

    expect(result.status).toBe("sent");
    expect(result.savedToSent).toBe(false);
    expect(result.sentFolderError).toBe("Mailbox is read-only");
  });

  it("skips the Sent copy when asked", async () => {
    const { deps, mockClient } = createDeps();

    const result = await sendEmail(deps, {
      to: "bob@example.org",
      subject: "s",
      body: "b",
      saveToSent: false,
    });

    expect(mockClient.append).not.toHaveBeenCalled();
    expect(result.savedToSent).toBe(false);
    expect(result.sentFolderError).toBeUndefined();
  });

  it("propagates submission failures", async () => {
    const { deps, transport, mockClient } = createDeps();
    transport.submit.mockRejectedValue(new Error("SMTP error: 554 rejected"));

    await expect(
      sendEmail(deps, { to: "bob@example.org", subject: "s", body: "b" })
    ).rejects.toThrow("SMTP error: 554 rejected");
    expect(mockClient.append).not.toHaveBeenCalled();
  });
});
