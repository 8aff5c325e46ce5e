import { mkdir, readFile, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import { createLogger } from "../log.js";

const log = createLogger("signatures");

export type SignatureMap = Record<string, string>;

export function defaultSignatureFile(): string {
  return join(homedir(), ".config", "mail-assistant-mcp", "signatures.json");
}

function isSignatureMap(value: unknown): value is SignatureMap {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((v) => typeof v === "string")
  );
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Named email signatures persisted as one JSON object.
 *
 * There is no locking: concurrent writers overwrite each other.
 */
export class SignatureStore {
  readonly filePath: string;

  constructor(filePath: string = defaultSignatureFile()) {
    this.filePath = filePath;
  }

  /**
   * Read the whole map. A missing, unreadable or malformed file reads as empty.
   */
  async list(): Promise<SignatureMap> {
    let content: string;
    try {
      content = await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (!isMissingFile(error)) {
        log.warn(`Could not read ${this.filePath}: ${String(error)}`);
      }
      return {};
    }

    try {
      const parsed: unknown = JSON.parse(content);
      if (isSignatureMap(parsed)) return parsed;
      log.warn(`Ignoring ${this.filePath}: not a name → text object`);
    } catch (error) {
      log.warn(`Ignoring corrupt ${this.filePath}: ${String(error)}`);
    }
    return {};
  }

  async get(name: string): Promise<string | null> {
    const signatures = await this.list();
    return Object.hasOwn(signatures, name) ? signatures[name] : null;
  }

  async save(name: string, text: string): Promise<void> {
    const signatures = await this.list();
    signatures[name] = text;
    await this.write(signatures);
    log.info(`Saved signature '${name}'`);
  }

  /**
   * Remove a signature. Returns false when it did not exist.
   */
  async delete(name: string): Promise<boolean> {
    const signatures = await this.list();
    if (!Object.hasOwn(signatures, name)) return false;

    delete signatures[name];
    await this.write(signatures);
    log.info(`Deleted signature '${name}'`);
    return true;
  }

  private async write(signatures: SignatureMap): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, JSON.stringify(signatures, null, 2) + "\n", "utf-8");
  }
}

export interface SignatureDetails {
  fullName: string;
  email: string;
  role?: string;
  company?: string;
  phone?: string;
}

/**
 * Plain-text signature block:
 *
 *   --
 *   Jane Doe
 *   Engineer
 *   Example Corp
 *   Email: jane@example.com
 *   Phone: +1 555 0100
 */
export function buildSignature(details: SignatureDetails): string {
  const lines = ["--", details.fullName];
  if (details.role) lines.push(details.role);
  if (details.company) lines.push(details.company);
  lines.push(`Email: ${details.email}`);
  if (details.phone) lines.push(`Phone: ${details.phone}`);
  return lines.join("\n");
}
