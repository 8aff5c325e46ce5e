import { ImapFlow } from "imapflow";
import {
  AuthenticationError,
  ConnectionError,
  NotFoundError,
  errorCode,
} from "../errors.js";
import { createLogger } from "../log.js";
import type { ImapConfig } from "./types.js";

const log = createLogger("imap");

const NETWORK_ERROR_CODES = [
  "ECONNRESET",
  "EPIPE",
  "ETIMEDOUT",
  "ECONNREFUSED",
  "ENOTFOUND",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EAI_AGAIN",
  "NoConnection",
];

/**
 * Map an IMAP or network error onto ConnectionError / AuthenticationError,
 * using the properties ImapFlow and Node.js set on it.
 */
export function classifyImapError(
  error: unknown,
  config: ImapConfig
): ConnectionError {
  if (!(error instanceof Error)) {
    return new ConnectionError(`IMAP error: ${String(error)}`);
  }

  const code = errorCode(error);

  if ("authenticationFailed" in error && error.authenticationFailed) {
    return new AuthenticationError(
      "IMAP authentication failed. Check IMAP_USER and IMAP_PASS credentials.",
      { cause: error }
    );
  }

  if (code === "ECONNREFUSED") {
    return new ConnectionError(
      `Cannot reach IMAP server at ${config.host}:${config.port} (connection refused). Is the server running?`,
      { cause: error }
    );
  }

  if (code === "ENOTFOUND") {
    return new ConnectionError(
      `Cannot resolve IMAP server hostname '${config.host}'. Check IMAP_HOST.`,
      { cause: error }
    );
  }

  if (code === "ETIMEDOUT" || code === "CONNECT_TIMEOUT") {
    return new ConnectionError(
      "Connection to IMAP server timed out. The server may be slow or unreachable.",
      { cause: error }
    );
  }

  if (code?.startsWith("ERR_TLS") || /tls|certificate/i.test(error.message)) {
    return new ConnectionError(
      "TLS/SSL error connecting to IMAP server. Check IMAP_SECURE setting.",
      { cause: error }
    );
  }

  return new ConnectionError(`IMAP error: ${error.message}`, { cause: error });
}

/**
 * Whether an error means the connection itself is gone, as opposed to the
 * server refusing a particular command.
 */
export function isConnectionFailure(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  const code = errorCode(error);
  if (code && NETWORK_ERROR_CODES.includes(code)) {
    return true;
  }

  return /connection|socket|not connected|closed|broken pipe|timeout/i.test(
    error.message
  );
}

/**
 * One authenticated mailbox session.
 * Wraps ImapFlow for the mailbox operations.
 *
 * Any operation connects on demand; a connection the server has dropped is
 * discarded and replaced on the next call. The session is meant to serve one
 * operation at a time.
 */
export class ImapClient {
  private client: ImapFlow | null = null;
  private config: ImapConfig;

  constructor(config: ImapConfig) {
    this.config = config;
  }

  /** The account's login name, used as the sender address. */
  get user(): string {
    return this.config.auth.user;
  }

  /**
   * Get or create an IMAP connection.
   * Discards stale connections and reconnects automatically.
   */
  async connect(): Promise<ImapFlow> {
    // Discard dead connections so the next block creates a fresh one
    if (this.client && !this.client.usable) {
      this.client = null;
    }

    if (this.client) {
      return this.client;
    }

    log.info(`Connecting to ${this.config.host}:${this.config.port}`);

    const flow = new ImapFlow({
      host: this.config.host,
      port: this.config.port,
      secure: this.config.secure,
      auth: this.config.auth,
      logger: false,
      tls: {
        rejectUnauthorized: this.config.tlsRejectUnauthorized,
      },
    });

    try {
      await flow.connect();
    } catch (error) {
      throw classifyImapError(error, this.config);
    }

    // Clear cached client when the server drops the connection
    flow.on("close", () => {
      this.client = null;
    });

    // EventEmitter requires handling "error" events, otherwise Node throws.
    flow.on("error", (error: unknown) => {
      const err = classifyImapError(error, this.config);
      log.error(`IMAP connection error: ${err.message}`);
      this.client = null;
    });

    this.client = flow;
    return this.client;
  }

  /**
   * Get the underlying ImapFlow instance (must be connected first).
   */
  getClient(): ImapFlow {
    if (!this.client) {
      throw new ConnectionError("IMAP client not connected. Call connect() first.");
    }
    return this.client;
  }

  /**
   * Log out and drop the connection. Safe to call when not connected.
   */
  async disconnect(): Promise<void> {
    const client = this.client;
    if (!client) return;

    this.client = null;
    try {
      await client.logout();
      log.info("Disconnected from IMAP server");
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.warn(`Error during IMAP logout: ${message}`);
    }
  }

  /**
   * Select a folder and hold its lock. Caller must release the lock when done.
   */
  async openMailbox(path: string = "INBOX") {
    const client = await this.connect();
    try {
      return await client.getMailboxLock(path);
    } catch (error) {
      if (isConnectionFailure(error)) {
        this.client = null;
        throw classifyImapError(error, this.config);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new NotFoundError(`Cannot open folder "${path}": ${message}`, {
        cause: error,
      });
    }
  }
}
