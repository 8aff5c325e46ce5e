import { ConfigurationError } from "./errors.js";
import type { ImapConfig } from "./imap/index.js";
import { parseLogLevel, type LogLevel } from "./log.js";
import { defaultSignatureFile } from "./signatures/store.js";
import type { SmtpConfig } from "./smtp/index.js";
import { PROBE_TIMEOUT_MS } from "./smtp/index.js";

/**
 * Everything the server needs, resolved from the environment.
 */
export interface AppConfig {
  imap: ImapConfig;
  smtp: SmtpConfig;
  /** Default display name for the From header */
  senderName?: string;
  /** Sent folder path; discovered from the server when unset */
  sentFolder?: string;
  signatureFile: string;
  verification: {
    heloName: string;
    mailFrom: string;
    timeoutMs: number;
  };
  /** Threshold for stderr logging, from LOG_LEVEL */
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

function required(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new ConfigurationError(`${name} environment variable is required`);
  }
  return value;
}

function integer(env: Env, name: string, fallback: number): number {
  const value = env[name];
  if (!value) return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function flag(env: Env, name: string, fallback: boolean): boolean {
  const value = env[name];
  if (value === undefined || value === "") return fallback;
  return value !== "false";
}

/**
 * "imap.example.com" → "smtp.example.com", "imaps.example.com" →
 * "smtps.example.com"; other hosts are used as-is.
 */
export function deriveSmtpHost(imapHost: string): string {
  return imapHost.replace(/^imap(s?)\./i, "smtp$1.");
}

/**
 * Build the configuration from environment variables (after dotenv has
 * loaded `.env`).
 */
export function loadConfigFromEnv(env: Env = process.env): AppConfig {
  const imapHost = required(env, "IMAP_HOST");
  const user = required(env, "IMAP_USER");
  const pass = required(env, "IMAP_PASS");

  const smtpPort = integer(env, "SMTP_PORT", 465);

  return {
    imap: {
      host: imapHost,
      port: integer(env, "IMAP_PORT", 993),
      secure: flag(env, "IMAP_SECURE", true),
      tlsRejectUnauthorized: flag(env, "IMAP_TLS_REJECT_UNAUTHORIZED", true),
      auth: { user, pass },
    },
    smtp: {
      host: env.SMTP_HOST || deriveSmtpHost(imapHost),
      port: smtpPort,
      secure: flag(env, "SMTP_SECURE", smtpPort === 465),
      auth: {
        user: env.SMTP_USER || user,
        pass: env.SMTP_PASS || pass,
      },
    },
    senderName: env.SENDER_NAME || undefined,
    sentFolder: env.SENT_FOLDER || undefined,
    signatureFile: env.SIGNATURE_FILE || defaultSignatureFile(),
    verification: {
      heloName: env.VERIFY_HELO_NAME || user.split("@")[1] || "localhost",
      mailFrom: user.includes("@") ? user : "",
      timeoutMs: integer(env, "VERIFY_TIMEOUT_MS", PROBE_TIMEOUT_MS),
    },
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
}
