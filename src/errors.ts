/**
 * Error taxonomy shared by the mailbox, transport and tool layers.
 *
 * Tool handlers render every one of these as a single line via
 * `describeError`, so messages should read well on their own.
 */
export class MailError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or invalid configuration (credentials, ports). */
export class ConfigurationError extends MailError {}

/** The mailbox or transport server could not be reached. */
export class ConnectionError extends MailError {}

/** The server was reached but rejected the credentials. */
export class AuthenticationError extends ConnectionError {}

/** A message, attachment, folder or signature does not exist. */
export class NotFoundError extends MailError {}

/** A recipient argument is not a usable email address. */
export class InvalidAddressError extends MailError {}

/** Raw message bytes could not be parsed. */
export class ParseError extends MailError {}

/**
 * Read the `code` property Node and the mail libraries attach to errors.
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/**
 * One-line, human-readable rendering of any thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
