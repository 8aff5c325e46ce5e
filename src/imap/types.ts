/**
 * Configuration for connecting to an IMAP server.
 */
export interface ImapConfig {
  host: string;
  port: number;
  secure: boolean;
  tlsRejectUnauthorized: boolean;
  auth: {
    user: string;
    pass: string;
  };
}

/**
 * Attachment metadata (returned with message content, NOT the actual data).
 */
export interface AttachmentInfo {
  /** Position among the message's attachment parts, in MIME tree order */
  index: number;
  /** Original filename */
  filename: string;
  /** MIME type (e.g. "application/pdf", "image/png") */
  contentType: string;
  /** Decoded payload size in bytes */
  size: number;
}

/**
 * A downloaded attachment.
 */
export interface AttachmentData extends AttachmentInfo {
  emailId: string;
  /** Base64-encoded content */
  contentBase64: string;
}

/**
 * A decoded message as returned by list, search and read.
 *
 * The `id` is the IMAP UID within the folder it was read from. It does not
 * survive moving the message to another folder.
 */
export interface MessageRecord {
  id: string;
  from: string;
  to: string;
  subject: string;
  /** Raw Date header, e.g. "Mon, 2 Feb 2026 10:30:00 +0100" */
  date: string;
  /** Plain text body, capped at BODY_CHAR_LIMIT characters */
  body: string;
  /** True when `body` was cut at the cap */
  truncated: boolean;
  attachments: AttachmentInfo[];
}

export type DecodedMessage = Omit<MessageRecord, "id">;

export type BounceReason =
  | "Mailbox does not exist"
  | "Mailbox full"
  | "Message rejected"
  | "Unknown reason";

/**
 * A delivery-failure notification found in a folder.
 *
 * `failedRecipient` is guessed from the notification body and may name the
 * wrong address; `recipientSource` says so to consumers.
 */
export interface BounceRecord {
  emailId: string;
  subject: string;
  date: string;
  failedRecipient: string | null;
  reason: BounceReason;
  recipientSource: "heuristic";
}
