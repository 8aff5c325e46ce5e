export { ImapClient, classifyImapError, isConnectionFailure } from "./client.js";
export {
  BODY_CHAR_LIMIT,
  decodeMessage,
  decodeAttachments,
  mimeLeaves,
  isListedAttachment,
  htmlPartText,
  plainPartText,
  selectBody,
  truncateBody,
} from "./decode.js";
export type { PartText, MimeLeaf, DecodedAttachment } from "./decode.js";
export {
  DEFAULT_LIMIT,
  listMessages,
  searchMessages,
  readMessage,
  fetchAttachment,
  parseSinceDate,
} from "./messages.js";
export type { ListOptions, SearchOptions } from "./messages.js";
export {
  BOUNCE_SUBJECT_PATTERNS,
  findBouncedEmails,
  extractFailedRecipient,
  classifyBounceReason,
} from "./bounces.js";
export type { BounceScanOptions } from "./bounces.js";
export { findSentFolder, appendToSent } from "./sent.js";
export type {
  ImapConfig,
  MessageRecord,
  DecodedMessage,
  AttachmentInfo,
  AttachmentData,
  BounceRecord,
  BounceReason,
} from "./types.js";
