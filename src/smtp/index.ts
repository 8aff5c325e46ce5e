export {
  buildMessage,
  mergeSignature,
  isHtmlSignature,
  formatDateHeader,
} from "./compose.js";
export { parseAddressList, requireAddresses, isEmailAddress } from "./address.js";
export type { Mailbox, ParsedAddressList } from "./address.js";
export type { OutboundMessage, MessageBodies, ComposedMessage } from "./compose.js";
export { SmtpClient, classifySmtpError } from "./transport.js";
export type { SmtpConfig, Envelope, SubmitResult, MessageTransport } from "./transport.js";
export {
  verifyRecipient,
  probeMailbox,
  classifyRcptCode,
  PROBE_PORT,
  PROBE_TIMEOUT_MS,
} from "./verify.js";
export type {
  VerificationResult,
  Existence,
  ProbeReply,
  ProbeStage,
  ProbeOptions,
  VerifyOptions,
} from "./verify.js";
export { sendEmail } from "./send.js";
export type { SendRequest, SendResult, SendDeps } from "./send.js";
