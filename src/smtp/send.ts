import { NotFoundError, describeError } from "../errors.js";
import { appendToSent, type ImapClient } from "../imap/index.js";
import { createLogger } from "../log.js";
import type { SignatureStore } from "../signatures/store.js";
import { requireAddresses } from "./address.js";
import { buildMessage, type OutboundMessage } from "./compose.js";
import type { MessageTransport } from "./transport.js";
import type { VerificationResult } from "./verify.js";

const log = createLogger("send");

export interface SendRequest extends Omit<OutboundMessage, "signature"> {
  /** Name of a stored signature to append */
  signatureName?: string;
  /** Probe the recipient's mail exchanger first (default true) */
  verifyRecipient?: boolean;
  /** Store a copy in the Sent folder after delivery (default true) */
  saveToSent?: boolean;
}

export interface SendDeps {
  imapClient: ImapClient;
  transport: MessageTransport;
  verify: (email: string) => Promise<VerificationResult>;
  signatures: SignatureStore;
  /** Overrides Sent-folder discovery */
  sentFolder?: string;
  now?: () => Date;
}

export interface SendResult {
  status: "sent" | "failed";
  to: string;
  cc: string[];
  subject: string;
  from: string;
  messageId?: string;
  savedToSent: boolean;
  sentFolderError?: string;
  verification?: VerificationResult[];
  error?: string;
}

/**
 * Copy the delivered message into the Sent folder. Runs after delivery has
 * succeeded; its failure is reported, never thrown.
 */
async function storeSentCopy(
  deps: SendDeps,
  raw: string,
  dateHeader: string
): Promise<{ savedToSent: boolean; sentFolderError?: string }> {
  try {
    const folder = await appendToSent(
      deps.imapClient,
      Buffer.from(raw, "utf-8"),
      new Date(dateHeader),
      deps.sentFolder
    );
    log.info(`Email saved to ${folder}`);
    return { savedToSent: true };
  } catch (error) {
    const message = describeError(error);
    log.warn(`Failed to save email to Sent folder: ${message}`);
    return { savedToSent: false, sentFolderError: message };
  }
}

/**
 * Verify, compose, deliver and file one message.
 * Throws InvalidAddressError before anything is sent if To or Cc is unusable.
 */
export async function sendEmail(
  deps: SendDeps,
  request: SendRequest
): Promise<SendResult> {
  const cc = request.cc ?? [];
  const shouldVerify = request.verifyRecipient ?? true;
  const shouldSave = request.saveToSent ?? true;
  const sender = deps.imapClient.user;

  const base = {
    to: request.to,
    cc,
    subject: request.subject,
    from: request.fromName ? `${request.fromName} <${sender}>` : sender,
  };

  let verification: VerificationResult[] | undefined;
  if (shouldVerify) {
    verification = [];
    for (const { address } of requireAddresses(request.to, "To")) {
      const result = await deps.verify(address);
      verification.push(result);

      if (result.exists === false) {
        log.warn(`Not sending to ${address}: ${result.reason}`);
        return {
          ...base,
          status: "failed",
          savedToSent: false,
          verification,
          error: `Recipient ${address} does not exist: ${result.reason}`,
        };
      }
      if (result.exists === "unknown") {
        log.warn(`Could not verify ${address}, sending anyway: ${result.reason}`);
      }
    }
  }

  let signature: string | undefined;
  if (request.signatureName) {
    const stored = await deps.signatures.get(request.signatureName);
    if (stored === null) {
      throw new NotFoundError(`Signature '${request.signatureName}' not found.`);
    }
    signature = stored;
  }

  const composed = buildMessage(
    sender,
    { ...request, cc, signature },
    deps.now ? deps.now() : new Date()
  );

  const { messageId } = await deps.transport.submit(composed.raw, composed.envelope);
  log.info(`Email sent to ${composed.envelope.to.join(", ")}: ${request.subject}`);

  const sent = shouldSave
    ? await storeSentCopy(deps, composed.raw, composed.dateHeader)
    : { savedToSent: false };

  return {
    ...base,
    from: composed.from,
    status: "sent",
    messageId,
    ...sent,
    ...(verification ? { verification } : {}),
  };
}
