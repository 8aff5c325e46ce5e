import { createMimeMessage, type MailboxAddrObject } from "mimetext";
import { InvalidAddressError } from "../errors.js";
import { requireAddresses, type Mailbox } from "./address.js";

/**
 * A message to send.
 */
export interface OutboundMessage {
  /** Recipient address list, e.g. `Bob <bob@example.com>, carol@example.org` */
  to: string;
  /** Each entry may itself hold several addresses */
  cc?: string[];
  subject: string;
  /** Plain text body */
  body: string;
  /** Display name for the From header */
  fromName?: string;
  /** Signature text, plain or HTML */
  signature?: string;
}

export interface MessageBodies {
  text: string;
  html?: string;
}

export interface ComposedMessage {
  raw: string;
  /** From header as shown to the recipient, e.g. "Alice <alice@example.com>" */
  from: string;
  date: Date;
  /** The Date header as written into the message */
  dateHeader: string;
  envelope: {
    from: string;
    to: string[];
  };
}

const WEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];
const MONTH_NAMES = [
  "Jan", "Feb", "Mar", "Apr", "May", "Jun",
  "Jul", "Aug", "Sep", "Oct", "Nov", "Dec",
];

/**
 * An HTML signature starts with a markup tag; anything else is plain text.
 */
export function isHtmlSignature(signature: string): boolean {
  return /^<[a-zA-Z!][^>]*>/.test(signature.trimStart());
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

/**
 * Attach a signature to the body.
 *
 * Plain signatures are appended after a blank line. HTML signatures leave the
 * plain part untouched and add an HTML alternative carrying the body with
 * line breaks, followed by the signature markup.
 */
export function mergeSignature(body: string, signature?: string): MessageBodies {
  if (!signature) {
    return { text: body };
  }

  if (isHtmlSignature(signature)) {
    const htmlBody = escapeHtml(body).replace(/\r?\n/g, "<br>");
    return { text: body, html: `<div>${htmlBody}</div>${signature}` };
  }

  return { text: `${body}\n\n${signature}` };
}

/**
 * RFC 2822 date in the machine's local time zone,
 * e.g. "Sun, 18 Oct 2026 15:20:00 +0200".
 */
export function formatDateHeader(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  const offset = -date.getTimezoneOffset();
  const sign = offset >= 0 ? "+" : "-";
  const abs = Math.abs(offset);

  return (
    `${WEEKDAYS[date.getDay()]}, ${pad(date.getDate())} ${MONTH_NAMES[date.getMonth()]} ${date.getFullYear()} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())} ` +
    `${sign}${pad(Math.floor(abs / 60))}${pad(abs % 60)}`
  );
}

/** Base64 body lines of at most 76 characters. */
function base64Body(text: string): string {
  const encoded = Buffer.from(text, "utf-8").toString("base64");
  return (encoded.match(/.{1,76}/g) ?? []).join("\r\n");
}

function mimeAddress({ name, address }: Mailbox): MailboxAddrObject {
  return name ? { name, addr: address } : { addr: address };
}

/**
 * Build a raw RFC 2822 message ready for submission.
 */
export function buildMessage(
  sender: string,
  message: OutboundMessage,
  date: Date = new Date()
): ComposedMessage {
  const msg = createMimeMessage();
  const to = requireAddresses(message.to, "To");
  const cc = requireAddresses(message.cc ?? [], "Cc");
  if (to.length === 0) {
    throw new InvalidAddressError("At least one To address is required.");
  }

  msg.setSender(
    message.fromName ? { name: message.fromName, addr: sender } : sender
  );
  msg.setTo(to.map(mimeAddress));
  if (cc.length > 0) {
    msg.setCc(cc.map(mimeAddress));
  }
  msg.setSubject(message.subject);
  const dateHeader = formatDateHeader(date);
  msg.setHeader("Date", dateHeader);

  const bodies = mergeSignature(message.body, message.signature);
  msg.addMessage({
    contentType: "text/plain",
    encoding: "base64",
    data: base64Body(bodies.text),
  });
  if (bodies.html) {
    msg.addMessage({
      contentType: "text/html",
      encoding: "base64",
      data: base64Body(bodies.html),
    });
  }

  return {
    raw: msg.asRaw(),
    from: message.fromName ? `${message.fromName} <${sender}>` : sender,
    date,
    dateHeader,
    envelope: {
      from: sender,
      to: [...to, ...cc].map((m) => m.address),
    },
  };
}
