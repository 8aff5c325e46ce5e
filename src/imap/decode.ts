import { htmlToText } from "html-to-text";
import {
  simpleParser,
  type AddressObject,
  type ParsedMail,
  type StructuredHeader,
} from "mailparser";
import { ParseError } from "../errors.js";
import { createLogger } from "../log.js";
import type { AttachmentInfo, DecodedMessage } from "./types.js";

const log = createLogger("decode");

/** Bodies handed to callers are cut at this many characters. */
export const BODY_CHAR_LIMIT = 5000;

/**
 * Outcome of turning one MIME part into text. A failed part is reported,
 * not thrown, so the other candidate can still supply the body.
 */
export type PartText =
  | { status: "text"; text: string }
  | { status: "empty" }
  | { status: "error"; error: Error };

export function htmlPartText(html: string | false | undefined): PartText {
  if (!html) return { status: "empty" };
  try {
    const text = htmlToText(html, { wordwrap: false })
      .replace(/\n{3,}/g, "\n\n")
      .trim();
    return text ? { status: "text", text } : { status: "empty" };
  } catch (error) {
    return {
      status: "error",
      error: error instanceof Error ? error : new Error(String(error)),
    };
  }
}

export function plainPartText(text: string | undefined): PartText {
  const trimmed = text?.trimEnd();
  if (!trimmed) return { status: "empty" };
  return { status: "text", text: trimmed };
}

/**
 * Pick the body text: HTML wins over plain text, which wins over nothing.
 */
export function selectBody(html: PartText, plain: PartText): string {
  for (const part of [html, plain]) {
    if (part.status === "text") return part.text;
    if (part.status === "error") {
      log.debug(`Skipping undecodable body part: ${part.error.message}`);
    }
  }
  return "";
}

export function truncateBody(text: string): { body: string; truncated: boolean } {
  if (text.length <= BODY_CHAR_LIMIT) {
    return { body: text, truncated: false };
  }
  return { body: text.slice(0, BODY_CHAR_LIMIT), truncated: true };
}

function addressText(value: AddressObject | AddressObject[] | undefined): string {
  if (!value) return "";
  if (Array.isArray(value)) {
    return value.map((a) => a.text).join(", ");
  }
  return value.text;
}

/**
 * The Date header exactly as sent (unfolded), not mailparser's Date object.
 */
function rawDateHeader(parsed: ParsedMail): string {
  const header = parsed.headerLines.find((h) => h.key === "date");
  if (!header) return "";
  const value = header.line.slice(header.line.indexOf(":") + 1);
  return value.replace(/\r?\n[ \t]+/g, " ").trim();
}

/**
 * One leaf of the MIME tree. `raw` is the part's own header block and body,
 * still transfer-encoded.
 */
export interface MimeLeaf {
  contentType: string;
  /** "attachment", "inline" or "" */
  disposition: string;
  filename: string;
  raw: Buffer;
}

export interface DecodedAttachment extends AttachmentInfo {
  content: Buffer;
}

const MAX_MIME_DEPTH = 20;

/**
 * Split an entity at the first blank line. Works on latin1 strings so every
 * byte survives the round trip.
 */
function splitEntity(raw: Buffer): { header: string; body: string } {
  const text = raw.toString("latin1");
  const leading = /^\r?\n/.exec(text);
  if (leading) {
    return { header: "", body: text.slice(leading[0].length) };
  }
  const separator = /\r?\n\r?\n/.exec(text);
  if (!separator) {
    return { header: text, body: "" };
  }
  return {
    header: text.slice(0, separator.index),
    body: text.slice(separator.index + separator[0].length),
  };
}

/** Children of a multipart body, preamble and epilogue dropped. */
function multipartChildren(body: string, boundary: string): string[] {
  const delimiter = `--${boundary}`;
  const children: string[] = [];
  let current: string[] | null = null;

  for (const line of body.split(/\r?\n/)) {
    const trimmed = line.trimEnd();
    if (trimmed === delimiter || trimmed === `${delimiter}--`) {
      if (current) children.push(current.join("\r\n"));
      if (trimmed !== delimiter) return children;
      current = [];
      continue;
    }
    current?.push(line);
  }

  // Unterminated multipart: keep what arrived
  if (current) children.push(current.join("\r\n"));
  return children;
}

function structuredHeader(parsed: ParsedMail, key: string): StructuredHeader | undefined {
  const value = parsed.headers.get(key);
  if (typeof value === "object" && value !== null && "params" in value) {
    return value;
  }
  return undefined;
}

function headerBlock(header: string): Buffer {
  return Buffer.from(`${header}\r\n\r\n`, "latin1");
}

async function collectLeaves(raw: Buffer, leaves: MimeLeaf[], depth: number): Promise<void> {
  const { header, body } = splitEntity(raw);
  const headers = await parseRaw(headerBlock(header));
  const type = structuredHeader(headers, "content-type");
  const contentType = (type?.value ?? "text/plain").toLowerCase();
  const boundary = type?.params.boundary;

  if (contentType.startsWith("multipart/") && boundary && depth < MAX_MIME_DEPTH) {
    for (const child of multipartChildren(body, boundary)) {
      await collectLeaves(Buffer.from(child, "latin1"), leaves, depth + 1);
    }
    return;
  }

  const disposition = structuredHeader(headers, "content-disposition");
  leaves.push({
    contentType,
    disposition: (disposition?.value ?? "").toLowerCase(),
    filename: disposition?.params.filename || type?.params.name || "",
    raw,
  });
}

/**
 * Leaf parts of a message in MIME tree order. Nested messages are leaves.
 */
export async function mimeLeaves(raw: Buffer | string): Promise<MimeLeaf[]> {
  const leaves: MimeLeaf[] = [];
  await collectLeaves(typeof raw === "string" ? Buffer.from(raw, "utf-8") : raw, leaves, 0);
  return leaves;
}

/** Any part marked attachment or inline that carries a filename. */
export function isListedAttachment(leaf: MimeLeaf): boolean {
  return (
    leaf.filename.length > 0 &&
    (leaf.disposition === "attachment" || leaf.disposition === "inline")
  );
}

function isBodyCandidate(leaf: MimeLeaf, contentType: string): boolean {
  return (
    leaf.contentType === contentType &&
    leaf.disposition !== "attachment" &&
    !isListedAttachment(leaf)
  );
}

async function leafText(leaf: MimeLeaf | undefined, kind: "html" | "plain"): Promise<PartText> {
  if (!leaf) return { status: "empty" };
  try {
    const parsed = await simpleParser(leaf.raw);
    return kind === "html" ? htmlPartText(parsed.html) : plainPartText(parsed.text);
  } catch (error) {
    return {
      status: "error",
      error: error instanceof Error ? error : new Error(String(error)),
    };
  }
}

/**
 * mailparser folds inline text parts into the body, so the disposition is
 * rewritten to get the payload back as an attachment.
 */
function asAttachment(raw: Buffer): Buffer {
  const { header, body } = splitEntity(raw);
  const rewritten = header.replace(/^(content-disposition:[ \t]*)inline\b/im, "$1attachment");
  return Buffer.from(`${rewritten}\r\n\r\n${body}`, "latin1");
}

async function decodeLeafAttachment(leaf: MimeLeaf, index: number): Promise<DecodedAttachment> {
  const parsed = await parseRaw(leaf.disposition === "inline" ? asAttachment(leaf.raw) : leaf.raw);
  const content = parsed.attachments[0]?.content ?? Buffer.alloc(0);
  return {
    index,
    filename: parsed.attachments[0]?.filename || leaf.filename,
    contentType: leaf.contentType,
    size: content.length,
    content,
  };
}

/**
 * Attachment parts in MIME tree order, with their decoded payloads.
 * The array index is the attachment's `index`.
 */
export async function decodeAttachments(
  raw: Buffer | string | MimeLeaf[]
): Promise<DecodedAttachment[]> {
  const leaves = Array.isArray(raw) ? raw : await mimeLeaves(raw);
  const listed = leaves.filter(isListedAttachment);
  const attachments: DecodedAttachment[] = [];
  for (const [index, leaf] of listed.entries()) {
    attachments.push(await decodeLeafAttachment(leaf, index));
  }
  return attachments;
}

export async function parseRaw(raw: Buffer | string): Promise<ParsedMail> {
  try {
    return await simpleParser(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ParseError(`Unparseable message: ${message}`, { cause: error });
  }
}

/**
 * Decode a raw RFC 822 message into headers, a capped text body and
 * attachment metadata.
 */
export async function decodeMessage(raw: Buffer | string): Promise<DecodedMessage> {
  const source = typeof raw === "string" ? Buffer.from(raw, "utf-8") : raw;
  const parsed = await parseRaw(headerBlock(splitEntity(source).header));
  const leaves = await mimeLeaves(source);

  // The first part of each kind is the body candidate; later ones are ignored
  const text = selectBody(
    await leafText(leaves.find((leaf) => isBodyCandidate(leaf, "text/html")), "html"),
    await leafText(leaves.find((leaf) => isBodyCandidate(leaf, "text/plain")), "plain")
  );
  const { body, truncated } = truncateBody(text);

  const attachments = await decodeAttachments(leaves);

  return {
    from: addressText(parsed.from),
    to: addressText(parsed.to),
    subject: parsed.subject ?? "",
    date: rawDateHeader(parsed),
    body,
    truncated,
    attachments: attachments.map(({ index, filename, contentType, size }) => ({
      index,
      filename,
      contentType,
      size,
    })),
  };
}
