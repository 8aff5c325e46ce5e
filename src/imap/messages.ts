import type { SearchObject } from "imapflow";
import { NotFoundError, ParseError } from "../errors.js";
import { createLogger } from "../log.js";
import type { ImapClient } from "./client.js";
import { decodeAttachments, decodeMessage } from "./decode.js";
import type { AttachmentData, MessageRecord } from "./types.js";

const log = createLogger("messages");

export const DEFAULT_LIMIT = 10;

export interface ListOptions {
  folder?: string;
  /** Substring matched against the From header by the server */
  senderFilter?: string;
  limit?: number;
}

export interface SearchOptions {
  /** Substring matched against Subject OR body by the server */
  query: string;
  folder?: string;
  /** Only messages on or after this date */
  since?: Date;
  limit?: number;
}

const MONTHS = [
  "jan", "feb", "mar", "apr", "may", "jun",
  "jul", "aug", "sep", "oct", "nov", "dec",
];

/**
 * Parse a "since" date given either as ISO "2026-02-01" or in IMAP form
 * "01-Feb-2026". Returns null for anything else.
 */
export function parseSinceDate(value: string): Date | null {
  const trimmed = value.trim();

  const iso = /^(\d{4})-(\d{2})-(\d{2})$/.exec(trimmed);
  if (iso) {
    const date = new Date(
      Date.UTC(Number(iso[1]), Number(iso[2]) - 1, Number(iso[3]))
    );
    return date.getUTCDate() === Number(iso[3]) ? date : null;
  }

  const imap = /^(\d{1,2})-([A-Za-z]{3})-(\d{4})$/.exec(trimmed);
  if (imap) {
    const month = MONTHS.indexOf(imap[2].toLowerCase());
    if (month === -1) return null;
    const date = new Date(Date.UTC(Number(imap[3]), month, Number(imap[1])));
    return date.getUTCDate() === Number(imap[1]) ? date : null;
  }

  return null;
}

/**
 * Run a SEARCH in `folder`, keep the `limit` highest UIDs and decode each
 * message. Results are ordered highest UID (most recently appended) first.
 */
async function fetchMatching(
  imapClient: ImapClient,
  folder: string,
  query: SearchObject,
  limit: number
): Promise<MessageRecord[]> {
  const lock = await imapClient.openMailbox(folder);
  const sources: { uid: number; source: Buffer }[] = [];
  try {
    const client = imapClient.getClient();

    const uids = (await client.search(query, { uid: true })) || [];
    if (uids.length === 0) {
      return [];
    }

    const wanted = [...uids].sort((a, b) => b - a).slice(0, limit);

    for await (const msg of client.fetch(wanted.join(","), {
      uid: true,
      source: true,
    }, { uid: true })) {
      if (msg.source) {
        sources.push({ uid: msg.uid, source: msg.source });
      }
    }
  } finally {
    lock.release();
  }

  // Servers return FETCH results in ascending order regardless of the range
  sources.sort((a, b) => b.uid - a.uid);

  const records: MessageRecord[] = [];
  for (const { uid, source } of sources) {
    try {
      records.push({ id: String(uid), ...(await decodeMessage(source)) });
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      log.warn(`Skipping message ${uid} in ${folder}: ${error.message}`);
    }
  }
  return records;
}

/**
 * List the most recent messages in a folder, optionally only those whose
 * From header contains `senderFilter`.
 */
export async function listMessages(
  imapClient: ImapClient,
  options: ListOptions = {}
): Promise<MessageRecord[]> {
  const folder = options.folder || "INBOX";
  const limit = options.limit ?? DEFAULT_LIMIT;
  const query: SearchObject = options.senderFilter
    ? { from: options.senderFilter }
    : { all: true };

  const records = await fetchMatching(imapClient, folder, query, limit);
  log.info(`Listed ${records.length} emails from ${folder}`);
  return records;
}

/**
 * Search a folder for messages whose subject or body contains `query`.
 */
export async function searchMessages(
  imapClient: ImapClient,
  options: SearchOptions
): Promise<MessageRecord[]> {
  const folder = options.folder || "INBOX";
  const limit = options.limit ?? DEFAULT_LIMIT;
  const query: SearchObject = {
    or: [{ subject: options.query }, { body: options.query }],
  };
  if (options.since) {
    query.since = options.since;
  }

  const records = await fetchMatching(imapClient, folder, query, limit);
  log.info(`Found ${records.length} emails matching '${options.query}' in ${folder}`);
  return records;
}

async function fetchSource(
  imapClient: ImapClient,
  id: string,
  folder: string
): Promise<Buffer> {
  if (!/^\d+$/.test(id)) {
    throw new NotFoundError(`Email ${id} not found in ${folder}.`);
  }

  const lock = await imapClient.openMailbox(folder);
  try {
    const client = imapClient.getClient();
    const msg = await client.fetchOne(id, {
      uid: true,
      source: true,
    }, { uid: true });

    if (!msg || !msg.source) {
      throw new NotFoundError(`Email ${id} not found in ${folder}.`);
    }
    return msg.source;
  } finally {
    lock.release();
  }
}

/**
 * Fetch and decode a single message by UID.
 */
export async function readMessage(
  imapClient: ImapClient,
  id: string,
  folder: string = "INBOX"
): Promise<MessageRecord> {
  const source = await fetchSource(imapClient, id, folder);
  return { id, ...(await decodeMessage(source)) };
}

/**
 * Download the attachment at `index` (as listed by readMessage).
 */
export async function fetchAttachment(
  imapClient: ImapClient,
  id: string,
  index: number,
  folder: string = "INBOX"
): Promise<AttachmentData> {
  const source = await fetchSource(imapClient, id, folder);
  const attachments = await decodeAttachments(source);
  const attachment = attachments.find((a) => a.index === index);

  if (!attachment) {
    throw new NotFoundError(`Email ${id} has no attachment at index ${index}.`);
  }

  const { content, ...info } = attachment;
  return { emailId: id, ...info, contentBase64: content.toString("base64") };
}
