import type { SearchObject } from "imapflow";
import { ParseError } from "../errors.js";
import { createLogger } from "../log.js";
import type { ImapClient } from "./client.js";
import { decodeMessage } from "./decode.js";
import type { BounceReason, BounceRecord, DecodedMessage } from "./types.js";

const log = createLogger("bounces");

/** Subjects used by common MTAs for delivery-failure notifications. */
export const BOUNCE_SUBJECT_PATTERNS = [
  "Mail Delivery Failed",
  "Undelivered Mail Returned to Sender",
  "Delivery Status Notification (Failure)",
  "Undeliverable",
  "Returned mail",
  "Mail delivery failed",
  "Failure Notice",
] as const;

const ADDRESS_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g;

const SYSTEM_LOCAL_PARTS = ["mailer-daemon", "postmaster"];

const REASON_RULES: { phrases: string[]; reason: BounceReason }[] = [
  {
    phrases: ["user unknown", "no such user", "does not exist"],
    reason: "Mailbox does not exist",
  },
  { phrases: ["quota exceeded", "mailbox full"], reason: "Mailbox full" },
  { phrases: ["rejected"], reason: "Message rejected" },
];

export interface BounceScanOptions {
  folder?: string;
  limit?: number;
  since?: Date;
}

/**
 * Guess the failed recipient: the first email-shaped string in the body that
 * is neither the account itself nor a mailer daemon. This is a heuristic;
 * notifications that quote the original headers may yield the wrong address.
 */
export function extractFailedRecipient(
  body: string,
  ownAddress?: string
): string | null {
  const own = ownAddress?.toLowerCase();
  for (const match of body.matchAll(ADDRESS_PATTERN)) {
    const address = match[0];
    const lower = address.toLowerCase();
    if (lower === own) continue;
    if (SYSTEM_LOCAL_PARTS.includes(lower.split("@")[0])) continue;
    return address;
  }
  return null;
}

export function classifyBounceReason(body: string): BounceReason {
  const lower = body.toLowerCase();
  for (const rule of REASON_RULES) {
    if (rule.phrases.some((phrase) => lower.includes(phrase))) {
      return rule.reason;
    }
  }
  return "Unknown reason";
}

/**
 * Find delivery-failure notifications in a folder, newest first.
 */
export async function findBouncedEmails(
  imapClient: ImapClient,
  options: BounceScanOptions = {}
): Promise<BounceRecord[]> {
  const folder = options.folder || "INBOX";
  const limit = options.limit ?? 20;

  const lock = await imapClient.openMailbox(folder);
  const sources: { uid: number; source: Buffer }[] = [];
  try {
    const client = imapClient.getClient();

    // Several patterns can match the same notification
    const matched = new Set<number>();
    for (const pattern of BOUNCE_SUBJECT_PATTERNS) {
      const query: SearchObject = { subject: pattern };
      if (options.since) query.since = options.since;
      const uids = (await client.search(query, { uid: true })) || [];
      for (const uid of uids) matched.add(uid);
    }

    if (matched.size === 0) {
      return [];
    }

    const wanted = [...matched].sort((a, b) => b - a).slice(0, limit);
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

  sources.sort((a, b) => b.uid - a.uid);

  const bounces: BounceRecord[] = [];
  for (const { uid, source } of sources) {
    let decoded: DecodedMessage;
    try {
      decoded = await decodeMessage(source);
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      log.warn(`Skipping bounce candidate ${uid}: ${error.message}`);
      continue;
    }

    bounces.push({
      emailId: String(uid),
      subject: decoded.subject,
      date: decoded.date,
      failedRecipient: extractFailedRecipient(decoded.body, imapClient.user),
      reason: classifyBounceReason(decoded.body),
      recipientSource: "heuristic",
    });
  }

  log.info(`Found ${bounces.length} bounced emails in ${folder}`);
  return bounces;
}
