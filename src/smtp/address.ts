import addressparser from "nodemailer/lib/addressparser/index.js";
import { InvalidAddressError } from "../errors.js";

const EMAIL_SYNTAX = /^[^\s@<>]+@[^\s@<>]+\.[^\s@<>]+$/;

/**
 * One parsed address: the bare `local@domain` plus its display name, if any.
 */
export interface Mailbox {
  name: string;
  address: string;
}

export interface ParsedAddressList {
  mailboxes: Mailbox[];
  /** Entries that do not contain a usable address, as written */
  invalid: string[];
}

export function isEmailAddress(value: string): boolean {
  return EMAIL_SYNTAX.test(value);
}

/**
 * Parse one or more address-list header values, e.g.
 * `Bob <bob@example.com>, "Doe, John" <john@example.com>`.
 * Groups are flattened into their members.
 */
export function parseAddressList(value: string | string[]): ParsedAddressList {
  const mailboxes: Mailbox[] = [];
  const invalid: string[] = [];

  for (const entry of Array.isArray(value) ? value : [value]) {
    if (entry.trim().length === 0) continue;
    for (const { name, address } of addressparser(entry, { flatten: true })) {
      if (isEmailAddress(address)) {
        mailboxes.push({ name, address });
      } else if (address || name) {
        invalid.push(address || name);
      }
    }
  }

  return { mailboxes, invalid };
}

/**
 * Like parseAddressList, but any unusable entry is an argument error.
 */
export function requireAddresses(value: string | string[], field: string): Mailbox[] {
  const { mailboxes, invalid } = parseAddressList(value);
  if (invalid.length > 0) {
    throw new InvalidAddressError(
      `Invalid ${field} address: ${invalid.map((a) => `"${a}"`).join(", ")}`
    );
  }
  return mailboxes;
}
