/**
 * MCP tool definitions for the mail assistant.
 *
 * Each tool co-locates its schema and handler in a single registration object.
 * Adding a new tool means adding a new entry to the registry; no dispatch
 * logic needs to change.
 */

import { describeError } from "../errors.js";
import {
  listMessages,
  searchMessages,
  readMessage,
  fetchAttachment,
  findBouncedEmails,
  parseSinceDate,
  DEFAULT_LIMIT,
} from "../imap/index.js";
import type { ImapClient, MessageRecord } from "../imap/index.js";
import { createLogger } from "../log.js";
import { buildSignature, type SignatureStore } from "../signatures/store.js";
import { sendEmail } from "../smtp/index.js";
import type { MessageTransport, VerificationResult } from "../smtp/index.js";

const log = createLogger("tools");

/** Upper bound for any `limit` argument. */
export const MAX_LIMIT = 50;

/** Appended to bodies that were cut at the size cap. */
export const TRUNCATION_MARKER = "\n\n[... truncated]";

// ---------------------------------------------------------------------------
// Tool registry types and helpers
// ---------------------------------------------------------------------------

/**
 * What the tool handlers operate on. One context serves the whole server.
 */
export interface ToolContext {
  imapClient: ImapClient;
  transport: MessageTransport;
  signatures: SignatureStore;
  verify: (email: string) => Promise<VerificationResult>;
  senderName?: string;
  sentFolder?: string;
}

export interface ToolResult {
  content: { type: "text"; text: string }[];
  isError?: true;
  [key: string]: unknown;
}

interface ToolRegistration {
  name: string;
  description: string;
  inputSchema: {
    type: "object";
    properties: Record<string, unknown>;
    required?: readonly string[];
  };
  handler: (
    context: ToolContext,
    args: Record<string, unknown>
  ) => Promise<ToolResult>;
}

function jsonResult(data: unknown): ToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(data, null, 2) }],
  };
}

function errorResult(message: string): ToolResult {
  return {
    content: [{ type: "text", text: message }],
    isError: true,
  };
}

function stringArg(args: Record<string, unknown>, key: string): string | undefined {
  const value = args[key];
  return typeof value === "string" && value.trim() !== "" ? value : undefined;
}

function integerArg(args: Record<string, unknown>, key: string): number | undefined {
  const value = args[key];
  if (typeof value === "number" && Number.isInteger(value)) return value;
  if (typeof value === "string" && /^-?\d+$/.test(value.trim())) return Number(value);
  return undefined;
}

function booleanArg(args: Record<string, unknown>, key: string): boolean | undefined {
  const value = args[key];
  if (typeof value === "boolean") return value;
  if (value === "true") return true;
  if (value === "false") return false;
  return undefined;
}

/**
 * Accepts an array of strings or a single address-list string. Lists are
 * parsed later, so quoted names containing commas survive.
 */
function addressListArg(args: Record<string, unknown>, key: string): string[] | undefined {
  const value = args[key];
  const items = Array.isArray(value)
    ? value.filter((v): v is string => typeof v === "string")
    : typeof value === "string"
      ? [value]
      : [];
  const addresses = items.map((a) => a.trim()).filter((a) => a.length > 0);
  return addresses.length > 0 ? addresses : undefined;
}

export function clampLimit(value: number | undefined, fallback: number = DEFAULT_LIMIT): number {
  if (value === undefined) return fallback;
  return Math.min(Math.max(value, 1), MAX_LIMIT);
}

/** Mark cut-off bodies for the reader. */
export function presentMessage(record: MessageRecord): MessageRecord {
  return record.truncated
    ? { ...record, body: record.body + TRUNCATION_MARKER }
    : record;
}

// ---------------------------------------------------------------------------
// Shared schema fragments
// ---------------------------------------------------------------------------

const FOLDER_SCHEMA = {
  folder: {
    type: "string",
    description: 'Mail folder to use. Default: "INBOX".',
  },
};

const LIMIT_SCHEMA = {
  limit: {
    type: "number",
    description: `Maximum number of emails to return (default: ${DEFAULT_LIMIT}, max: ${MAX_LIMIT}).`,
  },
};

const RECORD_SUFFIX =
  "Each email is {id, from, to, subject, date, body, truncated, attachments}, newest first. " +
  "Use the id with read_email or download_attachment.";

// ---------------------------------------------------------------------------
// Tool registry
// ---------------------------------------------------------------------------

const registry: ToolRegistration[] = [
  {
    name: "list_emails",
    description:
      "List the most recent emails in a folder, optionally only those from a given sender. " +
      RECORD_SUFFIX,
    inputSchema: {
      type: "object",
      properties: {
        ...FOLDER_SCHEMA,
        sender_filter: {
          type: "string",
          description: 'Only emails whose From contains this text (e.g. "alice@example.com").',
        },
        ...LIMIT_SCHEMA,
      },
    },
    handler: async ({ imapClient }, args) => {
      const emails = await listMessages(imapClient, {
        folder: stringArg(args, "folder"),
        senderFilter: stringArg(args, "sender_filter"),
        limit: clampLimit(integerArg(args, "limit")),
      });
      return jsonResult({ count: emails.length, emails: emails.map(presentMessage) });
    },
  },

  {
    name: "read_email",
    description:
      "Read the full content of one email by its id (from list_emails or search_emails). " +
      "Returns {id, from, to, subject, date, body, truncated, attachments}; " +
      "attachments carry metadata only; use download_attachment for the data.",
    inputSchema: {
      type: "object",
      properties: {
        email_id: {
          type: "string",
          description: "The email id from list or search results.",
        },
        ...FOLDER_SCHEMA,
      },
      required: ["email_id"],
    },
    handler: async ({ imapClient }, args) => {
      const id = stringArg(args, "email_id") ?? integerArg(args, "email_id")?.toString();
      if (!id) return errorResult("Error: email_id is required.");

      const email = await readMessage(imapClient, id, stringArg(args, "folder"));
      return jsonResult(presentMessage(email));
    },
  },

  {
    name: "search_emails",
    description:
      "Search emails whose subject or body contains the query, optionally only since a date. " +
      RECORD_SUFFIX,
    inputSchema: {
      type: "object",
      properties: {
        query: {
          type: "string",
          description: "Text to look for in subject and body.",
        },
        ...FOLDER_SCHEMA,
        from_date: {
          type: "string",
          description: 'Only emails on or after this date: "2026-02-01" or "01-Feb-2026".',
        },
        ...LIMIT_SCHEMA,
      },
      required: ["query"],
    },
    handler: async ({ imapClient }, args) => {
      const query = stringArg(args, "query");
      if (!query) return errorResult("Error: query is required.");

      const fromDate = stringArg(args, "from_date");
      const since = fromDate ? parseSinceDate(fromDate) : undefined;
      if (since === null) {
        return errorResult(
          `Error: from_date "${fromDate}" is not a date. Use YYYY-MM-DD or DD-Mon-YYYY.`
        );
      }

      const emails = await searchMessages(imapClient, {
        query,
        folder: stringArg(args, "folder"),
        since,
        limit: clampLimit(integerArg(args, "limit")),
      });
      return jsonResult({ count: emails.length, emails: emails.map(presentMessage) });
    },
  },

  {
    name: "send_email",
    description:
      "Send a plain-text email. By default the recipient is verified against its mail server first " +
      "(a definite \"does not exist\" aborts the send) and a copy is stored in the Sent folder. " +
      "Returns {status, to, cc, subject, from, savedToSent, verification}.",
    inputSchema: {
      type: "object",
      properties: {
        to: {
          type: "string",
          description:
            'Recipient address list, e.g. "bob@example.com" or "Bob <bob@example.com>, carol@example.org".',
        },
        subject: { type: "string", description: "Email subject line." },
        body: { type: "string", description: "Email body (plain text)." },
        cc: {
          type: "array",
          items: { type: "string" },
          description: "Optional CC addresses; display names are allowed.",
        },
        from_name: {
          type: "string",
          description: "Sender display name. Defaults to SENDER_NAME.",
        },
        signature_name: {
          type: "string",
          description: "Name of a saved signature to append.",
        },
        verify_recipient: {
          type: "boolean",
          description: "Check the recipient exists before sending. Default: true.",
        },
        save_to_sent: {
          type: "boolean",
          description: "Store a copy in the Sent folder. Default: true.",
        },
      },
      required: ["to", "subject", "body"],
    },
    handler: async (context, args) => {
      const to = stringArg(args, "to");
      const subject = stringArg(args, "subject");
      const body = typeof args.body === "string" ? args.body : undefined;
      if (!to || !subject || body === undefined)
        return errorResult("Error: to, subject, and body are required.");

      try {
        const result = await sendEmail(
          {
            imapClient: context.imapClient,
            transport: context.transport,
            verify: context.verify,
            signatures: context.signatures,
            sentFolder: context.sentFolder,
          },
          {
            to,
            subject,
            body,
            cc: addressListArg(args, "cc"),
            fromName: stringArg(args, "from_name") ?? context.senderName,
            signatureName: stringArg(args, "signature_name"),
            verifyRecipient: booleanArg(args, "verify_recipient"),
            saveToSent: booleanArg(args, "save_to_sent"),
          }
        );
        return result.status === "sent"
          ? jsonResult(result)
          : { ...jsonResult(result), isError: true };
      } catch (error) {
        log.error(`Error sending email: ${describeError(error)}`);
        return {
          ...jsonResult({ status: "failed", to, subject, error: describeError(error) }),
          isError: true,
        };
      }
    },
  },

  {
    name: "download_attachment",
    description:
      "Download one attachment of an email. attachment_index is the index from read_email's " +
      "attachments list. Returns {emailId, index, filename, contentType, size, contentBase64}.",
    inputSchema: {
      type: "object",
      properties: {
        email_id: { type: "string", description: "The email id." },
        attachment_index: {
          type: "number",
          description: "Index of the attachment (from read_email).",
        },
        ...FOLDER_SCHEMA,
      },
      required: ["email_id", "attachment_index"],
    },
    handler: async ({ imapClient }, args) => {
      const id = stringArg(args, "email_id") ?? integerArg(args, "email_id")?.toString();
      const index = integerArg(args, "attachment_index");
      if (!id || index === undefined || index < 0)
        return errorResult("Error: email_id and a non-negative attachment_index are required.");

      const attachment = await fetchAttachment(imapClient, id, index, stringArg(args, "folder"));
      return jsonResult(attachment);
    },
  },

  {
    name: "check_bounced_emails",
    description:
      "Find delivery-failure notifications and guess which recipient failed and why. " +
      "failedRecipient is a heuristic (first address found in the notification) and may be wrong.",
    inputSchema: {
      type: "object",
      properties: {
        ...FOLDER_SCHEMA,
        since: {
          type: "string",
          description: 'Only notifications on or after this date: "2026-02-01" or "01-Feb-2026".',
        },
        ...LIMIT_SCHEMA,
      },
    },
    handler: async ({ imapClient }, args) => {
      const sinceArg = stringArg(args, "since");
      const since = sinceArg ? parseSinceDate(sinceArg) : undefined;
      if (since === null) {
        return errorResult(
          `Error: since "${sinceArg}" is not a date. Use YYYY-MM-DD or DD-Mon-YYYY.`
        );
      }

      const bounces = await findBouncedEmails(imapClient, {
        folder: stringArg(args, "folder"),
        since,
        limit: clampLimit(integerArg(args, "limit"), 20),
      });
      return jsonResult({ count: bounces.length, bounces });
    },
  },

  {
    name: "verify_email",
    description:
      "Check whether an email address exists by asking its mail server (MX lookup + RCPT TO). " +
      'Returns {email, exists: true | false | "unknown", reason, method}.',
    inputSchema: {
      type: "object",
      properties: {
        email: { type: "string", description: "Address to check." },
      },
      required: ["email"],
    },
    handler: async ({ verify }, args) => {
      const email = stringArg(args, "email");
      if (!email) return errorResult("Error: email is required.");
      return jsonResult(await verify(email));
    },
  },

  {
    name: "save_signature",
    description: "Save (or replace) a named email signature. Plain text or HTML.",
    inputSchema: {
      type: "object",
      properties: {
        signature: { type: "string", description: "Signature text or HTML." },
        name: { type: "string", description: 'Signature name. Default: "default".' },
      },
      required: ["signature"],
    },
    handler: async ({ signatures }, args) => {
      const signature = stringArg(args, "signature");
      if (!signature) return errorResult("Error: signature is required.");
      const name = stringArg(args, "name") ?? "default";

      await signatures.save(name, signature);
      return jsonResult({ saved: name });
    },
  },

  {
    name: "create_signature",
    description:
      "Build a plain-text signature from contact details and save it under a name.",
    inputSchema: {
      type: "object",
      properties: {
        full_name: { type: "string", description: "Full name." },
        email: { type: "string", description: "Email address." },
        role: { type: "string", description: "Job title." },
        company: { type: "string", description: "Company name." },
        phone: { type: "string", description: "Phone number." },
        name: { type: "string", description: 'Signature name. Default: "default".' },
      },
      required: ["full_name", "email"],
    },
    handler: async ({ signatures }, args) => {
      const fullName = stringArg(args, "full_name");
      const email = stringArg(args, "email");
      if (!fullName || !email)
        return errorResult("Error: full_name and email are required.");

      const signature = buildSignature({
        fullName,
        email,
        role: stringArg(args, "role"),
        company: stringArg(args, "company"),
        phone: stringArg(args, "phone"),
      });
      const name = stringArg(args, "name") ?? "default";
      await signatures.save(name, signature);
      return jsonResult({ saved: name, signature });
    },
  },

  {
    name: "get_signature",
    description: "Get a saved signature by name.",
    inputSchema: {
      type: "object",
      properties: {
        name: { type: "string", description: 'Signature name. Default: "default".' },
      },
    },
    handler: async ({ signatures }, args) => {
      const name = stringArg(args, "name") ?? "default";
      const signature = await signatures.get(name);
      if (signature === null) return errorResult(`No signature named '${name}'.`);
      return jsonResult({ name, signature });
    },
  },

  {
    name: "list_signatures",
    description: "List all saved signatures as {name: text}.",
    inputSchema: {
      type: "object",
      properties: {},
    },
    handler: async ({ signatures }) => {
      return jsonResult(await signatures.list());
    },
  },

  {
    name: "delete_signature",
    description: "Delete a saved signature by name.",
    inputSchema: {
      type: "object",
      properties: {
        name: { type: "string", description: "Signature name." },
      },
      required: ["name"],
    },
    handler: async ({ signatures }, args) => {
      const name = stringArg(args, "name");
      if (!name) return errorResult("Error: name is required.");

      const deleted = await signatures.delete(name);
      if (!deleted) return errorResult(`No signature named '${name}'.`);
      return jsonResult({ deleted: name });
    },
  },
];

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** Tool schemas for MCP ListTools response. */
export const tools = registry.map(({ name, description, inputSchema }) => ({
  name,
  description,
  inputSchema,
}));

/** Map-based dispatch over the registry. */
const handlerMap = new Map(
  registry.map((t) => [t.name, t.handler])
);

/**
 * Run a tool. Failures come back as an error result, never as a throw.
 */
export async function handleToolCall(
  context: ToolContext,
  name: string,
  args: Record<string, unknown>
): Promise<ToolResult> {
  const handler = handlerMap.get(name);
  if (!handler)
    return errorResult(`Unknown tool: ${name}`);

  try {
    return await handler(context, args);
  } catch (error) {
    const message = describeError(error);
    log.error(`Error executing ${name}: ${message}`);
    return errorResult(`Error executing ${name}: ${message}`);
  }
}
