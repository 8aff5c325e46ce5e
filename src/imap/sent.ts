import { NotFoundError } from "../errors.js";
import type { ImapClient } from "./client.js";

const SENT_FOLDER_NAMES = ["sent", "sent items", "sent messages", "sent mail"];

/**
 * Find the folder that holds sent mail.
 *
 * A configured folder wins. Otherwise looks for the \Sent special-use
 * attribute, then for a conventionally named folder.
 */
export async function findSentFolder(
  imapClient: ImapClient,
  preferred?: string
): Promise<string> {
  if (preferred) return preferred;

  const client = await imapClient.connect();
  const mailboxes = await client.list();

  for (const mb of mailboxes) {
    if (mb.specialUse === "\\Sent") {
      return mb.path;
    }
  }

  for (const mb of mailboxes) {
    if (SENT_FOLDER_NAMES.includes(mb.name.toLowerCase())) {
      return mb.path;
    }
  }

  throw new NotFoundError(
    "Could not find a Sent folder. Set SENT_FOLDER to the folder path."
  );
}

/**
 * Store a copy of a delivered message in the Sent folder, marked as read.
 * Returns the folder it was stored in.
 */
export async function appendToSent(
  imapClient: ImapClient,
  raw: Buffer,
  date: Date,
  preferred?: string
): Promise<string> {
  const folder = await findSentFolder(imapClient, preferred);
  const client = await imapClient.connect();
  await client.append(folder, raw, ["\\Seen"], date);
  return folder;
}
