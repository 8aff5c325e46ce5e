import { resolveMx } from "node:dns/promises";
import type { MxRecord } from "node:dns";
import { createConnection } from "node:net";
import { describeError } from "../errors.js";
import { createLogger } from "../log.js";
import { parseAddressList } from "./address.js";

const log = createLogger("verify");

export const PROBE_PORT = 25;
export const PROBE_TIMEOUT_MS = 10_000;

/** true / false when the server answered clearly, "unknown" otherwise. */
export type Existence = boolean | "unknown";

export interface VerificationResult {
  email: string;
  exists: Existence;
  reason: string;
  method: "syntax" | "mx" | "smtp";
}

export type ProbeStage = "greeting" | "helo" | "mail" | "rcpt";

/**
 * The last reply seen during a probe. Only a reply at the "rcpt" stage says
 * anything about the mailbox.
 */
export interface ProbeReply {
  stage: ProbeStage;
  code: number;
  message: string;
}

export interface ProbeOptions {
  port?: number;
  timeoutMs?: number;
  /** Name announced in HELO */
  heloName?: string;
  /** Address used in MAIL FROM */
  mailFrom?: string;
}

export interface VerifyOptions extends ProbeOptions {
  resolveMx?: (domain: string) => Promise<MxRecord[]>;
  probe?: (host: string, address: string, options: ProbeOptions) => Promise<ProbeReply>;
}

/**
 * Map the RCPT TO reply code to a mailbox verdict.
 */
export function classifyRcptCode(code: number): Existence {
  if (code === 250) return true;
  if (code === 550 || code === 551 || code === 553) return false;
  return "unknown";
}

/**
 * Talk to a mail exchanger up to RCPT TO, then QUIT. No message is sent.
 * Rejects on socket errors, timeouts and early disconnects.
 */
export function probeMailbox(
  host: string,
  address: string,
  options: ProbeOptions = {}
): Promise<ProbeReply> {
  const port = options.port ?? PROBE_PORT;
  const timeoutMs = options.timeoutMs ?? PROBE_TIMEOUT_MS;
  const heloName = options.heloName ?? "localhost";
  const mailFrom = options.mailFrom ?? "";

  const steps: { stage: ProbeStage; command?: string }[] = [
    { stage: "greeting", command: `HELO ${heloName}` },
    { stage: "helo", command: `MAIL FROM:<${mailFrom}>` },
    { stage: "mail", command: `RCPT TO:<${address}>` },
    { stage: "rcpt" },
  ];

  return new Promise<ProbeReply>((resolve, reject) => {
    const socket = createConnection({ host, port });
    socket.setEncoding("utf8");
    socket.setTimeout(timeoutMs);

    let step = 0;
    let buffer = "";
    let settled = false;

    const settle = (outcome: { reply: ProbeReply } | { error: Error }) => {
      if (settled) return;
      settled = true;
      if ("reply" in outcome) {
        if (socket.writable) socket.end("QUIT\r\n");
        resolve(outcome.reply);
      } else {
        socket.destroy();
        reject(outcome.error);
      }
    };

    const onReply = (code: number, message: string) => {
      const { stage, command } = steps[step];
      if (code < 200 || code >= 400 || !command) {
        settle({ reply: { stage, code, message } });
        return;
      }
      step += 1;
      socket.write(`${command}\r\n`);
    };

    socket.on("data", (chunk: string) => {
      buffer += chunk;
      let newline = buffer.indexOf("\n");
      while (newline !== -1 && !settled) {
        const line = buffer.slice(0, newline).replace(/\r$/, "");
        buffer = buffer.slice(newline + 1);
        newline = buffer.indexOf("\n");

        // "250-..." continues a multi-line reply; "250 ..." or "250" ends it
        const match = /^(\d{3})(?:([ -])(.*))?$/.exec(line);
        if (!match || match[2] === "-") continue;
        onReply(Number(match[1]), match[3] ?? "");
      }
    });

    socket.on("timeout", () => {
      if (settled) {
        // Server never closed after QUIT
        socket.destroy();
        return;
      }
      settle({ error: new Error(`SMTP probe to ${host} timed out`) });
    });
    socket.on("error", (error) => {
      settle({ error });
    });
    socket.on("close", () => {
      settle({ error: new Error(`SMTP probe to ${host} closed before RCPT TO`) });
    });
  });
}

/**
 * Best-effort check that a mailbox exists, by asking its mail exchanger.
 * Accepts a bare address or one with a display name.
 * Never throws: anything inconclusive is reported as exists: "unknown".
 */
export async function verifyRecipient(
  email: string,
  options: VerifyOptions = {}
): Promise<VerificationResult> {
  const { mailboxes, invalid } = parseAddressList(email);
  if (mailboxes.length !== 1 || invalid.length > 0) {
    return {
      email,
      exists: "unknown",
      reason: "Not a single parseable email address",
      method: "syntax",
    };
  }
  const { address } = mailboxes[0];

  const domain = address.slice(address.lastIndexOf("@") + 1);
  const lookup = options.resolveMx ?? resolveMx;
  const probe = options.probe ?? probeMailbox;

  let records: MxRecord[];
  try {
    records = await lookup(domain);
  } catch (error) {
    return {
      email,
      exists: "unknown",
      reason: `MX lookup for ${domain} failed: ${describeError(error)}`,
      method: "mx",
    };
  }

  if (records.length === 0) {
    return { email, exists: "unknown", reason: `No MX records for ${domain}`, method: "mx" };
  }

  const [mx] = [...records].sort((a, b) => a.priority - b.priority);

  let reply: ProbeReply;
  try {
    reply = await probe(mx.exchange, address, options);
  } catch (error) {
    log.debug(`Probe of ${mx.exchange} failed: ${describeError(error)}`);
    return {
      email,
      exists: "unknown",
      reason: `SMTP check against ${mx.exchange} failed: ${describeError(error)}`,
      method: "smtp",
    };
  }

  if (reply.stage !== "rcpt") {
    return {
      email,
      exists: "unknown",
      reason: `${mx.exchange} refused the check at ${reply.stage} (${reply.code})`,
      method: "smtp",
    };
  }

  const exists = classifyRcptCode(reply.code);
  const reason =
    exists === true
      ? "Mailbox accepted by server"
      : exists === false
        ? `Mailbox rejected by server (${reply.code})`
        : `Inconclusive server reply (${reply.code})`;

  return { email, exists, reason, method: "smtp" };
}
