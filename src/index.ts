#!/usr/bin/env node

import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfigFromEnv } from "./config.js";
import { errorCode } from "./errors.js";
import { ImapClient } from "./imap/index.js";
import { createLogger, setLogLevel } from "./log.js";
import { createServer } from "./server.js";
import { SignatureStore } from "./signatures/store.js";
import { SmtpClient, verifyRecipient } from "./smtp/index.js";

const log = createLogger("main");

// Keep the process alive on unexpected errors; log to stderr so the
// MCP client can surface the message in its logs.
function formatError(label: string, err: unknown): string {
  const lines = [label];
  if (err instanceof Error) {
    lines.push(`  Message: ${err.message}`);
    lines.push(`  Name:    ${err.name}`);
    const code = errorCode(err);
    if (code) lines.push(`  Code:    ${code}`);
    if (err.stack) lines.push(`  Stack:\n${err.stack}`);
  } else {
    lines.push(`  Value: ${JSON.stringify(err)}`);
  }
  lines.push(`  PID:   ${process.pid}`);
  lines.push(`  Node:  ${process.version}`);
  return lines.join("\n");
}

process.on("uncaughtException", (err) => {
  log.error(formatError("UNCAUGHT EXCEPTION", err));
});
process.on("unhandledRejection", (reason) => {
  log.error(formatError("UNHANDLED REJECTION", reason));
});

async function main() {
  const config = loadConfigFromEnv();
  setLogLevel(config.logLevel);

  const imapClient = new ImapClient(config.imap);
  const server = createServer({
    imapClient,
    transport: new SmtpClient(config.smtp),
    signatures: new SignatureStore(config.signatureFile),
    verify: (email) => verifyRecipient(email, config.verification),
    senderName: config.senderName,
    sentFolder: config.sentFolder,
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info(`Serving mailbox ${config.imap.auth.user}@${config.imap.host}`);

  // Graceful shutdown
  const shutdown = async () => {
    await imapClient.disconnect();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

main().catch((error) => {
  log.error(formatError("Fatal error", error));
  process.exit(1);
});
