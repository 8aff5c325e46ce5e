import nodemailer from "nodemailer";
import { AuthenticationError, ConnectionError, errorCode } from "../errors.js";
import { createLogger } from "../log.js";

const log = createLogger("smtp");

/**
 * Configuration for the SMTP submission server.
 */
export interface SmtpConfig {
  host: string;
  port: number;
  /** true = implicit TLS (port 465), false = STARTTLS */
  secure: boolean;
  auth: {
    user: string;
    pass: string;
  };
}

export interface Envelope {
  from: string;
  to: string[];
}

export interface SubmitResult {
  messageId?: string;
}

/**
 * Anything that can deliver an already-assembled message.
 */
export interface MessageTransport {
  submit(raw: string, envelope: Envelope): Promise<SubmitResult>;
}

/**
 * Classify a nodemailer error into an authentication or connection failure.
 */
export function classifySmtpError(error: unknown, config: SmtpConfig): ConnectionError {
  const message = error instanceof Error ? error.message : String(error);
  const code = errorCode(error);

  if (code === "EAUTH") {
    return new AuthenticationError(
      "SMTP authentication failed. Check SMTP_USER and SMTP_PASS credentials.",
      { cause: error }
    );
  }

  if (code === "ECONNECTION" || code === "ESOCKET" || code === "ETIMEDOUT" || code === "EDNS") {
    return new ConnectionError(
      `Cannot reach SMTP server at ${config.host}:${config.port}: ${message}`,
      { cause: error }
    );
  }

  return new ConnectionError(`SMTP error: ${message}`, { cause: error });
}

/**
 * SMTP submission client. Opens a fresh transport per message.
 */
export class SmtpClient implements MessageTransport {
  private config: SmtpConfig;

  constructor(config: SmtpConfig) {
    this.config = config;
  }

  /**
   * Submit raw message bytes to every envelope recipient.
   */
  async submit(raw: string, envelope: Envelope): Promise<SubmitResult> {
    const transporter = nodemailer.createTransport({
      host: this.config.host,
      port: this.config.port,
      secure: this.config.secure,
      auth: {
        user: this.config.auth.user,
        pass: this.config.auth.pass,
      },
    });

    log.info(`Connecting to SMTP server ${this.config.host}:${this.config.port}`);

    try {
      const info = await transporter.sendMail({ envelope, raw });
      log.info(`Email sent to ${envelope.to.join(", ")}`);
      return { messageId: info.messageId };
    } catch (error) {
      throw classifySmtpError(error, this.config);
    } finally {
      transporter.close();
    }
  }
}
