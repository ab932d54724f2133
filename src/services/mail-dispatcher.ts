/**
 * SMTP delivery of composed reminder messages
 */

import { stat } from "fs/promises";
import { basename } from "path";
import nodemailer, { type SendMailOptions } from "nodemailer";
import pRetry from "p-retry";
import { sanitizeEmail, sanitizeHeaderValue } from "../core/agreement-extractor.js";
import { logger } from "../utils/logger.js";
import {
  getErrorCode,
  getErrorMessage,
  isRetryableError,
} from "../utils/error-handler.js";
import type {
  AppConfig,
  DispatchResult,
  OutgoingMessage,
} from "../types/index.js";

// ============================================================================
// TYPES
// ============================================================================

/** The part of a nodemailer transporter the dispatcher relies on */
export interface MailTransport {
  sendMail(options: SendMailOptions): Promise<{ messageId: string }>;
}

export interface NotificationDispatcher {
  send(message: OutgoingMessage): Promise<DispatchResult>;
}

export interface SmtpDispatcherOptions {
  host: string;
  port: number;
  user: string;
  password: string;
  retryAttempts: number;
  retryDelayMs: number;
  /** Replaces the nodemailer SMTP transport, e.g. in tests */
  transport?: MailTransport;
}

// ============================================================================
// DISPATCHER
// ============================================================================

export class SmtpDispatcher implements NotificationDispatcher {
  private transport: MailTransport | null;

  constructor(private readonly options: SmtpDispatcherOptions) {
    this.transport = options.transport ?? null;
  }

  static fromConfig(config: AppConfig): SmtpDispatcher {
    return new SmtpDispatcher({
      host: config.smtp.host,
      port: config.smtp.port,
      user: config.mail.sender,
      password: config.mail.password,
      retryAttempts: config.smtp.retryAttempts,
      retryDelayMs: config.smtp.retryDelayMs,
    });
  }

  private getTransport(): MailTransport {
    if (!this.transport) {
      this.transport = nodemailer.createTransport({
        host: this.options.host,
        port: this.options.port,
        // 465 is implicit TLS, anything else upgrades with STARTTLS
        secure: this.options.port === 465,
        auth: { user: this.options.user, pass: this.options.password },
      });
    }
    return this.transport;
  }

  async send(message: OutgoingMessage): Promise<DispatchResult> {
    if (!this.options.user || !this.options.password) {
      logger.warn("Missing sender email or password; skipping email send");
      return { ok: false, kind: "config", error: "Sender credentials are not configured" };
    }

    const recipients = message.recipients.map(sanitizeEmail).filter(Boolean);
    if (recipients.length === 0) {
      logger.warn("No recipients provided; skipping email send");
      return { ok: false, kind: "config", error: "No recipients" };
    }

    const mail: SendMailOptions = {
      from: sanitizeHeaderValue(message.sender),
      to: recipients,
      subject: sanitizeHeaderValue(message.subject),
      text: message.body,
      attachments: await this.resolveAttachments(message.attachmentPath),
    };

    try {
      const info = await pRetry(() => this.getTransport().sendMail(mail), {
        retries: this.options.retryAttempts,
        minTimeout: this.options.retryDelayMs,
        onFailedAttempt: (error) => {
          if (!isRetryableError(error)) {
            throw error;
          }
          logger.warn("Retrying email send", {
            recipients,
            attempt: error.attemptNumber,
            retriesLeft: error.retriesLeft,
          });
        },
      });

      logger.info("Email sent", {
        recipients,
        subject: mail.subject,
        messageId: info.messageId,
      });
      return { ok: true, messageId: info.messageId };
    } catch (error) {
      const errorMessage = getErrorMessage(error);

      if (getErrorCode(error) === "EAUTH") {
        logger.error("SMTP authentication failed; check APP_EMAIL / APP_PASSWORD", {
          error: errorMessage,
        });
        return { ok: false, kind: "auth", error: errorMessage };
      }

      logger.error("Failed to send email", { recipients, error: errorMessage });
      return { ok: false, kind: "transport", error: errorMessage };
    }
  }

  /**
   * Attach the agreement file if it exists at send time
   */
  private async resolveAttachments(
    attachmentPath?: string,
  ): Promise<SendMailOptions["attachments"]> {
    if (!attachmentPath) return [];

    try {
      const stats = await stat(attachmentPath);
      if (stats.isFile()) {
        return [{ filename: basename(attachmentPath), path: attachmentPath }];
      }
    } catch (error) {
      logger.debug("Attachment lookup failed", {
        path: attachmentPath,
        error: getErrorMessage(error),
      });
    }

    logger.warn("Attachment not found; sending without it", {
      path: attachmentPath,
    });
    return [];
  }
}
