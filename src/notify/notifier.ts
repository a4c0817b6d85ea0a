import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { createTransport } from "nodemailer";
import type { MailConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { DeliveryError, errorMessage } from "../report/errors.js";
import { buildReportHtml, imageCid } from "./message.js";
import type { DeliveryResult, MailTransport, ReportMessage } from "./types.js";

export type TransportFactory = (config: MailConfig) => MailTransport;

/** Port 465 speaks TLS from the start; any other port must upgrade with STARTTLS. */
export const createSmtpTransport: TransportFactory = (config) =>
  createTransport({
    host: config.host,
    port: config.port,
    secure: config.port === 465,
    requireTLS: config.port !== 465,
    ...(config.user ? { auth: { user: config.user, pass: config.password ?? "" } } : {}),
  });

export class Notifier {
  private readonly logger: Logger;

  constructor(
    private readonly config: MailConfig,
    logger: Logger,
    private readonly transportFactory: TransportFactory = createSmtpTransport,
  ) {
    this.logger = logger.child({ component: "notifier" });
  }

  /**
   * Compose and submit the report. Never throws: every failure comes back
   * as `{ ok: false }` and is logged here.
   */
  async send(message: ReportMessage): Promise<DeliveryResult> {
    let transport: MailTransport | undefined;
    try {
      if (message.recipients.length === 0 && message.ccRecipients.length === 0) {
        throw new DeliveryError("No recipients configured");
      }

      const attachments = await Promise.all(
        message.imagePaths.map(async (path, i) => ({
          filename: basename(path),
          content: await readFile(path),
          cid: imageCid(i),
        })),
      );

      transport = this.transportFactory(this.config);
      const info = await transport.sendMail({
        from: this.config.from,
        to: message.recipients,
        cc: message.ccRecipients,
        subject: message.subject,
        html: buildReportHtml(message.body, message.rows, attachments.length),
        attachments,
      });

      this.logger.info(
        {
          messageId: info.messageId,
          to: message.recipients.length,
          cc: message.ccRecipients.length,
          images: attachments.length,
        },
        "Report sent",
      );
      return { ok: true, messageId: info.messageId };
    } catch (err) {
      const error =
        err instanceof DeliveryError
          ? err
          : new DeliveryError(`Failed to send report: ${errorMessage(err)}`, { cause: err });
      this.logger.error({ err: error }, "Report delivery failed");
      return { ok: false, error };
    } finally {
      transport?.close();
    }
  }
}
