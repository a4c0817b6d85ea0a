import type { SendMailOptions } from "nodemailer";
import type { DeliveryError } from "../report/errors.js";

export interface ReportRow {
  readonly bucketName: string;
  readonly usageGb: number;
  readonly objectCount: number;
}

export interface ReportMessage {
  readonly recipients: string[];
  readonly ccRecipients: string[];
  readonly subject: string;
  readonly body: string;
  readonly rows: ReportRow[];
  readonly imagePaths: string[];
}

export type DeliveryResult =
  | { readonly ok: true; readonly messageId: string }
  | { readonly ok: false; readonly error: DeliveryError };

/** The slice of a nodemailer transporter the notifier uses. */
export interface MailTransport {
  sendMail(message: SendMailOptions): Promise<{ messageId: string }>;
  close(): void;
}
