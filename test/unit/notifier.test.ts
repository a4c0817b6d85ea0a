import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { createTransport } from "nodemailer";
import { Notifier } from "../../src/notify/notifier.js";
import type { ReportMessage } from "../../src/notify/types.js";
import { DeliveryError } from "../../src/report/errors.js";
import {
  CapturingTransport,
  asLogger,
  makeConfig,
  mockLogger,
} from "../helpers/fixtures.js";

const mail = makeConfig({
  mail: {
    host: "smtp.example.com",
    port: 587,
    user: "reporter",
    password: "test-secret",
    from: "reports@example.com",
  },
}).mail;

describe("Notifier", () => {
  let dir: string;
  let message: ReportMessage;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "bucket-report-notify-"));
    writeFileSync(join(dir, "b1-2024-01-01.png"), Buffer.from([0x89, 0x50, 0x4e, 0x47]));
    writeFileSync(join(dir, "b2-2024-01-01.png"), Buffer.from([1, 2, 3]));
    message = {
      recipients: ["ops@example.com"],
      ccRecipients: ["lead@example.com"],
      subject: "Bucket usage report 2024-01-01",
      body: "Daily bucket usage summary.",
      rows: [{ bucketName: "b1", usageGb: 12.5, objectCount: 340 }],
      imagePaths: [join(dir, "b1-2024-01-01.png"), join(dir, "b2-2024-01-01.png")],
    };
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("sends an HTML message with each image attached under its content id", async () => {
    const transport = new CapturingTransport();
    const notifier = new Notifier(mail, asLogger(mockLogger()), () => transport);

    const result = await notifier.send(message);

    expect(result).toEqual({ ok: true, messageId: "<test-1@bucket-report.test>" });
    expect(transport.sent).toHaveLength(1);
    const sent = transport.sent[0];
    expect(sent).toMatchObject({
      from: "reports@example.com",
      to: ["ops@example.com"],
      cc: ["lead@example.com"],
      subject: "Bucket usage report 2024-01-01",
    });
    expect(sent.attachments).toEqual([
      { filename: "b1-2024-01-01.png", content: Buffer.from([0x89, 0x50, 0x4e, 0x47]), cid: "image1" },
      { filename: "b2-2024-01-01.png", content: Buffer.from([1, 2, 3]), cid: "image2" },
    ]);
    expect(sent.html).toContain('<img src="cid:image2">');
    expect(transport.closed).toBe(1);
  });

  it("delivers to the union of recipients and cc", async () => {
    const json = createTransport({ jsonTransport: true });
    let envelopeTo: string[] = [];
    let cids: string[] = [];
    const notifier = new Notifier(mail, asLogger(mockLogger()), () => ({
      async sendMail(options) {
        const info = await json.sendMail(options);
        envelopeTo = info.envelope.to;
        const parsed = JSON.parse(info.message) as { attachments: { cid: string }[] };
        cids = parsed.attachments.map((a) => a.cid);
        return info;
      },
      close: () => json.close(),
    }));

    const result = await notifier.send(message);

    expect(result.ok).toBe(true);
    expect(envelopeTo).toEqual(["ops@example.com", "lead@example.com"]);
    expect(cids).toEqual(["image1", "image2"]);
  });

  it("returns a failure instead of throwing when login is rejected", async () => {
    const logger = mockLogger();
    const transport = new CapturingTransport(new Error("Invalid login: 535 Authentication failed"));
    const notifier = new Notifier(mail, asLogger(logger), () => transport);

    const result = await notifier.send(message);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(DeliveryError);
    expect(result.error.message).toBe(
      "Failed to send report: Invalid login: 535 Authentication failed",
    );
    expect(logger.error).toHaveBeenCalledWith(
      { err: result.error },
      "Report delivery failed",
    );
    expect(transport.closed).toBe(1);
  });

  it("returns a failure when the transport cannot be created", async () => {
    const notifier = new Notifier(mail, asLogger(mockLogger()), () => {
      throw new Error("getaddrinfo ENOTFOUND smtp.example.com");
    });

    const result = await notifier.send(message);

    expect(result).toMatchObject({ ok: false });
  });

  it("does not connect when an image is missing", async () => {
    const transport = new CapturingTransport();
    const notifier = new Notifier(mail, asLogger(mockLogger()), () => transport);

    const result = await notifier.send({ ...message, imagePaths: [join(dir, "gone.png")] });

    expect(result.ok).toBe(false);
    expect(transport.sent).toHaveLength(0);
    expect(transport.closed).toBe(0);
  });

  it("refuses to send without any recipient", async () => {
    const transport = new CapturingTransport();
    const notifier = new Notifier(mail, asLogger(mockLogger()), () => transport);

    const result = await notifier.send({ ...message, recipients: [], ccRecipients: [] });

    expect(result).toEqual({ ok: false, error: new DeliveryError("No recipients configured") });
  });
});
