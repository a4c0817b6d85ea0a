import { vi } from "vitest";
import type { SendMailOptions } from "nodemailer";
import { parseConfig } from "../../src/config/schema.js";
import type { BucketReportConfig } from "../../src/config/types.js";
import type { Logger } from "../../src/logging/logger.js";
import type { MailTransport } from "../../src/notify/types.js";
import type { CommandRunner, RawBucketStats } from "../../src/stats/types.js";

export function mockLogger() {
  const logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}

export function asLogger(mock: ReturnType<typeof mockLogger>): Logger {
  return mock as unknown as Logger;
}

export function silentLogger(): Logger {
  return asLogger(mockLogger());
}

export function makeConfig(overrides: Record<string, unknown> = {}): BucketReportConfig {
  return parseConfig(overrides);
}

/** `radosgw-admin bucket stats` entry with a populated `rgw.main` category. */
export function makeBucketStats(
  bucket: string,
  sizeKbUtilized: number,
  numObjects: number,
): RawBucketStats {
  return {
    bucket,
    usage: {
      "rgw.main": {
        size_kb: sizeKbUtilized,
        size_kb_actual: sizeKbUtilized,
        size_kb_utilized: sizeKbUtilized,
        num_objects: numObjects,
      },
    },
  };
}

/** A command runner that prints `output` as JSON, recording each call. */
export function fakeRunner(output: unknown) {
  const calls: { command: string; args: string[] }[] = [];
  const runner: CommandRunner = async (command, args) => {
    calls.push({ command, args });
    return typeof output === "string" ? output : JSON.stringify(output);
  };
  return { runner, calls };
}

export class CapturingTransport implements MailTransport {
  readonly sent: SendMailOptions[] = [];
  closed = 0;

  constructor(private readonly failWith?: Error) {}

  async sendMail(message: SendMailOptions): Promise<{ messageId: string }> {
    if (this.failWith) throw this.failWith;
    this.sent.push(message);
    return { messageId: `<test-${this.sent.length}@bucket-report.test>` };
  }

  close(): void {
    this.closed += 1;
  }
}
