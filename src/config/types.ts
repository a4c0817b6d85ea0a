export interface BucketReportConfig {
  readonly stats: StatsConfig;
  readonly ledger: LedgerConfig;
  readonly report: ReportConfig;
  readonly mail: MailConfig;
  readonly schedule: ScheduleConfig;
  readonly exporter: ExporterConfig;
  readonly logging?: LoggingConfig;
}

export interface StatsConfig {
  readonly command: string;
  readonly args: string[];
  readonly cluster?: string;
  readonly conf?: string;
  readonly keyring?: string;
  /** 0 waits for the command indefinitely */
  readonly timeoutMs: number;
}

export interface LedgerConfig {
  readonly dir?: string;
  readonly maxEntries: number;
  readonly enforceOrder: boolean;
  /** Attempts to take a busy ledger lock before the append fails. */
  readonly lockRetries: number;
  readonly lockStaleMs: number;
}

export interface ReportConfig {
  readonly chartDir?: string;
  readonly windowDays: number;
  readonly subject: string;
  readonly body: string;
  readonly chartWidth: number;
  readonly panelHeight: number;
}

export interface MailConfig {
  readonly host: string;
  readonly port: number;
  readonly user?: string;
  readonly password?: string;
  readonly from: string;
  readonly to: string[];
  readonly cc: string[];
}

export interface ScheduleConfig {
  readonly cron: string;
  readonly timezone?: string;
}

export interface ExporterConfig {
  readonly port: number;
  readonly hostname: string;
}

export interface LoggingConfig {
  readonly level: "debug" | "info" | "warn" | "error";
  readonly file?: string;
  readonly json?: boolean;
}
