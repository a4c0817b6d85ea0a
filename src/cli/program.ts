import { Cli } from "clipanion";
import { ReportRunCommand } from "./commands/report.js";
import { ScheduleCommand } from "./commands/schedule.js";
import { ServeCommand } from "./commands/serve.js";
import { HistoryCommand } from "./commands/history.js";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import { DoctorCommand } from "./commands/doctor.js";

export const VERSION = "0.1.0";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Bucket usage report",
    binaryName: "bucket-report",
    binaryVersion: VERSION,
  });

  cli.register(ReportRunCommand);
  cli.register(ScheduleCommand);
  cli.register(ServeCommand);
  cli.register(HistoryCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  cli.register(DoctorCommand);

  return cli;
}
