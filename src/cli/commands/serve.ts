import { Command, Option } from "clipanion";
import { loadConfig } from "../../config/loader.js";
import { MetricsServer } from "../../exporter/server.js";
import { createLogger } from "../../logging/logger.js";
import { StatsSource } from "../../stats/source.js";

export class ServeCommand extends Command {
  static override paths = [["serve"]];

  static override usage = Command.Usage({
    description: "Serve live bucket stats as Prometheus metrics",
    examples: [
      ["Serve on the configured address", "bucket-report serve"],
      ["Serve on another port", "bucket-report serve --port 9300"],
    ],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  host = Option.String("--host,-H", {
    description: "Address to listen on",
    required: false,
  });

  port = Option.String("--port,-p", {
    description: "Port to listen on",
    required: false,
  });

  async execute(): Promise<void> {
    const config = loadConfig(this.config);
    const logger = createLogger(config.logging);

    const port = this.port === undefined ? config.exporter.port : Number(this.port);
    if (!Number.isInteger(port) || port <= 0) {
      this.context.stdout.write(`Invalid port: ${this.port}\n`);
      process.exitCode = 1;
      return;
    }

    const stats = new StatsSource(config.stats, logger);
    const server = new MetricsServer(
      () => stats.collect(),
      port,
      this.host ?? config.exporter.hostname,
      logger,
    );
    await server.start();

    await new Promise<void>((resolve) => {
      const shutdown = (): void => {
        server.stop().then(resolve, resolve);
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
    });
  }
}
