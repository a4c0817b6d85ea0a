import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { isErrnoException } from "../utils/errno.js";
import type { BucketReportConfig } from "./types.js";
import { getConfigPath } from "./paths.js";
import { parseConfig } from "./schema.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

export interface ConfigSource {
  readonly path: string;
  /** Parsed JSON after `${env:NAME}` substitution, not yet validated. */
  readonly raw: unknown;
}

export function substituteEnv(raw: string): string {
  return raw.replace(ENV_PATTERN, (match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new Error(`Missing environment variable: ${varName} (referenced as ${match})`);
    }
    return value;
  });
}

/** Reads the config file, or returns `null` when there is none at `path`. */
export function readConfigSource(path?: string): ConfigSource | null {
  const configPath = resolve(path ?? getConfigPath());

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return null;
    throw err;
  }

  return { path: configPath, raw: JSON.parse(substituteEnv(content)) as unknown };
}

/** Validated config; a missing file yields all defaults. */
export function loadConfig(path?: string): BucketReportConfig {
  const source = readConfigSource(path);
  return parseConfig(source === null ? {} : source.raw);
}
