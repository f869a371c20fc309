/**
 * apkman CLI — Configuration
 *
 * Central location for all CLI paths, defaults, and environment detection.
 * All apkman data lives under ~/.apkman unless APKMAN_HOME points elsewhere.
 *
 *   APKMAN_HOME             data directory
 *   APKMAN_INSTALL_COMMAND  installer template (default: adb install -r {file})
 *   APKMAN_CONCURRENCY      parallel downloads (default: 1)
 *   APKMAN_DEBUG            "1" or "true" turns on debug output
 */

import * as path from "path";
import * as os from "os";
import * as fs from "fs";
import type { EngineOptions } from "@apkman/engine";

export const DEFAULT_INSTALL_COMMAND = "adb install -r {file}";

export interface CliConfig {
  home: string;
  paths: {
    /** SQLite state database */
    stateDb: string;
    /** Content Store root */
    cache: string;
  };
  installCommand: string;
  concurrency: number;
  debug: boolean;
}

function parseConcurrency(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === "") return 1;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`APKMAN_CONCURRENCY must be a positive integer, got "${raw}"`);
  }
  return value;
}

/**
 * Read the configuration from the environment.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const home = env.APKMAN_HOME?.trim() || path.join(os.homedir(), ".apkman");
  const debug = env.APKMAN_DEBUG === "1" || env.APKMAN_DEBUG?.toLowerCase() === "true";

  return {
    home,
    paths: {
      stateDb: path.join(home, "state.db"),
      cache: path.join(home, "cache"),
    },
    installCommand: env.APKMAN_INSTALL_COMMAND?.trim() || DEFAULT_INSTALL_COMMAND,
    concurrency: parseConcurrency(env.APKMAN_CONCURRENCY),
    debug,
  };
}

/**
 * Ensure the data directories exist.
 */
export function ensureDirectories(config: CliConfig): void {
  fs.mkdirSync(config.home, { recursive: true });
  fs.mkdirSync(config.paths.cache, { recursive: true });
}

/**
 * Build EngineOptions from CLI configuration.
 */
export function getEngineOptions(config: CliConfig, verbose: boolean): EngineOptions {
  ensureDirectories(config);
  return {
    cache_dir: config.paths.cache,
    verbose: verbose || config.debug,
  };
}
