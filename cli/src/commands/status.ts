/**
 * apkman CLI — Status Command
 *
 * Shows the last known state of every install apkman has seen.
 *
 * Usage:
 *   apkman status          Unfinished and failed installs
 *   apkman status --all    Include completed installs
 */

import { Command } from "commander";
import { createLogger } from "@apkman/engine";
import { loadConfig } from "../config";
import { StateDB } from "../state-db";
import type { StoredRecord } from "../state-db";
import {
  colors,
  formatProgress,
  formatStatus,
  printAdaptiveTable,
  printInfo,
  truncateText,
} from "../output";

/** Visible characters of an error message in the table */
const MAX_ERROR_LENGTH = 60;

export function statusRows(records: StoredRecord[]): string[][] {
  return records.map((record) => [
    colors.app(record.request.packageName),
    colors.version(String(record.request.versionCode)),
    formatStatus(record.status),
    formatProgress(record),
    record.errorMessage
      ? colors.error(truncateText(record.errorMessage, MAX_ERROR_LENGTH))
      : colors.dim(record.identity),
  ]);
}

export function registerStatusCommand(program: Command): void {
  program
    .command("status")
    .description("Show the state of known installs")
    .option("--all", "Include completed installs", false)
    .action(async (opts: { all: boolean }) => {
      const config = loadConfig();
      const db = new StateDB(config.paths.stateDb, createLogger({ level: "silent" }));
      await db.init();

      try {
        const records = db
          .listRecords()
          .filter((record) => opts.all || record.status !== "Installed");

        if (records.length === 0) {
          printInfo(opts.all ? "No installs recorded yet." : "No unfinished installs.");
          printInfo(`Run ${colors.bold("apkman install <request-file>")} to get started.`);
          return;
        }

        printInfo(`${colors.bold(String(records.length))} install(s):\n`);
        printAdaptiveTable({
          columns: [
            { header: "Package", minWidth: 16 },
            { header: "Version", minWidth: 7 },
            { header: "Status", minWidth: 16 },
            { header: "Progress", minWidth: 24 },
            { header: "Source / Error", flexible: true, minWidth: 16 },
          ],
          rows: statusRows(records),
        });
      } finally {
        db.close();
      }
    });
}
