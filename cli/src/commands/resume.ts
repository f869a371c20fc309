/**
 * apkman CLI — Resume Command
 *
 * Picks up installs an earlier run left unfinished (the process was
 * killed, the terminal closed). Records waiting in ReadyToInstall are
 * re-requested as fresh requests; every other unfinished record is
 * redelivered, and is abandoned unless its download is complete on disk.
 *
 * Usage:
 *   apkman resume
 */

import { Command } from "commander";
import type { StatusRecord } from "@apkman/engine";
import { openRuntime } from "../runtime";
import { SettlementWatcher } from "../watch";
import type { Settlement } from "../watch";
import {
  colors,
  createSpinner,
  isDebugMode,
  printBlank,
  printDebug,
  printInfo,
  printStageError,
  printStageSuccess,
} from "../output";

const SETTLED_STATUSES = new Set(["Installed", "Error"]);

function describeSettlement(record: StatusRecord, settlement: Settlement): string {
  const name = colors.app(record.request.packageName);
  switch (settlement.outcome) {
    case "installed":
      return `Installed ${name}`;
    case "failed":
      return `${name} failed: ${settlement.message ?? "unknown error"}`;
    case "interrupted":
      return `${name} download interrupted: ${settlement.message ?? "unknown error"}`;
    case "removed":
      return `${name} abandoned`;
  }
}

export function registerResumeCommand(program: Command): void {
  program
    .command("resume")
    .description("Finish installs left unfinished by an earlier run")
    .option("--verbose", "Show engine logs", false)
    .action(async (opts: { verbose: boolean }) => {
      const runtime = await openRuntime({ verbose: opts.verbose || isDebugMode() });
      const { orchestrator, registry } = runtime.engine;

      try {
        const pending = registry
          .listAll()
          .filter((record) => !SETTLED_STATUSES.has(record.status));
        if (pending.length === 0) {
          printInfo("Nothing to resume.");
          return;
        }

        printInfo(`Resuming ${colors.bold(String(pending.length))} install(s)`);

        const watcher = new SettlementWatcher(
          runtime.engine,
          pending.map((record) => record.identity),
        );
        const spinner = createSpinner("Resuming...").start();

        for (const record of pending) {
          const outcome = await orchestrator.requestInstall(record.request, {
            redelivered: record.status !== "ReadyToInstall",
          });
          printDebug(`${record.identity}: ${outcome}`);
        }
        // The install command died with the earlier process, so ReadyToInstall
        // records were handed to the installer again above
        const recovered = orchestrator.recoverPendingInstalls();
        printDebug(`re-attached ${recovered.length} pending install(s)`);

        const settlements = await watcher.settled;
        spinner.stop();
        printBlank();

        for (const settlement of settlements) {
          const record = pending.find((r) => r.identity === settlement.identity);
          if (!record) continue;
          const line = describeSettlement(record, settlement);
          if (settlement.outcome === "installed") {
            printStageSuccess(line);
          } else {
            printStageError(line);
          }
        }

        if (settlements.some((s) => s.outcome !== "installed")) {
          process.exitCode = 1;
        }
      } finally {
        await orchestrator.idle();
        runtime.close();
      }
    });
}
