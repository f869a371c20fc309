/**
 * apkman CLI -- Install Command
 *
 * Installs one artifact described by a request file.
 *
 * Usage:
 *   apkman install <request-file>            Download (or reuse) and install
 *   apkman install <request-file> --verbose  Also print engine logs to stderr
 *
 * Output:
 *
 *   apkman install org.example.app.yaml
 *
 *   Installing org.example.app (42)
 *
 *     ✔ Downloaded 12.4 MB
 *
 *   ✔ Installed org.example.app (42) in 8.1s
 *
 * Ctrl-C cancels the download and drops the record.
 */

import { Command } from "commander";
import { progressFraction } from "@apkman/engine";
import type { InstallRequest, InstallStatus, StatusRecord } from "@apkman/engine";
import { loadRequestFile } from "../request-file";
import { openRuntime } from "../runtime";
import { SettlementWatcher } from "../watch";
import {
  colors,
  createSpinner,
  formatBytes,
  formatDuration,
  formatFailureCategory,
  formatPercent,
  isDebugMode,
  printBlank,
  printDebug,
  printDetail,
  printError,
  printHeader,
  printInfo,
  printStageSuccess,
  printSuccess,
} from "../output";

/** Spinner text while a record sits in each status */
const STAGE_MESSAGES: Record<InstallStatus, string> = {
  Unknown: "Preparing download...",
  Downloading: "Downloading...",
  ReadyToInstall: "Waiting for the installer...",
  Installing: "Installing...",
  Installed: "Installed",
  Error: "Failed",
};

function label(request: InstallRequest): string {
  return `${colors.app(request.packageName)} (${colors.version(String(request.versionCode))})`;
}

export function registerInstallCommand(program: Command): void {
  program
    .command("install <request-file>")
    .alias("i")
    .description("Download and install the artifact described by a request file")
    .option("--verbose", "Show engine logs", false)
    .action(async (requestFile: string, opts: { verbose: boolean }) => {
      // 1. Load request
      const loaded = loadRequestFile(requestFile);
      if (!loaded.ok) {
        printError(`Invalid request file: ${requestFile}`);
        for (const error of loaded.errors) {
          printDetail("Problem", error);
        }
        process.exitCode = 1;
        return;
      }
      const request = loaded.request;
      const identity = request.url;

      // 2. Create engine
      const runtime = await openRuntime({ verbose: opts.verbose || isDebugMode() });
      const { orchestrator } = runtime.engine;

      printHeader(`Installing ${label(request)}`);

      // 3. Wire up progress display
      const spinner = createSpinner("Starting...");
      let lastStatus: InstallStatus | null = null;

      const onUpdate = (record: StatusRecord) => {
        if (record.status !== lastStatus) {
          if (lastStatus === "Downloading" && record.status === "ReadyToInstall") {
            spinner.stop();
            printStageSuccess(`Downloaded ${formatBytes(request.size)}`);
            spinner.start();
          }
          lastStatus = record.status;
          spinner.text = STAGE_MESSAGES[record.status];
          printDebug(`status: ${record.status}`);
        }
        if (record.status === "Downloading" && record.progress.totalBytes > 0) {
          spinner.text = `Downloading... ${formatPercent(progressFraction(record))}`;
        }
      };

      const watcher = new SettlementWatcher(runtime.engine, [identity], onUpdate);
      const failureSub = orchestrator.on((event) => {
        if (event.type === "failure" && event.data.identity === identity) {
          printDebug(`${event.data.category}: ${event.data.message}`);
        }
      });

      const onInterrupt = () => {
        spinner.text = "Cancelling...";
        void orchestrator.cancel(identity);
      };
      process.once("SIGINT", onInterrupt);

      spinner.start();
      const startTime = Date.now();

      // 4. Run until the identity settles
      try {
        const outcome = await orchestrator.requestInstall(request);
        if (outcome !== "accepted") {
          watcher.dispose();
          spinner.stop();
          printError(`Request was not accepted (${outcome})`);
          process.exitCode = 1;
          return;
        }

        const [settlement] = await watcher.settled;
        spinner.stop();
        const elapsed = Date.now() - startTime;

        if (settlement?.outcome === "installed") {
          printBlank();
          printSuccess(`Installed ${label(request)} in ${formatDuration(elapsed)}`);
          return;
        }

        printBlank();
        printError(`Failed to install ${label(request)}`);
        switch (settlement?.outcome) {
          case "failed":
            printDetail("Details", settlement.message ?? "unknown error");
            break;
          case "interrupted":
            printDetail("Reason", formatFailureCategory("TRANSIENT_DOWNLOAD_FAILURE"));
            printDetail("Details", settlement.message ?? "unknown error");
            printInfo(`Run ${colors.bold(`apkman install ${requestFile}`)} to try again.`);
            break;
          default:
            printDetail("Reason", "Cancelled or dismissed");
        }
        process.exitCode = 1;
      } catch (err: unknown) {
        spinner.stop();
        printBlank();
        printError("Unexpected error during installation");
        if (isDebugMode()) {
          console.error(err);
        } else {
          printDetail("Message", err instanceof Error ? err.message : String(err));
          printInfo(`Use ${colors.bold("--debug")} to see the full stack trace.`);
        }
        process.exitCode = 1;
      } finally {
        process.removeListener("SIGINT", onInterrupt);
        failureSub.dispose();
        watcher.dispose();
        await orchestrator.idle();
        runtime.close();
      }
    });
}
