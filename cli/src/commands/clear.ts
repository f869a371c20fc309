/**
 * apkman CLI — Clear Command
 *
 * Drops records that reached Installed or Error.
 *
 * Usage:
 *   apkman clear          Every finished record
 *   apkman clear <url>    One record
 */

import { Command } from "commander";
import { openRuntime } from "../runtime";
import { colors, isDebugMode, printError, printInfo, printSuccess } from "../output";

export function registerClearCommand(program: Command): void {
  program
    .command("clear [url]")
    .description("Remove finished installs from the status list")
    .action(async (url: string | undefined) => {
      const runtime = await openRuntime({ verbose: isDebugMode() });
      const { orchestrator, registry } = runtime.engine;

      try {
        const identities = url
          ? [url]
          : registry.listAll().map((record) => record.identity);

        let cleared = 0;
        for (const identity of identities) {
          if (await orchestrator.clear(identity)) cleared++;
        }

        if (url && cleared === 0) {
          const record = registry.get(url);
          printError(
            record
              ? `${colors.app(record.request.packageName)} is still in progress and cannot be cleared.`
              : `No install recorded for ${url}`,
          );
          process.exitCode = 1;
          return;
        }

        if (cleared === 0) {
          printInfo("Nothing to clear.");
        } else {
          printSuccess(`Cleared ${cleared} record(s)`);
        }
      } finally {
        runtime.close();
      }
    });
}
