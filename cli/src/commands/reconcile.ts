/**
 * apkman CLI — Reconcile Command
 *
 * Tells apkman a package was installed outside of it (sideloaded by
 * hand, updated by another store). Every record for the package becomes
 * Installed.
 *
 * Usage:
 *   apkman reconcile <package>
 */

import { Command } from "commander";
import { openRuntime } from "../runtime";
import { colors, isDebugMode, printInfo, printSuccess } from "../output";

export function registerReconcileCommand(program: Command): void {
  program
    .command("reconcile <package>")
    .description("Mark every record of a package installed outside apkman as Installed")
    .action(async (packageName: string) => {
      const runtime = await openRuntime({ verbose: isDebugMode() });
      const { orchestrator, registry, signals } = runtime.engine;

      try {
        const matching = registry.getByPackageName(packageName).length;
        signals.publish(packageName);
        await orchestrator.idle();

        if (matching === 0) {
          printInfo(`No installs recorded for ${colors.app(packageName)}`);
        } else {
          printSuccess(`Marked ${matching} record(s) of ${colors.app(packageName)} as installed`);
        }
      } finally {
        runtime.close();
      }
    });
}
