#!/usr/bin/env node

/**
 * apkman CLI — Entry Point
 *
 * Commands:
 *   apkman install <request-file>   Download (or reuse) and install an artifact
 *   apkman resume                   Finish installs left by an earlier run
 *   apkman status [--all]           Show known installs
 *   apkman clear [url]              Drop finished installs
 *   apkman reconcile <package>      Record an install made outside apkman
 *
 * Global:
 *   --debug                         Debug output (same as APKMAN_DEBUG=1)
 */

import { Command } from "commander";
import { loadConfig } from "./config";
import { setDebugMode } from "./output";
import { registerInstallCommand } from "./commands/install";
import { registerResumeCommand } from "./commands/resume";
import { registerStatusCommand } from "./commands/status";
import { registerClearCommand } from "./commands/clear";
import { registerReconcileCommand } from "./commands/reconcile";

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("apkman")
    .description("Download, verify and install Android packages from install requests")
    .version("0.1.0")
    .option("--debug", "Show debug output", false)
    .hook("preAction", (thisCommand) => {
      const debug = thisCommand.opts<{ debug: boolean }>().debug;
      setDebugMode(debug || loadConfig().debug);
    });

  registerInstallCommand(program);
  registerResumeCommand(program);
  registerStatusCommand(program);
  registerClearCommand(program);
  registerReconcileCommand(program);

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    });
}
