/**
 * apkman Engine — Command Installer
 *
 * Installs an artifact by running an external command, e.g.
 *   adb install -r {file}
 *
 * Placeholders in the arguments: {file} (local artifact path),
 * {package}, {version} (version code) and {url} (identity).
 * Exit code 0 is install-complete; anything else is install-interrupted
 * with a message naming the exit code and the tail of stderr.
 */

import { spawn } from "child_process";
import type { Identity, InstallRequest } from "../types";
import type { Logger } from "../utils/logger";
import { BaseInstaller } from "./base-installer";

export interface CommandInstallerOptions {
  command: string;
  args: string[];
}

/** Characters of stderr kept for the error message */
const STDERR_TAIL = 400;

/**
 * Split a command template into command and arguments.
 * Single and double quotes group words; quotes are removed.
 */
export function parseCommandTemplate(template: string): CommandInstallerOptions {
  const tokens: string[] = [];
  let current = "";
  let quote: '"' | "'" | null = null;
  let hasToken = false;

  for (const ch of template.trim()) {
    if (quote) {
      if (ch === quote) {
        quote = null;
      } else {
        current += ch;
      }
    } else if (ch === '"' || ch === "'") {
      quote = ch;
      hasToken = true;
    } else if (/\s/.test(ch)) {
      if (hasToken) {
        tokens.push(current);
        current = "";
        hasToken = false;
      }
    } else {
      current += ch;
      hasToken = true;
    }
  }
  if (quote) {
    throw new Error(`Unterminated quote in installer command: ${template}`);
  }
  if (hasToken) tokens.push(current);

  const [command, ...args] = tokens;
  if (!command) {
    throw new Error("Installer command is empty");
  }
  return { command, args };
}

export function expandArgs(
  args: string[],
  values: { file: string; package: string; version: number; url: string },
): string[] {
  return args.map((arg) =>
    arg
      .replace(/\{file\}/g, values.file)
      .replace(/\{package\}/g, values.package)
      .replace(/\{version\}/g, String(values.version))
      .replace(/\{url\}/g, values.url),
  );
}

export class CommandInstaller extends BaseInstaller {
  private options: CommandInstallerOptions;

  constructor(options: CommandInstallerOptions, logger: Logger) {
    super(logger);
    this.options = options;
  }

  install(localPath: string, identity: Identity, request: InstallRequest): void {
    const args = expandArgs(this.options.args, {
      file: localPath,
      package: request.packageName,
      version: request.versionCode,
      url: identity,
    });

    this.logger.info(
      { identity, command: this.options.command, args },
      `Installing ${request.packageName} (${request.versionCode})`,
    );

    let settled = false;
    let stderr = "";
    const settle = (errorMessage?: string) => {
      if (settled) return;
      settled = true;
      if (errorMessage === undefined) {
        this.emit(identity, { type: "install-complete" });
      } else {
        this.emit(identity, { type: "install-interrupted", errorMessage });
      }
    };

    const child = spawn(this.options.command, args, {
      stdio: ["ignore", "pipe", "pipe"],
      windowsHide: true,
    });

    child.on("spawn", () => this.emit(identity, { type: "install-started" }));

    child.stdout.on("data", (chunk: Buffer) => {
      this.logger.debug({ identity, out: chunk.toString().trim() }, "Installer output");
    });
    child.stderr.on("data", (chunk: Buffer) => {
      stderr = (stderr + chunk.toString()).slice(-STDERR_TAIL);
    });

    child.on("error", (err) => {
      this.logger.error({ identity, error: err.message }, "Installer failed to start");
      settle(`Failed to start installer: ${err.message}`);
    });

    child.on("close", (code, signal) => {
      if (code === 0) {
        settle();
        return;
      }
      const reason =
        code === null ? `was killed by ${signal ?? "a signal"}` : `exited with code ${code}`;
      const detail = stderr.trim();
      settle(`Installer ${reason}${detail ? `: ${detail}` : ""}`);
    });
  }
}
