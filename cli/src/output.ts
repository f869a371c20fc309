/**
 * apkman CLI -- Output Helpers
 *
 * Centralized formatting for all CLI output: colors, spinners, tables.
 * Uses chalk (v4, CommonJS compatible) for ANSI colors,
 * ora for spinners, and cli-table3 for tabular data.
 *
 * All user-visible output flows through this module. Engine logs go to
 * stderr through pino and never mix with it.
 */

import chalk from "chalk";
import ora, { Ora } from "ora";
import Table from "cli-table3";
import type { FailureCategory, InstallStatus, StatusRecord } from "@apkman/engine";

// ─── Debug Mode ─────────────────────────────────────────────

let _debugMode = false;

export function setDebugMode(enabled: boolean): void {
  _debugMode = enabled;
}

export function isDebugMode(): boolean {
  return _debugMode;
}

// ─── Color Shortcuts ────────────────────────────────────────

export const colors = {
  error: chalk.red,
  dim: chalk.gray,
  bold: chalk.bold,
  app: chalk.bold.white,
  version: chalk.cyan,
  muted: chalk.gray,
};

// ─── Symbols (safe for Windows terminals) ───────────────────

export const symbols = {
  success: chalk.green("\u2714"), // ✔
  error: chalk.red("\u2716"), // ✖
  info: chalk.cyan("\u2139"), // ℹ
};

// ─── Print Helpers ──────────────────────────────────────────

export function printSuccess(msg: string): void {
  console.log(`${symbols.success} ${msg}`);
}

export function printError(msg: string): void {
  console.error(`${symbols.error} ${msg}`);
}

export function printInfo(msg: string): void {
  console.log(`${symbols.info} ${msg}`);
}

/**
 * Print a debug message. Only visible with --debug or APKMAN_DEBUG.
 */
export function printDebug(msg: string): void {
  if (_debugMode) {
    console.log(colors.muted(`  [debug] ${msg}`));
  }
}

export function printBlank(): void {
  console.log();
}

/**
 * Print an indented detail line (for sub-items under a stage).
 */
export function printDetail(label: string, value: string): void {
  console.log(`  ${colors.dim(label + ":")} ${value}`);
}

/**
 * Print a completed stage line with ✔ prefix.
 *
 *   ✔ Downloaded org.example.app (cached)
 *   ✔ Installed org.example.app (42)
 */
export function printStageSuccess(msg: string): void {
  console.log(`  ${symbols.success} ${msg}`);
}

export function printStageError(msg: string): void {
  console.log(`  ${symbols.error} ${msg}`);
}

export function printHeader(msg: string): void {
  console.log();
  console.log(`  ${colors.bold(msg)}`);
  console.log();
}

// ─── Spinner ────────────────────────────────────────────────

export function createSpinner(text: string): Ora {
  return ora({ text, color: "cyan" });
}

// ─── Tables ─────────────────────────────────────────────────

type TableOptions = NonNullable<ConstructorParameters<typeof Table>[0]>;

/** Minimum terminal width below which we switch to compact (no-table) layout */
const MIN_TABLE_WIDTH = 70;

/** Default terminal width when process.stdout.columns is unavailable */
const DEFAULT_TERMINAL_WIDTH = 80;

const ASCII_BORDERS: TableOptions["chars"] = {
  top: "-",
  "top-mid": "+",
  "top-left": "+",
  "top-right": "+",
  bottom: "-",
  "bottom-mid": "+",
  "bottom-left": "+",
  "bottom-right": "+",
  left: "|",
  "left-mid": "+",
  mid: "-",
  "mid-mid": "+",
  right: "|",
  "right-mid": "+",
  middle: "|",
};

/**
 * Detect whether to use ASCII-only box drawing characters.
 * On Windows cmd/PowerShell without TERM set, Unicode borders corrupt.
 */
export function shouldUseAsciiBorders(): boolean {
  return process.platform === "win32" && !process.env.TERM;
}

export function getTerminalWidth(): number {
  return process.stdout.columns || DEFAULT_TERMINAL_WIDTH;
}

/**
 * Truncate a plain-text string to `max` visible characters, appending "..."
 * if it was shortened. Never returns a string longer than `max`.
 */
export function truncateText(s: string, max: number): string {
  if (max < 4) return s.slice(0, max);
  if (s.length <= max) return s;
  return s.slice(0, max - 3) + "...";
}

function stripAnsi(s: string): string {
  // eslint-disable-next-line no-control-regex
  return s.replace(/\u001b\[[0-9;]*m/g, "");
}

/**
 * Pad or truncate a (possibly ANSI-colored) string to exactly `width`
 * visible characters.
 */
function fitToWidth(s: string, width: number): string {
  const visible = stripAnsi(s);
  if (visible.length <= width) {
    return s + " ".repeat(width - visible.length);
  }
  const RESET = "\u001b[0m";
  let out = "";
  let visCount = 0;
  const target = width - 3;
  let i = 0;
  while (i < s.length && visCount < target) {
    if (s[i] === "\u001b") {
      const end = s.indexOf("m", i);
      if (end !== -1) {
        out += s.slice(i, end + 1);
        i = end + 1;
        continue;
      }
    }
    out += s[i];
    visCount++;
    i++;
  }
  return out + RESET + "...";
}

export interface TableColumn {
  header: string;
  /** Minimum column width (content area, excluding borders) */
  minWidth?: number;
  /** Absorbs remaining space and shrinks first. Only one column should be flexible. */
  flexible?: boolean;
}

export interface AdaptiveTableOptions {
  columns: TableColumn[];
  /** Each inner array must match columns.length; values may be colored. */
  rows: string[][];
}

export interface CompactItem {
  label: string;
  fields: { key: string; value: string }[];
}

/**
 * Column widths (content + 2 padding) that fit within `termWidth`.
 * The flexible column gets whatever the fixed columns leave over.
 */
function calculateColWidths(columns: TableColumn[], termWidth: number): number[] {
  const borderOverhead = columns.length + 1;
  const paddingPerCol = 2;
  const available = termWidth - borderOverhead;

  const minWidths = columns.map((c) => Math.max(c.minWidth ?? 8, 4));
  const flexIdx = columns.findIndex((c) => c.flexible);

  const fixedSum = minWidths.reduce(
    (sum, w, i) => sum + (i === flexIdx ? 0 : w + paddingPerCol),
    0,
  );

  const widths = minWidths.map((min, i) => {
    if (i === flexIdx) {
      return Math.max(available - fixedSum - paddingPerCol, min);
    }
    return min;
  });

  return widths.map((w) => w + paddingPerCol);
}

/**
 * Print a table that adapts to terminal width.
 *
 * - Wide terminal  → bordered table with dynamic column sizing
 * - Narrow terminal (<70 cols) → compact card-style layout
 * - Content that exceeds column width → truncated with "...", never wraps
 */
export function printAdaptiveTable(opts: AdaptiveTableOptions): void {
  const termWidth = getTerminalWidth();
  const { columns, rows } = opts;

  if (termWidth < MIN_TABLE_WIDTH) {
    printCompactList(
      rows.map((row) => ({
        label: stripAnsi(row[0]),
        fields: columns.slice(1).map((col, i) => ({
          key: col.header,
          value: row[i + 1],
        })),
      })),
    );
    return;
  }

  const colWidths = calculateColWidths(columns, termWidth);
  const contentWidths = colWidths.map((w) => w - 2);
  const ascii = shouldUseAsciiBorders();

  const tableOpts: TableOptions = {
    head: columns.map((c) => chalk.bold.cyan(c.header)),
    colWidths,
    style: { head: [], border: ascii ? [] : ["gray"] },
    wordWrap: false,
  };
  if (ascii) {
    tableOpts.chars = ASCII_BORDERS;
  }

  const table = new Table(tableOpts);
  for (const row of rows) {
    table.push(row.map((cell, i) => fitToWidth(cell, contentWidths[i])));
  }
  console.log(table.toString());
}

/**
 * Print a compact card-style list for narrow terminals.
 *
 *   org.example.app
 *     Status:   Installed
 *     Progress: 100%
 */
export function printCompactList(items: CompactItem[]): void {
  for (const item of items) {
    console.log(colors.app(item.label));
    const maxKeyLen = Math.max(...item.fields.map((f) => f.key.length));
    for (const f of item.fields) {
      console.log(`  ${colors.dim(f.key.padEnd(maxKeyLen) + ":")} ${f.value}`);
    }
    console.log();
  }
}

// ─── Status Badge ───────────────────────────────────────────

const STATUS_COLORS: Record<InstallStatus, chalk.Chalk> = {
  Unknown: chalk.gray,
  Downloading: chalk.blue,
  ReadyToInstall: chalk.cyan,
  Installing: chalk.yellow,
  Installed: chalk.green,
  Error: chalk.red,
};

/** Human-friendly status labels */
const STATUS_LABELS: Record<InstallStatus, string> = {
  Unknown: "Waiting",
  Downloading: "Downloading",
  ReadyToInstall: "Ready to install",
  Installing: "Installing",
  Installed: "Installed",
  Error: "Failed",
};

export function statusLabel(status: InstallStatus): string {
  return STATUS_LABELS[status];
}

export function formatStatus(status: InstallStatus): string {
  return STATUS_COLORS[status](STATUS_LABELS[status]);
}

// ─── Failure Category Labels ────────────────────────────────

const FAILURE_LABELS: Record<FailureCategory, string> = {
  TRANSIENT_DOWNLOAD_FAILURE: "Download interrupted",
  VALIDATION_FAILURE: "File integrity check failed",
  INSTALL_FAILURE: "Installer reported an error",
  SILENT_ABORT: "Install dismissed",
  MALFORMED_REQUEST: "Invalid install request",
};

export function formatFailureCategory(category: FailureCategory): string {
  return FAILURE_LABELS[category];
}

// ─── Byte / Progress Formatting ─────────────────────────────

export function formatBytes(bytes: number): string {
  if (bytes <= 0) return "0 B";
  const units = ["B", "KB", "MB", "GB"];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), units.length - 1);
  return `${(bytes / Math.pow(1024, i)).toFixed(1)} ${units[i]}`;
}

/**
 * Whole percent of a fraction in [0, 1].
 */
export function formatPercent(fraction: number): string {
  return `${Math.floor(Math.min(1, Math.max(0, fraction)) * 100)}%`;
}

/**
 * "1.0 MB / 4.0 MB (25%)", or just the bytes read while the total is unknown.
 */
export function formatProgress(record: Pick<StatusRecord, "progress">): string {
  const { bytesRead, totalBytes } = record.progress;
  if (totalBytes <= 0) {
    return bytesRead > 0 ? formatBytes(bytesRead) : "-";
  }
  return `${formatBytes(bytesRead)} / ${formatBytes(totalBytes)} (${formatPercent(bytesRead / totalBytes)})`;
}

// ─── Duration ───────────────────────────────────────────────

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const mins = Math.floor(ms / 60_000);
  const secs = Math.round((ms % 60_000) / 1000);
  return `${mins}m ${secs}s`;
}
