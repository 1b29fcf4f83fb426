/**
 * Wixpack CLI -- Output Helpers
 *
 * Centralized formatting for all CLI output: colors, spinners, tables.
 * Uses chalk (v4, CommonJS compatible) for ANSI colors,
 * ora for spinners, and cli-table3 for tabular data.
 *
 * All user-visible output flows through this module so verbosity is
 * controlled in one place.
 */

import chalk from "chalk";
import ora, { Ora } from "ora";
import Table from "cli-table3";

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
  success: chalk.green,
  error: chalk.red,
  dim: chalk.gray,
  bold: chalk.bold,
  app: chalk.bold.white,
  version: chalk.cyan,
  path: chalk.underline,
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
 * Print a debug message. Only visible with --debug flag.
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
 * Print one line of tool output, dimmed and indented under the spinner.
 */
export function printToolLine(line: string): void {
  console.log(colors.dim(`    ${line}`));
}

// ─── Stage Output ───────────────────────────────────────────

/**
 *   ✔ Harvested application files
 */
export function printStageSuccess(msg: string): void {
  console.log(`  ${symbols.success} ${msg}`);
}

export function printStageError(msg: string): void {
  console.log(`  ${symbols.error} ${msg}`);
}

// ─── Header / Banner ────────────────────────────────────────

/**
 * Print a bold header line, e.g.  "Building My App v1.2.0"
 */
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

/**
 * Detect whether to use ASCII-only box drawing characters.
 * On Windows cmd/PowerShell without TERM set, Unicode borders corrupt.
 */
export function shouldUseAsciiBorders(): boolean {
  return process.platform === "win32" && !process.env.TERM;
}

const ASCII_CHARS: Table.TableConstructorOptions["chars"] = {
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

export interface TableOptions {
  head: string[];
  rows: string[][];
}

export function printTable({ head, rows }: TableOptions): void {
  const ascii = shouldUseAsciiBorders();
  const tableOpts: Table.TableConstructorOptions = {
    head: head.map((h) => chalk.bold.cyan(h)),
    style: { head: [], border: ascii ? [] : ["gray"] },
    wordWrap: false,
  };
  if (ascii) {
    tableOpts.chars = ASCII_CHARS;
  }
  const table = new Table(tableOpts);
  for (const row of rows) {
    table.push(row);
  }
  console.log(table.toString());
}

// ─── State Badge ────────────────────────────────────────────

const STATE_COLORS: Record<string, chalk.Chalk> = {
  PREPARING: chalk.cyan,
  HARVESTING: chalk.blue,
  COMPILING: chalk.yellow,
  LINKING: chalk.magenta,
  DONE: chalk.green,
  FAILED: chalk.red,
};

/** Human-friendly state labels */
const STATE_LABELS: Record<string, string> = {
  PREPARING: "Preparing",
  HARVESTING: "Harvesting",
  COMPILING: "Compiling",
  LINKING: "Linking",
  DONE: "Done",
  FAILED: "Failed",
};

export function formatState(state: string): string {
  const colorFn = STATE_COLORS[state] || chalk.white;
  return colorFn(STATE_LABELS[state] || state);
}

// ─── Error Category Labels ──────────────────────────────────

const ERROR_LABELS: Record<string, string> = {
  TOOLCHAIN_ERROR: "WiX toolchain unavailable",
  NETWORK_ERROR: "Network or download failure",
  INTEGRITY_ERROR: "File integrity check failed",
  EXTRACTION_ERROR: "Archive extraction failed",
  TEMPLATE_ERROR: "Manifest template error",
  SPAWN_ERROR: "Tool could not be started",
  TOOL_ERROR: "Tool reported a failure",
  IO_ERROR: "File system error",
};

export function formatErrorCategory(category: string): string {
  return ERROR_LABELS[category] || category;
}

// ─── Byte Formatting ────────────────────────────────────────

export function formatBytes(bytes: number): string {
  if (bytes === 0) return "0 B";
  const units = ["B", "KB", "MB", "GB"];
  const i = Math.floor(Math.log(bytes) / Math.log(1024));
  return `${(bytes / Math.pow(1024, i)).toFixed(1)} ${units[i]}`;
}

// ─── Duration ───────────────────────────────────────────────

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const mins = Math.floor(ms / 60_000);
  const secs = Math.round((ms % 60_000) / 1000);
  return `${mins}m ${secs}s`;
}
