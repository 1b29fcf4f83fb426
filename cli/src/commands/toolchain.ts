/**
 * Wixpack CLI — Toolchain Commands
 *
 * Usage:
 *   wixpack toolchain fetch [--force]   Download, verify and extract WiX
 *   wixpack toolchain status            Show the managed toolchain
 */

import * as fs from "fs";
import * as path from "path";
import { Command } from "commander";
import {
  acquireToolchain,
  downloadBytes,
  errorMessage,
  loadToolchainConfig,
  locateToolchain,
  ToolchainError,
  TOOL_NAMES,
} from "@wixpack/engine";
import { createCliLogger, getToolchain } from "../config";
import {
  printSuccess,
  printError,
  printInfo,
  printDetail,
  printTable,
  createSpinner,
  formatBytes,
  formatDuration,
  setDebugMode,
  colors,
} from "../output";

export interface ToolRow {
  stage: string;
  file: string;
  present: boolean;
}

/**
 * Per-tool presence for the toolchain directory.
 */
export function inspectToolchain(dir: string): ToolRow[] {
  let missing: string[] = [];
  try {
    locateToolchain(dir);
  } catch (err: unknown) {
    if (!(err instanceof ToolchainError)) throw err;
    missing = err.missing;
  }
  return Object.entries(TOOL_NAMES).map(([stage, file]) => ({
    stage,
    file,
    present: !missing.includes(file),
  }));
}

export function registerToolchainCommand(program: Command): void {
  const toolchain = program
    .command("toolchain")
    .description("Manage the WiX toolchain");

  // ─── toolchain fetch ───────────────────────────────────────

  toolchain
    .command("fetch")
    .description("Download and verify the pinned WiX toolchain")
    .option("--force", "Re-download even if the toolchain is present", false)
    .option("--debug", "Show debug output", false)
    .action(async (opts: { force: boolean; debug: boolean }) => {
      setDebugMode(opts.debug);
      const config = loadToolchainConfig();
      const logger = createCliLogger(opts.debug);

      const existing = getToolchain().current();
      if (existing && !opts.force) {
        printSuccess(`WiX toolchain already present at ${colors.path(existing.dir)}`);
        return;
      }
      if (opts.force) {
        fs.rmSync(config.dir, { recursive: true, force: true });
      }

      const spinner = createSpinner("Downloading WiX toolchain...");
      spinner.start();
      const startTime = Date.now();

      try {
        const installation = await acquireToolchain({
          url: config.url,
          sha256: config.sha256,
          destDir: config.dir,
          logger,
          fetch: (url, log) =>
            downloadBytes(url, log, (progress) => {
              spinner.text =
                progress.bytes_total > 0
                  ? `Downloading WiX toolchain... ${progress.percent}%`
                  : `Downloading WiX toolchain... ${formatBytes(progress.bytes_downloaded)}`;
            }),
        });
        spinner.stop();
        printSuccess(
          `Installed WiX toolchain in ${formatDuration(Date.now() - startTime)}`,
        );
        printDetail("Location", installation.dir);
      } catch (err: unknown) {
        spinner.stop();
        printError("Could not acquire the WiX toolchain");
        printDetail("Details", errorMessage(err));
        process.exit(1);
      }
    });

  // ─── toolchain status ──────────────────────────────────────

  toolchain
    .command("status")
    .description("Show where the toolchain lives and which tools are present")
    .action(() => {
      const config = loadToolchainConfig();
      const rows = inspectToolchain(config.dir);

      printDetail("Directory", config.dir);
      printDetail("Source", config.url);
      printDetail("SHA-256", colors.dim(config.sha256));
      console.log();

      printTable({
        head: ["Stage", "Tool", "Status", "Path"],
        rows: rows.map((row) => [
          row.stage,
          colors.app(row.file),
          row.present ? colors.success("present") : colors.error("missing"),
          path.join(config.dir, row.file),
        ]),
      });

      if (rows.some((row) => !row.present)) {
        console.log();
        printInfo(
          `Run ${colors.bold("wixpack toolchain fetch")} to download it.`,
        );
      }
    });
}
