/**
 * Wixpack Engine — Toolchain Acquisition
 *
 * Download → verify → extract → locate. The archive is held in memory
 * until its digest matches; only verified bytes are ever extracted.
 *
 * Acquisition is idempotent: extracting into a populated directory
 * overwrites files in place. There is no global rollback, so a tree is
 * only trusted after locateToolchain() finds every tool in it.
 */

import * as fs from "fs";
import * as path from "path";
import AdmZip from "adm-zip";
import { TOOL_NAMES, ToolNames } from "./config";
import { downloadBytes, Fetcher } from "./downloader";
import {
  AcquireError,
  IntegrityError,
  ToolchainError,
  errorMessage,
} from "./errors";
import { ToolchainInstallation, ToolchainTools } from "./types";
import { Logger } from "./utils/logger";
import { assertDigest } from "./verifier";

export interface AcquireOptions {
  url: string;
  /** Expected SHA-256 of the archive (hex) */
  sha256: string;
  /** Directory to extract into */
  destDir: string;
  logger: Logger;
  /** Transport override (tests) */
  fetch?: Fetcher;
  /** Tool file names override */
  toolNames?: ToolNames;
}

// ─── Locating ────────────────────────────────────────────────────

function isExecutable(filePath: string): boolean {
  try {
    if (!fs.statSync(filePath).isFile()) return false;
    // Windows has no execute bit; existence is all we can check
    fs.accessSync(
      filePath,
      process.platform === "win32" ? fs.constants.F_OK : fs.constants.X_OK,
    );
    return true;
  } catch {
    return false;
  }
}

/**
 * Find the three toolchain executables in `dir`.
 *
 * @throws ToolchainError listing every missing or non-executable tool
 */
export function locateToolchain(
  dir: string,
  names: ToolNames = TOOL_NAMES,
): ToolchainInstallation {
  const root = path.resolve(dir);
  const tools: ToolchainTools = {
    harvest: path.join(root, names.harvest),
    compile: path.join(root, names.compile),
    link: path.join(root, names.link),
  };

  const missing = Object.values(tools)
    .filter((toolPath) => !isExecutable(toolPath))
    .map((toolPath) => path.basename(toolPath));

  if (missing.length > 0) {
    throw new ToolchainError(root, missing);
  }

  return { dir: root, tools };
}

// ─── Extraction ──────────────────────────────────────────────────

/**
 * Extract a zip archive entry by entry into `destDir`.
 *
 * Parent directories are created as needed, relative paths and recorded
 * Unix permission bits are preserved, and existing files are overwritten.
 *
 * @returns Number of files written
 * @throws AcquireError (extraction) on an unreadable archive or entry,
 *   a write failure, or an entry path that escapes destDir
 */
export function extractArchive(data: Buffer, destDir: string): number {
  const root = path.resolve(destDir);

  let entries: AdmZip.IZipEntry[];
  try {
    entries = new AdmZip(data).getEntries();
  } catch (err: unknown) {
    throw new AcquireError(
      "extraction",
      `Cannot read toolchain archive: ${errorMessage(err)}`,
      { cause: err },
    );
  }

  fs.mkdirSync(root, { recursive: true });
  let written = 0;

  for (const entry of entries) {
    const destPath = path.resolve(root, entry.entryName);
    if (destPath !== root && !destPath.startsWith(root + path.sep)) {
      throw new AcquireError(
        "extraction",
        `Archive entry escapes the destination directory: ${entry.entryName}`,
      );
    }

    try {
      if (entry.isDirectory) {
        fs.mkdirSync(destPath, { recursive: true });
        continue;
      }

      fs.mkdirSync(path.dirname(destPath), { recursive: true });
      const contents = entry.getData();
      const mode = (entry.attr >>> 16) & 0o777;
      fs.writeFileSync(destPath, contents);
      if (mode) fs.chmodSync(destPath, mode);
      written++;
    } catch (err: unknown) {
      throw new AcquireError(
        "extraction",
        `Failed to extract ${entry.entryName}: ${errorMessage(err)}`,
        { cause: err },
      );
    }
  }

  return written;
}

// ─── Acquisition ─────────────────────────────────────────────────

/**
 * Download, verify and extract the toolchain archive.
 *
 * @throws AcquireError (network | integrity | extraction)
 * @throws ToolchainError if the extracted tree lacks a tool
 */
export async function acquireToolchain(
  opts: AcquireOptions,
): Promise<ToolchainInstallation> {
  const { url, sha256, destDir, logger } = opts;
  const fetch = opts.fetch ?? downloadBytes;

  logger.info({ url, dest: destDir }, "Downloading WiX toolchain");
  const data = await fetch(url, logger);

  logger.info({ bytes: data.length }, "Validating toolchain checksum");
  try {
    assertDigest(data, sha256);
  } catch (err: unknown) {
    if (err instanceof IntegrityError) {
      throw new AcquireError(
        "integrity",
        `Toolchain archive failed verification: ${err.message}`,
        { url, cause: err },
      );
    }
    throw err;
  }

  logger.info({ dest: destDir }, "Extracting WiX toolchain");
  const files = extractArchive(data, destDir);
  logger.debug({ files }, "Toolchain extracted");

  return locateToolchain(destDir, opts.toolNames);
}

// ─── Providers ───────────────────────────────────────────────────

/**
 * Supplies a ready toolchain to the engine.
 */
export interface ToolchainProvider {
  ensure(logger: Logger): Promise<ToolchainInstallation>;
}

/**
 * A toolchain that is already in place. Returned as-is, unchecked.
 */
export class StaticToolchain implements ToolchainProvider {
  constructor(private readonly installation: ToolchainInstallation) {}

  async ensure(): Promise<ToolchainInstallation> {
    return this.installation;
  }
}

export interface ManagedToolchainOptions {
  url: string;
  sha256: string;
  dir: string;
  fetch?: Fetcher;
  toolNames?: ToolNames;
}

/**
 * A toolchain kept under a local directory, acquired on first use.
 */
export class ManagedToolchain implements ToolchainProvider {
  constructor(private readonly options: ManagedToolchainOptions) {}

  /**
   * The installation if the directory already holds a complete one.
   */
  current(): ToolchainInstallation | null {
    try {
      return locateToolchain(this.options.dir, this.options.toolNames);
    } catch (err: unknown) {
      if (err instanceof ToolchainError) return null;
      throw err;
    }
  }

  async ensure(logger: Logger): Promise<ToolchainInstallation> {
    const existing = this.current();
    if (existing) {
      logger.debug({ dir: existing.dir }, "Using existing WiX toolchain");
      return existing;
    }

    return acquireToolchain({
      url: this.options.url,
      sha256: this.options.sha256,
      destDir: this.options.dir,
      fetch: this.options.fetch,
      toolNames: this.options.toolNames,
      logger,
    });
  }
}
