/**
 * Wixpack Engine — Visual C++ Redistributables
 *
 * Pinned runtime installers that applications built with MSVC need on the
 * target machine. Fetched and verified the same way as the toolchain.
 */

import * as fs from "fs";
import * as path from "path";
import { downloadBytes, Fetcher } from "./downloader";
import { AcquireError, IntegrityError } from "./errors";
import { Architecture } from "./types";
import { Logger } from "./utils/logger";
import { assertDigest } from "./verifier";

export interface Redistributable {
  url: string;
  sha256: string;
  filename: string;
}

export const REDISTRIBUTABLES: Partial<Record<Architecture, Redistributable>> =
  {
    x86: {
      url: "https://download.visualstudio.microsoft.com/download/pr/c8edbb87-c7ec-4500-a461-71e8912d25e9/99ba493d660597490cbb8b3211d2cae4/vc_redist.x86.exe",
      sha256:
        "3a43e8a55a3f3e4b73d01872c16d47a19dd825756784f4580187309e7d1fcb74",
      filename: "vc_redist.x86.exe",
    },
    x64: {
      url: "https://download.visualstudio.microsoft.com/download/pr/9e04d214-5a9d-4515-9960-3d71398d98c3/1e1e62ab57bbb4bf5199e8ce88f040be/vc_redist.x64.exe",
      sha256:
        "d6cd2445f68815fe02489fafe0127819e44851e26dfbe702612bc0d223cbbc2b",
      filename: "vc_redist.x64.exe",
    },
  };

export interface FetchRedistOptions {
  logger: Logger;
  fetch?: Fetcher;
  /** Replaces the pinned table (tests) */
  table?: Partial<Record<Architecture, Redistributable>>;
}

/**
 * Download, verify and save the redistributable for `arch` into `destDir`.
 *
 * @returns Path of the written installer
 * @throws AcquireError (unsupported | network | integrity)
 */
export async function fetchRedistributable(
  arch: Architecture,
  destDir: string,
  opts: FetchRedistOptions,
): Promise<string> {
  const entry = (opts.table ?? REDISTRIBUTABLES)[arch];
  if (!entry) {
    throw new AcquireError(
      "unsupported",
      `No Visual C++ redistributable is pinned for ${arch}`,
    );
  }

  const fetch = opts.fetch ?? downloadBytes;
  const data = await fetch(entry.url, opts.logger);

  try {
    assertDigest(data, entry.sha256);
  } catch (err: unknown) {
    if (err instanceof IntegrityError) {
      throw new AcquireError(
        "integrity",
        `${entry.filename} failed verification: ${err.message}`,
        { url: entry.url, cause: err },
      );
    }
    throw err;
  }

  fs.mkdirSync(destDir, { recursive: true });
  const filePath = path.join(destDir, entry.filename);
  fs.writeFileSync(filePath, data);
  opts.logger.info({ path: filePath, arch }, "Redistributable saved");

  return filePath;
}
