/**
 * Wixpack CLI — Configuration
 *
 * Central location for all CLI paths and engine wiring.
 * All Wixpack data lives under ~/.wixpack (%USERPROFILE%\.wixpack on
 * Windows) unless WIXPACK_HOME points elsewhere.
 */

import * as path from "path";
import * as os from "os";
import * as fs from "fs";
import {
  createLogger,
  EngineOptions,
  loadToolchainConfig,
  Logger,
  ManagedToolchain,
} from "@wixpack/engine";

export function wixpackHome(env: NodeJS.ProcessEnv = process.env): string {
  return env.WIXPACK_HOME || path.join(os.homedir(), ".wixpack");
}

export function getPaths(env: NodeJS.ProcessEnv = process.env) {
  const home = wixpackHome(env);
  return {
    home,
    /** Extracted WiX toolchain */
    toolchain: loadToolchainConfig(env).dir,
    /** Per-build scratch directories (manifest, fragments, objects) */
    builds: path.join(home, "builds"),
  };
}

/**
 * Scratch directory for one product/version/arch combination.
 */
export function buildDirFor(
  name: string,
  version: string,
  arch: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const slug = name.replace(/[^A-Za-z0-9._-]+/g, "-").toLowerCase();
  return path.join(getPaths(env).builds, `${slug}-${version}-${arch}`);
}

export function ensureDirectories(env: NodeJS.ProcessEnv = process.env): void {
  fs.mkdirSync(getPaths(env).builds, { recursive: true });
}

export function createCliLogger(verbose: boolean): Logger {
  return createLogger({ level: verbose ? "debug" : "silent" });
}

export function getToolchain(): ManagedToolchain {
  return new ManagedToolchain(loadToolchainConfig());
}

/**
 * Build EngineOptions from CLI configuration.
 */
export function getEngineOptions(verbose: boolean = false): EngineOptions {
  ensureDirectories();
  return {
    toolchain: getToolchain(),
    logger: createCliLogger(verbose),
    verbose,
  };
}
