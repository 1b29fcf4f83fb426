/**
 * Wixpack Engine — Toolchain Configuration
 *
 * The WiX toolchain is pinned by URL and SHA-256. Upgrading it means
 * changing both values here, or overriding them through the environment.
 */

import * as os from "os";
import * as path from "path";
import { Architecture } from "./types";

export const WIX_URL =
  "https://github.com/wixtoolset/wix3/releases/download/wix3111rtm/wix311-binaries.zip";
export const WIX_SHA256 =
  "37f0a533b0978a454efb5dc3bd3598becf9660aaf4287e55bf68ca6b527d051d";

/** Executable names inside the extracted WiX archive */
export const TOOL_NAMES = {
  harvest: "heat.exe",
  compile: "candle.exe",
  link: "light.exe",
} as const;

export type ToolNames = { [K in keyof typeof TOOL_NAMES]: string };

export const DEFAULTS: {
  arch: Architecture;
  componentGroup: string;
  directoryRef: string;
  sourceDirVar: string;
  manifestFile: string;
  harvestFile: string;
} = {
  arch: "x64",
  componentGroup: "AppFiles",
  directoryRef: "APPLICATIONFOLDER",
  sourceDirVar: "SourceDir",
  manifestFile: "main.wxs",
  harvestFile: "appdir.wxs",
};

export interface ToolchainConfig {
  url: string;
  sha256: string;
  /** Directory the toolchain is extracted into */
  dir: string;
}

/**
 * Resolve the toolchain configuration.
 *
 * Honours WIXPACK_TOOLCHAIN_URL, WIXPACK_TOOLCHAIN_SHA256 and WIXPACK_HOME.
 */
export function loadToolchainConfig(
  env: NodeJS.ProcessEnv = process.env,
): ToolchainConfig {
  const home = env.WIXPACK_HOME || path.join(os.homedir(), ".wixpack");
  return {
    url: env.WIXPACK_TOOLCHAIN_URL || WIX_URL,
    sha256: env.WIXPACK_TOOLCHAIN_SHA256 || WIX_SHA256,
    dir: path.join(home, "toolchain", "wix311"),
  };
}
