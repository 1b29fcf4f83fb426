/**
 * Wixpack Engine — Stage Builders
 *
 * Argument vectors for the three WiX tools. Resulting command shapes:
 *
 *   heat.exe dir <harvestDir> -platform x64 -cg AppFiles -dr APPLICATIONFOLDER
 *            -gg -srd -out appdir.wxs -var var.SourceDir
 *   candle.exe -arch x64 -dSourceDir=<harvestDir> main.wxs appdir.wxs
 *   light.exe -o <output.msi> main.wixobj appdir.wixobj
 *
 * All tools run with the build directory as their working directory, so
 * relative outputs land there.
 */

import * as path from "path";
import { DEFAULTS } from "./config";
import { Architecture, Stage, ToolchainInstallation } from "./types";

export interface HarvestStageOptions {
  buildDir: string;
  harvestDir: string;
  platform: Architecture;
  componentGroup: string;
  directoryRef: string;
  sourceDirVar: string;
  /** Fragment file name (appdir.wxs) */
  outFile?: string;
}

export function harvestStage(
  toolchain: ToolchainInstallation,
  opts: HarvestStageOptions,
): Stage {
  const outFile = opts.outFile ?? DEFAULTS.harvestFile;
  return {
    name: "harvest",
    tool: toolchain.tools.harvest,
    args: [
      "dir",
      opts.harvestDir,
      "-platform",
      opts.platform,
      "-cg", // component group
      opts.componentGroup,
      "-dr", // directory reference
      opts.directoryRef,
      "-gg", // generate guids now
      "-srd", // suppress harvesting the root directory itself
      "-out",
      outFile,
      "-var",
      `var.${opts.sourceDirVar}`,
    ],
    cwd: opts.buildDir,
    outputs: [outFile],
  };
}

export interface CompileStageOptions {
  buildDir: string;
  arch: Architecture;
  harvestDir: string;
  sourceDirVar: string;
  /** .wxs files, relative to buildDir */
  sources: string[];
}

/**
 * The object file candle writes for a source: main.wxs → main.wixobj.
 */
export function objectFileFor(source: string): string {
  const parsed = path.parse(source);
  return path.join(parsed.dir, `${parsed.name}.wixobj`);
}

export function compileStage(
  toolchain: ToolchainInstallation,
  opts: CompileStageOptions,
): Stage {
  return {
    name: "compile",
    tool: toolchain.tools.compile,
    args: [
      "-arch",
      opts.arch,
      `-d${opts.sourceDirVar}=${opts.harvestDir}`,
      ...opts.sources,
    ],
    cwd: opts.buildDir,
    outputs: opts.sources.map(objectFileFor),
  };
}

export interface LinkStageOptions {
  buildDir: string;
  /** .wixobj files, relative to buildDir */
  objects: string[];
  outputPath: string;
}

export function linkStage(
  toolchain: ToolchainInstallation,
  opts: LinkStageOptions,
): Stage {
  return {
    name: "link",
    tool: toolchain.tools.link,
    args: ["-o", opts.outputPath, ...opts.objects],
    cwd: opts.buildDir,
    outputs: [opts.outputPath],
  };
}

/**
 * Format a stage as a single command line for logs.
 */
export function formatCommand(stage: Stage): string {
  return [path.basename(stage.tool), ...stage.args].join(" ");
}
