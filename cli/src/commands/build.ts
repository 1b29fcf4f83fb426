/**
 * Wixpack CLI -- Build Command
 *
 * Builds an .msi installer from an application directory.
 *
 * Usage:
 *   wixpack build ./dist --name "My App" --version 1.2.0 --manufacturer Acme
 *   wixpack build ./dist --config installer/wixpack.yaml
 *   wixpack build ./dist --verbose      Stream tool output
 *
 * Output:
 *
 *   Building My App v1.2.0
 *
 *     ✔ Prepared manifest
 *     ✔ Harvested application files
 *     ✔ Compiled sources
 *     ✔ Linked installer
 *
 *   ✔ Built My_App_1.2.0_x64.msi in 6.1s
 */

import * as path from "path";
import { Command } from "commander";
import {
  BundleState,
  BundleResult,
  EngineEvent,
  WixpackEngine,
  errorMessage,
  loadTemplate,
} from "@wixpack/engine";
import { buildDirFor, getEngineOptions } from "../config";
import {
  BuildFlags,
  BuildSettings,
  findProjectConfig,
  loadProjectConfig,
  ProjectConfigError,
  resolveBuildSettings,
} from "../project-config";
import {
  printSuccess,
  printError,
  printInfo,
  printHeader,
  printStageSuccess,
  printStageError,
  printDetail,
  printBlank,
  printDebug,
  printToolLine,
  setDebugMode,
  isDebugMode,
  createSpinner,
  formatState,
  formatDuration,
  formatErrorCategory,
  colors,
} from "../output";

/** Stages the spinner cycles through */
const STAGE_MESSAGES: Partial<Record<BundleState, string>> = {
  PREPARING: "Preparing manifest...",
  HARVESTING: "Harvesting application files...",
  COMPILING: "Compiling sources...",
  LINKING: "Linking installer...",
};

/** After each stage completes, print a check-marked line */
const STAGE_DONE: Partial<Record<BundleState, string>> = {
  PREPARING: "Prepared manifest",
  HARVESTING: "Harvested application files",
  COMPILING: "Compiled sources",
  LINKING: "Linked installer",
};

/** Tool output kept for the failure report when not streaming */
const TAIL_LINES = 15;

export interface BuildCommandOptions extends BuildFlags {
  config?: string;
  verbose: boolean;
  debug: boolean;
}

/**
 * Run one build and report it. Resolves to the process exit code.
 */
export async function runBuild(
  sourceDir: string,
  opts: BuildCommandOptions,
  cwd: string = process.cwd(),
): Promise<number> {
  setDebugMode(opts.debug);
  const verbose = opts.verbose || isDebugMode();

  // 1. Resolve settings from flags and the project file
  let settings: BuildSettings;
  let template: string | undefined;
  try {
    const configPath = findProjectConfig(opts.config, cwd);
    if (configPath) printDebug(`Using project file ${configPath}`);
    const project = configPath ? loadProjectConfig(configPath) : null;
    settings = resolveBuildSettings(sourceDir, opts, project, cwd);
    if (settings.templatePath) template = loadTemplate(settings.templatePath);
  } catch (err: unknown) {
    printError(errorMessage(err));
    if (err instanceof ProjectConfigError) {
      for (const issue of err.issues) {
        printDetail("Invalid", issue);
      }
    }
    return 1;
  }

  // 2. Create engine
  const engine = new WixpackEngine(getEngineOptions(verbose));

  printHeader(
    `Building ${colors.app(settings.name)} v${colors.version(settings.version)}`,
  );

  // 3. Wire up progress display
  const spinner = createSpinner("Starting...");
  let lastState: BundleState | "" = "";
  const tail: string[] = [];

  engine.on((event: EngineEvent) => {
    if (event.type !== "state_change") return;
    const { state, message } = event.data;

    if (lastState && STAGE_DONE[lastState] && state !== "FAILED") {
      spinner.stop();
      printStageSuccess(STAGE_DONE[lastState] ?? lastState);
      spinner.start();
    }
    if (state === "FAILED") {
      spinner.stop();
      if (lastState) printStageError(`${formatState(lastState)} failed`);
    }

    lastState = state;
    const stageMsg = STAGE_MESSAGES[state];
    if (stageMsg) {
      spinner.text = stageMsg;
    }

    if (message) {
      printDebug(`${state}: ${message}`);
    }
  });

  const sink = (line: string) => {
    if (verbose) {
      if (!spinner.isSpinning) {
        printToolLine(line);
        return;
      }
      spinner.clear();
      printToolLine(line);
      spinner.render();
      return;
    }
    tail.push(line);
    if (tail.length > TAIL_LINES) tail.shift();
  };

  spinner.start();
  const startTime = Date.now();

  // 4. Run the pipeline
  let result: BundleResult;
  try {
    result = await engine.bundle({
      source_dir: settings.sourceDir,
      metadata: {
        name: settings.name,
        version: settings.version,
        manufacturer: settings.manufacturer,
        upgrade_code: settings.upgradeCode,
      },
      output_path: settings.outputPath,
      build_dir: buildDirFor(settings.name, settings.version, settings.arch),
      arch: settings.arch,
      component_group: settings.componentGroup,
      directory_ref: settings.directoryRef,
      template,
      log_sink: sink,
    });
  } catch (err: unknown) {
    spinner.stop();
    printBlank();
    printError("Unexpected error during build");

    if (isDebugMode()) {
      console.error(err);
    } else {
      printDetail("Message", errorMessage(err));
      printInfo(`Use ${colors.bold("--debug")} to see the full stack trace.`);
    }
    return 1;
  }

  spinner.stop();
  const elapsed = Date.now() - startTime;

  if (result.final_state === "DONE") {
    printBlank();
    printSuccess(
      `Built ${colors.path(path.relative(cwd, settings.outputPath) || settings.outputPath)} in ${formatDuration(elapsed)}`,
    );
    return 0;
  }

  // ─── Failure output ───
  printBlank();
  printError(
    `Failed to build ${colors.app(settings.name)} v${colors.version(settings.version)}`,
  );

  if (result.error) {
    printDetail("Reason", formatErrorCategory(result.error.category));
    printDetail("Details", result.error.message);
    printDetail("Stage", formatState(result.error.state));
  }

  if (tail.length > 0) {
    printBlank();
    printInfo("Last tool output:");
    for (const line of tail) {
      printToolLine(line);
    }
  }

  return 1;
}

export function registerBuildCommand(program: Command): void {
  program
    .command("build <sourceDir>")
    .alias("b")
    .description("Build an .msi installer from an application directory")
    .option("-n, --name <name>", "Product name")
    .option("-v, --version <version>", "Product version (numeric, e.g. 1.2.0)")
    .option("-m, --manufacturer <manufacturer>", "Manufacturer name")
    .option("--upgrade-code <guid>", "Stable upgrade GUID (derived from the name when omitted)")
    .option("-a, --arch <arch>", "Target architecture: x64, x86 or arm64")
    .option("-o, --out <file>", "Output .msi path")
    .option("-c, --config <file>", "Project file (default: ./wixpack.yaml)")
    .option("-t, --template <file>", "Custom manifest template")
    .option("--verbose", "Stream tool output", false)
    .option("--debug", "Show debug output and stack traces", false)
    .action(async (sourceDir: string, opts: BuildCommandOptions) => {
      const code = await runBuild(sourceDir, opts);
      if (code !== 0) process.exit(code);
    });
}
