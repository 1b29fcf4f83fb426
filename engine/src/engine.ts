/**
 * Wixpack Engine — Main Engine Class
 *
 * Drives one installer build:
 *
 *   PREPARING → HARVESTING → COMPILING → LINKING → DONE
 *
 * Any failure moves to FAILED and stops there; the caller starts over from
 * PREPARING. A stage succeeds or fails on its tool's exit status alone —
 * produced files are never inspected.
 *
 * The engine has NO UI logic. It communicates via return values and event
 * callbacks, and every component error comes back as a BundleResult.
 */

import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";
import { DEFAULTS } from "./config";
import {
  AcquireError,
  RenderError,
  StageError,
  ToolchainError,
  errorMessage,
} from "./errors";
import {
  deriveUpgradeCode,
  loadTemplate,
  programFilesDir,
  renderManifest,
  ManifestContext,
} from "./manifest";
import { runStage as defaultRunStage, StageRunner } from "./stage-runner";
import {
  compileStage,
  formatCommand,
  harvestStage,
  linkStage,
} from "./stages";
import { ToolchainProvider } from "./toolchain";
import {
  BundleError,
  BundleRequest,
  BundleResult,
  BundleState,
  EngineEvent,
  EngineEventHandler,
  ErrorCategory,
  LineSink,
  Stage,
} from "./types";
import { createLogger, Logger } from "./utils/logger";

export interface EngineOptions {
  toolchain: ToolchainProvider;
  /** Defaults to a silent logger (debug when verbose) */
  logger?: Logger;
  verbose?: boolean;
  /** Process runner override (tests) */
  runStage?: StageRunner;
}

/**
 * Map a component error onto the category reported to the caller.
 */
export function categorizeError(err: unknown): {
  category: ErrorCategory;
  details: Record<string, unknown>;
} {
  if (err instanceof StageError) {
    return {
      category: err.kind === "spawn_failed" ? "SPAWN_ERROR" : "TOOL_ERROR",
      details: {
        kind: err.kind,
        tool: err.tool,
        exit_code: err.exit_code,
        signal: err.signal,
      },
    };
  }
  if (err instanceof AcquireError) {
    const categories: Record<AcquireError["kind"], ErrorCategory> = {
      network: "NETWORK_ERROR",
      integrity: "INTEGRITY_ERROR",
      extraction: "EXTRACTION_ERROR",
      unsupported: "TOOLCHAIN_ERROR",
    };
    return {
      category: categories[err.kind],
      details: { kind: err.kind, url: err.url },
    };
  }
  if (err instanceof ToolchainError) {
    return {
      category: "TOOLCHAIN_ERROR",
      details: { dir: err.dir, missing: err.missing },
    };
  }
  if (err instanceof RenderError) {
    return {
      category: "TEMPLATE_ERROR",
      details: { kind: err.kind, key: err.key, offset: err.offset },
    };
  }
  return { category: "IO_ERROR", details: {} };
}

export class WixpackEngine {
  private logger: Logger;
  private toolchain: ToolchainProvider;
  private runStage: StageRunner;
  private eventHandlers: EngineEventHandler[] = [];

  constructor(options: EngineOptions) {
    this.toolchain = options.toolchain;
    this.runStage = options.runStage ?? defaultRunStage;
    this.logger =
      options.logger ??
      createLogger({ level: options.verbose ? "debug" : "silent" });
  }

  // ─── Event System ────────────────────────────────────────────

  /**
   * Register an event handler. The CLI uses this for stage progress and
   * tool output.
   */
  on(handler: EngineEventHandler): void {
    this.eventHandlers.push(handler);
  }

  private emit(event: EngineEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (err: unknown) {
        this.logger.warn(
          { error: errorMessage(err), event: event.type },
          "Event handler threw",
        );
      }
    }
  }

  // ─── Core: Bundle ────────────────────────────────────────────

  /**
   * Build an installer for the application in `request.source_dir`.
   *
   * Never throws for a component failure; inspect `final_state`.
   */
  async bundle(request: BundleRequest): Promise<BundleResult> {
    const bundleId = crypto.randomUUID();
    const startedAt = new Date().toISOString();
    const states: BundleState[] = [];
    let current: BundleState = "PREPARING";

    const sourceDir = path.resolve(request.source_dir);
    const buildDir = path.resolve(request.build_dir);
    const outputPath = path.resolve(request.output_path);
    const arch = request.arch ?? DEFAULTS.arch;
    const componentGroup = request.component_group ?? DEFAULTS.componentGroup;
    const directoryRef = request.directory_ref ?? DEFAULTS.directoryRef;
    const sourceDirVar = DEFAULTS.sourceDirVar;

    const transition = (state: BundleState, message?: string) => {
      current = state;
      states.push(state);
      this.logger.debug({ bundle: bundleId, state }, message ?? state);
      this.emit({
        type: "state_change",
        timestamp: new Date().toISOString(),
        data: { bundle_id: bundleId, state, message },
      });
    };

    const fail = (failedState: BundleState, err: unknown): BundleResult => {
      const { category, details } = categorizeError(err);
      const error: BundleError = {
        category,
        message: errorMessage(err),
        state: failedState,
        details,
      };

      this.logger.error(
        { bundle: bundleId, state: failedState, category, error: error.message },
        "Bundle failed",
      );
      transition("FAILED", error.message);

      return {
        bundle_id: bundleId,
        final_state: "FAILED",
        started_at: startedAt,
        finished_at: new Date().toISOString(),
        states,
        error,
      };
    };

    try {
      // ─── PREPARING ───
      transition("PREPARING");
      this.logger.info(
        {
          bundle: bundleId,
          product: request.metadata.name,
          version: request.metadata.version,
          arch,
        },
        `Bundling ${request.metadata.name} v${request.metadata.version}`,
      );

      const toolchain = await this.toolchain.ensure(this.logger);

      fs.mkdirSync(buildDir, { recursive: true });
      fs.mkdirSync(path.dirname(outputPath), { recursive: true });
      // A stale artifact from an earlier run must not survive a failed link
      fs.rmSync(outputPath, { force: true });

      const context: ManifestContext = {
        product_name: request.metadata.name,
        version: request.metadata.version,
        manufacturer: request.metadata.manufacturer,
        upgrade_code:
          request.metadata.upgrade_code ??
          deriveUpgradeCode(request.metadata.name),
        platform: arch,
        program_files_dir: programFilesDir(arch),
        component_group: componentGroup,
        directory_ref: directoryRef,
        harvest_dir: sourceDir,
        source_dir_var: sourceDirVar,
      };
      const manifest = renderManifest(
        request.template ?? loadTemplate(),
        context,
      );
      const manifestPath = path.join(buildDir, DEFAULTS.manifestFile);
      fs.writeFileSync(manifestPath, manifest, "utf-8");
      this.logger.debug({ path: manifestPath }, "Manifest written");

      const sink = request.log_sink;

      // ─── HARVESTING ───
      transition("HARVESTING");
      const harvest = harvestStage(toolchain, {
        buildDir,
        harvestDir: sourceDir,
        platform: arch,
        componentGroup,
        directoryRef,
        sourceDirVar,
      });
      await this.execute(bundleId, harvest, sink);

      // ─── COMPILING ───
      transition("COMPILING");
      const compile = compileStage(toolchain, {
        buildDir,
        arch,
        harvestDir: sourceDir,
        sourceDirVar,
        sources: [DEFAULTS.manifestFile, ...harvest.outputs],
      });
      await this.execute(bundleId, compile, sink);

      // ─── LINKING ───
      transition("LINKING");
      const link = linkStage(toolchain, {
        buildDir,
        objects: compile.outputs,
        outputPath,
      });
      await this.execute(bundleId, link, sink);

      // ─── DONE ───
      transition("DONE");
      this.logger.info(
        { bundle: bundleId, artifact: outputPath },
        "Installer built",
      );

      return {
        bundle_id: bundleId,
        final_state: "DONE",
        artifact_path: outputPath,
        started_at: startedAt,
        finished_at: new Date().toISOString(),
        states,
      };
    } catch (err: unknown) {
      return fail(current, err);
    }
  }

  // ─── Helpers ─────────────────────────────────────────────────

  private async execute(
    bundleId: string,
    stage: Stage,
    sink: LineSink | undefined,
  ): Promise<void> {
    const tool = path.basename(stage.tool);
    this.logger.info(
      { bundle: bundleId, stage: stage.name, command: formatCommand(stage) },
      `Running ${tool}`,
    );

    await this.runStage(stage, (line, stream) => {
      if (sink) {
        try {
          sink(line, stream);
        } catch (err: unknown) {
          this.logger.warn(
            { error: errorMessage(err), stage: stage.name },
            "Log sink threw",
          );
        }
      } else {
        this.logger.info({ tool, stream }, line);
      }
      this.emit({
        type: "log",
        timestamp: new Date().toISOString(),
        data: { bundle_id: bundleId, stage: stage.name, line, stream },
      });
    });
  }
}
