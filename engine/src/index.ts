/**
 * Wixpack Engine — Public API
 *
 * The single entry point for the engine package. The CLI imports from
 * here — never from internal modules.
 */

// Main engine class
export { WixpackEngine, categorizeError } from "./engine";
export type { EngineOptions } from "./engine";

// All types
export type {
  Architecture,
  ToolchainTools,
  ToolchainInstallation,
  StageName,
  Stage,
  OutputStream,
  LineSink,
  PackageMetadata,
  BundleState,
  ErrorCategory,
  BundleError,
  BundleRequest,
  BundleResult,
  EngineEventType,
  StateChangeData,
  LogData,
  EngineEvent,
  EngineEventHandler,
} from "./types";

// Errors
export {
  IntegrityError,
  AcquireError,
  ToolchainError,
  RenderError,
  StageError,
  errorMessage,
} from "./errors";

// Configuration
export {
  WIX_URL,
  WIX_SHA256,
  TOOL_NAMES,
  DEFAULTS,
  loadToolchainConfig,
} from "./config";
export type { ToolchainConfig, ToolNames } from "./config";

// Pipeline components (exposed for advanced use / testing)
export { computeDigest, verifyDigest, assertDigest } from "./verifier";
export type { VerificationResult } from "./verifier";
export { downloadBytes } from "./downloader";
export type { Fetcher, DownloadProgress, ProgressCallback } from "./downloader";
export {
  acquireToolchain,
  extractArchive,
  locateToolchain,
  StaticToolchain,
  ManagedToolchain,
} from "./toolchain";
export type {
  AcquireOptions,
  ToolchainProvider,
  ManagedToolchainOptions,
} from "./toolchain";
export {
  renderTemplate,
  renderManifest,
  manifestValues,
  loadTemplate,
  deriveUpgradeCode,
  programFilesDir,
  DEFAULT_TEMPLATE_PATH,
} from "./manifest";
export type { ManifestContext } from "./manifest";
export { runTool, runStage } from "./stage-runner";
export type { StageRunner } from "./stage-runner";
export {
  harvestStage,
  compileStage,
  linkStage,
  objectFileFor,
  formatCommand,
} from "./stages";
export { fetchRedistributable, REDISTRIBUTABLES } from "./redist";
export type { Redistributable, FetchRedistOptions } from "./redist";

// Logging
export { createLogger } from "./utils/logger";
export type { Logger, LogLevel } from "./utils/logger";
