/**
 * Wixpack Engine — Core Type Definitions
 *
 * Shared by the engine, the stage builders and the CLI. Result and event
 * shapes use snake_case fields because they are printed and serialised
 * as-is.
 */

// ─── Platform ────────────────────────────────────────────────────

export type Architecture = "x64" | "x86" | "arm64";

// ─── Toolchain ───────────────────────────────────────────────────

export interface ToolchainTools {
  /** heat.exe — harvests a directory into a WiX fragment */
  harvest: string;
  /** candle.exe — compiles .wxs sources into .wixobj objects */
  compile: string;
  /** light.exe — links .wixobj objects into the .msi */
  link: string;
}

export interface ToolchainInstallation {
  /** Root directory of the extracted toolchain */
  dir: string;
  /** Absolute paths of the three executables */
  tools: ToolchainTools;
}

// ─── Stages ──────────────────────────────────────────────────────

export type StageName = "harvest" | "compile" | "link";

export interface Stage {
  name: StageName;
  /** Absolute path of the executable */
  tool: string;
  args: string[];
  /** Working directory for the process */
  cwd: string;
  /** Files the tool is expected to produce (relative to cwd or absolute) */
  outputs: string[];
}

export type OutputStream = "stdout" | "stderr";

/** Receives each line of tool output, in the order the tool emitted it */
export type LineSink = (line: string, stream: OutputStream) => void;

// ─── Package Metadata ────────────────────────────────────────────

export interface PackageMetadata {
  /** Product name shown in Add/Remove Programs */
  name: string;
  /** Numeric product version (major.minor.build) */
  version: string;
  manufacturer: string;
  /** Stable GUID; derived from the name when omitted */
  upgrade_code?: string;
}

// ─── Bundle Lifecycle ────────────────────────────────────────────

export type BundleState =
  | "PREPARING"
  | "HARVESTING"
  | "COMPILING"
  | "LINKING"
  | "DONE"
  | "FAILED";

export type ErrorCategory =
  | "TOOLCHAIN_ERROR"
  | "NETWORK_ERROR"
  | "INTEGRITY_ERROR"
  | "EXTRACTION_ERROR"
  | "TEMPLATE_ERROR"
  | "SPAWN_ERROR"
  | "TOOL_ERROR"
  | "IO_ERROR";

export interface BundleError {
  category: ErrorCategory;
  message: string;
  /** State the pipeline was in when it failed */
  state: BundleState;
  details?: Record<string, unknown>;
}

export interface BundleRequest {
  /** Directory holding the compiled application to package */
  source_dir: string;
  metadata: PackageMetadata;
  /** Where the .msi is written */
  output_path: string;
  /** Scratch directory owned by this run (manifest, fragments, objects) */
  build_dir: string;
  arch?: Architecture;
  component_group?: string;
  directory_ref?: string;
  /** Template source; the bundled main.wxs when omitted */
  template?: string;
  /** Receives tool output; defaults to the engine logger */
  log_sink?: LineSink;
}

export interface BundleResult {
  bundle_id: string;
  final_state: "DONE" | "FAILED";
  artifact_path?: string;
  started_at: string;
  finished_at: string;
  /** Every state entered, in order */
  states: BundleState[];
  error?: BundleError;
}

// ─── Engine Events ───────────────────────────────────────────────

export type EngineEventType = "state_change" | "log";

export interface StateChangeData {
  bundle_id: string;
  state: BundleState;
  message?: string;
}

export interface LogData {
  bundle_id: string;
  stage: StageName;
  stream: OutputStream;
  line: string;
}

export type EngineEvent =
  | { type: "state_change"; timestamp: string; data: StateChangeData }
  | { type: "log"; timestamp: string; data: LogData };

export type EngineEventHandler = (event: EngineEvent) => void;
