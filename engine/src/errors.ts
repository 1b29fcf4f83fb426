/**
 * Wixpack Engine — Error Types
 *
 * Every engine component throws one of these. Only the engine itself turns
 * them into a BundleResult; nothing here is retried.
 */

export type IntegrityErrorKind = "mismatch" | "malformed_expected";

export class IntegrityError extends Error {
  readonly kind: IntegrityErrorKind;
  readonly expected: string;
  readonly actual?: string;

  constructor(
    kind: IntegrityErrorKind,
    message: string,
    expected: string,
    actual?: string,
  ) {
    super(message);
    this.name = "IntegrityError";
    this.kind = kind;
    this.expected = expected;
    this.actual = actual;
  }
}

export type AcquireErrorKind =
  | "network"
  | "integrity"
  | "extraction"
  | "unsupported";

export class AcquireError extends Error {
  readonly kind: AcquireErrorKind;
  readonly url?: string;

  constructor(
    kind: AcquireErrorKind,
    message: string,
    options: { url?: string; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "AcquireError";
    this.kind = kind;
    this.url = options.url;
  }
}

export class ToolchainError extends Error {
  readonly dir: string;
  /** Tool file names that were missing or not executable */
  readonly missing: string[];

  constructor(dir: string, missing: string[]) {
    super(
      `Toolchain at ${dir} is incomplete. Missing or not executable: ${missing.join(", ")}`,
    );
    this.name = "ToolchainError";
    this.dir = dir;
    this.missing = missing;
  }
}

export type RenderErrorKind = "missing_key" | "malformed";

export class RenderError extends Error {
  readonly kind: RenderErrorKind;
  /** Placeholder name (missing_key only) */
  readonly key?: string;
  /** Character offset into the template (malformed only) */
  readonly offset?: number;

  constructor(
    kind: RenderErrorKind,
    message: string,
    detail: { key?: string; offset?: number } = {},
  ) {
    super(message);
    this.name = "RenderError";
    this.kind = kind;
    this.key = detail.key;
    this.offset = detail.offset;
  }
}

export type StageErrorKind = "spawn_failed" | "non_zero_exit";

export class StageError extends Error {
  readonly kind: StageErrorKind;
  readonly tool: string;
  /** null when the process was killed by a signal */
  readonly exit_code: number | null;
  readonly signal: string | null;

  constructor(
    kind: StageErrorKind,
    message: string,
    detail: {
      tool: string;
      exit_code?: number | null;
      signal?: string | null;
      cause?: unknown;
    },
  ) {
    super(message, { cause: detail.cause });
    this.name = "StageError";
    this.kind = kind;
    this.tool = detail.tool;
    this.exit_code = detail.exit_code ?? null;
    this.signal = detail.signal ?? null;
  }
}

/**
 * Normalise an unknown thrown value into a message string.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
