/**
 * Wixpack CLI — Project File
 *
 * An optional wixpack.yaml next to the application carries the settings
 * that rarely change between builds:
 *
 *   name: My App
 *   version: 1.2.0
 *   manufacturer: Example Corp
 *   arch: x64
 *   template: ./installer/main.wxs
 *
 * Command-line flags override the file. Relative paths in the file are
 * resolved against the file's own directory.
 */

import * as fs from "fs";
import * as path from "path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { Architecture, DEFAULTS } from "@wixpack/engine";

export const PROJECT_FILE = "wixpack.yaml";

// ─── Schemas ─────────────────────────────────────────────────

export const ArchitectureSchema = z.enum(["x64", "x86", "arm64"]);

const Identifier = z
  .string()
  .regex(
    /^[A-Za-z_][A-Za-z0-9_.]*$/,
    "must be a WiX identifier (letters, digits, underscores, periods)",
  );

export const ProjectConfigSchema = z
  .object({
    name: z.string().min(1).max(128),
    version: z
      .string()
      .regex(/^\d+(\.\d+){0,3}$/, "must be numeric, e.g. 1.2.0"),
    manufacturer: z.string().min(1).max(128),
    upgrade_code: z
      .string()
      .regex(
        /^\{?[0-9A-Fa-f]{8}-[0-9A-Fa-f]{4}-[0-9A-Fa-f]{4}-[0-9A-Fa-f]{4}-[0-9A-Fa-f]{12}\}?$/,
        "must be a GUID",
      ),
    arch: ArchitectureSchema,
    out: z.string().min(1),
    template: z.string().min(1),
    component_group: Identifier,
    directory_ref: Identifier,
  })
  .partial()
  .strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

const BuildSettingsSchema = ProjectConfigSchema.required({
  name: true,
  version: true,
  manufacturer: true,
});

export class ProjectConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = "ProjectConfigError";
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const key = issue.path.join(".");
    return key ? `${key}: ${issue.message}` : issue.message;
  });
}

// ─── Loading ─────────────────────────────────────────────────

/**
 * Parse and validate a project file.
 */
export function loadProjectConfig(filePath: string): ProjectConfig {
  let raw: unknown;
  try {
    raw = parseYaml(fs.readFileSync(filePath, "utf-8"));
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ProjectConfigError(`Could not read ${filePath}: ${reason}`);
  }

  // An empty file parses to null
  const result = ProjectConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ProjectConfigError(
      `Invalid project file ${filePath}`,
      formatIssues(result.error),
    );
  }

  const dir = path.dirname(path.resolve(filePath));
  const config = result.data;
  if (config.out) config.out = path.resolve(dir, config.out);
  if (config.template) config.template = path.resolve(dir, config.template);
  return config;
}

/**
 * The project file to use: the explicit one, or wixpack.yaml in `cwd`
 * when it exists.
 */
export function findProjectConfig(
  explicit: string | undefined,
  cwd: string = process.cwd(),
): string | null {
  if (explicit) return path.resolve(cwd, explicit);
  const candidate = path.join(cwd, PROJECT_FILE);
  return fs.existsSync(candidate) ? candidate : null;
}

// ─── Resolution ──────────────────────────────────────────────

/** Flag values as commander hands them over */
export interface BuildFlags {
  name?: string;
  version?: string;
  manufacturer?: string;
  upgradeCode?: string;
  arch?: string;
  out?: string;
  template?: string;
}

export interface BuildSettings {
  sourceDir: string;
  name: string;
  version: string;
  manufacturer: string;
  upgradeCode?: string;
  arch: Architecture;
  outputPath: string;
  templatePath?: string;
  componentGroup?: string;
  directoryRef?: string;
}

export function defaultOutputName(
  name: string,
  version: string,
  arch: string,
): string {
  return `${name.replace(/\s+/g, "_")}_${version}_${arch}.msi`;
}

/**
 * Merge flags over the project file and validate the result.
 */
export function resolveBuildSettings(
  sourceDir: string,
  flags: BuildFlags,
  project: ProjectConfig | null,
  cwd: string = process.cwd(),
): BuildSettings {
  const input: Record<string, string | undefined> = {
    name: flags.name,
    version: flags.version,
    manufacturer: flags.manufacturer,
    upgrade_code: flags.upgradeCode,
    arch: flags.arch,
    out: flags.out && path.resolve(cwd, flags.out),
    template: flags.template && path.resolve(cwd, flags.template),
  };
  const defined = Object.fromEntries(
    Object.entries(input).filter(([, value]) => value !== undefined),
  );

  const result = BuildSettingsSchema.safeParse({
    ...(project ?? {}),
    ...defined,
  });
  if (!result.success) {
    throw new ProjectConfigError(
      "Invalid build settings",
      formatIssues(result.error),
    );
  }

  const settings = result.data;
  const arch = settings.arch ?? DEFAULTS.arch;
  return {
    sourceDir: path.resolve(cwd, sourceDir),
    name: settings.name,
    version: settings.version,
    manufacturer: settings.manufacturer,
    upgradeCode: settings.upgrade_code,
    arch,
    outputPath:
      settings.out ??
      path.join(cwd, defaultOutputName(settings.name, settings.version, arch)),
    templatePath: settings.template,
    componentGroup: settings.component_group,
    directoryRef: settings.directory_ref,
  };
}
