/**
 * Wixpack Engine — Manifest Rendering
 *
 * Renders the WiX source (main.wxs) from a template. This is value
 * substitution only: `{{ name }}` is replaced by the XML-escaped value.
 * There are no conditionals, loops or helpers.
 *
 * WiX preprocessor references such as `$(var.SourceDir)` pass through
 * untouched.
 */

import * as fs from "fs";
import * as path from "path";
import { v5 as uuidv5 } from "uuid";
import { RenderError } from "./errors";
import { Architecture } from "./types";

/**
 * Bundled template shipped with the engine. Resolved from the package root:
 * src/ and the compiled dist/ sit at the same depth below it.
 */
export const DEFAULT_TEMPLATE_PATH = path.join(
  __dirname,
  "..",
  "templates",
  "main.wxs",
);

/** Namespace for upgrade codes derived from product names */
const UPGRADE_CODE_NAMESPACE = "6f1c2b9e-4a51-5d0e-9b7a-3c2f8e4d1a60";

const PLACEHOLDER_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Everything main.wxs needs. Each field maps to a `{{ field }}` placeholder.
 */
export interface ManifestContext {
  product_name: string;
  version: string;
  manufacturer: string;
  upgrade_code: string;
  platform: Architecture;
  /** ProgramFilesFolder or ProgramFiles64Folder */
  program_files_dir: string;
  /** Component group emitted by the harvest stage (-cg) */
  component_group: string;
  /** Directory the harvested files are installed under (-dr) */
  directory_ref: string;
  /** Directory that was harvested */
  harvest_dir: string;
  /** Preprocessor variable the harvested fragment refers to */
  source_dir_var: string;
}

type Segment =
  | { kind: "text"; text: string }
  | { kind: "placeholder"; name: string; offset: number };

function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/**
 * Split a template into literal text and placeholders.
 *
 * @throws RenderError (malformed)
 */
function parseTemplate(source: string): Segment[] {
  const segments: Segment[] = [];
  let cursor = 0;

  while (cursor < source.length) {
    const open = source.indexOf("{{", cursor);
    if (open === -1) {
      segments.push({ kind: "text", text: source.slice(cursor) });
      break;
    }

    if (open > cursor) {
      segments.push({ kind: "text", text: source.slice(cursor, open) });
    }

    const close = source.indexOf("}}", open + 2);
    if (close === -1) {
      throw new RenderError(
        "malformed",
        `Unterminated placeholder at offset ${open}`,
        { offset: open },
      );
    }

    const name = source.slice(open + 2, close).trim();
    if (name.length === 0) {
      throw new RenderError(
        "malformed",
        `Empty placeholder at offset ${open}`,
        { offset: open },
      );
    }
    if (!PLACEHOLDER_NAME.test(name)) {
      throw new RenderError(
        "malformed",
        `Invalid placeholder name "${name}" at offset ${open}`,
        { offset: open },
      );
    }

    segments.push({ kind: "placeholder", name, offset: open });
    cursor = close + 2;
  }

  return segments;
}

/**
 * Substitute every `{{ name }}` in `source` with the escaped value.
 *
 * The whole template is checked before anything is substituted, and the
 * result is only returned once every placeholder resolved.
 *
 * @throws RenderError (malformed | missing_key)
 */
export function renderTemplate(
  source: string,
  values: Record<string, string>,
): string {
  const segments = parseTemplate(source);
  let output = "";

  for (const segment of segments) {
    if (segment.kind === "text") {
      output += segment.text;
      continue;
    }

    if (!Object.prototype.hasOwnProperty.call(values, segment.name)) {
      throw new RenderError(
        "missing_key",
        `Template references unknown value "${segment.name}" at offset ${segment.offset}`,
        { key: segment.name, offset: segment.offset },
      );
    }
    output += escapeXml(values[segment.name]);
  }

  return output;
}

export function manifestValues(ctx: ManifestContext): Record<string, string> {
  return { ...ctx };
}

export function renderManifest(source: string, ctx: ManifestContext): string {
  return renderTemplate(source, manifestValues(ctx));
}

/**
 * Read a template file (the bundled main.wxs by default).
 */
export function loadTemplate(filePath: string = DEFAULT_TEMPLATE_PATH): string {
  return fs.readFileSync(filePath, "utf-8");
}

/**
 * Stable upgrade code for a product, so every build of the same product
 * upgrades the previous one.
 */
export function deriveUpgradeCode(productName: string): string {
  return uuidv5(productName, UPGRADE_CODE_NAMESPACE).toUpperCase();
}

export function programFilesDir(arch: Architecture): string {
  return arch === "x86" ? "ProgramFilesFolder" : "ProgramFiles64Folder";
}
