/**
 * Wixpack Engine — Manifest Rendering Tests
 */

import { describe, it, expect } from "vitest";
import * as fs from "fs";
import * as path from "path";
import {
  DEFAULT_TEMPLATE_PATH,
  deriveUpgradeCode,
  loadTemplate,
  ManifestContext,
  programFilesDir,
  renderManifest,
  renderTemplate,
} from "../src/manifest";
import { RenderError } from "../src/errors";

function captureRenderError(fn: () => unknown): RenderError {
  try {
    fn();
  } catch (err) {
    if (err instanceof RenderError) return err;
    throw err;
  }
  throw new Error("expected a RenderError");
}

function createContext(
  overrides: Partial<ManifestContext> = {},
): ManifestContext {
  return {
    product_name: "Test App",
    version: "1.2.3",
    manufacturer: "Test Co",
    upgrade_code: "11111111-2222-3333-4444-555555555555",
    platform: "x64",
    program_files_dir: "ProgramFiles64Folder",
    component_group: "AppFiles",
    directory_ref: "APPLICATIONFOLDER",
    harvest_dir: "/tmp/app",
    source_dir_var: "SourceDir",
    ...overrides,
  };
}

describe("renderTemplate", () => {
  it("substitutes placeholders with and without inner whitespace", () => {
    expect(
      renderTemplate('<A Name="{{name}}" Id="{{ id }}" />', {
        name: "app",
        id: "X1",
      }),
    ).toBe('<A Name="app" Id="X1" />');
  });

  it("substitutes repeated placeholders", () => {
    expect(renderTemplate("{{a}}-{{a}}", { a: "x" })).toBe("x-x");
  });

  it("returns text without placeholders unchanged", () => {
    const source = '<Wix><Fragment Id="$(var.SourceDir)" /></Wix>';
    expect(renderTemplate(source, {})).toBe(source);
  });

  it("escapes XML special characters in values", () => {
    expect(
      renderTemplate('<P Name="{{ name }}" />', { name: `Tom & "Jerry" <'s>` }),
    ).toBe('<P Name="Tom &amp; &quot;Jerry&quot; &lt;&apos;s&gt;" />');
  });

  it("fails with missing_key naming the absent value", () => {
    const err = captureRenderError(() =>
      renderTemplate("Hello {{ who }}", { name: "x" }),
    );
    expect(err.kind).toBe("missing_key");
    expect(err.key).toBe("who");
    expect(err.offset).toBe(6);
  });

  it("does not treat inherited properties as values", () => {
    const err = captureRenderError(() => renderTemplate("{{ toString }}", {}));
    expect(err.kind).toBe("missing_key");
    expect(err.key).toBe("toString");
  });

  it("fails with malformed on an unterminated placeholder", () => {
    const err = captureRenderError(() =>
      renderTemplate("abc {{ name", { name: "x" }),
    );
    expect(err.kind).toBe("malformed");
    expect(err.offset).toBe(4);
  });

  it("fails with malformed on an empty placeholder", () => {
    const err = captureRenderError(() => renderTemplate("{{  }}", {}));
    expect(err.kind).toBe("malformed");
    expect(err.offset).toBe(0);
  });

  it("fails with malformed on an invalid placeholder name", () => {
    const err = captureRenderError(() =>
      renderTemplate("x{{ product.name }}", { "product.name": "x" }),
    );
    expect(err.kind).toBe("malformed");
    expect(err.offset).toBe(1);
  });

  it("reports a malformed template before any missing key", () => {
    const err = captureRenderError(() => renderTemplate("{{ a }} {{", {}));
    expect(err.kind).toBe("malformed");
  });
});

describe("DEFAULT_TEMPLATE_PATH", () => {
  const packageRoot = path.resolve(__dirname, "..");

  function readJson(file: string): Record<string, unknown> {
    return JSON.parse(fs.readFileSync(path.join(packageRoot, file), "utf-8"));
  }

  it("points at the template in the package root", () => {
    expect(DEFAULT_TEMPLATE_PATH).toBe(
      path.join(packageRoot, "templates", "main.wxs"),
    );
    expect(fs.existsSync(DEFAULT_TEMPLATE_PATH)).toBe(true);
  });

  it("resolves to the same file from the compiled package", () => {
    const build = readJson("tsconfig.build.json");
    const options = build.compilerOptions;
    expect(options).toMatchObject({ rootDir: "src", outDir: "dist" });
    expect(readJson("package.json").main).toBe("dist/index.js");
  });
});

describe("renderManifest", () => {
  it("renders the bundled main.wxs", () => {
    const output = renderManifest(loadTemplate(), createContext());

    expect(output.startsWith('<?xml version="1.0" encoding="utf-8"?>')).toBe(
      true,
    );
    expect(output).toContain('Name="Test App"');
    expect(output).toContain('Version="1.2.3"');
    expect(output).toContain('Manufacturer="Test Co"');
    expect(output).toContain(
      'UpgradeCode="11111111-2222-3333-4444-555555555555"',
    );
    expect(output).toContain('Platform="x64"');
    expect(output).toContain('<Directory Id="ProgramFiles64Folder">');
    expect(output).toContain(
      '<Directory Id="APPLICATIONFOLDER" Name="Test App" />',
    );
    expect(output).toContain('<ComponentGroupRef Id="AppFiles" />');
    expect(output).toContain("$(var.SourceDir)");
    expect(output).not.toContain("{{");
  });

  it("uses the component group from the context", () => {
    const output = renderManifest(
      '<ComponentGroupRef Id="{{ component_group }}" />',
      createContext({ component_group: "MoreFiles" }),
    );
    expect(output).toBe('<ComponentGroupRef Id="MoreFiles" />');
  });

  it("fails for a template placeholder the context does not provide", () => {
    const err = captureRenderError(() =>
      renderManifest("{{ icon_path }}", createContext()),
    );
    expect(err.kind).toBe("missing_key");
    expect(err.key).toBe("icon_path");
  });
});

describe("deriveUpgradeCode", () => {
  it("is stable for the same product name", () => {
    expect(deriveUpgradeCode("Test App")).toBe(deriveUpgradeCode("Test App"));
  });

  it("differs between product names", () => {
    expect(deriveUpgradeCode("Test App")).not.toBe(
      deriveUpgradeCode("Other App"),
    );
  });

  it("is an uppercase version 5 UUID", () => {
    expect(deriveUpgradeCode("Test App")).toMatch(
      /^[0-9A-F]{8}-[0-9A-F]{4}-5[0-9A-F]{3}-[89AB][0-9A-F]{3}-[0-9A-F]{12}$/,
    );
  });
});

describe("programFilesDir", () => {
  it("maps x86 to the 32-bit folder", () => {
    expect(programFilesDir("x86")).toBe("ProgramFilesFolder");
  });

  it("maps x64 and arm64 to the 64-bit folder", () => {
    expect(programFilesDir("x64")).toBe("ProgramFiles64Folder");
    expect(programFilesDir("arm64")).toBe("ProgramFiles64Folder");
  });
});
