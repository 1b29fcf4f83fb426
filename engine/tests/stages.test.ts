/**
 * Wixpack Engine — Stage Builder Tests
 */

import { describe, it, expect } from "vitest";
import {
  compileStage,
  formatCommand,
  harvestStage,
  linkStage,
  objectFileFor,
} from "../src/stages";
import { ToolchainInstallation } from "../src/types";

const toolchain: ToolchainInstallation = {
  dir: "/opt/wix",
  tools: {
    harvest: "/opt/wix/heat.exe",
    compile: "/opt/wix/candle.exe",
    link: "/opt/wix/light.exe",
  },
};

describe("harvestStage", () => {
  it("builds the heat argument vector", () => {
    const stage = harvestStage(toolchain, {
      buildDir: "/build",
      harvestDir: "/app/dist",
      platform: "x64",
      componentGroup: "AppFiles",
      directoryRef: "APPLICATIONFOLDER",
      sourceDirVar: "SourceDir",
    });

    expect(stage).toEqual({
      name: "harvest",
      tool: "/opt/wix/heat.exe",
      args: [
        "dir",
        "/app/dist",
        "-platform",
        "x64",
        "-cg",
        "AppFiles",
        "-dr",
        "APPLICATIONFOLDER",
        "-gg",
        "-srd",
        "-out",
        "appdir.wxs",
        "-var",
        "var.SourceDir",
      ],
      cwd: "/build",
      outputs: ["appdir.wxs"],
    });
  });

  it("honours a custom fragment file name", () => {
    const stage = harvestStage(toolchain, {
      buildDir: "/build",
      harvestDir: "/app/dist",
      platform: "x86",
      componentGroup: "Files",
      directoryRef: "INSTALLDIR",
      sourceDirVar: "AppDir",
      outFile: "files.wxs",
    });

    expect(stage.outputs).toEqual(["files.wxs"]);
    expect(stage.args.slice(-4)).toEqual([
      "-out",
      "files.wxs",
      "-var",
      "var.AppDir",
    ]);
  });
});

describe("compileStage", () => {
  it("passes the fixed arch, the source variable and every source", () => {
    const stage = compileStage(toolchain, {
      buildDir: "/build",
      arch: "x64",
      harvestDir: "/app/dist",
      sourceDirVar: "SourceDir",
      sources: ["main.wxs", "appdir.wxs"],
    });

    expect(stage.tool).toBe("/opt/wix/candle.exe");
    expect(stage.args).toEqual([
      "-arch",
      "x64",
      "-dSourceDir=/app/dist",
      "main.wxs",
      "appdir.wxs",
    ]);
    expect(stage.outputs).toEqual(["main.wixobj", "appdir.wixobj"]);
    expect(stage.cwd).toBe("/build");
  });
});

describe("linkStage", () => {
  it("puts the output path first and then every object", () => {
    const stage = linkStage(toolchain, {
      buildDir: "/build",
      objects: ["main.wixobj", "appdir.wixobj"],
      outputPath: "/out/App.msi",
    });

    expect(stage.args).toEqual([
      "-o",
      "/out/App.msi",
      "main.wixobj",
      "appdir.wixobj",
    ]);
    expect(stage.outputs).toEqual(["/out/App.msi"]);
  });
});

describe("objectFileFor", () => {
  it("replaces the .wxs extension with .wixobj", () => {
    expect(objectFileFor("main.wxs")).toBe("main.wixobj");
  });
});

describe("formatCommand", () => {
  it("joins the tool name and arguments", () => {
    const stage = linkStage(toolchain, {
      buildDir: "/build",
      objects: ["main.wixobj"],
      outputPath: "App.msi",
    });
    expect(formatCommand(stage)).toBe("light.exe -o App.msi main.wixobj");
  });
});
