#!/usr/bin/env node

/**
 * Wixpack CLI — Entry Point
 *
 * Builds Windows .msi installers with the WiX toolset.
 *
 * Commands:
 *   wixpack build <sourceDir>        Build an installer
 *   wixpack toolchain fetch          Download and verify WiX
 *   wixpack toolchain status         Show the managed toolchain
 *   wixpack redist <arch> [dir]      Fetch a VC++ redistributable
 */

import { Command } from "commander";
import { registerBuildCommand } from "./commands/build";
import { registerToolchainCommand } from "./commands/toolchain";
import { registerRedistCommand } from "./commands/redist";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("wixpack")
    .description("Build Windows installers from an application directory")
    .version("0.1.0")
    // Root options only before the subcommand: `build --version 1.2.0`
    // belongs to build.
    .enablePositionalOptions();

  registerBuildCommand(program);
  registerToolchainCommand(program);
  registerRedistCommand(program);

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    });
}
