/**
 * Wixpack CLI — Redist Command
 *
 * Fetches the pinned Visual C++ redistributable for an architecture so it
 * can ship next to (or inside) the installer.
 *
 * Usage:
 *   wixpack redist x64            Save into the current directory
 *   wixpack redist x86 ./vendor   Save into ./vendor
 */

import * as fs from "fs";
import * as path from "path";
import { Command } from "commander";
import { errorMessage, fetchRedistributable } from "@wixpack/engine";
import { createCliLogger } from "../config";
import { ArchitectureSchema } from "../project-config";
import {
  printSuccess,
  printError,
  printDetail,
  createSpinner,
  formatBytes,
  setDebugMode,
  colors,
} from "../output";

export function registerRedistCommand(program: Command): void {
  program
    .command("redist <arch> [dir]")
    .description("Download a verified Visual C++ redistributable")
    .option("--debug", "Show debug output", false)
    .action(
      async (arch: string, dir: string | undefined, opts: { debug: boolean }) => {
        setDebugMode(opts.debug);
        const parsed = ArchitectureSchema.safeParse(arch);
        if (!parsed.success) {
          printError(`Unknown architecture "${arch}". Use x64, x86 or arm64.`);
          process.exit(1);
        }

        const destDir = path.resolve(dir ?? ".");
        const spinner = createSpinner(
          `Downloading VC++ redistributable (${parsed.data})...`,
        );
        spinner.start();

        try {
          const filePath = await fetchRedistributable(parsed.data, destDir, {
            logger: createCliLogger(opts.debug),
          });
          spinner.stop();
          printSuccess(
            `Saved ${colors.path(filePath)} (${formatBytes(fs.statSync(filePath).size)})`,
          );
        } catch (err: unknown) {
          spinner.stop();
          printError("Could not fetch the redistributable");
          printDetail("Details", errorMessage(err));
          process.exit(1);
        }
      },
    );
}
