/**
 * Wixpack Engine — Stage Runner
 *
 * Runs one external tool and streams its output, line by line, to a sink.
 *
 * Drain-then-wait: both output streams are read while the process runs,
 * and the exit status is only interpreted once every line has reached the
 * sink. Exit code 0 is success; anything else fails the stage. There is no
 * retry and no timeout: a hung tool hangs the build.
 */

import { spawn } from "child_process";
import * as path from "path";
import * as readline from "readline";
import { Readable } from "stream";
import { StageError } from "./errors";
import { LineSink, OutputStream, Stage } from "./types";

interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * Forward every line of `input` to the sink. Resolves once the stream ends.
 */
function pipeLines(
  input: Readable,
  stream: OutputStream,
  sink: LineSink,
): Promise<void> {
  return new Promise((resolve) => {
    const lines = readline.createInterface({ input, crlfDelay: Infinity });
    lines.on("line", (line) => sink(line, stream));
    lines.on("close", () => resolve());
  });
}

/**
 * Run `toolPath` with `args` in `workingDir`.
 *
 * @throws StageError (spawn_failed) if the process could not be started
 * @throws StageError (non_zero_exit) on a non-zero exit code or a signal
 */
export async function runTool(
  toolPath: string,
  args: string[],
  workingDir: string,
  sink: LineSink,
): Promise<void> {
  const tool = path.basename(toolPath);

  const child = spawn(toolPath, args, {
    cwd: workingDir,
    stdio: ["ignore", "pipe", "pipe"],
    windowsHide: true,
  });

  const drained = Promise.all([
    pipeLines(child.stdout, "stdout", sink),
    pipeLines(child.stderr, "stderr", sink),
  ]);

  const status = await new Promise<ExitStatus>((resolve, reject) => {
    child.once("error", (err) => {
      reject(
        new StageError("spawn_failed", `Failed to launch ${tool}: ${err.message}`, {
          tool,
          cause: err,
        }),
      );
    });
    child.once("close", (code, signal) => resolve({ code, signal }));
  });

  await drained;

  if (status.code !== 0) {
    const reason =
      status.signal !== null
        ? `was terminated by ${status.signal}`
        : `exited with code ${status.code}`;
    throw new StageError("non_zero_exit", `${tool} ${reason}`, {
      tool,
      exit_code: status.code,
      signal: status.signal,
    });
  }
}

/**
 * Run a stage descriptor.
 */
export function runStage(stage: Stage, sink: LineSink): Promise<void> {
  return runTool(stage.tool, stage.args, stage.cwd, sink);
}

export type StageRunner = typeof runStage;
