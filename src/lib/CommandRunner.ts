/**
 * Child-process command runner
 */

import { execFile } from "child_process";
import { promisify } from "util";
import {
  CommandOptions,
  CommandResult,
  ICommandRunner,
} from "../interfaces/ICommandRunner";
import { CancellationError, throwIfCancelled } from "../types";

const execFileAsync = promisify(execFile);

export class CommandRunner implements ICommandRunner {
  async run(
    command: string,
    args: string[],
    options: CommandOptions = {}
  ): Promise<CommandResult> {
    throwIfCancelled(options.signal);

    try {
      const { stdout } = await execFileAsync(command, args, {
        encoding: "utf8",
        timeout: options.timeoutMs,
        signal: options.signal,
        windowsHide: true,
        maxBuffer: 16 * 1024 * 1024,
      });
      return { exitCode: 0, stdout };
    } catch (error) {
      if (options.signal?.aborted) {
        throw new CancellationError();
      }
      return { exitCode: CommandRunner.exitCodeOf(error), stdout: "" };
    }
  }

  /**
   * Exit code of a failed execFile call; -1 for spawn failures and timeouts
   */
  private static exitCodeOf(error: unknown): number {
    if (
      typeof error === "object" &&
      error !== null &&
      "code" in error &&
      typeof error.code === "number"
    ) {
      return error.code;
    }
    return -1;
  }
}
