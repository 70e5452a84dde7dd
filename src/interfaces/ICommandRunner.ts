/**
 * External command runner interface
 */

export interface CommandResult {
  exitCode: number;
  stdout: string;
}

export interface CommandOptions {
  /** Kill the process after this many milliseconds */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface ICommandRunner {
  /**
   * Run a command and capture stdout.
   * Resolves with a non-zero exit code (-1 when it could not be spawned)
   * instead of rejecting; rejects only with CancellationError.
   */
  run(
    command: string,
    args: string[],
    options?: CommandOptions
  ): Promise<CommandResult>;
}
