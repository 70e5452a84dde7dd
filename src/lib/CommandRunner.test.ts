/**
 * Unit tests for CommandRunner
 */

import { CommandRunner } from "./CommandRunner";
import { CancellationError } from "../types";

describe("CommandRunner", () => {
  it("should report a command that cannot be spawned as exit code -1", async () => {
    const result = await new CommandRunner().run(
      "disk-insights-missing-command",
      ["version"],
      { timeoutMs: 5000 }
    );

    expect(result).toEqual({ exitCode: -1, stdout: "" });
  });

  it("should throw CancellationError for an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      new CommandRunner().run("disk-insights-missing-command", [], {
        signal: controller.signal,
      })
    ).rejects.toBeInstanceOf(CancellationError);
  });
});
