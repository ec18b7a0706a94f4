// ─── keyshift: Tool Runner ───────────────────────────────────────────────────
//
// Runs the external converter/detector/stretcher and collects their output.
// No shell, no timeout: a hung tool hangs the job.
// ─────────────────────────────────────────────────────────────────────────────

import { spawn } from "node:child_process";
import type { ProcessOutput, ToolRunner } from "./types.js";

/**
 * Spawn processes directly (argv, not a shell string).
 * stdout and stderr are merged in the order chunks arrive; stdout is also
 * kept on its own.
 */
export function createProcessRunner(): ToolRunner {
  return {
    run(command, args) {
      return new Promise<ProcessOutput>((resolve, reject) => {
        const chunks: Buffer[] = [];
        const stdout: Buffer[] = [];
        const child = spawn(command, [...args], { stdio: ["ignore", "pipe", "pipe"] });

        child.stdout.on("data", (chunk: Buffer) => {
          chunks.push(chunk);
          stdout.push(chunk);
        });
        child.stderr.on("data", (chunk: Buffer) => chunks.push(chunk));

        child.once("error", reject);
        child.once("close", (code) => {
          resolve({
            exitCode: code,
            output: Buffer.concat(chunks).toString("utf8"),
            stdout: Buffer.concat(stdout).toString("utf8"),
          });
        });
      });
    },
  };
}

// ─── Mock Runner (testing) ──────────────────────────────────────────────────

/** A recorded invocation. */
export interface ToolCall {
  command: string;
  args: string[];
}

/** Decides what a mocked invocation does. May write files as a side effect. */
export type MockToolHandler = (call: ToolCall) => ProcessOutput | Promise<ProcessOutput>;

/**
 * Runner that hands every call to `handler` and records it.
 * Use: `const runner = createMockToolRunner(h); ... runner.calls`
 */
export function createMockToolRunner(
  handler: MockToolHandler = () => ({ exitCode: 0, output: "", stdout: "" })
): ToolRunner & { calls: ToolCall[] } {
  const calls: ToolCall[] = [];

  return {
    calls,

    async run(command, args) {
      const call: ToolCall = { command, args: [...args] };
      calls.push(call);
      return handler(call);
    },
  };
}
