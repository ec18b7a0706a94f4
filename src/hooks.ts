// ─── keyshift: Progress Hooks ────────────────────────────────────────────────
//
// ConversionHook implementations the pipeline reports progress through.
//
// Implementations:
//   - ConsoleConversionHook: one line per stage (CLI / MCP stderr)
//   - SilentConversionHook: no-op (testing/library use)
//   - RecordingConversionHook: keeps every event for assertions
// ─────────────────────────────────────────────────────────────────────────────

import type { ConversionHook, ConversionResult, ConversionStage, ToolName } from "./types.js";
import { formatPitchArgument } from "./keys.js";

// ─── Console Hook ───────────────────────────────────────────────────────────

export interface ConsoleHookOptions {
  /** Also print raw tool output (default: false). */
  verbose?: boolean;

  /** "stderr" keeps stdout clean for protocols like MCP stdio. Default "stdout". */
  stream?: "stdout" | "stderr";
}

const STAGE_ICONS: Record<ConversionStage, string> = {
  check: "🔧",
  decode: "📥",
  detect: "🔍",
  offset: "🎼",
  shift: "🎚️",
  encode: "📤",
  copy: "📄",
  cleanup: "🧹",
};

/** Prints progress lines to the console. */
export function createConsoleConversionHook(options: ConsoleHookOptions = {}): ConversionHook {
  const write = options.stream === "stderr" ? console.error : console.log;

  return {
    onStage(stage, message) {
      write(`  ${STAGE_ICONS[stage]} ${message}`);
    },

    onToolOutput(tool, output) {
      if (!options.verbose) return;
      const text = output.trim();
      if (!text) return;
      write(`    [${tool}]`);
      for (const line of text.split(/\r?\n/)) write(`    │ ${line}`);
    },

    onWarning(message) {
      console.error(`  ⚠ ${message}`);
    },

    onResult(result) {
      switch (result.status) {
        case "converted":
          write(`  ✓ ${result.inputPath} → ${result.outputPath} (${result.sourceKey} → ${result.targetKey}, ${formatPitchArgument(result.semitones)})`);
          break;
        case "already in target key":
          write(`  ✓ ${result.inputPath} already in ${result.targetKey}, copied to ${result.outputPath}`);
          break;
        case "skipped":
          write(`  ⏭ ${result.inputPath}: key not detected, pass --from to set it manually`);
          break;
        case "failed":
          write(`  ✗ ${result.inputPath}: ${result.message ?? "failed"}`);
          break;
      }
    },
  };
}

// ─── Silent Hook ────────────────────────────────────────────────────────────

/** No-op hook. */
export function createSilentConversionHook(): ConversionHook {
  return {
    onStage() {},
    onToolOutput() {},
    onWarning() {},
    onResult() {},
  };
}

// ─── Recording Hook (testing) ───────────────────────────────────────────────

/** A recorded hook event for assertions. */
export type ConversionEvent =
  | { type: "stage"; stage: ConversionStage; message: string }
  | { type: "tool-output"; tool: ToolName; output: string }
  | { type: "warning"; message: string }
  | { type: "result"; result: ConversionResult };

/**
 * Records all hook events.
 * Use: `const hook = createRecordingConversionHook(); ... hook.events`
 */
export function createRecordingConversionHook(): ConversionHook & {
  events: ConversionEvent[];
  stages(): ConversionStage[];
} {
  const events: ConversionEvent[] = [];

  return {
    events,

    stages() {
      const out: ConversionStage[] = [];
      for (const e of events) if (e.type === "stage") out.push(e.stage);
      return out;
    },

    onStage(stage, message) {
      events.push({ type: "stage", stage, message });
    },

    onToolOutput(tool, output) {
      events.push({ type: "tool-output", tool, output });
    },

    onWarning(message) {
      events.push({ type: "warning", message });
    },

    onResult(result) {
      events.push({ type: "result", result });
    },
  };
}

// ─── Compose ────────────────────────────────────────────────────────────────

/** Fan every event out to several hooks, in order. */
export function composeConversionHooks(...hooks: ConversionHook[]): ConversionHook {
  return {
    onStage(stage, message) {
      for (const h of hooks) h.onStage(stage, message);
    },
    onToolOutput(tool, output) {
      for (const h of hooks) h.onToolOutput(tool, output);
    },
    onWarning(message) {
      for (const h of hooks) h.onWarning(message);
    },
    onResult(result) {
      for (const h of hooks) h.onResult(result);
    },
  };
}
