#!/usr/bin/env node
// ─── keyshift: MCP Server ────────────────────────────────────────────────────
//
// Exposes key detection and transposition as MCP tools, so an LLM can
// inspect and retune a user's audio files.
//
// Usage:
//   node dist/mcp-server.js          # stdio transport
//
// Tools:
//   list_keys           — recognized key names
//   semitone_offset     — shortest signed shift between two keys
//   detect_key          — detect the key of one audio file
//   detect_keys_to_log  — detect many files, write "path,key" lines to a log
//   convert_key         — transpose one or more files into a target key
//
// Progress goes to stderr; stdout belongs to the protocol.
// ─────────────────────────────────────────────────────────────────────────────

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { KEY_NAMES } from "./types.js";
import { isKeyName, isKeyRoot, semitoneOffset, formatPitchArgument } from "./keys.js";
import { createKeyConverter, type KeyConverter } from "./pipeline.js";
import { createConsoleConversionHook } from "./hooks.js";
import { resolveToolConfig } from "./config/loader.js";
import { isConversionError, errorMessage } from "./errors.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

const keySchema = z
  .string()
  .refine(isKeyName, { message: `Expected one of ${KEY_NAMES.join(", ")}, optionally followed by "m"` });

const targetKeySchema = z.string().refine(isKeyRoot, { message: `Expected one of ${KEY_NAMES.join(", ")}` });

interface TextResult {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

function text(body: string): TextResult {
  return { content: [{ type: "text", text: body }] };
}

function toolError(err: unknown): TextResult {
  const body = isConversionError(err) ? `${err.code}: ${err.message}` : errorMessage(err);
  return { content: [{ type: "text", text: body }], isError: true };
}

let converter: KeyConverter | null = null;

/** Config is read once, on first use. */
function getConverter(): KeyConverter {
  converter ??= createKeyConverter(resolveToolConfig(), {
    hook: createConsoleConversionHook({ stream: "stderr" }),
  });
  return converter;
}

// ─── Server ─────────────────────────────────────────────────────────────────

const server = new McpServer({
  name: "keyshift",
  version: "0.1.0",
});

// ─── Tool: list_keys ────────────────────────────────────────────────────────

server.tool(
  "list_keys",
  "List the key names accepted as source and target keys.",
  async () => text(`Keys: ${KEY_NAMES.join(", ")}\nAppend "m" for a minor label (e.g. "Am"); it does not change the shift.`)
);

// ─── Tool: semitone_offset ──────────────────────────────────────────────────

server.tool(
  "semitone_offset",
  "Compute the shortest signed semitone shift (-6..+6) from one key to another.",
  {
    from: keySchema.describe("Source key, e.g. 'Bb'"),
    to: keySchema.describe("Target key, e.g. 'C'"),
  },
  async ({ from, to }) => {
    try {
      const offset = semitoneOffset(from, to);
      return text(`${from} → ${to}: ${formatPitchArgument(offset)} semitone(s)`);
    } catch (err) {
      return toolError(err);
    }
  }
);

// ─── Tool: detect_key ───────────────────────────────────────────────────────

server.tool(
  "detect_key",
  "Detect the musical key of an .mp3 or .flac file.",
  {
    path: z.string().min(1).describe("Absolute path to the audio file"),
  },
  async ({ path }) => {
    try {
      const key = await getConverter().detectKey(path);
      return key === null
        ? text(`Could not detect the key of ${path}. Pass a source key to convert_key instead.`)
        : text(`${path}: ${key}`);
    } catch (err) {
      return toolError(err);
    }
  }
);

// ─── Tool: detect_keys_to_log ───────────────────────────────────────────────

server.tool(
  "detect_keys_to_log",
  "Detect the key of several files and write one 'path,key' line per file to a log (the log is recreated).",
  {
    paths: z.array(z.string().min(1)).min(1).describe("Audio files to analyze"),
    logPath: z.string().min(1).describe("Log file to write"),
  },
  async ({ paths, logPath }) => {
    try {
      const entries = await getConverter().detectKeysToLog(paths, logPath);
      const lines = entries.map((e) => `${e.path},${e.key}`).join("\n");
      return text(`Wrote ${entries.length} line(s) to ${logPath}:\n\n${lines}`);
    } catch (err) {
      return toolError(err);
    }
  }
);

// ─── Tool: convert_key ──────────────────────────────────────────────────────

server.tool(
  "convert_key",
  "Transpose audio files into a target key. Output files are named <name>_in_<key><ext>.",
  {
    paths: z.array(z.string().min(1)).min(1).describe("Audio files (.mp3 or .flac)"),
    outputFolder: z.string().min(1).describe("Folder for the transposed files"),
    targetKey: targetKeySchema.describe("Key to transpose into"),
    sourceKey: keySchema.optional().describe("Known source key; skips detection"),
    overwrite: z.boolean().optional().describe("Replace existing outputs (default false)"),
  },
  async ({ paths, outputFolder, targetKey, sourceKey, overwrite }) => {
    try {
      const results = await getConverter().convertBatch(paths, { outputFolder, targetKey, sourceKey, overwrite });
      const lines = results.map((r) => {
        switch (r.status) {
          case "converted":
            return `✓ ${r.inputPath} → ${r.outputPath} (${r.sourceKey} → ${r.targetKey}, ${formatPitchArgument(r.semitones)})`;
          case "already in target key":
            return `✓ ${r.inputPath} already in ${r.targetKey}, copied to ${r.outputPath}`;
          case "skipped":
            return `⏭ ${r.inputPath}: key not detected; retry with sourceKey`;
          case "failed":
            return `✗ ${r.inputPath}: ${r.message ?? "failed"}`;
        }
      });
      const failed = results.some((r) => r.status === "failed");
      return { ...text(lines.join("\n")), isError: failed };
    } catch (err) {
      return toolError(err);
    }
  }
);

// ─── Start ──────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("keyshift MCP server running on stdio");
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
