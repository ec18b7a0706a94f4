#!/usr/bin/env node
// ─── keyshift: CLI Entry Point ───────────────────────────────────────────────
//
// Usage:
//   keyshift                                   # Show help
//   keyshift convert <file...> --to <key>      # Transpose files into a key
//   keyshift detect <file...> --log <path>     # Detect keys, write path,key lines
//   keyshift offset <from> <to>                # Semitone shift between two keys
//   keyshift keys                              # List recognized key names
//   keyshift config [show | set <field> <value> | reset]
// ─────────────────────────────────────────────────────────────────────────────

import { KEY_NAMES } from "./types.js";
import type { ConversionResult } from "./types.js";
import { isKeyName, isKeyRoot, semitoneOffset, formatPitchArgument } from "./keys.js";
import { createKeyConverter } from "./pipeline.js";
import { createConsoleConversionHook } from "./hooks.js";
import { isConversionError, errorMessage } from "./errors.js";
import {
  defaultConfigPath,
  resolveToolConfig,
  saveToolConfig,
  resetToolConfig,
} from "./config/loader.js";
import { CONFIG_FIELDS, CONFIG_ENV_VARS, isConfigField, type ToolConfigFile } from "./config/schema.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

/** Flags that take a value; everything else starting with -- is boolean. */
const VALUE_FLAGS = ["--to", "--from", "--out", "--log", "--config", "--temp-dir"];

function getFlag(args: string[], flag: string): string | null {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx + 1 >= args.length) return null;
  return args[idx + 1];
}

/** Check for boolean flag (no value). */
function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

/** Arguments that are neither flags nor flag values. */
function positionals(args: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const a = args[i];
    if (VALUE_FLAGS.includes(a)) {
      i++;
      continue;
    }
    if (a.startsWith("--")) continue;
    out.push(a);
  }
  return out;
}

function fail(message: string): never {
  console.error(message);
  process.exit(1);
}

function requireKey(value: string | null, flag: string): string {
  if (!value) fail(`Missing ${flag} <key>. Keys: ${KEY_NAMES.join(" ")}`);
  if (!isKeyName(value)) fail(`Unknown key: "${value}". Keys: ${KEY_NAMES.join(" ")} (add "m" for minor)`);
  return value;
}

/** Target keys name the output file, so no minor suffix. */
function requireTargetKey(value: string | null): string {
  if (!value) fail(`Missing --to <key>. Keys: ${KEY_NAMES.join(" ")}`);
  if (!isKeyRoot(value)) fail(`Unknown target key: "${value}". Keys: ${KEY_NAMES.join(" ")}`);
  return value;
}

function loadConfig(args: string[]) {
  return resolveToolConfig({
    configPath: getFlag(args, "--config") ?? undefined,
    overrides: { tempDir: getFlag(args, "--temp-dir") ?? undefined },
  });
}

function padRight(s: string, len: number): string {
  return s.length >= len ? s : s + " ".repeat(len - s.length);
}

function printSummary(results: ConversionResult[]): void {
  const count = (status: ConversionResult["status"]) => results.filter((r) => r.status === status).length;
  console.log(`\n${"─".repeat(60)}`);
  console.log(
    `  ${count("converted")} converted, ${count("already in target key")} already in key, ` +
      `${count("skipped")} skipped, ${count("failed")} failed`
  );
  console.log();
}

// ─── Commands ───────────────────────────────────────────────────────────────

async function cmdConvert(args: string[]): Promise<void> {
  const files = positionals(args);
  if (files.length === 0) {
    fail("Usage: keyshift convert <file...> --to <key> [--from <key>] [--out <dir>] [--overwrite] [--verbose]");
  }

  const targetKey = requireTargetKey(getFlag(args, "--to"));
  const fromArg = getFlag(args, "--from");
  const sourceKey = fromArg === null ? undefined : requireKey(fromArg, "--from");
  const outputFolder = getFlag(args, "--out") ?? ".";

  const converter = createKeyConverter(loadConfig(args), {
    hook: createConsoleConversionHook({ verbose: hasFlag(args, "--verbose") }),
  });

  console.log(`\n  Transposing ${files.length} file(s) to ${targetKey}\n`);
  const results = await converter.convertBatch(files, {
    outputFolder,
    targetKey,
    sourceKey,
    overwrite: hasFlag(args, "--overwrite"),
  });
  printSummary(results);

  if (results.some((r) => r.status === "failed")) process.exitCode = 1;
}

async function cmdDetect(args: string[]): Promise<void> {
  const files = positionals(args);
  const logPath = getFlag(args, "--log");
  if (files.length === 0 || !logPath) {
    fail("Usage: keyshift detect <file...> --log <path> [--verbose]");
  }

  const converter = createKeyConverter(loadConfig(args), {
    hook: createConsoleConversionHook({ verbose: hasFlag(args, "--verbose") }),
  });

  const entries = await converter.detectKeysToLog(files, logPath);
  console.log();
  for (const e of entries) {
    console.log(`  ${padRight(e.key, 8)} ${e.path}`);
  }
  console.log(`\n  Wrote ${entries.length} line(s) to ${logPath}\n`);

  if (entries.some((e) => e.key === "Error")) process.exitCode = 1;
}

function cmdOffset(args: string[]): void {
  const [from, to] = positionals(args);
  if (!from || !to) fail("Usage: keyshift offset <from> <to>");
  const source = requireKey(from, "<from>");
  const target = requireKey(to, "<to>");
  const offset = semitoneOffset(source, target);
  console.log(`${source} → ${target}: ${formatPitchArgument(offset)} semitone(s)`);
}

function cmdKeys(): void {
  console.log(`\nRecognized keys (append "m" for minor):\n`);
  console.log(`  ${KEY_NAMES.join("  ")}\n`);
}

function cmdConfig(args: string[]): void {
  const sub = args[0] ?? "show";
  const configPath = getFlag(args, "--config") ?? defaultConfigPath();

  switch (sub) {
    case "show": {
      const config = resolveToolConfig({ configPath });
      console.log(`\n  Config file: ${configPath}\n`);
      for (const field of CONFIG_FIELDS) {
        console.log(`  ${padRight(field, 15)} ${padRight(config[field], 40)} (${CONFIG_ENV_VARS[field]})`);
      }
      console.log();
      return;
    }
    case "set": {
      const [, field, value] = positionals(args);
      if (!field || !value) fail(`Usage: keyshift config set <field> <value>. Fields: ${CONFIG_FIELDS.join(", ")}`);
      if (!isConfigField(field)) fail(`Unknown field: "${field}". Fields: ${CONFIG_FIELDS.join(", ")}`);
      const values: ToolConfigFile = {};
      values[field] = value;
      saveToolConfig(values, configPath);
      console.log(`Saved ${field} = ${value} to ${configPath}`);
      return;
    }
    case "reset":
      console.log(resetToolConfig(configPath) ? `Removed ${configPath}` : `No config file at ${configPath}`);
      return;
    default:
      fail(`Unknown config command: "${sub}". Use show, set or reset.`);
  }
}

function cmdHelp(): void {
  console.log(`
keyshift — transpose audio files into another key

Commands:
  convert <file...> --to <key>   Detect (or take --from) the key and shift into --to
      --from <key>               Source key; skips detection
      --out <dir>                Output folder (default: current directory)
      --overwrite                Replace existing outputs
  detect <file...> --log <path>  Detect keys and write "path,key" lines
  offset <from> <to>             Print the semitone shift between two keys
  keys                           List recognized key names
  config [show|set|reset]        Show or edit ${defaultConfigPath()}

Common flags:
  --config <path>                Use another config file
  --temp-dir <dir>               Scratch directory for intermediate WAVs
  --verbose                      Print tool output

Formats: .mp3, .flac. Outputs are named <name>_in_<key><ext>.
`);
}

// ─── CLI Router ─────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0] ?? "help";

  switch (command) {
    case "convert":
      await cmdConvert(args.slice(1));
      break;
    case "detect":
      await cmdDetect(args.slice(1));
      break;
    case "offset":
      cmdOffset(args.slice(1));
      break;
    case "keys":
      cmdKeys();
      break;
    case "config":
      cmdConfig(args.slice(1));
      break;
    case "help":
    case "--help":
    case "-h":
      cmdHelp();
      break;
    default:
      fail(`Unknown command: "${command}". Run 'keyshift help' for usage.`);
  }
}

main().catch((err: unknown) => {
  if (isConversionError(err)) {
    console.error(`${err.code}: ${err.message}`);
  } else {
    console.error(errorMessage(err));
  }
  process.exit(1);
});
