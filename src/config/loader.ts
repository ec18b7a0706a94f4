// ─── Tool Config Loader ──────────────────────────────────────────────────────
//
// Resolves the ToolConfig from, lowest precedence first:
//   defaults → config file → KEYSHIFT_* environment → explicit overrides.
// The result is frozen and handed to the pipeline at construction.
// ─────────────────────────────────────────────────────────────────────────────

import { existsSync, mkdirSync, readFileSync, writeFileSync, unlinkSync } from "node:fs";
import { homedir, tmpdir } from "node:os";
import { dirname, join } from "node:path";
import type { ToolConfig } from "../types.js";
import {
  ToolConfigFileSchema,
  CONFIG_FIELDS,
  CONFIG_ENV_VARS,
  type ToolConfigFile,
} from "./schema.js";

/** ~/.keyshift/config.json */
export function defaultConfigPath(): string {
  return join(homedir(), ".keyshift", "config.json");
}

/** Built-in tool locations: ffmpeg on PATH, keyfinder-cli, soundstretch. */
export function defaultToolConfig(): ToolConfig {
  return {
    converterPath: "ffmpeg",
    detectorPath: "/usr/local/bin/keyfinder-cli",
    stretcherPath: "/usr/bin/soundstretch",
    tempDir: tmpdir(),
  };
}

/**
 * Read and validate a config file. A missing file is an empty config.
 */
export function readConfigFile(path: string): ToolConfigFile {
  if (!existsSync(path)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    throw new Error(`Invalid config ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const result = ToolConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map(i => `  ${i.path.join(".") || "root"}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid config ${path}:\n${issues}`);
  }

  return result.data;
}

/** Fields set through KEYSHIFT_* variables. Empty values are ignored. */
export function envOverrides(env: NodeJS.ProcessEnv): ToolConfigFile {
  const out: ToolConfigFile = {};
  for (const field of CONFIG_FIELDS) {
    const value = env[CONFIG_ENV_VARS[field]]?.trim();
    if (value) out[field] = value;
  }
  return out;
}

function definedOnly(values: ToolConfigFile): ToolConfigFile {
  const out: ToolConfigFile = {};
  for (const field of CONFIG_FIELDS) {
    const value = values[field];
    if (value !== undefined) out[field] = value;
  }
  return out;
}

export interface ResolveConfigOptions {
  /** Config file to read (default: ~/.keyshift/config.json). */
  configPath?: string;

  /** Environment to read overrides from (default: process.env). */
  env?: NodeJS.ProcessEnv;

  /** Highest-precedence values, e.g. from CLI flags. */
  overrides?: ToolConfigFile;
}

/**
 * Resolve the effective tool config.
 */
export function resolveToolConfig(options: ResolveConfigOptions = {}): ToolConfig {
  const fromFile = readConfigFile(options.configPath ?? defaultConfigPath());
  const fromEnv = envOverrides(options.env ?? process.env);
  const fromArgs = ToolConfigFileSchema.parse(definedOnly(options.overrides ?? {}));

  return Object.freeze({
    ...defaultToolConfig(),
    ...fromFile,
    ...fromEnv,
    ...fromArgs,
  });
}

/** Merge values into the config file, creating it if needed. */
export function saveToolConfig(values: ToolConfigFile, path: string = defaultConfigPath()): ToolConfigFile {
  const merged = ToolConfigFileSchema.parse({ ...readConfigFile(path), ...definedOnly(values) });
  const dir = dirname(path);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  writeFileSync(path, JSON.stringify(merged, null, 2) + "\n", "utf8");
  return merged;
}

/** Delete the config file. Returns false if there was none. */
export function resetToolConfig(path: string = defaultConfigPath()): boolean {
  if (!existsSync(path)) return false;
  unlinkSync(path);
  return true;
}
