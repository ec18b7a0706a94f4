// ─── Tool Config Schema ──────────────────────────────────────────────────────
//
// Where the three external tools live and where scratch files go.
// Every field is optional on disk; defaults fill the gaps at load time.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";

// ─── Zod Schemas ─────────────────────────────────────────────────────────────

const pathField = z.string().trim().min(1, "must not be empty");

/** Shape of ~/.keyshift/config.json. */
export const ToolConfigFileSchema = z
  .object({
    converterPath: pathField.optional(),
    detectorPath: pathField.optional(),
    stretcherPath: pathField.optional(),
    tempDir: pathField.optional(),
  })
  .strict();

// ─── Derived Types ───────────────────────────────────────────────────────────

export type ToolConfigFile = z.infer<typeof ToolConfigFileSchema>;

/** Config fields, in display order. */
export const CONFIG_FIELDS = ["converterPath", "detectorPath", "stretcherPath", "tempDir"] as const;

export type ConfigField = (typeof CONFIG_FIELDS)[number];

/** Environment variable that overrides each field. */
export const CONFIG_ENV_VARS: Readonly<Record<ConfigField, string>> = {
  converterPath: "KEYSHIFT_CONVERTER",
  detectorPath: "KEYSHIFT_DETECTOR",
  stretcherPath: "KEYSHIFT_STRETCHER",
  tempDir: "KEYSHIFT_TEMP_DIR",
};

// ─── Validation ──────────────────────────────────────────────────────────────

export interface ConfigError {
  field: string;
  message: string;
}

/**
 * Validate a config object using the zod schema.
 * Returns an empty array if valid.
 */
export function validateConfig(config: unknown): ConfigError[] {
  const result = ToolConfigFileSchema.safeParse(config);
  if (result.success) return [];

  return result.error.issues.map((issue) => ({
    field: issue.path.join(".") || "root",
    message: issue.message,
  }));
}

/** Narrow a CLI-supplied field name. */
export function isConfigField(name: string): name is ConfigField {
  return (CONFIG_FIELDS as readonly string[]).includes(name);
}
