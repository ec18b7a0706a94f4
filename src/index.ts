// ─── keyshift ────────────────────────────────────────────────────────────────
//
// Transpose audio files into a target key. The heavy lifting is done by
// three external tools (an ffmpeg-compatible converter, a key detector and a
// SoundTouch-style stretcher); keyshift sequences them and does the key math.
//
// Usage:
//   import { createKeyConverter, resolveToolConfig } from "keyshift";
//   const converter = createKeyConverter(resolveToolConfig());
//   await converter.convertKey({ inputFile: "song.mp3", outputFolder: "out", targetKey: "C" });
// ─────────────────────────────────────────────────────────────────────────────

// Export key math
export {
  isKeyName,
  isKeyRoot,
  keyRoot,
  keyPosition,
  semitoneOffset,
  formatPitchArgument,
} from "./keys.js";

// Export detector output parsing
export { parseDetectedKey, KEY_MATCHERS } from "./key-detect.js";
export type { DetectedKey, KeyMatcher, KeyMatcherName } from "./key-detect.js";

// Export pipeline
export {
  createKeyConverter,
  KeyConverter,
  outputPathFor,
  audioFormatOf,
  UNKNOWN_KEY,
} from "./pipeline.js";
export type { KeyConverterOptions } from "./pipeline.js";

// Export tool boundary
export { createProcessRunner, createMockToolRunner } from "./runner.js";
export type { ToolCall, MockToolHandler } from "./runner.js";
export { checkTools, parseTitle } from "./tools.js";

// Export hooks
export {
  createConsoleConversionHook,
  createSilentConversionHook,
  createRecordingConversionHook,
  composeConversionHooks,
} from "./hooks.js";
export type { ConsoleHookOptions, ConversionEvent } from "./hooks.js";

// Export config
export {
  resolveToolConfig,
  readConfigFile,
  saveToolConfig,
  resetToolConfig,
  defaultConfigPath,
  defaultToolConfig,
} from "./config/loader.js";
export { ToolConfigFileSchema, validateConfig } from "./config/schema.js";
export type { ToolConfigFile, ConfigField } from "./config/schema.js";

// Export errors
export { ConversionError, isConversionError } from "./errors.js";
export type { ConversionErrorCode } from "./errors.js";

// Export types
export { KEY_NAMES, KEY_POSITIONS, SUPPORTED_FORMATS } from "./types.js";
export type {
  KeyName,
  AudioFormat,
  ToolConfig,
  ToolName,
  ToolRunner,
  ProcessOutput,
  ConversionJob,
  ConversionResult,
  ConversionStatus,
  ConversionStage,
  ConversionHook,
  DetectionLogEntry,
} from "./types.js";
