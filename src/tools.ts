// ─── keyshift: Tool Invocations ──────────────────────────────────────────────
//
// Argument vectors for the converter (ffmpeg-compatible), the key detector
// and the pitch stretcher, plus the availability check run before any job.
// ─────────────────────────────────────────────────────────────────────────────

import { accessSync, constants, statSync } from "node:fs";
import type { ProcessOutput, ToolConfig, ToolName, ToolRunner } from "./types.js";
import { ConversionError } from "./errors.js";
import { formatPitchArgument } from "./keys.js";

// ─── Converter ──────────────────────────────────────────────────────────────

/** Decode to 16-bit PCM, stereo, 44.1 kHz. */
export function decodeArgs(inputFile: string, wavFile: string): string[] {
  return ["-i", inputFile, "-acodec", "pcm_s16le", "-ar", "44100", "-ac", "2", wavFile, "-y"];
}

/**
 * Encode the shifted audio (input 0) into the output format, carrying the
 * original's metadata (input 1) with the title replaced.
 */
export function reencodeArgs(
  shiftedFile: string,
  originalFile: string,
  title: string,
  outputFile: string
): string[] {
  return [
    "-i", shiftedFile,
    "-i", originalFile,
    "-map", "0:a",
    "-map_metadata", "1",
    "-metadata", `title=${title}`,
    outputFile,
    "-y",
  ];
}

/** Dump the input's metadata block to stdout. */
export function metadataArgs(inputFile: string): string[] {
  return ["-i", inputFile, "-f", "ffmetadata", "-"];
}

export const VERSION_ARGS: readonly string[] = ["-version"];

/**
 * First `title=` value of an ffmetadata dump, unescaped. Null when absent.
 * Keys are matched case-insensitively (FLAC tags come out as TITLE=).
 */
export function parseTitle(ffmetadata: string): string | null {
  for (const line of ffmetadata.split(/\r?\n/)) {
    const m = line.match(/^title=(.*)$/i);
    if (!m) continue;
    const title = m[1].replace(/\\(.)/g, "$1").trim();
    if (title) return title;
  }
  return null;
}

// ─── Stretcher ──────────────────────────────────────────────────────────────

export function stretchArgs(inputFile: string, outputFile: string, semitones: number): string[] {
  return [inputFile, outputFile, `-pitch=${formatPitchArgument(semitones)}`];
}

// ─── Availability ───────────────────────────────────────────────────────────

function isFile(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isFile() ?? false;
}

function isExecutable(path: string): boolean {
  try {
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

function toolNotFound(tool: ToolName, path: string, output?: string): ConversionError {
  return new ConversionError("ToolNotFound", `${tool} not found: ${path}`, { stage: "check", output });
}

function assertExecutableFile(tool: ToolName, path: string): void {
  if (!isFile(path)) throw toolNotFound(tool, path);
  if (!isExecutable(path)) {
    throw new ConversionError("ToolNotFound", `${tool} is not executable: ${path}`, { stage: "check" });
  }
}

/**
 * Verify all three tools before touching any input.
 * The detector and stretcher must be executable files; the converter must
 * answer -version.
 */
export async function checkTools(config: ToolConfig, runner: ToolRunner): Promise<void> {
  assertExecutableFile("detector", config.detectorPath);
  assertExecutableFile("stretcher", config.stretcherPath);

  let version: ProcessOutput;
  try {
    version = await runner.run(config.converterPath, VERSION_ARGS);
  } catch (err) {
    throw new ConversionError("ToolNotFound", `converter not found: ${config.converterPath}`, {
      stage: "check",
      cause: err,
    });
  }
  if (version.exitCode !== 0) throw toolNotFound("converter", config.converterPath, version.output);
}
