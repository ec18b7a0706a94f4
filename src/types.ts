// ─── keyshift: Core Types ────────────────────────────────────────────────────
//
// Keys, conversion jobs and results, the external tool boundary, and the
// progress hook the pipeline reports through.
// ─────────────────────────────────────────────────────────────────────────────

// ─── Keys ───────────────────────────────────────────────────────────────────

/** The 17 recognized key spellings: 7 naturals, 5 sharps, 5 flats. */
export const KEY_NAMES = [
  "C", "C#", "Db", "D", "D#", "Eb", "E", "F",
  "F#", "Gb", "G", "G#", "Ab", "A", "A#", "Bb", "B",
] as const;

/** A recognized key spelling (letter + optional accidental). */
export type KeyName = (typeof KEY_NAMES)[number];

/** Chromatic position of each spelling. C = 0. Enharmonics share a slot. */
export const KEY_POSITIONS: Readonly<Record<KeyName, number>> = {
  C: 0,
  "C#": 1, Db: 1,
  D: 2,
  "D#": 3, Eb: 3,
  E: 4,
  F: 5,
  "F#": 6, Gb: 6,
  G: 7,
  "G#": 8, Ab: 8,
  A: 9,
  "A#": 10, Bb: 10,
  B: 11,
};

// ─── Audio Formats ──────────────────────────────────────────────────────────

/** Input/output formats the pipeline accepts (lowercase, with dot). */
export const SUPPORTED_FORMATS = [".mp3", ".flac"] as const;

export type AudioFormat = (typeof SUPPORTED_FORMATS)[number];

// ─── Configuration ──────────────────────────────────────────────────────────

/** Resolved tool locations and scratch directory. Read-only for a job. */
export interface ToolConfig {
  /** Format converter: an absolute path or a name resolved through PATH. */
  readonly converterPath: string;

  /** Key detector binary. Must exist as a file. */
  readonly detectorPath: string;

  /** Pitch shifter binary. Must exist as a file. */
  readonly stretcherPath: string;

  /** Base directory for intermediate WAV files. */
  readonly tempDir: string;
}

// ─── External Tools ─────────────────────────────────────────────────────────

/** The three collaborators the pipeline drives. */
export type ToolName = "converter" | "detector" | "stretcher";

/** Exit status plus combined stdout/stderr of a finished process. */
export interface ProcessOutput {
  /** Exit code. Null when the process was killed by a signal. */
  exitCode: number | null;

  /** stdout and stderr, interleaved in arrival order. */
  output: string;

  /** stdout alone. */
  stdout: string;
}

/**
 * Runs an external executable to completion.
 * Resolves once the process exits; rejects if it could not be started.
 */
export interface ToolRunner {
  run(command: string, args: readonly string[]): Promise<ProcessOutput>;
}

// ─── Jobs & Results ─────────────────────────────────────────────────────────

/** One conversion request for one input file. */
export interface ConversionJob {
  /** Audio file to transpose. */
  inputFile: string;

  /** Folder the transposed file is written into. Created if absent. */
  outputFolder: string;

  /** Key to transpose into. */
  targetKey: string;

  /** Known key of the input. Skips detection when set. */
  sourceKey?: string;

  /** Replace an existing output file (default: false). */
  overwrite?: boolean;
}

/** How a job ended. */
export type ConversionStatus =
  | "converted"              // Shifted and re-encoded
  | "already in target key"  // Shift was 0, input copied verbatim
  | "skipped"                // Detector output matched no pattern
  | "failed";                // Batch only: the job raised

/** Outcome of one job. */
export interface ConversionResult {
  inputPath: string;

  /** Written file, or null when nothing was written. */
  outputPath: string | null;

  /** Resolved source key, or "Unknown" when detection failed. */
  sourceKey: string;

  targetKey: string;

  /** Applied shift in semitones, within [-6, 6]. */
  semitones: number;

  status: ConversionStatus;

  /** Failure detail for "failed" results. */
  message?: string;
}

/** One line of a detection log. */
export interface DetectionLogEntry {
  path: string;

  /** Detected key, "Unknown" when no pattern matched, "Error" on failure. */
  key: string;
}

// ─── Progress Hook ──────────────────────────────────────────────────────────

/** Pipeline stages, in execution order. */
export type ConversionStage =
  | "check"
  | "decode"
  | "detect"
  | "offset"
  | "shift"
  | "encode"
  | "copy"
  | "cleanup";

/**
 * Receives progress from the pipeline.
 * The pipeline never awaits these; keep them synchronous.
 */
export interface ConversionHook {
  /** One human-readable line per stage. */
  onStage(stage: ConversionStage, message: string): void;

  /** Raw output of a finished tool invocation. */
  onToolOutput(tool: ToolName, output: string): void;

  /** Non-fatal problems (e.g. a temp file that could not be removed). */
  onWarning(message: string): void;

  /** Called once per finished job. */
  onResult(result: ConversionResult): void;
}
