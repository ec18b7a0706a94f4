// ─── keyshift: Errors ────────────────────────────────────────────────────────

import type { ConversionStage } from "./types.js";

/** Failure categories raised by the calculator and the pipeline. */
export type ConversionErrorCode =
  | "ToolNotFound"        // A configured executable is missing (aborts a batch)
  | "UnsupportedFormat"   // Input extension is not .mp3 or .flac
  | "DecodeFailed"
  | "KeyDetectionFailed"  // Reported as a "skipped" result, never thrown by the pipeline
  | "ShiftFailed"
  | "ReencodeFailed"
  | "OutputExists"        // Destination present and overwrite not requested
  | "InvalidKey";

export interface ConversionErrorOptions {
  stage?: ConversionStage;

  /** Captured output of the tool invocation that failed. */
  output?: string;

  cause?: unknown;
}

export class ConversionError extends Error {
  readonly code: ConversionErrorCode;
  readonly stage?: ConversionStage;
  readonly output?: string;

  constructor(code: ConversionErrorCode, message: string, options: ConversionErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ConversionError";
    this.code = code;
    this.stage = options.stage;
    this.output = options.output;
  }
}

/** Type guard, optionally narrowed to one code. */
export function isConversionError(err: unknown, code?: ConversionErrorCode): err is ConversionError {
  return err instanceof ConversionError && (code === undefined || err.code === code);
}

/** Message for any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
