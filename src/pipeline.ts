// ─── keyshift: Conversion Pipeline ───────────────────────────────────────────
//
// Transposes one audio file into a target key:
//
//   decode → resolve source key → offset → shift → re-encode
//
// Each job owns two scratch WAVs in the configured temp dir. They are removed
// in a finally block, so every exit path (result, skip, throw) cleans up.
//
// A detector that prints nothing recognizable is not an error: the job
// returns a "skipped" result so batch callers can carry on.
// ─────────────────────────────────────────────────────────────────────────────

import { randomUUID } from "node:crypto";
import { existsSync, statSync } from "node:fs";
import { appendFile, copyFile, mkdir, rm, writeFile } from "node:fs/promises";
import { basename, dirname, extname, join } from "node:path";
import type {
  AudioFormat,
  ConversionHook,
  ConversionJob,
  ConversionResult,
  ConversionStage,
  DetectionLogEntry,
  ProcessOutput,
  ToolConfig,
  ToolName,
  ToolRunner,
} from "./types.js";
import { SUPPORTED_FORMATS } from "./types.js";
import { ConversionError, errorMessage, isConversionError, type ConversionErrorCode } from "./errors.js";
import { isKeyName, isKeyRoot, semitoneOffset, formatPitchArgument } from "./keys.js";
import { parseDetectedKey } from "./key-detect.js";
import { checkTools, decodeArgs, metadataArgs, parseTitle, reencodeArgs, stretchArgs } from "./tools.js";
import { createProcessRunner } from "./runner.js";
import { createSilentConversionHook } from "./hooks.js";

/** Source key reported when detection found nothing. */
export const UNKNOWN_KEY = "Unknown";

// ─── Naming ─────────────────────────────────────────────────────────────────

/** `<folder>/<stem>_in_<targetKey><ext>` */
export function outputPathFor(inputFile: string, outputFolder: string, targetKey: string): string {
  const ext = extname(inputFile);
  return join(outputFolder, `${basename(inputFile, ext)}_in_${targetKey}${ext}`);
}

/** Format of an input file, by extension. Throws UnsupportedFormat. */
export function audioFormatOf(inputFile: string): AudioFormat {
  const ext = extname(inputFile).toLowerCase();
  const format = SUPPORTED_FORMATS.find((f) => f === ext);
  if (!format) {
    throw new ConversionError(
      "UnsupportedFormat",
      `Unsupported format "${ext || "(none)"}" for ${inputFile}. Supported: ${SUPPORTED_FORMATS.join(", ")}`,
      { stage: "decode" }
    );
  }
  return format;
}

/** Sources may carry a minor suffix; targets name one of the 17 spellings. */
function assertKey(name: string, role: "source" | "target"): void {
  if (!(role === "target" ? isKeyRoot(name) : isKeyName(name))) {
    throw new ConversionError("InvalidKey", `Invalid ${role} key: "${name}"`);
  }
}

// ─── Converter ──────────────────────────────────────────────────────────────

export interface KeyConverterOptions {
  /** Process runner (default: spawns real processes). */
  runner?: ToolRunner;

  /** Progress hook (default: silent). */
  hook?: ConversionHook;
}

/**
 * Create a converter bound to one tool config.
 */
export function createKeyConverter(config: ToolConfig, options: KeyConverterOptions = {}): KeyConverter {
  return new KeyConverter(
    Object.freeze({ ...config }),
    options.runner ?? createProcessRunner(),
    options.hook ?? createSilentConversionHook()
  );
}

interface ScratchFiles {
  decoded: string;
  shifted: string;
}

/**
 * Runs conversion and detection jobs. Jobs share nothing but the config,
 * so independent converters (or calls) may run side by side.
 */
export class KeyConverter {
  constructor(
    public readonly config: Readonly<ToolConfig>,
    private readonly runner: ToolRunner,
    private readonly hook: ConversionHook
  ) {}

  /**
   * Check the three tools. Runs at the start of every public operation, so a
   * tool removed between jobs is still reported. Throws ToolNotFound.
   */
  async ensureTools(): Promise<void> {
    this.hook.onStage("check", "Checking converter, detector and stretcher");
    await checkTools(this.config, this.runner);
  }

  /**
   * Transpose one file. Throws on every failure except an undetectable key,
   * which comes back as a "skipped" result.
   */
  async convertKey(job: ConversionJob): Promise<ConversionResult> {
    await this.ensureTools();
    const result = await this.runConversion(job);
    this.hook.onResult(result);
    return result;
  }

  /**
   * Convert several files with the same settings. A missing tool (at the start
   * or mid-batch) or an invalid key aborts the batch; any other failure becomes
   * a "failed" result.
   */
  async convertBatch(
    inputFiles: readonly string[],
    settings: Omit<ConversionJob, "inputFile">
  ): Promise<ConversionResult[]> {
    await this.ensureTools();
    assertKey(settings.targetKey, "target");
    if (settings.sourceKey !== undefined) assertKey(settings.sourceKey, "source");

    const results: ConversionResult[] = [];
    for (const inputFile of inputFiles) {
      let result: ConversionResult;
      try {
        result = await this.runConversion({ ...settings, inputFile });
      } catch (err) {
        if (isConversionError(err, "ToolNotFound")) throw err;
        result = {
          inputPath: inputFile,
          outputPath: null,
          sourceKey: settings.sourceKey ?? UNKNOWN_KEY,
          targetKey: settings.targetKey,
          semitones: 0,
          status: "failed",
          message: errorMessage(err),
        };
      }
      this.hook.onResult(result);
      results.push(result);
    }
    return results;
  }

  /**
   * Detect the key of one file. Null when the detector output matched nothing.
   */
  async detectKey(inputFile: string): Promise<string | null> {
    await this.ensureTools();
    return this.detectFile(inputFile);
  }

  /**
   * Detect every input and write `path,key` lines to `logPath`, which is
   * truncated first. Undetected keys are logged as "Unknown", failures as
   * "Error". A missing tool aborts before the log is touched.
   */
  async detectKeysToLog(inputFiles: readonly string[], logPath: string): Promise<DetectionLogEntry[]> {
    await this.ensureTools();
    await mkdir(dirname(logPath), { recursive: true });
    await writeFile(logPath, "", "utf8");

    const entries: DetectionLogEntry[] = [];
    for (const path of inputFiles) {
      let key: string;
      try {
        key = (await this.detectFile(path)) ?? UNKNOWN_KEY;
      } catch (err) {
        if (isConversionError(err, "ToolNotFound")) throw err;
        this.hook.onWarning(`${path}: ${errorMessage(err)}`);
        key = "Error";
      }
      await appendFile(logPath, `${path},${key}\n`, "utf8");
      entries.push({ path, key });
    }
    return entries;
  }

  // ─── Job ────────────────────────────────────────────────────────────────

  private async detectFile(inputFile: string): Promise<string | null> {
    audioFormatOf(inputFile);

    const scratch = this.scratchFiles();
    try {
      await this.decode(inputFile, scratch.decoded);
      return await this.detect(scratch.decoded);
    } finally {
      await this.cleanup(scratch);
    }
  }

  private async runConversion(job: ConversionJob): Promise<ConversionResult> {
    assertKey(job.targetKey, "target");
    if (job.sourceKey !== undefined) assertKey(job.sourceKey, "source");
    audioFormatOf(job.inputFile);

    await mkdir(job.outputFolder, { recursive: true });
    const outputPath = outputPathFor(job.inputFile, job.outputFolder, job.targetKey);
    const overwrite = job.overwrite ?? false;

    const scratch = this.scratchFiles();
    try {
      await this.decode(job.inputFile, scratch.decoded);

      let sourceKey: string;
      if (job.sourceKey !== undefined) {
        sourceKey = job.sourceKey;
        this.hook.onStage("detect", `Source key: ${sourceKey} (given)`);
      } else {
        const detected = await this.detect(scratch.decoded);
        if (detected === null) {
          return {
            inputPath: job.inputFile,
            outputPath: null,
            sourceKey: UNKNOWN_KEY,
            targetKey: job.targetKey,
            semitones: 0,
            status: "skipped",
          };
        }
        sourceKey = detected;
      }

      const semitones = semitoneOffset(sourceKey, job.targetKey);
      this.hook.onStage("offset", `${sourceKey} → ${job.targetKey}: ${formatPitchArgument(semitones)} semitones`);

      if (semitones === 0) {
        assertWritable(outputPath, overwrite);
        this.hook.onStage("copy", `Already in ${job.targetKey}, copying to ${outputPath}`);
        await copyFile(job.inputFile, outputPath);
        return {
          inputPath: job.inputFile,
          outputPath,
          sourceKey,
          targetKey: job.targetKey,
          semitones: 0,
          status: "already in target key",
        };
      }

      await this.shift(scratch.decoded, scratch.shifted, semitones);

      assertWritable(outputPath, overwrite);
      const title = `${await this.readTitle(job.inputFile)}_in_${job.targetKey}`;
      await this.encode(scratch.shifted, job.inputFile, title, outputPath);

      return {
        inputPath: job.inputFile,
        outputPath,
        sourceKey,
        targetKey: job.targetKey,
        semitones,
        status: "converted",
      };
    } finally {
      await this.cleanup(scratch);
    }
  }

  // ─── Stages ─────────────────────────────────────────────────────────────

  private async decode(inputFile: string, wavFile: string): Promise<void> {
    this.hook.onStage("decode", `Decoding ${basename(inputFile)}`);
    const result = await this.invoke("converter", decodeArgs(inputFile, wavFile), "decode", "DecodeFailed");
    requireOutput(wavFile, "decode", "DecodeFailed", result);
  }

  private async detect(wavFile: string): Promise<string | null> {
    this.hook.onStage("detect", "Detecting key");
    // Exit status is ignored; only the text is parsed.
    const { output } = await this.invoke("detector", [wavFile], "detect", null);
    const detected = parseDetectedKey(output);
    if (!detected) {
      this.hook.onWarning("Key detection failed: detector output matched no known pattern");
      return null;
    }
    this.hook.onStage("detect", `Detected key: ${detected.key}`);
    return detected.key;
  }

  private async shift(wavFile: string, shiftedFile: string, semitones: number): Promise<void> {
    this.hook.onStage("shift", `Shifting pitch by ${formatPitchArgument(semitones)}`);
    const result = await this.invoke("stretcher", stretchArgs(wavFile, shiftedFile, semitones), "shift", "ShiftFailed");
    requireOutput(shiftedFile, "shift", "ShiftFailed", result);
  }

  /** Original title tag, or the file stem when there is none. */
  private async readTitle(inputFile: string): Promise<string> {
    const stem = basename(inputFile, extname(inputFile));
    const result = await this.invoke("converter", metadataArgs(inputFile), "encode", null);
    if (result.exitCode !== 0) {
      this.hook.onWarning(`Could not read metadata from ${inputFile}; using "${stem}" as title`);
      return stem;
    }
    // stdout only: the converter's banner and diagnostics go to stderr.
    return parseTitle(result.stdout) ?? stem;
  }

  private async encode(shiftedFile: string, originalFile: string, title: string, outputFile: string): Promise<void> {
    this.hook.onStage("encode", `Encoding ${basename(outputFile)}`);
    const result = await this.invoke(
      "converter",
      reencodeArgs(shiftedFile, originalFile, title, outputFile),
      "encode",
      "ReencodeFailed"
    );
    requireOutput(outputFile, "encode", "ReencodeFailed", result);
  }

  // ─── Helpers ────────────────────────────────────────────────────────────

  private commandFor(tool: ToolName): string {
    switch (tool) {
      case "converter": return this.config.converterPath;
      case "detector":  return this.config.detectorPath;
      case "stretcher": return this.config.stretcherPath;
    }
  }

  /**
   * Run a tool. A tool that cannot be started throws ToolNotFound; a non-zero
   * exit throws `failure`, unless `failure` is null.
   */
  private async invoke(
    tool: ToolName,
    args: string[],
    stage: ConversionStage,
    failure: ConversionErrorCode | null
  ): Promise<ProcessOutput> {
    const command = this.commandFor(tool);
    let result: ProcessOutput;
    try {
      result = await this.runner.run(command, args);
    } catch (err) {
      throw new ConversionError("ToolNotFound", `${stage} failed: could not start ${tool} (${command}): ${errorMessage(err)}`, {
        stage,
        cause: err,
      });
    }

    this.hook.onToolOutput(tool, result.output);
    if (failure !== null && result.exitCode !== 0) {
      throw new ConversionError(
        failure,
        `${stage} failed: ${tool} exited with ${result.exitCode ?? "signal"}\n${result.output.trim()}`,
        { stage, output: result.output }
      );
    }
    return result;
  }

  private scratchFiles(): ScratchFiles {
    const id = randomUUID();
    return {
      decoded: join(this.config.tempDir, `keyshift-${id}-decoded.wav`),
      shifted: join(this.config.tempDir, `keyshift-${id}-shifted.wav`),
    };
  }

  private async cleanup(scratch: ScratchFiles): Promise<void> {
    const paths = [scratch.decoded, scratch.shifted];
    const outcomes = await Promise.allSettled(paths.map((p) => rm(p, { force: true })));
    outcomes.forEach((outcome, i) => {
      if (outcome.status === "rejected") {
        this.hook.onWarning(`Could not remove ${paths[i]}: ${errorMessage(outcome.reason)}`);
      }
    });
    this.hook.onStage("cleanup", "Removed scratch files");
  }
}

// ─── Checks ─────────────────────────────────────────────────────────────────

function assertWritable(outputPath: string, overwrite: boolean): void {
  if (!overwrite && existsSync(outputPath)) {
    throw new ConversionError("OutputExists", `Output already exists: ${outputPath} (use overwrite to replace it)`);
  }
}

/** A zero exit with a missing or empty file still counts as failure. */
function requireOutput(
  path: string,
  stage: ConversionStage,
  code: ConversionErrorCode,
  result: ProcessOutput
): void {
  const size = statSync(path, { throwIfNoEntry: false })?.size ?? 0;
  if (size === 0) {
    throw new ConversionError(code, `${stage} failed: no output written to ${path}\n${result.output.trim()}`, {
      stage,
      output: result.output,
    });
  }
}
