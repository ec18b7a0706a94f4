// ─── keyshift: Key Distance ──────────────────────────────────────────────────
//
// Maps key names to chromatic positions and computes the shortest signed
// semitone distance between two keys.
// ─────────────────────────────────────────────────────────────────────────────

import { KEY_NAMES, KEY_POSITIONS, type KeyName } from "./types.js";
import { ConversionError } from "./errors.js";

/** True for one of the 17 spellings. No minor suffix. */
export function isKeyRoot(name: string): name is KeyName {
  return (KEY_NAMES as readonly string[]).includes(name);
}

/**
 * True for a recognized key label: a spelling, optionally followed by "m".
 *
 *   "C#" → true, "Am" → true, "Cb" → false, "c" → false
 */
export function isKeyName(name: string): boolean {
  return isKeyRoot(keyRoot(name));
}

/** Drop a trailing minor suffix: "Bbm" → "Bb". */
export function keyRoot(name: string): string {
  return name.length > 1 && name.endsWith("m") ? name.slice(0, -1) : name;
}

/** Chromatic position 0–11 of a key label. Throws InvalidKey. */
export function keyPosition(name: string): number {
  const root = keyRoot(name);
  if (!isKeyRoot(root)) {
    throw new ConversionError("InvalidKey", `Invalid key: "${name}". Expected one of ${KEY_NAMES.join(", ")}`);
  }
  return KEY_POSITIONS[root];
}

/**
 * Shortest signed distance in semitones from `source` to `target`, in [-6, 6].
 *
 * The raw difference is wrapped only when it exceeds 6 in magnitude, so a
 * tritone keeps the sign of the raw difference:
 *
 *   semitoneOffset("Bb", "C") →  2
 *   semitoneOffset("C", "Bb") → -2
 *   semitoneOffset("C", "F#") →  6
 *   semitoneOffset("F#", "C") → -6
 */
export function semitoneOffset(source: string, target: string): number {
  let raw = keyPosition(target) - keyPosition(source);
  if (raw > 6) raw -= 12;
  if (raw < -6) raw += 12;
  return raw;
}

/** Pitch argument for the stretcher: "+3", "-2", "0". */
export function formatPitchArgument(semitones: number): string {
  return semitones > 0 ? `+${semitones}` : String(semitones);
}
