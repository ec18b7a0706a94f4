import { describe, it, expect } from "vitest";
import {
  isKeyName,
  isKeyRoot,
  keyRoot,
  keyPosition,
  semitoneOffset,
  formatPitchArgument,
} from "./keys.js";
import { KEY_NAMES } from "./types.js";
import { ConversionError } from "./errors.js";

describe("key names", () => {
  it("recognizes all 17 spellings", () => {
    expect(KEY_NAMES).toHaveLength(17);
    for (const k of KEY_NAMES) expect(isKeyName(k)).toBe(true);
  });

  it("accepts a minor suffix", () => {
    expect(isKeyName("Am")).toBe(true);
    expect(isKeyName("C#m")).toBe(true);
    expect(isKeyName("Bbm")).toBe(true);
  });

  it("rejects unknown spellings and lowercase letters", () => {
    expect(isKeyName("Cb")).toBe(false);
    expect(isKeyName("E#")).toBe(false);
    expect(isKeyName("c")).toBe(false);
    expect(isKeyName("H")).toBe(false);
    expect(isKeyName("")).toBe(false);
  });

  it("isKeyRoot does not take a suffix", () => {
    expect(isKeyRoot("A")).toBe(true);
    expect(isKeyRoot("Am")).toBe(false);
  });

  it("keyRoot strips only a trailing m", () => {
    expect(keyRoot("F#m")).toBe("F#");
    expect(keyRoot("F#")).toBe("F#");
    expect(keyRoot("m")).toBe("m");
  });

  it("maps enharmonics to the same position", () => {
    expect(keyPosition("C#")).toBe(keyPosition("Db"));
    expect(keyPosition("A#")).toBe(keyPosition("Bb"));
    expect(keyPosition("Gb")).toBe(6);
    expect(keyPosition("B")).toBe(11);
  });
});

describe("semitoneOffset", () => {
  it("Bb → C is +2", () => {
    expect(semitoneOffset("Bb", "C")).toBe(2);
  });

  it("C → Bb is -2", () => {
    expect(semitoneOffset("C", "Bb")).toBe(-2);
  });

  it("F# → C is -6 (raw -6 is not wrapped)", () => {
    expect(semitoneOffset("F#", "C")).toBe(-6);
  });

  it("C → F# is +6 (raw 6 is not wrapped)", () => {
    expect(semitoneOffset("C", "F#")).toBe(6);
  });

  it("wraps the long way round: B → C is +1, C → B is -1", () => {
    expect(semitoneOffset("B", "C")).toBe(1);
    expect(semitoneOffset("C", "B")).toBe(-1);
  });

  it("is zero from a key to itself", () => {
    for (const k of KEY_NAMES) expect(semitoneOffset(k, k)).toBe(0);
  });

  it("is zero between enharmonic spellings", () => {
    expect(semitoneOffset("C#", "Db")).toBe(0);
    expect(semitoneOffset("Gb", "F#")).toBe(0);
  });

  it("stays within [-6, 6] for every pair", () => {
    for (const a of KEY_NAMES) {
      for (const b of KEY_NAMES) {
        const offset = semitoneOffset(a, b);
        expect(offset).toBeGreaterThanOrEqual(-6);
        expect(offset).toBeLessThanOrEqual(6);
      }
    }
  });

  it("is anti-symmetric for every pair, including the tritone", () => {
    for (const a of KEY_NAMES) {
      for (const b of KEY_NAMES) {
        expect(semitoneOffset(a, b) + semitoneOffset(b, a)).toBe(0);
      }
    }
  });

  it("treats C# and Db alike on either side", () => {
    for (const x of KEY_NAMES) {
      expect(semitoneOffset(x, "C#")).toBe(semitoneOffset(x, "Db"));
      expect(semitoneOffset("C#", x)).toBe(semitoneOffset("Db", x));
    }
  });

  it("ignores a minor suffix", () => {
    expect(semitoneOffset("Am", "C")).toBe(3);
    expect(semitoneOffset("A", "Cm")).toBe(3);
  });

  it("throws InvalidKey for an unknown name", () => {
    expect(() => semitoneOffset("X", "C")).toThrow(ConversionError);
    expect(() => semitoneOffset("C", "Cb")).toThrow('Invalid key: "Cb"');
  });
});

describe("formatPitchArgument", () => {
  it("marks positive shifts with +", () => {
    expect(formatPitchArgument(3)).toBe("+3");
    expect(formatPitchArgument(6)).toBe("+6");
  });

  it("leaves negative shifts and zero unmarked", () => {
    expect(formatPitchArgument(-2)).toBe("-2");
    expect(formatPitchArgument(0)).toBe("0");
  });
});
