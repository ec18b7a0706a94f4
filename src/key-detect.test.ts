import { describe, it, expect } from "vitest";
import { parseDetectedKey, KEY_MATCHERS } from "./key-detect.js";

describe("parseDetectedKey", () => {
  it("takes the whole output when it is just a key", () => {
    expect(parseDetectedKey("Am\n")).toEqual({ key: "Am", matcher: "exact" });
    expect(parseDetectedKey("  C#  ")).toEqual({ key: "C#", matcher: "exact" });
  });

  it("reads a 'Key:' label", () => {
    expect(parseDetectedKey("Analyzing...\nKey: F#\nDone")).toEqual({ key: "F#", matcher: "key-label" });
    expect(parseDetectedKey("Key:Bbm")).toEqual({ key: "Bbm", matcher: "key-label" });
  });

  it("reads a key followed by a mode word", () => {
    expect(parseDetectedKey("Estimated: Eb minor")).toEqual({ key: "Ebm", matcher: "mode-word" });
    expect(parseDetectedKey("result G major (confidence 0.8)")).toEqual({ key: "G", matcher: "mode-word" });
    expect(parseDetectedKey("Cmaj")).toEqual({ key: "C", matcher: "mode-word" });
    expect(parseDetectedKey("result Dmin")).toEqual({ key: "Dm", matcher: "mode-word" });
  });

  it("reads a 'Key:' label followed by a mode word", () => {
    expect(parseDetectedKey("Key: A minor")).toEqual({ key: "Am", matcher: "key-label" });
    expect(parseDetectedKey("Key: F# major\nDone")).toEqual({ key: "F#", matcher: "key-label" });
    expect(parseDetectedKey("Key: Amaj")).toEqual({ key: "A", matcher: "key-label" });
    expect(parseDetectedKey("Key:Dmin")).toEqual({ key: "Dm", matcher: "key-label" });
  });

  it("reads the key after a sample count", () => {
    expect(parseDetectedKey("Samples loaded: 88200 Db")).toEqual({ key: "Db", matcher: "samples-loaded" });
  });

  it("falls back to any standalone key token", () => {
    expect(parseDetectedKey("result => D# (stable)")).toEqual({ key: "D#", matcher: "token" });
  });

  it("skips key-shaped tokens that are not recognized spellings", () => {
    expect(parseDetectedKey("Cb then E")).toEqual({ key: "E", matcher: "token" });
  });

  it("prefers the more specific matcher", () => {
    // "A" would match as a token, but the label comes first in the order.
    expect(parseDetectedKey("A file\nKey: G")).toEqual({ key: "G", matcher: "key-label" });
  });

  it("returns null when nothing matches", () => {
    expect(parseDetectedKey("")).toBeNull();
    expect(parseDetectedKey("error: could not open file")).toBeNull();
    expect(parseDetectedKey("Key: Cb")).toBeNull();
  });

  it("exposes matchers in priority order", () => {
    expect(KEY_MATCHERS.map((m) => m.name)).toEqual([
      "exact",
      "key-label",
      "mode-word",
      "samples-loaded",
      "token",
    ]);
  });

  it("accepts a custom matcher list", () => {
    const onlyExact = KEY_MATCHERS.filter((m) => m.name === "exact");
    expect(parseDetectedKey("Key: G", onlyExact)).toBeNull();
  });
});
