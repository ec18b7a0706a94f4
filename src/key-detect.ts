// ─── keyshift: Detector Output Parser ────────────────────────────────────────
//
// The key detector prints free text. We try an ordered list of matchers,
// most specific first, and take the first one that yields a recognized key.
// No match means detection failed; the pipeline turns that into a skip.
// ─────────────────────────────────────────────────────────────────────────────

import { isKeyRoot } from "./keys.js";

export type KeyMatcherName = "exact" | "key-label" | "mode-word" | "samples-loaded" | "token";

export interface KeyMatcher {
  name: KeyMatcherName;
  /** Returns a key label, or null to fall through to the next matcher. */
  match(output: string): string | null;
}

export interface DetectedKey {
  key: string;
  matcher: KeyMatcherName;
}

/** Letter + optional accidental + optional minor suffix. */
const KEY_TOKEN = "([A-G](?:#|b)?)(m?)";

/** Nothing key-like may follow a token. */
const TOKEN_END = "(?![A-Za-z0-9#])";

/** Spelled-out mode after a key, e.g. "minor" in "Eb minor". */
const MODE_WORD = "([Mm]ajor|[Mm]inor|[Mm]aj|[Mm]in)";

function modeSuffix(word: string): string {
  return word.toLowerCase().startsWith("min") ? "m" : "";
}

/** Join root and suffix if the root is one of the 17 spellings. */
function accept(root: string | undefined, suffix = ""): string | null {
  if (root === undefined || !isKeyRoot(root)) return null;
  return root + suffix;
}

function firstMatch(pattern: RegExp) {
  return (output: string): string | null => {
    const m = output.match(pattern);
    return m ? accept(m[1], m[2]) : null;
  };
}

export const KEY_MATCHERS: readonly KeyMatcher[] = [
  {
    name: "exact",
    match: (output) => {
      const m = output.trim().match(new RegExp(`^${KEY_TOKEN}$`));
      return m ? accept(m[1], m[2]) : null;
    },
  },
  {
    name: "key-label",
    match: (output) => {
      // "Key: A", "Key: Am", "Key: A minor", "Key: Amaj"
      const m = output.match(
        new RegExp(`Key:\\s*([A-G](?:#|b)?)(?:(m)${TOKEN_END}|[ \\t]*${MODE_WORD}|${TOKEN_END})`)
      );
      if (!m) return null;
      return accept(m[1], m[3] === undefined ? (m[2] ?? "") : modeSuffix(m[3]));
    },
  },
  {
    name: "mode-word",
    match: (output) => {
      const m = output.match(new RegExp(`([A-G](?:#|b)?)\\s*${MODE_WORD}`));
      return m ? accept(m[1], modeSuffix(m[2])) : null;
    },
  },
  {
    name: "samples-loaded",
    match: firstMatch(new RegExp(`Samples loaded:\\s*\\d+\\s+${KEY_TOKEN}${TOKEN_END}`)),
  },
  {
    name: "token",
    match: (output) => {
      const pattern = new RegExp(`(?<![A-Za-z0-9#])${KEY_TOKEN}${TOKEN_END}`, "g");
      for (const m of output.matchAll(pattern)) {
        const key = accept(m[1], m[2]);
        if (key) return key;
      }
      return null;
    },
  },
];

/**
 * Extract a key label from detector output.
 *
 *   "Am\n"                      → { key: "Am", matcher: "exact" }
 *   "Key: F#"                   → { key: "F#", matcher: "key-label" }
 *   "Key: A minor"              → { key: "Am", matcher: "key-label" }
 *   "Estimated: Eb minor"       → { key: "Ebm", matcher: "mode-word" }
 *   "Samples loaded: 88200 Db"  → { key: "Db", matcher: "samples-loaded" }
 *   "done"                      → null
 */
export function parseDetectedKey(
  output: string,
  matchers: readonly KeyMatcher[] = KEY_MATCHERS
): DetectedKey | null {
  for (const matcher of matchers) {
    const key = matcher.match(output);
    if (key) return { key, matcher: matcher.name };
  }
  return null;
}
