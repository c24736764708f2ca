import { IANAZone } from "luxon";
import renamedZones from "./tz-names.json";

// ICU reports these tzdb names under an older alias, so supportedValuesOf misses them
let spellings: ReadonlyMap<string, string> | null = null;

function knownSpellings(): ReadonlyMap<string, string> {
  if (!spellings) {
    const names = [...Intl.supportedValuesOf("timeZone"), ...renamedZones];
    spellings = new Map(names.map((name) => [name.toLowerCase(), name]));
  }
  return spellings;
}

/**
 * Parse a candidate string as an IANA timezone identifier
 *
 * Surrounding whitespace is ignored and matching is case-insensitive.
 * The identifier keeps its own name, only the casing is fixed, e.g.
 * " europe/paris " -> "Europe/Paris" and "asia/kolkata" -> "Asia/Kolkata".
 *
 * @param candidate Raw text read from an environment variable, file or API
 * @returns IANA identifier, or undefined if the candidate is not a known zone
 */
export function parseTimeZone(candidate: string): string | undefined {
  const trimmed = candidate.trim();
  if (!trimmed || !IANAZone.isValidZone(trimmed)) {
    return undefined;
  }

  const key = trimmed.toLowerCase();
  const resolved = new Intl.DateTimeFormat("en-US", { timeZone: trimmed }).resolvedOptions()
    .timeZone;
  if (resolved.toLowerCase() === key) {
    return resolved;
  }
  // Intl answered with another alias of the same zone
  return knownSpellings().get(key) ?? trimmed;
}

/**
 * Remove one pair of matching quotes around a value, as written in
 * shell-style KEY="value" files
 */
export function unquote(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length >= 2) {
    const first = trimmed[0];
    if ((first === '"' || first === "'") && trimmed.endsWith(first)) {
      return trimmed.slice(1, -1);
    }
  }
  return trimmed;
}
