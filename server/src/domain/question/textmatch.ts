// server/src/domain/question/textmatch.ts

/* ---------------------------------------------------------------------------------------- */
/*
 * Canonical form used to compare free-text answers: NFKC-folded, lower-cased, punctuation and symbols
 * removed (letters, digits and "_" survive, in any script), whitespace collapsed and trimmed.
 */
export function normalize(text: unknown): string {
  if (typeof text !== "string") return "";
  return text
    .normalize("NFKC")
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_\s]/gu, "")
    .replace(/\s+/g, " ")
    .trim();
}
/* ---------------------------------------------------------------------------------------- */

/* ---------------------------------------------------------------------------------------- */
// exact membership only, no fuzzy or substring matching
export function isCorrect(normalized: string, accepted: ReadonlySet<string>): boolean {
  if (!normalized) return false;
  return accepted.has(normalized);
}
/* ---------------------------------------------------------------------------------------- */

/* ---------------------------------------------------------------------------------------- */
export function toAcceptedSet(rawAnswers: string, separator = "|"): Set<string> {
  const out = new Set<string>();
  for (const part of rawAnswers.split(separator)) {
    const n = normalize(part);
    if (n) out.add(n);
  }
  return out;
}
/* ---------------------------------------------------------------------------------------- */
