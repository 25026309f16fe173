import { DEFAULT_DELIMITERS } from "@/lib/ingest/config";
import { countChar, modalValue } from "@/lib/ingest/lines";
import type { DelimiterCandidate } from "@/lib/ingest/types";

export const FALLBACK_DELIMITER = ",";

export function scoreDelimiter(lines: readonly string[], char: string): DelimiterCandidate | null {
  const counts = lines.filter((l) => l.trim()).map((l) => countChar(l, char));
  const observedLines = counts.filter((c) => c > 0).length;
  if (observedLines === 0) return null;

  const modalCount = modalValue(counts) ?? 0;
  const variance = counts.reduce((acc, c) => acc + (c - modalCount) ** 2, 0) / counts.length;
  return Object.freeze({ char, modalCount, variance, observedLines });
}

export function scoreDelimiters(
  lines: readonly string[],
  candidates: readonly string[] = DEFAULT_DELIMITERS
): readonly DelimiterCandidate[] {
  const scored: DelimiterCandidate[] = [];
  for (const char of candidates) {
    const c = scoreDelimiter(lines, char);
    if (c) scored.push(c);
  }
  return Object.freeze(scored);
}

/** Higher modal count first, then lower variance. Equal scores keep candidate order (stable sort). */
export function compareCandidates(a: DelimiterCandidate, b: DelimiterCandidate): number {
  if (a.modalCount !== b.modalCount) return b.modalCount - a.modalCount;
  return a.variance - b.variance;
}

export function inferDelimiter(lines: readonly string[], candidates: readonly string[] = DEFAULT_DELIMITERS): string {
  const ranked = [...scoreDelimiters(lines, candidates)].sort(compareCandidates);
  return ranked[0]?.char ?? FALLBACK_DELIMITER;
}

/** Typical field count in the sample for a given delimiter: modal occurrences + 1. */
export function modalColumnCount(lines: readonly string[], delimiter: string): number | null {
  const counts = lines.filter((l) => l.trim()).map((l) => countChar(l, delimiter));
  const mode = modalValue(counts);
  return mode === null ? null : mode + 1;
}
