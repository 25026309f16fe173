import { DEFAULT_STRATEGIES } from "@/lib/ingest/tokenize";
import type { ParseAttempt, Row, TokenizeStrategy } from "@/lib/ingest/types";

export type FallbackState =
  | { kind: "attempting"; index: number }
  | { kind: "succeeded"; strategy: string; rows: Row[] }
  | { kind: "exhausted" };

export type FallbackOutcome =
  | { ok: true; strategy: string; rows: Row[]; attempts: readonly ParseAttempt[] }
  | { ok: false; attempts: readonly ParseAttempt[] };

export function runFallbackChain(
  text: string,
  delimiter: string,
  strategies: readonly TokenizeStrategy[] = DEFAULT_STRATEGIES
): FallbackOutcome {
  const attempts: ParseAttempt[] = [];
  let state: FallbackState = strategies.length ? { kind: "attempting", index: 0 } : { kind: "exhausted" };

  while (state.kind === "attempting") {
    const strategy: TokenizeStrategy = strategies[state.index];
    const result = strategy.tokenize(text, delimiter);
    if (result.ok) {
      attempts.push({ strategy: strategy.name, success: true });
      state = { kind: "succeeded", strategy: strategy.name, rows: result.rows };
    } else {
      attempts.push({ strategy: strategy.name, success: false, errorKind: result.error.kind, message: result.error.message });
      const next: number = state.index + 1;
      state = next < strategies.length ? { kind: "attempting", index: next } : { kind: "exhausted" };
    }
  }

  if (state.kind === "succeeded") {
    return { ok: true, strategy: state.strategy, rows: state.rows, attempts: Object.freeze(attempts) };
  }
  return { ok: false, attempts: Object.freeze(attempts) };
}
