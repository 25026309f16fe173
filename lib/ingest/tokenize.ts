import { parse } from "csv-parse/sync";
import { ParseError } from "@/lib/ingest/errors";
import { countChar, splitLines } from "@/lib/ingest/lines";
import type { Row, TokenizeResult, TokenizeStrategy } from "@/lib/ingest/types";

export const QUOTE = '"';
export const ESCAPE = "\\";
export const LINE_ENDINGS = ["\r\n", "\n", "\r"] as const;

export const STRATEGY_NAMES = ["strict-quote", "escaped-quote", "quote-blind", "quote-repaired"] as const;
export type StrategyName = (typeof STRATEGY_NAMES)[number];

function fail(strategy: string, kind: string, message: string, line: number | null = null): TokenizeResult {
  return { ok: false, error: new ParseError(strategy, kind, message, line) };
}

function done(strategy: string, rows: Row[]): TokenizeResult {
  if (rows.length === 0) return fail(strategy, "EmptyInput", "No columns to parse from input");
  return { ok: true, rows };
}

function isStringRows(value: unknown): value is Row[] {
  return Array.isArray(value) && value.every((r) => Array.isArray(r) && r.every((f) => typeof f === "string"));
}

function errorCode(err: unknown): string {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return err instanceof Error ? err.name : "Error";
}

// ---- 1. strict quoting ----
export function tokenizeStrictQuote(text: string, delimiter: string): TokenizeResult {
  const name: StrategyName = "strict-quote";
  let records: unknown;
  try {
    records = parse(text, {
      delimiter,
      quote: QUOTE,
      escape: QUOTE,
      // otherwise csv-parse keeps only the first line ending it meets
      record_delimiter: [...LINE_ENDINGS],
      relax_column_count: true,
      skip_empty_lines: true,
    });
  } catch (err) {
    return fail(name, errorCode(err), err instanceof Error ? err.message : String(err));
  }
  if (!isStringRows(records)) return fail(name, "UnexpectedShape", "Parser returned non-string records");
  return done(name, records);
}

// ---- 2. quoting plus backslash escapes ----
type FieldState = "start" | "unquoted" | "quoted" | "closed";

export function tokenizeEscapedQuote(text: string, delimiter: string): TokenizeResult {
  const name: StrategyName = "escaped-quote";
  const rows: Row[] = [];
  let row: string[] = [];
  let field = "";
  let state: FieldState = "start";
  let touched = false;
  let line = 1;
  let quoteLine = 1;

  const endField = () => {
    row.push(field);
    field = "";
    state = "start";
  };
  const endRow = () => {
    if (touched) {
      endField();
      rows.push(row);
    }
    row = [];
    field = "";
    state = "start";
    touched = false;
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (ch === ESCAPE) {
      if (i + 1 >= text.length) return fail(name, "DanglingEscape", `Escape character at end of input (line ${line})`, line);
      const next = text[++i];
      field += next;
      touched = true;
      if (next === "\n" || (next === "\r" && text[i + 1] !== "\n")) line++;
      if (state === "start" || state === "closed") state = "unquoted";
      continue;
    }

    if (state === "quoted") {
      if (ch === QUOTE) {
        state = "closed";
      } else {
        field += ch;
        if (ch === "\n" || (ch === "\r" && text[i + 1] !== "\n")) line++;
      }
      continue;
    }

    if (ch === QUOTE) {
      touched = true;
      if (state === "start") {
        state = "quoted";
        quoteLine = line;
      } else if (state === "closed") {
        // doubled quote inside a quoted field
        field += QUOTE;
        state = "quoted";
      } else {
        field += QUOTE;
      }
      continue;
    }

    if (ch === delimiter) {
      touched = true;
      endField();
      continue;
    }

    if (ch === "\n" || ch === "\r") {
      if (ch === "\r" && text[i + 1] === "\n") i++;
      endRow();
      line++;
      continue;
    }

    field += ch;
    touched = true;
    if (state === "start" || state === "closed") state = "unquoted";
  }

  if (state === "quoted") {
    return fail(name, "QuoteNotClosed", `Quoted field opened on line ${quoteLine} is never closed`, quoteLine);
  }
  endRow();
  return done(name, rows);
}

// ---- 3. split on delimiters outside balanced quotes, line by line ----
export function unwrapField(field: string): string {
  if (field.length >= 2 && field.startsWith(QUOTE) && field.endsWith(QUOTE)) {
    return field.slice(1, -1).replace(/""/g, QUOTE);
  }
  return field;
}

function splitByQuoteParity(strategy: string, text: string, delimiter: string): TokenizeResult {
  const rows: Row[] = [];
  const lines = splitLines(text);

  for (let n = 0; n < lines.length; n++) {
    const line = lines[n];
    if (line.length === 0) continue;

    const fields: string[] = [];
    let current = "";
    let inQuotes = false;
    for (const ch of line) {
      if (ch === QUOTE) {
        inQuotes = !inQuotes;
        current += ch;
      } else if (ch === delimiter && !inQuotes) {
        fields.push(current);
        current = "";
      } else {
        current += ch;
      }
    }
    if (inQuotes) {
      return fail(strategy, "UnbalancedQuotes", `Line ${n + 1} has an odd number of quote characters`, n + 1);
    }
    fields.push(current);
    rows.push(fields.map(unwrapField));
  }

  return done(strategy, rows);
}

export function tokenizeQuoteBlind(text: string, delimiter: string): TokenizeResult {
  return splitByQuoteParity("quote-blind", text, delimiter);
}

// ---- 4. soft quote repair, then (3) ----

/**
 * Best-effort and lossy: smart quotes become plain ones, and on any line with an
 * odd number of double quotes every double quote becomes two apostrophes.
 */
export function repairQuotes(text: string): string {
  const plain = text.replace(/[“”„‟]/g, QUOTE).replace(/[‘’‚‛]/g, "'");
  return plain
    .split(/(\r\n|\n|\r)/)
    .map((part, i) => (i % 2 === 0 && countChar(part, QUOTE) % 2 === 1 ? part.replace(/"/g, "''") : part))
    .join("");
}

export function tokenizeQuoteRepaired(text: string, delimiter: string): TokenizeResult {
  return splitByQuoteParity("quote-repaired", repairQuotes(text), delimiter);
}

export const DEFAULT_STRATEGIES: readonly TokenizeStrategy[] = Object.freeze([
  { name: "strict-quote", tokenize: tokenizeStrictQuote },
  { name: "escaped-quote", tokenize: tokenizeEscapedQuote },
  { name: "quote-blind", tokenize: tokenizeQuoteBlind },
  { name: "quote-repaired", tokenize: tokenizeQuoteRepaired },
]);
