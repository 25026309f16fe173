import { IngestConfigError } from "@/lib/ingest/errors";
import type { IngestOptions } from "@/lib/ingest/types";

export const DEFAULT_EXPECTED_COLS = 106;
export const DEFAULT_SAMPLE_LINES = 200;
export const DEFAULT_ENCODINGS: readonly string[] = ["utf-8", "windows-1252"];
export const DEFAULT_DELIMITERS: readonly string[] = [",", ";", "|", "\t"];

// Double-byte sniffing: inspect this many leading bytes, flag when nulls exceed the ratio.
export const DOUBLE_BYTE_SNIFF_BYTES = 200;
export const DOUBLE_BYTE_NULL_RATIO = 0.1;

export const PLACEHOLDER_PREFIX = "__placeholder_";

const DELIMITER_NAMES: Record<string, string> = {
  comma: ",",
  semicolon: ";",
  pipe: "|",
  tab: "\t",
  "\\t": "\t",
};

export type IngestSettings = {
  expectedCols: number;
  mergeInto: string | null;
  delimiter: string | null;
  encoding: string | null;
  encodings: readonly string[];
  sampleLines: number;
};

export function parseDelimiterSetting(raw: string): string {
  const named = DELIMITER_NAMES[raw.trim().toLowerCase()];
  if (named) return named;
  if (raw.length !== 1) {
    throw new IngestConfigError("delimiter", `expected a single character or one of ${Object.keys(DELIMITER_NAMES).join(", ")}, got "${raw}"`);
  }
  return raw;
}

function positiveInt(setting: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new IngestConfigError(setting, `expected a positive integer, got ${value}`);
  }
  return value;
}

function intFromEnv(setting: string, raw: string | undefined): number | undefined {
  const trimmed = raw?.trim();
  if (!trimmed) return undefined;
  if (!/^\d+$/.test(trimmed)) {
    throw new IngestConfigError(setting, `expected a positive integer, got "${trimmed}"`);
  }
  return Number(trimmed);
}

export function ingestOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): IngestOptions {
  const options: IngestOptions = {};

  const expectedCols = intFromEnv("INGEST_EXPECTED_COLS", env.INGEST_EXPECTED_COLS);
  if (expectedCols !== undefined) options.expectedCols = expectedCols;

  const sampleLines = intFromEnv("INGEST_SAMPLE_LINES", env.INGEST_SAMPLE_LINES);
  if (sampleLines !== undefined) options.sampleLines = sampleLines;

  const mergeInto = env.INGEST_MERGE_INTO?.trim();
  if (mergeInto) options.mergeInto = mergeInto;

  // Not trimmed: a literal tab is a valid value.
  const delimiter = env.INGEST_DELIMITER;
  if (delimiter) options.delimiter = parseDelimiterSetting(delimiter);

  const encoding = env.INGEST_ENCODING?.trim();
  if (encoding) options.encoding = encoding;

  const encodings = (env.INGEST_ENCODINGS ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  if (encodings.length) options.encodings = encodings;

  return options;
}

export function resolveIngestSettings(options: IngestOptions = {}): IngestSettings {
  const expectedCols = positiveInt("expectedCols", options.expectedCols ?? DEFAULT_EXPECTED_COLS);
  const sampleLines = positiveInt("sampleLines", options.sampleLines ?? DEFAULT_SAMPLE_LINES);

  const delimiter = options.delimiter ?? null;
  if (delimiter !== null && delimiter.length !== 1) {
    throw new IngestConfigError("delimiter", `expected a single character, got "${delimiter}"`);
  }

  const encodings = options.encodings ?? DEFAULT_ENCODINGS;
  if (encodings.length === 0) {
    throw new IngestConfigError("encodings", "at least one encoding is required");
  }

  const mergeInto = options.mergeInto?.trim() || null;
  const encoding = options.encoding?.trim() || null;

  return { expectedCols, mergeInto, delimiter, encoding, encodings, sampleLines };
}
