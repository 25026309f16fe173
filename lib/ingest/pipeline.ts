import { open } from "node:fs/promises";
import { assertNodeRuntime } from "@/lib/node/_guard";
import { resolveIngestSettings } from "@/lib/ingest/config";
import { decodeBytes } from "@/lib/ingest/decode";
import { inferDelimiter, modalColumnCount } from "@/lib/ingest/delimiter";
import { runFallbackChain } from "@/lib/ingest/fallback";
import { takeSampleLines } from "@/lib/ingest/lines";
import { normalizeWidth } from "@/lib/ingest/normalizeWidth";
import { buildIngestReport, describeAttempt, describeReport, exhaustedError } from "@/lib/ingest/report";
import { DEFAULT_STRATEGIES } from "@/lib/ingest/tokenize";
import type { IngestOptions, IngestedTable } from "@/lib/ingest/types";

assertNodeRuntime("lib/ingest/pipeline");

/**
 * Decode → infer delimiter → tokenize with fallbacks → force width → report.
 *
 * Throws DecodeError when no encoding works, IngestExhaustedError when every
 * tokenization strategy fails, and IngestConfigError for invalid options.
 */
export function ingestBytes(raw: Uint8Array, options: IngestOptions = {}): IngestedTable {
  const settings = resolveIngestSettings(options);
  const logger = options.logger;

  const decoded = decodeBytes(raw, { encoding: settings.encoding, encodings: settings.encodings });

  const sample = takeSampleLines(decoded.text, settings.sampleLines);
  const delimiter = settings.delimiter ?? inferDelimiter(sample);
  const modalCols = modalColumnCount(sample, delimiter);

  const outcome = runFallbackChain(decoded.text, delimiter, options.strategies ?? DEFAULT_STRATEGIES);
  for (const attempt of outcome.attempts) {
    if (!attempt.success) logger?.warn(`[ingest] ${describeAttempt(attempt)}`);
  }
  if (!outcome.ok) {
    throw exhaustedError({ delimiter, modalColumnCount: modalCols, attempts: outcome.attempts });
  }

  const { table, counts, mergeTargetIndex } = normalizeWidth(outcome.rows, settings.expectedCols, settings.mergeInto);

  const report = buildIngestReport({
    encoding: decoded.encoding,
    delimiter,
    delimiterSource: settings.delimiter ? "explicit" : "inferred",
    strategy: outcome.strategy,
    expectedCols: settings.expectedCols,
    mergeTargetIndex,
    mergeTargetName: table.header[mergeTargetIndex],
    rowCount: table.rows.length,
    longRows: counts.longRows,
    shortRows: counts.shortRows,
    modalColumnCount: modalCols,
    attempts: outcome.attempts,
  });
  for (const line of describeReport(report)) logger?.info(`[ingest] ${line}`);

  return { header: table.header, rows: table.rows, report };
}

export async function readFileBytes(filePath: string): Promise<Uint8Array> {
  const handle = await open(filePath, "r");
  try {
    return await handle.readFile();
  } finally {
    await handle.close();
  }
}

export async function ingestFile(filePath: string, options: IngestOptions = {}): Promise<IngestedTable> {
  // Validate before touching the filesystem.
  resolveIngestSettings(options);
  const raw = await readFileBytes(filePath);
  return ingestBytes(raw, options);
}
