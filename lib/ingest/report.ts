import { IngestExhaustedError } from "@/lib/ingest/errors";
import type { IngestReport, ParseAttempt } from "@/lib/ingest/types";

export function buildIngestReport(fields: Omit<IngestReport, "attempts"> & { attempts: readonly ParseAttempt[] }): IngestReport {
  return Object.freeze({ ...fields, attempts: Object.freeze([...fields.attempts]) });
}

export function printableDelimiter(delimiter: string): string {
  return delimiter === "\t" ? "\\t" : delimiter;
}

export function describeReport(report: IngestReport): string[] {
  const lines = [
    `Loaded ${report.rowCount} rows with exactly ${report.expectedCols} columns. Delimiter='${printableDelimiter(report.delimiter)}' (${report.delimiterSource}), encoding=${report.encoding}, strategy=${report.strategy}`,
  ];
  if (report.longRows) {
    lines.push(`Rows with >${report.expectedCols} fields (merged into "${report.mergeTargetName}", nothing dropped): ${report.longRows}`);
  }
  if (report.shortRows) {
    lines.push(`Rows with <${report.expectedCols} fields (padded): ${report.shortRows}`);
  }
  return lines;
}

export function describeAttempt(attempt: ParseAttempt): string {
  return attempt.success ? `${attempt.strategy}: ok` : `${attempt.strategy}: ${attempt.errorKind}: ${attempt.message}`;
}

export function exhaustedError(args: {
  delimiter: string;
  modalColumnCount: number | null;
  attempts: readonly ParseAttempt[];
}): IngestExhaustedError {
  const message = [
    "Could not parse delimited text without dropping rows.",
    `Delimiter guess: '${printableDelimiter(args.delimiter)}'; modal column count in sample: ${args.modalColumnCount ?? "n/a"}`,
    "Attempts:",
    ...args.attempts.map((a) => ` - ${describeAttempt(a)}`),
  ].join("\n");
  return new IngestExhaustedError(message, { ...args, attempts: Object.freeze([...args.attempts]) });
}
