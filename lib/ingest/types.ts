import type { ParseError } from "@/lib/ingest/errors";

export type Row = string[];

export type DecodedText = {
  text: string;
  encoding: string;
};

export type DelimiterCandidate = Readonly<{
  char: string;
  modalCount: number;
  variance: number;
  observedLines: number;
}>;

export type TokenizeResult = { ok: true; rows: Row[] } | { ok: false; error: ParseError };

export type TokenizeStrategy = Readonly<{
  name: string;
  tokenize: (text: string, delimiter: string) => TokenizeResult;
}>;

export type ParseAttempt =
  | { strategy: string; success: true }
  | { strategy: string; success: false; errorKind: string; message: string };

export type Table = {
  readonly header: readonly string[];
  readonly rows: readonly (readonly string[])[];
};

export type WidthCounts = {
  longRows: number;
  shortRows: number;
};

export type IngestReport = Readonly<{
  encoding: string;
  delimiter: string;
  delimiterSource: "inferred" | "explicit";
  strategy: string;
  expectedCols: number;
  mergeTargetIndex: number;
  mergeTargetName: string;
  rowCount: number;
  longRows: number;
  shortRows: number;
  modalColumnCount: number | null;
  attempts: readonly ParseAttempt[];
}>;

export type IngestedTable = Table & { readonly report: IngestReport };

export type IngestLogger = Pick<Console, "info" | "warn">;

export type IngestOptions = {
  expectedCols?: number;
  mergeInto?: string | null;
  delimiter?: string | null;
  encoding?: string | null;
  encodings?: readonly string[];
  sampleLines?: number;
  strategies?: readonly TokenizeStrategy[];
  logger?: IngestLogger;
};
