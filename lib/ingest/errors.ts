import type { ParseAttempt } from "@/lib/ingest/types";

export type EncodingFailure = { encoding: string; message: string };

export class DecodeError extends Error {
  readonly failures: readonly EncodingFailure[];
  constructor(failures: readonly EncodingFailure[]) {
    const tried = failures.map((f) => `${f.encoding} (${f.message})`).join(", ");
    super(`Could not decode input with encodings: ${tried || "none configured"}`);
    this.name = "DecodeError";
    this.failures = failures;
  }
}

export class ParseError extends Error {
  readonly strategy: string;
  readonly kind: string;
  readonly line: number | null;
  constructor(strategy: string, kind: string, message: string, line: number | null = null) {
    super(message);
    this.name = "ParseError";
    this.strategy = strategy;
    this.kind = kind;
    this.line = line;
  }
}

export class IngestExhaustedError extends Error {
  readonly delimiter: string;
  readonly modalColumnCount: number | null;
  readonly attempts: readonly ParseAttempt[];
  constructor(message: string, args: { delimiter: string; modalColumnCount: number | null; attempts: readonly ParseAttempt[] }) {
    super(message);
    this.name = "IngestExhaustedError";
    this.delimiter = args.delimiter;
    this.modalColumnCount = args.modalColumnCount;
    this.attempts = args.attempts;
  }
}

export class IngestConfigError extends Error {
  readonly setting: string;
  constructor(setting: string, message: string) {
    super(`${setting}: ${message}`);
    this.name = "IngestConfigError";
    this.setting = setting;
  }
}
