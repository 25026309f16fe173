import dotenv from 'dotenv';
dotenv.config({ path: '.env.local', override: false });
dotenv.config({ path: '.env', override: false });

import { existsSync, writeFileSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { ingestOptionsFromEnv, parseDelimiterSetting } from '@/lib/ingest/config';
import { IngestConfigError, IngestExhaustedError } from '@/lib/ingest/errors';
import { ingestFile } from '@/lib/ingest/pipeline';
import type { IngestOptions, IngestedTable } from '@/lib/ingest/types';

function usage() {
  console.log(`
Usage:
  npx tsx scripts/ingest/load_table.ts --file /path/to/export.csv [--expected-cols 106] [--merge-into NOTES]
                                       [--delimiter ,|;|pipe|tab] [--encoding windows-1252] [--out table.json]

Decodes the file, guesses the delimiter, parses it without dropping rows and forces every row to the expected width.
Defaults come from INGEST_* variables in .env.local / .env.
`);
}

function getArg(flag: string): string | null {
  const i = process.argv.indexOf(flag);
  return i >= 0 ? process.argv[i + 1] ?? null : null;
}

export function optionsFromArgs(base: IngestOptions): IngestOptions {
  const options: IngestOptions = { ...base, logger: console };

  const cols = getArg('--expected-cols');
  if (cols !== null) options.expectedCols = Number(cols);

  const mergeInto = getArg('--merge-into');
  if (mergeInto !== null) options.mergeInto = mergeInto;

  const delimiter = getArg('--delimiter');
  if (delimiter !== null) options.delimiter = parseDelimiterSetting(delimiter);

  const encoding = getArg('--encoding');
  if (encoding !== null) options.encoding = encoding;

  return options;
}

/** 2 for bad flags or settings (a usage error), 1 for everything else. */
export function exitCodeFor(err: unknown): number {
  return err instanceof IngestConfigError ? 2 : 1;
}

function writeResult(outPath: string, table: IngestedTable) {
  const payload = { header: table.header, rows: table.rows, report: table.report };
  writeFileSync(outPath, JSON.stringify(payload, null, 2));
  console.log(`[ingest] wrote ${table.rows.length} rows to ${outPath}`);
}

async function main() {
  const filePath = getArg('--file');
  if (!filePath) {
    usage();
    process.exit(2);
  }
  if (!existsSync(filePath)) {
    console.error(`[ingest] file not found: ${filePath}`);
    process.exit(2);
  }

  try {
    const table = await ingestFile(filePath, optionsFromArgs(ingestOptionsFromEnv()));
    const outPath = getArg('--out');
    if (outPath) writeResult(outPath, table);
    process.exit(0);
  } catch (e) {
    if (e instanceof IngestConfigError) {
      console.error(`[ingest] ${e.message}`);
      usage();
    } else if (e instanceof IngestExhaustedError) {
      console.error(`[ingest] ${e.message}`);
    } else {
      console.error('[ingest] ERROR', e instanceof Error ? e.message : e);
    }
    process.exit(exitCodeFor(e));
  }
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? '').href) {
  main().catch((e) => {
    console.error('[ingest] ERROR', e instanceof Error ? e.message : e);
    process.exit(1);
  });
}
