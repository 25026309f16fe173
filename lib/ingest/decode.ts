import { DEFAULT_ENCODINGS, DOUBLE_BYTE_NULL_RATIO, DOUBLE_BYTE_SNIFF_BYTES } from "@/lib/ingest/config";
import { DecodeError, type EncodingFailure } from "@/lib/ingest/errors";
import type { DecodedText } from "@/lib/ingest/types";

export type DoubleByteEncoding = "utf-16le" | "utf-16be";

export type DecodeOptions = {
  encoding?: string | null;
  encodings?: readonly string[];
};

function stripNulls(text: string): string {
  return text.replace(/\u0000/g, "");
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * BOM first; otherwise a null-byte ratio over the leading bytes. Null bytes at odd
 * offsets mean the high byte comes second, i.e. little-endian.
 */
export function sniffDoubleByte(raw: Uint8Array): DoubleByteEncoding | null {
  if (raw.length >= 2) {
    if (raw[0] === 0xff && raw[1] === 0xfe) return "utf-16le";
    if (raw[0] === 0xfe && raw[1] === 0xff) return "utf-16be";
  }
  if (raw.length < DOUBLE_BYTE_SNIFF_BYTES) return null;

  const sample = raw.subarray(0, DOUBLE_BYTE_SNIFF_BYTES);
  let even = 0;
  let odd = 0;
  sample.forEach((b, i) => {
    if (b !== 0) return;
    if (i % 2 === 0) even++;
    else odd++;
  });
  if ((even + odd) / sample.length <= DOUBLE_BYTE_NULL_RATIO) return null;
  return odd >= even ? "utf-16le" : "utf-16be";
}

function decodeWith(raw: Uint8Array, encoding: string, fatal: boolean): string {
  // TextDecoder drops a matching BOM on its own.
  return new TextDecoder(encoding, { fatal }).decode(raw);
}

export function decodeBytes(raw: Uint8Array, options: DecodeOptions = {}): DecodedText {
  const failures: EncodingFailure[] = [];

  if (options.encoding) {
    try {
      return { text: stripNulls(decodeWith(raw, options.encoding, false)), encoding: options.encoding };
    } catch (err) {
      throw new DecodeError([{ encoding: options.encoding, message: errorMessage(err) }]);
    }
  }

  const wide = sniffDoubleByte(raw);
  if (wide) {
    try {
      return { text: stripNulls(decodeWith(raw, wide, true)), encoding: wide };
    } catch (err) {
      failures.push({ encoding: wide, message: errorMessage(err) });
    }
  }

  for (const encoding of options.encodings ?? DEFAULT_ENCODINGS) {
    try {
      return { text: stripNulls(decodeWith(raw, encoding, false)), encoding };
    } catch (err) {
      failures.push({ encoding, message: errorMessage(err) });
    }
  }

  throw new DecodeError(failures);
}
