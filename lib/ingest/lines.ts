const LINE_BREAK = /\r\n|\n|\r/;

export function splitLines(text: string): string[] {
  return text.split(LINE_BREAK);
}

export function takeSampleLines(text: string, limit: number): string[] {
  const out: string[] = [];
  for (const line of splitLines(text)) {
    if (out.length >= limit) break;
    if (line.trim()) out.push(line);
  }
  return out;
}

export function countChar(line: string, ch: string): number {
  let n = 0;
  for (const c of line) if (c === ch) n++;
  return n;
}

/** Most frequent value; on a tie the value seen first wins. */
export function modalValue(values: readonly number[]): number | null {
  const freq = new Map<number, number>();
  for (const v of values) freq.set(v, (freq.get(v) ?? 0) + 1);

  let best: number | null = null;
  let bestFreq = 0;
  for (const [v, f] of freq) {
    if (f > bestFreq) {
      best = v;
      bestFreq = f;
    }
  }
  return best;
}
