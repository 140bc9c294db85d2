/**
 * Serial-line pacing. A character on an async line costs ten bit times
 * (start, eight data, stop), so `baud / 10` characters leave per second.
 * Output is cut into chunks of about a tenth of a second each.
 */

export function charsPerSecond(baudRate: number): number {
  return baudRate / 10;
}

export function chunkSize(baudRate: number): number {
  return Math.max(1, Math.floor(charsPerSecond(baudRate) / 10));
}

/** Milliseconds a chunk of `length` characters occupies on the line. */
export function chunkDelayMs(length: number, baudRate: number): number {
  const cps = charsPerSecond(baudRate);
  return cps > 0 ? (length / cps) * 1000 : 0;
}

/** Splits `text` into chunks of `size` code points, never inside a surrogate pair. */
export function splitChunks(text: string, size: number): string[] {
  const chars = Array.from(text);
  const chunks: string[] = [];
  for (let i = 0; i < chars.length; i += size) {
    chunks.push(chars.slice(i, i + size).join(''));
  }
  return chunks;
}
