import { TextDecoder } from 'node:util';
import { SourceLine } from './types.js';

const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;

/**
 * Split raw bytes into physical lines and decode each one as UTF-8.
 *
 * Lines end at "\n" or "\r\n". A final newline does
 * not start another line. A line that is not valid UTF-8 becomes `null`
 * so it still occupies its line number.
 */
export function decodeLines(bytes: Uint8Array): SourceLine[] {
  let decoder = new TextDecoder('utf-8', { fatal: true });
  const lines: SourceLine[] = [];
  let start = 0;

  while (start < bytes.length) {
    const newline = bytes.indexOf(NEWLINE, start);
    let end = newline === -1 ? bytes.length : newline;
    const next = end + 1;
    if (newline !== -1 && end > start && bytes[end - 1] === CARRIAGE_RETURN) end--;

    try {
      lines.push(decoder.decode(bytes.subarray(start, end)));
    } catch {
      // A failed decode may leave partial state behind
      decoder = new TextDecoder('utf-8', { fatal: true });
      lines.push(null);
    }
    start = next;
  }

  return lines;
}

/**
 * Split decoded text into physical lines using the same rules as `decodeLines`
 */
export function splitLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split('\n');
  const last = lines.length - 1;
  if (lines[last] === '') lines.pop();
  // Only a "\r" that precedes "\n" is part of the line ending
  return lines.map((line, i) => (i < last && line.endsWith('\r') ? line.slice(0, -1) : line));
}
