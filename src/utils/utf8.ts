/** Cuts `text` to at most `maxBytes` of UTF-8 without splitting a character. */
export function truncateUtf8(text: string, maxBytes: number): string {
  const buf = Buffer.from(text, 'utf8');
  if (buf.length <= maxBytes) return text;
  let end = maxBytes;
  // step back over continuation bytes (10xxxxxx)
  while (end > 0 && (buf[end] & 0xc0) === 0x80) end--;
  return buf.subarray(0, end).toString('utf8');
}

export function utf8Length(text: string): number {
  return Buffer.byteLength(text, 'utf8');
}

/** UTF-16 index where each code point of `text` starts, plus `text.length` as the final entry. */
export function codePointBoundaries(text: string): number[] {
  const bounds: number[] = [];
  let index = 0;
  for (const ch of text) {
    bounds.push(index);
    index += ch.length;
  }
  bounds.push(index);
  return bounds;
}
