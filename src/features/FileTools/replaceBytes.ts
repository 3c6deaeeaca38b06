/**
 * Byte length of the UTF-8 sequence starting at `offset`. Malformed or
 * truncated sequences count as a single byte.
 */
export function sequenceLength(bytes: Buffer, offset: number): number {
  const lead = bytes[offset];
  let length: number;
  let low = 0x80;
  let high = 0xbf;

  if (lead < 0x80) return 1;
  if (lead >= 0xc2 && lead <= 0xdf) {
    length = 2;
  } else if (lead >= 0xe0 && lead <= 0xef) {
    length = 3;
    if (lead === 0xe0) low = 0xa0;
    if (lead === 0xed) high = 0x9f;
  } else if (lead >= 0xf0 && lead <= 0xf4) {
    length = 4;
    if (lead === 0xf0) low = 0x90;
    if (lead === 0xf4) high = 0x8f;
  } else {
    return 1;
  }

  if (offset + length > bytes.length) return 1;
  const second = bytes[offset + 1];
  if (second < low || second > high) return 1;
  for (let i = 2; i < length; i++) {
    const next = bytes[offset + i];
    if (next < 0x80 || next > 0xbf) return 1;
  }
  return length;
}

/**
 * Replaces every non-overlapping occurrence of `search` in `content`. The
 * replacement is inserted verbatim. An empty `search` matches at the start,
 * between characters and at the end, never inside a multi-byte sequence.
 */
export function replaceAllBytes(content: Buffer, search: Buffer, replacement: Buffer): Buffer {
  const parts: Buffer[] = [];

  if (search.length === 0) {
    let offset = 0;
    while (offset < content.length) {
      const length = sequenceLength(content, offset);
      parts.push(replacement, content.subarray(offset, offset + length));
      offset += length;
    }
    parts.push(replacement);
    return Buffer.concat(parts);
  }

  let start = 0;
  let match = content.indexOf(search, start);
  while (match !== -1) {
    parts.push(content.subarray(start, match), replacement);
    start = match + search.length;
    match = content.indexOf(search, start);
  }
  parts.push(content.subarray(start));
  return Buffer.concat(parts);
}
