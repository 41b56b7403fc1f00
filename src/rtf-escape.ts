/** Escape the characters RTF uses for its own structure: `\`, `{` and `}`. */
export function escapeRtf(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/\{/g, '\\{')
    .replace(/\}/g, '\\}');
}

/** UTF-16 high and low surrogate of a code point at or above U+10000. */
export function surrogatePair(codePoint: number): [number, number] {
  const offset = codePoint - 0x10000;
  return [0xd800 + (offset >> 10), 0xdc00 + (offset & 0x3ff)];
}

/**
 * Encode a name for the font table. Non-ASCII code points become `\uN`
 * control words delimited by a space, since the table entry cannot hold groups.
 */
export function escapeRtfFontName(name: string): string {
  let out = '';
  for (const ch of escapeRtf(name)) {
    const cp = ch.codePointAt(0) ?? 0;
    if (cp < 0x80) {
      out += ch;
    } else if (cp < 0x10000) {
      out += '\\u' + cp + ' ';
    } else {
      const [high, low] = surrogatePair(cp);
      out += '\\u' + high + ' \\u' + low + ' ';
    }
  }
  return out;
}

/**
 * Encode text for an RTF body. ASCII passes through, everything else becomes
 * `{\uN}` groups (two of them, as a surrogate pair, above the BMP), and each
 * newline becomes `\par` followed by a newline.
 *
 * The document declares `\uc0`, so no fallback character follows `\uN`.
 */
export function escapeRtfText(text: string): string {
  if (!text) return '';

  let out = '';
  for (const ch of escapeRtf(text)) {
    const cp = ch.codePointAt(0) ?? 0;
    if (cp < 0x80) {
      out += ch;
    } else if (cp < 0x10000) {
      out += '{\\u' + cp + '}';
    } else {
      const [high, low] = surrogatePair(cp);
      out += '{\\u' + high + '}{\\u' + low + '}';
    }
  }
  return out.replace(/\n/g, '\\par\n');
}
