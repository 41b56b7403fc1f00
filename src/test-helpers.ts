import { EMPTY_STYLE, type StyleRecord, type StyleSource } from './style';
import type { Token } from './token-stream';
import { type TokenType, tokenType } from './token-types';

/**
 * A style source that styles exactly the categories given, in the order given.
 * Pass `enumerate: false` to hide them from `entries()`, which the color table reads.
 */
export function fakeStyle(
  styles: Array<[string, Partial<StyleRecord>]>,
  { enumerate = true }: { enumerate?: boolean } = {}
): StyleSource {
  const map = new Map<TokenType, StyleRecord>([[tokenType(''), { ...EMPTY_STYLE }]]);
  for (const [path, record] of styles) {
    map.set(tokenType(path), { ...EMPTY_STYLE, ...record });
  }
  return {
    stylesToken: type => map.has(type),
    styleForToken: type => map.get(type) ?? { ...EMPTY_STYLE },
    entries: () => (enumerate ? map.entries() : []),
  };
}

export function tokens(...pairs: Array<[string, string]>): Token[] {
  return pairs.map(([path, text]) => ({ type: tokenType(path), text }));
}

/** The header every document starts with, for a given color table body and font options. */
export function expectedHeader(colorEntries = '', fontFace = '', fontSize = 0): string {
  return '{\\rtf1\\ansi\\uc0\\deff0{\\fonttbl{\\f0\\fmodern\\fprq1\\fcharset0'
    + (fontFace ? ' ' + fontFace : '') + ';}}'
    + '{\\colortbl;' + colorEntries + '}\\f0 '
    + (fontSize ? '\\fs' + fontSize + ' ' : '');
}

export const RED = '\\red255\\green0\\blue0;';
export const BLUE = '\\red0\\green0\\blue255;';
