import { type TokenType, tokenType } from './token-types';

export interface Token {
  type: TokenType;
  text: string;
}

/** Tokens as the lexer hands them over: one forward pass, no going back. */
export type TokenStream = Iterable<Token>;

/** Tokens held in memory so they can be walked more than once. */
export type MaterializedTokens = readonly Token[];

export function token(type: TokenType, text: string): Token {
  return { type, text };
}

/**
 * Decode a JSON array of `[category, text]` pairs, e.g.
 * `[["Keyword", "if"], ["Text", " "]]`. Entries are decoded as they are read.
 */
export function* parseTokenJson(json: unknown): Generator<Token, void, undefined> {
  if (!Array.isArray(json)) {
    throw new Error('Token input must be a JSON array of [category, text] pairs');
  }
  for (let i = 0; i < json.length; i++) {
    const entry: unknown = json[i];
    if (!Array.isArray(entry) || entry.length !== 2) {
      throw new Error(`Token ${i} must be a [category, text] pair`);
    }
    const [category, text]: unknown[] = entry;
    if (typeof category !== 'string' || typeof text !== 'string') {
      throw new Error(`Token ${i} must be a [category, text] pair of strings`);
    }
    yield { type: tokenType(category), text };
  }
}
