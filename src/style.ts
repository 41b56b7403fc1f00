import defaultDefinitions from './data/default-style.json';
import { RootToken, type TokenType, standardTokenTypes, tokenType } from './token-types';

/** Resolved visual attributes of one category. Colors are 6 hex digits, or '' when unset. */
export interface StyleRecord {
  color: string;
  bgcolor: string;
  border: string;
  bold: boolean;
  italic: boolean;
  underline: boolean;
}

export const EMPTY_STYLE: Readonly<StyleRecord> = Object.freeze({
  color: '',
  bgcolor: '',
  border: '',
  bold: false,
  italic: false,
  underline: false,
});

/** Category path → definition words, e.g. `{ "Keyword": "bold #008000" }`. */
export type StyleDefinitions = Readonly<Record<string, string>>;

/** What the renderer needs from a style: lookup, inheritance check, and enumeration. */
export interface StyleSource {
  /** True when `type` has a style of its own rather than one it must borrow from an ancestor. */
  stylesToken(type: TokenType): boolean;
  styleForToken(type: TokenType): StyleRecord;
  /** Every styled category with its record, in a stable order. */
  entries(): Iterable<[TokenType, StyleRecord]>;
}

const FONT_FAMILY_WORDS = new Set(['roman', 'sans', 'mono']);

/**
 * Normalize a color word: `#rgb` → `rrggbb`, `#rrggbb` → `rrggbb`.
 * Anything else comes back unchanged and is rejected later by the color table.
 */
export function parseColor(value: string): string {
  if (value === '') return '';
  if (/^#[0-9A-Fa-f]{3}$/.test(value)) {
    return value[1] + value[1] + value[2] + value[2] + value[3] + value[3];
  }
  if (/^#[0-9A-Fa-f]{6}$/.test(value)) return value.slice(1);
  return value;
}

/** Apply one category's definition words on top of the record it inherits. */
export function applyDefinition(base: Readonly<StyleRecord>, definition: string): StyleRecord {
  const record: StyleRecord = { ...base };
  for (const word of definition.split(/\s+/)) {
    if (!word || word === 'noinherit' || FONT_FAMILY_WORDS.has(word)) continue;
    if (word === 'bold') record.bold = true;
    else if (word === 'nobold') record.bold = false;
    else if (word === 'italic') record.italic = true;
    else if (word === 'noitalic') record.italic = false;
    else if (word === 'underline') record.underline = true;
    else if (word === 'nounderline') record.underline = false;
    else if (word.startsWith('bg:')) record.bgcolor = parseColor(word.slice(3));
    else if (word.startsWith('border:')) record.border = parseColor(word.slice(7));
    else record.color = parseColor(word);
  }
  return record;
}

/**
 * A style built from definition strings. Every standard category gets a record,
 * plus every category the definitions name (and its ancestors). A record starts
 * from the parent's record, or the root's when the definition says `noinherit`.
 */
export class Style implements StyleSource {
  private readonly styles = new Map<TokenType, StyleRecord>();

  constructor(definitions: StyleDefinitions = {}) {
    const defs = new Map<TokenType, string>();
    for (const [path, definition] of Object.entries(definitions)) {
      defs.set(tokenType(path), definition);
    }

    const resolve = (type: TokenType): StyleRecord => {
      const existing = this.styles.get(type);
      if (existing) return existing;
      const definition = defs.get(type) ?? '';
      let base: Readonly<StyleRecord> = EMPTY_STYLE;
      if (type.parent) {
        base = definition.split(/\s+/).includes('noinherit') ? resolve(RootToken) : resolve(type.parent);
      }
      const record = applyDefinition(base, definition);
      this.styles.set(type, record);
      return record;
    };

    for (const type of standardTokenTypes()) resolve(type);
    for (const type of defs.keys()) resolve(type);
  }

  stylesToken(type: TokenType): boolean {
    return this.styles.has(type);
  }

  styleForToken(type: TokenType): StyleRecord {
    const record = this.styles.get(type);
    if (!record) {
      throw new Error(`No style for ${type.toString()}`);
    }
    return record;
  }

  entries(): Iterable<[TokenType, StyleRecord]> {
    return this.styles.entries();
  }
}

/** Build a style from parsed JSON, rejecting anything that is not a map of strings. */
export function loadStyle(json: unknown): Style {
  if (typeof json !== 'object' || json === null || Array.isArray(json)) {
    throw new Error('Style definitions must be a JSON object');
  }
  const definitions: Record<string, string> = {};
  for (const [path, definition] of Object.entries(json)) {
    if (typeof definition !== 'string') {
      throw new Error(`Style definition for "${path}" must be a string`);
    }
    definitions[path] = definition;
  }
  return new Style(definitions);
}

/** The bundled default style. */
export function defaultStyle(): Style {
  return new Style(defaultDefinitions);
}
