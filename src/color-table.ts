import { InvalidColorFormatError, UnknownColorReferenceError } from './errors';
import type { StyleSource } from './style';

export interface ColorEntry {
  index: number;
  hex: string;
  red: number;
  green: number;
  blue: number;
}

/**
 * Colors referenced by a style, numbered from 1 in the order they were first seen.
 * Index 0 is the document's implicit default color and never appears here.
 */
export class ColorTable {
  private readonly indices = new Map<string, number>();
  private readonly list: ColorEntry[] = [];

  get entries(): readonly ColorEntry[] {
    return this.list;
  }

  get size(): number {
    return this.list.length;
  }

  has(hex: string): boolean {
    return this.indices.has(hex);
  }

  /** Index of a color already in the table. */
  indexOf(hex: string): number {
    const index = this.indices.get(hex);
    if (index === undefined) {
      throw new UnknownColorReferenceError(hex);
    }
    return index;
  }

  /** @internal Register a color; repeats keep their first index. */
  add(hex: string, category?: string): number {
    const existing = this.indices.get(hex);
    if (existing !== undefined) return existing;
    if (!/^[0-9A-Fa-f]{6}$/.test(hex)) {
      throw new InvalidColorFormatError(hex, category);
    }
    const entry: ColorEntry = {
      index: this.list.length + 1,
      hex,
      red: parseInt(hex.slice(0, 2), 16),
      green: parseInt(hex.slice(2, 4), 16),
      blue: parseInt(hex.slice(4, 6), 16),
    };
    this.indices.set(hex, entry.index);
    this.list.push(entry);
    return entry.index;
  }
}

/**
 * Scan every category of `style` once, taking foreground, background and
 * border color in that order per category.
 */
export function buildColorTable(style: StyleSource): ColorTable {
  const table = new ColorTable();
  for (const [type, record] of style.entries()) {
    for (const color of [record.color, record.bgcolor, record.border]) {
      if (color) table.add(color, type.toString());
    }
  }
  return table;
}

/** The `{\colortbl;...}` group. The leading `;` is the empty slot 0. */
export function colorTableRtf(table: ColorTable): string {
  let rtf = '{\\colortbl;';
  for (const entry of table.entries) {
    rtf += '\\red' + entry.red + '\\green' + entry.green + '\\blue' + entry.blue + ';';
  }
  return rtf + '}';
}
