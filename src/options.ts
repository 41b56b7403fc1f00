import { OptionError } from './errors';

export type OptionValue = string | number | boolean | undefined;

/**
 * Formatter options as callers hand them over. Numbers may arrive as strings
 * and switches as words ("yes", "off", "1"), e.g. straight from the command line.
 */
export interface RtfFormatterOptions {
  /** Font family for the font table. Empty means a generic fixed-pitch font. */
  fontFamily?: string;
  /** Body font size in half-points. 0 or unset leaves the viewer's default. */
  fontSize?: OptionValue;
  lineNumbers?: OptionValue;
  /** Line number font size in half-points. */
  lineNumberFontSize?: OptionValue;
  lineNumberStart?: OptionValue;
  /** Print a numeral only every `lineNumberStep` lines; other lines get blank padding. */
  lineNumberStep?: OptionValue;
}

export interface ResolvedRtfOptions {
  fontFamily: string;
  fontSize: number;
  lineNumbers: boolean;
  lineNumberFontSize: number;
  lineNumberStart: number;
  lineNumberStep: number;
}

export const DEFAULT_LINE_NUMBER_FONT_SIZE = 18;

const TRUE_WORDS = new Set(['1', 'yes', 'true', 'on']);
const FALSE_WORDS = new Set(['0', 'no', 'false', 'off', '']);

export function getIntOption(name: string, value: OptionValue, fallback: number): number {
  if (value === undefined) return fallback;
  if (typeof value === 'number' && Number.isSafeInteger(value)) return value;
  if (typeof value === 'string' && /^\s*[+-]?\d+\s*$/.test(value)) {
    const n = parseInt(value, 10);
    if (Number.isSafeInteger(n)) return n;
  }
  throw new OptionError(name, `Invalid value "${String(value)}" for option ${name}; expected an integer`);
}

export function getBoolOption(name: string, value: OptionValue, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  const word = value.trim().toLowerCase();
  if (TRUE_WORDS.has(word)) return true;
  if (FALSE_WORDS.has(word)) return false;
  throw new OptionError(name, `Invalid value "${value}" for option ${name}; expected yes or no`);
}

function getPositiveIntOption(name: string, value: OptionValue, fallback: number): number {
  const n = Math.abs(getIntOption(name, value, fallback));
  if (n < 1) {
    throw new OptionError(name, `Option ${name} must be a positive integer`);
  }
  return n;
}

/** Fill in defaults and normalize every option. Throws `OptionError` on values it cannot read. */
export function resolveRtfOptions(options: RtfFormatterOptions = {}): ResolvedRtfOptions {
  return {
    fontFamily: options.fontFamily ?? '',
    fontSize: getIntOption('fontSize', options.fontSize, 0),
    lineNumbers: getBoolOption('lineNumbers', options.lineNumbers, false),
    lineNumberFontSize: getIntOption('lineNumberFontSize', options.lineNumberFontSize, DEFAULT_LINE_NUMBER_FONT_SIZE),
    lineNumberStart: getPositiveIntOption('lineNumberStart', options.lineNumberStart, 1),
    lineNumberStep: getPositiveIntOption('lineNumberStep', options.lineNumberStep, 1),
  };
}
