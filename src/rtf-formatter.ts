import { ColorTable, buildColorTable, colorTableRtf } from './color-table';
import { type LineNumberConfig, lineNumberSlot, prepareLines } from './line-numbers';
import { type ResolvedRtfOptions, type RtfFormatterOptions, resolveRtfOptions } from './options';
import { escapeRtfFontName, escapeRtfText } from './rtf-escape';
import type { StyleRecord, StyleSource } from './style';
import type { Token, TokenStream } from './token-stream';
import type { TokenType } from './token-types';

export const RTF_FORMATTER = {
  name: 'RTF',
  aliases: ['rtf'],
  filenames: ['*.rtf'],
} as const;

export interface RtfSink {
  write(chunk: string): unknown;
}

export interface RenderContext {
  style: StyleSource;
  colors: ColorTable;
  /** Present only when line numbering is on. */
  lineNumbers?: LineNumberConfig;
}

export interface RenderState {
  lineno: number;
  /** The next token starts a line and owes a number slot first. */
  awaitingLineNumber: boolean;
}

export interface RenderStep {
  state: RenderState;
  fragment: string;
}

export function initialRenderState(lineNumberStart = 1): RenderState {
  return { lineno: lineNumberStart, awaitingLineNumber: true };
}

/** Walk up from `type` to the nearest category the style defines. */
export function resolveStyle(type: TokenType, style: StyleSource): StyleRecord {
  let current = type;
  while (!style.stylesToken(current) && current.parent) {
    current = current.parent;
  }
  return style.styleForToken(current);
}

/** Control words for the attributes `record` sets, or '' for a plain run. */
export function styleControlWords(record: StyleRecord, colors: ColorTable): string {
  let words = '';
  if (record.bgcolor) words += '\\cb' + colors.indexOf(record.bgcolor);
  if (record.color) words += '\\cf' + colors.indexOf(record.color);
  if (record.bold) words += '\\b';
  if (record.italic) words += '\\i';
  if (record.underline) words += '\\ul';
  if (record.border) words += '\\chbrdr\\chcfpat' + colors.indexOf(record.border);
  return words;
}

/** Everything before the body: version, font table, color table and default font size. */
export function rtfHeader(options: ResolvedRtfOptions, colors: ColorTable): string {
  const face = options.fontFamily ? ' ' + escapeRtfFontName(options.fontFamily) : '';
  let header = '{\\rtf1\\ansi\\uc0\\deff0'
    + '{\\fonttbl{\\f0\\fmodern\\fprq1\\fcharset0' + face + ';}}'
    + colorTableRtf(colors)
    + '\\f0 ';
  if (options.fontSize) header += '\\fs' + options.fontSize + ' ';
  return header;
}

export function renderToken(state: RenderState, token: Token, context: RenderContext): RenderStep {
  const record = resolveStyle(token.type, context.style);
  let { lineno, awaitingLineNumber } = state;
  let fragment = '';

  if (context.lineNumbers) {
    if (awaitingLineNumber) {
      fragment += lineNumberSlot(lineno, context.lineNumbers);
      awaitingLineNumber = false;
    }
    if (token.text.endsWith('\n')) {
      awaitingLineNumber = true;
      lineno += 1;
    }
  }

  const words = styleControlWords(record, context.colors);
  const text = escapeRtfText(token.text);
  fragment += words ? '{' + words + ' ' + text + '}' : text;

  return { state: { lineno, awaitingLineNumber }, fragment };
}

/**
 * Render `tokens` as a complete RTF document into `sink`.
 *
 * Without line numbers the stream is read once, token by token. With them it
 * is first held in memory to count lines.
 */
export function writeRtf(
  tokens: TokenStream,
  style: StyleSource,
  sink: RtfSink,
  options: RtfFormatterOptions = {}
): void {
  const resolved = resolveRtfOptions(options);
  const colors = buildColorTable(style);
  sink.write(rtfHeader(resolved, colors));

  let source = tokens;
  let lineNumbers: LineNumberConfig | undefined;
  if (resolved.lineNumbers) {
    const prepass = prepareLines(tokens);
    source = prepass.tokens;
    lineNumbers = {
      start: resolved.lineNumberStart,
      step: resolved.lineNumberStep,
      width: prepass.width,
      fontSize: resolved.lineNumberFontSize,
      colorIndex: colors.size > 0 ? 1 : undefined,
    };
  }

  const context: RenderContext = { style, colors, lineNumbers };
  let state = initialRenderState(resolved.lineNumberStart);
  for (const tok of source) {
    const step = renderToken(state, tok, context);
    state = step.state;
    if (step.fragment) sink.write(step.fragment);
  }

  sink.write('}');
}

export function formatRtf(tokens: TokenStream, style: StyleSource, options: RtfFormatterOptions = {}): string {
  const chunks: string[] = [];
  writeRtf(tokens, style, { write: chunk => chunks.push(chunk) }, options);
  return chunks.join('');
}
