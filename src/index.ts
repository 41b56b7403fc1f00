export { ColorTable, buildColorTable, colorTableRtf, type ColorEntry } from './color-table';
export { InvalidColorFormatError, OptionError, UnknownColorReferenceError } from './errors';
export {
  isNumberedLine,
  lineNumberSlot,
  prepareLines,
  splitLines,
  type LineNumberConfig,
  type LinePrepass,
} from './line-numbers';
export {
  DEFAULT_LINE_NUMBER_FONT_SIZE,
  getBoolOption,
  getIntOption,
  resolveRtfOptions,
  type OptionValue,
  type ResolvedRtfOptions,
  type RtfFormatterOptions,
} from './options';
export { escapeRtf, escapeRtfFontName, escapeRtfText, surrogatePair } from './rtf-escape';
export {
  RTF_FORMATTER,
  formatRtf,
  initialRenderState,
  renderToken,
  resolveStyle,
  rtfHeader,
  styleControlWords,
  writeRtf,
  type RenderContext,
  type RenderState,
  type RenderStep,
  type RtfSink,
} from './rtf-formatter';
export {
  EMPTY_STYLE,
  Style,
  applyDefinition,
  defaultStyle,
  loadStyle,
  parseColor,
  type StyleDefinitions,
  type StyleRecord,
  type StyleSource,
} from './style';
export { parseTokenJson, token, type MaterializedTokens, type Token, type TokenStream } from './token-stream';
export * from './token-types';
