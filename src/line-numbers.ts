import { DocString } from './token-types';
import type { MaterializedTokens, Token, TokenStream } from './token-stream';

export interface LinePrepass {
  tokens: MaterializedTokens;
  /** Line boundaries seen: split doc string lines plus bare newline tokens. */
  lineCount: number;
  /** Digits in `lineCount`; every number slot is padded to this width. */
  width: number;
}

export interface LineNumberConfig {
  start: number;
  step: number;
  width: number;
  fontSize: number;
  /** Color table index for the numerals. Left out when the table is empty. */
  colorIndex?: number;
}

/** Split text after each newline, keeping the newline on its line. */
export function splitLines(text: string): string[] {
  const lines: string[] = [];
  let from = 0;
  for (let nl = text.indexOf('\n'); nl !== -1; nl = text.indexOf('\n', from)) {
    lines.push(text.slice(from, nl + 1));
    from = nl + 1;
  }
  if (from < text.length) lines.push(text.slice(from));
  return lines;
}

/**
 * Read the whole stream once so the renderer knows how wide the line numbers
 * get. Multi-line doc strings are cut into one token per line so each line
 * receives its own number.
 */
export function prepareLines(stream: TokenStream): LinePrepass {
  const tokens: Token[] = [];
  let lineCount = 0;

  for (const tok of stream) {
    if (tok.type === DocString && tok.text.includes('\n')) {
      for (const line of splitLines(tok.text)) {
        tokens.push({ type: tok.type, text: line });
        if (line.endsWith('\n')) lineCount++;
      }
    } else {
      if (tok.text === '\n') lineCount++;
      tokens.push(tok);
    }
  }

  return { tokens, lineCount, width: String(lineCount).length };
}

/** Whether `lineno` gets a numeral: the first line and every `step`th line after it. */
export function isNumberedLine(lineno: number, start: number, step: number): boolean {
  return (lineno - start) % step === 0;
}

/** The `{\fsN \cfI nnn  }` group that opens a line. */
export function lineNumberSlot(lineno: number, config: LineNumberConfig): string {
  const label = isNumberedLine(lineno, config.start, config.step) ? String(lineno) : '';
  const color = config.colorIndex !== undefined ? '\\cf' + config.colorIndex + ' ' : '';
  return '{\\fs' + config.fontSize + ' ' + color + label.padStart(config.width) + '  }';
}
