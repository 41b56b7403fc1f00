import { describe, it, expect } from 'vitest';
import { isNumberedLine, lineNumberSlot, prepareLines, splitLines } from './line-numbers';
import { tokens } from './test-helpers';

describe('splitLines', () => {
  it('keeps each newline on the line it ends', () => {
    expect(splitLines('a\nb\n')).toEqual(['a\n', 'b\n']);
    expect(splitLines('a\nb')).toEqual(['a\n', 'b']);
    expect(splitLines('\n\n')).toEqual(['\n', '\n']);
  });

  it('returns nothing for empty text', () => {
    expect(splitLines('')).toEqual([]);
  });
});

describe('prepareLines', () => {
  it('splits multi-line doc strings and counts their lines', () => {
    const result = prepareLines(tokens(
      ['Literal.String.Doc', '"""a\nb\nc"""'],
      ['Text', '\n'],
      ['Name', 'x'],
      ['Text', '\n'],
    ));

    expect(result.tokens.map(t => t.text)).toEqual(['"""a\n', 'b\n', 'c"""', '\n', 'x', '\n']);
    expect(result.tokens[1].type.toString()).toBe('Token.Literal.String.Doc');
    expect(result.lineCount).toBe(4);
    expect(result.width).toBe(1);
  });

  it('leaves other multi-line tokens whole and uncounted', () => {
    const result = prepareLines(tokens(['Comment.Multiline', '/* a\nb */'], ['Text', '\n']));
    expect(result.tokens.map(t => t.text)).toEqual(['/* a\nb */', '\n']);
    expect(result.lineCount).toBe(1);
  });

  it('leaves single-line doc strings whole', () => {
    const result = prepareLines(tokens(['Literal.String.Doc', '"""doc"""']));
    expect(result.tokens.map(t => t.text)).toEqual(['"""doc"""']);
    expect(result.lineCount).toBe(0);
  });

  it('sizes the number column from the line count', () => {
    const input: Array<[string, string]> = [];
    for (let i = 0; i < 137; i++) input.push(['Text', '\n']);
    const result = prepareLines(tokens(...input));
    expect(result.lineCount).toBe(137);
    expect(result.width).toBe(3);
  });

  it('handles an empty stream', () => {
    expect(prepareLines([])).toEqual({ tokens: [], lineCount: 0, width: 1 });
  });
});

describe('isNumberedLine', () => {
  it('numbers every line when the step is 1', () => {
    for (let n = 3; n < 10; n++) {
      expect(isNumberedLine(n, 3, 1)).toBe(true);
    }
  });

  it('numbers the first line and every step-th line after it', () => {
    const numbered = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11].filter(n => isNumberedLine(n, 1, 5));
    expect(numbered).toEqual([1, 6, 11]);
  });

  it('counts from the start line', () => {
    const numbered = [10, 11, 12, 13, 14].filter(n => isNumberedLine(n, 10, 2));
    expect(numbered).toEqual([10, 12, 14]);
  });
});

describe('lineNumberSlot', () => {
  it('right-justifies the number in the column', () => {
    expect(lineNumberSlot(7, { start: 1, step: 1, width: 3, fontSize: 18, colorIndex: 1 }))
      .toBe('{\\fs18 \\cf1   7  }');
  });

  it('pads skipped lines with blanks of the same width', () => {
    expect(lineNumberSlot(2, { start: 1, step: 5, width: 2, fontSize: 20 }))
      .toBe('{\\fs20 ' + '  ' + '  }');
  });
});
