import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  assertNoOutputConflict,
  deriveOutputPath,
  parseArgs,
  readStyle,
  runRender,
  toFormatterOptions,
} from './cli';
import { RED, expectedHeader } from './test-helpers';
import { Keyword } from './token-types';

describe('parseArgs', () => {
  test('reads every flag', () => {
    const options = parseArgs([
      'node', 'cli.js', 'in.json',
      '--output', 'out.rtf',
      '--force',
      '--style', 'style.json',
      '--font-face', 'Courier New',
      '--font-size', '20',
      '--linenos',
      '--lineno-font-size', '16',
      '--lineno-start', '5',
      '--lineno-step', '2',
    ]);

    expect(options).toEqual({
      help: false,
      version: false,
      inputPath: 'in.json',
      outputPath: 'out.rtf',
      force: true,
      stylePath: 'style.json',
      fontFace: 'Courier New',
      fontSize: '20',
      lineNumbers: true,
      lineNumberFontSize: '16',
      lineNumberStart: '5',
      lineNumberStep: '2',
    });
  });

  test('Property 1: the input path survives any flag order', () => {
    fc.assert(fc.property(
      fc.stringMatching(/^[a-zA-Z][a-zA-Z0-9._-]{0,9}$/),
      fc.boolean(),
      fc.boolean(),
      (inputPath, force, before) => {
        const flags = force ? ['--force', '--linenos'] : ['--linenos'];
        const args = before ? ['node', 'cli.js', ...flags, inputPath] : ['node', 'cli.js', inputPath, ...flags];
        const options = parseArgs(args);
        expect(options.inputPath).toBe(inputPath);
        expect(options.force).toBe(force);
        expect(options.lineNumbers).toBe(true);
      }
    ), { numRuns: 100 });
  });

  test('does not need an input for --help or --version', () => {
    expect(parseArgs(['node', 'cli.js', '--help']).help).toBe(true);
    expect(parseArgs(['node', 'cli.js', '--version']).version).toBe(true);
  });

  test('rejects bad command lines', () => {
    expect(() => parseArgs(['node', 'cli.js'])).toThrow('No input file specified');
    expect(() => parseArgs(['node', 'cli.js', 'in.json', '--output'])).toThrow('--output requires a value');
    expect(() => parseArgs(['node', 'cli.js', 'in.json', '--style', '--force'])).toThrow('--style requires a value');
    expect(() => parseArgs(['node', 'cli.js', 'in.json', '--bogus'])).toThrow('Unknown option "--bogus"');
  });
});

test('toFormatterOptions maps flags onto formatter options', () => {
  const options = parseArgs(['node', 'cli.js', 'in.json', '--font-face', 'Mono', '--lineno-step', '3']);
  expect(toFormatterOptions(options)).toEqual({
    fontFamily: 'Mono',
    fontSize: undefined,
    lineNumbers: false,
    lineNumberFontSize: undefined,
    lineNumberStart: undefined,
    lineNumberStep: '3',
  });
});

test('deriveOutputPath swaps the extension for .rtf', () => {
  expect(deriveOutputPath('/tmp/code.json')).toBe('/tmp/code.rtf');
  expect(deriveOutputPath('/tmp/code.JSON', '/tmp/other.rtf')).toBe('/tmp/other.rtf');
});

describe('rendering files', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'rtf-highlight-test-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeJson(name: string, value: unknown): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, JSON.stringify(value));
    return file;
  }

  test('writes the document next to the input', () => {
    const inputPath = writeJson('tokens.json', [['Keyword', 'if'], ['Text', '\n']]);
    const stylePath = writeJson('style.json', { Keyword: 'bold #FF0000' });

    const written = runRender(parseArgs(['node', 'cli.js', inputPath, '--style', stylePath]));

    expect(written).toBe(path.join(dir, 'tokens.rtf'));
    expect(fs.readFileSync(written, 'utf8')).toBe(expectedHeader(RED) + '{\\cf1\\b if}\\par\n}');
  });

  test('passes line number flags through', () => {
    const inputPath = writeJson('tokens.json', [['Text', 'a'], ['Text', '\n']]);
    const stylePath = writeJson('style.json', {});
    const outputPath = path.join(dir, 'out.rtf');

    runRender(parseArgs(['node', 'cli.js', inputPath, '--style', stylePath, '--output', outputPath, '--linenos', '--lineno-start', '3']));

    expect(fs.readFileSync(outputPath, 'utf8')).toBe(expectedHeader() + '{\\fs18 3  }a\\par\n}');
  });

  test('refuses to overwrite without --force', () => {
    const inputPath = writeJson('tokens.json', []);
    const outputPath = path.join(dir, 'tokens.rtf');
    fs.writeFileSync(outputPath, 'existing');

    expect(() => runRender(parseArgs(['node', 'cli.js', inputPath]))).toThrow(`Output file already exists: ${outputPath}`);
    expect(() => assertNoOutputConflict(outputPath, true)).not.toThrow();

    runRender(parseArgs(['node', 'cli.js', inputPath, '--force']));
    expect(fs.readFileSync(outputPath, 'utf8')).not.toBe('existing');
  });

  test('refuses to write over the input', () => {
    const inputPath = writeJson('tokens.rtf', []);
    expect(() => runRender(parseArgs(['node', 'cli.js', inputPath, '--force']))).toThrow(`Output path is the input file: ${inputPath}`);
  });

  test('reports a missing style file', () => {
    const missing = path.join(dir, 'nope.json');
    expect(() => readStyle(missing)).toThrow(`Style file not found: ${missing}`);
  });

  test('falls back to the bundled style', () => {
    expect(readStyle().styleForToken(Keyword).bold).toBe(true);
  });
});
