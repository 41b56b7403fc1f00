import * as fs from 'fs';
import * as path from 'path';
import type { RtfFormatterOptions } from './options';
import { formatRtf } from './rtf-formatter';
import { type Style, defaultStyle, loadStyle } from './style';
import { parseTokenJson } from './token-stream';

export interface CliOptions {
  help: boolean;
  version: boolean;
  inputPath: string;
  outputPath?: string;
  force: boolean;
  stylePath?: string;
  fontFace?: string;
  fontSize?: string;
  lineNumbers: boolean;
  lineNumberFontSize?: string;
  lineNumberStart?: string;
  lineNumberStep?: string;
}

export function parseArgs(argv: string[]): CliOptions {
  const args = argv.slice(2);
  const options: CliOptions = {
    help: false,
    version: false,
    inputPath: '',
    force: false,
    lineNumbers: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const requireValue = (flag: string): string => {
      if (i + 1 >= args.length || args[i + 1].startsWith('--')) {
        throw new Error(`${flag} requires a value`);
      }
      i++;
      return args[i];
    };

    if (arg === '--help') {
      options.help = true;
    } else if (arg === '--version') {
      options.version = true;
    } else if (arg === '--force') {
      options.force = true;
    } else if (arg === '--linenos') {
      options.lineNumbers = true;
    } else if (arg === '--output') {
      options.outputPath = requireValue('--output');
    } else if (arg === '--style') {
      options.stylePath = requireValue('--style');
    } else if (arg === '--font-face') {
      options.fontFace = requireValue('--font-face');
    } else if (arg === '--font-size') {
      options.fontSize = requireValue('--font-size');
    } else if (arg === '--lineno-font-size') {
      options.lineNumberFontSize = requireValue('--lineno-font-size');
    } else if (arg === '--lineno-start') {
      options.lineNumberStart = requireValue('--lineno-start');
    } else if (arg === '--lineno-step') {
      options.lineNumberStep = requireValue('--lineno-step');
    } else if (arg.startsWith('--')) {
      throw new Error(`Unknown option "${arg}"`);
    } else if (!options.inputPath) {
      options.inputPath = arg;
    }
  }

  if (!options.help && !options.version && !options.inputPath) {
    throw new Error('No input file specified');
  }

  return options;
}

export function toFormatterOptions(options: CliOptions): RtfFormatterOptions {
  return {
    fontFamily: options.fontFace,
    fontSize: options.fontSize,
    lineNumbers: options.lineNumbers,
    lineNumberFontSize: options.lineNumberFontSize,
    lineNumberStart: options.lineNumberStart,
    lineNumberStep: options.lineNumberStep,
  };
}

function showHelp() {
  console.log(`Usage: rtf-highlight <tokens.json> [options]

Render a JSON array of [category, text] tokens as an RTF document.

Options:
  --help                    Show this help message
  --version                 Show version number
  --output <path>           Output file path (default: input path with .rtf)
  --force                   Overwrite an existing output file
  --style <path>            JSON file mapping categories to style definitions
  --font-face <name>        Font family (default: a generic fixed-pitch font)
  --font-size <n>           Font size in half-points
  --linenos                 Number the lines
  --lineno-font-size <n>    Line number font size in half-points (default: 18)
  --lineno-start <n>        First line number (default: 1)
  --lineno-step <n>         Print every nth line number (default: 1)`);
}

function showVersion() {
  const pkg: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf8'));
  const version = typeof pkg === 'object' && pkg !== null && 'version' in pkg ? String(pkg.version) : 'unknown';
  console.log(version);
}

export function deriveOutputPath(inputPath: string, outputPath?: string): string {
  if (outputPath) return outputPath;
  const inputDir = path.dirname(inputPath);
  const ext = path.extname(inputPath);
  const inputBase = path.basename(inputPath, ext);
  return path.join(inputDir, inputBase + '.rtf');
}

export function assertNoOutputConflict(outputPath: string, force: boolean) {
  if (!force && fs.existsSync(outputPath)) {
    throw new Error(`Output file already exists: ${outputPath}\nUse --force to overwrite`);
  }
}

export function readStyle(stylePath?: string): Style {
  if (!stylePath) return defaultStyle();
  if (!fs.existsSync(stylePath)) {
    throw new Error(`Style file not found: ${stylePath}`);
  }
  return loadStyle(JSON.parse(fs.readFileSync(stylePath, 'utf8')));
}

/** Render the input file and return the path written. */
export function runRender(options: CliOptions): string {
  const style = readStyle(options.stylePath);
  const tokens = parseTokenJson(JSON.parse(fs.readFileSync(options.inputPath, 'utf8')));

  const outputPath = deriveOutputPath(options.inputPath, options.outputPath);
  if (path.resolve(outputPath) === path.resolve(options.inputPath)) {
    throw new Error(`Output path is the input file: ${outputPath}`);
  }
  assertNoOutputConflict(outputPath, options.force);

  fs.writeFileSync(outputPath, formatRtf(tokens, style, toFormatterOptions(options)));
  return outputPath;
}

export function main(argv: string[] = process.argv) {
  const options = parseArgs(argv);

  if (options.help) {
    showHelp();
    return;
  }

  if (options.version) {
    showVersion();
    return;
  }

  if (!fs.existsSync(options.inputPath)) {
    throw new Error(`File not found: ${options.inputPath}`);
  }

  console.log(runRender(options));
}
