// ============================================================================
// @odlkit/cli - Commands
// ============================================================================
// Commands:
//   odlkit validate <file...> [-v|--verbose]                  → load/encode report per profile
//   odlkit encode   <file> [--dialect d] [--grammar g]        → label text on stdout
//                   [--out path] [--newline]
//   odlkit dialects                                           → built-in token tables
//
// Every command returns its output and exit code instead of printing, so the
// binary in cli.ts is the only place that touches stdout.
// ============================================================================

import { writeFileSync } from 'node:fs';
import {
  DIALECTS,
  LabelConfigError,
  LabelEncoder,
  LabelError,
  type LogLevel,
  StringSink,
  createQuoter,
  defaultQuoterFor,
  getDialect,
  getGrammar,
  logger,
} from '@odlkit/core';
import { readLabelFile } from './load.js';
import { profileNames } from './profiles.js';
import { report } from './report.js';
import { PLAIN, type Palette } from './ui.js';
import { validateFiles } from './validate.js';

export interface CommandResult {
  readonly code: 0 | 1;
  readonly stdout: string;
  readonly stderr: string;
}

// ---------------------------------------------------------------------------
// Argument helpers
// ---------------------------------------------------------------------------

export function getFlag(args: readonly string[], name: string): string | undefined {
  const idx = args.indexOf(`--${name}`);
  if (idx !== -1 && idx + 1 < args.length) return args[idx + 1];
  return undefined;
}

export function hasFlag(args: readonly string[], name: string): boolean {
  return args.includes(`--${name}`);
}

/** Arguments that are neither flags nor the value of one of `valueFlags`. */
export function positionals(args: readonly string[], valueFlags: readonly string[] = []): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (valueFlags.some((flag) => arg === `--${flag}`)) {
      i++;
    } else if (!arg.startsWith('-')) {
      out.push(arg);
    }
  }
  return out;
}

/** Counts `-v`, `--verbose` and stacked short forms such as `-vv`. */
export function verbosity(args: readonly string[]): number {
  let count = 0;
  for (const arg of args) {
    if (arg === '--verbose') count++;
    else if (/^-v+$/.test(arg)) count += arg.length - 1;
  }
  return count;
}

export function logLevelFor(verbose: number): LogLevel {
  if (verbose <= 0) return 'silent';
  if (verbose === 1) return 'error';
  return 'debug';
}

// ============================================================================
// validate
// ============================================================================
export function validateCommand(args: readonly string[]): CommandResult {
  const files = positionals(args);
  if (files.length === 0) {
    throw new LabelConfigError('validate needs at least one file');
  }

  const previous = logger.getLogLevel();
  logger.setLogLevel(logLevelFor(verbosity(args)));
  try {
    const reports = validateFiles(files);
    return { code: 0, stdout: `${report(reports, profileNames())}\n`, stderr: '' };
  } finally {
    logger.setLogLevel(previous);
  }
}

// ============================================================================
// encode
// ============================================================================
export function encodeCommand(args: readonly string[], ui: Palette = PLAIN): CommandResult {
  const [inputPath] = positionals(args, ['dialect', 'grammar', 'out']);
  if (!inputPath) {
    throw new LabelConfigError('encode needs an input file');
  }

  const dialect = getDialect(getFlag(args, 'dialect') ?? 'default');
  const grammarName = getFlag(args, 'grammar');
  const quoter = grammarName ? createQuoter(getGrammar(grammarName)) : defaultQuoterFor(dialect);
  const encoder = new LabelEncoder(dialect, { quoter });

  // Encode into memory first: a failed encode must not leave half a label
  // in the output file.
  const sink = new StringSink();
  encoder.encode(readLabelFile(inputPath), sink);
  if (hasFlag(args, 'newline')) sink.write('\n');

  const outPath = getFlag(args, 'out');
  if (!outPath) {
    return { code: 0, stdout: sink.toString(), stderr: '' };
  }
  writeFileSync(outPath, sink.toString());
  return {
    code: 0,
    stdout: `${ui.pass('wrote')} ${ui.accent(outPath)} ${ui.dim(`(${sink.byteLength} bytes, ${dialect.name})`)}\n`,
    stderr: '',
  };
}

// ============================================================================
// dialects
// ============================================================================
export function dialectsCommand(ui: Palette = PLAIN): CommandResult {
  const header = ['Name', 'Group', 'Object', 'Terminal', 'End line', 'Aligned'];
  const rows = Object.values(DIALECTS).map((d) => [
    d.name,
    `${d.tokens.group}/${d.tokens.endGroup}`,
    `${d.tokens.object}/${d.tokens.endObject}`,
    d.tokens.terminal,
    d.endLineStyle,
    d.alignAssignments ? 'yes' : 'no',
  ]);

  const widths = header.map((h, col) => Math.max(h.length, ...rows.map((row) => row[col].length)));
  const format = (cells: readonly string[]): string =>
    cells
      .map((cell, col) => cell.padEnd(widths[col]))
      .join('  ')
      .trimEnd();

  const lines = [ui.heading(format(header)), ...rows.map(format)];
  return { code: 0, stdout: `${lines.join('\n')}\n`, stderr: '' };
}

// ============================================================================
// usage
// ============================================================================
export function usage(ui: Palette = PLAIN): string {
  return `
  ${ui.heading('odlkit')} - PVL, ODL and PDS3 label writer

  Usage:
    odlkit validate <file...> [-v|--verbose]         Report which profiles load and encode each file
    odlkit encode   <file> [--dialect default|cube|pds3] [--grammar pvl|odl|isis|omni]
                    [--out path] [--newline]          Write a label from a JSON or YAML tree
    odlkit dialects                                   List the built-in dialects

  Verbosity (validate):
    -v                   Log load and encode errors
    -vv                  Also log debug timings

  Display Options:
    --color              Force colored output
    --no-color           Disable colored output

  Environment Variables:
    ODLKIT_DEBUG=1       Debug logging (also: warn, error, silent)
    FORCE_COLOR=1        Force colored output
    NO_COLOR=1           Disable colored output
`;
}

export function runCommand(argv: readonly string[], ui: Palette = PLAIN): CommandResult {
  const [command, ...args] = argv;
  try {
    switch (command) {
      case 'validate':
        return validateCommand(args);
      case 'encode':
        return encodeCommand(args, ui);
      case 'dialects':
        return dialectsCommand(ui);
      case undefined:
      case 'help':
      case '--help':
        return { code: 0, stdout: usage(ui), stderr: '' };
      default:
        return { code: 1, stdout: usage(ui), stderr: `${ui.fail('Error:')} unknown command "${command}"\n` };
    }
  } catch (error) {
    if (error instanceof LabelError) {
      return { code: 1, stdout: '', stderr: `${ui.fail('Error:')} ${error.message}\n` };
    }
    throw error;
  }
}
