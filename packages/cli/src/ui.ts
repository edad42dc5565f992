// ============================================================================
// @odlkit/cli - Terminal Colours
// ============================================================================

import process from 'node:process';

export function supportsColor(args: readonly string[]): boolean {
  if (args.includes('--no-color') || process.env.NO_COLOR === '1') return false;
  if (args.includes('--color')) return true;
  if (process.env.FORCE_COLOR === '1') return true;
  return process.stdout.isTTY === true;
}

export interface Palette {
  pass(text: string): string;
  fail(text: string): string;
  accent(text: string): string;
  heading(text: string): string;
  dim(text: string): string;
}

// ── ANSI Color Helpers ──────────────────────────────────────────────────────
const ANSI = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  magenta: '\x1b[35m',
  brightGreen: '\x1b[92m',
  brightWhite: '\x1b[97m',
} as const;

export function createPalette(useColor: boolean): Palette {
  const clr = (color: string, text: string): string => (useColor ? `${color}${text}${ANSI.reset}` : text);
  return {
    pass: (text) => clr(ANSI.brightGreen, text),
    fail: (text) => clr(ANSI.red, text),
    accent: (text) => clr(ANSI.magenta, text),
    heading: (text) => clr(ANSI.bold + ANSI.brightWhite, text),
    dim: (text) => clr(ANSI.dim, text),
  };
}

export const PLAIN = createPalette(false);
