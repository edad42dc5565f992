#!/usr/bin/env node
// ============================================================================
// @odlkit/cli - odlkit binary
// ============================================================================

import process from 'node:process';
import { runCommand } from './commands.js';
import { createPalette, supportsColor } from './ui.js';

const args = process.argv.slice(2);

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

try {
  const result = runCommand(args, createPalette(supportsColor(args)));
  process.stdout.write(result.stdout);
  process.stderr.write(result.stderr);
  process.exitCode = result.code;
} catch (error: unknown) {
  console.error(`Error: ${errorMessage(error)}`);
  process.exit(1);
}
