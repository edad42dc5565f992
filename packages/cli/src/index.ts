// ============================================================================
// @odlkit/cli - Public API
// ============================================================================

export { detectFormat, parseLabelText, readLabelFile, readLabelText } from './load.js';
export type { DocumentFormat } from './load.js';
export { PROFILES, createProfile, getProfile, profileNames } from './profiles.js';
export type { Profile } from './profiles.js';
export { checkProfile, validateFiles, validateText } from './validate.js';
export type { FileReport, ProfileCheck } from './validate.js';
export { buildLine, center, report, reportMany } from './report.js';
export { dialectsCommand, encodeCommand, runCommand, usage, validateCommand } from './commands.js';
export type { CommandResult } from './commands.js';
export { createPalette, supportsColor } from './ui.js';
export type { Palette } from './ui.js';
