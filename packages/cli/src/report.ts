// ============================================================================
// @odlkit/cli - Validation Reports
// ============================================================================
//
// One file:
//
//   PDS3 |     Loads     |     Encodes
//   ODL  | does NOT load |
//
// Several files:
//
//   ------+-----------+----------
//   File  |   PDS3    |    ODL
//   ------+-----------+----------
//   a.yml |  L    E   |  L   No E
//
// The first column is left-aligned, every other cell is centred with any odd
// padding space on the right.
// ============================================================================

import { LabelConfigError } from '@odlkit/core';
import type { FileReport, ProfileCheck } from './validate.js';

export function center(text: string, width: number): string {
  const padding = Math.max(width - text.length, 0);
  const left = Math.floor(padding / 2);
  return ' '.repeat(left) + text + ' '.repeat(padding - left);
}

export function buildLine(elements: readonly string[], widths: readonly number[], sep = ' | '): string {
  const cells = elements.map((element, i) => {
    const width = widths[i] ?? 0;
    return i === 0 ? element.padEnd(width) : center(element, width);
  });
  return cells.join(sep);
}

function longest(values: readonly string[]): number {
  return values.reduce((max, v) => Math.max(max, v.length), 0);
}

function checkFor(report: FileReport, profile: string): ProfileCheck {
  const check = report.checks.get(profile);
  if (!check) {
    throw new LabelConfigError(`No result for profile "${profile}" in ${report.file}`, 'profile');
  }
  return check;
}

const loadsText = (loads: boolean): string => (loads ? 'Loads' : 'does NOT load');
const encodesText = (encodes: boolean | null): string =>
  encodes === null ? '' : encodes ? 'Encodes' : 'does NOT encode';

const loadsShort = (loads: boolean): string => (loads ? 'L' : 'No L');
const encodesShort = (encodes: boolean | null): string => (encodes === null ? '' : encodes ? 'E' : 'No E');

/**
 * Render the results of `validateFiles`. `profiles` gives the column order
 * and must name as many profiles as each report holds.
 */
export function report(reports: readonly FileReport[], profiles: readonly string[]): string {
  const [first] = reports;
  if (!first) {
    throw new LabelConfigError('Nothing to report: no files were validated');
  }
  if (first.checks.size !== profiles.length) {
    throw new LabelConfigError(
      `The reports hold ${first.checks.size} profile results but ${profiles.length} profile names were given`,
      'profile',
    );
  }

  if (reports.length > 1) {
    return reportMany(reports, profiles);
  }

  const widths = [
    longest(profiles),
    longest([loadsText(true), loadsText(false)]),
    longest([encodesText(true), encodesText(false), encodesText(null)]),
  ];
  return profiles
    .map((profile) => {
      const check = checkFor(first, profile);
      return buildLine([profile, loadsText(check.loads), encodesText(check.encodes)], widths);
    })
    .join('\n');
}

export function reportMany(reports: readonly FileReport[], profiles: readonly string[]): string {
  const fileWidth = longest(reports.map((r) => r.file));
  const loadsWidth = longest([loadsShort(true), loadsShort(false)]);
  const encodesWidth = longest([encodesShort(true), encodesShort(false), encodesShort(null)]);
  const profileWidth = loadsWidth + encodesWidth + 1;

  const widths = [fileWidth, ...profiles.map(() => profileWidth)];
  const blanks = widths.map((w) => ' '.repeat(w));
  const rule = buildLine(blanks, widths).replaceAll('|', '+').replaceAll(' ', '-');

  const lines = [rule, buildLine(['File', ...profiles], widths), rule];
  for (const r of reports) {
    const cells = profiles.map((profile) => {
      const check = checkFor(r, profile);
      return `${center(loadsShort(check.loads), loadsWidth)} ${center(encodesShort(check.encodes), encodesWidth)}`;
    });
    lines.push(buildLine([r.file, ...cells], widths));
  }
  return lines.join('\n');
}
