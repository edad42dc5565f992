// ============================================================================
// @odlkit/cli - Validation
// ============================================================================
//
// For each file and profile: does the document load, and does the profile's
// encoder accept what was loaded? Failures are logged and recorded as
// results. Only label errors are absorbed; anything else is a bug and
// propagates.
// ============================================================================

import { LabelEncodeError, LabelInputError, type LabelMapping, logger } from '@odlkit/core';
import { readLabelText } from './load.js';
import { PROFILES, type Profile } from './profiles.js';

export interface ProfileCheck {
  readonly loads: boolean;
  /** `null` when the document did not load. */
  readonly encodes: boolean | null;
}

export interface FileReport {
  readonly file: string;
  /** Keyed by profile name, in profile order. */
  readonly checks: ReadonlyMap<string, ProfileCheck>;
}

export function checkProfile(file: string, text: string, profile: Profile): ProfileCheck {
  let tree: LabelMapping;
  try {
    tree = profile.load(text, file);
  } catch (error) {
    if (!(error instanceof LabelInputError)) throw error;
    logger.error(`${profile.name} load error ${file} ${error.reason}`);
    return { loads: false, encodes: null };
  }

  try {
    profile.encoder.encodeToString(tree);
  } catch (error) {
    if (!(error instanceof LabelEncodeError)) throw error;
    logger.error(`${profile.name} encode error ${file} ${error.message}`);
    return { loads: true, encodes: false };
  }
  return { loads: true, encodes: true };
}

export function validateText(file: string, text: string, profiles: readonly Profile[] = PROFILES): FileReport {
  const checks = new Map<string, ProfileCheck>();
  for (const profile of profiles) {
    checks.set(profile.name, checkProfile(file, text, profile));
  }
  return { file, checks };
}

/**
 * Validate files in order. A file that cannot be read at all throws
 * `LabelInputError`.
 */
export function validateFiles(files: readonly string[], profiles: readonly Profile[] = PROFILES): FileReport[] {
  const t = logger.timer(`validate ${files.length} file(s)`);
  const reports = files.map((file) => validateText(file, readLabelText(file), profiles));
  t.endWith({ profiles: profiles.length });
  return reports;
}
