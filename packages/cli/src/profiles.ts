// ============================================================================
// @odlkit/cli - Validation Profiles
// ============================================================================
//
// A profile pairs a way of loading a label document with the encoder of one
// label flavour. `odlkit validate` runs every profile, in this order, on every
// file it is given.
// ============================================================================

import {
  CUBE_DIALECT,
  DEFAULT_DIALECT,
  type Dialect,
  type Grammar,
  ISIS_GRAMMAR,
  LabelConfigError,
  LabelEncoder,
  type LabelMapping,
  ODL_GRAMMAR,
  OMNI_GRAMMAR,
  PDS3_DIALECT,
  PVL_GRAMMAR,
  createQuoter,
} from '@odlkit/core';
import { parseLabelText } from './load.js';

export interface Profile {
  readonly name: string;
  readonly dialect: Dialect;
  readonly grammar: Grammar;
  readonly encoder: LabelEncoder;
  load(text: string, file: string): LabelMapping;
}

export function createProfile(name: string, dialect: Dialect, grammar: Grammar): Profile {
  return Object.freeze({
    name,
    dialect,
    grammar,
    encoder: new LabelEncoder(dialect, { quoter: createQuoter(grammar) }),
    load: parseLabelText,
  });
}

export const PROFILES: readonly Profile[] = Object.freeze([
  createProfile('PDS3', PDS3_DIALECT, ODL_GRAMMAR),
  createProfile('ODL', DEFAULT_DIALECT, ODL_GRAMMAR),
  createProfile('PVL', DEFAULT_DIALECT, PVL_GRAMMAR),
  createProfile('ISIS', CUBE_DIALECT, ISIS_GRAMMAR),
  createProfile('Omni', DEFAULT_DIALECT, OMNI_GRAMMAR),
]);

export function profileNames(profiles: readonly Profile[] = PROFILES): string[] {
  return profiles.map((p) => p.name);
}

/** Case-insensitive lookup among the built-in profiles. */
export function getProfile(name: string): Profile {
  const wanted = name.toLowerCase();
  const profile = PROFILES.find((p) => p.name.toLowerCase() === wanted);
  if (!profile) {
    throw new LabelConfigError(
      `Unknown profile "${name}". Available: ${profileNames().join(', ')}`,
      'profile',
    );
  }
  return profile;
}
