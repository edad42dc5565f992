// ============================================================================
// @odlkit/cli - Label Files
// ============================================================================
//
// Label trees are read from JSON or YAML documents and converted with
// `labelFromPlain`. YAML is read with the core schema, so `2001-01-01` stays
// text instead of becoming a Date.
// ============================================================================

import { readFileSync } from 'node:fs';
import path from 'node:path';
import { LabelInputError, type LabelMapping, labelFromPlain } from '@odlkit/core';
import yaml from 'js-yaml';

export type DocumentFormat = 'json' | 'yaml';

const EXTENSIONS: ReadonlyMap<string, DocumentFormat> = new Map([
  ['.json', 'json'],
  ['.yaml', 'yaml'],
  ['.yml', 'yaml'],
]);

/**
 * Format implied by a file name, or `undefined` when the extension says nothing.
 */
export function detectFormat(file: string): DocumentFormat | undefined {
  return EXTENSIONS.get(path.extname(file).toLowerCase());
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function parseDocument(text: string, file: string, format: DocumentFormat): unknown {
  try {
    if (format === 'json') {
      const data: unknown = JSON.parse(text);
      return data;
    }
    return yaml.load(text, { schema: yaml.CORE_SCHEMA, filename: file });
  } catch (error) {
    if (error instanceof SyntaxError || error instanceof yaml.YAMLException) {
      throw new LabelInputError(`not valid ${format.toUpperCase()}: ${errorMessage(error)}`, file);
    }
    throw error;
  }
}

/**
 * Turn the text of a label document into a tree.
 *
 * Files without a known extension are tried as JSON first, then as YAML.
 */
export function parseLabelText(text: string, file: string, format = detectFormat(file)): LabelMapping {
  let data: unknown;
  if (format) {
    data = parseDocument(text, file, format);
  } else {
    try {
      data = parseDocument(text, file, 'json');
    } catch (error) {
      if (!(error instanceof LabelInputError)) throw error;
      data = parseDocument(text, file, 'yaml');
    }
  }

  try {
    return labelFromPlain(data);
  } catch (error) {
    if (error instanceof LabelInputError) {
      throw new LabelInputError(error.reason, file);
    }
    throw error;
  }
}

export function readLabelText(file: string): string {
  try {
    return readFileSync(file, 'utf-8');
  } catch (error) {
    throw new LabelInputError(`cannot read file (${errorMessage(error)})`, file);
  }
}

export function readLabelFile(file: string): LabelMapping {
  return parseLabelText(readLabelText(file), file);
}
