// ============================================================================
// @odlkit/core - Error Types
// ============================================================================

/**
 * Base error class for all odlkit errors.
 */
export class LabelError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LabelError';
  }
}

// ---------------------------------------------------------------------------
// Encoding Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a label tree cannot be written as text.
 */
export class LabelEncodeError extends LabelError {
  constructor(message: string) {
    super(message);
    this.name = 'LabelEncodeError';
  }
}

/**
 * Thrown when a value has no textual form in any dialect.
 */
export class UnsupportedValueError extends LabelEncodeError {
  public readonly representation: string;

  constructor(representation: string, reason = 'is not serializable') {
    super(`${representation} ${reason}`);
    this.name = 'UnsupportedValueError';
    this.representation = representation;
  }
}

/**
 * Thrown when the quoting grammar refuses a text value.
 */
export class EncodingRejectedError extends LabelEncodeError {
  public readonly text: string;
  public readonly grammar: string;
  public readonly reason: string;

  constructor(text: string, grammar: string, reason: string) {
    super(`Cannot quote ${JSON.stringify(text)} under the ${grammar} grammar: ${reason}`);
    this.name = 'EncodingRejectedError';
    this.text = text;
    this.grammar = grammar;
    this.reason = reason;
  }
}

// ---------------------------------------------------------------------------
// Configuration Errors
// ---------------------------------------------------------------------------

/**
 * Thrown for unknown dialect, grammar or profile names and bad options.
 */
export class LabelConfigError extends LabelError {
  public readonly option?: string;

  constructor(message: string, option?: string) {
    super(message);
    this.name = 'LabelConfigError';
    this.option = option;
  }
}

// ---------------------------------------------------------------------------
// Input Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a label document cannot be read or turned into a tree.
 */
export class LabelInputError extends LabelError {
  public readonly path?: string;
  public readonly reason: string;

  constructor(reason: string, path?: string) {
    super(path ? `${path}: ${reason}` : reason);
    this.name = 'LabelInputError';
    this.path = path;
    this.reason = reason;
  }
}
