// ============================================================================
// @odlkit/core - Output Sinks
// ============================================================================

const byteEncoder = new TextEncoder();

/**
 * Append-only destination for label text. A Node `Writable` (for example
 * `process.stdout`) satisfies it. The encoder never flushes, retries or
 * rewinds; buffering is the sink's business.
 */
export interface LabelSink {
  write(chunk: string): unknown;
}

/**
 * Collects chunks in memory. Encode into one of these and adopt the text only
 * on success when a partial label must never reach the real destination.
 */
export class StringSink implements LabelSink {
  private chunks: string[] = [];

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  /** UTF-8 size of everything written so far. */
  get byteLength(): number {
    return byteEncoder.encode(this.toString()).byteLength;
  }

  toString(): string {
    return this.chunks.join('');
  }
}
