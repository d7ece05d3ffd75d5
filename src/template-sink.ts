import type {
  TplSink,
} from './types.js';

/**
 * In-memory sink collecting output chunks.
 */
export class TplStringSink implements TplSink {
  private chunks: string[] = [];
  private written = 0;

  /**
   * @param initial - Text the sink starts with.
   */
  constructor (initial = '') {
    if (initial.length > 0) this.write(initial);
  }

  write (text: string): void {
    this.chunks.push(text);
    this.written += text.length;
  }

  /** Number of UTF-16 code units written so far. */
  get length (): number {
    return this.written;
  }

  toString (): string {
    return this.chunks.join('');
  }
}
