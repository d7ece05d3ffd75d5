/**
 * Codes of structural render failures:
 * - 'section-missing': a section could not be resolved when entering it
 * - 'section-index': a repetition index outside the section's array
 * - 'section-test': a section test returned a negative or non-integer count
 */
export type TplStructuralErrorCode = 'section-missing' | 'section-index' | 'section-test';

/**
 * Hard stop of a render. Output written before the error stays in the sink.
 */
export class TplStructuralError extends Error {
  readonly code: TplStructuralErrorCode;

  /** Name of the section that failed. */
  readonly key: string;

  /** Exception thrown by the `onError` hook while this error was reported. */
  hookError: unknown = undefined;

  constructor (code: TplStructuralErrorCode, key: string, message: string) {
    super(message);
    this.name = 'TplStructuralError';
    this.code = code;
    this.key = key;
  }
}
