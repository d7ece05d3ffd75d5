import type {
  TplScopeFrame,
  TplValue,
} from './types.js';

import {
  TplStructuralError,
} from './errors.js';

import {
  tplResolve,
} from './template-resolve.js';

import {
  tplAssertNever,
} from './template-value.js';

/**
 * Section test result that aborts the render.
 */
export const TPL_SECTION_ERROR = -1;

/**
 * Repetition count of a section value:
 * - not found, null, false: 0
 * - arrays: their length (0 when empty)
 * - any other value: 1
 *
 * @param value - Resolved section value.
 * @returns Number of repetitions.
 */
export const tplSectionCount = (value: TplValue | undefined): number => {
  if (value === undefined) return 0;
  switch (value.kind) {
    case 'null':
    case 'false':
      return 0;
    case 'array':
      return value.items.length;
    case 'true':
    case 'number':
    case 'string':
    case 'map':
      return 1;
    default:
      return tplAssertNever(value);
  }
};

/**
 * Test a section before entering it.
 *
 * Callable sections are not interpreted; they count like any other value.
 *
 * @param frame - Innermost frame.
 * @param name - Section name (identifier or dot-path).
 * @param _callable - Whether the parser kept the section's raw text for a lambda.
 * @returns Number of repetitions.
 */
export const tplSectionTest = (frame: TplScopeFrame, name: string, _callable: boolean): number => {
  return tplSectionCount(tplResolve(frame, name));
};

/**
 * Context of one repetition of a section. The name is resolved again, no result
 * of the preceding test is reused.
 *
 * - Arrays: the element at `index`.
 * - Other values: the value itself, for any index.
 *
 * @param frame - Frame enclosing the section.
 * @param name - Section name (identifier or dot-path).
 * @param index - Zero-based repetition index.
 * @returns Child context, or a structural error when the section cannot be entered.
 */
export const tplSectionEnter = (frame: TplScopeFrame, name: string, index: number): TplValue | TplStructuralError => {
  const value = tplResolve(frame, name);
  if (value === undefined) {
    return new TplStructuralError('section-missing', name, `Section "${name}" could not be resolved`);
  }
  if (value.kind !== 'array') return value;

  if (!Number.isInteger(index) || index < 0 || index >= value.items.length) {
    return new TplStructuralError('section-index', name, `Index ${index} is out of range for section "${name}" (length ${value.items.length})`);
  }
  return value.items[index];
};
