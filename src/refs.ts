import type {
  TplEscapeFn,
} from './types.js';

import {
  escapeHtml,
} from './html-utils.js';

/**
 * Type definition for shared references.
 */
interface Refs {
  escape: TplEscapeFn;
}

/**
 * Shared references used in multiple places.
 */
export const refs: Refs = {
  /**
   * Escaper used for escaped interpolations when a render passes none.
   */
  escape: escapeHtml,
};

/**
 * Set or reset the default escaper.
 * @param escapeFn Escaper to set or `null` to restore `escapeHtml`.
 */
export function setTemplateEscapeReference (escapeFn: TplEscapeFn | null): void {
  if (escapeFn !== null && typeof escapeFn !== 'function') {
    throw new TypeError('Invalid escape reference');
  }

  refs.escape = escapeFn ?? escapeHtml;
}
