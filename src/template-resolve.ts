/**
 * Name resolution against a scope chain.
 *
 * Resolution has two phases:
 * 1) the first segment of a name is looked up along the scope chain, innermost
 *    frame first (shadowing)
 * 2) the remaining segments descend into the value found, and only into it
 */

import type {
  TplScopeFrame,
  TplValue,
} from './types.js';

import {
  tplLookupKey,
} from './template-value.js';

/**
 * A name split at its first dot.
 * - head: Part before the first dot (the whole name without dots).
 * - tail: Remaining segments, or null when the name has no dot.
 */
export interface TplSplitName {
  head: string;
  tail: string[] | null;
}

/**
 * Split a name for resolution. Empty segments are kept as literal keys.
 *
 * @param name - Identifier or dot-path.
 * @returns Head and tail segments.
 */
export const tplSplitName = (name: string): TplSplitName => {
  const dot = name.indexOf('.');
  if (dot === -1) return { head: name, tail: null };
  return { head: name.slice(0, dot), tail: name.slice(dot + 1).split('.') };
};

/**
 * Find a key along the scope chain. The nearest frame whose context is a map
 * containing the key wins, even if the bound value is null.
 *
 * @param frame - Innermost frame to start from.
 * @param key - Exact key.
 * @returns The bound value, or undefined if no frame in the chain has the key.
 */
export const tplChainWalk = (frame: TplScopeFrame, key: string): TplValue | undefined => {
  for (let cur: TplScopeFrame | null = frame; cur !== null; cur = cur.parent) {
    const found = tplLookupKey(cur.context, key);
    if (found !== undefined) return found;
  }
  return undefined;
};

/**
 * Descend into a value by exact keys. No scope chain is consulted: every
 * segment must name a key of the map reached so far.
 *
 * @param root - Value to start from.
 * @param segments - Keys to follow, in order.
 * @returns The value reached, or undefined if a step hits a non-map or a missing key.
 */
export const tplDescend = (root: TplValue, segments: readonly string[]): TplValue | undefined => {
  let cur = root;
  for (const seg of segments) {
    const next = tplLookupKey(cur, seg);
    if (next === undefined) return undefined;
    cur = next;
  }
  return cur;
};

/**
 * Resolve an identifier or dot-path from a scope frame.
 *
 * @param frame - Innermost frame.
 * @param name - Identifier or dot-path.
 * @returns Resolved value or undefined (not found).
 */
export const tplResolve = (frame: TplScopeFrame, name: string): TplValue | undefined => {
  const { head, tail } = tplSplitName(name);
  const found = tplChainWalk(frame, head);
  if (found === undefined || tail === null) return found;
  return tplDescend(found, tail);
};
