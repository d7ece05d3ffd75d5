import type {
  TplInstruction,
  TplRenderCallbacks,
  TplSectionInstr,
} from './types.js';

import {
  TplStructuralError,
} from './errors.js';

import type {
  TplScopeStack,
} from './template-scope.js';

/**
 * Walk an instruction list and drive the render callbacks.
 *
 * Sections:
 * - Normal sections repeat `count` times; each repetition pushes the context
 *   returned by `onSectionStart` and pops it afterwards.
 * - Inverted sections render their children once, in the current scope, when
 *   the count is 0.
 *
 * A structural error stops the render: `onError` is called once and the error
 * is rethrown. An exception from `onError` is kept in `hookError` instead of
 * replacing it. Output written so far is not rolled back.
 *
 * @param instructions - Compiled template.
 * @param stack - Scope stack of this render.
 * @param callbacks - Render callbacks.
 */
export const tplExecute = (
  instructions: readonly TplInstruction[],
  stack: TplScopeStack,
  callbacks: TplRenderCallbacks,
): void => {
  try {
    tplExecuteNodes(instructions, stack, callbacks);
  } catch (err) {
    if (err instanceof TplStructuralError) {
      try {
        callbacks.onError(err);
      } catch (hookErr) {
        // the structural error stays the one reported to the caller
        err.hookError = hookErr;
      }
    }
    throw err;
  }
};

const tplExecuteNodes = (
  nodes: readonly TplInstruction[],
  stack: TplScopeStack,
  callbacks: TplRenderCallbacks,
): void => {
  for (const n of nodes) {
    if (n.type === 'text') {
      callbacks.onText(stack.top, n.value);
    } else if (n.type === 'arg') {
      callbacks.onArg(stack.top, n.name, n.escape);
    } else if (n.type === 'section') {
      tplExecuteSection(n, stack, callbacks);
    }
  }
};

const tplExecuteSection = (
  n: TplSectionInstr,
  stack: TplScopeStack,
  callbacks: TplRenderCallbacks,
): void => {
  const count = callbacks.onSectionTest(stack.top, n.name, n.callable);
  if (!Number.isInteger(count) || count < 0) {
    throw new TplStructuralError('section-test', n.name, `Section "${n.name}" test failed (${count})`);
  }

  if (n.inverted) {
    if (count === 0) tplExecuteNodes(n.children, stack, callbacks);
    return;
  }

  for (let i = 0; i < count; i++) {
    const child = callbacks.onSectionStart(stack.top, n.name, i);
    if (child instanceof TplStructuralError) throw child;
    stack.push(child);
    try {
      tplExecuteNodes(n.children, stack, callbacks);
    } finally {
      stack.pop();
    }
  }
};
