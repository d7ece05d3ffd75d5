/*!
 * scopestache
 *
 * Scope-chain variable resolution and section expansion for logic-less
 * templates, with zero dependencies.
 *
 * Copyright (c) 2025-2026 cryeffect Media Group <https://crymg.de>, Peter Müller
 * Licensed under the MIT License.
 */

import type {
  TplInstruction,
  TplRenderOptions,
  TplSink,
  TplValue,
} from './types.js';

import {
  refs,
} from './refs.js';

import {
  tplCreateRenderCallbacks,
} from './template-callbacks.js';

import {
  tplExecute,
} from './template-executor.js';

import {
  TplScopeStack,
} from './template-scope.js';

import {
  TplStringSink,
} from './template-sink.js';

import {
  tplFromJs,
} from './template-value.js';

// re-export some functions
export type * from './types.js';

export {
  TplStructuralError,
} from './errors.js';

export type {
  TplStructuralErrorCode,
} from './errors.js';

export {
  escapeHtml,
  escapeHtmlNumeric,
} from './html-utils.js';

export {
  setTemplateEscapeReference,
} from './refs.js';

export {
  tplArg,
  tplInvertedSection,
  tplRawArg,
  tplSection,
  tplText,
} from './template-builder.js';

export {
  tplCreateRenderCallbacks,
} from './template-callbacks.js';

export {
  tplExecute,
} from './template-executor.js';

export {
  tplChainWalk,
  tplDescend,
  tplResolve,
  tplSplitName,
} from './template-resolve.js';

export {
  TplScopeStack,
  tplParentOf,
} from './template-scope.js';

export {
  TPL_SECTION_ERROR,
  tplSectionCount,
  tplSectionEnter,
  tplSectionTest,
} from './template-section.js';

export {
  TplStringSink,
} from './template-sink.js';

export {
  TPL_FALSE,
  TPL_NULL,
  TPL_TRUE,
  tplArray,
  tplFromJs,
  tplLookupKey,
  tplMap,
  tplNumber,
  tplString,
  tplToJs,
  tplToJson,
  tplToText,
} from './template-value.js';

/**
 * Render a compiled template into a caller-owned sink, appending to whatever
 * the sink already holds.
 *
 * On a structural error the error is thrown and the output written so far
 * stays in the sink.
 *
 * @param sink - Output sink.
 * @param template - Instruction list.
 * @param root - Document value for the root scope.
 * @param options - Render options.
 * @returns The sink.
 */
export function renderTemplateInto<S extends TplSink> (
  sink: S,
  template: readonly TplInstruction[],
  root: TplValue,
  options: TplRenderOptions = {},
): S {
  if (!Array.isArray(template)) {
    throw new TypeError('Template must be an instruction array');
  }
  const callbacks = tplCreateRenderCallbacks({ sink, escape: options.escape ?? refs.escape });
  tplExecute(template, new TplScopeStack(root), callbacks);
  return sink;
}

/**
 * Render a compiled template using the provided data as the root scope.
 *
 * @param template - Instruction list.
 * @param data - Plain data for the root scope. May be nested.
 * @param options - Render options.
 * @returns Rendered string.
 */
export function renderTemplate (template: readonly TplInstruction[], data: unknown, options: TplRenderOptions = {}): string {
  return renderTemplateInto(new TplStringSink(), template, tplFromJs(data), options).toString();
}
