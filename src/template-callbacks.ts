import type {
  TplEscapeFn,
  TplRenderCallbacks,
  TplSink,
} from './types.js';

import {
  tplResolve,
} from './template-resolve.js';

import {
  tplSectionEnter,
  tplSectionTest,
} from './template-section.js';

import {
  tplToText,
} from './template-value.js';

/**
 * Output binding of one render.
 */
export interface TplRenderTarget {
  /** Caller-owned sink receiving all output. */
  sink: TplSink;
  /** Escaper for escaped interpolations. */
  escape: TplEscapeFn;
}

/**
 * Create the callbacks for one render, bound to a single sink and escaper.
 *
 * - text: written verbatim
 * - interpolations: resolved via the scope chain; missing values and values
 *   with an empty text form write nothing
 * - sections: counted and entered with the section policy
 *
 * @param target - Sink and escaper of the render.
 * @returns Callback set for the instruction executor.
 */
export const tplCreateRenderCallbacks = (target: TplRenderTarget): TplRenderCallbacks => {
  const { sink, escape } = target;
  return {
    onText: (_frame, text) => {
      sink.write(text);
    },
    onArg: (frame, name, escaped) => {
      const value = tplResolve(frame, name);
      if (value === undefined) return;
      const str = tplToText(value);
      if (str.length === 0) return;
      sink.write(escaped ? escape(str) : str);
    },
    onSectionTest: tplSectionTest,
    onSectionStart: tplSectionEnter,
    onError: (_error) => {
      // frames hold no resources, nothing to release
    },
  };
};
