import { assert } from 'chai';

import {
  TplStructuralError,
} from '../src/errors.js';

import {
  tplCreateRenderCallbacks,
} from '../src/template-callbacks.js';

import {
  TplScopeStack,
} from '../src/template-scope.js';

import {
  TplStringSink,
} from '../src/template-sink.js';

import {
  tplFromJs,
  tplString,
} from '../src/template-value.js';

describe('render callbacks', function () {
  const data = tplFromJs({
    name: '<b>',
    empty: '',
    zero: 0,
    nothing: null,
    no: false,
    yes: true,
    list: [ 1, 2 ],
  });

  function setup (): { sink: TplStringSink; callbacks: ReturnType<typeof tplCreateRenderCallbacks>; stack: TplScopeStack } {
    const sink = new TplStringSink();
    const callbacks = tplCreateRenderCallbacks({ sink, escape: (s) => `[${s}]` });
    return { sink, callbacks, stack: new TplScopeStack(data) };
  }

  it('onText writes verbatim', function () {
    const { sink, callbacks, stack } = setup();
    callbacks.onText(stack.top, '<p>{{ x }}</p>');
    assert.strictEqual(sink.toString(), '<p>{{ x }}</p>');
  });

  it('onArg escapes only when requested', function () {
    const { sink, callbacks, stack } = setup();
    callbacks.onArg(stack.top, 'name', true);
    callbacks.onArg(stack.top, 'name', false);
    assert.strictEqual(sink.toString(), '[<b>]<b>');
  });

  it('onArg writes nothing for missing values and empty text', function () {
    const { sink, callbacks, stack } = setup();
    for (const name of [ 'missing', 'empty', 'nothing', 'no', 'name.x' ]) {
      callbacks.onArg(stack.top, name, true);
    }
    assert.strictEqual(sink.length, 0);
    assert.strictEqual(sink.toString(), '');
  });

  it('onArg writes the text form of present values', function () {
    const { sink, callbacks, stack } = setup();
    callbacks.onArg(stack.top, 'zero', false);
    callbacks.onArg(stack.top, 'yes', false);
    callbacks.onArg(stack.top, 'list', false);
    assert.strictEqual(sink.toString(), '0true[1,2]');
  });

  it('onArg resolves through the scope chain', function () {
    const { sink, callbacks, stack } = setup();
    stack.push(tplFromJs({ name: 'inner' }));
    callbacks.onArg(stack.top, 'name', false);
    callbacks.onArg(stack.top, 'zero', false);
    assert.strictEqual(sink.toString(), 'inner0');
  });

  it('section callbacks use the section policy', function () {
    const { callbacks, stack } = setup();
    assert.strictEqual(callbacks.onSectionTest(stack.top, 'list', false), 2);
    assert.deepEqual(callbacks.onSectionStart(stack.top, 'name', 3), tplString('<b>'));
  });

  it('onError does not throw', function () {
    const { sink, callbacks } = setup();
    assert.doesNotThrow(() => callbacks.onError(new TplStructuralError('section-missing', 'x', 'boom')));
    assert.strictEqual(sink.toString(), '');
  });
});
