import { assert } from 'chai';

import {
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
} from '../src/template-value.js';

describe('template values', function () {
  describe('tplFromJs', function () {
    it('converts scalars', function () {
      assert.deepEqual(tplFromJs(null), TPL_NULL);
      assert.deepEqual(tplFromJs(undefined), TPL_NULL);
      assert.deepEqual(tplFromJs(true), TPL_TRUE);
      assert.deepEqual(tplFromJs(false), TPL_FALSE);
      assert.deepEqual(tplFromJs(0), tplNumber(0));
      assert.deepEqual(tplFromJs(''), tplString(''));
      assert.deepEqual(tplFromJs(12n), tplString('12'));
    });

    it('converts callables to true', function () {
      assert.deepEqual(tplFromJs(() => 'x'), TPL_TRUE);
    });

    it('converts dates to ISO strings and invalid dates to null', function () {
      assert.deepEqual(tplFromJs(new Date(Date.UTC(2024, 0, 2, 3, 4, 5))), tplString('2024-01-02T03:04:05.000Z'));
      assert.deepEqual(tplFromJs(new Date('nope')), TPL_NULL);
    });

    it('converts nested objects and arrays', function () {
      const v = tplFromJs({ a: [ 1, 'x' ], b: { c: null } });
      assert.deepEqual(v, tplMap({
        a: tplArray([ tplNumber(1), tplString('x') ]),
        b: tplMap({ c: TPL_NULL }),
      }));
    });

    it('converts holes of sparse arrays to null', function () {
      // eslint-disable-next-line no-sparse-arrays
      assert.deepEqual(tplFromJs([ 'a', , 'c' ]), tplArray([ tplString('a'), TPL_NULL, tplString('c') ]));
      assert.deepEqual(tplFromJs(new Array(2)), tplArray([ TPL_NULL, TPL_NULL ]));
    });

    it('converts sets, typed arrays and other iterables to arrays', function () {
      assert.deepEqual(tplFromJs(new Set([ 'x', 'y' ])), tplArray([ tplString('x'), tplString('y') ]));
      assert.deepEqual(tplFromJs(new Uint8Array([ 1, 2 ])), tplArray([ tplNumber(1), tplNumber(2) ]));
      assert.deepEqual(tplFromJs(new BigInt64Array([ 5n ])), tplArray([ tplString('5') ]));
      const gen = function * (): Generator<number> {
        yield 1;
      };
      assert.deepEqual(tplFromJs({ g: gen() }), tplMap({ g: tplArray([ tplNumber(1) ]) }));
    });

    it('converts Map instances using string keys only', function () {
      const v = tplFromJs(new Map<unknown, unknown>([ [ 'a', 1 ], [ 2, 'skip' ] ]));
      assert.deepEqual(v, tplMap({ a: tplNumber(1) }));
    });

    it('does not execute getters', function () {
      let called = false;
      const data = {
        plain: 'ok',
        get secret (): string {
          called = true;
          return 'leak';
        },
      };
      const v = tplFromJs(data);
      assert.isFalse(called);
      assert.isUndefined(tplLookupKey(v, 'secret'));
      assert.deepEqual(tplLookupKey(v, 'plain'), tplString('ok'));
    });

    it('ignores inherited properties', function () {
      const proto = { inherited: 'x' };
      const data: Record<string, unknown> = Object.create(proto);
      data.own = 'y';
      const v = tplFromJs(data);
      assert.isUndefined(tplLookupKey(v, 'inherited'));
      assert.deepEqual(tplLookupKey(v, 'own'), tplString('y'));
    });

    it('rejects reference cycles', function () {
      const data: Record<string, unknown> = { a: 1 };
      data.self = data;
      assert.throws(() => tplFromJs(data), TypeError, 'Circular reference in template data');
    });

    it('accepts shared sub-objects', function () {
      const shared = { v: 1 };
      const v = tplFromJs({ a: shared, b: shared });
      assert.deepEqual(tplLookupKey(v, 'a'), tplLookupKey(v, 'b'));
    });
  });

  describe('tplLookupKey', function () {
    it('finds keys in maps only', function () {
      const m = tplMap({ k: tplNumber(1), '': tplString('empty') });
      assert.deepEqual(tplLookupKey(m, 'k'), tplNumber(1));
      assert.deepEqual(tplLookupKey(m, ''), tplString('empty'));
      assert.isUndefined(tplLookupKey(m, 'missing'));
    });

    it('answers not found for every other variant', function () {
      const others = [ TPL_NULL, TPL_FALSE, TPL_TRUE, tplNumber(1), tplString('length'), tplArray([ tplNumber(1) ]) ];
      for (const v of others) {
        assert.isUndefined(tplLookupKey(v, 'length'));
        assert.isUndefined(tplLookupKey(v, '0'));
      }
    });
  });

  describe('tplToText', function () {
    it('null and false have an empty text form', function () {
      assert.strictEqual(tplToText(TPL_NULL), '');
      assert.strictEqual(tplToText(TPL_FALSE), '');
    });

    it('scalars', function () {
      assert.strictEqual(tplToText(TPL_TRUE), 'true');
      assert.strictEqual(tplToText(tplNumber(0)), '0');
      assert.strictEqual(tplToText(tplNumber(1.5)), '1.5');
      assert.strictEqual(tplToText(tplString('a b')), 'a b');
    });

    it('arrays and maps as JSON', function () {
      assert.strictEqual(tplToText(tplArray([ tplNumber(1), tplString('x') ])), '[1,"x"]');
      assert.strictEqual(tplToText(tplMap({ a: TPL_NULL, b: TPL_TRUE })), '{"a":null,"b":true}');
    });
  });

  describe('tplToJs', function () {
    it('converts back to plain data', function () {
      const data = { a: [ 1, 'x', true, false, null ], b: { c: 'd' } };
      assert.deepEqual(tplToJs(tplFromJs(data)), data);
      assert.strictEqual(tplToJson(tplFromJs(data)), '{"a":[1,"x",true,false,null],"b":{"c":"d"}}');
    });
  });
});
