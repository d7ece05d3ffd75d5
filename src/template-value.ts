import type {
  TplArrayValue,
  TplFalseValue,
  TplMapValue,
  TplNullValue,
  TplNumberValue,
  TplStringValue,
  TplTrueValue,
  TplValue,
} from './types.js';

/** Shared null value. */
export const TPL_NULL: TplNullValue = { kind: 'null' };

/** Shared false value. */
export const TPL_FALSE: TplFalseValue = { kind: 'false' };

/** Shared true value. */
export const TPL_TRUE: TplTrueValue = { kind: 'true' };

export const tplNumber = (value: number): TplNumberValue => ({ kind: 'number', value });

export const tplString = (value: string): TplStringValue => ({ kind: 'string', value });

export const tplArray = (items: readonly TplValue[]): TplArrayValue => ({ kind: 'array', items });

export const tplMap = (entries: Record<string, TplValue>): TplMapValue => ({ kind: 'map', entries: new Map(Object.entries(entries)) });

/**
 * Exhaustiveness guard for `switch` statements over value kinds.
 *
 * @param v - Value that should have been handled by all cases.
 */
export const tplAssertNever = (v: never): never => {
  throw new TypeError(`Unknown template value: ${JSON.stringify(v)}`);
};

/**
 * Look up a key in a value. Only maps answer lookups; every other variant
 * reports the key as missing.
 *
 * @param value - Value to look into.
 * @param key - Exact key.
 * @returns The bound value or undefined.
 */
export const tplLookupKey = (value: TplValue, key: string): TplValue | undefined => {
  switch (value.kind) {
    case 'map':
      return value.entries.get(key);
    case 'null':
    case 'false':
    case 'true':
    case 'number':
    case 'string':
    case 'array':
      return undefined;
    default:
      return tplAssertNever(value);
  }
};

/**
 * Convert a plain JavaScript value to a template value.
 *
 * Security: only own enumerable data properties are read. Accessors (getters)
 * are skipped and never executed.
 *
 * - `null`/`undefined`/symbols -> null
 * - functions -> true (lambdas are not supported)
 * - bigint -> decimal string
 * - `Date` -> ISO string (null for invalid dates)
 * - arrays -> array; holes of sparse arrays become null
 * - `Map` -> map over its string keys
 * - `Set`, typed arrays and other iterables -> array of their values
 *
 * @param input - Plain data, may be nested.
 * @returns Template value tree.
 * @throws TypeError if the data contains a reference cycle.
 */
export const tplFromJs = (input: unknown): TplValue => {
  return tplConvert(input, new WeakSet<object>());
};

const tplIsIterable = (v: object): v is Iterable<unknown> => typeof Reflect.get(v, Symbol.iterator) === 'function';

const tplConvert = (input: unknown, seen: WeakSet<object>): TplValue => {
  if (input === undefined || input === null) return TPL_NULL;
  if (typeof input === 'boolean') return input ? TPL_TRUE : TPL_FALSE;
  if (typeof input === 'number') return tplNumber(input);
  if (typeof input === 'bigint') return tplString(input.toString());
  if (typeof input === 'string') return tplString(input);
  if (typeof input === 'function') return TPL_TRUE;
  if (typeof input !== 'object') return TPL_NULL;

  if (input instanceof Date) {
    return Number.isNaN(input.getTime()) ? TPL_NULL : tplString(input.toISOString());
  }

  if (seen.has(input)) {
    throw new TypeError('Circular reference in template data');
  }
  seen.add(input);
  try {
    if (Array.isArray(input)) {
      const items: unknown[] = input;
      return tplArray(Array.from(items, (item) => tplConvert(item, seen)));
    }

    const entries = new Map<string, TplValue>();
    if (input instanceof Map) {
      const source: Map<unknown, unknown> = input;
      for (const [ k, v ] of source) {
        if (typeof k === 'string') entries.set(k, tplConvert(v, seen));
      }
      return { kind: 'map', entries };
    }

    if (tplIsIterable(input)) {
      return tplArray(Array.from(input, (item) => tplConvert(item, seen)));
    }

    for (const k of Object.keys(input)) {
      const desc = Object.getOwnPropertyDescriptor(input, k);
      if (!desc) continue;
      // Do not execute accessors (getters) while converting.
      if (typeof desc.get === 'function' || typeof desc.set === 'function') continue;
      const v: unknown = desc.value;
      entries.set(k, tplConvert(v, seen));
    }
    return { kind: 'map', entries };
  } finally {
    // only cycles are rejected, shared sub-objects are fine
    seen.delete(input);
  }
};

/**
 * Convert a template value back to plain JavaScript data.
 *
 * @param value - Template value.
 * @returns Plain data, maps become plain objects.
 */
export const tplToJs = (value: TplValue): unknown => {
  switch (value.kind) {
    case 'null': return null;
    case 'false': return false;
    case 'true': return true;
    case 'number':
    case 'string':
      return value.value;
    case 'array': return value.items.map(tplToJs);
    case 'map': return Object.fromEntries([ ...value.entries ].map(([ k, v ]) => [ k, tplToJs(v) ]));
    default: return tplAssertNever(value);
  }
};

/**
 * JSON text of a template value.
 *
 * @param value - Template value.
 * @returns JSON string.
 */
export function tplToJson (value: TplValue): string {
  return JSON.stringify(tplToJs(value)) ?? '';
}

/**
 * Text form used for interpolation.
 *
 * Null and false have an empty text form, so they emit nothing.
 * Arrays and maps are written as JSON.
 *
 * @param value - Template value.
 * @returns Text representation.
 */
export const tplToText = (value: TplValue): string => {
  switch (value.kind) {
    case 'null':
    case 'false':
      return '';
    case 'true': return 'true';
    case 'number': return String(value.value);
    case 'string': return value.value;
    case 'array':
    case 'map':
      return tplToJson(value);
    default: return tplAssertNever(value);
  }
};
