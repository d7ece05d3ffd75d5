import type {
  TplStructuralError,
} from './errors.js';

/**
 * Null value: absent for sections and interpolation.
 */
export interface TplNullValue {
  kind: 'null';
}

export interface TplFalseValue {
  kind: 'false';
}

/**
 * True value: present and truthy, but not iterable.
 */
export interface TplTrueValue {
  kind: 'true';
}

export interface TplNumberValue {
  kind: 'number';
  value: number;
}

export interface TplStringValue {
  kind: 'string';
  value: string;
}

/**
 * Ordered sequence of values. Its length drives the repetition count of a section.
 */
export interface TplArrayValue {
  kind: 'array';
  items: readonly TplValue[];
}

/**
 * String-keyed map. The only variant that answers key lookups.
 */
export interface TplMapValue {
  kind: 'map';
  entries: ReadonlyMap<string, TplValue>;
}

/** Union of all document value variants. */
export type TplValue =
  | TplNullValue
  | TplFalseValue
  | TplTrueValue
  | TplNumberValue
  | TplStringValue
  | TplArrayValue
  | TplMapValue;

/**
 * One level of the scope chain: the value in context at this nesting depth and
 * a link to the enclosing frame (`null` at the root).
 *
 * Frames only reference the caller's value tree, they never copy it.
 */
export interface TplScopeFrame {
  readonly context: TplValue;
  readonly parent: TplScopeFrame | null;
}

/**
 * Plain text instruction: emitted verbatim.
 */
export interface TplTextInstr {
  type: 'text';
  value: string;
}

/**
 * Interpolation instruction.
 * - name: Identifier or dot-path (e.g. "user.name").
 * - escape: pass the text through the escaper (default) or insert it as-is.
 */
export interface TplArgInstr {
  type: 'arg';
  name: string;
  escape: boolean;
}

/**
 * Section instruction.
 * - inverted: render the children once when the section value is falsy.
 * - callable: set by parsers that keep the raw section text for lambdas. Lambdas
 *   are not supported, so the flag never changes the outcome.
 */
export interface TplSectionInstr {
  type: 'section';
  name: string;
  inverted: boolean;
  callable: boolean;
  children: TplInstruction[];
}

/** Union of all instruction types. */
export type TplInstruction = TplTextInstr | TplArgInstr | TplSectionInstr;

/**
 * Escaping gate applied to interpolated text.
 */
export type TplEscapeFn = (text: string) => string;

/**
 * Append-only text accumulator owned by the caller.
 */
export interface TplSink {
  write: (text: string) => void;
}

/**
 * Callbacks driven by the instruction executor. Each receives the frame on top
 * of the scope stack.
 */
export interface TplRenderCallbacks {
  /** Plain template text. */
  onText: (frame: TplScopeFrame, text: string) => void;
  /** Interpolation tag. */
  onArg: (frame: TplScopeFrame, name: string, escape: boolean) => void;
  /**
   * Section open, before entering: number of repetitions, `0` to skip, or
   * `TPL_SECTION_ERROR` to abort.
   */
  onSectionTest: (frame: TplScopeFrame, name: string, callable: boolean) => number;
  /** Once per repetition: the context for the section body. */
  onSectionStart: (frame: TplScopeFrame, name: string, index: number) => TplValue | TplStructuralError;
  /** Unrecoverable failure. Must not throw. */
  onError: (context: TplStructuralError) => void;
}

/**
 * Per-render options.
 */
export interface TplRenderOptions {
  /** Escaper for escaped interpolations. Defaults to `refs.escape`. */
  escape?: TplEscapeFn;
}
