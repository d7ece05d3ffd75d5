import type {
  TplArgInstr,
  TplInstruction,
  TplSectionInstr,
  TplTextInstr,
} from './types.js';

export const tplText = (value: string): TplTextInstr => ({ type: 'text', value });

/**
 * Escaped interpolation of an identifier or dot-path.
 */
export const tplArg = (name: string): TplArgInstr => ({ type: 'arg', name, escape: true });

/**
 * Raw interpolation (use with caution).
 */
export const tplRawArg = (name: string): TplArgInstr => ({ type: 'arg', name, escape: false });

/**
 * Section repeating its children once per array element, or once for any other
 * truthy value.
 *
 * @param name - Identifier or dot-path of the section value.
 * @param children - Section body.
 * @param opts - `callable` marks sections a parser kept raw text for.
 * @returns Section instruction.
 */
export const tplSection = (
  name: string,
  children: TplInstruction[],
  opts: { callable?: boolean } = {},
): TplSectionInstr => ({
  type: 'section',
  name,
  inverted: false,
  callable: opts.callable ?? false,
  children,
});

/**
 * Section rendered once when its value is missing, falsy or an empty array.
 */
export const tplInvertedSection = (name: string, children: TplInstruction[]): TplSectionInstr => ({
  type: 'section',
  name,
  inverted: true,
  callable: false,
  children,
});
