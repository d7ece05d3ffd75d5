import type {
  TplScopeFrame,
  TplValue,
} from './types.js';

/**
 * Parent of a scope frame.
 *
 * @param frame - Scope frame.
 * @returns The enclosing frame, or null for the root frame.
 */
export const tplParentOf = (frame: TplScopeFrame): TplScopeFrame | null => frame.parent;

/**
 * Chain of scope frames for one render, one frame per open section on top of
 * the root frame holding the document.
 *
 * Frames are created once and never changed. Not shared between renders.
 */
export class TplScopeStack {
  private current: TplScopeFrame;
  private size: number;

  /**
   * @param root - Document value; becomes the root frame's context.
   */
  constructor (root: TplValue) {
    this.current = { context: root, parent: null };
    this.size = 1;
  }

  /** Innermost frame. */
  get top (): TplScopeFrame {
    return this.current;
  }

  /** Number of frames, root included. */
  get depth (): number {
    return this.size;
  }

  /**
   * Open a nested scope.
   *
   * @param context - Value in context for the new frame.
   * @returns The new top frame.
   */
  push (context: TplValue): TplScopeFrame {
    const frame: TplScopeFrame = { context, parent: this.current };
    this.current = frame;
    this.size++;
    return frame;
  }

  /**
   * Close the innermost scope.
   *
   * @returns The removed frame.
   * @throws TypeError when only the root frame is left.
   */
  pop (): TplScopeFrame {
    const frame = this.current;
    if (frame.parent === null) {
      throw new TypeError('Cannot pop the root scope frame');
    }
    this.current = frame.parent;
    this.size--;
    return frame;
  }
}
