/**
 * ResultAccumulator - collects fragments of one invocation.
 *
 * Fragments are substrings of one continuous stream, so they are joined
 * without a separator. An accumulator is finalized exactly once.
 */

import { EmptyResultError } from '../utils/errors.js';
import type { TextFragment } from './types.js';

export class ResultAccumulator {
  private readonly fragments: TextFragment[] = [];
  private finalized = false;

  /**
   * Add a fragment. Whitespace-only fragments are dropped.
   *
   * @returns whether the fragment was kept
   */
  add(fragment: TextFragment): boolean {
    this.assertOpen();
    if (!fragment.text.trim()) {
      return false;
    }
    this.fragments.push(fragment);
    return true;
  }

  /** Number of non-empty fragments kept so far. */
  get size(): number {
    return this.fragments.length;
  }

  get isFinalized(): boolean {
    return this.finalized;
  }

  /**
   * Join all fragments in event order and trim.
   *
   * @throws EmptyResultError when no text was accumulated
   */
  finalize(): string {
    this.assertOpen();
    this.finalized = true;

    const result = [...this.fragments]
      .sort((a, b) => a.index - b.index)
      .map((fragment) => fragment.text)
      .join('')
      .trim();

    if (!result) {
      throw new EmptyResultError();
    }
    return result;
  }

  private assertOpen(): void {
    if (this.finalized) {
      throw new Error('ResultAccumulator is already finalized');
    }
  }
}
