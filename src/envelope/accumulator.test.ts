/**
 * Tests for ResultAccumulator (src/envelope/accumulator.ts)
 */

import { describe, it, expect } from 'vitest';
import { ResultAccumulator } from './accumulator.js';
import { EmptyResultError } from '../utils/errors.js';

describe('ResultAccumulator', () => {
  it('should join fragments without a separator', () => {
    const accumulator = new ResultAccumulator();
    accumulator.add({ text: 'Hello ', index: 0 });
    accumulator.add({ text: 'world', index: 1 });

    expect(accumulator.finalize()).toBe('Hello world');
  });

  it('should order fragments by event index', () => {
    const accumulator = new ResultAccumulator();
    accumulator.add({ text: 'b', index: 3 });
    accumulator.add({ text: 'a', index: 1 });

    expect(accumulator.finalize()).toBe('ab');
  });

  it('should trim the final result', () => {
    const accumulator = new ResultAccumulator();
    accumulator.add({ text: '  x  ', index: 0 });

    expect(accumulator.finalize()).toBe('x');
  });

  it('should drop whitespace-only fragments', () => {
    const accumulator = new ResultAccumulator();

    expect(accumulator.add({ text: ' \n\t', index: 0 })).toBe(false);
    expect(accumulator.add({ text: 'kept', index: 1 })).toBe(true);
    expect(accumulator.size).toBe(1);
  });

  it('should fail with EmptyResultError when nothing was added', () => {
    const accumulator = new ResultAccumulator();

    expect(() => accumulator.finalize()).toThrow(EmptyResultError);
  });

  it('should fail with EmptyResultError when only blank fragments arrived', () => {
    const accumulator = new ResultAccumulator();
    accumulator.add({ text: '   ', index: 0 });

    expect(() => accumulator.finalize()).toThrow('No content received from agent');
  });

  it('should finalize only once', () => {
    const accumulator = new ResultAccumulator();
    accumulator.add({ text: 'done', index: 0 });
    accumulator.finalize();

    expect(accumulator.isFinalized).toBe(true);
    expect(() => accumulator.finalize()).toThrow('ResultAccumulator is already finalized');
    expect(() => accumulator.add({ text: 'late', index: 1 })).toThrow('ResultAccumulator is already finalized');
  });
});
