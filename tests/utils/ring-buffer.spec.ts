import { describe, expect, it } from 'vitest';
import { RingBuffer } from '../../src/utils/ring-buffer.js';

describe('RingBuffer', () => {
  it('rejects a non-positive capacity', () => {
    expect(() => new RingBuffer<number>(0)).toThrowError(RangeError);
    expect(() => new RingBuffer<number>(1.5)).toThrowError(RangeError);
  });

  it('overwrites the oldest item once full', () => {
    const buffer = new RingBuffer<number>(3);

    expect(buffer.push(1)).toBeUndefined();
    buffer.push(2);
    buffer.push(3);
    expect(buffer.push(4)).toBe(1);
    expect(buffer.push(5)).toBe(2);

    expect(buffer.toArray()).toEqual([3, 4, 5]);
    expect(buffer.size).toBe(3);
  });

  it('returns the most recent items oldest first', () => {
    const buffer = new RingBuffer<string>(5);
    for (const item of ['a', 'b', 'c', 'd']) buffer.push(item);

    expect(buffer.recent(2)).toEqual(['c', 'd']);
    expect(buffer.recent(10)).toEqual(['a', 'b', 'c', 'd']);
    expect(buffer.recent(0)).toEqual([]);
  });

  it('starts over after clear', () => {
    const buffer = new RingBuffer<number>(2);
    buffer.push(1);
    buffer.push(2);
    buffer.push(3);
    buffer.clear();
    buffer.push(9);

    expect(buffer.toArray()).toEqual([9]);
    expect(buffer.capacity).toBe(2);
  });
});
