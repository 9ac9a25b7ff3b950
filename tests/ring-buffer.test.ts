import { describe, it, expect } from 'vitest';
import { RingBuffer } from '../src/utils/ring-buffer.js';

describe('RingBuffer', () => {
  it('should reject non-positive or fractional capacity', () => {
    expect(() => new RingBuffer<number>(0)).toThrow(RangeError);
    expect(() => new RingBuffer<number>(-1)).toThrow(RangeError);
    expect(() => new RingBuffer<number>(2.5)).toThrow(RangeError);
  });

  it('should keep insertion order below capacity', () => {
    const buffer = new RingBuffer<number>(3);
    expect(buffer.push(1)).toBeUndefined();
    expect(buffer.push(2)).toBeUndefined();

    expect(buffer.size).toBe(2);
    expect(buffer.toArray()).toEqual([1, 2]);
  });

  it('should evict the oldest item when full', () => {
    const buffer = new RingBuffer<number>(3);
    [1, 2, 3].forEach(n => buffer.push(n));

    expect(buffer.push(4)).toBe(1);
    expect(buffer.push(5)).toBe(2);
    expect(buffer.toArray()).toEqual([3, 4, 5]);
    expect(buffer.size).toBe(3);
  });

  it('should index from the oldest item across wraparound', () => {
    const buffer = new RingBuffer<string>(2);
    ['a', 'b', 'c'].forEach(s => buffer.push(s));

    expect(buffer.at(0)).toBe('b');
    expect(buffer.at(1)).toBe('c');
    expect(buffer.at(2)).toBeUndefined();
    expect(buffer.at(-1)).toBeUndefined();
  });

  it('should retain matching items in order and return the removed ones', () => {
    const buffer = new RingBuffer<number>(4);
    [1, 2, 3, 4, 5, 6].forEach(n => buffer.push(n));

    const removed = buffer.retain(n => n % 2 === 0);

    expect(removed).toEqual([3, 5]);
    expect(buffer.toArray()).toEqual([4, 6]);

    buffer.push(7);
    buffer.push(8);
    expect(buffer.toArray()).toEqual([4, 6, 7, 8]);
    expect(buffer.push(9)).toBe(4);
  });

  it('should clear all items', () => {
    const buffer = new RingBuffer<number>(2);
    buffer.push(1);
    buffer.clear();

    expect(buffer.size).toBe(0);
    expect([...buffer]).toEqual([]);
  });
});
