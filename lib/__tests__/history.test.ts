import { describe, it, expect } from 'vitest';
import { HistoryBuffer, HISTORY_CAPACITY } from '../telemetry/history';

describe('HistoryBuffer', () => {
  it('should default to 30 entries', () => {
    expect(HISTORY_CAPACITY).toBe(30);
    expect(new HistoryBuffer<number>().capacity).toBe(30);
  });

  it('should keep entries oldest first', () => {
    const buffer = new HistoryBuffer<number>(3);
    buffer.push(1);
    buffer.push(2);

    expect(buffer.toArray()).toEqual([1, 2]);
    expect(buffer.length).toBe(2);
    expect(buffer.last()).toBe(2);
  });

  it('should drop the oldest entry when full', () => {
    const buffer = new HistoryBuffer<number>(3);
    for (const value of [1, 2, 3, 4]) buffer.push(value);

    expect(buffer.toArray()).toEqual([2, 3, 4]);
    expect(buffer.length).toBe(3);
  });

  it('should never grow past capacity', () => {
    const buffer = new HistoryBuffer<number>();
    for (let i = 0; i < 35; i++) buffer.push(i);

    const entries = buffer.toArray();
    expect(entries).toHaveLength(30);
    expect(entries[0]).toBe(5);
    expect(buffer.last()).toBe(34);
  });

  it('should empty on clear', () => {
    const buffer = new HistoryBuffer<string>(2);
    buffer.push('a');
    buffer.push('b');
    buffer.push('c');
    buffer.clear();

    expect(buffer.length).toBe(0);
    expect(buffer.last()).toBeUndefined();
    expect(buffer.toArray()).toEqual([]);

    buffer.push('d');
    expect(buffer.toArray()).toEqual(['d']);
  });

  it('should reject a capacity that is not a positive integer', () => {
    expect(() => new HistoryBuffer(0)).toThrow(RangeError);
    expect(() => new HistoryBuffer(2.5)).toThrow(RangeError);
  });
});
