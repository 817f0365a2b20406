import { describe, expect, it } from 'vitest';
import { ChannelBuffer } from './ChannelBuffer.js';

describe('ChannelBuffer', () => {
  it('keeps only the newest samples up to capacity', () => {
    const buffer = new ChannelBuffer(4);
    buffer.push([1, 2, 3]);
    buffer.push([4, 5]);

    expect(buffer.values()).toEqual([2, 3, 4, 5]);
    expect(buffer.size).toBe(4);
  });

  it('keeps the tail of a single oversized push', () => {
    const buffer = new ChannelBuffer(2);
    buffer.push([1, 2, 3, 4]);
    expect(buffer.values()).toEqual([3, 4]);
  });

  it('returns a copy', () => {
    const buffer = new ChannelBuffer(3);
    buffer.push([1]);
    buffer.values().push(99);
    expect(buffer.values()).toEqual([1]);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new ChannelBuffer(0)).toThrow(RangeError);
  });
});
