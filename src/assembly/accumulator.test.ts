import { describe, it, expect } from 'vitest';
import { ResultAccumulator } from './accumulator.js';
import { approximateSize } from './size.js';

describe('approximateSize', () => {
  it('counts UTF-8 bytes of the JSON form', () => {
    expect(approximateSize(['a', null])).toBe(10);
    expect(approximateSize('é')).toBe(4);
    expect(approximateSize(undefined)).toBe(0);
  });
});

describe('ResultAccumulator', () => {
  it('admits items up to maxItems', () => {
    const acc = new ResultAccumulator<number>(2);

    expect(acc.admit(1)).toBe(true);
    expect(acc.admit(2)).toBe(true);
    expect(acc.isFull).toBe(true);
    expect(acc.admit(3)).toBe(false);
    expect(acc.items).toEqual([1, 2]);
  });

  it('refuses an item that would exceed maxBytes', () => {
    const acc = new ResultAccumulator<string>(10, 8);

    expect(acc.admit('ab')).toBe(true);
    expect(acc.admit('cd')).toBe(true);
    expect(acc.admit('ef')).toBe(false);
    expect(acc.bytesSoFar).toBe(8);
    expect(acc.isFull).toBe(false);
  });

  it('always admits the first item', () => {
    const acc = new ResultAccumulator<string>(10, 1);

    expect(acc.admit('much larger than one byte')).toBe(true);
    expect(acc.admit('x')).toBe(false);
  });
});
