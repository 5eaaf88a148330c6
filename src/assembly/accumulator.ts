import { approximateSize } from './size.js';

/**
 * Ordered item buffer bounded by an item count and an approximate byte size.
 *
 * The first item is always admitted, so a resumed assembly makes progress
 * even when a single item exceeds `maxBytes`.
 */
export class ResultAccumulator<T> {
  readonly items: T[] = [];
  private bytes = 0;

  constructor(
    private readonly maxItems: number,
    private readonly maxBytes: number = Number.POSITIVE_INFINITY
  ) {}

  get bytesSoFar(): number {
    return this.bytes;
  }

  get isFull(): boolean {
    return this.items.length >= this.maxItems;
  }

  /**
   * Append `item` unless a cap would be exceeded.
   */
  admit(item: T): boolean {
    if (this.isFull) return false;

    const size = approximateSize(item);
    if (this.items.length > 0 && this.bytes + size > this.maxBytes) return false;

    this.items.push(item);
    this.bytes += size;
    return true;
  }
}
