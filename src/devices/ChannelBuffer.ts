/**
 * Fixed-capacity sample buffer; the oldest samples fall off the front.
 */
export class ChannelBuffer {
  private samples: number[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Buffer capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.samples.length;
  }

  push(values: readonly number[]): void {
    const combined = this.samples.concat(values);
    this.samples = combined.length > this.capacity ? combined.slice(combined.length - this.capacity) : combined;
  }

  values(): number[] {
    return [...this.samples];
  }
}
