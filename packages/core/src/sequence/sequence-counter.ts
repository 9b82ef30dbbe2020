/**
 * Sequence counter
 *
 * Source of strictly increasing integers. The value lives in a
 * SharedArrayBuffer and is advanced with Atomics.add, so counters attached to
 * the same buffer from several worker threads never return the same value.
 */

import { ConfigError, SequenceExhaustedError } from '../types/errors';

const MAX = BigInt(Number.MAX_SAFE_INTEGER);

export interface SequenceCounterOptions {
  /** Last value considered handed out; the first draw returns start + 1 */
  start?: number;
  /** Share state with the counter that owns this buffer; excludes `start` */
  buffer?: SharedArrayBuffer;
}

export class SequenceCounter {
  readonly buffer: SharedArrayBuffer;
  private readonly cell: BigInt64Array;

  /**
   * @throws {ConfigError} When `start` is given together with a shared buffer
   */
  constructor(options: SequenceCounterOptions = {}) {
    if (options.buffer) {
      if (options.start !== undefined) {
        throw new ConfigError(
          'start cannot be combined with a shared buffer',
          'start'
        );
      }
      this.buffer = options.buffer;
      this.cell = new BigInt64Array(this.buffer, 0, 1);
      return;
    }
    this.buffer = new SharedArrayBuffer(BigInt64Array.BYTES_PER_ELEMENT);
    this.cell = new BigInt64Array(this.buffer, 0, 1);
    Atomics.store(this.cell, 0, BigInt(options.start ?? 0));
  }

  /**
   * Attach to the buffer of another counter, typically one posted to a
   * worker thread.
   */
  static attach(buffer: SharedArrayBuffer): SequenceCounter {
    return new SequenceCounter({ buffer });
  }

  /** Draw the next value; strictly greater than every earlier draw */
  next(): number {
    const value = Atomics.add(this.cell, 0, 1n) + 1n;
    if (value > MAX) {
      throw new SequenceExhaustedError(value);
    }
    return Number(value);
  }

  /** Last value handed out, without drawing */
  peek(): number {
    return Number(Atomics.load(this.cell, 0));
  }
}
