import type { Readable } from 'node:stream';

import { IncompleteReadError, toError } from '../errors.js';

const NEWLINE = 0x0a;
// Pause the source once this much unread data has piled up.
const HIGH_WATER_MARK = 1024 * 1024;
const EMPTY = Buffer.alloc(0);

export const abortReason = (signal: AbortSignal): Error =>
  signal.reason instanceof Error
    ? signal.reason
    : new Error('Operation aborted');

/**
 * Pull-style reader over a Node stream. Each read suspends until enough
 * bytes are buffered, the stream ends, or the signal aborts the wait.
 * Intended for a single consumer.
 */
export class ByteReader {
  private buffer: Buffer = EMPTY;
  private ended = false;
  private failure: Error | null = null;
  // Bytes the pending read needs buffered before it can complete.
  private demand = 0;
  private readonly waiters = new Set<() => void>();

  public constructor(private readonly stream: Readable) {
    stream.on('data', (chunk: Buffer | string) => {
      const bytes = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
      this.buffer =
        this.buffer.length === 0 ? bytes : Buffer.concat([this.buffer, bytes]);
      if (this.buffer.length >= Math.max(HIGH_WATER_MARK, this.demand)) {
        stream.pause();
      }
      this.wake();
    });
    stream.on('end', () => {
      this.ended = true;
      this.wake();
    });
    stream.on('close', () => {
      this.ended = true;
      this.wake();
    });
    stream.on('error', (error: unknown) => {
      this.failure = toError(error);
      this.wake();
    });
  }

  /**
   * Reads through the next `\n`, terminator included. At end of stream the
   * remaining partial line is returned, then an empty buffer.
   */
  public async readLine(signal?: AbortSignal): Promise<Buffer> {
    while (true) {
      const newlineIndex = this.buffer.indexOf(NEWLINE);
      if (newlineIndex >= 0) {
        return this.take(newlineIndex + 1);
      }
      if (this.failure) {
        throw this.failure;
      }
      if (this.ended) {
        return this.take(this.buffer.length);
      }
      // A line has no known length, so keep the source flowing until it ends.
      await this.waitForData(Number.POSITIVE_INFINITY, signal);
    }
  }

  /** Reads exactly `size` bytes or fails with {@link IncompleteReadError}. */
  public async readExactly(
    size: number,
    signal?: AbortSignal,
  ): Promise<Buffer> {
    while (true) {
      if (this.buffer.length >= size) {
        return this.take(size);
      }
      if (this.failure) {
        throw this.failure;
      }
      if (this.ended) {
        throw new IncompleteReadError(size, this.buffer.length);
      }
      await this.waitForData(size, signal);
    }
  }

  private take(size: number): Buffer {
    const chunk = this.buffer.subarray(0, size);
    this.buffer =
      size >= this.buffer.length ? EMPTY : this.buffer.subarray(size);
    if (this.stream.isPaused() && this.buffer.length < HIGH_WATER_MARK) {
      this.stream.resume();
    }
    return chunk;
  }

  private wake(): void {
    for (const waiter of this.waiters) {
      waiter();
    }
    this.waiters.clear();
  }

  private waitForData(demand: number, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(abortReason(signal));
        return;
      }

      this.demand = demand;
      if (this.stream.isPaused()) {
        this.stream.resume();
      }

      const onAbort = (): void => {
        this.waiters.delete(onData);
        this.demand = 0;
        reject(signal ? abortReason(signal) : new Error('Operation aborted'));
      };

      const onData = (): void => {
        signal?.removeEventListener('abort', onAbort);
        this.demand = 0;
        resolve();
      };

      this.waiters.add(onData);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
