/**
 * Boundary between a session and the candidate's real-time connection. The
 * socket gateway implements it in production; tests drive it in-process.
 */

export type AudioInput = { kind: 'chunk'; data: Buffer } | { kind: 'end_of_turn' };

export type OutboundEvent =
  | { type: 'greeting'; text: string }
  | { type: 'question'; itemId: string; text: string; targetMs: number; maxMs: number }
  | { type: 'follow_up'; itemId: string; text: string }
  | { type: 'closing'; text: string }
  | { type: 'audio'; chunk: Buffer }
  | { type: 'listening'; itemId: string; cutoffMs: number }
  | { type: 'ended'; message: string };

export interface CandidateChannel {
  /** Candidate audio from now on, until the signal aborts or the iterator is returned. */
  listen(signal: AbortSignal): AsyncIterable<AudioInput>;
  send(event: OutboundEvent): void;
}

/**
 * Single-consumer async queue. Values pushed while nobody is reading are
 * buffered; `return()` on the iterator ends a pending read.
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private waiting: ((result: IteratorResult<T>) => void) | null = null;
  private closed = false;

  push(value: T): void {
    if (this.closed) return;
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value, done: false });
      return;
    }
    this.buffer.push(value);
  }

  close(): void {
    this.closed = true;
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value: undefined, done: true });
    }
  }

  /** Drops anything buffered, e.g. audio that arrived before a listening window opened. */
  clear(): void {
    this.buffer = [];
  }

  isClosed(): boolean {
    return this.closed;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => {
        const value = this.buffer.shift();
        if (value !== undefined) return Promise.resolve({ value, done: false });
        if (this.closed) return Promise.resolve({ value: undefined, done: true });
        return new Promise<IteratorResult<T>>((resolve) => {
          this.waiting = resolve;
        });
      },
      return: () => {
        if (this.waiting) {
          const resolve = this.waiting;
          this.waiting = null;
          resolve({ value: undefined, done: true });
        }
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}
