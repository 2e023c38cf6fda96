/**
 * Time source for the orchestrator. Everything that measures elapsed time or
 * waits on a deadline goes through a Clock so sessions can be driven by a
 * manual clock in tests.
 */
import { performance } from 'perf_hooks';

export interface Timer {
  cancel(): void;
}

export interface Clock {
  /** Monotonic milliseconds; only differences are meaningful. */
  now(): number;
  /** Wall-clock ISO timestamp for records. */
  timestamp(): string;
  setTimer(delayMs: number, callback: () => void): Timer;
}

/** Longest delay setTimeout honours; anything larger fires after 1 ms. */
export const MAX_TIMEOUT_MS = 2 ** 31 - 1;

export class SystemClock implements Clock {
  now(): number {
    return performance.now();
  }

  timestamp(): string {
    return new Date().toISOString();
  }

  /** Delays past the setTimeout limit are waited out in steps. */
  setTimer(delayMs: number, callback: () => void): Timer {
    let remaining = Math.max(0, delayMs);
    let handle: ReturnType<typeof setTimeout> | undefined;
    const arm = (): void => {
      const step = Math.min(remaining, MAX_TIMEOUT_MS);
      remaining -= step;
      handle = setTimeout(remaining > 0 ? arm : callback, step);
    };
    arm();
    return {
      cancel: () => clearTimeout(handle),
    };
  }
}

interface ScheduledTimer {
  id: number;
  dueAt: number;
  callback: () => void;
}

/**
 * Clock that only moves when told to. Timers fire synchronously inside
 * advance(), in due order, with now() set to each timer's due time.
 */
export class ManualClock implements Clock {
  private current = 0;
  private nextId = 1;
  private timers: ScheduledTimer[] = [];

  constructor(private readonly epochMs: number = Date.UTC(2024, 0, 1)) {}

  now(): number {
    return this.current;
  }

  timestamp(): string {
    return new Date(this.epochMs + this.current).toISOString();
  }

  setTimer(delayMs: number, callback: () => void): Timer {
    const timer: ScheduledTimer = { id: this.nextId++, dueAt: this.current + Math.max(0, delayMs), callback };
    this.timers.push(timer);
    return {
      cancel: () => {
        this.timers = this.timers.filter((t) => t.id !== timer.id);
      },
    };
  }

  advance(ms: number): void {
    const target = this.current + ms;
    for (;;) {
      const due = this.timers
        .filter((t) => t.dueAt <= target)
        .sort((a, b) => a.dueAt - b.dueAt || a.id - b.id)[0];
      if (!due) break;
      this.timers = this.timers.filter((t) => t.id !== due.id);
      this.current = due.dueAt;
      due.callback();
    }
    this.current = target;
  }

  pendingTimers(): number {
    return this.timers.length;
  }
}
