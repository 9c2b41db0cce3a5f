import { EventEmitter } from "node:events";

/** Source of simulated time. */
export interface Clock {
  readonly now: number;
}

/** What a simulated task may ask of the kernel. */
export interface Scheduler extends Clock {
  delay(duration: number): Promise<void>;
  stop(): void;
}

export interface RunOptions {
  /** Do not advance the clock past this time. */
  until?: number;
}

interface TimedEntry {
  time: number;
  fire: () => void;
}

const settle = (): Promise<void> => new Promise<void>((resolve) => setImmediate(resolve));

/**
 * Cooperative discrete-event kernel.
 *
 * Tasks are async functions that suspend on `delay()` or on a `SimEvent`.
 * The kernel fires one timed entry at a time and lets every task that became
 * runnable run up to its next suspension point before looking at the next
 * entry, so at most one task touches shared state at any instant and the
 * clock only moves while every task is suspended.
 */
export class Simulation extends EventEmitter implements Scheduler {
  private currentTime: number = 0;
  private timeline: TimedEntry[] = [];
  private running: boolean = false;
  private stopRequested: boolean = false;
  private failure: Error | null = null;

  get now(): number {
    return this.currentTime;
  }

  get pending(): number {
    return this.timeline.length;
  }

  isRunning(): boolean {
    return this.running;
  }

  spawn(name: string, task: () => Promise<void>): void {
    this.schedule(this.currentTime, () => {
      task().catch((error: unknown) => {
        const err = error instanceof Error ? error : new Error(String(error));
        this.emit("task:error", { task: name, error: err, time: this.currentTime });
        this.failure ??= err;
      });
    });
  }

  delay(duration: number): Promise<void> {
    if (!Number.isFinite(duration) || duration < 0) {
      throw new Error(`Delay must be a finite, non-negative number, got ${duration}`);
    }
    return new Promise<void>((resolve) => {
      this.schedule(this.currentTime + duration, resolve);
    });
  }

  stop(): void {
    this.stopRequested = true;
  }

  async run(options: RunOptions = {}): Promise<number> {
    if (this.running) {
      throw new Error("Simulation is already running");
    }

    this.running = true;
    this.stopRequested = false;
    this.failure = null;

    try {
      while (this.timeline.length > 0 && !this.stopRequested) {
        const next = this.timeline[0];

        if (options.until !== undefined && next.time > options.until) {
          this.currentTime = options.until;
          break;
        }

        this.timeline.shift();
        this.currentTime = next.time;
        next.fire();

        await settle();

        if (this.failure) {
          throw this.failure;
        }
      }
    } finally {
      this.running = false;
    }

    return this.currentTime;
  }

  private schedule(time: number, fire: () => void): void {
    const entry: TimedEntry = { time, fire };

    // Entries at the same time keep insertion order.
    let lo = 0;
    let hi = this.timeline.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.timeline[mid].time <= time) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    this.timeline.splice(lo, 0, entry);
  }
}
