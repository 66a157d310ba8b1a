import { describe } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";

/** Wait after a player appears before querying it. */
export const GRACE_DELAY_MS = 1000;

export type DispatchAction = () => void | Promise<void>;

export interface RefreshSchedulerOptions {
  /** Periodic refresh in milliseconds; 0 disables the timer. */
  intervalMs: number;
  graceDelayMs?: number;
  log?: Logger;
}

interface GraceHold {
  timer: NodeJS.Timeout;
  done: Promise<void>;
  release: () => void;
}

/**
 * Single serialized dispatch queue with a coalescing dirty flag. Requests
 * arriving before a pass starts collapse into that pass; posted actions and
 * passes never overlap.
 */
export class RefreshScheduler {
  private dirty = false;
  private stopped = false;
  private running = false;
  private readonly actions: DispatchAction[] = [];
  private grace: GraceHold | null = null;
  private ticker: NodeJS.Timeout | null = null;
  private draining: Promise<void> | null = null;
  private readonly log: Logger;

  constructor(
    private readonly pass: () => Promise<void>,
    private readonly options: RefreshSchedulerOptions
  ) {
    this.log = options.log ?? createLogger("mpris", "scheduler");
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  get hasPendingGrace(): boolean {
    return this.grace !== null;
  }

  start(): void {
    this.request();
    if (this.options.intervalMs > 0) this.scheduleTick();
  }

  request(): void {
    if (this.stopped) return;
    this.dirty = true;
    this.kick();
  }

  post(action: DispatchAction): void {
    if (this.stopped) return;
    this.actions.push(action);
    this.kick();
  }

  /**
   * Holds the queue for the grace delay, then requests a pass. Calls made
   * while a hold is pending are absorbed into it.
   */
  requestAfterGrace(): void {
    if (this.stopped) return;
    if (this.grace) {
      this.log.debug("grace delay already pending");
      return;
    }
    let release = (): void => {};
    const done = new Promise<void>((resolve) => {
      release = resolve;
    });
    const timer = setTimeout(() => {
      this.grace = null;
      release();
      this.request();
    }, this.options.graceDelayMs ?? GRACE_DELAY_MS);
    this.grace = { timer, done, release };
    this.kick();
  }

  /** Resolves once the queue has nothing left to run. */
  whenIdle(): Promise<void> {
    return this.draining ?? Promise.resolve();
  }

  /** Cancels timers and pending work; waits for a pass already in flight. */
  async stop(): Promise<void> {
    this.stopped = true;
    this.dirty = false;
    this.actions.length = 0;
    if (this.ticker) {
      clearTimeout(this.ticker);
      this.ticker = null;
    }
    if (this.grace) {
      clearTimeout(this.grace.timer);
      this.grace.release();
      this.grace = null;
    }
    await this.whenIdle();
  }

  private scheduleTick(): void {
    this.ticker = setTimeout(() => {
      this.ticker = null;
      if (this.stopped) return;
      this.request();
      this.scheduleTick();
    }, this.options.intervalMs);
  }

  private kick(): void {
    if (this.running) return;
    this.running = true;
    this.draining = this.drain();
  }

  private async drain(): Promise<void> {
    try {
      while (!this.stopped) {
        const action = this.actions.shift();
        if (action) {
          await this.runSafely("dispatch action", action);
          continue;
        }
        if (this.grace) {
          await this.grace.done;
          continue;
        }
        if (!this.dirty) return;
        this.dirty = false;
        await this.runSafely("refresh pass", this.pass);
      }
    } finally {
      this.running = false;
    }
  }

  private async runSafely(label: string, fn: DispatchAction): Promise<void> {
    try {
      await fn();
    } catch (error) {
      this.log.error(`${label} failed: ${describe(error)}`);
    }
  }
}
