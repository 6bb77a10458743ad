/**
 * Fixed-interval tick scheduler.
 *
 * A setTimeout chain rather than setInterval: the next tick is armed only
 * after the previous one settled, so ticks never pile up behind a slow one.
 * Timers are unref'd and never keep the process alive on their own.
 */

import { logger } from '../logger';

export class Scheduler {
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private current: Promise<void> | null = null;
  private readonly log = logger.child({ module: 'scheduler' });

  constructor(
    private readonly intervalMs: number,
    private readonly tick: () => Promise<void>,
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  /** Start ticking. The first tick runs immediately. */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.arm(0);
  }

  /** Stop ticking and wait for a tick in progress. */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.current) await this.current;
  }

  private arm(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.current = this.runTick();
    }, delayMs);
    this.timer.unref();
  }

  private async runTick(): Promise<void> {
    try {
      await this.tick();
    } catch (err) {
      this.log.error('Tick failed', { error: err instanceof Error ? err.message : String(err) });
    } finally {
      this.current = null;
      if (this.running) this.arm(this.intervalMs);
    }
  }
}
