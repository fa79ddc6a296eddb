import { setTimeout as delay } from 'timers/promises';
import type { Logger } from 'pino';

export type SchedulerState = 'idle' | 'polling' | 'sleeping' | 'stopped';

export type StopReason = 'cancelled' | 'max-attempts';

export interface SchedulerOptions {
  intervalMs: number;
  /** 0 runs until stopped. */
  maxAttempts: number;
  backoffMs: number;
  tickMs?: number;
  sleep?: (ms: number) => Promise<void>;
  /** Errors for which retrying cannot help; `run` rejects with them. */
  isFatal?: (error: unknown) => boolean;
  logger: Logger;
}

export interface SchedulerSummary {
  cycles: number;
  failures: number;
  sleeps: number;
  backoffs: number;
  reason: StopReason;
}

const DEFAULT_TICK_MS = 1000;

export class PollScheduler {
  private cancelled = false;
  private current: SchedulerState = 'idle';
  private readonly tickMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly cycle: (attempt: number) => Promise<unknown>,
    private readonly options: SchedulerOptions
  ) {
    this.tickMs = options.tickMs ?? DEFAULT_TICK_MS;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
  }

  get state(): SchedulerState {
    return this.current;
  }

  stop(reason = 'stop requested'): void {
    if (!this.cancelled) {
      this.options.logger.info({ reason }, 'Shutting down after the current step');
    }
    this.cancelled = true;
  }

  async run(): Promise<SchedulerSummary> {
    if (this.current !== 'idle') {
      throw new Error(`Scheduler cannot start from state "${this.current}".`);
    }

    const { maxAttempts, intervalMs, backoffMs, logger } = this.options;
    let attempt = 0;
    let failures = 0;
    let sleeps = 0;
    let backoffs = 0;
    let reason: StopReason = 'cancelled';

    while (!this.cancelled) {
      attempt += 1;
      this.current = 'polling';
      logger.info({ attempt, maxAttempts: maxAttempts || 'unlimited' }, 'Polling cycle');

      let failed = false;
      try {
        await this.cycle(attempt);
      } catch (error) {
        if (this.options.isFatal?.(error)) {
          this.current = 'stopped';
          throw error;
        }
        failed = true;
        failures += 1;
        logger.error({ err: error, attempt }, 'Polling cycle failed');
      }

      if (maxAttempts > 0 && attempt >= maxAttempts) {
        logger.info({ maxAttempts }, 'Reached maximum attempts');
        reason = 'max-attempts';
        break;
      }

      if (this.cancelled) {
        break;
      }

      this.current = 'sleeping';
      if (failed) {
        backoffs += 1;
        logger.info({ waitMs: backoffMs }, 'Backing off before retrying');
        await this.wait(backoffMs);
      } else {
        sleeps += 1;
        logger.info({ waitMs: intervalMs }, 'Waiting before next check');
        await this.wait(intervalMs);
      }
    }

    this.current = 'stopped';
    const summary: SchedulerSummary = { cycles: attempt, failures, sleeps, backoffs, reason };
    logger.info(summary, 'Monitoring stopped');
    return summary;
  }

  // Sleeps in ticks so a stop request is honoured within one tick.
  private async wait(ms: number): Promise<void> {
    let remaining = ms;
    while (remaining > 0 && !this.cancelled) {
      const step = Math.min(this.tickMs, remaining);
      await this.sleep(step);
      remaining -= step;
    }
  }
}
