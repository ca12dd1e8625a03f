import { setTimeout as delay } from 'node:timers/promises';

import { SCHEDULE } from '../config/defaults.js';
import { errorMessage } from '../errors.js';
import type { ShutdownCoordinator } from '../browser/index.js';
import type { SyncResult } from '../schema/index.js';
import * as log from '../utils/logger.js';

// ── Public types ─────────────────────────────────────────────

/** Resolves after `ms`, or early (without throwing) once `signal` aborts. */
export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface SchedulerOptions {
  intervalMs: number;
  run: () => Promise<SyncResult>;
  tickMs?: number | undefined;
  cooldownMs?: number | undefined;
  coordinator?: ShutdownCoordinator | undefined;
  now?: (() => number) | undefined;
  sleep?: Sleep | undefined;
}

export const abortableSleep: Sleep = async (ms, signal) => {
  if (signal.aborted) return;
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (!signal.aborted) throw err;
  }
};

// ── Scheduler ────────────────────────────────────────────────

/**
 * Fixed-interval loop: one run immediately, then one whenever the
 * interval has elapsed since the previous run started. A run that
 * throws is logged and followed by a cool-down; the loop keeps going
 * until `stop()`.
 */
export class Scheduler {
  private readonly tickMs: number;
  private readonly cooldownMs: number;
  private readonly now: () => number;
  private readonly sleep: Sleep;
  private controller: AbortController | null = null;
  private completed = 0;

  constructor(private readonly options: SchedulerOptions) {
    this.tickMs = options.tickMs ?? SCHEDULE.TICK_MS;
    this.cooldownMs = options.cooldownMs ?? SCHEDULE.COOLDOWN_MS;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? abortableSleep;

    if (options.intervalMs <= 0) {
      throw new RangeError('Schedule interval must be positive');
    }
    if (this.cooldownMs <= this.tickMs) {
      throw new RangeError('Cool-down must be longer than the polling tick');
    }
  }

  get isRunning(): boolean {
    return this.controller !== null;
  }

  /** Runs finished without throwing, successful or not. */
  get runsCompleted(): number {
    return this.completed;
  }

  /** Resolves once the loop has exited after `stop()`. */
  async start(): Promise<void> {
    if (this.controller !== null) {
      throw new Error('Scheduler is already running');
    }
    const controller = new AbortController();
    this.controller = controller;
    const { signal } = controller;

    const unregister = this.options.coordinator?.register({
      name: 'scheduler',
      release: () => {
        this.stop();
      },
    });

    log.schedule(
      `Scheduler started: every ${formatHours(this.options.intervalMs)}, first run now`,
    );

    try {
      let nextDue = this.now();
      while (!signal.aborted) {
        if (this.now() < nextDue) {
          await this.sleep(this.tickMs, signal);
          continue;
        }

        nextDue = this.now() + this.options.intervalMs;
        try {
          const result = await this.options.run();
          this.completed++;
          log.schedule(
            `Run ${result.status}: ${String(result.recordsProcessed)} processed; next run at ${new Date(nextDue).toISOString()}`,
          );
        } catch (err) {
          log.error(`Scheduled run crashed: ${errorMessage(err)}`);
          log.schedule(`Cooling down for ${String(Math.round(this.cooldownMs / 1000))}s`);
          await this.sleep(this.cooldownMs, signal);
        }
      }
    } finally {
      unregister?.();
      this.controller = null;
      log.schedule('Scheduler stopped');
    }
  }

  stop(): void {
    this.controller?.abort();
  }
}

function formatHours(ms: number): string {
  const hours = ms / 3_600_000;
  return `${String(Number.isInteger(hours) ? hours : Number(hours.toFixed(2)))}h`;
}
