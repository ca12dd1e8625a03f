import { describe, it, expect } from 'vitest';

import { ShutdownCoordinator } from '../src/browser/index.js';
import { Scheduler, abortableSleep } from '../src/core/index.js';
import type { Sleep } from '../src/core/index.js';
import type { SyncResult } from '../src/schema/index.js';

const RESULT: SyncResult = {
  status: 'success',
  syncType: 'incremental',
  startedAt: '2024-06-15T12:00:00.000Z',
  durationMs: 0,
  pagesVisited: 1,
  rowsRejected: 0,
  recordsScraped: 0,
  invalidDates: 0,
  recordsProcessed: 0,
  inserted: 0,
  updated: 0,
  logRecorded: true,
};

/** Virtual clock: sleeping advances time instantly. */
function virtualTime() {
  let t = 0;
  const sleeps: number[] = [];
  const sleep: Sleep = async (ms) => {
    sleeps.push(ms);
    t += ms;
  };
  return { now: () => t, sleep, sleeps };
}

describe('Scheduler', () => {
  it('runs immediately and then once per interval', async () => {
    const time = virtualTime();
    const runTimes: number[] = [];
    const scheduler: Scheduler = new Scheduler({
      intervalMs: 100,
      tickMs: 10,
      cooldownMs: 50,
      now: time.now,
      sleep: time.sleep,
      run: async () => {
        runTimes.push(time.now());
        if (runTimes.length === 3) scheduler.stop();
        return RESULT;
      },
    });

    await scheduler.start();

    expect(runTimes).toEqual([0, 100, 200]);
    expect(scheduler.runsCompleted).toBe(3);
    expect(time.sleeps).toHaveLength(20);
    expect(scheduler.isRunning).toBe(false);
  });

  it('cools down after a run throws and keeps the schedule', async () => {
    const time = virtualTime();
    const runTimes: number[] = [];
    const scheduler: Scheduler = new Scheduler({
      intervalMs: 100,
      tickMs: 10,
      cooldownMs: 50,
      now: time.now,
      sleep: time.sleep,
      run: async () => {
        runTimes.push(time.now());
        if (runTimes.length === 1) throw new Error('browser crashed');
        scheduler.stop();
        return RESULT;
      },
    });

    await scheduler.start();

    expect(runTimes).toEqual([0, 100]);
    expect(time.sleeps).toEqual([50, 10, 10, 10, 10, 10]);
    expect(scheduler.runsCompleted).toBe(1);
  });

  it('stops when the shutdown coordinator releases it', async () => {
    const coordinator = new ShutdownCoordinator();
    const time = virtualTime();
    let runs = 0;
    const scheduler = new Scheduler({
      intervalMs: 100,
      tickMs: 10,
      cooldownMs: 50,
      coordinator,
      now: time.now,
      sleep: async (ms, signal) => {
        await time.sleep(ms, signal);
        if (time.now() >= 30) await coordinator.shutdown('SIGTERM');
      },
      run: async () => {
        runs++;
        return RESULT;
      },
    });

    const loop = scheduler.start();
    expect(coordinator.openCount).toBe(1);
    await loop;

    expect(runs).toBe(1);
    expect(time.now()).toBe(30);
    expect(coordinator.openCount).toBe(0);
  });

  it('refuses to start twice', async () => {
    const time = virtualTime();
    const scheduler = new Scheduler({
      intervalMs: 100,
      tickMs: 10,
      cooldownMs: 50,
      now: time.now,
      sleep: time.sleep,
      run: async () => RESULT,
    });

    const loop = scheduler.start();
    await expect(scheduler.start()).rejects.toThrow('Scheduler is already running');
    scheduler.stop();
    await loop;
  });

  it('requires a cool-down longer than the tick', () => {
    expect(
      () =>
        new Scheduler({ intervalMs: 100, tickMs: 10, cooldownMs: 10, run: async () => RESULT }),
    ).toThrow(RangeError);
  });
});

describe('abortableSleep', () => {
  it('returns early once aborted', async () => {
    const controller = new AbortController();
    const sleeping = abortableSleep(60_000, controller.signal);
    controller.abort();

    await expect(sleeping).resolves.toBeUndefined();
  });

  it('returns immediately when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(abortableSleep(60_000, controller.signal)).resolves.toBeUndefined();
  });
});
