import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MetricsRegistry } from '../src/metrics/index.js';
import { METRIC } from '../src/metrics/catalog.js';
import { ProbeScheduler, StreamWorker, type CycleRunner } from '../src/scheduler/index.js';
import type { StreamTarget } from '../src/types.js';

function target(name: string, intervalMs: number): StreamTarget {
  return { url: `rtsp://camera.local/${name}`, name, intervalMs };
}

function createLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

async function flushMicrotasks() {
  for (let index = 0; index < 10; index += 1) {
    await Promise.resolve();
  }
}

function delayedRunner(durationMs: number) {
  let active = 0;
  let maxActive = 0;
  const signals: AbortSignal[] = [];
  const runner = vi.fn<CycleRunner>(
    signal =>
      new Promise<void>(resolve => {
        active += 1;
        maxActive = Math.max(maxActive, active);
        signals.push(signal);
        const finish = () => {
          clearTimeout(timer);
          active -= 1;
          resolve();
        };
        const timer = setTimeout(finish, durationMs);
        signal.addEventListener('abort', finish, { once: true });
      })
  );
  return { runner, signals, maxActive: () => maxActive };
}

describe('ProbeScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('SchedulerIndependentIntervals runs each stream on its own interval', async () => {
    const calls = new Map<string, number>();
    const scheduler = new ProbeScheduler(
      [target('fast', 10_000), target('slow', 30_000)],
      stream => async () => {
        calls.set(stream.name, (calls.get(stream.name) ?? 0) + 1);
      },
      { registry: new MetricsRegistry(), logger: createLogger() }
    );

    scheduler.start();
    await vi.advanceTimersByTimeAsync(29_999);
    await flushMicrotasks();

    expect(calls.get('fast')).toBe(3);
    expect(calls.get('slow')).toBe(1);
    expect(scheduler.size).toBe(2);

    await scheduler.stop();
  });

  it('SchedulerOverrunSkipsTick skips ticks while a cycle is in flight and catches up once', async () => {
    const registry = new MetricsRegistry();
    const logger = createLogger();
    const { runner, maxActive } = delayedRunner(25_000);
    const worker = new StreamWorker(target('lobby', 10_000), runner, { registry, logger });

    worker.start();
    await vi.advanceTimersByTimeAsync(24_999);
    await flushMicrotasks();

    expect(runner).toHaveBeenCalledTimes(1);
    expect(worker.snapshot().skippedTicks).toBe(1);
    expect(registry.getValue(METRIC.cyclesSkipped, { stream: 'lobby' })).toBe(1);
    expect(logger.warn).toHaveBeenCalledWith(
      { stream: 'lobby', intervalMs: 10_000, skippedTicks: 1 },
      'Previous probe still running; skipping tick'
    );

    await vi.advanceTimersByTimeAsync(1);
    await flushMicrotasks();
    expect(runner).toHaveBeenCalledTimes(2);
    expect(worker.state).toBe('probing');

    await vi.advanceTimersByTimeAsync(25_000);
    await flushMicrotasks();
    expect(runner).toHaveBeenCalledTimes(3);
    expect(worker.snapshot().skippedTicks).toBe(2);
    expect(maxActive()).toBe(1);

    await worker.stop();
  });

  it('keeps scheduling after a cycle throws', async () => {
    const logger = createLogger();
    const failure = new Error('probe exploded');
    const runner = vi.fn<CycleRunner>().mockRejectedValueOnce(failure).mockResolvedValue(undefined);
    const worker = new StreamWorker(target('lobby', 10_000), runner, { registry: new MetricsRegistry(), logger });

    worker.start();
    await flushMicrotasks();
    expect(logger.error).toHaveBeenCalledWith({ err: failure, stream: 'lobby' }, 'Probe cycle failed unexpectedly');

    await vi.advanceTimersByTimeAsync(10_000);
    await flushMicrotasks();
    expect(runner).toHaveBeenCalledTimes(2);

    await worker.stop();
  });

  it('SchedulerStopWaitsForGrace lets an in-flight cycle finish within the grace period', async () => {
    const { runner, signals } = delayedRunner(1_000);
    const worker = new StreamWorker(target('lobby', 10_000), runner, {
      registry: new MetricsRegistry(),
      logger: createLogger()
    });

    worker.start();
    const stopping = worker.stop(5_000);
    await vi.advanceTimersByTimeAsync(1_000);
    await stopping;

    expect(signals[0]?.aborted).toBe(false);
    expect(worker.state).toBe('stopped');

    await vi.advanceTimersByTimeAsync(60_000);
    expect(runner).toHaveBeenCalledTimes(1);
  });

  it('SchedulerStopAbortsAfterGrace cancels cycles that outlive the grace period', async () => {
    const logger = createLogger();
    const { runner, signals } = delayedRunner(60_000);
    const scheduler = new ProbeScheduler([target('lobby', 10_000), target('garage', 10_000)], () => runner, {
      registry: new MetricsRegistry(),
      logger
    });

    scheduler.start();
    const stopping = scheduler.stop({ graceMs: 5_000 });
    await vi.advanceTimersByTimeAsync(5_000);
    await stopping;

    expect(signals).toHaveLength(2);
    expect(signals.every(signal => signal.aborted)).toBe(true);
    expect(scheduler.snapshot().map(worker => worker.state)).toEqual(['stopped', 'stopped']);
    expect(logger.info).toHaveBeenLastCalledWith({ streams: 2 }, 'Probe scheduler stopped');
  });

  it('runOnce probes every stream a single time without arming timers', async () => {
    const runner = vi.fn<CycleRunner>().mockResolvedValue(undefined);
    const scheduler = new ProbeScheduler([target('lobby', 10_000), target('garage', 30_000)], () => runner, {
      registry: new MetricsRegistry(),
      logger: createLogger()
    });

    await scheduler.runOnce();
    await vi.advanceTimersByTimeAsync(60_000);

    expect(runner).toHaveBeenCalledTimes(2);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('warns when no streams are configured', () => {
    const logger = createLogger();
    const scheduler = new ProbeScheduler([], () => vi.fn<CycleRunner>(), { logger });

    scheduler.start();

    expect(logger.warn).toHaveBeenCalledWith('No streams configured; serving an empty registry');
    expect(scheduler.snapshot()).toEqual([]);
  });
});
