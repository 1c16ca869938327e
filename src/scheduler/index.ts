import type { Logger } from 'pino';
import defaultLogger from '../logger.js';
import defaultRegistry, { type MetricsRegistry } from '../metrics/index.js';
import { METRIC } from '../metrics/catalog.js';
import { settledWithin } from '../process/bounded.js';
import type { StreamTarget } from '../types.js';

export type CycleRunner = (signal: AbortSignal) => Promise<unknown>;

export type WorkerState = 'idle' | 'probing' | 'stopped';

export type WorkerSnapshot = {
  stream: string;
  state: WorkerState;
  intervalMs: number;
  cycles: number;
  skippedTicks: number;
  lastStartedAt: number | null;
};

type SchedulerLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

export type SchedulerOptions = {
  registry?: MetricsRegistry;
  logger?: SchedulerLogger;
  now?: () => number;
};

/**
 * Runs the probe cycle of one stream on its own timer.
 *
 * Each cycle start arms the next tick one interval later. A tick that finds the previous cycle
 * still running is skipped, and the overrunning cycle is followed by an immediate catch-up cycle.
 */
export class StreamWorker {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private controller: AbortController | null = null;
  private running = false;
  private stopped = false;
  private overdue = false;
  private cycles = 0;
  private skippedTicks = 0;
  private lastStartedAt: number | null = null;
  private readonly registry: MetricsRegistry;
  private readonly log: SchedulerLogger;
  private readonly now: () => number;

  constructor(
    readonly target: StreamTarget,
    private readonly runCycle: CycleRunner,
    options: SchedulerOptions = {}
  ) {
    this.registry = options.registry ?? defaultRegistry;
    this.log = options.logger ?? defaultLogger;
    this.now = options.now ?? Date.now;
  }

  get state(): WorkerState {
    if (this.stopped) {
      return 'stopped';
    }
    return this.inFlight ? 'probing' : 'idle';
  }

  start() {
    if (this.running || this.stopped) {
      return;
    }
    this.running = true;
    this.log.info({ stream: this.target.name, intervalMs: this.target.intervalMs }, 'Stream worker started');
    void this.startCycle();
  }

  /**
   * Runs a single cycle outside the schedule. Resolves false without probing when a cycle is
   * already in flight.
   */
  async runOnce(): Promise<boolean> {
    if (this.inFlight || this.stopped) {
      return false;
    }
    await this.startCycle({ arm: false });
    return true;
  }

  /**
   * Stops scheduling, gives the in-flight cycle `graceMs` to finish and then aborts it. Resolves
   * once the cycle has settled.
   */
  async stop(graceMs = 0): Promise<void> {
    this.running = false;
    this.stopped = true;
    this.clearTimer();

    const inFlight = this.inFlight;
    if (!inFlight) {
      return;
    }

    const finished = graceMs > 0 ? await settledWithin(inFlight, graceMs) : false;
    if (!finished) {
      this.log.warn({ stream: this.target.name, graceMs }, 'Cancelling in-flight probe');
      this.controller?.abort();
      await inFlight;
    }
  }

  snapshot(): WorkerSnapshot {
    return {
      stream: this.target.name,
      state: this.state,
      intervalMs: this.target.intervalMs,
      cycles: this.cycles,
      skippedTicks: this.skippedTicks,
      lastStartedAt: this.lastStartedAt
    };
  }

  private readonly onTick = () => {
    this.timer = null;
    if (!this.running) {
      return;
    }

    if (this.inFlight) {
      this.skippedTicks += 1;
      this.overdue = true;
      this.registry.incrementCounter(METRIC.cyclesSkipped, { stream: this.target.name });
      this.log.warn(
        { stream: this.target.name, intervalMs: this.target.intervalMs, skippedTicks: this.skippedTicks },
        'Previous probe still running; skipping tick'
      );
      return;
    }

    void this.startCycle();
  };

  private startCycle(options: { arm?: boolean } = {}): Promise<void> {
    if (options.arm !== false) {
      this.clearTimer();
      this.timer = setTimeout(this.onTick, this.target.intervalMs);
    }

    const controller = new AbortController();
    this.controller = controller;
    this.cycles += 1;
    this.lastStartedAt = this.now();

    const cycle = this.runCycle(controller.signal)
      .then(
        () => undefined,
        (error: unknown) => {
          this.log.error({ err: error, stream: this.target.name }, 'Probe cycle failed unexpectedly');
        }
      )
      .finally(() => {
        this.inFlight = null;
        this.controller = null;
        if (this.running && this.overdue) {
          this.overdue = false;
          void this.startCycle();
        }
      });
    this.inFlight = cycle;
    return cycle;
  }

  private clearTimer() {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}

/**
 * Owns one {@link StreamWorker} per stream target. Workers share nothing but the registry, so a
 * hung stream never delays another stream's schedule.
 */
export class ProbeScheduler {
  private readonly workers: StreamWorker[];
  private readonly log: SchedulerLogger;
  private started = false;

  constructor(
    targets: readonly StreamTarget[],
    createRunner: (target: StreamTarget) => CycleRunner,
    options: SchedulerOptions = {}
  ) {
    this.log = options.logger ?? defaultLogger;
    this.workers = targets.map(target => new StreamWorker(target, createRunner(target), options));
  }

  get size(): number {
    return this.workers.length;
  }

  start() {
    if (this.started) {
      return;
    }
    this.started = true;
    if (this.workers.length === 0) {
      this.log.warn('No streams configured; serving an empty registry');
    }
    for (const worker of this.workers) {
      worker.start();
    }
  }

  async runOnce(): Promise<void> {
    await Promise.all(this.workers.map(worker => worker.runOnce()));
  }

  async stop(options: { graceMs?: number } = {}): Promise<void> {
    const graceMs = options.graceMs ?? 0;
    await Promise.all(this.workers.map(worker => worker.stop(graceMs)));
    this.log.info({ streams: this.workers.length }, 'Probe scheduler stopped');
  }

  snapshot(): WorkerSnapshot[] {
    return this.workers.map(worker => worker.snapshot());
  }
}
