import { spawn } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { performance } from 'node:perf_hooks';
import type { Readable } from 'node:stream';
import logger from '../logger.js';

const DEFAULT_FORCE_KILL_TIMEOUT_MS = 2000;
const KILL_SETTLE_TIMEOUT_MS = 1000;
const DEFAULT_MAX_BUFFER_BYTES = 8 * 1024 * 1024;

export interface KillableProcess {
  kill(signal: NodeJS.Signals): unknown;
}

export type BoundedTask<T> = {
  process: KillableProcess;
  done: Promise<T>;
};

export type BoundedOutcome<T> =
  | { status: 'completed'; value: T; elapsedMs: number }
  | { status: 'errored'; error: Error; elapsedMs: number }
  | { status: 'timed-out'; elapsedMs: number }
  | { status: 'cancelled'; elapsedMs: number };

export type RunBoundedOptions<T> = {
  timeoutMs: number;
  forceKillTimeoutMs?: number;
  signal?: AbortSignal;
  start: () => BoundedTask<T>;
};

type Interruption = 'timed-out' | 'cancelled';

type Settled<T> = { ok: true; value: T } | { ok: false; error: Error };

/**
 * Waits for a process-backed task until it settles, the deadline passes or the signal aborts.
 *
 * When interrupted the process receives SIGTERM, then SIGKILL once `forceKillTimeoutMs` elapses,
 * and the call only returns after the task has settled (or the kill grace ran out).
 */
export async function runBounded<T>(options: RunBoundedOptions<T>): Promise<BoundedOutcome<T>> {
  const startedAt = performance.now();
  const elapsed = () => performance.now() - startedAt;

  if (options.signal?.aborted) {
    return { status: 'cancelled', elapsedMs: 0 };
  }

  let task: BoundedTask<T>;
  try {
    task = options.start();
  } catch (error) {
    return { status: 'errored', error: toError(error), elapsedMs: elapsed() };
  }

  const settled: Promise<Settled<T>> = task.done.then(
    value => ({ ok: true, value }),
    (error: unknown) => ({ ok: false, error: toError(error) })
  );

  let interrupt: (reason: Interruption) => void = () => {};
  const interrupted = new Promise<Interruption>(resolve => {
    interrupt = resolve;
  });
  const timer = setTimeout(() => interrupt('timed-out'), Math.max(0, options.timeoutMs));
  const onAbort = () => interrupt('cancelled');
  options.signal?.addEventListener('abort', onAbort, { once: true });

  try {
    const winner = await Promise.race([settled, interrupted]);
    if (typeof winner === 'string') {
      await terminate(task.process, settled, options.forceKillTimeoutMs ?? DEFAULT_FORCE_KILL_TIMEOUT_MS);
      return { status: winner, elapsedMs: elapsed() };
    }
    if (winner.ok) {
      return { status: 'completed', value: winner.value, elapsedMs: elapsed() };
    }
    return { status: 'errored', error: winner.error, elapsedMs: elapsed() };
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', onAbort);
  }
}

async function terminate(proc: KillableProcess, settled: Promise<unknown>, graceMs: number) {
  if (graceMs > 0) {
    sendSignal(proc, 'SIGTERM');
    if (await settledWithin(settled, graceMs)) {
      return;
    }
  }
  sendSignal(proc, 'SIGKILL');
  const exited = await settledWithin(settled, Math.max(graceMs, KILL_SETTLE_TIMEOUT_MS));
  if (!exited) {
    logger.warn({ graceMs }, 'Process did not exit after SIGKILL');
  }
}

function sendSignal(proc: KillableProcess, signal: NodeJS.Signals) {
  try {
    proc.kill(signal);
  } catch (error) {
    logger.debug({ err: error, signal }, 'Failed to signal process');
  }
}

export function settledWithin(promise: Promise<unknown>, timeoutMs: number): Promise<boolean> {
  return new Promise<boolean>(resolve => {
    const timer = setTimeout(() => resolve(false), timeoutMs);
    const onSettled = () => {
      clearTimeout(timer);
      resolve(true);
    };
    void promise.then(onSettled, onSettled);
  });
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export interface ChildProcessLike extends EventEmitter {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnFn = (command: string, args: readonly string[]) => ChildProcessLike;

export type ExecResult = {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  stdoutTruncated: boolean;
};

export type ExecBoundedOptions = {
  timeoutMs: number;
  forceKillTimeoutMs?: number;
  signal?: AbortSignal;
  maxBufferBytes?: number;
  spawn?: SpawnFn;
};

export const spawnProcess: SpawnFn = (command, args) =>
  spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'], windowsHide: true });

/**
 * Runs a command with {@link runBounded}, collecting stdout and stderr as UTF-8. Output beyond
 * `maxBufferBytes` is dropped and flagged with `stdoutTruncated`.
 */
export function execBounded(
  command: string,
  args: readonly string[],
  options: ExecBoundedOptions
): Promise<BoundedOutcome<ExecResult>> {
  const spawnFn = options.spawn ?? spawnProcess;
  const maxBufferBytes = options.maxBufferBytes ?? DEFAULT_MAX_BUFFER_BYTES;

  return runBounded<ExecResult>({
    timeoutMs: options.timeoutMs,
    forceKillTimeoutMs: options.forceKillTimeoutMs,
    signal: options.signal,
    start: () => {
      const child = spawnFn(command, args);
      const stdout = createCollector(maxBufferBytes);
      const stderr = createCollector(maxBufferBytes);
      child.stdout?.on('data', stdout.push);
      child.stderr?.on('data', stderr.push);

      const done = new Promise<ExecResult>((resolve, reject) => {
        child.once('error', reject);
        child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
          resolve({
            exitCode: code,
            signal,
            stdout: stdout.text(),
            stderr: stderr.text(),
            stdoutTruncated: stdout.truncated()
          });
        });
      });

      return { process: child, done };
    }
  });
}

function createCollector(limit: number) {
  const chunks: Buffer[] = [];
  let size = 0;
  let truncated = false;
  return {
    push: (chunk: Buffer | string) => {
      const buffer = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
      if (size + buffer.length > limit) {
        truncated = true;
        const remaining = limit - size;
        if (remaining > 0) {
          chunks.push(buffer.subarray(0, remaining));
          size = limit;
        }
        return;
      }
      chunks.push(buffer);
      size += buffer.length;
    },
    text: () => Buffer.concat(chunks).toString('utf8'),
    truncated: () => truncated
  };
}
