import { spawn, type ChildProcess } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { describe, expect, it, vi } from 'vitest';
import { execBounded, runBounded, settledWithin } from '../src/process/bounded.js';
import { createFakeSpawn } from './helpers/fakeProcess.js';

describe('BoundedProcess', () => {
  it('BoundedTimeoutKillsRealChild terminates a child that outlives its deadline', async () => {
    const children: ChildProcess[] = [];

    const outcome = await execBounded(process.execPath, ['-e', 'setTimeout(() => {}, 60000)'], {
      timeoutMs: 200,
      forceKillTimeoutMs: 2_000,
      spawn: (command, args) => {
        const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
        children.push(child);
        return child;
      }
    });

    expect(outcome.status).toBe('timed-out');
    expect(outcome.elapsedMs).toBeLessThan(5_000);
    expect(children).toHaveLength(1);
    expect(children[0]?.signalCode).toBe('SIGTERM');
  });

  it('collects output and exit code of a completed process', async () => {
    const { spawn: fakeSpawn } = createFakeSpawn([{ stdout: 'hello', stderr: 'warn', code: 3 }]);

    const outcome = await execBounded('tool', ['--flag'], { timeoutMs: 1_000, spawn: fakeSpawn });

    expect(outcome.status).toBe('completed');
    if (outcome.status === 'completed') {
      expect(outcome.value).toEqual({
        exitCode: 3,
        signal: null,
        stdout: 'hello',
        stderr: 'warn',
        stdoutTruncated: false
      });
    }
  });

  it('truncates stdout beyond the buffer limit', async () => {
    const { spawn: fakeSpawn } = createFakeSpawn([{ stdout: 'abcdefgh', code: 0 }]);

    const outcome = await execBounded('tool', [], { timeoutMs: 1_000, maxBufferBytes: 4, spawn: fakeSpawn });

    expect(outcome.status === 'completed' && outcome.value.stdout).toBe('abcd');
    expect(outcome.status === 'completed' && outcome.value.stdoutTruncated).toBe(true);
  });

  it('escalates to SIGKILL when SIGTERM is ignored', async () => {
    const signals: Array<NodeJS.Signals | undefined> = [];
    const emitter = new EventEmitter();
    const done = new Promise<void>(resolve => emitter.once('exit', resolve));

    const outcome = await runBounded({
      timeoutMs: 10,
      forceKillTimeoutMs: 20,
      start: () => ({
        process: {
          kill: (signal?: NodeJS.Signals) => {
            signals.push(signal);
            if (signal === 'SIGKILL') {
              emitter.emit('exit');
            }
          }
        },
        done
      })
    });

    expect(outcome.status).toBe('timed-out');
    expect(signals).toEqual(['SIGTERM', 'SIGKILL']);
  });

  it('returns cancelled without starting when the signal already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const start = vi.fn();

    const outcome = await runBounded({ timeoutMs: 1_000, signal: controller.signal, start });

    expect(outcome).toEqual({ status: 'cancelled', elapsedMs: 0 });
    expect(start).not.toHaveBeenCalled();
  });

  it('reports a start failure as errored', async () => {
    const outcome = await runBounded<string>({
      timeoutMs: 1_000,
      start: () => {
        throw new Error('spawn EACCES');
      }
    });

    expect(outcome.status).toBe('errored');
    expect(outcome.status === 'errored' && outcome.error.message).toBe('spawn EACCES');
  });

  it('settledWithin resolves false once the wait runs out', async () => {
    await expect(settledWithin(new Promise(() => {}), 10)).resolves.toBe(false);
    await expect(settledWithin(Promise.resolve('done'), 1_000)).resolves.toBe(true);
  });

  it('settledWithin counts a rejection as settled', async () => {
    const failed = Promise.reject(new Error('exited with code 1'));

    await expect(settledWithin(failed, 1_000)).resolves.toBe(true);
  });
});
