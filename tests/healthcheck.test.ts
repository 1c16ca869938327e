import { describe, expect, it, vi } from 'vitest';
import { countStreamsUp, resolveDefaultUrl, runHealthcheck, type FetchFn } from '../scripts/healthcheck.js';

function createIo() {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    streams: {
      stdout: {
        write(chunk: string | Uint8Array) {
          stdout.push(typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf8'));
          return true;
        }
      },
      stderr: {
        write(chunk: string | Uint8Array) {
          stderr.push(typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf8'));
          return true;
        }
      }
    },
    stdout,
    stderr
  };
}

function respond(status: number, body: string) {
  return vi.fn<FetchFn>(async () => ({ status, text: async () => body }));
}

const EXPOSITION = [
  '# TYPE stream_up gauge',
  'stream_up{stream="garage"} 0',
  'stream_up{stream="lobby"} 1',
  ''
].join('\n');

describe('HealthcheckCli', () => {
  it('HealthcheckScrapeOk exits 0 when the endpoint answers', async () => {
    const io = createIo();
    const fetch = respond(200, EXPOSITION);

    const code = await runHealthcheck(['--url', 'http://127.0.0.1:9000/metrics'], io.streams, { fetch });

    expect(code).toBe(0);
    expect(fetch).toHaveBeenCalledWith('http://127.0.0.1:9000/metrics', expect.objectContaining({ method: 'GET' }));
    expect(io.stdout.join('')).toBe(
      `${JSON.stringify({ status: 'ok', url: 'http://127.0.0.1:9000/metrics', streamsUp: 1 })}\n`
    );
    expect(io.stderr).toHaveLength(0);
  });

  it('uses the configured endpoint by default', async () => {
    const io = createIo();
    const fetch = respond(200, '');

    const code = await runHealthcheck([], io.streams, { fetch, defaultUrl: () => 'http://127.0.0.1:8001/metrics' });

    expect(code).toBe(0);
    expect(fetch.mock.calls[0]?.[0]).toBe('http://127.0.0.1:8001/metrics');
    expect(resolveDefaultUrl()).toBe('http://127.0.0.1:8001/metrics');
  });

  it('fails on a non-200 answer', async () => {
    const io = createIo();

    const code = await runHealthcheck(['--url=http://127.0.0.1:9000/metrics'], io.streams, {
      fetch: respond(503, '')
    });

    expect(code).toBe(1);
    expect(io.stderr.join('')).toBe('Metrics endpoint returned HTTP 503\n');
  });

  it('fails when --require-up finds no live stream', async () => {
    const io = createIo();

    const code = await runHealthcheck(['--require-up'], io.streams, {
      fetch: respond(200, 'stream_up{stream="garage"} 0\n'),
      defaultUrl: () => 'http://127.0.0.1:8001/metrics'
    });

    expect(code).toBe(1);
    expect(io.stderr.join('')).toBe('No stream reports stream_up 1\n');
  });

  it('reports an unreachable endpoint', async () => {
    const io = createIo();
    const fetch = vi.fn<FetchFn>(async () => {
      throw new Error('connect ECONNREFUSED 127.0.0.1:8001');
    });

    const code = await runHealthcheck([], io.streams, { fetch, defaultUrl: () => 'http://127.0.0.1:8001/metrics' });

    expect(code).toBe(1);
    expect(io.stderr.join('')).toBe('Metrics endpoint unreachable: connect ECONNREFUSED 127.0.0.1:8001\n');
  });

  it('rejects unknown options and prints usage', async () => {
    const io = createIo();

    const code = await runHealthcheck(['--bogus', '--timeout', '0'], io.streams, { fetch: respond(200, '') });

    expect(code).toBe(1);
    expect(io.stderr).toEqual([
      'Unknown option: --bogus\n',
      '--timeout expects a positive number of milliseconds\n'
    ]);
    expect(io.stdout.join('')).toContain('Usage:');
  });

  it('counts live streams in an exposition', () => {
    expect(countStreamsUp(EXPOSITION)).toBe(1);
    expect(countStreamsUp('stream_up 1\nstream_upper{a="b"} 1\n')).toBe(1);
  });
});
