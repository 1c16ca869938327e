import { afterEach, describe, expect, it, vi } from 'vitest';
import type { ExporterConfig } from '../src/config/index.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { METRIC } from '../src/metrics/catalog.js';
import type { ProbeFn } from '../src/pipeline/probeCycle.js';
import { runOnce, startExporter, type ExporterRuntime } from '../src/run-exporter.js';

function createConfig(): ExporterConfig {
  return {
    app: { name: 'rtsp-probe-exporter' },
    logging: { level: 'silent' },
    streams: [
      { url: 'rtsp://cam-1.local/live', name: 'lobby', intervalMs: 60_000 },
      { url: 'rtsp://cam-2.local/live', name: 'garage', intervalMs: 60_000 }
    ],
    probe: { timeoutMs: 1_000, rtspTransport: 'tcp', ffprobePath: 'ffprobe', forceKillTimeoutMs: 100 },
    bitrate: { enabled: false, sampleSeconds: 5, sampleEveryN: 4, method: 'auto', ffmpegPath: 'ffmpeg' },
    server: { host: '127.0.0.1', port: 0, path: '/metrics' },
    shutdown: { graceMs: 500 }
  };
}

const probeFn = vi.fn<ProbeFn>(async url =>
  url.includes('cam-1')
    ? {
        ok: true,
        exitCode: 0,
        description: { up: true, hasVideo: true, hasAudio: false, videoCodec: 'h264', width: 1280, height: 720 }
      }
    : { ok: false, kind: 'unreachable', message: 'Connection refused', exitCode: 1 }
);

describe('ExporterBootstrap', () => {
  let runtime: ExporterRuntime | null = null;

  afterEach(async () => {
    await runtime?.stop();
    runtime = null;
    probeFn.mockClear();
  });

  it('ExporterServesProbeResults probes every stream and exposes the results', async () => {
    const registry = new MetricsRegistry();
    runtime = await startExporter({ config: createConfig(), registry, probeFn });

    await vi.waitFor(() => {
      expect(registry.getValue(METRIC.streamUp, { stream: 'garage' })).toBe(0);
      expect(registry.getValue(METRIC.streamUp, { stream: 'lobby' })).toBe(1);
    });

    const response = await fetch(`http://127.0.0.1:${runtime.http.port}/metrics`);
    const lines = (await response.text()).split('\n');
    expect(lines).toContain('stream_up{stream="garage"} 0');
    expect(lines).toContain('stream_up{stream="lobby"} 1');
    expect(lines).toContain('probe_errors_total{error="unreachable",stream="garage"} 1');
    expect(lines).toContain('stream_resolution_width{stream="lobby"} 1280');
    expect(probeFn).toHaveBeenCalledTimes(2);

    const health = await fetch(`http://127.0.0.1:${runtime.http.port}/healthz`);
    expect(await health.json()).toMatchObject({ status: 'ok', streams: [{ stream: 'lobby' }, { stream: 'garage' }] });
  });

  it('stops the scheduler and closes the server once', async () => {
    runtime = await startExporter({ config: createConfig(), registry: new MetricsRegistry(), probeFn });

    const first = runtime.stop();
    const second = runtime.stop();
    expect(second).toBe(first);
    await first;

    expect(runtime.scheduler.snapshot().every(worker => worker.state === 'stopped')).toBe(true);
    expect(runtime.http.server.listening).toBe(false);
  });

  it('runOnce probes each stream a single time and renders the exposition', async () => {
    const registry = new MetricsRegistry();

    const text = await runOnce({ config: createConfig(), registry, probeFn });

    expect(probeFn).toHaveBeenCalledTimes(2);
    expect(text).toBe(registry.formatPrometheus());
    expect(text.split('\n')).toContain('stream_video_codec_info{codec="h264",stream="lobby"} 1');
  });
});
