import { performance } from 'node:perf_hooks';
import type { Logger } from 'pino';
import defaultLogger from '../logger.js';
import defaultRegistry, { type MetricsRegistry } from '../metrics/index.js';
import { METRIC } from '../metrics/catalog.js';
import { advanceInfoLabels, mapProbeResult, type InfoLabelState } from '../metrics/mapper.js';
import { probeStream, type ProbeOptions } from '../probe/ffprobe.js';
import { sampleBitrate, type BitrateSample, type BitrateSamplerOptions } from '../probe/bitrate.js';
import type { BitrateConfig, ProbeConfig } from '../config/index.js';
import type { ProbeResult, StreamDescription, StreamTarget } from '../types.js';
import { redactUrlsInText } from '../utils/stream.js';

export type ProbeFn = (url: string, options: ProbeOptions) => Promise<ProbeResult>;
export type SampleFn = (url: string, options: BitrateSamplerOptions) => Promise<BitrateSample>;

export type ProbeCycleOptions = {
  target: StreamTarget;
  probe: ProbeConfig;
  bitrate: BitrateConfig;
  registry?: MetricsRegistry;
  logger?: Pick<Logger, 'debug' | 'info' | 'warn'>;
  probeFn?: ProbeFn;
  sampleFn?: SampleFn;
  clock?: () => number;
  now?: () => number;
};

export type ProbeCycleReport = {
  result: ProbeResult;
  durationSeconds: number;
  consecutiveFailures: number;
};

/**
 * One stream's probe pipeline. The instance is owned by a single worker, so the per-stream state
 * it tracks is never written concurrently.
 */
export class ProbeCycle {
  private consecutiveFailures = 0;
  private sampleEligibleProbes = 0;
  private infoLabels: InfoLabelState = {};
  private readonly registry: MetricsRegistry;
  private readonly log: Pick<Logger, 'debug' | 'info' | 'warn'>;
  private readonly probeFn: ProbeFn;
  private readonly sampleFn: SampleFn;
  private readonly clock: () => number;
  private readonly now: () => number;

  constructor(private readonly options: ProbeCycleOptions) {
    this.registry = options.registry ?? defaultRegistry;
    this.log = options.logger ?? defaultLogger;
    this.probeFn = options.probeFn ?? probeStream;
    this.sampleFn = options.sampleFn ?? sampleBitrate;
    this.clock = options.clock ?? (() => performance.now());
    this.now = options.now ?? Date.now;
  }

  get target(): StreamTarget {
    return this.options.target;
  }

  /**
   * Probes the stream and applies the resulting observations. Returns null when the signal aborted
   * the probe itself; nothing is written to the registry in that case.
   */
  async run(signal?: AbortSignal): Promise<ProbeCycleReport | null> {
    const { target, probe } = this.options;
    const startedAt = this.clock();

    let result = await this.probeFn(target.url, {
      timeoutMs: probe.timeoutMs,
      rtspTransport: probe.rtspTransport,
      ffprobePath: probe.ffprobePath,
      forceKillTimeoutMs: probe.forceKillTimeoutMs,
      signal
    });

    if (signal?.aborted) {
      this.log.debug({ stream: target.name }, 'Probe cancelled');
      return null;
    }

    if (result.ok) {
      const description = await this.maybeSampleBitrate(result.description, signal);
      result = { ...result, description };
      this.consecutiveFailures = 0;
    } else {
      this.consecutiveFailures += 1;
    }

    const durationSeconds = Math.max(0, (this.clock() - startedAt) / 1000);
    this.registry.apply(
      mapProbeResult({
        stream: target.name,
        result,
        durationSeconds,
        consecutiveFailures: this.consecutiveFailures,
        completedAt: this.now(),
        previous: this.infoLabels
      })
    );
    this.infoLabels = advanceInfoLabels(this.infoLabels, result);

    if (result.ok) {
      this.log.debug(
        {
          stream: target.name,
          durationSeconds,
          videoCodec: result.description.videoCodec,
          audioCodec: result.description.audioCodec,
          bitrateBps: result.description.bitrateBps
        },
        'Stream probe succeeded'
      );
    } else {
      this.log.warn(
        {
          stream: target.name,
          kind: result.kind,
          exitCode: result.exitCode,
          consecutiveFailures: this.consecutiveFailures,
          reason: redactUrlsInText(result.message)
        },
        `Stream probe failed (kind=${result.kind})`
      );
    }

    return { result, durationSeconds, consecutiveFailures: this.consecutiveFailures };
  }

  private async maybeSampleBitrate(
    description: StreamDescription,
    signal?: AbortSignal
  ): Promise<StreamDescription> {
    const { bitrate, target, probe } = this.options;
    if (!bitrate.enabled || description.bitrateBps !== undefined) {
      return description;
    }

    this.sampleEligibleProbes += 1;
    if (this.sampleEligibleProbes % Math.max(1, bitrate.sampleEveryN) !== 0) {
      return description;
    }

    this.registry.setGauge(METRIC.bitrateSampleWindow, { stream: target.name }, bitrate.sampleSeconds);
    const sample = await this.sampleFn(target.url, {
      seconds: bitrate.sampleSeconds,
      method: bitrate.method,
      rtspTransport: probe.rtspTransport,
      ffmpegPath: bitrate.ffmpegPath,
      ffprobePath: probe.ffprobePath,
      forceKillTimeoutMs: probe.forceKillTimeoutMs,
      signal
    });

    if (!sample.ok) {
      this.registry.incrementCounter(METRIC.bitrateSampleErrors, { stream: target.name, reason: sample.reason });
      this.log.debug({ stream: target.name, reason: sample.reason, message: redactUrlsInText(sample.message) }, 'Bitrate sample failed');
      return description;
    }

    this.log.debug(
      { stream: target.name, method: sample.method, bytes: sample.bytes, bitrateBps: sample.bitrateBps },
      'Bitrate sampled'
    );
    return { ...description, bitrateBps: sample.bitrateBps, bitrateSource: 'sample' };
  }
}
