import { METRIC } from './catalog.js';
import type { MetricLabels, MetricObservation, ProbeErrorKind, ProbeResult, StreamDescription } from '../types.js';

// Reported as probe_exit_code when ffprobe left no exit status: killed on timeout, or never ran.
export const TIMEOUT_EXIT_CODE = 124;
export const NO_EXIT_STATUS_CODE = 1;

/**
 * Label values of the info series currently set to 1 for a stream. The mapper needs them to
 * retire a series once its value changes.
 */
export type InfoLabelState = {
  videoCodec?: string;
  audioCodec?: string;
  bitrateMethod?: string;
  errorKind?: ProbeErrorKind;
};

export type ProbeMappingInput = {
  stream: string;
  result: ProbeResult;
  durationSeconds: number;
  consecutiveFailures: number;
  completedAt: number;
  previous?: InfoLabelState;
};

/**
 * Turns the outcome of one probe cycle into registry observations.
 *
 * A failure only touches `stream_up`, the error series and the per-cycle gauges; media gauges
 * are left alone so they keep reporting the last successful probe. A success zeroes the video
 * gauges when no video was found and the audio gauges when no audio was found.
 */
export function mapProbeResult(input: ProbeMappingInput): MetricObservation[] {
  const { stream, result } = input;
  const previous = input.previous ?? {};
  const base: MetricLabels = { stream };
  const observations: MetricObservation[] = [];
  const set = (name: string, value: number, labels: MetricLabels = base) => {
    observations.push({ name, labels, value, op: 'set' });
  };
  const setInfo = (name: string, key: string, current: string | undefined, before: string | undefined) => {
    if (before !== undefined && before !== current) {
      set(name, 0, { ...base, [key]: before });
    }
    if (current !== undefined) {
      set(name, 1, { ...base, [key]: current });
    }
  };

  if (result.ok) {
    const { description } = result;
    set(METRIC.streamUp, description.up ? 1 : 0);

    if (description.hasVideo) {
      if (description.frameRate !== undefined) {
        set(METRIC.frameRate, description.frameRate);
      }
      if (description.width !== undefined) {
        set(METRIC.width, description.width);
      }
      if (description.height !== undefined) {
        set(METRIC.height, description.height);
      }
    } else {
      set(METRIC.frameRate, 0);
      set(METRIC.width, 0);
      set(METRIC.height, 0);
    }

    if (description.bitrateBps !== undefined) {
      set(METRIC.bitrate, description.bitrateBps);
    }
    const bitrateMethod = bitrateMethodOf(description);
    if (bitrateMethod !== undefined) {
      setInfo(METRIC.bitrateMethod, 'method', bitrateMethod, previous.bitrateMethod);
    }

    setInfo(METRIC.videoCodec, 'codec', description.videoCodec || undefined, previous.videoCodec);
    setInfo(METRIC.audioCodec, 'codec', description.audioCodec || undefined, previous.audioCodec);

    if (description.hasAudio) {
      if (description.audioChannels !== undefined) {
        set(METRIC.audioChannels, description.audioChannels);
      }
      if (description.audioSampleRateHz !== undefined) {
        set(METRIC.audioSampleRate, description.audioSampleRateHz);
      }
    } else {
      set(METRIC.audioChannels, 0);
      set(METRIC.audioSampleRate, 0);
    }

    setInfo(METRIC.lastError, 'kind', undefined, previous.errorKind);
    set(METRIC.lastSuccess, Math.floor(input.completedAt / 1000));
  } else {
    set(METRIC.streamUp, 0);
    observations.push({
      name: METRIC.probeErrors,
      labels: { ...base, error: result.kind },
      value: 1,
      op: 'increment'
    });
    setInfo(METRIC.lastError, 'kind', result.kind, previous.errorKind);
  }

  set(METRIC.consecutiveFailures, input.consecutiveFailures);
  set(METRIC.probeExitCode, resolveExitCode(result));
  set(METRIC.probeDuration, input.durationSeconds);

  return observations;
}

export function resolveExitCode(result: ProbeResult): number {
  if (result.exitCode !== null) {
    return result.exitCode;
  }
  return !result.ok && result.kind === 'timeout' ? TIMEOUT_EXIT_CODE : NO_EXIT_STATUS_CODE;
}

/**
 * The info labels in effect once `result` has been mapped over `previous`.
 */
export function advanceInfoLabels(previous: InfoLabelState, result: ProbeResult): InfoLabelState {
  if (!result.ok) {
    return { ...previous, errorKind: result.kind };
  }
  const { description } = result;
  return {
    videoCodec: description.videoCodec || undefined,
    audioCodec: description.audioCodec || undefined,
    bitrateMethod: bitrateMethodOf(description) ?? previous.bitrateMethod
  };
}

function bitrateMethodOf(description: StreamDescription): string | undefined {
  return description.bitrateBps !== undefined ? description.bitrateSource : undefined;
}
