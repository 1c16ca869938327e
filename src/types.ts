export type ProbeErrorKind = 'timeout' | 'process_error' | 'parse_error' | 'unreachable' | 'unknown';

export interface StreamTarget {
  readonly url: string;
  readonly name: string;
  readonly intervalMs: number;
}

export type BitrateSource = 'format' | 'streams' | 'sample';

export interface StreamDescription {
  up: boolean;
  hasVideo: boolean;
  hasAudio: boolean;
  videoCodec?: string;
  audioCodec?: string;
  frameRate?: number;
  width?: number;
  height?: number;
  bitrateBps?: number;
  bitrateSource?: BitrateSource;
  audioChannels?: number;
  audioSampleRateHz?: number;
}

export type ProbeSuccess = {
  ok: true;
  description: StreamDescription;
  exitCode: number;
};

export type ProbeFailure = {
  ok: false;
  kind: ProbeErrorKind;
  message: string;
  exitCode: number | null;
};

export type ProbeResult = ProbeSuccess | ProbeFailure;

export type MetricType = 'gauge' | 'counter';

export type MetricLabels = Record<string, string>;

export interface MetricObservation {
  name: string;
  labels: MetricLabels;
  value: number;
  op: 'set' | 'increment';
}
