import type { MetricsRegistry, MetricDescriptor } from './index.js';

export const METRIC = {
  streamUp: 'stream_up',
  frameRate: 'stream_frame_rate',
  width: 'stream_resolution_width',
  height: 'stream_resolution_height',
  bitrate: 'stream_bitrate_bps',
  bitrateMethod: 'stream_bitrate_method_info',
  videoCodec: 'stream_video_codec_info',
  audioCodec: 'stream_audio_codec_info',
  audioChannels: 'stream_audio_channels',
  audioSampleRate: 'stream_audio_sample_rate_hz',
  consecutiveFailures: 'stream_consecutive_failures',
  lastSuccess: 'stream_last_success_timestamp_seconds',
  lastError: 'stream_last_error_info',
  probeErrors: 'probe_errors_total',
  probeDuration: 'probe_duration_seconds',
  probeExitCode: 'probe_exit_code',
  cyclesSkipped: 'probe_cycles_skipped_total',
  bitrateSampleErrors: 'bitrate_sample_errors_total',
  bitrateSampleWindow: 'bitrate_last_sample_seconds',
  logMessages: 'exporter_log_messages_total'
} as const;

export type MetricName = (typeof METRIC)[keyof typeof METRIC];

// Media-property gauges keep their last successful value while a stream is down; read them together
// with stream_up.
const STALE_NOTE = 'Keeps the last known value while stream_up is 0.';
const NO_VIDEO_NOTE = '0 when the last successful probe found no video.';
const NO_AUDIO_NOTE = '0 when the last successful probe found no audio.';

export const METRIC_CATALOG: Record<MetricName, MetricDescriptor> = {
  [METRIC.streamUp]: { type: 'gauge', help: 'Whether the last probe of the stream succeeded (1) or failed (0).' },
  [METRIC.frameRate]: {
    type: 'gauge',
    help: `Average frame rate of the video stream. ${NO_VIDEO_NOTE} ${STALE_NOTE}`
  },
  [METRIC.width]: { type: 'gauge', help: `Width of the video stream in pixels. ${NO_VIDEO_NOTE} ${STALE_NOTE}` },
  [METRIC.height]: { type: 'gauge', help: `Height of the video stream in pixels. ${NO_VIDEO_NOTE} ${STALE_NOTE}` },
  [METRIC.bitrate]: {
    type: 'gauge',
    help: `Reported or sampled bitrate of the stream in bits per second. ${STALE_NOTE}`
  },
  [METRIC.bitrateMethod]: {
    type: 'gauge',
    help: 'How the bitrate was obtained (format, streams or sample); 1 for the current method, 0 for earlier ones.'
  },
  [METRIC.videoCodec]: { type: 'gauge', help: 'Video codec of the stream; 1 for the current codec, 0 for earlier ones.' },
  [METRIC.audioCodec]: { type: 'gauge', help: 'Audio codec of the stream; 1 for the current codec, 0 for earlier ones.' },
  [METRIC.audioChannels]: { type: 'gauge', help: `Audio channel count. ${NO_AUDIO_NOTE} ${STALE_NOTE}` },
  [METRIC.audioSampleRate]: { type: 'gauge', help: `Audio sample rate in Hz. ${NO_AUDIO_NOTE} ${STALE_NOTE}` },
  [METRIC.consecutiveFailures]: {
    type: 'gauge',
    help: 'Number of failed probes since the last successful one.'
  },
  [METRIC.lastSuccess]: { type: 'gauge', help: 'Unix time of the last successful probe.' },
  [METRIC.lastError]: {
    type: 'gauge',
    help: 'Error kind of the failing probe; 1 while the stream is failing with that kind, 0 otherwise.'
  },
  [METRIC.probeErrors]: { type: 'counter', help: 'Failed probes by error kind.' },
  [METRIC.probeDuration]: { type: 'gauge', help: 'Wall time of the last probe cycle in seconds.' },
  [METRIC.probeExitCode]: {
    type: 'gauge',
    help: 'Exit code of the last ffprobe run; 124 when it was killed on timeout, 1 when it left no exit status.'
  },
  [METRIC.cyclesSkipped]: {
    type: 'counter',
    help: 'Scheduled probes skipped because the previous probe of the stream was still running.'
  },
  [METRIC.bitrateSampleErrors]: { type: 'counter', help: 'Failed bitrate samples by reason.' },
  [METRIC.bitrateSampleWindow]: {
    type: 'gauge',
    help: 'Window of the last attempted bitrate sample in seconds.'
  },
  [METRIC.logMessages]: { type: 'counter', help: 'Log lines written, by level.' }
};

export function registerMetricCatalog(registry: MetricsRegistry) {
  for (const [name, descriptor] of Object.entries(METRIC_CATALOG)) {
    registry.describe(name, descriptor);
  }
}
