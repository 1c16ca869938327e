import ffmpeg from 'fluent-ffmpeg';
import { PassThrough } from 'node:stream';
import { MAX_SAMPLE_SECONDS, type BitrateMethod, type RtspTransport } from '../config/index.js';
import { execBounded, runBounded, type BoundedOutcome, type SpawnFn } from '../process/bounded.js';
import { resolveFfprobePath, toMicroseconds } from './ffprobe.js';

const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

export type BitrateSampleFailureReason = 'timeout' | 'process_error' | 'no_data' | 'cancelled';

export type BitrateSample =
  | { ok: true; bitrateBps: number; method: Exclude<BitrateMethod, 'auto'>; bytes: number }
  | { ok: false; reason: BitrateSampleFailureReason; message: string };

export type CommandFactory = (input: string) => ffmpeg.FfmpegCommand;

export type BitrateSamplerOptions = {
  seconds: number;
  method?: BitrateMethod;
  rtspTransport?: RtspTransport;
  connectTimeoutMs?: number;
  ffmpegPath?: string;
  ffprobePath?: string;
  forceKillTimeoutMs?: number;
  signal?: AbortSignal;
  commandFactory?: CommandFactory;
  spawn?: SpawnFn;
};

export function clampSampleSeconds(seconds: number): number {
  if (!Number.isFinite(seconds) || seconds <= 0) {
    return 0;
  }
  return Math.min(seconds, MAX_SAMPLE_SECONDS);
}

/**
 * Estimates the realized bitrate of a stream by reading it for a short window.
 * `auto` tries the ffmpeg remux first and falls back to summing ffprobe packet sizes.
 */
export async function sampleBitrate(url: string, options: BitrateSamplerOptions): Promise<BitrateSample> {
  const seconds = clampSampleSeconds(options.seconds);
  if (seconds === 0) {
    return { ok: false, reason: 'no_data', message: 'Sampling window is empty' };
  }

  const method = options.method ?? 'auto';
  if (method === 'ffprobe_packets') {
    return sampleWithFfprobePackets(url, seconds, options);
  }

  const piped = await sampleWithFfmpegPipe(url, seconds, options);
  if (piped.ok || method === 'ffmpeg_pipe' || piped.reason === 'cancelled') {
    return piped;
  }
  return sampleWithFfprobePackets(url, seconds, options);
}

function deadlineFor(seconds: number, options: BitrateSamplerOptions) {
  return seconds * 1000 + (options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS);
}

const defaultCommandFactory: CommandFactory = input => ffmpeg(input);

export async function sampleWithFfmpegPipe(
  url: string,
  seconds: number,
  options: BitrateSamplerOptions
): Promise<BitrateSample> {
  const factory = options.commandFactory ?? defaultCommandFactory;
  const connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;

  const outcome = await runBounded<number>({
    timeoutMs: deadlineFor(seconds, options),
    forceKillTimeoutMs: options.forceKillTimeoutMs,
    signal: options.signal,
    start: () => {
      const command = factory(url);
      const ffmpegPath = options.ffmpegPath?.trim() || process.env.FFMPEG_PATH;
      if (ffmpegPath) {
        command.setFfmpegPath(ffmpegPath);
      }
      command
        .inputOptions(['-rtsp_transport', options.rtspTransport ?? 'tcp', '-timeout', toMicroseconds(connectTimeoutMs)])
        .outputOptions(['-t', String(seconds), '-map', '0', '-c', 'copy'])
        .format('mpegts');

      const output = new PassThrough();
      let bytes = 0;
      output.on('data', (chunk: Buffer) => {
        bytes += chunk.length;
      });

      const done = new Promise<number>((resolve, reject) => {
        command.once('error', (error: Error) => reject(error));
        command.once('end', () => resolve(bytes));
      });
      command.pipe(output, { end: true });

      return { process: command, done };
    }
  });

  return toSample(outcome, seconds, 'ffmpeg_pipe', bytes => bytes);
}

export async function sampleWithFfprobePackets(
  url: string,
  seconds: number,
  options: BitrateSamplerOptions
): Promise<BitrateSample> {
  const connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
  const args = [
    '-v',
    'error',
    '-rtsp_transport',
    options.rtspTransport ?? 'tcp',
    '-timeout',
    toMicroseconds(connectTimeoutMs),
    '-read_intervals',
    `%+${seconds}`,
    '-show_entries',
    'packet=size',
    '-of',
    'json',
    url
  ];

  const outcome = await execBounded(resolveFfprobePath(options.ffprobePath), args, {
    timeoutMs: deadlineFor(seconds, options),
    forceKillTimeoutMs: options.forceKillTimeoutMs,
    signal: options.signal,
    spawn: options.spawn
  });

  if (outcome.status === 'completed' && outcome.value.exitCode !== 0) {
    const code = outcome.value.exitCode ?? outcome.value.signal ?? 'unknown';
    return { ok: false, reason: 'process_error', message: `ffprobe exited with ${code}` };
  }

  return toSample(outcome, seconds, 'ffprobe_packets', result => sumPacketSizes(result.stdout));
}

export function sumPacketSizes(stdout: string): number {
  let data: unknown;
  try {
    data = JSON.parse(stdout);
  } catch {
    return 0;
  }
  if (typeof data !== 'object' || data === null || !('packets' in data) || !Array.isArray(data.packets)) {
    return 0;
  }
  let total = 0;
  for (const packet of data.packets) {
    if (typeof packet !== 'object' || packet === null || !('size' in packet)) {
      continue;
    }
    const size = Number(packet.size);
    if (Number.isFinite(size) && size > 0) {
      total += size;
    }
  }
  return total;
}

function toSample<T>(
  outcome: BoundedOutcome<T>,
  seconds: number,
  method: Exclude<BitrateMethod, 'auto'>,
  countBytes: (value: T) => number
): BitrateSample {
  switch (outcome.status) {
    case 'timed-out':
      return { ok: false, reason: 'timeout', message: `${method} sample did not finish in time` };
    case 'cancelled':
      return { ok: false, reason: 'cancelled', message: `${method} sample cancelled` };
    case 'errored':
      return { ok: false, reason: 'process_error', message: outcome.error.message };
    case 'completed': {
      const bytes = countBytes(outcome.value);
      if (bytes <= 0) {
        return { ok: false, reason: 'no_data', message: `${method} sample read no data` };
      }
      return { ok: true, bitrateBps: Math.round((bytes * 8) / seconds), method, bytes };
    }
  }
}
