import type { RtspTransport } from '../config/index.js';
import { execBounded, type ExecResult, type SpawnFn } from '../process/bounded.js';
import type { ProbeErrorKind, ProbeFailure, ProbeResult, StreamDescription } from '../types.js';
import { redactStreamUrl, redactUrlsInText } from '../utils/stream.js';

const DEFAULT_RTSP_TRANSPORT: RtspTransport = 'tcp';
const MAX_REASON_LENGTH = 120;

const TIMEOUT_PATTERNS = [/timed?\s*out/i, /\btimeout\b/i];

const UNREACHABLE_PATTERNS = [
  /connection\s+refused/i,
  /connection\s+reset/i,
  /no\s+route\s+to\s+host/i,
  /network\s+is\s+unreachable/i,
  /host\s+is\s+unreachable/i,
  /unable\s+to\s+connect/i,
  /name\s+or\s+service\s+not\s+known/i,
  /no\s+such\s+host/i,
  /temporary\s+failure\s+in\s+name\s+resolution/i,
  /failed\s+to\s+resolve/i,
  /\b404\b/,
  /\b40[13]\b/,
  /\b454\b|session\s+not\s+found/i
];

const UNSUPPORTED_OPTION_PATTERNS = [/unrecognized\s+option/i, /option\s+not\s+found/i];

export type ProbeOptions = {
  timeoutMs: number;
  rtspTransport?: RtspTransport;
  ffprobePath?: string;
  forceKillTimeoutMs?: number;
  signal?: AbortSignal;
  spawn?: SpawnFn;
};

export function resolveFfprobePath(explicit?: string): string {
  const configured = explicit?.trim();
  if (configured) {
    return configured;
  }
  const fromEnv = process.env.FFPROBE_PATH?.trim();
  return fromEnv || 'ffprobe';
}

export function toMicroseconds(ms: number): string {
  return String(Math.max(0, Math.round(ms * 1000)));
}

export function buildFfprobeArgs(
  url: string,
  options: { timeoutMs: number; rtspTransport?: RtspTransport; includeTimeout?: boolean }
): string[] {
  const args = ['-v', 'error', '-rtsp_transport', options.rtspTransport ?? DEFAULT_RTSP_TRANSPORT];
  if (options.includeTimeout !== false) {
    args.push('-timeout', toMicroseconds(options.timeoutMs));
  }
  args.push('-print_format', 'json', '-show_streams', '-show_format', url);
  return args;
}

/**
 * Inspects one stream with ffprobe. Never rejects: every failure is reported as a
 * {@link ProbeFailure} carrying its error kind.
 */
export async function probeStream(url: string, options: ProbeOptions): Promise<ProbeResult> {
  const command = resolveFfprobePath(options.ffprobePath);

  let outcome = await runFfprobe(command, url, options, true);
  if (outcome.status === 'completed' && outcome.value.exitCode !== 0) {
    // Older builds reject -timeout for RTSP; retry once without it.
    const stderr = outcome.value.stderr;
    if (UNSUPPORTED_OPTION_PATTERNS.some(pattern => pattern.test(stderr))) {
      outcome = await runFfprobe(command, url, options, false);
    }
  }

  switch (outcome.status) {
    case 'timed-out':
      return failure('timeout', `ffprobe did not finish within ${options.timeoutMs}ms`, null);
    case 'cancelled':
      return failure('unknown', 'Probe cancelled', null);
    case 'errored':
      return classifySpawnError(outcome.error);
    case 'completed':
      return interpretExecResult(outcome.value, url);
  }
}

function runFfprobe(command: string, url: string, options: ProbeOptions, includeTimeout: boolean) {
  return execBounded(command, buildFfprobeArgs(url, { ...options, includeTimeout }), {
    timeoutMs: options.timeoutMs,
    forceKillTimeoutMs: options.forceKillTimeoutMs,
    signal: options.signal,
    spawn: options.spawn
  });
}

/**
 * Turns a finished ffprobe run into a probe result. When `url` is given it is removed from stderr
 * before classification, and the failure message never carries its credentials.
 */
export function interpretExecResult(result: ExecResult, url?: string): ProbeResult {
  const exitCode = result.exitCode;
  if (exitCode !== 0) {
    const kind = classifyProbeStderr(url ? stripUrl(result.stderr, url) : result.stderr) ?? 'process_error';
    const masked = url ? result.stderr.split(url).join(redactStreamUrl(url)) : result.stderr;
    const reason = shortReason(redactUrlsInText(masked));
    const status = exitCode === null ? `signal ${result.signal ?? 'unknown'}` : `code ${exitCode}`;
    return failure(kind, reason ?? `ffprobe exited with ${status}`, exitCode);
  }

  if (result.stdoutTruncated) {
    return failure('parse_error', 'ffprobe output exceeded the buffer limit', exitCode);
  }

  const parsed = parseFfprobeOutput(result.stdout);
  if (!parsed.ok) {
    return failure('parse_error', parsed.message, exitCode);
  }
  return { ok: true, description: parsed.description, exitCode };
}

// Path segments and query options of the probed URL must not match a classification pattern.
function stripUrl(stderr: string, url: string): string {
  return stderr.split(url).join('').split(redactStreamUrl(url)).join('');
}

export function classifyProbeStderr(stderr: string): ProbeErrorKind | null {
  const text = stderr.trim();
  if (!text) {
    return null;
  }
  if (TIMEOUT_PATTERNS.some(pattern => pattern.test(text))) {
    return 'timeout';
  }
  if (UNREACHABLE_PATTERNS.some(pattern => pattern.test(text))) {
    return 'unreachable';
  }
  return null;
}

function classifySpawnError(error: Error & { code?: unknown }): ProbeFailure {
  const code = typeof error.code === 'string' ? error.code : null;
  if (code === 'ENOENT' || code === 'EACCES' || code === 'EPERM') {
    return failure('process_error', `Unable to run ffprobe (${code})`, null);
  }
  return failure('unknown', error.message || 'ffprobe failed', null);
}

function failure(kind: ProbeErrorKind, message: string, exitCode: number | null): ProbeFailure {
  return { ok: false, kind, message, exitCode };
}

export function shortReason(stderr: string): string | null {
  const collapsed = stderr.replace(/\s+/g, ' ').trim();
  if (!collapsed) {
    return null;
  }
  return collapsed.slice(0, MAX_REASON_LENGTH);
}

export type ParsedProbeOutput =
  | { ok: true; description: StreamDescription }
  | { ok: false; message: string };

/**
 * Normalizes `ffprobe -print_format json` output. Every field is optional; only the presence of
 * at least one audio or video stream entry is required.
 */
export function parseFfprobeOutput(stdout: string): ParsedProbeOutput {
  const text = stdout.trim();
  if (!text) {
    return { ok: false, message: 'ffprobe produced no output' };
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, message: `ffprobe output is not valid JSON: ${message}` };
  }

  if (!isRecord(data) || !Array.isArray(data.streams)) {
    return { ok: false, message: 'ffprobe output has no streams array' };
  }

  const entries = data.streams.filter(isRecord);
  const video = entries.find(entry => entry.codec_type === 'video');
  const audio = entries.find(entry => entry.codec_type === 'audio');
  if (!video && !audio) {
    return { ok: false, message: 'ffprobe found no audio or video streams' };
  }

  const description: StreamDescription = {
    up: true,
    hasVideo: Boolean(video),
    hasAudio: Boolean(audio)
  };

  if (video) {
    description.videoCodec = readString(video, 'codec_name');
    description.width = readPositiveInteger(video, 'width');
    description.height = readPositiveInteger(video, 'height');
    description.frameRate = resolveFrameRate(video);
  }

  if (audio) {
    description.audioCodec = readString(audio, 'codec_name');
    description.audioChannels = readPositiveInteger(audio, 'channels');
    description.audioSampleRateHz = readPositiveNumber(audio, 'sample_rate');
  }

  const formatBitrate = isRecord(data.format) ? readPositiveNumber(data.format, 'bit_rate') : undefined;
  if (formatBitrate !== undefined) {
    description.bitrateBps = formatBitrate;
    description.bitrateSource = 'format';
  } else {
    const streamsBitrate = entries.reduce((total, entry) => total + (readPositiveNumber(entry, 'bit_rate') ?? 0), 0);
    if (streamsBitrate > 0) {
      description.bitrateBps = streamsBitrate;
      description.bitrateSource = 'streams';
    }
  }

  return { ok: true, description };
}

function resolveFrameRate(video: Record<string, unknown>): number | undefined {
  const average = parseFrameRate(video.avg_frame_rate);
  if (average !== undefined && average > 0) {
    return average;
  }
  const real = parseFrameRate(video.r_frame_rate);
  if (real !== undefined && real > 0) {
    return real;
  }
  return average;
}

export function parseFrameRate(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value : undefined;
  }
  if (typeof value !== 'string') {
    return undefined;
  }
  const [numeratorText, denominatorText] = value.trim().split('/', 2);
  const numerator = Number(numeratorText);
  const denominator = denominatorText === undefined ? 1 : Number(denominatorText);
  if (!Number.isFinite(numerator) || !Number.isFinite(denominator) || denominator === 0) {
    return undefined;
  }
  const rate = numerator / denominator;
  return rate >= 0 ? rate : undefined;
}

function readString(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function readPositiveNumber(record: Record<string, unknown>, key: string): number | undefined {
  const value = record[key];
  const numeric = typeof value === 'number' ? value : typeof value === 'string' && value.trim() ? Number(value) : NaN;
  return Number.isFinite(numeric) && numeric > 0 ? numeric : undefined;
}

function readPositiveInteger(record: Record<string, unknown>, key: string): number | undefined {
  const value = readPositiveNumber(record, key);
  return value !== undefined && Number.isInteger(value) ? value : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
