import config from 'config';
import type { StreamTarget } from '../types.js';
import { isRtspUrl, parseStreamEntry, parseStreamList, resolveStreamName, type StreamEntry } from '../utils/stream.js';

export type RtspTransport = 'tcp' | 'udp';

export type BitrateMethod = 'auto' | 'ffmpeg_pipe' | 'ffprobe_packets';

export type StreamConfigEntry = string | { url: string; name?: string; intervalSeconds?: number };

export type RawExporterConfig = {
  app: { name: string };
  logging: { level: string };
  streams: string | StreamConfigEntry[];
  probe: {
    intervalSeconds: number;
    timeoutSeconds: number;
    rtspTransport: RtspTransport;
    ffprobePath: string;
    forceKillTimeoutMs: number;
  };
  bitrate: {
    enabled: boolean;
    sampleSeconds: number;
    sampleEveryN: number;
    method: BitrateMethod;
    ffmpegPath: string;
  };
  server: { host: string; port: number; path: string };
  shutdown: { graceSeconds: number };
};

export type ProbeConfig = {
  timeoutMs: number;
  rtspTransport: RtspTransport;
  ffprobePath: string;
  forceKillTimeoutMs: number;
};

export type BitrateConfig = {
  enabled: boolean;
  sampleSeconds: number;
  sampleEveryN: number;
  method: BitrateMethod;
  ffmpegPath: string;
};

export type ServerConfig = {
  host: string;
  port: number;
  path: string;
};

export type ExporterConfig = {
  app: { name: string };
  logging: { level: string };
  streams: StreamTarget[];
  probe: ProbeConfig;
  bitrate: BitrateConfig;
  server: ServerConfig;
  shutdown: { graceMs: number };
};

export const MAX_SAMPLE_SECONDS = 30;

type JsonType = 'object' | 'number' | 'string' | 'boolean' | 'array';

type JsonSchema = {
  type: JsonType | JsonType[];
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean | JsonSchema;
  items?: JsonSchema;
  enum?: (string | number | boolean)[];
  minimum?: number;
  maximum?: number;
};

const streamEntrySchema: JsonSchema = {
  type: ['string', 'object'],
  required: ['url'],
  additionalProperties: false,
  properties: {
    url: { type: 'string' },
    name: { type: 'string' },
    intervalSeconds: { type: 'number', minimum: 0 }
  }
};

const exporterConfigSchema: JsonSchema = {
  type: 'object',
  required: ['app', 'logging', 'streams', 'probe', 'bitrate', 'server', 'shutdown'],
  additionalProperties: true,
  properties: {
    app: {
      type: 'object',
      required: ['name'],
      additionalProperties: false,
      properties: {
        name: { type: 'string' }
      }
    },
    logging: {
      type: 'object',
      required: ['level'],
      additionalProperties: false,
      properties: {
        level: { type: 'string' }
      }
    },
    streams: {
      type: ['string', 'array'],
      items: streamEntrySchema
    },
    probe: {
      type: 'object',
      required: ['intervalSeconds', 'timeoutSeconds', 'rtspTransport', 'ffprobePath', 'forceKillTimeoutMs'],
      additionalProperties: false,
      properties: {
        intervalSeconds: { type: 'number', minimum: 0 },
        timeoutSeconds: { type: 'number', minimum: 0 },
        rtspTransport: { type: 'string', enum: ['tcp', 'udp'] },
        ffprobePath: { type: 'string' },
        forceKillTimeoutMs: { type: 'number', minimum: 0 }
      }
    },
    bitrate: {
      type: 'object',
      required: ['enabled', 'sampleSeconds', 'sampleEveryN', 'method', 'ffmpegPath'],
      additionalProperties: false,
      properties: {
        enabled: { type: 'boolean' },
        sampleSeconds: { type: 'number', minimum: 0, maximum: MAX_SAMPLE_SECONDS },
        sampleEveryN: { type: 'number', minimum: 1 },
        method: { type: 'string', enum: ['auto', 'ffmpeg_pipe', 'ffprobe_packets'] },
        ffmpegPath: { type: 'string' }
      }
    },
    server: {
      type: 'object',
      required: ['host', 'port', 'path'],
      additionalProperties: false,
      properties: {
        host: { type: 'string' },
        port: { type: 'number', minimum: 0, maximum: 65535 },
        path: { type: 'string' }
      }
    },
    shutdown: {
      type: 'object',
      required: ['graceSeconds'],
      additionalProperties: false,
      properties: {
        graceSeconds: { type: 'number', minimum: 0 }
      }
    }
  }
};

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const types = Array.isArray(schema.type) ? schema.type : [schema.type];
  const results = types.map(type => validateAgainstSchemaForType(type, schema, value, pathLabel));

  if (results.some(errors => errors.length === 0)) {
    return [];
  }

  return results[0] ?? [];
}

function validateAgainstSchemaForType(
  type: JsonType,
  schema: JsonSchema,
  value: unknown,
  pathLabel: string
): string[] {
  const errors: string[] = [];

  if (type === 'object') {
    if (!isRecord(value)) {
      errors.push(`${pathLabel} must be an object`);
      return errors;
    }

    for (const key of schema.required ?? []) {
      if (!(key in value)) {
        errors.push(`${pathLabel}.${key} is required`);
      }
    }

    const definedProperties = new Set(Object.keys(schema.properties ?? {}));
    if (schema.additionalProperties === false) {
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(`${pathLabel}.${key} is not allowed`);
        }
      }
    } else if (schema.additionalProperties && typeof schema.additionalProperties === 'object') {
      for (const key of Object.keys(value)) {
        if (definedProperties.has(key)) {
          continue;
        }
        errors.push(...validateAgainstSchema(schema.additionalProperties, value[key], `${pathLabel}.${key}`));
      }
    }

    for (const [key, childSchema] of Object.entries(schema.properties ?? {})) {
      if (!(key in value)) {
        continue;
      }
      errors.push(...validateAgainstSchema(childSchema, value[key], `${pathLabel}.${key}`));
    }

    return errors;
  }

  if (type === 'array') {
    if (!Array.isArray(value)) {
      errors.push(`${pathLabel} must be an array`);
      return errors;
    }

    const itemSchema = schema.items;
    if (itemSchema) {
      value.forEach((item, index) => {
        errors.push(...validateAgainstSchema(itemSchema, item, `${pathLabel}[${index}]`));
      });
    }

    return errors;
  }

  if (type === 'number') {
    if (typeof value !== 'number' || Number.isNaN(value)) {
      errors.push(`${pathLabel} must be a number`);
      return errors;
    }

    if (typeof schema.minimum === 'number' && value < schema.minimum) {
      errors.push(`${pathLabel} must be >= ${schema.minimum}`);
    }

    if (typeof schema.maximum === 'number' && value > schema.maximum) {
      errors.push(`${pathLabel} must be <= ${schema.maximum}`);
    }

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
    }

    return errors;
  }

  if (type === 'string') {
    if (typeof value !== 'string') {
      errors.push(`${pathLabel} must be a string`);
      return errors;
    }

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
    }

    return errors;
  }

  if (type === 'boolean') {
    if (typeof value !== 'boolean') {
      errors.push(`${pathLabel} must be a boolean`);
    }
    return errors;
  }

  return errors;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function validateConfig(raw: unknown): asserts raw is RawExporterConfig {
  const errors = validateAgainstSchema(exporterConfigSchema, raw, 'config');
  if (errors.length > 0) {
    throw new Error(errors.join('; '));
  }
}

/**
 * Validates a raw configuration object and resolves it into stream targets and millisecond
 * durations. Every problem found is reported in a single error.
 */
export function resolveConfig(raw: unknown): ExporterConfig {
  validateConfig(raw);

  const messages: string[] = [];
  const { probe, bitrate, server, shutdown } = raw;

  const defaultIntervalMs = resolveIntervalMs(probe.intervalSeconds, 'config.probe.intervalSeconds', messages) ?? 0;

  if (probe.timeoutSeconds <= 0) {
    messages.push('config.probe.timeoutSeconds must be positive');
  }
  if (!probe.ffprobePath.trim()) {
    messages.push('config.probe.ffprobePath must be a non-empty string');
  }
  if (bitrate.enabled && bitrate.sampleSeconds <= 0) {
    messages.push('config.bitrate.sampleSeconds must be positive when sampling is enabled');
  }
  if (!Number.isInteger(bitrate.sampleEveryN)) {
    messages.push('config.bitrate.sampleEveryN must be an integer');
  }
  if (!Number.isInteger(server.port)) {
    messages.push('config.server.port must be an integer');
  }
  if (!server.path.startsWith('/')) {
    messages.push('config.server.path must start with "/"');
  }

  const streams = resolveStreamTargets(raw.streams, defaultIntervalMs, messages);

  if (messages.length > 0) {
    throw new Error(messages.join('; '));
  }

  return {
    app: { name: raw.app.name },
    logging: { level: raw.logging.level },
    streams,
    probe: {
      timeoutMs: Math.round(probe.timeoutSeconds * 1000),
      rtspTransport: probe.rtspTransport,
      ffprobePath: probe.ffprobePath.trim(),
      forceKillTimeoutMs: probe.forceKillTimeoutMs
    },
    bitrate: {
      enabled: bitrate.enabled,
      sampleSeconds: bitrate.sampleSeconds,
      sampleEveryN: bitrate.sampleEveryN,
      method: bitrate.method,
      ffmpegPath: bitrate.ffmpegPath.trim() || 'ffmpeg'
    },
    server: { host: server.host, port: server.port, path: server.path },
    shutdown: { graceMs: Math.round(shutdown.graceSeconds * 1000) }
  };
}

// setTimeout fires after 1 ms for any delay above this.
const MAX_TIMER_DELAY_MS = 2_147_483_647;

function resolveIntervalMs(seconds: number, label: string, messages: string[]): number | null {
  if (seconds <= 0) {
    messages.push(`${label} must be positive`);
    return null;
  }
  const intervalMs = Math.round(seconds * 1000);
  if (intervalMs < 1 || intervalMs > MAX_TIMER_DELAY_MS) {
    messages.push(`${label} must be between 0.001 and ${MAX_TIMER_DELAY_MS / 1000} seconds`);
    return null;
  }
  return intervalMs;
}

function resolveStreamTargets(
  streams: RawExporterConfig['streams'],
  defaultIntervalMs: number,
  messages: string[]
): StreamTarget[] {
  const entries: Array<StreamEntry & { intervalSeconds?: number }> =
    typeof streams === 'string'
      ? parseStreamList(streams)
      : streams.map(entry => (typeof entry === 'string' ? parseStreamEntry(entry) : { ...entry }));

  const targets: StreamTarget[] = [];
  const names = new Map<string, number>();

  entries.forEach((entry, index) => {
    const url = entry.url.trim();
    const label = `config.streams[${index}]`;
    if (!isRtspUrl(url)) {
      messages.push(`${label} must be an rtsp:// or rtsps:// URL`);
      return;
    }

    let intervalMs = defaultIntervalMs;
    if (typeof entry.intervalSeconds === 'number') {
      const resolved = resolveIntervalMs(entry.intervalSeconds, `${label}.intervalSeconds`, messages);
      if (resolved === null) {
        return;
      }
      intervalMs = resolved;
    }

    const name = resolveStreamName({ url, name: entry.name });
    const existing = names.get(name);
    if (existing !== undefined) {
      messages.push(`${label} duplicates stream "${name}" already defined by config.streams[${existing}]`);
      return;
    }
    names.set(name, index);

    targets.push(Object.freeze({ url, name, intervalMs }));
  });

  return targets;
}

export function loadExporterConfig(source: typeof config = config): ExporterConfig {
  const raw: unknown = source.util.toObject(source);
  return resolveConfig(raw);
}
