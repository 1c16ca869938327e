const RTSP_PROTOCOLS = new Set(['rtsp:', 'rtsps:']);

export function isRtspUrl(value: string | null | undefined): boolean {
  const trimmed = typeof value === 'string' ? value.trim() : '';
  if (!trimmed) {
    return false;
  }
  try {
    const parsed = new URL(trimmed);
    return RTSP_PROTOCOLS.has(parsed.protocol.toLowerCase()) && parsed.hostname.length > 0;
  } catch {
    return false;
  }
}

/**
 * Removes user info from a stream URL so it can be used as a label or logged.
 * Values that do not parse as URLs are returned trimmed.
 */
export function redactStreamUrl(value: string): string {
  const trimmed = value.trim();
  try {
    const parsed = new URL(trimmed);
    if (!parsed.username && !parsed.password) {
      return trimmed;
    }
    parsed.username = '';
    parsed.password = '';
    return parsed.toString();
  } catch {
    return trimmed;
  }
}

const EMBEDDED_USERINFO_PATTERN = /\b([a-z][a-z0-9+.-]*:\/\/)[^\s/@]+@/gi;

/**
 * Strips user info from every URL embedded in free text, such as a line of ffprobe stderr.
 */
export function redactUrlsInText(text: string): string {
  return text.replace(EMBEDDED_USERINFO_PATTERN, '$1');
}

export type StreamEntry = {
  url: string;
  name?: string;
};

/**
 * Splits a stream list such as `lobby=rtsp://cam-1/live, rtsp://cam-2/live` into entries.
 * Commas, semicolons and whitespace all separate entries; `name=` prefixes are optional.
 */
export function parseStreamList(value: string): StreamEntry[] {
  return value
    .split(/[\s,;]+/)
    .map(part => part.trim())
    .filter(part => part.length > 0)
    .map(parseStreamEntry);
}

export function parseStreamEntry(value: string): StreamEntry {
  const trimmed = value.trim();
  const match = /^([A-Za-z0-9_.:-]+)=(rtsps?:\/\/.*)$/i.exec(trimmed);
  if (match) {
    const [, name, url] = match;
    return { name, url };
  }
  return { url: trimmed };
}

export function resolveStreamName(entry: StreamEntry): string {
  const explicit = typeof entry.name === 'string' ? entry.name.trim() : '';
  if (explicit) {
    return explicit;
  }
  return redactStreamUrl(entry.url);
}
