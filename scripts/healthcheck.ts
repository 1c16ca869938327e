import path from 'node:path';
import process from 'node:process';
import config from 'config';

type Writable = Pick<NodeJS.WritableStream, 'write'>;

type IoStreams = {
  stdout: Writable;
  stderr: Writable;
};

export type FetchFn = (url: string, init: { method: string; signal: AbortSignal }) => Promise<{
  status: number;
  text: () => Promise<string>;
}>;

type HealthcheckDeps = {
  fetch?: FetchFn;
  defaultUrl?: () => string;
};

const DEFAULT_TIMEOUT_MS = 5000;

function printUsage(target: Writable) {
  target.write(
    [
      'rtsp-probe-exporter healthcheck helper',
      '',
      'Usage:',
      '  node dist/scripts/healthcheck.js [--url <url>] [--timeout <ms>] [--require-up]',
      '',
      'Options:',
      '  --url <url>      Metrics endpoint to scrape (default: from server.port and server.path)',
      '  --timeout <ms>   Abort the scrape after this many milliseconds (default: 5000)',
      '  --require-up     Fail unless at least one stream reports stream_up 1',
      '  -h, --help       Show this help message'
    ].join('\n') + '\n'
  );
}

type ParsedArgs = {
  url: string | null;
  timeoutMs: number;
  requireUp: boolean;
  help: boolean;
  errors: string[];
};

function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = { url: null, timeoutMs: DEFAULT_TIMEOUT_MS, requireUp: false, help: false, errors: [] };
  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (!token) {
      continue;
    }

    if (token === '--url' || token.startsWith('--url=')) {
      const value = token === '--url' ? argv[++index] : token.slice('--url='.length);
      if (value) {
        parsed.url = value;
      } else {
        parsed.errors.push('Missing value for --url');
      }
      continue;
    }

    if (token === '--timeout' || token.startsWith('--timeout=')) {
      const value = token === '--timeout' ? argv[++index] : token.slice('--timeout='.length);
      const timeoutMs = Number(value);
      if (value && Number.isFinite(timeoutMs) && timeoutMs > 0) {
        parsed.timeoutMs = timeoutMs;
      } else {
        parsed.errors.push('--timeout expects a positive number of milliseconds');
      }
      continue;
    }

    switch (token) {
      case '--require-up':
        parsed.requireUp = true;
        break;
      case '--help':
      case '-h':
        parsed.help = true;
        break;
      default:
        parsed.errors.push(`Unknown option: ${token}`);
        break;
    }
  }
  return parsed;
}

export function resolveDefaultUrl(): string {
  const port = config.has('server.port') ? config.get<number>('server.port') : 8001;
  const metricsPath = config.has('server.path') ? config.get<string>('server.path') : '/metrics';
  return `http://127.0.0.1:${port}${metricsPath}`;
}

export function countStreamsUp(body: string): number {
  let up = 0;
  for (const line of body.split('\n')) {
    const match = /^stream_up(?:\{[^}]*\})?\s+(\S+)$/.exec(line.trim());
    if (match && Number(match[1]) === 1) {
      up += 1;
    }
  }
  return up;
}

export async function runHealthcheck(
  argv: string[],
  streams: IoStreams = { stdout: process.stdout, stderr: process.stderr },
  deps: HealthcheckDeps = {}
): Promise<number> {
  const args = parseArgs(argv);
  if (args.errors.length > 0) {
    args.errors.forEach(error => {
      streams.stderr.write(`${error}\n`);
    });
    printUsage(streams.stdout);
    return 1;
  }
  if (args.help) {
    printUsage(streams.stdout);
    return 0;
  }

  const url = args.url ?? (deps.defaultUrl ?? resolveDefaultUrl)();
  const fetchFn: FetchFn = deps.fetch ?? ((target, init) => fetch(target, init));
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), args.timeoutMs);

  try {
    const response = await fetchFn(url, { method: 'GET', signal: controller.signal });
    if (response.status !== 200) {
      streams.stderr.write(`Metrics endpoint returned HTTP ${response.status}\n`);
      return 1;
    }
    const body = await response.text();
    const up = countStreamsUp(body);
    if (args.requireUp && up === 0) {
      streams.stderr.write('No stream reports stream_up 1\n');
      return 1;
    }
    streams.stdout.write(`${JSON.stringify({ status: 'ok', url, streamsUp: up })}\n`);
    return 0;
  } catch (error) {
    const message = controller.signal.aborted
      ? `timed out after ${args.timeoutMs}ms`
      : error instanceof Error
        ? error.message
        : String(error);
    streams.stderr.write(`Metrics endpoint unreachable: ${message}\n`);
    return 1;
  } finally {
    clearTimeout(timer);
  }
}

const scriptName = path.basename(process.argv[1] ?? '');

if (scriptName === 'healthcheck.ts' || scriptName === 'healthcheck.js') {
  runHealthcheck(process.argv.slice(2)).then(code => {
    process.exitCode = code;
  }).catch(error => {
    process.stderr.write(`Healthcheck failed: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
  });
}
