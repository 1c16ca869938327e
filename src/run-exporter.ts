#!/usr/bin/env node
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import logger from './logger.js';
import { loadExporterConfig, type ExporterConfig } from './config/index.js';
import defaultRegistry, { type MetricsRegistry } from './metrics/index.js';
import { registerMetricCatalog } from './metrics/catalog.js';
import { ProbeCycle, type ProbeFn, type SampleFn } from './pipeline/probeCycle.js';
import { ProbeScheduler } from './scheduler/index.js';
import { startHttpServer, type HttpServerRuntime } from './server/http.js';

export type ExporterStartOptions = {
  config?: ExporterConfig;
  registry?: MetricsRegistry;
  probeFn?: ProbeFn;
  sampleFn?: SampleFn;
};

export type ExporterRuntime = {
  config: ExporterConfig;
  scheduler: ProbeScheduler;
  http: HttpServerRuntime;
  stop: () => Promise<void>;
};

function createScheduler(config: ExporterConfig, registry: MetricsRegistry, options: ExporterStartOptions) {
  return new ProbeScheduler(
    config.streams,
    target => {
      const cycle = new ProbeCycle({
        target,
        probe: config.probe,
        bitrate: config.bitrate,
        registry,
        probeFn: options.probeFn,
        sampleFn: options.sampleFn
      });
      return signal => cycle.run(signal);
    },
    { registry }
  );
}

/**
 * Loads configuration, binds the metrics endpoint and starts one probe worker per stream. The
 * endpoint is bound first so a port conflict fails startup before any probe runs.
 */
export async function startExporter(options: ExporterStartOptions = {}): Promise<ExporterRuntime> {
  const config = options.config ?? loadExporterConfig();
  const registry = options.registry ?? defaultRegistry;
  registerMetricCatalog(registry);

  const scheduler = createScheduler(config, registry, options);
  const http = await startHttpServer({
    registry,
    host: config.server.host,
    port: config.server.port,
    path: config.server.path,
    health: () => ({ streams: scheduler.snapshot() })
  });

  scheduler.start();
  logger.info(
    { streams: config.streams.map(stream => stream.name), port: http.port, path: config.server.path },
    'Exporter started'
  );

  let stopping: Promise<void> | null = null;
  const stop = () => {
    stopping ??= (async () => {
      logger.info({ graceMs: config.shutdown.graceMs }, 'Stopping exporter');
      await scheduler.stop({ graceMs: config.shutdown.graceMs });
      await http.close();
    })();
    return stopping;
  };

  return { config, scheduler, http, stop };
}

/**
 * Probes every stream once and returns the exposition text.
 */
export async function runOnce(options: ExporterStartOptions = {}): Promise<string> {
  const config = options.config ?? loadExporterConfig();
  const registry = options.registry ?? defaultRegistry;
  registerMetricCatalog(registry);

  const scheduler = createScheduler(config, registry, options);
  await scheduler.runOnce();
  return registry.formatPrometheus();
}

async function main(argv: string[]) {
  if (argv.includes('--once')) {
    process.stdout.write(await runOnce());
    return;
  }

  const runtime = await startExporter();
  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Received shutdown signal');
    runtime
      .stop()
      .catch(error => {
        logger.error({ err: error }, 'Exporter shutdown failed');
        process.exitCode = 1;
      })
      .finally(() => {
        process.exit();
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

function isEntryPoint(scriptPath: string | undefined) {
  if (!scriptPath) {
    return false;
  }
  try {
    return fs.realpathSync(scriptPath) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint(process.argv[1])) {
  main(process.argv.slice(2)).catch(error => {
    logger.error({ err: error }, 'Exporter failed to start');
    process.exitCode = 1;
  });
}
