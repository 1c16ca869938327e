import pino from 'pino';
import config from 'config';
import metrics from './metrics/index.js';
import { METRIC, METRIC_CATALOG } from './metrics/catalog.js';

const level = config.has('logging.level') ? config.get<string>('logging.level') : 'info';
const name = config.has('app.name') ? config.get<string>('app.name') : 'rtsp-probe-exporter';

const AVAILABLE_LOG_LEVELS = new Set(
  Object.keys(pino.levels.values).map(value => value.toLowerCase()).concat('silent')
);

metrics.describe(METRIC.logMessages, METRIC_CATALOG[METRIC.logMessages]);

function resolveLevel(value: string) {
  const normalized = value.trim().toLowerCase();
  if (!AVAILABLE_LOG_LEVELS.has(normalized)) {
    const available = Array.from(AVAILABLE_LOG_LEVELS).sort().join(', ');
    throw new Error(`Unknown log level "${value}" (available: ${available})`);
  }
  return normalized;
}

const logger = pino({
  name,
  level: resolveLevel(level),
  hooks: {
    logMethod(inputArgs, method, logLevel) {
      const resolvedLevel = pino.levels.labels[logLevel] ?? String(logLevel);
      metrics.incrementCounter(METRIC.logMessages, { level: resolvedLevel });
      return method.apply(this, inputArgs);
    }
  }
});

export default logger;
