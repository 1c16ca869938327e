import type { MetricLabels, MetricObservation, MetricType } from '../types.js';

type SampleState = {
  labels: MetricLabels;
  labelString: string;
  value: number;
  updatedAt: number;
};

type MetricFamily = {
  name: string;
  help: string | null;
  type: MetricType;
  samples: Map<string, SampleState>;
};

export type MetricDescriptor = {
  help?: string;
  type: MetricType;
};

export type MetricSample = {
  name: string;
  type: MetricType;
  labels: MetricLabels;
  value: number;
  updatedAt: number;
};

/**
 * In-memory store of the current metric values, keyed by metric name and label set.
 *
 * Every mutation runs synchronously on the event loop, so a scrape calling
 * {@link MetricsRegistry.snapshot} always sees each sample either before or after a write, never
 * in between. Samples are never evicted.
 */
class MetricsRegistry {
  private readonly families = new Map<string, MetricFamily>();

  constructor(private readonly now: () => number = Date.now) {}

  describe(name: string, descriptor: MetricDescriptor) {
    const metricName = sanitizePrometheusMetricName(name);
    const existing = this.families.get(metricName);
    if (existing) {
      if (existing.type !== descriptor.type) {
        throw new Error(
          `Metric "${metricName}" is already registered as a ${existing.type}, not a ${descriptor.type}`
        );
      }
      if (descriptor.help) {
        existing.help = descriptor.help;
      }
      return;
    }

    this.families.set(metricName, {
      name: metricName,
      help: descriptor.help ?? null,
      type: descriptor.type,
      samples: new Map()
    });
  }

  setGauge(name: string, labels: MetricLabels, value: number) {
    if (!Number.isFinite(value)) {
      return;
    }
    const sample = this.resolveSample(name, 'gauge', labels);
    sample.value = value;
    sample.updatedAt = this.now();
  }

  incrementCounter(name: string, labels: MetricLabels, delta = 1) {
    if (!Number.isFinite(delta) || delta < 0) {
      throw new Error(`Counter "${name}" can only be incremented by a finite, non-negative amount`);
    }
    const sample = this.resolveSample(name, 'counter', labels);
    sample.value += delta;
    sample.updatedAt = this.now();
  }

  apply(observations: readonly MetricObservation[]) {
    for (const observation of observations) {
      if (observation.op === 'increment') {
        this.incrementCounter(observation.name, observation.labels, observation.value);
      } else {
        this.setGauge(observation.name, observation.labels, observation.value);
      }
    }
  }

  getValue(name: string, labels: MetricLabels): number | undefined {
    const family = this.families.get(sanitizePrometheusMetricName(name));
    if (!family) {
      return undefined;
    }
    const normalized = sanitizeLabels(labels);
    return family.samples.get(formatPrometheusLabels(normalized))?.value;
  }

  snapshot(): MetricSample[] {
    const samples: MetricSample[] = [];
    for (const family of this.orderedFamilies()) {
      for (const sample of orderedSamples(family)) {
        samples.push({
          name: family.name,
          type: family.type,
          labels: { ...sample.labels },
          value: sample.value,
          updatedAt: sample.updatedAt
        });
      }
    }
    return samples;
  }

  formatPrometheus(): string {
    const blocks: string[] = [];
    for (const family of this.orderedFamilies()) {
      const block = formatPrometheusFamily(family);
      if (block) {
        blocks.push(block);
      }
    }
    return blocks.length > 0 ? `${blocks.join('\n')}\n` : '';
  }

  private orderedFamilies() {
    return Array.from(this.families.values()).sort((a, b) => a.name.localeCompare(b.name));
  }

  private resolveSample(name: string, type: MetricType, labels: MetricLabels): SampleState {
    const metricName = sanitizePrometheusMetricName(name);
    let family = this.families.get(metricName);
    if (!family) {
      family = { name: metricName, help: null, type, samples: new Map() };
      this.families.set(metricName, family);
    } else if (family.type !== type) {
      throw new Error(`Metric "${metricName}" is a ${family.type}, not a ${type}`);
    }

    const normalized = sanitizeLabels(labels);
    const labelString = formatPrometheusLabels(normalized);
    const existing = family.samples.get(labelString);
    if (existing) {
      return existing;
    }
    const created: SampleState = { labels: normalized, labelString, value: 0, updatedAt: 0 };
    family.samples.set(labelString, created);
    return created;
  }
}

function orderedSamples(family: MetricFamily) {
  return Array.from(family.samples.values()).sort((a, b) => a.labelString.localeCompare(b.labelString));
}

function formatPrometheusFamily(family: MetricFamily): string {
  const samples = orderedSamples(family).filter(sample => Number.isFinite(sample.value));
  if (samples.length === 0) {
    return '';
  }

  const lines: string[] = [];
  if (family.help) {
    lines.push(`# HELP ${family.name} ${escapePrometheusHelp(family.help)}`);
  }
  lines.push(`# TYPE ${family.name} ${family.type}`);
  for (const sample of samples) {
    lines.push(`${family.name}${sample.labelString} ${formatPrometheusValue(sample.value)}`);
  }
  return lines.join('\n');
}

function sanitizeLabels(labels: MetricLabels): MetricLabels {
  const result: MetricLabels = {};
  for (const [key, value] of Object.entries(labels)) {
    result[sanitizePrometheusLabelName(key)] = String(value);
  }
  return result;
}

export function sanitizePrometheusMetricName(name: string): string {
  const sanitized = name.replace(/[^A-Za-z0-9_]/g, '_');
  const collapsed = sanitized.replace(/_{2,}/g, '_').replace(/^_+|_+$/g, '');
  const lower = collapsed.toLowerCase();
  if (!lower) {
    return 'metric';
  }
  if (/^[0-9]/.test(lower)) {
    return `metric_${lower}`;
  }
  return lower;
}

export function sanitizePrometheusLabelName(name: string): string {
  const sanitized = name.replace(/[^A-Za-z0-9_]/g, '_');
  const collapsed = sanitized.replace(/_{2,}/g, '_').replace(/^_+|_+$/g, '');
  const lower = collapsed.toLowerCase();
  if (!lower) {
    return 'label';
  }
  if (/^[0-9]/.test(lower)) {
    return `_${lower}`;
  }
  return lower;
}

function escapePrometheusLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');
}

function escapePrometheusHelp(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, ' ');
}

export function formatPrometheusLabels(labels: MetricLabels): string {
  const entries = Object.entries(labels);
  if (entries.length === 0) {
    return '';
  }
  entries.sort(([a], [b]) => a.localeCompare(b));
  const rendered = entries.map(([key, value]) => `${key}="${escapePrometheusLabelValue(value)}"`);
  return `{${rendered.join(',')}}`;
}

export function formatPrometheusValue(value: number): string {
  if (!Number.isFinite(value)) {
    return '0';
  }
  if (value === 0) {
    return '0';
  }
  if (Number.isInteger(value)) {
    return value.toString();
  }
  return String(value);
}

const defaultRegistry = new MetricsRegistry();

export { MetricsRegistry };
export default defaultRegistry;
