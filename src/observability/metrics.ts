import { existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

type Labels = Record<string, string>;

interface Metric {
  name: string;
  value: number;
  timestamp: number;
  labels?: Labels;
}

export type HistogramSummary = { count: number; sum: number; avg: number; max: number };

function seriesKey(name: string, labels?: Labels): string {
  return `${name}:${JSON.stringify(labels || {})}`;
}

function renderLabels(labels?: Labels): string {
  if (!labels) return '';
  const inner = Object.entries(labels).map(([k, v]) => `${k}="${v}"`).join(',');
  return inner ? `{${inner}}` : '';
}

export class MetricsCollector {
  private metrics: Metric[] = [];
  private counters: Map<string, number> = new Map();
  private histograms: Map<string, number[]> = new Map();

  constructor(private clock: () => number = Date.now) {}

  // Counter metrics
  incrementCounter(name: string, labels?: Labels): void {
    const key = seriesKey(name, labels);
    const next = (this.counters.get(key) || 0) + 1;
    this.counters.set(key, next);
    this.recordMetric(name, next, labels);
  }

  // Histogram metrics for durations
  recordHistogram(name: string, value: number, labels?: Labels): void {
    const key = seriesKey(name, labels);
    const values = this.histograms.get(key) || [];
    values.push(value);
    this.histograms.set(key, values);
    this.recordMetric(name, value, labels);
  }

  counter(name: string, labels?: Labels): number {
    return this.counters.get(seriesKey(name, labels)) || 0;
  }

  histogram(name: string, labels?: Labels): HistogramSummary {
    const values = this.histograms.get(seriesKey(name, labels)) || [];
    const sum = values.reduce((a, b) => a + b, 0);
    return {
      count: values.length,
      sum,
      avg: values.length > 0 ? sum / values.length : 0,
      max: values.length > 0 ? Math.max(...values) : 0,
    };
  }

  private recordMetric(name: string, value: number, labels?: Labels): void {
    this.metrics.push({ name, value, timestamp: this.clock(), labels });

    // Keep only recent metrics (last 1000)
    if (this.metrics.length > 1000) {
      this.metrics = this.metrics.slice(-1000);
    }
  }

  // Export metrics in Prometheus format, latest value per series
  exportPrometheusMetrics(): string {
    const lines: string[] = [];
    const latest = new Map<string, Map<string, Metric>>();

    for (const metric of this.metrics) {
      const group = latest.get(metric.name) || new Map<string, Metric>();
      group.set(seriesKey(metric.name, metric.labels), metric);
      latest.set(metric.name, group);
    }

    for (const [name, series] of latest) {
      lines.push(`# HELP ${name} Agent metric`);
      lines.push(`# TYPE ${name} gauge`);
      for (const metric of series.values()) {
        lines.push(`${name}${renderLabels(metric.labels)} ${metric.value} ${metric.timestamp}`);
      }
    }

    return lines.join('\n');
  }

  /** Writes the Prometheus text under `<dataDir>/metrics` and returns the file path. */
  saveMetrics(dataDir: string): string {
    const metricsDir = join(dataDir, 'metrics');
    if (!existsSync(metricsDir)) mkdirSync(metricsDir, { recursive: true });
    const timestamp = new Date(this.clock()).toISOString().replace(/[:.]/g, '-');
    const file = join(metricsDir, `metrics-${timestamp}.prom`);
    writeFileSync(file, this.exportPrometheusMetrics());
    return file;
  }
}
