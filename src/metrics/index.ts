export type { MetricsCounts, MetricsSummary, MetricsSink } from './types.js';
export { MetricsCollector, createMetrics } from './collector.js';
