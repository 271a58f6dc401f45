// =============================================================================
// PDF SCAN — In-Memory Metrics Repository
//
// Append-only list. Time bounds are inclusive on both ends.
// =============================================================================

import { Metric } from '../../types/entities';
import { IMetricsRepository, MetricQuery, OperationSummary } from '../../types/repositories';

function withinWindow(metric: Metric, startTime?: Date, endTime?: Date): boolean {
  const ts = metric.timestamp.getTime();
  if (startTime && ts < startTime.getTime()) return false;
  if (endTime && ts > endTime.getTime()) return false;
  return true;
}

function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export class InMemoryMetricsRepository implements IMetricsRepository {
  readonly backendName = 'memory';
  private metrics: Metric[] = [];

  async store(metric: Metric): Promise<void> {
    this.metrics.push(metric);
  }

  async query(filters: MetricQuery): Promise<Metric[]> {
    return this.metrics
      .filter(m =>
        (filters.operation === undefined || m.operation === filters.operation) &&
        (filters.documentId === undefined || m.documentId === filters.documentId) &&
        withinWindow(m, filters.startTime, filters.endTime)
      )
      .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime())
      .slice(filters.offset, filters.offset + filters.limit);
  }

  async averageDuration(operation: string, startTime?: Date, endTime?: Date): Promise<number> {
    return mean(
      this.metrics
        .filter(m => m.operation === operation && withinWindow(m, startTime, endTime))
        .map(m => m.durationMs)
    );
  }

  async summarize(
    filters: { operation?: string; startTime?: Date; endTime?: Date } = {}
  ): Promise<OperationSummary[]> {
    const durations = new Map<string, number[]>();

    for (const m of this.metrics) {
      if (filters.operation !== undefined && m.operation !== filters.operation) continue;
      if (!withinWindow(m, filters.startTime, filters.endTime)) continue;

      const bucket = durations.get(m.operation);
      if (bucket) bucket.push(m.durationMs);
      else durations.set(m.operation, [m.durationMs]);
    }

    return [...durations.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([operation, values]) => ({
        operation,
        count: values.length,
        averageDurationMs: mean(values),
      }));
  }
}
