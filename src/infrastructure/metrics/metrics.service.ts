import { Injectable, Logger } from '@nestjs/common';

export type MetricTags = Record<string, string>;

export interface MetricsSnapshot {
  counters: Record<string, number>;
  durations: Record<string, number[]>;   // milliseconds, in recording order
  gauges: Record<string, number>;
}

/**
 * In-process metrics sink. Series are keyed by name plus tags,
 * e.g. `payment.process.count[success=true,currency=USD]`.
 */
@Injectable()
export class MetricsService {
  private readonly logger = new Logger(MetricsService.name);
  private readonly counters = new Map<string, number>();
  private readonly durations = new Map<string, number[]>();
  private readonly gauges = new Map<string, number>();

  incrementCounter(name: string, tags?: MetricTags): void {
    const key = seriesKey(name, tags);
    const count = (this.counters.get(key) ?? 0) + 1;
    this.counters.set(key, count);
    this.logger.debug(`Counter ${key} incremented to ${count}`);
  }

  recordDuration(name: string, durationMs: number, tags?: MetricTags): void {
    const key = seriesKey(name, tags);
    const samples = this.durations.get(key) ?? [];
    samples.push(durationMs);
    this.durations.set(key, samples);
    this.logger.debug(`Duration ${key} recorded: ${durationMs}ms`);
  }

  setGauge(name: string, value: number, tags?: MetricTags): void {
    const key = seriesKey(name, tags);
    this.gauges.set(key, value);
    this.logger.debug(`Gauge ${key} set to ${value}`);
  }

  getSnapshot(): MetricsSnapshot {
    const durations: Record<string, number[]> = {};
    this.durations.forEach((samples, key) => {
      durations[key] = [...samples];
    });
    return {
      counters: Object.fromEntries(this.counters),
      durations,
      gauges: Object.fromEntries(this.gauges),
    };
  }
}

export function seriesKey(name: string, tags?: MetricTags): string {
  if (!tags) {
    return name;
  }
  const pairs = Object.entries(tags).map(([k, v]) => `${k}=${v}`);
  return `${name}[${pairs.join(',')}]`;
}
