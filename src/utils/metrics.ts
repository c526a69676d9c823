/**
 * GridSim MCP Server - Metrics collection
 *
 * In-process counters, gauges and bounded histograms.
 */

export interface HistogramStats {
  count: number;
  min: number;
  max: number;
  avg: number;
  sum: number;
  p50: number;
  p90: number;
  p99: number;
}

export interface Timer {
  stop: () => number;
}

const EMPTY_STATS: HistogramStats = {
  count: 0,
  min: 0,
  max: 0,
  avg: 0,
  sum: 0,
  p50: 0,
  p90: 0,
  p99: 0
};

export class Metrics {
  private counters: Map<string, number> = new Map();
  private gauges: Map<string, number> = new Map();
  private histograms: Map<string, number[]> = new Map();
  private startTime: number = Date.now();

  constructor(private readonly maxHistogramSize: number = 1000) {}

  increment(name: string, value: number = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  gauge(name: string, value: number): void {
    this.gauges.set(name, value);
  }

  /**
   * Record a histogram value; the oldest value is dropped once the bound is reached.
   */
  histogram(name: string, value: number): void {
    let values = this.histograms.get(name);
    if (!values) {
      values = [];
      this.histograms.set(name, values);
    }

    values.push(value);
    if (values.length > this.maxHistogramSize) {
      values.shift();
    }
  }

  /**
   * Start a timer; `stop()` records the elapsed milliseconds once.
   */
  startTimer(name: string): Timer {
    const start = Date.now();
    let stopped = false;

    return {
      stop: (): number => {
        if (stopped) return 0;
        stopped = true;
        const duration = Date.now() - start;
        this.histogram(name, duration);
        return duration;
      }
    };
  }

  private calculateHistogramStats(values: number[]): HistogramStats {
    if (values.length === 0) {
      return { ...EMPTY_STATS };
    }

    const sorted = [...values].sort((a, b) => a - b);
    const sum = values.reduce((a, b) => a + b, 0);

    const percentile = (p: number): number => {
      const index = Math.ceil((p / 100) * sorted.length) - 1;
      return sorted[Math.max(0, index)];
    };

    return {
      count: values.length,
      min: sorted[0],
      max: sorted[sorted.length - 1],
      avg: Math.round((sum / values.length) * 100) / 100,
      sum,
      p50: percentile(50),
      p90: percentile(90),
      p99: percentile(99)
    };
  }

  getCounter(name: string): number {
    return this.counters.get(name) ?? 0;
  }

  getGauge(name: string): number {
    return this.gauges.get(name) ?? 0;
  }

  getHistogram(name: string): HistogramStats | null {
    const values = this.histograms.get(name);
    return values ? this.calculateHistogramStats(values) : null;
  }

  getAll(): Record<string, unknown> {
    const histogramStats: Record<string, HistogramStats> = {};
    for (const [name, values] of this.histograms) {
      histogramStats[name] = this.calculateHistogramStats(values);
    }

    return {
      uptime_ms: Date.now() - this.startTime,
      collected_at: new Date().toISOString(),
      counters: Object.fromEntries(this.counters),
      gauges: Object.fromEntries(this.gauges),
      histograms: histogramStats
    };
  }

  reset(): void {
    this.counters.clear();
    this.gauges.clear();
    this.histograms.clear();
    this.startTime = Date.now();
  }
}

export const metrics = new Metrics();

export const MetricNames = {
  // Counters
  TOOL_CALLS_TOTAL: 'tool_calls_total',
  TOOL_CALLS_SUCCESS: 'tool_calls_success',
  TOOL_CALLS_FAILED: 'tool_calls_failed',
  SESSIONS_CREATED: 'sessions_created',
  SESSIONS_CLOSED: 'sessions_closed',
  SESSIONS_EVICTED: 'sessions_evicted',
  SESSIONS_EXPIRED: 'sessions_expired',
  CASES_LOADED: 'cases_loaded',
  CASE_LOAD_FAILURES: 'case_load_failures',
  ENGINE_FAILURES: 'engine_failures',

  // Gauges
  ACTIVE_SESSIONS: 'active_sessions',

  // Histograms (durations)
  TOOL_DURATION_MS: 'tool_duration_ms',
  LOAD_CASE_DURATION_MS: 'load_case_duration_ms',
  POWER_FLOW_DURATION_MS: 'power_flow_duration_ms',
  TIME_DOMAIN_DURATION_MS: 'time_domain_duration_ms',
  EIGENVALUE_DURATION_MS: 'eigenvalue_duration_ms',
} as const;
