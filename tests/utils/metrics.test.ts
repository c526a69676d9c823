import { describe, it, expect } from 'vitest';
import { Metrics } from '../../src/utils/metrics.js';

describe('Metrics', () => {
  it('counts and gauges', () => {
    const metrics = new Metrics();

    metrics.increment('tool_calls_total');
    metrics.increment('tool_calls_total', 2);
    metrics.gauge('active_sessions', 4);

    expect(metrics.getCounter('tool_calls_total')).toBe(3);
    expect(metrics.getCounter('unknown')).toBe(0);
    expect(metrics.getGauge('active_sessions')).toBe(4);
  });

  it('keeps a bounded histogram window', () => {
    const metrics = new Metrics(3);

    for (const value of [5, 1, 3, 2]) {
      metrics.histogram('load_case_duration_ms', value);
    }

    expect(metrics.getHistogram('load_case_duration_ms')).toEqual({
      count: 3,
      min: 1,
      max: 3,
      avg: 2,
      sum: 6,
      p50: 2,
      p90: 3,
      p99: 3
    });
    expect(metrics.getHistogram('missing')).toBeNull();
  });

  it('records a timer once', () => {
    const metrics = new Metrics();
    const timer = metrics.startTimer('power_flow_duration_ms');

    timer.stop();
    expect(timer.stop()).toBe(0);
    expect(metrics.getHistogram('power_flow_duration_ms')?.count).toBe(1);
  });

  it('clears everything on reset', () => {
    const metrics = new Metrics();
    metrics.increment('sessions_created');

    metrics.reset();

    expect(metrics.getAll()).toMatchObject({ counters: {}, gauges: {}, histograms: {} });
  });
});
