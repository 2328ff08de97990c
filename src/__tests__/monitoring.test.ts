import { describe, it, expect } from '@jest/globals';
import { LogEntry } from '../core/types';
import { LogAggregator, MetricsCollector } from '../monitoring/core/Monitoring';

describe('LogAggregator', () => {
  it('keeps entries with agent and task ids lifted out of the metadata', () => {
    const logs = new LogAggregator({ silent: true });
    const seen: LogEntry[] = [];
    logs.on('log', (entry: LogEntry) => seen.push(entry));

    logs.info('Running task', { agentId: 'writer', taskId: 't1', attempt: 2 });
    logs.warn('No metadata');

    expect(seen).toHaveLength(2);
    expect(seen[0]).toMatchObject({ level: 'info', message: 'Running task', agentId: 'writer', taskId: 't1', metadata: { attempt: 2 } });
    expect(seen[1]?.metadata).toBeUndefined();
  });

  it('filters entries', () => {
    const logs = new LogAggregator({ silent: true });
    logs.info('Agent added', { agentId: 'a' });
    logs.error('Task failed: boom', { taskId: 't1' });
    logs.debug('Tool executed', { agentId: 'a', tool: 'calculator' });

    expect(logs.query({ agentId: 'a' }).map(l => l.message)).toEqual(['Agent added', 'Tool executed']);
    expect(logs.query({ level: 'error' }).map(l => l.taskId)).toEqual(['t1']);
    expect(logs.query({ searchText: 'CALCULATOR' }).map(l => l.message)).toEqual(['Tool executed']);
    expect(logs.query({ limit: 1 }).map(l => l.message)).toEqual(['Tool executed']);
    expect(logs.getLogCount()).toEqual({ total: 3, debug: 1, info: 1, warn: 0, error: 1 });
  });

  it('drops the oldest entries past its capacity', () => {
    const logs = new LogAggregator({ silent: true, maxLogs: 2 });
    logs.info('one');
    logs.info('two');
    logs.info('three');

    expect(logs.getRecent().map(l => l.message)).toEqual(['two', 'three']);
    logs.clear();
    expect(logs.getRecent()).toEqual([]);
  });
});

describe('MetricsCollector', () => {
  it('counts per label set', () => {
    const metrics = new MetricsCollector();
    metrics.incrementCounter('tool_calls_total', { tool: 'echo' });
    metrics.incrementCounter('tool_calls_total', { tool: 'echo' });
    metrics.incrementCounter('tool_calls_total', { tool: 'calculator' });

    expect(metrics.getCounter('tool_calls_total', { tool: 'echo' })).toBe(2);
    expect(metrics.getCounter('tool_calls_total', { tool: 'calculator' })).toBe(1);
    expect(metrics.getCounter('tool_calls_total')).toBe(0);
    expect(metrics.getRecentMetrics('tool_calls_total').map(m => m.value)).toEqual([1, 2, 1]);
  });

  it('summarizes histograms', () => {
    const metrics = new MetricsCollector();
    expect(metrics.getHistogramStats('agent_run_steps')).toBeNull();

    for (const value of [4, 1, 3, 2]) {
      metrics.recordHistogram('agent_run_steps', value);
    }

    expect(metrics.getHistogramStats('agent_run_steps')).toEqual({ count: 4, min: 1, max: 4, avg: 2.5, p50: 3, p95: 4 });
    metrics.reset();
    expect(metrics.getRecentMetrics()).toEqual([]);
  });
});
