import { Metric, LogEntry, LogLevel } from '../../core/types';
import { EventEmitter } from 'events';
import winston from 'winston';

export interface LogAggregatorOptions {
  level?: LogLevel;
  maxLogs?: number;
  silent?: boolean;
}

export interface LogQuery {
  level?: LogLevel;
  agentId?: string;
  taskId?: string;
  searchText?: string;
  limit?: number;
}

/**
 * winston-backed logger that also keeps the most recent entries in memory so
 * a host can inspect what an agent or a workflow did after the fact.
 */
export class LogAggregator extends EventEmitter {
  private logs: LogEntry[] = [];
  private maxLogs: number;
  private logger: winston.Logger;

  constructor(options: LogAggregatorOptions = {}) {
    super();
    this.maxLogs = options.maxLogs ?? 1000;
    this.logger = winston.createLogger({
      level: options.level ?? 'info',
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json()
      ),
      transports: [
        new winston.transports.Console({ silent: options.silent ?? false }),
      ],
    });
  }

  log(level: LogLevel, message: string, metadata: Record<string, unknown> = {}): void {
    const { agentId, taskId, ...rest } = metadata;
    const entry: LogEntry = {
      level,
      message,
      agentId: typeof agentId === 'string' ? agentId : undefined,
      taskId: typeof taskId === 'string' ? taskId : undefined,
      timestamp: new Date(),
      metadata: Object.keys(rest).length > 0 ? rest : undefined,
    };

    this.logs.push(entry);
    if (this.logs.length > this.maxLogs) {
      this.logs.shift();
    }

    this.logger.log(level, message, metadata);
    this.emit('log', entry);
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log('warn', message, metadata);
  }

  error(message: string, metadata?: Record<string, unknown>): void {
    this.log('error', message, metadata);
  }

  query(filters: LogQuery): LogEntry[] {
    let results = [...this.logs];

    if (filters.level) {
      results = results.filter(l => l.level === filters.level);
    }
    if (filters.agentId) {
      results = results.filter(l => l.agentId === filters.agentId);
    }
    if (filters.taskId) {
      results = results.filter(l => l.taskId === filters.taskId);
    }
    if (filters.searchText) {
      const searchLower = filters.searchText.toLowerCase();
      results = results.filter(l =>
        l.message.toLowerCase().includes(searchLower) ||
        JSON.stringify(l.metadata ?? {}).toLowerCase().includes(searchLower)
      );
    }

    return results.slice(-(filters.limit || 100));
  }

  getRecent(limit: number = 100): LogEntry[] {
    return this.logs.slice(-limit);
  }

  getLogCount(): Record<LogLevel | 'total', number> {
    return {
      total: this.logs.length,
      debug: this.logs.filter(l => l.level === 'debug').length,
      info: this.logs.filter(l => l.level === 'info').length,
      warn: this.logs.filter(l => l.level === 'warn').length,
      error: this.logs.filter(l => l.level === 'error').length,
    };
  }

  clear(): void {
    this.logs = [];
  }
}

export interface HistogramStats {
  count: number;
  min: number;
  max: number;
  avg: number;
  p50: number;
  p95: number;
}

export class MetricsCollector {
  private counters: Map<string, number> = new Map();
  private histograms: Map<string, number[]> = new Map();
  private recent: Metric[] = [];
  private maxRecent: number;

  constructor(maxRecent: number = 1000) {
    this.maxRecent = maxRecent;
  }

  incrementCounter(name: string, labels: Record<string, string> = {}): void {
    const key = this.makeKey(name, labels);
    const next = (this.counters.get(key) ?? 0) + 1;
    this.counters.set(key, next);
    this.record(name, next, labels);
  }

  recordHistogram(name: string, value: number, labels: Record<string, string> = {}): void {
    const key = this.makeKey(name, labels);
    const values = this.histograms.get(key) ?? [];
    values.push(value);
    if (values.length > 1000) values.shift();
    this.histograms.set(key, values);
    this.record(name, value, labels);
  }

  getCounter(name: string, labels: Record<string, string> = {}): number {
    return this.counters.get(this.makeKey(name, labels)) ?? 0;
  }

  getHistogramStats(name: string, labels: Record<string, string> = {}): HistogramStats | null {
    const values = this.histograms.get(this.makeKey(name, labels));
    if (!values || values.length === 0) return null;

    const sorted = [...values].sort((a, b) => a - b);
    const at = (q: number): number => sorted[Math.min(sorted.length - 1, Math.floor(sorted.length * q))] ?? 0;
    return {
      count: sorted.length,
      min: at(0),
      max: sorted[sorted.length - 1] ?? 0,
      avg: values.reduce((a, b) => a + b, 0) / values.length,
      p50: at(0.5),
      p95: at(0.95),
    };
  }

  getRecentMetrics(name?: string): Metric[] {
    return name ? this.recent.filter(m => m.name === name) : [...this.recent];
  }

  reset(): void {
    this.counters.clear();
    this.histograms.clear();
    this.recent = [];
  }

  private record(name: string, value: number, labels: Record<string, string>): void {
    this.recent.push({ name, value, labels, timestamp: new Date() });
    if (this.recent.length > this.maxRecent) this.recent.shift();
  }

  private makeKey(name: string, labels: Record<string, string>): string {
    const labelStr = Object.entries(labels).sort().map(([k, v]) => `${k}=${v}`).join(',');
    return `${name}${labelStr ? '{' + labelStr + '}' : ''}`;
  }
}

export interface Telemetry {
  logs: LogAggregator;
  metrics: MetricsCollector;
}

export function createTelemetry(options: LogAggregatorOptions = {}): Telemetry {
  return { logs: new LogAggregator(options), metrics: new MetricsCollector() };
}
