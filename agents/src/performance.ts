/**
 * Performance Monitoring
 * Tracks decision and language-model latencies per operation
 */

import { logger } from '@elizaos/core';

export interface PerformanceMetric {
  operation: string;
  /** Duration in milliseconds */
  duration: number;
  timestamp: number;
  success: boolean;
  error?: string;
}

export interface PerformanceStats {
  operation: string;
  count: number;
  avgDuration: number;
  minDuration: number;
  maxDuration: number;
  /** Success rate (0-1) */
  successRate: number;
  lastExecution: number;
}

export interface PerformanceMonitorOptions {
  maxMetrics?: number;
  /** Operations slower than this are logged as warnings */
  slowThresholdMs?: number;
}

export class PerformanceMonitor {
  private metrics: PerformanceMetric[] = [];
  private maxMetrics: number;
  private slowThresholdMs: number;

  constructor(options: PerformanceMonitorOptions = {}) {
    this.maxMetrics = options.maxMetrics ?? 1000;
    this.slowThresholdMs = options.slowThresholdMs ?? 1000;
  }

  record(operation: string, duration: number, success: boolean, error?: string): void {
    this.metrics.push({ operation, duration, timestamp: Date.now(), success, error });

    if (this.metrics.length > this.maxMetrics) {
      this.metrics.shift();
    }

    if (duration > this.slowThresholdMs) {
      logger.warn(`[Perf] Slow operation: ${operation} took ${duration}ms`);
    }
    if (!success && error) {
      logger.error(`[Perf] Failed operation: ${operation} - ${error}`);
    }
  }

  /**
   * Measure an async operation. Failures are recorded and rethrown.
   */
  async measure<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const start = Date.now();
    try {
      const result = await fn();
      this.record(operation, Date.now() - start, true);
      return result;
    } catch (err) {
      this.record(operation, Date.now() - start, false, err instanceof Error ? err.message : String(err));
      throw err;
    }
  }

  measureSync<T>(operation: string, fn: () => T): T {
    const start = Date.now();
    try {
      const result = fn();
      this.record(operation, Date.now() - start, true);
      return result;
    } catch (err) {
      this.record(operation, Date.now() - start, false, err instanceof Error ? err.message : String(err));
      throw err;
    }
  }

  getStats(operation: string): PerformanceStats | null {
    const operationMetrics = this.metrics.filter((m) => m.operation === operation);
    if (operationMetrics.length === 0) {
      return null;
    }

    const durations = operationMetrics.map((m) => m.duration);
    const successes = operationMetrics.filter((m) => m.success).length;

    return {
      operation,
      count: operationMetrics.length,
      avgDuration: durations.reduce((a, b) => a + b, 0) / durations.length,
      minDuration: Math.min(...durations),
      maxDuration: Math.max(...durations),
      successRate: successes / operationMetrics.length,
      lastExecution: operationMetrics[operationMetrics.length - 1].timestamp
    };
  }

  getAllStats(): PerformanceStats[] {
    const operations = [...new Set(this.metrics.map((m) => m.operation))];
    return operations
      .map((op) => this.getStats(op))
      .filter((stats): stats is PerformanceStats => stats !== null);
  }

  getRecentMetrics(count: number = 10): PerformanceMetric[] {
    return this.metrics.slice(-count);
  }

  clear(): void {
    this.metrics = [];
  }

  generateReport(): string {
    const stats = this.getAllStats();
    if (stats.length === 0) {
      return 'No performance data available';
    }

    const lines = ['PERFORMANCE REPORT'];
    for (const stat of stats) {
      lines.push(
        `${stat.operation}: ${stat.count} runs, avg ${stat.avgDuration.toFixed(1)}ms ` +
          `(min ${stat.minDuration}ms, max ${stat.maxDuration}ms), ` +
          `${(stat.successRate * 100).toFixed(0)}% ok`
      );
    }
    return lines.join('\n');
  }

  logMetrics(): void {
    logger.info(this.generateReport());
  }
}
