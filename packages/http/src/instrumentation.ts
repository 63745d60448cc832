import type { ExchangeOutcome } from './exchange.js';

export interface ExchangeMetric {
  exchangeId: number;
  method: string;
  endpoint: string; // Path only, sanitized
  status: number; // 0 when no response head arrived
  outcome: ExchangeOutcome;
  durationMs: number;
  timestamp: number;
  error?: string | undefined;
}

export interface MetricsSummary {
  total: number;
  failures: number;
  avgDuration: number;
  byMethod: Record<string, number>;
  byStatus: Record<string, number>;
  byEndpoint: Record<string, EndpointMetrics>;
}

export interface EndpointMetrics {
  calls: number;
  avgDuration: number;
}

export class InstrumentationCollector {
  private metrics: ExchangeMetric[] = [];

  record(metric: ExchangeMetric): void {
    this.metrics.push(metric);
  }

  getMetrics(): readonly ExchangeMetric[] {
    return this.metrics;
  }

  clear(): void {
    this.metrics = [];
  }

  getSummary(): MetricsSummary {
    if (this.metrics.length === 0) {
      return {
        total: 0,
        failures: 0,
        avgDuration: 0,
        byMethod: {},
        byStatus: {},
        byEndpoint: {},
      };
    }

    const byMethod: Record<string, number> = {};
    const byStatus: Record<string, number> = {};
    const byEndpoint: Record<string, EndpointMetrics> = {};
    let totalDuration = 0;
    let failures = 0;

    for (const m of this.metrics) {
      byMethod[m.method] = (byMethod[m.method] ?? 0) + 1;
      byStatus[String(m.status)] = (byStatus[String(m.status)] ?? 0) + 1;

      const key = `${m.method} ${m.endpoint}`;
      const current = byEndpoint[key] ?? { calls: 0, avgDuration: 0 };
      const endpointDuration = current.avgDuration * current.calls + m.durationMs;
      current.calls += 1;
      current.avgDuration = endpointDuration / current.calls;
      byEndpoint[key] = current;

      totalDuration += m.durationMs;
      if (m.outcome === 'failed') failures++;
    }

    return {
      total: this.metrics.length,
      failures,
      avgDuration: totalDuration / this.metrics.length,
      byMethod,
      byStatus,
      byEndpoint,
    };
  }
}

/**
 * Reduces a URL to its path and masks key-like segments, so metrics can be
 * grouped per endpoint without leaking credentials.
 */
export function sanitizeEndpoint(endpoint: string): string {
  try {
    const url = new URL(endpoint, 'http://placeholder.invalid');
    return url.pathname
      .replace(/\/[a-f0-9]{32,}(?=\/|$)/gi, '/{key}') // hex keys and digests
      .replace(/\/[A-Za-z0-9_-]{24,}(?=\/|$)/g, '/{key}'); // base64url-like tokens
  } catch {
    return endpoint;
  }
}
