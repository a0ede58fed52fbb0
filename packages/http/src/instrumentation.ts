import type { ClientRequest } from './clients/interfaces.js';
import type { ExceptionTriple } from './exceptions/exception-triple.js';
import type { RequestTemplate } from './io/interfaces.js';

export interface RequestMetric {
  transport: string;
  endpoint: string; // Path only, sanitized
  method: string;
  attempt: number;
  status?: number | undefined;
  durationMs: number;
  timestamp: number;
  errorKind?: string | undefined;
}

export interface MetricsSummary {
  total: number;
  failures: number;
  avgDuration: number;
  byTransport: Record<string, number>;
  byStatus: Record<string, number>;
  byEndpoint: Record<string, EndpointMetrics>;
}

export interface EndpointMetrics {
  calls: number;
  avgDuration: number;
}

export class InstrumentationCollector {
  private metrics: RequestMetric[] = [];

  record(metric: RequestMetric): void {
    this.metrics.push(metric);
  }

  getMetrics(): readonly RequestMetric[] {
    return this.metrics;
  }

  getSummary(): MetricsSummary {
    const byTransport: Record<string, number> = {};
    const byStatus: Record<string, number> = {};
    const byEndpoint: Record<string, EndpointMetrics> = {};
    let totalDuration = 0;
    let failures = 0;

    for (const m of this.metrics) {
      byTransport[m.transport] = (byTransport[m.transport] ?? 0) + 1;

      const statusKey = m.status === undefined ? (m.errorKind ?? 'unknown') : String(m.status);
      byStatus[statusKey] = (byStatus[statusKey] ?? 0) + 1;

      const key = `${m.method} ${m.endpoint}`;
      const current = byEndpoint[key] ?? { avgDuration: 0, calls: 0 };
      const endpointDuration = current.avgDuration * current.calls + m.durationMs;
      current.calls += 1;
      current.avgDuration = endpointDuration / current.calls;
      byEndpoint[key] = current;

      totalDuration += m.durationMs;
      if (m.errorKind !== undefined) {
        failures++;
      }
    }

    return {
      total: this.metrics.length,
      failures,
      avgDuration: this.metrics.length === 0 ? 0 : totalDuration / this.metrics.length,
      byTransport,
      byStatus,
      byEndpoint,
    };
  }
}

/**
 * Sanitizes an endpoint URL down to its path, masking ids and API keys.
 */
export function sanitizeEndpoint(endpoint: string): string {
  try {
    const url = new URL(endpoint, 'http://placeholder.invalid');

    return url.pathname
      .replace(/\/[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}(?=\/|$)/gi, '/{id}') // UUIDs
      .replace(/\/[a-f0-9]{32,}/gi, '/{apiKey}') // Hex API keys
      .replace(/\/[A-Za-z0-9_-]{20,}/g, '/{apiKey}'); // Base64-like keys
  } catch {
    return endpoint;
  }
}

export interface InstrumentationTemplateOptions {
  collector: InstrumentationCollector;
  transport: string;
  now?: (() => number) | undefined;
}

/**
 * Records one metric per attempt. It observes the lifecycle and never
 * redirects it, so it can sit anywhere in a CompositeRequestTemplate.
 * Create one per request: it tracks the attempt in flight.
 */
export class InstrumentationTemplate implements RequestTemplate<ClientRequest, unknown> {
  private readonly collector: InstrumentationCollector;
  private readonly transport: string;
  private readonly now: () => number;
  private attempt = 0;
  private startedAt = 0;

  constructor(options: InstrumentationTemplateOptions) {
    this.collector = options.collector;
    this.transport = options.transport;
    this.now = options.now ?? Date.now;
  }

  beforeRequest(_request: ClientRequest): undefined {
    this.attempt++;
    this.startedAt = this.now();
    return undefined;
  }

  afterResponse(request: ClientRequest, response: unknown): undefined {
    this.recordAttempt(request, { status: statusOf(response) });
    return undefined;
  }

  afterException(request: ClientRequest, failure: ExceptionTriple): undefined {
    this.recordAttempt(request, { errorKind: failure.kind });
    return undefined;
  }

  private recordAttempt(
    [method, url]: ClientRequest,
    outcome: { errorKind?: string | undefined; status?: number | undefined }
  ): void {
    const timestamp = this.now();
    this.collector.record({
      attempt: this.attempt,
      durationMs: timestamp - this.startedAt,
      endpoint: sanitizeEndpoint(url),
      errorKind: outcome.errorKind,
      method,
      status: outcome.status,
      timestamp,
      transport: this.transport,
    });
  }
}

function statusOf(response: unknown): number | undefined {
  if (typeof response !== 'object' || response === null || !('status' in response)) {
    return undefined;
  }
  return typeof response.status === 'number' ? response.status : undefined;
}
