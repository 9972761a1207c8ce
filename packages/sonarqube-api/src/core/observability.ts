import type { Counter, Histogram, Meter } from '@opentelemetry/api';

export interface SonarQubeApiMetrics {
  requestsTotal: Counter;
  errorsTotal: Counter;
  requestDurationMs: Histogram;
  slowRequestsTotal: Counter;
}

export function createSonarQubeApiMetrics(meter: Meter, prefix: string): SonarQubeApiMetrics {
  return {
    requestsTotal: meter.createCounter(`${prefix}_requests_total`, {
      description: 'Total number of SonarQube API requests',
    }),
    errorsTotal: meter.createCounter(`${prefix}_errors_total`, {
      description: 'Total number of SonarQube API errors',
    }),
    requestDurationMs: meter.createHistogram(`${prefix}_request_duration_ms`, {
      description: 'Duration of SonarQube API requests in milliseconds',
      unit: 'ms',
    }),
    slowRequestsTotal: meter.createCounter(`${prefix}_slow_requests_total`, {
      description: 'Total number of slow SonarQube API requests by duration bucket',
    }),
  };
}
