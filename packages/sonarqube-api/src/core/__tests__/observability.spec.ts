import type { Meter } from '@opentelemetry/api';
import { describe, expect, it, vi } from 'vitest';
import { createSonarQubeApiMetrics } from '../observability';

function createMockMeter() {
  return {
    createCounter: vi.fn().mockReturnValue({ add: vi.fn() }),
    createHistogram: vi.fn().mockReturnValue({ record: vi.fn() }),
  } as unknown as Meter & {
    createCounter: ReturnType<typeof vi.fn>;
    createHistogram: ReturnType<typeof vi.fn>;
  };
}

describe('createSonarQubeApiMetrics', () => {
  it('creates all instruments with descriptions', () => {
    const mockMeter = createMockMeter();

    const metrics = createSonarQubeApiMetrics(mockMeter, 'sonarqube_api');

    expect(Object.keys(metrics)).toStrictEqual([
      'requestsTotal',
      'errorsTotal',
      'requestDurationMs',
      'slowRequestsTotal',
    ]);
    expect(mockMeter.createCounter).toHaveBeenCalledWith('sonarqube_api_requests_total', {
      description: 'Total number of SonarQube API requests',
    });
    expect(mockMeter.createCounter).toHaveBeenCalledWith('sonarqube_api_errors_total', {
      description: 'Total number of SonarQube API errors',
    });
    expect(mockMeter.createHistogram).toHaveBeenCalledWith('sonarqube_api_request_duration_ms', {
      description: 'Duration of SonarQube API requests in milliseconds',
      unit: 'ms',
    });
    expect(mockMeter.createCounter).toHaveBeenCalledWith('sonarqube_api_slow_requests_total', {
      description: 'Total number of slow SonarQube API requests by duration bucket',
    });
  });

  it('uses provided prefix for all metric names', () => {
    const mockMeter = createMockMeter();

    createSonarQubeApiMetrics(mockMeter, 'ci_sonar');

    expect(mockMeter.createCounter.mock.calls.map(([name]) => name)).toStrictEqual([
      'ci_sonar_requests_total',
      'ci_sonar_errors_total',
      'ci_sonar_slow_requests_total',
    ]);
    expect(mockMeter.createHistogram).toHaveBeenCalledWith(
      'ci_sonar_request_duration_ms',
      expect.any(Object),
    );
  });
});
