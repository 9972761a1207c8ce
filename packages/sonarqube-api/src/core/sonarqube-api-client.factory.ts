import { Logger } from '@nestjs/common';
import { metrics } from '@opentelemetry/api';
import { Agent } from 'undici';
import { z } from 'zod/v4';
import { SonarQubeAuth } from '../auth/sonarqube-auth';
import { SonarQubeHttpClient } from '../clients/sonarqube-http.client';
import { GroupsService } from '../groups/groups.service';
import {
  type SonarQubeApiClientInputOptions,
  sonarQubeApiClientOptionsSchema,
} from './config/sonarqube-api-client-options';
import { ConfigurationError } from './errors';
import { createSonarQubeApiMetrics, type SonarQubeApiMetrics } from './observability';
import type { SonarQubeApiClient, SonarQubeApiClientFactory, SonarQubeApiLogger } from './types';

interface SonarQubeApiClientFactoryDeps {
  logger: SonarQubeApiLogger;
  metrics: SonarQubeApiMetrics;
}

export class SonarQubeApiClientFactoryImpl implements SonarQubeApiClientFactory {
  public constructor(private readonly deps: SonarQubeApiClientFactoryDeps) {}

  public create(inputOptions: SonarQubeApiClientInputOptions): SonarQubeApiClient {
    const parsed = sonarQubeApiClientOptionsSchema.safeParse(inputOptions);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Invalid SonarQube API client options:\n${z.prettifyError(parsed.error)}`,
      );
    }
    const options = parsed.data;

    const auth = new SonarQubeAuth(options.token);

    const isOwnedDispatcher = !options.dispatcher;
    const dispatcher =
      options.dispatcher ??
      new Agent({
        headersTimeout: options.timeoutMs,
        bodyTimeout: options.timeoutMs,
        connect: { rejectUnauthorized: options.verifySsl },
      });

    const httpClient = new SonarQubeHttpClient({
      baseUrl: options.baseUrl,
      auth,
      metrics: this.deps.metrics,
      logger: this.deps.logger,
      dispatcher,
      clientName: options.metadata.clientName,
    });

    return {
      baseUrl: options.baseUrl,
      groups: new GroupsService(httpClient),
      close: async () => {
        if (isOwnedDispatcher) {
          await dispatcher.close();
        }
      },
    };
  }
}

/**
 * Builds a client outside of a Nest application, logging through a Nest `Logger`
 * and recording metrics on the global OpenTelemetry meter provider unless
 * overridden.
 */
export function createSonarQubeApiClient(
  options: SonarQubeApiClientInputOptions,
  deps: Partial<SonarQubeApiClientFactoryDeps> = {},
): SonarQubeApiClient {
  const factory = new SonarQubeApiClientFactoryImpl({
    logger: deps.logger ?? new Logger('SonarQubeApi'),
    metrics:
      deps.metrics ?? createSonarQubeApiMetrics(metrics.getMeter('sonarqube_api'), 'sonarqube_api'),
  });
  return factory.create(options);
}
