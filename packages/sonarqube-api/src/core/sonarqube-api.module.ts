import 'reflect-metadata';
import {
  type DynamicModule,
  Inject,
  Logger,
  Module,
  type OnModuleDestroy,
  type Provider,
} from '@nestjs/common';
import { type Meter, metrics } from '@opentelemetry/api';
import type { SonarQubeApiClientInputOptions } from './config/sonarqube-api-client-options';
import {
  type ParsedSonarQubeApiModuleOptions,
  sonarQubeApiModuleOptionsSchema,
} from './config/sonarqube-api-module-options';
import { createSonarQubeApiMetrics, type SonarQubeApiMetrics } from './observability';
import { SonarQubeApiClientFactoryImpl } from './sonarqube-api-client.factory';
import { SonarQubeApiClientRegistryImpl } from './sonarqube-api-client.registry';
import {
  getSonarQubeApiClientToken,
  SONARQUBE_API_CLIENT_FACTORY,
  SONARQUBE_API_CLIENT_REGISTRY,
  SONARQUBE_API_METER,
  SONARQUBE_API_METRICS,
  SONARQUBE_API_MODULE_OPTIONS,
} from './tokens';
import type {
  SonarQubeApiClientFactory,
  SonarQubeApiClientRegistry,
  SonarQubeApiFeatureAsyncOptions,
  SonarQubeApiModuleAsyncOptions,
  SonarQubeApiModuleOptions,
} from './types';

@Module({})
export class SonarQubeApiModule implements OnModuleDestroy {
  public constructor(
    @Inject(SONARQUBE_API_CLIENT_REGISTRY)
    private readonly registry: SonarQubeApiClientRegistry,
  ) {}

  public async onModuleDestroy(): Promise<void> {
    await this.registry.clear();
  }

  public static forRoot(options: SonarQubeApiModuleOptions = {}): DynamicModule {
    return {
      module: SonarQubeApiModule,
      global: true,
      providers: [
        {
          provide: SONARQUBE_API_MODULE_OPTIONS,
          useValue: sonarQubeApiModuleOptionsSchema.parse(options),
        },
        ...SonarQubeApiModule.createCoreProviders(),
      ],
      exports: [SONARQUBE_API_CLIENT_FACTORY, SONARQUBE_API_CLIENT_REGISTRY, SONARQUBE_API_METRICS],
    };
  }

  public static forRootAsync(options: SonarQubeApiModuleAsyncOptions): DynamicModule {
    return {
      module: SonarQubeApiModule,
      global: true,
      imports: options.imports,
      providers: [
        {
          provide: SONARQUBE_API_MODULE_OPTIONS,
          useFactory: async (...args: never[]) =>
            sonarQubeApiModuleOptionsSchema.parse(await options.useFactory(...args)),
          inject: options.inject,
        },
        ...SonarQubeApiModule.createCoreProviders(),
      ],
      exports: [SONARQUBE_API_CLIENT_FACTORY, SONARQUBE_API_CLIENT_REGISTRY, SONARQUBE_API_METRICS],
    };
  }

  public static forFeature(name: string, options: SonarQubeApiClientInputOptions): DynamicModule {
    const token = getSonarQubeApiClientToken(name);
    return {
      module: SonarQubeApiModule,
      providers: [
        {
          provide: token,
          useFactory: (registry: SonarQubeApiClientRegistry) =>
            registry.getOrCreate(name, options),
          inject: [SONARQUBE_API_CLIENT_REGISTRY],
        },
      ],
      exports: [token],
    };
  }

  public static forFeatureAsync(
    name: string,
    options: SonarQubeApiFeatureAsyncOptions,
  ): DynamicModule {
    const token = getSonarQubeApiClientToken(name);
    return {
      module: SonarQubeApiModule,
      imports: options.imports,
      providers: [
        {
          provide: token,
          useFactory: async (registry: SonarQubeApiClientRegistry, ...args: never[]) =>
            registry.getOrCreate(name, await options.useFactory(...args)),
          inject: [SONARQUBE_API_CLIENT_REGISTRY, ...(options.inject ?? [])],
        },
      ],
      exports: [token],
    };
  }

  private static createCoreProviders(): Provider[] {
    return [
      {
        provide: SONARQUBE_API_METER,
        useFactory: (options: ParsedSonarQubeApiModuleOptions) =>
          metrics.getMeter(options.observability.metricPrefix),
        inject: [SONARQUBE_API_MODULE_OPTIONS],
      },
      {
        provide: SONARQUBE_API_METRICS,
        useFactory: (meter: Meter, options: ParsedSonarQubeApiModuleOptions) =>
          createSonarQubeApiMetrics(meter, options.observability.metricPrefix),
        inject: [SONARQUBE_API_METER, SONARQUBE_API_MODULE_OPTIONS],
      },
      {
        provide: SONARQUBE_API_CLIENT_FACTORY,
        useFactory: (
          metricsInstance: SonarQubeApiMetrics,
          options: ParsedSonarQubeApiModuleOptions,
        ) =>
          new SonarQubeApiClientFactoryImpl({
            logger: new Logger(options.observability.loggerContext),
            metrics: metricsInstance,
          }),
        inject: [SONARQUBE_API_METRICS, SONARQUBE_API_MODULE_OPTIONS],
      },
      {
        provide: SONARQUBE_API_CLIENT_REGISTRY,
        useFactory: (factory: SonarQubeApiClientFactory) =>
          new SonarQubeApiClientRegistryImpl(factory),
        inject: [SONARQUBE_API_CLIENT_FACTORY],
      },
    ];
  }
}
