import type { DynamicModule, FactoryProvider } from '@nestjs/common';
import type { z } from 'zod/v4';
import type { SonarQubeGroupsFacade } from '../groups/sonarqube-groups.facade';
import type { SonarQubeApiClientInputOptions } from './config/sonarqube-api-client-options';
import type { sonarQubeApiModuleOptionsSchema } from './config/sonarqube-api-module-options';

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Decoded response body. An empty body decodes to `{}`, a body that is not valid
 * JSON is returned as raw text.
 */
export type CallResult = JsonValue;

/** `'2xx'` accepts any success status. */
export type ExpectedStatusCodes = readonly number[] | '2xx';

export interface RequestMetricAttributes {
  operation: string;
  target: string;
  result: 'success' | 'error';
  status_code_class?: string;
  tenant?: string;
}

export interface SonarQubeApiLogger {
  debug: (obj: object) => void;
  warn: (obj: object) => void;
  error: (obj: object) => void;
}

export type SonarQubeApiModuleOptions = z.input<typeof sonarQubeApiModuleOptionsSchema>;

export interface SonarQubeApiModuleAsyncOptions {
  imports?: DynamicModule['imports'];
  useFactory: (...args: never[]) => SonarQubeApiModuleOptions | Promise<SonarQubeApiModuleOptions>;
  inject?: FactoryProvider['inject'];
}

export interface SonarQubeApiFeatureAsyncOptions {
  imports?: DynamicModule['imports'];
  useFactory: (
    ...args: never[]
  ) => SonarQubeApiClientInputOptions | Promise<SonarQubeApiClientInputOptions>;
  inject?: FactoryProvider['inject'];
}

export interface SonarQubeApiClient {
  /** Base URL of the server the client talks to, as configured. */
  readonly baseUrl: string;
  groups: SonarQubeGroupsFacade;
  close?(): Promise<void>;
}

export interface SonarQubeApiClientFactory {
  create(options: SonarQubeApiClientInputOptions): SonarQubeApiClient;
}

export interface SonarQubeApiClientRegistry {
  get(key: string): SonarQubeApiClient | undefined;
  getOrCreate(key: string, options: SonarQubeApiClientInputOptions): SonarQubeApiClient;
  set(key: string, client: SonarQubeApiClient): void;
  delete(key: string): Promise<void>;
  clear(): Promise<void>;
}
