import * as assert from 'node:assert';
import type { SonarQubeApiClientInputOptions } from './config/sonarqube-api-client-options';
import { ConfigurationError } from './errors';
import type {
  SonarQubeApiClient,
  SonarQubeApiClientFactory,
  SonarQubeApiClientRegistry,
} from './types';

/**
 * Keeps one client per SonarQube server, keyed by a caller-chosen name.
 *
 * A name stays bound to the server its client was created for: asking for the same
 * name with another base URL is a configuration error, not a silent reuse.
 */
export class SonarQubeApiClientRegistryImpl implements SonarQubeApiClientRegistry {
  private readonly clients = new Map<string, SonarQubeApiClient>();

  public constructor(private readonly factory: SonarQubeApiClientFactory) {}

  public get(key: string): SonarQubeApiClient | undefined {
    return this.clients.get(key);
  }

  public getOrCreate(key: string, options: SonarQubeApiClientInputOptions): SonarQubeApiClient {
    const existing = this.clients.get(key);
    if (existing) {
      if (toServerKey(existing.baseUrl) !== toServerKey(options.baseUrl)) {
        throw new ConfigurationError(
          `SonarQubeApiClient "${key}" is registered for ${existing.baseUrl}, ` +
            `cannot reuse it for ${options.baseUrl}`,
        );
      }
      return existing;
    }

    const client = this.factory.create(options);
    this.clients.set(key, client);
    return client;
  }

  public set(key: string, client: SonarQubeApiClient): void {
    assert.ok(!this.clients.has(key), `SonarQubeApiClient with key "${key}" is already registered`);
    this.clients.set(key, client);
  }

  public async delete(key: string): Promise<void> {
    const client = this.clients.get(key);
    if (client) {
      this.clients.delete(key);
      await client.close?.();
    }
  }

  public async clear(): Promise<void> {
    const closePromises: Promise<void>[] = [];
    for (const client of this.clients.values()) {
      if (client.close) {
        closePromises.push(client.close());
      }
    }
    this.clients.clear();
    await Promise.allSettled(closePromises);
  }
}

// Scheme and host case and trailing slashes do not change the target server.
function toServerKey(baseUrl: string): string {
  if (!URL.canParse(baseUrl)) {
    return baseUrl;
  }
  const url = new URL(baseUrl);
  return `${url.origin}${url.pathname.replace(/\/+$/, '')}`;
}
