import { describe, expect, it, vi } from 'vitest';
import type { SonarQubeApiClientInputOptions } from '../config/sonarqube-api-client-options';
import { ConfigurationError } from '../errors';
import { SonarQubeApiClientRegistryImpl } from '../sonarqube-api-client.registry';
import type { SonarQubeApiClient, SonarQubeApiClientFactory } from '../types';

function createMockClient(overrides?: Partial<SonarQubeApiClient>): SonarQubeApiClient {
  return {
    baseUrl: 'https://sonar.test',
    groups: {} as SonarQubeApiClient['groups'],
    close: vi.fn().mockResolvedValue(undefined),
    ...overrides,
  };
}

function createMockFactory(...clients: SonarQubeApiClient[]) {
  const create = vi.fn();
  for (const client of clients) {
    create.mockReturnValueOnce(client);
  }
  return { create } satisfies SonarQubeApiClientFactory;
}

const options: SonarQubeApiClientInputOptions = {
  baseUrl: 'https://sonar.test',
  token: 'test-token',
};

describe('SonarQubeApiClientRegistryImpl', () => {
  describe('get', () => {
    it('returns undefined for unknown key', () => {
      const registry = new SonarQubeApiClientRegistryImpl(createMockFactory());

      expect(registry.get('unknown')).toBeUndefined();
    });
  });

  describe('getOrCreate', () => {
    it('creates client via factory and returns it', () => {
      const client = createMockClient();
      const factory = createMockFactory(client);
      const registry = new SonarQubeApiClientRegistryImpl(factory);

      expect(registry.getOrCreate('primary', options)).toBe(client);
      expect(factory.create).toHaveBeenCalledWith(options);
    });

    it('returns existing client on second call without duplicate creation', () => {
      const factory = createMockFactory(createMockClient());
      const registry = new SonarQubeApiClientRegistryImpl(factory);

      const first = registry.getOrCreate('primary', options);
      const second = registry.getOrCreate('primary', options);

      expect(first).toBe(second);
      expect(factory.create).toHaveBeenCalledOnce();
    });

    it('reuses the client when the base URL differs only in trailing slash and host case', () => {
      const factory = createMockFactory(createMockClient());
      const registry = new SonarQubeApiClientRegistryImpl(factory);

      const first = registry.getOrCreate('primary', options);
      const second = registry.getOrCreate('primary', { ...options, baseUrl: 'https://SONAR.test/' });

      expect(second).toBe(first);
      expect(factory.create).toHaveBeenCalledOnce();
    });

    it('rejects a name already bound to a different server', () => {
      const factory = createMockFactory(createMockClient({ baseUrl: 'https://one.test' }));
      const registry = new SonarQubeApiClientRegistryImpl(factory);

      registry.getOrCreate('primary', { ...options, baseUrl: 'https://one.test' });

      expect(() =>
        registry.getOrCreate('primary', { ...options, baseUrl: 'https://two.test' }),
      ).toThrow(
        new ConfigurationError(
          'SonarQubeApiClient "primary" is registered for https://one.test, ' +
            'cannot reuse it for https://two.test',
        ),
      );
      expect(factory.create).toHaveBeenCalledOnce();
    });

    it('treats a different context path as a different server', () => {
      const factory = createMockFactory(createMockClient({ baseUrl: 'https://sonar.test/a' }));
      const registry = new SonarQubeApiClientRegistryImpl(factory);

      registry.getOrCreate('primary', { ...options, baseUrl: 'https://sonar.test/a' });

      expect(() =>
        registry.getOrCreate('primary', { ...options, baseUrl: 'https://sonar.test/b' }),
      ).toThrow(ConfigurationError);
    });
  });

  describe('set', () => {
    it('stores client and makes it retrievable via get', () => {
      const client = createMockClient();
      const registry = new SonarQubeApiClientRegistryImpl(createMockFactory());

      registry.set('primary', client);

      expect(registry.get('primary')).toBe(client);
    });

    it('throws on duplicate key', () => {
      const registry = new SonarQubeApiClientRegistryImpl(createMockFactory());

      registry.set('primary', createMockClient());

      expect(() => registry.set('primary', createMockClient())).toThrow(
        'SonarQubeApiClient with key "primary" is already registered',
      );
    });
  });

  describe('delete', () => {
    it('removes client and calls close()', async () => {
      const client = createMockClient();
      const registry = new SonarQubeApiClientRegistryImpl(createMockFactory(client));

      registry.getOrCreate('primary', options);
      await registry.delete('primary');

      expect(client.close).toHaveBeenCalledOnce();
      expect(registry.get('primary')).toBeUndefined();
    });

    it('no-ops for unknown key', async () => {
      const registry = new SonarQubeApiClientRegistryImpl(createMockFactory());

      await expect(registry.delete('missing')).resolves.toBeUndefined();
    });
  });

  describe('clear', () => {
    it('closes all clients and empties the registry', async () => {
      const client1 = createMockClient();
      const client2 = createMockClient();
      const registry = new SonarQubeApiClientRegistryImpl(createMockFactory(client1, client2));

      registry.getOrCreate('a', options);
      registry.getOrCreate('b', options);
      await registry.clear();

      expect(client1.close).toHaveBeenCalledOnce();
      expect(client2.close).toHaveBeenCalledOnce();
      expect(registry.get('a')).toBeUndefined();
      expect(registry.get('b')).toBeUndefined();
    });

    it('resolves even when close() rejects', async () => {
      const failingClient = createMockClient({
        close: vi.fn().mockRejectedValue(new Error('close failed')),
      });
      const registry = new SonarQubeApiClientRegistryImpl(createMockFactory(failingClient));

      registry.getOrCreate('primary', options);

      await expect(registry.clear()).resolves.toBeUndefined();
      expect(registry.get('primary')).toBeUndefined();
    });

    it('handles clients without close()', async () => {
      const registry = new SonarQubeApiClientRegistryImpl(
        createMockFactory(createMockClient({ close: undefined })),
      );

      registry.getOrCreate('primary', options);

      await expect(registry.clear()).resolves.toBeUndefined();
    });
  });
});
