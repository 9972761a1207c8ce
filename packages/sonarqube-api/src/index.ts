export { SonarQubeApiModule } from './core/sonarqube-api.module';

export {
  SONARQUBE_API_CLIENT_FACTORY,
  SONARQUBE_API_CLIENT_REGISTRY,
  SONARQUBE_API_METRICS,
  getSonarQubeApiClientToken,
} from './core/tokens';

export type {
  CallResult,
  ExpectedStatusCodes,
  JsonObject,
  JsonValue,
  SonarQubeApiClient,
  SonarQubeApiClientFactory,
  SonarQubeApiClientRegistry,
  SonarQubeApiFeatureAsyncOptions,
  SonarQubeApiLogger,
  SonarQubeApiModuleAsyncOptions,
  SonarQubeApiModuleOptions,
} from './core/types';

export {
  ConfigurationError,
  GroupAlreadyExistsError,
  GroupNotFoundError,
  InsufficientPrivilegesError,
  SonarQubeApiError,
  TransportError,
  UnexpectedResponseError,
  UnexpectedStatusError,
} from './core/errors';

export {
  createSonarQubeApiClient,
  SonarQubeApiClientFactoryImpl,
} from './core/sonarqube-api-client.factory';
export { SonarQubeApiClientRegistryImpl } from './core/sonarqube-api-client.registry';
export {
  type SonarQubeApiClientInputOptions,
  type SonarQubeApiClientOptions,
  sonarQubeApiClientOptionsSchema,
} from './core/config/sonarqube-api-client-options';

export { createSonarQubeApiMetrics, type SonarQubeApiMetrics } from './core/observability';

export { SonarQubeAuth } from './auth/sonarqube-auth';
export {
  type CallOptions,
  type FormFields,
  type HttpMethod,
  type QueryParams,
  SonarQubeHttpClient,
} from './clients/sonarqube-http.client';
export { GroupsService } from './groups/groups.service';
export type { SonarQubeGroupsFacade } from './groups/sonarqube-groups.facade';
export type { Group, GroupMutationResult } from './groups/groups.types';
