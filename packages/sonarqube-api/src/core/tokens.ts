export const SONARQUBE_API_MODULE_OPTIONS = Symbol('SONARQUBE_API_MODULE_OPTIONS');

export const SONARQUBE_API_METER = Symbol('SONARQUBE_API_METER');

export const SONARQUBE_API_METRICS = Symbol('SONARQUBE_API_METRICS');

export const SONARQUBE_API_CLIENT_FACTORY = Symbol('SONARQUBE_API_CLIENT_FACTORY');

export const SONARQUBE_API_CLIENT_REGISTRY = Symbol('SONARQUBE_API_CLIENT_REGISTRY');

export function getSonarQubeApiClientToken(name: string): string {
  return `SONARQUBE_API_CLIENT_${name}`;
}
