import type { Redacted } from '@sonar-admin/utils';
import { ConfigurationError } from '../core/errors';

/**
 * SonarQube accepts a user token as the basic auth username with an empty password.
 */
export class SonarQubeAuth {
  private readonly authorizationHeader: string;

  public constructor(token: Redacted<string>) {
    if (!token.value) {
      throw new ConfigurationError(
        'Authentication credentials are not provided. Set the token option.',
      );
    }

    const basicAuth = Buffer.from(`${token.value}:`).toString('base64');
    this.authorizationHeader = `Basic ${basicAuth}`;
  }

  public getAuthHeaders(): Record<string, string> {
    return { Authorization: this.authorizationHeader };
  }
}
