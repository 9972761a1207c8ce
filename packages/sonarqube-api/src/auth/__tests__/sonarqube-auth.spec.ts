import { Redacted } from '@sonar-admin/utils';
import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../../core/errors';
import { SonarQubeAuth } from '../sonarqube-auth';

describe('SonarQubeAuth', () => {
  it('sends the token as basic auth username with an empty password', () => {
    const auth = new SonarQubeAuth(new Redacted('test-token'));

    // base64("test-token:")
    expect(auth.getAuthHeaders()).toStrictEqual({ Authorization: 'Basic dGVzdC10b2tlbjo=' });
  });

  it('throws ConfigurationError for an empty token', () => {
    expect(() => new SonarQubeAuth(new Redacted(''))).toThrow(ConfigurationError);
    expect(() => new SonarQubeAuth(new Redacted(''))).toThrow(
      'Authentication credentials are not provided. Set the token option.',
    );
  });
});
