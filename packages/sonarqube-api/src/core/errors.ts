import type { ExpectedStatusCodes } from './types';

export class SonarQubeApiError extends Error {
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends SonarQubeApiError {}

/**
 * The request never produced an HTTP response: connection refused, DNS failure,
 * TLS handshake failure, timeout.
 */
export class TransportError extends SonarQubeApiError {
  public constructor(
    message: string,
    public readonly url: string,
    public readonly data: Record<string, string> | undefined,
    options: { cause: unknown },
  ) {
    super(message, options);
  }
}

export class UnexpectedStatusError extends SonarQubeApiError {
  public constructor(
    message: string,
    public readonly url: string,
    public readonly expectedStatusCodes: ExpectedStatusCodes,
    public readonly statusCode: number,
    public readonly errorData: unknown,
  ) {
    super(message);
  }
}

export class InsufficientPrivilegesError extends SonarQubeApiError {}

export class GroupNotFoundError extends SonarQubeApiError {}

export class GroupAlreadyExistsError extends SonarQubeApiError {}

export class UnexpectedResponseError extends SonarQubeApiError {}
