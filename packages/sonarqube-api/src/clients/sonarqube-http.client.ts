import {
  createApiMethodExtractor,
  elapsedMilliseconds,
  getHttpStatusCodeClass,
  getSlowRequestDurationBucket,
  normalizeError,
  sanitizeError,
} from '@sonar-admin/utils';
import type { Dispatcher } from 'undici';
import { z } from 'zod/v4';
import type { SonarQubeAuth } from '../auth/sonarqube-auth';
import { ConfigurationError, TransportError, UnexpectedStatusError } from '../core/errors';
import type { SonarQubeApiMetrics } from '../core/observability';
import type {
  CallResult,
  ExpectedStatusCodes,
  JsonValue,
  RequestMetricAttributes,
  SonarQubeApiLogger,
} from '../core/types';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type QueryParams = Record<string, string>;

export type FormFields = Record<string, string>;

export interface CallOptions {
  expectedStatusCodes?: ExpectedStatusCodes;
}

const DEFAULT_EXPECTED_STATUS_CODES: Record<HttpMethod, ExpectedStatusCodes> = {
  GET: [200],
  POST: [200, 201],
  PUT: [200],
  DELETE: '2xx',
};

const sonarQubeErrorPayloadSchema = z.object({
  errors: z.array(z.object({ msg: z.string() })).min(1),
});

interface SonarQubeHttpClientDeps {
  baseUrl: string;
  auth: SonarQubeAuth;
  metrics: SonarQubeApiMetrics;
  logger: SonarQubeApiLogger;
  dispatcher: Dispatcher;
  clientName?: string;
}

interface RequestTarget {
  origin: string;
  path: string;
  href: string;
}

interface RawResponse {
  statusCode: number;
  text: string;
}

export class SonarQubeHttpClient {
  private readonly origin: string;
  private readonly basePath: string;
  private readonly auth: SonarQubeAuth;
  private readonly metrics: SonarQubeApiMetrics;
  private readonly logger: SonarQubeApiLogger;
  private readonly dispatcher: Dispatcher;
  private readonly clientName?: string;
  private readonly extractApiMethod: ReturnType<typeof createApiMethodExtractor>;

  public constructor(deps: SonarQubeHttpClientDeps) {
    if (!URL.canParse(deps.baseUrl)) {
      throw new ConfigurationError(`Invalid SonarQube base URL: ${deps.baseUrl}`);
    }

    const base = new URL(deps.baseUrl);
    this.origin = base.origin;
    // `new URL` reports "/" for a bare origin; keep the base as written so paths append verbatim
    this.basePath = base.pathname === '/' && !deps.baseUrl.endsWith('/') ? '' : base.pathname;
    this.auth = deps.auth;
    this.metrics = deps.metrics;
    this.logger = deps.logger;
    this.dispatcher = deps.dispatcher;
    this.clientName = deps.clientName;

    this.extractApiMethod = createApiMethodExtractor([
      'api',
      'user_groups',
      'search',
      'create',
      'update',
      'delete',
    ]);
  }

  public async get(path: string, query?: QueryParams, options?: CallOptions): Promise<CallResult> {
    return this.call('GET', path, { query, ...options });
  }

  public async post(path: string, form: FormFields, options?: CallOptions): Promise<CallResult> {
    return this.call('POST', path, { form, ...options });
  }

  public async put(path: string, form: FormFields, options?: CallOptions): Promise<CallResult> {
    return this.call('PUT', path, { form, ...options });
  }

  public async delete(path: string, form?: FormFields, options?: CallOptions): Promise<CallResult> {
    return this.call('DELETE', path, { form, ...options });
  }

  private async call(
    method: HttpMethod,
    path: string,
    request: { query?: QueryParams; form?: FormFields } & CallOptions,
  ): Promise<CallResult> {
    const target = this.buildTarget(path, request.query);
    const expectedStatusCodes =
      request.expectedStatusCodes ?? DEFAULT_EXPECTED_STATUS_CODES[method];
    const startTime = Date.now();

    const baseAttributes: Pick<RequestMetricAttributes, 'operation' | 'target' | 'tenant'> = {
      operation: this.extractApiMethod(path, method),
      target: 'sonarqube',
      ...(this.clientName ? { tenant: this.clientName } : {}),
    };

    this.logger.debug({ msg: 'SonarQube API request', method, path });

    try {
      const response = await this.send(method, target, request.form ?? request.query);

      if (!isExpectedStatus(response.statusCode, expectedStatusCodes)) {
        throw createUnexpectedStatusError(method, target, expectedStatusCodes, response);
      }

      const durationMs = elapsedMilliseconds(startTime);

      this.metrics.requestsTotal.add(1, { ...baseAttributes, result: 'success' });
      this.metrics.requestDurationMs.record(durationMs, {
        ...baseAttributes,
        result: 'success',
        status_code_class: getHttpStatusCodeClass(response.statusCode),
      });

      const slowBucket = getSlowRequestDurationBucket(durationMs);
      if (slowBucket) {
        this.metrics.slowRequestsTotal.add(1, {
          ...baseAttributes,
          duration_bucket: slowBucket,
        });

        this.logger.warn({
          msg: 'Slow SonarQube API request detected',
          method,
          path,
          duration: durationMs,
          durationBucket: slowBucket,
        });
      }

      return decodeBody(response.text);
    } catch (error) {
      const statusCode = error instanceof UnexpectedStatusError ? error.statusCode : 0;
      const statusCodeClass = getHttpStatusCodeClass(statusCode);
      const durationMs = elapsedMilliseconds(startTime);

      this.metrics.requestsTotal.add(1, { ...baseAttributes, result: 'error' });
      this.metrics.errorsTotal.add(1, {
        ...baseAttributes,
        status_code_class: statusCodeClass,
      });
      this.metrics.requestDurationMs.record(durationMs, {
        ...baseAttributes,
        result: 'error',
        status_code_class: statusCodeClass,
      });

      this.logger.error({
        msg: 'Failed SonarQube API request',
        method,
        path,
        error: sanitizeError(error),
      });

      throw error;
    }
  }

  private buildTarget(path: string, query?: QueryParams): RequestTarget {
    const queryString =
      query && Object.keys(query).length > 0 ? `?${new URLSearchParams(query).toString()}` : '';
    const requestPath = `${this.basePath}${path}${queryString}`;
    return { origin: this.origin, path: requestPath, href: `${this.origin}${requestPath}` };
  }

  private async send(
    method: HttpMethod,
    target: RequestTarget,
    data: Record<string, string> | undefined,
  ): Promise<RawResponse> {
    const isForm = method !== 'GET' && data !== undefined;

    try {
      const { statusCode, body } = await this.dispatcher.request({
        origin: target.origin,
        path: target.path,
        method,
        headers: {
          ...this.auth.getAuthHeaders(),
          Accept: 'application/json',
          ...(isForm ? { 'Content-Type': 'application/x-www-form-urlencoded' } : {}),
        },
        body: isForm ? new URLSearchParams(data).toString() : undefined,
      });

      return { statusCode, text: await body.text() };
    } catch (error) {
      throw new TransportError(
        `Request to ${target.href} failed: ${normalizeError(error).message}`,
        target.href,
        data,
        { cause: error },
      );
    }
  }
}

function isExpectedStatus(statusCode: number, expected: ExpectedStatusCodes): boolean {
  if (expected === '2xx') {
    return statusCode >= 200 && statusCode < 300;
  }
  return expected.includes(statusCode);
}

function createUnexpectedStatusError(
  method: HttpMethod,
  target: RequestTarget,
  expectedStatusCodes: ExpectedStatusCodes,
  response: RawResponse,
): UnexpectedStatusError {
  const errorData = decodeBody(response.text);
  const expectedText =
    expectedStatusCodes === '2xx' ? '2xx' : expectedStatusCodes.join(', ');
  const serverMessage = extractServerMessage(errorData);

  return new UnexpectedStatusError(
    `Unexpected status code ${response.statusCode} (expected ${expectedText}) ` +
      `for ${method} ${target.href}${serverMessage ? `: ${serverMessage}` : ''}`,
    target.href,
    expectedStatusCodes,
    response.statusCode,
    errorData,
  );
}

// SonarQube reports failures as {"errors":[{"msg":"..."}]}
function extractServerMessage(errorData: CallResult): string | undefined {
  const payload = sonarQubeErrorPayloadSchema.safeParse(errorData);
  if (payload.success) {
    return payload.data.errors.map((error) => error.msg).join('; ');
  }
  if (typeof errorData === 'string' && errorData.length > 0) {
    return errorData;
  }
  return undefined;
}

function decodeBody(text: string): CallResult {
  if (text.length === 0) {
    return {};
  }

  try {
    const decoded: JsonValue = JSON.parse(text);
    return decoded;
  } catch {
    return text;
  }
}
