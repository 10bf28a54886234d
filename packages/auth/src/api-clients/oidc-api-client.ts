import { logEvent, RequestUtils, ValidationUtils } from '@credgate/core';
import type { z } from 'zod';
import {
  AuthClientConfigError,
  OidcProtocolError,
  OidcTransportError,
  TransportErrorCode,
  toError,
} from '../errors/index.js';
import {
  APP_HEADER,
  APP_NAME,
  AUTH_MAX_RETRIES,
  AUTH_RETRY_DELAY_MS,
} from '../constants.js';
import { delay } from '../utils/delay.js';
import type { FormPayload } from './types.js';

/**
 * Options shared by every endpoint client.
 * @public
 */
export interface OidcApiClientOptions {
  /** Fetch implementation. Defaults to the global `fetch` at call time. */
  fetch?: typeof fetch;
  /** Base delay for 429 backoff; attempt n waits `retryDelayMs * 2^(n-1)`. */
  retryDelayMs?: number;
  maxRetries?: number;
}

type JsonSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

interface RequestSpec {
  method: 'GET' | 'POST';
  params?: FormPayload;
  headers?: Record<string, string>;
  form?: FormPayload;
  json?: unknown;
}

/**
 * Encodes a payload as `application/x-www-form-urlencoded` parameters.
 * Array values become repeated parameters.
 * @internal
 */
export function encodeForm(payload: FormPayload): URLSearchParams {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(payload)) {
    if (value === undefined) {
      continue;
    }
    if (Array.isArray(value)) {
      for (const item of value) {
        params.append(key, item);
      }
    } else {
      params.append(key, value);
    }
  }
  return params;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(
  record: Record<string, unknown>,
  field: string,
): string | undefined {
  const value = record[field];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Parses a `Retry-After` header given in seconds.
 * @internal
 */
function retryAfterMs(response: Response): number | undefined {
  const header = response.headers.get('retry-after');
  if (!header) {
    return undefined;
  }
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

/**
 * HTTP client for a single auth server endpoint.
 *
 * Every request carries `Accept: application/json` and the library's app
 * header. HTTP 429 answers are retried with exponential backoff, honouring
 * `Retry-After` when present.
 *
 * Responses are classified in a fixed order:
 * 1. An OAuth2 error payload (`error`, or the `errorCode` variant) raises
 *    {@link OidcProtocolError}, whatever the HTTP status.
 * 2. A non-2xx status raises {@link OidcTransportError} (`http_error`).
 * 3. A body that is not the expected JSON shape raises
 *    {@link OidcTransportError} (`invalid_payload`).
 *
 * @public
 */
export class OidcApiClient {
  protected readonly endpointUri: string;
  private readonly options: OidcApiClientOptions;

  public constructor(endpointUri: string, options: OidcApiClientOptions = {}) {
    try {
      ValidationUtils.validateUrl(endpointUri, 'endpoint');
    } catch (error) {
      throw new AuthClientConfigError(toError(error).message, toError(error));
    }
    this.endpointUri = endpointUri;
    this.options = options;
  }

  public endpoint(): string {
    return this.endpointUri;
  }

  protected async checkedGet(
    params?: FormPayload,
    headers?: Record<string, string>,
  ): Promise<void> {
    await this.send({ method: 'GET', params, headers }, undefined);
  }

  protected async checkedGetJson<T>(
    schema: JsonSchema<T>,
    params?: FormPayload,
    headers?: Record<string, string>,
  ): Promise<T> {
    return this.send({ method: 'GET', params, headers }, schema);
  }

  protected async checkedPostForm(
    form: FormPayload,
    headers?: Record<string, string>,
  ): Promise<void> {
    await this.send({ method: 'POST', form, headers }, undefined);
  }

  protected async checkedPostFormJson<T>(
    schema: JsonSchema<T>,
    form: FormPayload,
    headers?: Record<string, string>,
  ): Promise<T> {
    return this.send({ method: 'POST', form, headers }, schema);
  }

  protected async checkedPostJson(
    json: unknown,
    headers?: Record<string, string>,
  ): Promise<void> {
    await this.send({ method: 'POST', json, headers }, undefined);
  }

  protected async checkedPostJsonJson<T>(
    schema: JsonSchema<T>,
    json: unknown,
    headers?: Record<string, string>,
  ): Promise<T> {
    return this.send({ method: 'POST', json, headers }, schema);
  }

  private async send(spec: RequestSpec, schema: undefined): Promise<undefined>;
  private async send<T>(spec: RequestSpec, schema: JsonSchema<T>): Promise<T>;
  private async send<T>(
    spec: RequestSpec,
    schema: JsonSchema<T> | undefined,
  ): Promise<T | undefined> {
    const requestId = RequestUtils.generateRequestId('oidc');
    const response = await this.fetchWithRetry(spec, requestId);
    const body = await this.classify(response, schema !== undefined);
    if (schema === undefined) {
      return undefined;
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw OidcTransportError.invalidPayload(
        this.endpointUri,
        detail,
        response.status,
      );
    }
    return parsed.data;
  }

  private buildRequest(spec: RequestSpec): { url: string; init: RequestInit } {
    const url = new URL(this.endpointUri);
    if (spec.params) {
      for (const [key, value] of encodeForm(spec.params)) {
        url.searchParams.append(key, value);
      }
    }

    const headers: Record<string, string> = {
      Accept: 'application/json',
      [APP_HEADER]: APP_NAME,
      ...spec.headers,
    };
    const init: RequestInit = { method: spec.method, headers };
    if (spec.form) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
      init.body = encodeForm(spec.form).toString();
    } else if (spec.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(spec.json);
    }
    return { url: url.toString(), init };
  }

  private async fetchWithRetry(
    spec: RequestSpec,
    requestId: string,
  ): Promise<Response> {
    const fetchImpl = this.options.fetch ?? globalThis.fetch;
    const maxRetries = this.options.maxRetries ?? AUTH_MAX_RETRIES;
    const baseDelay = this.options.retryDelayMs ?? AUTH_RETRY_DELAY_MS;
    const { url, init } = this.buildRequest(spec);

    for (let attempt = 1; ; attempt++) {
      logEvent('debug', 'auth:api_request', {
        requestId,
        method: spec.method,
        endpoint: this.endpointUri,
        attempt,
      });

      let response: Response;
      try {
        response = await fetchImpl(url, init);
      } catch (error) {
        throw OidcTransportError.networkError(this.endpointUri, toError(error));
      }

      if (response.status !== 429 || attempt > maxRetries) {
        return response;
      }

      const delayMs =
        retryAfterMs(response) ?? baseDelay * Math.pow(2, attempt - 1);
      logEvent('warn', 'auth:rate_limited', {
        requestId,
        endpoint: this.endpointUri,
        attempt,
        maxRetries,
        nextAttemptDelayMs: delayMs,
      });
      await delay(delayMs);
    }
  }

  private async classify(
    response: Response,
    expectJson: boolean,
  ): Promise<unknown> {
    const text = await response.text();
    const contentType = response.headers.get('content-type') ?? '';
    const isJson = contentType.toLowerCase().includes('application/json');

    let body: unknown;
    let parseError: Error | undefined;
    if (isJson && text.length > 0) {
      try {
        body = JSON.parse(text);
      } catch (error) {
        parseError = toError(error);
      }
    }

    if (isRecord(body)) {
      const errorCode = stringField(body, 'error') ?? stringField(body, 'errorCode');
      if (errorCode) {
        throw new OidcProtocolError({
          errorCode,
          errorDescription:
            stringField(body, 'error_description') ??
            stringField(body, 'errorSummary'),
          status: response.status,
          endpoint: this.endpointUri,
        });
      }
    }

    if (!response.ok) {
      throw OidcTransportError.httpError(
        this.endpointUri,
        response.status,
        response.statusText,
      );
    }

    if (!expectJson) {
      return undefined;
    }
    if (!isJson) {
      throw OidcTransportError.invalidPayload(
        this.endpointUri,
        `expected application/json but got '${contentType || 'no content type'}'`,
        response.status,
      );
    }
    if (text.length === 0) {
      throw OidcTransportError.invalidPayload(
        this.endpointUri,
        'empty response body',
        response.status,
      );
    }
    if (parseError) {
      throw new OidcTransportError(
        `Unexpected response from ${this.endpointUri}: body is not valid JSON`,
        TransportErrorCode.INVALID_PAYLOAD,
        this.endpointUri,
        { status: response.status, cause: parseError },
      );
    }
    return body;
  }
}
