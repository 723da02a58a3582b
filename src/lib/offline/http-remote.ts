/**
 * HTTP implementation of RemoteApi over global fetch.
 *
 * Statuses map onto the failure taxonomy; every call is bounded by a
 * timeout and can be aborted from outside.
 */

import {
  AuthFailure,
  CancelledFailure,
  NetworkFailure,
  NotFoundFailure,
  ServerFailure,
  SyncConflict,
  ValidationFailure,
  err,
  errorMessage,
  ok,
  type Failure,
} from '@/lib/errors';
import { remoteLogger as log } from '@/lib/logger';
import type { HttpMethod, RemoteApi, RemoteRequestOptions, RemoteResult } from './remote';

export type AuthTokenProvider = () => string | null | Promise<string | null>;

export interface HttpRemoteOptions {
  baseUrl: string;
  timeoutMs: number;
  getAuthToken?: AuthTokenProvider;
  fetchImpl?: typeof fetch;
}

interface Envelope {
  success: boolean | null;
  data: unknown;
  message: string | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Accepts `{ success, data, message }` envelopes as well as bare bodies. */
function readEnvelope(body: unknown): Envelope {
  if (!isRecord(body)) return { success: null, data: body, message: null };

  const message =
    typeof body.message === 'string' ? body.message : typeof body.error === 'string' ? body.error : null;
  const success = typeof body.success === 'boolean' ? body.success : null;
  const data = 'data' in body && success !== null ? body.data : body;
  return { success, data, message };
}

export function failureForStatus(status: number, message: string | null, path: string, details: unknown): Failure {
  const text = message ?? `HTTP ${status}`;
  if (status === 401 || status === 403) return new AuthFailure(text, status);
  if (status === 404) return new NotFoundFailure(path, null, 404);
  if (status === 409) return new SyncConflict(text, 'duplicate', 409);
  if (status === 410) return new SyncConflict(text, 'gone', 410);
  if (status === 408 || status === 429 || status >= 500) return new ServerFailure(text, status);
  return new ValidationFailure(text, { statusCode: status, details });
}

export class HttpRemoteApi implements RemoteApi {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly getAuthToken: AuthTokenProvider;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpRemoteOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.getAuthToken = options.getAuthToken ?? (() => null);
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  get(path: string, options?: RemoteRequestOptions): Promise<RemoteResult> {
    return this.request('GET', path, undefined, options);
  }

  post(path: string, data?: unknown, options?: RemoteRequestOptions): Promise<RemoteResult> {
    return this.request('POST', path, data, options);
  }

  put(path: string, data?: unknown, options?: RemoteRequestOptions): Promise<RemoteResult> {
    return this.request('PUT', path, data, options);
  }

  patch(path: string, data?: unknown, options?: RemoteRequestOptions): Promise<RemoteResult> {
    return this.request('PATCH', path, data, options);
  }

  delete(path: string, options?: RemoteRequestOptions): Promise<RemoteResult> {
    return this.request('DELETE', path, undefined, options);
  }

  private async request(
    method: HttpMethod,
    path: string,
    data: unknown,
    options: RemoteRequestOptions = {}
  ): Promise<RemoteResult> {
    const external = options.signal;
    if (external?.aborted) return err(new CancelledFailure());

    const headers: Record<string, string> = { Accept: 'application/json' };
    if (data !== undefined) headers['Content-Type'] = 'application/json';
    if (options.clientMutationId) headers['X-Client-Mutation-Id'] = options.clientMutationId;

    const token = await this.getAuthToken();
    if (token) headers.Authorization = `Bearer ${token}`;

    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onExternalAbort = (): void => controller.abort();
    external?.addEventListener('abort', onExternalAbort);

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers,
        body: data === undefined ? undefined : JSON.stringify(data),
        signal: controller.signal,
      });
    } catch (error) {
      if (timedOut) {
        log.warn({ method, path, timeoutMs: this.timeoutMs }, 'Request timed out');
        return err(new NetworkFailure(`Request timed out after ${this.timeoutMs} ms`, { timedOut: true, cause: error }));
      }
      if (external?.aborted) return err(new CancelledFailure());
      log.warn({ method, path, err: errorMessage(error) }, 'Request failed');
      return err(new NetworkFailure(errorMessage(error), { cause: error }));
    } finally {
      clearTimeout(timeout);
      external?.removeEventListener('abort', onExternalAbort);
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      return err(new NetworkFailure(`Response body unreadable: ${errorMessage(error)}`, { cause: error }));
    }

    let body: unknown = null;
    if (text.length > 0) {
      try {
        body = JSON.parse(text);
      } catch (error) {
        if (response.ok) {
          return err(new ServerFailure(`Invalid JSON response: ${errorMessage(error)}`, response.status));
        }
        body = text;
      }
    }

    const envelope = readEnvelope(body);
    if (!response.ok) {
      log.debug({ method, path, status: response.status }, 'Request rejected');
      return err(failureForStatus(response.status, envelope.message, path, envelope.data));
    }

    return ok({
      success: envelope.success ?? true,
      statusCode: response.status,
      data: envelope.data,
      message: envelope.message,
    });
  }
}
