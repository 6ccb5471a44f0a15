/**
 * @fileoverview Remote Sync Client
 *
 * Thin HTTP client for the remote authority. It knows the endpoints and the
 * wire schemas, and nothing about sessions or records: callers pass the
 * bearer token in and decide what each failure means for them (a 401 means
 * "wrong password" to the session manager but "session expired" to the
 * sync engine).
 *
 * Every failure surfaces as a {@link RemoteRequestError} whose `kind` tells
 * transport problems (`network`, `timeout`, `aborted`) apart from HTTP
 * errors (`http`, with `status`) and malformed responses
 * (`invalid_response`).
 *
 * Requests are bounded by `timeoutMs` and may additionally be cancelled
 * through a caller-provided `AbortSignal`.
 */

import type { z } from 'zod';
import { debugLog, debugWarn } from '../debug';
import {
  downloadResponseSchema,
  tokenResponseSchema,
  uploadResponseSchema,
  userProfileSchema,
  type RemoteVector,
  type TokenResponse,
  type UploadResponse,
  type UserProfile,
  type VectorPayload
} from './schema';

// =============================================================================
// Types
// =============================================================================

export type RemoteErrorKind = 'network' | 'timeout' | 'aborted' | 'http' | 'invalid_response';

export class RemoteRequestError extends Error {
  readonly kind: RemoteErrorKind;
  /** HTTP status for `http` and `invalid_response` errors, otherwise null. */
  readonly status: number | null;
  /** Server-provided `detail` text, when the body had one. */
  readonly detail: string | null;

  constructor(
    kind: RemoteErrorKind,
    message: string,
    options: { status?: number | null; detail?: string | null; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'RemoteRequestError';
    this.kind = kind;
    this.status = options.status ?? null;
    this.detail = options.detail ?? null;
  }
}

/** Bearer credential and the identity it belongs to. */
export interface RemoteAuth {
  token: string;
  userId: number;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

/**
 * The remote endpoints the engine consumes. {@link createHttpSyncClient}
 * is the production implementation; tests substitute in-process fakes.
 */
export interface RemoteSyncClient {
  login(username: string, password: string, options?: RequestOptions): Promise<TokenResponse>;
  register(
    username: string,
    email: string,
    password: string,
    options?: RequestOptions
  ): Promise<TokenResponse>;
  fetchProfile(token: string, options?: RequestOptions): Promise<UserProfile>;
  uploadVectors(
    auth: RemoteAuth,
    vectors: VectorPayload[],
    options?: RequestOptions
  ): Promise<UploadResponse>;
  downloadVectors(auth: RemoteAuth, limit: number, options?: RequestOptions): Promise<RemoteVector[]>;
}

export interface HttpSyncClientOptions {
  baseUrl: string;
  timeoutMs: number;
  /** Override for the global `fetch` (tests, custom agents). */
  fetch?: typeof fetch;
}

// =============================================================================
// Factory
// =============================================================================

export function createHttpSyncClient(options: HttpSyncClientOptions): RemoteSyncClient {
  const baseUrl = options.baseUrl.replace(/\/+$/, '');
  const fetchImpl = options.fetch ?? globalThis.fetch;

  /**
   * Perform one JSON request and validate the response body.
   *
   * Combines the caller's signal with the request timeout; whichever fires
   * first aborts the request, and the error says which one it was.
   */
  async function request<T>(
    method: 'GET' | 'POST',
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    init: { token?: string; body?: unknown; signal?: AbortSignal }
  ): Promise<T> {
    if (init.signal?.aborted) {
      throw new RemoteRequestError('aborted', `${method} ${path} was cancelled`);
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, options.timeoutMs);
    const onCallerAbort = () => controller.abort();
    init.signal?.addEventListener('abort', onCallerAbort, { once: true });

    const headers: Record<string, string> = { Accept: 'application/json' };
    if (init.body !== undefined) headers['Content-Type'] = 'application/json';
    if (init.token) headers.Authorization = `Bearer ${init.token}`;

    try {
      let response: Response;
      let text: string;
      try {
        debugLog(`[HTTP] ${method} ${path}`);
        response = await fetchImpl(`${baseUrl}${path}`, {
          method,
          headers,
          body: init.body !== undefined ? JSON.stringify(init.body) : undefined,
          signal: controller.signal
        });
        text = await response.text();
      } catch (e) {
        if (timedOut) {
          throw new RemoteRequestError(
            'timeout',
            `${method} ${path} timed out after ${Math.round(options.timeoutMs / 1000)}s`,
            { cause: e }
          );
        }
        if (controller.signal.aborted) {
          throw new RemoteRequestError('aborted', `${method} ${path} was cancelled`, { cause: e });
        }
        throw new RemoteRequestError('network', `${method} ${path} failed: ${describe(e)}`, {
          cause: e
        });
      }
      return parseResponse(method, path, response, text, schema);
    } finally {
      clearTimeout(timer);
      init.signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  return {
    login(username, password, requestOptions) {
      return request('POST', '/auth/login', tokenResponseSchema, {
        body: { username, password },
        signal: requestOptions?.signal
      });
    },

    register(username, email, password, requestOptions) {
      return request('POST', '/auth/register', tokenResponseSchema, {
        body: { username, email, password },
        signal: requestOptions?.signal
      });
    },

    fetchProfile(token, requestOptions) {
      return request('GET', '/users/me', userProfileSchema, {
        token,
        signal: requestOptions?.signal
      });
    },

    uploadVectors(auth, vectors, requestOptions) {
      return request('POST', `/sync/${auth.userId}/vectors`, uploadResponseSchema, {
        token: auth.token,
        body: vectors,
        signal: requestOptions?.signal
      });
    },

    downloadVectors(auth, limit, requestOptions) {
      return request(
        'GET',
        `/sync/${auth.userId}/vectors?limit=${encodeURIComponent(String(limit))}`,
        downloadResponseSchema,
        { token: auth.token, signal: requestOptions?.signal }
      );
    }
  };
}

// =============================================================================
// Helpers
// =============================================================================

function parseResponse<T>(
  method: string,
  path: string,
  response: Response,
  text: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T {
  const body = parseJson(text);

  if (!response.ok) {
    const detail = extractDetail(body);
    debugWarn(`[HTTP] ${method} ${path} -> ${response.status}`, detail ?? '');
    throw new RemoteRequestError(
      'http',
      `${method} ${path} failed with status ${response.status}${detail ? `: ${detail}` : ''}`,
      { status: response.status, detail }
    );
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new RemoteRequestError(
      'invalid_response',
      `${method} ${path} returned an unexpected body: ${parsed.error.issues
        .map((i) => `${i.path.join('.') || '(root)'} ${i.message}`)
        .join('; ')}`,
      { status: response.status }
    );
  }
  return parsed.data;
}

function parseJson(text: string): unknown {
  if (text === '') return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/** Pull the `detail` field from a JSON error body. */
function extractDetail(body: unknown): string | null {
  if (typeof body === 'string' && body) return body;
  if (body && typeof body === 'object' && 'detail' in body) {
    const detail = body.detail;
    if (typeof detail === 'string') return detail;
    try {
      return JSON.stringify(detail);
    } catch {
      return null;
    }
  }
  return null;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
