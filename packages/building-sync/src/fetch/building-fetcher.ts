/**
 * Building Fetcher
 *
 * The engine's only contact with the network. Implementations return the
 * raw JSON payload; interpreting it is the differencer's job.
 *
 * ERROR CONTRACT:
 * - TransportFailureError: no payload (network, timeout, non-success
 *   status, credential rejected)
 * - MalformedPayloadError: a response arrived but is not JSON
 */

import { MalformedPayloadError, TransportFailureError } from '../core/errors.js';
import type { FetchOptions, HTTPClientConfig } from '../core/http-client.js';
import {
  HTTPClient,
  HTTPError,
  HTTPJSONParseError,
  HTTPNetworkError,
  HTTPTimeoutError,
} from '../core/http-client.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'fetcher' });

export interface BuildingFetcher {
  /**
   * Fetch the current building payload
   *
   * @param signal - Aborted when the engine stops
   */
  fetch(signal?: AbortSignal): Promise<unknown>;
}

/**
 * Bearer credential source. The authentication subsystem lives outside
 * this package; it is told when the server rejects the credential.
 */
export interface TokenProvider {
  getToken(): string | Promise<string>;
  onCredentialExpired?(): void;
}

/**
 * Token provider for a fixed token (CLI, tests)
 */
export function staticTokenProvider(token: string): TokenProvider {
  return { getToken: () => token };
}

export interface HttpBuildingFetcherOptions {
  readonly endpointUrl: string;
  readonly tokenProvider: TokenProvider;
  readonly client?: HTTPClient;
  readonly http?: Partial<HTTPClientConfig>;
}

const NO_CACHE_HEADERS = {
  'Cache-Control': 'no-cache, no-store, must-revalidate',
  Pragma: 'no-cache',
  Accept: 'application/json',
} as const;

export class HttpBuildingFetcher implements BuildingFetcher {
  private readonly client: HTTPClient;
  private readonly endpointUrl: string;
  private readonly tokenProvider: TokenProvider;

  constructor(options: HttpBuildingFetcherOptions) {
    this.endpointUrl = options.endpointUrl;
    this.tokenProvider = options.tokenProvider;
    this.client = options.client ?? new HTTPClient(options.http);
  }

  async fetch(signal?: AbortSignal): Promise<unknown> {
    try {
      const token = await this.tokenProvider.getToken();
      const requestOptions: FetchOptions = {
        headers: {
          ...NO_CACHE_HEADERS,
          Authorization: `Bearer ${token}`,
        },
        ...(signal !== undefined ? { signal } : {}),
      };
      return await this.client.fetchJSON(this.endpointUrl, requestOptions);
    } catch (error) {
      throw this.classify(error);
    }
  }

  private classify(error: unknown): Error {
    if (error instanceof HTTPJSONParseError) {
      return new MalformedPayloadError(error.message, 'text', error);
    }

    if (error instanceof HTTPError) {
      const credentialExpired = error.statusCode === 401 || error.statusCode === 403;
      if (credentialExpired) {
        log.warn('Credential rejected', { status: error.statusCode, url: this.endpointUrl });
        this.tokenProvider.onCredentialExpired?.();
      }
      return new TransportFailureError(error.message, {
        status: error.statusCode,
        credentialExpired,
        cause: error,
      });
    }

    if (error instanceof HTTPTimeoutError || error instanceof HTTPNetworkError) {
      return new TransportFailureError(error.message, { credentialExpired: false, cause: error });
    }

    return new TransportFailureError(error instanceof Error ? error.message : String(error), {
      credentialExpired: false,
      cause: error,
    });
  }
}
