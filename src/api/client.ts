/**
 * Service REST API Client
 *
 * Typed calls against the service's REST API, authenticated with the
 * X-API-Key header.
 */

import { ApiError, RequestTimeoutError } from '../errors.js';
import { logger } from '../logger.js';
import type { ServiceVersion } from '../supervisor/models.js';
import type {
  ApiClient,
  Connections,
  FetchEventsOptions,
  Ignores,
  ServiceConfig,
  ServiceEvent,
  SystemInfo,
} from '../supervisor/types.js';
import {
  parseConfig,
  parseConnections,
  parseEvents,
  parseIgnores,
  parseSystemInfo,
  parseVersion,
} from './parse.js';

// ============================================================================
// Constants
// ============================================================================

/** Timeout for ordinary requests; event long-polls add their own timeout */
const REQUEST_TIMEOUT_MS = 30_000;

/** Extra time on top of the long-poll timeout before giving up on a poll */
const LONG_POLL_GRACE_MS = 10_000;

type Method = 'GET' | 'POST';

type Query = Record<string, string | number | undefined>;

interface RequestOptions {
  query?: Query;
  signal?: AbortSignal;
  timeoutMs?: number;
}

// ============================================================================
// Client
// ============================================================================

export class RestApiClient implements ApiClient {
  private readonly baseUrl: URL;
  private readonly apiKey: string;

  constructor(baseUrl: URL, apiKey: string) {
    this.baseUrl = baseUrl;
    this.apiKey = apiKey;
  }

  /**
   * Build the request URL for an endpoint, dropping undefined query values.
   */
  buildUrl(endpoint: string, query: Query = {}): URL {
    const url = new URL(endpoint, this.baseUrl);
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    return url;
  }

  /**
   * Cheap liveness check. `timeoutMs` caps the wait for an answer.
   */
  async ping(signal?: AbortSignal, timeoutMs?: number): Promise<void> {
    await this.request('GET', '/rest/system/ping', { signal, timeoutMs });
  }

  async fetchConfig(signal?: AbortSignal): Promise<ServiceConfig> {
    return parseConfig(await this.request('GET', '/rest/config', { signal }));
  }

  async fetchSystemInfo(signal?: AbortSignal): Promise<SystemInfo> {
    return parseSystemInfo(await this.request('GET', '/rest/system/status', { signal }));
  }

  async fetchVersion(signal?: AbortSignal): Promise<ServiceVersion> {
    return parseVersion(await this.request('GET', '/rest/system/version', { signal }));
  }

  async fetchConnections(signal?: AbortSignal): Promise<Connections> {
    return parseConnections(await this.request('GET', '/rest/system/connections', { signal }));
  }

  async fetchIgnores(folderId: string, signal?: AbortSignal): Promise<Ignores> {
    return parseIgnores(
      await this.request('GET', '/rest/db/ignores', { query: { folder: folderId }, signal })
    );
  }

  async fetchEvents(options: FetchEventsOptions): Promise<ServiceEvent[]> {
    const { since, limit, timeoutSec, signal } = options;
    const body = await this.request('GET', '/rest/events', {
      query: { since, limit, timeout: timeoutSec },
      signal,
      timeoutMs:
        timeoutSec !== undefined ? timeoutSec * 1000 + LONG_POLL_GRACE_MS : REQUEST_TIMEOUT_MS,
    });
    return parseEvents(body);
  }

  async scan(folderId: string, subPath?: string, signal?: AbortSignal): Promise<void> {
    await this.request('POST', '/rest/db/scan', {
      query: { folder: folderId, sub: subPath },
      signal,
    });
  }

  async pauseDevice(deviceId: string, signal?: AbortSignal): Promise<void> {
    await this.request('POST', '/rest/system/pause', { query: { device: deviceId }, signal });
  }

  async resumeDevice(deviceId: string, signal?: AbortSignal): Promise<void> {
    await this.request('POST', '/rest/system/resume', { query: { device: deviceId }, signal });
  }

  async restart(signal?: AbortSignal): Promise<void> {
    await this.request('POST', '/rest/system/restart', { signal });
  }

  async shutdown(signal?: AbortSignal): Promise<void> {
    await this.request('POST', '/rest/system/shutdown', { signal });
  }

  // ==========================================================================
  // Transport
  // ==========================================================================

  /**
   * Make an API request and return the decoded JSON body (null when empty).
   */
  private async request(
    method: Method,
    endpoint: string,
    options: RequestOptions = {}
  ): Promise<unknown> {
    const url = this.buildUrl(endpoint, options.query);
    const controller = new AbortController();
    const timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    const timeout = setTimeout(
      () => controller.abort(new RequestTimeoutError(endpoint, timeoutMs)),
      timeoutMs
    );
    const forwardAbort = (): void => controller.abort(options.signal?.reason);
    options.signal?.addEventListener('abort', forwardAbort, { once: true });
    if (options.signal?.aborted) forwardAbort();

    logger.debug(`${method} ${url.pathname}${url.search}`);

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers: { 'X-API-Key': this.apiKey, Accept: 'application/json' },
        signal: controller.signal,
      });
    } finally {
      clearTimeout(timeout);
      options.signal?.removeEventListener('abort', forwardAbort);
    }

    const text = await response.text();
    if (!response.ok) {
      throw new ApiError(endpoint, response.status, text.trim() || undefined);
    }
    if (!text.trim()) return null;

    try {
      return JSON.parse(text);
    } catch {
      throw new ApiError(endpoint, response.status, 'response was not valid JSON');
    }
  }
}
