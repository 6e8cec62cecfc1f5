/**
 * Syncthing Supervisor - Error Types
 */

/**
 * Raised when the service answers a REST call with a non-2xx status.
 */
export class ApiError extends Error {
  readonly status: number;
  readonly endpoint: string;

  constructor(endpoint: string, status: number, detail?: string) {
    super(`API error ${status} from ${endpoint}${detail ? `: ${detail}` : ''}`);
    this.name = 'ApiError';
    this.status = status;
    this.endpoint = endpoint;
  }

  /** 401/403: the API key was refused, retrying will not help */
  get isUnauthorized(): boolean {
    return this.status === 401 || this.status === 403;
  }
}

/**
 * Raised when the service did not answer within the connect timeout.
 */
export class ConnectTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(address: string, timeoutMs: number) {
    super(`Service at ${address} did not respond within ${Math.round(timeoutMs / 1000)}s`);
    this.name = 'ConnectTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Raised when a single REST request takes longer than its timeout.
 */
export class RequestTimeoutError extends Error {
  constructor(endpoint: string, timeoutMs: number) {
    super(`Request to ${endpoint} timed out after ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
  }
}

/**
 * Raised by commands that need a live API client while there is none.
 */
export class ServiceNotRunningError extends Error {
  constructor(operation: string) {
    super(`Cannot ${operation}: the service is not running`);
    this.name = 'ServiceNotRunningError';
  }
}

/**
 * Raised when the config file cannot be read or has invalid values.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * True for the rejection produced by an aborted AbortSignal or fetch.
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Render an unknown thrown value for a log line.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
