import type { ProviderName } from './provider-types.js';

export type ProviderErrorCode =
  | 'UNSUPPORTED_SPORT'
  | 'PROVIDER_UNAVAILABLE'
  | 'MISSING_ENDPOINT'
  | 'HTTP_STATUS'
  | 'RATE_LIMITED'
  | 'TIMEOUT'
  | 'NETWORK';

/**
 * Error raised anywhere between the registry and the HTTP response.
 *
 * @example
 * throw ProviderError.unsupportedSport('curling');
 * throw ProviderError.httpStatus('api-sports', 503);
 */
export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly code: ProviderErrorCode,
    public readonly provider?: ProviderName,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'ProviderError';
  }

  static unsupportedSport(sport: string): ProviderError {
    return new ProviderError(`Unsupported sport: ${sport}`, 'UNSUPPORTED_SPORT');
  }

  static unavailable(provider: ProviderName, reason: string): ProviderError {
    return new ProviderError(`Provider ${provider} unavailable: ${reason}`, 'PROVIDER_UNAVAILABLE', provider);
  }

  static missingEndpoint(provider: ProviderName, sport: string): ProviderError {
    return new ProviderError(`No endpoints configured for ${sport} on ${provider}`, 'MISSING_ENDPOINT', provider);
  }

  static httpStatus(provider: ProviderName, status: number, url = 'unknown'): ProviderError {
    return new ProviderError(`${provider} responded ${status} for ${url}`, 'HTTP_STATUS', provider, status);
  }

  static rateLimited(provider: ProviderName, url = 'unknown'): ProviderError {
    return new ProviderError(`${provider} rate limited (429) for ${url}`, 'RATE_LIMITED', provider, 429);
  }

  static timeout(provider: ProviderName, url = 'unknown'): ProviderError {
    return new ProviderError(`${provider} timed out for ${url}`, 'TIMEOUT', provider);
  }

  static network(provider: ProviderName, cause: string): ProviderError {
    return new ProviderError(`${provider} request failed: ${cause}`, 'NETWORK', provider);
  }

  /** Transient failures the HTTP client retries once. */
  get retryable(): boolean {
    return this.code === 'RATE_LIMITED' || this.code === 'TIMEOUT';
  }
}
