import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import type { Context } from '../ctx.js';
import { Logs, Severity } from '../log.js';
import { ProviderError } from './errors.js';
import { sleep, type SlidingWindowRateLimiter } from './rate-limiter.js';
import type { ProviderConfig, ProviderQuery, Sport } from './provider-types.js';

export interface HttpClientOptions {
  timeoutMs: number;
  /** wait before retrying a 429 */
  backoffMs: number;
  /** axios transport override, used by tests to answer in process */
  adapter?: AxiosAdapter;
}

/**
 * GET client shared by every provider. One axios instance per provider
 * carries the auth scheme; every attempt goes through the rate limiter.
 */
export class ProviderHttpClient extends Logs {
  private readonly clients = new Map<string, AxiosInstance>();

  constructor(
    ctx: Context,
    private readonly limiter: SlidingWindowRateLimiter,
    private readonly options: HttpClientOptions,
  ) {
    super(ctx);
  }

  async get(config: ProviderConfig, sport: Sport, query: ProviderQuery): Promise<unknown> {
    const baseURL = config.baseUrls[sport];
    if (!baseURL) {
      throw ProviderError.missingEndpoint(config.name, sport);
    }

    const client = this.clientFor(config);

    for (let attempt = 1; ; attempt++) {
      await this.limiter.acquire(config.name);

      try {
        return await this.send(client, config, baseURL, query);
      } catch (err) {
        if (!(err instanceof ProviderError) || !err.retryable || attempt > 1) {
          throw err;
        }

        this.log(Severity.WRN, `${err.message}, retrying`);
        if (err.code === 'RATE_LIMITED') {
          await sleep(this.options.backoffMs);
        }
      }
    }
  }

  private async send(
    client: AxiosInstance,
    config: ProviderConfig,
    baseURL: string,
    query: ProviderQuery,
  ): Promise<unknown> {
    const safeUrl = `${baseURL}${query.path}`;

    try {
      this.log(Severity.DBG, `GET ${safeUrl}`);
      const response = await client.get<unknown>(query.path, { baseURL, params: query.params });

      if (response.status === 429) {
        throw ProviderError.rateLimited(config.name, safeUrl);
      }
      if (response.status < 200 || response.status >= 300) {
        throw ProviderError.httpStatus(config.name, response.status, safeUrl);
      }

      return response.data;
    } catch (err) {
      if (err instanceof ProviderError) throw err;

      if (axios.isAxiosError(err)) {
        if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') {
          throw ProviderError.timeout(config.name, safeUrl);
        }
        // never log the request config, it carries the API key
        throw ProviderError.network(config.name, err.code ?? err.message);
      }
      throw err;
    }
  }

  private clientFor(config: ProviderConfig): AxiosInstance {
    const existing = this.clients.get(config.name);
    if (existing) return existing;

    const client = axios.create({
      timeout: this.options.timeoutMs,
      headers: {
        Accept: 'application/json',
      },
      // statuses are handled in send()
      validateStatus: () => true,
      ...(this.options.adapter ? { adapter: this.options.adapter } : {}),
    });

    // Add request interceptor to attach the provider's credentials
    client.interceptors.request.use((request) => {
      const auth = config.auth;
      const apiKey = config.apiKey ?? '';

      switch (auth.type) {
        case 'header':
          request.headers.set(auth.header, apiKey);
          break;
        case 'rapidapi':
          request.headers.set('x-rapidapi-key', apiKey);
          request.headers.set('x-rapidapi-host', auth.host);
          break;
        case 'query':
          request.params = { ...request.params, [auth.param]: apiKey };
          break;
        case 'none':
          break;
        default: {
          const _exhaustive: never = auth;
          throw new Error(`Unknown auth type: ${String(_exhaustive)}`);
        }
      }

      return request;
    });

    this.clients.set(config.name, client);
    return client;
  }
}
