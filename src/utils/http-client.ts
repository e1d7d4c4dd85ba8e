import { RegistryError, describeError } from './errors.js';
import { logger } from './logger.js';

/** Release the connection behind a response whose body is not needed */
async function discardBody(response: Response): Promise<void> {
  try {
    await response.body?.cancel();
  } catch (error) {
    logger.debug(`Could not discard response body: ${describeError(error)}`);
  }
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  baseUrl: string;
  timeoutMs: number;
  userAgent: string;
  /** Substituted by tests; defaults to the global fetch */
  fetchImpl?: FetchLike;
}

export interface RequestOptions {
  timeoutMs?: number;
}

/**
 * Thin fetch wrapper for the registry API.
 *
 * Every request carries a timeout; failures are normalized to RegistryError.
 */
export class HttpClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: HttpClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.userAgent = options.userAgent;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  buildUrl(endpoint: string, params?: Record<string, string>): string {
    const url = new URL(`${this.baseUrl}/${endpoint.replace(/^\/+/, '')}`);
    for (const [key, value] of Object.entries(params ?? {})) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }

  /**
   * GET a JSON document relative to the base URL.
   */
  async getJson(endpoint: string, params?: Record<string, string>, options: RequestOptions = {}): Promise<unknown> {
    const url = this.buildUrl(endpoint, params);
    logger.debug(`GET ${url}`);

    return this.withTimeout(url, options, async (signal) => {
      const response = await this.send(url, signal);
      try {
        return await response.json();
      } catch (error) {
        throw new RegistryError(`Invalid JSON from registry: ${endpoint}`, 'invalid-response', { endpoint, cause: error });
      }
    });
  }

  /**
   * GET an absolute URL and hand the streaming response to `consume`.
   * The timeout covers the whole transfer, not only the headers.
   */
  async stream<T>(url: string, consume: (response: Response) => Promise<T>, options: RequestOptions = {}): Promise<T> {
    logger.debug(`GET (stream) ${url}`);
    return this.withTimeout(url, options, async (signal) => consume(await this.send(url, signal)));
  }

  private async send(url: string, signal: AbortSignal): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'application/json'
        },
        signal
      });
    } catch (error) {
      if (signal.aborted) {
        throw error;
      }
      throw new RegistryError(`Network error requesting ${url}: ${describeError(error)}`, 'network', { endpoint: url, cause: error });
    }

    if (response.ok) {
      return response;
    }

    const status = response.status;
    if (status === 404 || status === 429) {
      await discardBody(response);
      throw status === 404
        ? new RegistryError(`Not found: ${url}`, 'not-found', { endpoint: url, status })
        : new RegistryError('Registry rate limit exceeded', 'rate-limited', { endpoint: url, status });
    }
    const body = await response.text().catch(() => '');
    throw new RegistryError(`Registry error (${status}): ${body.slice(0, 200)}`, 'http', { endpoint: url, status });
  }

  private async withTimeout<T>(url: string, options: RequestOptions, run: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      return await run(controller.signal);
    } catch (error) {
      if (controller.signal.aborted && !(error instanceof RegistryError)) {
        throw new RegistryError(
          `Request timed out after ${Math.round(timeoutMs / 1000)} seconds: ${url}`,
          'timeout',
          { endpoint: url, cause: error }
        );
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
