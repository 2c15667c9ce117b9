/**
 * Fetch-based HTTP transport implementation
 */

import type { HttpRequest, HttpResponse, HttpTransport } from './types.js';
import { TransportError } from '../errors/index.js';

/**
 * Fetch transport options
 */
export interface FetchTransportOptions {
  /** Request timeout in milliseconds */
  timeoutMs: number;
  /** Fetch implementation; defaults to the global `fetch` */
  fetch?: typeof fetch;
}

/**
 * Fetch-based HTTP transport implementation
 *
 * Buffers the whole response body as text. Resolves for every HTTP status;
 * status handling belongs to the caller.
 */
export class FetchTransport implements HttpTransport {
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: FetchTransportOptions) {
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });

      return {
        status: response.status,
        headers: this.convertHeaders(response.headers),
        body: await response.text(),
      };
    } catch (error) {
      throw this.handleError(error, request, controller.signal.aborted);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Converts Headers object to plain object
   */
  private convertHeaders(headers: Headers): Record<string, string> {
    const result: Record<string, string> = {};
    headers.forEach((value, key) => {
      result[key] = value;
    });
    return result;
  }

  private handleError(error: unknown, request: HttpRequest, timedOut: boolean): TransportError {
    if (timedOut) {
      return new TransportError(`Request timed out after ${this.timeoutMs}ms: ${request.method} ${request.url}`, {
        cause: error,
      });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new TransportError(`Network error: ${request.method} ${request.url}: ${message}`, { cause: error });
  }
}

/**
 * Creates a fetch-based HTTP transport
 */
export function createFetchTransport(timeoutMs: number): HttpTransport {
  return new FetchTransport({ timeoutMs });
}
