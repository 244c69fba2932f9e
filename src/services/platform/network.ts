/**
 * Network layer interface and implementation.
 *
 * HttpClient is the only network surface the installer needs: plain GET
 * requests for release archives, with a timeout on the response headers.
 */

import type { Logger } from "../logging";
import { getErrorMessage } from "../../shared/error-utils";

/**
 * Options for HTTP requests.
 */
export interface HttpRequestOptions {
  /** Timeout in milliseconds until response headers arrive. Default: 30000 */
  readonly timeout?: number;
}

/**
 * HTTP client for making fetch requests with timeout support.
 */
export interface HttpClient {
  /**
   * HTTP GET request with timeout support.
   * Redirects are followed (release downloads redirect to a CDN).
   *
   * @param url - URL to fetch
   * @param options - Request options
   * @returns Response object; non-2xx statuses resolve, they do not throw
   * @throws DOMException with name "AbortError" on timeout
   * @throws TypeError on network error (connection refused, DNS failure)
   *
   * @example
   * const response = await httpClient.fetch(artifact.url, { timeout: 60000 });
   * if (!response.ok || !response.body) throw ...;
   */
  fetch(url: string, options?: HttpRequestOptions): Promise<Response>;
}

/**
 * Configuration for DefaultNetworkLayer.
 */
export interface NetworkLayerConfig {
  /** Default timeout for HTTP requests in ms. Default: 30000 */
  readonly defaultTimeout?: number;
}

/**
 * Default HttpClient over the global fetch.
 */
export class DefaultNetworkLayer implements HttpClient {
  private readonly defaultTimeout: number;

  constructor(
    private readonly logger: Logger,
    config: NetworkLayerConfig = {}
  ) {
    this.defaultTimeout = config.defaultTimeout ?? 30_000;
  }

  async fetch(url: string, options?: HttpRequestOptions): Promise<Response> {
    const timeout = options?.timeout ?? this.defaultTimeout;
    this.logger.debug("Fetch", { url, method: "GET" });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      const response = await fetch(url, { signal: controller.signal, redirect: "follow" });
      this.logger.debug("Fetch complete", { url, status: response.status });
      return response;
    } catch (error) {
      this.logger.warn("Fetch failed", { url, error: getErrorMessage(error) });
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
