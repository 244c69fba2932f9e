/**
 * Test utilities for HttpClient mocking.
 */

import { vi, type Mock } from "vitest";
import type { HttpClient, HttpRequestOptions } from "./network";

/**
 * A canned response for one URL.
 */
export interface MockRoute {
  readonly status?: number;
  readonly body?: Uint8Array | string;
  /** Reject the request with this error instead of responding */
  readonly error?: Error;
  /** Send a Content-Length header (default: true when a body is given) */
  readonly contentLength?: boolean;
}

export interface MockHttpClient extends HttpClient {
  fetch: Mock<(url: string, options?: HttpRequestOptions) => Promise<Response>>;
}

/**
 * Build a Response whose body is streamed in small chunks, like a real download.
 */
export function createStreamingResponse(route: MockRoute): Response {
  const status = route.status ?? 200;
  const bytes = typeof route.body === "string" ? new TextEncoder().encode(route.body) : route.body;
  if (bytes === undefined) {
    return new Response(null, { status });
  }

  const chunkSize = 1024;
  let offset = 0;
  const stream = new ReadableStream<Uint8Array>({
    pull(controller) {
      if (offset >= bytes.length) {
        controller.close();
        return;
      }
      controller.enqueue(bytes.slice(offset, offset + chunkSize));
      offset += chunkSize;
    },
  });

  const headers =
    route.contentLength === false ? undefined : { "content-length": String(bytes.length) };
  return new Response(stream, { status, headers });
}

/**
 * Create an HttpClient that answers from a URL → route table.
 * Unknown URLs answer 404. Every call returns a fresh Response.
 *
 * @example
 * const http = createMockHttpClient({ "https://example.test/a.zip": { body: zipBytes } });
 * ...
 * expect(http.fetch).toHaveBeenCalledTimes(1);
 */
export function createMockHttpClient(routes: Record<string, MockRoute> = {}): MockHttpClient {
  return {
    fetch: vi.fn(async (url: string) => {
      const route = routes[url];
      if (route === undefined) {
        return new Response("Not Found", { status: 404 });
      }
      if (route.error) {
        throw route.error;
      }
      return createStreamingResponse(route);
    }),
  };
}
