/**
 * Helpers for moving response bodies between web streams and Node streams.
 */

import { ReadableStream } from "node:stream/web";
import { FetchError } from "../errors";
import { getErrorMessage } from "../../shared/error-utils";
import type { DownloadProgressCallback } from "./types";

/**
 * Iterate a web stream as Buffers, e.g. for `Readable.from()`.
 */
export async function* readChunks(stream: ReadableStream<Uint8Array>): AsyncGenerator<Buffer> {
  const reader = stream.getReader();
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        return;
      }
      yield Buffer.from(value.buffer, value.byteOffset, value.byteLength);
    }
  } finally {
    reader.releaseLock();
  }
}

/**
 * Wrap a response body so that every chunk is counted and reported, and so
 * that transport failures surface as FetchError NETWORK_ERROR no matter which
 * decoder ends up reading the stream.
 */
export function monitorBody(
  url: string,
  body: ReadableStream<Uint8Array>,
  totalBytes: number | null,
  onProgress?: DownloadProgressCallback
): ReadableStream<Uint8Array> {
  const reader = body.getReader();
  let bytesDownloaded = 0;

  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      const result = await reader.read().catch((error: unknown) => {
        throw new FetchError(
          `Download from ${url} interrupted: ${getErrorMessage(error)}`,
          "NETWORK_ERROR",
          error instanceof Error ? error : undefined
        );
      });
      if (result.done) {
        controller.close();
        return;
      }
      bytesDownloaded += result.value.byteLength;
      onProgress?.({ bytesDownloaded, totalBytes });
      controller.enqueue(result.value);
    },
    cancel(reason: unknown) {
      return reader.cancel(reason);
    },
  });
}

/**
 * Parse a Content-Length header value.
 */
export function parseContentLength(header: string | null): number | null {
  if (header === null) {
    return null;
  }
  const length = Number.parseInt(header, 10);
  return Number.isFinite(length) && length >= 0 ? length : null;
}
