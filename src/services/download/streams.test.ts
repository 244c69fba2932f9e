import { describe, it, expect, vi } from "vitest";
import { monitorBody, parseContentLength, readChunks } from "./streams";
import { failingStream, streamOf } from "./archive-fixtures.test-utils";
import { FetchError } from "../errors";

async function collect(stream: Parameters<typeof readChunks>[0]): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of readChunks(stream)) {
    chunks.push(chunk);
  }
  return Buffer.concat(chunks);
}

describe("monitorBody", () => {
  it("passes bytes through and reports cumulative progress", async () => {
    const bytes = Buffer.alloc(1500, 7);
    const onProgress = vi.fn();

    const result = await collect(
      monitorBody("https://example.test/a.bin", streamOf(bytes), 1500, onProgress)
    );

    expect(result.equals(bytes)).toBe(true);
    expect(onProgress.mock.calls).toEqual([
      [{ bytesDownloaded: 512, totalBytes: 1500 }],
      [{ bytesDownloaded: 1024, totalBytes: 1500 }],
      [{ bytesDownloaded: 1500, totalBytes: 1500 }],
    ]);
  });

  it("turns transport failures into NETWORK_ERROR", async () => {
    const body = monitorBody(
      "https://example.test/a.bin",
      failingStream(new Error("socket hang up")),
      null
    );

    const error = await collect(body).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({
      errorCode: "NETWORK_ERROR",
      message: "Download from https://example.test/a.bin interrupted: socket hang up",
    });
  });
});

describe("parseContentLength", () => {
  it("parses a byte count", () => {
    expect(parseContentLength("2048")).toBe(2048);
  });

  it("returns null for a missing or malformed header", () => {
    expect(parseContentLength(null)).toBeNull();
    expect(parseContentLength("unknown")).toBeNull();
  });
});
