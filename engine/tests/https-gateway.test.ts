/**
 * apkman Engine — HTTPS Download Gateway Tests
 *
 * The transfer function is replaced with one the test settles by hand.
 */

import { describe, it, expect, beforeEach } from "vitest";
import * as os from "os";
import * as path from "path";
import { ContentStore } from "../src/content-store";
import type {
  DownloadFileOptions,
  DownloadResult,
} from "../src/download/downloader";
import { HttpsDownloadGateway } from "../src/download/https-gateway";
import type { DownloadEvent } from "../src/types";
import { silentLogger } from "./helpers";

interface PendingTransfer {
  opts: DownloadFileOptions;
  resolve: (result: DownloadResult) => void;
  reject: (err: Error) => void;
}

const A = "https://x/a-1.apk";
const B = "https://x/b-1.apk";

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe("HttpsDownloadGateway", () => {
  let store: ContentStore;
  let transfers: PendingTransfer[];
  let gateway: HttpsDownloadGateway;
  let events: Array<[string, DownloadEvent]>;

  function record(identity: string): void {
    gateway.events.subscribe(identity, (event, key) => events.push([key, event]));
  }

  beforeEach(() => {
    store = new ContentStore(path.join(os.tmpdir(), "apkman-gateway-cache"), silentLogger);
    transfers = [];
    events = [];
    gateway = new HttpsDownloadGateway(store, silentLogger, {
      progressIntervalMs: 1000,
      transfer: (opts) =>
        new Promise<DownloadResult>((resolve, reject) => {
          transfers.push({ opts, resolve, reject });
          opts.signal?.addEventListener("abort", () => {
            const err = new Error("Download cancelled");
            err.name = "AbortError";
            reject(err);
          });
        }),
    });
    record(A);
    record(B);
  });

  it("starts a transfer into the content store path", () => {
    gateway.queue(A);

    expect(events).toEqual([[A, { type: "started" }]]);
    expect(transfers).toHaveLength(1);
    expect(transfers[0].opts.url).toBe(A);
    expect(transfers[0].opts.destPath).toBe(store.resolvePath(A));
    expect(gateway.isQueuedOrActive(A)).toBe(true);
  });

  it("ignores a second queue call for the same identity", () => {
    gateway.queue(A);
    gateway.queue(A);

    expect(transfers).toHaveLength(1);
    expect(events).toEqual([[A, { type: "started" }]]);
  });

  it("runs one transfer at a time by default, in FIFO order", async () => {
    gateway.queue(A);
    gateway.queue(B);
    expect(transfers).toHaveLength(1);
    expect(gateway.isQueuedOrActive(B)).toBe(true);

    transfers[0].resolve({ file_path: store.resolvePath(A), bytes_downloaded: 10, duration_ms: 5 });
    await flush();

    expect(events).toEqual([
      [A, { type: "started" }],
      [A, { type: "completed", localPath: store.resolvePath(A) }],
      [B, { type: "started" }],
    ]);
    expect(gateway.isQueuedOrActive(A)).toBe(false);
    expect(transfers.map((t) => t.opts.url)).toEqual([A, B]);
  });

  it("cancels a waiting download without starting it", () => {
    gateway.queue(A);
    gateway.queue(B);

    gateway.cancel(B);

    expect(events).toEqual([
      [A, { type: "started" }],
      [B, { type: "interrupted", reason: "cancelled" }],
    ]);
    expect(gateway.isQueuedOrActive(B)).toBe(false);
    expect(transfers).toHaveLength(1);
  });

  it("aborts an active download and reports it as cancelled", async () => {
    gateway.queue(A);

    gateway.cancel(A);
    await flush();

    expect(transfers[0].opts.signal?.aborted).toBe(true);
    expect(events).toEqual([
      [A, { type: "started" }],
      [A, { type: "interrupted", reason: "cancelled" }],
    ]);
    expect(gateway.isQueuedOrActive(A)).toBe(false);
  });

  it("reports a failed transfer with its error message", async () => {
    gateway.queue(A);

    transfers[0].reject(new Error("HTTP 404 downloading https://x/a-1.apk"));
    await flush();

    expect(events[1]).toEqual([
      A,
      { type: "interrupted", reason: "HTTP 404 downloading https://x/a-1.apk" },
    ]);
  });

  it("throttles progress but always reports the last chunk", () => {
    gateway.queue(A);
    const onProgress = transfers[0].opts.onProgress;

    onProgress?.({ bytes_downloaded: 10, bytes_total: 100 });
    onProgress?.({ bytes_downloaded: 20, bytes_total: 100 });
    onProgress?.({ bytes_downloaded: 100, bytes_total: 100 });

    expect(events.slice(1)).toEqual([
      [A, { type: "progress", bytesRead: 10, totalBytes: 100 }],
      [A, { type: "progress", bytesRead: 100, totalBytes: 100 }],
    ]);
  });

  it("runs transfers in parallel up to the concurrency limit", () => {
    const parallel = new HttpsDownloadGateway(store, silentLogger, {
      concurrency: 2,
      transfer: (opts) =>
        new Promise<DownloadResult>((resolve, reject) => {
          transfers.push({ opts, resolve, reject });
        }),
    });

    parallel.queue(A);
    parallel.queue(B);
    parallel.queue("https://x/c-1.apk");

    expect(transfers.map((t) => t.opts.url)).toEqual([A, B]);
  });
});
