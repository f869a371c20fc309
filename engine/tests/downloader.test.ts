/**
 * apkman Engine — HTTPS File Downloader Tests
 *
 * https.get is replaced so the response body is written by the test.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { EventEmitter } from "events";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { PassThrough } from "stream";
import { downloadFile } from "../src/download/downloader";
import { silentLogger } from "./helpers";

class FakeResponse extends PassThrough {
  statusCode = 200;
  headers: Record<string, string> = { "content-length": "8" };
}

class FakeRequest extends EventEmitter {
  destroyed = false;

  destroy(): this {
    this.destroyed = true;
    return this;
  }

  setTimeout(): this {
    return this;
  }
}

const transfer = vi.hoisted(() => {
  const state: { respond: (response: unknown) => void; request: unknown } = {
    respond: () => undefined,
    request: null,
  };
  return state;
});

vi.mock("https", () => {
  const get = (_url: string, callback: (response: unknown) => void) => {
    const request = new FakeRequest();
    transfer.request = request;
    transfer.respond = callback;
    return request;
  };
  return { get, default: { get } };
});

const APK_URL = "https://x/app-1.apk";

describe("downloadFile", () => {
  let tmp: string;
  let destPath: string;
  let response: FakeResponse;

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), "apkman-downloader-"));
    destPath = path.join(tmp, "x", "app-1.apk");
    response = new FakeResponse();
  });

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  /** Start a transfer and wait until part of the body is on disk. */
  async function started(signal?: AbortSignal): Promise<{ download: Promise<unknown> }> {
    const download = downloadFile({ url: APK_URL, destPath, signal, logger: silentLogger });
    transfer.respond(response);
    response.write("half");
    await vi.waitFor(() => expect(fs.readFileSync(destPath, "utf-8")).toBe("half"));
    return { download };
  }

  it("writes the body and reports progress", async () => {
    const progress: number[] = [];
    const download = downloadFile({
      url: APK_URL,
      destPath,
      onProgress: (p) => progress.push(p.bytes_downloaded),
      logger: silentLogger,
    });
    transfer.respond(response);
    response.write("abcd");
    response.end("efgh");

    const result = await download;
    expect(result.file_path).toBe(destPath);
    expect(result.bytes_downloaded).toBe(8);
    expect(progress[progress.length - 1]).toBe(8);
    expect(fs.readFileSync(destPath, "utf-8")).toBe("abcdefgh");
  });

  it("rejects plain HTTP before connecting", async () => {
    await expect(
      downloadFile({ url: "http://x/app-1.apk", destPath, logger: silentLogger }),
    ).rejects.toThrow("Download URL must be HTTPS. Got: http://x/app-1.apk");
  });

  it("closes and removes the partial file when aborted mid-transfer", async () => {
    const controller = new AbortController();
    const { download } = await started(controller.signal);

    controller.abort();

    await expect(download).rejects.toThrow(`Download cancelled: ${APK_URL}`);
    expect(transfer.request).toMatchObject({ destroyed: true });
    expect(fs.existsSync(destPath)).toBe(false);

    response.write("late bytes");
    await new Promise((resolve) => setImmediate(resolve));
    expect(fs.existsSync(destPath)).toBe(false);
  });

  it("removes the partial file when the connection closes early", async () => {
    const { download } = await started();

    response.emit("aborted");

    await expect(download).rejects.toThrow(`Connection closed early: ${APK_URL}`);
    expect(fs.existsSync(destPath)).toBe(false);
  });

  it("reports the HTTP status and leaves no file", async () => {
    response.statusCode = 404;
    const download = downloadFile({ url: APK_URL, destPath, logger: silentLogger });
    transfer.respond(response);

    await expect(download).rejects.toThrow(`Download failed: HTTP 404 for ${APK_URL}`);
    expect(fs.existsSync(destPath)).toBe(false);
  });
});
