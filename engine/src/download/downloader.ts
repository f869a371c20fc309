/**
 * apkman Engine — HTTPS File Downloader
 *
 * Streams one URL to one file with progress reporting.
 * HTTPS only — HTTP URLs are rejected.
 */

import * as fs from "fs";
import * as path from "path";
import * as https from "https";
import type { IncomingMessage } from "http";
import type { Logger } from "../utils/logger";

export interface DownloadProgress {
  bytes_downloaded: number;
  bytes_total: number;
}

export interface DownloadResult {
  file_path: string;
  bytes_downloaded: number;
  duration_ms: number;
}

export type ProgressCallback = (progress: DownloadProgress) => void;

export interface DownloadFileOptions {
  url: string;
  /** Absolute path the body is written to */
  destPath: string;
  onProgress?: ProgressCallback;
  /** Aborting rejects with an Error named "AbortError" */
  signal?: AbortSignal;
  /** Socket inactivity timeout */
  timeoutMs?: number;
  logger: Logger;
}

const MAX_REDIRECTS = 5;
const DEFAULT_TIMEOUT_MS = 60_000;

function abortError(url: string): Error {
  const err = new Error(`Download cancelled: ${url}`);
  err.name = "AbortError";
  return err;
}

/**
 * Download a file over HTTPS, following up to 5 redirects.
 * A partial file is removed on failure or abort.
 */
export async function downloadFile(
  opts: DownloadFileOptions,
  redirectsLeft: number = MAX_REDIRECTS,
): Promise<DownloadResult> {
  const { url, destPath, onProgress, signal, logger } = opts;
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  if (!url.startsWith("https://")) {
    throw new Error(`Download URL must be HTTPS. Got: ${url}`);
  }
  if (signal?.aborted) {
    throw abortError(url);
  }

  fs.mkdirSync(path.dirname(destPath), { recursive: true });
  logger.debug({ url, dest: destPath }, "Starting transfer");

  const startTime = Date.now();

  return new Promise<DownloadResult>((resolve, reject) => {
    let settled = false;
    let body: IncomingMessage | null = null;
    let fileStream: fs.WriteStream | null = null;

    const removePartial = (err: Error) => {
      fs.rm(destPath, { force: true }, () => reject(err));
    };

    const finish = (err: Error | null, result?: DownloadResult) => {
      if (settled) return;
      settled = true;
      signal?.removeEventListener("abort", onAbort);
      if (!err) {
        if (result) resolve(result);
        return;
      }
      // The file must be closed before it is removed, or a pending open
      // recreates it and the descriptor leaks
      const stream = fileStream;
      if (!stream) {
        removePartial(err);
        return;
      }
      body?.unpipe(stream);
      if (stream.closed) {
        removePartial(err);
      } else {
        stream.once("close", () => removePartial(err));
        stream.destroy();
      }
    };

    const request = https.get(url, (response) => {
      const status = response.statusCode ?? 0;

      if (status >= 300 && status < 400 && response.headers.location) {
        response.resume();
        settled = true;
        signal?.removeEventListener("abort", onAbort);
        if (redirectsLeft <= 0) {
          reject(new Error(`Too many redirects for ${url}`));
          return;
        }
        const redirectUrl = new URL(response.headers.location, url).toString();
        logger.debug({ redirect: redirectUrl }, "Following redirect");
        downloadFile({ ...opts, url: redirectUrl }, redirectsLeft - 1)
          .then(resolve)
          .catch(reject);
        return;
      }

      if (status !== 200) {
        response.resume();
        finish(new Error(`Download failed: HTTP ${status} for ${url}`));
        return;
      }

      const totalBytes = parseInt(
        response.headers["content-length"] || "0",
        10,
      );
      let downloadedBytes = 0;

      const out = fs.createWriteStream(destPath);
      body = response;
      fileStream = out;

      response.on("data", (chunk: Buffer) => {
        downloadedBytes += chunk.length;
        onProgress?.({
          bytes_downloaded: downloadedBytes,
          bytes_total: totalBytes,
        });
      });
      response.on("aborted", () =>
        finish(new Error(`Connection closed early: ${url}`)),
      );
      response.on("error", (err) =>
        finish(
          signal?.aborted
            ? abortError(url)
            : new Error(`Download interrupted: ${err.message}`),
        ),
      );

      response.pipe(out);

      out.on("finish", () => {
        out.close();
        finish(null, {
          file_path: destPath,
          bytes_downloaded: downloadedBytes,
          duration_ms: Date.now() - startTime,
        });
      });

      out.on("error", (err) =>
        finish(new Error(`Failed to write downloaded file: ${err.message}`)),
      );
    });

    function onAbort(): void {
      request.destroy();
      finish(abortError(url));
    }
    signal?.addEventListener("abort", onAbort);

    request.on("error", (err) => {
      finish(
        signal?.aborted
          ? abortError(url)
          : new Error(`Download request failed: ${err.message}`),
      );
    });

    request.setTimeout(timeoutMs, () => {
      request.destroy();
      finish(
        new Error(`Download timed out after ${timeoutMs / 1000} seconds: ${url}`),
      );
    });
  });
}
