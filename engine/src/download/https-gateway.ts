/**
 * apkman Engine — HTTPS Download Gateway
 *
 * A concrete transfer engine for hosts that have none (the CLI).
 * Keeps a FIFO of identities, runs up to `concurrency` transfers at once,
 * writes each file to the Content Store path for its identity, and
 * reports lifecycle events on the shared bus.
 */

import { ContentStore } from "../content-store";
import { KeyedEventBus } from "../events";
import type { DownloadEvent, Identity } from "../types";
import type { Logger } from "../utils/logger";
import { downloadFile } from "./downloader";
import type { DownloadFileOptions, DownloadResult } from "./downloader";
import type { DownloadGateway } from "./gateway";

export type TransferFunction = (
  opts: DownloadFileOptions,
) => Promise<DownloadResult>;

export interface HttpsGatewayOptions {
  /** Parallel transfers (default 1) */
  concurrency?: number;
  /** Minimum delay between two progress events for one identity */
  progressIntervalMs?: number;
  timeoutMs?: number;
  /** Replaces the HTTPS transfer (used by tests) */
  transfer?: TransferFunction;
}

export class HttpsDownloadGateway implements DownloadGateway {
  readonly events: KeyedEventBus<DownloadEvent>;
  private store: ContentStore;
  private logger: Logger;
  private concurrency: number;
  private progressIntervalMs: number;
  private timeoutMs?: number;
  private transfer: TransferFunction;
  private waiting: Identity[] = [];
  private active = new Map<Identity, AbortController>();

  constructor(
    store: ContentStore,
    logger: Logger,
    options: HttpsGatewayOptions = {},
  ) {
    this.store = store;
    this.logger = logger;
    this.events = new KeyedEventBus<DownloadEvent>(logger);
    this.concurrency = Math.max(1, options.concurrency ?? 1);
    this.progressIntervalMs = options.progressIntervalMs ?? 250;
    this.timeoutMs = options.timeoutMs;
    this.transfer = options.transfer ?? downloadFile;
  }

  queue(identity: Identity): void {
    if (this.isQueuedOrActive(identity)) {
      this.logger.debug({ identity }, "Already queued or active");
      return;
    }
    this.waiting.push(identity);
    this.logger.info(
      { identity, position: this.waiting.length },
      "Download queued",
    );
    this.pump();
  }

  cancel(identity: Identity): void {
    const index = this.waiting.indexOf(identity);
    if (index !== -1) {
      this.waiting.splice(index, 1);
      this.logger.info({ identity }, "Queued download cancelled");
      this.events.publish(identity, { type: "interrupted", reason: "cancelled" });
      return;
    }

    const controller = this.active.get(identity);
    if (controller) {
      this.logger.info({ identity }, "Active download cancelled");
      controller.abort();
    }
  }

  isQueuedOrActive(identity: Identity): boolean {
    return this.active.has(identity) || this.waiting.includes(identity);
  }

  private pump(): void {
    while (this.active.size < this.concurrency && this.waiting.length > 0) {
      const identity = this.waiting.shift();
      if (identity === undefined) break;
      const controller = new AbortController();
      this.active.set(identity, controller);
      this.events.publish(identity, { type: "started" });
      this.run(identity, controller).catch((err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.error({ identity, error: message }, "Transfer loop failed");
      });
    }
  }

  private async run(
    identity: Identity,
    controller: AbortController,
  ): Promise<void> {
    const destPath = this.store.resolvePath(identity);
    let lastProgressAt = 0;

    try {
      const result = await this.transfer({
        url: identity,
        destPath,
        signal: controller.signal,
        timeoutMs: this.timeoutMs,
        logger: this.logger,
        onProgress: (progress) => {
          const now = Date.now();
          const done = progress.bytes_downloaded === progress.bytes_total;
          if (!done && now - lastProgressAt < this.progressIntervalMs) return;
          lastProgressAt = now;
          this.events.publish(identity, {
            type: "progress",
            bytesRead: progress.bytes_downloaded,
            totalBytes: progress.bytes_total,
          });
        },
      });

      this.active.delete(identity);
      this.logger.info(
        {
          identity,
          path: result.file_path,
          bytes: result.bytes_downloaded,
          duration_ms: result.duration_ms,
        },
        "Download complete",
      );
      this.events.publish(identity, {
        type: "completed",
        localPath: result.file_path,
      });
    } catch (err: unknown) {
      this.active.delete(identity);
      const reason = controller.signal.aborted
        ? "cancelled"
        : err instanceof Error
          ? err.message
          : String(err);
      this.logger.warn({ identity, reason }, "Download interrupted");
      this.events.publish(identity, { type: "interrupted", reason });
    } finally {
      this.pump();
    }
  }
}
