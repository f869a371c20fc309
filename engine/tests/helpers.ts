/**
 * apkman Engine — In-process test doubles
 *
 * A download gateway and an installer that record calls and let tests
 * publish lifecycle events by hand.
 */

import * as crypto from "crypto";
import { KeyedEventBus } from "../src/events";
import type { DownloadGateway } from "../src/download/gateway";
import { BaseInstaller } from "../src/installer/base-installer";
import type { DownloadEvent, Identity, InstallRequest } from "../src/types";
import { createLogger } from "../src/utils/logger";

export const silentLogger = createLogger({ level: "silent" });

export function sha256(content: string): string {
  return crypto.createHash("sha256").update(content).digest("hex");
}

export class FakeDownloadGateway implements DownloadGateway {
  readonly events = new KeyedEventBus<DownloadEvent>(silentLogger);
  readonly queued: Identity[] = [];
  readonly cancelled: Identity[] = [];
  readonly active = new Set<Identity>();

  queue(identity: Identity): void {
    if (this.active.has(identity)) return;
    this.queued.push(identity);
    this.active.add(identity);
  }

  cancel(identity: Identity): void {
    this.cancelled.push(identity);
    if (this.active.delete(identity)) {
      this.events.publish(identity, { type: "interrupted", reason: "cancelled" });
    }
  }

  isQueuedOrActive(identity: Identity): boolean {
    return this.active.has(identity);
  }

  /** Publish as the transfer engine would; terminal events end the transfer. */
  emit(identity: Identity, event: DownloadEvent): void {
    if (event.type === "completed" || event.type === "interrupted") {
      this.active.delete(identity);
    }
    this.events.publish(identity, event);
  }
}

export interface InstallCall {
  localPath: string;
  identity: Identity;
  request: InstallRequest;
}

export class FakeInstaller extends BaseInstaller {
  readonly calls: InstallCall[] = [];
  failWith: Error | null = null;

  constructor() {
    super(silentLogger);
  }

  install(localPath: string, identity: Identity, request: InstallRequest): void {
    if (this.failWith) throw this.failWith;
    this.calls.push({ localPath, identity, request });
  }
}
