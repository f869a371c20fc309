/**
 * apkman Engine — Expansion-File Coordinator
 *
 * Fetches the "main" and "patch" expansion files (OBB) that belong to an
 * artifact, verifies them, moves them into place, and prunes obsolete
 * files of the same role. There can be only one main and one patch file
 * per destination directory.
 *
 * Expansion files are best-effort: failures are logged and reported,
 * never propagated to the artifact install, and never retried here.
 */

import * as fs from "fs";
import * as path from "path";
import { ContentStore } from "./content-store";
import type { DownloadGateway } from "./download/gateway";
import { StatusRegistry } from "./status-registry";
import { EXPANSION_ROLES } from "./types";
import type {
  DownloadEvent,
  ExpansionFileDescriptor,
  ExpansionRole,
  Failure,
  Identity,
  InstallRequest,
  Subscription,
} from "./types";
import { KeyedSerialQueue } from "./utils/serial-queue";
import type { Logger } from "./utils/logger";

export interface ExpansionFileName {
  role: ExpansionRole;
  versionCode: number;
  packageName: string;
}

const EXPANSION_FILE_NAME = /^(main|patch)\.(\d+)\.(.+)\.obb$/;

/**
 * Parse `<role>.<versionCode>.<packageName>.obb`.
 */
export function parseExpansionFileName(
  fileName: string,
): ExpansionFileName | null {
  const match = EXPANSION_FILE_NAME.exec(fileName);
  if (!match) return null;
  const role: ExpansionRole = match[1] === "main" ? "main" : "patch";
  return {
    role,
    versionCode: parseInt(match[2], 10),
    packageName: match[3],
  };
}

export type FailureReporter = (failure: Failure) => void;

export class ExpansionFileCoordinator {
  private gateway: DownloadGateway;
  private store: ContentStore;
  private registry: StatusRegistry;
  private logger: Logger;
  private onFailure: FailureReporter;
  private subscriptions = new Map<string, Subscription>();
  /** `<directory>\0<role>` → every path known to hold a file of that role */
  private placed = new Map<string, Set<string>>();
  private work: KeyedSerialQueue;

  constructor(
    gateway: DownloadGateway,
    store: ContentStore,
    registry: StatusRegistry,
    logger: Logger,
    onFailure: FailureReporter = () => undefined,
  ) {
    this.gateway = gateway;
    this.store = store;
    this.registry = registry;
    this.logger = logger;
    this.onFailure = onFailure;
    this.work = new KeyedSerialQueue((url, err) => {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error({ url, error: message }, "Expansion file handling failed");
      this.onFailure({ category: "VALIDATION_FAILURE", message, identity: url });
    });
  }

  /**
   * Queue every expansion file of `request` that is not already in place.
   * Returns the URLs that were queued.
   */
  fetch(request: InstallRequest): string[] {
    const queued: string[] = [];
    for (const role of EXPANSION_ROLES) {
      const descriptor = request.expansionFiles?.[role];
      if (!descriptor) continue;

      if (this.store.exists(descriptor.destination)) {
        this.logger.debug(
          { role, destination: descriptor.destination },
          "Expansion file already in place",
        );
        continue;
      }

      this.subscriptions.get(descriptor.url)?.dispose();
      this.subscriptions.set(
        descriptor.url,
        this.gateway.events.subscribe(descriptor.url, (event) =>
          this.onDownloadEvent(request.url, role, descriptor, event),
        ),
      );
      this.gateway.queue(descriptor.url);
      queued.push(descriptor.url);
      this.logger.info(
        { identity: request.url, role, url: descriptor.url },
        "Expansion file queued",
      );
    }
    return queued;
  }

  /**
   * Cancel the expansion downloads of `request` and drop their listeners.
   */
  cancel(request: InstallRequest): void {
    for (const role of EXPANSION_ROLES) {
      const descriptor = request.expansionFiles?.[role];
      if (!descriptor) continue;
      this.release(descriptor.url);
      this.gateway.cancel(descriptor.url);
    }
  }

  isListening(url: string): boolean {
    return this.subscriptions.has(url);
  }

  /** Resolves when no verification or placement is in progress. */
  idle(): Promise<void> {
    return this.work.drain();
  }

  dispose(): void {
    for (const subscription of this.subscriptions.values()) {
      subscription.dispose();
    }
    this.subscriptions.clear();
  }

  private release(url: string): void {
    this.subscriptions.get(url)?.dispose();
    this.subscriptions.delete(url);
  }

  private onDownloadEvent(
    parent: Identity,
    role: ExpansionRole,
    descriptor: ExpansionFileDescriptor,
    event: DownloadEvent,
  ): void {
    switch (event.type) {
      case "started":
        this.logger.debug({ parent, role }, "Expansion download started");
        break;
      case "progress":
        this.registry.updateProgress(parent, event.totalBytes, event.bytesRead);
        break;
      case "completed":
        this.release(descriptor.url);
        void this.work.run(descriptor.url, () =>
          this.place(role, descriptor, event.localPath),
        );
        break;
      case "interrupted":
        this.release(descriptor.url);
        this.logger.warn(
          { parent, role, reason: event.reason },
          "Expansion download interrupted",
        );
        this.onFailure({
          category: "TRANSIENT_DOWNLOAD_FAILURE",
          message: `${role} expansion file download interrupted`,
          identity: descriptor.url,
        });
        break;
    }
  }

  private async place(
    role: ExpansionRole,
    descriptor: ExpansionFileDescriptor,
    localPath: string,
  ): Promise<void> {
    try {
      if (!(await this.store.matchesHash(localPath, descriptor.sha256))) {
        this.logger.warn(
          { role, path: localPath, expected: descriptor.sha256 },
          "Expansion file did not match hash, discarded",
        );
        this.onFailure({
          category: "VALIDATION_FAILURE",
          message: `${role} expansion file did not match hash`,
          identity: descriptor.url,
        });
        return;
      }

      this.logger.info(
        { role, from: localPath, to: descriptor.destination },
        "Installing expansion file",
      );
      this.store.moveInto(localPath, descriptor.destination);
      this.prune(role, descriptor.destination);
    } finally {
      this.store.remove(localPath);
    }
  }

  /**
   * Delete every other file of `role` in the destination's directory.
   */
  private prune(role: ExpansionRole, destination: string): void {
    const dir = path.dirname(destination);
    const key = `${dir}\0${role}`;
    const known = this.placed.get(key) ?? this.scan(dir, role);

    for (const filePath of known) {
      if (filePath === destination) continue;
      this.logger.info({ role, path: filePath }, "Deleting obsolete expansion file");
      this.store.remove(filePath);
    }
    this.placed.set(key, new Set([destination]));
  }

  /**
   * First visit of a directory: find files left by earlier processes.
   */
  private scan(dir: string, role: ExpansionRole): Set<string> {
    const found = new Set<string>();
    let names: string[] = [];
    try {
      names = fs.readdirSync(dir);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn({ dir, error: message }, "Cannot list expansion directory");
    }
    for (const name of names) {
      if (parseExpansionFileName(name)?.role === role) {
        found.add(path.join(dir, name));
      }
    }
    return found;
  }
}
