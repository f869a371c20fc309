/**
 * apkman Engine — Package Registry Boundary
 *
 * Two collaborators on the OS package side:
 *
 * - PackageSignals: "package X was added or updated", from outside the
 *   orchestrator's own flow (the user opened the downloaded file by hand).
 *   The orchestrator merges this channel into its per-identity queue.
 * - PackageLedger: records which identity installed a package once an
 *   install completes ("who installed this" bookkeeping).
 */

import type { Identity, Subscription } from "./types";
import type { Logger } from "./utils/logger";

export type PackageAddedListener = (packageName: string) => void;

export interface PackageLedger {
  setInstaller(packageName: string, identity: Identity): void;
}

export class PackageSignals {
  private listeners = new Set<PackageAddedListener>();
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  subscribe(listener: PackageAddedListener): Subscription {
    this.listeners.add(listener);
    return {
      dispose: () => {
        this.listeners.delete(listener);
      },
    };
  }

  publish(packageName: string): void {
    this.logger.info({ packageName }, "Package added signal");
    for (const listener of [...this.listeners]) {
      try {
        listener(packageName);
      } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.error(
          { packageName, error: message },
          "Package signal listener failed",
        );
      }
    }
  }
}

/**
 * Ledger kept in memory; hosts with storage provide their own.
 */
export class InMemoryPackageLedger implements PackageLedger {
  private owners = new Map<string, Identity>();

  setInstaller(packageName: string, identity: Identity): void {
    this.owners.set(packageName, identity);
  }

  getInstaller(packageName: string): Identity | null {
    return this.owners.get(packageName) ?? null;
  }
}
