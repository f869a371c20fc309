/**
 * apkman Engine — Status Registry
 *
 * Process-wide table of identity → StatusRecord. Constructed once by the
 * host and passed to the orchestrator and to observers (notification
 * layer, CLI spinner, persistence).
 *
 * Records are immutable snapshots: every mutation replaces the record and
 * notifies listeners, so an observer can never hold a live copy.
 * Mutations are synchronous, which linearizes them on Node's single
 * thread; multi-step work per identity is serialized by the orchestrator.
 */

import type {
  Identity,
  InstallRequest,
  InstallStatus,
  PendingAction,
  Progress,
  StatusChange,
  StatusRecord,
  Subscription,
} from "./types";
import type { Logger } from "./utils/logger";

export type StatusListener = (change: StatusChange) => void;

const NO_PROGRESS: Progress = Object.freeze({ bytesRead: 0, totalBytes: 0 });

/**
 * Fraction of the download done, in [0, 1]. 0 when the total is unknown.
 */
export function progressFraction(record: StatusRecord): number {
  const { bytesRead, totalBytes } = record.progress;
  if (totalBytes <= 0) return 0;
  return Math.min(1, Math.max(0, bytesRead / totalBytes));
}

export class StatusRegistry {
  private records = new Map<Identity, StatusRecord>();
  private listeners = new Set<StatusListener>();
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  // ─── Mutations ───────────────────────────────────────────────

  /**
   * Create the record for a request, or move an existing one to `status`.
   * Progress is kept; an error message is cleared.
   */
  upsert(
    request: InstallRequest,
    status: InstallStatus,
    action?: PendingAction,
  ): StatusRecord {
    const existing = this.records.get(request.url);
    return this.commit({
      identity: request.url,
      request,
      status,
      progress: existing?.progress ?? NO_PROGRESS,
      action,
      updatedAt: new Date().toISOString(),
    });
  }

  /**
   * Move an existing record to `status`. Returns null (and changes
   * nothing) when there is no record: events for removed identities
   * must not resurrect them.
   */
  update(
    identity: Identity,
    status: InstallStatus,
    action?: PendingAction,
  ): StatusRecord | null {
    const existing = this.records.get(identity);
    if (!existing) return null;
    return this.commit({
      identity,
      request: existing.request,
      status,
      progress: existing.progress,
      action,
      updatedAt: new Date().toISOString(),
    });
  }

  updateProgress(
    identity: Identity,
    totalBytes: number,
    bytesRead: number,
  ): StatusRecord | null {
    const existing = this.records.get(identity);
    if (!existing) return null;
    return this.commit({
      ...existing,
      progress: Object.freeze({ bytesRead, totalBytes }),
      updatedAt: new Date().toISOString(),
    });
  }

  setError(identity: Identity, message: string): StatusRecord | null {
    const existing = this.records.get(identity);
    if (!existing) return null;
    return this.commit({
      identity,
      request: existing.request,
      status: "Error",
      progress: existing.progress,
      errorMessage: message,
      updatedAt: new Date().toISOString(),
    });
  }

  remove(identity: Identity): boolean {
    if (!this.records.delete(identity)) return false;
    this.logger.debug({ identity }, "Status record removed");
    this.notify({ type: "removed", identity });
    return true;
  }

  /**
   * Restore a record produced by an earlier process (host persistence).
   * Pending actions never survive a restart.
   */
  seed(record: Omit<StatusRecord, "action">): StatusRecord {
    return this.commit({ ...record, action: undefined });
  }

  // ─── Queries ─────────────────────────────────────────────────

  get(identity: Identity): StatusRecord | null {
    return this.records.get(identity) ?? null;
  }

  listAll(): StatusRecord[] {
    return [...this.records.values()];
  }

  getByPackageName(packageName: string): StatusRecord[] {
    return this.listAll().filter(
      (record) => record.request.packageName === packageName,
    );
  }

  get size(): number {
    return this.records.size;
  }

  // ─── Observers ───────────────────────────────────────────────

  subscribe(listener: StatusListener): Subscription {
    this.listeners.add(listener);
    return {
      dispose: () => {
        this.listeners.delete(listener);
      },
    };
  }

  private commit(record: StatusRecord): StatusRecord {
    const frozen = Object.freeze(record);
    const previous = this.records.get(record.identity);
    this.records.set(record.identity, frozen);

    if (previous?.status !== frozen.status) {
      this.logger.debug(
        {
          identity: frozen.identity,
          from: previous?.status ?? null,
          to: frozen.status,
        },
        "Status changed",
      );
    }

    this.notify({ type: "updated", record: frozen });
    return frozen;
  }

  private notify(change: StatusChange): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(change);
      } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.error({ error: message }, "Status listener failed");
      }
    }
  }
}
