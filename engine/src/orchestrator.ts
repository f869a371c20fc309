/**
 * apkman Engine — Install Orchestrator
 *
 * Drives every artifact from request to a terminal state:
 *
 *   Unknown → Downloading → ReadyToInstall → Installing → Installed
 *        └──────────── any ────────────→ Error(message)
 *   Downloading / ReadyToInstall → removed (cancel)
 *
 * Inputs are all event-driven: install/cancel requests, download events,
 * installer events, and "package added" signals from the OS. Each input
 * is queued on its identity's serial queue, so events for one identity
 * are handled one at a time in arrival order while different identities
 * proceed independently. Nothing is persisted here; after a restart the
 * host redelivers requests and calls recoverPendingInstalls().
 *
 * The full download URL is the identity: it names one file on one
 * server, so two copies of the same package on different mirrors are two
 * identities.
 */

import { ContentStore } from "./content-store";
import type { DownloadGateway } from "./download/gateway";
import { EngineError, errorMessage } from "./errors";
import { ExpansionFileCoordinator } from "./expansion-files";
import type { PackageInstaller } from "./installer/base-installer";
import { PackageSignals } from "./packages";
import type { PackageLedger } from "./packages";
import { findPendingInstalls } from "./recovery";
import { parseInstallRequest } from "./schemas";
import { StatusRegistry } from "./status-registry";
import type {
  DownloadEvent,
  EngineEvent,
  EngineEventHandler,
  Failure,
  Identity,
  InstallerEvent,
  InstallRequest,
  InstallStatus,
  IntakeOutcome,
  PendingAction,
  RequestInstallOptions,
  Subscription,
} from "./types";
import { KeyedSerialQueue } from "./utils/serial-queue";
import type { Logger } from "./utils/logger";

export interface OrchestratorDeps {
  store: ContentStore;
  gateway: DownloadGateway;
  installer: PackageInstaller;
  registry: StatusRegistry;
  logger: Logger;
  /** OS "package added" channel; optional for hosts without one */
  signals?: PackageSignals;
  /** "Who installed this" bookkeeping */
  ledger?: PackageLedger;
}

const TERMINAL: ReadonlySet<InstallStatus> = new Set(["Installed", "Error"]);

export class InstallOrchestrator {
  private store: ContentStore;
  private gateway: DownloadGateway;
  private installer: PackageInstaller;
  private registry: StatusRegistry;
  private logger: Logger;
  private ledger?: PackageLedger;
  private expansion: ExpansionFileCoordinator;
  private queue: KeyedSerialQueue;
  private downloadSubs = new Map<Identity, Subscription>();
  private installerSubs = new Map<Identity, Subscription>();
  private signalSub: Subscription | null = null;
  private eventHandlers: EngineEventHandler[] = [];

  constructor(deps: OrchestratorDeps) {
    this.store = deps.store;
    this.gateway = deps.gateway;
    this.installer = deps.installer;
    this.registry = deps.registry;
    this.logger = deps.logger;
    this.ledger = deps.ledger;

    this.queue = new KeyedSerialQueue((identity, err) => {
      this.logger.error(
        { identity, error: errorMessage(err) },
        "Event handling failed",
      );
      if (err instanceof EngineError) {
        this.reportFailure({ category: err.category, message: err.message, identity });
      }
    });
    this.expansion = new ExpansionFileCoordinator(
      this.gateway,
      this.store,
      this.registry,
      this.logger,
      (failure) => this.reportFailure(failure),
    );

    if (deps.signals) {
      this.signalSub = deps.signals.subscribe((packageName) =>
        this.onPackageAdded(packageName),
      );
    }
  }

  // ─── Event System ────────────────────────────────────────────

  /**
   * Register an event handler for transitions and failures.
   */
  on(handler: EngineEventHandler): Subscription {
    this.eventHandlers.push(handler);
    return {
      dispose: () => {
        this.eventHandlers = this.eventHandlers.filter((h) => h !== handler);
      },
    };
  }

  private emit(event: EngineEvent): void {
    for (const handler of [...this.eventHandlers]) {
      try {
        handler(event);
      } catch (err: unknown) {
        this.logger.warn({ error: errorMessage(err) }, "Event handler threw");
      }
    }
  }

  private reportFailure(failure: Failure): void {
    this.emit({
      type: "failure",
      timestamp: new Date().toISOString(),
      data: failure,
    });
  }

  private transitioned(identity: Identity, status: InstallStatus | "Removed"): void {
    this.emit({
      type: "transition",
      timestamp: new Date().toISOString(),
      data: { identity, status },
    });
  }

  private setStatus(
    identity: Identity,
    status: InstallStatus,
    action?: PendingAction,
  ): boolean {
    if (!this.registry.update(identity, status, action)) {
      this.logger.debug({ identity, status }, "No record, event ignored");
      return false;
    }
    this.transitioned(identity, status);
    return true;
  }

  private removeRecord(identity: Identity): void {
    if (this.registry.remove(identity)) {
      this.transitioned(identity, "Removed");
    }
  }

  // ─── Public Entry Points ─────────────────────────────────────

  /**
   * Install an artifact, using the cached file when it is valid and
   * downloading it otherwise. Safe to call again with the same request.
   */
  async requestInstall(
    input: unknown,
    options: RequestInstallOptions = {},
  ): Promise<IntakeOutcome> {
    const validation = parseInstallRequest(input);
    if (!validation.ok) {
      const message = validation.errors.join("; ");
      this.logger.warn({ errors: validation.errors }, "Malformed install request dropped");
      this.reportFailure({ category: "MALFORMED_REQUEST", message });
      return "malformed";
    }

    const request = validation.request;
    let outcome: IntakeOutcome = "accepted";
    await this.queue.run(request.url, async () => {
      outcome = await this.intake(request, options);
    });
    return outcome;
  }

  /**
   * Cancel the artifact and its expansion downloads, then drop the record.
   * A no-op when nothing is in flight.
   */
  async cancel(identity: Identity): Promise<void> {
    // Stop listening right away so nothing queued after this call lands
    this.releaseAll(identity);

    await this.queue.run(identity, () => {
      this.releaseAll(identity);
      const record = this.registry.get(identity);
      this.gateway.cancel(identity);
      if (record) {
        this.expansion.cancel(record.request);
      }
      this.logger.info({ identity, hadRecord: record !== null }, "Install cancelled");
      this.removeRecord(identity);
    });
  }

  /**
   * Re-attach installer listeners for every record waiting in
   * ReadyToInstall (downloaded in an earlier process lifetime).
   */
  recoverPendingInstalls(): Identity[] {
    const pending = findPendingInstalls(this.registry).map((r) => r.identity);
    for (const identity of pending) {
      this.armInstaller(identity);
    }
    this.logger.info({ count: pending.length }, "Recovered pending installs");
    return pending;
  }

  /**
   * Drop a record that reached Installed or Error.
   */
  async clear(identity: Identity): Promise<boolean> {
    let cleared = false;
    await this.queue.run(identity, () => {
      const record = this.registry.get(identity);
      if (!record || !TERMINAL.has(record.status)) return;
      this.removeRecord(identity);
      cleared = true;
    });
    return cleared;
  }

  /**
   * Resolve once every queued input has been handled.
   */
  async idle(): Promise<void> {
    do {
      await this.queue.drain();
      await this.expansion.idle();
    } while (this.queue.activeKeys > 0);
  }

  dispose(): void {
    for (const subscription of this.downloadSubs.values()) subscription.dispose();
    for (const subscription of this.installerSubs.values()) subscription.dispose();
    this.downloadSubs.clear();
    this.installerSubs.clear();
    this.expansion.dispose();
    this.signalSub?.dispose();
    this.signalSub = null;
  }

  // ─── Intake ──────────────────────────────────────────────────

  private async intake(
    request: InstallRequest,
    options: RequestInstallOptions,
  ): Promise<IntakeOutcome> {
    const identity = request.url;
    const localPath = this.store.resolvePath(identity);
    const inFlight = this.gateway.isQueuedOrActive(identity);

    if (
      options.redelivered &&
      !inFlight &&
      !this.store.isComplete(localPath, request.size)
    ) {
      this.logger.info(
        { identity },
        "Redelivered request has no download in flight and no complete file, abandoning",
      );
      this.releaseAll(identity);
      this.removeRecord(identity);
      return "abandoned";
    }

    const existing = this.registry.get(identity);
    if (existing && this.inProgress(identity, existing.status)) {
      this.logger.debug(
        { identity, status: existing.status },
        "Install already in progress, re-attaching listeners",
      );
      if (this.downloadSubs.has(identity)) this.armDownload(identity);
      if (this.installerSubs.has(identity)) this.armInstaller(identity);
      return "accepted";
    }

    if (!existing || !inFlight) {
      this.registry.upsert(request, "Unknown");
      this.transitioned(identity, "Unknown");
    }

    this.logger.info(
      { identity, packageName: request.packageName, versionCode: request.versionCode },
      "Install requested",
    );

    this.armDownload(identity);
    this.expansion.fetch(request);

    if (inFlight) {
      this.logger.debug({ identity }, "Download already in flight");
      return "accepted";
    }

    try {
      await this.reconcileCache(request, localPath);
    } catch (err: unknown) {
      const message = `Could not prepare download: ${errorMessage(err)}`;
      this.logger.error({ identity, error: message }, "Cache reconciliation failed");
      this.releaseAll(identity);
      this.registry.setError(identity, message);
      this.transitioned(identity, "Error");
    }
    return "accepted";
  }

  /**
   * A download (real or from the cache) has not reported its outcome yet,
   * or the installer has the file.
   */
  private inProgress(identity: Identity, status: InstallStatus): boolean {
    if (this.downloadSubs.has(identity)) return true;
    return (
      this.installerSubs.has(identity) &&
      (status === "ReadyToInstall" || status === "Installing")
    );
  }

  private async reconcileCache(
    request: InstallRequest,
    localPath: string,
  ): Promise<void> {
    const identity = request.url;

    if (!this.store.exists(localPath) || this.store.sizeOf(localPath) < request.size) {
      this.logger.debug({ identity, path: localPath }, "Not cached, downloading");
      this.gateway.queue(identity);
      return;
    }

    if (await this.store.isValid(localPath, request.size, request.sha256)) {
      this.logger.info(
        { identity, path: localPath },
        "Valid cached file, skipping download",
      );
      this.gateway.events.publish(identity, { type: "started" });
      this.gateway.events.publish(identity, { type: "completed", localPath });
      return;
    }

    this.logger.warn(
      { identity, path: localPath },
      "Cached file failed validation, deleting and downloading again",
    );
    this.reportFailure({
      category: "VALIDATION_FAILURE",
      message: "Cached file did not match the expected size and hash",
      identity,
    });
    this.store.remove(localPath);
    this.gateway.queue(identity);
  }

  // ─── Subscriptions ───────────────────────────────────────────

  private armDownload(identity: Identity): void {
    this.downloadSubs.get(identity)?.dispose();
    this.downloadSubs.set(
      identity,
      this.gateway.events.subscribe(identity, (event) => {
        void this.queue.run(identity, () => this.onDownloadEvent(identity, event));
      }),
    );
  }

  private armInstaller(identity: Identity): void {
    this.installerSubs.get(identity)?.dispose();
    this.installerSubs.set(
      identity,
      this.installer.events.subscribe(identity, (event) => {
        void this.queue.run(identity, () => this.onInstallerEvent(identity, event));
      }),
    );
  }

  private release(subs: Map<Identity, Subscription>, identity: Identity): void {
    subs.get(identity)?.dispose();
    subs.delete(identity);
  }

  private releaseAll(identity: Identity): void {
    this.release(this.downloadSubs, identity);
    this.release(this.installerSubs, identity);
  }

  hasListeners(identity: Identity): { download: boolean; installer: boolean } {
    return {
      download: this.downloadSubs.has(identity),
      installer: this.installerSubs.has(identity),
    };
  }

  // ─── Download Events ─────────────────────────────────────────

  private onDownloadEvent(identity: Identity, event: DownloadEvent): void {
    switch (event.type) {
      case "started":
        this.setStatus(identity, "Downloading", {
          kind: "cancel",
          label: "Cancel download",
          run: () => this.cancel(identity),
        });
        break;

      case "progress":
        this.registry.updateProgress(identity, event.totalBytes, event.bytesRead);
        break;

      case "completed": {
        this.release(this.downloadSubs, identity);
        this.logger.info(
          { identity, path: event.localPath },
          "Download completed",
        );
        if (!this.setStatus(identity, "ReadyToInstall")) return;
        const record = this.registry.get(identity);
        if (!record) return;

        this.armInstaller(identity);
        try {
          this.installer.install(event.localPath, identity, record.request);
        } catch (err: unknown) {
          const message = `Installer failed to start: ${errorMessage(err)}`;
          this.logger.error({ identity, error: message }, "Install failed");
          this.release(this.installerSubs, identity);
          this.registry.setError(identity, message);
          this.transitioned(identity, "Error");
          this.reportFailure({ category: "INSTALL_FAILURE", message, identity });
        }
        break;
      }

      case "interrupted":
        this.release(this.downloadSubs, identity);
        this.logger.warn({ identity, reason: event.reason }, "Download interrupted");
        this.setStatus(identity, "Unknown");
        this.reportFailure({
          category: "TRANSIENT_DOWNLOAD_FAILURE",
          message: event.reason ?? "Download interrupted",
          identity,
        });
        break;

      default: {
        const unhandled: never = event;
        throw new EngineError(
          `Unhandled download event: ${JSON.stringify(unhandled)}`,
          "TRANSIENT_DOWNLOAD_FAILURE",
        );
      }
    }
  }

  // ─── Installer Events ────────────────────────────────────────

  private onInstallerEvent(identity: Identity, event: InstallerEvent): void {
    switch (event.type) {
      case "install-started":
        this.setStatus(identity, "Installing");
        break;

      case "install-complete": {
        this.release(this.installerSubs, identity);
        if (!this.setStatus(identity, "Installed")) return;
        const record = this.registry.get(identity);
        if (record) {
          this.ledger?.setInstaller(record.request.packageName, identity);
        }
        this.logger.info({ identity }, "Install complete");
        break;
      }

      case "install-interrupted":
        this.release(this.installerSubs, identity);
        if (event.errorMessage) {
          this.logger.warn({ identity, error: event.errorMessage }, "Install failed");
          if (this.registry.setError(identity, event.errorMessage)) {
            this.transitioned(identity, "Error");
          }
          this.reportFailure({
            category: "INSTALL_FAILURE",
            message: event.errorMessage,
            identity,
          });
        } else {
          this.logger.info({ identity }, "Install dismissed");
          this.removeRecord(identity);
          this.reportFailure({
            category: "SILENT_ABORT",
            message: "Install interrupted without an error",
            identity,
          });
        }
        break;

      case "user-interaction-required":
        this.setStatus(identity, "ReadyToInstall", event.action);
        break;

      default: {
        const unhandled: never = event;
        throw new EngineError(
          `Unhandled installer event: ${JSON.stringify(unhandled)}`,
          "INSTALL_FAILURE",
        );
      }
    }
  }

  // ─── Package Signals ─────────────────────────────────────────

  /**
   * The package was installed or updated outside this flow: every record
   * for it is Installed.
   */
  private onPackageAdded(packageName: string): void {
    for (const record of this.registry.getByPackageName(packageName)) {
      const identity = record.identity;
      void this.queue.run(identity, () => {
        this.releaseAll(identity);
        if (this.setStatus(identity, "Installed")) {
          this.logger.info({ identity, packageName }, "Installed outside apkman");
        }
      });
    }
  }
}
