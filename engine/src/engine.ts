/**
 * apkman Engine — Wiring
 *
 * Builds the process-wide services once and hands them out by reference:
 * one Status Registry, one Content Store, one Download Gateway, one
 * orchestrator. Hosts call createEngine() at startup instead of reaching
 * for global singletons.
 *
 * The engine has NO UI logic. Observers read the registry and listen to
 * orchestrator events.
 */

import * as fs from "fs";
import { ContentStore } from "./content-store";
import type { DownloadGateway } from "./download/gateway";
import { HttpsDownloadGateway } from "./download/https-gateway";
import type { HttpsGatewayOptions } from "./download/https-gateway";
import type { PackageInstaller } from "./installer/base-installer";
import { InstallOrchestrator } from "./orchestrator";
import { PackageSignals } from "./packages";
import type { PackageLedger } from "./packages";
import { StatusRegistry } from "./status-registry";
import type { EngineOptions } from "./types";
import { createLogger } from "./utils/logger";
import type { Logger } from "./utils/logger";

export interface EngineCollaborators {
  installer: PackageInstaller;
  /** Defaults to an HttpsDownloadGateway writing into cache_dir */
  gateway?: DownloadGateway;
  gatewayOptions?: HttpsGatewayOptions;
  ledger?: PackageLedger;
  logger?: Logger;
}

export interface Engine {
  orchestrator: InstallOrchestrator;
  registry: StatusRegistry;
  store: ContentStore;
  gateway: DownloadGateway;
  signals: PackageSignals;
  logger: Logger;
  close(): void;
}

export function createEngine(
  options: EngineOptions,
  collaborators: EngineCollaborators,
): Engine {
  const logger =
    collaborators.logger ??
    createLogger({ level: options.verbose ? "debug" : "silent", name: "engine" });

  fs.mkdirSync(options.cache_dir, { recursive: true });

  const store = new ContentStore(options.cache_dir, logger);
  const registry = new StatusRegistry(logger);
  const signals = new PackageSignals(logger);
  const gateway =
    collaborators.gateway ??
    new HttpsDownloadGateway(store, logger, collaborators.gatewayOptions);

  const orchestrator = new InstallOrchestrator({
    store,
    gateway,
    installer: collaborators.installer,
    registry,
    logger,
    signals,
    ledger: collaborators.ledger,
  });

  return {
    orchestrator,
    registry,
    store,
    gateway,
    signals,
    logger,
    close() {
      orchestrator.dispose();
      logger.debug("Engine shut down");
    },
  };
}
