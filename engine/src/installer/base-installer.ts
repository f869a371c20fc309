/**
 * apkman Engine — External Installer Contract
 *
 * The platform's package installer is an external collaborator. The
 * orchestrator hands it a verified local file and then only listens:
 *
 *   install-started → user-interaction-required* →
 *     install-complete | install-interrupted(errorMessage?)
 *
 * Implementations publish on `events`, keyed by the artifact identity.
 */

import { KeyedEventBus } from "../events";
import type { Identity, InstallerEvent, InstallRequest } from "../types";
import type { Logger } from "../utils/logger";

export interface PackageInstaller {
  readonly events: KeyedEventBus<InstallerEvent>;
  /** Start installing; must return without waiting for the outcome. */
  install(localPath: string, identity: Identity, request: InstallRequest): void;
}

/**
 * Shared plumbing for installer implementations.
 */
export abstract class BaseInstaller implements PackageInstaller {
  readonly events: KeyedEventBus<InstallerEvent>;
  protected logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
    this.events = new KeyedEventBus<InstallerEvent>(logger);
  }

  abstract install(
    localPath: string,
    identity: Identity,
    request: InstallRequest,
  ): void;

  protected emit(identity: Identity, event: InstallerEvent): void {
    this.logger.debug({ identity, event: event.type }, "Installer event");
    this.events.publish(identity, event);
  }
}
