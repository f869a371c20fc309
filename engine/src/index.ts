/**
 * apkman Engine — Public API
 *
 * This is the single entry point for the engine package.
 * The CLI imports from here — never from internal modules.
 */

// Orchestrator and its collaborators
export { InstallOrchestrator } from "./orchestrator";
export type { OrchestratorDeps } from "./orchestrator";
export { StatusRegistry, progressFraction } from "./status-registry";
export type { StatusListener } from "./status-registry";
export { ContentStore, sanitizeSegment } from "./content-store";
export {
  ExpansionFileCoordinator,
  parseExpansionFileName,
} from "./expansion-files";
export type { ExpansionFileName } from "./expansion-files";
export { findPendingInstalls } from "./recovery";
export { KeyedEventBus } from "./events";
export type { KeyedListener } from "./events";
export { PackageSignals, InMemoryPackageLedger } from "./packages";
export type { PackageLedger, PackageAddedListener } from "./packages";

// Download gateway
export type { DownloadGateway } from "./download/gateway";
export { HttpsDownloadGateway } from "./download/https-gateway";
export type {
  HttpsGatewayOptions,
  TransferFunction,
} from "./download/https-gateway";
export { downloadFile } from "./download/downloader";
export type {
  DownloadFileOptions,
  DownloadProgress,
  DownloadResult,
} from "./download/downloader";

// Installers
export { BaseInstaller } from "./installer/base-installer";
export type { PackageInstaller } from "./installer/base-installer";
export {
  CommandInstaller,
  parseCommandTemplate,
  expandArgs,
} from "./installer/command-installer";
export type { CommandInstallerOptions } from "./installer/command-installer";

// Validation & errors
export {
  InstallRequestSchema,
  ExpansionFileSchema,
  parseInstallRequest,
} from "./schemas";
export type { RequestValidation } from "./schemas";
export { EngineError, errorMessage } from "./errors";
export { computeFileHash, verifyChecksum } from "./verifier";
export type { VerificationResult } from "./verifier";

// All types
export type {
  Identity,
  InstallRequest,
  ExpansionRole,
  ExpansionFileDescriptor,
  ExpansionFiles,
  InstallStatus,
  PendingAction,
  PendingActionKind,
  Progress,
  StatusRecord,
  StatusChange,
  DownloadEvent,
  InstallerEvent,
  FailureCategory,
  Failure,
  EngineOptions,
  IntakeOutcome,
  RequestInstallOptions,
  EngineEvent,
  EngineEventHandler,
  Subscription,
} from "./types";
export { EXPANSION_ROLES } from "./types";

// Utilities
export { KeyedSerialQueue } from "./utils/serial-queue";
export { createLogger } from "./utils/logger";
export type { Logger, LogLevel, LoggerOptions } from "./utils/logger";

// Wiring
export { createEngine } from "./engine";
export type { Engine, EngineCollaborators } from "./engine";
