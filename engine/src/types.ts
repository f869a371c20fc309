/**
 * apkman Engine — Core Type Definitions
 *
 * Requests, status records, download and installer lifecycle events,
 * and the engine's event/option types. Collaborator contracts
 * (gateway, installer, package signals) live next to their modules.
 */

// ─── Install Request ─────────────────────────────────────────────

/** The canonical download URL of an artifact; the sole correlation key. */
export type Identity = string;

export type ExpansionRole = "main" | "patch";

export const EXPANSION_ROLES: readonly ExpansionRole[] = ["main", "patch"];

export interface ExpansionFileDescriptor {
  /** Download URL; also the identity of the expansion file's download */
  url: string;
  /** Absolute path the verified file is placed at */
  destination: string;
  /** Expected SHA-256, lowercase hex */
  sha256: string;
}

export type ExpansionFiles = Partial<
  Record<ExpansionRole, ExpansionFileDescriptor>
>;

export interface InstallRequest {
  /** Artifact identity (download URL) */
  readonly url: Identity;
  readonly packageName: string;
  readonly versionCode: number;
  /** Expected file size in bytes */
  readonly size: number;
  /** Expected SHA-256, lowercase hex */
  readonly sha256: string;
  readonly expansionFiles?: Readonly<ExpansionFiles>;
}

// ─── Status Records ──────────────────────────────────────────────

export type InstallStatus =
  | "Unknown"
  | "Downloading"
  | "ReadyToInstall"
  | "Installing"
  | "Installed"
  | "Error";

export type PendingActionKind = "cancel" | "confirm";

/**
 * Something an observer can surface to the user ("Cancel", "Tap to install").
 */
export interface PendingAction {
  kind: PendingActionKind;
  label: string;
  run(): Promise<void>;
}

export interface Progress {
  bytesRead: number;
  totalBytes: number;
}

export interface StatusRecord {
  readonly identity: Identity;
  readonly request: InstallRequest;
  readonly status: InstallStatus;
  readonly progress: Progress;
  readonly action?: PendingAction;
  readonly errorMessage?: string;
  /** ISO timestamp of the last mutation */
  readonly updatedAt: string;
}

export type StatusChange =
  | { type: "updated"; record: StatusRecord }
  | { type: "removed"; identity: Identity };

// ─── Lifecycle Events ────────────────────────────────────────────

export type DownloadEvent =
  | { type: "started" }
  | { type: "progress"; bytesRead: number; totalBytes: number }
  | { type: "completed"; localPath: string }
  | { type: "interrupted"; reason?: string };

export type InstallerEvent =
  | { type: "install-started" }
  | { type: "install-complete" }
  | { type: "install-interrupted"; errorMessage?: string }
  | { type: "user-interaction-required"; action: PendingAction };

// ─── Failures ────────────────────────────────────────────────────

export type FailureCategory =
  | "TRANSIENT_DOWNLOAD_FAILURE"
  | "VALIDATION_FAILURE"
  | "INSTALL_FAILURE"
  | "SILENT_ABORT"
  | "MALFORMED_REQUEST";

export interface Failure {
  category: FailureCategory;
  message: string;
  identity?: Identity;
}

// ─── Engine Options & Events ─────────────────────────────────────

export interface EngineOptions {
  /** Directory downloaded artifacts are cached in */
  cache_dir: string;
  /** Enable debug logging */
  verbose: boolean;
}

export type IntakeOutcome = "accepted" | "malformed" | "abandoned";

export interface RequestInstallOptions {
  /**
   * The host is re-issuing a request it already delivered once
   * (e.g. after the process was killed mid-flight).
   */
  redelivered?: boolean;
}

export type EngineEvent =
  | { type: "failure"; timestamp: string; data: Failure }
  | {
      type: "transition";
      timestamp: string;
      data: { identity: Identity; status: InstallStatus | "Removed" };
    };

export type EngineEventHandler = (event: EngineEvent) => void;

/** Handle returned by every subscribe(); dispose() is idempotent. */
export interface Subscription {
  dispose(): void;
}
