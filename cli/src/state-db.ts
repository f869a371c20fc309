/**
 * apkman CLI — State Database
 *
 * Local SQLite database that survives between CLI runs:
 * - status_records: the last known StatusRecord of every identity,
 *   mirrored from Status Registry change notifications
 * - installed_packages: which identity installed each package (the
 *   engine's PackageLedger)
 *
 * Uses sql.js (Emscripten-compiled SQLite) for zero-native-dependency operation.
 * The database is persisted to disk on every write operation.
 */

import initSqlJs, { Database as SqlJsDatabase, ParamsObject } from "sql.js";
import * as path from "path";
import * as fs from "fs";
import { parseInstallRequest, StatusRegistry } from "@apkman/engine";
import type {
  Identity,
  InstallStatus,
  Logger,
  PackageLedger,
  StatusRecord,
  Subscription,
} from "@apkman/engine";

/** A StatusRecord as stored: pending actions never survive a restart. */
export type StoredRecord = Omit<StatusRecord, "action">;

export interface InstalledPackage {
  packageName: string;
  identity: Identity;
  installedAt: string;
}

const STATUSES: readonly InstallStatus[] = [
  "Unknown",
  "Downloading",
  "ReadyToInstall",
  "Installing",
  "Installed",
  "Error",
];

function isInstallStatus(value: string): value is InstallStatus {
  return STATUSES.some((status) => status === value);
}

// ─── Row narrowing ───────────────────────────────────────────

function text(row: ParamsObject, column: string): string {
  const value = row[column];
  if (typeof value !== "string") {
    throw new Error(`Column ${column} is not text`);
  }
  return value;
}

function optionalText(row: ParamsObject, column: string): string | undefined {
  const value = row[column];
  return typeof value === "string" ? value : undefined;
}

function integer(row: ParamsObject, column: string): number {
  const value = row[column];
  if (typeof value !== "number") {
    throw new Error(`Column ${column} is not a number`);
  }
  return value;
}

export class StateDB implements PackageLedger {
  private db: SqlJsDatabase | null = null;
  private dbPath: string;
  private logger: Logger;
  private initialized = false;

  constructor(dbPath: string, logger: Logger) {
    this.dbPath = dbPath;
    this.logger = logger;
  }

  /**
   * Initialize the database. Must be called before any operations.
   * sql.js requires async initialization.
   */
  async init(): Promise<void> {
    if (this.initialized) return;

    fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });

    const SQL = await initSqlJs();

    if (fs.existsSync(this.dbPath)) {
      this.db = new SQL.Database(fs.readFileSync(this.dbPath));
    } else {
      this.db = new SQL.Database();
    }

    this.initialized = true;
    this.initSchema();
    this.logger.debug({ path: this.dbPath }, "State database initialized");
  }

  private ensureInit(): SqlJsDatabase {
    if (!this.db || !this.initialized) {
      throw new Error("StateDB not initialized. Call init() first.");
    }
    return this.db;
  }

  private persist(): void {
    const db = this.ensureInit();
    fs.writeFileSync(this.dbPath, Buffer.from(db.export()));
  }

  private initSchema(): void {
    const db = this.ensureInit();
    db.run(`
      CREATE TABLE IF NOT EXISTS status_records (
        identity       TEXT    PRIMARY KEY,
        request        TEXT    NOT NULL,
        status         TEXT    NOT NULL,
        bytes_read     INTEGER NOT NULL DEFAULT 0,
        total_bytes    INTEGER NOT NULL DEFAULT 0,
        error_message  TEXT,
        updated_at     TEXT    NOT NULL
      )
    `);

    db.run(`
      CREATE TABLE IF NOT EXISTS installed_packages (
        package_name  TEXT PRIMARY KEY,
        identity      TEXT NOT NULL,
        installed_at  TEXT NOT NULL
      )
    `);

    this.persist();
  }

  // ─── Status Records ──────────────────────────────────────────

  saveRecord(record: StoredRecord): void {
    const db = this.ensureInit();
    db.run(
      `INSERT OR REPLACE INTO status_records
         (identity, request, status, bytes_read, total_bytes, error_message, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [
        record.identity,
        JSON.stringify(record.request),
        record.status,
        record.progress.bytesRead,
        record.progress.totalBytes,
        record.errorMessage ?? null,
        record.updatedAt,
      ],
    );
    this.persist();
  }

  deleteRecord(identity: Identity): void {
    const db = this.ensureInit();
    db.run("DELETE FROM status_records WHERE identity = ?", [identity]);
    this.persist();
  }

  getRecord(identity: Identity): StoredRecord | null {
    const db = this.ensureInit();
    const stmt = db.prepare("SELECT * FROM status_records WHERE identity = ?");
    stmt.bind([identity]);

    const row = stmt.step() ? stmt.getAsObject() : null;
    stmt.free();
    return row ? this.toRecord(row) : null;
  }

  /**
   * Every readable record, oldest update first. Rows whose request no
   * longer validates are skipped.
   */
  listRecords(): StoredRecord[] {
    const db = this.ensureInit();
    const records: StoredRecord[] = [];
    const stmt = db.prepare("SELECT * FROM status_records ORDER BY updated_at, identity");

    while (stmt.step()) {
      const record = this.toRecord(stmt.getAsObject());
      if (record) records.push(record);
    }
    stmt.free();
    return records;
  }

  private toRecord(row: ParamsObject): StoredRecord | null {
    const identity = text(row, "identity");
    const status = text(row, "status");
    if (!isInstallStatus(status)) {
      this.logger.warn({ identity, status }, "Unknown status in state database, skipped");
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text(row, "request"));
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn({ identity, error: message }, "Unreadable request in state database, skipped");
      return null;
    }
    const validation = parseInstallRequest(raw);
    if (!validation.ok) {
      this.logger.warn({ identity, errors: validation.errors }, "Invalid request in state database, skipped");
      return null;
    }

    return {
      identity,
      request: validation.request,
      status,
      progress: {
        bytesRead: integer(row, "bytes_read"),
        totalBytes: integer(row, "total_bytes"),
      },
      errorMessage: optionalText(row, "error_message"),
      updatedAt: text(row, "updated_at"),
    };
  }

  /**
   * Keep status_records in step with a registry until disposed.
   */
  mirror(registry: StatusRegistry): Subscription {
    return registry.subscribe((change) => {
      if (change.type === "updated") {
        this.saveRecord(change.record);
      } else {
        this.deleteRecord(change.identity);
      }
    });
  }

  // ─── Package Ledger ──────────────────────────────────────────

  setInstaller(packageName: string, identity: Identity): void {
    const db = this.ensureInit();
    db.run(
      `INSERT OR REPLACE INTO installed_packages (package_name, identity, installed_at)
       VALUES (?, ?, ?)`,
      [packageName, identity, new Date().toISOString()],
    );
    this.persist();
    this.logger.debug({ packageName, identity }, "Recorded installer");
  }

  getInstaller(packageName: string): InstalledPackage | null {
    const db = this.ensureInit();
    const stmt = db.prepare("SELECT * FROM installed_packages WHERE package_name = ?");
    stmt.bind([packageName]);

    const row = stmt.step() ? stmt.getAsObject() : null;
    stmt.free();
    if (!row) return null;
    return {
      packageName: text(row, "package_name"),
      identity: text(row, "identity"),
      installedAt: text(row, "installed_at"),
    };
  }

  // ─── Lifecycle ───────────────────────────────────────────────

  close(): void {
    if (this.db) {
      this.persist();
      this.db.close();
      this.db = null;
      this.initialized = false;
    }
  }
}
