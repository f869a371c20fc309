/**
 * apkman CLI — Tests
 *
 * Tests for CLI configuration, request files, output formatting, the
 * state database and the settlement watcher.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as path from "path";
import * as os from "os";
import * as fs from "fs";
import { stringify as stringifyYaml } from "yaml";
import { createEngine, StatusRegistry } from "@apkman/engine";
import type { Engine, InstallRequest } from "@apkman/engine";
import { DEFAULT_INSTALL_COMMAND, loadConfig } from "../src/config";
import { loadRequestFile } from "../src/request-file";
import { StateDB } from "../src/state-db";
import { SettlementWatcher } from "../src/watch";
import {
  formatBytes,
  formatDuration,
  formatFailureCategory,
  formatPercent,
  formatProgress,
  isDebugMode,
  setDebugMode,
  statusLabel,
  truncateText,
} from "../src/output";
import {
  FakeDownloadGateway,
  FakeInstaller,
  silentLogger,
} from "../../engine/tests/helpers";

const HASH = "ab".repeat(32);

const request: InstallRequest = {
  url: "https://repo.example.org/org.example.app_42.apk",
  packageName: "org.example.app",
  versionCode: 42,
  size: 2048,
  sha256: HASH,
};

let tmp: string;

beforeEach(() => {
  tmp = fs.mkdtempSync(path.join(os.tmpdir(), "apkman-cli-"));
});

afterEach(() => {
  fs.rmSync(tmp, { recursive: true, force: true });
});

describe("Configuration", () => {
  it("defaults to ~/.apkman", () => {
    const config = loadConfig({});
    const home = path.join(os.homedir(), ".apkman");

    expect(config.home).toBe(home);
    expect(config.paths).toEqual({
      stateDb: path.join(home, "state.db"),
      cache: path.join(home, "cache"),
    });
    expect(config.installCommand).toBe(DEFAULT_INSTALL_COMMAND);
    expect(config.concurrency).toBe(1);
    expect(config.debug).toBe(false);
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      APKMAN_HOME: "/srv/apkman",
      APKMAN_INSTALL_COMMAND: "adb -s emulator-5554 install -r {file}",
      APKMAN_CONCURRENCY: "3",
      APKMAN_DEBUG: "true",
    });

    expect(config.paths.stateDb).toBe(path.join("/srv/apkman", "state.db"));
    expect(config.installCommand).toBe("adb -s emulator-5554 install -r {file}");
    expect(config.concurrency).toBe(3);
    expect(config.debug).toBe(true);
  });

  it("rejects a concurrency that is not a positive integer", () => {
    expect(() => loadConfig({ APKMAN_CONCURRENCY: "0" })).toThrow(
      'APKMAN_CONCURRENCY must be a positive integer, got "0"',
    );
    expect(() => loadConfig({ APKMAN_CONCURRENCY: "two" })).toThrow(
      "APKMAN_CONCURRENCY must be a positive integer",
    );
  });
});

describe("Request Files", () => {
  function writeFile(name: string, content: string): string {
    const filePath = path.join(tmp, name);
    fs.writeFileSync(filePath, content, "utf-8");
    return filePath;
  }

  it("loads a YAML request", () => {
    const filePath = writeFile("app.yaml", stringifyYaml(request));

    expect(loadRequestFile(filePath)).toEqual({ ok: true, request });
  });

  it("loads a JSON request", () => {
    const filePath = writeFile("app.json", JSON.stringify(request));

    expect(loadRequestFile(filePath)).toEqual({ ok: true, request });
  });

  it("reports a missing file", () => {
    const result = loadRequestFile(path.join(tmp, "missing.yaml"));

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].startsWith(`Cannot read ${path.join(tmp, "missing.yaml")}: `)).toBe(true);
  });

  it("reports invalid YAML", () => {
    const filePath = writeFile("broken.yaml", "url: [unclosed\n");
    const result = loadRequestFile(filePath);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.errors[0].startsWith(`Invalid YAML in ${filePath}: `)).toBe(true);
  });

  it("reports validation problems by field", () => {
    const filePath = writeFile("bad.yaml", stringifyYaml({ ...request, sha256: "abc" }));

    expect(loadRequestFile(filePath)).toEqual({
      ok: false,
      errors: ["sha256: must be 64 hex characters"],
    });
  });
});

describe("Output Formatting", () => {
  describe("formatBytes", () => {
    it("formats zero bytes", () => {
      expect(formatBytes(0)).toBe("0 B");
    });

    it("formats bytes", () => {
      expect(formatBytes(512)).toBe("512.0 B");
    });

    it("formats kilobytes", () => {
      expect(formatBytes(1024)).toBe("1.0 KB");
    });

    it("formats megabytes", () => {
      expect(formatBytes(1024 * 1024 * 5.5)).toBe("5.5 MB");
    });
  });

  describe("formatPercent", () => {
    it("rounds down to whole percent", () => {
      expect(formatPercent(0.256)).toBe("25%");
    });

    it("clamps to 0-100", () => {
      expect(formatPercent(1.2)).toBe("100%");
      expect(formatPercent(-1)).toBe("0%");
    });
  });

  describe("formatProgress", () => {
    it("shows a dash before any bytes arrive", () => {
      expect(formatProgress({ progress: { bytesRead: 0, totalBytes: 0 } })).toBe("-");
    });

    it("shows bytes read while the total is unknown", () => {
      expect(formatProgress({ progress: { bytesRead: 512, totalBytes: 0 } })).toBe("512.0 B");
    });

    it("shows bytes and percent when the total is known", () => {
      expect(
        formatProgress({ progress: { bytesRead: 1024 * 1024, totalBytes: 4 * 1024 * 1024 } }),
      ).toBe("1.0 MB / 4.0 MB (25%)");
    });
  });

  describe("formatDuration", () => {
    it("formats milliseconds", () => {
      expect(formatDuration(150)).toBe("150ms");
    });

    it("formats seconds", () => {
      expect(formatDuration(5500)).toBe("5.5s");
    });

    it("formats minutes", () => {
      expect(formatDuration(125000)).toBe("2m 5s");
    });
  });

  it("labels statuses and failure categories", () => {
    expect(statusLabel("ReadyToInstall")).toBe("Ready to install");
    expect(statusLabel("Error")).toBe("Failed");
    expect(formatFailureCategory("SILENT_ABORT")).toBe("Install dismissed");
  });

  it("truncates long text with an ellipsis", () => {
    expect(truncateText("abcdefghij", 6)).toBe("abc...");
    expect(truncateText("abc", 6)).toBe("abc");
  });

  describe("debug mode", () => {
    afterEach(() => setDebugMode(false));

    it("is off by default and can be switched on", () => {
      expect(isDebugMode()).toBe(false);
      setDebugMode(true);
      expect(isDebugMode()).toBe(true);
    });
  });
});

describe("StateDB", () => {
  let dbPath: string;
  let db: StateDB;

  beforeEach(async () => {
    dbPath = path.join(tmp, "state.db");
    db = new StateDB(dbPath, silentLogger);
    await db.init();
  });

  afterEach(() => {
    db.close();
  });

  it("throws when used before init", () => {
    const fresh = new StateDB(path.join(tmp, "other.db"), silentLogger);
    expect(() => fresh.listRecords()).toThrow("StateDB not initialized");
  });

  it("mirrors registry changes", () => {
    const registry = new StatusRegistry(silentLogger);
    const mirror = db.mirror(registry);

    registry.upsert(request, "Unknown");
    registry.update(request.url, "Downloading");
    registry.updateProgress(request.url, 2048, 1024);

    const stored = db.getRecord(request.url);
    expect(stored?.status).toBe("Downloading");
    expect(stored?.progress).toEqual({ bytesRead: 1024, totalBytes: 2048 });
    expect(stored?.request).toEqual(request);

    registry.remove(request.url);
    expect(db.getRecord(request.url)).toBeNull();
    mirror.dispose();
  });

  it("persists records and error messages across instances", async () => {
    const registry = new StatusRegistry(silentLogger);
    db.mirror(registry);
    registry.upsert(request, "Installing");
    registry.setError(request.url, "INSTALL_FAILED_OLDER_SDK");
    db.close();

    db = new StateDB(dbPath, silentLogger);
    await db.init();
    const records = db.listRecords();

    expect(records).toHaveLength(1);
    expect(records[0].status).toBe("Error");
    expect(records[0].errorMessage).toBe("INSTALL_FAILED_OLDER_SDK");
    expect(records[0].request).toEqual(request);
  });

  it("skips rows whose request no longer validates", () => {
    db.saveRecord({
      identity: "https://x/broken.apk",
      request: { ...request, url: "https://x/broken.apk", sha256: "not-a-hash" },
      status: "Unknown",
      progress: { bytesRead: 0, totalBytes: 0 },
      updatedAt: "2026-01-01T00:00:00.000Z",
    });

    expect(db.listRecords()).toEqual([]);
  });

  it("records which identity installed a package", () => {
    expect(db.getInstaller("org.example.app")).toBeNull();

    db.setInstaller("org.example.app", request.url);

    const owner = db.getInstaller("org.example.app");
    expect(owner?.packageName).toBe("org.example.app");
    expect(owner?.identity).toBe(request.url);
  });
});

describe("SettlementWatcher", () => {
  let gateway: FakeDownloadGateway;
  let installer: FakeInstaller;
  let engine: Engine;

  beforeEach(() => {
    gateway = new FakeDownloadGateway();
    installer = new FakeInstaller();
    engine = createEngine(
      { cache_dir: path.join(tmp, "cache"), verbose: false },
      { installer, gateway, logger: silentLogger },
    );
  });

  afterEach(() => {
    engine.close();
  });

  it("settles immediately with nothing to watch", async () => {
    expect(await new SettlementWatcher(engine, []).settled).toEqual([]);
  });

  it("settles as installed after the install completes", async () => {
    const statuses: string[] = [];
    const watcher = new SettlementWatcher(engine, [request.url], (record) =>
      statuses.push(record.status),
    );

    await engine.orchestrator.requestInstall(request);
    gateway.emit(request.url, { type: "started" });
    gateway.emit(request.url, {
      type: "completed",
      localPath: engine.store.resolvePath(request.url),
    });
    await engine.orchestrator.idle();
    installer.events.publish(request.url, { type: "install-complete" });

    expect(await watcher.settled).toEqual([
      { identity: request.url, outcome: "installed" },
    ]);
    expect(statuses).toEqual(["Unknown", "Downloading", "ReadyToInstall", "Installed"]);
  });

  it("settles as failed with the installer's message", async () => {
    const watcher = new SettlementWatcher(engine, [request.url]);

    await engine.orchestrator.requestInstall(request);
    gateway.emit(request.url, { type: "completed", localPath: "/tmp/app.apk" });
    await engine.orchestrator.idle();
    installer.events.publish(request.url, {
      type: "install-interrupted",
      errorMessage: "INSTALL_FAILED_NO_MATCHING_ABIS",
    });

    expect(await watcher.settled).toEqual([
      {
        identity: request.url,
        outcome: "failed",
        message: "INSTALL_FAILED_NO_MATCHING_ABIS",
      },
    ]);
  });

  it("settles as interrupted when the download stops", async () => {
    const watcher = new SettlementWatcher(engine, [request.url]);

    await engine.orchestrator.requestInstall(request);
    gateway.emit(request.url, { type: "interrupted", reason: "connection reset" });

    expect(await watcher.settled).toEqual([
      { identity: request.url, outcome: "interrupted", message: "connection reset" },
    ]);
  });

  it("settles as removed on cancel and reports in the given order", async () => {
    const other: InstallRequest = { ...request, url: "https://repo.example.org/other_1.apk" };
    const watcher = new SettlementWatcher(engine, [request.url, other.url]);

    await engine.orchestrator.requestInstall(request);
    await engine.orchestrator.requestInstall(other);
    await engine.orchestrator.cancel(other.url);
    await engine.orchestrator.cancel(request.url);

    expect(await watcher.settled).toEqual([
      { identity: request.url, outcome: "removed" },
      { identity: other.url, outcome: "removed" },
    ]);
  });
});
