/**
 * apkman Engine — Content Store
 *
 * Local cache of downloaded artifacts and expansion files.
 *
 * This module is the only place that maps an identity to a file path:
 *   https://example.org/repo/app-1.apk  →  <cache_dir>/example.org/repo/app-1.apk
 *   https://mirror:8443/a.apk?x=1       →  <cache_dir>/mirror-8443/a-<hash8>.apk
 *
 * Validity is size first, then a full-file SHA-256 only when the size
 * already matches (hashing a large file is the expensive part).
 */

import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";
import type { Identity } from "./types";
import { verifyChecksum } from "./verifier";
import type { Logger } from "./utils/logger";

function shortHash(value: string, length: number = 64): string {
  return crypto
    .createHash("sha256")
    .update(value)
    .digest("hex")
    .slice(0, length);
}

/**
 * Make one URL path segment safe to use as a file name.
 */
export function sanitizeSegment(segment: string): string {
  let decoded = segment;
  try {
    decoded = decodeURIComponent(segment);
  } catch {
    // Malformed escape sequence; sanitize the raw text instead
  }
  const safe = decoded.replace(/[^A-Za-z0-9._-]/g, "_");
  if (safe === "" || safe === "." || safe === "..") return "_";
  return safe;
}

export class ContentStore {
  readonly cacheDir: string;
  private logger: Logger;

  constructor(cacheDir: string, logger: Logger) {
    this.cacheDir = cacheDir;
    this.logger = logger;
  }

  /**
   * Deterministic cache path for an identity.
   */
  resolvePath(identity: Identity): string {
    let url: URL | null = null;
    try {
      url = new URL(identity);
    } catch {
      url = null;
    }

    if (!url || url.protocol !== "https:") {
      return path.join(this.cacheDir, "_", shortHash(identity));
    }

    const host = url.port ? `${url.hostname}-${url.port}` : url.hostname;
    const segments = url.pathname
      .split("/")
      .filter((s) => s.length > 0)
      .map(sanitizeSegment);
    if (segments.length === 0) segments.push("index");

    // Two URLs differing only by query are distinct identities
    if (url.search) {
      const last = segments.length - 1;
      const ext = path.extname(segments[last]);
      const base = segments[last].slice(0, segments[last].length - ext.length);
      segments[last] = `${base}-${shortHash(url.search, 8)}${ext}`;
    }

    return path.join(this.cacheDir, sanitizeSegment(host), ...segments);
  }

  exists(filePath: string): boolean {
    return fs.existsSync(filePath);
  }

  /**
   * Size in bytes, or 0 when the file does not exist.
   */
  sizeOf(filePath: string): number {
    try {
      return fs.statSync(filePath).size;
    } catch {
      return 0;
    }
  }

  /**
   * True when the file exists and is at least `expectedSize` bytes.
   * Says nothing about its content.
   */
  isComplete(filePath: string, expectedSize: number): boolean {
    return this.exists(filePath) && this.sizeOf(filePath) >= expectedSize;
  }

  /**
   * Full validity check: exact size, then SHA-256.
   */
  async isValid(
    filePath: string,
    expectedSize: number,
    expectedHash: string,
  ): Promise<boolean> {
    if (!this.exists(filePath)) return false;
    if (this.sizeOf(filePath) !== expectedSize) return false;
    return this.matchesHash(filePath, expectedHash);
  }

  async matchesHash(filePath: string, expectedHash: string): Promise<boolean> {
    try {
      const result = await verifyChecksum(filePath, expectedHash);
      if (result.status === "mismatch") {
        this.logger.debug(
          { path: filePath, expected: result.expected, actual: result.actual },
          "Hash mismatch",
        );
      } else if (result.status === "missing") {
        this.logger.debug({ path: filePath }, "Nothing to hash");
      }
      return result.status === "match";
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn({ path: filePath, error: message }, "Hashing failed");
      return false;
    }
  }

  remove(filePath: string): void {
    fs.rmSync(filePath, { force: true });
  }

  /**
   * Move a file to `destination`, creating parent directories.
   * Across devices the file is copied to a sibling temp name first so the
   * destination only ever appears complete.
   */
  moveInto(source: string, destination: string): void {
    fs.mkdirSync(path.dirname(destination), { recursive: true });
    try {
      fs.renameSync(source, destination);
    } catch (err: unknown) {
      if (!(err instanceof Error) || !("code" in err) || err.code !== "EXDEV") {
        throw err;
      }
      const partial = `${destination}.partial`;
      fs.copyFileSync(source, partial);
      fs.renameSync(partial, destination);
      fs.rmSync(source, { force: true });
    }
  }
}
