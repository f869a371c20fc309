/**
 * apkman Engine — Install Request Validation Tests
 */

import { describe, it, expect } from "vitest";
import { parseInstallRequest } from "../src/schemas";

const HASH = "ab".repeat(32);

const valid = {
  url: "https://x/app-1.apk",
  packageName: "org.example.app",
  versionCode: 1,
  size: 1000,
  sha256: HASH,
};

describe("parseInstallRequest", () => {
  it("accepts a minimal request", () => {
    const result = parseInstallRequest(valid);
    expect(result).toEqual({ ok: true, request: valid });
  });

  it("normalizes the hash and trims the package name", () => {
    const result = parseInstallRequest({
      ...valid,
      packageName: "  org.example.app ",
      sha256: ` ${HASH.toUpperCase()} `,
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.request.sha256).toBe(HASH);
    expect(result.request.packageName).toBe("org.example.app");
  });

  it("returns a frozen request including expansion files", () => {
    const result = parseInstallRequest({
      ...valid,
      expansionFiles: {
        main: {
          url: "https://x/main.1.org.example.app.obb",
          destination: "/storage/obb/org.example.app/main.1.org.example.app.obb",
          sha256: HASH,
        },
      },
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(Object.isFrozen(result.request)).toBe(true);
    expect(Object.isFrozen(result.request.expansionFiles)).toBe(true);
    expect(Object.isFrozen(result.request.expansionFiles?.main)).toBe(true);
    expect(result.request.expansionFiles?.patch).toBeUndefined();
  });

  it("rejects URLs that are not https", () => {
    expect(parseInstallRequest({ ...valid, url: "ftp://x/app-1.apk" })).toEqual({
      ok: false,
      errors: ["url: must be an https URL"],
    });
    expect(parseInstallRequest({ ...valid, url: "http://x/app-1.apk" })).toEqual({
      ok: false,
      errors: ["url: must be an https URL"],
    });
  });

  it("rejects a hash that is not 64 hex characters", () => {
    expect(parseInstallRequest({ ...valid, sha256: "abc" })).toEqual({
      ok: false,
      errors: ["sha256: must be 64 hex characters"],
    });
  });

  it("rejects a relative expansion destination", () => {
    const result = parseInstallRequest({
      ...valid,
      expansionFiles: {
        patch: { url: "https://x/patch.obb", destination: "obb/patch.obb", sha256: HASH },
      },
    });
    expect(result).toEqual({
      ok: false,
      errors: ["expansionFiles.patch.destination: must be an absolute path"],
    });
  });

  it("lists every problem with its path", () => {
    const result = parseInstallRequest({ ...valid, size: -1, versionCode: 1.5 });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.errors).toHaveLength(2);
    expect(result.errors.some((e) => e.startsWith("size: "))).toBe(true);
    expect(result.errors.some((e) => e.startsWith("versionCode: "))).toBe(true);
  });

  it("reports non-object input at the root", () => {
    const result = parseInstallRequest("https://x/app-1.apk");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].startsWith("(root): ")).toBe(true);
  });
});
