/**
 * apkman CLI — Request Files
 *
 * An install request is a YAML (or JSON) document:
 *
 *   url: https://repo.example.org/org.example.app_42.apk
 *   packageName: org.example.app
 *   versionCode: 42
 *   size: 1048576
 *   sha256: 3b1f...e0
 *   expansionFiles:
 *     main:
 *       url: https://repo.example.org/main.42.org.example.app.obb
 *       destination: /sdcard/Android/obb/org.example.app/main.42.org.example.app.obb
 *       sha256: 9c2d...41
 */

import * as fs from "fs";
import { parse as parseYaml } from "yaml";
import { parseInstallRequest } from "@apkman/engine";
import type { RequestValidation } from "@apkman/engine";

/**
 * Load and validate a request file.
 */
export function loadRequestFile(filePath: string): RequestValidation {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf-8");
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, errors: [`Cannot read ${filePath}: ${message}`] };
  }

  let data: unknown;
  try {
    data = parseYaml(text);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, errors: [`Invalid YAML in ${filePath}: ${message}`] };
  }

  return parseInstallRequest(data);
}
