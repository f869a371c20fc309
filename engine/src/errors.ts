/**
 * apkman Engine — Errors
 *
 * Expected failures (interrupted downloads, hash mismatches, installer
 * errors) are never thrown: they end up on the Status Record and as
 * "failure" engine events. EngineError marks a broken contract, such as
 * an event kind nobody handles; it aborts the handling of that one event
 * and is reported under its category.
 */

import type { FailureCategory } from "./types";

export class EngineError extends Error {
  readonly category: FailureCategory;

  constructor(message: string, category: FailureCategory) {
    super(message);
    this.name = "EngineError";
    this.category = category;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
