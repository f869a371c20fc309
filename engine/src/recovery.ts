/**
 * apkman Engine — Recovery Scanner
 *
 * A file may have finished downloading in an earlier process lifetime
 * while the user has not acted on it yet. On an explicit cold-start
 * trigger the orchestrator re-attaches installer listeners for every such
 * record, so a later install is observed exactly like a fresh one.
 */

import { StatusRegistry } from "./status-registry";
import type { StatusRecord } from "./types";

export function findPendingInstalls(registry: StatusRegistry): StatusRecord[] {
  return registry
    .listAll()
    .filter((record) => record.status === "ReadyToInstall");
}
