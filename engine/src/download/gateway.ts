/**
 * apkman Engine — Download Gateway Contract
 *
 * The orchestrator never transfers bytes itself. It queues and cancels
 * downloads by identity and listens to their lifecycle on `events`:
 *
 *   started → progress* → completed(localPath) | interrupted
 *
 * At most one terminal event is published per queued download.
 */

import { KeyedEventBus } from "../events";
import type { DownloadEvent, Identity } from "../types";

export interface DownloadGateway {
  readonly events: KeyedEventBus<DownloadEvent>;
  /** Queue a download; queuing an identity already queued or active is a no-op. */
  queue(identity: Identity): void;
  /** Cancel a queued or active download; a no-op when there is none. */
  cancel(identity: Identity): void;
  isQueuedOrActive(identity: Identity): boolean;
}
