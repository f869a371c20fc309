/**
 * apkman CLI — Settlement Watcher
 *
 * The engine never blocks on an install: it only moves records. A CLI run
 * has to exit, so it watches the identities it asked for until each one
 * settles. An identity settles when its record reaches Installed or
 * Error, when the record is removed (cancelled, dismissed, abandoned), or
 * when its download is interrupted, since nothing retries it.
 */

import type {
  Engine,
  Identity,
  StatusRecord,
  Subscription,
} from "@apkman/engine";

export type SettledOutcome = "installed" | "failed" | "removed" | "interrupted";

export interface Settlement {
  identity: Identity;
  outcome: SettledOutcome;
  message?: string;
}

export class SettlementWatcher {
  readonly settled: Promise<Settlement[]>;
  private identities: Identity[];
  private results = new Map<Identity, Settlement>();
  private subscriptions: Subscription[] = [];
  private resolve: (settlements: Settlement[]) => void = () => undefined;

  constructor(
    engine: Pick<Engine, "registry" | "orchestrator">,
    identities: Identity[],
    onUpdate?: (record: StatusRecord) => void,
  ) {
    this.identities = [...new Set(identities)];
    this.settled = new Promise((resolve) => {
      this.resolve = resolve;
    });

    const watched = new Set(this.identities);
    this.subscriptions.push(
      engine.registry.subscribe((change) => {
        if (change.type === "removed") {
          if (watched.has(change.identity)) {
            this.settle({ identity: change.identity, outcome: "removed" });
          }
          return;
        }
        const record = change.record;
        if (!watched.has(record.identity)) return;
        onUpdate?.(record);
        if (record.status === "Installed") {
          this.settle({ identity: record.identity, outcome: "installed" });
        } else if (record.status === "Error") {
          this.settle({
            identity: record.identity,
            outcome: "failed",
            message: record.errorMessage,
          });
        }
      }),
      engine.orchestrator.on((event) => {
        if (event.type !== "failure") return;
        const { category, identity, message } = event.data;
        if (
          category === "TRANSIENT_DOWNLOAD_FAILURE" &&
          identity !== undefined &&
          watched.has(identity)
        ) {
          this.settle({ identity, outcome: "interrupted", message });
        }
      }),
    );

    if (this.identities.length === 0) this.finish();
  }

  /** Identities still waiting to settle. */
  get pending(): Identity[] {
    return this.identities.filter((identity) => !this.results.has(identity));
  }

  dispose(): void {
    for (const subscription of this.subscriptions) subscription.dispose();
    this.subscriptions = [];
  }

  private settle(settlement: Settlement): void {
    if (this.results.has(settlement.identity)) return;
    this.results.set(settlement.identity, settlement);
    if (this.pending.length === 0) this.finish();
  }

  private finish(): void {
    this.dispose();
    this.resolve(
      this.identities.flatMap((identity) => {
        const result = this.results.get(identity);
        return result ? [result] : [];
      }),
    );
  }
}
