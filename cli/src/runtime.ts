/**
 * apkman CLI — Runtime
 *
 * Builds the engine stack for one CLI run: state database, command
 * installer, HTTPS gateway, and a registry seeded from the database and
 * mirrored back into it.
 */

import {
  CommandInstaller,
  createEngine,
  createLogger,
  parseCommandTemplate,
} from "@apkman/engine";
import type { Engine, Subscription } from "@apkman/engine";
import { getEngineOptions, loadConfig } from "./config";
import type { CliConfig } from "./config";
import { StateDB } from "./state-db";

export interface Runtime {
  config: CliConfig;
  engine: Engine;
  db: StateDB;
  close(): void;
}

export async function openRuntime(
  opts: { verbose: boolean },
  config: CliConfig = loadConfig(),
): Promise<Runtime> {
  const engineOptions = getEngineOptions(config, opts.verbose);
  const logger = createLogger({
    level: engineOptions.verbose ? "debug" : "silent",
    name: "apkman",
  });

  const db = new StateDB(config.paths.stateDb, logger);
  await db.init();

  const installer = new CommandInstaller(
    parseCommandTemplate(config.installCommand),
    logger,
  );
  const engine = createEngine(engineOptions, {
    installer,
    ledger: db,
    logger,
    gatewayOptions: { concurrency: config.concurrency },
  });

  for (const record of db.listRecords()) {
    engine.registry.seed(record);
  }
  const mirror: Subscription = db.mirror(engine.registry);

  return {
    config,
    engine,
    db,
    close() {
      mirror.dispose();
      engine.close();
      db.close();
    },
  };
}
