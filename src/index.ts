import React from "react";
import { render, type Instance } from "ink";
import { ModuleRegistry } from "./boot/moduleRegistry";
import { loadConfig, type RuntimeConfig } from "./config/config";
import { PaperGateway, loadPaperInstruments } from "./gateway/paperGateway";
import { ConsoleLogger } from "./modules/consoleLogger";
import { EventJournal } from "./modules/eventJournal";
import { Scheduler } from "./modules/scheduler";
import { App } from "./ui/App";
import { ConfigurationError, errorMessage } from "./utils/errors";

function readConfig(): RuntimeConfig {
  try {
    return loadConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error("Invalid configuration:");
      for (const issue of error.issues) console.error(`  - ${issue}`);
      process.exit(1);
    }
    throw error;
  }
}

async function bootstrap(): Promise<void> {
  const config = readConfig();
  const registry = new ModuleRegistry();

  const gateway = new PaperGateway({
    instruments: loadPaperInstruments(),
    initialBalance: config.initialCapital,
    takerFee: config.paper.takerFee,
    latencyMs: config.paper.latencyMs
  });

  const scheduler = new Scheduler(registry, gateway, config);
  const journal = new EventJournal(registry, config.journal);

  // Stopped in reverse, so the journal outlives the scheduler's shutdown logs.
  registry.register("journal", journal);
  if (config.ui.headless) registry.register("console", new ConsoleLogger(registry));
  registry.register("scheduler", scheduler);

  let ink: Instance | undefined;
  let shuttingDown = false;
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    registry.log("INFO", "Shutting down...");
    try {
      await registry.stopAll();
    } finally {
      ink?.unmount();
      process.exit(0);
    }
  };

  // A second signal while shutdown is running exits at once.
  const onSignal = (): void => {
    if (shuttingDown) {
      console.error("Forced exit: shutdown did not finish");
      process.exit(130);
    }
    void shutdown();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  if (!config.ui.headless) {
    ink = render(React.createElement(App, { bus: registry, scheduler, config }));
    void ink.waitUntilExit().then(shutdown);
  }

  await registry.startAll();
  if (!shuttingDown) await scheduler.runCycleNow();
}

bootstrap().catch((error: unknown) => {
  console.error(`Fatal: ${errorMessage(error)}`);
  process.exit(1);
});
