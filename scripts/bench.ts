import { ModuleRegistry } from "../src/boot/moduleRegistry";
import { loadConfig } from "../src/config/config";
import { PaperGateway, loadPaperInstruments } from "../src/gateway/paperGateway";
import { Scheduler } from "../src/modules/scheduler";

// Times full scan cycles against the paper venue with no simulated latency.
async function main(): Promise<void> {
  const config = loadConfig(process.env, { journalEnabled: false, retryBaseDelayMs: 0 });
  const registry = new ModuleRegistry();
  const gateway = new PaperGateway({
    instruments: loadPaperInstruments(),
    initialBalance: config.initialCapital,
    takerFee: config.paper.takerFee,
    latencyMs: 0
  });
  const scheduler = new Scheduler(registry, gateway, config);
  await scheduler.universe.refresh();

  const cycles = Number(process.argv[2] ?? "20");
  const durations: number[] = [];
  let filled = 0;

  for (let i = 0; i < cycles; i++) {
    const started = performance.now();
    const event = await scheduler.runCycle();
    durations.push(performance.now() - started);
    filled += event?.filled ?? 0;
    await scheduler.pollNow();
  }

  durations.sort((a, b) => a - b);
  const p50 = durations[Math.floor(durations.length * 0.5)] ?? 0;
  const p99 = durations[Math.min(durations.length - 1, Math.floor(durations.length * 0.99))] ?? 0;
  console.log(
    `bench: cycles=${cycles} instruments=${scheduler.universe.instruments().length} filled=${filled} ` +
      `p50Ms=${p50.toFixed(2)} p99Ms=${p99.toFixed(2)}`
  );
  await scheduler.monitor.closeAll("shutdown");
}

void main();
