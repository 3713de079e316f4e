import type { MarketGateway } from "../gateway/marketGateway";
import type { Instrument } from "../types/market";
import type { SystemModule, TypedEventBus } from "../types/module";
import { errorMessage } from "../utils/errors";
import { ScheduledTask } from "../utils/scheduledTask";

interface UniverseConfig {
  size: number;
  minLiquidityTier: number;
  refreshIntervalMs: number;
}

function byLiquidityThenId(a: Instrument, b: Instrument): number {
  if (a.liquidityTier !== b.liquidityTier) return b.liquidityTier - a.liquidityTier;
  if (a.id < b.id) return -1;
  if (a.id > b.id) return 1;
  return 0;
}

export class UniverseManager implements SystemModule {
  private current: readonly Instrument[] = [];
  private lastRefreshAt?: number;
  private readonly task: ScheduledTask;

  constructor(
    private readonly bus: TypedEventBus,
    private readonly gateway: MarketGateway,
    private readonly config: UniverseConfig
  ) {
    this.task = new ScheduledTask(bus, {
      name: "universe refresh",
      intervalMs: config.refreshIntervalMs,
      run: async () => {
        await this.refresh();
      }
    });
  }

  async start(): Promise<void> {
    await this.refresh();
    this.task.start();
  }

  async stop(): Promise<void> {
    this.task.stop();
    await this.task.idle();
  }

  instruments(): readonly Instrument[] {
    return this.current;
  }

  get refreshedAt(): number | undefined {
    return this.lastRefreshAt;
  }

  async refresh(): Promise<boolean> {
    let listed: Instrument[];
    try {
      listed = await this.gateway.listInstruments();
    } catch (error) {
      this.keepStale(`Universe refresh failed: ${errorMessage(error)}`);
      return false;
    }

    const next = listed
      .filter((i) => i.liquidityTier >= this.config.minLiquidityTier)
      .sort(byLiquidityThenId)
      .slice(0, this.config.size)
      .map((i) => Object.freeze({ id: i.id, minSize: i.minSize, liquidityTier: i.liquidityTier }));

    if (next.length === 0) {
      this.keepStale("Universe refresh returned no tradable instruments");
      return false;
    }

    this.current = Object.freeze(next);
    this.lastRefreshAt = Date.now();
    this.bus.emit("universe.refreshed", { instruments: this.current, stale: false, ts: this.lastRefreshAt });
    this.bus.log("INFO", `Universe ready: ${this.current.length} instruments`);
    return true;
  }

  private keepStale(reason: string): void {
    const suffix = this.current.length > 0 ? `keeping ${this.current.length} known instruments` : "universe is empty";
    this.bus.log("WARN", `${reason}; ${suffix}`);
    this.bus.emit("universe.refreshed", { instruments: this.current, stale: true, ts: Date.now() });
  }
}
