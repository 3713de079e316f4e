import type { SystemModule, TypedEventBus } from "../types/module";
import type { PerformanceSnapshot } from "../types/performance";
import type { AccountView } from "../types/portfolio";
import { round } from "../utils/math";
import { ScheduledTask } from "../utils/scheduledTask";
import type { RiskManager } from "./riskManager";

interface PerformanceConfig {
  initialCapital: number;
  snapshotIntervalMs: number;
  historyLimit: number;
}

export function computeSnapshot(view: AccountView, initialCapital: number, ts: number): PerformanceSnapshot {
  const { count, wins, totalPnl } = view.tradeStats;
  const balance = view.account.balance;

  return Object.freeze({
    balance: round(balance, 2),
    growthPct: round(((balance - initialCapital) / initialCapital) * 100, 2),
    tradeCount: count,
    winRate: count === 0 ? 0 : round(wins / count, 4),
    totalPnl: round(totalPnl, 2),
    openPositions: view.positions.length,
    riskState: view.riskState,
    ts
  });
}

export function formatSnapshot(s: PerformanceSnapshot): string {
  const sign = s.growthPct >= 0 ? "+" : "";
  return (
    `Performance: balance ${s.balance.toFixed(2)} (${sign}${s.growthPct.toFixed(2)}%) | ` +
    `trades ${s.tradeCount} | win ${(s.winRate * 100).toFixed(1)}% | ` +
    `pnl ${s.totalPnl.toFixed(2)} | open ${s.openPositions} | ${s.riskState}`
  );
}

// The journal keeps every snapshot; memory holds only the latest `historyLimit`.
export class PerformanceTracker implements SystemModule {
  private readonly task: ScheduledTask;
  private readonly snapshots: PerformanceSnapshot[] = [];

  constructor(
    private readonly bus: TypedEventBus,
    private readonly risk: RiskManager,
    private readonly config: PerformanceConfig,
    private readonly clock: () => number = Date.now
  ) {
    this.task = new ScheduledTask(bus, {
      name: "performance snapshot",
      intervalMs: config.snapshotIntervalMs,
      run: async () => {
        this.snapshot();
      }
    });
  }

  start(): void {
    this.task.start();
  }

  stop(): void {
    this.task.stop();
  }

  get history(): readonly PerformanceSnapshot[] {
    return this.snapshots;
  }

  snapshot(): PerformanceSnapshot {
    const snap = computeSnapshot(this.risk.view(), this.config.initialCapital, this.clock());
    this.snapshots.push(snap);
    if (this.snapshots.length > this.config.historyLimit) this.snapshots.shift();
    this.bus.emit("performance.snapshot", snap);
    this.bus.log("INFO", formatSnapshot(snap));
    return snap;
  }
}
