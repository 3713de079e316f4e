import type { RuntimeConfig } from "../config/config";
import type { MarketGateway } from "../gateway/marketGateway";
import { AccountLedger } from "../state/accountLedger";
import { rankOpportunities, scoreFeatures } from "../strategy/scorer";
import type { BalanceReconciledEvent, ScanCompletedEvent } from "../types/events";
import type { Opportunity } from "../types/market";
import type { SystemModule, TypedEventBus } from "../types/module";
import type { PerformanceSnapshot } from "../types/performance";
import type { Position } from "../types/portfolio";
import { errorMessage } from "../utils/errors";
import { rootCause, sleep, withRetry, withTimeout, type RetryOptions } from "../utils/retry";
import { ScheduledTask } from "../utils/scheduledTask";
import { ExecutionCoordinator } from "./executionCoordinator";
import { PerformanceTracker } from "./performanceTracker";
import { PositionMonitor } from "./positionMonitor";
import { RiskManager } from "./riskManager";
import { Scanner, type ScanStats } from "./scanner";
import { UniverseManager } from "./universeManager";

export interface SchedulerOptions {
  clock?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

type GatewayRetry = Pick<RetryOptions, "attempts" | "baseDelayMs" | "maxDelayMs" | "sleep">;

export class Scheduler implements SystemModule {
  readonly risk: RiskManager;
  readonly universe: UniverseManager;
  readonly scanner: Scanner;
  readonly execution: ExecutionCoordinator;
  readonly monitor: PositionMonitor;
  readonly tracker: PerformanceTracker;

  private readonly ledger: AccountLedger;
  private readonly scanTask: ScheduledTask;
  private readonly monitorTask: ScheduledTask;
  private readonly balanceTask: ScheduledTask;
  private readonly retry: GatewayRetry;
  private readonly clock: () => number;
  private running = false;
  private stopping = false;
  private scanning = true;
  private lastCycle?: ScanCompletedEvent;

  constructor(
    private readonly bus: TypedEventBus,
    private readonly gateway: MarketGateway,
    private readonly config: RuntimeConfig,
    options: SchedulerOptions = {}
  ) {
    this.clock = options.clock ?? Date.now;
    const retry: GatewayRetry = { ...config.retry, sleep: options.sleep ?? sleep };
    this.retry = retry;

    this.ledger = new AccountLedger(config.initialCapital, this.clock());
    this.risk = new RiskManager(bus, this.ledger, config.risk, this.clock);
    this.universe = new UniverseManager(bus, gateway, {
      size: config.universe.size,
      minLiquidityTier: config.universe.minLiquidityTier,
      refreshIntervalMs: config.schedule.universeRefreshIntervalMs
    });
    this.scanner = new Scanner(bus, gateway, { minCandles: config.scoring.minCandles, retry });
    this.execution = new ExecutionCoordinator(bus, gateway, this.risk, {
      scalpTakeProfit: config.risk.scalpTakeProfit,
      scalpStopLoss: config.risk.scalpStopLoss,
      retry
    });
    this.monitor = new PositionMonitor(
      bus,
      gateway,
      this.risk,
      { maxHoldTimeSec: config.risk.maxHoldTimeSec, retry },
      this.clock
    );
    this.tracker = new PerformanceTracker(
      bus,
      this.risk,
      {
        initialCapital: config.initialCapital,
        snapshotIntervalMs: config.schedule.snapshotIntervalMs,
        historyLimit: config.performance.historyLimit
      },
      this.clock
    );

    this.scanTask = new ScheduledTask(bus, {
      name: "scan cycle",
      intervalMs: config.schedule.scanIntervalMs,
      run: async () => {
        await this.runCycle();
      }
    });
    this.monitorTask = new ScheduledTask(bus, {
      name: "position monitor",
      intervalMs: config.schedule.monitorIntervalMs,
      run: async () => {
        await this.risk.rollDay(this.clock());
        await this.monitor.poll();
      }
    });
    this.balanceTask = new ScheduledTask(bus, {
      name: "balance reconcile",
      intervalMs: config.schedule.balanceSyncIntervalMs,
      run: async () => {
        await this.reconcileBalance();
      }
    });
  }

  get isRunning(): boolean {
    return this.running;
  }

  get isScanning(): boolean {
    return this.scanning && !this.stopping;
  }

  get latestCycle(): ScanCompletedEvent | undefined {
    return this.lastCycle;
  }

  async start(): Promise<void> {
    if (this.running) return;

    try {
      const balance = await this.gateway.getBalance();
      await this.risk.seed(balance);
      this.bus.log("INFO", `Account balance ${balance.toFixed(2)}`);
    } catch (error) {
      this.bus.log("WARN", `Balance query failed (${errorMessage(error)}); using initial capital`);
    }

    await this.universe.start();
    this.monitorTask.start();
    this.scanTask.start();
    this.balanceTask.start();
    this.tracker.start();
    this.running = true;
    this.publishState();
    this.bus.log(
      "INFO",
      `Scheduler started: scan every ${this.config.schedule.scanIntervalMs / 1000}s, ` +
        `monitor every ${this.config.schedule.monitorIntervalMs / 1000}s`
    );
  }

  // One deadline covers the whole shutdown; whatever is still pending when it passes is abandoned.
  async stop(): Promise<void> {
    if (!this.running || this.stopping) return;
    this.stopping = true;
    this.publishState();
    this.bus.log("INFO", "Shutting down: waiting for in-flight work");

    const deadline = Date.now() + this.config.schedule.shutdownTimeoutMs;
    const drain = async (what: string, work: Promise<void>): Promise<void> => {
      const done = await withTimeout(
        work.then(() => true),
        Math.max(0, deadline - Date.now())
      );
      if (done !== true) this.bus.log("ERROR", `Shutdown deadline passed; abandoned the ${what}`);
    };

    this.scanTask.stop();
    this.balanceTask.stop();
    await drain("universe refresh", this.universe.stop());
    await drain("scan cycle", this.scanTask.idle());
    await drain("balance reconcile", this.balanceTask.idle());
    this.monitorTask.stop();
    await drain("position monitor", this.monitorTask.idle());

    const closed = await withTimeout(this.monitor.closeAll("shutdown"), Math.max(0, deadline - Date.now()));
    if (closed !== true) {
      const open = this.risk.view().positions.map((p) => p.id);
      if (open.length > 0) {
        this.bus.log("ERROR", `Shutdown abandoned ${open.length} open position(s): ${open.join(", ")}`);
      }
    }

    this.tracker.stop();
    this.tracker.snapshot();
    this.running = false;
    this.publishState();
    this.bus.log("INFO", "Scheduler stopped");
  }

  pause(): void {
    this.scanning = false;
    this.publishState();
    this.bus.log("INFO", "Scanning paused");
  }

  resume(): void {
    this.scanning = true;
    this.publishState();
    this.bus.log("INFO", "Scanning resumed");
  }

  runCycleNow(): Promise<void> {
    return this.scanTask.trigger();
  }

  pollNow(): Promise<void> {
    return this.monitorTask.trigger();
  }

  closePosition(positionId: string): Promise<boolean> {
    return this.monitor.closeOne(positionId, "manual");
  }

  closeAll(): Promise<boolean> {
    return this.monitor.closeAll("manual");
  }

  resetCircuitBreaker(): Promise<boolean> {
    return this.risk.resetCircuitBreaker();
  }

  snapshot(): PerformanceSnapshot {
    return this.tracker.snapshot();
  }

  async idle(): Promise<void> {
    await Promise.all([this.scanTask.idle(), this.monitorTask.idle(), this.balanceTask.idle()]);
  }

  async reconcileBalance(): Promise<BalanceReconciledEvent | undefined> {
    const before = this.risk.view();
    if (before.positions.some((p) => p.status === "closing")) return undefined;

    let venueBalance: number;
    try {
      const { value } = await withRetry(() => this.gateway.getBalance(), this.retry);
      venueBalance = value;
    } catch (error) {
      this.bus.log("WARN", `Balance query failed (${errorMessage(rootCause(error))}); keeping the ledger balance`);
      return undefined;
    }
    return this.risk.reconcileBalance(venueBalance, this.config.balanceTolerance, before.tradeStats.count);
  }

  // Sequential admission: each approved order is reserved before the next candidate is gated.
  async runCycle(): Promise<ScanCompletedEvent | undefined> {
    if (this.stopping || !this.scanning) return undefined;
    if (this.risk.state !== "normal") {
      this.bus.log("WARN", `Trading paused by risk state '${this.risk.state}'; cycle skipped`);
      return undefined;
    }

    const cycleTs = this.clock();
    const started = Date.now();
    const stats: ScanStats = { scanned: 0, skipped: 0 };
    const candidates: Opportunity[] = [];

    for await (const result of this.scanner.scan(this.universe.instruments(), stats)) {
      const opportunity = scoreFeatures(result.instrument, result.features, cycleTs);
      if (opportunity) candidates.push(opportunity);
    }

    const ranked = rankOpportunities(candidates, this.config.scoring.minConfidence);
    const submissions: Promise<Position | undefined>[] = [];
    let approved = 0;

    for (const opportunity of ranked) {
      if (this.stopping) break;
      const id = opportunity.instrument.id;
      if (this.risk.hasExposure(id) || this.execution.isInFlight(id)) continue;

      const decision = await this.risk.admit(opportunity);
      if (decision.kind === "rejected") {
        // Only a size rejection depends on the candidate; the rest hold for the whole cycle.
        if (decision.reason === "SizeBelowMinimum") continue;
        break;
      }
      approved += 1;
      submissions.push(this.execution.submit(opportunity, decision, cycleTs));
    }

    const results = await Promise.all(submissions);
    const event: ScanCompletedEvent = {
      cycleTs,
      scanned: stats.scanned,
      skipped: stats.skipped,
      ranked,
      approved,
      submitted: submissions.length,
      filled: results.filter((p) => p !== undefined).length,
      durationMs: Date.now() - started
    };
    this.lastCycle = event;
    this.bus.emit("scan.completed", event);
    this.bus.log(
      "INFO",
      `Scan: ${event.scanned} scanned, ${event.skipped} skipped, ${ranked.length} ranked, ` +
        `${event.approved} approved, ${event.filled} filled`
    );
    return event;
  }

  private publishState(): void {
    this.bus.emit("scheduler.state", {
      running: this.running && !this.stopping,
      scanning: this.isScanning,
      ts: this.clock()
    });
  }
}
