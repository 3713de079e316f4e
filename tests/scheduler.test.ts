import { afterEach, describe, expect, it, vi } from "vitest";
import { loadConfig, type SettingsInput } from "../src/config/config";
import { Scheduler } from "../src/modules/scheduler";
import { flush, noSleep, recordingBus } from "./support/bus";
import { FakeGateway, candlesFrom, instrument, risingCloses } from "./support/fakeGateway";
import { DAY_MS, NOW, closeAt, openPosition } from "./support/fixtures";

const IDS = Array.from({ length: 12 }, (_, i) => `I${String(i + 1).padStart(2, "0")}`);

function setup(overrides: SettingsInput = {}, clock: () => number = () => NOW) {
  const recorder = recordingBus();
  const gateway = new FakeGateway();
  gateway.instruments = IDS.map((id) => instrument(id));
  // Same uptrend everywhere; a wider range per instrument raises volatility and so the score.
  IDS.forEach((id, i) => gateway.setMarket(id, candlesFrom(risingCloses(30), 0.0005 * (i + 1))));

  const config = loadConfig({}, { minConfidence: 0, retryBaseDelayMs: 0, journalEnabled: false, ...overrides });
  const scheduler = new Scheduler(recorder.bus, gateway, config, { clock, sleep: noSleep });
  return { ...recorder, gateway, config, scheduler };
}

const TOP_EIGHT = ["I12", "I11", "I10", "I09", "I08", "I07", "I06", "I05"];

afterEach(() => {
  vi.useRealTimers();
});

describe("Scheduler", () => {
  it("submits the best opportunities in rank order up to the concurrency cap", async () => {
    const { scheduler, gateway, capture } = setup();
    const completed = capture("scan.completed");
    await scheduler.universe.refresh();

    const cycle = await scheduler.runCycle();
    await flush();

    expect(cycle?.ranked.map((o) => o.instrument.id)).toEqual([...IDS].reverse());
    expect(gateway.orderCalls.map((r) => r.instrument)).toEqual([
      "I12",
      "I11",
      "I10",
      "I09",
      "I08",
      "I07",
      "I06",
      "I05"
    ]);
    expect(gateway.orderCalls.every((r) => r.clientOrderId === `${r.instrument}:${NOW}` && r.size === 7.5)).toBe(
      true
    );
    expect(cycle).toMatchObject({ scanned: 12, skipped: 0, approved: 8, submitted: 8, filled: 8 });
    expect(completed).toEqual([cycle]);
    expect(scheduler.risk.view().positions).toHaveLength(8);
    expect(scheduler.latestCycle).toBe(cycle);
  });

  it("does not add to instruments it already holds", async () => {
    const { scheduler, gateway } = setup();
    await scheduler.universe.refresh();
    await scheduler.runCycle();

    const second = await scheduler.runCycle();

    expect(second?.approved).toBe(0);
    expect(gateway.orderCalls).toHaveLength(8);
  });

  it("skips the cycle while paused or outside the normal risk state", async () => {
    const { scheduler, gateway, logs } = setup();
    await scheduler.universe.refresh();

    scheduler.pause();
    expect(await scheduler.runCycle()).toBeUndefined();
    expect(gateway.marketCalls).toEqual([]);
    scheduler.resume();

    const loser = await openPosition(scheduler.risk, "I01", 1);
    await closeAt(scheduler.risk, loser.id, 0);
    expect(await scheduler.runCycle()).toBeUndefined();
    await flush();

    expect(gateway.marketCalls).toEqual([]);
    expect(logs.at(-1)?.message).toBe("Trading paused by risk state 'halted'; cycle skipped");
  });

  it("seeds from the venue balance and closes everything on stop", async () => {
    const { scheduler, gateway } = setup();
    gateway.balance = 250;

    await scheduler.start();
    expect(scheduler.isRunning).toBe(true);
    expect(scheduler.risk.view().account.balance).toBe(250);
    expect(scheduler.universe.instruments()).toHaveLength(12);

    await scheduler.runCycleNow();
    expect(scheduler.risk.view().positions).toHaveLength(8);

    await scheduler.stop();

    expect(scheduler.isRunning).toBe(false);
    expect(scheduler.risk.view().positions).toHaveLength(0);
    expect(scheduler.risk.view().closedTrades.every((t) => t.reason === "shutdown")).toBe(true);
    expect(scheduler.tracker.history.at(-1)).toMatchObject({ openPositions: 0, tradeCount: 8 });
  });

  it("stops admitting when a monitor close halts trading in the middle of a scan", async () => {
    const { scheduler, gateway, capture } = setup();
    await scheduler.universe.refresh();
    const loser = await openPosition(scheduler.risk, "X", 1);
    gateway.setMarket("X", candlesFrom([20]));
    gateway.exitPrices.set(loser.id, 0);
    const decisions = capture("risk.decision");
    const release = gateway.hold("I06");

    const cycle = scheduler.runCycleNow();
    await vi.waitFor(() => expect(gateway.marketCalls).toContain("I06"));

    await scheduler.pollNow();
    expect(scheduler.risk.state).toBe("halted");

    release();
    await cycle;
    await flush();

    expect(scheduler.latestCycle).toMatchObject({ scanned: 12, approved: 0, submitted: 0, filled: 0 });
    expect(gateway.orderCalls).toEqual([]);
    expect(decisions.map((d) => d.decision)).toEqual([{ kind: "rejected", reason: "CircuitBreakerHalted" }]);
  });

  it("drives the monitor and the scan on their own timers, rolling the trading day before each poll", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(NOW);
    let offset = 0;
    const { scheduler, gateway, config } = setup({}, () => Date.now() + offset);
    const monitorMs = config.schedule.monitorIntervalMs;

    await scheduler.start();
    gateway.balance = 88;
    const loser = await openPosition(scheduler.risk, "X", 1);
    gateway.setMarket("X", candlesFrom([20]));
    gateway.exitPrices.set(loser.id, 20);

    await vi.advanceTimersByTimeAsync(monitorMs);
    await scheduler.idle();
    expect(gateway.closeCalls).toEqual([loser.id]);
    expect(scheduler.risk.view().account.balance).toBe(88);
    expect(scheduler.risk.state).toBe("day-limit");

    offset = DAY_MS;
    await vi.advanceTimersByTimeAsync(monitorMs);
    await scheduler.idle();
    expect(scheduler.risk.state).toBe("normal");
    expect(scheduler.risk.view().account.tradingDay).toBe("2024-01-16");
    expect(gateway.orderCalls).toEqual([]);

    await vi.advanceTimersByTimeAsync(config.schedule.scanIntervalMs - 2 * monitorMs);
    await scheduler.idle();
    expect(gateway.orderCalls.map((r) => r.instrument)).toEqual(TOP_EIGHT);
    expect(scheduler.risk.view().positions).toHaveLength(8);
  });

  it("abandons a scan cycle stuck on the venue once the shutdown deadline passes", async () => {
    const { scheduler, gateway, logs } = setup({ shutdownTimeout: 0.2 });
    gateway.hold("I03");
    await scheduler.start();

    void scheduler.runCycleNow();
    await vi.waitFor(() => expect(gateway.marketCalls).toContain("I03"));
    await scheduler.stop();
    await flush();

    expect(scheduler.isRunning).toBe(false);
    expect(logs.filter((l) => l.level === "ERROR").map((l) => l.message)).toEqual([
      "Shutdown deadline passed; abandoned the scan cycle"
    ]);
    expect(logs.at(-1)?.message).toBe("Scheduler stopped");
  });

  it("stops within the deadline when closes are never confirmed", async () => {
    const { scheduler, gateway, logs } = setup({ shutdownTimeout: 0.2 });
    await scheduler.start();
    await scheduler.runCycleNow();
    gateway.hangCloses = true;

    await scheduler.stop();
    await flush();

    const { positions } = scheduler.risk.view();
    expect(scheduler.isRunning).toBe(false);
    expect(positions).toHaveLength(8);
    expect(positions.every((p) => p.status === "closing")).toBe(true);
    expect(gateway.closeCalls).toHaveLength(8);
    const errors = logs.filter((l) => l.level === "ERROR").map((l) => l.message);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatch(/^Shutdown abandoned 8 open position\(s\): pos-\d, /);
  });
});

describe("Scheduler balance reconcile", () => {
  it("adopts the venue balance when it drifts past the tolerance", async () => {
    const { scheduler, gateway, logs, capture } = setup();
    const reconciled = capture("balance.reconciled");
    await scheduler.start();
    gateway.balance = 97;

    const result = await scheduler.reconcileBalance();
    await flush();

    expect(result).toEqual({ ledgerBalance: 100, venueBalance: 97, drift: -3, adjusted: true, ts: NOW });
    expect(reconciled).toEqual([result]);
    expect(scheduler.risk.view().account.balance).toBe(97);
    expect(scheduler.risk.state).toBe("normal");
    expect(logs.at(-1)?.message).toBe("Venue balance 97.00 differs from ledger 100.00 by -3.00; using the venue balance");
  });

  it("records but keeps the ledger balance within the tolerance", async () => {
    const { scheduler, gateway } = setup();
    await scheduler.start();
    gateway.balance = 100.005;

    const result = await scheduler.reconcileBalance();

    expect(result?.adjusted).toBe(false);
    expect(result?.venueBalance).toBe(100.005);
    expect(scheduler.risk.view().account.balance).toBe(100);
  });

  it("halts when the adopted balance breaches the breaker", async () => {
    const { scheduler, gateway } = setup();
    await scheduler.start();
    gateway.balance = 80;

    await scheduler.reconcileBalance();

    expect(scheduler.risk.state).toBe("halted");
  });

  it("skips while a close is pending or a trade settled after the read", async () => {
    const { scheduler, gateway } = setup();
    await scheduler.start();
    const open = await openPosition(scheduler.risk, "X", 1);
    await scheduler.risk.beginClose(open.id);
    gateway.balance = 50;

    expect(await scheduler.reconcileBalance()).toBeUndefined();
    expect(await scheduler.risk.reconcileBalance(50, 0.01, 1)).toBeUndefined();
    expect(scheduler.risk.view().account.balance).toBe(100);
  });
});
