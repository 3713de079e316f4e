import { describe, expect, it } from "vitest";
import { PositionMonitor, exitReason } from "../src/modules/positionMonitor";
import { RiskManager } from "../src/modules/riskManager";
import { AccountLedger } from "../src/state/accountLedger";
import { RejectedByVenueError, TransientGatewayError } from "../src/utils/errors";
import { flush, noSleep, recordingBus } from "./support/bus";
import { FakeGateway, candlesFrom } from "./support/fakeGateway";
import { LIMITS, NOW, closeAt, openPosition, position } from "./support/fixtures";

function setup() {
  const recorder = recordingBus();
  const gateway = new FakeGateway();
  let now = NOW;
  const clock = () => now;
  const risk = new RiskManager(recorder.bus, new AccountLedger(100, NOW), LIMITS, clock);
  const monitor = new PositionMonitor(
    recorder.bus,
    gateway,
    risk,
    { maxHoldTimeSec: 300, retry: { attempts: 3, baseDelayMs: 0, maxDelayMs: 0, sleep: noSleep } },
    clock
  );
  return {
    ...recorder,
    gateway,
    risk,
    monitor,
    setPrice: (id: string, price: number) => gateway.setMarket(id, candlesFrom([price])),
    advance: (ms: number) => {
      now += ms;
    }
  };
}

describe("exitReason", () => {
  const long = position("p", { stopLoss: 99, takeProfit: 101.5 });
  const short = position("s", { direction: "short", stopLoss: 101, takeProfit: 98.5 });
  const holdMs = 300_000;

  it("checks forced, stop-loss, take-profit, then the time stop", () => {
    expect(exitReason({ ...long, forceClose: true }, 98, NOW, holdMs, false)).toBe("forced");
    expect(exitReason(long, 98, NOW + holdMs, holdMs, true)).toBe("forced");
    expect(exitReason(long, 99, NOW + holdMs, holdMs, false)).toBe("stop-loss");
    expect(exitReason(long, 101.5, NOW, holdMs, false)).toBe("take-profit");
    expect(exitReason(long, 100, NOW + holdMs, holdMs, false)).toBe("time-stop");
    expect(exitReason(long, 100, NOW + holdMs - 1, holdMs, false)).toBeUndefined();
  });

  it("mirrors the levels for shorts", () => {
    expect(exitReason(short, 101, NOW, holdMs, false)).toBe("stop-loss");
    expect(exitReason(short, 98.4, NOW, holdMs, false)).toBe("take-profit");
    expect(exitReason(short, 100, NOW, holdMs, false)).toBeUndefined();
  });

  it("never time-stops when the hold limit is zero", () => {
    expect(exitReason(long, 100, NOW + 10 * holdMs, 0, false)).toBeUndefined();
  });
});

describe("PositionMonitor", () => {
  it("marks positions and closes them on a stop-loss", async () => {
    const { monitor, risk, gateway, capture, setPrice } = setup();
    const marks = capture("position.marked");
    const opened = await openPosition(risk, "A", 0.6);
    setPrice("A", 98.5);
    gateway.exitPrices.set(opened.id, 98.5);

    await monitor.poll();
    await flush();

    expect(marks[0]).toMatchObject({ positionId: opened.id, price: 98.5 });
    expect(marks[0]?.unrealizedPnl).toBeCloseTo(-0.135, 10);
    const { positions, closedTrades } = risk.view();
    expect(positions).toHaveLength(0);
    expect(closedTrades[0]?.reason).toBe("stop-loss");
    expect(closedTrades[0]?.pnl).toBeCloseTo(-0.135, 10);
    expect(gateway.closeCalls).toEqual([opened.id]);
  });

  it("leaves a position alone while it is inside its levels", async () => {
    const { monitor, risk, gateway, setPrice } = setup();
    await openPosition(risk, "A", 0.6);
    setPrice("A", 100.5);

    await monitor.poll();

    expect(risk.view().positions[0]?.status).toBe("open");
    expect(gateway.closeCalls).toEqual([]);
  });

  it("closes positions held past the time limit", async () => {
    const { monitor, risk, setPrice, advance } = setup();
    await openPosition(risk, "A", 0.6);
    setPrice("A", 100);
    advance(300_000);

    await monitor.poll();

    expect(risk.view().closedTrades[0]?.reason).toBe("time-stop");
  });

  it("keeps a position whose price cannot be fetched for the next poll", async () => {
    const { monitor, risk, gateway, logs, setPrice } = setup();
    await openPosition(risk, "A", 0.6);
    setPrice("A", 90);
    gateway.marketFailures.set("A", [new TransientGatewayError("Timeout", "slow")]);

    await monitor.poll();
    await flush();

    expect(risk.view().positions[0]?.status).toBe("open");
    expect(logs.at(-1)?.message).toBe("No price for A (Timeout); will retry");
  });

  it("leaves a failed close in closing and retries it on the next poll", async () => {
    const { monitor, risk, gateway, logs, setPrice } = setup();
    const opened = await openPosition(risk, "A", 0.6);
    setPrice("A", 98);
    gateway.closeFailures.push(new RejectedByVenueError("Rejected", "venue busy"));

    await monitor.poll();
    await flush();

    expect(risk.view().positions[0]?.status).toBe("closing");
    expect(logs.at(-1)?.message).toBe(`Close of A ${opened.id} failed (Rejected venue busy); will retry`);

    setPrice("A", 101);
    await monitor.poll();

    expect(risk.view().positions).toHaveLength(0);
    expect(risk.view().closedTrades[0]?.reason).toBe("stop-loss");
    expect(gateway.closeCalls).toEqual([opened.id, opened.id]);
  });

  it("settles at the last mark when the venue already closed the position", async () => {
    const { monitor, risk, gateway, logs, setPrice } = setup();
    const opened = await openPosition(risk, "A", 0.6);
    setPrice("A", 102);
    gateway.closeFailures.push(new RejectedByVenueError("AlreadyClosed", "gone"));

    await monitor.poll();
    await flush();

    const trade = risk.view().closedTrades[0];
    expect(trade).toMatchObject({ exitPrice: 102, fee: 0, reason: "take-profit" });
    expect(trade?.pnl).toBeCloseTo(0.18, 10);
    expect(logs.map((l) => l.message)).toContain(`A ${opened.id} was already closed at the venue`);
  });

  it("force-closes every position once trading is halted", async () => {
    const { monitor, risk, gateway } = setup();
    const loser = await openPosition(risk, "A", 1);
    const survivor = await openPosition(risk, "B", 0.6);
    await closeAt(risk, loser.id, 0);
    expect(risk.state).toBe("halted");

    await monitor.poll();

    expect(gateway.marketCalls).toEqual([]);
    expect(risk.view().closedTrades.at(-1)).toMatchObject({ reason: "forced", position: { id: survivor.id } });
  });

  it("closes every position on close-all, including one already closing, without fetching prices", async () => {
    const { monitor, risk, gateway } = setup();
    const a = await openPosition(risk, "A", 0.6);
    await risk.beginClose(a.id);
    const b = await openPosition(risk, "B", 0.6);
    const before = risk.view().positions.map((p) => p.id);

    expect(await monitor.closeAll("shutdown")).toBe(true);

    expect(before).toEqual([a.id, b.id]);
    expect(gateway.marketCalls).toEqual([]);
    expect(risk.view().closedTrades.map((t) => t.reason)).toEqual(["shutdown", "shutdown"]);
  });

  it("reports positions it could not close after every round", async () => {
    const { monitor, risk, gateway, logs } = setup();
    await openPosition(risk, "A", 0.6);
    gateway.closeFailures.push(
      ...[1, 2, 3].map(() => new RejectedByVenueError("Rejected", "venue busy"))
    );

    expect(await monitor.closeAll("shutdown")).toBe(false);
    await flush();

    expect(gateway.closeCalls).toHaveLength(3);
    expect(logs.at(-1)).toMatchObject({ level: "ERROR", message: "1 position(s) still open after close-all" });
  });

  it("closes a single position on request", async () => {
    const { monitor, risk } = setup();
    const opened = await openPosition(risk, "A", 0.6);

    expect(await monitor.closeOne("missing", "manual")).toBe(false);
    expect(await monitor.closeOne(opened.id, "manual")).toBe(true);
    expect(risk.view().closedTrades[0]?.reason).toBe("manual");
  });
});
