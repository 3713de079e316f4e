import React, { useEffect, useState } from "react";
import { Box, Text, useInput, useStdout } from "ink";
import type { RuntimeConfig } from "../config/config";
import type { Scheduler } from "../modules/scheduler";
import type { LogEvent, ScanCompletedEvent } from "../types/events";
import type { TypedEventBus } from "../types/module";
import type { PerformanceSnapshot } from "../types/performance";
import type { AccountView, PositionMark } from "../types/portfolio";
import type { RiskState } from "../types/risk";
import { errorMessage } from "../utils/errors";
import { ActiveTradesPanel } from "./ActiveTradesPanel";
import { CommandPalette } from "./CommandPalette";
import { COMMANDS, executeCommand, parseCommand } from "./commands";
import { OpportunitiesPanel } from "./OpportunitiesPanel";
import { PerformancePanel } from "./PerformancePanel";

interface AppProps {
  bus: TypedEventBus;
  scheduler: Scheduler;
  config: RuntimeConfig;
}

const RISK_COLORS: Record<RiskState, string> = { normal: "green", "day-limit": "yellow", halted: "red" };

function appendBounded<T>(prev: readonly T[], item: T, limit: number): T[] {
  const next = [...prev, item];
  return next.length > limit ? next.slice(next.length - limit) : next;
}

export function App({ bus, scheduler, config }: AppProps): React.JSX.Element {
  const { stdout } = useStdout();
  const contentWidth = Math.max(100, (stdout.columns ?? 120) - 1);
  const rowGap = 1;
  const topLeftWidth = Math.floor((contentWidth - rowGap) * 0.45);
  const topRightWidth = contentWidth - rowGap - topLeftWidth;
  const bottomLeftWidth = Math.floor((contentWidth - rowGap) * 0.35);
  const bottomRightWidth = contentWidth - rowGap - bottomLeftWidth;

  const [view, setView] = useState<AccountView>(() => scheduler.risk.view());
  const [marks, setMarks] = useState<ReadonlyMap<string, PositionMark>>(new Map());
  const [cycle, setCycle] = useState<ScanCompletedEvent | undefined>(scheduler.latestCycle);
  const [universe, setUniverse] = useState({ size: scheduler.universe.instruments().length, stale: false });
  const [snapshot, setSnapshot] = useState<PerformanceSnapshot | undefined>(scheduler.tracker.history.at(-1));
  const [balances, setBalances] = useState<number[]>(() => [scheduler.risk.view().account.balance]);
  const [scanning, setScanning] = useState(scheduler.isScanning);
  const [logs, setLogs] = useState<LogEvent[]>([]);
  const [now, setNow] = useState(Date.now());
  const [commandOpen, setCommandOpen] = useState(false);

  useEffect(() => {
    const unsubs: Array<() => void> = [];
    unsubs.push(
      bus.on("account.updated", (next) => {
        setView(next);
        setMarks((prev) => {
          const live = new Map<string, PositionMark>();
          for (const p of next.positions) {
            const mark = prev.get(p.id);
            if (mark) live.set(p.id, mark);
          }
          return live;
        });
        setBalances((prev) =>
          prev.at(-1) === next.account.balance
            ? prev
            : appendBounded(prev, next.account.balance, config.ui.balanceHistory)
        );
      })
    );
    unsubs.push(bus.on("position.marked", (mark) => setMarks((prev) => new Map(prev).set(mark.positionId, mark))));
    unsubs.push(bus.on("scan.completed", setCycle));
    unsubs.push(bus.on("universe.refreshed", (evt) => setUniverse({ size: evt.instruments.length, stale: evt.stale })));
    unsubs.push(bus.on("performance.snapshot", setSnapshot));
    unsubs.push(bus.on("scheduler.state", (evt) => setScanning(evt.running && evt.scanning)));
    unsubs.push(bus.on("log", (line) => setLogs((prev) => appendBounded(prev, line, config.ui.logBuffer))));

    // Held times only need second resolution.
    const clock = setInterval(() => setNow(Date.now()), 1000);

    return () => {
      clearInterval(clock);
      for (const unsub of unsubs) unsub();
    };
  }, [bus, config]);

  useInput((input) => {
    if (commandOpen) return;
    if (input === "/" || input === "\\") setCommandOpen(true);
  });

  const runCommand = async (raw: string): Promise<void> => {
    const parsed = parseCommand(raw);
    if (!parsed) return;
    try {
      await executeCommand(
        parsed,
        scheduler,
        bus,
        view.positions.filter((p) => p.status === "open").map((p) => p.id)
      );
    } catch (error) {
      bus.log("ERROR", errorMessage(error));
    }
  };

  const { account, riskState } = view;

  return (
    <Box flexDirection="column" width={contentWidth}>
      <Text color="cyan">
        Micro Scalper | Risk: <Text color={RISK_COLORS[riskState]}>{riskState.toUpperCase()}</Text> | Scanning:{" "}
        {scanning ? "ON" : "OFF"}
      </Text>
      <Text color="gray">
        Balance: {account.balance.toFixed(2)} | Peak: {account.peakBalance.toFixed(2)} | Day PnL:{" "}
        {account.dailyPnl.toFixed(2)} | Open: {view.positions.length}/{config.risk.maxConcurrentTrades} | Reserved:{" "}
        {view.reservedCapital.toFixed(2)}
      </Text>

      <Box width={contentWidth}>
        <Box width={topLeftWidth} marginRight={rowGap}>
          <OpportunitiesPanel cycle={cycle} universeSize={universe.size} staleUniverse={universe.stale} />
        </Box>
        <Box width={topRightWidth}>
          <ActiveTradesPanel
            positions={view.positions}
            marks={marks}
            maxConcurrent={config.risk.maxConcurrentTrades}
            now={now}
          />
        </Box>
      </Box>

      <Box width={contentWidth}>
        <Box width={bottomLeftWidth} marginRight={rowGap}>
          <PerformancePanel
            account={account}
            snapshot={snapshot}
            balanceHistory={balances}
            sparklineWidth={config.ui.sparklineWidth}
          />
        </Box>
        <Box width={bottomRightWidth}>
          <Box borderStyle="round" borderColor="yellow" flexDirection="column" paddingX={1} minHeight={10}>
            <Text color="yellow">Logs</Text>
            {logs.slice(-8).map((line, idx) => (
              <Text
                key={`${line.ts}_${idx}`}
                color={line.level === "ERROR" ? "red" : line.level === "WARN" ? "yellow" : "white"}
              >
                [{new Date(line.ts).toISOString().slice(11, 19)}] {line.level} {line.message}
              </Text>
            ))}
          </Box>
        </Box>
      </Box>

      <CommandPalette
        isOpen={commandOpen}
        commands={COMMANDS}
        onClose={() => setCommandOpen(false)}
        onExecute={(cmd) => void runCommand(cmd)}
      />

      <Text color="gray">/ open palette | /scan /pause /resume /close /close-all /reset-breaker /snapshot | Ctrl+C exit</Text>
    </Box>
  );
}
