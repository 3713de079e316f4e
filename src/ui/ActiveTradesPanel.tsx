import React from "react";
import { Box, Text } from "ink";
import type { Position, PositionMark } from "../types/portfolio";

interface ActiveTradesPanelProps {
  positions: readonly Position[];
  marks: ReadonlyMap<string, PositionMark>;
  maxConcurrent: number;
  now: number;
}

function heldFor(openedAt: number, now: number): string {
  const sec = Math.max(0, Math.floor((now - openedAt) / 1000));
  return `${Math.floor(sec / 60)}m${String(sec % 60).padStart(2, "0")}s`;
}

export function ActiveTradesPanel({ positions, marks, maxConcurrent, now }: ActiveTradesPanelProps): React.JSX.Element {
  return (
    <Box borderStyle="round" borderColor="magenta" flexDirection="column" paddingX={1} minHeight={12}>
      <Text color="magenta">
        Active Trades {positions.length}/{maxConcurrent}
      </Text>
      <Text>Id           Inst       Dir    Size     Entry      Mark       uPnL    Held</Text>
      {positions.slice(0, 10).map((p) => {
        const mark = marks.get(p.id);
        const pnl = mark?.unrealizedPnl ?? 0;
        return (
          <Text key={p.id} color={p.status === "closing" ? "yellow" : p.forceClose ? "red" : undefined}>
            {p.id.slice(0, 12).padEnd(12)} {p.instrument.padEnd(10)} {p.direction.padEnd(5)} {p.size
              .toFixed(2)
              .padStart(6)} {p.entryPrice.toPrecision(6).padStart(10)} {(mark ? mark.price.toPrecision(6) : "-").padStart(
              10
            )} <Text color={pnl >= 0 ? "green" : "red"}>{pnl.toFixed(2).padStart(8)}</Text> {heldFor(p.openedAt, now)}
          </Text>
        );
      })}
      {positions.length === 0 ? <Text color="gray">No active trades</Text> : null}
    </Box>
  );
}
