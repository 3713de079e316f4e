import React from "react";
import { Box, Text } from "ink";
import type { ScanCompletedEvent } from "../types/events";

interface OpportunitiesPanelProps {
  cycle: ScanCompletedEvent | undefined;
  universeSize: number;
  staleUniverse: boolean;
}

export function OpportunitiesPanel({ cycle, universeSize, staleUniverse }: OpportunitiesPanelProps): React.JSX.Element {
  const rows = cycle?.ranked.slice(0, 10) ?? [];

  return (
    <Box borderStyle="round" borderColor="blue" flexDirection="column" paddingX={1} minHeight={12}>
      <Text color="blue">
        Opportunities | universe {universeSize}
        {staleUniverse ? <Text color="yellow"> (stale)</Text> : null}
      </Text>
      {cycle ? (
        <Text color="gray">
          last scan {new Date(cycle.cycleTs).toISOString().slice(11, 19)} | {cycle.scanned} scanned, {cycle.skipped}{" "}
          skipped | {cycle.filled}/{cycle.submitted} filled | {cycle.durationMs}ms
        </Text>
      ) : (
        <Text color="gray">Waiting for first scan...</Text>
      )}
      <Text>Inst       Dir      Score   Conf     Entry</Text>
      {rows.map((o) => (
        <Text key={o.instrument.id}>
          {o.instrument.id.padEnd(10)} <Text color={o.direction === "long" ? "green" : "red"}>{o.direction.padEnd(5)}</Text>{" "}
          {o.score.toFixed(3).padStart(8)} {o.confidence.toFixed(2).padStart(6)} {o.entryPrice.toPrecision(6).padStart(10)}
        </Text>
      ))}
      {cycle && rows.length === 0 ? <Text color="gray">No instrument passed the confidence threshold</Text> : null}
    </Box>
  );
}
