import React from "react";
import { Box, Text } from "ink";
import type { PerformanceSnapshot } from "../types/performance";
import type { AccountState } from "../types/portfolio";
import { createSparkline } from "../utils/sparkline";

interface PerformancePanelProps {
  account: AccountState;
  snapshot: PerformanceSnapshot | undefined;
  balanceHistory: readonly number[];
  sparklineWidth: number;
}

export function PerformancePanel({
  account,
  snapshot,
  balanceHistory,
  sparklineWidth
}: PerformancePanelProps): React.JSX.Element {
  const drawdown = account.peakBalance > 0 ? (account.peakBalance - account.balance) / account.peakBalance : 0;

  return (
    <Box borderStyle="round" borderColor="green" flexDirection="column" paddingX={1} minHeight={10}>
      <Text color="green">Performance</Text>
      <Text>Balance:   {account.balance.toFixed(2)}</Text>
      <Text>Peak:      {account.peakBalance.toFixed(2)}</Text>
      <Text>Drawdown:  {(drawdown * 100).toFixed(2)}%</Text>
      <Text color={account.dailyPnl >= 0 ? "green" : "red"}>Daily PnL: {account.dailyPnl.toFixed(2)}</Text>
      {snapshot ? (
        <Text>
          Growth:    {snapshot.growthPct >= 0 ? "+" : ""}
          {snapshot.growthPct.toFixed(2)}% | trades {snapshot.tradeCount} | win {(snapshot.winRate * 100).toFixed(1)}%
        </Text>
      ) : (
        <Text color="gray">Growth:    no snapshot yet</Text>
      )}
      <Text color="cyan">{createSparkline(balanceHistory, sparklineWidth)}</Text>
    </Box>
  );
}
