export const DEFAULTS = {
  initialCapital: 100,
  risk: {
    maxConcurrentTrades: 8,
    dailyLossLimit: 0.1,
    maxDrawdownLimit: 0.2,
    circuitBreakerLimit: 0.15,
    minPositionSize: 5,
    maxPositionSize: 15,
    scalpTakeProfit: 0.015,
    scalpStopLoss: 0.01,
    maxHoldTimeSec: 300
  },
  schedule: {
    scanIntervalSec: 300,
    monitorIntervalSec: 5,
    snapshotIntervalSec: 300,
    universeRefreshIntervalSec: 3600,
    balanceSyncIntervalSec: 60,
    shutdownTimeoutSec: 30
  },
  balance: {
    tolerance: 0.01
  },
  performance: {
    historyLimit: 288
  },
  universe: {
    size: 50,
    minLiquidityTier: 1
  },
  scoring: {
    minConfidence: 0.6,
    minCandles: 20
  },
  retry: {
    attempts: 3,
    baseDelayMs: 500,
    maxDelayMs: 4000
  },
  paper: {
    takerFee: 0.00055,
    latencyMs: 25
  },
  ui: {
    headless: false,
    logBuffer: 250,
    sparklineWidth: 24,
    balanceHistory: 120
  },
  journal: {
    enabled: true,
    path: "data/events.ndjson",
    flushMs: 1000
  }
} as const;
