import { z } from "zod";
import type { RiskLimits } from "../types/risk";
import { ConfigurationError } from "../utils/errors";
import { DEFAULTS } from "./defaults";

const fraction = (fallback: number) => z.coerce.number().gt(0).lt(1).default(fallback);
const positive = (fallback: number) => z.coerce.number().positive().default(fallback);
const count = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const flag = (fallback: boolean) =>
  z
    .union([z.boolean(), z.enum(["true", "false", "1", "0"]).transform((v) => v === "true" || v === "1")])
    .default(fallback);

const settingsSchema = z
  .object({
    initialCapital: positive(DEFAULTS.initialCapital),
    maxConcurrentTrades: count(DEFAULTS.risk.maxConcurrentTrades),
    dailyLossLimit: fraction(DEFAULTS.risk.dailyLossLimit),
    maxDrawdownLimit: fraction(DEFAULTS.risk.maxDrawdownLimit),
    circuitBreakerLimit: fraction(DEFAULTS.risk.circuitBreakerLimit),
    minPositionSize: positive(DEFAULTS.risk.minPositionSize),
    maxPositionSize: positive(DEFAULTS.risk.maxPositionSize),
    scalpTakeProfit: fraction(DEFAULTS.risk.scalpTakeProfit),
    scalpStopLoss: fraction(DEFAULTS.risk.scalpStopLoss),
    maxHoldTime: z.coerce.number().nonnegative().default(DEFAULTS.risk.maxHoldTimeSec),
    scanInterval: positive(DEFAULTS.schedule.scanIntervalSec),
    monitorInterval: positive(DEFAULTS.schedule.monitorIntervalSec),
    snapshotInterval: positive(DEFAULTS.schedule.snapshotIntervalSec),
    universeRefreshInterval: positive(DEFAULTS.schedule.universeRefreshIntervalSec),
    balanceSyncInterval: positive(DEFAULTS.schedule.balanceSyncIntervalSec),
    balanceTolerance: z.coerce.number().nonnegative().default(DEFAULTS.balance.tolerance),
    shutdownTimeout: positive(DEFAULTS.schedule.shutdownTimeoutSec),
    universeSize: count(DEFAULTS.universe.size),
    minLiquidityTier: z.coerce.number().int().nonnegative().default(DEFAULTS.universe.minLiquidityTier),
    minConfidence: z.coerce.number().min(0).max(1).default(DEFAULTS.scoring.minConfidence),
    minCandles: count(DEFAULTS.scoring.minCandles),
    retryAttempts: count(DEFAULTS.retry.attempts),
    retryBaseDelayMs: z.coerce.number().nonnegative().default(DEFAULTS.retry.baseDelayMs),
    retryMaxDelayMs: z.coerce.number().nonnegative().default(DEFAULTS.retry.maxDelayMs),
    takerFee: z.coerce.number().min(0).lt(1).default(DEFAULTS.paper.takerFee),
    journalEnabled: flag(DEFAULTS.journal.enabled),
    journalPath: z.string().min(1).default(DEFAULTS.journal.path),
    headless: flag(DEFAULTS.ui.headless)
  })
  .superRefine((s, ctx) => {
    if (s.minPositionSize > s.maxPositionSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["minPositionSize"],
        message: `must not exceed maxPositionSize (${s.maxPositionSize})`
      });
    }
    if (s.maxPositionSize > s.initialCapital) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["maxPositionSize"],
        message: `must not exceed initialCapital (${s.initialCapital})`
      });
    }
    if (s.monitorInterval >= s.scanInterval) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["monitorInterval"],
        message: `must be shorter than scanInterval (${s.scanInterval})`
      });
    }
  });

export type SettingsInput = z.input<typeof settingsSchema>;
type Settings = z.output<typeof settingsSchema>;

const ENV_KEYS: Record<keyof Settings, string> = {
  initialCapital: "MICRO_INITIAL_CAPITAL",
  maxConcurrentTrades: "MICRO_MAX_CONCURRENT_TRADES",
  dailyLossLimit: "MICRO_DAILY_LOSS_LIMIT",
  maxDrawdownLimit: "MICRO_MAX_DRAWDOWN_LIMIT",
  circuitBreakerLimit: "MICRO_CIRCUIT_BREAKER_LIMIT",
  minPositionSize: "MICRO_MIN_POSITION_SIZE",
  maxPositionSize: "MICRO_MAX_POSITION_SIZE",
  scalpTakeProfit: "MICRO_SCALP_TAKE_PROFIT",
  scalpStopLoss: "MICRO_SCALP_STOP_LOSS",
  maxHoldTime: "MICRO_MAX_HOLD_TIME",
  scanInterval: "MICRO_SCAN_INTERVAL",
  monitorInterval: "MICRO_MONITOR_INTERVAL",
  snapshotInterval: "MICRO_SNAPSHOT_INTERVAL",
  universeRefreshInterval: "MICRO_UNIVERSE_REFRESH_INTERVAL",
  balanceSyncInterval: "MICRO_BALANCE_SYNC_INTERVAL",
  balanceTolerance: "MICRO_BALANCE_TOLERANCE",
  shutdownTimeout: "MICRO_SHUTDOWN_TIMEOUT",
  universeSize: "MICRO_UNIVERSE_SIZE",
  minLiquidityTier: "MICRO_MIN_LIQUIDITY_TIER",
  minConfidence: "MICRO_MIN_CONFIDENCE",
  minCandles: "MICRO_MIN_CANDLES",
  retryAttempts: "MICRO_RETRY_ATTEMPTS",
  retryBaseDelayMs: "MICRO_RETRY_BASE_DELAY_MS",
  retryMaxDelayMs: "MICRO_RETRY_MAX_DELAY_MS",
  takerFee: "MICRO_TAKER_FEE",
  journalEnabled: "MICRO_JOURNAL_ENABLED",
  journalPath: "MICRO_JOURNAL_PATH",
  headless: "MICRO_HEADLESS"
};

export interface RuntimeConfig {
  readonly initialCapital: number;
  readonly risk: RiskLimits;
  readonly schedule: {
    readonly scanIntervalMs: number;
    readonly monitorIntervalMs: number;
    readonly snapshotIntervalMs: number;
    readonly universeRefreshIntervalMs: number;
    readonly balanceSyncIntervalMs: number;
    readonly shutdownTimeoutMs: number;
  };
  readonly balanceTolerance: number;
  readonly performance: { readonly historyLimit: number };
  readonly universe: { readonly size: number; readonly minLiquidityTier: number };
  readonly scoring: { readonly minConfidence: number; readonly minCandles: number };
  readonly retry: { readonly attempts: number; readonly baseDelayMs: number; readonly maxDelayMs: number };
  readonly paper: { readonly takerFee: number; readonly latencyMs: number };
  readonly journal: { readonly enabled: boolean; readonly path: string; readonly flushMs: number };
  readonly ui: {
    readonly headless: boolean;
    readonly logBuffer: number;
    readonly sparklineWidth: number;
    readonly balanceHistory: number;
  };
}

function fromEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const raw: Record<string, string> = {};
  for (const [key, name] of Object.entries(ENV_KEYS)) {
    const value = env[name]?.trim();
    if (value) raw[key] = value;
  }
  return raw;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const nested of Object.values(value)) {
    if (nested && typeof nested === "object") deepFreeze(nested);
  }
  return Object.freeze(value);
}

// Defaults, then MICRO_* variables, then explicit overrides.
export function loadConfig(env: NodeJS.ProcessEnv = {}, overrides: SettingsInput = {}): RuntimeConfig {
  const parsed = settingsSchema.safeParse({ ...fromEnv(env), ...overrides });
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
    );
  }
  const s = parsed.data;

  return deepFreeze<RuntimeConfig>({
    initialCapital: s.initialCapital,
    risk: {
      maxConcurrentTrades: s.maxConcurrentTrades,
      dailyLossLimit: s.dailyLossLimit,
      maxDrawdownLimit: s.maxDrawdownLimit,
      circuitBreakerLimit: s.circuitBreakerLimit,
      minPositionSize: s.minPositionSize,
      maxPositionSize: s.maxPositionSize,
      scalpTakeProfit: s.scalpTakeProfit,
      scalpStopLoss: s.scalpStopLoss,
      maxHoldTimeSec: s.maxHoldTime
    },
    schedule: {
      scanIntervalMs: s.scanInterval * 1000,
      monitorIntervalMs: s.monitorInterval * 1000,
      snapshotIntervalMs: s.snapshotInterval * 1000,
      universeRefreshIntervalMs: s.universeRefreshInterval * 1000,
      balanceSyncIntervalMs: s.balanceSyncInterval * 1000,
      shutdownTimeoutMs: s.shutdownTimeout * 1000
    },
    balanceTolerance: s.balanceTolerance,
    performance: { historyLimit: DEFAULTS.performance.historyLimit },
    universe: { size: s.universeSize, minLiquidityTier: s.minLiquidityTier },
    scoring: { minConfidence: s.minConfidence, minCandles: s.minCandles },
    retry: { attempts: s.retryAttempts, baseDelayMs: s.retryBaseDelayMs, maxDelayMs: s.retryMaxDelayMs },
    paper: { takerFee: s.takerFee, latencyMs: DEFAULTS.paper.latencyMs },
    journal: { enabled: s.journalEnabled, path: s.journalPath, flushMs: DEFAULTS.journal.flushMs },
    ui: {
      headless: s.headless,
      logBuffer: DEFAULTS.ui.logBuffer,
      sparklineWidth: DEFAULTS.ui.sparklineWidth,
      balanceHistory: DEFAULTS.ui.balanceHistory
    }
  });
}
