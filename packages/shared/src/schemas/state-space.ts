import { z } from "zod";

export const OptionPositionStateSchema = z.enum(["NONE", "LONG_GAMMA", "SHORT_GAMMA"]);
export type OptionPositionState = z.infer<typeof OptionPositionStateSchema>;

export const DeltaDeviationStateSchema = z.enum(["IN_BAND", "MINOR", "HEDGE_NEEDED", "FORCE_HEDGE", "INVALID"]);
export type DeltaDeviationState = z.infer<typeof DeltaDeviationStateSchema>;

export const MarketRegimeStateSchema = z.enum(["QUIET", "NORMAL", "TREND", "CHOPPY_HIGHVOL", "GAP", "STALE"]);
export type MarketRegimeState = z.infer<typeof MarketRegimeStateSchema>;

export const LiquidityStateSchema = z.enum(["NORMAL", "WIDE", "EXTREME_WIDE", "NO_QUOTE"]);
export type LiquidityState = z.infer<typeof LiquidityStateSchema>;

export const ExecutionStateSchema = z.enum(["IDLE", "ORDER_WORKING", "PARTIAL_FILL", "DISCONNECTED", "BROKER_ERROR"]);
export type ExecutionState = z.infer<typeof ExecutionStateSchema>;

export const SystemHealthStateSchema = z.enum(["OK", "GREEKS_BAD", "DATA_LAG", "RISK_HALT"]);
export type SystemHealthState = z.infer<typeof SystemHealthStateSchema>;

export const CompositeDimensionsSchema = z.object({
  O: OptionPositionStateSchema,
  D: DeltaDeviationStateSchema,
  M: MarketRegimeStateSchema,
  L: LiquidityStateSchema,
  E: ExecutionStateSchema,
  S: SystemHealthStateSchema
});
export type CompositeDimensions = z.infer<typeof CompositeDimensionsSchema>;

export const DaemonStateSchema = z.enum([
  "IDLE",
  "CONNECTING",
  "CONNECTED",
  "RUNNING",
  "RUNNING_SUSPENDED",
  "WAITING_IB",
  "STOPPING",
  "STOPPED"
]);
export type DaemonState = z.infer<typeof DaemonStateSchema>;

export const TradingStateSchema = z.enum([
  "BOOT",
  "SYNC",
  "IDLE",
  "ARMED",
  "MONITOR",
  "NO_TRADE",
  "PAUSE_COST",
  "PAUSE_LIQ",
  "NEED_HEDGE",
  "HEDGING",
  "SAFE"
]);
export type TradingState = z.infer<typeof TradingStateSchema>;

export const HedgeStateSchema = z.enum([
  "EXEC_IDLE",
  "PLAN",
  "SEND",
  "WAIT_ACK",
  "WORKING",
  "PARTIAL",
  "REPRICE",
  "CANCEL",
  "RECOVER",
  "FILLED",
  "FAIL"
]);
export type HedgeState = z.infer<typeof HedgeStateSchema>;

export const OrderSideSchema = z.enum(["BUY", "SELL"]);
export type OrderSide = z.infer<typeof OrderSideSchema>;

// Severity order per dimension, least severe first. INVALID sits outside the D ladder.
export const DELTA_SEVERITY: readonly DeltaDeviationState[] = ["IN_BAND", "MINOR", "HEDGE_NEEDED", "FORCE_HEDGE"];
export const LIQUIDITY_SEVERITY: readonly LiquidityState[] = ["NORMAL", "WIDE", "EXTREME_WIDE", "NO_QUOTE"];
export const SYSTEM_HEALTH_PRECEDENCE: readonly SystemHealthState[] = ["OK", "DATA_LAG", "GREEKS_BAD", "RISK_HALT"];
