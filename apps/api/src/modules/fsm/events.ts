export const TRADING_EVENTS = [
  "start",
  "synced",
  "tick",
  "quote",
  "greeks_update",
  "target_emitted",
  "hedge_done",
  "hedge_failed",
  "broker_down",
  "broker_up",
  "manual_resume",
  "shutdown"
] as const;
export type TradingEvent = (typeof TRADING_EVENTS)[number];

/** Events that re-run the band/cost/liquidity evaluation. */
export const EVALUATION_EVENTS: ReadonlySet<TradingEvent> = new Set<TradingEvent>(["synced", "tick", "quote", "greeks_update"]);

export const HEDGE_EVENTS = [
  "recv_target",
  "plan_skip",
  "plan_send",
  "place_order",
  "ack_ok",
  "ack_reject",
  "timeout_ack",
  "partial_fill",
  "full_fill",
  "timeout_working",
  "risk_trip",
  "manual_cancel",
  "broker_down",
  "cancel_sent",
  "positions_resynced",
  "cannot_recover",
  "try_resync"
] as const;
export type HedgeEvent = (typeof HEDGE_EVENTS)[number];
