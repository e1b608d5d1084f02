import type {
  CompositeDimensions,
  DeltaDeviationState,
  ExecutionState,
  LiquidityState,
  MarketRegimeState,
  OptionPositionState,
  SystemHealthState
} from "@gammahedge/shared";

export type PortfolioGreeks = {
  delta: number;
  gamma: number;
  vega: number;
  theta: number;
  valid: boolean;
};

/**
 * One evaluation cycle's view of the world. Every dimension is derived from the
 * same input snapshot; the object is frozen once built.
 */
export type CompositeState = Readonly<{
  O: OptionPositionState;
  D: DeltaDeviationState;
  M: MarketRegimeState;
  L: LiquidityState;
  E: ExecutionState;
  S: SystemHealthState;
  netDelta: number;
  optionDelta: number;
  stockShares: number;
  optionLegsCount: number;
  spot: number | null;
  bid: number | null;
  ask: number | null;
  spreadPct: number | null;
  eventLagMs: number | null;
  dataAgeMs: number | null;
  greeks: Readonly<PortfolioGreeks>;
  greeksValid: boolean;
  lastHedgeTs: number | null;
  lastHedgePrice: number | null;
  ts: number;
}>;

export function dimensionsOf(cs: CompositeState): CompositeDimensions {
  return { O: cs.O, D: cs.D, M: cs.M, L: cs.L, E: cs.E, S: cs.S };
}

export const INVALID_GREEKS: Readonly<PortfolioGreeks> = Object.freeze({
  delta: 0,
  gamma: 0,
  vega: 0,
  theta: 0,
  valid: false
});

/**
 * Keeps the previous cycle's state but marks system health degraded. A latched
 * RISK_HALT is never downgraded.
 */
export function degradeCompositeState(previous: CompositeState | null, execution: ExecutionState, nowMs: number): CompositeState {
  if (previous) {
    const kept: CompositeState = {
      ...previous,
      E: execution,
      S: previous.S === "RISK_HALT" ? "RISK_HALT" : "DATA_LAG",
      ts: nowMs
    };
    return Object.freeze(kept);
  }

  const conservative: CompositeState = {
    O: "NONE",
    D: "INVALID",
    M: "STALE",
    L: "NO_QUOTE",
    E: execution,
    S: "DATA_LAG",
    netDelta: 0,
    optionDelta: 0,
    stockShares: 0,
    optionLegsCount: 0,
    spot: null,
    bid: null,
    ask: null,
    spreadPct: null,
    eventLagMs: null,
    dataAgeMs: null,
    greeks: INVALID_GREEKS,
    greeksValid: false,
    lastHedgeTs: null,
    lastHedgePrice: null,
    ts: nowMs
  };
  return Object.freeze(conservative);
}
