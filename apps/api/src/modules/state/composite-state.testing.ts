import type { CompositeState } from "./composite-state";

/** A healthy long-gamma state needing a hedge; override fields per test. */
export function makeCompositeState(overrides: Partial<CompositeState> = {}): CompositeState {
  return Object.freeze({
    O: "LONG_GAMMA",
    D: "HEDGE_NEEDED",
    M: "NORMAL",
    L: "NORMAL",
    E: "IDLE",
    S: "OK",
    netDelta: 30,
    optionDelta: 30,
    stockShares: 0,
    optionLegsCount: 2,
    spot: 100,
    bid: 97.5,
    ask: 102.5,
    spreadPct: 0.05,
    eventLagMs: 100,
    dataAgeMs: 100,
    greeks: Object.freeze({ delta: 30, gamma: 2, vega: 10, theta: -5, valid: true }),
    greeksValid: true,
    lastHedgeTs: null,
    lastHedgePrice: null,
    ts: 0,
    ...overrides
  } satisfies CompositeState);
}
