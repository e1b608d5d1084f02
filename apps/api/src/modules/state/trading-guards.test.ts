import { describe, expect, it } from "vitest";

import { defaultDaemonConfig } from "@gammahedge/shared";

import { makeCompositeState } from "./composite-state.testing";
import { evaluateTradingGuards, type GuardContext } from "./trading-guards";

const config = defaultDaemonConfig();

function context(overrides: Partial<GuardContext> = {}): GuardContext {
  return { config, brokerConnected: true, positionsSynced: true, hedgeRetries: 0, dailyHedgeCount: 0, ...overrides };
}

describe("evaluateTradingGuards", () => {
  it("passes every guard for a healthy state", () => {
    const g = evaluateTradingGuards(makeCompositeState(), context());

    expect(g).toEqual({
      dataOk: true,
      dataStale: false,
      greeksBad: false,
      brokerDown: false,
      brokerUp: true,
      execFault: false,
      haveOptionPosition: true,
      strategyEnabled: true,
      deltaBandReady: true,
      inNoTradeBand: false,
      costOk: true,
      liquidityOk: true,
      positionsOk: true,
      retryAllowed: true
    });
  });

  it("treats lag at the threshold, a missing quote or STALE market as stale data", () => {
    expect(evaluateTradingGuards(makeCompositeState({ eventLagMs: 1000 }), context()).dataStale).toBe(true);
    expect(evaluateTradingGuards(makeCompositeState({ L: "NO_QUOTE" }), context()).dataOk).toBe(false);
    expect(evaluateTradingGuards(makeCompositeState({ M: "STALE" }), context()).dataOk).toBe(false);
    expect(evaluateTradingGuards(makeCompositeState({ spot: null }), context()).dataOk).toBe(false);
  });

  it("separates broker down from execution fault", () => {
    const down = evaluateTradingGuards(makeCompositeState({ E: "DISCONNECTED" }), context());
    const fault = evaluateTradingGuards(makeCompositeState({ E: "BROKER_ERROR" }), context());

    expect([down.brokerDown, down.execFault]).toEqual([true, false]);
    expect([fault.brokerDown, fault.execFault]).toEqual([false, true]);
    expect(evaluateTradingGuards(makeCompositeState(), context({ brokerConnected: false })).brokerUp).toBe(false);
  });

  it("uses a strict epsilon for the no-trade band", () => {
    expect(evaluateTradingGuards(makeCompositeState({ netDelta: 9.5 }), context()).inNoTradeBand).toBe(true);
    expect(evaluateTradingGuards(makeCompositeState({ netDelta: -10 }), context()).inNoTradeBand).toBe(false);
  });

  it("requires a minimum price move since the last hedge unless forced", () => {
    const small = makeCompositeState({ spot: 100.1, lastHedgePrice: 100 });
    const large = makeCompositeState({ spot: 100.3, lastHedgePrice: 100 });

    expect(evaluateTradingGuards(small, context()).costOk).toBe(false);
    expect(evaluateTradingGuards(large, context()).costOk).toBe(true);
    expect(evaluateTradingGuards({ ...small, D: "FORCE_HEDGE" }, context()).costOk).toBe(true);
  });

  it("fails cost and liquidity on an extreme spread", () => {
    const g = evaluateTradingGuards(makeCompositeState({ spreadPct: 0.6, L: "EXTREME_WIDE" }), context());

    expect([g.costOk, g.liquidityOk]).toEqual([false, false]);
  });

  it("applies the optional max spread to liquidity", () => {
    const tight = { ...config, risk: { ...config.risk, maxSpreadPct: 0.02 } };

    expect(evaluateTradingGuards(makeCompositeState(), context({ config: tight })).liquidityOk).toBe(false);
  });

  it("stops retries at the retry limit or the daily hedge limit", () => {
    expect(evaluateTradingGuards(makeCompositeState(), context({ hedgeRetries: 3 })).retryAllowed).toBe(false);
    expect(evaluateTradingGuards(makeCompositeState(), context({ dailyHedgeCount: 50 })).retryAllowed).toBe(false);
  });

  it("requires synced positions and no risk halt for positionsOk", () => {
    expect(evaluateTradingGuards(makeCompositeState(), context({ positionsSynced: false })).positionsOk).toBe(false);
    expect(evaluateTradingGuards(makeCompositeState({ S: "RISK_HALT" }), context()).positionsOk).toBe(false);
  });
});
