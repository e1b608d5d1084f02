import type {
  ClassificationConfig,
  DeltaDeviationState,
  ExecutionState,
  LiquidityState,
  MarketRegimeState,
  OptionPositionState,
  SystemHealthState
} from "@gammahedge/shared";

import type { CompositeState, PortfolioGreeks } from "./composite-state";

const GREEKS_SANITY_LIMIT = 1e6;

export class ClassificationError extends Error {
  constructor(
    readonly field: string,
    readonly received: string
  ) {
    super(`Malformed numeric input for ${field} (got ${received})`);
    this.name = "ClassificationError";
  }
}

export type PositionsInput = {
  legs: ReadonlyArray<{ quantity: number }>;
  stockShares: number;
};

export type MarketInput = {
  bid: number | null;
  ask: number | null;
  last: number | null;
  lastTs: number | null;
  eventLagMs: number | null;
  priceHistory: readonly number[];
  asOfMs: number;
};

export type ExecutionInput = {
  state: ExecutionState;
  circuitBreaker: boolean;
  lastHedgeTs: number | null;
  lastHedgePrice: number | null;
};

function numeric(field: string, value: unknown): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value !== "number") {
    throw new ClassificationError(field, typeof value);
  }
  return value;
}

function required(field: string, value: unknown): number {
  const n = numeric(field, value);
  if (n === null) {
    throw new ClassificationError(field, String(value));
  }
  return n;
}

export function greeksUsable(greeks: PortfolioGreeks): boolean {
  if (!greeks.valid) return false;
  if (!Number.isFinite(greeks.delta) || !Number.isFinite(greeks.gamma)) return false;
  return Math.abs(greeks.delta) <= GREEKS_SANITY_LIMIT && Math.abs(greeks.gamma) <= GREEKS_SANITY_LIMIT;
}

function twoSidedQuote(bid: number | null, ask: number | null): { bid: number; ask: number } | null {
  if (bid === null || ask === null) return null;
  if (!Number.isFinite(bid) || !Number.isFinite(ask)) return null;
  if (bid <= 0 || ask <= 0 || ask < bid) return null;
  return { bid, ask };
}

export function classifyOptionPosition(legs: ReadonlyArray<{ quantity: number }>, greeks: PortfolioGreeks, greeksValid: boolean): OptionPositionState {
  if (legs.length === 0) return "NONE";
  if (greeksValid) {
    if (greeks.gamma > 0) return "LONG_GAMMA";
    if (greeks.gamma < 0) return "SHORT_GAMMA";
  }
  // Long options carry long gamma; fall back to the sign of the net contract count.
  const netContracts = legs.reduce((sum, leg) => sum + leg.quantity, 0);
  if (netContracts > 0) return "LONG_GAMMA";
  if (netContracts < 0) return "SHORT_GAMMA";
  return "NONE";
}

export function classifyDeltaDeviation(netDelta: number, greeksValid: boolean, delta: ClassificationConfig["delta"]): DeltaDeviationState {
  if (!greeksValid || !Number.isFinite(netDelta)) return "INVALID";
  const abs = Math.abs(netDelta);
  if (abs >= delta.maxDeltaLimit) return "FORCE_HEDGE";
  if (abs >= delta.hedgeThreshold) return "HEDGE_NEEDED";
  if (abs >= delta.epsilonBand) return "MINOR";
  return "IN_BAND";
}

export function classifyMarketRegime(
  dataAgeMs: number | null,
  priceHistory: readonly number[],
  market: ClassificationConfig["market"]
): MarketRegimeState {
  if (dataAgeMs === null || dataAgeMs >= market.staleTsThresholdMs) return "STALE";

  const prices = priceHistory.filter((p) => Number.isFinite(p) && p > 0);
  if (prices.length < 2) return "NORMAL";

  const last = prices[prices.length - 1] ?? 0;
  const prev = prices[prices.length - 2] ?? last;
  if (Math.abs(last - prev) / prev >= market.gapPct) return "GAP";

  const n = prices.length;
  const mean = prices.reduce((sum, p) => sum + p, 0) / n;
  const variance = prices.reduce((sum, p) => sum + (p - mean) ** 2, 0) / (n - 1);
  const vol = Math.sqrt(variance) / mean;
  const first = prices[0] ?? last;
  const drift = Math.abs(last - first) / first;

  if (vol >= market.choppyVolPct && drift < market.trendDriftPct) return "CHOPPY_HIGHVOL";
  if (drift >= market.trendDriftPct) return "TREND";
  if (vol < market.quietVolPct) return "QUIET";
  return "NORMAL";
}

export function classifyLiquidity(spreadPct: number | null, liquidity: ClassificationConfig["liquidity"]): LiquidityState {
  if (spreadPct === null) return "NO_QUOTE";
  if (spreadPct >= liquidity.extremeSpreadPct) return "EXTREME_WIDE";
  if (spreadPct >= liquidity.wideSpreadPct) return "WIDE";
  return "NORMAL";
}

/** Fixed precedence: RISK_HALT > GREEKS_BAD > DATA_LAG > OK. */
export function classifySystemHealth(
  circuitBreaker: boolean,
  greeksValid: boolean,
  eventLagMs: number | null,
  system: ClassificationConfig["system"]
): SystemHealthState {
  if (circuitBreaker) return "RISK_HALT";
  if (!greeksValid) return "GREEKS_BAD";
  if (eventLagMs !== null && eventLagMs >= system.dataLagThresholdMs) return "DATA_LAG";
  return "OK";
}

/**
 * Maps one atomic snapshot of raw inputs to the six-dimension composite state.
 * Missing data yields conservative states; a present value of the wrong runtime
 * type throws {@link ClassificationError}.
 */
export function classify(
  positions: PositionsInput,
  market: MarketInput,
  greeks: PortfolioGreeks,
  execution: ExecutionInput,
  config: ClassificationConfig
): CompositeState {
  const asOfMs = required("market.asOfMs", market.asOfMs);
  const bid = numeric("market.bid", market.bid);
  const ask = numeric("market.ask", market.ask);
  const last = numeric("market.last", market.last);
  const lastTs = numeric("market.lastTs", market.lastTs);
  const eventLagInput = numeric("market.eventLagMs", market.eventLagMs);
  const stockShares = required("positions.stockShares", positions.stockShares);
  required("greeks.delta", greeks.delta);
  required("greeks.gamma", greeks.gamma);
  positions.legs.forEach((leg, i) => required(`positions.legs[${i}].quantity`, leg.quantity));
  market.priceHistory.forEach((p, i) => required(`market.priceHistory[${i}]`, p));

  const quote = twoSidedQuote(bid, ask);
  const mid = quote ? (quote.bid + quote.ask) / 2 : null;
  const spot = mid ?? (last !== null && Number.isFinite(last) && last > 0 ? last : null);
  const spreadPct = quote && mid ? (quote.ask - quote.bid) / mid : null;

  const dataAgeMs = lastTs !== null && Number.isFinite(lastTs) ? Math.max(0, asOfMs - lastTs) : null;
  const eventLagMs = eventLagInput ?? dataAgeMs;

  const greeksValid = greeksUsable(greeks) && Number.isFinite(stockShares);
  const optionDelta = greeksValid ? greeks.delta : 0;
  const netDelta = optionDelta + stockShares;

  const state: CompositeState = {
    O: classifyOptionPosition(positions.legs, greeks, greeksValid),
    D: classifyDeltaDeviation(netDelta, greeksValid, config.delta),
    M: classifyMarketRegime(dataAgeMs, market.priceHistory, config.market),
    L: classifyLiquidity(spreadPct, config.liquidity),
    E: execution.state,
    S: classifySystemHealth(execution.circuitBreaker, greeksValid, eventLagMs, config.system),
    netDelta,
    optionDelta,
    stockShares,
    optionLegsCount: positions.legs.length,
    spot,
    bid: quote?.bid ?? null,
    ask: quote?.ask ?? null,
    spreadPct,
    eventLagMs,
    dataAgeMs,
    greeks: Object.freeze({ ...greeks }),
    greeksValid,
    lastHedgeTs: execution.lastHedgeTs,
    lastHedgePrice: execution.lastHedgePrice,
    ts: asOfMs
  };

  return Object.freeze(state);
}
