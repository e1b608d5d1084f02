import type { DaemonConfig } from "@gammahedge/shared";

import type { CompositeState } from "./composite-state";

export type TradingGuards = Readonly<{
  dataOk: boolean;
  dataStale: boolean;
  greeksBad: boolean;
  brokerDown: boolean;
  brokerUp: boolean;
  execFault: boolean;
  haveOptionPosition: boolean;
  strategyEnabled: boolean;
  deltaBandReady: boolean;
  inNoTradeBand: boolean;
  costOk: boolean;
  liquidityOk: boolean;
  positionsOk: boolean;
  retryAllowed: boolean;
}>;

export type GuardContext = {
  config: Pick<DaemonConfig, "classification" | "sizing" | "risk" | "eligibility" | "daemon">;
  brokerConnected: boolean;
  positionsSynced: boolean;
  hedgeRetries: number;
  dailyHedgeCount: number;
};

export function isDataOk(cs: CompositeState, dataLagThresholdMs: number): boolean {
  if (cs.eventLagMs !== null && cs.eventLagMs >= dataLagThresholdMs) return false;
  if (cs.L === "NO_QUOTE") return false;
  if (cs.spot === null || cs.spot <= 0) return false;
  return cs.M !== "STALE";
}

/** Percent move of spot since the last hedge, or null without a prior hedge price. */
export function priceMoveSinceLastHedgePct(cs: CompositeState): number | null {
  if (cs.lastHedgePrice === null || cs.lastHedgePrice <= 0 || cs.spot === null) return null;
  return (100 * Math.abs(cs.spot - cs.lastHedgePrice)) / cs.lastHedgePrice;
}

export function isCostOk(cs: CompositeState, extremeSpreadPct: number, minPriceMovePct: number): boolean {
  if (cs.spreadPct !== null && cs.spreadPct >= extremeSpreadPct) return false;
  if (cs.D === "FORCE_HEDGE" || minPriceMovePct <= 0) return true;
  const move = priceMoveSinceLastHedgePct(cs);
  return move === null || move >= minPriceMovePct;
}

export function isLiquidityOk(cs: CompositeState, maxSpreadPct: number | undefined): boolean {
  if (cs.L === "NO_QUOTE" || cs.L === "EXTREME_WIDE") return false;
  if (maxSpreadPct !== undefined && cs.spreadPct !== null && cs.spreadPct > maxSpreadPct) return false;
  return true;
}

export function evaluateTradingGuards(cs: CompositeState, context: GuardContext): TradingGuards {
  const { classification, sizing, risk, eligibility, daemon } = context.config;

  const dataOk = isDataOk(cs, classification.system.dataLagThresholdMs);
  const brokerDown = cs.E === "DISCONNECTED" || !context.brokerConnected;

  return {
    dataOk,
    dataStale: !dataOk,
    greeksBad: !cs.greeksValid,
    brokerDown,
    brokerUp: !brokerDown,
    execFault: cs.E === "BROKER_ERROR",
    haveOptionPosition: cs.O !== "NONE",
    strategyEnabled: eligibility.strategyEnabled,
    deltaBandReady: cs.greeksValid,
    inNoTradeBand: Math.abs(cs.netDelta) < classification.delta.epsilonBand,
    costOk: isCostOk(cs, classification.liquidity.extremeSpreadPct, sizing.minPriceMovePct),
    liquidityOk: isLiquidityOk(cs, risk.maxSpreadPct),
    positionsOk: context.positionsSynced && dataOk && cs.S !== "RISK_HALT",
    retryAllowed: context.hedgeRetries < daemon.maxHedgeRetries && context.dailyHedgeCount < risk.maxDailyHedgeCount
  };
}
