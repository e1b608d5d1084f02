import type { BrokerPosition, EligibilityConfig, OptionPosition } from "@gammahedge/shared";

import type { PortfolioGreeks } from "../state/composite-state";

const DAY_MS = 86_400_000;

export type StructureLeg = OptionPosition & { dte: number };

/** Per-contract greeks, per share of underlying. */
export type LegGreeks = {
  delta: number;
  gamma: number;
  vega: number;
  theta: number;
};

/** Days until a YYYYMMDD expiry, floored at 0; -1 when the expiry cannot be parsed. */
export function daysToExpiry(expiry: string, nowMs: number): number {
  const match = /^(\d{4})(\d{2})(\d{2})$/.exec(expiry);
  if (!match) return -1;

  const year = Number(match[1]);
  const month = Number(match[2]) - 1;
  const day = Number(match[3]);
  const expiryDate = new Date(Date.UTC(year, month, day));
  if (expiryDate.getUTCMonth() !== month || expiryDate.getUTCDate() !== day) return -1;

  return Math.max(0, Math.floor((expiryDate.getTime() - nowMs) / DAY_MS));
}

export function isNearAtm(strike: number, spot: number | null, atmBandPct: number): boolean {
  if (spot === null || spot <= 0) return false;
  return Math.abs(strike - spot) / spot <= atmBandPct;
}

export function stockSharesOf(positions: readonly BrokerPosition[], symbol: string): number {
  return positions.reduce((sum, p) => (p.secType === "STK" && p.symbol === symbol ? sum + p.quantity : sum), 0);
}

/** Option legs on the underlying that belong to the hedged structure (DTE window and ATM band). */
export function selectStructureLegs(
  positions: readonly BrokerPosition[],
  spot: number | null,
  eligibility: Pick<EligibilityConfig, "symbol" | "minDte" | "maxDte" | "atmBandPct">,
  nowMs: number
): StructureLeg[] {
  const legs: StructureLeg[] = [];
  for (const position of positions) {
    if (position.secType !== "OPT") continue;
    if (position.symbol !== eligibility.symbol || position.quantity === 0) continue;

    const dte = daysToExpiry(position.expiry, nowMs);
    if (dte < eligibility.minDte || dte > eligibility.maxDte) continue;
    if (!isNearAtm(position.strike, spot, eligibility.atmBandPct)) continue;

    legs.push({ ...position, dte });
  }
  return legs;
}

/**
 * Share-equivalent option greeks of the structure. Any leg without greeks makes
 * the aggregate invalid; an empty structure is a valid zero.
 */
export function aggregateGreeks(legs: readonly StructureLeg[], greeksByContract: ReadonlyMap<string, LegGreeks | null>): PortfolioGreeks {
  const total: PortfolioGreeks = { delta: 0, gamma: 0, vega: 0, theta: 0, valid: true };

  for (const leg of legs) {
    const g = greeksByContract.get(leg.contractId);
    if (!g) {
      total.valid = false;
      continue;
    }
    const shares = leg.quantity * leg.multiplier;
    total.delta += shares * g.delta;
    total.gamma += shares * g.gamma;
    total.vega += shares * g.vega;
    total.theta += shares * g.theta;
  }

  return total;
}
