import type { OrderSide } from "@gammahedge/shared";

import type { CompositeState } from "../state/composite-state";

export type HedgeIntent = {
  side: OrderSide;
  quantity: number;
  /** Stock shares that bring net delta back to zero. */
  targetShares: number;
  reason: "delta_hedge";
  forceHedge: boolean;
};

export function buildHedgeIntent(cs: CompositeState, hedgeThreshold: number): HedgeIntent | null {
  if (!cs.greeksValid) return null;

  const forceHedge = cs.D === "FORCE_HEDGE";
  if (cs.netDelta >= hedgeThreshold) {
    const quantity = Math.round(cs.netDelta);
    return { side: "SELL", quantity, targetShares: cs.stockShares - quantity, reason: "delta_hedge", forceHedge };
  }
  if (cs.netDelta <= -hedgeThreshold) {
    const quantity = Math.round(-cs.netDelta);
    return { side: "BUY", quantity, targetShares: cs.stockShares + quantity, reason: "delta_hedge", forceHedge };
  }
  return null;
}
