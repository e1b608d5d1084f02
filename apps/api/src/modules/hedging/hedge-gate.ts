import type { DaemonConfig, HedgeOrderRequest } from "@gammahedge/shared";

import type { CompositeState } from "../state/composite-state";
import { priceMoveSinceLastHedgePct } from "../state/trading-guards";
import type { ExecutionGuard, GuardRejectReason, GuardSettings } from "./execution-guard";
import type { HedgeIntent } from "./hedge-intent";

/**
 * True only when an option structure is held, delta is out of band, the book is
 * quoted, no order is in flight and system health is OK.
 */
export function shouldOutputTarget(cs: CompositeState): boolean {
  if (cs.O !== "LONG_GAMMA" && cs.O !== "SHORT_GAMMA") return false;
  if (cs.D !== "HEDGE_NEEDED" && cs.D !== "FORCE_HEDGE") return false;
  if (cs.L !== "NORMAL" && cs.L !== "WIDE") return false;
  return cs.E === "IDLE" && cs.S === "OK";
}

export type GateRejectReason = "below_min_hedge_shares" | "min_price_move" | GuardRejectReason;

export type GateContext = {
  settings: GuardSettings;
  symbol: string;
  orderType: DaemonConfig["broker"]["orderType"];
  dailyPnl: number;
};

export type GateDecision =
  | { approved: true; order: HedgeOrderRequest; intent: HedgeIntent }
  | { approved: false; reason: GateRejectReason };

function limitPriceFor(intent: HedgeIntent, cs: CompositeState): number | undefined {
  const price = intent.side === "BUY" ? cs.ask : cs.bid;
  return price ?? cs.spot ?? undefined;
}

export function applyHedgeGates(intent: HedgeIntent, cs: CompositeState, guard: ExecutionGuard, context: GateContext): GateDecision {
  const { sizing } = context.settings;

  if (intent.quantity < sizing.minHedgeShares) {
    return { approved: false, reason: "below_min_hedge_shares" };
  }

  const quantity = Math.min(intent.quantity, sizing.maxHedgeSharesPerOrder);
  const forceHedge = cs.D === "FORCE_HEDGE";

  if (!forceHedge && sizing.minPriceMovePct > 0) {
    const move = priceMoveSinceLastHedgePct(cs);
    if (move !== null && move < sizing.minPriceMovePct) {
      return { approved: false, reason: "min_price_move" };
    }
  }

  const decision = guard.allowHedge(
    {
      side: intent.side,
      quantity,
      currentPosition: cs.stockShares,
      spreadPct: cs.spreadPct,
      spot: cs.spot,
      forceHedge,
      dailyPnl: context.dailyPnl
    },
    context.settings
  );
  if (!decision.allowed) return { approved: false, reason: decision.reason };

  const signed = intent.side === "BUY" ? quantity : -quantity;
  const order: HedgeOrderRequest = { symbol: context.symbol, side: intent.side, quantity, orderType: context.orderType };
  if (context.orderType === "LIMIT") {
    const limitPrice = limitPriceFor(intent, cs);
    if (limitPrice !== undefined) order.limitPrice = limitPrice;
  }

  return {
    approved: true,
    order,
    intent: { ...intent, quantity, targetShares: cs.stockShares + signed, forceHedge }
  };
}
