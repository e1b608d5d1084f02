import type { DaemonConfig, OrderSide } from "@gammahedge/shared";
import type { Logger } from "pino";

import { getEtClock, isInEarningsBlackout, isRegularTradingHours } from "./market-clock";

export type GuardSettings = Pick<DaemonConfig, "sizing" | "risk" | "eligibility">;

export type HedgeRequest = {
  side: OrderSide;
  quantity: number;
  /** Stock position before the hedge. */
  currentPosition: number;
  spreadPct: number | null;
  spot: number | null;
  forceHedge: boolean;
  dailyPnl: number;
};

export type GuardRejectReason =
  | "circuit_breaker"
  | "cooldown"
  | "max_daily_hedge_count"
  | "max_position"
  | "spread_too_wide"
  | "outside_rth"
  | "earnings_blackout";

export type GuardDecision = { allowed: true } | { allowed: false; reason: GuardRejectReason };

export type ExecutionGuardSnapshot = {
  tradingDay: string | null;
  dailyHedgeCount: number;
  lastHedgeTs: number | null;
  lastHedgePrice: number | null;
  circuitBreaker: boolean;
  dailyPnl: number;
};

/**
 * Risk limits in front of every hedge order. The circuit breaker latches for the
 * rest of the New York trading day and is not bypassed by a forced hedge.
 */
export class ExecutionGuard {
  private tradingDay: string | null = null;
  private dailyHedgeCount = 0;
  private lastHedgeTs: number | null = null;
  private lastHedgePrice: number | null = null;
  private circuitBreaker = false;
  private dailyPnl = 0;

  constructor(
    private readonly logger: Logger,
    private readonly now: () => number = Date.now
  ) {}

  snapshot(): ExecutionGuardSnapshot {
    return {
      tradingDay: this.tradingDay,
      dailyHedgeCount: this.dailyHedgeCount,
      lastHedgeTs: this.lastHedgeTs,
      lastHedgePrice: this.lastHedgePrice,
      circuitBreaker: this.circuitBreaker,
      dailyPnl: this.dailyPnl
    };
  }

  isHalted(): boolean {
    return this.circuitBreaker;
  }

  /** Resets daily counters when the New York calendar day changes. Returns true on a roll. */
  rollDay(nowMs: number = this.now()): boolean {
    const today = getEtClock(nowMs).date;
    if (this.tradingDay === today) return false;

    const previous = this.tradingDay;
    this.tradingDay = today;
    if (previous === null) return false;

    this.dailyHedgeCount = 0;
    this.circuitBreaker = false;
    this.dailyPnl = 0;
    this.logger.info({ msg: "Trading day rolled", from: previous, to: today });
    return true;
  }

  /** Records the broker's daily P&L. Returns true when this observation tripped the breaker. */
  observeDailyPnl(pnl: number, settings: Pick<GuardSettings, "risk">): boolean {
    this.dailyPnl = pnl;
    if (this.circuitBreaker || pnl > -settings.risk.maxDailyLossUsd) return false;
    this.tripCircuitBreaker(pnl, settings.risk.maxDailyLossUsd);
    return true;
  }

  allowHedge(request: HedgeRequest, settings: GuardSettings): GuardDecision {
    const { sizing, risk, eligibility } = settings;
    const nowMs = this.now();

    if (this.circuitBreaker) return this.reject("circuit_breaker", request);

    if (!request.forceHedge && this.lastHedgeTs !== null && nowMs - this.lastHedgeTs < sizing.cooldownSeconds * 1000) {
      return this.reject("cooldown", request);
    }

    if (this.dailyHedgeCount >= risk.maxDailyHedgeCount) return this.reject("max_daily_hedge_count", request);

    const signed = request.side === "BUY" ? request.quantity : -request.quantity;
    if (Math.abs(request.currentPosition + signed) > risk.maxPositionShares) return this.reject("max_position", request);

    if (risk.maxSpreadPct !== undefined && request.spreadPct !== null && request.spreadPct > risk.maxSpreadPct) {
      return this.reject("spread_too_wide", request);
    }

    if (eligibility.tradingHoursOnly && !isRegularTradingHours(nowMs)) return this.reject("outside_rth", request);

    if (isInEarningsBlackout(nowMs, eligibility.earningsDates, eligibility.blackoutDaysBefore, eligibility.blackoutDaysAfter)) {
      return this.reject("earnings_blackout", request);
    }

    if (request.dailyPnl <= -risk.maxDailyLossUsd) {
      this.tripCircuitBreaker(request.dailyPnl, risk.maxDailyLossUsd);
      return this.reject("circuit_breaker", request);
    }

    this.dailyHedgeCount += 1;
    this.lastHedgeTs = nowMs;
    if (request.spot !== null) this.lastHedgePrice = request.spot;
    return { allowed: true };
  }

  private tripCircuitBreaker(pnl: number, limit: number): void {
    this.circuitBreaker = true;
    this.logger.error({ msg: "Circuit breaker tripped", dailyPnl: pnl, maxDailyLossUsd: limit });
  }

  private reject(reason: GuardRejectReason, request: HedgeRequest): GuardDecision {
    this.logger.info({ msg: "Hedge blocked by execution guard", reason, side: request.side, quantity: request.quantity });
    return { allowed: false, reason };
  }
}
