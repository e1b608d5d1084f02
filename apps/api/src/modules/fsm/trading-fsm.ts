import type { SafeRecoveryPolicy, TradingState } from "@gammahedge/shared";
import type { Logger } from "pino";

import type { TradingGuards } from "../state/trading-guards";
import { EVALUATION_EVENTS, type TradingEvent } from "./events";

export type TradingPolicy = {
  safeRecovery: SafeRecoveryPolicy;
};

export type TradingTransition = {
  from: TradingState;
  to: TradingState;
  event: TradingEvent;
};

const BAND_STATES: ReadonlySet<TradingState> = new Set<TradingState>(["MONITOR", "NO_TRADE", "PAUSE_COST", "PAUSE_LIQ", "NEED_HEDGE"]);

// No-trade band first, then cost, then liquidity.
function evaluateBand(g: TradingGuards): TradingState {
  if (g.inNoTradeBand) return "NO_TRADE";
  if (g.costOk && g.liquidityOk) return "NEED_HEDGE";
  if (!g.costOk) return "PAUSE_COST";
  return "PAUSE_LIQ";
}

/**
 * Total transition function: every (state, event) pair yields a state, and an
 * event with no matching guard leaves the state unchanged.
 */
export function nextTradingState(state: TradingState, event: TradingEvent, g: TradingGuards, policy: TradingPolicy): TradingState {
  if (event === "shutdown") return state;

  if (g.brokerDown || g.dataStale || g.greeksBad || g.execFault) return "SAFE";

  if (state === "BOOT") {
    return event === "start" ? "SYNC" : state;
  }

  if (state === "HEDGING") {
    if (event === "hedge_done") return "MONITOR";
    if (event === "hedge_failed") return g.retryAllowed ? "NEED_HEDGE" : "SAFE";
    return state;
  }

  if (state === "SAFE") {
    const recoveryEvent = event === "manual_resume" || (policy.safeRecovery === "AUTO" && (event === "broker_up" || event === "tick"));
    return recoveryEvent && g.brokerUp && g.dataOk ? "SYNC" : state;
  }

  if (state === "NEED_HEDGE" && event === "target_emitted") return "HEDGING";

  if (!EVALUATION_EVENTS.has(event)) return state;

  switch (state) {
    case "SYNC":
      return g.positionsOk && g.dataOk ? "IDLE" : state;
    case "IDLE":
      return g.haveOptionPosition && g.strategyEnabled ? "ARMED" : state;
    case "ARMED":
      if (!g.haveOptionPosition || !g.strategyEnabled) return "IDLE";
      return g.deltaBandReady ? "MONITOR" : state;
    default:
      if (!BAND_STATES.has(state)) return state;
      if (!g.haveOptionPosition || !g.strategyEnabled) return "IDLE";
      return evaluateBand(g);
  }
}

export class TradingFsm {
  private state: TradingState = "BOOT";

  constructor(
    private readonly logger: Logger,
    private readonly onTransition?: (transition: TradingTransition, guards: TradingGuards) => void
  ) {}

  get current(): TradingState {
    return this.state;
  }

  apply(event: TradingEvent, guards: TradingGuards, policy: TradingPolicy): TradingTransition | null {
    const from = this.state;
    const to = nextTradingState(from, event, guards, policy);
    if (to === from) return null;

    this.state = to;
    const transition: TradingTransition = { from, to, event };
    this.logger.info({
      msg: "Trading state",
      from,
      to,
      event,
      guards: Object.entries(guards)
        .filter(([, v]) => v)
        .map(([k]) => k)
    });
    this.onTransition?.(transition, guards);
    return transition;
  }
}
