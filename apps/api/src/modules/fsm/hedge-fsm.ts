import type { ExecutionState, HedgeState, OrderSide } from "@gammahedge/shared";
import type { Logger } from "pino";

import type { HedgeEvent } from "./events";

const TABLE: ReadonlyArray<readonly [HedgeState, HedgeEvent, HedgeState]> = [
  ["EXEC_IDLE", "recv_target", "PLAN"],
  ["FILLED", "recv_target", "PLAN"],
  ["PLAN", "plan_skip", "EXEC_IDLE"],
  ["PLAN", "plan_send", "SEND"],
  ["SEND", "place_order", "WAIT_ACK"],
  ["WAIT_ACK", "ack_ok", "WORKING"],
  ["WAIT_ACK", "ack_reject", "FAIL"],
  ["WAIT_ACK", "timeout_ack", "FAIL"],
  ["WAIT_ACK", "broker_down", "FAIL"],
  ["WORKING", "partial_fill", "PARTIAL"],
  ["WORKING", "full_fill", "FILLED"],
  ["WORKING", "timeout_working", "REPRICE"],
  ["WORKING", "risk_trip", "CANCEL"],
  ["WORKING", "manual_cancel", "CANCEL"],
  ["WORKING", "broker_down", "CANCEL"],
  ["PARTIAL", "plan_send", "SEND"],
  ["PARTIAL", "plan_skip", "EXEC_IDLE"],
  ["REPRICE", "place_order", "WAIT_ACK"],
  ["CANCEL", "cancel_sent", "RECOVER"],
  ["RECOVER", "positions_resynced", "EXEC_IDLE"],
  ["RECOVER", "cannot_recover", "FAIL"],
  ["FAIL", "try_resync", "RECOVER"]
];

const TRANSITIONS: ReadonlyMap<string, HedgeState> = new Map(TABLE.map(([from, event, to]) => [`${from}:${event}`, to]));

export function hedgeTransition(from: HedgeState, event: HedgeEvent): HedgeState | null {
  return TRANSITIONS.get(`${from}:${event}`) ?? null;
}

export function toExecutionState(state: HedgeState, connected: boolean): ExecutionState {
  if (!connected) return "DISCONNECTED";
  switch (state) {
    case "EXEC_IDLE":
    case "FILLED":
      return "IDLE";
    case "PARTIAL":
      return "PARTIAL_FILL";
    case "FAIL":
      return "BROKER_ERROR";
    default:
      return "ORDER_WORKING";
  }
}

export type HedgeTarget = {
  side: OrderSide;
  quantity: number;
  targetShares: number;
  reason: string;
};

export type HedgeTransitionListener = (from: HedgeState, to: HedgeState, event: HedgeEvent) => void;

/**
 * Execution layer for one hedge at a time. A new target is accepted only from
 * EXEC_IDLE or FILLED, which is what keeps a second order from going out while
 * one is still in flight.
 */
export class HedgeFsm {
  private state: HedgeState = "EXEC_IDLE";
  private connected = true;
  private enteredAtMs: number;
  private target: HedgeTarget | null = null;
  private remainingShares = 0;
  private workingOrderId: string | null = null;
  private reprices = 0;

  constructor(
    private readonly logger: Logger,
    private readonly now: () => number = Date.now,
    private readonly onTransition?: HedgeTransitionListener
  ) {
    this.enteredAtMs = now();
  }

  get current(): HedgeState {
    return this.state;
  }

  get currentTarget(): HedgeTarget | null {
    return this.target;
  }

  get remaining(): number {
    return this.remainingShares;
  }

  get orderId(): string | null {
    return this.workingOrderId;
  }

  get repriceCount(): number {
    return this.reprices;
  }

  /** Milliseconds spent in the current state. */
  timeInState(): number {
    return this.now() - this.enteredAtMs;
  }

  setConnected(connected: boolean): void {
    this.connected = connected;
  }

  isConnected(): boolean {
    return this.connected;
  }

  effectiveExecutionState(): ExecutionState {
    return toExecutionState(this.state, this.connected);
  }

  canPlaceOrder(): boolean {
    return this.state === "EXEC_IDLE" || this.state === "FILLED";
  }

  /** Accepts a new hedge target; refused unless the previous cycle has finished. */
  receiveTarget(target: HedgeTarget): boolean {
    if (!this.canPlaceOrder()) {
      this.logger.warn({ msg: "Hedge target refused while order in flight", state: this.state, target });
      return false;
    }
    this.target = target;
    this.remainingShares = target.quantity;
    this.workingOrderId = null;
    this.reprices = 0;
    return this.fire("recv_target");
  }

  /** Plans the remaining quantity: send when at least the minimum, otherwise skip. */
  plan(minHedgeShares: number): boolean {
    return this.fire(this.remainingShares >= minHedgeShares ? "plan_send" : "plan_skip");
  }

  orderPlaced(orderId: string | null): boolean {
    const fromReprice = this.state === "REPRICE";
    const applied = this.fire("place_order");
    if (applied) {
      this.workingOrderId = orderId;
      if (fromReprice) this.reprices += 1;
    }
    return applied;
  }

  acknowledged(orderId: string): boolean {
    const applied = this.fire("ack_ok");
    if (applied) this.workingOrderId = orderId;
    return applied;
  }

  filled(quantity: number, complete: boolean): boolean {
    const applied = this.fire(complete ? "full_fill" : "partial_fill");
    if (applied) {
      this.remainingShares = complete ? 0 : Math.max(0, this.remainingShares - quantity);
    }
    return applied;
  }

  fire(event: HedgeEvent): boolean {
    const from = this.state;
    const to = hedgeTransition(from, event);
    if (to === null) {
      this.logger.debug({ msg: "Hedge event ignored", state: from, event });
      return false;
    }

    this.state = to;
    this.enteredAtMs = this.now();
    if (to === "EXEC_IDLE") {
      this.workingOrderId = null;
    }
    this.logger.debug({ msg: "Hedge state", from, to, event });
    this.onTransition?.(from, to, event);
    return true;
  }
}
