import type { DaemonConfig, HedgeOrderRequest, InFlightOrder, OperationRecord, OperationType } from "@gammahedge/shared";
import type { Logger } from "pino";

import { withBrokerTimeout } from "../broker/broker-call";
import type { BrokerEvent, BrokerPort, PlaceOrderResult } from "../broker/broker.port";
import type { HedgeFsm } from "../fsm/hedge-fsm";
import type { HedgeIntent } from "../hedging/hedge-intent";
import type { StatusSink } from "../sink/status-sink";

/** `pending` means nothing terminal happened; the daemon maps the others to hedge_done / hedge_failed. */
export type ExecutionOutcome = "done" | "failed" | "pending";

export type ExecutorSettings = Pick<DaemonConfig["daemon"], "ackTimeoutMs" | "workingTimeoutMs" | "maxReprices" | "brokerTimeoutMs"> & {
  minHedgeShares: number;
};

type OrderUpdate = Extract<BrokerEvent, { kind: "order" }>;

/** `closed` means the broker no longer had the order open; `failed` means the request itself errored or timed out. */
type CancelResult = "cancelled" | "closed" | "failed";

/** A placement that missed its ack deadline; `result` is filled in if the broker answers later. */
type LatePlacement = {
  quantity: number;
  sinceMs: number;
  result: PlaceOrderResult | null;
};

const ACK_TIMEOUT = Symbol("ack_timeout");

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Drives the {@link HedgeFsm} against the broker port: places, tracks, reprices
 * and cancels the single in-flight hedge order, and records every step as an
 * operation in causal order.
 */
export class HedgeExecutor {
  private order: HedgeOrderRequest | null = null;
  private latePlacement: LatePlacement | null = null;
  private failures = 0;
  private nextOperationId = 1;

  constructor(
    private readonly fsm: HedgeFsm,
    private readonly broker: BrokerPort,
    private readonly sink: StatusSink,
    private readonly logger: Logger,
    private readonly now: () => number = Date.now
  ) {}

  /** Consecutive failed hedges since the last completed one. */
  get consecutiveFailures(): number {
    return this.failures;
  }

  inFlightOrder(): InFlightOrder | null {
    const target = this.fsm.currentTarget;
    if (!target || this.fsm.canPlaceOrder()) return null;
    const inFlight: InFlightOrder = {
      hedgeState: this.fsm.current,
      side: target.side,
      quantity: target.quantity,
      remaining: this.fsm.remaining,
      reason: target.reason
    };
    if (this.fsm.orderId) inFlight.orderId = this.fsm.orderId;
    return inFlight;
  }

  async submit(order: HedgeOrderRequest, intent: HedgeIntent, settings: ExecutorSettings): Promise<ExecutionOutcome> {
    const accepted = this.fsm.receiveTarget({
      side: order.side,
      quantity: order.quantity,
      targetShares: intent.targetShares,
      reason: intent.reason
    });
    if (!accepted) return "pending";

    this.order = order;
    this.record("hedge_intent", order.quantity, intent.forceHedge ? "force_hedge" : intent.reason);

    this.fsm.plan(settings.minHedgeShares);
    if (this.fsm.current !== "SEND") return this.finish("done");
    return this.send(order.quantity, settings);
  }

  async onOrderUpdate(update: OrderUpdate, settings: ExecutorSettings): Promise<ExecutionOutcome> {
    if (update.orderId !== this.fsm.orderId || this.fsm.current !== "WORKING") {
      this.logger.debug({ msg: "Order update ignored", orderId: update.orderId, status: update.status, state: this.fsm.current });
      return "pending";
    }

    if (update.status === "FILLED") {
      this.record("fill", update.filledQuantity, "filled", update.avgPrice, update.orderId);
      this.fsm.filled(update.filledQuantity, true);
      return this.finish("done");
    }

    if (update.status === "PARTIAL") {
      this.record("fill", update.filledQuantity, "partial_fill", update.avgPrice, update.orderId);
      this.fsm.filled(update.filledQuantity, false);
      const cancel = await this.cancelAtBroker(update.orderId, this.fsm.remaining, "partial_remainder", settings);
      if (cancel !== "cancelled") {
        // The remainder may still be live or already filled; the next cycle hedges from resynced positions.
        this.logger.warn({ msg: "Partial remainder not replanned", orderId: update.orderId, cancel });
        this.fsm.fire("plan_skip");
        return this.finish("failed");
      }
      this.fsm.plan(settings.minHedgeShares);
      if (this.fsm.current !== "SEND") return this.finish("done");
      return this.send(this.fsm.remaining, settings);
    }

    this.fsm.fire("manual_cancel");
    this.record("cancel", this.fsm.remaining, "broker_cancel", null, update.orderId);
    this.fsm.fire("cancel_sent");
    await this.recover(settings);
    return this.finish("failed");
  }

  /** Housekeeping once per cycle: working-order timeouts and recovery of a failed cycle. */
  async checkTimeouts(settings: ExecutorSettings): Promise<ExecutionOutcome> {
    const state = this.fsm.current;

    if (state === "CANCEL" || state === "FAIL" || state === "RECOVER") {
      if (this.fsm.isConnected()) await this.recover(settings);
      return "pending";
    }

    if (state !== "WORKING" || this.fsm.timeInState() < settings.workingTimeoutMs) return "pending";

    const orderId = this.fsm.orderId;
    if (this.fsm.repriceCount < settings.maxReprices) {
      // The replacement goes out only once the broker confirmed the old order is gone.
      const cancel = orderId ? await this.cancelAtBroker(orderId, this.fsm.remaining, "reprice", settings) : "failed";
      if (cancel === "cancelled") {
        this.fsm.fire("timeout_working");
        await this.refreshLimitPrice(settings);
        return this.send(this.fsm.remaining, settings);
      }
      this.logger.warn({ msg: "Reprice abandoned", orderId, cancel });
      this.fsm.fire("manual_cancel");
      this.fsm.fire("cancel_sent");
      await this.recover(settings);
      return this.finish("failed");
    }

    this.fsm.fire("manual_cancel");
    if (orderId) await this.cancelAtBroker(orderId, this.fsm.remaining, "working_timeout", settings);
    this.fsm.fire("cancel_sent");
    await this.recover(settings);
    return this.finish("failed");
  }

  onBrokerDown(): void {
    const wasWorking = this.fsm.current === "WORKING";
    const orderId = this.fsm.orderId;
    if (this.fsm.fire("broker_down") && wasWorking) {
      this.record("cancel", this.fsm.remaining, "broker_down", null, orderId);
    }
    this.fsm.setConnected(false);
  }

  /** Cancels the working order, used by flatten. Returns false when nothing was working. */
  async cancelInFlight(reason: string, settings: ExecutorSettings): Promise<boolean> {
    const orderId = this.fsm.orderId;
    if (this.fsm.current !== "WORKING" || !orderId) return false;

    this.fsm.fire("manual_cancel");
    await this.cancelAtBroker(orderId, this.fsm.remaining, reason, settings);
    this.fsm.fire("cancel_sent");
    await this.recover(settings);
    this.finish("failed");
    return true;
  }

  /** Pulls the working order after the daily loss breaker tripped. `pending` when nothing was working. */
  async riskTrip(settings: ExecutorSettings): Promise<ExecutionOutcome> {
    const orderId = this.fsm.orderId;
    if (this.fsm.current !== "WORKING" || !orderId) return "pending";

    this.fsm.fire("risk_trip");
    await this.cancelAtBroker(orderId, this.fsm.remaining, "risk_trip", settings);
    this.fsm.fire("cancel_sent");
    await this.recover(settings);
    return this.finish("failed");
  }

  /**
   * Resyncs positions after a failure; lands in EXEC_IDLE on success, FAIL otherwise.
   * Stays in RECOVER while a timed-out placement has not been answered yet.
   */
  private async recover(settings: ExecutorSettings): Promise<boolean> {
    if (this.fsm.current === "CANCEL") this.fsm.fire("cancel_sent");
    if (this.fsm.current === "FAIL") this.fsm.fire("try_resync");
    if (this.fsm.current !== "RECOVER") return false;
    if (!(await this.settleLatePlacement(settings))) return false;

    try {
      const positions = await withBrokerTimeout("getPositions", this.broker.getPositions(), settings.brokerTimeoutMs);
      this.fsm.fire("positions_resynced");
      this.logger.info({ msg: "Hedge execution recovered", positions: positions.length });
      this.order = null;
      return true;
    } catch (err) {
      this.logger.warn({ msg: "Position resync failed", err: errorMessage(err) });
      this.fsm.fire("cannot_recover");
      return false;
    }
  }

  /** Returns false while a late placement is still unanswered or its cancel did not go through. */
  private async settleLatePlacement(settings: ExecutorSettings): Promise<boolean> {
    const late = this.latePlacement;
    if (!late) return true;

    if (!late.result) {
      if (this.now() - late.sinceMs < settings.workingTimeoutMs) {
        this.logger.info({ msg: "Waiting for late order acknowledgement", quantity: late.quantity });
        return false;
      }
      this.logger.error({ msg: "Late order acknowledgement never arrived; resyncing anyway", quantity: late.quantity });
      this.latePlacement = null;
      return true;
    }

    if (late.result.status === "REJECT") {
      this.logger.info({ msg: "Late order reject", reason: late.result.reason });
      this.latePlacement = null;
      return true;
    }

    const cancel = await this.cancelAtBroker(late.result.orderId, late.quantity, "late_ack", settings);
    if (cancel === "failed") return false;
    this.latePlacement = null;
    return true;
  }

  private async send(quantity: number, settings: ExecutorSettings): Promise<ExecutionOutcome> {
    const template = this.order;
    if (!template) {
      this.logger.error({ msg: "No order template for send", state: this.fsm.current });
      return "pending";
    }

    const request: HedgeOrderRequest = { ...template, quantity };
    this.fsm.orderPlaced(null);
    const placement = this.broker
      .placeOrder(request)
      .catch((err: unknown): PlaceOrderResult => ({ status: "REJECT", reason: errorMessage(err) }));
    const result = await this.awaitAck(placement, settings.ackTimeoutMs);

    if (result === ACK_TIMEOUT) {
      this.fsm.fire("timeout_ack");
      this.record("reject", quantity, "ack_timeout");
      this.trackLatePlacement(placement, quantity);
      await this.recover(settings);
      return this.finish("failed");
    }

    if (result.status === "REJECT") {
      this.fsm.fire("ack_reject");
      this.record("reject", quantity, result.reason);
      await this.recover(settings);
      return this.finish("failed");
    }

    this.fsm.acknowledged(result.orderId);
    this.record("order_sent", quantity, this.fsm.repriceCount > 0 ? "reprice" : "delta_hedge", request.limitPrice ?? null, result.orderId);
    return "pending";
  }

  private async awaitAck(placement: Promise<PlaceOrderResult>, ackTimeoutMs: number): Promise<PlaceOrderResult | typeof ACK_TIMEOUT> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<typeof ACK_TIMEOUT>((resolve) => {
      timer = setTimeout(() => resolve(ACK_TIMEOUT), ackTimeoutMs);
    });
    try {
      return await Promise.race([placement, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private trackLatePlacement(placement: Promise<PlaceOrderResult>, quantity: number): void {
    const late: LatePlacement = { quantity, sinceMs: this.now(), result: null };
    this.latePlacement = late;
    void placement.then((result) => {
      late.result = result;
      this.logger.warn({ msg: "Order acknowledgement arrived after timeout", result });
    });
  }

  private async cancelAtBroker(orderId: string, quantity: number, reason: string, settings: ExecutorSettings): Promise<CancelResult> {
    let result: CancelResult;
    try {
      const cancelled = await withBrokerTimeout("cancelOrder", this.broker.cancelOrder(orderId), settings.brokerTimeoutMs);
      result = cancelled ? "cancelled" : "closed";
      this.logger.info({ msg: "Cancel requested", orderId, reason, cancelled });
    } catch (err) {
      result = "failed";
      this.logger.warn({ msg: "Cancel request failed", orderId, reason, err: errorMessage(err) });
    }
    this.record("cancel", quantity, reason, null, orderId);
    return result;
  }

  private async refreshLimitPrice(settings: ExecutorSettings): Promise<void> {
    const order = this.order;
    if (!order || order.orderType !== "LIMIT") return;
    try {
      const quote = await withBrokerTimeout("getQuote", this.broker.getQuote(order.symbol), settings.brokerTimeoutMs);
      const price = order.side === "BUY" ? quote?.ask : quote?.bid;
      if (typeof price === "number" && price > 0) this.order = { ...order, limitPrice: price };
    } catch (err) {
      this.logger.warn({ msg: "Quote refresh for reprice failed", err: errorMessage(err) });
    }
  }

  private finish(outcome: "done" | "failed"): ExecutionOutcome {
    this.failures = outcome === "done" ? 0 : this.failures + 1;
    this.logger.info({ msg: "Hedge cycle finished", outcome, hedgeState: this.fsm.current, consecutiveFailures: this.failures });
    return outcome;
  }

  private record(type: OperationType, quantity: number, reason: string, price: number | null = null, orderId: string | null = null): void {
    const side = this.fsm.currentTarget?.side ?? this.order?.side;
    if (!side) return;

    const operation: OperationRecord = {
      id: `op-${this.now()}-${this.nextOperationId++}`,
      ts: new Date(this.now()).toISOString(),
      type,
      side,
      quantity,
      reason
    };
    if (price !== null) operation.price = price;
    if (orderId) operation.orderId = orderId;
    this.sink.recordOperation(operation);
  }
}
