import { PaperBookSchema, type HedgeOrderRequest } from "@gammahedge/shared";
import pino from "pino";
import { beforeEach, describe, expect, it, vi } from "vitest";

import type { BrokerEvent } from "../broker/broker.port";
import { PaperBroker } from "../broker/paper-broker";
import { HedgeFsm } from "../fsm/hedge-fsm";
import type { HedgeIntent } from "../hedging/hedge-intent";
import { MemoryStatusSink } from "../sink/status-sink.testing";
import { HedgeExecutor, type ExecutorSettings } from "./hedge-executor";

type OrderEvent = Extract<BrokerEvent, { kind: "order" }>;

const logger = pino({ enabled: false });
const settings: ExecutorSettings = { ackTimeoutMs: 20, workingTimeoutMs: 30_000, maxReprices: 1, brokerTimeoutMs: 20, minHedgeShares: 10 };
const order: HedgeOrderRequest = { symbol: "SPY", side: "SELL", quantity: 30, orderType: "MARKET" };
const intent: HedgeIntent = { side: "SELL", quantity: 30, targetShares: -30, reason: "delta_hedge", forceHedge: false };

describe("HedgeExecutor", () => {
  let now: number;
  let broker: PaperBroker;
  let fsm: HedgeFsm;
  let sink: MemoryStatusSink;
  let executor: HedgeExecutor;
  let orderEvents: OrderEvent[];

  beforeEach(async () => {
    now = Date.UTC(2026, 0, 5, 15, 0);
    broker = new PaperBroker("SPY", PaperBookSchema.parse({}), logger, () => now);
    fsm = new HedgeFsm(logger, () => now);
    sink = new MemoryStatusSink();
    executor = new HedgeExecutor(fsm, broker, sink, logger, () => now);
    orderEvents = [];
    broker.subscribe((e) => {
      if (e.kind === "order") orderEvents.push(e);
    });
    await broker.connect();
  });

  function operations(): string[] {
    return sink.operations.map((o) => `${o.type}:${o.quantity}:${o.reason}`);
  }

  it("completes a hedge on a full fill", async () => {
    expect(await executor.submit(order, intent, settings)).toBe("pending");
    expect(fsm.current).toBe("WORKING");
    expect(fsm.orderId).toBe("paper-1");

    const fill = orderEvents[0];
    expect(fill).toMatchObject({ status: "FILLED", filledQuantity: 30 });
    if (!fill) return;

    expect(await executor.onOrderUpdate(fill, settings)).toBe("done");
    expect(fsm.current).toBe("FILLED");
    expect(operations()).toEqual(["hedge_intent:30:delta_hedge", "order_sent:30:delta_hedge", "fill:30:filled"]);
    expect(sink.operations[2]).toMatchObject({ orderId: "paper-1", price: 99.95 });
  });

  it("reports the working order while in flight", async () => {
    broker.setFillMode("MANUAL");
    await executor.submit(order, intent, settings);

    expect(executor.inFlightOrder()).toEqual({
      hedgeState: "WORKING",
      side: "SELL",
      quantity: 30,
      remaining: 30,
      orderId: "paper-1",
      reason: "delta_hedge"
    });
  });

  it("fails and recovers on a reject", async () => {
    broker.setOrderResponse("REJECT");

    expect(await executor.submit(order, intent, settings)).toBe("failed");

    expect(fsm.current).toBe("EXEC_IDLE");
    expect(operations()).toEqual(["hedge_intent:30:delta_hedge", "reject:30:paper_reject"]);
    expect(executor.consecutiveFailures).toBe(1);
    expect(executor.inFlightOrder()).toBeNull();
  });

  it("fails when no acknowledgement arrives in time and waits for a late answer", async () => {
    broker.setOrderResponse("NO_RESPONSE");

    expect(await executor.submit(order, intent, settings)).toBe("failed");

    expect(fsm.current).toBe("RECOVER");
    expect(operations()).toEqual(["hedge_intent:30:delta_hedge", "reject:30:ack_timeout"]);

    now += 29_999;
    await executor.checkTimeouts(settings);
    expect(fsm.current).toBe("RECOVER");

    now += 1;
    await executor.checkTimeouts(settings);
    expect(fsm.current).toBe("EXEC_IDLE");
  });

  it("cancels an order whose acknowledgement arrives after the timeout", async () => {
    broker.setFillMode("MANUAL");
    const place = broker.placeOrder.bind(broker);
    vi.spyOn(broker, "placeOrder").mockImplementationOnce(async (request: HedgeOrderRequest) => {
      await new Promise((resolve) => setTimeout(resolve, 60));
      return place(request);
    });

    expect(await executor.submit(order, intent, settings)).toBe("failed");
    expect(fsm.current).toBe("RECOVER");
    expect(executor.consecutiveFailures).toBe(1);

    expect(await executor.submit(order, intent, settings)).toBe("pending");
    await executor.checkTimeouts(settings);
    expect(fsm.current).toBe("RECOVER");

    await new Promise((resolve) => setTimeout(resolve, 100));
    expect(broker.openOrderIds()).toEqual(["paper-1"]);

    expect(await executor.checkTimeouts(settings)).toBe("pending");
    expect(fsm.current).toBe("EXEC_IDLE");
    expect(broker.openOrderIds()).toEqual([]);
    expect(operations()).toEqual(["hedge_intent:30:delta_hedge", "reject:30:ack_timeout", "cancel:30:late_ack"]);
    expect(sink.operations[2]?.orderId).toBe("paper-1");
  });

  it("cancels the remainder of a partial fill and replans it", async () => {
    broker.setFillMode("MANUAL");
    await executor.submit(order, intent, settings);
    broker.fill("paper-1", 12);

    const partial = orderEvents[0];
    if (!partial) throw new Error("missing partial fill");
    expect(await executor.onOrderUpdate(partial, settings)).toBe("pending");

    expect(fsm.current).toBe("WORKING");
    expect(fsm.orderId).toBe("paper-2");
    expect(fsm.remaining).toBe(18);
    expect(operations()).toEqual([
      "hedge_intent:30:delta_hedge",
      "order_sent:30:delta_hedge",
      "fill:12:partial_fill",
      "cancel:18:partial_remainder",
      "order_sent:18:delta_hedge"
    ]);

    const staleCancel = orderEvents[1];
    expect(staleCancel).toMatchObject({ orderId: "paper-1", status: "CANCELLED" });
    if (!staleCancel) return;
    expect(await executor.onOrderUpdate(staleCancel, settings)).toBe("pending");
    expect(fsm.current).toBe("WORKING");
  });

  it("finishes when the partial remainder is below the minimum", async () => {
    broker.setFillMode("MANUAL");
    await executor.submit(order, intent, settings);
    broker.fill("paper-1", 25);

    const partial = orderEvents[0];
    if (!partial) throw new Error("missing partial fill");

    expect(await executor.onOrderUpdate(partial, settings)).toBe("done");
    expect(fsm.current).toBe("EXEC_IDLE");
  });

  it("reprices a stuck order, then gives up after the limit", async () => {
    broker.setFillMode("MANUAL");
    await executor.submit(order, intent, settings);

    now += 29_999;
    expect(await executor.checkTimeouts(settings)).toBe("pending");
    expect(fsm.orderId).toBe("paper-1");

    now += 1;
    expect(await executor.checkTimeouts(settings)).toBe("pending");
    expect(fsm.orderId).toBe("paper-2");
    expect(fsm.repriceCount).toBe(1);

    now += 30_000;
    expect(await executor.checkTimeouts(settings)).toBe("failed");
    expect(fsm.current).toBe("EXEC_IDLE");
    expect(broker.openOrderIds()).toEqual([]);
    expect(operations()).toEqual([
      "hedge_intent:30:delta_hedge",
      "order_sent:30:delta_hedge",
      "cancel:30:reprice",
      "order_sent:30:reprice",
      "cancel:30:working_timeout"
    ]);
  });

  it("does not reprice when the cancel of the stuck order fails", async () => {
    broker.setFillMode("MANUAL");
    await executor.submit(order, intent, settings);
    vi.spyOn(broker, "cancelOrder").mockRejectedValueOnce(new Error("cancel refused"));

    now += 30_000;
    expect(await executor.checkTimeouts(settings)).toBe("failed");

    expect(fsm.current).toBe("EXEC_IDLE");
    expect(fsm.repriceCount).toBe(0);
    expect(broker.openOrderIds()).toEqual(["paper-1"]);
    expect(operations()).toEqual(["hedge_intent:30:delta_hedge", "order_sent:30:delta_hedge", "cancel:30:reprice"]);
  });

  it("pulls the working order when the loss breaker trips", async () => {
    broker.setFillMode("MANUAL");
    await executor.submit(order, intent, settings);

    expect(await executor.riskTrip(settings)).toBe("failed");

    expect(fsm.current).toBe("EXEC_IDLE");
    expect(broker.openOrderIds()).toEqual([]);
    expect(operations()[2]).toBe("cancel:30:risk_trip");
    expect(await executor.riskTrip(settings)).toBe("pending");
  });

  it("bounds a cancel request the broker never answers", async () => {
    broker.setFillMode("MANUAL");
    await executor.submit(order, intent, settings);
    vi.spyOn(broker, "cancelOrder").mockReturnValueOnce(new Promise<boolean>(() => undefined));

    expect(await executor.cancelInFlight("flatten", settings)).toBe(true);

    expect(fsm.current).toBe("EXEC_IDLE");
    expect(operations()[2]).toBe("cancel:30:flatten");
  });

  it("treats a broker-side cancel as a failed hedge", async () => {
    broker.setFillMode("MANUAL");
    await executor.submit(order, intent, settings);
    await broker.cancelOrder("paper-1");

    const cancelled = orderEvents[0];
    if (!cancelled) throw new Error("missing cancel");

    expect(await executor.onOrderUpdate(cancelled, settings)).toBe("failed");
    expect(fsm.current).toBe("EXEC_IDLE");
    expect(operations()[2]).toBe("cancel:30:broker_cancel");
  });

  it("parks a working order on broker loss and recovers after reconnect", async () => {
    broker.setFillMode("MANUAL");
    await executor.submit(order, intent, settings);

    broker.setReachable(false);
    executor.onBrokerDown();

    expect(fsm.current).toBe("CANCEL");
    expect(fsm.effectiveExecutionState()).toBe("DISCONNECTED");
    expect(await executor.checkTimeouts(settings)).toBe("pending");
    expect(fsm.current).toBe("CANCEL");

    broker.setReachable(true);
    await broker.connect();
    fsm.setConnected(true);
    await executor.checkTimeouts(settings);

    expect(fsm.current).toBe("EXEC_IDLE");
    expect(operations()[2]).toBe("cancel:30:broker_down");
  });

  it("stays in FAIL when the resync fails, and retries later", async () => {
    broker.setOrderResponse("REJECT");
    vi.spyOn(broker, "getPositions").mockRejectedValueOnce(new Error("resync down"));

    expect(await executor.submit(order, intent, settings)).toBe("failed");
    expect(fsm.current).toBe("FAIL");

    await executor.checkTimeouts(settings);
    expect(fsm.current).toBe("EXEC_IDLE");
  });

  it("cancels the working order on flatten", async () => {
    broker.setFillMode("MANUAL");
    await executor.submit(order, intent, settings);

    expect(await executor.cancelInFlight("flatten", settings)).toBe(true);
    expect(fsm.current).toBe("EXEC_IDLE");
    expect(await executor.cancelInFlight("flatten", settings)).toBe(false);
    expect(operations()[2]).toBe("cancel:30:flatten");
  });
});
