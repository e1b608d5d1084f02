import type { BrokerPosition, HedgeOrderRequest, PaperBook, PaperPosition } from "@gammahedge/shared";
import type { Logger } from "pino";

import type { LegGreeks } from "../positions/positions";
import type { BrokerEvent, BrokerListener, BrokerPort, PlaceOrderResult, Quote } from "./broker.port";

export type PaperFillMode = "IMMEDIATE" | "MANUAL";
export type PaperOrderResponse = "ACK" | "REJECT" | "NO_RESPONSE";

const DAY_MS = 24 * 60 * 60 * 1000;

/** Resolves a `+<N>d` expiry to the YYYYMMDD date N days after `nowMs` (UTC); absolute dates pass through. */
export function resolvePaperExpiry(expiry: string, nowMs: number): string {
  const match = /^\+(\d+)d$/.exec(expiry);
  if (!match) return expiry;
  const date = new Date(nowMs + Number(match[1] ?? "0") * DAY_MS);
  const month = String(date.getUTCMonth() + 1).padStart(2, "0");
  const day = String(date.getUTCDate()).padStart(2, "0");
  return `${date.getUTCFullYear()}${month}${day}`;
}

function seedPosition(position: PaperPosition, nowMs: number): BrokerPosition {
  return position.secType === "OPT" ? { ...position, expiry: resolvePaperExpiry(position.expiry, nowMs) } : { ...position };
}

type PaperOrder = {
  request: HedgeOrderRequest;
  filled: number;
  open: boolean;
};

/**
 * In-process broker seeded from `broker.paper`. Market orders fill at the touch
 * and move the simulated stock position; fill events are published before
 * `placeOrder` resolves, so consumers must queue them.
 *
 * The quote behaves like a live feed and is stamped with the current time on
 * every read, unless {@link PaperBroker.setQuote} pinned an explicit `ts`.
 */
export class PaperBroker implements BrokerPort {
  private readonly listeners = new Set<BrokerListener>();
  private readonly orders = new Map<string, PaperOrder>();
  private readonly greeks: Map<string, LegGreeks>;
  private positions: BrokerPosition[];
  private quote: Quote;
  private pinnedQuoteTs: number | null = null;
  private dailyPnl: number;
  private connected = false;
  private reachable = true;
  private fillMode: PaperFillMode = "IMMEDIATE";
  private orderResponse: PaperOrderResponse = "ACK";
  private nextOrderId = 1;

  constructor(
    private readonly symbol: string,
    seed: PaperBook,
    private readonly logger: Logger,
    private readonly now: () => number = Date.now
  ) {
    this.positions = seed.positions.map((p) => seedPosition(p, now()));
    this.greeks = new Map(seed.greeks.map((g) => [g.contractId, { delta: g.delta, gamma: g.gamma, vega: g.vega, theta: g.theta }]));
    this.quote = { bid: seed.bid, ask: seed.ask, last: (seed.bid + seed.ask) / 2, ts: now() };
    this.dailyPnl = seed.dailyPnl;
  }

  async connect(): Promise<boolean> {
    if (!this.reachable) {
      this.logger.warn({ msg: "Paper broker unreachable" });
      return false;
    }
    if (!this.connected) {
      this.connected = true;
      this.emit({ kind: "connection", connected: true });
    }
    return true;
  }

  async disconnect(): Promise<void> {
    if (!this.connected) return;
    this.connected = false;
    this.emit({ kind: "connection", connected: false });
  }

  isConnected(): boolean {
    return this.connected;
  }

  async getPositions(): Promise<BrokerPosition[]> {
    this.assertConnected("getPositions");
    return this.positions.map((p) => ({ ...p }));
  }

  async getQuote(symbol: string): Promise<Quote | null> {
    this.assertConnected("getQuote");
    if (symbol !== this.symbol) return null;
    return { ...this.quote, ts: this.pinnedQuoteTs ?? this.now() };
  }

  async getGreeks(contractId: string): Promise<LegGreeks | null> {
    this.assertConnected("getGreeks");
    const greeks = this.greeks.get(contractId);
    return greeks ? { ...greeks } : null;
  }

  async getDailyPnl(): Promise<number> {
    this.assertConnected("getDailyPnl");
    return this.dailyPnl;
  }

  async placeOrder(request: HedgeOrderRequest): Promise<PlaceOrderResult> {
    this.assertConnected("placeOrder");

    if (this.orderResponse === "NO_RESPONSE") {
      return new Promise<PlaceOrderResult>(() => undefined);
    }
    if (this.orderResponse === "REJECT" || request.quantity <= 0) {
      return { status: "REJECT", reason: this.orderResponse === "REJECT" ? "paper_reject" : "invalid_quantity" };
    }

    const orderId = `paper-${this.nextOrderId++}`;
    this.orders.set(orderId, { request, filled: 0, open: true });
    this.logger.info({ msg: "Paper order accepted", orderId, side: request.side, quantity: request.quantity });

    if (this.fillMode === "IMMEDIATE") {
      this.fill(orderId, request.quantity);
    }
    return { status: "ACK", orderId };
  }

  async cancelOrder(orderId: string): Promise<boolean> {
    this.assertConnected("cancelOrder");
    const order = this.orders.get(orderId);
    if (!order || !order.open) return false;

    order.open = false;
    this.emit({ kind: "order", orderId, status: "CANCELLED", filledQuantity: order.filled, avgPrice: null });
    return true;
  }

  subscribe(listener: BrokerListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Fills part or all of an open order at the touch. Returns false for unknown or closed orders. */
  fill(orderId: string, quantity: number): boolean {
    const order = this.orders.get(orderId);
    if (!order || !order.open) return false;

    const qty = Math.min(quantity, order.request.quantity - order.filled);
    if (qty <= 0) return false;

    const price = this.touchPrice(order.request);
    order.filled += qty;
    this.applyFill(order.request, qty);

    const complete = order.filled >= order.request.quantity;
    if (complete) order.open = false;
    this.emit({ kind: "order", orderId, status: complete ? "FILLED" : "PARTIAL", filledQuantity: qty, avgPrice: price });
    return true;
  }

  setReachable(reachable: boolean): void {
    this.reachable = reachable;
    if (!reachable && this.connected) {
      this.connected = false;
      this.logger.warn({ msg: "Paper broker connection dropped" });
      this.emit({ kind: "connection", connected: false });
    }
  }

  setQuote(quote: Partial<Quote>): void {
    this.pinnedQuoteTs = quote.ts ?? null;
    this.quote = { ...this.quote, ts: this.now(), ...quote };
    this.emit({ kind: "quote", symbol: this.symbol, quote: { ...this.quote } });
  }

  setLegGreeks(contractId: string, greeks: LegGreeks | null): void {
    if (greeks) this.greeks.set(contractId, greeks);
    else this.greeks.delete(contractId);
  }

  setDailyPnl(pnl: number): void {
    this.dailyPnl = pnl;
  }

  setFillMode(mode: PaperFillMode): void {
    this.fillMode = mode;
  }

  setOrderResponse(response: PaperOrderResponse): void {
    this.orderResponse = response;
  }

  openOrderIds(): string[] {
    return [...this.orders.entries()].filter(([, o]) => o.open).map(([id]) => id);
  }

  private touchPrice(request: HedgeOrderRequest): number | null {
    if (request.orderType === "LIMIT" && request.limitPrice !== undefined) return request.limitPrice;
    return request.side === "BUY" ? this.quote.ask : this.quote.bid;
  }

  private applyFill(request: HedgeOrderRequest, quantity: number): void {
    const signed = request.side === "BUY" ? quantity : -quantity;
    const stock = this.positions.find((p) => p.secType === "STK" && p.symbol === request.symbol);
    if (stock) {
      stock.quantity += signed;
      return;
    }
    this.positions.push({ secType: "STK", contractId: `STK:${request.symbol}`, symbol: request.symbol, quantity: signed });
  }

  private assertConnected(operation: string): void {
    if (!this.connected) {
      throw new Error(`Paper broker not connected (${operation})`);
    }
  }

  private emit(event: BrokerEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}
