import type { BrokerPosition, HedgeOrderRequest } from "@gammahedge/shared";

import type { LegGreeks } from "../positions/positions";

export const BROKER_PORT = "BROKER_PORT";

export type Quote = {
  bid: number | null;
  ask: number | null;
  last: number | null;
  /** Epoch ms of the last quote update. */
  ts: number | null;
};

export type PlaceOrderResult = { status: "ACK"; orderId: string } | { status: "REJECT"; reason: string };

export type OrderUpdateStatus = "PARTIAL" | "FILLED" | "CANCELLED";

export type BrokerEvent =
  | { kind: "quote"; symbol: string; quote: Quote }
  | { kind: "connection"; connected: boolean }
  | { kind: "order"; orderId: string; status: OrderUpdateStatus; filledQuantity: number; avgPrice: number | null };

export type BrokerListener = (event: BrokerEvent) => void;

/**
 * Everything the daemon needs from a broker session. Implementations must not
 * call listeners synchronously from inside `subscribe`.
 */
export interface BrokerPort {
  connect(): Promise<boolean>;
  disconnect(): Promise<void>;
  isConnected(): boolean;
  getPositions(): Promise<BrokerPosition[]>;
  getQuote(symbol: string): Promise<Quote | null>;
  getGreeks(contractId: string): Promise<LegGreeks | null>;
  placeOrder(request: HedgeOrderRequest): Promise<PlaceOrderResult>;
  cancelOrder(orderId: string): Promise<boolean>;
  getDailyPnl(): Promise<number>;
  subscribe(listener: BrokerListener): () => void;
}
