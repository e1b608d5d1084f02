import { z } from "zod";

import { CompositeDimensionsSchema, DaemonStateSchema, HedgeStateSchema, OrderSideSchema, TradingStateSchema } from "./state-space";

export const STATUS_VERSION = 1 as const;

export const OperationTypeSchema = z.enum(["hedge_intent", "order_sent", "fill", "reject", "cancel"]);
export type OperationType = z.infer<typeof OperationTypeSchema>;

export const OperationRecordSchema = z.object({
  id: z.string().min(1),
  ts: z.string().min(1),
  type: OperationTypeSchema,
  side: OrderSideSchema,
  quantity: z.number().nonnegative(),
  price: z.number().positive().optional(),
  reason: z.string().min(1),
  orderId: z.string().min(1).optional()
});
export type OperationRecord = z.infer<typeof OperationRecordSchema>;

export const ControlCommandSchema = z.enum(["stop", "flatten", "suspend", "resume", "retry_broker"]);
export type ControlCommand = z.infer<typeof ControlCommandSchema>;

export const SelfCheckLevelSchema = z.enum(["ok", "degraded", "blocked"]);
export type SelfCheckLevel = z.infer<typeof SelfCheckLevelSchema>;

export const StatusLampSchema = z.enum(["green", "yellow", "red"]);
export type StatusLamp = z.infer<typeof StatusLampSchema>;

export const SelfCheckSchema = z.object({
  selfCheck: SelfCheckLevelSchema,
  statusLamp: StatusLampSchema,
  blockReasons: z.array(z.string().min(1)),
  daemonSelfCheck: SelfCheckLevelSchema,
  daemonLamp: StatusLampSchema,
  daemonBlockReasons: z.array(z.string().min(1))
});
export type SelfCheck = z.infer<typeof SelfCheckSchema>;

export const InFlightOrderSchema = z.object({
  hedgeState: HedgeStateSchema,
  side: OrderSideSchema,
  quantity: z.number().int().nonnegative(),
  remaining: z.number().int().nonnegative(),
  orderId: z.string().min(1).optional(),
  reason: z.string().min(1)
});
export type InFlightOrder = z.infer<typeof InFlightOrderSchema>;

export const StatusSnapshotSchema = z.object({
  version: z.literal(STATUS_VERSION),
  ts: z.string().min(1),
  daemonState: DaemonStateSchema,
  tradingState: TradingStateSchema,
  hedgeState: HedgeStateSchema,
  symbol: z.string().min(1),
  spot: z.number().nullable(),
  bid: z.number().nullable(),
  ask: z.number().nullable(),
  netDelta: z.number().nullable(),
  stockPosition: z.number().int(),
  optionLegsCount: z.number().int().nonnegative(),
  dailyHedgeCount: z.number().int().nonnegative(),
  dailyPnl: z.number(),
  dataLagMs: z.number().nullable(),
  composite: CompositeDimensionsSchema.nullable(),
  lastGateReason: z.string().min(1).nullable(),
  inFlightOrder: InFlightOrderSchema.nullable(),
  configSummary: z.record(z.unknown()),
  selfCheck: SelfCheckSchema
});
export type StatusSnapshot = z.infer<typeof StatusSnapshotSchema>;
