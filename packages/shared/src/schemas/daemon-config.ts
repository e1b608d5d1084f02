import { z } from "zod";

import { OrderSideSchema } from "./state-space";

export const CONFIG_VERSION = 1 as const;

const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

export const OptionRightSchema = z.enum(["C", "P"]);
export type OptionRight = z.infer<typeof OptionRightSchema>;

const StockPositionSchema = z.object({
  secType: z.literal("STK"),
  contractId: z.string().min(1),
  symbol: z.string().min(1),
  quantity: z.number().int()
});

const OptionPositionSchema = z.object({
  secType: z.literal("OPT"),
  contractId: z.string().min(1),
  symbol: z.string().min(1),
  quantity: z.number().int(),
  expiry: z.string().regex(/^\d{8}$/, "expected YYYYMMDD"),
  strike: z.number().positive(),
  right: OptionRightSchema,
  multiplier: z.number().int().positive().default(100)
});

export const BrokerPositionSchema = z.discriminatedUnion("secType", [StockPositionSchema, OptionPositionSchema]);
export type BrokerPosition = z.infer<typeof BrokerPositionSchema>;
export type OptionPosition = Extract<BrokerPosition, { secType: "OPT" }>;

export const PaperLegGreeksSchema = z.object({
  contractId: z.string().min(1),
  delta: z.number(),
  gamma: z.number(),
  vega: z.number().default(0),
  theta: z.number().default(0)
});
export type PaperLegGreeks = z.infer<typeof PaperLegGreeksSchema>;

/** Paper seeds may give an option expiry relative to startup, e.g. `+28d`. */
export const PaperPositionSchema = z.discriminatedUnion("secType", [
  StockPositionSchema,
  OptionPositionSchema.extend({ expiry: z.string().regex(/^(\d{8}|\+\d{1,4}d)$/, "expected YYYYMMDD or +<days>d") })
]);
export type PaperPosition = z.infer<typeof PaperPositionSchema>;

export const PaperBookSchema = z.object({
  bid: z.number().positive().default(99.95),
  ask: z.number().positive().default(100.05),
  positions: z.array(PaperPositionSchema).default([]),
  greeks: z.array(PaperLegGreeksSchema).default([]),
  dailyPnl: z.number().default(0)
});
export type PaperBook = z.infer<typeof PaperBookSchema>;

export const BrokerConfigSchema = z.object({
  kind: z.literal("PAPER").default("PAPER"),
  orderType: z.enum(["MARKET", "LIMIT"]).default("MARKET"),
  paper: PaperBookSchema.default({})
});
export type BrokerConfig = z.infer<typeof BrokerConfigSchema>;

export const SafeRecoveryPolicySchema = z.enum(["MANUAL", "AUTO"]);
export type SafeRecoveryPolicy = z.infer<typeof SafeRecoveryPolicySchema>;

export const DaemonLoopConfigSchema = z.object({
  heartbeatIntervalMs: z.number().int().min(100).max(300_000).default(10_000),
  reconnectIntervalMs: z.number().int().min(100).max(3_600_000).default(30_000),
  ackTimeoutMs: z.number().int().min(100).max(120_000).default(5_000),
  workingTimeoutMs: z.number().int().min(100).max(600_000).default(30_000),
  brokerTimeoutMs: z.number().int().min(100).max(120_000).default(5_000),
  maxHedgeRetries: z.number().int().min(0).max(20).default(3),
  maxReprices: z.number().int().min(0).max(20).default(2),
  safeRecovery: SafeRecoveryPolicySchema.default("MANUAL"),
  priceWindow: z.number().int().min(2).max(1_000).default(20)
});
export type DaemonLoopConfig = z.infer<typeof DaemonLoopConfigSchema>;

export const EligibilityConfigSchema = z.object({
  symbol: z.string().min(1).default("SPY"),
  minDte: z.number().int().min(0).default(21),
  maxDte: z.number().int().min(0).default(35),
  atmBandPct: z.number().min(0).max(1).default(0.03),
  strategyEnabled: z.boolean().default(true),
  tradingHoursOnly: z.boolean().default(true),
  earningsDates: z.array(IsoDateSchema).default([]),
  blackoutDaysBefore: z.number().int().min(0).max(30).default(3),
  blackoutDaysAfter: z.number().int().min(0).max(30).default(1)
});
export type EligibilityConfig = z.infer<typeof EligibilityConfigSchema>;

export const ClassificationConfigSchema = z.object({
  delta: z
    .object({
      epsilonBand: z.number().nonnegative().default(10),
      hedgeThreshold: z.number().nonnegative().default(25),
      maxDeltaLimit: z.number().positive().default(500)
    })
    .default({}),
  market: z
    .object({
      staleTsThresholdMs: z.number().positive().default(5_000),
      gapPct: z.number().positive().default(0.01),
      trendDriftPct: z.number().positive().default(0.005),
      choppyVolPct: z.number().positive().default(0.02),
      quietVolPct: z.number().positive().default(0.005)
    })
    .default({}),
  liquidity: z
    .object({
      wideSpreadPct: z.number().positive().default(0.1),
      extremeSpreadPct: z.number().positive().default(0.5)
    })
    .default({}),
  system: z
    .object({
      dataLagThresholdMs: z.number().positive().default(1_000)
    })
    .default({})
});
export type ClassificationConfig = z.infer<typeof ClassificationConfigSchema>;

export const SizingConfigSchema = z.object({
  minHedgeShares: z.number().int().min(1).default(10),
  maxHedgeSharesPerOrder: z.number().int().min(1).default(500),
  cooldownSeconds: z.number().min(0).default(60),
  // Percent of the last hedge price, e.g. 0.2 means 0.2%.
  minPriceMovePct: z.number().min(0).default(0.2)
});
export type SizingConfig = z.infer<typeof SizingConfigSchema>;

export const RiskConfigSchema = z.object({
  maxDailyHedgeCount: z.number().int().min(0).default(50),
  maxPositionShares: z.number().int().min(0).default(2_000),
  maxDailyLossUsd: z.number().positive().default(5_000),
  maxSpreadPct: z.number().positive().optional()
});
export type RiskConfig = z.infer<typeof RiskConfigSchema>;

export const ApiConfigSchema = z.object({
  apiKey: z.string().min(8).optional()
});
export type ApiConfig = z.infer<typeof ApiConfigSchema>;

export const DaemonConfigSchema = z
  .object({
    version: z.literal(CONFIG_VERSION).default(CONFIG_VERSION),
    updatedAt: z.string().min(1).optional(),
    broker: BrokerConfigSchema.default({}),
    daemon: DaemonLoopConfigSchema.default({}),
    eligibility: EligibilityConfigSchema.default({}),
    classification: ClassificationConfigSchema.default({}),
    sizing: SizingConfigSchema.default({}),
    risk: RiskConfigSchema.default({}),
    api: ApiConfigSchema.default({})
  })
  .superRefine((value, ctx) => {
    const { delta, liquidity } = value.classification;
    if (delta.epsilonBand > delta.hedgeThreshold) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "epsilonBand must not exceed hedgeThreshold",
        path: ["classification", "delta", "epsilonBand"]
      });
    }
    if (delta.hedgeThreshold > delta.maxDeltaLimit) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "hedgeThreshold must not exceed maxDeltaLimit",
        path: ["classification", "delta", "hedgeThreshold"]
      });
    }
    if (liquidity.wideSpreadPct > liquidity.extremeSpreadPct) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "wideSpreadPct must not exceed extremeSpreadPct",
        path: ["classification", "liquidity", "wideSpreadPct"]
      });
    }
    if (value.eligibility.minDte > value.eligibility.maxDte) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "minDte must not exceed maxDte",
        path: ["eligibility", "minDte"]
      });
    }
    if (value.sizing.minHedgeShares > value.sizing.maxHedgeSharesPerOrder) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "minHedgeShares must not exceed maxHedgeSharesPerOrder",
        path: ["sizing", "minHedgeShares"]
      });
    }
  });

export type DaemonConfig = z.infer<typeof DaemonConfigSchema>;
export type DaemonConfigInput = z.input<typeof DaemonConfigSchema>;

export const DaemonConfigPatchSchema = z.object({
  broker: z.object({ orderType: z.enum(["MARKET", "LIMIT"]).optional() }).optional(),
  daemon: DaemonLoopConfigSchema.partial().optional(),
  eligibility: EligibilityConfigSchema.partial().optional(),
  classification: z
    .object({
      delta: ClassificationConfigSchema.shape.delta.removeDefault().partial().optional(),
      market: ClassificationConfigSchema.shape.market.removeDefault().partial().optional(),
      liquidity: ClassificationConfigSchema.shape.liquidity.removeDefault().partial().optional(),
      system: ClassificationConfigSchema.shape.system.removeDefault().partial().optional()
    })
    .optional(),
  sizing: SizingConfigSchema.partial().optional(),
  risk: RiskConfigSchema.partial().optional()
});
export type DaemonConfigPatch = z.infer<typeof DaemonConfigPatchSchema>;

export function defaultDaemonConfig(): DaemonConfig {
  return DaemonConfigSchema.parse({});
}

export type ConfigSummary = {
  symbol: string;
  orderType: DaemonConfig["broker"]["orderType"];
  epsilonBand: number;
  hedgeThreshold: number;
  maxDeltaLimit: number;
  minHedgeShares: number;
  maxHedgeSharesPerOrder: number;
  cooldownSeconds: number;
  maxDailyHedgeCount: number;
  maxDailyLossUsd: number;
  safeRecovery: SafeRecoveryPolicy;
  tradingHoursOnly: boolean;
  strategyEnabled: boolean;
};

export function summarizeConfig(config: DaemonConfig): ConfigSummary {
  return {
    symbol: config.eligibility.symbol,
    orderType: config.broker.orderType,
    epsilonBand: config.classification.delta.epsilonBand,
    hedgeThreshold: config.classification.delta.hedgeThreshold,
    maxDeltaLimit: config.classification.delta.maxDeltaLimit,
    minHedgeShares: config.sizing.minHedgeShares,
    maxHedgeSharesPerOrder: config.sizing.maxHedgeSharesPerOrder,
    cooldownSeconds: config.sizing.cooldownSeconds,
    maxDailyHedgeCount: config.risk.maxDailyHedgeCount,
    maxDailyLossUsd: config.risk.maxDailyLossUsd,
    safeRecovery: config.daemon.safeRecovery,
    tradingHoursOnly: config.eligibility.tradingHoursOnly,
    strategyEnabled: config.eligibility.strategyEnabled
  };
}

export const HedgeOrderRequestSchema = z.object({
  symbol: z.string().min(1),
  side: OrderSideSchema,
  quantity: z.number().int().positive(),
  orderType: z.enum(["MARKET", "LIMIT"]),
  limitPrice: z.number().positive().optional()
});
export type HedgeOrderRequest = z.infer<typeof HedgeOrderRequestSchema>;
