import { describe, expect, it } from "vitest";

import {
  BrokerPositionSchema,
  DaemonConfigPatchSchema,
  DaemonConfigSchema,
  defaultDaemonConfig,
  PaperBookSchema,
  summarizeConfig
} from "./daemon-config";

describe("DaemonConfigSchema", () => {
  it("fills every section with defaults", () => {
    const config = defaultDaemonConfig();

    expect(config.classification.delta).toEqual({ epsilonBand: 10, hedgeThreshold: 25, maxDeltaLimit: 500 });
    expect(config.classification.liquidity).toEqual({ wideSpreadPct: 0.1, extremeSpreadPct: 0.5 });
    expect(config.classification.system.dataLagThresholdMs).toBe(1000);
    expect(config.classification.market.staleTsThresholdMs).toBe(5000);
    expect(config.sizing).toEqual({ minHedgeShares: 10, maxHedgeSharesPerOrder: 500, cooldownSeconds: 60, minPriceMovePct: 0.2 });
    expect(config.risk.maxDailyLossUsd).toBe(5000);
    expect(config.risk.maxSpreadPct).toBeUndefined();
    expect(config.eligibility.minDte).toBe(21);
    expect(config.eligibility.maxDte).toBe(35);
    expect(config.daemon.safeRecovery).toBe("MANUAL");
    expect(config.daemon.brokerTimeoutMs).toBe(5000);
    expect(config.broker.paper.positions).toEqual([]);
  });

  it("keeps defaults for sibling fields when a section is partially given", () => {
    const config = DaemonConfigSchema.parse({ classification: { delta: { hedgeThreshold: 40 } } });

    expect(config.classification.delta).toEqual({ epsilonBand: 10, hedgeThreshold: 40, maxDeltaLimit: 500 });
    expect(config.classification.liquidity.wideSpreadPct).toBe(0.1);
  });

  it("rejects out-of-order delta thresholds", () => {
    const result = DaemonConfigSchema.safeParse({ classification: { delta: { epsilonBand: 30, hedgeThreshold: 25 } } });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(["classification", "delta", "epsilonBand"]);
    }
  });

  it("rejects a DTE window that is inverted", () => {
    expect(DaemonConfigSchema.safeParse({ eligibility: { minDte: 40, maxDte: 35 } }).success).toBe(false);
  });

  it("rejects malformed earnings dates", () => {
    expect(DaemonConfigSchema.safeParse({ eligibility: { earningsDates: ["2026/01/02"] } }).success).toBe(false);
  });

  it("parses option positions with a default multiplier", () => {
    const config = DaemonConfigSchema.parse({
      broker: {
        paper: {
          positions: [
            { secType: "OPT", contractId: "c1", symbol: "SPY", quantity: 1, expiry: "20261120", strike: 100, right: "C" }
          ]
        }
      }
    });

    const [leg] = config.broker.paper.positions;
    expect(leg?.secType === "OPT" ? leg.multiplier : null).toBe(100);
  });
});

describe("PaperBookSchema", () => {
  const leg = { secType: "OPT", contractId: "C100", symbol: "SPY", quantity: 1, strike: 100, right: "C" };

  it("accepts a relative expiry for paper legs only", () => {
    expect(PaperBookSchema.safeParse({ positions: [{ ...leg, expiry: "+28d" }] }).success).toBe(true);
    expect(PaperBookSchema.safeParse({ positions: [{ ...leg, expiry: "28d" }] }).success).toBe(false);
    expect(BrokerPositionSchema.safeParse({ ...leg, expiry: "+28d" }).success).toBe(false);
    expect(BrokerPositionSchema.safeParse({ ...leg, expiry: "20260130" }).success).toBe(true);
  });
});

describe("DaemonConfigPatchSchema", () => {
  it("leaves absent keys out of a partial section", () => {
    const patch = DaemonConfigPatchSchema.parse({ sizing: { cooldownSeconds: 30 } });

    expect(patch.sizing).toEqual({ cooldownSeconds: 30 });
    expect(patch.risk).toBeUndefined();
  });
});

describe("summarizeConfig", () => {
  it("exposes the thresholds an operator needs", () => {
    const summary = summarizeConfig(defaultDaemonConfig());

    expect(summary).toEqual({
      symbol: "SPY",
      orderType: "MARKET",
      epsilonBand: 10,
      hedgeThreshold: 25,
      maxDeltaLimit: 500,
      minHedgeShares: 10,
      maxHedgeSharesPerOrder: 500,
      cooldownSeconds: 60,
      maxDailyHedgeCount: 50,
      maxDailyLossUsd: 5000,
      safeRecovery: "MANUAL",
      tradingHoursOnly: true,
      strategyEnabled: true
    });
  });
});
