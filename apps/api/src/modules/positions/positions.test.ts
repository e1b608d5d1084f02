import { describe, expect, it } from "vitest";

import type { BrokerPosition } from "@gammahedge/shared";

import { aggregateGreeks, daysToExpiry, selectStructureLegs, stockSharesOf } from "./positions";

// 2026-01-05T00:00:00Z
const NOW = Date.UTC(2026, 0, 5);

const eligibility = { symbol: "SPY", minDte: 21, maxDte: 35, atmBandPct: 0.03 };

const book: BrokerPosition[] = [
  { secType: "STK", contractId: "stk", symbol: "SPY", quantity: -40 },
  { secType: "STK", contractId: "other", symbol: "QQQ", quantity: 300 },
  { secType: "OPT", contractId: "call", symbol: "SPY", quantity: 2, expiry: "20260202", strike: 101, right: "C", multiplier: 100 },
  { secType: "OPT", contractId: "put", symbol: "SPY", quantity: 2, expiry: "20260202", strike: 101, right: "P", multiplier: 100 },
  { secType: "OPT", contractId: "far-otm", symbol: "SPY", quantity: 1, expiry: "20260202", strike: 120, right: "C", multiplier: 100 },
  { secType: "OPT", contractId: "too-short", symbol: "SPY", quantity: 1, expiry: "20260110", strike: 100, right: "C", multiplier: 100 },
  { secType: "OPT", contractId: "flat", symbol: "SPY", quantity: 0, expiry: "20260202", strike: 100, right: "C", multiplier: 100 }
];

describe("daysToExpiry", () => {
  it("counts whole days to the expiry date", () => {
    expect(daysToExpiry("20260202", NOW)).toBe(28);
    expect(daysToExpiry("20260105", NOW + 3_600_000)).toBe(0);
  });

  it("returns -1 for unparseable expiries", () => {
    expect(daysToExpiry("2026-02-02", NOW)).toBe(-1);
    expect(daysToExpiry("20261340", NOW)).toBe(-1);
  });
});

describe("selectStructureLegs", () => {
  it("keeps in-window near-ATM legs of the symbol", () => {
    const legs = selectStructureLegs(book, 100, eligibility, NOW);

    expect(legs.map((l) => l.contractId)).toEqual(["call", "put"]);
    expect(legs[0]?.dte).toBe(28);
  });

  it("selects nothing without a spot price", () => {
    expect(selectStructureLegs(book, null, eligibility, NOW)).toEqual([]);
  });
});

describe("stockSharesOf", () => {
  it("sums stock positions of the symbol only", () => {
    expect(stockSharesOf(book, "SPY")).toBe(-40);
  });
});

describe("aggregateGreeks", () => {
  it("scales per-share greeks by quantity and multiplier", () => {
    const legs = selectStructureLegs(book, 100, eligibility, NOW);
    const greeks = aggregateGreeks(
      legs,
      new Map([
        ["call", { delta: 0.55, gamma: 0.04, vega: 0.1, theta: -0.05 }],
        ["put", { delta: -0.45, gamma: 0.04, vega: 0.1, theta: -0.05 }]
      ])
    );

    expect(greeks.delta).toBeCloseTo(20, 10);
    expect(greeks.gamma).toBeCloseTo(16, 10);
    expect(greeks.valid).toBe(true);
  });

  it("is invalid when a leg has no greeks", () => {
    const legs = selectStructureLegs(book, 100, eligibility, NOW);

    expect(aggregateGreeks(legs, new Map([["call", null]])).valid).toBe(false);
  });

  it("is a valid zero for an empty structure", () => {
    expect(aggregateGreeks([], new Map())).toEqual({ delta: 0, gamma: 0, vega: 0, theta: 0, valid: true });
  });
});
