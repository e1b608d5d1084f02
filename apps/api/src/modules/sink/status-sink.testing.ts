import type { OperationRecord, StatusSnapshot } from "@gammahedge/shared";

import type { StatusSink } from "./status-sink";

export class MemoryStatusSink implements StatusSink {
  readonly statuses: StatusSnapshot[] = [];
  readonly operations: OperationRecord[] = [];

  writeStatus(snapshot: StatusSnapshot): void {
    this.statuses.push(snapshot);
  }

  recordOperation(operation: OperationRecord): void {
    this.operations.push(operation);
  }

  latestStatus(): StatusSnapshot | null {
    return this.statuses[this.statuses.length - 1] ?? null;
  }

  recentOperations(limit = 50): OperationRecord[] {
    return this.operations.slice(-limit);
  }
}

export function makeStatusSnapshot(overrides: Partial<StatusSnapshot> = {}): StatusSnapshot {
  return {
    version: 1,
    ts: "2026-01-05T15:00:00.000Z",
    daemonState: "RUNNING",
    tradingState: "MONITOR",
    hedgeState: "EXEC_IDLE",
    symbol: "SPY",
    spot: 100,
    bid: 99.95,
    ask: 100.05,
    netDelta: 4,
    stockPosition: -20,
    optionLegsCount: 2,
    dailyHedgeCount: 0,
    dailyPnl: 0,
    dataLagMs: 50,
    composite: { O: "LONG_GAMMA", D: "IN_BAND", M: "NORMAL", L: "NORMAL", E: "IDLE", S: "OK" },
    lastGateReason: null,
    inFlightOrder: null,
    configSummary: {},
    selfCheck: {
      selfCheck: "ok",
      statusLamp: "green",
      blockReasons: [],
      daemonSelfCheck: "ok",
      daemonLamp: "green",
      daemonBlockReasons: []
    },
    ...overrides
  };
}
