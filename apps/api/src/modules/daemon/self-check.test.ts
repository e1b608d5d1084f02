import { describe, expect, it } from "vitest";

import { deriveDaemonCheck, deriveSelfCheck, deriveStatusCheck, type StatusCheckInput } from "./self-check";

const healthy: StatusCheckInput = {
  daemonState: "RUNNING",
  tradingState: "MONITOR",
  composite: { O: "LONG_GAMMA", D: "IN_BAND", M: "NORMAL", L: "NORMAL", E: "IDLE", S: "OK" },
  lastGateReason: null
};

describe("deriveStatusCheck", () => {
  it("is green for a healthy running daemon", () => {
    expect(deriveStatusCheck(healthy)).toEqual({ level: "ok", lamp: "green", reasons: [] });
  });

  it("blocks without a status or a live daemon", () => {
    expect(deriveStatusCheck(null)).toEqual({ level: "blocked", lamp: "red", reasons: ["no_status"] });
    expect(deriveStatusCheck({ ...healthy, daemonState: "STOPPED" })).toEqual({
      level: "blocked",
      lamp: "red",
      reasons: ["daemon_not_running"]
    });
  });

  it("collects every degradation reason", () => {
    const check = deriveStatusCheck({
      daemonState: "RUNNING_SUSPENDED",
      tradingState: "SAFE",
      composite: { O: "LONG_GAMMA", D: "HEDGE_NEEDED", M: "STALE", L: "NORMAL", E: "IDLE", S: "RISK_HALT" },
      lastGateReason: "cooldown"
    });

    expect(check).toEqual({
      level: "degraded",
      lamp: "yellow",
      reasons: ["trading_suspended", "data_stale", "trading_state_safe", "risk_halt", "gate_cooldown"]
    });
  });
});

describe("deriveDaemonCheck", () => {
  it("requires a recent heartbeat", () => {
    const base = { lastHeartbeatMs: 1_000, nowMs: 31_000, heartbeatIntervalMs: 10_000, brokerConnected: true };

    expect(deriveDaemonCheck(base).level).toBe("ok");
    expect(deriveDaemonCheck({ ...base, nowMs: 31_001 }).reasons).toEqual(["daemon_heartbeat_missing"]);
    expect(deriveDaemonCheck({ ...base, lastHeartbeatMs: null }).level).toBe("blocked");
    expect(deriveDaemonCheck({ ...base, brokerConnected: false })).toEqual({
      level: "degraded",
      lamp: "yellow",
      reasons: ["broker_not_connected"]
    });
  });
});

describe("deriveSelfCheck", () => {
  it("combines both checks", () => {
    expect(
      deriveSelfCheck({ ...healthy, tradingState: "PAUSE_LIQ" }, { lastHeartbeatMs: 0, nowMs: 0, heartbeatIntervalMs: 10_000, brokerConnected: false })
    ).toEqual({
      selfCheck: "degraded",
      statusLamp: "yellow",
      blockReasons: ["trading_state_pause_liq"],
      daemonSelfCheck: "degraded",
      daemonLamp: "yellow",
      daemonBlockReasons: ["broker_not_connected"]
    });
  });
});
