import type { SelfCheck, SelfCheckLevel, StatusLamp, StatusSnapshot } from "@gammahedge/shared";

const LIVE_DAEMON_STATES: ReadonlySet<StatusSnapshot["daemonState"]> = new Set<StatusSnapshot["daemonState"]>([
  "CONNECTING",
  "WAITING_IB",
  "CONNECTED",
  "RUNNING",
  "RUNNING_SUSPENDED"
]);

// A heartbeat older than this many intervals counts as a dead loop.
const HEARTBEAT_GRACE_INTERVALS = 3;

type Verdict = { level: SelfCheckLevel; lamp: StatusLamp; reasons: string[] };

const LAMPS: Readonly<Record<SelfCheckLevel, StatusLamp>> = { ok: "green", degraded: "yellow", blocked: "red" };

function verdict(level: SelfCheckLevel, reasons: string[]): Verdict {
  return { level, lamp: LAMPS[level], reasons };
}

export type StatusCheckInput = Pick<StatusSnapshot, "daemonState" | "tradingState" | "composite" | "lastGateReason">;

export function deriveStatusCheck(status: StatusCheckInput | null): Verdict {
  if (!status) return verdict("blocked", ["no_status"]);
  if (!LIVE_DAEMON_STATES.has(status.daemonState)) return verdict("blocked", ["daemon_not_running"]);

  const reasons: string[] = [];
  if (status.daemonState === "RUNNING_SUSPENDED") reasons.push("trading_suspended");
  if (status.composite && (status.composite.S === "DATA_LAG" || status.composite.M === "STALE")) reasons.push("data_stale");
  if (status.tradingState === "SAFE") reasons.push("trading_state_safe");
  if (status.tradingState === "PAUSE_COST") reasons.push("trading_state_pause_cost");
  if (status.tradingState === "PAUSE_LIQ") reasons.push("trading_state_pause_liq");
  if (status.composite?.S === "RISK_HALT") reasons.push("risk_halt");
  if (status.lastGateReason) reasons.push(`gate_${status.lastGateReason}`);

  return reasons.length > 0 ? verdict("degraded", reasons) : verdict("ok", []);
}

export type DaemonCheckInput = {
  lastHeartbeatMs: number | null;
  nowMs: number;
  heartbeatIntervalMs: number;
  brokerConnected: boolean;
};

export function deriveDaemonCheck(input: DaemonCheckInput): Verdict {
  const alive = input.lastHeartbeatMs !== null && input.nowMs - input.lastHeartbeatMs <= HEARTBEAT_GRACE_INTERVALS * input.heartbeatIntervalMs;
  if (!alive) return verdict("blocked", ["daemon_heartbeat_missing"]);
  if (!input.brokerConnected) return verdict("degraded", ["broker_not_connected"]);
  return verdict("ok", []);
}

export function deriveSelfCheck(status: StatusCheckInput | null, daemon: DaemonCheckInput): SelfCheck {
  const statusCheck = deriveStatusCheck(status);
  const daemonCheck = deriveDaemonCheck(daemon);
  return {
    selfCheck: statusCheck.level,
    statusLamp: statusCheck.lamp,
    blockReasons: statusCheck.reasons,
    daemonSelfCheck: daemonCheck.level,
    daemonLamp: daemonCheck.lamp,
    daemonBlockReasons: daemonCheck.reasons
  };
}
