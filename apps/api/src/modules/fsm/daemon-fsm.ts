import type { DaemonState } from "@gammahedge/shared";
import type { Logger } from "pino";

const TRANSITIONS: Readonly<Record<DaemonState, readonly DaemonState[]>> = {
  IDLE: ["CONNECTING", "WAITING_IB", "STOPPED"],
  CONNECTING: ["CONNECTED", "WAITING_IB", "STOPPING"],
  WAITING_IB: ["CONNECTING", "CONNECTED", "STOPPING"],
  CONNECTED: ["RUNNING", "WAITING_IB", "STOPPING"],
  RUNNING: ["RUNNING_SUSPENDED", "WAITING_IB", "STOPPING"],
  RUNNING_SUSPENDED: ["RUNNING", "WAITING_IB", "STOPPING"],
  STOPPING: ["STOPPED"],
  STOPPED: []
};

export type DaemonTransitionListener = (from: DaemonState, to: DaemonState) => void;

/**
 * Lifecycle gate. Broker loss parks the daemon in WAITING_IB; only a stop
 * request leads to STOPPING and STOPPED.
 */
export class DaemonFsm {
  private state: DaemonState = "IDLE";

  constructor(
    private readonly logger: Logger,
    private readonly onTransition?: DaemonTransitionListener
  ) {}

  get current(): DaemonState {
    return this.state;
  }

  canTransitionTo(to: DaemonState): boolean {
    return TRANSITIONS[this.state].includes(to);
  }

  transition(to: DaemonState): boolean {
    if (!this.canTransitionTo(to)) {
      this.logger.warn({ msg: "Invalid daemon transition", from: this.state, to, allowed: TRANSITIONS[this.state] });
      return false;
    }
    const from = this.state;
    this.state = to;
    this.logger.info({ msg: "Daemon state", from, to });
    this.onTransition?.(from, to);
    return true;
  }

  isRunning(): boolean {
    return this.state === "RUNNING" || this.state === "RUNNING_SUSPENDED";
  }

  isSuspended(): boolean {
    return this.state === "RUNNING_SUSPENDED";
  }

  isTerminating(): boolean {
    return this.state === "STOPPING" || this.state === "STOPPED";
  }

  brokerLost(): boolean {
    if (this.isTerminating() || this.state === "WAITING_IB") return false;
    return this.transition("WAITING_IB");
  }

  requestStop(): boolean {
    if (this.state === "IDLE") return this.transition("STOPPED");
    if (this.isTerminating()) return false;
    return this.transition("STOPPING");
  }
}
