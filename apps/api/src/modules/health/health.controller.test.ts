import { describe, expect, it } from "vitest";

import type { DaemonService } from "../daemon/daemon.service";
import { HealthController } from "./health.controller";

function fakeDaemon(daemonState: string, loopRunning: boolean): DaemonService {
  return {
    state: { daemon: daemonState, trading: "BOOT", hedge: "EXEC_IDLE" },
    isLoopRunning: () => loopRunning
  } as unknown as DaemonService;
}

describe("HealthController", () => {
  it("reports the daemon state while the loop runs", () => {
    const health = new HealthController(fakeDaemon("WAITING_IB", true)).getHealth();

    expect(health).toMatchObject({ ok: true, daemonState: "WAITING_IB", loopRunning: true });
  });

  it("is not ok once the daemon has stopped", () => {
    const health = new HealthController(fakeDaemon("STOPPED", false)).getHealth();

    expect(health.ok).toBe(false);
    expect(health.loopRunning).toBe(false);
  });
});
