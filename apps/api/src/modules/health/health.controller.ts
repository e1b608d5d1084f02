import { Controller, Get } from "@nestjs/common";
import type { DaemonState } from "@gammahedge/shared";

import { DaemonService } from "../daemon/daemon.service";

export type HealthResponse = {
  ok: boolean;
  ts: string;
  daemonState: DaemonState;
  loopRunning: boolean;
};

/** Unauthenticated liveness probe. `ok` is false once the daemon has stopped. */
@Controller("health")
export class HealthController {
  constructor(private readonly daemon: DaemonService) {}

  @Get()
  getHealth(): HealthResponse {
    const daemonState = this.daemon.state.daemon;
    return {
      ok: daemonState !== "STOPPED",
      ts: new Date().toISOString(),
      daemonState,
      loopRunning: this.daemon.isLoopRunning()
    };
  }
}
