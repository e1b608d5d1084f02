import { BadRequestException, Controller, Get, Inject, Param, Post, Query } from "@nestjs/common";
import type { OperationRecord, SelfCheck, StatusSnapshot } from "@gammahedge/shared";
import { ControlCommandSchema } from "@gammahedge/shared";

import { ConfigService } from "../config/config.service";
import { deriveSelfCheck } from "../daemon/self-check";
import { RECENT_OPERATIONS_LIMIT, STATUS_SINK, type StatusSink } from "../sink/status-sink";
import { ControlChannelService, type QueuedCommand } from "./control-channel.service";

const CONNECTED_DAEMON_STATES: ReadonlySet<StatusSnapshot["daemonState"]> = new Set<StatusSnapshot["daemonState"]>([
  "CONNECTED",
  "RUNNING",
  "RUNNING_SUSPENDED"
]);

@Controller()
export class ControlController {
  constructor(
    private readonly controlChannel: ControlChannelService,
    private readonly configService: ConfigService,
    @Inject(STATUS_SINK) private readonly sink: StatusSink
  ) {}

  @Post("control/:command")
  sendCommand(@Param("command") raw: string): { ok: true; queued: QueuedCommand } {
    const parsed = ControlCommandSchema.safeParse(raw);
    if (!parsed.success) {
      throw new BadRequestException(`Unknown control command: ${raw}. Expected one of ${ControlCommandSchema.options.join(", ")}.`);
    }
    return { ok: true, queued: this.controlChannel.enqueue(parsed.data) };
  }

  /** Latest snapshot with the self-check re-derived against the current time. */
  @Get("status")
  getStatus(): { status: StatusSnapshot | null; selfCheck: SelfCheck } {
    const status = this.sink.latestStatus();
    const heartbeatMs = status ? Date.parse(status.ts) : Number.NaN;
    const selfCheck = deriveSelfCheck(status, {
      lastHeartbeatMs: Number.isFinite(heartbeatMs) ? heartbeatMs : null,
      nowMs: Date.now(),
      heartbeatIntervalMs: this.configService.load().daemon.heartbeatIntervalMs,
      brokerConnected: status !== null && CONNECTED_DAEMON_STATES.has(status.daemonState)
    });
    return { status, selfCheck };
  }

  @Get("operations")
  getOperations(@Query("limit") limit?: string): OperationRecord[] {
    const parsed = limit === undefined ? 50 : Number.parseInt(limit, 10);
    if (!Number.isFinite(parsed) || parsed < 1 || parsed > RECENT_OPERATIONS_LIMIT) {
      throw new BadRequestException(`limit must be an integer between 1 and ${RECENT_OPERATIONS_LIMIT}.`);
    }
    return this.sink.recentOperations(parsed);
  }
}
