import { BadRequestException } from "@nestjs/common";
import { defaultDaemonConfig } from "@gammahedge/shared";
import { describe, expect, it } from "vitest";

import type { ConfigService } from "../config/config.service";
import { makeStatusSnapshot, MemoryStatusSink } from "../sink/status-sink.testing";
import { ControlChannelService } from "./control-channel.service";
import { ControlController } from "./control.controller";

function setup(): { controller: ControlController; channel: ControlChannelService; sink: MemoryStatusSink } {
  const channel = new ControlChannelService();
  const sink = new MemoryStatusSink();
  const config = defaultDaemonConfig();
  const configService = { load: () => config };
  return { controller: new ControlController(channel, configService as unknown as ConfigService, sink), channel, sink };
}

describe("ControlController", () => {
  it("queues valid commands", () => {
    const { controller, channel } = setup();

    const response = controller.sendCommand("suspend");

    expect(response.queued.command).toBe("suspend");
    expect(channel.drain().map((c) => c.command)).toEqual(["suspend"]);
  });

  it("rejects unknown commands", () => {
    const { controller, channel } = setup();

    expect(() => controller.sendCommand("restart")).toThrow(BadRequestException);
    expect(channel.pending()).toBe(0);
  });

  it("reports a blocked self-check without a status", () => {
    const { controller } = setup();

    expect(controller.getStatus()).toEqual({
      status: null,
      selfCheck: {
        selfCheck: "blocked",
        statusLamp: "red",
        blockReasons: ["no_status"],
        daemonSelfCheck: "blocked",
        daemonLamp: "red",
        daemonBlockReasons: ["daemon_heartbeat_missing"]
      }
    });
  });

  it("marks an old heartbeat as missing", () => {
    const { controller, sink } = setup();
    sink.writeStatus(makeStatusSnapshot({ ts: "2020-01-01T00:00:00.000Z" }));

    const { selfCheck } = controller.getStatus();

    expect(selfCheck.selfCheck).toBe("ok");
    expect(selfCheck.daemonBlockReasons).toEqual(["daemon_heartbeat_missing"]);
  });

  it("treats a fresh running snapshot as healthy", () => {
    const { controller, sink } = setup();
    sink.writeStatus(makeStatusSnapshot({ ts: new Date().toISOString() }));

    expect(controller.getStatus().selfCheck.daemonSelfCheck).toBe("ok");
  });

  it("serves recent operations with a bounded limit", () => {
    const { controller, sink } = setup();
    for (const id of ["op-1", "op-2", "op-3"]) {
      sink.recordOperation({ id, ts: "2026-01-05T15:00:00.000Z", type: "fill", side: "BUY", quantity: 10, reason: "filled" });
    }

    expect(controller.getOperations("2").map((o) => o.id)).toEqual(["op-2", "op-3"]);
    expect(controller.getOperations().length).toBe(3);
    expect(() => controller.getOperations("0")).toThrow(BadRequestException);
    expect(controller.getOperations("200").length).toBe(3);
    expect(() => controller.getOperations("201")).toThrow("limit must be an integer between 1 and 200.");
  });
});
