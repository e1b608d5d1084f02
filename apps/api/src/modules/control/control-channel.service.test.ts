import { describe, expect, it } from "vitest";

import { ControlChannelService } from "./control-channel.service";

describe("ControlChannelService", () => {
  it("drains commands once, in arrival order", () => {
    const channel = new ControlChannelService();
    channel.enqueue("suspend");
    channel.enqueue("resume");
    channel.enqueue("stop");

    expect(channel.drain().map((c) => c.command)).toEqual(["suspend", "resume", "stop"]);
    expect(channel.drain()).toEqual([]);
    expect(channel.pending()).toBe(0);
  });

  it("wakes the consumer on enqueue", () => {
    const channel = new ControlChannelService();
    let wakes = 0;
    channel.onEnqueue(() => {
      wakes += 1;
    });

    channel.enqueue("retry_broker");
    channel.onEnqueue(null);
    channel.enqueue("stop");

    expect(wakes).toBe(1);
    expect(channel.pending()).toBe(2);
  });
});
