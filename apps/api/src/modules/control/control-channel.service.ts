import { Injectable } from "@nestjs/common";
import type { ControlCommand } from "@gammahedge/shared";

export type QueuedCommand = {
  command: ControlCommand;
  receivedAt: string;
};

/** Single-consumer FIFO between the HTTP surface and the daemon loop. */
@Injectable()
export class ControlChannelService {
  private readonly queue: QueuedCommand[] = [];
  private wakeListener: (() => void) | null = null;

  enqueue(command: ControlCommand): QueuedCommand {
    const queued: QueuedCommand = { command, receivedAt: new Date().toISOString() };
    this.queue.push(queued);
    this.wakeListener?.();
    return queued;
  }

  /** Removes and returns every pending command in arrival order. */
  drain(): QueuedCommand[] {
    return this.queue.splice(0, this.queue.length);
  }

  pending(): number {
    return this.queue.length;
  }

  onEnqueue(listener: (() => void) | null): void {
    this.wakeListener = listener;
  }
}
