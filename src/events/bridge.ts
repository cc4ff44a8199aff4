// ---------------------------------------------------------------------------
// EventBridge – device lifecycle → SSE consumers → event stream manager
// ---------------------------------------------------------------------------
// SSE readers hand payloads to `push`, which never waits: it drops into a
// bounded channel that one drain task empties into the EventStreamManager.
// ---------------------------------------------------------------------------

import type { FetchLike } from "../alpaca/client.js";
import type { EventStreamMode } from "../config/types.js";
import type { ConnectionManager } from "../devices/connection-manager.js";
import type { DeviceDescriptor } from "../devices/types.js";
import type { ServiceLog } from "../logging.js";
import { formatError } from "../logging.js";
import { BoundedQueue } from "./queue.js";
import { SseConsumer } from "./sse-consumer.js";
import type { EventStreamManager } from "./stream.js";
import type { EventPayload } from "./types.js";

export const DEFAULT_CHANNEL_SIZE = 1_000;

type BridgedEvent = {
  deviceId: string;
  payload: EventPayload;
};

export type EventBridgeDeps = {
  events: Pick<EventStreamManager, "addEvent" | "setDeviceMetadata">;
  mode: EventStreamMode;
  log: ServiceLog;
  channelSize?: number;
  fetch?: FetchLike;
  eventPort?: number | null;
  reconnectDelayMs?: number;
};

/** Whether a connected device gets an SSE consumer under `mode`. */
export function streamsEvents(descriptor: DeviceDescriptor, mode: EventStreamMode): boolean {
  switch (mode) {
    case "all":
      return true;
    case "off":
      return false;
    case "auto":
      return descriptor.name.toLowerCase().includes("seestar");
  }
}

export class EventBridge {
  readonly consumer: SseConsumer;
  private channel: BoundedQueue<BridgedEvent>;
  private drainTask: Promise<void> | null = null;
  private dropped = 0;

  constructor(private readonly deps: EventBridgeDeps) {
    this.channel = new BoundedQueue(deps.channelSize ?? DEFAULT_CHANNEL_SIZE);
    this.consumer = new SseConsumer({
      sink: (deviceId, payload) => {
        if (!this.push(deviceId, payload)) {
          this.deps.log.warn(`event channel full or closed; dropped event from ${deviceId}`);
        }
      },
      log: deps.log,
      fetch: deps.fetch,
      eventPort: deps.eventPort,
      reconnectDelayMs: deps.reconnectDelayMs,
    });
  }

  get running(): boolean {
    return this.drainTask !== null;
  }

  get pending(): number {
    return this.channel.size;
  }

  get droppedCount(): number {
    return this.dropped;
  }

  /** Enqueue without waiting. False when the channel is full or closed. */
  push(deviceId: string, payload: EventPayload): boolean {
    const accepted = this.channel.offer({ deviceId, payload });
    if (!accepted) {
      this.dropped++;
    }
    return accepted;
  }

  start(): void {
    if (this.drainTask) {
      return;
    }
    if (this.channel.closed) {
      this.channel = new BoundedQueue(this.deps.channelSize ?? DEFAULT_CHANNEL_SIZE);
    }
    this.drainTask = this.drain(this.channel);
    this.deps.log.info("event bridge started");
  }

  /** Stop every consumer, then forward whatever is still queued. */
  async stop(): Promise<void> {
    await this.consumer.stopAll();
    this.channel.close();
    if (this.drainTask) {
      await this.drainTask;
      this.drainTask = null;
    }
    this.deps.log.info("event bridge stopped");
  }

  private async drain(channel: BoundedQueue<BridgedEvent>): Promise<void> {
    for await (const { deviceId, payload } of channel) {
      try {
        await this.deps.events.addEvent(deviceId, payload);
      } catch (err) {
        this.deps.log.error(`storing event for ${deviceId} failed: ${formatError(err)}`);
      }
    }
  }

  // -------------------------------------------------------------------------
  // Device lifecycle
  // -------------------------------------------------------------------------

  /** Register the connect/disconnect hooks. Returns a function that removes them. */
  attach(manager: Pick<ConnectionManager, "registerEventCallback">): () => void {
    const offConnected = manager.registerEventCallback("on_device_connected", (deviceId, descriptor) =>
      this.onDeviceConnected(deviceId, descriptor),
    );
    const offDisconnected = manager.registerEventCallback("on_device_disconnected", (deviceId) =>
      this.consumer.stopConsuming(deviceId),
    );
    return () => {
      offConnected();
      offDisconnected();
    };
  }

  async onDeviceConnected(deviceId: string, descriptor: DeviceDescriptor): Promise<void> {
    if (!streamsEvents(descriptor, this.deps.mode)) {
      this.deps.log.debug(`${deviceId} does not stream events (mode ${this.deps.mode})`);
      return;
    }
    await this.deps.events.setDeviceMetadata(deviceId, {
      name: descriptor.name,
      type: descriptor.type,
      host: descriptor.host,
      port: descriptor.port,
      device_number: descriptor.number,
    });
    this.consumer.startConsuming(deviceId, {
      host: descriptor.host,
      port: descriptor.port,
      deviceNumber: descriptor.number,
    });
  }
}
