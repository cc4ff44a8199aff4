// ---------------------------------------------------------------------------
// EventStreamManager – per-device event history and live subscribers
// ---------------------------------------------------------------------------
// Every mutation runs under one event lock. Appending to the ring buffer
// always succeeds; subscriber delivery is best-effort per subscriber.
// ---------------------------------------------------------------------------

import { createSerialLock } from "../infra/serial-lock.js";
import type { ServiceLog } from "../logging.js";
import { BoundedQueue } from "./queue.js";
import { RingBuffer } from "./ring-buffer.js";
import {
  EVENT_TYPES,
  UNKNOWN_EVENT_TYPE,
  type DeviceEvent,
  type EventPayload,
  type EventQuery,
  type EventSnapshot,
} from "./types.js";

export const DEFAULT_SUBSCRIBER_QUEUE_SIZE = 100;

export type EventStreamManagerDeps = {
  bufferSize: number;
  log: ServiceLog;
  nowMs?: () => number;
};

function eventTypeOf(payload: EventPayload): string {
  const value = payload.Event;
  return typeof value === "string" && value.length > 0 ? value : UNKNOWN_EVENT_TYPE;
}

export class EventStreamManager {
  private readonly buffers = new Map<string, RingBuffer<DeviceEvent>>();
  private readonly subscribers = new Map<string, Set<BoundedQueue<DeviceEvent>>>();
  private readonly metadata = new Map<string, Record<string, unknown>>();
  private readonly lock = createSerialLock();

  constructor(private readonly deps: EventStreamManagerDeps) {}

  private now(): number {
    return this.deps.nowMs?.() ?? Date.now();
  }

  // -------------------------------------------------------------------------
  // Writes
  // -------------------------------------------------------------------------

  async addEvent(deviceId: string, payload: EventPayload): Promise<DeviceEvent> {
    return this.lock.run(() => {
      const timestamp = this.now();
      const event: DeviceEvent = {
        device_id: deviceId,
        event_type: eventTypeOf(payload),
        timestamp,
        datetime: new Date(timestamp).toISOString(),
        payload,
      };

      let buffer = this.buffers.get(deviceId);
      if (!buffer) {
        buffer = new RingBuffer<DeviceEvent>(this.deps.bufferSize);
        this.buffers.set(deviceId, buffer);
      }
      buffer.push(event);

      const queues = this.subscribers.get(deviceId);
      if (queues) {
        for (const queue of queues) {
          if (queue.closed) {
            queues.delete(queue);
          } else if (!queue.offer(event)) {
            this.deps.log.warn(`subscriber queue full for ${deviceId}; dropped ${event.event_type} event`);
          }
        }
      }

      this.deps.log.debug(`event ${event.event_type} from ${deviceId}`);
      return event;
    });
  }

  async setDeviceMetadata(deviceId: string, metadata: Record<string, unknown>): Promise<void> {
    await this.lock.run(() => {
      this.metadata.set(deviceId, { ...metadata });
    });
  }

  async clear(deviceId: string): Promise<void> {
    await this.lock.run(() => {
      const buffer = this.buffers.get(deviceId);
      if (buffer) {
        buffer.clear();
        this.deps.log.info(`cleared events for ${deviceId}`);
      }
    });
  }

  // -------------------------------------------------------------------------
  // Reads
  // -------------------------------------------------------------------------

  async getEvents(deviceId: string, query: EventQuery = {}): Promise<EventSnapshot> {
    return this.lock.run(() => {
      const metadata = { ...(this.metadata.get(deviceId) ?? {}) };
      const buffer = this.buffers.get(deviceId);
      if (!buffer) {
        return {
          device_id: deviceId,
          status: "no_events",
          event_count: 0,
          buffer_size: 0,
          events: [],
          metadata,
          available_types: [],
        };
      }

      const all = buffer.toArray();
      let events = all;
      const { sinceMs, types, limit } = query;
      if (sinceMs !== undefined) {
        events = events.filter((e) => e.timestamp > sinceMs);
      }
      if (types && types.length > 0) {
        const wanted = new Set(types);
        events = events.filter((e) => wanted.has(e.event_type));
      }
      // 0 means no limit.
      if (limit !== undefined && limit > 0 && events.length > limit) {
        events = events.slice(-limit);
      }

      return {
        device_id: deviceId,
        status: "active",
        event_count: events.length,
        buffer_size: all.length,
        events,
        metadata,
        available_types: [...new Set(all.map((e) => e.event_type))],
      };
    });
  }

  getEventTypes(): Record<string, string> {
    return { ...EVENT_TYPES };
  }

  subscriberCount(deviceId: string): number {
    let count = 0;
    for (const queue of this.subscribers.get(deviceId) ?? []) {
      if (!queue.closed) count++;
    }
    return count;
  }

  // -------------------------------------------------------------------------
  // Subscriptions
  // -------------------------------------------------------------------------

  async subscribe(deviceId: string, queueSize = DEFAULT_SUBSCRIBER_QUEUE_SIZE): Promise<BoundedQueue<DeviceEvent>> {
    const queue = new BoundedQueue<DeviceEvent>(queueSize);
    await this.lock.run(() => {
      let queues = this.subscribers.get(deviceId);
      if (!queues) {
        queues = new Set();
        this.subscribers.set(deviceId, queues);
      }
      queues.add(queue);
    });
    this.deps.log.info(`new event subscriber for ${deviceId}`);
    return queue;
  }

  async unsubscribe(deviceId: string, queue: BoundedQueue<DeviceEvent>): Promise<void> {
    await this.lock.run(() => {
      const queues = this.subscribers.get(deviceId);
      if (queues?.delete(queue)) {
        this.deps.log.info(`removed event subscriber for ${deviceId}`);
      }
      queue.close();
    });
  }
}
