// ---------------------------------------------------------------------------
// SSE consumer – one background reader per device event feed
// ---------------------------------------------------------------------------
// State machine per device:
//   idle → connecting → streaming → (disconnected → connecting)* → cancelled
// Any failure (non-200, socket error, end of stream) moves to disconnected
// and reconnects after a fixed delay until the task is cancelled.
// ---------------------------------------------------------------------------

import { setTimeout as delay } from "node:timers/promises";
import type { FetchLike } from "../alpaca/client.js";
import type { ServiceLog } from "../logging.js";
import { formatError } from "../logging.js";
import type { EventPayload } from "./types.js";

export const DEFAULT_RECONNECT_DELAY_MS = 5_000;

export type SseTarget = {
  host: string;
  port: number;
  deviceNumber: number;
};

export type ConsumerState = "idle" | "connecting" | "streaming" | "disconnected" | "cancelled";

export type EventSink = (deviceId: string, payload: EventPayload) => void | Promise<void>;

export type SseConsumerDeps = {
  sink: EventSink;
  log: ServiceLog;
  fetch?: FetchLike;
  /** Port the feed is served on when it differs from the device API port. */
  eventPort?: number | null;
  reconnectDelayMs?: number;
};

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/** `<pre>2025-08-01 10:06:55.8: {...}</pre>`; the stamp itself contains colons. */
const ENVELOPE = /^<pre>.*?: (\{.*\})<\/pre>$/s;

function isPlainObject(value: unknown): value is EventPayload {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Decode one `data:` value. Returns null for anything but a JSON object. */
export function parseSseData(data: string): EventPayload | null {
  const trimmed = data.trim();
  const match = ENVELOPE.exec(trimmed);
  const json = match?.[1] ?? trimmed;
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    return null;
  }
  return isPlainObject(parsed) ? parsed : null;
}

/** The value of an SSE `data:` field line, or null for any other line. */
export function sseDataField(line: string): string | null {
  if (!line.startsWith("data:")) {
    return null;
  }
  const value = line.slice(5);
  return value.startsWith(" ") ? value.slice(1) : value;
}

export function eventFeedUrl(target: SseTarget, eventPort?: number | null): string {
  return `http://${target.host}:${eventPort ?? target.port}/${target.deviceNumber}/events`;
}

// ---------------------------------------------------------------------------
// SseConsumer
// ---------------------------------------------------------------------------

type ChunkReader = {
  read: () => Promise<{ done: boolean; value?: Uint8Array }>;
  releaseLock: () => void;
};

type ConsumerTask = {
  url: string;
  controller: AbortController;
  done: Promise<void>;
};

export class SseConsumer {
  private readonly tasks = new Map<string, ConsumerTask>();
  private readonly states = new Map<string, ConsumerState>();

  constructor(private readonly deps: SseConsumerDeps) {}

  getState(deviceId: string): ConsumerState {
    return this.states.get(deviceId) ?? "idle";
  }

  isConsuming(deviceId: string): boolean {
    return this.tasks.has(deviceId);
  }

  activeDevices(): string[] {
    return [...this.tasks.keys()];
  }

  /** Start reading `deviceId`'s feed. Returns false when a reader is already running. */
  startConsuming(deviceId: string, target: SseTarget): boolean {
    if (this.tasks.has(deviceId)) {
      this.deps.log.debug(`already consuming events for ${deviceId}`);
      return false;
    }
    const url = eventFeedUrl(target, this.deps.eventPort);
    const controller = new AbortController();
    const done = this.consume(deviceId, url, controller.signal).catch((err: unknown) => {
      this.deps.log.error(`event consumer for ${deviceId} failed: ${formatError(err)}`);
      this.states.set(deviceId, "cancelled");
    });
    this.tasks.set(deviceId, { url, controller, done });
    this.deps.log.info(`started event consumer for ${deviceId} at ${url}`);
    return true;
  }

  /** Cancel the reader and wait until it has finished. */
  async stopConsuming(deviceId: string): Promise<void> {
    const task = this.tasks.get(deviceId);
    if (!task) {
      return;
    }
    this.tasks.delete(deviceId);
    task.controller.abort();
    await task.done;
    this.deps.log.info(`stopped event consumer for ${deviceId}`);
  }

  async stopAll(): Promise<void> {
    await Promise.all([...this.tasks.keys()].map((id) => this.stopConsuming(id)));
  }

  // -------------------------------------------------------------------------
  // Reader loop
  // -------------------------------------------------------------------------

  private async consume(deviceId: string, url: string, signal: AbortSignal): Promise<void> {
    const { log } = this.deps;
    const fetchImpl = this.deps.fetch ?? fetch;
    const reconnectDelayMs = this.deps.reconnectDelayMs ?? DEFAULT_RECONNECT_DELAY_MS;

    while (!signal.aborted) {
      this.states.set(deviceId, "connecting");
      try {
        const res = await fetchImpl(url, { signal, headers: { Accept: "text/event-stream" } });
        if (res.status !== 200 || !res.body) {
          log.warn(`event feed ${url} answered ${res.status}`);
          await res.body?.cancel();
        } else {
          this.states.set(deviceId, "streaming");
          log.info(`event feed connected for ${deviceId}`);
          await this.readFeed(deviceId, res.body.getReader(), signal);
          log.info(`event feed for ${deviceId} ended`);
        }
      } catch (err) {
        if (signal.aborted) {
          break;
        }
        log.warn(`event feed error for ${deviceId}: ${formatError(err)}`);
      }

      if (signal.aborted) {
        break;
      }
      this.states.set(deviceId, "disconnected");
      try {
        await delay(reconnectDelayMs, undefined, { signal });
      } catch (err) {
        if (!signal.aborted) {
          throw err;
        }
      }
    }
    this.states.set(deviceId, "cancelled");
  }

  private async readFeed(
    deviceId: string,
    reader: ChunkReader,
    signal: AbortSignal,
  ): Promise<void> {
    const decoder = new TextDecoder();
    let pending = "";
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done || signal.aborted) {
          break;
        }
        pending += decoder.decode(value, { stream: true });
        const lines = pending.split(/\r?\n/);
        pending = lines.pop() ?? "";
        for (const line of lines) {
          await this.handleLine(deviceId, line);
        }
      }
    } finally {
      reader.releaseLock();
    }
  }

  private async handleLine(deviceId: string, line: string): Promise<void> {
    const data = sseDataField(line);
    if (data === null) {
      return;
    }
    const payload = parseSseData(data);
    if (!payload) {
      this.deps.log.debug(`dropping unparsable event data from ${deviceId}: ${data.slice(0, 100)}`);
      return;
    }
    try {
      await this.deps.sink(deviceId, payload);
    } catch (err) {
      this.deps.log.error(`forwarding event from ${deviceId} failed: ${formatError(err)}`);
    }
  }
}
