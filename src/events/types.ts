// ---------------------------------------------------------------------------
// Device events – Core Types
// ---------------------------------------------------------------------------

export type EventPayload = Record<string, unknown>;

export type DeviceEvent = {
  device_id: string;
  /** The payload's `Event` field, or "Unknown". */
  event_type: string;
  /** Epoch milliseconds at arrival. */
  timestamp: number;
  datetime: string;
  payload: EventPayload;
};

export type EventQuery = {
  /** Only events strictly newer than this epoch-ms instant. */
  sinceMs?: number;
  types?: string[];
  /** Keep the most recent N after filtering. */
  limit?: number;
};

export type EventStreamStatus = "no_events" | "active";

export type EventSnapshot = {
  device_id: string;
  status: EventStreamStatus;
  event_count: number;
  buffer_size: number;
  events: DeviceEvent[];
  metadata: Record<string, unknown>;
  available_types: string[];
};

/** Event types Seestar telescopes emit on their SSE feed. */
export const EVENT_TYPES: Readonly<Record<string, string>> = {
  PiStatus: "System status updates (battery, temperature)",
  GotoComplete: "Telescope movement completed",
  BalanceSensor: "Balance sensor updates",
  EqModePA: "Polar alignment status",
  Stack: "Image stacking progress",
  ViewChanged: "View state changes",
  MountEvent: "Mount status changes",
};

export const UNKNOWN_EVENT_TYPE = "Unknown";
