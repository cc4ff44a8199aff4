import { describe, it, expect, vi } from "vitest";
import { EventBridge } from "../../events/bridge.js";
import { EventStreamManager } from "../../events/stream.js";
import { EVENT_TYPES } from "../../events/types.js";
import { createDeviceEventsTool } from "./device-events-tool.js";

const NOW = Date.parse("2026-04-01T12:00:00.000Z");

function makeLog() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function setup() {
  let now = NOW;
  const events = new EventStreamManager({ bufferSize: 10, log: makeLog(), nowMs: () => now++ });
  const bridge = new EventBridge({ events, mode: "auto", log: makeLog() });
  const tool = createDeviceEventsTool({ events, bridge });
  return { tool, events };
}

describe("device_events tool", () => {
  it("returns filtered history with the stream state", async () => {
    const { tool, events } = setup();
    await events.addEvent("telescope_1", { Event: "PiStatus", battery: 80 });
    await events.addEvent("telescope_1", { Event: "GotoComplete" });
    await events.addEvent("telescope_1", { Event: "PiStatus", battery: 79 });

    const result = await tool.execute("call-1", {
      action: "history",
      deviceId: "telescope_1",
      types: ["PiStatus"],
      limit: 1,
    });

    expect(result.details).toEqual({
      success: true,
      device_id: "telescope_1",
      status: "active",
      event_count: 1,
      buffer_size: 3,
      events: [
        {
          device_id: "telescope_1",
          event_type: "PiStatus",
          timestamp: NOW + 2,
          datetime: new Date(NOW + 2).toISOString(),
          payload: { Event: "PiStatus", battery: 79 },
        },
      ],
      metadata: {},
      available_types: ["PiStatus", "GotoComplete"],
      stream_state: "idle",
    });
  });

  it("accepts a comma separated type list and a since bound", async () => {
    const { tool, events } = setup();
    await events.addEvent("telescope_1", { Event: "PiStatus" });
    await events.addEvent("telescope_1", { Event: "Stack" });
    await events.addEvent("telescope_1", { Event: "GotoComplete" });

    const result = await tool.execute("call-1", {
      action: "history",
      deviceId: "telescope_1",
      types: "Stack, GotoComplete",
      since: NOW,
    });

    expect(result.details).toMatchObject({ event_count: 2 });
  });

  it("reports no_events for a quiet device", async () => {
    const { tool } = setup();
    const result = await tool.execute("call-1", { action: "history", deviceId: "camera_1" });
    expect(result.details).toEqual({
      success: true,
      device_id: "camera_1",
      status: "no_events",
      event_count: 0,
      buffer_size: 0,
      events: [],
      metadata: {},
      available_types: [],
      stream_state: "idle",
    });
  });

  it("clears history", async () => {
    const { tool, events } = setup();
    await events.addEvent("telescope_1", { Event: "PiStatus" });

    const result = await tool.execute("call-1", { action: "clear", deviceId: "telescope_1" });
    expect(result.details).toEqual({ success: true, device_id: "telescope_1", cleared: true });
    expect((await events.getEvents("telescope_1")).buffer_size).toBe(0);
  });

  it("lists event types", async () => {
    const { tool } = setup();
    const result = await tool.execute("call-1", { action: "types" });
    expect(result.details).toEqual({ success: true, event_types: { ...EVENT_TYPES } });
  });

  it("rejects a non-numeric limit", async () => {
    const { tool } = setup();
    const result = await tool.execute("call-1", { action: "history", deviceId: "telescope_1", limit: "many" });
    expect(result.details).toMatchObject({
      success: false,
      error: "invalid_parameter",
      message: "limit must be a number",
    });
  });
});
