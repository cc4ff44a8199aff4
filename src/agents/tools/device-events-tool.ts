// ---------------------------------------------------------------------------
// Device Events Agent Tool – read and clear buffered device events
// ---------------------------------------------------------------------------

import { Type } from "@sinclair/typebox";
import { InvalidParameterError } from "../../devices/errors.js";
import type { EventBridge } from "../../events/bridge.js";
import type { EventStreamManager } from "../../events/stream.js";
import { stringEnum } from "../schema/typebox.js";
import {
  type AnyAgentTool,
  errorResult,
  jsonResult,
  readNumberParam,
  readStringArrayParam,
  readStringParam,
} from "./common.js";

const DEVICE_EVENT_ACTIONS = ["history", "clear", "types"] as const;

const DeviceEventsToolSchema = Type.Object({
  action: stringEnum(DEVICE_EVENT_ACTIONS),
  deviceId: Type.Optional(Type.String({ description: "Device id" })),
  // history
  since: Type.Optional(Type.Number({ description: "Only events after this epoch-milliseconds instant" })),
  types: Type.Optional(Type.Array(Type.String(), { description: "Event types to keep, e.g. GotoComplete" })),
  limit: Type.Optional(Type.Integer({ description: "Most recent N events; 0 for all", minimum: 0 })),
});

export type DeviceEventsToolDeps = {
  events: EventStreamManager;
  bridge?: EventBridge;
};

export function createDeviceEventsTool(deps: DeviceEventsToolDeps): AnyAgentTool {
  const { events, bridge } = deps;
  return {
    label: "Device Events",
    name: "device_events",
    description:
      "Read the recent event history of a connected device (status updates, goto completion, stacking progress), " +
      "clear it, or list the known event types.",
    parameters: DeviceEventsToolSchema,
    execute: async (_toolCallId, params) => {
      try {
        const action = readStringParam(params, "action", { required: true });

        switch (action) {
          case "history": {
            const deviceId = readStringParam(params, "deviceId", { required: true });
            const snapshot = await events.getEvents(deviceId, {
              sinceMs: readNumberParam(params, "since"),
              types: readStringArrayParam(params, "types"),
              limit: readNumberParam(params, "limit"),
            });
            return jsonResult({
              success: true,
              ...snapshot,
              stream_state: bridge?.consumer.getState(deviceId) ?? "idle",
            });
          }

          case "clear": {
            const deviceId = readStringParam(params, "deviceId", { required: true });
            await events.clear(deviceId);
            return jsonResult({ success: true, device_id: deviceId, cleared: true });
          }

          case "types":
            return jsonResult({ success: true, event_types: events.getEventTypes() });

          default:
            throw new InvalidParameterError(
              `Unknown device_events action: ${action}`,
              `Use one of: ${DEVICE_EVENT_ACTIONS.join(", ")}.`,
            );
        }
      } catch (err) {
        return errorResult(err);
      }
    },
  };
}
