// ---------------------------------------------------------------------------
// Alpaca Device Agent Tool – discover, connect and inspect devices
// ---------------------------------------------------------------------------

import { Type } from "@sinclair/typebox";
import type { ConnectionManager } from "../../devices/connection-manager.js";
import type { DiscoveryEngine } from "../../devices/discovery.js";
import { InvalidParameterError } from "../../devices/errors.js";
import { describeDevice } from "../../devices/types.js";
import { stringEnum } from "../schema/typebox.js";
import {
  type AnyAgentTool,
  errorResult,
  jsonResult,
  readNumberParam,
  readStringParam,
} from "./common.js";

const ALPACA_DEVICE_ACTIONS = [
  "discover",
  "list_available",
  "list_connected",
  "connect",
  "disconnect",
  "info",
] as const;

const AlpacaDeviceToolSchema = Type.Object({
  action: stringEnum(ALPACA_DEVICE_ACTIONS),
  // connect / disconnect / info
  deviceId: Type.Optional(
    Type.String({
      description: 'Device id such as "telescope_1", or a direct "name@host:port" string',
    }),
  ),
  // discover
  timeout: Type.Optional(Type.Number({ description: "Discovery timeout in seconds", minimum: 0 })),
});

export type AlpacaDeviceToolDeps = {
  connections: ConnectionManager;
  discovery: DiscoveryEngine;
};

export function createAlpacaDeviceTool(deps: AlpacaDeviceToolDeps): AnyAgentTool {
  const { connections, discovery } = deps;
  return {
    label: "Alpaca Device",
    name: "alpaca_device",
    description:
      "Find and manage ASCOM Alpaca astronomy devices. Run discover to scan the network, then connect by device id " +
      '(e.g. "telescope_1") or directly with "name@host:port". info reports driver details for a device.',
    parameters: AlpacaDeviceToolSchema,
    execute: async (_toolCallId, params) => {
      try {
        const action = readStringParam(params, "action", { required: true });

        switch (action) {
          case "discover": {
            const timeoutS = readNumberParam(params, "timeout");
            const devices = await discovery.discover(
              timeoutS !== undefined ? Math.round(timeoutS * 1000) : undefined,
            );
            return jsonResult({
              success: true,
              count: devices.length,
              devices: devices.map(describeDevice),
              summary: discovery.lastSummary(),
            });
          }

          case "list_available": {
            const devices = connections.listAvailable();
            return jsonResult({ success: true, count: devices.length, devices });
          }

          case "list_connected": {
            const devices = connections.listConnected();
            return jsonResult({ success: true, count: devices.length, devices });
          }

          case "connect": {
            const deviceId = readStringParam(params, "deviceId", { required: true });
            const handle = await connections.connect(deviceId);
            return jsonResult({ success: true, device: handle.view() });
          }

          case "disconnect": {
            const deviceId = readStringParam(params, "deviceId", { required: true });
            const wasConnected = connections.isConnected(deviceId);
            await connections.disconnect(deviceId);
            return jsonResult({ success: true, device_id: deviceId, was_connected: wasConnected });
          }

          case "info": {
            const deviceId = readStringParam(params, "deviceId", { required: true });
            const info = await connections.getDeviceInfo(deviceId);
            return jsonResult({ success: true, device: info });
          }

          default:
            throw new InvalidParameterError(
              `Unknown alpaca_device action: ${action}`,
              `Use one of: ${ALPACA_DEVICE_ACTIONS.join(", ")}.`,
            );
        }
      } catch (err) {
        return errorResult(err);
      }
    },
  };
}
