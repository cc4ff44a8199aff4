import { createAlpacaDeviceTool } from "./agents/tools/alpaca-device-tool.js";
import type { AnyAgentTool } from "./agents/tools/common.js";
import { createDeviceEventsTool } from "./agents/tools/device-events-tool.js";
import type { AlpacaBridgeState } from "./gateway/server-alpaca.js";

export { buildAlpacaBridge, type AlpacaBridgeState, type BuildAlpacaBridgeParams } from "./gateway/server-alpaca.js";
export { loadConfig } from "./config/config.js";
export type { AlpacaBridgeConfig, EventStreamMode } from "./config/types.js";
export { ConnectionManager, ConnectedHandle } from "./devices/connection-manager.js";
export { DiscoveryEngine, type DiscoverySummary } from "./devices/discovery.js";
export { DeviceStateStore } from "./devices/store.js";
export * from "./devices/errors.js";
export type * from "./devices/types.js";
export { EventStreamManager } from "./events/stream.js";
export { EventBridge } from "./events/bridge.js";
export { SseConsumer, type ConsumerState } from "./events/sse-consumer.js";
export type { DeviceEvent, EventSnapshot } from "./events/types.js";
export { AlpacaApiError, AlpacaDeviceClient } from "./alpaca/client.js";
export { createAlpacaDeviceTool, createDeviceEventsTool };
export type { AgentToolResult, AnyAgentTool } from "./agents/tools/common.js";

export function createAlpacaBridgeTools(state: AlpacaBridgeState): AnyAgentTool[] {
  return [
    createAlpacaDeviceTool({ connections: state.connections, discovery: state.discovery }),
    createDeviceEventsTool({ events: state.events, bridge: state.bridge }),
  ];
}
