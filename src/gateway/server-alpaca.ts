// ---------------------------------------------------------------------------
// Alpaca Bridge Builder – wires config, store, manager, discovery, events
// ---------------------------------------------------------------------------

import type { FetchLike } from "../alpaca/client.js";
import { createAlpacaClientFactory, type DeviceClientFactory } from "../alpaca/clients.js";
import { loadConfig } from "../config/config.js";
import type { AlpacaBridgeConfig } from "../config/types.js";
import { ConnectionManager } from "../devices/connection-manager.js";
import { createDefaultStrategies, DiscoveryEngine } from "../devices/discovery.js";
import type { TcpCheck } from "../devices/discovery-strategies.js";
import { DeviceStateStore } from "../devices/store.js";
import type { UdpProbe } from "../devices/udp-probe.js";
import { EventBridge } from "../events/bridge.js";
import { EventStreamManager } from "../events/stream.js";
import type { RetryOptions } from "../infra/retry.js";
import { getChildLogger, setLogLevel, toServiceLog } from "../logging.js";

export type AlpacaBridgeState = {
  config: AlpacaBridgeConfig;
  store: DeviceStateStore;
  connections: ConnectionManager;
  discovery: DiscoveryEngine;
  events: EventStreamManager;
  bridge: EventBridge;
  /** Load persisted devices and start the event drain. */
  start: () => Promise<void>;
  /** Disconnect all devices, stop consumers, stop the bridge. */
  shutdown: () => Promise<void>;
};

export type BuildAlpacaBridgeParams = {
  cfg?: AlpacaBridgeConfig;
  env?: NodeJS.ProcessEnv;
  fetch?: FetchLike;
  probe?: UdpProbe;
  checkTcp?: TcpCheck;
  createClient?: DeviceClientFactory;
  retry?: Pick<RetryOptions, "maxAttempts" | "baseDelayMs" | "maxDelayMs" | "sleep">;
  reconnectDelayMs?: number;
  nowMs?: () => number;
};

export function buildAlpacaBridge(params: BuildAlpacaBridgeParams = {}): AlpacaBridgeState {
  const config = params.cfg ?? loadConfig({ env: params.env });
  if (!params.cfg) {
    setLogLevel(config.logLevel);
  }

  const store = new DeviceStateStore({
    storePath: config.statePath,
    log: toServiceLog(getChildLogger({ module: "device-store" })),
    nowMs: params.nowMs,
  });

  const connections = new ConnectionManager({
    config: config.discovery,
    store,
    createClient: params.createClient ?? createAlpacaClientFactory({ fetch: params.fetch }),
    log: toServiceLog(getChildLogger({ module: "connections" })),
    nowMs: params.nowMs,
    retry: params.retry,
  });

  const discoveryLog = toServiceLog(getChildLogger({ module: "discovery" }));
  const discovery = new DiscoveryEngine({
    registry: connections,
    store,
    strategies: createDefaultStrategies(config.discovery, {
      log: discoveryLog,
      fetch: params.fetch,
      probe: params.probe,
      checkTcp: params.checkTcp,
    }),
    defaultTimeoutMs: config.discovery.timeoutMs,
    log: discoveryLog,
    nowMs: params.nowMs,
  });

  const events = new EventStreamManager({
    bufferSize: config.events.bufferSize,
    log: toServiceLog(getChildLogger({ module: "events" })),
    nowMs: params.nowMs,
  });

  const bridge = new EventBridge({
    events,
    mode: config.events.mode,
    log: toServiceLog(getChildLogger({ module: "event-bridge" })),
    fetch: params.fetch,
    eventPort: config.events.port,
    reconnectDelayMs: params.reconnectDelayMs,
  });
  const detach = bridge.attach(connections);

  return {
    config,
    store,
    connections,
    discovery,
    events,
    bridge,
    start: async () => {
      await connections.initialize();
      bridge.start();
    },
    shutdown: async () => {
      await connections.shutdown();
      await bridge.stop();
      detach();
    },
  };
}
