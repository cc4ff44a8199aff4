// ---------------------------------------------------------------------------
// Discovery strategies – independent sources of device descriptors
// ---------------------------------------------------------------------------
// Each strategy returns what it found and may throw; the engine isolates
// failures so one broken source never hides the others.
// ---------------------------------------------------------------------------

import net from "node:net";
import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { FetchLike } from "../alpaca/client.js";
import { withTimeout } from "../infra/timeout.js";
import type { ServiceLog } from "../logging.js";
import { formatError } from "../logging.js";
import { descriptorFromConnection } from "./resolver.js";
import { probeAlpacaBroadcast, type UdpProbe } from "./udp-probe.js";
import {
  descriptorFromRecord,
  makeDeviceId,
  SIMULATOR_DEVICE_NUMBER,
  type DeviceDescriptor,
  type DirectDeviceEntry,
  type KnownDeviceEndpoint,
  type SimulatorEndpoint,
} from "./types.js";

export const PROBE_TIMEOUT_MS = 2_000;
/** Slack on top of the listen window before the broadcast probe is abandoned. */
export const UDP_CEILING_EXTRA_MS = 1_000;

export type DiscoveryContext = {
  timeoutMs: number;
};

export type DiscoveryStrategy = {
  name: string;
  run: (ctx: DiscoveryContext) => Promise<DeviceDescriptor[]>;
};

type StrategyDeps = {
  log: ServiceLog;
  nowIso?: () => string;
};

function nowIsoOf(deps: StrategyDeps): string {
  return deps.nowIso?.() ?? new Date().toISOString();
}

// ---------------------------------------------------------------------------
// Management API
// ---------------------------------------------------------------------------

const ManagementRecordSchema = Type.Object({
  DeviceName: Type.Optional(Type.String()),
  DeviceType: Type.Optional(Type.String()),
  DeviceNumber: Type.Optional(Type.Integer({ minimum: 0 })),
  UniqueID: Type.Optional(Type.String()),
  ApiVersion: Type.Optional(Type.Integer({ minimum: 1 })),
});

const ManagementResponseSchema = Type.Object({
  Value: Type.Array(Type.Unknown()),
});

/**
 * `GET /management/v1/configureddevices` on one Alpaca server. The server's
 * own host and port are stamped onto every record.
 */
export async function fetchConfiguredDevices(
  host: string,
  port: number,
  opts: { fetch?: FetchLike; timeoutMs?: number; discoveredAt: string; log?: ServiceLog },
): Promise<DeviceDescriptor[]> {
  const fetchImpl = opts.fetch ?? fetch;
  const url = `http://${host}:${port}/management/v1/configureddevices`;
  const res = await fetchImpl(url, { signal: AbortSignal.timeout(opts.timeoutMs ?? PROBE_TIMEOUT_MS) });
  if (res.status !== 200) {
    throw new Error(`${host}:${port} returned status ${res.status}`);
  }
  const body: unknown = await res.json();
  if (!Value.Check(ManagementResponseSchema, body)) {
    throw new Error(`${host}:${port} returned an unexpected configureddevices body`);
  }

  const devices: DeviceDescriptor[] = [];
  for (const record of body.Value) {
    if (!Value.Check(ManagementRecordSchema, record)) {
      opts.log?.debug(`skipping malformed configured device from ${host}:${port}`);
      continue;
    }
    devices.push(descriptorFromRecord({ ...record, Host: host, Port: port }, opts.discoveredAt));
  }
  return devices;
}

// ---------------------------------------------------------------------------
// 1. UDP broadcast
// ---------------------------------------------------------------------------

export function createUdpStrategy(
  deps: StrategyDeps & { probe?: UdpProbe; fetch?: FetchLike },
): DiscoveryStrategy {
  const probe = deps.probe ?? probeAlpacaBroadcast;
  return {
    name: "udp",
    run: async ({ timeoutMs }) => {
      // Only the broadcast is bounded here; each responder query has its own timeout.
      const responders = await withTimeout(
        probe({ timeoutMs }),
        timeoutMs + UDP_CEILING_EXTRA_MS,
        "udp broadcast probe",
      );
      deps.log.debug(`udp discovery: ${responders.length} Alpaca server(s) answered`);
      const discoveredAt = nowIsoOf(deps);

      const results = await Promise.all(
        responders.map(async ({ host, port }) => {
          try {
            return await fetchConfiguredDevices(host, port, {
              fetch: deps.fetch,
              discoveredAt,
              log: deps.log,
            });
          } catch (err) {
            deps.log.warn(`udp responder ${host}:${port} did not list its devices: ${formatError(err)}`);
            return [];
          }
        }),
      );
      return results.flat();
    },
  };
}

// ---------------------------------------------------------------------------
// 2. Known hosts (servers that ignore UDP discovery)
// ---------------------------------------------------------------------------

export function createKnownHostStrategy(
  endpoints: KnownDeviceEndpoint[],
  deps: StrategyDeps & { fetch?: FetchLike; probeTimeoutMs?: number },
): DiscoveryStrategy {
  return {
    name: "known-hosts",
    run: async () => {
      const discoveredAt = nowIsoOf(deps);
      const results = await Promise.all(
        endpoints.map(async ({ host, port, name }) => {
          deps.log.info(`checking known device: ${name} at ${host}:${port}`);
          try {
            const devices = await fetchConfiguredDevices(host, port, {
              fetch: deps.fetch,
              timeoutMs: deps.probeTimeoutMs,
              discoveredAt,
              log: deps.log,
            });
            for (const device of devices) {
              deps.log.info(`added known device: ${device.name} (${device.type}) from ${name}`);
            }
            return devices;
          } catch (err) {
            deps.log.warn(`known device ${name} at ${host}:${port} unavailable: ${formatError(err)}`);
            return [];
          }
        }),
      );
      return results.flat();
    },
  };
}

// ---------------------------------------------------------------------------
// 3. Simulators (TCP reachability only)
// ---------------------------------------------------------------------------

export type TcpCheck = (host: string, port: number, timeoutMs: number) => Promise<boolean>;

export const checkTcpReachable: TcpCheck = (host, port, timeoutMs) =>
  new Promise((resolve) => {
    const socket = net.createConnection({ host, port });
    const done = (ok: boolean) => {
      socket.removeAllListeners();
      socket.destroy();
      resolve(ok);
    };
    socket.setTimeout(timeoutMs);
    socket.once("connect", () => done(true));
    socket.once("timeout", () => done(false));
    socket.once("error", () => done(false));
  });

export function simulatorDescriptor(
  endpoint: SimulatorEndpoint,
  index: number,
  discoveredAt: string,
): DeviceDescriptor {
  const number = SIMULATOR_DEVICE_NUMBER + index;
  return {
    id: makeDeviceId("Telescope", number),
    type: "Telescope",
    number,
    name: endpoint.name,
    unique_id: `simulator_${endpoint.host}_${endpoint.port}`,
    host: endpoint.host,
    port: endpoint.port,
    api_version: 1,
    is_simulator: true,
    discovered_at: discoveredAt,
  };
}

export function createSimulatorStrategy(
  endpoints: SimulatorEndpoint[],
  deps: StrategyDeps & { checkTcp?: TcpCheck; probeTimeoutMs?: number },
): DiscoveryStrategy {
  const checkTcp = deps.checkTcp ?? checkTcpReachable;
  return {
    name: "simulators",
    run: async () => {
      const discoveredAt = nowIsoOf(deps);
      const reachable = await Promise.all(
        endpoints.map((ep) => checkTcp(ep.host, ep.port, deps.probeTimeoutMs ?? PROBE_TIMEOUT_MS)),
      );
      const devices: DeviceDescriptor[] = [];
      endpoints.forEach((ep, index) => {
        if (reachable[index]) {
          devices.push(simulatorDescriptor(ep, index, discoveredAt));
        } else {
          deps.log.debug(`simulator ${ep.name} at ${ep.host}:${ep.port} not reachable`);
        }
      });
      return devices;
    },
  };
}

// ---------------------------------------------------------------------------
// 4. Direct devices (configuration only, no I/O)
// ---------------------------------------------------------------------------

export function directDeviceDescriptor(entry: DirectDeviceEntry, discoveredAt: string): DeviceDescriptor {
  return descriptorFromConnection({
    deviceId: entry.id,
    name: entry.name,
    host: entry.host,
    port: entry.port,
    discoveredAt,
  });
}

export function createDirectDeviceStrategy(
  entries: DirectDeviceEntry[],
  deps: StrategyDeps,
): DiscoveryStrategy {
  return {
    name: "direct",
    run: async () => {
      const discoveredAt = nowIsoOf(deps);
      return entries.map((entry) => directDeviceDescriptor(entry, discoveredAt));
    },
  };
}
