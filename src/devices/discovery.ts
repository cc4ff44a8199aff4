// ---------------------------------------------------------------------------
// Discovery Engine – one pass over every discovery strategy
// ---------------------------------------------------------------------------
// A pass clears the available table, runs all strategies concurrently,
// merges their results in a fixed order (first writer wins per id), merges
// that with the persisted snapshot and installs the pass as the new
// available table. Passes are serialized; the connected table is never
// touched.
// ---------------------------------------------------------------------------

import type { FetchLike } from "../alpaca/client.js";
import type { DiscoveryConfig } from "../config/types.js";
import { createSerialLock } from "../infra/serial-lock.js";
import type { ServiceLog } from "../logging.js";
import { formatError } from "../logging.js";
import {
  createDirectDeviceStrategy,
  createKnownHostStrategy,
  createSimulatorStrategy,
  createUdpStrategy,
  type DiscoveryStrategy,
  type TcpCheck,
} from "./discovery-strategies.js";
import type { DeviceStateStore } from "./store.js";
import type { DeviceDescriptor } from "./types.js";
import type { UdpProbe } from "./udp-probe.js";

/** The slice of the connection manager discovery writes to. */
export type AvailableRegistry = {
  clearAvailable: () => void;
  replaceAvailable: (devices: DeviceDescriptor[]) => void;
};

export type StrategyOutcome = {
  name: string;
  found: number;
  error?: string;
};

export type DiscoverySummary = {
  startedAt: string;
  durationMs: number;
  deviceCount: number;
  strategies: StrategyOutcome[];
};

export type DiscoveryEngineDeps = {
  registry: AvailableRegistry;
  store: Pick<DeviceStateStore, "upsert">;
  strategies: DiscoveryStrategy[];
  defaultTimeoutMs: number;
  log: ServiceLog;
  nowMs?: () => number;
};

/** Combine strategy results in order; the first strategy to report an id keeps it. */
export function mergeFirstWins(results: DeviceDescriptor[][]): DeviceDescriptor[] {
  const byId = new Map<string, DeviceDescriptor>();
  for (const devices of results) {
    for (const device of devices) {
      if (!byId.has(device.id)) {
        byId.set(device.id, device);
      }
    }
  }
  return [...byId.values()];
}

export class DiscoveryEngine {
  private readonly lock = createSerialLock();
  private lastRun: DiscoverySummary | null = null;

  constructor(private readonly deps: DiscoveryEngineDeps) {}

  private now(): number {
    return this.deps.nowMs?.() ?? Date.now();
  }

  get running(): boolean {
    return this.lock.busy;
  }

  lastSummary(): DiscoverySummary | null {
    return this.lastRun;
  }

  async discover(timeoutMs?: number): Promise<DeviceDescriptor[]> {
    return this.lock.run(() => this.runPass(timeoutMs ?? this.deps.defaultTimeoutMs));
  }

  private async runStrategy(
    strategy: DiscoveryStrategy,
    timeoutMs: number,
  ): Promise<{ devices: DeviceDescriptor[]; outcome: StrategyOutcome }> {
    const { log } = this.deps;
    try {
      const devices = await strategy.run({ timeoutMs });
      log.debug(`${strategy.name} discovery found ${devices.length} device(s)`);
      return { devices, outcome: { name: strategy.name, found: devices.length } };
    } catch (err) {
      const error = formatError(err);
      log.warn(`${strategy.name} discovery failed: ${error}`);
      return { devices: [], outcome: { name: strategy.name, found: 0, error } };
    }
  }

  private async runPass(timeoutMs: number): Promise<DeviceDescriptor[]> {
    const { registry, store, strategies, log } = this.deps;
    const startedMs = this.now();
    log.info(`starting device discovery (timeout ${timeoutMs}ms)`);

    registry.clearAvailable();

    const settled = await Promise.all(strategies.map((s) => this.runStrategy(s, timeoutMs)));
    const found = mergeFirstWins(settled.map((r) => r.devices));

    const merged = await store.upsert(found);
    const mergedById = new Map(merged.map((d) => [d.id, d]));
    const pass = found.map((d) => mergedById.get(d.id) ?? d);

    registry.replaceAvailable(pass);

    this.lastRun = {
      startedAt: new Date(startedMs).toISOString(),
      durationMs: this.now() - startedMs,
      deviceCount: pass.length,
      strategies: settled.map((r) => r.outcome),
    };

    if (pass.length === 0) {
      log.warn(
        "discovery found no devices; check that Alpaca servers are running on this network " +
          "or configure ALPACA_KNOWN_DEVICES / ALPACA_DIRECT_DEVICES",
      );
    } else {
      log.info(`discovery complete: ${pass.length} device(s) available`);
    }
    return pass;
  }
}

// ---------------------------------------------------------------------------
// Default strategy set
// ---------------------------------------------------------------------------

export type DefaultStrategyDeps = {
  log: ServiceLog;
  fetch?: FetchLike;
  probe?: UdpProbe;
  checkTcp?: TcpCheck;
  nowIso?: () => string;
};

/** UDP, known hosts, simulators, direct devices: the order merge precedence follows. */
export function createDefaultStrategies(
  config: DiscoveryConfig,
  deps: DefaultStrategyDeps,
): DiscoveryStrategy[] {
  const strategies: DiscoveryStrategy[] = [];
  if (config.skipUdp) {
    deps.log.info("UDP discovery disabled by configuration");
  } else {
    strategies.push(createUdpStrategy(deps));
  }
  strategies.push(
    createKnownHostStrategy(config.knownDevices, deps),
    createSimulatorStrategy(config.simulatorDevices, deps),
    createDirectDeviceStrategy(config.directDevices, deps),
  );
  return strategies;
}
