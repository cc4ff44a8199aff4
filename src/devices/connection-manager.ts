// ---------------------------------------------------------------------------
// ConnectionManager – available and connected device tables
// ---------------------------------------------------------------------------
// Owns the two tables, resolves ids to descriptors, builds and activates
// clients with retry, and fires lifecycle hooks. Connect and disconnect run
// under one connection lock; reads never wait on it.
// ---------------------------------------------------------------------------

import {
  requireDeviceKind,
  type DeviceClient,
  type DeviceClientFactory,
} from "../alpaca/clients.js";
import type { DiscoveryConfig } from "../config/types.js";
import { withRetry, type RetryOptions } from "../infra/retry.js";
import { createSerialLock } from "../infra/serial-lock.js";
import type { ServiceLog } from "../logging.js";
import { formatError } from "../logging.js";
import { directDeviceDescriptor } from "./discovery-strategies.js";
import {
  ConnectionFailedError,
  DeviceNotConnectedError,
  DeviceNotFoundError,
  isDeviceError,
} from "./errors.js";
import {
  descriptorFromConnection,
  descriptorFromConnectionString,
  matchKindDeviceId,
  parseConnectionString,
} from "./resolver.js";
import type { DeviceStateStore } from "./store.js";
import {
  describeDevice,
  type ConnectedDeviceView,
  type DeviceDescriptor,
  type DeviceDescriptorView,
  type DeviceInfo,
  type DeviceLifecycleCallback,
  type DeviceLifecycleHook,
} from "./types.js";

// ---------------------------------------------------------------------------
// ConnectedHandle
// ---------------------------------------------------------------------------

export class ConnectedHandle {
  readonly connectedAtMs: number;
  lastUsedAtMs: number;

  constructor(
    readonly descriptor: DeviceDescriptor,
    readonly client: DeviceClient,
    nowMs: number,
  ) {
    this.connectedAtMs = nowMs;
    this.lastUsedAtMs = nowMs;
  }

  get deviceId(): string {
    return this.descriptor.id;
  }

  touch(nowMs: number): void {
    this.lastUsedAtMs = nowMs;
  }

  view(): ConnectedDeviceView {
    return {
      ...describeDevice(this.descriptor),
      connected_at: new Date(this.connectedAtMs).toISOString(),
      last_used: new Date(this.lastUsedAtMs).toISOString(),
    };
  }
}

// ---------------------------------------------------------------------------
// Dependencies (injected at construction)
// ---------------------------------------------------------------------------

export type ConnectionManagerDeps = {
  config: Pick<DiscoveryConfig, "knownDevices" | "directDevices">;
  store: DeviceStateStore;
  createClient: DeviceClientFactory;
  log: ServiceLog;
  nowMs?: () => number;
  retry?: Pick<RetryOptions, "maxAttempts" | "baseDelayMs" | "maxDelayMs" | "sleep">;
};

type ResolvedDevice = {
  descriptor: DeviceDescriptor;
  source: "available" | "persisted" | "connection-string" | "direct" | "known-host";
};

const NOT_FOUND_HINT =
  'Run discovery, connect with a direct string such as "seestar@192.168.1.50:5555", ' +
  'or set ALPACA_DIRECT_DEVICES="telescope_1:192.168.1.50:5555:Seestar S50".';

// ---------------------------------------------------------------------------
// ConnectionManager
// ---------------------------------------------------------------------------

export class ConnectionManager {
  private readonly available = new Map<string, DeviceDescriptor>();
  private readonly connected = new Map<string, ConnectedHandle>();
  private readonly callbacks = new Map<DeviceLifecycleHook, DeviceLifecycleCallback[]>();
  private readonly lock = createSerialLock();

  constructor(private readonly deps: ConnectionManagerDeps) {}

  private now(): number {
    return this.deps.nowMs?.() ?? Date.now();
  }

  private nowIso(): string {
    return new Date(this.now()).toISOString();
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /** Seed the available table from the persisted snapshot. Returns the count loaded. */
  async initialize(): Promise<number> {
    const { store, log } = this.deps;
    const persisted = await store.load();
    const fresh = store.cleanupStale(persisted);
    if (fresh.length !== persisted.length) {
      await store.save(fresh);
    }
    for (const device of fresh) {
      this.available.set(device.id, device);
    }
    log.info(`initialized with ${fresh.length} persisted device(s)`);
    return fresh.length;
  }

  /** Disconnect everything, then persist the available table. */
  async shutdown(): Promise<void> {
    const { log } = this.deps;
    for (const deviceId of [...this.connected.keys()]) {
      try {
        await this.disconnect(deviceId);
      } catch (err) {
        log.error(`shutdown: disconnecting ${deviceId} failed: ${formatError(err)}`);
      }
    }
    await this.deps.store.upsert([...this.available.values()]);
    log.info("connection manager shut down");
  }

  registerEventCallback(hook: DeviceLifecycleHook, callback: DeviceLifecycleCallback): () => void {
    const list = this.callbacks.get(hook) ?? [];
    list.push(callback);
    this.callbacks.set(hook, list);
    return () => {
      const current = this.callbacks.get(hook);
      if (current) {
        this.callbacks.set(
          hook,
          current.filter((cb) => cb !== callback),
        );
      }
    };
  }

  private async fire(hook: DeviceLifecycleHook, descriptor: DeviceDescriptor): Promise<void> {
    for (const callback of this.callbacks.get(hook) ?? []) {
      try {
        await callback(descriptor.id, descriptor);
      } catch (err) {
        this.deps.log.error(`${hook} callback failed for ${descriptor.id}: ${formatError(err)}`);
      }
    }
  }

  // -------------------------------------------------------------------------
  // Available table
  // -------------------------------------------------------------------------

  listAvailable(): DeviceDescriptorView[] {
    return [...this.available.values()].map(describeDevice);
  }

  getAvailable(deviceId: string): DeviceDescriptor | undefined {
    return this.available.get(deviceId);
  }

  registerAvailable(descriptor: DeviceDescriptor): void {
    this.available.set(descriptor.id, descriptor);
  }

  clearAvailable(): void {
    this.available.clear();
  }

  replaceAvailable(descriptors: DeviceDescriptor[]): void {
    this.available.clear();
    for (const descriptor of descriptors) {
      this.available.set(descriptor.id, descriptor);
    }
  }

  // -------------------------------------------------------------------------
  // Connected table
  // -------------------------------------------------------------------------

  listConnected(): ConnectedDeviceView[] {
    return [...this.connected.values()].map((handle) => handle.view());
  }

  isConnected(deviceId: string): boolean {
    return this.connected.has(deviceId);
  }

  getConnected(deviceId: string): ConnectedHandle {
    const handle = this.connected.get(deviceId);
    if (!handle) {
      throw new DeviceNotConnectedError(deviceId);
    }
    handle.touch(this.now());
    return handle;
  }

  // -------------------------------------------------------------------------
  // Resolution
  // -------------------------------------------------------------------------

  private async resolve(deviceId: string): Promise<ResolvedDevice> {
    const { store, config, log } = this.deps;

    const known = this.available.get(deviceId);
    if (known) {
      return { descriptor: known, source: "available" };
    }

    const persisted = (await store.load()).find((d) => d.id === deviceId);
    if (persisted) {
      log.info(`found ${deviceId} in persisted state`);
      return { descriptor: persisted, source: "persisted" };
    }

    const target = parseConnectionString(deviceId);
    if (target) {
      log.info(`direct connection to ${target.host}:${target.port}`);
      return {
        descriptor: descriptorFromConnectionString(deviceId, target, this.nowIso()),
        source: "connection-string",
      };
    }

    const direct = config.directDevices.find((entry) => entry.id === deviceId);
    if (direct) {
      return { descriptor: directDeviceDescriptor(direct, this.nowIso()), source: "direct" };
    }

    const firstKnown = config.knownDevices[0];
    if (firstKnown && matchKindDeviceId(deviceId)) {
      log.info(`assuming ${deviceId} is served by known device ${firstKnown.name}`);
      return {
        descriptor: descriptorFromConnection({
          deviceId,
          name: firstKnown.name,
          host: firstKnown.host,
          port: firstKnown.port,
          discoveredAt: this.nowIso(),
        }),
        source: "known-host",
      };
    }

    throw new DeviceNotFoundError(
      `Device ${deviceId} not found. Run discovery first, connect with "name@host:port", ` +
        "or configure it in ALPACA_DIRECT_DEVICES.",
      NOT_FOUND_HINT,
    );
  }

  // -------------------------------------------------------------------------
  // connect / disconnect
  // -------------------------------------------------------------------------

  private async activate(descriptor: DeviceDescriptor): Promise<DeviceClient> {
    const kind = requireDeviceKind(descriptor);
    const retry = this.deps.retry ?? {};
    const maxAttempts = retry.maxAttempts ?? 3;

    try {
      return await withRetry(
        async () => {
          const client = this.deps.createClient(descriptor, kind);
          await client.setConnected(true);
          if (!(await client.getConnected())) {
            throw new Error("device did not report Connected=true after activation");
          }
          return client;
        },
        {
          ...retry,
          maxAttempts,
          shouldRetry: (err) => !isDeviceError(err),
          onRetry: (err, attempt, delayMs) => {
            this.deps.log.warn(
              `connect ${descriptor.id} attempt ${attempt} failed: ${formatError(err)}; retrying in ${delayMs}ms`,
            );
          },
        },
      );
    } catch (err) {
      if (isDeviceError(err)) {
        throw err;
      }
      throw new ConnectionFailedError(
        `Failed to connect to ${descriptor.id} at ${descriptor.host}:${descriptor.port} ` +
          `after ${maxAttempts} attempt(s): ${formatError(err)}`,
        { cause: err },
      );
    }
  }

  async connect(deviceId: string): Promise<ConnectedHandle> {
    return this.lock.run(async () => {
      const existing = this.connected.get(deviceId);
      if (existing) {
        existing.touch(this.now());
        return existing;
      }

      const { descriptor, source } = await this.resolve(deviceId);
      const client = await this.activate(descriptor);

      if (source !== "available") {
        this.available.set(descriptor.id, descriptor);
        await this.deps.store.upsert([descriptor]);
      }

      const handle = new ConnectedHandle(descriptor, client, this.now());
      this.connected.set(deviceId, handle);
      this.deps.log.info(`connected to ${descriptor.name} (${deviceId}) at ${descriptor.host}:${descriptor.port}`);

      await this.fire("on_device_connected", descriptor);
      return handle;
    });
  }

  async disconnect(deviceId: string): Promise<void> {
    return this.lock.run(async () => {
      const handle = this.connected.get(deviceId);
      if (!handle) {
        this.deps.log.debug(`disconnect ${deviceId}: not connected`);
        return;
      }
      try {
        await handle.client.setConnected(false);
      } catch (err) {
        this.deps.log.warn(`disconnect ${deviceId}: device refused Connected=false: ${formatError(err)}`);
      } finally {
        this.connected.delete(deviceId);
      }
      this.deps.log.info(`disconnected ${deviceId}`);
      await this.fire("on_device_disconnected", handle.descriptor);
    });
  }

  // -------------------------------------------------------------------------
  // Device info
  // -------------------------------------------------------------------------

  private async readProperty<T>(deviceId: string, label: string, read: () => Promise<T>): Promise<T | undefined> {
    try {
      return await read();
    } catch (err) {
      this.deps.log.warn(`${deviceId}: could not read ${label}: ${formatError(err)}`);
      return undefined;
    }
  }

  async getDeviceInfo(deviceId: string): Promise<DeviceInfo> {
    const handle = this.connected.get(deviceId);
    if (handle) {
      handle.touch(this.now());
      const { client } = handle;
      const info: DeviceInfo = { ...describeDevice(handle.descriptor), connected: true };
      const driverInfo = await this.readProperty(deviceId, "DriverInfo", () => client.getDriverInfo());
      const driverVersion = await this.readProperty(deviceId, "DriverVersion", () => client.getDriverVersion());
      const interfaceVersion = await this.readProperty(deviceId, "InterfaceVersion", () =>
        client.getInterfaceVersion(),
      );
      const description = await this.readProperty(deviceId, "Description", () => client.getDescription());
      const capabilities = await this.readProperty(deviceId, "capabilities", () => client.getCapabilities());
      if (driverInfo !== undefined) info.driver_info = driverInfo;
      if (driverVersion !== undefined) info.driver_version = driverVersion;
      if (interfaceVersion !== undefined) info.interface_version = interfaceVersion;
      if (description !== undefined) info.description = description;
      if (capabilities !== undefined) info.capabilities = capabilities;
      return info;
    }

    const available = this.available.get(deviceId);
    if (available) {
      return { ...describeDevice(available), connected: false };
    }

    throw new DeviceNotFoundError(`Device ${deviceId} not found`, NOT_FOUND_HINT);
  }
}
