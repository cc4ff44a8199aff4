// ---------------------------------------------------------------------------
// Device State Store – durable snapshot of discovered devices
// ---------------------------------------------------------------------------
// Storage layout:
//   ~/.alpaca-bridge/devices/
//     store.json – { version: 1, updated_at, devices: DeviceDescriptor[] }
//
// The file is a cache. It is read once at start (and on connect fallback),
// written through on change, and never treated as the source of truth while
// the process runs. Neither load nor save ever throws.
// ---------------------------------------------------------------------------

import { existsSync, mkdirSync } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { ServiceLog } from "../logging.js";
import { formatError } from "../logging.js";
import { createSerialLock, type SerialLock } from "../infra/serial-lock.js";
import type { DeviceDescriptor, PersistedStateFile } from "./types.js";

// ---------------------------------------------------------------------------
// Path resolution
// ---------------------------------------------------------------------------

const DEFAULT_DIR = ".alpaca-bridge";

export function resolveDeviceStatePath(customPath?: string): string {
  if (customPath) {
    return path.resolve(customPath);
  }
  const home = process.env.HOME ?? process.env.USERPROFILE ?? ".";
  return path.join(home, DEFAULT_DIR, "devices", "store.json");
}

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const PersistedDescriptorSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  type: Type.String(),
  number: Type.Integer({ minimum: 0 }),
  name: Type.String(),
  unique_id: Type.String(),
  host: Type.String({ minLength: 1 }),
  port: Type.Integer({ minimum: 1, maximum: 65535 }),
  api_version: Type.Integer({ minimum: 1 }),
  // Older snapshots predate the simulator flag.
  is_simulator: Type.Optional(Type.Boolean()),
  discovered_at: Type.String(),
});

const PersistedStateSchema = Type.Object({
  version: Type.Literal(1),
  updated_at: Type.String(),
  devices: Type.Array(Type.Unknown()),
});

// ---------------------------------------------------------------------------
// Pure helpers
// ---------------------------------------------------------------------------

/**
 * Combine two device lists by id. Incoming entries replace existing ones,
 * except that the existing `discovered_at` is kept so rediscovery does not
 * reset a device's age.
 */
export function mergeDevices(
  existing: DeviceDescriptor[],
  incoming: DeviceDescriptor[],
): DeviceDescriptor[] {
  const byId = new Map<string, DeviceDescriptor>();
  for (const device of existing) {
    byId.set(device.id, device);
  }
  for (const device of incoming) {
    const prior = byId.get(device.id);
    byId.set(device.id, prior ? { ...device, discovered_at: prior.discovered_at } : device);
  }
  return [...byId.values()];
}

const DAY_MS = 24 * 60 * 60 * 1000;

/** Drop devices first seen more than `maxAgeDays` ago. Unparsable stamps are kept. */
export function cleanupStaleDevices(
  devices: DeviceDescriptor[],
  opts: { maxAgeDays?: number; nowMs?: number; log?: ServiceLog } = {},
): DeviceDescriptor[] {
  const maxAgeDays = opts.maxAgeDays ?? 30;
  const now = opts.nowMs ?? Date.now();
  return devices.filter((device) => {
    const seen = Date.parse(device.discovered_at);
    if (Number.isNaN(seen)) {
      return true;
    }
    const ageDays = Math.floor((now - seen) / DAY_MS);
    if (ageDays > maxAgeDays) {
      opts.log?.info(`removing stale device ${device.id} (age: ${ageDays} days)`);
      return false;
    }
    return true;
  });
}

// One writer per file, shared by every store instance pointing at it.
const storeLocks = new Map<string, SerialLock>();

function lockFor(storePath: string): SerialLock {
  let lock = storeLocks.get(storePath);
  if (!lock) {
    lock = createSerialLock();
    storeLocks.set(storePath, lock);
  }
  return lock;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

// ---------------------------------------------------------------------------
// DeviceStateStore
// ---------------------------------------------------------------------------

export type DeviceStateStoreDeps = {
  storePath: string;
  log: ServiceLog;
  nowMs?: () => number;
};

export class DeviceStateStore {
  constructor(private readonly deps: DeviceStateStoreDeps) {}

  get storePath(): string {
    return this.deps.storePath;
  }

  private now(): number {
    return this.deps.nowMs?.() ?? Date.now();
  }

  async load(): Promise<DeviceDescriptor[]> {
    const { storePath, log } = this.deps;
    let raw: string;
    try {
      raw = await fs.readFile(storePath, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) {
        log.debug(`no device state file at ${storePath}`);
      } else {
        log.warn(`failed to read device state ${storePath}: ${formatError(err)}`);
      }
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      log.warn(`device state ${storePath} is not valid JSON: ${formatError(err)}`);
      return [];
    }

    if (!Value.Check(PersistedStateSchema, parsed)) {
      log.warn(`device state ${storePath} has an unrecognised layout; ignoring it`);
      return [];
    }

    const devices: DeviceDescriptor[] = [];
    let skipped = 0;
    for (const entry of parsed.devices) {
      if (Value.Check(PersistedDescriptorSchema, entry)) {
        devices.push({ ...entry, is_simulator: entry.is_simulator ?? false });
      } else {
        skipped += 1;
      }
    }
    if (skipped > 0) {
      log.warn(`skipped ${skipped} invalid device entr${skipped === 1 ? "y" : "ies"} in ${storePath}`);
    }
    log.info(`loaded ${devices.length} devices from state`);
    return devices;
  }

  /** Write the snapshot atomically. Returns false (after logging) on failure. */
  async save(devices: DeviceDescriptor[]): Promise<boolean> {
    const { storePath, log } = this.deps;
    const file: PersistedStateFile = {
      version: 1,
      updated_at: new Date(this.now()).toISOString(),
      devices,
    };
    const tmpPath = storePath + ".tmp";
    try {
      const dir = path.dirname(storePath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
      await fs.writeFile(tmpPath, JSON.stringify(file, null, 2), "utf-8");
      await fs.rename(tmpPath, storePath);
      log.debug(`saved ${devices.length} devices to state`);
      return true;
    } catch (err) {
      log.error(`failed to save device state ${storePath}: ${formatError(err)}`);
      return false;
    }
  }

  merge(existing: DeviceDescriptor[], incoming: DeviceDescriptor[]): DeviceDescriptor[] {
    return mergeDevices(existing, incoming);
  }

  cleanupStale(devices: DeviceDescriptor[], maxAgeDays?: number): DeviceDescriptor[] {
    return cleanupStaleDevices(devices, { maxAgeDays, nowMs: this.now(), log: this.deps.log });
  }

  /** Load, merge `incoming` over what is on disk, save. Returns the merged list. */
  async upsert(incoming: DeviceDescriptor[]): Promise<DeviceDescriptor[]> {
    return lockFor(this.deps.storePath).run(async () => {
      const merged = mergeDevices(await this.load(), incoming);
      await this.save(merged);
      return merged;
    });
  }
}
