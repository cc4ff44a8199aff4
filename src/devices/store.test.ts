import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { ServiceLog } from "../logging.js";
import { cleanupStaleDevices, DeviceStateStore, mergeDevices, resolveDeviceStatePath } from "./store.js";
import type { DeviceDescriptor } from "./types.js";

let tmpDir: string;
let storePath: string;

function makeLog() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies ServiceLog;
}

function device(overrides: Partial<DeviceDescriptor> = {}): DeviceDescriptor {
  return {
    id: "telescope_1",
    type: "Telescope",
    number: 1,
    name: "Seestar S50",
    unique_id: "abc-123",
    host: "192.168.1.50",
    port: 5555,
    api_version: 1,
    is_simulator: false,
    discovered_at: "2026-01-01T00:00:00.000Z",
    ...overrides,
  };
}

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "device-store-test-"));
  storePath = path.join(tmpDir, "devices", "store.json");
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

describe("resolveDeviceStatePath", () => {
  it("resolves a custom path", () => {
    expect(resolveDeviceStatePath("/var/lib/alpaca/state.json")).toBe("/var/lib/alpaca/state.json");
  });

  it("defaults under the home directory", () => {
    vi.stubEnv("HOME", "/home/observer");
    try {
      expect(resolveDeviceStatePath()).toBe("/home/observer/.alpaca-bridge/devices/store.json");
    } finally {
      vi.unstubAllEnvs();
    }
  });
});

describe("mergeDevices", () => {
  it("lets incoming fields win but keeps the existing discovered_at", () => {
    const existing = [device({ name: "Old Name" }), device({ id: "camera_0", type: "Camera", number: 0 })];
    const incoming = [
      device({ name: "New Name", discovered_at: "2026-06-01T00:00:00.000Z" }),
      device({ id: "focuser_0", type: "Focuser", number: 0, discovered_at: "2026-06-01T00:00:00.000Z" }),
    ];

    const merged = mergeDevices(existing, incoming);
    expect(merged.map((d) => d.id)).toEqual(["telescope_1", "camera_0", "focuser_0"]);
    expect(merged[0]).toMatchObject({ name: "New Name", discovered_at: "2026-01-01T00:00:00.000Z" });
    expect(merged[2]?.discovered_at).toBe("2026-06-01T00:00:00.000Z");
  });
});

describe("cleanupStaleDevices", () => {
  const now = Date.parse("2026-03-01T00:00:00.000Z");

  it("drops devices older than the cutoff and keeps unparsable stamps", () => {
    const log = makeLog();
    const kept = cleanupStaleDevices(
      [
        device({ id: "telescope_1", discovered_at: "2026-02-15T00:00:00.000Z" }),
        device({ id: "telescope_2", discovered_at: "2026-01-01T00:00:00.000Z" }),
        device({ id: "telescope_3", discovered_at: "not a date" }),
      ],
      { nowMs: now, log },
    );

    expect(kept.map((d) => d.id)).toEqual(["telescope_1", "telescope_3"]);
    expect(log.info).toHaveBeenCalledWith("removing stale device telescope_2 (age: 59 days)");
  });

  it("keeps a device exactly at the cutoff", () => {
    const kept = cleanupStaleDevices([device({ discovered_at: "2026-01-30T00:00:00.000Z" })], {
      nowMs: now,
      maxAgeDays: 30,
    });
    expect(kept).toHaveLength(1);
  });
});

describe("DeviceStateStore", () => {
  it("returns an empty list when the file does not exist", async () => {
    const log = makeLog();
    const store = new DeviceStateStore({ storePath, log });
    await expect(store.load()).resolves.toEqual([]);
    expect(log.warn).not.toHaveBeenCalled();
  });

  it("writes atomically and reads back", async () => {
    const log = makeLog();
    const store = new DeviceStateStore({
      storePath,
      log,
      nowMs: () => Date.parse("2026-02-02T10:00:00.000Z"),
    });

    await expect(store.save([device()])).resolves.toBe(true);
    const raw = JSON.parse(await fs.readFile(storePath, "utf-8"));
    expect(raw).toEqual({
      version: 1,
      updated_at: "2026-02-02T10:00:00.000Z",
      devices: [device()],
    });
    await expect(fs.access(`${storePath}.tmp`)).rejects.toThrow();
    await expect(store.load()).resolves.toEqual([device()]);
  });

  it("returns an empty list for invalid JSON", async () => {
    const log = makeLog();
    await fs.mkdir(path.dirname(storePath), { recursive: true });
    await fs.writeFile(storePath, "{not json", "utf-8");

    const store = new DeviceStateStore({ storePath, log });
    await expect(store.load()).resolves.toEqual([]);
    expect(log.warn).toHaveBeenCalledTimes(1);
  });

  it("ignores a file with an unknown version", async () => {
    const log = makeLog();
    await fs.mkdir(path.dirname(storePath), { recursive: true });
    await fs.writeFile(storePath, JSON.stringify({ version: 7, updated_at: "x", devices: [] }), "utf-8");

    const store = new DeviceStateStore({ storePath, log });
    await expect(store.load()).resolves.toEqual([]);
    expect(log.warn).toHaveBeenCalledWith(`device state ${storePath} has an unrecognised layout; ignoring it`);
  });

  it("keeps the valid subset and defaults a missing simulator flag", async () => {
    const log = makeLog();
    const { is_simulator: _omitted, ...legacy } = device({ id: "camera_0" });
    await fs.mkdir(path.dirname(storePath), { recursive: true });
    await fs.writeFile(
      storePath,
      JSON.stringify({ version: 1, updated_at: "x", devices: [legacy, { id: "broken" }] }),
      "utf-8",
    );

    const store = new DeviceStateStore({ storePath, log });
    const loaded = await store.load();
    expect(loaded).toEqual([device({ id: "camera_0", is_simulator: false })]);
    expect(log.warn).toHaveBeenCalledWith(`skipped 1 invalid device entry in ${storePath}`);
  });

  it("reports a failed save without throwing", async () => {
    const log = makeLog();
    // A directory where the file should be makes the rename fail.
    await fs.mkdir(storePath, { recursive: true });
    const store = new DeviceStateStore({ storePath, log });

    await expect(store.save([device()])).resolves.toBe(false);
    expect(log.error).toHaveBeenCalledTimes(1);
  });

  it("upserts over what is on disk", async () => {
    const log = makeLog();
    const store = new DeviceStateStore({ storePath, log });
    await store.save([device(), device({ id: "camera_0", type: "Camera", number: 0 })]);

    const merged = await store.upsert([device({ name: "Renamed", discovered_at: "2026-05-05T00:00:00.000Z" })]);
    expect(merged.map((d) => [d.id, d.name, d.discovered_at])).toEqual([
      ["telescope_1", "Renamed", "2026-01-01T00:00:00.000Z"],
      ["camera_0", "Seestar S50", "2026-01-01T00:00:00.000Z"],
    ]);
    await expect(store.load()).resolves.toEqual(merged);
  });

  it("serializes concurrent upserts to the same file", async () => {
    const log = makeLog();
    const a = new DeviceStateStore({ storePath, log });
    const b = new DeviceStateStore({ storePath, log });

    await Promise.all([a.upsert([device({ id: "telescope_1" })]), b.upsert([device({ id: "telescope_2" })])]);
    const loaded = await a.load();
    expect(loaded.map((d) => d.id).sort()).toEqual(["telescope_1", "telescope_2"]);
  });
});
