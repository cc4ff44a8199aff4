import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { DeviceClient } from "../alpaca/clients.js";
import type { AlpacaBridgeConfig } from "../config/types.js";
import { createAlpacaBridgeTools } from "../index.js";
import { buildAlpacaBridge } from "./server-alpaca.js";

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "server-alpaca-test-"));
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

function makeConfig(): AlpacaBridgeConfig {
  return {
    discovery: {
      timeoutMs: 1000,
      skipUdp: true,
      knownDevices: [],
      simulatorDevices: [],
      directDevices: [{ id: "telescope_1", host: "192.168.1.50", port: 5555, name: "Seestar S50" }],
    },
    statePath: path.join(tmpDir, "state", "devices.json"),
    events: { mode: "off", port: null, bufferSize: 10 },
    logLevel: "error",
  };
}

function fakeClient() {
  const writes: boolean[] = [];
  let connected = false;
  const client: DeviceClient = {
    getConnected: async () => connected,
    setConnected: async (value) => {
      writes.push(value);
      connected = value;
    },
    getDriverInfo: async () => "driver",
    getDriverVersion: async () => "1.0",
    getInterfaceVersion: async () => 3,
    getDescription: async () => "telescope",
    getCapabilities: async () => ({}),
  };
  return { client, writes };
}

describe("buildAlpacaBridge", () => {
  it("discovers, connects and persists across a start/shutdown cycle", async () => {
    const fake = fakeClient();
    const state = buildAlpacaBridge({ cfg: makeConfig(), createClient: () => fake.client });

    await state.start();
    expect(state.bridge.running).toBe(true);

    const devices = await state.discovery.discover();
    expect(devices.map((d) => d.id)).toEqual(["telescope_1"]);
    expect(state.discovery.lastSummary()?.strategies.map((s) => s.name)).toEqual([
      "known-hosts",
      "simulators",
      "direct",
    ]);

    await state.connections.connect("telescope_1");
    await state.shutdown();

    expect(fake.writes).toEqual([true, false]);
    expect(state.connections.listConnected()).toEqual([]);
    expect(state.bridge.running).toBe(false);

    const saved: unknown = JSON.parse(await fs.readFile(makeConfig().statePath, "utf-8"));
    expect(saved).toMatchObject({ version: 1, devices: [{ id: "telescope_1", host: "192.168.1.50", port: 5555 }] });
  });

  it("reloads persisted devices on the next start", async () => {
    const first = buildAlpacaBridge({ cfg: makeConfig(), createClient: () => fakeClient().client });
    await first.start();
    await first.discovery.discover();
    await first.shutdown();

    const second = buildAlpacaBridge({ cfg: makeConfig(), createClient: () => fakeClient().client });
    await second.start();
    expect(second.connections.listAvailable().map((d) => d.id)).toEqual(["telescope_1"]);
    await second.shutdown();
  });

  it("resolves configuration from the environment when none is given", () => {
    const state = buildAlpacaBridge({
      env: {
        ALPACA_BRIDGE_CONFIG: path.join(tmpDir, "missing.yaml"),
        ALPACA_SKIP_UDP: "true",
        ALPACA_KNOWN_DEVICES: "",
        ALPACA_STATE_PATH: path.join(tmpDir, "devices.json"),
        ALPACA_EVENT_STREAMS: "all",
        ALPACA_LOG_LEVEL: "error",
      },
    });

    expect(state.config.discovery.skipUdp).toBe(true);
    expect(state.config.discovery.knownDevices).toEqual([]);
    expect(state.config.statePath).toBe(path.join(tmpDir, "devices.json"));
    expect(state.config.events.mode).toBe("all");
    expect(state.store.storePath).toBe(path.join(tmpDir, "devices.json"));
  });

  it("exposes its agent tools", async () => {
    const state = buildAlpacaBridge({ cfg: makeConfig(), createClient: () => fakeClient().client });
    const tools = createAlpacaBridgeTools(state);
    expect(tools.map((t) => t.name)).toEqual(["alpaca_device", "device_events"]);

    const [deviceTool] = tools;
    const result = await deviceTool?.execute("call-1", { action: "list_available" });
    expect(result?.details).toEqual({ success: true, count: 0, devices: [] });
  });
});

