import net from "node:net";
import { describe, it, expect, vi } from "vitest";
import type { FetchLike } from "../alpaca/client.js";
import {
  createDirectDeviceStrategy,
  createKnownHostStrategy,
  createSimulatorStrategy,
  createUdpStrategy,
  fetchConfiguredDevices,
} from "./discovery-strategies.js";

const AT = "2026-04-01T12:00:00.000Z";
const nowIso = () => AT;

function makeLog() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/** Management API answering per `host:port`; unknown hosts refuse. */
function managementFetch(servers: Record<string, unknown[]>) {
  const urls: string[] = [];
  const fetch: FetchLike = async (url) => {
    urls.push(url);
    const { host } = new URL(url);
    const devices = servers[host];
    if (!devices) {
      throw new TypeError("fetch failed");
    }
    return Response.json({ Value: devices, ErrorNumber: 0, ErrorMessage: "" });
  };
  return { fetch, urls };
}

const SEESTAR_RECORD = {
  DeviceName: "Seestar S50",
  DeviceType: "Telescope",
  DeviceNumber: 1,
  UniqueID: "uid-1",
  ApiVersion: 1,
};

describe("fetchConfiguredDevices", () => {
  it("stamps the server's host and port onto every record", async () => {
    const { fetch, urls } = managementFetch({ "10.0.0.2:5555": [SEESTAR_RECORD, { DeviceType: 5 }] });

    const devices = await fetchConfiguredDevices("10.0.0.2", 5555, { fetch, discoveredAt: AT });
    expect(urls).toEqual(["http://10.0.0.2:5555/management/v1/configureddevices"]);
    expect(devices).toEqual([
      {
        id: "telescope_1",
        type: "Telescope",
        number: 1,
        name: "Seestar S50",
        unique_id: "uid-1",
        host: "10.0.0.2",
        port: 5555,
        api_version: 1,
        is_simulator: false,
        discovered_at: AT,
      },
    ]);
  });

  it("applies management defaults to sparse records", async () => {
    const { fetch } = managementFetch({ "10.0.0.3:11111": [{}] });
    const [only] = await fetchConfiguredDevices("10.0.0.3", 11111, { fetch, discoveredAt: AT });
    expect(only).toMatchObject({ id: "unknown_0", type: "unknown", number: 0, name: "Unknown Device", unique_id: "" });
  });

  it("fails on a non-200 answer", async () => {
    const fetch: FetchLike = async () => new Response("busy", { status: 503 });
    await expect(fetchConfiguredDevices("10.0.0.2", 5555, { fetch, discoveredAt: AT })).rejects.toThrow(
      "10.0.0.2:5555 returned status 503",
    );
  });
});

describe("createUdpStrategy", () => {
  it("queries every responder and skips the ones that fail", async () => {
    const log = makeLog();
    const { fetch } = managementFetch({ "10.0.0.2:5555": [SEESTAR_RECORD] });
    const probe = vi.fn(async () => [
      { host: "10.0.0.2", port: 5555 },
      { host: "10.0.0.4", port: 11111 },
    ]);

    const strategy = createUdpStrategy({ log, fetch, probe, nowIso });
    const devices = await strategy.run({ timeoutMs: 1500 });

    expect(probe).toHaveBeenCalledWith({ timeoutMs: 1500 });
    expect(devices.map((d) => `${d.id}@${d.host}:${d.port}`)).toEqual(["telescope_1@10.0.0.2:5555"]);
    expect(log.warn).toHaveBeenCalledWith("udp responder 10.0.0.4:11111 did not list its devices: fetch failed");
  });

  it("keeps fast responders when another answers after the listen window", async () => {
    const { fetch: fast } = managementFetch({ "10.0.0.2:5555": [SEESTAR_RECORD] });
    const fetch: FetchLike = async (url, init) => {
      if (new URL(url).hostname === "10.0.0.3") {
        await new Promise((resolve) => setTimeout(resolve, 1_200));
        return Response.json({
          Value: [{ DeviceName: "Slow Camera", DeviceType: "Camera", DeviceNumber: 0 }],
          ErrorNumber: 0,
          ErrorMessage: "",
        });
      }
      return fast(url, init);
    };
    const probe = vi.fn(async () => [
      { host: "10.0.0.2", port: 5555 },
      { host: "10.0.0.3", port: 11111 },
    ]);

    const strategy = createUdpStrategy({ log: makeLog(), fetch, probe, nowIso });
    const devices = await strategy.run({ timeoutMs: 100 });

    expect(devices.map((d) => `${d.id}@${d.host}:${d.port}`)).toEqual([
      "telescope_1@10.0.0.2:5555",
      "camera_0@10.0.0.3:11111",
    ]);
  });

  it("abandons a broadcast probe that outlives its window", async () => {
    const probe = vi.fn(() => new Promise<{ host: string; port: number }[]>(() => {}));
    const strategy = createUdpStrategy({ log: makeLog(), probe, nowIso });

    await expect(strategy.run({ timeoutMs: 10 })).rejects.toThrow("udp broadcast probe timed out after 1010ms");
  });
});

describe("createKnownHostStrategy", () => {
  it("returns devices from reachable hosts only", async () => {
    const log = makeLog();
    const { fetch } = managementFetch({ "localhost:5555": [SEESTAR_RECORD] });
    const strategy = createKnownHostStrategy(
      [
        { host: "localhost", port: 5555, name: "seestar_alp" },
        { host: "10.9.9.9", port: 11111, name: "offline" },
      ],
      { log, fetch, nowIso },
    );

    const devices = await strategy.run({ timeoutMs: 5000 });
    expect(devices.map((d) => d.id)).toEqual(["telescope_1"]);
    expect(devices[0]?.host).toBe("localhost");
    expect(log.info).toHaveBeenCalledWith("added known device: Seestar S50 (Telescope) from seestar_alp");
    expect(log.warn).toHaveBeenCalledWith("known device offline at 10.9.9.9:11111 unavailable: fetch failed");
  });
});

describe("createSimulatorStrategy", () => {
  it("synthesizes telescopes numbered from 99 for reachable endpoints", async () => {
    const checkTcp = vi.fn(async () => true);
    const strategy = createSimulatorStrategy(
      [
        { host: "localhost", port: 4700, name: "Simulator" },
        { host: "localhost", port: 4701, name: "Second Simulator" },
      ],
      { log: makeLog(), checkTcp, nowIso },
    );

    const devices = await strategy.run({ timeoutMs: 5000 });
    expect(checkTcp).toHaveBeenCalledWith("localhost", 4700, 2000);
    expect(devices).toEqual([
      {
        id: "telescope_99",
        type: "Telescope",
        number: 99,
        name: "Simulator",
        unique_id: "simulator_localhost_4700",
        host: "localhost",
        port: 4700,
        api_version: 1,
        is_simulator: true,
        discovered_at: AT,
      },
      expect.objectContaining({ id: "telescope_100", number: 100, name: "Second Simulator" }),
    ]);
  });

  it("skips unreachable endpoints over a real socket", async () => {
    const server = net.createServer((socket) => socket.end());
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
    const address = server.address();
    const openPort = typeof address === "object" && address ? address.port : 0;

    const closed = net.createServer();
    await new Promise<void>((resolve) => closed.listen(0, "127.0.0.1", () => resolve()));
    const closedAddress = closed.address();
    const closedPort = typeof closedAddress === "object" && closedAddress ? closedAddress.port : 0;
    await new Promise<void>((resolve) => closed.close(() => resolve()));

    try {
      const strategy = createSimulatorStrategy(
        [
          { host: "127.0.0.1", port: openPort, name: "Sim A" },
          { host: "127.0.0.1", port: closedPort, name: "Sim B" },
        ],
        { log: makeLog(), nowIso },
      );
      const devices = await strategy.run({ timeoutMs: 5000 });
      expect(devices.map((d) => [d.id, d.name])).toEqual([["telescope_99", "Sim A"]]);
    } finally {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  });
});

describe("createDirectDeviceStrategy", () => {
  it("turns configured entries into descriptors without I/O", async () => {
    const strategy = createDirectDeviceStrategy(
      [
        { id: "telescope_1", host: "localhost", port: 5555, name: "Seestar S50" },
        { id: "telescope_99", host: "localhost", port: 4700, name: "Simulator" },
      ],
      { log: makeLog(), nowIso },
    );

    const devices = await strategy.run({ timeoutMs: 5000 });
    expect(devices).toEqual([
      expect.objectContaining({ id: "telescope_1", type: "Telescope", number: 1, name: "Seestar S50" }),
      {
        id: "telescope_99",
        type: "Telescope",
        number: 99,
        name: "Simulator",
        unique_id: "telescope_99_localhost_4700",
        host: "localhost",
        port: 4700,
        api_version: 1,
        is_simulator: false,
        discovered_at: AT,
      },
    ]);
  });
});
