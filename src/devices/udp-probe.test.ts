import dgram from "node:dgram";
import { describe, it, expect, afterEach } from "vitest";
import { ALPACA_DISCOVERY_MESSAGE, parseDiscoveryReply, probeAlpacaBroadcast } from "./udp-probe.js";

describe("parseDiscoveryReply", () => {
  it("reads the advertised port", () => {
    expect(parseDiscoveryReply('{"AlpacaPort": 11111}')).toBe(11111);
    expect(parseDiscoveryReply(Buffer.from('{"AlpacaPort":5555}'))).toBe(5555);
  });

  it("rejects anything else", () => {
    expect(parseDiscoveryReply("alpacadiscovery1")).toBeNull();
    expect(parseDiscoveryReply('{"Port": 11111}')).toBeNull();
    expect(parseDiscoveryReply('{"AlpacaPort": "11111"}')).toBeNull();
    expect(parseDiscoveryReply('{"AlpacaPort": 70000}')).toBeNull();
    expect(parseDiscoveryReply("[1]")).toBeNull();
  });
});

describe("probeAlpacaBroadcast", () => {
  let responder: dgram.Socket | null = null;

  afterEach(() => {
    responder?.close();
    responder = null;
  });

  it("collects replies from a responder until the timeout", async () => {
    const socket = dgram.createSocket("udp4");
    responder = socket;
    const received: string[] = [];
    socket.on("message", (msg, rinfo) => {
      received.push(msg.toString());
      socket.send('{"AlpacaPort": 11111}', rinfo.port, rinfo.address);
      // Duplicate replies collapse into one responder.
      socket.send('{"AlpacaPort": 11111}', rinfo.port, rinfo.address);
    });
    await new Promise<void>((resolve) => socket.bind(0, "127.0.0.1", () => resolve()));
    const { port } = socket.address();

    const responders = await probeAlpacaBroadcast({
      timeoutMs: 300,
      broadcastAddress: "127.0.0.1",
      discoveryPort: port,
    });

    expect(received).toEqual([ALPACA_DISCOVERY_MESSAGE]);
    expect(responders).toEqual([{ host: "127.0.0.1", port: 11111 }]);
  });

  it("resolves empty when nobody answers", async () => {
    const socket = dgram.createSocket("udp4");
    responder = socket;
    await new Promise<void>((resolve) => socket.bind(0, "127.0.0.1", () => resolve()));
    const { port } = socket.address();

    await expect(
      probeAlpacaBroadcast({ timeoutMs: 100, broadcastAddress: "127.0.0.1", discoveryPort: port }),
    ).resolves.toEqual([]);
  });
});
