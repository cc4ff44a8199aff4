// ---------------------------------------------------------------------------
// Alpaca UDP discovery probe
// ---------------------------------------------------------------------------
// Broadcasts "alpacadiscovery1" to port 32227 and collects the
// `{"AlpacaPort": n}` replies until the timeout elapses.
// ---------------------------------------------------------------------------

import dgram from "node:dgram";

export const ALPACA_DISCOVERY_PORT = 32227;
export const ALPACA_DISCOVERY_MESSAGE = "alpacadiscovery1";

export type AlpacaResponder = {
  host: string;
  port: number;
};

export type UdpProbeOptions = {
  timeoutMs: number;
  broadcastAddress?: string;
  discoveryPort?: number;
};

/** Parse one discovery reply; null for anything that is not a valid reply. */
export function parseDiscoveryReply(msg: Buffer | string): number | null {
  try {
    const parsed: unknown = JSON.parse(msg.toString());
    if (typeof parsed !== "object" || parsed === null || !("AlpacaPort" in parsed)) {
      return null;
    }
    const port = parsed.AlpacaPort;
    return typeof port === "number" && Number.isInteger(port) && port > 0 && port <= 65535
      ? port
      : null;
  } catch {
    return null;
  }
}

export type UdpProbe = (opts: UdpProbeOptions) => Promise<AlpacaResponder[]>;

export const probeAlpacaBroadcast: UdpProbe = (opts) => {
  const address = opts.broadcastAddress ?? "255.255.255.255";
  const discoveryPort = opts.discoveryPort ?? ALPACA_DISCOVERY_PORT;

  return new Promise((resolve, reject) => {
    const socket = dgram.createSocket({ type: "udp4", reuseAddr: true });
    const responders = new Map<string, AlpacaResponder>();
    let settled = false;

    const finish = (err?: Error) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      socket.close();
      if (err) {
        reject(err);
      } else {
        resolve([...responders.values()]);
      }
    };

    const timer = setTimeout(() => finish(), opts.timeoutMs);

    socket.on("error", (err) => finish(err));
    socket.on("message", (msg, rinfo) => {
      const port = parseDiscoveryReply(msg);
      if (port !== null) {
        responders.set(`${rinfo.address}:${port}`, { host: rinfo.address, port });
      }
    });
    socket.bind(0, () => {
      socket.setBroadcast(true);
      socket.send(ALPACA_DISCOVERY_MESSAGE, discoveryPort, address, (err) => {
        if (err) {
          finish(err);
        }
      });
    });
  });
};
