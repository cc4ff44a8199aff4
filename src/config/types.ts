// ---------------------------------------------------------------------------
// Bridge configuration – resolved shape
// ---------------------------------------------------------------------------

import type { LogLevel } from "../logging.js";
import type {
  DirectDeviceEntry,
  KnownDeviceEndpoint,
  SimulatorEndpoint,
} from "../devices/types.js";

/** Which connected devices get an SSE consumer. */
export type EventStreamMode = "auto" | "all" | "off";

export type DiscoveryConfig = {
  timeoutMs: number;
  skipUdp: boolean;
  knownDevices: KnownDeviceEndpoint[];
  simulatorDevices: SimulatorEndpoint[];
  directDevices: DirectDeviceEntry[];
};

export type EventsConfig = {
  mode: EventStreamMode;
  /** SSE port override; null means "same port as the device API". */
  port: number | null;
  bufferSize: number;
};

export type AlpacaBridgeConfig = {
  discovery: DiscoveryConfig;
  statePath: string;
  events: EventsConfig;
  logLevel: LogLevel;
};
