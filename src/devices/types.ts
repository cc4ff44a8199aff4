// ---------------------------------------------------------------------------
// Alpaca Devices – Core Types
// ---------------------------------------------------------------------------

export type DeviceDescriptor = {
  /** `lower(type)_number`, or the caller's own string for ad hoc devices. */
  id: string;
  type: string;
  number: number;
  name: string;
  unique_id: string;
  host: string;
  port: number;
  api_version: number;
  is_simulator: boolean;
  discovered_at: string;
};

/** Descriptor as shown to callers, with the derived device API base URL. */
export type DeviceDescriptorView = DeviceDescriptor & {
  connection_url: string;
};

/** One record of `GET /management/v1/configureddevices`. */
export type ManagementDeviceRecord = {
  DeviceName?: string;
  DeviceType?: string;
  DeviceNumber?: number;
  UniqueID?: string;
  Host?: string;
  Port?: number;
  ApiVersion?: number;
};

export type PersistedStateFile = {
  version: 1;
  updated_at: string;
  devices: DeviceDescriptor[];
};

// ---------------------------------------------------------------------------
// Configured endpoints
// ---------------------------------------------------------------------------

/** An Alpaca server probed through its management API. */
export type KnownDeviceEndpoint = {
  host: string;
  port: number;
  name: string;
};

/** A simulator reachable over TCP that does not answer management queries. */
export type SimulatorEndpoint = KnownDeviceEndpoint;

/** A device declared up front with its id, so no discovery is needed. */
export type DirectDeviceEntry = {
  id: string;
  host: string;
  port: number;
  name: string;
};

// ---------------------------------------------------------------------------
// Connected devices
// ---------------------------------------------------------------------------

export type ConnectedDeviceView = DeviceDescriptorView & {
  connected_at: string;
  last_used: string;
};

export type DeviceInfo = DeviceDescriptorView & {
  connected: boolean;
  driver_info?: string;
  driver_version?: string;
  interface_version?: number;
  description?: string;
  capabilities?: Record<string, unknown>;
};

export type DeviceLifecycleHook = "on_device_connected" | "on_device_disconnected";

export type DeviceLifecycleCallback = (
  deviceId: string,
  descriptor: DeviceDescriptor,
) => void | Promise<void>;

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_ALPACA_PORT = 11111;
export const DIRECT_CONNECTION_NAME = "Direct Connection";
export const SIMULATOR_DEVICE_NUMBER = 99;

export function makeDeviceId(type: string, number: number): string {
  return `${type.toLowerCase()}_${number}`;
}

export function descriptorFromRecord(
  record: ManagementDeviceRecord,
  discoveredAt: string,
): DeviceDescriptor {
  const type = record.DeviceType ?? "unknown";
  const number = record.DeviceNumber ?? 0;
  return {
    id: makeDeviceId(type, number),
    type,
    number,
    name: record.DeviceName ?? "Unknown Device",
    unique_id: record.UniqueID ?? "",
    host: record.Host ?? "localhost",
    port: record.Port ?? DEFAULT_ALPACA_PORT,
    api_version: record.ApiVersion ?? 1,
    is_simulator: false,
    discovered_at: discoveredAt,
  };
}

export function connectionUrl(device: DeviceDescriptor): string {
  return `http://${device.host}:${device.port}/api/v${device.api_version}`;
}

export function describeDevice(device: DeviceDescriptor): DeviceDescriptorView {
  return { ...device, connection_url: connectionUrl(device) };
}
