// ---------------------------------------------------------------------------
// Device Resolver – connection strings and device ids
// ---------------------------------------------------------------------------
// Pure helpers; nothing here touches the network or the device tables.
// ---------------------------------------------------------------------------

import { InvalidParameterError } from "./errors.js";
import { DEVICE_KIND_NAMES, toDeviceKind, type DeviceKind } from "./kinds.js";
import { DIRECT_CONNECTION_NAME, type DeviceDescriptor } from "./types.js";

export type ConnectionTarget = {
  name: string;
  host: string;
  port: number;
};

/** `name@host:port` or `host:port`. */
const DIRECT_PATTERN = /^(?:([^@]+)@)?([^:@]+):(\d+)$/;

const KIND_ID_PATTERN = /^([a-z]+)_(\d+)$/i;

export function parsePort(raw: string, context: string): number {
  const port = Number.parseInt(raw, 10);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidParameterError(
      `Invalid port "${raw}" in ${context}`,
      "Ports must be whole numbers between 1 and 65535.",
    );
  }
  return port;
}

/**
 * Parse a direct connection string. Returns null when `value` does not look
 * like one; throws `InvalidParameterError` when it does but the port is out
 * of range.
 */
export function parseConnectionString(value: string): ConnectionTarget | null {
  const match = DIRECT_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }
  const [, name, host, port] = match;
  if (!host || !port) {
    return null;
  }
  return {
    name: name?.trim() || DIRECT_CONNECTION_NAME,
    host,
    port: parsePort(port, `connection string "${value}"`),
  };
}

function titleCase(value: string): string {
  return value.toLowerCase().replace(/(^|[^a-z])([a-z])/g, (_m, sep: string, ch: string) => sep + ch.toUpperCase());
}

/**
 * Split `telescope_1` into its ASCOM type and number. Ids without an
 * underscore fall back to Telescope #1; a non-numeric suffix falls back to
 * number 1. Known kinds get their canonical spelling (`FilterWheel`).
 */
export function parseDeviceIdType(deviceId: string): { type: string; number: number } {
  const idx = deviceId.lastIndexOf("_");
  if (idx === -1) {
    return { type: DEVICE_KIND_NAMES.telescope, number: 1 };
  }
  const typePart = deviceId.slice(0, idx);
  const numPart = deviceId.slice(idx + 1);
  const kind = toDeviceKind(typePart);
  const type = kind ? DEVICE_KIND_NAMES[kind] : titleCase(typePart);
  const number = /^\d+$/.test(numPart) ? Number.parseInt(numPart, 10) : 1;
  return { type, number };
}

/** `telescope_3` → { kind: "telescope", number: 3 }; null for anything else. */
export function matchKindDeviceId(deviceId: string): { kind: DeviceKind; number: number } | null {
  const match = KIND_ID_PATTERN.exec(deviceId);
  if (!match?.[1] || !match[2]) {
    return null;
  }
  const kind = toDeviceKind(match[1]);
  return kind ? { kind, number: Number.parseInt(match[2], 10) } : null;
}

/**
 * Build a descriptor for a device reached without discovery. The id is kept
 * exactly as given.
 */
export function descriptorFromConnection(params: {
  deviceId: string;
  name: string;
  host: string;
  port: number;
  discoveredAt: string;
  /** Where to read `<type>_<n>` from; defaults to the id. */
  typeSource?: string;
}): DeviceDescriptor {
  const source = params.typeSource ?? params.deviceId;
  const { type, number } = parseDeviceIdType(source);
  return {
    id: params.deviceId,
    type,
    number,
    name: params.name,
    unique_id: `${params.deviceId}_${params.host}_${params.port}`,
    host: params.host,
    port: params.port,
    api_version: 1,
    is_simulator: false,
    discovered_at: params.discoveredAt,
  };
}

/**
 * Descriptor for a `[name@]host:port` id. Type and number come from the
 * name prefix when it reads like `camera_2`, otherwise Telescope #1.
 */
export function descriptorFromConnectionString(
  deviceId: string,
  target: ConnectionTarget,
  discoveredAt: string,
): DeviceDescriptor {
  const named = matchKindDeviceId(target.name);
  return descriptorFromConnection({
    deviceId,
    name: target.name,
    host: target.host,
    port: target.port,
    discoveredAt,
    typeSource: named ? target.name : "",
  });
}
