// ---------------------------------------------------------------------------
// Device kinds – the Alpaca device types this bridge can drive
// ---------------------------------------------------------------------------

export const DEVICE_KINDS = ["telescope", "camera", "focuser", "filterwheel"] as const;

export type DeviceKind = (typeof DEVICE_KINDS)[number];

/** ASCOM spelling of each kind, as reported by management APIs. */
export const DEVICE_KIND_NAMES: Record<DeviceKind, string> = {
  telescope: "Telescope",
  camera: "Camera",
  focuser: "Focuser",
  filterwheel: "FilterWheel",
};

export function isDeviceKind(value: string): value is DeviceKind {
  return DEVICE_KINDS.some((kind) => kind === value);
}

/** Case-insensitive lookup; null for types without a client. */
export function toDeviceKind(type: string): DeviceKind | null {
  const lower = type.trim().toLowerCase();
  return isDeviceKind(lower) ? lower : null;
}
