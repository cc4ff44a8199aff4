// ---------------------------------------------------------------------------
// Device errors – machine-checkable kind + what to try next
// ---------------------------------------------------------------------------

export type DeviceErrorKind =
  | "device_not_found"
  | "connection_failed"
  | "device_not_connected"
  | "unsupported_operation"
  | "invalid_parameter";

export class DeviceError extends Error {
  readonly kind: DeviceErrorKind;
  readonly hint: string;

  constructor(kind: DeviceErrorKind, message: string, hint: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DeviceError";
    this.kind = kind;
    this.hint = hint;
  }
}

export class DeviceNotFoundError extends DeviceError {
  constructor(message: string, hint: string) {
    super("device_not_found", message, hint);
    this.name = "DeviceNotFoundError";
  }
}

export class ConnectionFailedError extends DeviceError {
  constructor(message: string, options?: { cause?: unknown; hint?: string }) {
    super(
      "connection_failed",
      message,
      options?.hint ?? "Check that the device is powered on and reachable, then try again.",
      { cause: options?.cause },
    );
    this.name = "ConnectionFailedError";
  }
}

export class DeviceNotConnectedError extends DeviceError {
  constructor(deviceId: string) {
    super(
      "device_not_connected",
      `Device ${deviceId} is not connected`,
      `Connect it first with connect("${deviceId}").`,
    );
    this.name = "DeviceNotConnectedError";
  }
}

export class UnsupportedOperationError extends DeviceError {
  constructor(message: string, hint = "Supported device types: Telescope, Camera, Focuser, FilterWheel.") {
    super("unsupported_operation", message, hint);
    this.name = "UnsupportedOperationError";
  }
}

export class InvalidParameterError extends DeviceError {
  constructor(message: string, hint: string) {
    super("invalid_parameter", message, hint);
    this.name = "InvalidParameterError";
  }
}

export function isDeviceError(err: unknown): err is DeviceError {
  return err instanceof DeviceError;
}
