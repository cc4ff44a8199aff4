// ---------------------------------------------------------------------------
// Typed device clients + the kind → constructor table
// ---------------------------------------------------------------------------

import { UnsupportedOperationError } from "../devices/errors.js";
import { toDeviceKind, type DeviceKind } from "../devices/kinds.js";
import type { DeviceDescriptor } from "../devices/types.js";
import {
  AlpacaDeviceClient,
  clientOptionsFor,
  type AlpacaClientOptions,
  type FetchLike,
} from "./client.js";

export class TelescopeClient extends AlpacaDeviceClient {
  override async getCapabilities(): Promise<Record<string, unknown>> {
    return {
      can_slew: await this.getBoolean("canslew"),
      can_park: await this.getBoolean("canpark"),
      can_find_home: await this.getBoolean("canfindhome"),
    };
  }
}

export class CameraClient extends AlpacaDeviceClient {
  override async getCapabilities(): Promise<Record<string, unknown>> {
    return {
      sensor_type: await this.getNumber("sensortype"),
      pixel_size: await this.getNumber("pixelsizex"),
      max_bin: await this.getNumber("maxbinx"),
    };
  }
}

export class FocuserClient extends AlpacaDeviceClient {
  override async getCapabilities(): Promise<Record<string, unknown>> {
    return {
      absolute: await this.getBoolean("absolute"),
      max_step: await this.getNumber("maxstep"),
    };
  }
}

export class FilterWheelClient extends AlpacaDeviceClient {
  override async getCapabilities(): Promise<Record<string, unknown>> {
    const names = await this.get("names");
    return { filter_names: Array.isArray(names) ? names : [] };
  }
}

const CLIENT_CONSTRUCTORS: { [K in DeviceKind]: (opts: AlpacaClientOptions) => AlpacaDeviceClient } = {
  telescope: (opts) => new TelescopeClient(opts),
  camera: (opts) => new CameraClient(opts),
  focuser: (opts) => new FocuserClient(opts),
  filterwheel: (opts) => new FilterWheelClient(opts),
};

/** What the connection manager needs from a device client. */
export type DeviceClient = Pick<
  AlpacaDeviceClient,
  | "getConnected"
  | "setConnected"
  | "getDriverInfo"
  | "getDriverVersion"
  | "getInterfaceVersion"
  | "getDescription"
  | "getCapabilities"
>;

export type DeviceClientFactory = (device: DeviceDescriptor, kind: DeviceKind) => DeviceClient;

export function createAlpacaClientFactory(
  extra: { fetch?: FetchLike; timeoutMs?: number } = {},
): DeviceClientFactory {
  return (device, kind) => CLIENT_CONSTRUCTORS[kind](clientOptionsFor(device, kind, extra));
}

/** Map a descriptor's free-form type onto a supported kind, or fail. */
export function requireDeviceKind(device: DeviceDescriptor): DeviceKind {
  const kind = toDeviceKind(device.type);
  if (!kind) {
    throw new UnsupportedOperationError(`Unsupported device type: ${device.type}`);
  }
  return kind;
}
