/**
 * Minimal Alpaca device API client.
 *
 * Speaks the REST convention `/api/v{n}/{type}/{number}/{property}`:
 * GET for properties, PUT (form-encoded) for setters and actions. Every
 * response is `{ Value, ErrorNumber, ErrorMessage }`.
 */

import type { DeviceDescriptor } from "../devices/types.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export class AlpacaApiError extends Error {
  constructor(
    message: string,
    readonly errorNumber: number,
    readonly httpStatus?: number,
  ) {
    super(message);
    this.name = "AlpacaApiError";
  }
}

type AlpacaEnvelope = {
  Value?: unknown;
  ErrorNumber?: number;
  ErrorMessage?: string;
};

function isEnvelope(value: unknown): value is AlpacaEnvelope {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export type AlpacaClientOptions = {
  host: string;
  port: number;
  /** Alpaca path segment, lowercase (`telescope`, `filterwheel`, ...). */
  deviceType: string;
  deviceNumber: number;
  apiVersion?: number;
  clientId?: number;
  timeoutMs?: number;
  fetch?: FetchLike;
};

let nextTransactionId = 1;

export class AlpacaDeviceClient {
  readonly baseUrl: string;
  private readonly clientId: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly opts: AlpacaClientOptions) {
    const version = opts.apiVersion ?? 1;
    this.baseUrl = `http://${opts.host}:${opts.port}/api/v${version}/${opts.deviceType}/${opts.deviceNumber}`;
    this.clientId = opts.clientId ?? 1;
    this.timeoutMs = opts.timeoutMs ?? 10_000;
    this.fetchImpl = opts.fetch ?? fetch;
  }

  get deviceType(): string {
    return this.opts.deviceType;
  }

  get deviceNumber(): number {
    return this.opts.deviceNumber;
  }

  private transactionParams(): URLSearchParams {
    return new URLSearchParams({
      ClientID: String(this.clientId),
      ClientTransactionID: String(nextTransactionId++),
    });
  }

  private async request(method: "GET" | "PUT", name: string, body?: Record<string, string>): Promise<unknown> {
    const key = name.toLowerCase();
    let url = `${this.baseUrl}/${key}`;
    const init: RequestInit = { method, signal: AbortSignal.timeout(this.timeoutMs) };

    if (method === "GET") {
      url += `?${this.transactionParams().toString()}`;
    } else {
      const form = this.transactionParams();
      for (const [k, v] of Object.entries(body ?? {})) {
        form.set(k, v);
      }
      init.headers = { "Content-Type": "application/x-www-form-urlencoded" };
      init.body = form.toString();
    }

    const res = await this.fetchImpl(url, init);
    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw new AlpacaApiError(`Alpaca ${method} ${key} failed (${res.status}): ${text}`, -1, res.status);
    }
    const payload: unknown = await res.json();
    if (!isEnvelope(payload)) {
      throw new AlpacaApiError(`Alpaca ${method} ${key} returned a non-object body`, -1, res.status);
    }
    if (payload.ErrorNumber) {
      throw new AlpacaApiError(
        payload.ErrorMessage || `Alpaca error ${payload.ErrorNumber}`,
        payload.ErrorNumber,
        res.status,
      );
    }
    return payload.Value;
  }

  async get(property: string): Promise<unknown> {
    return this.request("GET", property);
  }

  async getString(property: string): Promise<string> {
    const value = await this.get(property);
    if (typeof value !== "string") {
      throw new AlpacaApiError(`${property} is not a string`, -1);
    }
    return value;
  }

  async getNumber(property: string): Promise<number> {
    const value = await this.get(property);
    if (typeof value !== "number") {
      throw new AlpacaApiError(`${property} is not a number`, -1);
    }
    return value;
  }

  async getBoolean(property: string): Promise<boolean> {
    const value = await this.get(property);
    if (typeof value !== "boolean") {
      throw new AlpacaApiError(`${property} is not a boolean`, -1);
    }
    return value;
  }

  async put(property: string, params: Record<string, string | number | boolean> = {}): Promise<unknown> {
    const body: Record<string, string> = {};
    for (const [k, v] of Object.entries(params)) {
      body[k] = String(v);
    }
    return this.request("PUT", property, body);
  }

  async action(actionName: string, parameters = ""): Promise<unknown> {
    return this.put("action", { Action: actionName, Parameters: parameters });
  }

  // -------------------------------------------------------------------------
  // Common members (ASCOM IDeviceV2)
  // -------------------------------------------------------------------------

  async getConnected(): Promise<boolean> {
    return this.getBoolean("connected");
  }

  async setConnected(connected: boolean): Promise<void> {
    await this.put("connected", { Connected: connected });
  }

  async getDriverInfo(): Promise<string> {
    return this.getString("driverinfo");
  }

  async getDriverVersion(): Promise<string> {
    return this.getString("driverversion");
  }

  async getInterfaceVersion(): Promise<number> {
    return this.getNumber("interfaceversion");
  }

  async getDescription(): Promise<string> {
    return this.getString("description");
  }

  /** Kind-specific capability flags, for device info views. */
  async getCapabilities(): Promise<Record<string, unknown>> {
    return {};
  }
}

export function clientOptionsFor(
  device: DeviceDescriptor,
  deviceType: string,
  extra: Pick<AlpacaClientOptions, "fetch" | "timeoutMs"> = {},
): AlpacaClientOptions {
  return {
    host: device.host,
    port: device.port,
    deviceType,
    deviceNumber: device.number,
    apiVersion: device.api_version,
    ...extra,
  };
}
