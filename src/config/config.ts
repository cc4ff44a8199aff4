// ---------------------------------------------------------------------------
// Config loader – YAML file overlaid by ALPACA_* environment variables
// ---------------------------------------------------------------------------

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { parse as parseYaml } from "yaml";
import { getChildLogger, parseLogLevel, type LogLevel } from "../logging.js";
import { isDeviceError } from "../devices/errors.js";
import { parsePort } from "../devices/resolver.js";
import type { DirectDeviceEntry, KnownDeviceEndpoint } from "../devices/types.js";
import { resolveDeviceStatePath } from "../devices/store.js";
import type { AlpacaBridgeConfig, EventStreamMode } from "./types.js";

export const DEFAULT_DISCOVERY_TIMEOUT_S = 5;
export const MAX_DISCOVERY_TIMEOUT_S = 30;
export const DEFAULT_KNOWN_DEVICES = "localhost:5555:seestar_alp";
export const DEFAULT_EVENT_BUFFER_SIZE = 100;

// ---------------------------------------------------------------------------
// File schema
// ---------------------------------------------------------------------------

const EndpointSchema = Type.Union([
  Type.String(),
  Type.Object({
    host: Type.String({ minLength: 1 }),
    port: Type.Integer({ minimum: 1, maximum: 65535 }),
    name: Type.Optional(Type.String()),
  }),
]);

const DirectDeviceSchema = Type.Union([
  Type.String(),
  Type.Object({
    id: Type.String({ minLength: 1 }),
    host: Type.String({ minLength: 1 }),
    port: Type.Integer({ minimum: 1, maximum: 65535 }),
    name: Type.Optional(Type.String()),
  }),
]);

const ConfigFileSchema = Type.Object({
  discovery: Type.Optional(
    Type.Object({
      timeout: Type.Optional(Type.Number({ exclusiveMinimum: 0 })),
      skipUdp: Type.Optional(Type.Boolean()),
      knownDevices: Type.Optional(Type.Array(EndpointSchema)),
      simulatorDevices: Type.Optional(Type.Array(EndpointSchema)),
      directDevices: Type.Optional(Type.Array(DirectDeviceSchema)),
    }),
  ),
  statePath: Type.Optional(Type.String()),
  events: Type.Optional(
    Type.Object({
      mode: Type.Optional(
        Type.Union([Type.Literal("auto"), Type.Literal("all"), Type.Literal("off")]),
      ),
      port: Type.Optional(Type.Integer({ minimum: 1, maximum: 65535 })),
      bufferSize: Type.Optional(Type.Integer({ minimum: 1 })),
    }),
  ),
  logLevel: Type.Optional(Type.String()),
});

export type ConfigFile = Static<typeof ConfigFileSchema>;

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const custom = env.ALPACA_BRIDGE_CONFIG?.trim();
  if (custom) {
    return path.resolve(custom);
  }
  const home = env.HOME ?? env.USERPROFILE ?? os.homedir();
  return path.join(home, ".alpaca-bridge", "config.yaml");
}

/** Read and validate the YAML file. A missing file is an empty config. */
export function readConfigFile(filePath: string, warn: (msg: string) => void): ConfigFile {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    warn(`ignoring config ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
    return {};
  }
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!Value.Check(ConfigFileSchema, parsed)) {
    const first = Value.Errors(ConfigFileSchema, parsed).First();
    const where = first ? `${first.path || "/"}: ${first.message}` : "invalid layout";
    warn(`ignoring config ${filePath} (${where})`);
    return {};
  }
  return parsed;
}

// ---------------------------------------------------------------------------
// List parsing (env format)
// ---------------------------------------------------------------------------

function splitList(raw: string): string[] {
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

function tryPort(raw: string | undefined, context: string, warn: (msg: string) => void): number | null {
  if (raw === undefined) {
    return null;
  }
  try {
    return parsePort(raw, context);
  } catch (err) {
    if (isDeviceError(err)) {
      warn(`${err.message}; skipping`);
      return null;
    }
    throw err;
  }
}

/** `host:port[:name]` → endpoint. Name defaults to `host:port`. */
export function parseEndpoint(
  entry: string,
  label: string,
  warn: (msg: string) => void,
): KnownDeviceEndpoint | null {
  const [host, portRaw, ...rest] = entry.split(":");
  if (!host || portRaw === undefined) {
    warn(`malformed ${label} entry "${entry}" (expected host:port[:name]); skipping`);
    return null;
  }
  const port = tryPort(portRaw, `${label} entry "${entry}"`, warn);
  if (port === null) {
    return null;
  }
  const name = rest.join(":").trim();
  return { host, port, name: name || `${host}:${port}` };
}

export function parseEndpointList(
  raw: string,
  label: string,
  warn: (msg: string) => void,
): KnownDeviceEndpoint[] {
  const out: KnownDeviceEndpoint[] = [];
  for (const entry of splitList(raw)) {
    const endpoint = parseEndpoint(entry, label, warn);
    if (endpoint) {
      out.push(endpoint);
    }
  }
  return out;
}

/** `id:host:port[:name]` → direct device. Name defaults to the id. */
export function parseDirectDevice(
  entry: string,
  warn: (msg: string) => void,
): DirectDeviceEntry | null {
  const [id, host, portRaw, ...rest] = entry.split(":");
  if (!id || !host || portRaw === undefined) {
    warn(`malformed direct device "${entry}" (expected id:host:port[:name]); skipping`);
    return null;
  }
  const port = tryPort(portRaw, `direct device "${entry}"`, warn);
  if (port === null) {
    return null;
  }
  const name = rest.join(":").trim();
  return { id, host, port, name: name || id };
}

export function parseDirectDeviceList(raw: string, warn: (msg: string) => void): DirectDeviceEntry[] {
  const out: DirectDeviceEntry[] = [];
  for (const entry of splitList(raw)) {
    const device = parseDirectDevice(entry, warn);
    if (device) {
      out.push(device);
    }
  }
  return out;
}

type FileEndpoint = Static<typeof EndpointSchema>;
type FileDirectDevice = Static<typeof DirectDeviceSchema>;

function fileEndpoints(
  entries: FileEndpoint[] | undefined,
  label: string,
  warn: (msg: string) => void,
): KnownDeviceEndpoint[] {
  const out: KnownDeviceEndpoint[] = [];
  for (const entry of entries ?? []) {
    if (typeof entry === "string") {
      const endpoint = parseEndpoint(entry, label, warn);
      if (endpoint) {
        out.push(endpoint);
      }
    } else {
      out.push({ host: entry.host, port: entry.port, name: entry.name ?? `${entry.host}:${entry.port}` });
    }
  }
  return out;
}

function fileDirectDevices(
  entries: FileDirectDevice[] | undefined,
  warn: (msg: string) => void,
): DirectDeviceEntry[] {
  const out: DirectDeviceEntry[] = [];
  for (const entry of entries ?? []) {
    if (typeof entry === "string") {
      const device = parseDirectDevice(entry, warn);
      if (device) {
        out.push(device);
      }
    } else {
      out.push({ id: entry.id, host: entry.host, port: entry.port, name: entry.name ?? entry.id });
    }
  }
  return out;
}

// ---------------------------------------------------------------------------
// Scalar parsing
// ---------------------------------------------------------------------------

export function parseBoolean(raw: string | undefined): boolean | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const value = raw.trim().toLowerCase();
  return value === "true" || value === "1" || value === "yes" || value === "on";
}

/** Seconds → clamped milliseconds; falls back to the default on garbage. */
export function resolveDiscoveryTimeoutMs(
  seconds: number | string | undefined,
  warn: (msg: string) => void,
): number {
  if (seconds === undefined) {
    return DEFAULT_DISCOVERY_TIMEOUT_S * 1000;
  }
  const value = typeof seconds === "number" ? seconds : Number.parseFloat(seconds);
  if (!Number.isFinite(value) || value <= 0) {
    warn(`invalid discovery timeout "${seconds}"; using ${DEFAULT_DISCOVERY_TIMEOUT_S}s`);
    return DEFAULT_DISCOVERY_TIMEOUT_S * 1000;
  }
  return Math.round(Math.min(value, MAX_DISCOVERY_TIMEOUT_S) * 1000);
}

function parseEventMode(raw: string | undefined, warn: (msg: string) => void): EventStreamMode | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const value = raw.trim().toLowerCase();
  if (value === "auto" || value === "all" || value === "off") {
    return value;
  }
  warn(`invalid ALPACA_EVENT_STREAMS "${raw}"; using auto`);
  return "auto";
}

// ---------------------------------------------------------------------------
// loadConfig
// ---------------------------------------------------------------------------

export type LoadConfigOptions = {
  env?: NodeJS.ProcessEnv;
  /** Overrides ALPACA_BRIDGE_CONFIG / the default path. */
  configPath?: string;
  warn?: (msg: string) => void;
};

export function loadConfig(opts: LoadConfigOptions = {}): AlpacaBridgeConfig {
  const env = opts.env ?? process.env;
  const warn =
    opts.warn ??
    ((msg: string) => {
      getChildLogger({ module: "config" }).warn(msg);
    });
  const file = readConfigFile(opts.configPath ?? resolveConfigPath(env), warn);
  const discovery = file.discovery ?? {};

  const knownDevices =
    env.ALPACA_KNOWN_DEVICES !== undefined
      ? parseEndpointList(env.ALPACA_KNOWN_DEVICES, "known device", warn)
      : discovery.knownDevices
        ? fileEndpoints(discovery.knownDevices, "known device", warn)
        : parseEndpointList(DEFAULT_KNOWN_DEVICES, "known device", warn);

  const simulatorDevices =
    env.ALPACA_SIMULATOR_DEVICES !== undefined
      ? parseEndpointList(env.ALPACA_SIMULATOR_DEVICES, "simulator device", warn)
      : fileEndpoints(discovery.simulatorDevices, "simulator device", warn);

  const directDevices =
    env.ALPACA_DIRECT_DEVICES !== undefined
      ? parseDirectDeviceList(env.ALPACA_DIRECT_DEVICES, warn)
      : fileDirectDevices(discovery.directDevices, warn);

  const eventPort =
    env.ALPACA_EVENT_PORT !== undefined
      ? tryPort(env.ALPACA_EVENT_PORT, "ALPACA_EVENT_PORT", warn)
      : (file.events?.port ?? null);

  const logLevel: LogLevel = parseLogLevel(env.ALPACA_LOG_LEVEL ?? file.logLevel);

  return {
    discovery: {
      timeoutMs: resolveDiscoveryTimeoutMs(env.ALPACA_DISCOVERY_TIMEOUT ?? discovery.timeout, warn),
      skipUdp: parseBoolean(env.ALPACA_SKIP_UDP) ?? discovery.skipUdp ?? false,
      knownDevices,
      simulatorDevices,
      directDevices,
    },
    statePath: resolveDeviceStatePath(env.ALPACA_STATE_PATH ?? file.statePath),
    events: {
      mode: parseEventMode(env.ALPACA_EVENT_STREAMS, warn) ?? file.events?.mode ?? "auto",
      port: eventPort,
      bufferSize: file.events?.bufferSize ?? DEFAULT_EVENT_BUFFER_SIZE,
    },
    logLevel,
  };
}
