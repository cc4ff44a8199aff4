// ---------------------------------------------------------------------------
// Agent tool plumbing – tool shape, JSON results, parameter readers
// ---------------------------------------------------------------------------

import type { TSchema } from "@sinclair/typebox";
import { InvalidParameterError, isDeviceError } from "../../devices/errors.js";

export type AgentToolResult = {
  content: { type: "text"; text: string }[];
  details: unknown;
};

export type AgentTool<TParams extends TSchema = TSchema> = {
  label: string;
  name: string;
  description: string;
  parameters: TParams;
  execute: (toolCallId: string, args: Record<string, unknown>) => Promise<AgentToolResult>;
};

export type AnyAgentTool = AgentTool;

export function jsonResult(payload: unknown): AgentToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
    details: payload,
  };
}

/** Device errors become `{ success: false, error: kind, message, hint }`; anything else propagates. */
export function errorResult(err: unknown): AgentToolResult {
  if (isDeviceError(err)) {
    return jsonResult({ success: false, error: err.kind, message: err.message, hint: err.hint });
  }
  throw err;
}

type ReadOpts = { required?: boolean; label?: string };

export function readStringParam(
  params: Record<string, unknown>,
  key: string,
  opts: ReadOpts & { required: true },
): string;
export function readStringParam(
  params: Record<string, unknown>,
  key: string,
  opts?: ReadOpts,
): string | undefined;
export function readStringParam(
  params: Record<string, unknown>,
  key: string,
  opts: ReadOpts = {},
): string | undefined {
  const raw = params[key];
  const value = typeof raw === "string" ? raw.trim() : undefined;
  if (!value) {
    if (opts.required) {
      throw new InvalidParameterError(`${opts.label ?? key} required`, `Pass "${key}" as a non-empty string.`);
    }
    return undefined;
  }
  return value;
}

export function readNumberParam(params: Record<string, unknown>, key: string): number | undefined {
  const raw = params[key];
  if (raw === undefined || raw === null || raw === "") {
    return undefined;
  }
  const value = typeof raw === "number" ? raw : typeof raw === "string" ? Number(raw) : Number.NaN;
  if (!Number.isFinite(value)) {
    throw new InvalidParameterError(`${key} must be a number`, `Pass "${key}" as a number.`);
  }
  return value;
}

export function readStringArrayParam(params: Record<string, unknown>, key: string): string[] | undefined {
  const raw = params[key];
  if (raw === undefined) {
    return undefined;
  }
  if (typeof raw === "string") {
    return raw
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean);
  }
  if (Array.isArray(raw) && raw.every((item): item is string => typeof item === "string")) {
    return raw;
  }
  throw new InvalidParameterError(`${key} must be a list of strings`, `Pass "${key}" as an array of strings.`);
}
