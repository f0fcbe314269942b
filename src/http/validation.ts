import type { FieldError } from "./problem.js";

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function asString(v: unknown): string | undefined {
  return typeof v === "string" ? v : undefined;
}

/** Parses a base-10 integer query parameter; undefined when absent or malformed. */
export function parseIntParam(v: string | null): number | undefined {
  if (v === null || !/^-?\d+$/.test(v.trim())) return undefined;
  return Number.parseInt(v, 10);
}

export function pushErr(errors: FieldError[], path: string, message: string): void {
  errors.push({ path, message });
}

/** Optional string field: absent and null are fine, anything else must be a string. */
export function optionalString(errors: FieldError[], body: Record<string, unknown>, key: string, maxLength: number): string | undefined {
  const v = body[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "string") {
    pushErr(errors, `$.${key}`, "must be a string");
    return undefined;
  }
  if (v.length > maxLength) pushErr(errors, `$.${key}`, `must be at most ${maxLength} characters`);
  return v;
}
