import { UserError } from "../utils/errors.js";

export function asOptionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

export function asOptionalBoolean(value: unknown): boolean | undefined {
  return typeof value === "boolean" ? value : undefined;
}

/** Commander yields `true` for a bare optional-value flag and the string otherwise. */
export function asOptionalStringOrBoolean(value: unknown): string | boolean | undefined {
  return typeof value === "string" || typeof value === "boolean" ? value : undefined;
}

export function parseOptionalArgument(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

export function parseRequiredArgument(value: unknown, name: string): string {
  if (typeof value === "string" && value.length > 0) return value;
  throw new UserError(`Missing required argument: ${name}`);
}

export function toOptionRecord(value: unknown): Record<string, unknown> {
  if (!value || typeof value !== "object") return {};
  return Object.fromEntries(Object.entries(value));
}
