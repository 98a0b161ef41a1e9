import yaml from "js-yaml";
import { z } from "zod";

export const TERMINAL_SERVICING_STATES = ["not-provisioned", "provisioned", "failed"] as const;

export const IN_PROGRESS_SERVICING_STATES = [
  "provisioning",
  "clean-install-staged",
  "clean-install-finalized",
  "ab-update-staged",
  "ab-update-finalized",
  "ab-update-health-check-failed",
  "manual-rollback-staged",
  "manual-rollback-finalized",
] as const;

export type TerminalServicingState = (typeof TERMINAL_SERVICING_STATES)[number];
export type ServicingPhase = "terminal" | "in-progress" | "unrecognized";

const volumeLabelSchema = z.string().min(1).nullable();

const lastErrorSchema = z.union([z.string(), z.record(z.string(), z.unknown())]).nullish();

const rawHostStatusSchema = z
  .object({
    servicingState: z.string().min(1),
    abActiveVolume: volumeLabelSchema.optional(),
    boot: z
      .object({
        abActiveVolume: volumeLabelSchema.optional(),
        ab_active_volume: volumeLabelSchema.optional(),
      })
      .passthrough()
      .nullish(),
    lastError: lastErrorSchema,
  })
  .passthrough();

export type LastErrorRecord = string | Record<string, unknown>;

export interface HostStatus {
  servicingState: string;
  /** Booted A/B volume, or null when the host reports none. */
  activeVolume: string | null;
  lastError: LastErrorRecord | null;
}

export type HostStatusParseResult =
  | { ok: true; status: HostStatus }
  | { ok: false; reason: string };

/**
 * Parses the output of the host status command (YAML or JSON). Either every
 * required field resolves or the whole payload is rejected.
 */
export function parseHostStatus(output: string): HostStatusParseResult {
  if (output.trim().length === 0) {
    return { ok: false, reason: "status output is empty" };
  }

  let raw: unknown;
  try {
    raw = yaml.load(output);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, reason: `status output is not valid YAML/JSON: ${message}` };
  }

  const parsed = rawHostStatusSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      reason: parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "status"}: ${issue.message}`)
        .join("; "),
    };
  }

  const candidates: Array<[string, string | null | undefined]> = [
    ["abActiveVolume", parsed.data.abActiveVolume],
    ["boot.abActiveVolume", parsed.data.boot?.abActiveVolume],
    ["boot.ab_active_volume", parsed.data.boot?.ab_active_volume],
  ];
  const reported = candidates.filter(
    (entry): entry is [string, string | null] => entry[1] !== undefined
  );

  if (reported.length === 0) {
    return {
      ok: false,
      reason:
        "status does not report an active volume (abActiveVolume, boot.abActiveVolume or boot.ab_active_volume)",
    };
  }

  const [firstPath, activeVolume] = reported[0];
  const conflicting = reported.find(([, value]) => value !== activeVolume);
  if (conflicting) {
    return {
      ok: false,
      reason: `conflicting active volume: ${firstPath}=${String(activeVolume)} but ${conflicting[0]}=${String(conflicting[1])}`,
    };
  }

  return {
    ok: true,
    status: {
      servicingState: parsed.data.servicingState,
      activeVolume,
      lastError: parsed.data.lastError ?? null,
    },
  };
}

export function isTerminalServicingState(state: string): state is TerminalServicingState {
  return TERMINAL_SERVICING_STATES.some((terminal) => terminal === state);
}

export function classifyServicingState(state: string): ServicingPhase {
  if (isTerminalServicingState(state)) return "terminal";
  if (IN_PROGRESS_SERVICING_STATES.some((inProgress) => inProgress === state)) {
    return "in-progress";
  }
  return "unrecognized";
}

/** Text form of the last error, used for marker matching and reports. */
export function renderLastError(lastError: LastErrorRecord): string {
  return typeof lastError === "string" ? lastError : JSON.stringify(lastError);
}
