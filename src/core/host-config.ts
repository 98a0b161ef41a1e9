import yaml from "js-yaml";
import { z } from "zod";

const mappingSchema = z.record(z.string(), z.unknown());

// Existing entries are carried through untouched, whatever their shape.
const healthCheckEntrySchema = z.unknown();

const healthSectionSchema = z
  .object({
    checks: z.array(healthCheckEntrySchema).nullish(),
  })
  .passthrough();

export const hostConfigDocumentSchema = z
  .object({
    health: healthSectionSchema.nullish(),
  })
  .passthrough();

export type HealthCheckEntry = z.infer<typeof healthCheckEntrySchema>;
export type HealthSection = z.infer<typeof healthSectionSchema>;
export type HostConfigDocument = z.infer<typeof hostConfigDocumentSchema>;

export type HostConfigWithChecks = HostConfigDocument & {
  health: HealthSection & { checks: HealthCheckEntry[] };
};

export type HealthCheckTrigger = "ab-update" | "clean-install";

export type ScriptHealthCheck = {
  name: string;
  content: string;
  run_on: HealthCheckTrigger[];
};

export type SystemdHealthCheck = {
  name: string;
  timeoutSeconds: number;
  systemdServices: string[];
};

export type HealthCheck = ScriptHealthCheck | SystemdHealthCheck;

export type HostConfigParseResult =
  | { ok: true; document: HostConfigDocument }
  | { ok: false; issues: string[] };

export function parseHostConfigDocument(content: string): HostConfigParseResult {
  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, issues: [`invalid YAML: ${message}`] };
  }

  const mapping = mappingSchema.safeParse(raw);
  if (!mapping.success) {
    return { ok: false, issues: ["document: expected a mapping at the top level"] };
  }

  const parsed = hostConfigDocumentSchema.safeParse(mapping.data);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "document"}: ${issue.message}`
      ),
    };
  }
  // zod moves known keys first; spreading over the raw mapping keeps the file's key order.
  return { ok: true, document: { ...mapping.data, ...parsed.data } };
}

export function serializeHostConfigDocument(document: HostConfigDocument): string {
  return yaml.dump(document, { lineWidth: 120, noRefs: true, quotingType: '"' });
}

/** Returns a copy whose `health.checks` list exists, creating missing sections. */
export function ensureHealthChecks(document: HostConfigDocument): HostConfigWithChecks {
  const health: HealthSection = document.health ?? {};
  const checks: HealthCheckEntry[] = health.checks ?? [];
  return { ...document, health: { ...health, checks } };
}

export function appendHealthChecks(
  document: HostConfigDocument,
  checks: HealthCheck[]
): HostConfigWithChecks {
  const ensured = ensureHealthChecks(document);
  return {
    ...ensured,
    health: {
      ...ensured.health,
      checks: [...ensured.health.checks, ...checks],
    },
  };
}
