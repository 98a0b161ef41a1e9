import fs from "node:fs/promises";
import path from "node:path";
import { FixtureError } from "../utils/errors.js";
import {
  appendHealthChecks,
  parseHostConfigDocument,
  serializeHostConfigDocument,
  type HealthCheck,
} from "./host-config.js";

export const FAILURE_PROFILES = ["failing-script", "missing-services"] as const;
export type FailureProfile = (typeof FAILURE_PROFILES)[number];

export interface InjectionResult {
  filePath: string;
  added: HealthCheck[];
  totalChecks: number;
}

/**
 * Health check guaranteed to fail on the host for the given profile.
 *
 * Host health checks only run during A/B updates, so the systemd variant
 * needs no explicit trigger list to stay scoped to update attempts.
 */
export function buildFailureCheck(profile: FailureProfile): HealthCheck {
  switch (profile) {
    case "failing-script":
      return {
        name: "invoke-rollback-from-script",
        content: "echo 'failure for ab update'\nexit 1",
        run_on: ["ab-update"],
      };
    case "missing-services":
      return {
        name: "check-non-existent-service-to-invoke-rollback",
        timeoutSeconds: 30,
        systemdServices: ["non-existent-service1", "non-existent-service2"],
      };
  }
}

export function buildFailureChecks(
  profiles: readonly FailureProfile[] = FAILURE_PROFILES
): HealthCheck[] {
  return profiles.map(buildFailureCheck);
}

/**
 * Appends rollback-inducing health checks to a host configuration file and
 * rewrites it in place. Every call appends; nothing is deduplicated.
 */
export async function injectFailureChecks(
  filePath: string,
  profiles: readonly FailureProfile[] = FAILURE_PROFILES
): Promise<InjectionResult> {
  const absolutePath = path.resolve(filePath);

  let content: string;
  try {
    content = await fs.readFile(absolutePath, "utf-8");
  } catch (err) {
    throw new FixtureError(
      `Failed to read host configuration: ${absolutePath} (${errorMessage(err)})`,
      absolutePath
    );
  }

  const parsed = parseHostConfigDocument(content);
  if (!parsed.ok) {
    throw new FixtureError(
      `Invalid host configuration in ${absolutePath}: ${parsed.issues.join("; ")}`,
      absolutePath
    );
  }

  const added = buildFailureChecks(profiles);
  const updated = appendHealthChecks(parsed.document, added);

  try {
    await fs.writeFile(absolutePath, serializeHostConfigDocument(updated), "utf-8");
  } catch (err) {
    throw new FixtureError(
      `Failed to write host configuration: ${absolutePath} (${errorMessage(err)})`,
      absolutePath
    );
  }

  return {
    filePath: absolutePath,
    added,
    totalChecks: updated.health.checks.length,
  };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
