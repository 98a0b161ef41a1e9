import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { HostStatus } from "./host-status.js";
import type { VerificationResult } from "./outcome-verifier.js";
import { SCENARIO_KINDS } from "./scenario.js";

const VERIFICATION_REPORT_SCHEMA_VERSION = "1.0";

const fieldCheckSchema = z.object({
  field: z.enum(["servicingState", "activeVolume", "lastError"]),
  expected: z.string(),
  actual: z.string(),
  passed: z.boolean(),
  message: z.string().min(1),
});

const statusSnapshotSchema = z.object({
  servicingState: z.string().min(1),
  activeVolume: z.string().nullable(),
  lastError: z.union([z.string(), z.record(z.string(), z.unknown())]).nullable(),
});

const verificationReportSchema = z.object({
  schemaVersion: z.literal(VERIFICATION_REPORT_SCHEMA_VERSION),
  generatedAt: z.string().datetime(),
  host: z.string().min(1),
  statusCommand: z.string().min(1),
  scenario: z.enum(SCENARIO_KINDS),
  scenarioSource: z.enum(["explicit", "inferred"]),
  updateAttempted: z.boolean(),
  outcome: z.enum(["passed", "failed", "skipped"]),
  skipReason: z.string().optional(),
  // Null for a skipped scenario: the host is never queried.
  status: statusSnapshotSchema.nullable(),
  checks: z.array(fieldCheckSchema),
});

export type VerificationReport = z.infer<typeof verificationReportSchema>;

export function createReportFileName(now = new Date()): string {
  const iso = now.toISOString().replace(/[:.]/g, "-");
  return `verify-${iso}.json`;
}

export function buildVerificationReport(input: {
  host: string;
  statusCommand: string;
  result: VerificationResult;
  status: HostStatus | null;
  generatedAt?: string;
}): VerificationReport {
  const { result } = input;
  return verificationReportSchema.parse({
    schemaVersion: VERIFICATION_REPORT_SCHEMA_VERSION,
    generatedAt: input.generatedAt ?? new Date().toISOString(),
    host: input.host,
    statusCommand: input.statusCommand,
    scenario: result.scenario,
    scenarioSource: result.scenarioSource,
    updateAttempted: result.updateAttempted,
    outcome: result.outcome,
    skipReason: result.skipReason,
    status: input.status,
    checks: result.checks,
  });
}

export async function writeVerificationReport(
  report: VerificationReport,
  reportPath: string
): Promise<string> {
  const validated = verificationReportSchema.parse(report);
  const absolutePath = path.resolve(reportPath);
  await fs.mkdir(path.dirname(absolutePath), { recursive: true });
  await fs.writeFile(absolutePath, JSON.stringify(validated, null, 2) + "\n", "utf-8");
  return absolutePath;
}
