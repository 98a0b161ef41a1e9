import type { HostStatus } from "../../core/host-status.js";
import {
  evaluateOutcome,
  firstMismatch,
  skippedResult,
  skipReasonFor,
  type VerificationResult,
} from "../../core/outcome-verifier.js";
import {
  buildVerificationReport,
  writeVerificationReport,
} from "../../core/verification-report.js";
import { loadConfig } from "../../utils/config.js";
import { ui, type RowTone } from "../../utils/ui.js";
import { resolveVerifyProfile, type VerifyProfileInput } from "../options/verify-profile.js";
import { queryHostStatus } from "./status-service.js";

export async function runVerify(
  scenarioArg: string | undefined,
  input: VerifyProfileInput
): Promise<VerificationResult> {
  const config = await loadConfig();
  const profile = resolveVerifyProfile(scenarioArg, input, config);

  let status: HostStatus | null = null;
  let result: VerificationResult;

  const skipReason = skipReasonFor(profile.expectation);
  if (skipReason !== undefined) {
    result = skippedResult(skipReason);
    ui.skip(skipReason);
  } else {
    status = await queryHostStatus(profile.host);
    result = evaluateOutcome(status, profile.expectation);
    printChecks(profile.host.host, result);
  }

  if (profile.reportPath) {
    const report = buildVerificationReport({
      host: profile.host.host,
      statusCommand: profile.host.statusCommand,
      result,
      status,
    });
    const written = await writeVerificationReport(report, profile.reportPath);
    ui.step(`Report: ${written}`);
  }

  const mismatch = firstMismatch(result);
  if (mismatch) throw mismatch;

  if (result.outcome === "passed") {
    ui.success(`${result.scenario}: all ${result.checks.length} checks passed`);
  }
  return result;
}

function printChecks(host: string, result: VerificationResult): void {
  const source = result.scenarioSource === "inferred" ? " (inferred)" : "";
  ui.heading(`Verifying ${result.scenario}${source} on ${host}`);
  console.log();

  const rows = [["Field", "Expected", "Actual", "Result"]];
  const tones: RowTone[] = [];
  for (const check of result.checks) {
    rows.push([check.field, check.expected, check.actual, check.passed ? "ok" : "MISMATCH"]);
    tones.push(check.passed ? "pass" : "fail");
  }
  ui.table(rows, tones);
  console.log();
}
