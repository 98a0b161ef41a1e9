import path from "node:path";
import type { AbVerifyConfig } from "../../utils/config.js";
import { UserError } from "../../utils/errors.js";
import { DEFAULT_REPORT_DIR } from "../../core/defaults.js";
import type { OutcomeExpectation } from "../../core/outcome-verifier.js";
import { isScenarioKind, SCENARIO_KINDS } from "../../core/scenario.js";
import { createReportFileName } from "../../core/verification-report.js";
import { resolveHostProfile, type HostProfileInput, type ResolvedHostProfile } from "./host-profile.js";

export { SCENARIO_KINDS };

export interface VerifyProfileInput extends HostProfileInput {
  expectedVolume?: string;
  updateAttempted?: boolean;
  uefiFallback?: boolean;
  bootOnly?: boolean;
  /** `true` when --report is given without a path. */
  report?: string | boolean;
}

export interface ResolvedVerifyProfile {
  host: ResolvedHostProfile;
  expectation: OutcomeExpectation;
  reportPath?: string;
}

export function resolveVerifyProfile(
  scenarioArg: string | undefined,
  input: VerifyProfileInput,
  config: AbVerifyConfig,
  now = new Date()
): ResolvedVerifyProfile {
  if (scenarioArg !== undefined && !isScenarioKind(scenarioArg)) {
    throw new UserError(
      `Unknown scenario: ${scenarioArg}`,
      `Use one of: ${SCENARIO_KINDS.join(", ")}, or omit it to infer the scenario from the volume labels.`
    );
  }

  const expectedVolume = (input.expectedVolume ?? config.expectedVolume)?.trim();
  if (!expectedVolume) {
    throw new UserError(
      "No expected active volume configured.",
      "Pass --expected-volume <label> or set expectedVolume in abverify.config.yaml."
    );
  }

  if (input.bootOnly && scenarioArg !== "uefi-fallback") {
    throw new UserError(
      "--boot-only only applies to the uefi-fallback scenario.",
      "Run: abverify verify uefi-fallback --boot-only --expected-volume <label>"
    );
  }

  const expectation: OutcomeExpectation = { expectedVolume };
  if (scenarioArg !== undefined) expectation.scenario = scenarioArg;
  if (input.updateAttempted !== undefined) expectation.updateAttempted = input.updateAttempted;
  const uefiFallback = input.uefiFallback ?? config.uefiFallback;
  if (uefiFallback !== undefined) expectation.uefiFallback = uefiFallback;
  if (input.bootOnly) expectation.bootOnly = true;

  const profile: ResolvedVerifyProfile = {
    host: resolveHostProfile(input, config),
    expectation,
  };

  if (typeof input.report === "string") {
    const reportPath = input.report.trim();
    if (!reportPath) {
      throw new UserError(
        "Invalid report path: empty path",
        "Set a non-empty path with --report <path>, or pass --report alone for the default location."
      );
    }
    profile.reportPath = reportPath;
  } else if (input.report === true) {
    profile.reportPath = path.join(config.reportDir ?? DEFAULT_REPORT_DIR, createReportFileName(now));
  }

  return profile;
}
