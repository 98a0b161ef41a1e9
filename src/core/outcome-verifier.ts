import { InvariantMismatchError, ScenarioSkippedError } from "../utils/errors.js";
import {
  FALLBACK_ERROR_MARKER,
  PROVISIONED_STATE,
  ROLLBACK_ERROR_MARKER,
} from "./defaults.js";
import { renderLastError, type HostStatus, type LastErrorRecord } from "./host-status.js";
import { classifyVolumeLabel, inferScenarioKind, type ScenarioKind } from "./scenario.js";

export interface OutcomeExpectation {
  /** When omitted the scenario is inferred from the expected and observed volume labels. */
  scenario?: ScenarioKind;
  /** Volume that must remain booted; may carry the update-attempt prefix. */
  expectedVolume: string;
  /** Explicit update provenance; wins over the label prefix convention. */
  updateAttempted?: boolean;
  /** False when the host is not booted in UEFI fallback mode. */
  uefiFallback?: boolean;
  /** Check only the booted volume after a UEFI fallback. */
  bootOnly?: boolean;
}

export type CheckedField = "servicingState" | "activeVolume" | "lastError";

export interface FieldCheck {
  field: CheckedField;
  expected: string;
  actual: string;
  passed: boolean;
  message: string;
}

export type VerificationOutcome = "passed" | "failed" | "skipped";

export interface VerificationResult {
  scenario: ScenarioKind;
  scenarioSource: "explicit" | "inferred";
  updateAttempted: boolean;
  outcome: VerificationOutcome;
  checks: FieldCheck[];
  skipReason?: string;
}

export function skipReasonFor(expectation: OutcomeExpectation): string | undefined {
  if (expectation.scenario === "uefi-fallback" && expectation.uefiFallback === false) {
    return "uefi-fallback does not apply: host is not booted in UEFI fallback mode";
  }
  return undefined;
}

export function skippedResult(reason: string): VerificationResult {
  return {
    scenario: "uefi-fallback",
    scenarioSource: "explicit",
    updateAttempted: false,
    outcome: "skipped",
    checks: [],
    skipReason: reason,
  };
}

/**
 * Compares an observed host status against the invariants of a scenario.
 * A skipped scenario reads nothing from the status.
 */
export function evaluateOutcome(
  status: HostStatus,
  expectation: OutcomeExpectation
): VerificationResult {
  const skipReason = skipReasonFor(expectation);
  if (skipReason !== undefined) {
    return skippedResult(skipReason);
  }

  const expected = classifyVolumeLabel(expectation.expectedVolume);
  const scenarioSource = expectation.scenario ? "explicit" : "inferred";
  const scenario =
    expectation.scenario ?? inferScenarioKind([status.activeVolume, expectation.expectedVolume]);
  const observed = status.activeVolume === null ? null : classifyVolumeLabel(status.activeVolume);
  // An inferred scenario came from the labels themselves, so compare without the prefix.
  const comparedVolume =
    scenarioSource === "inferred" ? (observed?.volume ?? null) : status.activeVolume;

  let updateAttempted: boolean;
  let checks: FieldCheck[];

  switch (scenario) {
    case "clean-install": {
      updateAttempted = false;
      checks = [
        expectEqual("servicingState", PROVISIONED_STATE, status.servicingState),
        expectVolume(expected.volume, status.activeVolume, comparedVolume),
        expectNoError(status.lastError),
      ];
      break;
    }
    case "ab-update-rollback": {
      updateAttempted = true;
      checks = [
        expectEqual("servicingState", PROVISIONED_STATE, status.servicingState),
        expectVolume(expected.volume, status.activeVolume, comparedVolume),
        expectErrorContaining(ROLLBACK_ERROR_MARKER, status.lastError),
      ];
      break;
    }
    case "uefi-fallback": {
      updateAttempted =
        expectation.updateAttempted ??
        (expected.updateAttempted || observed?.updateAttempted === true);
      const volumeCheck = expectVolume(
        expected.volume,
        status.activeVolume,
        observed?.volume ?? null
      );
      if (expectation.bootOnly) {
        checks = [volumeCheck];
        break;
      }
      checks = [
        expectEqual("servicingState", PROVISIONED_STATE, status.servicingState),
        volumeCheck,
        updateAttempted
          ? expectErrorContaining(FALLBACK_ERROR_MARKER, status.lastError)
          : expectNoError(status.lastError),
      ];
      break;
    }
  }

  return {
    scenario,
    scenarioSource,
    updateAttempted,
    outcome: checks.every((check) => check.passed) ? "passed" : "failed",
    checks,
  };
}

/** Like {@link evaluateOutcome} but throws on the first mismatch or on a skip. */
export function assertOutcome(
  status: HostStatus,
  expectation: OutcomeExpectation
): VerificationResult {
  const result = evaluateOutcome(status, expectation);
  if (result.outcome === "skipped") {
    throw new ScenarioSkippedError(result.skipReason ?? "scenario does not apply");
  }
  const mismatch = firstMismatch(result);
  if (mismatch) throw mismatch;
  return result;
}

export function firstMismatch(result: VerificationResult): InvariantMismatchError | undefined {
  const failed = result.checks.find((check) => !check.passed);
  if (!failed) return undefined;
  return new InvariantMismatchError(failed.field, failed.expected, failed.actual, failed.message);
}

function formatValue(value: string | null): string {
  return value === null ? "null" : JSON.stringify(value);
}

function expectEqual(field: CheckedField, expected: string, actual: string): FieldCheck {
  const passed = expected === actual;
  return {
    field,
    expected: formatValue(expected),
    actual: formatValue(actual),
    passed,
    message: passed
      ? `${field} is ${formatValue(actual)}`
      : `${field}: expected ${formatValue(expected)}, got ${formatValue(actual)}`,
  };
}

// `compared` is the observed label as matched (prefix stripped or not); the
// raw label is what gets reported.
function expectVolume(expected: string, reported: string | null, compared: string | null): FieldCheck {
  const passed = compared === expected;
  return {
    field: "activeVolume",
    expected: formatValue(expected),
    actual: formatValue(reported),
    passed,
    message: passed
      ? `activeVolume is ${formatValue(reported)}`
      : `activeVolume: expected ${formatValue(expected)}, got ${formatValue(reported)}`,
  };
}

function expectErrorContaining(marker: string, lastError: LastErrorRecord | null): FieldCheck {
  const expected = `error containing ${JSON.stringify(marker)}`;
  if (lastError === null) {
    return {
      field: "lastError",
      expected,
      actual: "no error",
      passed: false,
      message: `lastError: expected ${expected}, got no error`,
    };
  }
  const text = renderLastError(lastError);
  const passed = text.includes(marker);
  return {
    field: "lastError",
    expected,
    actual: formatValue(text),
    passed,
    message: passed
      ? `lastError contains ${JSON.stringify(marker)}`
      : `lastError: expected ${expected}, got ${formatValue(text)}`,
  };
}

function expectNoError(lastError: LastErrorRecord | null): FieldCheck {
  if (lastError === null) {
    return {
      field: "lastError",
      expected: "no error",
      actual: "no error",
      passed: true,
      message: "lastError is absent",
    };
  }
  const actual = formatValue(renderLastError(lastError));
  return {
    field: "lastError",
    expected: "no error",
    actual,
    passed: false,
    message: `lastError: expected no error, got ${actual}`,
  };
}
