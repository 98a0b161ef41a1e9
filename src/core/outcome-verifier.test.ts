import { describe, expect, it } from "vitest";
import { InvariantMismatchError, ScenarioSkippedError } from "../utils/errors.js";
import type { HostStatus } from "./host-status.js";
import { assertOutcome, evaluateOutcome } from "./outcome-verifier.js";

function status(overrides: Partial<HostStatus> = {}): HostStatus {
  return {
    servicingState: "provisioned",
    activeVolume: "volume-a",
    lastError: null,
    ...overrides,
  };
}

describe("evaluateOutcome: ab-update-rollback", () => {
  it("passes when the pre-update volume stays active with a health-check error", () => {
    const result = evaluateOutcome(
      status({ activeVolume: "blue", lastError: "Failed health-checks on check X" }),
      { scenario: "ab-update-rollback", expectedVolume: "blue" }
    );

    expect(result.outcome).toBe("passed");
    expect(result.scenarioSource).toBe("explicit");
    expect(result.updateAttempted).toBe(true);
    expect(result.checks.map((check) => check.message)).toEqual([
      'servicingState is "provisioned"',
      'activeVolume is "blue"',
      'lastError contains "Failed health-checks"',
    ]);
  });

  it("fails when the host switched to the updated volume", () => {
    const result = evaluateOutcome(
      status({ activeVolume: "green", lastError: "Failed health-checks on check X" }),
      { scenario: "ab-update-rollback", expectedVolume: "blue" }
    );

    expect(result.outcome).toBe("failed");
    expect(result.checks[1]).toEqual({
      field: "activeVolume",
      expected: '"blue"',
      actual: '"green"',
      passed: false,
      message: 'activeVolume: expected "blue", got "green"',
    });
  });

  it("fails when no error was recorded", () => {
    const result = evaluateOutcome(status({ activeVolume: "blue" }), {
      scenario: "ab-update-rollback",
      expectedVolume: "blue",
    });

    expect(result.checks[2].message).toBe(
      'lastError: expected error containing "Failed health-checks", got no error'
    );
  });

  it("matches the marker inside a structured error record", () => {
    const result = evaluateOutcome(
      status({ lastError: { category: "servicing", message: "Failed health-checks: 2 failed" } }),
      { scenario: "ab-update-rollback", expectedVolume: "volume-a" }
    );

    expect(result.outcome).toBe("passed");
  });
});

describe("evaluateOutcome: clean-install", () => {
  it("passes only when lastError is absent", () => {
    const clean = evaluateOutcome(status({ activeVolume: "blue" }), {
      scenario: "clean-install",
      expectedVolume: "blue",
    });
    expect(clean.outcome).toBe("passed");
    expect(clean.updateAttempted).toBe(false);

    const withError = evaluateOutcome(status({ activeVolume: "blue", lastError: "oops" }), {
      scenario: "clean-install",
      expectedVolume: "blue",
    });
    expect(withError.outcome).toBe("failed");
    expect(withError.checks[2].message).toBe('lastError: expected no error, got "oops"');
  });

  it("reports a missing active volume as null", () => {
    const result = evaluateOutcome(status({ activeVolume: null }), {
      scenario: "clean-install",
      expectedVolume: "volume-a",
    });

    expect(result.checks[1].message).toBe('activeVolume: expected "volume-a", got null');
  });
});

describe("evaluateOutcome: uefi-fallback", () => {
  it("strips the update-attempt prefix from the observed volume", () => {
    const result = evaluateOutcome(
      status({
        activeVolume: "abupdate-green",
        lastError: "A/B update failed as host booted from green",
      }),
      { scenario: "uefi-fallback", expectedVolume: "green" }
    );

    expect(result.outcome).toBe("passed");
    expect(result.updateAttempted).toBe(true);
    expect(result.checks[1]).toMatchObject({
      field: "activeVolume",
      expected: '"green"',
      actual: '"abupdate-green"',
      passed: true,
    });
  });

  it("reads update provenance from a prefixed expected volume", () => {
    const result = evaluateOutcome(
      status({
        lastError: { message: "A/B update failed as host booted from volume-a" },
      }),
      { scenario: "uefi-fallback", expectedVolume: "abupdate-volume-a" }
    );

    expect(result.outcome).toBe("passed");
    expect(result.updateAttempted).toBe(true);
  });

  it("expects no error when no update was attempted", () => {
    const passing = evaluateOutcome(status(), {
      scenario: "uefi-fallback",
      expectedVolume: "volume-a",
    });
    expect(passing.outcome).toBe("passed");
    expect(passing.updateAttempted).toBe(false);

    const failing = evaluateOutcome(status({ lastError: "stale" }), {
      scenario: "uefi-fallback",
      expectedVolume: "volume-a",
    });
    expect(failing.checks[2].message).toBe('lastError: expected no error, got "stale"');
  });

  it("lets explicit provenance override the label convention", () => {
    const result = evaluateOutcome(status(), {
      scenario: "uefi-fallback",
      expectedVolume: "abupdate-volume-a",
      updateAttempted: false,
    });

    expect(result.outcome).toBe("passed");
    expect(result.updateAttempted).toBe(false);
  });

  it("checks only the booted volume in boot-only mode", () => {
    const result = evaluateOutcome(
      status({ servicingState: "ab-update-staged", lastError: "anything" }),
      { scenario: "uefi-fallback", expectedVolume: "volume-a", bootOnly: true }
    );

    expect(result.outcome).toBe("passed");
    expect(result.checks.map((check) => check.field)).toEqual(["activeVolume"]);
  });

  it("skips without reading the status when the host is not in fallback mode", () => {
    const untouchable = new Proxy<HostStatus>(status(), {
      get() {
        throw new Error("status payload was read");
      },
    });

    const result = evaluateOutcome(untouchable, {
      scenario: "uefi-fallback",
      expectedVolume: "volume-a",
      uefiFallback: false,
    });

    expect(result).toEqual({
      scenario: "uefi-fallback",
      scenarioSource: "explicit",
      updateAttempted: false,
      outcome: "skipped",
      checks: [],
      skipReason: "uefi-fallback does not apply: host is not booted in UEFI fallback mode",
    });
  });

  it("does not skip other scenarios outside fallback mode", () => {
    const result = evaluateOutcome(status(), {
      scenario: "clean-install",
      expectedVolume: "volume-a",
      uefiFallback: false,
    });

    expect(result.outcome).toBe("passed");
  });
});

describe("evaluateOutcome: inferred scenario", () => {
  it("applies the fallback rules when the observed volume carries the prefix", () => {
    const result = evaluateOutcome(
      status({
        activeVolume: "abupdate-green",
        lastError: "A/B update failed as host booted from green",
      }),
      { expectedVolume: "green" }
    );

    expect(result.scenario).toBe("uefi-fallback");
    expect(result.scenarioSource).toBe("inferred");
    expect(result.updateAttempted).toBe(true);
    expect(result.outcome).toBe("passed");
    expect(result.checks.map((check) => check.message)).toEqual([
      'servicingState is "provisioned"',
      'activeVolume is "abupdate-green"',
      'lastError contains "A/B update failed as host booted from"',
    ]);
  });

  it("applies the fallback rules when the expected volume carries the prefix", () => {
    const result = evaluateOutcome(
      status({
        activeVolume: "green",
        lastError: "A/B update failed as host booted from green",
      }),
      { expectedVolume: "abupdate-green" }
    );

    expect(result.scenario).toBe("uefi-fallback");
    expect(result.updateAttempted).toBe(true);
    expect(result.outcome).toBe("passed");
  });

  it("requires the fallback marker, not the health-check marker, after an inferred update", () => {
    const result = evaluateOutcome(
      status({ activeVolume: "abupdate-volume-b", lastError: "Failed health-checks: x" }),
      { expectedVolume: "volume-b" }
    );

    expect(result.outcome).toBe("failed");
    expect(result.checks[2].message).toBe(
      'lastError: expected error containing "A/B update failed as host booted from", got "Failed health-checks: x"'
    );
  });

  it("infers a clean install from plain labels", () => {
    const result = evaluateOutcome(status({ activeVolume: "volume-b" }), {
      expectedVolume: "volume-b",
    });

    expect(result.scenario).toBe("clean-install");
    expect(result.outcome).toBe("passed");
  });
});

describe("assertOutcome", () => {
  it("throws for the first mismatching field", () => {
    const error = (() => {
      try {
        assertOutcome(status({ servicingState: "failed", activeVolume: "volume-b" }), {
          scenario: "clean-install",
          expectedVolume: "volume-a",
        });
      } catch (err) {
        return err;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(InvariantMismatchError);
    if (!(error instanceof InvariantMismatchError)) return;
    expect(error.field).toBe("servicingState");
    expect(error.expected).toBe('"provisioned"');
    expect(error.actual).toBe('"failed"');
    expect(error.message).toBe('servicingState: expected "provisioned", got "failed"');
  });

  it("throws ScenarioSkippedError for a skipped scenario", () => {
    expect(() =>
      assertOutcome(status(), {
        scenario: "uefi-fallback",
        expectedVolume: "volume-a",
        uefiFallback: false,
      })
    ).toThrow(ScenarioSkippedError);
  });

  it("returns the result when every field matches", () => {
    const result = assertOutcome(status(), {
      scenario: "clean-install",
      expectedVolume: "volume-a",
    });

    expect(result.outcome).toBe("passed");
    expect(result.checks).toHaveLength(3);
  });
});
