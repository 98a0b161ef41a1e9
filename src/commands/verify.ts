import type { Command } from "commander";
import { SCENARIO_KINDS, type VerifyProfileInput } from "../app/options/verify-profile.js";
import { runVerify } from "../app/services/verify-service.js";
import { handleError } from "../utils/errors.js";
import { addHostOptions, parseHostCliOptions } from "./host-options.js";
import {
  asOptionalBoolean,
  asOptionalString,
  asOptionalStringOrBoolean,
  parseOptionalArgument,
  toOptionRecord,
} from "./parse-helpers.js";

export function registerVerify(program: Command) {
  const command = program
    .command("verify")
    .description("Check the host status against the invariants of a scenario")
    .argument(
      "[scenario]",
      `Scenario: ${SCENARIO_KINDS.join(", ")} (inferred from the volume labels when omitted)`
    )
    .option("--expected-volume <label>", "Volume that must be active after the run")
    .option("--update-attempted", "An A/B update was attempted before the fallback")
    .option("--no-update-attempted", "No A/B update was attempted before the fallback")
    .option("--uefi-fallback", "Host is booted in UEFI fallback mode")
    .option("--no-uefi-fallback", "Host is not in UEFI fallback mode; uefi-fallback is skipped")
    .option("--boot-only", "uefi-fallback: check only the booted volume")
    .option("--report [path]", "Write a JSON verification report");
  addHostOptions(command).action(async (scenarioArg: unknown, opts: unknown) => {
    try {
      await runVerify(parseOptionalArgument(scenarioArg), parseVerifyCliOptions(opts));
    } catch (err) {
      handleError(err);
    }
  });
}

export function parseVerifyCliOptions(value: unknown): VerifyProfileInput {
  const record = toOptionRecord(value);
  return {
    ...parseHostCliOptions(record),
    expectedVolume: asOptionalString(record.expectedVolume),
    updateAttempted: asOptionalBoolean(record.updateAttempted),
    uefiFallback: asOptionalBoolean(record.uefiFallback),
    bootOnly: asOptionalBoolean(record.bootOnly),
    report: asOptionalStringOrBoolean(record.report),
  };
}
