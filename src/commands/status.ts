import type { Command } from "commander";
import { runStatus, type StatusCommandInput } from "../app/services/status-service.js";
import { handleError } from "../utils/errors.js";
import { addHostOptions, parseHostCliOptions } from "./host-options.js";
import { asOptionalBoolean, toOptionRecord } from "./parse-helpers.js";

export function registerStatus(program: Command) {
  const command = program
    .command("status")
    .description("Query and print the normalized host status");
  addHostOptions(command)
    .option("--json", "Print the status as JSON")
    .action(async (opts: unknown) => {
      try {
        await runStatus(parseStatusCliOptions(opts));
      } catch (err) {
        handleError(err);
      }
    });
}

export function parseStatusCliOptions(value: unknown): StatusCommandInput {
  const record = toOptionRecord(value);
  return {
    ...parseHostCliOptions(record),
    json: asOptionalBoolean(record.json),
  };
}
