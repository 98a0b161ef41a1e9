import type { Command } from "commander";
import { runInject } from "../app/services/inject-service.js";
import { handleError } from "../utils/errors.js";
import { parseRequiredArgument, toOptionRecord } from "./parse-helpers.js";

export function registerInject(program: Command) {
  program
    .command("inject")
    .description("Add failing health checks to a host configuration so the next A/B update rolls back")
    .requiredOption("-t, --hostconfig <path>", "Path to the host configuration YAML file")
    .action(async (opts: unknown) => {
      try {
        await runInject(parseRequiredArgument(toOptionRecord(opts).hostconfig, "--hostconfig"));
      } catch (err) {
        handleError(err);
      }
    });
}
