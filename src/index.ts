import { Command, Help } from "commander";
import { registerInject } from "./commands/inject.js";
import { registerStatus } from "./commands/status.js";
import { registerVerify } from "./commands/verify.js";
import { handleError } from "./utils/errors.js";
import { getCliVersion } from "./utils/runtime-info.js";
import { buildUnifiedHelp } from "./utils/unified-help.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("abverify")
    .description("Inject A/B update failures, read host servicing status and verify rollback outcomes")
    .version(getCliVersion())
    .configureHelp({
      formatHelp(cmd, helper) {
        // Unified help for the root command only; subcommands use the default.
        if (cmd.parent) {
          return Help.prototype.formatHelp.call(this, cmd, helper);
        }
        return buildUnifiedHelp(cmd, helper);
      },
    });

  registerInject(program);
  registerStatus(program);
  registerVerify(program);

  return program;
}

export function run() {
  const program = createProgram();
  program.parseAsync().catch(handleError);
}
