import type { Command, Help, Option } from "commander";

interface SharedOptionGroup {
  commands: string[];
  options: Option[];
}

function optionKey(opt: Option): string {
  return opt.long ?? opt.flags;
}

function commandOptions(helper: Help, sub: Command): Option[] {
  return helper.visibleOptions(sub).filter((opt) => opt.long !== "--help");
}

/** Options declared by more than one subcommand, listed once in declaration order. */
function collectSharedOptions(optionsByCommand: Map<Command, Option[]>): SharedOptionGroup {
  const users = new Map<string, string[]>();
  for (const [sub, options] of optionsByCommand) {
    for (const opt of options) {
      users.set(optionKey(opt), [...(users.get(optionKey(opt)) ?? []), sub.name()]);
    }
  }

  const commands = new Set<string>();
  const options: Option[] = [];
  const seen = new Set<string>();
  for (const subOptions of optionsByCommand.values()) {
    for (const opt of subOptions) {
      const names = users.get(optionKey(opt)) ?? [];
      if (names.length < 2 || seen.has(optionKey(opt))) continue;
      seen.add(optionKey(opt));
      options.push(opt);
      names.forEach((name) => commands.add(name));
    }
  }
  return { commands: [...commands], options };
}

/**
 * Root help: each subcommand with the options only it takes, then the
 * options several subcommands share, then global options.
 */
export function buildUnifiedHelp(cmd: Command, helper: Help): string {
  const subcommands = helper.visibleCommands(cmd).filter((sub) => sub.name() !== "help");
  const optionsByCommand = new Map(
    subcommands.map((sub): [Command, Option[]] => [sub, commandOptions(helper, sub)])
  );
  const shared = collectSharedOptions(optionsByCommand);
  const sharedKeys = new Set(shared.options.map(optionKey));
  const globalOptions = helper.visibleOptions(cmd);

  const terms = [
    ...subcommands.map((sub) => helper.subcommandTerm(sub)),
    ...[...optionsByCommand.values()].flat().map((opt) => helper.optionTerm(opt)),
    ...globalOptions.map((opt) => helper.optionTerm(opt)),
  ];
  const width = Math.max(0, ...terms.map((term) => helper.displayWidth(term)));
  const item = (term: string, description: string, indent = "") =>
    helper
      .formatItem(term, width, description, helper)
      .split("\n")
      .map((line) => indent + line)
      .join("\n");

  const output: string[] = [
    helper.styleTitle("Usage:") + " " + helper.styleUsage(helper.commandUsage(cmd)),
    "",
  ];
  const desc = helper.commandDescription(cmd);
  if (desc) output.push(helper.styleCommandDescription(desc), "");

  if (subcommands.length > 0) {
    output.push(helper.styleTitle("Commands:"));
    for (const sub of subcommands) {
      output.push(item(helper.subcommandTerm(sub), helper.subcommandDescription(sub)));
      for (const opt of optionsByCommand.get(sub) ?? []) {
        if (sharedKeys.has(optionKey(opt))) continue;
        output.push(item(helper.optionTerm(opt), helper.optionDescription(opt), "    "));
      }
      output.push("");
    }
  }

  if (shared.options.length > 0) {
    output.push(helper.styleTitle(`Shared options (${shared.commands.join(", ")}):`));
    for (const opt of shared.options) {
      output.push(item(helper.optionTerm(opt), helper.optionDescription(opt)));
    }
    output.push("");
  }

  if (globalOptions.length > 0) {
    output.push(helper.styleTitle("Global Options:"));
    for (const opt of globalOptions) {
      output.push(item(helper.optionTerm(opt), helper.optionDescription(opt)));
    }
    output.push("");
  }

  output.push(
    helper.styleTitle("Examples:"),
    "  abverify inject -t host-config.yaml",
    "  abverify status --host 192.0.2.10 --user testuser --json",
    "  abverify verify ab-update-rollback --host 192.0.2.10 --expected-volume volume-a",
    "  abverify verify uefi-fallback --boot-only --expected-volume volume-b --report",
    "",
    helper.styleTitle("Config:"),
    "  Defaults for every option are read from abverify.config.yaml in the working directory.",
    ""
  );

  return output.join("\n");
}
