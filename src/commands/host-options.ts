import type { Command } from "commander";
import type { HostProfileInput } from "../app/options/host-profile.js";
import { asOptionalString } from "./parse-helpers.js";

export function addHostOptions(command: Command): Command {
  return command
    .option("--host <host>", "Host to query over SSH, or \"local\" for this machine")
    .option("--user <user>", "SSH user")
    .option("--port <port>", "SSH port")
    .option("--identity-file <path>", "SSH private key")
    .option("--status-command <command>", "Command that prints the host status document")
    .option("--timeout <ms>", "Status command timeout in milliseconds");
}

export function parseHostCliOptions(record: Record<string, unknown>): HostProfileInput {
  return {
    host: asOptionalString(record.host),
    user: asOptionalString(record.user),
    port: asOptionalString(record.port),
    identityFile: asOptionalString(record.identityFile),
    statusCommand: asOptionalString(record.statusCommand),
    timeout: asOptionalString(record.timeout),
  };
}
