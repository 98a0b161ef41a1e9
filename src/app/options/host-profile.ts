import type { AbVerifyConfig } from "../../utils/config.js";
import { UserError } from "../../utils/errors.js";
import {
  DEFAULT_COMMAND_TIMEOUT_MS,
  DEFAULT_STATUS_COMMAND,
  LOCAL_HOST,
} from "../../core/defaults.js";

export interface HostProfileInput {
  host?: string;
  user?: string;
  port?: string;
  identityFile?: string;
  statusCommand?: string;
  timeout?: string;
}

export interface ResolvedHostProfile {
  host: string;
  transport: "ssh" | "local";
  user?: string;
  port?: number;
  identityFile?: string;
  statusCommand: string;
  commandTimeoutMs: number;
}

export function resolveHostProfile(
  input: HostProfileInput,
  config: AbVerifyConfig
): ResolvedHostProfile {
  const host = (input.host ?? config.host)?.trim();
  if (!host) {
    throw new UserError(
      "No host configured.",
      `Pass --host <host> or set host in abverify.config.yaml. Use --host ${LOCAL_HOST} to query this machine.`
    );
  }

  const port =
    input.port !== undefined
      ? parsePositiveInt(input.port, "port", "Use a TCP port, for example: --port 22")
      : config.port;
  if (port !== undefined && port > 65535) {
    throw new UserError(`Invalid port value: ${port}`, "Use a TCP port between 1 and 65535.");
  }

  const commandTimeoutMs =
    input.timeout !== undefined
      ? parsePositiveInt(
          input.timeout,
          "timeout",
          "Use a positive integer in milliseconds, for example: --timeout 60000"
        )
      : (config.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS);

  const statusCommand = (input.statusCommand ?? config.statusCommand ?? DEFAULT_STATUS_COMMAND).trim();
  if (!statusCommand) {
    throw new UserError(
      "Invalid status command: empty string",
      `Set a command with --status-command, for example: --status-command "${DEFAULT_STATUS_COMMAND}"`
    );
  }

  const profile: ResolvedHostProfile = {
    host,
    transport: host === LOCAL_HOST ? "local" : "ssh",
    statusCommand,
    commandTimeoutMs,
  };
  const user = input.user ?? config.user;
  if (user) profile.user = user;
  if (port !== undefined) profile.port = port;
  const identityFile = input.identityFile ?? config.identityFile;
  if (identityFile) profile.identityFile = identityFile;
  return profile;
}

export function parsePositiveInt(input: string, label: string, hint: string): number {
  const value = Number(input);
  if (!Number.isFinite(value) || value <= 0 || !Number.isInteger(value)) {
    throw new UserError(`Invalid ${label} value: ${input}`, hint);
  }
  return value;
}
