import { StatusUnavailableError } from "../utils/errors.js";
import type { HostCommandResult, HostConnection } from "./contracts/host-connection.js";
import { parseHostStatus, type HostStatus } from "./host-status.js";

const STDERR_EXCERPT_LIMIT = 400;

/**
 * Runs the status command once and parses its output. Retrying while the
 * host reboots is left to the caller.
 */
export async function retrieveHostStatus(
  connection: HostConnection,
  statusCommand: string
): Promise<HostStatus> {
  const { host } = connection;

  let result: HostCommandResult;
  try {
    result = await connection.run(statusCommand);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new StatusUnavailableError(
      `Failed to run status command on ${host}: ${message}`,
      host,
      statusCommand
    );
  }

  if (!result.ok) {
    const reason = result.error ?? `exit code ${result.exitCode ?? "unknown"}`;
    const stderr = result.stderr.trim().slice(0, STDERR_EXCERPT_LIMIT);
    throw new StatusUnavailableError(
      `Status command failed on ${host}: ${reason}${stderr ? ` (${stderr})` : ""}`,
      host,
      statusCommand
    );
  }

  const parsed = parseHostStatus(result.stdout);
  if (!parsed.ok) {
    throw new StatusUnavailableError(
      `Unparsable status from ${host}: ${parsed.reason}`,
      host,
      statusCommand
    );
  }
  return parsed.status;
}
