import type { HostStatus } from "../../core/host-status.js";
import { classifyServicingState, renderLastError } from "../../core/host-status.js";
import { retrieveHostStatus } from "../../core/status-retriever.js";
import { loadConfig } from "../../utils/config.js";
import { ui } from "../../utils/ui.js";
import { resolveHostProfile, type HostProfileInput, type ResolvedHostProfile } from "../options/host-profile.js";
import { createHostConnection } from "./host-connection.js";

export interface StatusCommandInput extends HostProfileInput {
  json?: boolean;
}

export async function queryHostStatus(profile: ResolvedHostProfile): Promise<HostStatus> {
  const connection = createHostConnection(profile);
  const spinner = ui.spinner(`Querying status on ${profile.host}: ${profile.statusCommand}`).start();
  try {
    const status = await retrieveHostStatus(connection, profile.statusCommand);
    spinner.stop();
    return status;
  } catch (err) {
    spinner.fail(`Status unavailable from ${profile.host}`);
    throw err;
  }
}

export async function runStatus(input: StatusCommandInput): Promise<HostStatus> {
  const config = await loadConfig();
  const profile = resolveHostProfile(input, config);
  const status = await queryHostStatus(profile);

  if (input.json) {
    console.log(JSON.stringify(status, null, 2));
    return status;
  }

  ui.heading(`Host status: ${profile.host}`);
  console.log();
  ui.info(`Servicing state: ${status.servicingState}`);
  ui.info(`Active volume: ${status.activeVolume ?? "(none)"}`);
  ui.info(`Last error: ${status.lastError === null ? "(none)" : renderLastError(status.lastError)}`);

  const phase = classifyServicingState(status.servicingState);
  if (phase === "in-progress") {
    ui.warn("Host is still servicing; outcomes cannot be verified until it reaches a terminal state.");
  } else if (phase === "unrecognized") {
    ui.warn(`Unrecognized servicing state: ${status.servicingState}`);
  }
  return status;
}
