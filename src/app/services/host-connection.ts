import type { HostConnection } from "../../core/contracts/host-connection.js";
import { createLocalConnection } from "../../infra/process/local-connection.js";
import { createSshConnection } from "../../infra/ssh/ssh-connection.js";
import type { ResolvedHostProfile } from "../options/host-profile.js";

export function createHostConnection(profile: ResolvedHostProfile): HostConnection {
  if (profile.transport === "local") {
    return createLocalConnection(profile.commandTimeoutMs, profile.host);
  }
  return createSshConnection({
    host: profile.host,
    user: profile.user,
    port: profile.port,
    identityFile: profile.identityFile,
    timeoutMs: profile.commandTimeoutMs,
  });
}
