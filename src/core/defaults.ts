// Single source of truth for harness defaults and host-side markers.
export const DEFAULT_STATUS_COMMAND = "sudo trident get";
export const DEFAULT_COMMAND_TIMEOUT_MS = 60_000;
export const DEFAULT_REPORT_DIR = ".abverify-reports";
export const LOCAL_HOST = "local";

/** Volume-label prefix marking an update that was attempted and then reverted. */
export const UPDATE_ATTEMPT_PREFIX = "abupdate-";

export const ROLLBACK_ERROR_MARKER = "Failed health-checks";
export const FALLBACK_ERROR_MARKER = "A/B update failed as host booted from";

export const PROVISIONED_STATE = "provisioned";
