import { UPDATE_ATTEMPT_PREFIX } from "./defaults.js";

export const SCENARIO_KINDS = ["clean-install", "ab-update-rollback", "uefi-fallback"] as const;
export type ScenarioKind = (typeof SCENARIO_KINDS)[number];

export interface VolumeClassification {
  /** Volume label with any update-attempt prefix removed. */
  volume: string;
  updateAttempted: boolean;
}

export function isScenarioKind(value: string): value is ScenarioKind {
  return SCENARIO_KINDS.some((kind) => kind === value);
}

/**
 * The only place that understands the `abupdate-` label convention. A label
 * carrying the prefix names a volume that an update was attempted from and
 * then reverted to.
 */
export function classifyVolumeLabel(label: string): VolumeClassification {
  if (label.startsWith(UPDATE_ATTEMPT_PREFIX) && label.length > UPDATE_ATTEMPT_PREFIX.length) {
    return { volume: label.slice(UPDATE_ATTEMPT_PREFIX.length), updateAttempted: true };
  }
  return { volume: label, updateAttempted: false };
}

/**
 * Scenario implied by the volume labels when none is supplied. The prefix is
 * only written by a fallback boot after an attempted update, so a prefix on
 * either the expected or the observed label selects `uefi-fallback`.
 */
export function inferScenarioKind(labels: ReadonlyArray<string | null>): ScenarioKind {
  const attempted = labels.some(
    (label) => label !== null && classifyVolumeLabel(label).updateAttempted
  );
  return attempted ? "uefi-fallback" : "clean-install";
}
