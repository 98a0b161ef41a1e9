import { describe, expect, it } from "vitest";
import { classifyVolumeLabel, inferScenarioKind, isScenarioKind } from "./scenario.js";

describe("classifyVolumeLabel", () => {
  it("strips the update-attempt prefix", () => {
    expect(classifyVolumeLabel("abupdate-green")).toEqual({
      volume: "green",
      updateAttempted: true,
    });
  });

  it("leaves plain labels alone", () => {
    expect(classifyVolumeLabel("volume-a")).toEqual({
      volume: "volume-a",
      updateAttempted: false,
    });
  });

  it("does not treat the bare prefix as an attempt", () => {
    expect(classifyVolumeLabel("abupdate-")).toEqual({
      volume: "abupdate-",
      updateAttempted: false,
    });
  });
});

describe("inferScenarioKind", () => {
  it("infers a fallback after an update from a prefixed observed label", () => {
    expect(inferScenarioKind(["abupdate-volume-b", "volume-b"])).toBe("uefi-fallback");
  });

  it("infers a fallback after an update from a prefixed expected label", () => {
    expect(inferScenarioKind(["volume-b", "abupdate-volume-b"])).toBe("uefi-fallback");
  });

  it("infers a clean install otherwise", () => {
    expect(inferScenarioKind(["volume-b", "volume-b"])).toBe("clean-install");
    expect(inferScenarioKind([null, "volume-b"])).toBe("clean-install");
    expect(inferScenarioKind(["abupdate-", "volume-b"])).toBe("clean-install");
  });
});

describe("isScenarioKind", () => {
  it("accepts only known scenario names", () => {
    expect(isScenarioKind("uefi-fallback")).toBe(true);
    expect(isScenarioKind("rollback")).toBe(false);
  });
});
