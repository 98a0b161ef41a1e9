import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FixtureError } from "../../utils/errors.js";

vi.mock("../../utils/ui.js", () => ({
  ui: {
    success: vi.fn(),
    step: vi.fn(),
    dim: vi.fn(),
  },
}));

import { ui } from "../../utils/ui.js";
import { runInject } from "./inject-service.js";

describe("runInject", () => {
  let tempDir: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "abverify-inject-service-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("reports the injected checks", async () => {
    const configPath = path.join(tempDir, "host-config.yaml");
    await fs.writeFile(configPath, "os:\n  hostname: testhost\n", "utf-8");

    await runInject(configPath);

    expect(ui.success).toHaveBeenCalledWith(
      `Injected 2 failing health checks into ${configPath}`
    );
    expect(vi.mocked(ui.step).mock.calls).toEqual([
      ["invoke-rollback-from-script"],
      ["check-non-existent-service-to-invoke-rollback"],
    ]);
    expect(ui.dim).toHaveBeenCalledWith("health.checks now holds 2 entries.");
  });

  it("propagates fixture errors", async () => {
    const configPath = path.join(tempDir, "broken.yaml");
    await fs.writeFile(configPath, "health: [\n", "utf-8");

    await expect(runInject(configPath)).rejects.toBeInstanceOf(FixtureError);
    expect(ui.success).not.toHaveBeenCalled();
  });
});
