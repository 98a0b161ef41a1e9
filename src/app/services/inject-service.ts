import { injectFailureChecks } from "../../core/failure-injector.js";
import { ui } from "../../utils/ui.js";

export async function runInject(hostConfigPath: string): Promise<void> {
  const result = await injectFailureChecks(hostConfigPath);

  ui.success(`Injected ${result.added.length} failing health checks into ${result.filePath}`);
  for (const check of result.added) {
    ui.step(check.name);
  }
  ui.dim(`health.checks now holds ${result.totalChecks} entr${result.totalChecks === 1 ? "y" : "ies"}.`);
}
