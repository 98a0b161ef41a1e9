import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const VERSION_FALLBACK = "0.1.0";

const packageManifestSchema = z.object({
  name: z.string().optional(),
  version: z.string().optional(),
});

export function getCliVersion(): string {
  const runtimeDir = path.dirname(fileURLToPath(import.meta.url));
  const packageJsonPath = findNearestPackageJson(runtimeDir);
  if (!packageJsonPath) return VERSION_FALLBACK;

  return readPackageVersion(packageJsonPath) ?? VERSION_FALLBACK;
}

export function findNearestPackageJson(startDir: string): string | undefined {
  let current = startDir;
  while (true) {
    const candidate = path.join(current, "package.json");
    if (fs.existsSync(candidate)) return candidate;

    const parent = path.dirname(current);
    if (parent === current) return undefined;
    current = parent;
  }
}

export function readPackageVersion(packageJsonPath: string): string | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(packageJsonPath, "utf-8"));
  } catch {
    return undefined;
  }
  const manifest = packageManifestSchema.safeParse(raw);
  if (!manifest.success) return undefined;
  const version = manifest.data.version?.trim();
  return version ? version : undefined;
}
