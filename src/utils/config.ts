import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { UserError, ValidationError } from "./errors.js";

const configSchema = z
  .object({
    host: z.string().min(1).optional(),
    user: z.string().min(1).optional(),
    port: z.number().int().positive().max(65535).optional(),
    identityFile: z.string().min(1).optional(),
    statusCommand: z.string().min(1).optional(),
    commandTimeoutMs: z.number().int().positive().optional(),
    expectedVolume: z.string().min(1).optional(),
    uefiFallback: z.boolean().optional(),
    reportDir: z.string().min(1).optional(),
  })
  .strict();

export type AbVerifyConfig = z.infer<typeof configSchema>;

export const CONFIG_FILENAME = "abverify.config.yaml";

export async function loadConfig(cwd = process.cwd()): Promise<AbVerifyConfig> {
  const configPath = path.resolve(cwd, CONFIG_FILENAME);
  let content: string;

  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (err) {
    if (isMissingFileError(err)) {
      return {};
    }
    throw new UserError(
      `Failed to read config file: ${CONFIG_FILENAME}`,
      "Check file permissions and try again."
    );
  }

  let parsedYaml: unknown;

  try {
    parsedYaml = yaml.load(content);
  } catch {
    throw new UserError(
      `Invalid YAML syntax in ${CONFIG_FILENAME}`,
      "Fix YAML syntax in the config file and try again."
    );
  }

  if (parsedYaml == null) return {};

  const parsedConfig = configSchema.safeParse(parsedYaml);
  if (!parsedConfig.success) {
    throw new ValidationError(
      `Invalid config in ${CONFIG_FILENAME}`,
      parsedConfig.error.issues.map(
        (issue) => `${issue.path.join(".") || "config"}: ${issue.message}`
      )
    );
  }

  return parsedConfig.data;
}

function isMissingFileError(err: unknown): boolean {
  return (
    typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT"
  );
}
