/**
 * Engine configuration
 *
 * Optional YAML file merged with OCI_ENGINE_* environment overrides and
 * validated with Zod. Environment wins over the file.
 */

import { availableParallelism } from "os";
import { z } from "zod";
import { MAX_DEFAULT_CONCURRENCY, USER_AGENT } from "#/constants";
import { formatZodIssues, safeParseYaml, type ParseResult } from "#/friendly-errors";
import { LOG_LEVEL_NAMES } from "#/logging";

export function defaultConcurrency(): number {
  return Math.max(1, Math.min(availableParallelism(), MAX_DEFAULT_CONCURRENCY));
}

export const RegistryConfigSchema = z.object({
  plainHttp: z.boolean().default(false),
  userAgent: z.string().min(1).default(USER_AGENT),
});

export const EngineConfigSchema = z.object({
  concurrency: z.number().int().positive().default(defaultConcurrency),
  logLevel: z.enum(LOG_LEVEL_NAMES).default("info"),
  registry: RegistryConfigSchema.default({}),
});
export type EngineConfig = z.infer<typeof EngineConfigSchema>;

// Env values arrive as strings; coerce before the main schema sees them
const EnvOverridesSchema = z.object({
  OCI_ENGINE_CONCURRENCY: z.coerce.number().int().positive().optional(),
  OCI_ENGINE_LOG_LEVEL: z.enum(LOG_LEVEL_NAMES).optional(),
  OCI_ENGINE_PLAIN_HTTP: z
    .enum(["true", "false", "1", "0"])
    .transform((value) => value === "true" || value === "1")
    .optional(),
});

const FileConfigSchema = z
  .object({
    concurrency: z.unknown().optional(),
    logLevel: z.unknown().optional(),
    registry: z.record(z.string(), z.unknown()).optional(),
  })
  .passthrough()
  .nullable();

/**
 * Resolve the engine configuration.
 *
 * @param env - Usually `process.env`
 * @param fileContent - Contents of an engine config YAML file, if one exists
 */
export function loadEngineConfig(
  env: Record<string, string | undefined>,
  fileContent?: string
): ParseResult<EngineConfig> {
  let fileValues: Record<string, unknown> = {};
  if (fileContent !== undefined) {
    const parsed = safeParseYaml(fileContent, FileConfigSchema, "engine config");
    if (!parsed.success) return parsed;
    fileValues = parsed.data ?? {};
  }

  const envResult = EnvOverridesSchema.safeParse(env);
  if (!envResult.success) {
    return {
      success: false,
      error: {
        type: "validation",
        message: "Invalid environment configuration",
        details: formatZodIssues(envResult.error),
      },
    };
  }
  const overrides = envResult.data;

  const fileRegistry = fileValues["registry"];
  const merged = {
    ...fileValues,
    ...(overrides.OCI_ENGINE_CONCURRENCY !== undefined && { concurrency: overrides.OCI_ENGINE_CONCURRENCY }),
    ...(overrides.OCI_ENGINE_LOG_LEVEL !== undefined && { logLevel: overrides.OCI_ENGINE_LOG_LEVEL }),
    registry: {
      ...(isRecord(fileRegistry) ? fileRegistry : {}),
      ...(overrides.OCI_ENGINE_PLAIN_HTTP !== undefined && { plainHttp: overrides.OCI_ENGINE_PLAIN_HTTP }),
    },
  };

  const result = EngineConfigSchema.safeParse(merged);
  if (!result.success) {
    return {
      success: false,
      error: {
        type: "validation",
        message: "Invalid content in engine config",
        details: formatZodIssues(result.error),
      },
    };
  }
  return { success: true, data: result.data };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
