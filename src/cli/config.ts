import { ok, err, type Result } from "neverthrow";
import { z } from "zod";
import * as fs from "node:fs/promises";
import { existsSync } from "node:fs";
import { DEFAULT_LOCK_TTL_MS } from "../core/engine.js";
import { DEFAULT_PARALLELISM } from "../core/executor.js";
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from "../core/retry.js";

export const DEFAULT_CONFIG_PATH = "stratum.json";
export const DEFAULT_STATE_PATH = "stratum.state.json";

const RetryConfigSchema = z
  .object({
    maxAttempts: z.number().int().positive(),
    baseDelayMs: z.number().int().nonnegative(),
    maxDelayMs: z.number().int().nonnegative(),
    jitter: z.number().min(0).max(1),
  })
  .partial();

const StratumConfigSchema = z.object({
  declarations: z.string().min(1),
  state: z.string().min(1).default(DEFAULT_STATE_PATH),
  schemas: z.string().min(1).optional(),
  providers: z.string().min(1).optional(),
  parallelism: z.number().int().positive().default(DEFAULT_PARALLELISM),
  retry: RetryConfigSchema.optional(),
  lockTtlMs: z.number().int().positive().default(DEFAULT_LOCK_TTL_MS),
  timeoutMs: z.number().int().positive().optional(),
});

export type StratumConfig = z.infer<typeof StratumConfigSchema>;

export type ConfigError = {
  readonly field: string;
  readonly message: string;
};

export const readConfig = async (path: string): Promise<Result<StratumConfig, ConfigError>> => {
  if (!existsSync(path)) {
    return err({ field: "path", message: `Config file not found: ${path}` });
  }

  const text = await fs.readFile(path, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    return err({ field: "root", message: `Invalid JSON: ${e instanceof Error ? e.message : String(e)}` });
  }

  return parseConfig(parsed);
};

export const parseConfig = (parsed: unknown): Result<StratumConfig, ConfigError> => {
  const result = StratumConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    if (issue !== undefined) {
      return err({ field: issue.path.join(".") || "root", message: issue.message });
    }
    return err({ field: "root", message: "Invalid config" });
  }
  return ok(result.data);
};

export const retryPolicy = (config: StratumConfig): RetryPolicy => ({
  ...DEFAULT_RETRY_POLICY,
  ...config.retry,
});
