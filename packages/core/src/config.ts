// Configuration schema + validation

import { z } from "zod";
import { type Result, ok, err, ConfigError } from "./types/errors";
import { LOG_LEVELS } from "./types/logger";
import type { LogLevel } from "./types/logger";
import type { PlanExclusivityMode } from "./types/plan";
import { DEFAULT_MODELS, type GatewayModels } from "./llm-gateway";
import { DEFAULT_PREFIX } from "./tool-registry";
import { DEFAULT_PLAN_MAX_TOKENS } from "./plan-generator";

export const DEFAULT_BASE_URL = "https://openrouter.ai/api/v1";

export interface ToolplanConfig {
  readonly port: number;
  readonly logLevel: LogLevel;
  readonly prefix: string;
  readonly llm: {
    readonly apiKey: string;
    readonly baseUrl: string;
    readonly models: GatewayModels;
    readonly maxAttempts: number;
  };
  readonly planner: {
    readonly maxTokens: number;
    readonly exclusivity: PlanExclusivityMode;
    readonly scoreGap?: number;
  };
  readonly pools: {
    /** Unset means the pool's own default. */
    readonly threadWorkers?: number;
    readonly processWorkers?: number;
  };
}

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value === "" ? undefined : value));

function withDefault(fallback: string) {
  return optionalString.transform((value) => value ?? fallback);
}

function positiveInt(key: string) {
  return optionalString.pipe(
    z.coerce.number<string>().int().positive({ error: `${key} must be a positive integer` }).optional(),
  );
}

const HttpUrlSchema = z.url({ protocol: /^https?$/, error: "OPENAI_BASE_URL must be an http(s) URL" });

const EnvSchema = z.object({
  OPENAI_API_KEY: optionalString.pipe(z.string({ error: "Missing required env var: OPENAI_API_KEY" })),
  OPENAI_BASE_URL: withDefault(DEFAULT_BASE_URL).pipe(HttpUrlSchema),
  TOOLPLAN_DESCRIBE_MODEL: withDefault(DEFAULT_MODELS.describe),
  TOOLPLAN_PLAN_MODEL: withDefault(DEFAULT_MODELS.plan),
  TOOLPLAN_EMBEDDING_MODEL: withDefault(DEFAULT_MODELS.embedding),
  TOOLPLAN_MAX_ATTEMPTS: positiveInt("TOOLPLAN_MAX_ATTEMPTS"),
  TOOLPLAN_PLAN_MAX_TOKENS: positiveInt("TOOLPLAN_PLAN_MAX_TOKENS"),
  TOOLPLAN_PREFIX: withDefault(DEFAULT_PREFIX).pipe(
    z.string().regex(/^\//, { error: "TOOLPLAN_PREFIX must start with /" }),
  ),
  TOOLPLAN_THREAD_WORKERS: positiveInt("TOOLPLAN_THREAD_WORKERS"),
  TOOLPLAN_PROCESS_WORKERS: positiveInt("TOOLPLAN_PROCESS_WORKERS"),
  TOOLPLAN_PLAN_EXCLUSIVITY: withDefault("normalize").pipe(z.enum(["normalize", "reject", "off"])),
  TOOLPLAN_PLAN_SCORE_GAP: optionalString.pipe(z.coerce.number<string>().min(0).max(1).optional()),
  PORT: withDefault("8000").pipe(z.coerce.number<string>().int().min(1).max(65535)),
  LOG_LEVEL: withDefault("info").pipe(z.enum(LOG_LEVELS)),
});

/**
 * Load and validate configuration from environment variables.
 * Returns a Result; never throws.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Result<ToolplanConfig, ConfigError> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue?.path.map(String).join(".") ?? "env";
    return err(new ConfigError(`Invalid configuration (${key}): ${issue?.message ?? "unknown error"}`, parsed.error));
  }

  const e = parsed.data;
  return ok({
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    prefix: e.TOOLPLAN_PREFIX.replace(/\/+$/, ""),
    llm: {
      apiKey: e.OPENAI_API_KEY,
      baseUrl: e.OPENAI_BASE_URL,
      models: {
        describe: e.TOOLPLAN_DESCRIBE_MODEL,
        plan: e.TOOLPLAN_PLAN_MODEL,
        embedding: e.TOOLPLAN_EMBEDDING_MODEL,
      },
      maxAttempts: e.TOOLPLAN_MAX_ATTEMPTS ?? 3,
    },
    planner: {
      maxTokens: e.TOOLPLAN_PLAN_MAX_TOKENS ?? DEFAULT_PLAN_MAX_TOKENS,
      exclusivity: e.TOOLPLAN_PLAN_EXCLUSIVITY,
      scoreGap: e.TOOLPLAN_PLAN_SCORE_GAP,
    },
    pools: {
      threadWorkers: e.TOOLPLAN_THREAD_WORKERS,
      processWorkers: e.TOOLPLAN_PROCESS_WORKERS,
    },
  });
}
