import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { DEFAULT_BUDGET_USD } from "./pipeline/jury.js";
import { STAGE_ORDER, StageRoleSchema, type StageRole } from "./pipeline/schemas.js";
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from "./pipeline/structured_client.js";
import { repoRoot } from "./pipeline/utils.js";

export const DEFAULT_STAGE_MODELS: Record<StageRole, string> = {
  taxonomy: "gpt-4.1",
  segment: "gpt-4.1-mini",
  behavioral: "gpt-4.1-mini",
  competitive: "gpt-4.1",
  jury: "gpt-4.1"
};

export const DEFAULT_MAX_CONCURRENT_CALLS = 4;
export const MAX_CONCURRENT_CALLS_LIMIT = 64;

export type FanOutLimits = {
  maxCategories: number | null;
  maxSegmentsPerCategory: number | null;
};

export type ResearchConfig = {
  models: Record<StageRole, string>;
  retry: Record<StageRole, RetryPolicy>;
  limits: FanOutLimits;
  concurrency: { maxConcurrentCalls: number };
  budgetUsd: number;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const RetryPolicyOverrideSchema = z
  .object({
    maxAttempts: z.number().int().min(1).max(10),
    maxSchemaAttempts: z.number().int().min(1).max(5),
    initialBackoffMs: z.number().int().min(0).max(60_000),
    maxBackoffMs: z.number().int().min(0).max(300_000),
    backoffMultiplier: z.number().min(1).max(10),
    jitterRatio: z.number().min(0).max(1),
    attemptTimeoutMs: z.number().int().min(1_000).max(600_000)
  })
  .partial()
  .strict();

// 0 means "no cap", matching the limits block of the config file.
const FanOutCapSchema = z.number().int().min(0).max(50);

export const ResearchConfigFileSchema = z
  .object({
    models: z.record(StageRoleSchema, z.string().trim().min(1)).optional(),
    retry: z
      .object({
        default: RetryPolicyOverrideSchema.optional(),
        stages: z.record(StageRoleSchema, RetryPolicyOverrideSchema).optional()
      })
      .strict()
      .optional(),
    limits: z
      .object({
        maxCategories: FanOutCapSchema.optional(),
        maxSegmentsPerCategory: FanOutCapSchema.optional()
      })
      .strict()
      .optional(),
    concurrency: z
      .object({
        maxConcurrentCalls: z.number().int().min(1).max(MAX_CONCURRENT_CALLS_LIMIT).optional()
      })
      .strict()
      .optional(),
    budgetUsd: z.number().int().positive().optional()
  })
  .strict();

export type ResearchConfigFile = z.infer<typeof ResearchConfigFileSchema>;

type EnvLike = Record<string, string | undefined>;

export function researchConfigPathAbs(env: EnvLike = process.env): string {
  const explicit = env.ATLAS_CONFIG_PATH?.trim();
  if (explicit) return path.resolve(explicit);
  return path.join(repoRoot(), "research.config.json");
}

function capFrom(value: number | undefined): number | null {
  if (value === undefined || value <= 0) return null;
  return value;
}

function intFromEnv(raw: string | undefined, min: number, max: number): number | undefined {
  if (raw === undefined || raw.trim().length === 0) return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n)) return undefined;
  return Math.min(max, Math.max(min, Math.round(n)));
}

export function resolveResearchConfig(file: ResearchConfigFile, env: EnvLike = process.env): ResearchConfig {
  const modelOverride = env.ATLAS_MODEL?.trim();
  const models = { ...DEFAULT_STAGE_MODELS };
  const retry: Record<StageRole, RetryPolicy> = {
    taxonomy: { ...DEFAULT_RETRY_POLICY },
    segment: { ...DEFAULT_RETRY_POLICY },
    behavioral: { ...DEFAULT_RETRY_POLICY },
    competitive: { ...DEFAULT_RETRY_POLICY },
    jury: { ...DEFAULT_RETRY_POLICY }
  };
  for (const stage of STAGE_ORDER) {
    models[stage] = modelOverride || file.models?.[stage] || DEFAULT_STAGE_MODELS[stage];
    retry[stage] = { ...retry[stage], ...file.retry?.default, ...file.retry?.stages?.[stage] };
  }

  const envCategories = intFromEnv(env.ATLAS_MAX_CATEGORIES, 0, 50);
  const envSegments = intFromEnv(env.ATLAS_MAX_SEGMENTS_PER_CATEGORY, 0, 50);
  const envConcurrency = intFromEnv(env.ATLAS_MAX_CONCURRENT_CALLS, 1, MAX_CONCURRENT_CALLS_LIMIT);

  return {
    models,
    retry,
    limits: {
      maxCategories: capFrom(envCategories ?? file.limits?.maxCategories),
      maxSegmentsPerCategory: capFrom(envSegments ?? file.limits?.maxSegmentsPerCategory)
    },
    concurrency: {
      maxConcurrentCalls: envConcurrency ?? file.concurrency?.maxConcurrentCalls ?? DEFAULT_MAX_CONCURRENT_CALLS
    },
    budgetUsd: file.budgetUsd ?? DEFAULT_BUDGET_USD
  };
}

export function defaultResearchConfig(env: EnvLike = {}): ResearchConfig {
  return resolveResearchConfig({}, env);
}

export async function loadResearchConfig(env: EnvLike = process.env): Promise<ResearchConfig> {
  const filePath = researchConfigPathAbs(env);
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (err && typeof err === "object" && "code" in err && err.code === "ENOENT") return resolveResearchConfig({}, env);
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Config file ${filePath} is not valid JSON: ${msg}`);
  }

  const parsed = ResearchConfigFileSchema.safeParse(json);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid config file ${filePath}: ${problems}`);
  }
  return resolveResearchConfig(parsed.data, env);
}

/** Per-run options take precedence over the configured caps; 0 lifts a cap. */
export function effectiveLimits(
  config: ResearchConfig,
  overrides?: { maxCategories?: number; maxSegmentsPerCategory?: number }
): FanOutLimits {
  return {
    maxCategories: overrides?.maxCategories !== undefined ? capFrom(overrides.maxCategories) : config.limits.maxCategories,
    maxSegmentsPerCategory:
      overrides?.maxSegmentsPerCategory !== undefined
        ? capFrom(overrides.maxSegmentsPerCategory)
        : config.limits.maxSegmentsPerCategory
  };
}
