import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod/v4";
import { ConfigurationError } from "@/lib/pipeline/core/errors";
import { pipelineSettingsSchema, type PipelineSettings, type RunRequest } from "@/lib/pipeline/core/schemas";
import { validateRunRequest } from "@/lib/pipeline/runner/request";

const configSchema = pipelineSettingsSchema.extend({
  runs_root: z.string().default("runs"),
  queue: z
    .object({
      concurrency: z.number().int().min(1).default(2),
    })
    .prefault({}),
});

export type AppConfig = z.infer<typeof configSchema>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep-merge two plain objects. Plain objects recurse;
 * arrays and primitives: override wins. `undefined` overrides are ignored.
 */
export function deepMerge(
  base: Record<string, unknown>,
  overrides: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, overVal] of Object.entries(overrides)) {
    if (overVal === undefined) continue;
    const baseVal = result[key];
    result[key] =
      isPlainObject(baseVal) && isPlainObject(overVal) ? deepMerge(baseVal, overVal) : overVal;
  }
  return result;
}

/**
 * Load and validate config.yaml (repository root unless a path is given).
 * A missing or empty file yields the defaults.
 * @throws ConfigurationError
 */
export function loadConfig(configPath?: string): AppConfig {
  const resolved = configPath ?? path.resolve(process.cwd(), "config.yaml");
  const raw = fs.existsSync(resolved) ? yaml.load(fs.readFileSync(resolved, "utf-8")) : undefined;
  const parsed = configSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.map(String).join(".")}: ${issue.message}`)
    );
  }
  return parsed.data;
}

export function getRunsRoot(cfg: AppConfig): string {
  return path.resolve(process.env.RUNS_ROOT ?? cfg.runs_root);
}

/** The stage settings snapshotted into every run. */
export function getPipelineSettings(cfg: AppConfig): PipelineSettings {
  return {
    crawl: cfg.crawl,
    cleaning: cfg.cleaning,
    slicing: cfg.slicing,
    generation: cfg.generation,
  };
}

export interface RunRequestOverrides {
  source_url: string;
  max_pages?: number;
  delay_seconds?: number;
  max_block_chars?: number;
  min_block_chars?: number;
}

/**
 * Build a run submission from config defaults plus per-run overrides.
 * @throws ConfigurationError
 */
export function buildRunRequest(cfg: AppConfig, overrides: RunRequestOverrides): Readonly<RunRequest> {
  const defaults: Record<string, unknown> = {
    max_pages: cfg.crawl.max_pages,
    delay_seconds: cfg.crawl.delay_seconds,
    max_block_chars: cfg.slicing.max_block_chars,
    min_block_chars: cfg.slicing.min_block_chars,
  };
  return validateRunRequest(deepMerge(defaults, { ...overrides }));
}
