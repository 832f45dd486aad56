import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ConfigurationError } from "@shoal/engine-core";
import type { EngineConfig } from "@shoal/engine";

const DEFAULT_SCENARIO_DIR = fileURLToPath(new URL("../scenarios/", import.meta.url));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  SCENARIO_DIR: z.string().min(1).default(DEFAULT_SCENARIO_DIR),
  /** Path to a JSON file of engine overrides. */
  ENGINE_CONFIG: z.string().min(1).optional(),
});

export type AppConfig = z.infer<typeof envSchema>;

const unitOverride = z.number().min(0).max(1);

/** Engine overrides accepted from ENGINE_CONFIG. Range checks beyond this happen in createEngine. */
const engineConfigSchema = z
  .object({
    bargaining: z
      .object({
        falloff: z
          .object({
            shape: z.enum(["linear", "quadratic", "logarithmic"]),
            floor_at_minimum: unitOverride,
            categorical_partial: unitOverride,
          })
          .partial(),
        red_line_veto: z.boolean(),
        acceptance: z
          .object({
            curve: z.enum(["logistic", "linear"]),
            steepness: z.number().positive(),
            risk_premium: unitOverride,
          })
          .partial(),
        status_thresholds: z.object({ strong: unitOverride, marginal: unitOverride }).partial(),
      })
      .partial(),
    simulation: z
      .object({
        mechanisms: z.object({ cues_success: unitOverride, hotline_success: unitOverride }).partial(),
        weather: z
          .object({ persistence: unitOverride, perturbation: unitOverride, accident_rate: unitOverride })
          .partial(),
        tension: z
          .object({
            gain: unitOverride,
            decay: z.number(),
            max: z.number().positive(),
            relief: unitOverride,
            de_escalated_factor: unitOverride,
            calm_threshold: z.number(),
            alert_threshold: z.number(),
          })
          .partial(),
        behavior: z
          .object({
            encounter_rate: unitOverride,
            approach_range_nm: z.number().positive(),
            unsafe_distance_nm: z.number().positive(),
            media_restraint: unitOverride,
            memory_window: z.number().int().positive(),
            grievance_weight: unitOverride,
          })
          .partial(),
        trend: z.object({ ratio: z.number() }).partial(),
        assessment: z
          .object({
            good_max_rate: z.number(),
            concerning_min_rate: z.number(),
            good_max_severity: unitOverride,
            concerning_min_severity: unitOverride,
          })
          .partial(),
        max_rng_draws: z.number().int().positive(),
      })
      .partial(),
    yield_every: z.number().int().positive(),
  })
  .partial()
  .strict();

/** Parse process environment. Throws ConfigurationError listing every bad variable. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigurationError(`Invalid environment: ${detail}`, { detail });
  }
  return parsed.data;
}

/** Read engine overrides from ENGINE_CONFIG, or none when it is unset. */
export async function loadEngineConfig(config: AppConfig): Promise<EngineConfig> {
  if (!config.ENGINE_CONFIG) return {};

  let raw: string;
  try {
    raw = await readFile(config.ENGINE_CONFIG, "utf8");
  } catch (err) {
    throw new ConfigurationError(`Cannot read ENGINE_CONFIG ${config.ENGINE_CONFIG}`, {
      detail: config.ENGINE_CONFIG,
      cause: err instanceof Error ? err : undefined,
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`ENGINE_CONFIG ${config.ENGINE_CONFIG} is not valid JSON`, {
      detail: config.ENGINE_CONFIG,
      cause: err instanceof Error ? err : undefined,
    });
  }

  const parsed = engineConfigSchema.safeParse(json);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigurationError(`Invalid ENGINE_CONFIG: ${detail}`, { detail });
  }
  return parsed.data;
}
