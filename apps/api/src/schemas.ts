import { z } from "zod";
import { MAX_SEED, SENSITIVITY_METRICS, SENSITIVITY_PARAMETERS } from "@shoal/engine-sim";

// ─── Scenario model ────────────────────────────────────────

export const seedSchema = z.number().int().min(0).max(MAX_SEED);

/** Vessels per roster entry. */
export const MAX_ROSTER_COUNT = 500;

export const dimensionValueSchema = z.union([z.number(), z.string(), z.boolean()]);

export const dimensionSchema = z.object({
  id: z.string().min(1),
  kind: z.enum(["continuous", "categorical", "boolean"]),
  range: z.tuple([z.number(), z.number()]).optional(),
  values: z.array(z.string()).optional(),
  unit: z.string().optional(),
  term: z.string().optional(),
});

export const issueSpaceSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  dimensions: z.array(dimensionSchema).min(1),
});

export const partyProfileSchema = z.object({
  party_id: z.string().min(1),
  interests: z.record(z.number()),
  ideal_value: z.record(dimensionValueSchema),
  minimum_acceptable: z.record(z.union([z.number(), z.array(z.string()), z.boolean()])),
  red_lines: z.array(z.string()).default([]),
  batna_utility: z.number(),
  risk_tolerance: z.number(),
});

const agentRoleSchema = z.enum(["coast_guard", "navy", "militia", "fishing"]);
const activityKindSchema = z.enum(["patrol", "resupply", "fishing"]);

export const environmentSchema = z.object({
  initial_weather: z.enum(["calm", "moderate", "rough"]).optional(),
  media_visibility: z.number().min(0).max(3).optional(),
  roster: z
    .array(
      z.object({
        party_id: z.string().min(1),
        role: agentRoleSchema,
        count: z.number().int().min(0).max(MAX_ROSTER_COUNT),
        zone: z.enum(["shoal", "approaches", "fishing_grounds"]).optional(),
      }),
    )
    .optional(),
  aggression_scale: z.number().positive().optional(),
  initial_tension: z.number().min(0).optional(),
  activity_rates: z.record(agentRoleSchema, z.record(activityKindSchema, z.number().min(0).max(1))).optional(),
});

export const scenarioSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().default(""),
  issue_space: issueSpaceSchema,
  party_profiles: z.array(partyProfileSchema).min(1),
  environment: environmentSchema.default({}),
  /** Example proposals shipped with the scenario. */
  sample_proposals: z
    .array(z.object({ id: z.string().min(1), values: z.record(dimensionValueSchema) }))
    .default([]),
});

export type ScenarioDefinition = z.infer<typeof scenarioSchema>;

// ─── Requests ──────────────────────────────────────────────

export const proposalInputSchema = z.object({
  id: z.string().min(1),
  values: z.record(dimensionValueSchema),
  round_number: z.number().int().min(0).optional(),
  proposer: z.string().min(1).optional(),
});

export type ProposalInput = z.infer<typeof proposalInputSchema>;

export const evaluateRequestSchema = z.object({
  scenario_id: z.string().min(1),
  proposal: proposalInputSchema,
  /** Replaces the scenario's default profiles. */
  party_profiles: z.array(partyProfileSchema).min(1).optional(),
});

export const rankRequestSchema = z.object({
  scenario_id: z.string().min(1),
  candidates: z.array(proposalInputSchema).min(1).max(100),
  party_profiles: z.array(partyProfileSchema).min(1).optional(),
});

export const simulateRequestSchema = z.object({
  scenario_id: z.string().min(1),
  proposal: proposalInputSchema,
  duration: z.number().int().min(1).max(100_000),
  seed: seedSchema.optional(),
  party_profiles: z.array(partyProfileSchema).min(1).optional(),
  /** Merged over the scenario's environment. */
  environment: environmentSchema.optional(),
  /** Wait for the run to finish and return it. */
  wait: z.boolean().default(false),
});

export const exploreRequestSchema = z.object({
  scenario_id: z.string().min(1),
  proposal: proposalInputSchema,
  duration: z.number().int().min(1).max(10_000),
  seeds: z.array(seedSchema).min(1).max(200),
  party_profiles: z.array(partyProfileSchema).min(1).optional(),
  environment: environmentSchema.optional(),
});

export const calibrateRequestSchema = z.object({
  scenario_id: z.string().min(1),
  proposal: proposalInputSchema,
  duration: z.number().int().min(1).max(10_000).default(300),
  /** Bucket start step → observed incident count. */
  historical: z.record(z.string().regex(/^\d+$/), z.number().int().min(0)),
  bucket: z.number().int().min(1).default(20),
  seeds: z.array(seedSchema).min(1).max(20).optional(),
  aggression_scales: z.array(z.number().positive()).min(1).optional(),
  initial_tensions: z.array(z.number().min(0)).min(1).optional(),
  environment: environmentSchema.optional(),
});

export const sensitivityRequestSchema = z.object({
  scenario_id: z.string().min(1),
  proposal: proposalInputSchema,
  duration: z.number().int().min(1).max(10_000).default(200),
  parameters: z
    .array(z.object({ parameter: z.enum(SENSITIVITY_PARAMETERS), min: z.number(), max: z.number() }))
    .min(1)
    .max(SENSITIVITY_PARAMETERS.length),
  metric: z.enum(SENSITIVITY_METRICS).default("incident_count"),
  points: z.number().int().min(2).max(11).default(5),
  seeds: z.array(seedSchema).min(1).max(20).optional(),
  environment: environmentSchema.optional(),
});

export const runParamsSchema = z.object({ run_id: z.string().min(1) });
export const scenarioParamsSchema = z.object({ scenario_id: z.string().min(1) });

export type EvaluateRequest = z.infer<typeof evaluateRequestSchema>;
export type RankRequest = z.infer<typeof rankRequestSchema>;
export type SimulateRequest = z.infer<typeof simulateRequestSchema>;
export type ExploreRequest = z.infer<typeof exploreRequestSchema>;
export type CalibrateRequest = z.infer<typeof calibrateRequestSchema>;
export type SensitivityRequest = z.infer<typeof sensitivityRequestSchema>;
