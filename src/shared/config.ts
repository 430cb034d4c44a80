/**
 * Service Configuration
 *
 * Reads the environment (populated from `.env` by dotenv in the entry points)
 * and validates it once at startup. Numeric settings arrive as strings and are
 * coerced; anything out of range fails fast with a ConfigError.
 */

import { z } from "zod";

export const DEFAULT_MODEL = "claude-sonnet-4-5-20250929";
export const DEFAULT_ENDPOINT_NAME = "facility_dashboard_summary";

const optionalString = z.preprocess(
  (v) => (typeof v === "string" && v.trim() === "" ? undefined : v),
  z.string().optional(),
);

const cutoff = z.coerce.number().min(0).max(1);

export const ServiceConfigSchema = z.object({
  DATASET_DIR: z.string().min(1).default("Dataset"),
  ANTHROPIC_API_KEY: optionalString,
  SUMMARY_MODEL: z.string().min(1).default(DEFAULT_MODEL),
  SUMMARY_MAX_TOKENS: z.coerce.number().int().positive().default(900),
  SUMMARY_TEMPERATURE: z.coerce.number().min(0).max(1).default(0.3),
  FUZZY_HIGH_CUTOFF: cutoff.default(0.88),
  FUZZY_SUGGEST_CUTOFF: cutoff.default(0.6),
  FUZZY_SUGGEST_LIMIT: z.coerce.number().int().positive().default(5),
  READMISSION_TOP_N: z.coerce.number().int().positive().default(3),
  PORT: z.coerce.number().int().min(0).max(65535).default(9004),
  SUMMARY_ENDPOINT_NAME: z.string().regex(/^[A-Za-z0-9_-]+$/).default(DEFAULT_ENDPOINT_NAME),
});

type RawServiceConfig = z.infer<typeof ServiceConfigSchema>;

export interface GenerationSettings {
  apiKey?: string;
  model: string;
  maxTokens: number;
  temperature: number;
}

export interface ResolverSettings {
  highCutoff: number;
  suggestCutoff: number;
  suggestLimit: number;
}

export interface ServiceConfig {
  datasetDir: string;
  generation: GenerationSettings;
  resolver: ResolverSettings;
  readmissionTopN: number;
  port: number;
  endpointName: string;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/**
 * Parse and validate service settings from an environment map.
 * Unknown variables are ignored.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const parsed = ServiceConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    );
  }
  return toServiceConfig(parsed.data);
}

function toServiceConfig(raw: RawServiceConfig): ServiceConfig {
  if (raw.FUZZY_SUGGEST_CUTOFF > raw.FUZZY_HIGH_CUTOFF) {
    throw new ConfigError([
      `FUZZY_SUGGEST_CUTOFF (${raw.FUZZY_SUGGEST_CUTOFF}) must not exceed FUZZY_HIGH_CUTOFF (${raw.FUZZY_HIGH_CUTOFF})`,
    ]);
  }
  return {
    datasetDir: raw.DATASET_DIR,
    generation: {
      apiKey: raw.ANTHROPIC_API_KEY,
      model: raw.SUMMARY_MODEL,
      maxTokens: raw.SUMMARY_MAX_TOKENS,
      temperature: raw.SUMMARY_TEMPERATURE,
    },
    resolver: {
      highCutoff: raw.FUZZY_HIGH_CUTOFF,
      suggestCutoff: raw.FUZZY_SUGGEST_CUTOFF,
      suggestLimit: raw.FUZZY_SUGGEST_LIMIT,
    },
    readmissionTopN: raw.READMISSION_TOP_N,
    port: raw.PORT,
    endpointName: raw.SUMMARY_ENDPOINT_NAME,
  };
}
