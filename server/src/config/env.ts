/**
 * Centralized Environment Configuration
 *
 * Fail-fast Zod validation for the service's environment variables.
 * Import this module early to catch missing config before app startup.
 */

import { z } from "zod";
import { registryBackends, similarityMetrics } from "@shared/schema";

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

const EnvSchema = z.object({
  APP_NAME: z.string().min(1).default("voiceprint-registry"),
  NODE_ENV: z.string().default("development"),
  PORT: z.coerce.number().int().positive().default(5000),

  LOG_LEVEL: LogLevelSchema.default("info"),

  REQUIRED_CLIPS: z.coerce.number().int().min(1).max(32).default(4),
  SIMILARITY_THRESHOLD: z.coerce.number().min(-1).max(1).default(0.75),
  SIMILARITY_METRIC: z.enum(similarityMetrics).default("dot"),

  REGISTRY_BACKEND: z.enum(registryBackends).default("sqlite"),
  REGISTRY_PATH: z.string().min(1).default("data/voiceprints.db"),
  REGISTRY_DIR: z.string().min(1).default("data/embeddings"),

  EMBEDDER_URL: z.string().url().optional(),
  EMBEDDER_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  FFMPEG_PATH: z.string().min(1).default("ffmpeg"),
  FFMPEG_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  TARGET_SAMPLE_RATE: z.coerce.number().int().positive().default(16000),

  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
});

export type Env = z.infer<typeof EnvSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;

export class EnvValidationError extends Error {
  constructor(
    public readonly missingVars: string[],
    public readonly invalidVars: string[]
  ) {
    const errorMessages: string[] = [];

    if (missingVars.length > 0) {
      errorMessages.push(`Missing required environment variables:\n  - ${missingVars.join("\n  - ")}`);
    }

    if (invalidVars.length > 0) {
      errorMessages.push(`Invalid environment variables:\n  - ${invalidVars.join("\n  - ")}`);
    }

    super(errorMessages.join("\n\n"));
    this.name = "EnvValidationError";
  }
}

/**
 * Parse an environment record. Throws EnvValidationError listing every bad variable.
 */
export function loadEnv(source: Record<string, string | undefined> = process.env): Env {
  const result = EnvSchema.safeParse(source);

  if (!result.success) {
    const missingVars: string[] = [];
    const invalidVars: string[] = [];

    for (const issue of result.error.issues) {
      const path = issue.path.join(".");
      if (issue.code === "invalid_type" && issue.received === "undefined") {
        missingVars.push(path);
      } else {
        invalidVars.push(`${path}: ${issue.message}`);
      }
    }

    throw new EnvValidationError(missingVars, invalidVars);
  }

  return result.data;
}

let _env: Env | null = null;

function validateEnv(): Env {
  try {
    return loadEnv(process.env);
  } catch (error) {
    if (!(error instanceof EnvValidationError)) {
      throw error;
    }
    console.error(
      `\n${"=".repeat(60)}\nENVIRONMENT CONFIGURATION ERROR\n${"=".repeat(60)}\n\n${error.message}\n\nRefer to .env.example for the supported variables.\n${"=".repeat(60)}\n`
    );
    process.exit(1);
  }
}

export function getEnv(): Env {
  if (!_env) {
    _env = validateEnv();
  }
  return _env;
}

export function requireEnv(key: keyof Env): string {
  const value = getEnv()[key];
  if (!value) {
    throw new Error(`Required environment variable ${key} is not set`);
  }
  return String(value);
}
