import * as v from "valibot";

import { logFormatSchema, logLevelSchema } from "../logger/schema";

const portSchema = v.pipe(v.string(), v.transform(Number), v.number(), v.integer(), v.minValue(1), v.maxValue(65535));

export const envSchema = v.object({
  NODE_ENV: v.optional(v.picklist(["development", "production", "test"]), "development"),

  // Logging
  LOG_LEVEL: v.optional(logLevelSchema),
  LOG_FORMAT: v.optional(logFormatSchema),

  // Compose project
  COMPOSE_FILE: v.optional(v.pipe(v.string(), v.minLength(1)), "docker-compose.yml"),
  COMPOSE_PROJECT_DIR: v.optional(v.pipe(v.string(), v.minLength(1))),
  STACK_FILE: v.optional(v.pipe(v.string(), v.minLength(1))),

  // Data store
  POSTGRES_HOST: v.optional(v.pipe(v.string(), v.minLength(1)), "localhost"),
  POSTGRES_PORT: v.optional(portSchema, "5432"),
  POSTGRES_DB: v.optional(v.pipe(v.string(), v.minLength(1)), "postgres"),
  POSTGRES_USER: v.optional(v.pipe(v.string(), v.minLength(1)), "postgres"),
  POSTGRES_PASSWORD: v.optional(v.string(), ""),

  // Status server
  STATUS_PORT: v.optional(portSchema, "9400"),
});

export type Env = v.InferOutput<typeof envSchema>;

/** Variables the stack's services cannot run without. */
export const REQUIRED_KEYS = [
  "POSTGRES_PASSWORD",
  "JWT_SECRET",
  "ANON_KEY",
  "SERVICE_ROLE_KEY",
  "DASHBOARD_USERNAME",
  "DASHBOARD_PASSWORD",
  "SECRET_KEY_BASE",
  "VAULT_ENC_KEY",
  "LOGFLARE_PUBLIC_ACCESS_TOKEN",
  "LOGFLARE_PRIVATE_ACCESS_TOKEN",
] as const;

/** Reported when unset, never fatal. */
export const OPTIONAL_KEYS = [
  "SITE_URL",
  "API_EXTERNAL_URL",
  "SUPABASE_PUBLIC_URL",
  "OPENAI_API_KEY",
  "SMTP_HOST",
  "SMTP_PORT",
  "SMTP_USER",
  "SMTP_PASS",
] as const;

/** Values left over from an env template. */
export const PLACEHOLDER_VALUES: ReadonlySet<string> = new Set(["", "your-value-here", "change-me"]);
