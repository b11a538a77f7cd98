/**
 * src/lib/env.ts
 * WHAT: Environment loading/validation via dotenv + zod.
 * WHY: Fail-fast on missing secrets; keep process.env access centralized.
 * FLOWS: load .env → parse/validate → export typed env object
 * DOCS:
 *  - zod: https://zod.dev
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import dotenv from "dotenv";
import path from "node:path";
import { z } from "zod";

// override: true outside tests so .env wins over a stale shell environment;
// tests set their variables before imports and must not be clobbered.
const isTest = process.env.NODE_ENV === "test" || !!process.env.VITEST_WORKER_ID;
dotenv.config({ path: path.join(process.cwd(), ".env"), override: !isTest });

// "yes", "1", "true", "on" (any case) all count as enabled
const truthyPattern = /^(1|true|yes|on)$/i;

/**
 * Everything the process reads from the environment. Timer knobs have
 * defaults tuned for a single-guild bot; see schedulerOptionsFromEnv().
 */
export const envSchema = z.object({
  DISCORD_TOKEN: z.string().min(1, "Missing DISCORD_TOKEN"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  DB_PATH: z.string().default("data/data.db"),
  LOG_LEVEL: z.string().optional(),

  // Sentry error tracking - disabled if DSN not provided
  SENTRY_DSN: z.string().optional(),
  SENTRY_ENVIRONMENT: z.string().optional(),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),

  // Timer scheduler
  TIMER_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(20).default(3),
  TIMER_RETRY_INITIAL_MS: z.coerce.number().int().min(0).default(1000),
  TIMER_RETRY_MAX_MS: z.coerce.number().int().min(0).default(30_000),
  // 0 disables the timeout. Handlers run one at a time, so a slow one delays every
  // other due timer (and stop()) by up to maxAttempts x this plus retry backoff.
  TIMER_HANDLER_TIMEOUT_MS: z.coerce.number().int().min(0).default(10_000),
  // setTimeout overflows past 2^31-1 ms, so the loop never sleeps longer than this
  TIMER_MAX_SLEEP_MS: z.coerce.number().int().min(1000).max(2_147_483_647).default(3_600_000),
  TIMER_SCHEDULER_DISABLED: z
    .string()
    .optional()
    .transform((val) => truthyPattern.test(val ?? "")),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Trims every known key (stray whitespace from copy-paste is common) and
 * validates in one pass.
 */
export function parseEnv(source: NodeJS.ProcessEnv) {
  const raw: Record<string, string | undefined> = {};
  for (const key of Object.keys(envSchema.shape)) {
    raw[key] = source[key]?.trim();
  }
  return envSchema.safeParse(raw);
}

/**
 * Maps the TIMER_* variables onto TimerScheduler options.
 */
export function schedulerOptionsFromEnv(e: Env) {
  return {
    maxAttempts: e.TIMER_MAX_ATTEMPTS,
    retryInitialDelayMs: e.TIMER_RETRY_INITIAL_MS,
    retryMaxDelayMs: e.TIMER_RETRY_MAX_MS,
    handlerTimeoutMs: e.TIMER_HANDLER_TIMEOUT_MS,
    maxSleepMs: e.TIMER_MAX_SLEEP_MS,
  };
}

// safeParse reports ALL issues at once instead of one per restart
const parsed = parseEnv(process.env);
if (!parsed.success) {
  const issues = parsed.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`).join("\n");
  console.error(`Environment validation failed:\n${issues}`);
  process.exit(1);
}
export const env = parsed.data;
