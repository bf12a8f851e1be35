/**
 * Bulk Restore Configuration Schema
 *
 * Schema-based validation of the runtime configuration using Zod.
 */

import { z } from "zod";
import { LOG_LEVELS } from "../logging/index.js";

export const DEFAULT_BASE_URL = "https://us-west-2.api.backup.example/";

/**
 * Retry settings for idempotent API reads
 */
export const retryConfigSchema = z.object({
  attempts: z.number().int().positive().default(3),
  minDelayMs: z.number().int().nonnegative().default(100),
  maxDelayMs: z.number().int().nonnegative().default(30_000),
  jitter: z.number().min(0).max(1).default(0.2),
});

export const apiConfigSchema = z.object({
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  token: z.string().min(1).optional(),
  /** Secrets Manager secret holding the bearer token */
  tokenSecretArn: z.string().min(1).optional(),
  pageSize: z.number().int().positive().max(1000).default(100),
  timeoutMs: z.number().int().positive().default(30_000),
  retry: retryConfigSchema.default({}),
});

export const discoveryConfigSchema = z.object({
  /** Larger result sets fail with TooManyResults instead of being truncated */
  maxResults: z.number().int().positive().default(1000),
});

export const pollingConfigSchema = z.object({
  timeoutMs: z.number().int().positive().default(600_000),
  intervalMs: z.number().int().positive().default(20_000),
});

export const runnerConfigSchema = z.object({
  concurrency: z.number().int().positive().default(5),
});

export const loggingConfigSchema = z.object({
  level: z.enum(LOG_LEVELS).default("info"),
});

export const bulkRestoreConfigSchema = z.object({
  api: apiConfigSchema.default({}),
  discovery: discoveryConfigSchema.default({}),
  polling: pollingConfigSchema.default({}),
  runner: runnerConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
});

export type RetrySettings = z.infer<typeof retryConfigSchema>;
export type ApiConfig = z.infer<typeof apiConfigSchema>;
export type PollingConfig = z.infer<typeof pollingConfigSchema>;
export type BulkRestoreConfig = z.infer<typeof bulkRestoreConfigSchema>;
/** Configuration as written by the operator, before defaults are applied */
export type BulkRestoreConfigInput = z.input<typeof bulkRestoreConfigSchema>;
