/**
 * Configuration loader.
 *
 * Precedence: environment variables over the JSON file over schema defaults.
 */

import { readFile } from "node:fs/promises";
import { ValidationError, formatErrorMessage } from "../errors.js";
import {
  bulkRestoreConfigSchema,
  type BulkRestoreConfig,
  type BulkRestoreConfigInput,
} from "./schema.js";

export const CONFIG_ENV_VARS = {
  baseUrl: "BULK_RESTORE_BASE_URL",
  token: "BULK_RESTORE_TOKEN",
  tokenSecretArn: "BULK_RESTORE_TOKEN_ARN",
  logLevel: "BULK_RESTORE_LOG_LEVEL",
} as const;

export type LoadConfigOptions = {
  /** Path to a JSON config file */
  path?: string;
  env?: NodeJS.ProcessEnv;
  /** Values that win over both file and environment (e.g. CLI flags) */
  overrides?: BulkRestoreConfigInput;
};

/**
 * Validate a raw configuration object and apply defaults
 */
export function parseConfig(raw: unknown): BulkRestoreConfig {
  const result = bulkRestoreConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new ValidationError(`Invalid configuration: ${issues.join("; ")}`);
  }
  return result.data;
}

async function readConfigFile(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw new ValidationError(`Cannot read config file ${path}: ${formatErrorMessage(err)}`);
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ValidationError(`Config file ${path} is not valid JSON: ${formatErrorMessage(err)}`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return isRecord(value) ? value : {};
}

/**
 * Load configuration from an optional file and the environment
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<BulkRestoreConfig> {
  const env = options.env ?? process.env;
  const fileConfig = options.path ? await readConfigFile(options.path) : {};
  if (!isRecord(fileConfig)) {
    throw new ValidationError(`Config file ${options.path ?? ""} must contain a JSON object`);
  }

  const api = { ...section(fileConfig, "api") };
  const logging = { ...section(fileConfig, "logging") };

  const baseUrl = env[CONFIG_ENV_VARS.baseUrl];
  if (baseUrl) api.baseUrl = baseUrl;
  const token = env[CONFIG_ENV_VARS.token];
  if (token) api.token = token;
  const tokenSecretArn = env[CONFIG_ENV_VARS.tokenSecretArn];
  if (tokenSecretArn) api.tokenSecretArn = tokenSecretArn;
  const logLevel = env[CONFIG_ENV_VARS.logLevel];
  if (logLevel) logging.level = logLevel;

  const overrides = options.overrides ?? {};
  return parseConfig({
    ...fileConfig,
    ...overrides,
    api: { ...api, ...overrides.api },
    logging: { ...logging, ...overrides.logging },
  });
}
