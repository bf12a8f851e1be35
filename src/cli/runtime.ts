/**
 * Wires configuration, credentials, logging and the API client for one
 * CLI invocation.
 */

import { createBackupApiClient, type BackupApiClient } from "../api/client.js";
import { loadConfig, type BulkRestoreConfig, type BulkRestoreConfigInput } from "../config/index.js";
import { resolveBearerToken } from "../credentials/token.js";
import { ValidationError } from "../errors.js";
import { createLogger, isLogLevel, type Logger } from "../logging/index.js";

export type GlobalOptions = {
  config?: string;
  baseUrl?: string;
  logLevel?: string;
};

export type CliRuntime = {
  config: BulkRestoreConfig;
  client: BackupApiClient;
  logger: Logger;
};

export async function createCliRuntime(options: GlobalOptions, env: NodeJS.ProcessEnv = process.env): Promise<CliRuntime> {
  const { logLevel } = options;
  if (logLevel !== undefined && !isLogLevel(logLevel)) {
    throw new ValidationError(`Unknown log level ${logLevel}`, "logLevel");
  }

  const overrides: BulkRestoreConfigInput = {};
  if (options.baseUrl) overrides.api = { baseUrl: options.baseUrl };
  if (logLevel) overrides.logging = { level: logLevel };

  const config = await loadConfig({ path: options.config, env, overrides });
  const token = await resolveBearerToken(config.api);
  const logger = createLogger("cli", { level: config.logging.level, secrets: [token] });

  const client = createBackupApiClient({
    baseUrl: config.api.baseUrl,
    token,
    pageSize: config.api.pageSize,
    timeoutMs: config.api.timeoutMs,
    retry: config.api.retry,
    logger: logger.child("api"),
  });

  return { config, client, logger };
}
