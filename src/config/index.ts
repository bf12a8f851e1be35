export {
  DEFAULT_BASE_URL,
  bulkRestoreConfigSchema,
  type ApiConfig,
  type BulkRestoreConfig,
  type BulkRestoreConfigInput,
  type PollingConfig,
  type RetrySettings,
} from "./schema.js";
export { CONFIG_ENV_VARS, loadConfig, parseConfig, type LoadConfigOptions } from "./loader.js";
