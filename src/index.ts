/**
 * Bulk Restore
 *
 * Discover backups, resolve restore targets, submit restores and track
 * their tasks.
 */

export * from "./types.js";
export * from "./errors.js";
export {
  createBackupApiClient,
  RESTORE_PATHS,
  type BackupApiClient,
  type BackupApiClientOptions,
  type FetchLike,
  type ListingOperation,
  type ListPage,
  type ListQuery,
  type ReadTask,
  type RestoreSubmission,
} from "./api/client.js";
export { createApiRetryRunner, retryAsync, type RetryConfig, type RetryOptions } from "./retry.js";
export { resolveBearerToken, type TokenSource } from "./credentials/token.js";
export * from "./config/index.js";
export * from "./logging/index.js";
export * from "./discovery/index.js";
export * from "./restore/index.js";
export {
  DEFAULT_POLL_POLICY,
  abortableSleep,
  classifyTaskStatus,
  isTaskStatus,
  pollTask,
  type PollOptions,
  type PollPolicy,
} from "./tasks/poller.js";
export {
  DEFAULT_CONCURRENCY,
  runRestore,
  runRestores,
  type RestoreOutcome,
  type RestoreStatus,
  type RunnerDeps,
  type RunRestoresOptions,
} from "./runner/restore-runner.js";
