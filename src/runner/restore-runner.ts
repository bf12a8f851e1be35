/**
 * Restore Runner
 *
 * Drives one plan entry through context lookup, request build, submission
 * and polling, and reports the result as an outcome. Errors from the
 * restore taxonomy become failed outcomes; anything else is rethrown.
 */

import type { BackupApiClient } from "../api/client.js";
import { formatErrorMessage, isRestoreError, type RestoreErrorKind } from "../errors.js";
import type { Logger } from "../logging/index.js";
import { prepareRestoreContext } from "../restore/context.js";
import { buildRestoreRequest, type RestoreContext } from "../restore/requests.js";
import { DEFAULT_POLL_POLICY, pollTask, type PollOptions, type PollPolicy } from "../tasks/poller.js";
import type { ResolvedTargetSpec, ResourceType, RestorePlanEntry } from "../types.js";

// =============================================================================
// Types
// =============================================================================

export type RestoreStatus = "completed" | "failed" | "timed-out";

export type RestoreOutcome = {
  resourceType: ResourceType;
  sourceBackupId: string;
  status: RestoreStatus;
  /** Set once the backend accepted the restore */
  taskId?: string;
  /** Last task status seen while polling */
  lastStatus?: string;
  errorKind?: RestoreErrorKind;
  message?: string;
};

export type RunnerClient = Pick<BackupApiClient, "listEnvironments" | "listS3Buckets" | "submitRestore" | "readTask">;

export type RunnerDeps = {
  client: RunnerClient;
  polling?: PollPolicy;
  /** Context lookup; defaults to an uncached prepareRestoreContext */
  contextFor?: (target: ResolvedTargetSpec) => Promise<RestoreContext>;
  logger?: Logger;
  signal?: AbortSignal;
  sleep?: PollOptions["sleep"];
  now?: PollOptions["now"];
};

export type RunRestoresOptions = {
  concurrency?: number;
};

export const DEFAULT_CONCURRENCY = 5;

// =============================================================================
// Single Restore
// =============================================================================

export async function runRestore(entry: RestorePlanEntry, deps: RunnerDeps): Promise<RestoreOutcome> {
  const base = { resourceType: entry.resourceType, sourceBackupId: entry.record.sourceBackupId };
  const log = deps.logger?.withContext({
    resourceType: entry.resourceType,
    backupId: entry.record.sourceBackupId,
    region: entry.target.targetRegion,
  });

  if (deps.signal?.aborted) {
    return { ...base, status: "timed-out", message: "Aborted before submission" };
  }

  let taskId: string | undefined;
  try {
    const context = deps.contextFor
      ? await deps.contextFor(entry.target)
      : await prepareRestoreContext(deps.client, entry.target, log);
    const request = buildRestoreRequest(entry, context);
    const submission = await deps.client.submitRestore(request);
    taskId = submission.taskId;

    const result = await pollTask(deps.client.readTask, taskId, deps.polling ?? DEFAULT_POLL_POLICY, {
      signal: deps.signal,
      sleep: deps.sleep,
      now: deps.now,
      logger: log,
    });

    if (result.state === "completed") {
      log?.info(`Restore completed after ${result.polls} polls`, { taskId });
      return { ...base, status: "completed", taskId, lastStatus: result.lastStatus };
    }
    return {
      ...base,
      status: "timed-out",
      taskId,
      lastStatus: result.lastStatus,
      message: result.reason === "aborted" ? "Polling aborted" : `Task not done - ${result.lastStatus ?? "unknown"}`,
    };
  } catch (err) {
    if (!isRestoreError(err)) throw err;
    log?.error(`Restore failed: ${formatErrorMessage(err)}`, { kind: err.kind, taskId });
    return { ...base, status: "failed", taskId, errorKind: err.kind, message: err.message };
  }
}

// =============================================================================
// Batches
// =============================================================================

function chunkArray<T>(array: readonly T[], chunkSize: number): T[][] {
  if (chunkSize <= 0) return [[...array]];
  const chunks: T[][] = [];
  for (let i = 0; i < array.length; i += chunkSize) {
    chunks.push(array.slice(i, i + chunkSize));
  }
  return chunks;
}

/**
 * Run entries in batches of `concurrency`; outcomes keep the entry order
 */
export async function runRestores(
  entries: readonly RestorePlanEntry[],
  deps: RunnerDeps,
  options: RunRestoresOptions = {},
): Promise<RestoreOutcome[]> {
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY));
  const outcomes: RestoreOutcome[] = [];

  for (const chunk of chunkArray(entries, concurrency)) {
    outcomes.push(...(await Promise.all(chunk.map((entry) => runRestore(entry, deps)))));
  }

  const failed = outcomes.filter((outcome) => outcome.status !== "completed").length;
  deps.logger?.info(`Ran ${outcomes.length} restores, ${failed} not completed`);
  return outcomes;
}
