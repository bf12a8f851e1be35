/**
 * Task Poller
 *
 * Reads a restore task at a fixed interval until it completes, fails, the
 * time budget runs out or the caller aborts.
 */

import type { ReadTask } from "../api/client.js";
import { TaskFailedError } from "../errors.js";
import type { Logger } from "../logging/index.js";
import type { TaskPollResult, TaskState, TaskStatus } from "../types.js";

export type PollPolicy = {
  timeoutMs: number;
  intervalMs: number;
};

export const DEFAULT_POLL_POLICY: PollPolicy = {
  timeoutMs: 600_000,
  intervalMs: 20_000,
};

export type PollOptions = {
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Milliseconds clock */
  now?: () => number;
  logger?: Logger;
};

const TASK_STATES: Record<TaskStatus, TaskState> = {
  queued: "pending",
  in_progress: "pending",
  completed: "completed",
  failed: "failed",
  aborted: "aborted",
};

export function isTaskStatus(status: string): status is TaskStatus {
  return Object.keys(TASK_STATES).includes(status);
}

/**
 * Unknown statuses count as pending
 */
export function classifyTaskStatus(status: string): TaskState {
  return isTaskStatus(status) ? TASK_STATES[status] : "pending";
}

/** Resolves after `ms`, or early once `signal` aborts */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Poll `taskId` until it reaches a final state.
 *
 * Another poll is only made while it fits in the remaining budget. A failed
 * or aborted task throws TaskFailedError; errors from `readTask` (including
 * AuthError) propagate.
 */
export async function pollTask(
  readTask: ReadTask,
  taskId: string,
  policy: PollPolicy = DEFAULT_POLL_POLICY,
  options: PollOptions = {},
): Promise<TaskPollResult> {
  const sleep = options.sleep ?? abortableSleep;
  const now = options.now ?? Date.now;
  const log = options.logger?.withContext({ taskId });
  const startedAt = now();
  let polls = 0;
  let lastStatus: string | undefined;

  for (;;) {
    if (options.signal?.aborted) {
      log?.warn(`Polling aborted; last status ${lastStatus ?? "unknown"}`);
      return { state: "timed-out", taskId, polls, lastStatus, reason: "aborted" };
    }

    const task = await readTask(taskId);
    polls += 1;
    lastStatus = task.status;
    const state = classifyTaskStatus(task.status);
    if (!isTaskStatus(task.status)) {
      log?.warn(`Unknown task status ${task.status}; treating as pending`);
    } else {
      log?.info(`Task status ${task.status}`);
    }

    if (state === "completed") {
      return { state: "completed", taskId, polls, lastStatus: task.status };
    }
    if (state === "failed" || state === "aborted") {
      throw new TaskFailedError(taskId, task.status);
    }

    const elapsed = now() - startedAt;
    if (elapsed + policy.intervalMs > policy.timeoutMs) {
      log?.warn(`Task not done after ${polls} polls; last status ${task.status}`);
      return { state: "timed-out", taskId, polls, lastStatus, reason: "budget-exhausted" };
    }
    await sleep(policy.intervalMs, options.signal);
  }
}
