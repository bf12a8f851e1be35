/**
 * Backup Service REST Client
 *
 * Authenticated `fetch()` calls against the backup service. Listing
 * operations return one page per call and report non-success statuses as a
 * failed page; task reads and restore submissions throw.
 */

import type { z } from "zod";
import { ApiError, AuthError } from "../errors.js";
import { silentLogger, type Logger } from "../logging/index.js";
import { createApiRetryRunner, type RetryConfig, type RetryOptions } from "../retry.js";
import type { FilterExpression, ResourceType, RestoreRequest } from "../types.js";
import {
  assetItemSchema,
  dynamoDbBackupItemSchema,
  ebsBackupItemSchema,
  ec2BackupItemSchema,
  environmentItemSchema,
  pageSchema,
  protectionGroupBackupItemSchema,
  protectionGroupItemSchema,
  protectionGroupS3AssetItemSchema,
  rdsBackupItemSchema,
  restoreResponseSchema,
  s3BucketItemSchema,
  taskItemSchema,
  type AssetItem,
  type DynamoDbBackupItem,
  type EbsBackupItem,
  type Ec2BackupItem,
  type EnvironmentItem,
  type ProtectionGroupBackupItem,
  type ProtectionGroupItem,
  type ProtectionGroupS3AssetItem,
  type RdsBackupItem,
  type S3BucketItem,
  type TaskItem,
} from "./schemas.js";

// =============================================================================
// Types
// =============================================================================

export type ListQuery = {
  filter?: FilterExpression;
  sort?: string;
  /** 1-based page cursor */
  start: number;
};

export type ListPage<T> =
  | { ok: true; items: T[]; totalCount: number; totalPages: number }
  | { ok: false; statusCode: number; reason: string; content: string };

/** One page of a filtered listing. */
export type ListingOperation<T> = (query: ListQuery) => Promise<ListPage<T>>;

export type ReadTask = (taskId: string) => Promise<TaskItem>;

export type RestoreSubmission = {
  taskId: string;
  statusCode: number;
};

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface BackupApiClient {
  listEbsBackups: ListingOperation<EbsBackupItem>;
  listEc2Backups: ListingOperation<Ec2BackupItem>;
  listRdsBackups: ListingOperation<RdsBackupItem>;
  listDynamoDbBackups: ListingOperation<DynamoDbBackupItem>;
  listProtectionGroupBackups: ListingOperation<ProtectionGroupBackupItem>;

  listEnvironments: ListingOperation<EnvironmentItem>;
  listS3Buckets: ListingOperation<S3BucketItem>;
  listProtectionGroups: ListingOperation<ProtectionGroupItem>;
  listProtectionGroupS3Assets: ListingOperation<ProtectionGroupS3AssetItem>;
  listEbsVolumes: ListingOperation<AssetItem>;
  listEc2Instances: ListingOperation<AssetItem>;

  readTask: ReadTask;
  /** Submit a restore; never retried */
  submitRestore(request: RestoreRequest): Promise<RestoreSubmission>;
}

export type BackupApiClientOptions = {
  baseUrl: string;
  token: string;
  pageSize?: number;
  timeoutMs?: number;
  retry?: RetryConfig;
  retryHooks?: Pick<RetryOptions, "sleep" | "random">;
  fetch?: FetchLike;
  logger?: Logger;
};

// =============================================================================
// Endpoints
// =============================================================================

export const RESTORE_PATHS: Record<ResourceType, string> = {
  EBS: "restores/aws/ebs-volumes",
  EC2: "restores/aws/ec2-instances",
  RDS: "restores/aws/rds-resources",
  DynamoDB: "restores/aws/dynamodb-tables",
  ProtectionGroup: "restores/protection-groups",
};

type ApiResponse = { status: number; payload: unknown };

function parseRetryAfter(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = Number.parseInt(header, 10);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

function stringifyPayload(payload: unknown): string {
  return typeof payload === "string" ? payload : JSON.stringify(payload);
}

// =============================================================================
// Client
// =============================================================================

/**
 * Create a backup service client bound to one base URL and bearer token
 */
export function createBackupApiClient(options: BackupApiClientOptions): BackupApiClient {
  const fetchImpl: FetchLike = options.fetch ?? ((input, init) => fetch(input, init));
  const logger = options.logger ?? silentLogger;
  const pageSize = options.pageSize ?? 100;
  const timeoutMs = options.timeoutMs ?? 30_000;

  const runWithRetry = createApiRetryRunner(options.retry, {
    ...options.retryHooks,
    onRetry: (info) =>
      logger.warn(`Retrying ${info.label ?? "request"} (attempt ${info.attempt}/${info.maxAttempts})`, {
        delayMs: info.delayMs,
        error: info.err instanceof Error ? info.err.message : String(info.err),
      }),
  });

  async function send(
    method: "GET" | "POST",
    path: string,
    init: { query?: Record<string, string>; body?: unknown } = {},
  ): Promise<ApiResponse> {
    const url = new URL(path, options.baseUrl);
    for (const [key, value] of Object.entries(init.query ?? {})) {
      url.searchParams.set(key, value);
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const res = await fetchImpl(url.toString(), {
        method,
        headers: {
          Authorization: `Bearer ${options.token}`,
          "Content-Type": "application/json",
          Accept: "application/json",
        },
        body: init.body === undefined ? undefined : JSON.stringify(init.body),
        signal: controller.signal,
      });
      const text = await res.text();
      logger.debug(`${method} ${path} -> ${res.status}`);

      if (res.status === 401 || res.status === 403) {
        throw new AuthError(`Backup service rejected the credentials for ${method} ${path} (HTTP ${res.status})`, res.status);
      }
      if (!res.ok) {
        throw new ApiError(
          `${method} ${path} failed with HTTP ${res.status}`,
          res.status,
          res.statusText || `HTTP ${res.status}`,
          text,
          parseRetryAfter(res.headers.get("retry-after")),
        );
      }

      if (text.trim() === "") return { status: res.status, payload: {} };
      try {
        return { status: res.status, payload: JSON.parse(text) };
      } catch {
        throw new ApiError(`${method} ${path} returned a body that is not JSON`, res.status, "invalid JSON", text);
      }
    } finally {
      clearTimeout(timer);
    }
  }

  function listing<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): ListingOperation<T> {
    return async (query) => {
      const params: Record<string, string> = {
        start: String(query.start),
        limit: String(pageSize),
      };
      if (query.filter && Object.keys(query.filter).length > 0) params.filter = JSON.stringify(query.filter);
      if (query.sort) params.sort = query.sort;

      let response: ApiResponse;
      try {
        response = await runWithRetry(() => send("GET", path, { query: params }), `GET ${path}`);
      } catch (err) {
        if (err instanceof ApiError) {
          return { ok: false, statusCode: err.statusCode, reason: err.reason, content: err.content };
        }
        throw err;
      }

      const page = pageSchema.safeParse(response.payload);
      if (!page.success) {
        throw new ApiError(`Malformed page from ${path}`, response.status, "malformed page", stringifyPayload(response.payload));
      }

      const items: T[] = [];
      for (const [index, raw] of (page.data._embedded?.items ?? []).entries()) {
        const parsed = schema.safeParse(raw);
        if (!parsed.success) {
          const issue = parsed.error.issues[0];
          throw new ApiError(
            `Malformed item ${index} from ${path}: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid"}`,
            response.status,
            "malformed item",
            stringifyPayload(raw),
          );
        }
        items.push(parsed.data);
      }

      return {
        ok: true,
        items,
        totalCount: page.data.total_count ?? items.length,
        totalPages: page.data.total_pages_count ?? 1,
      };
    };
  }

  return {
    listEbsBackups: listing("backups/aws/ebs-volumes", ebsBackupItemSchema),
    listEc2Backups: listing("backups/aws/ec2-instances", ec2BackupItemSchema),
    listRdsBackups: listing("backups/aws/rds-resources", rdsBackupItemSchema),
    listDynamoDbBackups: listing("backups/aws/dynamodb-tables", dynamoDbBackupItemSchema),
    listProtectionGroupBackups: listing("backups/protection-groups", protectionGroupBackupItemSchema),

    listEnvironments: listing("datasources/aws/environments", environmentItemSchema),
    listS3Buckets: listing("datasources/aws/s3-buckets", s3BucketItemSchema),
    listProtectionGroups: listing("datasources/protection-groups", protectionGroupItemSchema),
    listProtectionGroupS3Assets: listing("datasources/protection-groups/s3-assets", protectionGroupS3AssetItemSchema),
    listEbsVolumes: listing("datasources/aws/ebs-volumes", assetItemSchema),
    listEc2Instances: listing("datasources/aws/ec2-instances", assetItemSchema),

    async readTask(taskId) {
      const path = `tasks/${encodeURIComponent(taskId)}`;
      const response = await runWithRetry(() => send("GET", path), `GET ${path}`);
      const parsed = taskItemSchema.safeParse(response.payload);
      if (!parsed.success) {
        throw new ApiError(`Malformed task ${taskId}`, response.status, "malformed task", stringifyPayload(response.payload));
      }
      return parsed.data;
    },

    async submitRestore(request) {
      const path = RESTORE_PATHS[request.resourceType];
      const response = await send("POST", path, { body: request.body });
      const parsed = restoreResponseSchema.safeParse(response.payload);
      if (!parsed.success) {
        throw new ApiError(
          `Restore of ${request.sourceBackupId} returned no task id`,
          response.status,
          "missing task id",
          stringifyPayload(response.payload),
        );
      }
      logger.info(`Submitted ${request.resourceType} restore of ${request.sourceBackupId}`, {
        taskId: parsed.data.task_id,
      });
      return { taskId: parsed.data.task_id, statusCode: response.status };
    },
  };
}
