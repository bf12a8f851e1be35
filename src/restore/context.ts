/**
 * Target lookups done once per (account, region, bucket) before requests
 * are built.
 */

import type { BackupApiClient } from "../api/client.js";
import { fetchAllPages } from "../discovery/pagination.js";
import { getEnvironmentId } from "../discovery/environments.js";
import { NotFoundError } from "../errors.js";
import type { Logger } from "../logging/index.js";
import type { ResolvedTargetSpec } from "../types.js";
import type { RestoreContext } from "./requests.js";

export type { RestoreContext } from "./requests.js";

type ContextClient = Pick<BackupApiClient, "listEnvironments" | "listS3Buckets">;

/**
 * Bucket restores take their environment from the bucket itself; every
 * other type looks up the target (account, region) environment.
 */
export async function prepareRestoreContext(
  client: ContextClient,
  target: ResolvedTargetSpec,
  logger?: Logger,
): Promise<RestoreContext> {
  if (target.resourceType !== "ProtectionGroup") {
    const environmentId = await getEnvironmentId(client, target.targetAccount, target.targetRegion, logger);
    return { environmentId };
  }

  const buckets = await fetchAllPages(
    client.listS3Buckets,
    {
      account_native_id: { $eq: target.targetAccount },
      aws_region: { $eq: target.targetRegion },
      name: { $in: [target.targetBucket] },
    },
    { logger },
  );
  const bucket = buckets.find((item) => item.name === target.targetBucket);
  if (!bucket) {
    throw new NotFoundError(
      `Bucket ${target.targetBucket} not found in account ${target.targetAccount} region ${target.targetRegion}`,
    );
  }
  logger?.debug(`Resolved bucket ${bucket.name} to ${bucket.id}`);
  return { environmentId: bucket.environment_id, bucketId: bucket.id };
}

/**
 * Memoizes contexts per target location so a batch looks each one up once
 */
export function createContextCache(client: ContextClient, logger?: Logger) {
  const cache = new Map<string, Promise<RestoreContext>>();

  return (target: ResolvedTargetSpec): Promise<RestoreContext> => {
    const bucket = target.resourceType === "ProtectionGroup" ? target.targetBucket : "";
    const key = `${target.targetAccount}/${target.targetRegion}/${bucket}`;
    let context = cache.get(key);
    if (!context) {
      context = prepareRestoreContext(client, target, logger);
      cache.set(key, context);
      // A failed lookup is retried by the next entry
      void context.catch(() => cache.delete(key));
    }
    return context;
  };
}
