/**
 * Environment Lookups
 *
 * An environment is one (account, region) pair registered with the backup
 * service. Restores address their target through its id.
 */

import type { BackupApiClient } from "../api/client.js";
import { NotFoundError, ValidationError } from "../errors.js";
import type { Logger } from "../logging/index.js";
import { fetchAllPages } from "./pagination.js";

export type AccountRegion = {
  region: string;
  environmentId: string;
};

export type AssetResourceType = "EBS" | "EC2";

/**
 * Regions of an account that the backup service protects
 */
export async function listRegions(
  client: Pick<BackupApiClient, "listEnvironments">,
  account: string,
  logger?: Logger,
): Promise<AccountRegion[]> {
  if (!account) throw new ValidationError("account is required", "account");

  const environments = await fetchAllPages(
    client.listEnvironments,
    { account_native_id: { $eq: account } },
    { logger },
  );
  return environments.map((env) => ({ region: env.aws_region, environmentId: env.id }));
}

/**
 * Environment id of an (account, region) pair
 */
export async function getEnvironmentId(
  client: Pick<BackupApiClient, "listEnvironments">,
  account: string | undefined,
  region: string | undefined,
  logger?: Logger,
): Promise<string> {
  if (!account) throw new ValidationError("targetAccount is required", "targetAccount");
  if (!region) throw new ValidationError("targetRegion is required", "targetRegion");

  const environments = await fetchAllPages(
    client.listEnvironments,
    { account_native_id: { $eq: account }, aws_region: { $eq: region } },
    { logger },
  );
  const environment = environments[0];
  if (!environment) {
    throw new NotFoundError(`No authorized environment found for account ${account} in ${region}`);
  }
  return environment.id;
}

/**
 * Volume or instance ids registered in an environment
 */
export async function listAssetIds(
  client: Pick<BackupApiClient, "listEbsVolumes" | "listEc2Instances">,
  resourceType: AssetResourceType,
  environmentId: string,
  logger?: Logger,
): Promise<string[]> {
  const list = resourceType === "EBS" ? client.listEbsVolumes : client.listEc2Instances;
  const assets = await fetchAllPages(list, { environment_id: { $eq: environmentId } }, { logger });
  return assets.map((asset) => asset.id);
}
