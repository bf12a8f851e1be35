/**
 * Backup Discovery
 *
 * Lists backups of one resource type in a time window, maps them to
 * BackupRecords and narrows them by source account, region and tag.
 */

import type { BackupApiClient } from "../api/client.js";
import type {
  DynamoDbBackupItem,
  EbsBackupItem,
  Ec2BackupItem,
  ProtectionGroupBackupItem,
  ProtectionGroupS3AssetItem,
  RdsBackupItem,
} from "../api/schemas.js";
import { NotFoundError, TooManyResultsError, ValidationError } from "../errors.js";
import { silentLogger, type Logger } from "../logging/index.js";
import type {
  BackupRecord,
  DynamoDbBackupRecord,
  DynamoDbSecondaryIndex,
  EbsBackupRecord,
  Ec2BackupRecord,
  FilterExpression,
  ObjectFilters,
  ProtectionGroupBackupRecord,
  RdsBackupRecord,
  ResourceType,
  SearchDirection,
} from "../types.js";
import { fetchAllPages } from "./pagination.js";
import { filterByTag } from "./tags.js";
import { getSortAndTimestampFilter } from "./time-window.js";

// =============================================================================
// Types
// =============================================================================

export type BackupQuery = {
  resourceType: ResourceType;
  sourceAccount: string;
  sourceRegion: string;
  searchTagKey?: string;
  searchTagValue?: string;
  searchDirection?: SearchDirection;
  /** Days back to the start of the window (default 1) */
  startSearchDayOffset?: number;
  /** Days back to the end of the window (default 0) */
  endSearchDayOffset?: number;
  /** Volume, instance, RDS resource or DynamoDB table id */
  searchAssetId?: string;
  /** Keep only the newest backup of each asset (default on for protection groups) */
  latestOnly?: boolean;

  protectionGroupName?: string;
  bucketNames?: string[];
  objectFilters?: Partial<ObjectFilters>;
};

export type DiscoverBackupsOptions = {
  maxResults?: number;
  logger?: Logger;
  now?: Date;
};

type DiscoveryContext = {
  client: BackupApiClient;
  query: BackupQuery;
  sort: string;
  filter: FilterExpression;
  logger: Logger;
};

/** Filter field holding the searched asset id, per resource type */
export const ASSET_FILTER_FIELDS = {
  EBS: "volume_id",
  EC2: "instance_id",
  RDS: "resource_id",
  DynamoDB: "table_id",
} as const;

// =============================================================================
// Record Mapping
// =============================================================================

const tagsOf = (tags: Array<{ key: string; value: string }>) => tags.map(({ key, value }) => ({ key, value }));

export function toEbsBackupRecord(item: EbsBackupItem): EbsBackupRecord {
  return Object.freeze<EbsBackupRecord>({
    resourceType: "EBS",
    sourceBackupId: item.id,
    sourceAssetId: item.volume_native_id,
    sourceAccount: item.account_native_id,
    sourceRegion: item.aws_region,
    sourceTags: tagsOf(item.tags),
    startTimestamp: item.start_timestamp,
    expireTimestamp: item.expiration_timestamp ?? undefined,
    sourceVolumeId: item.volume_native_id,
    sourceEncrypted: item.is_encrypted ?? false,
    sourceAz: item.aws_az,
    sourceKmsKeyId: item.kms_key_native_id ?? undefined,
    sourceVolumeType: item.type,
    sourceIops: item.iops ?? undefined,
  });
}

export function toEc2BackupRecord(item: Ec2BackupItem): Ec2BackupRecord {
  return Object.freeze<Ec2BackupRecord>({
    resourceType: "EC2",
    sourceBackupId: item.id,
    sourceAssetId: item.instance_native_id,
    sourceAccount: item.account_native_id,
    sourceRegion: item.aws_region,
    sourceTags: tagsOf(item.tags),
    startTimestamp: item.start_timestamp,
    expireTimestamp: item.expiration_timestamp ?? undefined,
    sourceInstanceId: item.instance_native_id,
    sourceAmiId: item.ami?.ami_native_id,
    sourceAz: item.aws_az,
    sourceVpcId: item.vpc_native_id,
    sourceKeyPairName: item.key_pair_name ?? undefined,
    sourceIamInstanceProfileName: item.iam_instance_profile ?? undefined,
    sourceNetworkInterfaces: item.network_interfaces.map((nic) => ({
      deviceIndex: nic.device_index,
      subnetId: nic.subnet_native_id,
      securityGroupIds: [...nic.security_group_native_ids],
    })),
    sourceEbsVolumes: item.attached_backup_ebs_volumes.map((volume) => ({
      name: volume.name,
      volumeId: volume.volume_native_id,
      kmsKeyId: volume.kms_key_native_id ?? undefined,
      tags: tagsOf(volume.tags),
    })),
  });
}

export function toRdsBackupRecord(item: RdsBackupItem): RdsBackupRecord {
  return Object.freeze<RdsBackupRecord>({
    resourceType: "RDS",
    sourceBackupId: item.id,
    sourceAssetId: item.resource_id,
    sourceAccount: item.account_native_id,
    sourceRegion: item.aws_region,
    sourceTags: tagsOf(item.tags),
    startTimestamp: item.start_timestamp,
    expireTimestamp: item.expiration_timestamp ?? undefined,
    sourceResourceId: item.resource_id,
    sourceEngine: item.engine,
    sourceEngineVersion: item.engine_version,
    sourceSubnetGroupName: item.subnet_group_name ?? undefined,
    sourceSecurityGroupIds: [...item.security_group_native_ids],
    sourceKmsKeyId: item.kms_key_native_id ?? undefined,
    sourceInstances: item.instances.map((instance) => ({
      name: instance.name,
      instanceClass: instance.class,
      isPubliclyAccessible: instance.is_publicly_accessible,
    })),
  });
}

function toSecondaryIndex(index: DynamoDbBackupItem["global_secondary_indexes"][number]): DynamoDbSecondaryIndex {
  return {
    indexName: index.index_name,
    keySchema: index.key_schema.map((key) => ({ attributeName: key.attribute_name, keyType: key.key_type })),
    projection: {
      projectionType: index.projection.projection_type,
      nonKeyAttributes: index.projection.non_key_attributes ?? undefined,
    },
    provisionedThroughput: index.provisioned_throughput
      ? {
          readCapacityUnits: index.provisioned_throughput.read_capacity_units,
          writeCapacityUnits: index.provisioned_throughput.write_capacity_units,
        }
      : undefined,
  };
}

export function toDynamoDbBackupRecord(item: DynamoDbBackupItem): DynamoDbBackupRecord {
  const sse = item.sse_specification;
  const throughput = item.provisioned_throughput;
  return Object.freeze<DynamoDbBackupRecord>({
    resourceType: "DynamoDB",
    sourceBackupId: item.id,
    sourceAssetId: item.table_id,
    sourceAccount: item.account_native_id,
    sourceRegion: item.aws_region,
    sourceTags: tagsOf(item.tags),
    startTimestamp: item.start_timestamp,
    expireTimestamp: item.expiration_timestamp ?? undefined,
    sourceTableName: item.table_name,
    sourceTableId: item.table_id,
    sourceBillingMode: item.billing_mode ?? undefined,
    sourceTableClass: item.table_class ?? undefined,
    sourceSseSpecification: sse
      ? { enabled: sse.enabled, sseType: sse.sse_type ?? undefined, kmsKeyId: sse.kms_key_native_id ?? undefined }
      : undefined,
    sourceProvisionedThroughput: throughput
      ? { readCapacityUnits: throughput.read_capacity_units, writeCapacityUnits: throughput.write_capacity_units }
      : undefined,
    sourceGlobalSecondaryIndexes: item.global_secondary_indexes.map(toSecondaryIndex),
    sourceLocalSecondaryIndexes: item.local_secondary_indexes.map(toSecondaryIndex),
    sourceGlobalTableVersion: item.global_table_version ?? undefined,
  });
}

export function toProtectionGroupBackupRecord(
  item: ProtectionGroupBackupItem,
  group: { name: string; account: string; region: string },
  s3AssetIds: string[],
  objectFilters: ObjectFilters,
): ProtectionGroupBackupRecord {
  return Object.freeze<ProtectionGroupBackupRecord>({
    resourceType: "ProtectionGroup",
    sourceBackupId: item.id,
    sourceAssetId: item.protection_group_id,
    sourceAccount: group.account,
    sourceRegion: group.region,
    sourceTags: [],
    startTimestamp: item.start_timestamp,
    expireTimestamp: item.expiration_timestamp ?? undefined,
    protectionGroupId: item.protection_group_id,
    protectionGroupName: group.name,
    s3AssetIds: [...s3AssetIds],
    objectFilters: { ...objectFilters, storageClasses: objectFilters.storageClasses && [...objectFilters.storageClasses] },
  });
}

// =============================================================================
// Narrowing
// =============================================================================

function inSourceLocation<R extends BackupRecord>(records: R[], query: BackupQuery): R[] {
  return records.filter((r) => r.sourceAccount === query.sourceAccount && r.sourceRegion === query.sourceRegion);
}

/**
 * Newest backup of every asset, in first-seen order
 */
export function keepLatestPerAsset<R extends { sourceAssetId: string; startTimestamp: string }>(records: readonly R[]): R[] {
  const latest = new Map<string, R>();
  for (const record of records) {
    const current = latest.get(record.sourceAssetId);
    if (!current || record.startTimestamp > current.startTimestamp) {
      latest.set(record.sourceAssetId, record);
    }
  }
  return records.filter((record) => latest.get(record.sourceAssetId) === record);
}

function withAssetFilter(ctx: DiscoveryContext, field: string): FilterExpression {
  return ctx.query.searchAssetId ? { ...ctx.filter, [field]: { $eq: ctx.query.searchAssetId } } : ctx.filter;
}

// =============================================================================
// Per-type discovery
// =============================================================================

type Discover = (ctx: DiscoveryContext) => Promise<BackupRecord[]>;

async function discoverEbs(ctx: DiscoveryContext): Promise<BackupRecord[]> {
  const items = await fetchAllPages(ctx.client.listEbsBackups, withAssetFilter(ctx, ASSET_FILTER_FIELDS.EBS), ctx);
  return inSourceLocation(items.map(toEbsBackupRecord), ctx.query);
}

async function discoverEc2(ctx: DiscoveryContext): Promise<BackupRecord[]> {
  const items = await fetchAllPages(ctx.client.listEc2Backups, withAssetFilter(ctx, ASSET_FILTER_FIELDS.EC2), ctx);
  return inSourceLocation(items.map(toEc2BackupRecord), ctx.query);
}

async function discoverRds(ctx: DiscoveryContext): Promise<BackupRecord[]> {
  const items = await fetchAllPages(ctx.client.listRdsBackups, withAssetFilter(ctx, ASSET_FILTER_FIELDS.RDS), ctx);
  return inSourceLocation(items.map(toRdsBackupRecord), ctx.query);
}

async function discoverDynamoDb(ctx: DiscoveryContext): Promise<BackupRecord[]> {
  const items = await fetchAllPages(
    ctx.client.listDynamoDbBackups,
    withAssetFilter(ctx, ASSET_FILTER_FIELDS.DynamoDB),
    ctx,
  );
  return inSourceLocation(items.map(toDynamoDbBackupRecord), ctx.query);
}

function selectBucketAssets(assets: ProtectionGroupS3AssetItem[], bucketNames: string[] | undefined): string[] {
  if (!bucketNames || bucketNames.length === 0) return assets.map((asset) => asset.id);

  const missing = bucketNames.filter((name) => !assets.some((asset) => asset.bucket_name === name));
  if (missing.length > 0) {
    throw new NotFoundError(`Buckets not in protection group: ${missing.join(", ")}`);
  }
  return assets.filter((asset) => bucketNames.includes(asset.bucket_name)).map((asset) => asset.id);
}

async function discoverProtectionGroup(ctx: DiscoveryContext): Promise<BackupRecord[]> {
  const { client, query, logger } = ctx;
  const name = query.protectionGroupName;
  if (!name) throw new ValidationError("protectionGroupName is required", "protectionGroupName");

  const groups = await fetchAllPages(client.listProtectionGroups, { name: { $eq: name } }, { logger });
  const group = groups.find((candidate) => candidate.name === name);
  if (!group) throw new NotFoundError(`Protection group ${name} not found`);

  const assets = await fetchAllPages(
    client.listProtectionGroupS3Assets,
    { protection_group_id: { $eq: group.id } },
    { logger },
  );
  if (assets.length === 0) throw new NotFoundError(`Protection group ${name} has no S3 assets`);
  const assetIds = selectBucketAssets(assets, query.bucketNames);

  const objectFilters: ObjectFilters = {
    ...query.objectFilters,
    latestVersionOnly: query.objectFilters?.latestVersionOnly ?? true,
  };
  const items = await fetchAllPages(
    client.listProtectionGroupBackups,
    { ...ctx.filter, protection_group_id: { $eq: group.id } },
    ctx,
  );
  return items.map((item) =>
    toProtectionGroupBackupRecord(
      item,
      { name: group.name, account: query.sourceAccount, region: query.sourceRegion },
      assetIds,
      objectFilters,
    ),
  );
}

const DISCOVERERS: Record<ResourceType, Discover> = {
  EBS: discoverEbs,
  EC2: discoverEc2,
  RDS: discoverRds,
  DynamoDB: discoverDynamoDb,
  ProtectionGroup: discoverProtectionGroup,
};

// =============================================================================
// Entry Point
// =============================================================================

/**
 * Find the backups matching a query.
 *
 * Fails with TooManyResultsError rather than truncating when more than
 * `maxResults` records remain after filtering.
 */
export async function discoverBackups(
  client: BackupApiClient,
  query: BackupQuery,
  options: DiscoverBackupsOptions = {},
): Promise<BackupRecord[]> {
  if (!query.sourceAccount) throw new ValidationError("sourceAccount is required", "sourceAccount");
  if (!query.sourceRegion) throw new ValidationError("sourceRegion is required", "sourceRegion");

  const logger = (options.logger ?? silentLogger).withContext({
    resourceType: query.resourceType,
    region: query.sourceRegion,
  });
  const { sort, filter } = getSortAndTimestampFilter(
    query.searchDirection,
    query.startSearchDayOffset ?? 1,
    query.endSearchDayOffset ?? 0,
    options.now,
  );

  logger.info(`Listing ${query.resourceType} backups`);
  let records = await DISCOVERERS[query.resourceType]({ client, query, sort, filter, logger });
  logger.info(`Found ${records.length} backup records before tag filtering`);

  records = filterByTag(records, query.searchTagKey, query.searchTagValue);
  if (query.latestOnly ?? query.resourceType === "ProtectionGroup") records = keepLatestPerAsset(records);
  logger.info(`Found ${records.length} backup records after filtering`);

  const maxResults = options.maxResults ?? 1000;
  if (records.length > maxResults) throw new TooManyResultsError(records.length, maxResults);
  return records;
}
