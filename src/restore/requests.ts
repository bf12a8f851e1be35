/**
 * Restore Request Builder
 *
 * Pure mapping from a plan entry and its looked-up context to the backend
 * request body. Nothing here performs I/O or mutates its inputs.
 */

import { NotFoundError, ValidationError } from "../errors.js";
import {
  FOLLOW_DEFAULT_INPUT,
  type DynamoDbRestoreBody,
  type DynamoDbSecondaryIndex,
  type EbsRestoreBody,
  type Ec2RestoreBody,
  type ProtectionGroupRestoreBody,
  type RdsRestoreBody,
  type RestorePlanEntry,
  type RestorePlanEntryOf,
  type RestoreRequest,
  type RestoreRequestOf,
  type Tag,
  type WireSecondaryIndex,
  type WireTag,
} from "../types.js";

/**
 * Lookups a request needs that only the backup service can answer
 */
export type RestoreContext = {
  /** Target environment (account + region) id */
  environmentId: string;
  /** Destination bucket id, protection group restores only */
  bucketId?: string;
};

const wireTags = (tags: readonly Tag[]): WireTag[] => tags.map(({ key, value }) => ({ key, value }));

function resolved(value: string, field: string): string {
  if (value === "" || value === FOLLOW_DEFAULT_INPUT) {
    throw new ValidationError(`${field} still needs operator input`, field);
  }
  return value;
}

function resolvedOptional(value: string | undefined, field: string): string | undefined {
  return value === undefined ? undefined : resolved(value, field);
}

function toWireIndex(index: DynamoDbSecondaryIndex): WireSecondaryIndex {
  return {
    index_name: index.indexName,
    key_schema: index.keySchema.map((key) => ({ attribute_name: key.attributeName, key_type: key.keyType })),
    projection: {
      projection_type: index.projection.projectionType,
      non_key_attributes: index.projection.nonKeyAttributes && [...index.projection.nonKeyAttributes],
    },
    provisioned_throughput: index.provisionedThroughput && {
      read_capacity_units: index.provisionedThroughput.readCapacityUnits,
      write_capacity_units: index.provisionedThroughput.writeCapacityUnits,
    },
  };
}

// =============================================================================
// Per-type Builders
// =============================================================================

export function buildEbsRestoreRequest(
  { record, target }: RestorePlanEntryOf<"EBS">,
  context: RestoreContext,
): RestoreRequestOf<"EBS"> {
  const body: EbsRestoreBody = {
    source: { backup_id: record.sourceBackupId },
    target: {
      environment_id: context.environmentId,
      aws_az: resolved(target.targetAz, "targetAz"),
      type: resolved(target.targetVolumeType, "targetVolumeType"),
      iops: target.targetIops > 0 ? target.targetIops : undefined,
      kms_key_native_id: resolvedOptional(target.targetKmsKeyId, "targetKmsKeyId"),
      tags: wireTags(target.tags),
    },
  };
  return { resourceType: "EBS", sourceBackupId: record.sourceBackupId, body };
}

/**
 * Every attached volume and interface is re-derived from the source; the
 * target's subnet, security groups and KMS key override where set.
 */
export function buildEc2RestoreRequest(
  { record, target }: RestorePlanEntryOf<"EC2">,
  context: RestoreContext,
): RestoreRequestOf<"EC2"> {
  const subnetId = resolved(target.targetSubnetId, "targetSubnetId");
  const kmsKeyId = resolvedOptional(target.targetKmsKeyId, "targetKmsKeyId");

  const body: Ec2RestoreBody = {
    source: { backup_id: record.sourceBackupId },
    target: {
      instance_restore_target: {
        environment_id: context.environmentId,
        aws_az: resolved(target.targetAz, "targetAz"),
        vpc_native_id: resolved(target.targetVpcId, "targetVpcId"),
        subnet_native_id: subnetId,
        key_pair_name: resolvedOptional(target.targetKeyPairName, "targetKeyPairName"),
        iam_instance_profile_name: resolvedOptional(target.targetIamInstanceProfileName, "targetIamInstanceProfileName"),
        should_power_on: true,
        tags: wireTags(target.tags),
        ebs_block_device_mappings: record.sourceEbsVolumes.map((volume) => ({
          name: volume.name,
          volume_native_id: volume.volumeId,
          kms_key_native_id: kmsKeyId ?? volume.kmsKeyId,
          tags: wireTags(volume.tags),
        })),
        network_interfaces: record.sourceNetworkInterfaces.map((nic) => ({
          device_index: nic.deviceIndex,
          subnet_native_id: subnetId,
          security_group_native_ids: [...(target.targetSecurityGroupIds ?? nic.securityGroupIds)],
          restore_default: true,
          restore_from_backup: false,
        })),
      },
    },
  };
  return { resourceType: "EC2", sourceBackupId: record.sourceBackupId, body };
}

/**
 * Publicly accessible only when every instance of the backup was
 */
export function isPubliclyAccessible(instances: ReadonlyArray<{ isPubliclyAccessible: boolean }>): boolean {
  return instances.length > 0 && instances.every((instance) => instance.isPubliclyAccessible);
}

export function buildRdsRestoreRequest(
  { record, target }: RestorePlanEntryOf<"RDS">,
  context: RestoreContext,
): RestoreRequestOf<"RDS"> {
  const body: RdsRestoreBody = {
    source: { backup: { backup_id: record.sourceBackupId } },
    target: {
      environment_id: context.environmentId,
      name: resolved(target.targetName, "targetName"),
      instance_class: target.targetInstanceClass ?? record.sourceInstances[0]?.instanceClass,
      is_publicly_accessible: isPubliclyAccessible(record.sourceInstances),
      kms_key_native_id: resolvedOptional(target.targetKmsKeyId, "targetKmsKeyId"),
      security_group_native_ids: [...target.targetSecurityGroupIds],
      subnet_group_name: resolvedOptional(target.targetSubnetGroupName, "targetSubnetGroupName"),
      tags: wireTags(target.tags),
    },
  };
  return { resourceType: "RDS", sourceBackupId: record.sourceBackupId, body };
}

export function buildDynamoDbRestoreRequest(
  { record, target }: RestorePlanEntryOf<"DynamoDB">,
  context: RestoreContext,
): RestoreRequestOf<"DynamoDB"> {
  const sse = record.sourceSseSpecification;
  const throughput = record.sourceProvisionedThroughput;
  const body: DynamoDbRestoreBody = {
    source: { securesync_backup_id: record.sourceBackupId },
    target: {
      environment_id: context.environmentId,
      table_name: resolved(target.targetTableName, "targetTableName"),
      billing_mode: record.sourceBillingMode,
      table_class: record.sourceTableClass,
      provisioned_throughput: throughput && {
        read_capacity_units: throughput.readCapacityUnits,
        write_capacity_units: throughput.writeCapacityUnits,
      },
      sse_specification: sse && { enabled: sse.enabled, sse_type: sse.sseType, kms_key_native_id: sse.kmsKeyId },
      global_secondary_indexes: record.sourceGlobalSecondaryIndexes.map(toWireIndex),
      local_secondary_indexes: record.sourceLocalSecondaryIndexes.map(toWireIndex),
      tags: wireTags(target.tags),
    },
  };
  return { resourceType: "DynamoDB", sourceBackupId: record.sourceBackupId, body };
}

export function buildProtectionGroupRestoreRequest(
  { record, target }: RestorePlanEntryOf<"ProtectionGroup">,
  context: RestoreContext,
): RestoreRequestOf<"ProtectionGroup"> {
  if (!context.bucketId) {
    throw new NotFoundError(`Bucket ${target.targetBucket} was not resolved in ${target.targetAccount}/${target.targetRegion}`);
  }
  const filters = record.objectFilters;
  const body: ProtectionGroupRestoreBody = {
    source: {
      backup_id: record.sourceBackupId,
      protection_group_s3_asset_ids: [...record.s3AssetIds],
      object_filters: {
        latest_version_only: filters.latestVersionOnly,
        prefix: filters.prefix,
        storage_classes: filters.storageClasses && [...filters.storageClasses],
        before_timestamp: filters.beforeTimestamp,
        after_timestamp: filters.afterTimestamp,
      },
    },
    target: {
      bucket_id: context.bucketId,
      environment_id: context.environmentId,
      prefix: target.targetPrefix,
      overwrite: target.overwrite,
      restore_original_storage_class: target.restoreOriginalStorageClass,
    },
  };
  return { resourceType: "ProtectionGroup", sourceBackupId: record.sourceBackupId, body };
}

// =============================================================================
// Dispatch
// =============================================================================

export function buildRestoreRequest(entry: RestorePlanEntry, context: RestoreContext): RestoreRequest {
  switch (entry.resourceType) {
    case "EBS":
      return buildEbsRestoreRequest(entry, context);
    case "EC2":
      return buildEc2RestoreRequest(entry, context);
    case "RDS":
      return buildRdsRestoreRequest(entry, context);
    case "DynamoDB":
      return buildDynamoDbRestoreRequest(entry, context);
    case "ProtectionGroup":
      return buildProtectionGroupRestoreRequest(entry, context);
  }
}
