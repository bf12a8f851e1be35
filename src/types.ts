/**
 * Bulk Restore Types
 *
 * Shared domain types: resource types, backup records, resolved target
 * specs, restore requests and task handles.
 */

// =============================================================================
// Resource Types
// =============================================================================

/**
 * Resource types that can be discovered and restored
 */
export const RESOURCE_TYPES = ["EBS", "EC2", "RDS", "DynamoDB", "ProtectionGroup"] as const;

export type ResourceType = (typeof RESOURCE_TYPES)[number];

export function isResourceType(value: string): value is ResourceType {
  return RESOURCE_TYPES.some((type) => type === value);
}

/**
 * Marker for a target field that must be filled from the operator's default input
 */
export const FOLLOW_DEFAULT_INPUT = "FOLLOW_DEFAULT_INPUT";

/**
 * Volume types for which an IOPS value may be set
 */
export const IOPS_VOLUME_TYPES: readonly string[] = ["gp3", "io1", "io2"];

// =============================================================================
// Filters
// =============================================================================

export type FilterScalar = string | number | boolean;

/**
 * Comparison operators over one field
 */
export type FilterCondition = {
  $eq?: FilterScalar;
  $in?: FilterScalar[];
  $contains?: FilterScalar;
  $all?: FilterScalar[];
  $gt?: FilterScalar;
  $lte?: FilterScalar;
};

/**
 * Filter over named fields; all top-level keys are AND-ed
 */
export type FilterExpression = Record<string, FilterCondition>;

export type SearchDirection = "before" | "after";

// =============================================================================
// Backup Records
// =============================================================================

export type Tag = {
  key: string;
  value: string;
};

type BackupRecordBase = {
  /** Backup identifier in the backup service */
  sourceBackupId: string;
  /** Volume, instance, resource, table or protection group identifier */
  sourceAssetId: string;
  sourceAccount: string;
  sourceRegion: string;
  sourceTags: Tag[];
  startTimestamp: string;
  expireTimestamp?: string;
};

export type EbsBackupRecord = BackupRecordBase & {
  resourceType: "EBS";
  sourceVolumeId: string;
  sourceEncrypted: boolean;
  sourceAz: string;
  sourceKmsKeyId?: string;
  sourceVolumeType: string;
  sourceIops?: number;
};

export type Ec2NetworkInterface = {
  deviceIndex: number;
  subnetId: string;
  securityGroupIds: string[];
};

export type Ec2AttachedVolume = {
  /** Device name, e.g. /dev/xvda */
  name: string;
  volumeId: string;
  kmsKeyId?: string;
  tags: Tag[];
};

export type Ec2BackupRecord = BackupRecordBase & {
  resourceType: "EC2";
  sourceInstanceId: string;
  sourceAmiId?: string;
  sourceAz: string;
  sourceVpcId: string;
  sourceKeyPairName?: string;
  sourceIamInstanceProfileName?: string;
  sourceNetworkInterfaces: Ec2NetworkInterface[];
  sourceEbsVolumes: Ec2AttachedVolume[];
};

export type RdsInstance = {
  name: string;
  instanceClass: string;
  isPubliclyAccessible: boolean;
};

export type RdsBackupRecord = BackupRecordBase & {
  resourceType: "RDS";
  sourceResourceId: string;
  sourceEngine: string;
  sourceEngineVersion: string;
  sourceSubnetGroupName?: string;
  sourceSecurityGroupIds: string[];
  sourceKmsKeyId?: string;
  sourceInstances: RdsInstance[];
};

export type DynamoDbKeySchemaElement = {
  attributeName: string;
  keyType: string;
};

export type DynamoDbProjection = {
  projectionType: string;
  nonKeyAttributes?: string[];
};

export type DynamoDbThroughput = {
  readCapacityUnits: number;
  writeCapacityUnits: number;
};

export type DynamoDbSecondaryIndex = {
  indexName: string;
  keySchema: DynamoDbKeySchemaElement[];
  projection: DynamoDbProjection;
  provisionedThroughput?: DynamoDbThroughput;
};

export type DynamoDbSseSpecification = {
  enabled: boolean;
  sseType?: string;
  kmsKeyId?: string;
};

export type DynamoDbBackupRecord = BackupRecordBase & {
  resourceType: "DynamoDB";
  sourceTableName: string;
  sourceTableId: string;
  sourceBillingMode?: string;
  sourceTableClass?: string;
  sourceSseSpecification?: DynamoDbSseSpecification;
  sourceProvisionedThroughput?: DynamoDbThroughput;
  sourceGlobalSecondaryIndexes: DynamoDbSecondaryIndex[];
  sourceLocalSecondaryIndexes: DynamoDbSecondaryIndex[];
  sourceGlobalTableVersion?: string;
};

export type ObjectFilters = {
  latestVersionOnly: boolean;
  prefix?: string;
  storageClasses?: string[];
  beforeTimestamp?: string;
  afterTimestamp?: string;
};

export type ProtectionGroupBackupRecord = BackupRecordBase & {
  resourceType: "ProtectionGroup";
  protectionGroupId: string;
  protectionGroupName: string;
  s3AssetIds: string[];
  objectFilters: ObjectFilters;
};

export type BackupRecord =
  | EbsBackupRecord
  | Ec2BackupRecord
  | RdsBackupRecord
  | DynamoDbBackupRecord
  | ProtectionGroupBackupRecord;

export type BackupRecordOf<T extends ResourceType> = Extract<BackupRecord, { resourceType: T }>;

// =============================================================================
// Resolved Target Specs
// =============================================================================

type ResolvedTargetBase = {
  targetAccount: string;
  targetRegion: string;
};

export type ResolvedEbsTarget = ResolvedTargetBase & {
  resourceType: "EBS";
  targetAz: string;
  targetVolumeType: string;
  targetIops: number;
  targetKmsKeyId?: string;
  tags: Tag[];
};

export type ResolvedEc2Target = ResolvedTargetBase & {
  resourceType: "EC2";
  targetAz: string;
  targetVpcId: string;
  targetSubnetId: string;
  /** Unset means each interface keeps its own source security groups */
  targetSecurityGroupIds?: string[];
  /** Unset means each volume keeps its own source key */
  targetKmsKeyId?: string;
  targetKeyPairName?: string;
  targetIamInstanceProfileName?: string;
  tags: Tag[];
};

export type ResolvedRdsTarget = ResolvedTargetBase & {
  resourceType: "RDS";
  targetName: string;
  targetSubnetGroupName?: string;
  targetSecurityGroupIds: string[];
  targetKmsKeyId?: string;
  targetInstanceClass?: string;
  tags: Tag[];
};

export type ResolvedDynamoDbTarget = ResolvedTargetBase & {
  resourceType: "DynamoDB";
  targetTableName: string;
  tags: Tag[];
};

export type ResolvedProtectionGroupTarget = ResolvedTargetBase & {
  resourceType: "ProtectionGroup";
  targetBucket: string;
  targetPrefix?: string;
  overwrite: boolean;
  restoreOriginalStorageClass: boolean;
};

export type ResolvedTargetSpec =
  | ResolvedEbsTarget
  | ResolvedEc2Target
  | ResolvedRdsTarget
  | ResolvedDynamoDbTarget
  | ResolvedProtectionGroupTarget;

export type ResolvedTargetOf<T extends ResourceType> = Extract<ResolvedTargetSpec, { resourceType: T }>;

/**
 * A discovered backup paired with the target it will be restored into
 */
export type RestorePlanEntry = {
  [T in ResourceType]: {
    resourceType: T;
    record: BackupRecordOf<T>;
    target: ResolvedTargetOf<T>;
    crossAccount: boolean;
  };
}[ResourceType];

export type RestorePlanEntryOf<T extends ResourceType> = Extract<RestorePlanEntry, { resourceType: T }>;

// =============================================================================
// Restore Requests (backend wire shapes)
// =============================================================================

export type WireTag = {
  key: string;
  value: string;
};

export type EbsRestoreBody = {
  source: { backup_id: string };
  target: {
    environment_id: string;
    aws_az: string;
    type: string;
    iops?: number;
    kms_key_native_id?: string;
    tags: WireTag[];
  };
};

export type Ec2RestoreBody = {
  source: { backup_id: string };
  target: {
    instance_restore_target: {
      environment_id: string;
      aws_az: string;
      vpc_native_id: string;
      subnet_native_id: string;
      key_pair_name?: string;
      iam_instance_profile_name?: string;
      should_power_on: boolean;
      tags: WireTag[];
      ebs_block_device_mappings: Array<{
        name: string;
        volume_native_id: string;
        kms_key_native_id?: string;
        tags: WireTag[];
      }>;
      network_interfaces: Array<{
        device_index: number;
        subnet_native_id: string;
        security_group_native_ids: string[];
        restore_default: boolean;
        restore_from_backup: boolean;
      }>;
    };
  };
};

export type RdsRestoreBody = {
  source: { backup: { backup_id: string } };
  target: {
    environment_id: string;
    name: string;
    instance_class?: string;
    is_publicly_accessible: boolean;
    kms_key_native_id?: string;
    security_group_native_ids: string[];
    subnet_group_name?: string;
    tags: WireTag[];
  };
};

export type DynamoDbRestoreBody = {
  source: { securesync_backup_id: string };
  target: {
    environment_id: string;
    table_name: string;
    billing_mode?: string;
    table_class?: string;
    provisioned_throughput?: { read_capacity_units: number; write_capacity_units: number };
    sse_specification?: { enabled: boolean; sse_type?: string; kms_key_native_id?: string };
    global_secondary_indexes: WireSecondaryIndex[];
    local_secondary_indexes: WireSecondaryIndex[];
    tags: WireTag[];
  };
};

export type WireSecondaryIndex = {
  index_name: string;
  key_schema: Array<{ attribute_name: string; key_type: string }>;
  projection: { projection_type: string; non_key_attributes?: string[] };
  provisioned_throughput?: { read_capacity_units: number; write_capacity_units: number };
};

export type ProtectionGroupRestoreBody = {
  source: {
    backup_id: string;
    protection_group_s3_asset_ids: string[];
    object_filters: {
      latest_version_only: boolean;
      prefix?: string;
      storage_classes?: string[];
      before_timestamp?: string;
      after_timestamp?: string;
    };
  };
  target: {
    bucket_id: string;
    environment_id: string;
    prefix?: string;
    overwrite: boolean;
    restore_original_storage_class: boolean;
  };
};

export type RestoreRequest =
  | { resourceType: "EBS"; sourceBackupId: string; body: EbsRestoreBody }
  | { resourceType: "EC2"; sourceBackupId: string; body: Ec2RestoreBody }
  | { resourceType: "RDS"; sourceBackupId: string; body: RdsRestoreBody }
  | { resourceType: "DynamoDB"; sourceBackupId: string; body: DynamoDbRestoreBody }
  | { resourceType: "ProtectionGroup"; sourceBackupId: string; body: ProtectionGroupRestoreBody };

export type RestoreRequestOf<T extends ResourceType> = Extract<RestoreRequest, { resourceType: T }>;

// =============================================================================
// Tasks
// =============================================================================

/**
 * Task statuses reported by the backup service
 */
export type TaskStatus = "queued" | "in_progress" | "completed" | "failed" | "aborted";

export type TaskState = "pending" | "completed" | "failed" | "aborted";

export type RestoreTask = {
  taskId: string;
};

export type TaskPollResult =
  | { state: "completed"; taskId: string; polls: number; lastStatus: string }
  | { state: "timed-out"; taskId: string; polls: number; lastStatus?: string; reason: "budget-exhausted" | "aborted" };
