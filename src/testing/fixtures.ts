/**
 * Backup service items for tests
 */

import type {
  DynamoDbBackupItem,
  EbsBackupItem,
  Ec2BackupItem,
  ProtectionGroupBackupItem,
  RdsBackupItem,
} from "../api/schemas.js";

export const SOURCE_ACCOUNT = "111111111111";
export const TARGET_ACCOUNT = "222222222222";
export const SOURCE_REGION = "us-east-1";

export function ebsBackupItem(overrides: Partial<EbsBackupItem> = {}): EbsBackupItem {
  return {
    id: "ebs-backup-1",
    volume_native_id: "vol-0001",
    account_native_id: SOURCE_ACCOUNT,
    aws_region: SOURCE_REGION,
    aws_az: "us-east-1a",
    is_encrypted: false,
    type: "gp2",
    iops: 100,
    tags: [{ key: "env", value: "prod" }],
    start_timestamp: "2026-10-17T08:00:00Z",
    expiration_timestamp: "2026-11-17T08:00:00Z",
    ...overrides,
  };
}

export function ec2BackupItem(overrides: Partial<Ec2BackupItem> = {}): Ec2BackupItem {
  return {
    id: "ec2-backup-1",
    instance_native_id: "i-0001",
    account_native_id: SOURCE_ACCOUNT,
    aws_region: SOURCE_REGION,
    aws_az: "us-east-1b",
    vpc_native_id: "vpc-source",
    key_pair_name: "ops-key",
    iam_instance_profile: "app-profile",
    ami: { ami_native_id: "ami-0001" },
    network_interfaces: [
      { device_index: 0, subnet_native_id: "subnet-a", security_group_native_ids: ["sg-web"] },
      { device_index: 1, subnet_native_id: "subnet-b", security_group_native_ids: ["sg-admin"] },
    ],
    attached_backup_ebs_volumes: [
      { name: "/dev/xvda", volume_native_id: "vol-root", kms_key_native_id: null, tags: [] },
      { name: "/dev/xvdb", volume_native_id: "vol-data", kms_key_native_id: "kms-source", tags: [{ key: "disk", value: "data" }] },
    ],
    tags: [{ key: "env", value: "prod" }],
    start_timestamp: "2026-10-17T09:00:00Z",
    expiration_timestamp: null,
    ...overrides,
  };
}

export function rdsBackupItem(overrides: Partial<RdsBackupItem> = {}): RdsBackupItem {
  return {
    id: "rds-backup-1",
    resource_id: "orders-db",
    account_native_id: SOURCE_ACCOUNT,
    aws_region: SOURCE_REGION,
    engine: "aurora-postgresql",
    engine_version: "15.4",
    subnet_group_name: "db-subnets",
    security_group_native_ids: ["sg-db"],
    kms_key_native_id: null,
    instances: [
      { name: "orders-db-1", class: "db.r6g.large", is_publicly_accessible: true },
      { name: "orders-db-2", class: "db.r6g.large", is_publicly_accessible: false },
    ],
    tags: [{ key: "env", value: "prod" }],
    start_timestamp: "2026-10-17T10:00:00Z",
    expiration_timestamp: null,
    ...overrides,
  };
}

export function dynamoDbBackupItem(overrides: Partial<DynamoDbBackupItem> = {}): DynamoDbBackupItem {
  return {
    id: "ddb-backup-1",
    table_name: "orders",
    table_id: "table-0001",
    account_native_id: SOURCE_ACCOUNT,
    aws_region: SOURCE_REGION,
    billing_mode: "PROVISIONED",
    table_class: "STANDARD",
    sse_specification: { enabled: true, sse_type: "KMS", kms_key_native_id: "kms-table" },
    provisioned_throughput: { read_capacity_units: 5, write_capacity_units: 10 },
    global_secondary_indexes: [
      {
        index_name: "by-customer",
        key_schema: [{ attribute_name: "customer_id", key_type: "HASH" }],
        projection: { projection_type: "INCLUDE", non_key_attributes: ["total"] },
        provisioned_throughput: { read_capacity_units: 1, write_capacity_units: 1 },
      },
    ],
    local_secondary_indexes: [],
    global_table_version: null,
    tags: [{ key: "env", value: "prod" }],
    start_timestamp: "2026-10-17T11:00:00Z",
    expiration_timestamp: null,
    ...overrides,
  };
}

export function protectionGroupBackupItem(
  overrides: Partial<ProtectionGroupBackupItem> = {},
): ProtectionGroupBackupItem {
  return {
    id: "pg-backup-1",
    protection_group_id: "pg-1",
    start_timestamp: "2026-10-17T12:00:00Z",
    expiration_timestamp: null,
    ...overrides,
  };
}
