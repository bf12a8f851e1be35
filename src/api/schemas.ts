/**
 * Backup service response schemas.
 *
 * Only the fields the engine reads are declared; unknown fields are dropped.
 */

import { z } from "zod";

const tagSchema = z.object({
  key: z.string(),
  value: z.string().nullish().transform((v) => v ?? ""),
});

const tagsSchema = z
  .array(tagSchema)
  .nullish()
  .transform((v) => v ?? []);

const stringListSchema = z
  .array(z.string())
  .nullish()
  .transform((v) => v ?? []);

const throughputSchema = z.object({
  read_capacity_units: z.number(),
  write_capacity_units: z.number(),
});

const secondaryIndexSchema = z.object({
  index_name: z.string(),
  key_schema: z.array(z.object({ attribute_name: z.string(), key_type: z.string() })),
  projection: z.object({
    projection_type: z.string(),
    non_key_attributes: z.array(z.string()).nullish(),
  }),
  provisioned_throughput: throughputSchema.nullish(),
});

// =============================================================================
// Pages
// =============================================================================

export const pageSchema = z.object({
  total_count: z.number().int().nonnegative().nullish(),
  total_pages_count: z.number().int().nonnegative().nullish(),
  current_count: z.number().int().nonnegative().nullish(),
  _embedded: z
    .object({ items: z.array(z.unknown()).nullish() })
    .nullish(),
});

// =============================================================================
// Backups
// =============================================================================

export const ebsBackupItemSchema = z.object({
  id: z.string(),
  volume_native_id: z.string(),
  account_native_id: z.string(),
  aws_region: z.string(),
  aws_az: z.string(),
  is_encrypted: z.boolean().nullish(),
  kms_key_native_id: z.string().nullish(),
  type: z.string(),
  iops: z.number().int().nullish(),
  tags: tagsSchema,
  start_timestamp: z.string(),
  expiration_timestamp: z.string().nullish(),
});

export const ec2BackupItemSchema = z.object({
  id: z.string(),
  instance_native_id: z.string(),
  account_native_id: z.string(),
  aws_region: z.string(),
  aws_az: z.string(),
  vpc_native_id: z.string(),
  key_pair_name: z.string().nullish(),
  iam_instance_profile: z.string().nullish(),
  ami: z.object({ ami_native_id: z.string() }).nullish(),
  network_interfaces: z
    .array(
      z.object({
        device_index: z.number().int(),
        subnet_native_id: z.string(),
        security_group_native_ids: stringListSchema,
      }),
    )
    .nullish()
    .transform((v) => v ?? []),
  attached_backup_ebs_volumes: z
    .array(
      z.object({
        name: z.string(),
        volume_native_id: z.string(),
        kms_key_native_id: z.string().nullish(),
        tags: tagsSchema,
      }),
    )
    .nullish()
    .transform((v) => v ?? []),
  tags: tagsSchema,
  start_timestamp: z.string(),
  expiration_timestamp: z.string().nullish(),
});

export const rdsBackupItemSchema = z.object({
  id: z.string(),
  resource_id: z.string(),
  account_native_id: z.string(),
  aws_region: z.string(),
  engine: z.string(),
  engine_version: z.string(),
  subnet_group_name: z.string().nullish(),
  security_group_native_ids: stringListSchema,
  kms_key_native_id: z.string().nullish(),
  instances: z
    .array(
      z.object({
        name: z.string(),
        class: z.string(),
        is_publicly_accessible: z.boolean(),
      }),
    )
    .nullish()
    .transform((v) => v ?? []),
  tags: tagsSchema,
  start_timestamp: z.string(),
  expiration_timestamp: z.string().nullish(),
});

export const dynamoDbBackupItemSchema = z.object({
  id: z.string(),
  table_name: z.string(),
  table_id: z.string(),
  account_native_id: z.string(),
  aws_region: z.string(),
  billing_mode: z.string().nullish(),
  table_class: z.string().nullish(),
  sse_specification: z
    .object({
      enabled: z.boolean(),
      sse_type: z.string().nullish(),
      kms_key_native_id: z.string().nullish(),
    })
    .nullish(),
  provisioned_throughput: throughputSchema.nullish(),
  global_secondary_indexes: z
    .array(secondaryIndexSchema)
    .nullish()
    .transform((v) => v ?? []),
  local_secondary_indexes: z
    .array(secondaryIndexSchema)
    .nullish()
    .transform((v) => v ?? []),
  global_table_version: z.string().nullish(),
  tags: tagsSchema,
  start_timestamp: z.string(),
  expiration_timestamp: z.string().nullish(),
});

export const protectionGroupBackupItemSchema = z.object({
  id: z.string(),
  protection_group_id: z.string(),
  start_timestamp: z.string(),
  expiration_timestamp: z.string().nullish(),
});

// =============================================================================
// Data Sources
// =============================================================================

export const environmentItemSchema = z.object({
  id: z.string(),
  account_native_id: z.string(),
  aws_region: z.string(),
});

export const s3BucketItemSchema = z.object({
  id: z.string(),
  name: z.string(),
  environment_id: z.string(),
  account_native_id: z.string().nullish(),
  aws_region: z.string().nullish(),
});

export const protectionGroupItemSchema = z.object({
  id: z.string(),
  name: z.string(),
});

export const protectionGroupS3AssetItemSchema = z.object({
  id: z.string(),
  bucket_name: z.string(),
  protection_group_id: z.string(),
});

export const assetItemSchema = z.object({
  id: z.string(),
});

// =============================================================================
// Tasks & Restores
// =============================================================================

export const taskItemSchema = z.object({
  id: z.string(),
  status: z.string(),
});

export const restoreResponseSchema = z.object({
  task_id: z.string().min(1),
});

export type EbsBackupItem = z.infer<typeof ebsBackupItemSchema>;
export type Ec2BackupItem = z.infer<typeof ec2BackupItemSchema>;
export type RdsBackupItem = z.infer<typeof rdsBackupItemSchema>;
export type DynamoDbBackupItem = z.infer<typeof dynamoDbBackupItemSchema>;
export type ProtectionGroupBackupItem = z.infer<typeof protectionGroupBackupItemSchema>;
export type EnvironmentItem = z.infer<typeof environmentItemSchema>;
export type S3BucketItem = z.infer<typeof s3BucketItemSchema>;
export type ProtectionGroupItem = z.infer<typeof protectionGroupItemSchema>;
export type ProtectionGroupS3AssetItem = z.infer<typeof protectionGroupS3AssetItemSchema>;
export type AssetItem = z.infer<typeof assetItemSchema>;
export type TaskItem = z.infer<typeof taskItemSchema>;
