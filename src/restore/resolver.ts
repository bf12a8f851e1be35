/**
 * Target Spec Resolution
 *
 * Each field resolves on its own: the operator's explicit value, else the
 * source value (same account only), else a cross-account failure for
 * network and encryption fields, else the FOLLOW_DEFAULT_INPUT marker for
 * default input to fill.
 */

import { appendTagsToSourceTags } from "../discovery/tags.js";
import { ValidationError } from "../errors.js";
import {
  FOLLOW_DEFAULT_INPUT,
  IOPS_VOLUME_TYPES,
  type BackupRecordOf,
  type DynamoDbBackupRecord,
  type EbsBackupRecord,
  type Ec2BackupRecord,
  type ProtectionGroupBackupRecord,
  type RdsBackupRecord,
  type ResolvedDynamoDbTarget,
  type ResolvedEbsTarget,
  type ResolvedEc2Target,
  type ResolvedProtectionGroupTarget,
  type ResolvedRdsTarget,
  type ResolvedTargetOf,
  type ResourceType,
} from "../types.js";
import type {
  DynamoDbTargetSpec,
  EbsTargetSpec,
  Ec2TargetSpec,
  ProtectionGroupTargetSpec,
  RdsTargetSpec,
  TargetSpecOf,
} from "./specs.js";

/** Uniform number in [0, 1) */
export type RandomSource = () => number;

export type ResolveContext = {
  targetAccount: string;
  crossAccount: boolean;
  random?: RandomSource;
};

export const RDS_NAME_SUFFIX_LENGTH = 3;

const LOWERCASE = "abcdefghijklmnopqrstuvwxyz";

export function randomSuffix(length: number, random: RandomSource = Math.random): string {
  let suffix = "";
  for (let i = 0; i < length; i += 1) {
    suffix += LOWERCASE.charAt(Math.min(LOWERCASE.length - 1, Math.floor(random() * LOWERCASE.length)));
  }
  return suffix;
}

// =============================================================================
// Field Helpers
// =============================================================================

function explicit(value: string | undefined): string | undefined {
  return value && value !== FOLLOW_DEFAULT_INPUT ? value : undefined;
}

function explicitList(value: string[] | undefined): string[] | undefined {
  return value && value.length > 0 ? [...value] : undefined;
}

function crossAccountRequired(field: string, resourceType: ResourceType): never {
  throw new ValidationError(`${field} must be filled for cross-account ${resourceType} restore`, field);
}

/** Explicit, else the source value in the same account, else the marker */
function inherit(ctx: ResolveContext, value: string | undefined, source: string | undefined): string {
  return explicit(value) ?? (ctx.crossAccount ? FOLLOW_DEFAULT_INPUT : source ?? FOLLOW_DEFAULT_INPUT);
}

/** Like inherit, but a field the source never had stays unset */
function inheritOptional(ctx: ResolveContext, value: string | undefined, source: string | undefined): string | undefined {
  const given = explicit(value);
  if (given) return given;
  if (!source) return undefined;
  return ctx.crossAccount ? FOLLOW_DEFAULT_INPUT : source;
}

function targetLocation(ctx: ResolveContext, targetRegion: string | undefined, sourceRegion: string) {
  return { targetAccount: ctx.targetAccount, targetRegion: explicit(targetRegion) ?? sourceRegion };
}

// =============================================================================
// Per-type Resolvers
// =============================================================================

/**
 * Explicit IOPS only apply to provisioned volume types. A type still marked
 * for default input is checked again once it is filled.
 */
export function assertIopsVolumeType(volumeType: string, iops: number): void {
  if (iops > 0 && volumeType !== FOLLOW_DEFAULT_INPUT && !IOPS_VOLUME_TYPES.includes(volumeType)) {
    throw new ValidationError(
      `targetIops is only valid for volume types ${IOPS_VOLUME_TYPES.join(", ")}, not ${volumeType}`,
      "targetIops",
    );
  }
}

export function resolveEbsTarget(spec: EbsTargetSpec, record: EbsBackupRecord, ctx: ResolveContext): ResolvedEbsTarget {
  const targetVolumeType = inherit(ctx, spec.targetVolumeType, record.sourceVolumeType);

  let targetIops = 0;
  if (spec.targetIops !== undefined && spec.targetIops > 0) {
    assertIopsVolumeType(targetVolumeType, spec.targetIops);
    targetIops = spec.targetIops;
  } else if (IOPS_VOLUME_TYPES.includes(targetVolumeType) && !ctx.crossAccount) {
    targetIops = record.sourceIops ?? 0;
  }

  let targetKmsKeyId = explicit(spec.targetKmsKeyId);
  if (!targetKmsKeyId) {
    if (ctx.crossAccount && record.sourceEncrypted) crossAccountRequired("targetKmsKeyId", "EBS");
    targetKmsKeyId = ctx.crossAccount ? undefined : record.sourceKmsKeyId;
  }

  return {
    resourceType: "EBS",
    ...targetLocation(ctx, spec.targetRegion, record.sourceRegion),
    targetAz: inherit(ctx, spec.targetAz, record.sourceAz),
    targetVolumeType,
    targetIops,
    targetKmsKeyId,
    tags: appendTagsToSourceTags(record.sourceTags, spec.appendTags),
  };
}

export function resolveEc2Target(spec: Ec2TargetSpec, record: Ec2BackupRecord, ctx: ResolveContext): ResolvedEc2Target {
  const cross = ctx.crossAccount;

  const targetVpcId = explicit(spec.targetVpcId) ?? (cross ? crossAccountRequired("targetVpcId", "EC2") : record.sourceVpcId);
  const targetSubnetId =
    explicit(spec.targetSubnetId) ??
    (cross
      ? crossAccountRequired("targetSubnetId", "EC2")
      : record.sourceNetworkInterfaces[0]?.subnetId ?? FOLLOW_DEFAULT_INPUT);
  const targetSecurityGroupIds =
    explicitList(spec.targetSecurityGroupIds) ?? (cross ? crossAccountRequired("targetSecurityGroupIds", "EC2") : undefined);

  const encrypted = record.sourceEbsVolumes.some((volume) => volume.kmsKeyId);
  const targetKmsKeyId =
    explicit(spec.targetKmsKeyId) ?? (cross && encrypted ? crossAccountRequired("targetKmsKeyId", "EC2") : undefined);

  return {
    resourceType: "EC2",
    ...targetLocation(ctx, spec.targetRegion, record.sourceRegion),
    targetAz: inherit(ctx, spec.targetAz, record.sourceAz),
    targetVpcId,
    targetSubnetId,
    targetSecurityGroupIds,
    targetKmsKeyId,
    targetKeyPairName: inheritOptional(ctx, spec.targetKeyPairName, record.sourceKeyPairName),
    targetIamInstanceProfileName: inheritOptional(
      ctx,
      spec.targetIamInstanceProfileName,
      record.sourceIamInstanceProfileName,
    ),
    tags: appendTagsToSourceTags(record.sourceTags, spec.appendTags),
  };
}

export function resolveRdsTarget(spec: RdsTargetSpec, record: RdsBackupRecord, ctx: ResolveContext): ResolvedRdsTarget {
  const cross = ctx.crossAccount;

  const targetName =
    explicit(spec.targetName) ??
    (cross ? FOLLOW_DEFAULT_INPUT : `${record.sourceResourceId}-${randomSuffix(RDS_NAME_SUFFIX_LENGTH, ctx.random)}`);
  const targetSubnetGroupName =
    explicit(spec.targetSubnetGroupName) ??
    (cross ? crossAccountRequired("targetSubnetGroupName", "RDS") : record.sourceSubnetGroupName);
  const targetSecurityGroupIds =
    explicitList(spec.targetSecurityGroupIds) ??
    (cross ? crossAccountRequired("targetSecurityGroupIds", "RDS") : [...record.sourceSecurityGroupIds]);

  let targetKmsKeyId = explicit(spec.targetKmsKeyId);
  if (!targetKmsKeyId) {
    if (cross && record.sourceKmsKeyId) crossAccountRequired("targetKmsKeyId", "RDS");
    targetKmsKeyId = cross ? undefined : record.sourceKmsKeyId;
  }

  return {
    resourceType: "RDS",
    ...targetLocation(ctx, spec.targetRegion, record.sourceRegion),
    targetName,
    targetSubnetGroupName,
    targetSecurityGroupIds,
    targetKmsKeyId,
    targetInstanceClass: explicit(spec.targetInstanceClass),
    tags: appendTagsToSourceTags(record.sourceTags, spec.appendTags),
  };
}

export function resolveDynamoDbTarget(
  spec: DynamoDbTargetSpec,
  record: DynamoDbBackupRecord,
  ctx: ResolveContext,
): ResolvedDynamoDbTarget {
  const changeSetName = explicit(spec.changeSetName);
  const targetTableName =
    explicit(spec.targetTableName) ?? (changeSetName ? `${record.sourceTableName}-${changeSetName}` : FOLLOW_DEFAULT_INPUT);

  return {
    resourceType: "DynamoDB",
    ...targetLocation(ctx, spec.targetRegion, record.sourceRegion),
    targetTableName,
    tags: appendTagsToSourceTags(record.sourceTags, spec.appendTags),
  };
}

export function resolveProtectionGroupTarget(
  spec: ProtectionGroupTargetSpec,
  record: ProtectionGroupBackupRecord,
  ctx: ResolveContext,
): ResolvedProtectionGroupTarget {
  return {
    resourceType: "ProtectionGroup",
    ...targetLocation(ctx, spec.targetRegion, record.sourceRegion),
    targetBucket: explicit(spec.targetBucket) ?? FOLLOW_DEFAULT_INPUT,
    targetPrefix: explicit(spec.targetPrefix),
    overwrite: spec.overwrite ?? true,
    restoreOriginalStorageClass: spec.restoreOriginalStorageClass ?? true,
  };
}

// =============================================================================
// Dispatch
// =============================================================================

type Resolver<T extends ResourceType> = (
  spec: TargetSpecOf<T>,
  record: BackupRecordOf<T>,
  ctx: ResolveContext,
) => ResolvedTargetOf<T>;

const RESOLVERS: { [T in ResourceType]: Resolver<T> } = {
  EBS: resolveEbsTarget,
  EC2: resolveEc2Target,
  RDS: resolveRdsTarget,
  DynamoDB: resolveDynamoDbTarget,
  ProtectionGroup: resolveProtectionGroupTarget,
};

/**
 * Resolve the target of one backup record
 */
export function resolveTargetSpec<T extends ResourceType>(
  resourceType: T,
  spec: TargetSpecOf<T>,
  record: BackupRecordOf<T>,
  ctx: ResolveContext,
): ResolvedTargetOf<T> {
  const resolve: Resolver<T> = RESOLVERS[resourceType];
  return resolve(spec, record, ctx);
}
