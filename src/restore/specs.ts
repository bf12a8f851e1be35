/**
 * Operator input: per-type target specs and default input.
 *
 * Every field is optional; resolution decides which ones a restore needs.
 */

import { z } from "zod";
import { ValidationError } from "../errors.js";
import type { ResourceType } from "../types.js";

const optionalText = z.string().trim().optional();
const idList = z.array(z.string().min(1)).optional();

/** Tags added to the restored resource, keyed by tag key */
export const appendTagsSchema = z.record(z.string(), z.string());

export const ebsTargetSpecSchema = z
  .object({
    targetRegion: optionalText,
    targetAz: optionalText,
    targetVolumeType: optionalText,
    targetIops: z.number().int().nonnegative().optional(),
    targetKmsKeyId: optionalText,
    appendTags: appendTagsSchema.optional(),
  })
  .strict();

export const ec2TargetSpecSchema = z
  .object({
    targetRegion: optionalText,
    targetAz: optionalText,
    targetVpcId: optionalText,
    targetSubnetId: optionalText,
    targetSecurityGroupIds: idList,
    targetKmsKeyId: optionalText,
    targetKeyPairName: optionalText,
    targetIamInstanceProfileName: optionalText,
    appendTags: appendTagsSchema.optional(),
  })
  .strict();

export const rdsTargetSpecSchema = z
  .object({
    targetRegion: optionalText,
    targetName: optionalText,
    targetSubnetGroupName: optionalText,
    targetSecurityGroupIds: idList,
    targetKmsKeyId: optionalText,
    targetInstanceClass: optionalText,
    appendTags: appendTagsSchema.optional(),
  })
  .strict();

export const dynamoDbTargetSpecSchema = z
  .object({
    targetRegion: optionalText,
    targetTableName: optionalText,
    /** Suffix appended to the source table name when no name is given */
    changeSetName: optionalText,
    appendTags: appendTagsSchema.optional(),
  })
  .strict();

export const protectionGroupTargetSpecSchema = z
  .object({
    targetRegion: optionalText,
    targetBucket: optionalText,
    targetPrefix: optionalText,
    overwrite: z.boolean().optional(),
    restoreOriginalStorageClass: z.boolean().optional(),
  })
  .strict();

/**
 * The operator's target document: one spec per resource type and the
 * account restores go to.
 */
export const targetSpecsSchema = z
  .object({
    targetAccount: optionalText,
    EBS: ebsTargetSpecSchema.optional(),
    EC2: ec2TargetSpecSchema.optional(),
    RDS: rdsTargetSpecSchema.optional(),
    DynamoDB: dynamoDbTargetSpecSchema.optional(),
    ProtectionGroup: protectionGroupTargetSpecSchema.optional(),
  })
  .strict();

/**
 * Fallback values for fields resolution could not fill
 */
export const defaultInputSchema = z
  .object({
    EBS: z.object({ targetAz: optionalText, targetVolumeType: optionalText }).strict().optional(),
    EC2: z
      .object({
        targetAz: optionalText,
        targetSubnetId: optionalText,
        targetKeyPairName: optionalText,
        targetIamInstanceProfileName: optionalText,
      })
      .strict()
      .optional(),
    RDS: z.object({ targetName: optionalText }).strict().optional(),
    DynamoDB: z.object({ targetTableName: optionalText }).strict().optional(),
    ProtectionGroup: z.object({ targetBucket: optionalText }).strict().optional(),
  })
  .strict();

export type AppendTags = z.infer<typeof appendTagsSchema>;
export type EbsTargetSpec = z.infer<typeof ebsTargetSpecSchema>;
export type Ec2TargetSpec = z.infer<typeof ec2TargetSpecSchema>;
export type RdsTargetSpec = z.infer<typeof rdsTargetSpecSchema>;
export type DynamoDbTargetSpec = z.infer<typeof dynamoDbTargetSpecSchema>;
export type ProtectionGroupTargetSpec = z.infer<typeof protectionGroupTargetSpecSchema>;
export type TargetSpecs = z.infer<typeof targetSpecsSchema>;
export type DefaultInput = z.infer<typeof defaultInputSchema>;

export type TargetSpecOf<T extends ResourceType> = NonNullable<TargetSpecs[T]>;

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

export function parseTargetSpecs(raw: unknown): TargetSpecs {
  const result = targetSpecsSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(`Invalid target specs: ${formatIssues(result.error)}`, result.error.issues[0]?.path.join("."));
  }
  return result.data;
}

export function parseDefaultInput(raw: unknown): DefaultInput {
  const result = defaultInputSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(`Invalid default input: ${formatIssues(result.error)}`, result.error.issues[0]?.path.join("."));
  }
  return result.data;
}
