/**
 * Input Validator
 *
 * Fills target fields that resolution left empty or marked
 * FOLLOW_DEFAULT_INPUT from the operator's default input. A mandatory field
 * with no default fails the plan; optional fields only replace the marker.
 */

import { ValidationError } from "../errors.js";
import { FOLLOW_DEFAULT_INPUT, type ResourceType, type RestorePlanEntry } from "../types.js";
import { assertIopsVolumeType } from "./resolver.js";
import type { DefaultInput } from "./specs.js";

type FieldRule = {
  field: string;
  /** Mandatory fields must end up with a value */
  required: boolean;
};

/**
 * Fields default input may supply, per resource type
 */
export const DEFAULTABLE_FIELDS: { [T in ResourceType]: readonly FieldRule[] } = {
  EBS: [
    { field: "targetAz", required: true },
    { field: "targetVolumeType", required: true },
  ],
  EC2: [
    { field: "targetAz", required: true },
    { field: "targetSubnetId", required: true },
    { field: "targetKeyPairName", required: false },
    { field: "targetIamInstanceProfileName", required: false },
  ],
  RDS: [{ field: "targetName", required: true }],
  DynamoDB: [{ field: "targetTableName", required: true }],
  ProtectionGroup: [{ field: "targetBucket", required: true }],
};

function isEmpty(value: unknown): boolean {
  return (
    value === undefined ||
    value === null ||
    value === "" ||
    value === FOLLOW_DEFAULT_INPUT ||
    (Array.isArray(value) && value.length === 0)
  );
}

function readField(source: object | undefined, field: string): unknown {
  if (!source) return undefined;
  return Object.entries(source).find(([key]) => key === field)?.[1];
}

/**
 * Returns the fields of one target to overwrite, or throws on a mandatory
 * field nothing can fill
 */
export function collectDefaults(
  resourceType: ResourceType,
  target: object,
  defaults: DefaultInput | undefined,
): Record<string, string> {
  const fallback = defaults?.[resourceType];
  const filled: Record<string, string> = {};

  for (const { field, required } of DEFAULTABLE_FIELDS[resourceType]) {
    const current = readField(target, field);
    const needsInput = required ? isEmpty(current) : current === FOLLOW_DEFAULT_INPUT;
    if (!needsInput) continue;

    const value = readField(fallback, field);
    if (typeof value === "string" && !isEmpty(value)) {
      filled[field] = value;
    } else if (required) {
      throw new ValidationError(`${field} is required for ${resourceType} restore and has no default input`, field);
    } else {
      throw new ValidationError(
        `${field} was inherited from another account; set it in the ${resourceType} target spec or default input`,
        field,
      );
    }
  }

  return filled;
}

/**
 * Apply default input to every plan entry. Entries are copied; explicit
 * values are never replaced.
 */
export function applyDefaultInput(entries: readonly RestorePlanEntry[], defaults?: DefaultInput): RestorePlanEntry[] {
  return entries.map((entry) => {
    const filled = collectDefaults(entry.resourceType, entry.target, defaults);
    if (Object.keys(filled).length === 0) return entry;
    return withTarget(entry, filled);
  });
}

function withTarget(entry: RestorePlanEntry, filled: Record<string, string>): RestorePlanEntry {
  const pick = (field: string, current: string): string => filled[field] ?? current;
  const pickOptional = (field: string, current: string | undefined): string | undefined => filled[field] ?? current;

  switch (entry.resourceType) {
    case "EBS": {
      const { target } = entry;
      const targetVolumeType = pick("targetVolumeType", target.targetVolumeType);
      assertIopsVolumeType(targetVolumeType, target.targetIops);
      return {
        ...entry,
        target: { ...target, targetAz: pick("targetAz", target.targetAz), targetVolumeType },
      };
    }
    case "EC2": {
      const { target } = entry;
      return {
        ...entry,
        target: {
          ...target,
          targetAz: pick("targetAz", target.targetAz),
          targetSubnetId: pick("targetSubnetId", target.targetSubnetId),
          targetKeyPairName: pickOptional("targetKeyPairName", target.targetKeyPairName),
          targetIamInstanceProfileName: pickOptional("targetIamInstanceProfileName", target.targetIamInstanceProfileName),
        },
      };
    }
    case "RDS":
      return { ...entry, target: { ...entry.target, targetName: pick("targetName", entry.target.targetName) } };
    case "DynamoDB":
      return {
        ...entry,
        target: { ...entry.target, targetTableName: pick("targetTableName", entry.target.targetTableName) },
      };
    case "ProtectionGroup":
      return { ...entry, target: { ...entry.target, targetBucket: pick("targetBucket", entry.target.targetBucket) } };
  }
}
