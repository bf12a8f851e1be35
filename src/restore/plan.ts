/**
 * Restore Planner
 *
 * Pairs every discovered backup with its resolved target, then runs the
 * default-input gate over the whole set so a plan either covers every
 * record or fails before anything is submitted.
 */

import type { Logger } from "../logging/index.js";
import type { BackupRecord, RestorePlanEntry } from "../types.js";
import { applyDefaultInput } from "./input-validator.js";
import { resolveTargetSpec, type RandomSource, type ResolveContext } from "./resolver.js";
import type { DefaultInput, TargetSpecs } from "./specs.js";

export type PlanOptions = {
  defaults?: DefaultInput;
  random?: RandomSource;
  logger?: Logger;
};

export function planEntry(record: BackupRecord, specs: TargetSpecs, random?: RandomSource): RestorePlanEntry {
  const targetAccount = specs.targetAccount || record.sourceAccount;
  const crossAccount = targetAccount !== record.sourceAccount;
  const ctx: ResolveContext = { targetAccount, crossAccount, random };

  // Each case narrows the record so the resolved target keeps its type.
  switch (record.resourceType) {
    case "EBS":
      return { resourceType: "EBS", record, target: resolveTargetSpec("EBS", specs.EBS ?? {}, record, ctx), crossAccount };
    case "EC2":
      return { resourceType: "EC2", record, target: resolveTargetSpec("EC2", specs.EC2 ?? {}, record, ctx), crossAccount };
    case "RDS":
      return { resourceType: "RDS", record, target: resolveTargetSpec("RDS", specs.RDS ?? {}, record, ctx), crossAccount };
    case "DynamoDB":
      return {
        resourceType: "DynamoDB",
        record,
        target: resolveTargetSpec("DynamoDB", specs.DynamoDB ?? {}, record, ctx),
        crossAccount,
      };
    case "ProtectionGroup":
      return {
        resourceType: "ProtectionGroup",
        record,
        target: resolveTargetSpec("ProtectionGroup", specs.ProtectionGroup ?? {}, record, ctx),
        crossAccount,
      };
  }
}

export function planRestores(
  records: readonly BackupRecord[],
  specs: TargetSpecs,
  options: PlanOptions = {},
): RestorePlanEntry[] {
  const entries = records.map((record) => planEntry(record, specs, options.random));
  const planned = applyDefaultInput(entries, options.defaults);
  options.logger?.info(`Planned ${planned.length} restores`, {
    crossAccount: planned.filter((entry) => entry.crossAccount).length,
  });
  return planned;
}
