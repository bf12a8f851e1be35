/**
 * Restore Module Index
 */

export {
  appendTagsSchema,
  defaultInputSchema,
  dynamoDbTargetSpecSchema,
  ebsTargetSpecSchema,
  ec2TargetSpecSchema,
  parseDefaultInput,
  parseTargetSpecs,
  protectionGroupTargetSpecSchema,
  rdsTargetSpecSchema,
  targetSpecsSchema,
  type AppendTags,
  type DefaultInput,
  type DynamoDbTargetSpec,
  type EbsTargetSpec,
  type Ec2TargetSpec,
  type ProtectionGroupTargetSpec,
  type RdsTargetSpec,
  type TargetSpecOf,
  type TargetSpecs,
} from "./specs.js";
export {
  RDS_NAME_SUFFIX_LENGTH,
  randomSuffix,
  resolveDynamoDbTarget,
  resolveEbsTarget,
  resolveEc2Target,
  resolveProtectionGroupTarget,
  resolveRdsTarget,
  resolveTargetSpec,
  type RandomSource,
  type ResolveContext,
} from "./resolver.js";
export {
  buildDynamoDbRestoreRequest,
  buildEbsRestoreRequest,
  buildEc2RestoreRequest,
  buildProtectionGroupRestoreRequest,
  buildRdsRestoreRequest,
  buildRestoreRequest,
  isPubliclyAccessible,
  type RestoreContext,
} from "./requests.js";
export { createContextCache, prepareRestoreContext } from "./context.js";
export { DEFAULTABLE_FIELDS, applyDefaultInput, collectDefaults } from "./input-validator.js";
export { planEntry, planRestores, type PlanOptions } from "./plan.js";
