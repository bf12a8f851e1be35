import { describe, expect, it } from "vitest";
import {
  toDynamoDbBackupRecord,
  toEbsBackupRecord,
  toEc2BackupRecord,
  toProtectionGroupBackupRecord,
  toRdsBackupRecord,
} from "../discovery/backups.js";
import { ValidationError } from "../errors.js";
import {
  SOURCE_ACCOUNT,
  SOURCE_REGION,
  TARGET_ACCOUNT,
  dynamoDbBackupItem,
  ebsBackupItem,
  ec2BackupItem,
  protectionGroupBackupItem,
  rdsBackupItem,
} from "../testing/fixtures.js";
import { FOLLOW_DEFAULT_INPUT } from "../types.js";
import {
  randomSuffix,
  resolveDynamoDbTarget,
  resolveEbsTarget,
  resolveEc2Target,
  resolveProtectionGroupTarget,
  resolveRdsTarget,
  resolveTargetSpec,
  type ResolveContext,
} from "./resolver.js";

const sameAccount: ResolveContext = { targetAccount: SOURCE_ACCOUNT, crossAccount: false, random: () => 0.5 };
const crossAccount: ResolveContext = { targetAccount: TARGET_ACCOUNT, crossAccount: true, random: () => 0.5 };

describe("randomSuffix", () => {
  it("draws lowercase letters from the random source", () => {
    expect(randomSuffix(3, () => 0)).toBe("aaa");
    expect(randomSuffix(3, () => 0.5)).toBe("nnn");
    expect(randomSuffix(2, () => 0.9999)).toBe("zz");
  });
});

describe("resolveEbsTarget", () => {
  it("inherits source values in the same account", () => {
    const target = resolveEbsTarget({}, toEbsBackupRecord(ebsBackupItem()), sameAccount);

    expect(target).toEqual({
      resourceType: "EBS",
      targetAccount: SOURCE_ACCOUNT,
      targetRegion: SOURCE_REGION,
      targetAz: "us-east-1a",
      targetVolumeType: "gp2",
      targetIops: 0,
      targetKmsKeyId: undefined,
      tags: [{ key: "env", value: "prod" }],
    });
  });

  it("prefers explicit values", () => {
    const target = resolveEbsTarget(
      { targetRegion: "us-west-2", targetAz: "us-west-2c", targetVolumeType: "io2", targetIops: 4000 },
      toEbsBackupRecord(ebsBackupItem()),
      sameAccount,
    );

    expect(target).toMatchObject({
      targetRegion: "us-west-2",
      targetAz: "us-west-2c",
      targetVolumeType: "io2",
      targetIops: 4000,
    });
  });

  it("keeps the source IOPS for a provisioned type", () => {
    const record = toEbsBackupRecord(ebsBackupItem({ type: "gp3", iops: 3000 }));

    expect(resolveEbsTarget({}, record, sameAccount).targetIops).toBe(3000);
  });

  it("drops the source IOPS when the target type takes none", () => {
    const record = toEbsBackupRecord(ebsBackupItem({ type: "gp3", iops: 3000 }));

    expect(resolveEbsTarget({ targetVolumeType: "st1" }, record, sameAccount).targetIops).toBe(0);
  });

  it("rejects explicit IOPS for a type that takes none", () => {
    const record = toEbsBackupRecord(ebsBackupItem());

    expect(() => resolveEbsTarget({ targetIops: 500 }, record, sameAccount)).toThrow(
      "targetIops is only valid for volume types gp3, io1, io2, not gp2",
    );
  });

  it("keeps explicit IOPS while the volume type awaits default input", () => {
    const target = resolveEbsTarget({ targetIops: 4000 }, toEbsBackupRecord(ebsBackupItem()), crossAccount);

    expect(target).toMatchObject({ targetVolumeType: FOLLOW_DEFAULT_INPUT, targetIops: 4000 });
  });

  it("asks for default input across accounts", () => {
    const target = resolveEbsTarget({}, toEbsBackupRecord(ebsBackupItem()), crossAccount);

    expect(target).toMatchObject({
      targetAccount: TARGET_ACCOUNT,
      targetAz: FOLLOW_DEFAULT_INPUT,
      targetVolumeType: FOLLOW_DEFAULT_INPUT,
      targetIops: 0,
    });
  });

  it("requires a KMS key for an encrypted volume in another account", () => {
    const record = toEbsBackupRecord(ebsBackupItem({ is_encrypted: true, kms_key_native_id: "kms-source" }));

    expect(() => resolveEbsTarget({}, record, crossAccount)).toThrow(
      "targetKmsKeyId must be filled for cross-account EBS restore",
    );
    expect(resolveEbsTarget({}, record, sameAccount).targetKmsKeyId).toBe("kms-source");
  });

  it("appends operator tags after the source tags", () => {
    const target = resolveEbsTarget(
      { appendTags: { env: "prod", team: "ops" } },
      toEbsBackupRecord(ebsBackupItem()),
      sameAccount,
    );

    expect(target.tags).toEqual([
      { key: "env", value: "prod" },
      { key: "team", value: "ops" },
    ]);
  });
});

describe("resolveEc2Target", () => {
  it("inherits network and identity in the same account", () => {
    const target = resolveEc2Target({}, toEc2BackupRecord(ec2BackupItem()), sameAccount);

    expect(target).toEqual({
      resourceType: "EC2",
      targetAccount: SOURCE_ACCOUNT,
      targetRegion: SOURCE_REGION,
      targetAz: "us-east-1b",
      targetVpcId: "vpc-source",
      targetSubnetId: "subnet-a",
      targetSecurityGroupIds: undefined,
      targetKmsKeyId: undefined,
      targetKeyPairName: "ops-key",
      targetIamInstanceProfileName: "app-profile",
      tags: [{ key: "env", value: "prod" }],
    });
  });

  it("names the first missing cross-account field", () => {
    const record = toEc2BackupRecord(ec2BackupItem());

    expect(() =>
      resolveEc2Target({ targetVpcId: "vpc-target", targetSubnetId: "subnet-target" }, record, crossAccount),
    ).toThrow(new ValidationError("targetSecurityGroupIds must be filled for cross-account EC2 restore"));
  });

  it("requires a KMS key across accounts when a volume is encrypted", () => {
    const record = toEc2BackupRecord(ec2BackupItem());
    const spec = { targetVpcId: "vpc-target", targetSubnetId: "subnet-target", targetSecurityGroupIds: ["sg-target"] };

    expect(() => resolveEc2Target(spec, record, crossAccount)).toThrow(
      "targetKmsKeyId must be filled for cross-account EC2 restore",
    );
  });

  it("marks inherited identity fields across accounts", () => {
    const record = toEc2BackupRecord(ec2BackupItem());
    const target = resolveEc2Target(
      {
        targetVpcId: "vpc-target",
        targetSubnetId: "subnet-target",
        targetSecurityGroupIds: ["sg-target"],
        targetKmsKeyId: "kms-target",
      },
      record,
      crossAccount,
    );

    expect(target).toMatchObject({
      targetAz: FOLLOW_DEFAULT_INPUT,
      targetKeyPairName: FOLLOW_DEFAULT_INPUT,
      targetIamInstanceProfileName: FOLLOW_DEFAULT_INPUT,
      targetSecurityGroupIds: ["sg-target"],
      targetKmsKeyId: "kms-target",
    });
  });

  it("leaves a key pair the source never had unset", () => {
    const record = toEc2BackupRecord(ec2BackupItem({ key_pair_name: null }));

    expect(resolveEc2Target({}, record, sameAccount).targetKeyPairName).toBeUndefined();
  });
});

describe("resolveRdsTarget", () => {
  it("derives a name from the resource id and a random suffix", () => {
    const target = resolveRdsTarget({}, toRdsBackupRecord(rdsBackupItem()), sameAccount);

    expect(target).toEqual({
      resourceType: "RDS",
      targetAccount: SOURCE_ACCOUNT,
      targetRegion: SOURCE_REGION,
      targetName: "orders-db-nnn",
      targetSubnetGroupName: "db-subnets",
      targetSecurityGroupIds: ["sg-db"],
      targetKmsKeyId: undefined,
      targetInstanceClass: undefined,
      tags: [{ key: "env", value: "prod" }],
    });
  });

  it("leaves the name to default input across accounts", () => {
    const target = resolveRdsTarget(
      { targetSubnetGroupName: "target-subnets", targetSecurityGroupIds: ["sg-target"] },
      toRdsBackupRecord(rdsBackupItem()),
      crossAccount,
    );

    expect(target.targetName).toBe(FOLLOW_DEFAULT_INPUT);
  });

  it("requires the subnet group across accounts", () => {
    expect(() =>
      resolveRdsTarget({ targetName: "orders-copy" }, toRdsBackupRecord(rdsBackupItem()), crossAccount),
    ).toThrow("targetSubnetGroupName must be filled for cross-account RDS restore");
  });
});

describe("resolveDynamoDbTarget", () => {
  it("suffixes the source table name with the change set", () => {
    const target = resolveDynamoDbTarget(
      { changeSetName: "cs42" },
      toDynamoDbBackupRecord(dynamoDbBackupItem()),
      sameAccount,
    );

    expect(target.targetTableName).toBe("orders-cs42");
  });

  it("prefers an explicit table name", () => {
    const target = resolveDynamoDbTarget(
      { targetTableName: "orders-restored", changeSetName: "cs42" },
      toDynamoDbBackupRecord(dynamoDbBackupItem()),
      sameAccount,
    );

    expect(target.targetTableName).toBe("orders-restored");
  });

  it("leaves the name to default input with neither", () => {
    const target = resolveDynamoDbTarget({}, toDynamoDbBackupRecord(dynamoDbBackupItem()), sameAccount);

    expect(target.targetTableName).toBe(FOLLOW_DEFAULT_INPUT);
  });
});

describe("resolveProtectionGroupTarget", () => {
  const record = toProtectionGroupBackupRecord(
    protectionGroupBackupItem(),
    { name: "nightly", account: SOURCE_ACCOUNT, region: SOURCE_REGION },
    ["asset-1"],
    { latestVersionOnly: true },
  );

  it("defaults overwrite and storage class restore to true", () => {
    expect(resolveProtectionGroupTarget({ targetBucket: "restore-bucket" }, record, sameAccount)).toEqual({
      resourceType: "ProtectionGroup",
      targetAccount: SOURCE_ACCOUNT,
      targetRegion: SOURCE_REGION,
      targetBucket: "restore-bucket",
      targetPrefix: undefined,
      overwrite: true,
      restoreOriginalStorageClass: true,
    });
  });

  it("leaves the bucket to default input", () => {
    expect(resolveProtectionGroupTarget({}, record, sameAccount).targetBucket).toBe(FOLLOW_DEFAULT_INPUT);
  });
});

describe("resolveTargetSpec", () => {
  it("dispatches on the resource type", () => {
    const target = resolveTargetSpec("RDS", { targetName: "orders-copy" }, toRdsBackupRecord(rdsBackupItem()), sameAccount);

    expect(target.resourceType).toBe("RDS");
    expect(target.targetName).toBe("orders-copy");
  });
});
