import { describe, expect, it } from "vitest";
import {
  toDynamoDbBackupRecord,
  toEbsBackupRecord,
  toProtectionGroupBackupRecord,
  toRdsBackupRecord,
} from "../discovery/backups.js";
import { MemoryTransport, createLogger } from "../logging/index.js";
import {
  SOURCE_ACCOUNT,
  SOURCE_REGION,
  TARGET_ACCOUNT,
  dynamoDbBackupItem,
  ebsBackupItem,
  protectionGroupBackupItem,
  rdsBackupItem,
} from "../testing/fixtures.js";
import { planRestores } from "./plan.js";

describe("planRestores", () => {
  const records = [
    toEbsBackupRecord(ebsBackupItem()),
    toRdsBackupRecord(rdsBackupItem()),
    toDynamoDbBackupRecord(dynamoDbBackupItem()),
  ];

  it("restores into the source account by default", () => {
    const entries = planRestores(records, { DynamoDB: { changeSetName: "cs1" } }, { random: () => 0 });

    expect(entries.map((entry) => [entry.resourceType, entry.crossAccount, entry.target.targetAccount])).toEqual([
      ["EBS", false, SOURCE_ACCOUNT],
      ["RDS", false, SOURCE_ACCOUNT],
      ["DynamoDB", false, SOURCE_ACCOUNT],
    ]);
    expect(entries[1]?.target).toMatchObject({ targetName: "orders-db-aaa" });
  });

  it("fills cross-account gaps from the defaults", () => {
    const entries = planRestores(
      [toEbsBackupRecord(ebsBackupItem())],
      { targetAccount: TARGET_ACCOUNT },
      { defaults: { EBS: { targetAz: "us-east-1c", targetVolumeType: "gp3" } } },
    );

    expect(entries).toHaveLength(1);
    expect(entries[0]?.crossAccount).toBe(true);
    expect(entries[0]?.target).toMatchObject({
      targetAccount: TARGET_ACCOUNT,
      targetAz: "us-east-1c",
      targetVolumeType: "gp3",
    });
  });

  it("takes names and buckets nothing else supplies from the defaults", () => {
    const pgRecord = toProtectionGroupBackupRecord(
      protectionGroupBackupItem(),
      { name: "media", account: SOURCE_ACCOUNT, region: SOURCE_REGION },
      ["asset-1"],
      { latestVersionOnly: true },
    );

    const entries = planRestores(
      [toRdsBackupRecord(rdsBackupItem()), toDynamoDbBackupRecord(dynamoDbBackupItem()), pgRecord],
      {
        targetAccount: TARGET_ACCOUNT,
        RDS: { targetSubnetGroupName: "target-subnets", targetSecurityGroupIds: ["sg-target"] },
      },
      {
        defaults: {
          RDS: { targetName: "orders-copy" },
          DynamoDB: { targetTableName: "orders-restored" },
          ProtectionGroup: { targetBucket: "restore-bucket" },
        },
      },
    );

    expect(entries.map((entry) => entry.target)).toEqual([
      expect.objectContaining({ resourceType: "RDS", targetName: "orders-copy" }),
      expect.objectContaining({ resourceType: "DynamoDB", targetTableName: "orders-restored" }),
      expect.objectContaining({ resourceType: "ProtectionGroup", targetBucket: "restore-bucket" }),
    ]);
  });

  it("names the field when a name has no default", () => {
    expect(() => planRestores([toDynamoDbBackupRecord(dynamoDbBackupItem())], {})).toThrow(
      "targetTableName is required for DynamoDB restore and has no default input",
    );
  });

  it("accepts explicit IOPS once the defaulted volume type takes them", () => {
    const [entry] = planRestores(
      [toEbsBackupRecord(ebsBackupItem())],
      { targetAccount: TARGET_ACCOUNT, EBS: { targetIops: 4000 } },
      { defaults: { EBS: { targetAz: "us-east-1c", targetVolumeType: "gp3" } } },
    );

    expect(entry?.target).toMatchObject({ targetVolumeType: "gp3", targetIops: 4000 });
  });

  it("rejects explicit IOPS when the defaulted volume type takes none", () => {
    expect(() =>
      planRestores(
        [toEbsBackupRecord(ebsBackupItem())],
        { targetAccount: TARGET_ACCOUNT, EBS: { targetIops: 4000 } },
        { defaults: { EBS: { targetAz: "us-east-1c", targetVolumeType: "gp2" } } },
      ),
    ).toThrow("targetIops is only valid for volume types gp3, io1, io2, not gp2");
  });

  it("fails the whole plan when one record cannot resolve", () => {
    expect(() => planRestores(records, { targetAccount: TARGET_ACCOUNT, DynamoDB: { changeSetName: "cs1" } })).toThrow(
      "targetSubnetGroupName must be filled for cross-account RDS restore",
    );
  });

  it("logs the plan size", () => {
    const transport = new MemoryTransport();
    const logger = createLogger("plan", { level: "info", transports: [transport] });

    planRestores(records, { DynamoDB: { changeSetName: "cs1" } }, { logger });

    expect(transport.entries.map((entry) => entry.message)).toEqual(["Planned 3 restores"]);
  });
});
