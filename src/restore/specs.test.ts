import { describe, expect, it } from "vitest";
import { ValidationError } from "../errors.js";
import { parseDefaultInput, parseTargetSpecs } from "./specs.js";

describe("parseTargetSpecs", () => {
  it("accepts a spec per resource type", () => {
    const specs = parseTargetSpecs({
      targetAccount: "222222222222",
      EBS: { targetAz: " us-east-1a ", targetIops: 3000, appendTags: { team: "ops" } },
      ProtectionGroup: { targetBucket: "restore-bucket", overwrite: false },
    });

    expect(specs).toEqual({
      targetAccount: "222222222222",
      EBS: { targetAz: "us-east-1a", targetIops: 3000, appendTags: { team: "ops" } },
      ProtectionGroup: { targetBucket: "restore-bucket", overwrite: false },
    });
  });

  it("rejects unknown fields", () => {
    expect(() => parseTargetSpecs({ EBS: { targetZone: "us-east-1a" } })).toThrow(
      "Invalid target specs: EBS: Unrecognized key(s) in object: 'targetZone'",
    );
  });

  it("names the offending field", () => {
    try {
      parseTargetSpecs({ EBS: { targetIops: -1 } });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      expect(err).toMatchObject({ field: "EBS.targetIops" });
    }
  });
});

describe("parseDefaultInput", () => {
  it("only takes fillable fields", () => {
    expect(parseDefaultInput({ RDS: { targetName: "orders-copy" } })).toEqual({ RDS: { targetName: "orders-copy" } });
    expect(() => parseDefaultInput({ RDS: { targetKmsKeyId: "kms-1" } })).toThrow(ValidationError);
    expect(() => parseDefaultInput({ EC2: { targetVpcId: "vpc-1" } })).toThrow(ValidationError);
  });
});
