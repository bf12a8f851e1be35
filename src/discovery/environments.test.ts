import { describe, expect, it, vi } from "vitest";
import type { ListPage, ListQuery } from "../api/client.js";
import type { AssetItem, EnvironmentItem } from "../api/schemas.js";
import { NotFoundError, ValidationError } from "../errors.js";
import { getEnvironmentId, listAssetIds, listRegions } from "./environments.js";

function singlePage<T>(items: T[]) {
  return vi.fn(
    async (_query: ListQuery): Promise<ListPage<T>> => ({
      ok: true,
      items,
      totalCount: items.length,
      totalPages: items.length === 0 ? 0 : 1,
    }),
  );
}

const environments: EnvironmentItem[] = [
  { id: "env-east", account_native_id: "111111111111", aws_region: "us-east-1" },
  { id: "env-west", account_native_id: "111111111111", aws_region: "us-west-2" },
];

describe("listRegions", () => {
  it("maps environments to regions", async () => {
    const listEnvironments = singlePage(environments);

    await expect(listRegions({ listEnvironments }, "111111111111")).resolves.toEqual([
      { region: "us-east-1", environmentId: "env-east" },
      { region: "us-west-2", environmentId: "env-west" },
    ]);
    expect(listEnvironments).toHaveBeenCalledWith(
      expect.objectContaining({ filter: { account_native_id: { $eq: "111111111111" } } }),
    );
  });
});

describe("getEnvironmentId", () => {
  it("filters by account and region", async () => {
    const listEnvironments = singlePage(environments.slice(1));

    await expect(getEnvironmentId({ listEnvironments }, "111111111111", "us-west-2")).resolves.toBe("env-west");
    expect(listEnvironments.mock.calls[0]?.[0].filter).toEqual({
      account_native_id: { $eq: "111111111111" },
      aws_region: { $eq: "us-west-2" },
    });
  });

  it("requires an account and a region", async () => {
    const listEnvironments = singlePage(environments);

    await expect(getEnvironmentId({ listEnvironments }, undefined, "us-east-1")).rejects.toBeInstanceOf(ValidationError);
    await expect(getEnvironmentId({ listEnvironments }, "111111111111", "")).rejects.toThrow("targetRegion is required");
    expect(listEnvironments).not.toHaveBeenCalled();
  });

  it("fails when no environment matches", async () => {
    const listEnvironments = singlePage<EnvironmentItem>([]);

    await expect(getEnvironmentId({ listEnvironments }, "222222222222", "eu-west-1")).rejects.toBeInstanceOf(
      NotFoundError,
    );
  });
});

describe("listAssetIds", () => {
  it("lists volumes or instances by environment", async () => {
    const listEbsVolumes = singlePage<AssetItem>([{ id: "vol-a" }, { id: "vol-b" }]);
    const listEc2Instances = singlePage<AssetItem>([{ id: "i-a" }]);
    const client = { listEbsVolumes, listEc2Instances };

    await expect(listAssetIds(client, "EBS", "env-east")).resolves.toEqual(["vol-a", "vol-b"]);
    await expect(listAssetIds(client, "EC2", "env-east")).resolves.toEqual(["i-a"]);
    expect(listEbsVolumes.mock.calls[0]?.[0].filter).toEqual({ environment_id: { $eq: "env-east" } });
  });
});
