import { describe, expect, it, vi, type Mock } from "vitest";
import { ApiError, AuthError } from "../errors.js";
import type { EbsRestoreBody } from "../types.js";
import { createBackupApiClient, type FetchLike } from "./client.js";

const BASE_URL = "https://api.backup.example/";

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers },
  });
}

function page(items: unknown[], totalPages = 1) {
  return { total_count: items.length, total_pages_count: totalPages, _embedded: { items } };
}

const ebsItem = {
  id: "backup-1",
  volume_native_id: "vol-1",
  account_native_id: "111111111111",
  aws_region: "us-east-1",
  aws_az: "us-east-1a",
  is_encrypted: false,
  type: "gp3",
  iops: 3000,
  tags: [{ key: "env", value: "prod" }],
  start_timestamp: "2026-10-17T10:00:00Z",
};

function setup(fetchMock: Mock<FetchLike>) {
  return createBackupApiClient({
    baseUrl: BASE_URL,
    token: "test-token",
    pageSize: 25,
    retry: { attempts: 3, jitter: 0 },
    retryHooks: { sleep: vi.fn().mockResolvedValue(undefined) },
    fetch: fetchMock,
  });
}

describe("createBackupApiClient", () => {
  describe("listings", () => {
    it("sends the cursor, page size, filter and sort", async () => {
      const fetchMock = vi.fn<FetchLike>().mockResolvedValue(jsonResponse(page([ebsItem])));
      const client = setup(fetchMock);

      const result = await client.listEbsBackups({
        start: 2,
        filter: { start_timestamp: { $lte: "2026-10-17T23:59:59Z" } },
        sort: "-start_timestamp",
      });

      expect(fetchMock).toHaveBeenCalledTimes(1);
      const [input, init] = fetchMock.mock.calls[0] ?? [];
      const url = new URL(String(input));
      expect(url.origin + url.pathname).toBe("https://api.backup.example/backups/aws/ebs-volumes");
      expect(url.searchParams.get("start")).toBe("2");
      expect(url.searchParams.get("limit")).toBe("25");
      expect(url.searchParams.get("sort")).toBe("-start_timestamp");
      expect(url.searchParams.get("filter")).toBe('{"start_timestamp":{"$lte":"2026-10-17T23:59:59Z"}}');
      expect(init?.method).toBe("GET");
      expect(new Headers(init?.headers).get("authorization")).toBe("Bearer test-token");

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.totalCount).toBe(1);
      expect(result.totalPages).toBe(1);
      expect(result.items[0]).toMatchObject({ id: "backup-1", type: "gp3", iops: 3000 });
    });

    it("omits an empty filter", async () => {
      const fetchMock = vi.fn<FetchLike>().mockResolvedValue(jsonResponse(page([])));
      const client = setup(fetchMock);

      await client.listEnvironments({ start: 1, filter: {} });

      const url = new URL(String(fetchMock.mock.calls[0]?.[0]));
      expect(url.searchParams.has("filter")).toBe(false);
    });

    it("reports a client error as a failed page", async () => {
      const fetchMock = vi
        .fn<FetchLike>()
        .mockResolvedValue(new Response("bad filter", { status: 400, statusText: "Bad Request" }));
      const client = setup(fetchMock);

      const result = await client.listRdsBackups({ start: 1 });

      expect(result).toEqual({ ok: false, statusCode: 400, reason: "Bad Request", content: "bad filter" });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it("retries a throttled page", async () => {
      const fetchMock = vi
        .fn<FetchLike>()
        .mockResolvedValueOnce(new Response("slow down", { status: 429, headers: { "retry-after": "1" } }))
        .mockResolvedValueOnce(jsonResponse(page([ebsItem])));
      const client = setup(fetchMock);

      const result = await client.listEbsBackups({ start: 1 });

      expect(result.ok).toBe(true);
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it("throws AuthError on 401", async () => {
      const fetchMock = vi.fn<FetchLike>().mockResolvedValue(new Response("", { status: 401 }));
      const client = setup(fetchMock);

      await expect(client.listEc2Backups({ start: 1 })).rejects.toBeInstanceOf(AuthError);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it("rejects a malformed item", async () => {
      const fetchMock = vi
        .fn<FetchLike>()
        .mockResolvedValue(jsonResponse(page([{ ...ebsItem, volume_native_id: 42 }])));
      const client = setup(fetchMock);

      await expect(client.listEbsBackups({ start: 1 })).rejects.toThrow(
        "Malformed item 0 from backups/aws/ebs-volumes: volume_native_id: Expected string, received number",
      );
    });
  });

  describe("readTask", () => {
    it("reads the task status", async () => {
      const fetchMock = vi.fn<FetchLike>().mockResolvedValue(jsonResponse({ id: "task-9", status: "in_progress" }));
      const client = setup(fetchMock);

      await expect(client.readTask("task-9")).resolves.toEqual({ id: "task-9", status: "in_progress" });
      expect(String(fetchMock.mock.calls[0]?.[0])).toBe("https://api.backup.example/tasks/task-9");
    });

    it("throws AuthError on 403", async () => {
      const fetchMock = vi.fn<FetchLike>().mockResolvedValue(new Response("", { status: 403 }));
      const client = setup(fetchMock);

      await expect(client.readTask("task-9")).rejects.toMatchObject({ name: "AuthError", statusCode: 403 });
    });
  });

  describe("submitRestore", () => {
    const body: EbsRestoreBody = {
      source: { backup_id: "backup-1" },
      target: { environment_id: "env-1", aws_az: "us-east-1a", type: "gp2", tags: [] },
    };

    it("posts the body and returns the task id", async () => {
      const fetchMock = vi.fn<FetchLike>().mockResolvedValue(jsonResponse({ task_id: "task-1" }, 202));
      const client = setup(fetchMock);

      const submission = await client.submitRestore({ resourceType: "EBS", sourceBackupId: "backup-1", body });

      expect(submission).toEqual({ taskId: "task-1", statusCode: 202 });
      const [input, init] = fetchMock.mock.calls[0] ?? [];
      expect(String(input)).toBe("https://api.backup.example/restores/aws/ebs-volumes");
      expect(init?.method).toBe("POST");
      expect(init?.body).toBe(JSON.stringify(body));
    });

    it("does not retry a failed submission", async () => {
      const fetchMock = vi.fn<FetchLike>().mockResolvedValue(new Response("boom", { status: 503 }));
      const client = setup(fetchMock);

      const submit = client.submitRestore({ resourceType: "EBS", sourceBackupId: "backup-1", body });

      await expect(submit).rejects.toBeInstanceOf(ApiError);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it("rejects a response without a task id", async () => {
      const fetchMock = vi.fn<FetchLike>().mockResolvedValue(jsonResponse({}, 200));
      const client = setup(fetchMock);

      await expect(
        client.submitRestore({ resourceType: "EBS", sourceBackupId: "backup-1", body }),
      ).rejects.toThrow("Restore of backup-1 returned no task id");
    });
  });
});
