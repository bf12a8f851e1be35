import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ValidationError } from "../errors.js";
import { DEFAULT_BASE_URL, loadConfig, parseConfig } from "./index.js";

describe("parseConfig", () => {
  it("applies defaults to an empty object", () => {
    const config = parseConfig({});

    expect(config.api.baseUrl).toBe(DEFAULT_BASE_URL);
    expect(config.api.pageSize).toBe(100);
    expect(config.api.retry).toEqual({ attempts: 3, minDelayMs: 100, maxDelayMs: 30_000, jitter: 0.2 });
    expect(config.discovery.maxResults).toBe(1000);
    expect(config.polling).toEqual({ timeoutMs: 600_000, intervalMs: 20_000 });
    expect(config.runner.concurrency).toBe(5);
    expect(config.logging.level).toBe("info");
  });

  it("reports every invalid field", () => {
    const parse = () => parseConfig({ api: { pageSize: 0 }, logging: { level: "loud" } });

    expect(parse).toThrow(ValidationError);
    expect(parse).toThrow(/api\.pageSize: .*; logging\.level: /);
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "bulk-restore-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads the file and lets the environment win", async () => {
    const path = join(dir, "config.json");
    await writeFile(
      path,
      JSON.stringify({
        api: { baseUrl: "https://file.backup.example/", pageSize: 50 },
        discovery: { maxResults: 10 },
      }),
    );

    const config = await loadConfig({
      path,
      env: { BULK_RESTORE_BASE_URL: "https://env.backup.example/", BULK_RESTORE_TOKEN: "test-token" },
    });

    expect(config.api.baseUrl).toBe("https://env.backup.example/");
    expect(config.api.token).toBe("test-token");
    expect(config.api.pageSize).toBe(50);
    expect(config.discovery.maxResults).toBe(10);
  });

  it("applies overrides last", async () => {
    const config = await loadConfig({
      env: { BULK_RESTORE_LOG_LEVEL: "debug" },
      overrides: { runner: { concurrency: 2 }, logging: { level: "error" } },
    });

    expect(config.runner.concurrency).toBe(2);
    expect(config.logging.level).toBe("error");
  });

  it("rejects a file that is not JSON", async () => {
    const path = join(dir, "broken.json");
    await writeFile(path, "{ not json");

    await expect(loadConfig({ path, env: {} })).rejects.toBeInstanceOf(ValidationError);
  });
});
