/**
 * Bulk Restore CLI Commands
 *
 * Registers the `bulk-restore` subcommands. Results go to stdout as JSON;
 * logs go to stderr.
 */

import { Command, InvalidArgumentError } from "commander";
import { discoverBackups, type BackupQuery } from "../discovery/backups.js";
import { listRegions } from "../discovery/environments.js";
import { ValidationError, formatErrorMessage, isRestoreError } from "../errors.js";
import { createContextCache } from "../restore/context.js";
import { planRestores } from "../restore/plan.js";
import { runRestores } from "../runner/restore-runner.js";
import { pollTask } from "../tasks/poller.js";
import { isResourceType, type RestorePlanEntry, type SearchDirection } from "../types.js";
import { readRestoreInput, type RestoreInput } from "./input.js";
import type { CliRuntime, GlobalOptions } from "./runtime.js";

// =============================================================================
// Types
// =============================================================================

export type CliIo = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  setExitCode: (code: number) => void;
};

export type CliContext = {
  program: Command;
  io: CliIo;
  createRuntime: (options: GlobalOptions) => Promise<CliRuntime>;
  readFile?: (path: string) => Promise<string>;
};

type ListOptions = {
  account: string;
  region: string;
  tagKey?: string;
  tagValue?: string;
  direction?: string;
  startOffset?: number;
  endOffset?: number;
  assetId?: string;
  latest?: boolean;
  protectionGroup?: string;
  bucket?: string[];
};

// =============================================================================
// Helpers
// =============================================================================

function parseDayOffset(value: string): number {
  const days = Number(value);
  if (!Number.isInteger(days) || days < 0) {
    throw new InvalidArgumentError("Expected a non-negative whole number of days.");
  }
  return days;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return n;
}

function isSearchDirection(value: string): value is SearchDirection {
  return value === "before" || value === "after";
}

function toQuery(type: string, opts: ListOptions): BackupQuery {
  if (!isResourceType(type)) {
    throw new ValidationError(`Unknown resource type ${type}`, "type");
  }
  const direction = opts.direction;
  if (direction !== undefined && !isSearchDirection(direction)) {
    throw new ValidationError(`Unknown search direction ${direction}; use before or after`, "direction");
  }
  return {
    resourceType: type,
    sourceAccount: opts.account,
    sourceRegion: opts.region,
    searchTagKey: opts.tagKey,
    searchTagValue: opts.tagValue,
    searchDirection: direction,
    startSearchDayOffset: opts.startOffset,
    endSearchDayOffset: opts.endOffset,
    searchAssetId: opts.assetId,
    latestOnly: opts.latest,
    protectionGroupName: opts.protectionGroup,
    bucketNames: opts.bucket,
  };
}

function summarizeEntry(entry: RestorePlanEntry) {
  return {
    resourceType: entry.resourceType,
    sourceBackupId: entry.record.sourceBackupId,
    sourceAssetId: entry.record.sourceAssetId,
    crossAccount: entry.crossAccount,
    target: entry.target,
  };
}

// =============================================================================
// CLI Registration
// =============================================================================

/**
 * Register the `bulk-restore` commands on `ctx.program`
 */
export function registerBulkRestoreCli(ctx: CliContext): void {
  const { program, io } = ctx;

  program
    .option("--config <path>", "JSON configuration file")
    .option("--base-url <url>", "Backup service base URL")
    .option("--log-level <level>", "trace, debug, info, warn, error or fatal");

  const print = (value: unknown) => io.stdout(JSON.stringify(value, null, 2));

  /** Runs an action, reporting restore errors on stderr with exit code 1 */
  const run = async (action: (runtime: CliRuntime) => Promise<void>) => {
    try {
      const runtime = await ctx.createRuntime(program.opts<GlobalOptions>());
      await action(runtime);
    } catch (err) {
      if (!isRestoreError(err)) throw err;
      io.stderr(`${err.name}: ${formatErrorMessage(err)}`);
      io.setExitCode(1);
    }
  };

  const plan = async (runtime: CliRuntime, input: RestoreInput) => {
    const records = await discoverBackups(runtime.client, input.query, {
      maxResults: runtime.config.discovery.maxResults,
      logger: runtime.logger.child("discovery"),
    });
    return planRestores(records, input.targetSpecs, {
      defaults: input.defaultInput,
      logger: runtime.logger.child("plan"),
    });
  };

  // ---------------------------------------------------------------------------
  // regions
  // ---------------------------------------------------------------------------
  program
    .command("regions")
    .description("List the regions of an account the backup service protects")
    .requiredOption("--account <id>", "Account id")
    .action(async (opts: { account: string }) => {
      await run(async (runtime) => {
        print(await listRegions(runtime.client, opts.account, runtime.logger));
      });
    });

  // ---------------------------------------------------------------------------
  // list
  // ---------------------------------------------------------------------------
  program
    .command("list")
    .description("List backups of one resource type")
    .argument("<type>", "EBS, EC2, RDS, DynamoDB or ProtectionGroup")
    .requiredOption("--account <id>", "Source account id")
    .requiredOption("--region <region>", "Source region")
    .option("--tag-key <key>", "Keep backups carrying this tag key")
    .option("--tag-value <value>", "Keep backups carrying this tag value")
    .option("--direction <direction>", "before or after")
    .option("--start-offset <days>", "Days back to the start of the window", parseDayOffset)
    .option("--end-offset <days>", "Days back to the end of the window", parseDayOffset)
    .option("--asset-id <id>", "Volume, instance, RDS resource or table id")
    .option("--latest", "Keep only the newest backup of each asset")
    .option("--no-latest", "Keep every backup in the window, protection groups included")
    .option("--protection-group <name>", "Protection group name")
    .option("--bucket <names...>", "Buckets of the protection group")
    .action(async (type: string, opts: ListOptions) => {
      await run(async (runtime) => {
        const query = toQuery(type, opts);
        print(
          await discoverBackups(runtime.client, query, {
            maxResults: runtime.config.discovery.maxResults,
            logger: runtime.logger.child("discovery"),
          }),
        );
      });
    });

  // ---------------------------------------------------------------------------
  // plan
  // ---------------------------------------------------------------------------
  program
    .command("plan")
    .description("Discover backups and resolve their restore targets without submitting")
    .requiredOption("--input <file>", "Restore input document")
    .action(async (opts: { input: string }) => {
      await run(async (runtime) => {
        const input = await readRestoreInput(opts.input, ctx.readFile);
        print((await plan(runtime, input)).map(summarizeEntry));
      });
    });

  // ---------------------------------------------------------------------------
  // restore
  // ---------------------------------------------------------------------------
  program
    .command("restore")
    .description("Discover, plan, submit and track restores")
    .requiredOption("--input <file>", "Restore input document")
    .option("--concurrency <n>", "Restores run in parallel", parsePositiveInt)
    .action(async (opts: { input: string; concurrency?: number }) => {
      await run(async (runtime) => {
        const input = await readRestoreInput(opts.input, ctx.readFile);
        const entries = await plan(runtime, input);
        const logger = runtime.logger.child("runner");
        const outcomes = await runRestores(
          entries,
          {
            client: runtime.client,
            polling: runtime.config.polling,
            contextFor: createContextCache(runtime.client, logger),
            logger,
          },
          { concurrency: opts.concurrency ?? runtime.config.runner.concurrency },
        );
        print(outcomes);
        if (outcomes.some((outcome) => outcome.status !== "completed")) io.setExitCode(1);
      });
    });

  // ---------------------------------------------------------------------------
  // task
  // ---------------------------------------------------------------------------
  program
    .command("task")
    .description("Poll a restore task until it finishes or the budget runs out")
    .argument("<taskId>", "Task id returned by a restore")
    .action(async (taskId: string) => {
      await run(async (runtime) => {
        const result = await pollTask(runtime.client.readTask, taskId, runtime.config.polling, {
          logger: runtime.logger.child("tasks"),
        });
        print(result);
        if (result.state !== "completed") io.setExitCode(1);
      });
    });
}

/**
 * Create the `bulk-restore` program
 */
export function createProgram(ctx: Omit<CliContext, "program">): Command {
  const program = new Command();
  program.name("bulk-restore").description("Bulk restore of cloud backups");
  registerBulkRestoreCli({ ...ctx, program });
  return program;
}
