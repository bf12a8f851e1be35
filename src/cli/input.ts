/**
 * Restore input document read by `plan` and `restore`
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ValidationError, formatErrorMessage } from "../errors.js";
import { defaultInputSchema, targetSpecsSchema } from "../restore/specs.js";
import { RESOURCE_TYPES } from "../types.js";

const dayOffset = z.number().int().nonnegative().optional();

export const backupQuerySchema = z
  .object({
    resourceType: z.enum(RESOURCE_TYPES),
    sourceAccount: z.string().min(1),
    sourceRegion: z.string().min(1),
    searchTagKey: z.string().optional(),
    searchTagValue: z.string().optional(),
    searchDirection: z.enum(["before", "after"]).optional(),
    startSearchDayOffset: dayOffset,
    endSearchDayOffset: dayOffset,
    searchAssetId: z.string().optional(),
    latestOnly: z.boolean().optional(),
    protectionGroupName: z.string().optional(),
    bucketNames: z.array(z.string().min(1)).optional(),
    objectFilters: z
      .object({
        latestVersionOnly: z.boolean().optional(),
        prefix: z.string().optional(),
        storageClasses: z.array(z.string()).optional(),
        beforeTimestamp: z.string().optional(),
        afterTimestamp: z.string().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export const restoreInputSchema = z
  .object({
    query: backupQuerySchema,
    targetSpecs: targetSpecsSchema.default({}),
    defaultInput: defaultInputSchema.optional(),
  })
  .strict();

export type RestoreInput = z.infer<typeof restoreInputSchema>;

export function parseRestoreInput(raw: unknown): RestoreInput {
  const result = restoreInputSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ValidationError(`Invalid restore input: ${issues.join("; ")}`, result.error.issues[0]?.path.join("."));
  }
  return result.data;
}

export async function readRestoreInput(
  path: string,
  read: (path: string) => Promise<string> = (file) => readFile(file, "utf8"),
): Promise<RestoreInput> {
  let text: string;
  try {
    text = await read(path);
  } catch (err) {
    throw new ValidationError(`Cannot read input file ${path}: ${formatErrorMessage(err)}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ValidationError(`Input file ${path} is not valid JSON: ${formatErrorMessage(err)}`);
  }
  return parseRestoreInput(raw);
}
