import type { Tag } from "../types.js";

/**
 * Keep records carrying a tag with exactly `key` and `value`. Without both,
 * the input is returned unchanged.
 */
export function filterByTag<R extends { sourceTags: readonly Tag[] }>(
  records: readonly R[],
  key?: string,
  value?: string,
): R[] {
  if (!key || !value) return [...records];
  return records.filter((record) => record.sourceTags.some((tag) => tag.key === key && tag.value === value));
}

/**
 * Append operator tags to a source tag list, skipping exact duplicates.
 * Existing tags with the same key but another value are kept.
 */
export function appendTagsToSourceTags(
  sourceTags: readonly Tag[] | undefined,
  appendTags: Readonly<Record<string, string>> | undefined,
): Tag[] {
  const tags = [...(sourceTags ?? [])];
  for (const [key, value] of Object.entries(appendTags ?? {})) {
    if (!tags.some((tag) => tag.key === key && tag.value === value)) {
      tags.push({ key, value });
    }
  }
  return tags;
}
