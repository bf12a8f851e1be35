/**
 * Discovery Module Index
 */

export { fetchAllPages, type FetchAllPagesOptions } from "./pagination.js";
export {
  TIMESTAMP_FIELD,
  endOfDayAgo,
  getSortAndTimestampFilter,
  startOfDayAgo,
  type SortAndFilter,
} from "./time-window.js";
export { appendTagsToSourceTags, filterByTag } from "./tags.js";
export {
  ASSET_FILTER_FIELDS,
  discoverBackups,
  keepLatestPerAsset,
  toDynamoDbBackupRecord,
  toEbsBackupRecord,
  toEc2BackupRecord,
  toProtectionGroupBackupRecord,
  toRdsBackupRecord,
  type BackupQuery,
  type DiscoverBackupsOptions,
} from "./backups.js";
export {
  getEnvironmentId,
  listAssetIds,
  listRegions,
  type AccountRegion,
  type AssetResourceType,
} from "./environments.js";
