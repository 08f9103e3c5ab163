/**
 * @cache-mirror/sync
 * 
 * Keeps cached copies of remote files in step with local edits.
 * 
 * Edits made through native applications arrive as file change
 * notifications; the auto-update manager turns them into exactly one
 * re-upload per save, including saves that delete and recreate the file.
 * 
 * Components:
 * - Cache layout (where cached files live on disk)
 * - File watcher (per-file fs.watch)
 * - Platform quirk filter (ignores changes caused by opening a file)
 * - Watch registry and deferred-recreation queue
 * - Upload coordinator
 * - Cache teardown worker
 */

// Cache layout
export {
  CacheLayout,
  FILE_CACHE_DIR_NAME,
  FILE_CACHE_TEMP_DIR_NAME,
  FILE_CACHE_DB_FILE_NAME,
} from './cache/cacheLayout.js';

// Collaborators
export type {
  NotificationSink,
  AccountProvider,
  DownloadCanceller,
  FileCacheIndex,
  WatchResult,
} from './types.js';

// Watching and re-upload
export {
  AutoUpdateManager,
  type AutoUpdateManagerOptions,
  CacheFileWatcher,
  ensureWatched,
  ensureUnwatched,
  type WatchPrimitive,
  type WatchFunction,
  RecentOpenFilter,
  createPlatformQuirkFilter,
  isQuirkProneType,
  noSpuriousChanges,
  DEFAULT_QUIRK_WINDOW_MS,
  type QuirkFilterMode,
  type SpuriousChangeFilter,
  type RecentOpenFilterOptions,
  WatchRegistry,
  DeferredRecreationQueue,
  DEFAULT_RECREATE_CHECK_DELAY_MS,
  type DeferredQueueOptions,
  type RecheckOrder,
  type RecheckHandler,
  UploadCoordinator,
  type UploadCoordinatorContext,
  CachedFilesCleaner,
  CleanupWorkerPool,
  type CleanupJob,
  type CleanupReport,
} from './watcher/index.js';
