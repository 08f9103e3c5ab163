/**
 * Watcher Module
 * 
 * Cache file watching and re-upload coordination.
 */

export {
  AutoUpdateManager,
  type AutoUpdateManagerOptions,
} from './autoUpdateManager.js';

export {
  CacheFileWatcher,
  ensureWatched,
  ensureUnwatched,
  type WatchPrimitive,
  type WatchFunction,
} from './fileWatcher.js';

export {
  RecentOpenFilter,
  createPlatformQuirkFilter,
  isQuirkProneType,
  noSpuriousChanges,
  DEFAULT_QUIRK_WINDOW_MS,
  type QuirkFilterMode,
  type SpuriousChangeFilter,
  type RecentOpenFilterOptions,
} from './quirkFilter.js';

export { WatchRegistry } from './watchRegistry.js';

export {
  DeferredRecreationQueue,
  DEFAULT_RECREATE_CHECK_DELAY_MS,
  type DeferredQueueOptions,
  type RecheckOrder,
  type RecheckHandler,
} from './deferredQueue.js';

export {
  UploadCoordinator,
  type UploadCoordinatorContext,
} from './uploadCoordinator.js';

export {
  CachedFilesCleaner,
  CleanupWorkerPool,
  type CleanupJob,
  type CleanupReport,
} from './cacheCleaner.js';
