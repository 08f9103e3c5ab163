/**
 * Cache File Watcher
 * 
 * Watches individual cache files using native fs.watch. Unlike a folder
 * watcher there is no debouncing here: the auto-update manager drops the
 * watch on the first notification and re-adds it once the change is handled.
 */

import { EventEmitter } from 'node:events';
import { watch, type FSWatcher } from 'node:fs';
import { createLogger, getErrorMessage } from '@cache-mirror/utils';

const logger = createLogger({ component: 'file-watcher' });

/**
 * Per-file change notification primitive
 * 
 * addPath/removePath report whether the underlying watch changed; they are
 * not required to be idempotent, see ensureWatched/ensureUnwatched.
 */
export interface WatchPrimitive {
  addPath(filePath: string): boolean;
  removePath(filePath: string): boolean;
  files(): string[];
  onChange(listener: (filePath: string) => void): void;
  close(): void;
}

export type WatchFunction = (
  filePath: string,
  listener: (eventType: string) => void
) => FSWatcher;

const nativeWatch: WatchFunction = (filePath, listener) =>
  watch(filePath, { persistent: true }, (eventType) => listener(eventType));

export class CacheFileWatcher extends EventEmitter implements WatchPrimitive {
  private watchers: Map<string, FSWatcher> = new Map();
  private readonly watchFn: WatchFunction;

  constructor(watchFn: WatchFunction = nativeWatch) {
    super();
    this.watchFn = watchFn;
  }

  /**
   * Start watching a file. Returns false if it is already watched or
   * cannot be watched (e.g. it does not exist).
   */
  addPath(filePath: string): boolean {
    if (this.watchers.has(filePath)) {
      return false;
    }

    try {
      const watcher = this.watchFn(filePath, (eventType) => {
        this.emit('fileChanged', filePath, eventType);
      });

      watcher.on('error', (error) => {
        logger.warn({ filePath, error: getErrorMessage(error) }, 'Watch error, dropping watch');
        this.removePath(filePath);
      });

      this.watchers.set(filePath, watcher);
      return true;
    } catch (error) {
      logger.debug({ filePath, error: getErrorMessage(error) }, 'fs.watch refused path');
      return false;
    }
  }

  /**
   * Stop watching a file. Returns false if it was not watched.
   */
  removePath(filePath: string): boolean {
    const watcher = this.watchers.get(filePath);
    if (!watcher) {
      return false;
    }

    watcher.close();
    this.watchers.delete(filePath);
    return true;
  }

  files(): string[] {
    return Array.from(this.watchers.keys());
  }

  onChange(listener: (filePath: string) => void): void {
    this.on('fileChanged', listener);
  }

  close(): void {
    for (const [filePath, watcher] of this.watchers) {
      watcher.close();
      this.watchers.delete(filePath);
    }
    this.removeAllListeners('fileChanged');
  }
}

/**
 * Watch a path unless it is watched already
 */
export function ensureWatched(primitive: WatchPrimitive, filePath: string): boolean {
  if (primitive.files().includes(filePath)) {
    return true;
  }
  const ok = primitive.addPath(filePath);
  if (!ok) {
    logger.warn({ filePath }, 'Failed to watch cache file');
  }
  return ok;
}

/**
 * Stop watching a path if it is watched
 */
export function ensureUnwatched(primitive: WatchPrimitive, filePath: string): boolean {
  if (!primitive.files().includes(filePath)) {
    return true;
  }
  const ok = primitive.removePath(filePath);
  if (!ok) {
    logger.warn({ filePath }, 'Failed to remove watch on cache file');
  }
  return ok;
}
