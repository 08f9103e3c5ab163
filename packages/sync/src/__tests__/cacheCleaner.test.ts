import { existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CacheLayout } from '../cache/cacheLayout.js';
import { CachedFilesCleaner, CleanupWorkerPool } from '../watcher/cacheCleaner.js';

const combinations = [false, true].flatMap((db) =>
  [false, true].flatMap((temp) =>
    [false, true].map((live) => ({ db, temp, live }))
  )
);

describe('CachedFilesCleaner', () => {
  let root: string;
  let layout: CacheLayout;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'cache-mirror-clean-'));
    layout = new CacheLayout(root);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it.each(combinations)(
    'leaves nothing behind (db: $db, temp dir: $temp, cache dir: $live)',
    async ({ db, temp, live }) => {
      if (db) {
        writeFileSync(layout.fileCacheDbFile, 'sqlite');
      }
      if (temp) {
        mkdirSync(join(layout.fileCacheTempDir, 'repo-0'), { recursive: true });
        writeFileSync(join(layout.fileCacheTempDir, 'repo-0', 'stale.txt'), 'stale');
      }
      if (live) {
        mkdirSync(join(layout.fileCacheDir, 'repo-1', 'docs'), { recursive: true });
        writeFileSync(join(layout.fileCacheDir, 'repo-1', 'docs', 'a.txt'), 'a');
      }

      const report = await new CachedFilesCleaner(layout).run();

      expect(existsSync(layout.fileCacheDbFile)).toBe(false);
      expect(existsSync(layout.fileCacheTempDir)).toBe(false);
      expect(existsSync(layout.fileCacheDir)).toBe(false);
      expect(report).toEqual({
        removedDbFile: db,
        removedLeftoverTempDir: temp,
        removedCacheDir: live,
        failures: [],
      });
    }
  );

  it('keeps going when the metadata store cannot be removed', async () => {
    // A directory where the store file should be makes unlink fail
    mkdirSync(layout.fileCacheDbFile);
    mkdirSync(join(layout.fileCacheDir, 'repo-1'), { recursive: true });
    writeFileSync(join(layout.fileCacheDir, 'repo-1', 'a.txt'), 'a');

    const report = await new CachedFilesCleaner(layout).run();

    expect(report.failures).toEqual(['remove metadata store']);
    expect(report.removedCacheDir).toBe(true);
    expect(existsSync(layout.fileCacheDir)).toBe(false);
    expect(existsSync(layout.fileCacheTempDir)).toBe(false);
  });

  it('does not touch files outside the cache layout', async () => {
    writeFileSync(join(root, 'settings.json'), '{}');
    mkdirSync(layout.fileCacheDir);

    await new CachedFilesCleaner(layout).run();

    expect(existsSync(join(root, 'settings.json'))).toBe(true);
  });
});

describe('CleanupWorkerPool', () => {
  it('returns from submit before the job runs to completion', async () => {
    const pool = new CleanupWorkerPool();
    let finished = false;

    pool.submit({
      run: async () => {
        await new Promise((resolve) => setTimeout(resolve, 20));
        finished = true;
      },
    });

    expect(finished).toBe(false);
    expect(pool.pending).toBe(1);

    await pool.onIdle();
    expect(finished).toBe(true);
    expect(pool.pending).toBe(0);
  });

  it('runs jobs one after another', async () => {
    const pool = new CleanupWorkerPool();
    const order: string[] = [];

    pool.submit({
      run: async () => {
        order.push('first:start');
        await new Promise((resolve) => setTimeout(resolve, 10));
        order.push('first:end');
      },
    });
    pool.submit({
      run: async () => {
        order.push('second');
      },
    });

    await pool.onIdle();
    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('survives a job that throws', async () => {
    const pool = new CleanupWorkerPool();
    let ran = false;

    pool.submit({
      run: async () => {
        throw new Error('disk gone');
      },
    });
    pool.submit({
      run: async () => {
        ran = true;
      },
    });

    await expect(pool.onIdle()).resolves.toBeUndefined();
    expect(ran).toBe(true);
  });
});
