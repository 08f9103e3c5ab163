/**
 * Platform Quirk Filter
 * 
 * Some image and PDF viewers (notably on macOS) rewrite or touch a file when
 * they open it, which shows up as a change notification although the user
 * edited nothing. Files of those types opened within the last few seconds
 * have their notifications ignored.
 */

import { lookup as lookupMimeType } from 'mime-types';

export const DEFAULT_QUIRK_WINDOW_MS = 10_000;

export type QuirkFilterMode = 'auto' | 'on' | 'off';

export interface SpuriousChangeFilter {
  fileOpened(filePath: string): void;
  isSpurious(filePath: string): boolean;
}

/**
 * For platforms without the quirk
 */
export const noSpuriousChanges: SpuriousChangeFilter = {
  fileOpened: () => undefined,
  isSpurious: () => false,
};

export interface RecentOpenFilterOptions {
  windowMs?: number;
  now?: () => number;
}

export function isQuirkProneType(filePath: string): boolean {
  const mimeType = lookupMimeType(filePath);
  if (!mimeType) return false;
  return mimeType.startsWith('image/') || mimeType === 'application/pdf';
}

export class RecentOpenFilter implements SpuriousChangeFilter {
  // path -> last open time; entries are only ever overwritten
  private openedAt: Map<string, number> = new Map();
  private readonly windowMs: number;
  private readonly now: () => number;

  constructor(options: RecentOpenFilterOptions = {}) {
    this.windowMs = options.windowMs ?? DEFAULT_QUIRK_WINDOW_MS;
    this.now = options.now ?? Date.now;
  }

  fileOpened(filePath: string): void {
    if (isQuirkProneType(filePath)) {
      this.openedAt.set(filePath, this.now());
    }
  }

  isSpurious(filePath: string): boolean {
    const openedAt = this.openedAt.get(filePath);
    if (openedAt === undefined) {
      return false;
    }
    return this.now() < openedAt + this.windowMs;
  }
}

/**
 * Pick the filter for the running platform
 */
export function createPlatformQuirkFilter(
  mode: QuirkFilterMode = 'auto',
  options: RecentOpenFilterOptions = {},
  platform: NodeJS.Platform = process.platform
): SpuriousChangeFilter {
  if (mode === 'off' || (mode === 'auto' && platform !== 'darwin')) {
    return noSpuriousChanges;
  }
  return new RecentOpenFilter(options);
}
