import type { Account } from '@cache-mirror/core';
import type { UploadOutcome, UploadTask, UploadTaskFactory } from '@cache-mirror/upload';
import { joinRepoPath } from '@cache-mirror/utils';
import type { WatchPrimitive } from '../watcher/fileWatcher.js';

export const alice: Account = { serverUrl: 'https://files.example.test', username: 'alice' };
export const bob: Account = { serverUrl: 'https://files.example.test', username: 'bob' };

/**
 * In-memory watch primitive; tests fire notifications by hand
 */
export class FakeWatchPrimitive implements WatchPrimitive {
  readonly addCalls: string[] = [];
  readonly removeCalls: string[] = [];
  failAdd = false;
  private watched: Set<string> = new Set();
  private listeners: Array<(filePath: string) => void> = [];

  addPath(filePath: string): boolean {
    this.addCalls.push(filePath);
    if (this.failAdd || this.watched.has(filePath)) {
      return false;
    }
    this.watched.add(filePath);
    return true;
  }

  removePath(filePath: string): boolean {
    this.removeCalls.push(filePath);
    return this.watched.delete(filePath);
  }

  files(): string[] {
    return Array.from(this.watched);
  }

  onChange(listener: (filePath: string) => void): void {
    this.listeners.push(listener);
  }

  close(): void {
    this.watched.clear();
    this.listeners = [];
  }

  emitChange(filePath: string): void {
    for (const listener of this.listeners) {
      listener(filePath);
    }
  }
}

/**
 * Upload task the test settles explicitly
 */
export class ControlledUploadTask implements UploadTask {
  readonly path: string;
  starts = 0;
  private settle: (outcome: UploadOutcome) => void = () => undefined;
  private readonly completion: Promise<UploadOutcome>;

  constructor(
    readonly account: Account,
    readonly repoId: string,
    parentPath: string,
    readonly localFilePath: string,
    fileName: string
  ) {
    this.path = joinRepoPath(parentPath, fileName);
    this.completion = new Promise((resolve) => {
      this.settle = resolve;
    });
  }

  start(): Promise<UploadOutcome> {
    this.starts++;
    return this.completion;
  }

  succeed(): void {
    this.settle({
      success: true,
      repoId: this.repoId,
      path: this.path,
      localFilePath: this.localFilePath,
      etag: 'etag-test',
    });
  }

  fail(error: string = 'connection reset'): void {
    this.settle({
      success: false,
      repoId: this.repoId,
      path: this.path,
      localFilePath: this.localFilePath,
      error,
    });
  }
}

export interface UploadTaskCall {
  account: Account;
  repoId: string;
  parentPath: string;
  localPath: string;
  fileName: string;
  isUpdate: boolean;
}

export class ControlledUploadFactory implements UploadTaskFactory {
  readonly tasks: ControlledUploadTask[] = [];
  readonly calls: UploadTaskCall[] = [];

  createUploadTask(
    account: Account,
    repoId: string,
    parentPath: string,
    localPath: string,
    fileName: string,
    isUpdate: boolean
  ): ControlledUploadTask {
    this.calls.push({ account, repoId, parentPath, localPath, fileName, isUpdate });
    const task = new ControlledUploadTask(account, repoId, parentPath, localPath, fileName);
    this.tasks.push(task);
    return task;
  }

  task(index: number): ControlledUploadTask {
    const task = this.tasks[index];
    if (!task) {
      throw new Error(`No upload task #${index}, ${this.tasks.length} created`);
    }
    return task;
  }
}
