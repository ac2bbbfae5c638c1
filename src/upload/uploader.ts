import fs from 'node:fs';
import path from 'node:path';
import type { RemoteStore } from './driveClient.js';
import { UploadError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface CategoryUploadResult {
  uploaded: number;
  skipped: number;
  failed: number;
}

export type UploadSummary = Record<string, CategoryUploadResult>;

type FileOutcome = 'uploaded' | 'skipped' | 'failed';

function listFilesRecursive(dir: string): string[] {
  const files: string[] = [];
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...listFilesRecursive(full));
    } else if (entry.isFile() && !entry.name.endsWith('.part')) {
      files.push(full);
    }
  }
  return files.sort();
}

/**
 * Mirrors outputRoot/category/topic/... into a remote folder. Folders are
 * looked up by name and parent before being created, and files already
 * present remotely under the same name and parent are skipped, so repeat
 * uploads are idempotent. Files anywhere below a topic folder land flat in
 * that topic's remote folder.
 */
export class TreeUploader {
  private readonly folderCache = new Map<string, string>();

  constructor(private readonly remote: RemoteStore) {}

  async findOrCreateFolder(name: string, parentId: string): Promise<string> {
    const cacheKey = `${parentId}/${name}`;
    const cached = this.folderCache.get(cacheKey);
    if (cached) return cached;

    let folderId = await this.remote.findFolder(name, parentId);
    if (folderId) {
      logger.debug({ name, folderId }, 'Found existing remote folder');
    } else {
      folderId = await this.remote.createFolder(name, parentId);
      logger.info({ name, folderId }, 'Created remote folder');
    }
    this.folderCache.set(cacheKey, folderId);
    return folderId;
  }

  async uploadFile(localPath: string, folderId: string): Promise<FileOutcome> {
    const name = path.basename(localPath);
    try {
      if (await this.remote.fileExists(name, folderId)) {
        logger.debug({ name }, 'File already exists remotely');
        return 'skipped';
      }
      await this.remote.uploadFile(localPath, name, folderId);
      logger.debug({ name }, 'Uploaded');
      return 'uploaded';
    } catch (err) {
      logger.error({ name, error: errorMessage(err) }, 'Upload failed');
      return 'failed';
    }
  }

  async uploadCategory(categoryPath: string, parentFolderId: string): Promise<CategoryUploadResult> {
    const result: CategoryUploadResult = { uploaded: 0, skipped: 0, failed: 0 };
    const categoryName = path.basename(categoryPath);
    const tally = (outcome: FileOutcome): void => {
      result[outcome]++;
    };

    let categoryFolderId: string;
    try {
      categoryFolderId = await this.findOrCreateFolder(categoryName, parentFolderId);
    } catch (err) {
      logger.error({ category: categoryName, error: errorMessage(err) }, 'Failed to prepare category folder');
      result.failed++;
      return result;
    }

    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(categoryPath, { withFileTypes: true }).sort((a, b) => a.name.localeCompare(b.name));
    } catch (err) {
      logger.error({ category: categoryName, error: errorMessage(err) }, 'Failed to read category folder');
      result.failed++;
      return result;
    }
    for (const entry of entries) {
      const entryPath = path.join(categoryPath, entry.name);

      if (!entry.isDirectory()) {
        if (entry.name.endsWith('.json')) {
          tally(await this.uploadFile(entryPath, categoryFolderId));
        }
        continue;
      }

      let topicFolderId: string;
      try {
        topicFolderId = await this.findOrCreateFolder(entry.name, categoryFolderId);
      } catch (err) {
        logger.error({ topic: entry.name, error: errorMessage(err) }, 'Failed to prepare topic folder');
        result.failed++;
        continue;
      }

      let files: string[];
      try {
        files = listFilesRecursive(entryPath);
      } catch (err) {
        logger.error({ topic: entry.name, error: errorMessage(err) }, 'Failed to read topic folder');
        result.failed++;
        continue;
      }
      for (const file of files) {
        tally(await this.uploadFile(file, topicFolderId));
      }
    }

    logger.info({ category: categoryName, ...result }, 'Category upload complete');
    return result;
  }

  /**
   * Throws UploadError when the base path cannot be listed; failures inside a
   * category are counted in that category's result.
   */
  async uploadAll(basePath: string, targetFolderId: string): Promise<UploadSummary> {
    const summary: UploadSummary = {};
    if (!fs.existsSync(basePath)) {
      logger.error({ basePath }, 'Upload base path not found');
      return summary;
    }

    let categories: fs.Dirent[];
    try {
      categories = fs
        .readdirSync(basePath, { withFileTypes: true })
        .filter((e) => e.isDirectory() && !e.name.startsWith('.'))
        .sort((a, b) => a.name.localeCompare(b.name));
    } catch (err) {
      throw new UploadError(`Cannot read output folder ${basePath}`, { error: errorMessage(err) });
    }

    for (const category of categories) {
      summary[category.name] = await this.uploadCategory(path.join(basePath, category.name), targetFolderId);
    }
    return summary;
  }
}
