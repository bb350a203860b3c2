import fs from 'fs-extra';
import path from 'path';
import type { ArchiveItem } from '../item/ArchiveItem';
import { DEFAULTS } from '../config/default';
import { ArchiveResponse } from '../session/ArchiveResponse';
import { MetadataInput, PreparedRequest, RetryOptions } from '../types';
import { ValidationError } from '../utils/errors';
import { FileUtils } from '../utils/fileUtils';
import { validateIdentifier } from '../utils/identifier';
import { logger } from '../utils/logger';
import { retryOnSlowDown } from './retry';
import { buildUploadHeaders, quote } from './s3Headers';

export type UploadSource = string | Buffer | NodeJS.ReadableStream;

/**
 * A local path, several local paths (directories are walked), or a mapping
 * of remote key to source. In-memory and streamed sources can only be given
 * through a mapping, so they always carry a remote name. A stream is spooled
 * to a temporary file first, since its size and MD5 are needed before the
 * PUT; the file is removed once the batch finishes.
 */
export type UploadFiles = string | string[] | Record<string, UploadSource>;

export interface UploadOptions extends RetryOptions {
  metadata?: MetadataInput;
  headers?: Record<string, string>;
  queueDerive?: boolean;
  /** Skip files whose MD5 matches the copy already in the item. */
  checksum?: boolean;
  /** Remove local files once the item holds a verified copy. Implies `checksum`. */
  delete?: boolean;
  /** Describe the requests instead of sending them. */
  debug?: boolean;
  sizeHint?: number;
}

export type UploadResult =
  | {
      kind: 'sent';
      key: string;
      response: ArchiveResponse;
      retriesUsed: number;
      localPath?: string;
      deleted: boolean;
    }
  | { kind: 'skipped'; key: string; md5: string; localPath?: string; deleted: boolean }
  | { kind: 'debug'; key: string; request: PreparedRequest };

interface UploadTask {
  key: string;
  localPath?: string;
  data?: Buffer;
  /** `localPath` is a spool file owned by this upload. */
  spooled?: boolean;
}

function isReadableStream(source: UploadSource): source is NodeJS.ReadableStream {
  return typeof source === 'object' && !Buffer.isBuffer(source);
}

export function uploadSucceeded(result: UploadResult): boolean {
  return result.kind !== 'sent' || result.response.ok;
}

export class UploadManager {
  constructor(private readonly item: ArchiveItem) {}

  async upload(files: UploadFiles, options: UploadOptions = {}): Promise<UploadResult[]> {
    validateIdentifier(this.item.identifier);
    const tasks: UploadTask[] = [];
    try {
      await this.resolveTasks(files, tasks);

      if ((options.checksum || options.delete) && !this.item.loaded) {
        await this.item.load();
      }

      const results: UploadResult[] = [];
      for (const task of tasks) {
        results.push(await this.uploadFile(task, options));
      }
      return results;
    } finally {
      for (const task of tasks) {
        if (task.spooled && task.localPath) {
          await FileUtils.deleteFile(path.dirname(task.localPath));
        }
      }
    }
  }

  /** Pushes onto `tasks` as it goes, so spool files made before a failure are still cleaned up. */
  private async resolveTasks(files: UploadFiles, tasks: UploadTask[]): Promise<void> {
    if (typeof files === 'string' || Array.isArray(files)) {
      for (const localPath of typeof files === 'string' ? [files] : files) {
        tasks.push(...(await this.resolvePath(localPath)));
      }
      return;
    }

    for (const [key, source] of Object.entries(files)) {
      if (!key) {
        throw new ValidationError('A remote name is required for every upload source');
      }
      if (typeof source === 'string') {
        await this.assertReadableFile(source);
        tasks.push({ key, localPath: source });
      } else if (isReadableStream(source)) {
        tasks.push({ key, localPath: await FileUtils.spoolToTempFile(source), spooled: true });
      } else {
        tasks.push({ key, data: source });
      }
    }
  }

  /**
   * A directory given with a trailing slash uploads its contents; without
   * one, its own name becomes the key prefix.
   */
  private async resolvePath(localPath: string): Promise<UploadTask[]> {
    if (!(await FileUtils.fileExists(localPath))) {
      throw new ValidationError(`${localPath} should be a readable file or directory`);
    }
    if (!(await FileUtils.isDirectory(localPath))) {
      return [{ key: path.basename(localPath), localPath }];
    }

    const prefix = /[\\/]$/.test(localPath) ? '' : `${path.basename(localPath)}/`;
    const relativePaths = await FileUtils.listFilesRecursive(localPath);
    return relativePaths.map(relative => ({
      key: `${prefix}${relative}`,
      localPath: path.join(localPath, relative),
    }));
  }

  private async assertReadableFile(localPath: string): Promise<void> {
    if (!(await FileUtils.fileExists(localPath)) || (await FileUtils.isDirectory(localPath))) {
      throw new ValidationError(`${localPath} should be a readable file`);
    }
  }

  private async uploadFile(task: UploadTask, options: UploadOptions): Promise<UploadResult> {
    const { key, data } = task;
    const localPath = task.spooled ? undefined : task.localPath;
    const session = this.item.session;
    const md5 = data ? FileUtils.md5(data) : await FileUtils.getFileMd5(this.requirePath(task));
    const size = data ? data.length : await FileUtils.getFileSize(this.requirePath(task));

    if (options.checksum || options.delete) {
      const remote = this.item.getFile(key);
      if (remote?.md5 === md5) {
        logger.item(`${key} already exists in ${this.item.identifier}, skipping`);
        const deleted = await this.deleteLocal(localPath, options);
        return { kind: 'skipped', key, md5, localPath, deleted };
      }
    }

    const metadata: MetadataInput = { scanner: DEFAULTS.SCANNER, ...options.metadata };
    const headers = buildUploadHeaders({
      size,
      md5,
      metadata,
      queueDerive: options.queueDerive ?? true,
      sizeHint: options.sizeHint,
      extraHeaders: options.headers,
    });
    const url = session.url('s3', `/${this.item.identifier}/${quote(key)}`);

    if (options.debug) {
      return {
        kind: 'debug',
        key,
        request: { method: 'PUT', url, headers: session.requestHeaders({ headers }) },
      };
    }

    logger.item(`uploading ${key} to ${this.item.identifier}`);
    const { response, retriesUsed } = await retryOnSlowDown(
      () =>
        session.put(url, {
          headers,
          body: data ?? fs.createReadStream(this.requirePath(task)),
          // No total limit on an upload: its timer would also cover sending the body.
          timeoutMs: 0,
        }),
      { retries: options.retries, retriesSleep: options.retriesSleep ?? DEFAULTS.RETRIES_SLEEP_SECONDS },
      key
    );

    if (!response.ok) {
      logger.error(` * error uploading ${key} (${response.status}): ${await response.errorMessage()}`);
      return { kind: 'sent', key, response, retriesUsed, localPath, deleted: false };
    }

    const deleted = await this.deleteLocal(localPath, options);
    return { kind: 'sent', key, response, retriesUsed, localPath, deleted };
  }

  private requirePath(task: UploadTask): string {
    if (!task.localPath) {
      throw new ValidationError(`No local path for ${task.key}`);
    }
    return task.localPath;
  }

  private async deleteLocal(localPath: string | undefined, options: UploadOptions): Promise<boolean> {
    if (!options.delete || !localPath) {
      return false;
    }
    await FileUtils.deleteFile(localPath);
    logger.item(`deleted local file ${localPath}`);
    return true;
  }
}
