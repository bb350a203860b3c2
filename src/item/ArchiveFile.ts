import path from 'path';
import type { ArchiveItem } from './ArchiveItem';
import { ArchiveFileRecord, DownloadOptions, DownloadResult } from './types';
import { ArchiveResponse } from '../session/ArchiveResponse';
import { quote } from '../upload/s3Headers';
import { FileUtils } from '../utils/fileUtils';
import { logger } from '../utils/logger';

function optionalNumber(value: string | number | undefined): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * One entry of an item's file listing. Read-only; built from the metadata
 * response.
 */
export class ArchiveFile {
  readonly identifier: string;
  readonly name: string;
  readonly source?: string;
  readonly format?: string;
  readonly size?: number;
  readonly md5?: string;
  readonly sha1?: string;
  readonly crc32?: string;
  readonly mtime?: number;
  readonly url: string;

  constructor(
    private readonly item: ArchiveItem,
    readonly record: ArchiveFileRecord
  ) {
    this.identifier = item.identifier;
    this.name = record.name;
    this.source = record.source;
    this.format = record.format;
    this.size = optionalNumber(record.size);
    this.md5 = record.md5?.toLowerCase();
    this.sha1 = record.sha1;
    this.crc32 = record.crc32;
    this.mtime = optionalNumber(record.mtime);
    this.url = item.session.url('api', `/download/${item.identifier}/${quote(record.name)}`);
  }

  localPath(options: Pick<DownloadOptions, 'destdir' | 'noDirectory'> = {}): string {
    const destdir = options.destdir ?? '.';
    return options.noDirectory
      ? path.join(destdir, this.name)
      : path.join(destdir, this.identifier, this.name);
  }

  async download(options: DownloadOptions = {}): Promise<DownloadResult> {
    const target = this.localPath(options);
    const result = { name: this.name, url: this.url, path: target };

    if (options.dryRun) {
      return { ...result, status: 'planned' };
    }

    const exists = await FileUtils.fileExists(target);
    if (exists && options.ignoreExisting) {
      logger.item(`${target} already exists, skipping`);
      return { ...result, status: 'skipped' };
    }
    if (exists && options.checksum && this.md5 && (await FileUtils.getFileMd5(target)) === this.md5) {
      logger.item(`${target} matches its checksum, skipping`);
      return { ...result, status: 'skipped' };
    }

    let writing = false;
    try {
      const response = await this.item.session.send('GET', this.url);
      if (!response.ok) {
        const failure = await ArchiveResponse.fromFetch('GET', this.url, response);
        const message = `${failure.status}: ${await failure.errorMessage()}`;
        logger.error(`Failed to download ${this.name} (${message})`);
        return { ...result, status: 'failed', error: message };
      }

      writing = true;
      await FileUtils.writeStream(response.body, target);
      logger.item(`downloaded ${this.identifier}/${this.name} to ${target}`);
      return { ...result, status: 'downloaded' };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Failed to download ${this.name}: ${message}`);
      if (writing) {
        await FileUtils.deleteFile(target);
      }
      return { ...result, status: 'failed', error: message };
    }
  }
}
