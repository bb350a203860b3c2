import { minimatch } from 'minimatch';
import { DEFAULTS } from '../config/default';
import type { ArchiveSession } from '../session/ArchiveSession';
import { ArchiveResponse } from '../session/ArchiveResponse';
import { FileFilter, MetadataInput, PreparedRequest } from '../types';
import { retryOnSlowDown } from '../upload/retry';
import { quote } from '../upload/s3Headers';
import { UploadFiles, UploadManager, UploadOptions, UploadResult } from '../upload/UploadManager';
import { ArchiveHttpError } from '../utils/errors';
import { validateIdentifier } from '../utils/identifier';
import { logger } from '../utils/logger';
import { ArchiveFile } from './ArchiveFile';
import { buildMetadataPatch } from './metadataPatch';
import {
  DeleteOptions,
  DownloadOptions,
  DownloadResult,
  itemMetadataResponseSchema,
  ModifyMetadataOptions,
} from './types';

export type DeleteResult =
  | { kind: 'sent'; key: string; response: ArchiveResponse; retriesUsed: number }
  | { kind: 'debug'; key: string; request: PreparedRequest };

function asList(value: string | string[] | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return Array.isArray(value) ? value : [value];
}

/**
 * Handle on one archive item. Metadata and the file listing are fetched on
 * `load()` and held only for the lifetime of the object.
 */
export class ArchiveItem {
  metadata: Record<string, unknown> = {};
  files: ArchiveFile[] = [];
  server?: string;
  dir?: string;
  created?: number;
  itemSize?: number;
  exists = false;
  loaded = false;

  constructor(
    readonly session: ArchiveSession,
    readonly identifier: string
  ) {}

  get detailsUrl(): string {
    return this.session.url('api', `/details/${this.identifier}`);
  }

  get metadataUrl(): string {
    return this.session.url('api', `/metadata/${this.identifier}`);
  }

  async load(): Promise<this> {
    const response = await this.session.get(this.metadataUrl);
    await response.raiseForStatus();

    const parsed = itemMetadataResponseSchema.safeParse(response.json());
    if (!parsed.success) {
      throw new ArchiveHttpError(
        response.status,
        response.url,
        response.body,
        `unexpected metadata document: ${parsed.error.issues[0]?.message ?? 'invalid'}`
      );
    }

    const data = parsed.data;
    this.metadata = data.metadata ?? {};
    this.files = (data.files ?? []).map(record => new ArchiveFile(this, record));
    this.server = data.server;
    this.dir = data.dir;
    this.created = data.created;
    this.itemSize = data.item_size;
    this.exists = Object.keys(data).length > 0;
    this.loaded = true;

    logger.debug(`Loaded ${this.identifier}: ${this.files.length} files`);
    return this;
  }

  refresh(): Promise<this> {
    return this.load();
  }

  getFile(name: string): ArchiveFile | undefined {
    return this.files.find(file => file.name === name);
  }

  /** Files matching every filter given; no filters returns the whole listing. */
  getFiles(filter: FileFilter = {}): ArchiveFile[] {
    const names = asList(filter.files);
    const sources = asList(filter.source);
    const formats = asList(filter.formats);
    const patterns = filter.globPattern?.split('|').filter(Boolean);

    return this.files.filter(file => {
      if (names && !names.includes(file.name)) return false;
      if (sources && !(file.source && sources.includes(file.source))) return false;
      if (formats && !(file.format && formats.includes(file.format))) return false;
      if (patterns && !patterns.some(pattern => minimatch(file.name, pattern, { matchBase: true }))) {
        return false;
      }
      return true;
    });
  }

  upload(files: UploadFiles, options: UploadOptions = {}): Promise<UploadResult[]> {
    return new UploadManager(this).upload(files, options);
  }

  async download(options: DownloadOptions = {}): Promise<DownloadResult[]> {
    const selected = this.getFiles(options);
    if (options.files && selected.length === 0) {
      logger.warn(`No matching files found in ${this.identifier}`);
    }

    const results: DownloadResult[] = [];
    for (const file of selected) {
      results.push(await file.download(options));
    }
    return results;
  }

  /**
   * POST a JSON Patch for `changes` to the metadata write API. Returns the
   * service's response (`{ success, task_id, log }` or `{ success, error }`).
   */
  async modifyMetadata(changes: MetadataInput, options: ModifyMetadataOptions = {}): Promise<ArchiveResponse> {
    if (!this.loaded) {
      await this.load();
    }
    const target = options.target ?? 'metadata';
    const patch = buildMetadataPatch(this.currentTarget(target), changes, options.append);

    const form = new URLSearchParams();
    form.append('-target', target);
    form.append('-patch', JSON.stringify(patch));
    if (this.session.accessKey) form.append('access', this.session.accessKey);
    if (this.session.secretKey) form.append('secret', this.session.secretKey);

    logger.debug(`Modifying ${target} of ${this.identifier}: ${JSON.stringify(patch)}`);
    const response = await this.session.post(this.metadataUrl, { body: form });
    if (!response.ok) {
      logger.error(`Failed to modify ${this.identifier} (${response.status}): ${await response.errorMessage()}`);
    }
    return response;
  }

  async deleteFile(name: string, options: DeleteOptions = {}): Promise<DeleteResult> {
    validateIdentifier(this.identifier);
    const url = this.session.url('s3', `/${this.identifier}/${quote(name)}`);
    const headers: Record<string, string> = {};
    if (options.cascadeDelete) {
      headers['x-archive-cascade-delete'] = '1';
    }

    if (options.debug) {
      return {
        kind: 'debug',
        key: name,
        request: { method: 'DELETE', url, headers: this.session.requestHeaders({ headers }) },
      };
    }

    const { response, retriesUsed } = await retryOnSlowDown(
      () => this.session.delete(url, { headers }),
      { retries: options.retries, retriesSleep: options.retriesSleep ?? DEFAULTS.RETRIES_SLEEP_SECONDS },
      name
    );
    if (response.ok) {
      logger.item(`deleted ${this.identifier}/${name}`);
    } else {
      logger.error(`Failed to delete ${name} (${response.status}): ${await response.errorMessage()}`);
    }
    return { kind: 'sent', key: name, response, retriesUsed };
  }

  private currentTarget(target: string): Record<string, unknown> {
    if (target === 'metadata') {
      return this.metadata;
    }
    if (target.startsWith('files/')) {
      return this.getFile(target.slice('files/'.length))?.record ?? {};
    }
    return {};
  }
}
