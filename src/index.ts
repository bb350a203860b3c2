import { ArchiveSession } from './session/ArchiveSession';
import { ArchiveItem, DeleteResult } from './item/ArchiveItem';
import { ArchiveFile } from './item/ArchiveFile';
import { ArchiveResponse } from './session/ArchiveResponse';
import { Search } from './search/Search';
import { ConfigManager } from './config/configManager';
import { UploadFiles, UploadOptions, UploadResult } from './upload/UploadManager';
import { DeleteOptions, DownloadOptions, DownloadResult, ModifyMetadataOptions } from './item/types';
import { FileFilter, MetadataInput, SearchOptions, SessionOptions } from './types';
import { validateIdentifier } from './utils/identifier';
import { logger } from './utils/logger';

/** Session options, or an existing session to reuse. */
export interface ClientOptions extends SessionOptions {
  session?: ArchiveSession;
}

export function getSession(options: SessionOptions = {}): Promise<ArchiveSession> {
  return ArchiveSession.create(options);
}

async function resolveSession(options: ClientOptions): Promise<ArchiveSession> {
  return options.session ?? ArchiveSession.create(options);
}

export async function getItem(identifier: string, options: ClientOptions = {}): Promise<ArchiveItem> {
  const session = await resolveSession(options);
  return session.getItem(identifier);
}

export async function getFiles(
  identifier: string,
  filter: FileFilter = {},
  options: ClientOptions = {}
): Promise<ArchiveFile[]> {
  const item = await getItem(identifier, options);
  return item.getFiles(filter);
}

export async function modifyMetadata(
  identifier: string,
  changes: MetadataInput,
  metadataOptions: ModifyMetadataOptions = {},
  options: ClientOptions = {}
): Promise<ArchiveResponse> {
  const item = await getItem(identifier, options);
  return item.modifyMetadata(changes, metadataOptions);
}

export async function upload(
  identifier: string,
  files: UploadFiles,
  uploadOptions: UploadOptions = {},
  options: ClientOptions = {}
): Promise<UploadResult[]> {
  validateIdentifier(identifier);
  const item = await getItem(identifier, options);
  return item.upload(files, uploadOptions);
}

export async function download(
  identifier: string,
  downloadOptions: DownloadOptions = {},
  options: ClientOptions = {}
): Promise<DownloadResult[]> {
  const item = await getItem(identifier, options);
  return item.download(downloadOptions);
}

export async function deleteFiles(
  identifier: string,
  names: string[],
  deleteOptions: DeleteOptions = {},
  options: ClientOptions = {}
): Promise<DeleteResult[]> {
  validateIdentifier(identifier);
  const item = await getItem(identifier, options);
  const results: DeleteResult[] = [];
  for (const name of names) {
    results.push(await item.deleteFile(name, deleteOptions));
  }
  return results;
}

export async function searchItems(
  query: string,
  searchOptions: SearchOptions = {},
  options: ClientOptions = {}
): Promise<Search> {
  const session = await resolveSession(options);
  return session.searchItems(query, searchOptions);
}

export { ArchiveSession, ArchiveItem, ArchiveFile, ArchiveResponse, Search, ConfigManager, logger };
export { ArchiveError, ArchiveHttpError, ConfigError, ValidationError } from './utils/errors';
export { validateIdentifier, isValidIdentifier } from './utils/identifier';
export { LogLevel } from './utils/logger';
export { buildMetadataHeaders, buildUploadHeaders, needsQuote, quote } from './upload/s3Headers';
export { uploadSucceeded } from './upload/UploadManager';
export { buildMetadataPatch, REMOVE_TAG } from './item/metadataPatch';
export type { UploadFiles, UploadOptions, UploadResult, DeleteResult };
export * from './item/types';
export * from './types';
