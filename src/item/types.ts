import { z } from 'zod';

const stringOrNumber = z.union([z.string(), z.number()]);

export const archiveFileRecordSchema = z
  .object({
    name: z.string(),
    source: z.string().optional(),
    format: z.string().optional(),
    size: stringOrNumber.optional(),
    md5: z.string().optional(),
    sha1: z.string().optional(),
    crc32: z.string().optional(),
    mtime: stringOrNumber.optional(),
    original: z.string().optional(),
  })
  .passthrough();

export type ArchiveFileRecord = z.infer<typeof archiveFileRecordSchema>;

/** Body of `GET /metadata/<identifier>`; `{}` for an item that does not exist. */
export const itemMetadataResponseSchema = z
  .object({
    metadata: z.record(z.unknown()).optional(),
    files: z.array(archiveFileRecordSchema).optional(),
    server: z.string().optional(),
    dir: z.string().optional(),
    d1: z.string().optional(),
    d2: z.string().optional(),
    created: z.number().optional(),
    updated: z.number().optional(),
    item_size: z.number().optional(),
    files_count: z.number().optional(),
    is_dark: z.boolean().optional(),
  })
  .passthrough();

export type ItemMetadataResponse = z.infer<typeof itemMetadataResponseSchema>;

export interface DownloadOptions {
  files?: string | string[];
  source?: string | string[];
  formats?: string | string[];
  globPattern?: string;
  /** Base directory; files land in `<destdir>/<identifier>/<name>`. */
  destdir?: string;
  /** Write straight into `destdir` without the identifier directory. */
  noDirectory?: boolean;
  /** Skip files whose local MD5 matches the item's record. */
  checksum?: boolean;
  /** Skip files that already exist locally. */
  ignoreExisting?: boolean;
  /** Resolve targets without downloading anything. */
  dryRun?: boolean;
}

export type DownloadStatus = 'downloaded' | 'skipped' | 'failed' | 'planned';

export interface DownloadResult {
  name: string;
  url: string;
  path: string;
  status: DownloadStatus;
  error?: string;
}

export interface ModifyMetadataOptions {
  /** `metadata` (default) or a file target such as `files/<name>`. */
  target?: string;
  /** Append to existing string values instead of replacing them. */
  append?: boolean;
}

export interface DeleteOptions {
  cascadeDelete?: boolean;
  retries?: number;
  retriesSleep?: number;
  debug?: boolean;
}
