import { MetadataInput, MetadataValue } from '../types';

/**
 * Percent-encode everything except unreserved characters and `/`, the way
 * the S3 endpoint expects keys and `uri(...)` header values.
 */
export function quote(value: string): string {
  return encodeURIComponent(value)
    .replace(/[!'()*]/g, c => `%${c.charCodeAt(0).toString(16).toUpperCase()}`)
    .replace(/%2F/g, '/');
}

/** Header values must be plain ASCII without whitespace to go out verbatim. */
export function needsQuote(value: string): boolean {
  return /[^\x00-\x7F]/.test(value) || /\s/.test(value);
}

function headerValues(value: MetadataValue): string[] {
  if (value === null || value === undefined) {
    return [];
  }
  if (Array.isArray(value)) {
    return value.map(String);
  }
  if (typeof value === 'object') {
    return [JSON.stringify(value)];
  }
  return [String(value)];
}

/**
 * One `x-archive-metaNN-<key>` header per metadata value. NN indexes the
 * entries of a list value; underscores in keys are sent as `--`, which the
 * service maps back.
 */
export function buildMetadataHeaders(metadata: MetadataInput): Record<string, string> {
  const headers: Record<string, string> = {};

  for (const [key, raw] of Object.entries(metadata)) {
    headerValues(raw).forEach((value, index) => {
      if (value === '') {
        return;
      }
      const name = `x-archive-meta${String(index).padStart(2, '0')}-${key}`
        .toLowerCase()
        .replace(/_/g, '--');
      headers[name] = needsQuote(value) ? `uri(${quote(value)})` : value;
    });
  }

  return headers;
}

export interface UploadHeaderOptions {
  size: number;
  md5: string;
  metadata: MetadataInput;
  queueDerive: boolean;
  sizeHint?: number;
  extraHeaders?: Record<string, string>;
}

export function buildUploadHeaders(options: UploadHeaderOptions): Record<string, string> {
  const extra: Record<string, string> = {};
  for (const [name, value] of Object.entries(options.extraHeaders ?? {})) {
    extra[name.toLowerCase()] = value;
  }

  return {
    'content-length': String(options.size),
    'content-md5': options.md5,
    'x-archive-auto-make-bucket': '1',
    'x-archive-queue-derive': options.queueDerive ? '1' : '0',
    'x-archive-size-hint': String(options.sizeHint ?? options.size),
    ...buildMetadataHeaders(options.metadata),
    ...extra,
  };
}
