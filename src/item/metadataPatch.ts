import { MetadataInput } from '../types';

export const REMOVE_TAG = 'REMOVE_TAG';

export interface PatchOperation {
  op: 'add' | 'replace' | 'remove';
  path: string;
  value?: unknown;
}

function pointer(key: string): string {
  return `/${key.replace(/~/g, '~0').replace(/\//g, '~1')}`;
}

/**
 * JSON Patch (RFC 6902) turning `current` into `current` updated with
 * `changes`. A value of REMOVE_TAG deletes the key; with `append`, string
 * values are joined with a space and list values are extended.
 */
export function buildMetadataPatch(
  current: Record<string, unknown>,
  changes: MetadataInput,
  append = false
): PatchOperation[] {
  const operations: PatchOperation[] = [];

  for (const [key, value] of Object.entries(changes)) {
    const exists = Object.prototype.hasOwnProperty.call(current, key);
    const existing = current[key];

    if (value === REMOVE_TAG) {
      if (exists) operations.push({ op: 'remove', path: pointer(key) });
      continue;
    }
    if (value === undefined || value === null) {
      continue;
    }
    if (!exists) {
      operations.push({ op: 'add', path: pointer(key), value });
    } else if (append && Array.isArray(existing)) {
      for (const entry of Array.isArray(value) ? value : [value]) {
        operations.push({ op: 'add', path: `${pointer(key)}/-`, value: entry });
      }
    } else if (append) {
      operations.push({ op: 'replace', path: pointer(key), value: `${String(existing)} ${String(value)}` });
    } else if (JSON.stringify(existing) !== JSON.stringify(value)) {
      operations.push({ op: 'replace', path: pointer(key), value });
    }
  }

  return operations;
}
