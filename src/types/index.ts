import type { RequestInit, Response } from 'node-fetch';

export interface Credentials {
  accessKey?: string;
  secretKey?: string;
}

export interface ArchiveConfig {
  s3: {
    access?: string;
    secret?: string;
  };
  general: {
    host: string;
    s3Host: string;
    secure: boolean;
  };
  logging: {
    level?: string;
  };
}

/** Partial config as passed by callers; every section and key is optional. */
export interface ArchiveConfigInput {
  s3?: Partial<ArchiveConfig['s3']>;
  general?: Partial<ArchiveConfig['general']>;
  logging?: Partial<ArchiveConfig['logging']>;
}

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface SessionOptions {
  config?: ArchiveConfigInput;
  configFile?: string;
  env?: NodeJS.ProcessEnv;
  /** Per-request timeout in milliseconds; 0 disables it. */
  timeoutMs?: number;
  fetch?: FetchLike;
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'HEAD';

export type MetadataValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | Array<string | number>
  | Record<string, unknown>;

export type MetadataInput = Record<string, MetadataValue>;

export interface PreparedRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
}

export interface FileFilter {
  files?: string | string[];
  source?: string | string[];
  formats?: string | string[];
  /** One or more glob patterns separated by `|`. */
  globPattern?: string;
}

export interface RetryOptions {
  retries?: number;
  /** Seconds to wait between attempts after a 503 SlowDown. */
  retriesSleep?: number;
}

export type SearchDocument = Record<string, unknown>;

export interface SearchOptions {
  fields?: string[];
  sorts?: string[];
  params?: Record<string, string | number>;
  pageSize?: number;
}
