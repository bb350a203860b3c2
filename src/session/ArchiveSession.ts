import nodeFetch, { BodyInit, Response } from 'node-fetch';
import { ConfigManager } from '../config/configManager';
import { DEFAULTS } from '../config/default';
import { ArchiveItem } from '../item/ArchiveItem';
import { Search } from '../search/Search';
import { ArchiveConfig, FetchLike, HttpMethod, SearchOptions, SessionOptions } from '../types';
import { logger, parseLogLevel } from '../utils/logger';
import { ArchiveResponse } from './ArchiveResponse';

export type QueryParams = Record<string, string | number | Array<string | number>>;

export interface RequestOptions {
  headers?: Record<string, string>;
  body?: BodyInit;
  query?: QueryParams;
  /** Attach the `authorization` header when credentials exist. Defaults to true. */
  auth?: boolean;
  /**
   * Overrides the session timeout for this request; 0 disables it. The
   * timer runs until response headers arrive, so it also bounds the time
   * spent sending the body.
   */
  timeoutMs?: number;
}

export type HostKind = 'api' | 's3';

/**
 * Carries credentials and transport settings for every request made against
 * the archive. One session is not meant to be shared across concurrent
 * batches.
 */
export class ArchiveSession {
  readonly config: ArchiveConfig;
  readonly accessKey?: string;
  readonly secretKey?: string;
  readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(config: ArchiveConfig, options: Pick<SessionOptions, 'fetch' | 'timeoutMs'> = {}) {
    this.config = config;
    this.accessKey = config.s3.access;
    this.secretKey = config.s3.secret;
    this.timeoutMs = options.timeoutMs ?? DEFAULTS.REQUEST_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? nodeFetch;
  }

  static async create(options: SessionOptions = {}): Promise<ArchiveSession> {
    const configManager = new ConfigManager({
      config: options.config,
      configFile: options.configFile,
      env: options.env,
    });
    const config = await configManager.loadConfig();

    const level = config.logging.level ? parseLogLevel(config.logging.level) : undefined;
    if (level !== undefined) {
      logger.setLogLevel(level);
    }

    return new ArchiveSession(config, options);
  }

  get hasCredentials(): boolean {
    return Boolean(this.accessKey && this.secretKey);
  }

  get protocol(): string {
    return this.config.general.secure ? 'https:' : 'http:';
  }

  authHeaders(): Record<string, string> {
    if (!this.hasCredentials) {
      return {};
    }
    return { authorization: `LOW ${this.accessKey}:${this.secretKey}` };
  }

  /** Absolute URL on the API host (`archive.org`) or the S3 host. */
  url(kind: HostKind, pathname: string): string {
    const host = kind === 's3' ? this.config.general.s3Host : this.config.general.host;
    return `${this.protocol}//${host}${pathname.startsWith('/') ? '' : '/'}${pathname}`;
  }

  /** The full header set `send` puts on the wire for these options. */
  requestHeaders(options: Pick<RequestOptions, 'headers' | 'auth'> = {}): Record<string, string> {
    return {
      'user-agent': DEFAULTS.USER_AGENT,
      ...(options.auth === false ? {} : this.authHeaders()),
      ...options.headers,
    };
  }

  async send(method: HttpMethod, url: string, options: RequestOptions = {}): Promise<Response> {
    const target = appendQuery(url, options.query);

    logger.debug(`${method} ${target}`);
    return this.fetchImpl(target, {
      method,
      headers: this.requestHeaders(options),
      body: options.body,
      timeout: options.timeoutMs ?? this.timeoutMs,
    });
  }

  async request(method: HttpMethod, url: string, options: RequestOptions = {}): Promise<ArchiveResponse> {
    const response = await this.send(method, url, options);
    return ArchiveResponse.fromFetch(method, appendQuery(url, options.query), response);
  }

  get(url: string, options?: RequestOptions): Promise<ArchiveResponse> {
    return this.request('GET', url, options);
  }

  post(url: string, options?: RequestOptions): Promise<ArchiveResponse> {
    return this.request('POST', url, options);
  }

  put(url: string, options?: RequestOptions): Promise<ArchiveResponse> {
    return this.request('PUT', url, options);
  }

  delete(url: string, options?: RequestOptions): Promise<ArchiveResponse> {
    return this.request('DELETE', url, options);
  }

  async getItem(identifier: string): Promise<ArchiveItem> {
    const item = new ArchiveItem(this, identifier);
    await item.load();
    return item;
  }

  searchItems(query: string, options: SearchOptions = {}): Search {
    return new Search(this, query, options);
  }

  /**
   * Ask the S3 endpoint whether it is currently rejecting work for this
   * bucket. Any failure of the check itself is treated as overloaded.
   */
  async s3IsOverloaded(identifier?: string): Promise<boolean> {
    const query: QueryParams = { check_limit: 1 };
    if (this.accessKey) query.accesskey = this.accessKey;
    if (identifier) query.bucket = identifier;

    try {
      const response = await this.get(this.url('s3', '/'), { query, auth: false });
      if (!response.ok) {
        return true;
      }
      const data = response.json();
      if (data !== null && typeof data === 'object' && 'over_limit' in data) {
        return Number(data.over_limit) !== 0;
      }
      return true;
    } catch (error) {
      logger.warn('S3 limit check failed:', error);
      return true;
    }
  }
}

export function appendQuery(url: string, query?: QueryParams): string {
  if (!query || Object.keys(query).length === 0) {
    return url;
  }
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    for (const v of Array.isArray(value) ? value : [value]) {
      params.append(key, String(v));
    }
  }
  return `${url}${url.includes('?') ? '&' : '?'}${params.toString()}`;
}
