export type ArchiveErrorCode = 'VALIDATION' | 'HTTP' | 'CONFIG';

export class ArchiveError extends Error {
  readonly code: ArchiveErrorCode;

  constructor(message: string, code: ArchiveErrorCode) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Raised before any request is sent: malformed identifiers, missing local
 * files, bad `key:value` arguments, invalid CLI options.
 */
export class ValidationError extends ArchiveError {
  constructor(message: string) {
    super(message, 'VALIDATION');
  }
}

export class ConfigError extends ArchiveError {
  constructor(message: string) {
    super(message, 'CONFIG');
  }
}

/**
 * A terminal HTTP failure. The message carries the service's own error text.
 */
export class ArchiveHttpError extends ArchiveError {
  readonly status: number;
  readonly url: string;
  readonly body: string;

  constructor(status: number, url: string, body: string, detail?: string) {
    super(`HTTP ${status} from ${url}${detail ? `: ${detail}` : ''}`, 'HTTP');
    this.status = status;
    this.url = url;
    this.body = body;
  }
}
