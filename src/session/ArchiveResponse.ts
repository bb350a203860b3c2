import type { Response } from 'node-fetch';
import { HttpMethod } from '../types';
import { ArchiveHttpError } from '../utils/errors';
import { getXmlText } from '../utils/xml';

export const SLOW_DOWN_STATUS = 503;

function jsonErrorField(body: string): string | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return undefined;
  }
  if (parsed !== null && typeof parsed === 'object' && 'error' in parsed) {
    return String(parsed.error);
  }
  return undefined;
}

/**
 * A fully read HTTP response. Callers branch on `status`: 2xx success,
 * 503 SlowDown (transient), anything else terminal.
 */
export class ArchiveResponse {
  constructor(
    readonly method: HttpMethod,
    readonly url: string,
    readonly status: number,
    readonly statusText: string,
    readonly headers: Record<string, string>,
    readonly body: string
  ) {}

  static async fromFetch(method: HttpMethod, url: string, response: Response): Promise<ArchiveResponse> {
    const headers: Record<string, string> = {};
    response.headers.forEach((value, name) => {
      headers[name.toLowerCase()] = value;
    });
    const body = await response.text();
    return new ArchiveResponse(method, url, response.status, response.statusText, headers, body);
  }

  get ok(): boolean {
    return this.status >= 200 && this.status < 300;
  }

  get isSlowDown(): boolean {
    return this.status === SLOW_DOWN_STATUS;
  }

  json(): unknown {
    try {
      return JSON.parse(this.body);
    } catch {
      throw new ArchiveHttpError(this.status, this.url, this.body, 'response is not JSON');
    }
  }

  /**
   * The service's own explanation of a failure: the `<Message>` of an S3 XML
   * error, the `error` field of a JSON body, or the raw body.
   */
  async errorMessage(): Promise<string> {
    const xmlMessage = await getXmlText(this.body);
    if (xmlMessage) {
      return xmlMessage;
    }
    return jsonErrorField(this.body) ?? (this.body.trim() || this.statusText);
  }

  async toError(): Promise<ArchiveHttpError> {
    return new ArchiveHttpError(this.status, this.url, this.body, await this.errorMessage());
  }

  async raiseForStatus(): Promise<void> {
    if (!this.ok) {
      throw await this.toError();
    }
  }
}
