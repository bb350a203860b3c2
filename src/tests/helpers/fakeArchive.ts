import { Readable } from 'stream';
import { Headers, RequestInit, Response } from 'node-fetch';
import { ArchiveSession } from '../../session/ArchiveSession';
import { ArchiveConfig, FetchLike } from '../../types';
import { FileUtils } from '../../utils/fileUtils';

export interface FakeReply {
  status?: number;
  body?: string | object;
  headers?: Record<string, string>;
}

export interface RecordedRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

export type Responder = (request: RecordedRequest) => FakeReply;

interface Route {
  method: string;
  match: string | RegExp;
  replies: FakeReply[] | Responder;
}

export const TEST_CONFIG: ArchiveConfig = {
  s3: { access: 'test-access', secret: 'test-secret' },
  general: { host: 'archive.org', s3Host: 's3.us.archive.org', secure: true },
  logging: {},
};

async function readBody(body: RequestInit['body']): Promise<string | undefined> {
  if (body === undefined || body === null) return undefined;
  if (typeof body === 'string') return body;
  if (body instanceof URLSearchParams) return body.toString();
  if (Buffer.isBuffer(body)) return body.toString('utf8');
  if (body instanceof Readable) return (await FileUtils.readStream(body)).toString('utf8');
  return undefined;
}

function routeMatches(route: Route, method: string, url: string): boolean {
  if (route.method !== method) return false;
  if (typeof route.match === 'string') {
    return url.split('?')[0] === route.match;
  }
  return route.match.test(url);
}

/**
 * In-process stand-in for the archive's HTTP endpoints. Routes match on
 * method and URL (a string matches the URL without its query); each route
 * replays its replies in order and repeats the last one.
 */
export class FakeArchive {
  readonly requests: RecordedRequest[] = [];
  private readonly routes: Route[] = [];

  readonly fetch = jest.fn<ReturnType<FetchLike>, Parameters<FetchLike>>((url, init) => this.handle(url, init));

  on(method: string, match: string | RegExp, ...replies: FakeReply[]): this {
    this.routes.push({ method, match, replies: replies.length > 0 ? replies : [{}] });
    return this;
  }

  /** Answer every matching request by calling `responder`. */
  route(method: string, match: string | RegExp, responder: Responder): this {
    this.routes.push({ method, match, replies: responder });
    return this;
  }

  requestsTo(method: string, match?: string | RegExp): RecordedRequest[] {
    return this.requests.filter(request =>
      match === undefined ? request.method === method : routeMatches({ method, match, replies: [] }, request.method, request.url)
    );
  }

  session(config: ArchiveConfig = TEST_CONFIG): ArchiveSession {
    return new ArchiveSession(config, { fetch: this.fetch });
  }

  private async handle(url: string, init: RequestInit = {}): Promise<Response> {
    const method = init.method ?? 'GET';
    const headers: Record<string, string> = {};
    new Headers(init.headers).forEach((value, name) => {
      headers[name] = value;
    });
    const request: RecordedRequest = { method, url, headers, body: await readBody(init.body) };
    this.requests.push(request);

    const route = this.routes.find(candidate => routeMatches(candidate, method, url));
    if (!route) {
      return new Response(Readable.from([Buffer.from(`no route for ${method} ${url}`)]), { status: 404 });
    }

    const { replies } = route;
    const reply = typeof replies === 'function' ? replies(request) : replies.length > 1 ? replies.shift() : replies[0];
    const status = reply?.status ?? 200;
    const body = reply?.body ?? '';
    const text = typeof body === 'string' ? body : JSON.stringify(body);
    const responseHeaders: Record<string, string> = {
      ...(typeof body === 'string' ? {} : { 'content-type': 'application/json' }),
      ...reply?.headers,
    };
    // Streamed so that download bodies can be piped.
    return new Response(Readable.from([Buffer.from(text)]), { status, headers: responseHeaders });
  }
}
