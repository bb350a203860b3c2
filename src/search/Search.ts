import { z } from 'zod';
import { DEFAULTS } from '../config/default';
import type { ArchiveItem } from '../item/ArchiveItem';
import type { ArchiveSession, QueryParams } from '../session/ArchiveSession';
import { SearchDocument, SearchOptions } from '../types';
import { ArchiveHttpError } from '../utils/errors';
import { logger } from '../utils/logger';

const searchPageSchema = z.object({
  responseHeader: z.record(z.unknown()).optional(),
  response: z.object({
    numFound: z.number(),
    start: z.number(),
    docs: z.array(z.record(z.unknown())),
  }),
});

export type SearchPage = z.infer<typeof searchPageSchema>;

/**
 * A lazy view over an advanced-search query. Nothing is fetched until the
 * result is iterated or counted; every new iteration starts again from the
 * first page. Only the hit count is kept between iterations.
 *
 * Passing `page` or `rows` in `params` pins the search to that single page.
 */
export class Search implements AsyncIterable<SearchDocument> {
  readonly query: string;
  readonly fields: string[];
  readonly sorts: string[];
  readonly pageSize: number;
  private readonly extraParams: Record<string, string | number>;
  private readonly fixedPage?: { page: number; rows: number };
  private numFound?: number;

  constructor(
    private readonly session: ArchiveSession,
    query: string,
    options: SearchOptions = {}
  ) {
    this.query = query;
    const fields = options.fields ?? [];
    this.fields = fields.includes('identifier') ? [...fields] : ['identifier', ...fields];
    this.sorts = options.sorts ?? [];
    this.pageSize = options.pageSize ?? DEFAULTS.SEARCH_PAGE_SIZE;

    const { page, rows, ...rest } = options.params ?? {};
    this.extraParams = rest;
    if (page !== undefined || rows !== undefined) {
      this.fixedPage = {
        page: Number(page ?? 1),
        rows: Number(rows ?? this.pageSize),
      };
    }
  }

  get url(): string {
    return this.session.url('api', '/advancedsearch.php');
  }

  /** `numFound` of the query, fetched with a zero-row request if not yet known. */
  async getNumFound(): Promise<number> {
    if (this.numFound === undefined) {
      const page = await this.fetchPage(this.fixedPage?.page ?? 1, 0);
      this.numFound = page.response.numFound;
    }
    return this.numFound;
  }

  [Symbol.asyncIterator](): AsyncIterator<SearchDocument> {
    return this.iterate();
  }

  async *iterate(): AsyncGenerator<SearchDocument, void, undefined> {
    if (this.fixedPage) {
      const { response } = await this.fetchPage(this.fixedPage.page, this.fixedPage.rows);
      this.numFound = response.numFound;
      yield* response.docs;
      return;
    }

    let page = 1;
    let yielded = 0;
    let total: number | undefined;

    for (;;) {
      const { response } = await this.fetchPage(page, this.pageSize);
      if (total === undefined) {
        total = response.numFound;
        this.numFound = total;
      }

      for (const doc of response.docs) {
        if (yielded >= total) return;
        yield doc;
        yielded++;
      }

      if (response.docs.length === 0 || yielded >= total) {
        return;
      }
      page++;
    }
  }

  /**
   * The results as items, each loaded with its own metadata request at the
   * moment it is consumed.
   */
  async *iterAsItems(): AsyncGenerator<ArchiveItem, void, undefined> {
    for await (const doc of this) {
      const identifier = doc.identifier;
      if (typeof identifier !== 'string') {
        logger.warn('Search result without an identifier, skipping');
        continue;
      }
      yield await this.session.getItem(identifier);
    }
  }

  private async fetchPage(page: number, rows: number): Promise<SearchPage> {
    const query: QueryParams = {
      q: this.query,
      'fl[]': this.fields,
      rows,
      page,
      output: 'json',
      ...this.extraParams,
    };
    if (this.sorts.length > 0) {
      query['sort[]'] = this.sorts;
    }

    logger.debug(`Fetching search page ${page} (${rows} rows) for: ${this.query}`);
    const response = await this.session.get(this.url, { query });
    await response.raiseForStatus();

    const parsed = searchPageSchema.safeParse(response.json());
    if (!parsed.success) {
      throw new ArchiveHttpError(response.status, response.url, response.body, await response.errorMessage());
    }
    return parsed.data;
  }
}
