import { randomUUID } from 'crypto';
import fetch from 'cross-fetch';
import { z } from 'zod';

import log from '../log';
import metrics from '../metrics';
import type { JsonObject } from '../query';
import { jsonValue } from '../schema';
import { trimSlashes } from '../util';
import type { QuerySet } from './queries';
import { Resource } from './resource';

/** There was a problem retrieving a document from Solr. */
export class SolrLookupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SolrLookupError';
  }
}

/** No Solr document matched the lookup. */
export class SolrDocumentNotFound extends SolrLookupError {
  constructor(message: string) {
    super(message);
    this.name = 'SolrDocumentNotFound';
  }
}

const selectResponse = z.object({
  response: z.object({
    numFound: z.number(),
    docs: z.array(z.record(jsonValue)),
  }),
  highlighting: z
    .record(z.record(z.array(z.string())))
    .optional(),
});

type SelectResponse = z.infer<typeof selectResponse>;

const errorResponse = z.object({
  error: z.object({ msg: z.string() }),
});

/** A token from a tagged text field, `text|querystring`. */
export class TaggedText {
  readonly text: string;
  readonly params: { [name: string]: string };

  constructor(text: string, params: { [name: string]: string }) {
    this.text = text;
    this.params = params;
  }

  /** Split on the first `|`. The part before it is the text, the part
   * after it is parsed as a URL query string. */
  static parse(tagged: string): TaggedText {
    const sepIdx = tagged.indexOf('|');
    if (sepIdx < 0) {
      return new TaggedText(tagged, {});
    }
    const params = new URLSearchParams(tagged.substring(sepIdx + 1));
    return new TaggedText(
      tagged.substring(0, sepIdx),
      Object.fromEntries(params.entries())
    );
  }
}

export interface SolrServiceOptions {
  /** URL of the Solr core, must have a `/select` handler */
  endpoint: string;
  queries: QuerySet;
  /** Field holding tagged text for full-text search */
  textMatchField?: string;
  /** Field holding the resource URI */
  uriField?: string;
}

/** Looks up the metadata documents that manifests are built from. */
export class SolrService {
  readonly endpoint: string;
  readonly queries: QuerySet;
  readonly textMatchField?: string;
  readonly uriField: string;

  constructor({
    endpoint,
    queries,
    textMatchField,
    uriField = 'id',
  }: SolrServiceOptions) {
    this.endpoint = trimSlashes(endpoint);
    this.queries = queries;
    this.textMatchField = textMatchField;
    this.uriField = uriField;
  }

  private async select(
    kind: 'document' | 'text',
    params: { [name: string]: string }
  ): Promise<SelectResponse> {
    // The term query parser takes the URI from a separate parameter, so
    // Solr handles any escaping of it.
    const url = new URL(`${this.endpoint}/select`);
    url.searchParams.set('q', `{!term f=${this.uriField} v=$id}`);
    url.searchParams.set('wt', 'json');
    for (const [name, value] of Object.entries(params)) {
      url.searchParams.set(name, value);
    }
    const stopMeasuring = metrics.solrQueryDuration.startTimer({ kind });
    let body: unknown;
    try {
      const resp = await fetch(url.toString(), {
        headers: { Accept: 'application/json' },
      });
      body = await resp.json();
      if (!resp.ok) {
        const parsedError = errorResponse.safeParse(body);
        throw new SolrLookupError(
          parsedError.success
            ? parsedError.data.error.msg
            : `Solr returned status ${resp.status}`
        );
      }
    } catch (err) {
      stopMeasuring({ status: 'error' });
      if (err instanceof SolrLookupError) {
        throw err;
      }
      log.error(`Failed to query Solr at ${url}: ${err}`);
      throw new SolrLookupError(`Failed to query Solr: ${err}`, { cause: err });
    }
    const parsed = selectResponse.safeParse(body);
    if (!parsed.success) {
      stopMeasuring({ status: 'error' });
      throw new SolrLookupError(
        `Malformed response from Solr: ${parsed.error.message}`
      );
    }
    stopMeasuring({ status: 'success' });
    return parsed.data;
  }

  /** Retrieve the single document whose URI field matches `resourceUri`. */
  async getDoc(resourceUri: string): Promise<JsonObject> {
    const { response } = await this.select('document', { id: resourceUri });
    if (response.numFound === 0) {
      throw new SolrDocumentNotFound(
        `No document with id "${resourceUri}" found`
      );
    }
    if (response.numFound > 1 || response.docs.length !== 1) {
      throw new SolrLookupError(
        `Multiple documents with id "${resourceUri}" found`
      );
    }
    return response.docs[0];
  }

  async getResource(resourceUri: string): Promise<Resource> {
    return new Resource(await this.getDoc(resourceUri), this.queries);
  }

  /**
   * Search the text match field of a resource for `textQuery` using Solr's
   * highlighter, returning every matching token.
   *
   * With `index`, only the matches on the page with that 0-based index
   * (the `n` parameter of the token) are returned.
   */
  async getTextMatches(
    resourceUri: string,
    textQuery: string,
    index?: number
  ): Promise<TaggedText[]> {
    const field = this.textMatchField;
    if (!field) {
      throw new SolrLookupError('No text match field is configured');
    }
    const matchTag = `<<${randomUUID()}>>`;
    const { highlighting } = await this.select('text', {
      id: resourceUri,
      hl: 'on',
      'hl.fl': field,
      'hl.q': `${field}:${textQuery}`,
      'hl.snippets': '100',
      'hl.fragsize': '50',
      'hl.maxAnalyzedChars': '1000000',
      'hl.tag.pre': matchTag,
      'hl.tag.post': matchTag,
    });
    const snippets = highlighting?.[resourceUri]?.[field] ?? [];
    const hits = snippets.flatMap((snippet) =>
      snippet
        .split(matchTag)
        .filter((_, idx) => idx % 2 === 1)
        .map((tagged) => TaggedText.parse(tagged))
    );
    if (index === undefined) {
      return hits;
    }
    return hits.filter((hit) => Number(hit.params.n) === index);
  }
}
