import { QueryError } from '../query';
import type { JsonObject, JsonValue, Query, QueryVariables } from '../query';
import { isDefined } from '../util';
import type { QuerySet, StructureKey } from './queries';

export type LanguageValue = {
  '@language': string;
  '@value': string;
};

export type MetadataValue = string | LanguageValue;

export type MetadataEntry = {
  label: string;
  value: MetadataValue[];
};

const LANGUAGE_TAG = /^\[@(.*?)\](.*)$/s;

/** Turn a value carrying a leading language tag (`[@de]Wert`,
 * `[@ja-latn]...`) into a JSON-LD language value, leave anything else as it
 * is. */
export function formatValue(value: string): MetadataValue {
  const match = LANGUAGE_TAG.exec(value);
  if (!match) {
    return value;
  }
  return { '@language': match[1], '@value': match[2] };
}

export function formatLanguageTags(values: string[]): MetadataValue[] {
  return values.map(formatValue);
}

export class ResourceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ResourceError';
  }
}

function toMetadataValue(value: JsonValue): MetadataValue | undefined {
  switch (typeof value) {
    case 'string':
      return formatValue(value);
    case 'number':
    case 'boolean':
      return String(value);
    default:
      return undefined;
  }
}

function asText(value: JsonValue | undefined): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return undefined;
}

/** A digital object with a IIIF manifest, backed by a single metadata
 * document (usually a Solr document). Every accessor runs a jq query and is
 * asynchronous. */
export class Resource {
  readonly doc: JsonObject;
  private readonly queries: QuerySet;
  private pageUrisPromise: Promise<string[]> | undefined;
  private pageImageIdsPromise: Promise<string[]> | undefined;

  constructor(doc: JsonObject, queries: QuerySet) {
    this.doc = doc;
    this.queries = queries;
  }

  private async run(
    label: string,
    query: Query,
    vars: QueryVariables = {}
  ): Promise<JsonValue[]> {
    try {
      return await query.all(this.doc, vars);
    } catch (err) {
      if (err instanceof QueryError) {
        throw new ResourceError(
          `Query for ${label} failed on document: ${err.message}`,
          { cause: err }
        );
      }
      throw err;
    }
  }

  private async outputs(key: StructureKey, uri?: string): Promise<JsonValue[]> {
    const query = this.queries.get(key);
    if (!query) {
      return [];
    }
    return this.run(key, query, uri === undefined ? {} : { uri });
  }

  private async texts(key: StructureKey): Promise<string[]> {
    return (await this.outputs(key))
      .flatMap((v) => (Array.isArray(v) ? v : [v]))
      .map(asText)
      .filter(isDefined);
  }

  private async firstText(
    key: StructureKey,
    uri?: string
  ): Promise<string | undefined> {
    return asText((await this.outputs(key, uri))[0]);
  }

  async getUri(): Promise<string> {
    const uri = await this.firstText('$uri');
    if (uri === undefined) {
      throw new ResourceError('Metadata document has no resource URI');
    }
    return uri;
  }

  /** Manifest label, multiple values are joined with `' / '` */
  async getLabel(): Promise<string> {
    return (await this.texts('$label')).join(' / ');
  }

  getDate(): Promise<string | undefined> {
    return this.firstText('$date');
  }

  getLicense(): Promise<string | undefined> {
    return this.firstText('$license_uri');
  }

  async getDescription(): Promise<string | undefined> {
    const parts = await this.texts('$description');
    return parts.length > 0 ? parts.join(' / ') : undefined;
  }

  /** Page URIs in presentation order */
  getPageUris(): Promise<string[]> {
    if (!this.pageUrisPromise) {
      this.pageUrisPromise = this.texts('$page_uris');
    }
    return this.pageUrisPromise;
  }

  /** IIIF image ids, in the same order as the page URIs */
  getPageImageIds(): Promise<string[]> {
    if (!this.pageImageIdsPromise) {
      this.pageImageIdsPromise = this.texts('$page_image_ids');
    }
    return this.pageImageIdsPromise;
  }

  async getMetadata(): Promise<MetadataEntry[]> {
    const entries = await Promise.all(
      this.queries.descriptive.map(async ([label, query]) => ({
        label,
        value: (await this.run(label, query))
          .map(toMetadataValue)
          .filter(isDefined),
      }))
    );
    return entries.filter((entry) => entry.value.length > 0);
  }

  /** 0-based position of the page, -1 if it is not part of the resource */
  async index(pageUri: string): Promise<number> {
    return (await this.getPageUris()).indexOf(pageUri);
  }

  async getPageDoc(pageUri: string): Promise<JsonValue | undefined> {
    return (await this.outputs('$*page_doc', pageUri))[0];
  }

  /** URI of the page holding the file with the given URI */
  findPageUri(fileUri: string): Promise<string | undefined> {
    return this.firstText('$*file_page_uri', fileUri);
  }

  async getPageImageId(pageUri: string): Promise<string> {
    const idx = await this.index(pageUri);
    const imageId = idx >= 0 ? (await this.getPageImageIds())[idx] : undefined;
    if (imageId === undefined) {
      throw new ResourceError(`No image id for page ${pageUri}`);
    }
    return imageId;
  }

  /** Canvas label for a page, the 1-based page number if no label query
   * is configured or it yields nothing. */
  async getPageLabel(pageUri: string): Promise<string> {
    return (
      (await this.firstText('$*page_label', pageUri)) ??
      String((await this.index(pageUri)) + 1)
    );
  }
}
