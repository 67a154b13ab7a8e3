import { compile, Query, QuerySyntaxError } from '../query';

/** Mapping of metadata query keys to jq expressions.
 *
 * Keys starting with `$` describe the structure of the manifest, keys
 * starting with `$*` additionally receive a `$uri` argument at runtime. Every
 * other key is a descriptive metadata label. */
export type MetadataQueries = { [key: string]: string };

export type StructureKey =
  | '$uri'
  | '$label'
  | '$date'
  | '$license_uri'
  | '$description'
  | '$page_uris'
  | '$page_image_ids'
  | '$*page_doc'
  | '$*page_label'
  | '$*file_page_uri';

export const REQUIRED_KEYS: readonly StructureKey[] = [
  '$uri',
  '$label',
  '$page_uris',
  '$page_image_ids',
];

export class QuerySetError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid metadata queries: ${problems.join('; ')}`);
    this.name = 'QuerySetError';
    this.problems = problems;
  }
}

/** The compiled form of a set of metadata queries. */
export class QuerySet {
  /** The jq sources the set was compiled from */
  readonly sources: Readonly<MetadataQueries>;
  /** Descriptive metadata queries, in configuration order. */
  readonly descriptive: ReadonlyArray<[label: string, query: Query]>;
  private readonly structure: ReadonlyMap<string, Query>;

  private constructor(
    sources: MetadataQueries,
    structure: Map<string, Query>,
    descriptive: Array<[string, Query]>
  ) {
    this.sources = sources;
    this.structure = structure;
    this.descriptive = descriptive;
  }

  /**
   * Compile every query of the set and check that the required ones are
   * present. All problems are reported together in a `QuerySetError`.
   */
  static async compile(queries: MetadataQueries): Promise<QuerySet> {
    const entries = Object.entries(queries);
    const compiled = await Promise.all(
      entries.map(async ([key, source]): Promise<Query | string> => {
        try {
          return await compile(source, key.startsWith('$*') ? ['uri'] : []);
        } catch (err) {
          if (!(err instanceof QuerySyntaxError)) {
            throw err;
          }
          return `${key}: ${err.message}`;
        }
      })
    );
    const problems: string[] = [];
    const structure = new Map<string, Query>();
    const descriptive: Array<[string, Query]> = [];
    entries.forEach(([key], idx) => {
      const query = compiled[idx];
      if (typeof query === 'string') {
        problems.push(query);
      } else if (key.startsWith('$')) {
        structure.set(key, query);
      } else {
        descriptive.push([key, query]);
      }
    });
    for (const key of REQUIRED_KEYS) {
      if (!(key in queries)) {
        problems.push(`${key}: required query is missing`);
      }
    }
    if (problems.length > 0) {
      throw new QuerySetError(problems);
    }
    return new QuerySet({ ...queries }, structure, descriptive);
  }

  get(key: StructureKey): Query | undefined {
    return this.structure.get(key);
  }
}
