import log from '../log';

/** There was a problem with a IIIF identifier. */
export class IdentifierError extends Error {
  readonly iiifId: string;

  constructor(iiifId: string) {
    super(iiifId);
    this.name = 'IdentifierError';
    this.iiifId = iiifId;
  }
}

/** There was a problem with a resource URI. */
export class URLError extends Error {
  readonly resourceUri: string;

  constructor(resourceUri: string) {
    super(resourceUri);
    this.name = 'URLError';
    this.resourceUri = resourceUri;
  }
}

export interface RepositoryServiceOptions {
  /** Base URL of the repository */
  endpoint: string;
  /** Prefix of the IIIF identifiers, including any trailing separator
   * (e.g. `fcrepo:`) */
  prefix: string;
  /** Stands in for `/` in IIIF identifiers, `:` by default */
  pathSep?: string;
}

/** Translates between repository URIs and IIIF identifiers.
 *
 * With endpoint `http://example.com/repo` and prefix `fcrepo:`,
 * `http://example.com/repo/foo/bar/123` and `fcrepo:foo:bar:123` are the
 * same resource. */
export class RepositoryService {
  readonly endpoint: string;
  readonly prefix: string;
  readonly pathSep: string;

  constructor({ endpoint, prefix, pathSep = ':' }: RepositoryServiceOptions) {
    this.endpoint = endpoint;
    this.prefix = prefix;
    this.pathSep = pathSep;
  }

  getResourceUri(iiifId: string): string {
    if (!iiifId.startsWith(this.prefix)) {
      log.error(
        `Invalid IIIF ID: Expecting "${this.prefix}<local part>", got "${iiifId}"`
      );
      throw new IdentifierError(iiifId);
    }
    const localPart = iiifId.substring(this.prefix.length);
    return `${this.endpoint}/${localPart.split(this.pathSep).join('/')}`;
  }

  getIiifId(resourceUri: string): string {
    if (!resourceUri.startsWith(this.endpoint)) {
      log.error(
        `${resourceUri} not part of configured repository ${this.endpoint}`
      );
      throw new URLError(resourceUri);
    }
    return resourceUri
      .split(`${this.endpoint}/`)
      .join(this.prefix)
      .split('/')
      .join(this.pathSep);
  }
}
