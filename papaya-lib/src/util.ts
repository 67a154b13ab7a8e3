export function isDefined<T>(val: T | undefined | null | void): val is T {
  return val !== undefined && val !== null;
}

/** Encode a value for use as a single URL path segment. Colons are left
 * alone, IIIF identifiers are full of them. */
export function encodePathSegment(segment: string): string {
  return encodeURIComponent(segment).replace(/%3A/gi, ':');
}

/** Strip trailing slashes from a base URL. */
export function trimSlashes(url: string): string {
  return url.replace(/\/+$/, '');
}
