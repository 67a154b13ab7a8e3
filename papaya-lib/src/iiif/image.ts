import fetch from 'cross-fetch';
import { z } from 'zod';

import log from '../log';
import metrics from '../metrics';
import type { JsonValue } from '../query';
import { jsonValue } from '../schema';
import { trimSlashes } from '../util';

export const DEFAULT_THUMBNAIL_WIDTH = 250;

/** IIIF Image API request parameters, see
 * https://iiif.io/api/image/2.1/#image-request-parameters */
export class ImageParams {
  /** `full` | `{x},{y},{w},{h}` | `pct:{x},{y},{w},{h}` */
  readonly region: string;
  /** `full` | `{w},` | `,{h}` | `pct:{n}` | `{w},{h}` | `!{w},{h}` */
  readonly size: string;
  /** `{n}` | `!{n}` */
  readonly rotation: string;
  /** `color` | `gray` | `bitonal` | `default` */
  readonly quality: string;
  /** `jpg` | `tif` | `png` | `gif` | `jp2` | `pdf` | `webp` */
  readonly format: string;

  constructor({
    region = 'full',
    size = 'full',
    rotation = '0',
    quality = 'default',
    format = 'jpg',
  }: Partial<
    Pick<ImageParams, 'region' | 'size' | 'rotation' | 'quality' | 'format'>
  > = {}) {
    this.region = region;
    this.size = size;
    this.rotation = rotation;
    this.quality = quality;
    this.format = format;
  }

  toString(): string {
    return `/${this.region}/${this.size}/${this.rotation}/${this.quality}.${this.format}`;
  }
}

export const FULL_IMAGE_PARAMS = new ImageParams();

/** Technical metadata of an image, from its `info.json` */
export class ImageInfo {
  readonly uri: string;
  readonly context: JsonValue;
  readonly profile: JsonValue;
  readonly width: number;
  readonly height: number;

  constructor(
    uri: string,
    context: JsonValue,
    profile: JsonValue,
    width: number,
    height: number
  ) {
    this.uri = uri;
    this.context = context;
    this.profile = profile;
    this.width = width;
    this.height = height;
  }

  get aspectRatio(): number {
    return this.width / this.height;
  }
}

export class ImageServiceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ImageServiceError';
  }
}

const infoSchema = z.object({
  '@id': z.string(),
  '@context': jsonValue,
  profile: jsonValue,
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

/** Client for a IIIF Image API server */
export class ImageService {
  readonly endpoint: string;
  readonly thumbnailWidth: number;

  constructor(endpoint: string, thumbnailWidth = DEFAULT_THUMBNAIL_WIDTH) {
    this.endpoint = trimSlashes(endpoint);
    this.thumbnailWidth = thumbnailWidth;
  }

  async getMetadata(imageId: string): Promise<ImageInfo> {
    const url = `${this.endpoint}/${imageId}`;
    const stopMeasuring = metrics.imageInfoDuration.startTimer({
      iiif_host: new URL(url).host,
    });
    let body: unknown;
    try {
      const resp = await fetch(url, { headers: { Accept: 'application/json' } });
      if (!resp.ok) {
        throw new ImageServiceError(
          `Problem retrieving image ${imageId}, server returned status ${resp.status}`
        );
      }
      body = await resp.json();
    } catch (err) {
      stopMeasuring({ status: 'error' });
      log.error(`Failed to fetch image info from ${url}: ${err}`);
      if (err instanceof ImageServiceError) {
        throw err;
      }
      throw new ImageServiceError(`Problem retrieving image ${imageId}`, {
        cause: err,
      });
    }
    const parsed = infoSchema.safeParse(body);
    if (!parsed.success) {
      stopMeasuring({ status: 'error' });
      throw new ImageServiceError(
        `Invalid image info for ${imageId}: ${parsed.error.message}`
      );
    }
    stopMeasuring({ status: 'success' });
    const info = parsed.data;
    return new ImageInfo(
      info['@id'],
      info['@context'],
      info.profile,
      info.width,
      info.height
    );
  }
}
