import type { JsonObject } from '../query';
import { ResourceError } from '../source/resource';
import type { Resource } from '../source/resource';
import type { TaggedText } from '../source/solr';
import {
  FULL_IMAGE_PARAMS,
  ImageInfo,
  ImageParams,
  ImageService,
} from './image';

export const PRESENTATION_API_CONTEXT =
  'http://iiif.io/api/presentation/2/context.json';
export const SEARCH_API_CONTEXT = 'http://iiif.io/api/search/1/context.json';
export const SEARCH_API_PROFILE = 'http://iiif.io/api/search/1/search';

function withContextIf(json: JsonObject, withContext: boolean): JsonObject {
  return withContext ? { ...json, '@context': PRESENTATION_API_CONTEXT } : json;
}

/** An image served by a IIIF Image API server */
export class Image {
  readonly service: ImageService;
  readonly imageId: string;
  readonly params: ImageParams;
  private infoPromise: Promise<ImageInfo> | undefined;

  constructor(
    service: ImageService,
    imageId: string,
    params: ImageParams = FULL_IMAGE_PARAMS
  ) {
    this.service = service;
    this.imageId = imageId;
    this.params = params;
  }

  /** Technical metadata, fetched once and shared by every caller */
  info(): Promise<ImageInfo> {
    if (!this.infoPromise) {
      this.infoPromise = this.service.getMetadata(this.imageId);
    }
    return this.infoPromise;
  }

  async toJsonLd(): Promise<JsonObject> {
    const info = await this.info();
    return {
      '@id': `${info.uri}${this.params}`,
      '@type': 'dctypes:Image',
      service: {
        '@context': info.context,
        '@id': info.uri,
        profile: info.profile,
      },
      format: 'image/jpeg',
      height: info.height,
      width: info.width,
    };
  }

  async thumbnailJsonLd(): Promise<JsonObject> {
    const info = await this.info();
    const width = this.service.thumbnailWidth;
    const height = Math.floor(width / info.aspectRatio);
    const params = new ImageParams({ size: `${width},${height}` });
    return {
      ...(await this.toJsonLd()),
      '@id': `${info.uri}${params}`,
      height,
      width,
    };
  }
}

export class Annotation {
  readonly canvas: Canvas;
  readonly name: string;
  readonly motivation: string;
  readonly resource: Image;

  constructor(canvas: Canvas, name: string, motivation: string, resource: Image) {
    this.canvas = canvas;
    this.name = name;
    this.motivation = motivation;
    this.resource = resource;
  }

  get uri(): string {
    return `${this.canvas.manifest.baseUri}/annotation/${this.name}`;
  }

  async toJsonLd(withContext = false): Promise<JsonObject> {
    return withContextIf(
      {
        '@id': this.uri,
        '@type': 'oa:Annotation',
        motivation: this.motivation,
        resource: await this.resource.toJsonLd(),
        on: this.canvas.uri,
      },
      withContext
    );
  }
}

export class Canvas {
  readonly sequence: Sequence;
  readonly manifest: Manifest;
  readonly name: string;
  readonly pageUri: string;
  readonly imageAnnotation: Annotation;

  constructor(
    sequence: Sequence,
    name: string,
    pageUri: string,
    imageId: string
  ) {
    this.sequence = sequence;
    this.manifest = sequence.manifest;
    this.name = name;
    this.pageUri = pageUri;
    this.imageAnnotation = new Annotation(
      this,
      `${name}-image`,
      'sc:painting',
      new Image(this.manifest.imageService, imageId)
    );
  }

  get uri(): string {
    return `${this.manifest.baseUri}/canvas/${this.name}`;
  }

  getLabel(): Promise<string> {
    return this.manifest.resource.getPageLabel(this.pageUri);
  }

  async toJsonLd(withContext = false): Promise<JsonObject> {
    const image = this.imageAnnotation.resource;
    const [label, annotation, thumbnail, info] = await Promise.all([
      this.getLabel(),
      this.imageAnnotation.toJsonLd(),
      image.thumbnailJsonLd(),
      image.info(),
    ]);
    return withContextIf(
      {
        '@id': this.uri,
        '@type': 'sc:Canvas',
        label,
        images: [annotation],
        thumbnail,
        height: info.height,
        width: info.width,
        otherContent: [],
      },
      withContext
    );
  }
}

export class Sequence {
  readonly manifest: Manifest;
  readonly name: string;
  private canvasesPromise: Promise<Canvas[]> | undefined;

  constructor(manifest: Manifest, name: string) {
    this.manifest = manifest;
    this.name = name;
  }

  get uri(): string {
    return `${this.manifest.baseUri}/sequence/${this.name}`;
  }

  /** One canvas per page, named `0001`, `0002`, ... */
  getCanvases(): Promise<Canvas[]> {
    if (!this.canvasesPromise) {
      this.canvasesPromise = this.buildCanvases();
    }
    return this.canvasesPromise;
  }

  private async buildCanvases(): Promise<Canvas[]> {
    const { resource } = this.manifest;
    const [pageUris, imageIds] = await Promise.all([
      resource.getPageUris(),
      resource.getPageImageIds(),
    ]);
    return pageUris.map((pageUri, idx) => {
      const imageId = imageIds[idx];
      if (imageId === undefined) {
        throw new ResourceError(`No image id for page ${pageUri}`);
      }
      return new Canvas(
        this,
        (idx + 1).toString().padStart(4, '0'),
        pageUri,
        imageId
      );
    });
  }

  async getCanvas(name: string): Promise<Canvas | undefined> {
    return (await this.getCanvases()).find((c) => c.name === name);
  }

  async toJsonLd(withContext = false): Promise<JsonObject> {
    const canvases = await this.getCanvases();
    const json: JsonObject = {
      '@id': this.uri,
      '@type': 'sc:Sequence',
      canvases: await Promise.all(canvases.map((c) => c.toJsonLd())),
    };
    if (canvases.length > 0) {
      json.startCanvas = canvases[0].uri;
    }
    return withContextIf(json, withContext);
  }
}

export interface ManifestOptions {
  /** URI the manifest and its parts live under, without a trailing slash */
  baseUri: string;
  resource: Resource;
  imageService: ImageService;
  logoUrl?: string;
  /** Advertise the content search service of the manifest */
  searchEnabled?: boolean;
}

/** A IIIF Presentation API 2.1 manifest for a single resource */
export class Manifest {
  readonly baseUri: string;
  readonly resource: Resource;
  readonly imageService: ImageService;
  readonly logoUrl?: string;
  readonly searchEnabled: boolean;
  private _sequences: Sequence[] | undefined;

  constructor({
    baseUri,
    resource,
    imageService,
    logoUrl,
    searchEnabled = false,
  }: ManifestOptions) {
    this.baseUri = baseUri;
    this.resource = resource;
    this.imageService = imageService;
    this.logoUrl = logoUrl;
    this.searchEnabled = searchEnabled;
  }

  get uri(): string {
    return `${this.baseUri}/manifest`;
  }

  get searchUri(): string {
    return `${this.baseUri}/search`;
  }

  get sequences(): Sequence[] {
    if (!this._sequences) {
      this._sequences = [new Sequence(this, 'normal')];
    }
    return this._sequences;
  }

  async getCanvases(): Promise<Canvas[]> {
    const perSequence = await Promise.all(
      this.sequences.map((s) => s.getCanvases())
    );
    return perSequence.flat();
  }

  findSequence(name: string): Sequence | undefined {
    return this.sequences.find((s) => s.name === name);
  }

  async findCanvas(name: string): Promise<Canvas | undefined> {
    return (await this.getCanvases()).find((c) => c.name === name);
  }

  async findAnnotation(name: string): Promise<Annotation | undefined> {
    return (await this.getCanvases())
      .map((c) => c.imageAnnotation)
      .find((a) => a.name === name);
  }

  async toJsonLd(withContext = false): Promise<JsonObject> {
    const { resource } = this;
    const [label, metadata, description, date, license, sequences, canvases] =
      await Promise.all([
        resource.getLabel(),
        resource.getMetadata(),
        resource.getDescription(),
        resource.getDate(),
        resource.getLicense(),
        Promise.all(this.sequences.map((s) => s.toJsonLd())),
        this.getCanvases(),
      ]);
    const json: JsonObject = {
      '@id': this.uri,
      '@type': 'sc:Manifest',
      label,
      metadata,
      sequences,
    };
    if (description !== undefined) {
      json.description = description;
    }
    if (date !== undefined) {
      json.navDate = date;
    }
    if (license !== undefined) {
      json.license = license;
    }
    const firstCanvas = canvases[0];
    if (firstCanvas) {
      json.thumbnail = await firstCanvas.imageAnnotation.resource.thumbnailJsonLd();
    }
    if (this.logoUrl !== undefined) {
      json.logo = { '@id': this.logoUrl };
    }
    if (this.searchEnabled) {
      json.service = {
        '@context': SEARCH_API_CONTEXT,
        '@id': this.searchUri,
        profile: SEARCH_API_PROFILE,
      };
    }
    return withContextIf(json, withContext);
  }

  /**
   * Build an annotation list for full-text search hits. Each hit's `n`
   * parameter is the 0-based index of its page and `xywh` the region on
   * that page's canvas. Hits on pages that do not exist are left out.
   */
  async searchAnnotations(
    hits: TaggedText[],
    listUri: string
  ): Promise<JsonObject> {
    const canvases = await this.getCanvases();
    const resources: JsonObject[] = [];
    hits.forEach((hit, idx) => {
      const canvas = canvases[Number.parseInt(hit.params.n ?? '', 10)];
      if (!canvas) {
        return;
      }
      const target = hit.params.xywh
        ? `${canvas.uri}#xywh=${hit.params.xywh}`
        : canvas.uri;
      resources.push({
        '@id': `${this.baseUri}/annotation/match-${idx}`,
        '@type': 'oa:Annotation',
        motivation: 'sc:painting',
        resource: {
          '@type': 'cnt:ContentAsText',
          chars: hit.text,
        },
        on: target,
      });
    });
    return {
      '@context': [PRESENTATION_API_CONTEXT, SEARCH_API_CONTEXT],
      '@id': listUri,
      '@type': 'sc:AnnotationList',
      resources,
    };
  }
}
