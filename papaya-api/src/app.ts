import express, {
  Express,
  NextFunction,
  Request,
  RequestHandler,
  Response,
} from 'express';
import bodyParser from 'body-parser';
import cors from 'cors';
import * as Sentry from '@sentry/node';
import { z } from 'zod';
import {
  encodePathSegment,
  IdentifierError,
  ImageService,
  ImageServiceError,
  Manifest,
  RepositoryService,
  ResourceError,
  SolrDocumentNotFound,
  SolrLookupError,
  SolrService,
  TaggedText,
  URLError,
  version,
} from 'papaya';

import type { Config } from './config';
import {
  AnnotationNotFound,
  BadRequestProblem,
  CanvasNotFound,
  ConfigurationProblem,
  IdentifierProblem,
  InternalServerProblem,
  ManifestNotFound,
  ProblemDetailError,
  problemDetailResponse,
  SequenceNotFound,
  ServiceProblem,
} from './errors';
import log from './logger';
import metrics, { httpMetrics } from './metrics';

export interface Services {
  repository: RepositoryService;
  solr: SolrService;
  images: ImageService;
}

export function createServices(config: Config): Services {
  return {
    repository: new RepositoryService(config.fcrepo),
    solr: new SolrService({
      endpoint: config.solr.endpoint,
      uriField: config.solr.uriField,
      textMatchField: config.solr.textMatchField,
      queries: config.metadataQueries,
    }),
    images: new ImageService(
      config.iiif.imageEndpoint,
      config.iiif.thumbnailWidth
    ),
  };
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/** Express 4 does not catch rejected promises from handlers */
function asyncHandler(handler: AsyncHandler): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

const LOCAL_ADDRESSES = ['127.0.0.1', '::1', '::ffff:127.0.0.1'];

function externalBase(req: Request): string {
  return `${req.protocol}://${req.get('host') ?? 'localhost'}`;
}

function manifestUrl(req: Request, manifestId: string): string {
  return `${externalBase(req)}/manifests/${encodePathSegment(manifestId)}/manifest`;
}

function lookupForm(): string {
  return `<!DOCTYPE html>
<html>
  <head>
    <title>Papaya</title>
  </head>
  <body>
    <h1>Papaya</h1>
    <form method="post" action="">
      <label>URI: <input name="uri" type="text" size="80"/></label><button type="submit">Submit</button>
    </form>
    <hr/>
    <p id="version">${version}</p>
  </body>
</html>
`;
}

const lookupFormSchema = z.object({ uri: z.string().min(1) });

export function createApp(
  config: Config,
  services: Services = createServices(config)
): Express {
  const { repository, solr, images } = services;

  function getResourceUri(iiifId: string): string {
    try {
      return repository.getResourceUri(iiifId);
    } catch (err) {
      if (err instanceof IdentifierError) {
        throw new IdentifierProblem(iiifId, { cause: err });
      }
      throw err;
    }
  }

  async function getManifest(req: Request, manifestId: string): Promise<Manifest> {
    const resourceUri = getResourceUri(manifestId);
    try {
      const resource = await solr.getResource(resourceUri);
      return new Manifest({
        baseUri: manifestUrl(req, manifestId).replace(/\/manifest$/, ''),
        resource,
        imageService: images,
        logoUrl: config.logoUrl,
        searchEnabled: solr.textMatchField !== undefined,
      });
    } catch (err) {
      if (err instanceof SolrDocumentNotFound) {
        throw new ManifestNotFound(manifestId, { cause: err });
      }
      if (err instanceof SolrLookupError) {
        throw new ServiceProblem({ cause: err });
      }
      throw err;
    }
  }

  /** Build a JSON document, measuring the time it takes and turning
   * backend failures into problem details. */
  async function build<T>(
    kind: string,
    render: () => Promise<T>
  ): Promise<T> {
    const stopMeasuring = metrics.documentBuildDuration.startTimer({ kind });
    try {
      const result = await render();
      stopMeasuring({ status: 'success' });
      return result;
    } catch (err) {
      stopMeasuring({ status: 'error' });
      if (err instanceof ImageServiceError || err instanceof ResourceError) {
        throw new ServiceProblem({ cause: err });
      }
      throw err;
    }
  }

  const app: Express = express();
  app.set('trust proxy', config.trustProxy);
  app.use(
    cors({
      origin: '*',
    })
  );

  // Only allow access to Prometheus metrics endpoint from localhost,
  // judged by the socket since req.ip follows X-Forwarded-For
  app.use('/metrics', (req, res, next) => {
    const { remoteAddress } = req.socket;
    if (
      remoteAddress !== undefined &&
      LOCAL_ADDRESSES.includes(remoteAddress)
    ) {
      next();
    } else {
      res.status(403).send();
    }
  });
  app.use(httpMetrics);

  app.get('/', (req, res) => {
    res.type('html').send(lookupForm());
  });

  app.post(
    '/',
    bodyParser.urlencoded({ extended: false }),
    (req, res) => {
      const form = lookupFormSchema.safeParse(req.body);
      if (!form.success) {
        throw new BadRequestProblem('The "uri" form field is required');
      }
      const { uri } = form.data;
      let iiifId: string;
      try {
        iiifId = repository.getIiifId(uri);
      } catch (err) {
        if (err instanceof URLError) {
          throw new BadRequestProblem(
            `${uri} is not part of the configured repository`,
            { cause: err }
          );
        }
        throw err;
      }
      res.redirect(302, manifestUrl(req, iiifId));
    }
  );

  app.get(['/manifests/:id/', '/manifests/:id/manifest.json'], (req, res) => {
    res.redirect(301, manifestUrl(req, req.params.id));
  });

  app.get(
    '/manifests/:id/manifest',
    asyncHandler(async (req, res) => {
      const manifestId = req.params.id;
      const json = await build('manifest', async () =>
        (await getManifest(req, manifestId)).toJsonLd(true)
      );
      res.json(json);
    })
  );

  app.get(
    '/manifests/:id/sequence/:name',
    asyncHandler(async (req, res) => {
      const { id: manifestId, name } = req.params;
      const json = await build('sequence', async () => {
        const sequence = (await getManifest(req, manifestId)).findSequence(name);
        if (!sequence) {
          throw new SequenceNotFound(name, manifestId);
        }
        return sequence.toJsonLd(true);
      });
      res.json(json);
    })
  );

  app.get(
    '/manifests/:id/canvas/:name',
    asyncHandler(async (req, res) => {
      const { id: manifestId, name } = req.params;
      const json = await build('canvas', async () => {
        const manifest = await getManifest(req, manifestId);
        const canvas = await manifest.findCanvas(name);
        if (!canvas) {
          throw new CanvasNotFound(name, manifestId);
        }
        return canvas.toJsonLd(true);
      });
      res.json(json);
    })
  );

  app.get(
    '/manifests/:id/annotation/:name',
    asyncHandler(async (req, res) => {
      const { id: manifestId, name } = req.params;
      const json = await build('annotation', async () => {
        const manifest = await getManifest(req, manifestId);
        const annotation = await manifest.findAnnotation(name);
        if (!annotation) {
          throw new AnnotationNotFound(name, manifestId);
        }
        return annotation.toJsonLd(true);
      });
      res.json(json);
    })
  );

  app.get(
    '/manifests/:id/search',
    asyncHandler(async (req, res) => {
      const manifestId = req.params.id;
      if (solr.textMatchField === undefined) {
        log.error('Search requested, but no text match field is configured');
        throw new ConfigurationProblem();
      }
      const { q } = req.query;
      if (typeof q !== 'string' || q.trim() === '') {
        throw new BadRequestProblem('The "q" query parameter is required');
      }
      const json = await build('search', async () => {
        const manifest = await getManifest(req, manifestId);
        let hits: TaggedText[];
        try {
          hits = await solr.getTextMatches(await manifest.resource.getUri(), q);
        } catch (err) {
          if (err instanceof SolrLookupError) {
            throw new ServiceProblem({ cause: err });
          }
          throw err;
        }
        return manifest.searchAnnotations(
          hits,
          `${manifest.searchUri}?q=${encodeURIComponent(q)}`
        );
      });
      res.json(json);
    })
  );

  if (config.sentryDsn) {
    // Must come after all routes and before any other error middleware
    Sentry.setupExpressErrorHandler(app);
  }

  app.use(
    (err: unknown, req: Request, res: Response, next: NextFunction) => {
      if (res.headersSent) {
        next(err);
        return;
      }
      if (err instanceof ProblemDetailError) {
        if (err.status >= 500) {
          log.error(`${err.title}: ${err.cause ?? err.message}`, {
            path: req.path,
          });
        }
        problemDetailResponse(res, err);
        return;
      }
      if (
        err instanceof Error &&
        'status' in err &&
        typeof err.status === 'number' &&
        err.status >= 400 &&
        err.status < 500
      ) {
        problemDetailResponse(res, new BadRequestProblem(err.message, { cause: err }));
        return;
      }
      log.error(`Unexpected error while handling ${req.method} ${req.path}: ${err}`, {
        stack: err instanceof Error ? err.stack : undefined,
      });
      problemDetailResponse(res, new InternalServerProblem({ cause: err }));
    }
  );

  return app;
}
