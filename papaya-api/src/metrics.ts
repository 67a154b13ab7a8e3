import prometheus from 'prom-client';
import promBundle from 'express-prom-bundle';

const metrics = {
  documentBuildDuration: new prometheus.Histogram({
    name: 'papaya_document_build_duration_seconds',
    help: 'Latency for building a IIIF document, including all backend lookups',
    buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
    labelNames: ['status', 'kind'],
  }),
};

/** HTTP request metrics, served under `/metrics`. Created once, since
 * prom-client refuses to register the same metric twice. */
export const httpMetrics = promBundle({
  includeMethod: true,
  includePath: true,
  normalizePath: [
    ['^/manifests/[^/]+/sequence/.*', '/manifests/#id/sequence/#name'],
    ['^/manifests/[^/]+/canvas/.*', '/manifests/#id/canvas/#name'],
    ['^/manifests/[^/]+/annotation/.*', '/manifests/#id/annotation/#name'],
    ['^/manifests/[^/]+/search.*', '/manifests/#id/search'],
    ['^/manifests/[^/]+/(manifest(\\.json)?)?$', '/manifests/#id/manifest'],
  ],
  promClient: {
    collectDefaultMetrics: {},
  },
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
});

export default metrics;
