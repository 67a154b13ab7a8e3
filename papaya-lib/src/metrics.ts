import prometheus from 'prom-client';

const metrics = {
  solrQueryDuration: new prometheus.Histogram({
    name: 'papaya_solr_query_duration_seconds',
    help: 'Latency for document lookups and text searches against Solr',
    buckets: [0.005, 0.01, 0.05, 0.15, 0.5, 1, 5],
    labelNames: ['status', 'kind'],
  }),
  imageInfoDuration: new prometheus.Histogram({
    name: 'papaya_image_info_duration_seconds',
    help: 'Latency for fetching info from IIIF Image API endpoints',
    buckets: [0.01, 0.05, 0.15, 0.5, 1, 5, 10],
    labelNames: ['status', 'iiif_host'],
  }),
};

export default metrics;
