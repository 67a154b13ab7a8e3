import fs from 'fs';
import path from 'path';
import tmp from 'tmp';

import { QuerySet } from 'papaya';

import { ConfigurationError, loadConfig, readEnvironment } from '../config';

const QUERIES = {
  $uri: '.id',
  $label: '.title',
  $page_uris: '.pages[].id',
  $page_image_ids: '.pages[].image',
  Title: '.title',
};

const BASE_ENV = {
  PAPAYA_FCREPO_ENDPOINT: 'http://repo.test/rest/',
  PAPAYA_FCREPO_PREFIX: 'fcrepo:',
  PAPAYA_SOLR_ENDPOINT: 'http://solr.test/solr/papaya',
  PAPAYA_IIIF_IMAGE_ENDPOINT: 'http://images.test/iiif',
  PAPAYA_METADATA_QUERIES: JSON.stringify(QUERIES),
  UNRELATED: 'ignored',
};

async function configProblems(env: NodeJS.ProcessEnv): Promise<string[]> {
  try {
    await loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      return err.problems;
    }
    throw err;
  }
  throw new Error('Expected the configuration to be rejected');
}

describe('Configuration', () => {
  let tmpDir: tmp.DirResult;

  beforeEach(() => {
    tmpDir = tmp.dirSync({ unsafeCleanup: true });
  });

  afterEach(() => {
    tmpDir.removeCallback();
  });

  function writeFile(name: string, contents: string): string {
    const filePath = path.join(tmpDir.name, name);
    fs.writeFileSync(filePath, contents);
    return filePath;
  }

  it('should load the configuration with defaults', async () => {
    const config = await loadConfig(BASE_ENV);
    expect(config).toEqual({
      fcrepo: {
        endpoint: 'http://repo.test/rest',
        prefix: 'fcrepo:',
        pathSep: ':',
      },
      solr: {
        endpoint: 'http://solr.test/solr/papaya',
        uriField: 'id',
        textMatchField: undefined,
      },
      iiif: {
        imageEndpoint: 'http://images.test/iiif',
        thumbnailWidth: 250,
      },
      logoUrl: undefined,
      metadataQueries: expect.any(QuerySet),
      host: '0.0.0.0',
      port: 5000,
      logLevel: 'debug',
      trustProxy: false,
      sentryDsn: undefined,
    });
    expect(config.metadataQueries.sources).toEqual(QUERIES);
    expect(config.metadataQueries.get('$page_uris')?.source).toBe(
      '.pages[].id'
    );
  });

  it('should convert values from the environment', async () => {
    const config = await loadConfig({
      ...BASE_ENV,
      PAPAYA_THUMBNAIL_WIDTH: '120',
      PAPAYA_PORT: '8080',
      PAPAYA_TRUST_PROXY: 'TRUE',
      PAPAYA_LOG_LEVEL: 'warn',
      PAPAYA_FCREPO_PATH_SEP: '.',
      PAPAYA_SOLR_TEXT_MATCH_FIELD: 'ocr_text',
      PAPAYA_LOGO_URL: 'http://papaya.test/logo.png',
    });
    expect(config.iiif.thumbnailWidth).toBe(120);
    expect(config.port).toBe(8080);
    expect(config.trustProxy).toBe(true);
    expect(config.logLevel).toBe('warn');
    expect(config.fcrepo.pathSep).toBe('.');
    expect(config.solr.textMatchField).toBe('ocr_text');
    expect(config.logoUrl).toBe('http://papaya.test/logo.png');
  });

  it('should read values from files', async () => {
    const queriesPath = writeFile(
      'queries.yml',
      [
        '$uri: .id',
        '$label: .title',
        '$page_uris: .pages[].id',
        '$page_image_ids: .pages[].image',
        'Title: .title',
        'Pages: .pages | length',
      ].join('\n')
    );
    const { PAPAYA_METADATA_QUERIES: _, ...env } = BASE_ENV;
    const config = await loadConfig({
      ...env,
      PAPAYA_METADATA_QUERIES_FILE: queriesPath,
    });
    expect(config.metadataQueries.sources).toEqual({
      ...QUERIES,
      Pages: '.pages | length',
    });
  });

  it('should read JSON files', async () => {
    const queriesPath = writeFile('queries.json', JSON.stringify(QUERIES));
    const values = await readEnvironment({
      PAPAYA_METADATA_QUERIES_FILE: queriesPath,
      PAPAYA_HOST: '127.0.0.1',
    });
    expect(values).toEqual({ METADATA_QUERIES: QUERIES, HOST: '127.0.0.1' });
  });

  it('should accept the bundled metadata queries', async () => {
    const config = await loadConfig({
      ...BASE_ENV,
      PAPAYA_METADATA_QUERIES_FILE: path.join(
        __dirname,
        '../../config/metadata-queries.yml'
      ),
    });
    expect(config.metadataQueries.sources.$uri).toBe('.id');
    expect(config.metadataQueries.descriptive.map(([label]) => label)).toEqual(
      expect.arrayContaining(['Title', 'Creator', 'Date', 'Subject', 'Extent'])
    );
  });

  it('should report missing and invalid settings', async () => {
    const problems = await configProblems({
      PAPAYA_FCREPO_PREFIX: 'fcrepo:',
      PAPAYA_SOLR_ENDPOINT: 'not a url',
      PAPAYA_IIIF_IMAGE_ENDPOINT: 'http://images.test/iiif',
      PAPAYA_METADATA_QUERIES: JSON.stringify(QUERIES),
      PAPAYA_PORT: 'eighty',
    });
    expect(problems).toHaveLength(3);
    expect(problems[0]).toBe('PAPAYA_FCREPO_ENDPOINT: Required');
    expect(problems[1]).toBe('PAPAYA_SOLR_ENDPOINT: Invalid url');
    expect(problems[2]).toMatch(/^PAPAYA_PORT: /);
  });

  it('should report invalid metadata queries', async () => {
    const problems = await configProblems({
      ...BASE_ENV,
      PAPAYA_METADATA_QUERIES: JSON.stringify({
        ...QUERIES,
        $page_uris: undefined,
        Broken: '.title | nope',
      }),
    });
    expect(problems).toEqual([
      expect.stringMatching(
        /^PAPAYA_METADATA_QUERIES: Broken: nope\/0 is not defined.* in query "\.title \| nope"$/
      ),
      'PAPAYA_METADATA_QUERIES: $page_uris: required query is missing',
    ]);
  });

  it('should require metadata queries', async () => {
    const { PAPAYA_METADATA_QUERIES: _, ...env } = BASE_ENV;
    const problems = await configProblems(env);
    expect(problems).toContain(
      'PAPAYA_METADATA_QUERIES: $uri: required query is missing'
    );
  });

  it('should report files that cannot be read', async () => {
    const missing = path.join(tmpDir.name, 'missing.yml');
    await expect(
      loadConfig({ ...BASE_ENV, PAPAYA_METADATA_QUERIES_FILE: missing })
    ).rejects.toThrow(
      new ConfigurationError([
        `PAPAYA_METADATA_QUERIES_FILE: file ${missing} could not be read`,
      ])
    );
  });

  it('should report files that cannot be parsed', async () => {
    const broken = writeFile('broken.yml', 'Title: [.title\n');
    await expect(
      loadConfig({ ...BASE_ENV, PAPAYA_METADATA_QUERIES_FILE: broken })
    ).rejects.toThrow(
      `PAPAYA_METADATA_QUERIES_FILE: file ${broken} is not valid YAML or JSON`
    );
  });
});
