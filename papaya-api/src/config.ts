import fs from 'fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { LOG_LEVELS, QuerySet, QuerySetError } from 'papaya';

export const ENV_PREFIX = 'PAPAYA_';
const FILE_SUFFIX = '_FILE';

export class ConfigurationError extends Error {
  readonly problems: string[];

  constructor(problems: string[], options?: { cause?: unknown }) {
    super(`Invalid configuration: ${problems.join('; ')}`, options);
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

/** Values passed directly through the environment may hold JSON */
function parseJsonString(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

const booleanish = z.preprocess(
  (value) => (typeof value === 'string' ? parseJsonString(value.toLowerCase()) : value),
  z.boolean()
);

const metadataQueries = z.preprocess(
  parseJsonString,
  z.record(z.string()).transform(async (queries, ctx) => {
    try {
      return await QuerySet.compile(queries);
    } catch (err) {
      if (!(err instanceof QuerySetError)) {
        throw err;
      }
      err.problems.forEach((message) =>
        ctx.addIssue({ code: z.ZodIssueCode.custom, message })
      );
      return z.NEVER;
    }
  })
);

const configSchema = z
  .object({
    FCREPO_ENDPOINT: z.string().url(),
    FCREPO_PREFIX: z.string().min(1),
    FCREPO_PATH_SEP: z.string().min(1).default(':'),
    SOLR_ENDPOINT: z.string().url(),
    SOLR_URI_FIELD: z.string().min(1).default('id'),
    SOLR_TEXT_MATCH_FIELD: z.string().min(1).optional(),
    IIIF_IMAGE_ENDPOINT: z.string().url(),
    THUMBNAIL_WIDTH: z.coerce.number().int().positive().default(250),
    LOGO_URL: z.string().url().optional(),
    METADATA_QUERIES: metadataQueries.default({}),
    HOST: z.string().min(1).default('0.0.0.0'),
    PORT: z.coerce.number().int().min(0).max(65535).default(5000),
    LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
    TRUST_PROXY: booleanish.default(false),
    SENTRY_DSN: z.string().url().optional(),
  })
  .transform((raw) => ({
    fcrepo: {
      endpoint: raw.FCREPO_ENDPOINT.replace(/\/+$/, ''),
      prefix: raw.FCREPO_PREFIX,
      pathSep: raw.FCREPO_PATH_SEP,
    },
    solr: {
      endpoint: raw.SOLR_ENDPOINT,
      uriField: raw.SOLR_URI_FIELD,
      textMatchField: raw.SOLR_TEXT_MATCH_FIELD,
    },
    iiif: {
      imageEndpoint: raw.IIIF_IMAGE_ENDPOINT,
      thumbnailWidth: raw.THUMBNAIL_WIDTH,
    },
    logoUrl: raw.LOGO_URL,
    metadataQueries: raw.METADATA_QUERIES,
    host: raw.HOST,
    port: raw.PORT,
    logLevel:
      raw.LOG_LEVEL ??
      (process.env.NODE_ENV === 'production' ? 'info' : 'debug'),
    trustProxy: raw.TRUST_PROXY,
    sentryDsn: raw.SENTRY_DSN,
  }));

export type Config = z.output<typeof configSchema>;

async function readValueFile(name: string, path: string): Promise<unknown> {
  let contents: string;
  try {
    contents = await fs.promises.readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(
      [`${ENV_PREFIX}${name}${FILE_SUFFIX}: file ${path} could not be read`],
      { cause: err }
    );
  }
  try {
    // JSON is a subset of YAML, one parser reads both
    return parseYaml(contents);
  } catch (err) {
    throw new ConfigurationError(
      [`${ENV_PREFIX}${name}${FILE_SUFFIX}: file ${path} is not valid YAML or JSON`],
      { cause: err }
    );
  }
}

/**
 * Collect the `PAPAYA_*` variables from the environment, without their
 * prefix. A variable ending in `_FILE` names a YAML or JSON file, whose
 * parsed contents become the value of the variable without the suffix.
 */
export async function readEnvironment(
  env: NodeJS.ProcessEnv
): Promise<{ [name: string]: unknown }> {
  const values: { [name: string]: unknown } = {};
  const files: Array<[string, string]> = [];
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) {
      continue;
    }
    const name = key.substring(ENV_PREFIX.length);
    if (name.endsWith(FILE_SUFFIX)) {
      files.push([name.substring(0, name.length - FILE_SUFFIX.length), value]);
    } else {
      values[name] = value;
    }
  }
  for (const [name, path] of files) {
    values[name] = await readValueFile(name, path);
  }
  return values;
}

export async function loadConfig(
  env: NodeJS.ProcessEnv = process.env
): Promise<Config> {
  const result = await configSchema.safeParseAsync(await readEnvironment(env));
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) =>
        issue.path.length > 0
          ? `${ENV_PREFIX}${issue.path.join('.')}: ${issue.message}`
          : issue.message
      )
    );
  }
  return result.data;
}
