import * as jq from 'jq-wasm';

import { jsonValue } from './schema';

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type QueryVariables = { [name: string]: JsonValue };

export class QueryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'QueryError';
  }
}

export class QuerySyntaxError extends QueryError {
  readonly source: string;

  constructor(message: string, source: string, options?: { cause?: unknown }) {
    super(`${message} in query "${source}"`, options);
    this.name = 'QuerySyntaxError';
    this.source = source;
  }
}

/** First diagnostic jq wrote, without its `jq: error ...:` preamble and the
 * location suffix of compile errors. */
export function jqErrorMessage(stderr: string): string {
  const line =
    stderr
      .split('\n')
      .map((l) => l.trim())
      .find((l) => l.length > 0) ?? '';
  const message = line
    .replace(/^jq: error(?: \(at [^)]*\))?: /, '')
    .replace(/ at <[^>]*>, line \d+:$/, '');
  return message.length > 0 ? message : 'jq failed without a message';
}

function argumentFlags(variables: QueryVariables): string[] {
  return Object.entries(variables).flatMap(([name, value]) => [
    '--argjson',
    name,
    JSON.stringify(value),
  ]);
}

async function runJq(
  input: JsonObject,
  filter: string,
  flags: string[]
): Promise<string> {
  let result: Awaited<ReturnType<typeof jq.raw>>;
  try {
    result = await jq.raw(input, filter, flags);
  } catch (err) {
    throw new QueryError(
      err instanceof Error ? jqErrorMessage(err.message) : String(err),
      { cause: err }
    );
  }
  if (result.exitCode !== 0) {
    throw new QueryError(jqErrorMessage(result.stderr));
  }
  return result.stdout;
}

/** A jq filter that passed compilation. */
export class Query {
  readonly source: string;
  /** Names of the variables the filter may reference */
  readonly variables: readonly string[];

  constructor(source: string, variables: readonly string[] = []) {
    this.source = source;
    this.variables = variables;
  }

  /** Every output of the filter for the input, in order */
  async all(input: JsonObject, variables: QueryVariables = {}): Promise<JsonValue[]> {
    const stdout = await runJq(input, this.source, [
      '-c',
      ...argumentFlags(variables),
    ]);
    return stdout
      .split('\n')
      .filter((line) => line.trim().length > 0)
      .map((line) => jsonValue.parse(JSON.parse(line)));
  }

  async first(
    input: JsonObject,
    variables: QueryVariables = {}
  ): Promise<JsonValue | undefined> {
    const [value] = await this.all(input, variables);
    return value;
  }
}

/**
 * Compile a jq filter without running it on a document. `variables` names
 * the `$variables` the filter may use, they are bound to `null` for the
 * check.
 */
export async function compile(
  source: string,
  variables: readonly string[] = []
): Promise<Query> {
  if (source.trim().length === 0) {
    throw new QuerySyntaxError('empty filter', source);
  }
  // The branch is never taken, jq only has to accept the program
  const checkFilter = `if false then (\n${source}\n) else empty end`;
  const flags = [
    '-n',
    ...argumentFlags(Object.fromEntries(variables.map((name) => [name, null]))),
  ];
  try {
    await runJq({}, checkFilter, flags);
  } catch (err) {
    if (err instanceof QueryError) {
      throw new QuerySyntaxError(err.message, source, { cause: err });
    }
    throw err;
  }
  return new Query(source, variables);
}
