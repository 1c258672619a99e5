/**
 * API Command
 * API 版本、deprecated 端點檢查，以及任意端點請求
 */

import { Command, InvalidArgumentError } from 'commander';
import { getApiClient } from '../lib/api-client.js';
import { formatJSON, printError, resolveFormat } from '../utils/output.js';
import type { HttpMethod, QueryParams } from '../services/transport.js';
import type { FieldValue } from '../types/envelope.js';

const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'];

function parseMethod(value: string): HttpMethod {
  const upper = value.toUpperCase();
  const method = HTTP_METHODS.find((candidate) => candidate === upper);
  if (!method) {
    throw new InvalidArgumentError(`Expected one of ${HTTP_METHODS.join(', ')}.`);
  }
  return method;
}

/**
 * --query key=value，可重複
 */
function collectQuery(value: string, previous: QueryParams): QueryParams {
  const index = value.indexOf('=');
  if (index <= 0) {
    throw new InvalidArgumentError('Expected key=value.');
  }
  return { ...previous, [value.slice(0, index)]: value.slice(index + 1) };
}

function isFieldMap(value: unknown): value is Record<string, FieldValue> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * --data '{"name":"Practice"}'：欄位會編碼成 template
 */
function parseFields(value: string): Record<string, FieldValue> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    throw new InvalidArgumentError('Expected a JSON object.');
  }
  if (!isFieldMap(parsed)) {
    throw new InvalidArgumentError('Expected a JSON object.');
  }
  return parsed;
}

export const apiCommand = new Command('api').description('Inspect the TeamSnap API');

/**
 * teamsnap api version
 */
apiCommand
  .command('version')
  .description('Show the API version reported by the root endpoint')
  .action(async (_options: unknown, cmd: Command) => {
    const format = resolveFormat(cmd.optsWithGlobals().format);
    try {
      const version = await getApiClient().connect();

      if (format === 'json') {
        console.log(formatJSON({ version: version ?? null }));
      } else {
        console.log(`TeamSnap API version: ${version ?? 'not reported'}`);
      }
    } catch (error) {
      printError(error, format);
    }
  });

/**
 * teamsnap api deprecations [path]
 */
apiCommand
  .command('deprecations [path]')
  .description('List links an endpoint marks as deprecated')
  .action(async (path: string | undefined, _options: unknown, cmd: Command) => {
    const format = resolveFormat(cmd.optsWithGlobals().format);
    try {
      const links = await getApiClient().checkForDeprecations(path ?? '/');

      if (format === 'json') {
        console.log(formatJSON(links));
      } else if (links.length === 0) {
        console.log(`✅ No deprecated links on ${path ?? '/'}`);
      } else {
        console.log(`⚠️  ${links.length} deprecated link(s) on ${path ?? '/'}:`);
        for (const link of links) {
          console.log(`  - ${link.rel}: ${link.href}${link.prompt ? ` (${link.prompt})` : ''}`);
        }
      }
    } catch (error) {
      printError(error, format);
    }
  });

/**
 * teamsnap api request <method> <path>
 */
apiCommand
  .command('request')
  .description('Send a request to any endpoint')
  .argument('<method>', 'HTTP method (GET, POST, PUT, PATCH, DELETE)', parseMethod)
  .argument('<path>', 'Path relative to the API root, e.g. /teams/123')
  .option('-q, --query <key=value>', 'Query parameter (repeatable)', collectQuery, {})
  .option('-d, --data <json>', 'Fields to send as a Collection+JSON template', parseFields)
  .option('--raw', 'Print the response body without decoding')
  .action(
    async (
      method: HttpMethod,
      path: string,
      options: { query: QueryParams; data?: Record<string, FieldValue>; raw?: boolean },
      cmd: Command
    ) => {
      const format = resolveFormat(cmd.optsWithGlobals().format);
      try {
        const result = await getApiClient().request(method, path, {
          query: options.query,
          fields: options.data,
          raw: options.raw,
        });

        const output =
          result.kind === 'raw'
            ? { status: result.status, body: result.body }
            : {
                status: result.status,
                version: result.collection.version ?? null,
                records: result.collection.records.map((record) => record.data),
                links: result.collection.links,
              };
        console.log(formatJSON(output));
      } catch (error) {
        printError(error, format);
      }
    }
  );
