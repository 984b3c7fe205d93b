import type { FastifyInstance, FastifyRequest } from 'fastify';
import { QuerySyntaxError, astDepth } from '../../../../src/index.js';
import type { QueryParser, QueryResult } from '../../../../src/index.js';
import { LruCache } from '../../cache.js';
import { UploadError } from '../../errors.js';

interface ParseBody {
  query: string;
}

interface FileRoute {
  Body: string | undefined;
}

interface BatchBody {
  queries: string[];
}

type BatchItem =
  | {
      query: string;
      valid: true;
      narrative_text: string;
      deterministic_text: string;
      ast_depth: number;
    }
  | { query: string; valid: false; error: string };

const MAX_BATCH_SIZE = 100;

const parseBodySchema = {
  type: 'object',
  required: ['query'],
  properties: {
    query: { type: 'string', minLength: 1 },
  },
} as const;

const batchBodySchema = {
  type: 'object',
  required: ['queries'],
  properties: {
    queries: {
      type: 'array',
      minItems: 1,
      maxItems: MAX_BATCH_SIZE,
      items: { type: 'string' },
    },
  },
} as const;

const utf8 = new TextDecoder('utf-8', { fatal: true });

/** Query text from a multipart `file` upload, or from a raw text/plain body. */
async function readQueryFile(request: FastifyRequest<FileRoute>): Promise<string> {
  if (!request.isMultipart()) {
    return typeof request.body === 'string' ? request.body : '';
  }
  const file = await request.file();
  if (file === undefined) {
    throw new UploadError('No file uploaded');
  }
  const content = await file.toBuffer();
  try {
    return utf8.decode(content);
  } catch (err) {
    throw new UploadError('File must be UTF-8 encoded text', err);
  }
}

function toResponse(result: QueryResult) {
  return {
    deterministic_text: result.deterministic_text,
    narrative_text: result.narrative_text,
    ast_json: result.ast_json,
  };
}

export async function registerParseRoutes(
  app: FastifyInstance,
  parser: QueryParser,
  cacheSize: number,
): Promise<void> {
  const cache = new LruCache<QueryResult>(cacheSize);

  function parseCached(query: string): QueryResult {
    const cached = cache.get(query);
    if (cached !== undefined) return cached;
    const result = parser.parse(query);
    cache.set(query, result);
    return result;
  }

  // POST /parse: explain a single query
  app.post<{ Body: ParseBody }>('/parse', { schema: { body: parseBodySchema } }, async (request, reply) => {
    const result = parser.parse(request.body.query.trim());
    return reply.status(200).send(toResponse(result));
  });

  // POST /parse-file: explain the query held in an uploaded text file
  app.post<FileRoute>('/parse-file', async (request, reply) => {
    const query = (await readQueryFile(request)).trim();
    if (query.length === 0) {
      throw new QuerySyntaxError('File is empty or contains only whitespace');
    }
    return reply.status(200).send(toResponse(parser.parse(query)));
  });

  // POST /parse-batch: explain many queries; failures are reported per item
  app.post<{ Body: BatchBody }>('/parse-batch', { schema: { body: batchBodySchema } }, async (request, reply) => {
    const results = request.body.queries.map((query): BatchItem => {
      try {
        const result = parseCached(query);
        return {
          query,
          valid: true,
          narrative_text: result.narrative_text,
          deterministic_text: result.deterministic_text,
          ast_depth: astDepth(result.ast_json),
        };
      } catch (err) {
        if (!(err instanceof QuerySyntaxError)) throw err;
        return { query, valid: false, error: err.message };
      }
    });

    const valid = results.filter((item) => item.valid).length;
    return reply.status(200).send({
      results,
      summary: { total: results.length, valid, invalid: results.length - valid },
    });
  });
}
