import Fastify from 'fastify';
import multipart from '@fastify/multipart';
import { v4 as uuidv4 } from 'uuid';
import { QueryParser } from '../../../src/index.js';
import type { GrammarParser } from '../../../src/index.js';
import type { AppConfig } from '../config.js';
import { registerErrorHandler } from './middleware/error-handler.js';
import { registerHealthRoutes } from '../features/health/routes.js';
import { registerParseRoutes } from '../features/parse/routes.js';

const MAX_UPLOAD_BYTES = 1024 * 1024;

export interface ServerOptions extends Pick<AppConfig, 'logLevel' | 'parseCacheSize' | 'version'> {
  /** Overrides the Lucene grammar; tests use this to stub parsing. */
  grammar?: GrammarParser;
}

export function buildServer(options: ServerOptions) {
  const app = Fastify({
    logger: { level: options.logLevel },
    genReqId: () => uuidv4(),
  });

  const parser = new QueryParser({
    ...(options.grammar !== undefined ? { grammar: options.grammar } : {}),
    onError: (query, err) => app.log.warn({ query, reason: err.message }, 'query rejected'),
  });

  registerErrorHandler(app);

  // /parse-file takes a single `file` part
  app.register(multipart, { limits: { files: 1, fileSize: MAX_UPLOAD_BYTES } });

  app.addHook('onRequest', async (request, reply) => {
    reply.header('x-request-id', request.id);
  });

  app.register(async (instance) => {
    await registerHealthRoutes(instance, options.version);
  });

  const prefix = '/api/v1';

  app.register(async (instance) => {
    await registerParseRoutes(instance, parser, options.parseCacheSize);
  }, { prefix });

  return app;
}
