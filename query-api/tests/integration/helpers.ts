import type { GrammarParser } from '../../../src/index.js';
import { buildServer } from '../../src/api/server.js';

export const TEST_VERSION = '0.0.0-test';

export function buildTestServer(grammar?: GrammarParser) {
  return buildServer({
    logLevel: 'silent',
    parseCacheSize: 10,
    version: TEST_VERSION,
    ...(grammar !== undefined ? { grammar } : {}),
  });
}
