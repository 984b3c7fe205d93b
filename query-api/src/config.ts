export interface AppConfig {
  port: number;
  host: string;
  logLevel: string;
  parseCacheSize: number;
  version: string;
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function intFrom(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${key} must be a non-negative integer, got '${raw}'`);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const logLevel = env['LOG_LEVEL'] ?? 'info';
  if (!LOG_LEVELS.includes(logLevel)) {
    throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got '${logLevel}'`);
  }

  return {
    port: intFrom(env, 'PORT', 3000),
    host: env['HOST'] ?? '0.0.0.0',
    logLevel,
    parseCacheSize: intFrom(env, 'PARSE_CACHE_SIZE', 1000),
    version: env['APP_VERSION'] ?? '1.0.0',
  };
}
