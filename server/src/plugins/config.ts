import fp from 'fastify-plugin';

export const DEFAULT_PORT = 4999;
export const DEFAULT_DATABASE_SECRET_NAME = 'neon-database-connection-string';

// Type-safe configuration interface
export interface AppConfig {
  port: number;
  host: string;
  /** Local database location; when unset the location is read from the secret store. */
  databaseUrl?: string;
  databaseSecretName: string;
  gcpProjectId?: string;
  logLevel: 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
  nodeEnv: string;
  trustProxy: boolean;
  corsOrigin: string;
}

// Type augmentation: makes fastify.config available across all routes/plugins
declare module 'fastify' {
  interface FastifyInstance {
    config: AppConfig;
  }
}

const LOG_LEVELS: ReadonlyArray<AppConfig['logLevel']> = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
];

function isLogLevel(value: string): value is AppConfig['logLevel'] {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Pure function to load and validate configuration from environment variables.
 *
 * @param env - Environment variables object (e.g., process.env)
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const errors: string[] = [];

  // Helper to treat empty strings as undefined
  const getValue = (key: string): string | undefined => {
    const value = env[key];
    return value === '' ? undefined : value;
  };

  // Parse and validate PORT
  const portStr = getValue('PORT') ?? String(DEFAULT_PORT);
  const port = parseInt(portStr, 10);
  if (isNaN(port)) {
    errors.push(`PORT must be a valid number, got: ${portStr}`);
  } else if (port < 0 || port > 65535) {
    errors.push(`PORT must be in range 0-65535, got: ${port}`);
  }

  const host = getValue('HOST') ?? '0.0.0.0';

  const databaseUrl = getValue('DATABASE_URL');
  const databaseSecretName = getValue('DATABASE_SECRET_NAME') ?? DEFAULT_DATABASE_SECRET_NAME;
  const gcpProjectId = getValue('GOOGLE_CLOUD_PROJECT');

  // Parse and validate LOG_LEVEL
  const logLevelStr = (getValue('LOG_LEVEL') ?? 'info').toLowerCase();
  let logLevel: AppConfig['logLevel'] = 'info';
  if (isLogLevel(logLevelStr)) {
    logLevel = logLevelStr;
  } else {
    errors.push(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got: ${getValue('LOG_LEVEL')}`);
  }

  const nodeEnv = getValue('NODE_ENV') ?? 'production';

  // Parse TRUST_PROXY (boolean, default false)
  const trustProxyStr = (getValue('TRUST_PROXY') ?? 'false').toLowerCase();
  let trustProxy: boolean;
  if (trustProxyStr === 'true') {
    trustProxy = true;
  } else if (trustProxyStr === 'false') {
    trustProxy = false;
  } else {
    errors.push(`TRUST_PROXY must be 'true' or 'false', got: ${getValue('TRUST_PROXY')}`);
    trustProxy = false;
  }

  const corsOrigin = getValue('CORS_ORIGIN') ?? '*';

  if (errors.length > 0) {
    throw new Error(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }

  return {
    port,
    host,
    databaseUrl,
    databaseSecretName,
    gcpProjectId,
    logLevel,
    nodeEnv,
    trustProxy,
    corsOrigin,
  };
}

export default fp(
  async function configPlugin(fastify) {
    const config = loadConfig(process.env);

    // The database location may embed credentials, so only its source is logged
    fastify.log.info(
      {
        port: config.port,
        host: config.host,
        databaseSource: config.databaseUrl ? 'env' : 'secret-manager',
        databaseSecretName: config.databaseUrl ? undefined : config.databaseSecretName,
        logLevel: config.logLevel,
        nodeEnv: config.nodeEnv,
        trustProxy: config.trustProxy,
        corsOrigin: config.corsOrigin,
      },
      'Configuration loaded',
    );

    fastify.decorate('config', config);
  },
  {
    name: 'config',
  },
);
