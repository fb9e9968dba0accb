/**
 * Environment variable names for the Mongo connection.
 */
export const ENV_MONGO_HOST = 'MONGO_HOST';
export const ENV_MONGO_PORT = 'MONGO_PORT';
export const ENV_MONGO_ROOT_USERNAME = 'MONGO_ROOT_USERNAME';
export const ENV_MONGO_ROOT_PASSWORD = 'MONGO_ROOT_PASSWORD';
export const ENV_MONGO_DB_NAME = 'MONGO_DB_NAME';

/**
 * Strict config shape consumed by the Mongo client.
 */
export interface MongoConfig {
  readonly host: string;
  readonly port: number;
  /** Root admin username; credentials are omitted from the URI when empty. */
  readonly username: string;
  readonly password: string;
  /** Database used when a caller does not name one. */
  readonly dbName: string;
}

export const MONGO_CONFIG_DEFAULTS: Readonly<MongoConfig> = {
  host: '127.0.0.1',
  port: 27017,
  username: '',
  password: '',
  dbName: 'data_repository',
};

/** Reads one raw config value (process.env, ConfigService, ...). */
export type ConfigReader = (key: string) => string | undefined;

const readProcessEnv: ConfigReader = (key) => process.env[key];

/**
 * Parse a positive integer port with a sensible default.
 */
function parsePort(value: string | undefined, fallback: number): number {
  const n = value ? Number.parseInt(value, 10) : Number.NaN;
  return Number.isFinite(n) && n > 0 && n <= 65535 ? n : fallback;
}

function readTrimmed(
  read: ConfigReader,
  key: string,
  fallback: string,
): string {
  const raw = read(key);
  return (raw && raw.trim()) || fallback;
}

/**
 * Load strongly typed Mongo config.
 * Never throws; always returns a complete config with defaults.
 */
export function loadMongoConfig(read: ConfigReader = readProcessEnv): MongoConfig {
  return {
    host: readTrimmed(read, ENV_MONGO_HOST, MONGO_CONFIG_DEFAULTS.host),
    port: parsePort(read(ENV_MONGO_PORT), MONGO_CONFIG_DEFAULTS.port),
    username: readTrimmed(
      read,
      ENV_MONGO_ROOT_USERNAME,
      MONGO_CONFIG_DEFAULTS.username,
    ),
    password: readTrimmed(
      read,
      ENV_MONGO_ROOT_PASSWORD,
      MONGO_CONFIG_DEFAULTS.password,
    ),
    dbName: readTrimmed(read, ENV_MONGO_DB_NAME, MONGO_CONFIG_DEFAULTS.dbName),
  };
}

/**
 * Build a standard Mongo URI from config.
 * Does NOT attempt a connection.
 */
export function buildMongoUri(cfg: MongoConfig, authDb = 'admin'): string {
  const hostPart = `${cfg.host}:${cfg.port}`;
  if (!cfg.username) {
    return `mongodb://${hostPart}/?directConnection=true`;
  }
  const u = encodeURIComponent(cfg.username);
  const p = encodeURIComponent(cfg.password);
  return `mongodb://${u}:${p}@${hostPart}/${authDb}?authSource=${authDb}&directConnection=true`;
}
