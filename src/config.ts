import { readFileSync } from 'fs';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const port = z.coerce.number().int().min(0).max(65535);
const positiveInt = z.coerce.number().int().positive();
const flag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  SERVICE_NAME: z.string().min(1).default('user-service'),
  HOST: z.string().min(1).default('0.0.0.0'),
  GRPC_PORT: port.default(50051),
  HTTP_PORT: port.default(8080),

  DATABASE_URL: z.string().url().optional(),
  DB_HOST: z.string().min(1).default('localhost'),
  DB_PORT: port.default(5432),
  DB_USER: z.string().min(1).default('postgres'),
  DB_PASSWORD: z.string().default('postgres'),
  DB_NAME: z.string().min(1).default('users'),
  DB_SSLMODE: z.enum(['disable', 'require', 'verify-ca', 'verify-full']).default('disable'),
  DB_POOL_MAX: positiveInt.default(20),
  DB_CONNECTION_TIMEOUT_MS: positiveInt.default(2000),
  DB_STATEMENT_TIMEOUT_MS: positiveInt.default(5000),

  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  RUN_MIGRATIONS: flag.default('true'),
  MIGRATIONS_DIR: z.string().min(1).optional(),
  SHUTDOWN_TIMEOUT_MS: positiveInt.default(30000),

  APP_VERSION: z.string().default('dev'),
  BUILD_TIME: z.string().default('unknown'),
  GIT_COMMIT: z.string().default('unknown'),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

type EnvName = keyof z.input<typeof envSchema>;

/**
 * Settings that may also come from the config file (`section.key`) or from
 * `APP_SECTION_KEY` variables. Plain variables win over `APP_` ones, which
 * win over the file.
 */
const LAYERED_SETTINGS: ReadonlyArray<readonly [string, EnvName]> = [
  ['server.host', 'HOST'],
  ['server.grpc_port', 'GRPC_PORT'],
  ['server.http_port', 'HTTP_PORT'],
  ['database.host', 'DB_HOST'],
  ['database.port', 'DB_PORT'],
  ['database.user', 'DB_USER'],
  ['database.password', 'DB_PASSWORD'],
  ['database.database', 'DB_NAME'],
  ['database.ssl_mode', 'DB_SSLMODE'],
  ['logger.level', 'LOG_LEVEL'],
];

export const DEFAULT_CONFIG_FILES = [
  join(process.cwd(), 'configs', 'config.yaml'),
  join(process.cwd(), 'config.yaml'),
];

const scalar = z.union([z.string(), z.number(), z.boolean()]).transform(String);
const configFileSchema = z.record(z.record(scalar)).nullish();

type ConfigFileValues = Map<string, string>;

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read the first config file that exists. A missing file is not an error;
 * an unreadable or malformed one is.
 */
export function readConfigFile(paths: readonly string[] = DEFAULT_CONFIG_FILES): ConfigFileValues {
  const values: ConfigFileValues = new Map();

  for (const path of paths) {
    let content: string;
    try {
      content = readFileSync(path, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        continue;
      }
      throw new Error(`Failed to read config file ${path}`, { cause: error });
    }

    let document: unknown;
    try {
      document = parseYaml(content);
    } catch (error) {
      throw new Error(`Failed to parse config file ${path}`, { cause: error });
    }
    const parsed = configFileSchema.safeParse(document);
    if (!parsed.success) {
      throw new Error(`Invalid config file ${path}: expected sections of scalar settings`);
    }

    for (const [section, settings] of Object.entries(parsed.data ?? {})) {
      for (const [key, value] of Object.entries(settings)) {
        values.set(`${section}.${key}`, value);
      }
    }
    return values;
  }

  return values;
}

function appEnvName(setting: string): string {
  return `APP_${setting.replace('.', '_').toUpperCase()}`;
}

function layerSettings(env: NodeJS.ProcessEnv, file: ConfigFileValues): NodeJS.ProcessEnv {
  const layered: NodeJS.ProcessEnv = { ...env };
  for (const [setting, name] of LAYERED_SETTINGS) {
    layered[name] = env[name] ?? env[appEnvName(setting)] ?? file.get(setting);
  }
  return layered;
}

export interface ServerConfig {
  host: string;
  grpcPort: number;
  httpPort: number;
  shutdownTimeoutMs: number;
}

export interface DatabaseConfig {
  connectionString: string;
  poolMax: number;
  connectionTimeoutMs: number;
  statementTimeoutMs: number;
  runMigrations: boolean;
  migrationsDir: string;
}

export interface BuildInfo {
  version: string;
  buildTime: string;
  gitCommit: string;
}

export interface AppConfig {
  serviceName: string;
  logLevel: LogLevel;
  server: ServerConfig;
  database: DatabaseConfig;
  build: BuildInfo;
}

export interface LoadConfigOptions {
  /** Candidate config files, first existing one wins. */
  configFiles?: readonly string[];
}

/**
 * Build and validate the service configuration from environment variables,
 * `APP_` variables and the optional YAML config file.
 * Call `dotenv.config()` first when a `.env` file should be honoured.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, options: LoadConfigOptions = {}): AppConfig {
  const file = readConfigFile(options.configFiles ?? DEFAULT_CONFIG_FILES);
  const parsed = envSchema.safeParse(layerSettings(env, file));
  if (!parsed.success) {
    const issues = parsed.error.errors
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const vars = parsed.data;
  return {
    serviceName: vars.SERVICE_NAME,
    logLevel: vars.LOG_LEVEL,
    server: {
      host: vars.HOST,
      grpcPort: vars.GRPC_PORT,
      httpPort: vars.HTTP_PORT,
      shutdownTimeoutMs: vars.SHUTDOWN_TIMEOUT_MS,
    },
    database: {
      connectionString:
        vars.DATABASE_URL ??
        buildConnectionString({
          host: vars.DB_HOST,
          port: vars.DB_PORT,
          user: vars.DB_USER,
          password: vars.DB_PASSWORD,
          database: vars.DB_NAME,
          sslMode: vars.DB_SSLMODE,
        }),
      poolMax: vars.DB_POOL_MAX,
      connectionTimeoutMs: vars.DB_CONNECTION_TIMEOUT_MS,
      statementTimeoutMs: vars.DB_STATEMENT_TIMEOUT_MS,
      runMigrations: vars.RUN_MIGRATIONS,
      migrationsDir: vars.MIGRATIONS_DIR ?? join(process.cwd(), 'src/infra/db/migrations'),
    },
    build: {
      version: vars.APP_VERSION,
      buildTime: vars.BUILD_TIME,
      gitCommit: vars.GIT_COMMIT,
    },
  };
}

function buildConnectionString(parts: {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  sslMode: string;
}): string {
  const user = encodeURIComponent(parts.user);
  const password = encodeURIComponent(parts.password);
  const database = encodeURIComponent(parts.database);
  return `postgres://${user}:${password}@${parts.host}:${parts.port}/${database}?sslmode=${parts.sslMode}`;
}
