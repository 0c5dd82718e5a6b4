import { z } from 'zod';
import { envParsers, loadEnvConfig, normalizeLogLevel, type EnvSource, type LogLevel } from '@series-import/shared';

export const DEFAULT_PORT = 8086;
export const DEFAULT_COLUMN_WRITE_PORT = 8305;
export const DEFAULT_TIMEOUT_MS = 10_000;

const connectionEnvSchema = z.object({
  SERIES_IMPORT_HOST: envParsers.host(),
  SERIES_IMPORT_PORT: envParsers.port({ defaultPort: DEFAULT_PORT }),
  SERIES_IMPORT_COLUMN_WRITE_PORT: envParsers.port({
    defaultPort: DEFAULT_COLUMN_WRITE_PORT,
    description: 'column write port'
  }),
  SERIES_IMPORT_USERNAME: envParsers.string({ defaultValue: '' }),
  SERIES_IMPORT_PASSWORD: envParsers.string({ trim: false, defaultValue: '' }),
  SERIES_IMPORT_TIMEOUT_MS: envParsers.integer({ min: 0, defaultValue: DEFAULT_TIMEOUT_MS }),
  SERIES_IMPORT_SSL: envParsers.boolean({ defaultValue: false }),
  SERIES_IMPORT_LOG_LEVEL: envParsers.string({ defaultValue: 'info', lowercase: true })
});

export type ConnectionSettings = {
  host: string;
  port: number;
  columnWritePort: number;
  username: string;
  password: string;
  timeoutMs: number;
  ssl: boolean;
  logLevel: LogLevel;
};

export type ConnectionOverrides = Partial<Omit<ConnectionSettings, 'logLevel'>>;

export function loadConnectionDefaults(env?: EnvSource): ConnectionSettings {
  const parsed = loadEnvConfig(connectionEnvSchema, { env, context: 'series-import' });
  return {
    host: parsed.SERIES_IMPORT_HOST ?? 'localhost',
    port: parsed.SERIES_IMPORT_PORT ?? DEFAULT_PORT,
    columnWritePort: parsed.SERIES_IMPORT_COLUMN_WRITE_PORT ?? DEFAULT_COLUMN_WRITE_PORT,
    username: parsed.SERIES_IMPORT_USERNAME ?? '',
    password: parsed.SERIES_IMPORT_PASSWORD ?? '',
    timeoutMs: parsed.SERIES_IMPORT_TIMEOUT_MS ?? DEFAULT_TIMEOUT_MS,
    ssl: parsed.SERIES_IMPORT_SSL ?? false,
    logLevel: normalizeLogLevel(parsed.SERIES_IMPORT_LOG_LEVEL)
  };
}

/** Command-line flags win over environment defaults. */
export function resolveConnection(defaults: ConnectionSettings, overrides: ConnectionOverrides): ConnectionSettings {
  return {
    host: overrides.host ?? defaults.host,
    port: overrides.port ?? defaults.port,
    columnWritePort: overrides.columnWritePort ?? defaults.columnWritePort,
    username: overrides.username ?? defaults.username,
    password: overrides.password ?? defaults.password,
    timeoutMs: overrides.timeoutMs ?? defaults.timeoutMs,
    ssl: overrides.ssl ?? defaults.ssl,
    logLevel: defaults.logLevel
  };
}

export function buildBaseUrl(settings: ConnectionSettings, port: number): string {
  const host = settings.host.includes(':') && !settings.host.startsWith('[') ? `[${settings.host}]` : settings.host;
  return `${settings.ssl ? 'https' : 'http'}://${host}:${port}`;
}
