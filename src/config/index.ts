import { existsSync } from 'fs';
import { tmpdir } from 'os';
import { resolve } from 'path';
import { AppConfig } from '../types';
import { ConfigurationError } from '../errors';

/**
 * Locations probed for LibreOffice when neither SOFFICE_PATH nor
 * LIBREOFFICE_PATH is set
 */
export const SOFFICE_CANDIDATES = [
  '/usr/bin/soffice',
  '/usr/bin/libreoffice',
  '/Applications/LibreOffice.app/Contents/MacOS/soffice',
];

export const MAX_POOL_SIZE = 16;

/**
 * First non-empty value among the given environment variables
 */
function readEnv(...names: string[]): string | undefined {
  for (const name of names) {
    const value = process.env[name];
    if (value !== undefined && value.trim() !== '') {
      return value.trim();
    }
  }
  return undefined;
}

/**
 * Comma-separated origin list; '*' (the default) allows any origin
 */
function parseOrigins(value: string | undefined): string[] {
  const origins = (value || '*')
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin !== '');
  return origins.length > 0 ? origins : ['*'];
}

function resolveSofficePath(): string {
  const configured = readEnv('SOFFICE_PATH', 'LIBREOFFICE_PATH');
  if (configured) {
    return configured;
  }

  // Fall back to a PATH lookup at conversion time
  return SOFFICE_CANDIDATES.find((candidate) => existsSync(candidate)) ?? 'soffice';
}

/**
 * Load configuration from environment variables
 *
 * Called once at start-up; the resulting object is passed explicitly to the
 * converter, the orchestrator and the HTTP server. RAW_DATA_DIR,
 * PREPARED_DATA_DIR, LIBREOFFICE_PATH and API_PORT are accepted as aliases.
 */
export function loadConfig(): AppConfig {
  return {
    port: parseInt(readEnv('PORT', 'API_PORT') || '8000', 10),
    nodeEnv: process.env.NODE_ENV || 'development',
    logLevel: process.env.LOG_LEVEL || 'info',
    sourceDir: resolve(process.cwd(), readEnv('SOURCE_DIR', 'RAW_DATA_DIR') || './raw_data'),
    destinationDir: resolve(process.cwd(), readEnv('DESTINATION_DIR', 'PREPARED_DATA_DIR') || './prepared_data'),
    sofficePath: resolveSofficePath(),
    conversionTimeout: parseInt(process.env.CONVERSION_TIMEOUT || '120000', 10),
    conversionWorkdir: process.env.CONVERSION_WORKDIR || tmpdir(),
    conversionPoolSize: parseInt(process.env.CONVERSION_POOL_SIZE || '2', 10),
    skipEmpty: (process.env.SKIP_EMPTY || 'false').toLowerCase() === 'true',
    corsOrigins: parseOrigins(process.env.CORS_ORIGINS),
    azureMonitorConnectionString: process.env.AZURE_MONITOR_CONNECTION_STRING,
    enableTelemetry: process.env.ENABLE_TELEMETRY !== 'false', // Enabled by default, can be explicitly disabled
  };
}

function requireIntegerInRange(key: keyof AppConfig, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigurationError(`${key} must be an integer between ${min} and ${max}, got ${value}`, {
      configKey: key,
    });
  }
}

/**
 * Validate numeric settings and folder layout
 *
 * @throws ConfigurationError on the first invalid setting
 */
export function validateConfig(config: AppConfig): void {
  requireIntegerInRange('port', config.port, 1, 65535);
  requireIntegerInRange('conversionTimeout', config.conversionTimeout, 1, 24 * 60 * 60 * 1000);
  requireIntegerInRange('conversionPoolSize', config.conversionPoolSize, 1, MAX_POOL_SIZE);

  if (config.sourceDir === config.destinationDir) {
    throw new ConfigurationError('source and destination directories must differ', {
      configKey: 'destinationDir',
      path: config.sourceDir,
    });
  }
}
