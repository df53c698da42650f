/**
 * Configuration management for the shopping cart service
 * Loads configuration from environment variables with sensible defaults
 */

export interface Config {
  host: string;
  port: number;
  logLevel: string;
  serviceName: string;
  serviceVersion: string;
  otelExporterEndpoint: string | null;
}

const VALID_LOG_LEVELS = ['debug', 'info', 'warn', 'error'];

/**
 * Load and validate configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const host = env.HOST || '0.0.0.0';
  const port = env.PORT ? parseInt(env.PORT, 10) : 7070;
  const logLevel = env.LOG_LEVEL || 'info';
  const serviceName = env.OTEL_SERVICE_NAME || env.SERVICE_NAME || 'shoppingcartservice';
  const serviceVersion = env.OTEL_SERVICE_VERSION || '1.0.0';
  const otelExporterEndpoint = env.OTEL_EXPORTER_OTLP_ENDPOINT || null;

  if (isNaN(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid PORT: ${env.PORT}. Must be between 1 and 65535.`);
  }

  if (!VALID_LOG_LEVELS.includes(logLevel.toLowerCase())) {
    throw new Error(`Invalid LOG_LEVEL: ${logLevel}. Must be one of: ${VALID_LOG_LEVELS.join(', ')}`);
  }

  return {
    host,
    port,
    logLevel: logLevel.toLowerCase(),
    serviceName,
    serviceVersion,
    otelExporterEndpoint,
  };
}

/**
 * Singleton config instance
 */
export const config: Config = loadConfig();
