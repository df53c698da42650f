/**
 * OpenTelemetry instrumentation setup
 * Configures tracing, metrics, and logs collection for the shopping cart service.
 * Loaded with `node --require` so gRPC is patched before the server module loads.
 */

import { NodeSDK } from '@opentelemetry/sdk-node';
import { GrpcInstrumentation } from '@opentelemetry/instrumentation-grpc';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-grpc';
import { OTLPMetricExporter } from '@opentelemetry/exporter-metrics-otlp-grpc';
import { OTLPLogExporter } from '@opentelemetry/exporter-logs-otlp-grpc';
import { PeriodicExportingMetricReader } from '@opentelemetry/sdk-metrics';
import { BatchLogRecordProcessor, LoggerProvider } from '@opentelemetry/sdk-logs';
import { Resource } from '@opentelemetry/resources';
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';
import { logs } from '@opentelemetry/api-logs';
import { config } from '../utils/config';

let sdk: NodeSDK | null = null;

/**
 * The logger module reads the global LoggerProvider, so messages from this file go straight to the console.
 */
function writeConsole(level: 'info' | 'error', message: string, context?: Record<string, string>): void {
  const output = JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    message,
    service: config.serviceName,
    ...(context ? { context } : {}),
  });
  if (level === 'error') {
    console.error(output);
  } else {
    console.log(output);
  }
}

/**
 * Initialize OpenTelemetry instrumentation.
 * With an endpoint, traces, metrics and logs are exported over OTLP/gRPC; without one only
 * in-process instrumentation runs. Errors are logged and never stop the service.
 * @returns true if the SDK started
 */
export function initializeTelemetry(endpoint: string | null = config.otelExporterEndpoint): boolean {
  if (sdk) {
    return true;
  }

  try {
    const resource = new Resource({
      [ATTR_SERVICE_NAME]: config.serviceName,
      [ATTR_SERVICE_VERSION]: config.serviceVersion,
    });

    const traceExporter = endpoint ? new OTLPTraceExporter({ url: endpoint }) : undefined;

    const metricReader = endpoint
      ? new PeriodicExportingMetricReader({
        exporter: new OTLPMetricExporter({ url: endpoint }),
        exportIntervalMillis: 10000,
      })
      : undefined;

    if (endpoint) {
      const loggerProvider = new LoggerProvider({ resource });
      loggerProvider.addLogRecordProcessor(new BatchLogRecordProcessor(new OTLPLogExporter({ url: endpoint })));
      logs.setGlobalLoggerProvider(loggerProvider);
    }

    sdk = new NodeSDK({
      resource,
      traceExporter,
      metricReader,
      instrumentations: [new GrpcInstrumentation()],
    });
    sdk.start();

    writeConsole('info', 'OpenTelemetry instrumentation initialized', {
      serviceName: config.serviceName,
      serviceVersion: config.serviceVersion,
      otelEndpoint: endpoint || 'not configured',
    });
    return true;
  } catch (error) {
    sdk = null;
    writeConsole('error', 'Failed to initialize OpenTelemetry', {
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}

/**
 * Flush pending telemetry and stop the SDK.
 */
export async function shutdownTelemetry(): Promise<void> {
  if (!sdk) {
    return;
  }

  const running = sdk;
  sdk = null;
  try {
    await running.shutdown();
    writeConsole('info', 'OpenTelemetry instrumentation shut down');
  } catch (error) {
    writeConsole('error', 'Error shutting down OpenTelemetry', {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

// Auto-initialize when module is loaded (for --require flag)
initializeTelemetry();
