/**
 * OpenTelemetry instrumentation setup for Grafana observability stack
 * Configures tracing, metrics, and logs collection for the Cart Service
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
import { config, Config } from '../utils/config';
import { logger, errorMessage } from '../utils/logger';

export type TelemetrySettings = Pick<
  Config,
  'serviceName' | 'serviceVersion' | 'otelExporterEndpoint' | 'fault' | 'rpcDelay'
>;

let sdk: NodeSDK | null = null;

/**
 * Resource describing this service, tagged with whether fault injection
 * is active so injected failures can be told apart in dashboards
 */
export function createResource(settings: TelemetrySettings): Resource {
  return new Resource({
    [ATTR_SERVICE_NAME]: settings.serviceName,
    [ATTR_SERVICE_VERSION]: settings.serviceVersion,
    'cart.fault_injection.enabled': settings.fault.enabled,
    'cart.rpc_delay.enabled': settings.rpcDelay.enabled,
  });
}

function registerLogExporter(endpoint: string, resource: Resource): void {
  const loggerProvider = new LoggerProvider({ resource });
  loggerProvider.addLogRecordProcessor(new BatchLogRecordProcessor(new OTLPLogExporter({ url: endpoint })));
  logs.setGlobalLoggerProvider(loggerProvider);
}

/**
 * Initialize OpenTelemetry instrumentation
 * Without an OTLP endpoint only tracing is started, with the SDK's defaults.
 * Calling it again while running is a no-op.
 */
export function initializeTelemetry(settings: TelemetrySettings = config): void {
  if (sdk) {
    return;
  }

  const endpoint = settings.otelExporterEndpoint;

  try {
    const resource = createResource(settings);

    if (endpoint) {
      registerLogExporter(endpoint, resource);
    }

    sdk = new NodeSDK({
      resource,
      traceExporter: endpoint ? new OTLPTraceExporter({ url: endpoint }) : undefined,
      metricReader: endpoint
        ? new PeriodicExportingMetricReader({
          exporter: new OTLPMetricExporter({ url: endpoint }),
          exportIntervalMillis: 10000, // Export every 10 seconds
        })
        : undefined,
      instrumentations: [
        new GrpcInstrumentation(),
      ],
    });

    sdk.start();

    logger.info('OpenTelemetry instrumentation initialized', {
      serviceName: settings.serviceName,
      serviceVersion: settings.serviceVersion,
      otelEndpoint: endpoint || 'not configured',
    });
  } catch (error) {
    // Telemetry is optional; the service still starts without it
    sdk = null;
    logger.error('Failed to initialize OpenTelemetry', { error: errorMessage(error) });
  }
}

export function isTelemetryRunning(): boolean {
  return sdk !== null;
}

/**
 * Gracefully shutdown OpenTelemetry SDK
 * Ensures all pending telemetry data is exported before shutdown
 */
export async function shutdownTelemetry(): Promise<void> {
  if (!sdk) {
    return;
  }

  const running = sdk;
  sdk = null;
  try {
    await running.shutdown();
    logger.info('OpenTelemetry instrumentation shut down');
  } catch (error) {
    logger.error('Error shutting down OpenTelemetry', { error: errorMessage(error) });
  }
}
