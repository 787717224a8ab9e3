/**
 * Azure Application Insights observability wrapper using OpenTelemetry
 *
 * Provides:
 * - Metrics tracking (counters, histograms, gauges)
 * - Dependency tracking (LibreOffice)
 * - Correlation ID propagation as span attribute
 * - No-op behaviour when App Insights is unavailable
 */

import { useAzureMonitor } from '@azure/monitor-opentelemetry';
import { metrics, trace, context, SpanStatusCode } from '@opentelemetry/api';
import type { Counter, Histogram, Meter } from '@opentelemetry/api';
import type { AppConfig } from '../types';
import { createLogger } from '../utils/logger';

const logger = createLogger('obs:insights');

// Service metadata
const SERVICE_NAME = 'legacy-office-converter';
const SERVICE_VERSION = '1.0.0';

export type MetricName =
  | 'conversion_duration_ms'
  | 'conversion_failures_total'
  | 'batch_runs_total'
  | 'batch_duration_ms';

export type GaugeName = 'conversion_pool_active' | 'conversion_pool_queued';

// Telemetry state
let isInitialized = false;
let telemetryEnabled = false;
let meter: Meter | null = null;

// Metric instruments
let conversionDurationHistogram: Histogram | null = null;
let conversionFailuresCounter: Counter | null = null;
let batchRunsCounter: Counter | null = null;
let batchDurationHistogram: Histogram | null = null;
let conversionPoolActiveHistogram: Histogram | null = null;
let conversionPoolQueuedHistogram: Histogram | null = null;

/**
 * Initialize Azure Application Insights with OpenTelemetry
 *
 * Stays disabled in the test environment, when ENABLE_TELEMETRY=false, or
 * without a connection string.
 */
export function initializeAppInsights(
  config: Pick<AppConfig, 'nodeEnv' | 'enableTelemetry' | 'azureMonitorConnectionString'>
): void {
  if (config.nodeEnv === 'test' || !config.enableTelemetry) {
    logger.info({ nodeEnv: config.nodeEnv }, 'App Insights disabled');
    telemetryEnabled = false;
    isInitialized = true;
    return;
  }

  if (!config.azureMonitorConnectionString) {
    logger.warn('AZURE_MONITOR_CONNECTION_STRING not set. App Insights telemetry disabled.');
    telemetryEnabled = false;
    isInitialized = true;
    return;
  }

  try {
    useAzureMonitor({
      azureMonitorExporterOptions: {
        connectionString: config.azureMonitorConnectionString,
      },
    });

    meter = metrics.getMeter(SERVICE_NAME, SERVICE_VERSION);
    createMetricInstruments(meter);

    telemetryEnabled = true;
    isInitialized = true;

    logger.info({ service: SERVICE_NAME, version: SERVICE_VERSION }, 'App Insights initialized successfully');
  } catch (error) {
    logger.error({ error }, 'Failed to initialize App Insights');
    telemetryEnabled = false;
    isInitialized = true;
  }
}

function createMetricInstruments(activeMeter: Meter): void {
  conversionDurationHistogram = activeMeter.createHistogram('conversion_duration_ms', {
    description: 'Single document conversion duration in milliseconds',
    unit: 'ms',
  });

  conversionFailuresCounter = activeMeter.createCounter('conversion_failures_total', {
    description: 'Total number of failed document conversions',
  });

  batchRunsCounter = activeMeter.createCounter('batch_runs_total', {
    description: 'Total number of batch passes',
  });

  batchDurationHistogram = activeMeter.createHistogram('batch_duration_ms', {
    description: 'Batch pass duration in milliseconds',
    unit: 'ms',
  });

  // Histograms record the gauge-like pool values
  conversionPoolActiveHistogram = activeMeter.createHistogram('conversion_pool_active', {
    description: 'Number of active conversion jobs',
  });

  conversionPoolQueuedHistogram = activeMeter.createHistogram('conversion_pool_queued', {
    description: 'Number of queued conversion jobs',
  });

  logger.debug('Metric instruments created');
}

/**
 * Track a metric (counter or histogram)
 */
export function trackMetric(
  name: MetricName,
  value: number,
  dimensions: Record<string, string | number> = {}
): void {
  if (!telemetryEnabled || !isInitialized) {
    return;
  }

  try {
    switch (name) {
      case 'conversion_duration_ms':
        conversionDurationHistogram?.record(value, dimensions);
        break;
      case 'conversion_failures_total':
        conversionFailuresCounter?.add(value, dimensions);
        break;
      case 'batch_runs_total':
        batchRunsCounter?.add(value, dimensions);
        break;
      case 'batch_duration_ms':
        batchDurationHistogram?.record(value, dimensions);
        break;
    }
  } catch (error) {
    logger.error({ error, name }, 'Failed to track metric');
  }
}

/**
 * Track a gauge metric (point-in-time measurement)
 */
export function trackGauge(
  name: GaugeName,
  value: number,
  dimensions: Record<string, string | number> = {}
): void {
  if (!telemetryEnabled || !isInitialized) {
    return;
  }

  try {
    switch (name) {
      case 'conversion_pool_active':
        conversionPoolActiveHistogram?.record(value, dimensions);
        break;
      case 'conversion_pool_queued':
        conversionPoolQueuedHistogram?.record(value, dimensions);
        break;
    }
  } catch (error) {
    logger.error({ error, name }, 'Failed to track gauge');
  }
}

/**
 * Dependency tracking options
 */
export interface DependencyOptions {
  /** Dependency type (e.g., "LibreOffice") */
  type: string;
  /** Dependency name (e.g., "doc to docx conversion") */
  name: string;
  /** Duration in milliseconds */
  duration: number;
  success: boolean;
  /** Correlation ID for distributed tracing */
  correlationId: string;
  /** Optional error message for failed dependencies */
  error?: string;
}

/**
 * Track a dependency call as an OpenTelemetry span
 */
export function trackDependency(options: DependencyOptions): void {
  if (!telemetryEnabled || !isInitialized) {
    return;
  }

  try {
    const tracer = trace.getTracer(SERVICE_NAME, SERVICE_VERSION);
    const span = tracer.startSpan(options.name, { startTime: Date.now() - options.duration }, context.active());

    span.setAttribute('dependency.type', options.type);
    span.setAttribute('dependency.name', options.name);
    span.setAttribute('dependency.duration', options.duration);
    span.setAttribute('correlationId', options.correlationId);

    if (options.success) {
      span.setStatus({ code: SpanStatusCode.OK });
    } else {
      span.setStatus({ code: SpanStatusCode.ERROR });
      if (options.error) {
        span.recordException(options.error);
      }
    }

    span.end();
  } catch (error) {
    logger.error({ error, options }, 'Failed to track dependency');
  }
}

/**
 * Check if telemetry is enabled
 */
export function isTelemetryEnabled(): boolean {
  return telemetryEnabled;
}

/**
 * Check if App Insights is initialized
 */
export function isAppInsightsInitialized(): boolean {
  return isInitialized;
}
