// Common TypeScript interfaces and types

export interface HealthStatus {
  status: 'ok';
}

export interface ConverterHealth {
  status: 'ok' | 'unhealthy';
  converterAvailable: boolean;
  sofficePath: string;
  sourceDirExists: boolean;
  destinationDirExists: boolean;
}

export interface AppConfig {
  port: number;
  nodeEnv: string;
  logLevel: string;
  sourceDir: string;
  destinationDir: string;
  // LibreOffice conversion settings
  sofficePath: string;
  conversionTimeout: number;
  conversionWorkdir: string;
  conversionPoolSize: number;
  skipEmpty: boolean;
  /** Allowed browser origins; ['*'] allows any */
  corsOrigins: string[];
  // Azure Application Insights settings
  azureMonitorConnectionString?: string;
  enableTelemetry: boolean;
}

// Conversion Types

export type SourceFormat = 'doc' | 'xls';
export type TargetFormat = 'docx' | 'xlsx';

/**
 * One file scheduled for conversion
 *
 * Built during traversal and never modified afterwards.
 */
export interface ConversionJob {
  /** Absolute path of the legacy document */
  readonly sourcePath: string;
  /** Source path relative to the source root, `/`-separated */
  readonly relativePath: string;
  /** Absolute path the converted document is written to */
  readonly destinationPath: string;
  readonly sourceFormat: SourceFormat;
  readonly targetFormat: TargetFormat;
}

export type ConversionOutcome = 'CONVERTED' | 'SKIPPED' | 'FAILED';

export type FailureKind = 'timeout' | 'exit-code' | 'missing-output' | 'spawn-error' | 'io-error';

interface ResultBase {
  readonly sourcePath: string;
  readonly relativePath: string;
  /** Wall-clock time spent on the file, 0 for skipped files */
  readonly durationMs: number;
}

export interface ConvertedResult extends ResultBase {
  readonly outcome: 'CONVERTED';
  readonly job: ConversionJob;
}

export interface FailedResult extends ResultBase {
  readonly outcome: 'FAILED';
  readonly job: ConversionJob;
  readonly failureKind: FailureKind;
  /** Never empty; exactly "timeout" for timed-out jobs */
  readonly failureReason: string;
}

export interface SkippedResult extends ResultBase {
  readonly outcome: 'SKIPPED';
  readonly skipReason: 'unsupported extension';
}

export type ConversionResult = ConvertedResult | FailedResult | SkippedResult;

/**
 * Aggregate report of one traversal-and-convert pass
 */
export interface BatchSummary {
  sourceRoot: string;
  destinationRoot: string;
  totalScanned: number;
  convertedCount: number;
  skippedCount: number;
  failedCount: number;
  convertedByFormat: Record<SourceFormat, number>;
  /** Results in discovery (path) order */
  results: ConversionResult[];
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}

/**
 * Options for a single conversion
 */
export interface ConversionOptions {
  /** Timeout in milliseconds (default: 120000) */
  timeout?: number;
  /** Correlation ID for logging and tracing */
  correlationId?: string;
}

/**
 * Anything that can turn a ConversionJob into a ConversionResult.
 * Implementations never reject for per-file problems.
 */
export interface ConversionInvoker {
  convert(job: ConversionJob, options?: ConversionOptions): Promise<ConversionResult>;
}

/**
 * Invoker with the probes the HTTP layer needs
 */
export interface ManagedConverter extends ConversionInvoker {
  /** Whether the conversion binary resolves to an executable */
  checkAvailability(): Promise<boolean>;
  getStats(): ConversionPoolStats;
  getSofficePath(): string;
}

/**
 * Conversion pool statistics
 * Tracks job execution and pool state for observability
 */
export interface ConversionPoolStats {
  /** Number of currently active conversion jobs */
  activeJobs: number;
  /** Number of jobs waiting in queue */
  queuedJobs: number;
  /** Total number of successfully completed conversions */
  completedJobs: number;
  /** Total number of failed conversions */
  failedJobs: number;
  /** Total number of conversion attempts (completed + failed) */
  totalConversions: number;
}

export interface BatchOptions {
  /** Per-job timeout in milliseconds */
  timeout: number;
  /** Accept a tree without eligible files silently */
  skipEmpty?: boolean;
  correlationId?: string;
}

// File management Types

export type DataArea = 'source' | 'destination';

export interface FileInfo {
  name: string;
  relativePath: string;
  sizeBytes: number;
  modifiedAt: string;
}

export interface FolderStats {
  path: string;
  total: number;
  extensions: string[];
}
