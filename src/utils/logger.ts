import pino from 'pino';

function isLogLevel(value: string): value is pino.LevelWithSilent {
  return value === 'silent' || value in pino.levels.values;
}

/**
 * Get the log level from environment variables
 * Priority: LOG_LEVEL > NODE_ENV=test (silent) > default (info)
 */
export function getLogLevel(): pino.LevelWithSilent {
  const level = process.env.LOG_LEVEL;
  if (level && isLogLevel(level)) {
    return level;
  }

  // In test and CI environments, default to silent to reduce noise
  if (process.env.NODE_ENV === 'test' || process.env.CI === 'true') {
    return 'silent';
  }

  return 'info';
}

export type LogDestination = 'stdout' | 'stderr';

let destination: LogDestination = 'stdout';

// Loggers are created at module load, so the stream resolves the target per line
const output: pino.DestinationStream = {
  write(line: string): void {
    if (destination === 'stderr') {
      process.stderr.write(line);
    } else {
      process.stdout.write(line);
    }
  },
};

/**
 * Route every logger, including those already created, to stdout or stderr
 *
 * The CLI writes its summary to stdout and moves log lines to stderr.
 */
export function setLogDestination(target: LogDestination): void {
  destination = target;
}

/**
 * Create a named logger with environment-aware log level
 * @param name - Logger name (used for filtering and debugging)
 */
export function createLogger(name: string): pino.Logger {
  return pino(
    {
      name,
      level: getLogLevel(),
    },
    output
  );
}
