/**
 * Flow logging for the report pipeline
 *
 * Every line reads `[timestamp] <marker> STAGE | message | data`. The marker
 * shows whether a stage is being entered or left, or what it is reporting.
 * Lines below LOG_LEVEL are dropped; ENTRY and EXIT count as debug.
 */

export type LogDirection = 'ENTRY' | 'EXIT' | 'ERROR' | 'INFO' | 'WARN';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const DIRECTION_MARKERS: Readonly<Record<LogDirection, string>> = {
  ENTRY: '>>>',
  EXIT: '<<<',
  INFO: '---',
  WARN: '~~~',
  ERROR: '!!!'
};

const DIRECTION_LEVELS: Readonly<Record<LogDirection, LogLevel>> = {
  ENTRY: 'debug',
  EXIT: 'debug',
  INFO: 'info',
  WARN: 'warn',
  ERROR: 'error'
};

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_RANK;
}

/**
 * Threshold from LOG_LEVEL; unset or unrecognised values log everything
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const configured = env.LOG_LEVEL?.trim().toLowerCase() ?? '';
  return isLogLevel(configured) ? configured : 'debug';
}

export function shouldLog(direction: LogDirection, threshold: LogLevel): boolean {
  return LEVEL_RANK[DIRECTION_LEVELS[direction]] >= LEVEL_RANK[threshold];
}

export function formatLogLine(
  stage: string,
  direction: LogDirection,
  message: string,
  data: unknown,
  timestamp: Date = new Date()
): string {
  const line = `[${timestamp.toISOString()}] ${DIRECTION_MARKERS[direction]} ${stage} | ${message}`;
  if (data === null || data === undefined) {
    return line;
  }
  try {
    return `${line} | ${safeStringify(data)}`;
  } catch (error) {
    return `${line} | [unserialisable data: ${error instanceof Error ? error.message : String(error)}]`;
  }
}

/**
 * Writes one flow line to the console stream matching its direction
 */
export function logFlow(stage: string, direction: LogDirection, message: string, data: unknown = null): void {
  if (!shouldLog(direction, resolveLogLevel())) {
    return;
  }

  const line = formatLogLine(stage, direction, message, data);
  if (direction === 'ERROR') {
    console.error(line);
  } else if (direction === 'WARN') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

/**
 * JSON form of a log payload. Maps become objects, sets become arrays, errors
 * keep name and message, and a repeated reference prints as a marker.
 */
export function safeStringify(value: unknown): string {
  if (value === null || value === undefined || typeof value !== 'object') {
    return String(value);
  }

  const seen = new WeakSet<object>();

  return JSON.stringify(value, (_key, current: unknown) => {
    if (current instanceof Map) {
      return Object.fromEntries(current);
    }
    if (current instanceof Set) {
      return [...current];
    }
    if (current instanceof Error) {
      return { name: current.name, message: current.message };
    }
    if (typeof current === 'object' && current !== null) {
      if (seen.has(current)) {
        return '[Circular]';
      }
      seen.add(current);
    }
    return current;
  });
}
