export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  scope?: string;
  /** Line sink; defaults to console.log / console.error by level */
  write?: (level: Exclude<LogLevel, 'silent'>, line: string) => void;
}

function defaultWrite(level: Exclude<LogLevel, 'silent'>, line: string): void {
  if (level === 'error' || level === 'warn') {
    console.error(line);
  } else {
    console.log(line);
  }
}

/**
 * Leveled console logger. Lines look like
 * `[INFO] [orchestrator] Message processed {"intent":"add_item"}`.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const scope = options.scope;
  const write = options.write ?? defaultWrite;

  const log = (lineLevel: Exclude<LogLevel, 'silent'>, message: string, data?: Record<string, unknown>) => {
    if (LEVEL_ORDER[lineLevel] < LEVEL_ORDER[level]) return;

    const parts = [`[${lineLevel.toUpperCase()}]`];
    if (scope) parts.push(`[${scope}]`);
    parts.push(message);
    if (data && Object.keys(data).length > 0) parts.push(safeStringify(data));

    write(lineLevel, parts.join(' '));
  };

  return {
    debug: (message, data) => log('debug', message, data),
    info: (message, data) => log('info', message, data),
    warn: (message, data) => log('warn', message, data),
    error: (message, data) => log('error', message, data),
    child: (childScope) =>
      createLogger({ level, write, scope: scope ? `${scope}:${childScope}` : childScope }),
  };
}

export const silentLogger: Logger = createLogger({ level: 'silent' });

function safeStringify(data: Record<string, unknown>): string {
  try {
    return JSON.stringify(data, (_key, value: unknown) =>
      value instanceof Error ? { name: value.name, message: value.message } : value
    );
  } catch {
    return '[unserializable]';
  }
}
