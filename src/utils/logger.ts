type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

export interface Logger {
  info: LoggerFn;
  warn: LoggerFn;
  error: LoggerFn;
  debug: LoggerFn;
}

let debugEnabled = false;

export function setDebugLogging(enabled: boolean): void {
  debugEnabled = enabled;
}

const emit = (
  level: 'info' | 'warn' | 'error' | 'debug',
  component: string,
  message: string,
  context?: LogContext
): void => {
  if (level === 'debug' && !debugEnabled) return;

  // stdout carries the MCP stdio stream; every log line goes to stderr
  const write = level === 'warn' ? console.warn : console.error;
  const line = level === 'debug' ? `[DEBUG] [${component}] ${message}` : `[${component}] ${message}`;
  if (context && Object.keys(context).length > 0) {
    write(line, context);
    return;
  }
  write(line);
};

/**
 * Component-tagged logger, e.g. createLogger('TaskQueue') → "[TaskQueue] ..."
 */
export function createLogger(component: string): Logger {
  return {
    info: (message, context) => emit('info', component, message, context),
    warn: (message, context) => emit('warn', component, message, context),
    error: (message, context) => emit('error', component, message, context),
    debug: (message, context) => emit('debug', component, message, context),
  };
}
