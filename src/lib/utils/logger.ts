export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogContext {
  requestId?: string;
  component?: string;
  action?: string;
  metadata?: Record<string, unknown>;
  [key: string]: unknown; // Allow additional properties
}

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isThreshold(value: string | undefined): value is LogLevel | 'silent' {
  return value !== undefined && value in LEVEL_ORDER;
}

class Logger {
  private isDev = process.env.NODE_ENV === 'development';

  // Read on every call so LOG_LEVEL can be changed by tests and the instrumentation hook.
  private threshold(): number {
    const configured = process.env.LOG_LEVEL?.toLowerCase();
    return LEVEL_ORDER[isThreshold(configured) ? configured : 'info'];
  }

  private log(level: LogLevel, message: string, context?: LogContext, error?: Error) {
    if (LEVEL_ORDER[level] < this.threshold()) return;

    const timestamp = new Date().toISOString();
    const logData = {
      timestamp,
      level,
      message,
      ...context,
      ...(error && {
        error: {
          name: error.name,
          message: error.message,
          stack: error.stack,
        }
      })
    };

    if (this.isDev) {
      const consoleMethod = level === 'error' ? console.error :
                           level === 'warn' ? console.warn :
                           level === 'info' ? console.info : console.log;
      consoleMethod(`[${level.toUpperCase()}]`, message, context || '', error || '');
    } else {
      console.log(JSON.stringify(logData));
    }
  }

  debug(message: string, context?: LogContext) {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext) {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext, error?: Error) {
    this.log('warn', message, context, error);
  }

  error(message: string, context?: LogContext, error?: Error) {
    this.log('error', message, context, error);
  }
}

export const logger = new Logger();

