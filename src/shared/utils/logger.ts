// JSON lines on stdout, one object per entry, queryable with CloudWatch Logs Insights

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

export interface LogContext {
  trace_id?: string;
  item_id?: string;
  taxonomy?: string;
  [key: string]: unknown;
}

interface SerializedError {
  name: string;
  message: string;
  stack?: string;
}

const SEVERITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.trim().toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

function serializeError(error: Error): SerializedError {
  return { name: error.name, message: error.message, stack: error.stack };
}

export class Logger {
  private context: LogContext;

  constructor(
    private readonly minLevel: LogLevel = LogLevel.INFO,
    context: LogContext = {},
    private readonly write: (line: string) => void = (line) => console.log(line)
  ) {
    this.context = { ...context };
  }

  /** Adds fields to every later entry of this logger (and of children created afterwards). */
  setContext(context: LogContext): void {
    this.context = { ...this.context, ...context };
  }

  clearContext(): void {
    this.context = {};
  }

  /**
   * Logger with extra fixed fields. Items of one batch are tagged
   * concurrently, so per-item fields go on a child, not on the shared logger.
   */
  child(context: LogContext): Logger {
    return new Logger(this.minLevel, { ...this.context, ...context }, this.write);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return SEVERITY[level] >= SEVERITY[this.minLevel];
  }

  debug(message: string, context?: LogContext): void {
    this.emit(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.emit(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LogContext, error?: Error): void {
    this.emit(LogLevel.WARN, message, context, error);
  }

  error(message: string, context?: LogContext, error?: Error): void {
    this.emit(LogLevel.ERROR, message, context, error);
  }

  private emit(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (!this.isLevelEnabled(level)) return;

    this.write(
      JSON.stringify({
        timestamp: new Date().toISOString(),
        level,
        message,
        context: { ...this.context, ...context },
        ...(error ? { error: serializeError(error) } : {}),
      })
    );
  }
}

let loggerInstance: Logger | null = null;

export function getLogger(minLevel?: LogLevel): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger(minLevel ?? parseLogLevel(process.env.LOG_LEVEL));
  }
  return loggerInstance;
}

export function setLambdaContext(requestId: string, functionName: string, functionVersion: string): void {
  getLogger().setContext({
    aws_request_id: requestId,
    function_name: functionName,
    function_version: functionVersion,
  });
}
