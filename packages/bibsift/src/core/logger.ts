export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

const PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

// Log lines go to stderr; stdout carries CLI output and the MCP stdio stream.
export class Logger {
  constructor(
    private readonly minLevel: LogLevel,
    private readonly bindings: LogContext = {}
  ) {}

  child(bindings: LogContext): Logger {
    return new Logger(this.minLevel, { ...this.bindings, ...bindings });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return PRIORITY[level] >= PRIORITY[this.minLevel];
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const merged = { ...this.bindings, ...(context ?? {}) };
    const payload = {
      ts: new Date().toISOString(),
      level,
      message,
      ...(Object.keys(merged).length > 0 ? { context: merged } : {})
    };

    process.stderr.write(`${JSON.stringify(payload)}\n`);
  }
}
