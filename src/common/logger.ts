export interface LoggingConfig {
  enableEngineLogs?: boolean;
  enableMembershipLogs?: boolean;
  enableActuationLogs?: boolean;
  /** Silences everything; detected from NODE_ENV=test or a Jest worker when unset */
  enableTestMode?: boolean;
  /** Printed after the level label, typically the instance id */
  prefix?: string;
}

/**
 * Shape every component logs through, so tests can inject a spy
 */
export interface Logger {
  engine(message: string, ...args: unknown[]): void;
  membership(message: string, ...args: unknown[]): void;
  actuation(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

type ConsoleMethod = 'log' | 'warn' | 'error' | 'debug';

/**
 * Console logger with one switch per channel. Warnings and errors always
 * print; debug output only under NODE_ENV=development.
 */
export class FailoverLogger implements Logger {
  private readonly silent: boolean;
  private readonly tag: string;

  constructor(private readonly config: LoggingConfig = {}) {
    this.silent = config.enableTestMode ?? isTestEnvironment();
    this.tag = config.prefix ? ` [${config.prefix}]` : '';
  }

  engine(message: string, ...args: unknown[]): void {
    if (this.config.enableEngineLogs) {
      this.write('log', 'ENGINE', message, args);
    }
  }

  membership(message: string, ...args: unknown[]): void {
    if (this.config.enableMembershipLogs) {
      this.write('log', 'MEMBERSHIP', message, args);
    }
  }

  actuation(message: string, ...args: unknown[]): void {
    if (this.config.enableActuationLogs) {
      this.write('log', 'ACTUATION', message, args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    this.write('warn', 'WARN', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write('error', 'ERROR', message, args);
  }

  debug(message: string, ...args: unknown[]): void {
    if (process.env.NODE_ENV === 'development') {
      this.write('debug', 'DEBUG', message, args);
    }
  }

  private write(method: ConsoleMethod, label: string, message: string, args: unknown[]): void {
    if (this.silent) {
      return;
    }
    console[method](`[${label}]${this.tag} ${message}`, ...args);
  }
}

function isTestEnvironment(): boolean {
  return process.env.NODE_ENV === 'test' || process.env.JEST_WORKER_ID !== undefined;
}

export function createLogger(config: LoggingConfig = {}): FailoverLogger {
  return new FailoverLogger(config);
}
