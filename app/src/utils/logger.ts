/**
 * Structured logger with file and console output support
 */

import * as fs from 'fs';
import { colors, stripColors } from '../config/colors';

export interface LoggerOptions {
  logFile?: string | null;
  verbose?: boolean;
  scope?: string;
}

/**
 * Logger for keeper, engine and server output.
 * When a log file is set, console output is redirected to it with timestamps.
 */
export class Logger {
  private logStream: fs.WriteStream | null = null;
  private verbose: boolean;
  private scope: string | null;
  private originalConsoleLog: typeof console.log;
  private originalConsoleError: typeof console.error;
  private originalConsoleWarn: typeof console.warn;

  constructor(options: LoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.scope = options.scope ?? null;

    this.originalConsoleLog = console.log.bind(console);
    this.originalConsoleError = console.error.bind(console);
    this.originalConsoleWarn = console.warn.bind(console);

    if (options.logFile) {
      this.setupFileLogging(options.logFile);
    }
  }

  /**
   * Redirect console methods to the log file
   */
  private setupFileLogging(logFile: string): void {
    this.logStream = fs.createWriteStream(logFile, { flags: 'a' });

    const write = (level: string) => (...args: unknown[]) => {
      this.logStream?.write(`${new Date().toISOString()} [${level}] ${this.formatArgs(args)}\n`);
    };
    console.log = write('LOG');
    console.error = write('ERROR');
    console.warn = write('WARN');

    this.originalConsoleLog(`📝 Logging to file: ${logFile}`);
  }

  /**
   * Format console arguments to string
   */
  private formatArgs(args: unknown[]): string {
    return args
      .map((arg) => {
        if (typeof arg === 'string') {
          return stripColors(arg);
        }
        if (typeof arg === 'bigint') {
          return arg.toString();
        }
        if (arg instanceof Error) {
          return `${arg.name}: ${arg.message}`;
        }
        if (typeof arg === 'object') {
          return JSON.stringify(arg, (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value));
        }
        return String(arg);
      })
      .join(' ');
  }

  private prefix(): string[] {
    return this.scope ? [`${colors.cyan}[${this.scope}]${colors.reset}`] : [];
  }

  /**
   * Create a logger sharing this one's output, tagged with a component name
   */
  child(scope: string): Logger {
    const child = new Logger({ verbose: this.verbose, scope });
    child.originalConsoleLog = this.originalConsoleLog;
    child.originalConsoleError = this.originalConsoleError;
    child.originalConsoleWarn = this.originalConsoleWarn;
    return child;
  }

  /**
   * Log to original console (bypasses file logging)
   */
  logToConsole(...args: unknown[]): void {
    this.originalConsoleLog(...args);
  }

  /**
   * Log error to original console (bypasses file logging)
   */
  errorToConsole(...args: unknown[]): void {
    this.originalConsoleError(...args);
  }

  debug(...args: unknown[]): void {
    if (this.verbose) {
      console.log(`${colors.gray}[DEBUG]${colors.reset}`, ...this.prefix(), ...args);
    }
  }

  info(...args: unknown[]): void {
    console.log(...this.prefix(), ...args);
  }

  warn(...args: unknown[]): void {
    console.warn(`${colors.yellow}[WARN]${colors.reset}`, ...this.prefix(), ...args);
  }

  error(...args: unknown[]): void {
    console.error(`${colors.red}[ERROR]${colors.reset}`, ...this.prefix(), ...args);
  }

  /**
   * Verbose-only logging without the debug tag
   */
  verboseLog(...args: unknown[]): void {
    if (this.verbose) {
      console.log(...this.prefix(), ...args);
    }
  }

  /**
   * Close the log stream
   */
  close(): void {
    if (this.logStream) {
      this.logStream.end();
      this.logStream = null;
    }
  }

  /**
   * Restore original console methods
   */
  restore(): void {
    console.log = this.originalConsoleLog;
    console.error = this.originalConsoleError;
    console.warn = this.originalConsoleWarn;
  }
}

/**
 * Global logger instance (initialized by main app)
 */
let globalLogger: Logger | null = null;

/**
 * Initialize the global logger
 */
export function initLogger(options: LoggerOptions): Logger {
  if (globalLogger) {
    globalLogger.close();
    globalLogger.restore();
  }
  globalLogger = new Logger(options);
  return globalLogger;
}

/**
 * Get the global logger instance
 */
export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger();
  }
  return globalLogger;
}
