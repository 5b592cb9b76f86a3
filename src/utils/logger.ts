import * as fs from 'fs';
import * as path from 'path';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  OFF = 4
}

interface LogSinks {
  main: fs.WriteStream;
  debug: fs.WriteStream;
}

export class Logger {
  private sinks: LogSinks | null = null;
  private level: LogLevel;
  private enableConsole: boolean;

  constructor(private readonly logFile: string, level: LogLevel = LogLevel.INFO, enableConsole: boolean = false) {
    this.level = level;
    this.enableConsole = enableConsole;
  }

  public setLevel(level: LogLevel): void {
    this.level = level;
  }

  public enableConsoleOutput(enable: boolean): void {
    this.enableConsole = enable;
  }

  public isEnabled(level: LogLevel): boolean {
    return this.level !== LogLevel.OFF && this.level <= level;
  }

  public debug(message: string, data?: unknown): void {
    if (this.isEnabled(LogLevel.DEBUG)) {
      this.writeLog('DEBUG', message, data, true);
    }
  }

  public info(message: string, data?: unknown): void {
    if (this.isEnabled(LogLevel.INFO)) {
      this.writeLog('INFO', message, data);
    }
  }

  public warn(message: string, data?: unknown): void {
    if (this.isEnabled(LogLevel.WARN)) {
      this.writeLog('WARN', message, data);
    }
  }

  public error(message: string, data?: unknown): void {
    if (this.isEnabled(LogLevel.ERROR)) {
      this.writeLog('ERROR', message, data);
    }
  }

  /**
   * Streams are opened on first write so that a disabled logger never
   * touches the filesystem.
   */
  private getSinks(): LogSinks {
    if (!this.sinks) {
      const logDir = path.dirname(this.logFile);
      if (!fs.existsSync(logDir)) {
        fs.mkdirSync(logDir, { recursive: true });
      }

      const debugLogFile = this.logFile.replace(/\.log$/, '') + '-debug.log';
      this.sinks = {
        main: fs.createWriteStream(this.logFile, { flags: 'a' }),
        debug: fs.createWriteStream(debugLogFile, { flags: 'a' })
      };
    }
    return this.sinks;
  }

  private writeLog(level: string, message: string, data: unknown, debugOnly = false): void {
    const timestamp = new Date().toISOString();
    const logString = JSON.stringify({ timestamp, level, message, data }, errorReplacer) + '\n';
    const sinks = this.getSinks();

    // The debug log receives every entry; the main log skips DEBUG
    sinks.debug.write(logString);
    if (!debugOnly) {
      sinks.main.write(logString);
    }

    // stdout carries the MCP protocol, so the console echo goes to stderr
    if (this.enableConsole) {
      const consoleData = data === undefined ? '' : ` ${JSON.stringify(data, errorReplacer)}`;
      process.stderr.write(`[${timestamp}] [${level}] ${message}${consoleData}\n`);
    }
  }

  public close(): void {
    if (this.sinks) {
      this.sinks.main.end();
      this.sinks.debug.end();
      this.sinks = null;
    }
  }
}

function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  return value;
}

export function logLevelFromString(level: string | undefined): LogLevel {
  switch (level?.toUpperCase()) {
    case 'DEBUG': return LogLevel.DEBUG;
    case 'INFO': return LogLevel.INFO;
    case 'WARN': return LogLevel.WARN;
    case 'ERROR': return LogLevel.ERROR;
    case 'OFF': default: return LogLevel.OFF;
  }
}

// Logging configuration via environment variables
// LOGLEVEL: OFF | ERROR | WARN | INFO | DEBUG (default: OFF)
// LOGFILE: path to log file (default: logs/slo-insight.log)
// LOGCONSOLE: "false" disables the stderr echo
const logger = new Logger(
  process.env.LOGFILE || path.resolve(process.cwd(), 'logs', 'slo-insight.log'),
  logLevelFromString(process.env.LOGLEVEL),
  process.env.LOGCONSOLE !== 'false'
);

export { logger };

// Handle process exit to ensure logs are flushed
process.on('exit', () => {
  logger.close();
});
