// Levels, least to most verbose.
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export const logLevels: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

const levelOrder: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

// A LogSink receives formatted lines. Defaults to the console.
export interface LogSink {
  error(line: string): void;
  warn(line: string): void;
  info(line: string): void;
  debug(line: string): void;
}

export interface LoggerOptions {
  name?: string;
  level?: LogLevel;
  sink?: LogSink;
}

const consoleSink: LogSink = {
  error: (line) => console.error(line),
  warn: (line) => console.warn(line),
  info: (line) => console.error(line),
  debug: (line) => console.error(line),
};

// Loggers made by child share level and sink with their root.
interface Shared {
  level: LogLevel;
  sink: LogSink;
}

// A Logger writes "[name] LEVEL: message" lines at or below its level.
// Diagnostics go to stderr so that stdout can carry program output.
export class Logger {
  readonly name: string;
  private readonly shared: Shared;

  constructor(options: LoggerOptions = {}, shared?: Shared) {
    this.name = options.name ?? 'luafuscate';
    this.shared = shared ?? {
      level: options.level ?? 'info',
      sink: options.sink ?? consoleSink,
    };
  }

  // child returns a logger for a component, prefixed name:component.
  child(component: string): Logger {
    return new Logger({ name: `${this.name}:${component}` }, this.shared);
  }

  setLevel(level: LogLevel): void {
    this.shared.level = level;
  }

  getLevel(): LogLevel {
    return this.shared.level;
  }

  enabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return levelOrder[level] <= levelOrder[this.shared.level];
  }

  error(msg: string, payload?: unknown): void {
    this.emit('error', msg, payload);
  }

  warn(msg: string, payload?: unknown): void {
    this.emit('warn', msg, payload);
  }

  info(msg: string, payload?: unknown): void {
    this.emit('info', msg, payload);
  }

  debug(msg: string, payload?: unknown): void {
    this.emit('debug', msg, payload);
  }

  private emit(level: Exclude<LogLevel, 'silent'>, msg: string, payload: unknown): void {
    if (!this.enabled(level)) {
      return;
    }
    let line = `[${this.name}] ${level.toUpperCase()}: ${msg}`;
    if (payload !== undefined) {
      line += ` ${stringify(payload)}`;
    }
    this.shared.sink[level](line);
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}

// silentLogger discards everything; the default for library calls.
export function silentLogger(): Logger {
  return new Logger({ level: 'silent' });
}

function stringify(value: unknown): string {
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch (e) {
    // cyclic or BigInt payloads
    return String(value);
  }
}
