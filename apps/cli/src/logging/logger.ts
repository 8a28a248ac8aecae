export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type LogWriteLevel = Exclude<LogLevel, 'silent'>;

export interface LogSink {
  write(level: LogWriteLevel, line: string): void;
}

/** Built once at process start and handed to whatever needs to log. */
export interface LoggerConfig {
  readonly level: LogLevel;
  readonly sink?: LogSink;
}

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string, err?: unknown): void;
  child(tag: string): Logger;
}

export const consoleSink: LogSink = {
  write(level, line) {
    if (level === 'error' || level === 'warn') {
      console.error(line);
    } else {
      console.log(line);
    }
  },
};

function errorText(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

class TaggedLogger implements Logger {
  constructor(
    private readonly config: LoggerConfig,
    private readonly tag: string,
  ) {}

  debug(msg: string): void {
    this.emit('debug', msg);
  }

  info(msg: string): void {
    this.emit('info', msg);
  }

  warn(msg: string): void {
    this.emit('warn', msg);
  }

  error(msg: string, err?: unknown): void {
    this.emit('error', err === undefined ? msg : `${msg}: ${errorText(err)}`);
  }

  child(tag: string): Logger {
    return new TaggedLogger(this.config, `${this.tag}:${tag}`);
  }

  private emit(level: LogWriteLevel, msg: string): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.config.level]) return;
    (this.config.sink ?? consoleSink).write(level, `[${this.tag}] ${msg}`);
  }
}

export function createLogger(config: LoggerConfig, tag = 'linetest'): Logger {
  return new TaggedLogger(config, tag);
}

export const silentLogger: Logger = createLogger({ level: 'silent' });
