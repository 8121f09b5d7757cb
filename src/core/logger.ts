import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Logging handle threaded through every operation. Each build cell creates its
 * own, so nothing here is process-wide.
 */
export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  child(component: string): Logger;
}

export interface LoggerOptions {
  /** Build cell name, e.g. `cpython-x86_64-unknown-linux-gnu-pgo`. */
  prefix: string;
  verbose?: boolean;
  /** Receives every emitted line without colour, e.g. a build log file. */
  sink?: (line: string) => void;
}

const LEVEL_STYLE: Record<LogLevel, (s: string) => string> = {
  debug: chalk.dim,
  info: (s) => s,
  warn: chalk.yellow,
  error: chalk.red,
};

export function createLogger(options: LoggerOptions): Logger {
  const verbose = options.verbose ?? isDebugEnv();

  const emit = (level: LogLevel, msg: string): void => {
    if (level === 'debug' && !verbose) return;
    const line = `${options.prefix}> ${msg}`;
    const styled = `${chalk.cyan(`${options.prefix}>`)} ${LEVEL_STYLE[level](msg)}`;
    if (level === 'warn' || level === 'error') {
      console.error(styled);
    } else {
      console.log(styled);
    }
    options.sink?.(level === 'info' ? line : `${line} [${level}]`);
  };

  return {
    debug: (msg) => emit('debug', msg),
    info: (msg) => emit('info', msg),
    warn: (msg) => emit('warn', msg),
    error: (msg) => emit('error', msg),
    child: (component) => createLogger({ ...options, prefix: `${options.prefix}:${component}` }),
  };
}

export interface MemoryLogger extends Logger {
  readonly lines: { level: LogLevel; msg: string }[];
}

/** Collects lines instead of printing them. */
export function createMemoryLogger(): MemoryLogger {
  const lines: { level: LogLevel; msg: string }[] = [];
  const make = (component?: string): MemoryLogger => {
    const push = (level: LogLevel) => (msg: string) => {
      lines.push({ level, msg: component ? `${component}: ${msg}` : msg });
    };
    return {
      lines,
      debug: push('debug'),
      info: push('info'),
      warn: push('warn'),
      error: push('error'),
      child: (sub) => make(component ? `${component}:${sub}` : sub),
    };
  };
  return make();
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};

function isDebugEnv(): boolean {
  const value = process.env.DISTKIT_DEBUG;
  return value === '1' || value === 'true';
}
