import type { LogLevel } from './config.ts';

const RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

/** Destination for formatted log lines. */
export type LogSink = (line: string) => void;

/** Logger bound to one part of the program, e.g. `session` or `cli`. */
export interface ModuleLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  /** Errors are written with their stack when they carry one. */
  error(message: string | Error): void;
}

export interface Logger {
  readonly level: LogLevel;
  forModule(module: string): ModuleLogger;
}

// stdout carries the board, so logs go to stderr unless told otherwise.
const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

function describeError(err: Error): string {
  return err.stack ?? `${err.name}: ${err.message}`;
}

/**
 * Create a leveled logger writing `time | level | module | message` lines.
 * @param level - Lowest level that is written.
 * @param sink - Line destination; stderr by default.
 */
export function createLogger(level: LogLevel, sink: LogSink = stderrSink): Logger {
  const threshold = RANK[level];
  const write = (lvl: LogLevel, module: string, message: string) => {
    if (RANK[lvl] < threshold) return;
    sink(`${new Date().toISOString()} | ${lvl} | ${module} | ${message}`);
  };
  const scoped = new Map<string, ModuleLogger>();
  return {
    level,
    forModule(module) {
      let log = scoped.get(module);
      if (!log) {
        log = {
          debug: (message) => write('debug', module, message),
          info: (message) => write('info', module, message),
          warn: (message) => write('warn', module, message),
          error: (message) =>
            write('error', module, typeof message === 'string' ? message : describeError(message))
        };
        scoped.set(module, log);
      }
      return log;
    }
  };
}
