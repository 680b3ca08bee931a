import * as fs from 'fs';
import * as path from 'path';
import type { LogEntry, LogLevel, LogSink } from '../agent/core/types.js';

export interface LoggerOptions {
  /** Optional callback invoked for every structured log entry */
  onLog?: LogSink;
  /** Print `[phase] message` lines to the console (default: true) */
  console?: boolean;
}

/**
 * Component logger.
 *
 * Prints `[phase] message` to the console and relays the structured entry to
 * the `onLog` sink, which the worker uses to stream logs to Redis Pub/Sub and
 * the CLI uses to append to a JSONL file.
 */
export class Logger {
  private readonly phase: string;
  private readonly options: LoggerOptions;

  constructor(phase: string, options: LoggerOptions = {}) {
    this.phase = phase;
    this.options = options;
  }

  log(level: LogLevel, message: string): void {
    if (this.options.console !== false) {
      const line = `[${this.phase}] ${message}`;
      if (level === 'ERROR' || level === 'WARN') {
        console.error(line);
      } else {
        console.log(line);
      }
    }
    this.options.onLog?.({ level, phase: this.phase, message });
  }

  info(message: string): void {
    this.log('INFO', message);
  }

  step(message: string): void {
    this.log('STEP', message);
  }

  result(message: string): void {
    this.log('RESULT', message);
  }

  warn(message: string): void {
    this.log('WARN', message);
  }

  error(message: string): void {
    this.log('ERROR', message);
  }

  /** Logger for another component sharing this one's sink and console setting. */
  child(phase: string): Logger {
    return new Logger(phase, this.options);
  }
}

/**
 * Sink that appends each entry as one JSON line (with a timestamp) to `logFile`.
 */
export function createJsonlSink(logFile: string): LogSink {
  fs.mkdirSync(path.dirname(path.resolve(logFile)), { recursive: true });
  return (entry: LogEntry) => {
    const line = JSON.stringify({ timestamp: new Date().toISOString(), ...entry }) + '\n';
    fs.appendFileSync(logFile, line);
  };
}

/** Fans one entry out to several sinks. */
export function combineSinks(...sinks: Array<LogSink | undefined>): LogSink | undefined {
  const active = sinks.filter((s): s is LogSink => s !== undefined);
  if (active.length === 0) return undefined;
  return (entry) => active.forEach((sink) => sink(entry));
}
