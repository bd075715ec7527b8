import { z } from 'zod';

const LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LEVELS)[number];

const levelSchema = z.enum(LEVELS).catch('info');

function rank(level: LogLevel): number {
  return LEVELS.indexOf(level);
}

class Logger {
  private threshold: LogLevel;

  constructor(level: LogLevel) {
    this.threshold = level;
  }

  setLevel(level: LogLevel): void {
    this.threshold = level;
  }

  debug(message: string): void {
    if (this.enabled('debug')) console.debug(this.format('debug', message));
  }

  info(message: string): void {
    if (this.enabled('info')) console.info(this.format('info', message));
  }

  warn(message: string): void {
    if (this.enabled('warn')) console.warn(this.format('warn', message));
  }

  error(message: string): void {
    if (this.enabled('error')) console.error(this.format('error', message));
  }

  private enabled(level: LogLevel): boolean {
    return this.threshold !== 'silent' && rank(level) >= rank(this.threshold);
  }

  private format(level: LogLevel, message: string): string {
    return `${new Date().toISOString()} ${level.toUpperCase().padEnd(5)} ${message}`;
  }
}

const logger = new Logger(levelSchema.parse(process.env.LOG_LEVEL));

export default logger;
