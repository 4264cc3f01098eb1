/**
 * Pino Logger Adapter
 *
 * Structured logging through pino. Output goes to stderr (or LOG_FILE) so
 * it never interleaves with the interactive session printed on stdout.
 */

import pino from 'pino';
import { ILogger, LogMetadata } from '@/interfaces/ILogger';

type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export class PinoLogger implements ILogger {
  constructor(private logger: pino.Logger) {}

  debug(messageOrMetadata: string | LogMetadata, message?: string): void {
    this.write('debug', messageOrMetadata, message);
  }

  info(messageOrMetadata: string | LogMetadata, message?: string): void {
    this.write('info', messageOrMetadata, message);
  }

  warn(messageOrMetadata: string | LogMetadata, message?: string): void {
    this.write('warn', messageOrMetadata, message);
  }

  error(messageOrMetadata: string | LogMetadata, message?: string): void {
    this.write('error', messageOrMetadata, message);
  }

  fatal(messageOrMetadata: string | LogMetadata, message?: string): void {
    this.write('fatal', messageOrMetadata, message);
  }

  // pino takes (msg) or (mergingObject, msg); the overloads map onto those
  private write(
    level: LogLevel,
    messageOrMetadata: string | LogMetadata,
    message?: string
  ): void {
    if (typeof messageOrMetadata === 'string') {
      this.logger[level](messageOrMetadata);
    } else {
      this.logger[level](messageOrMetadata, message);
    }
  }
}
