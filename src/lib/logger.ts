/**
 * Level-gated diagnostic logging as JSON lines on stderr.
 *
 * stdout belongs to the MCP stdio transport, so nothing here may write there.
 *
 * @module
 */
import { LOG_LEVELS, type LogLevel, type ProviderConfig } from './config.js';

export type LogFields = Record<string, unknown>;

export class Logger {
  private threshold: number;
  private writer: (s: string) => void;

  constructor(
    config: Pick<ProviderConfig, 'logLevel'>,
    writer: (s: string) => void = (s) => process.stderr.write(s),
  ) {
    this.threshold = LOG_LEVELS.indexOf(config.logLevel);
    this.writer = writer;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= this.threshold;
  }

  trace(message: string, fields: LogFields = {}): void {
    this.write('trace', message, fields);
  }

  info(message: string, fields: LogFields = {}): void {
    this.write('info', message, fields);
  }

  warn(message: string, fields: LogFields = {}): void {
    this.write('warn', message, fields);
  }

  private write(level: LogLevel, message: string, fields: LogFields): void {
    if (!this.isEnabled(level)) return;
    this.writer(
      JSON.stringify({ timestamp: new Date().toISOString(), level, message, ...fields }) + '\n',
    );
  }
}
