/**
 * Run logger for the deployment pipeline.
 *
 * Console output is colored for people reading a CI log; an optional winston
 * file (or stream) transport keeps JSON records for later analysis. Values
 * registered with `addMask` never reach either destination.
 */

import winston from 'winston';
import chalk from 'chalk';
import { v4 as uuidv4 } from 'uuid';
import type { Writable } from 'stream';

export interface LoggerOptions {
  verbose?: boolean;
  /** Path of a JSON log file. */
  file?: string;
  /** Extra JSON destination, mostly for tests. */
  stream?: Writable;
  /** Suppress console output. */
  silent?: boolean;
}

export const MASK = '***';

type JsonTransport = winston.transports.FileTransportInstance | winston.transports.StreamTransportInstance;

export class Logger {
  private winston: winston.Logger;
  private transports: JsonTransport[] = [];
  private closing?: Promise<void>;
  private verbose: boolean;
  private consoleEnabled: boolean;
  private executionId = '';
  private secrets = new Set<string>();

  constructor(options: LoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.consoleEnabled = !options.silent;

    if (options.file) {
      this.transports.push(new winston.transports.File({ filename: options.file }));
    }
    if (options.stream) {
      this.transports.push(new winston.transports.Stream({ stream: options.stream }));
    }

    this.winston = winston.createLogger({
      level: this.verbose ? 'debug' : 'info',
      silent: this.transports.length === 0,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json()
      ),
      transports: this.transports
    });
  }

  /**
   * End the JSON transports and wait until every record has been flushed.
   * Call before the process exits, or the tail of the log file may be lost.
   */
  close(): Promise<void> {
    if (!this.closing) {
      const finished = this.transports.map(
        transport => new Promise<void>(resolve => transport.once('finish', () => resolve()))
      );
      this.winston.end();
      this.closing = Promise.all(finished).then(() => undefined);
    }
    return this.closing;
  }

  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
    this.winston.level = verbose ? 'debug' : 'info';
  }

  isVerbose(): boolean {
    return this.verbose;
  }

  /**
   * Register a value that must never be written out, such as a client
   * secret or a storage connection string.
   */
  addMask(secret: string): void {
    if (secret.trim().length > 0) {
      this.secrets.add(secret);
    }
  }

  redact(text: string): string {
    let result = text;
    for (const secret of this.secrets) {
      result = result.split(secret).join(MASK);
    }
    return result;
  }

  startExecution(command: string): string {
    this.executionId = uuidv4();
    this.print(chalk.cyan('🚀'), chalk.bold(`Execution ID: ${this.executionId}`));
    this.winston.info(`Starting execution: ${this.redact(command)}`, { executionId: this.executionId });
    return this.executionId;
  }

  getExecutionId(): string {
    return this.executionId;
  }

  info(message: string, data?: unknown): void {
    this.print(chalk.blue('ℹ'), this.format(message));
    this.write('info', message, data);
  }

  success(message: string, data?: unknown): void {
    this.print(chalk.green('✓'), this.format(message));
    this.write('info', message, data, { outcome: 'success' });
  }

  warn(message: string, data?: unknown): void {
    this.print(chalk.yellow('⚠'), this.format(message));
    this.write('warn', message, data);
  }

  error(message: string, error?: unknown, data?: unknown): void {
    this.print(chalk.red('✗'), this.format(message));
    if (error instanceof Error && this.verbose && error.stack) {
      this.print(chalk.red(this.redact(error.stack)));
    }
    this.write('error', message, data, {
      error: error instanceof Error ? this.redact(error.stack ?? error.message) : undefined
    });
  }

  debug(message: string, data?: unknown): void {
    if (this.verbose) {
      this.print(chalk.gray('🔍'), chalk.gray(this.format(message)));
      if (data !== undefined) {
        this.print(chalk.gray('   Data:'), chalk.gray(JSON.stringify(this.redactValue(data), null, 2)));
      }
    }
    this.write('debug', message, data);
  }

  /** Marks the start of a pipeline stage. */
  step(step: string, message: string): void {
    this.print(chalk.magenta('▶'), chalk.magenta(this.format(`${step}: ${message}`)));
    this.write('info', `${step}: ${message}`, undefined, { step, type: 'step' });
  }

  /** Raw block output, e.g. pod logs. Still redacted. */
  block(title: string, body: string): void {
    this.print(chalk.bold(`=== ${title} ===`));
    this.print(this.redact(body));
    this.print(chalk.bold(`=== End ${title} ===`));
    this.write('info', title, { body });
  }

  private format(message: string): string {
    const redacted = this.redact(message);
    return this.executionId ? `[${this.executionId.slice(0, 8)}] ${redacted}` : redacted;
  }

  private print(...parts: string[]): void {
    if (this.consoleEnabled) {
      console.log(...parts);
    }
  }

  private write(level: string, message: string, data: unknown, extra: Record<string, unknown> = {}): void {
    this.winston.log(level, this.redact(message), {
      executionId: this.executionId || undefined,
      data: data === undefined ? undefined : this.redactValue(data),
      ...extra
    });
  }

  private redactValue(value: unknown): unknown {
    if (typeof value === 'string') {
      return this.redact(value);
    }
    if (Array.isArray(value)) {
      return value.map(item => this.redactValue(item));
    }
    if (value instanceof Error) {
      return this.redact(value.message);
    }
    if (value && typeof value === 'object') {
      const result: Record<string, unknown> = {};
      for (const [key, item] of Object.entries(value)) {
        result[key] = this.redactValue(item);
      }
      return result;
    }
    return value;
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}
