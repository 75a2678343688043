import type { Disposable } from './disposable';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  stream?: NodeJS.WritableStream;
  verbose?: boolean;
}

export class AppLogger implements Disposable {
  private readonly stream: NodeJS.WritableStream;
  private readonly verbose: boolean;
  private disposed = false;

  constructor(
    private readonly name = 'translation-orchestrator',
    options?: LoggerOptions,
  ) {
    this.stream = options?.stream ?? process.stderr;
    this.verbose = options?.verbose ?? false;
  }

  debug(message: string): void {
    if (!this.verbose) {
      return;
    }

    this.appendLine(this.format('debug', message));
  }

  info(message: string): void {
    this.appendLine(this.format('info', message));
  }

  warn(message: string): void {
    this.appendLine(this.format('warn', message));
  }

  error(message: string, error?: unknown): void {
    const details = error instanceof Error ? `\n${error.name}: ${error.message}\n${error.stack ?? ''}` : '';
    this.appendLine(this.format('error', `${message}${details}`));
  }

  event(name: string, data: Record<string, unknown>): void {
    this.appendLine(this.formatEvent(name, data));
  }

  dispose(): void {
    this.disposed = true;
  }

  private appendLine(line: string): void {
    if (this.disposed) {
      return;
    }

    this.stream.write(`${line}\n`);
  }

  private format(level: LogLevel, message: string): string {
    const timestamp = new Date().toISOString();
    return `[${level.toUpperCase()} - ${timestamp}] ${this.name}: ${message}`;
  }

  private formatEvent(name: string, data: Record<string, unknown>): string {
    const timestamp = new Date().toISOString();
    return `[EVENT - ${timestamp}] ${this.name}: ${name} ${this.safeStringify(data)}`;
  }

  private safeStringify(data: Record<string, unknown>): string {
    try {
      return JSON.stringify(data, undefined, 0);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return JSON.stringify({ serializationError: message });
    }
  }
}
