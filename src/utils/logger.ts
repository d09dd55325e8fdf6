import * as fs from 'fs';
import * as path from 'path';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export type LogData = Record<string, unknown>;

export class Logger {
  private logPath: string;
  private component: string;
  private enabled: boolean = true;

  private constructor(component: string, logPath?: string) {
    this.component = component;
    this.logPath = logPath ?? path.join(process.cwd(), '.scalatest-launch', 'debug.log');
    this.ensureLogDirectory();
  }

  static create(component: string, logPath?: string): Logger {
    return new Logger(component, logPath);
  }

  getLogPath(): string {
    return this.logPath;
  }

  private ensureLogDirectory(): void {
    try {
      fs.mkdirSync(path.dirname(this.logPath), { recursive: true });
    } catch {
      // Nowhere to write; stay quiet for the rest of the run
      this.enabled = false;
    }
  }

  private formatMessage(level: LogLevel, message: string, data?: LogData): string {
    const timestamp = new Date().toISOString();
    const dataStr = data ? ` | ${JSON.stringify(data)}` : '';
    return `${timestamp} ${level.padEnd(5)} | [${this.component}] ${message}${dataStr}`;
  }

  private writeLog(level: LogLevel, message: string, data?: LogData): void {
    if (!this.enabled) return;
    try {
      fs.appendFileSync(this.logPath, this.formatMessage(level, message, data) + '\n', 'utf8');
    } catch {
      this.enabled = false;
    }
  }

  debug(message: string, data?: LogData): void {
    if (process.env.SCALATEST_LAUNCH_DEBUG === '1') {
      this.writeLog('DEBUG', message, data);
    }
  }

  info(message: string, data?: LogData): void {
    this.writeLog('INFO', message, data);
  }

  warn(message: string, data?: LogData): void {
    this.writeLog('WARN', message, data);
  }

  error(message: string, error?: unknown, data?: LogData): void {
    const errorData: LogData = { ...data };
    if (error instanceof Error) {
      errorData.error = error.message;
      errorData.stack = error.stack;
    } else if (error !== undefined) {
      errorData.error = String(error);
    }
    this.writeLog('ERROR', message, errorData);
  }

  /**
   * Log lifecycle events with consistent narrative structure
   */
  lifecycle(event: string, details?: LogData): void {
    this.info(`Lifecycle: ${event}`, details);
  }

  /**
   * Log command execution
   */
  command(cmd: string, args?: readonly string[]): void {
    this.info(`Executing command: ${cmd}`, { args });
  }

  /**
   * Log decision points
   */
  decision(description: string, choice: string, reason?: string): void {
    this.info(`Decision: ${description}`, { choice, reason });
  }
}
