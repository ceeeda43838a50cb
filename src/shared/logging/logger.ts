import type { LogLevel } from '../../config/index.js';

/**
 * コンソール出力ロガー
 *
 * 出力形式: `[LEVEL] scope : message`（全て標準エラー出力）
 */

export type LogSink = (line: string) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export class Logger {
  constructor(
    private readonly level: LogLevel = 'warn',
    private readonly sink: LogSink = (line) => console.error(line)
  ) {}

  debug(scope: string, message: string): void {
    this.write('debug', scope, message);
  }

  info(scope: string, message: string): void {
    this.write('info', scope, message);
  }

  warn(scope: string, message: string): void {
    this.write('warn', scope, message);
  }

  error(scope: string, message: string): void {
    this.write('error', scope, message);
  }

  /**
   * 起動不能などの致命的エラー。ログレベルに関係なく出力する
   */
  fatal(scope: string, message: string): void {
    this.sink(`[FATAL] ${scope} : ${message}`);
  }

  isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private write(level: Exclude<LogLevel, 'silent'>, scope: string, message: string): void {
    if (!this.isEnabled(level)) {
      return;
    }
    this.sink(`[${level.toUpperCase()}] ${scope} : ${message}`);
  }
}

/**
 * 出力しないロガー（省略時の既定値）
 */
export const silentLogger = new Logger('silent');
