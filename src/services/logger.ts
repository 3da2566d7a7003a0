import fs from 'fs/promises';
import path from 'path';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3
}

export interface LoggerOptions {
  level: LogLevel;
  filePath?: string | undefined;
  enableConsole?: boolean;
  // 모든 로그에 붙는 고정 컨텍스트 (예: resource 종류)
  baseContext?: LogContext;
}

export interface LogContext {
  [key: string]: unknown;
}

export class Logger {
  private readonly level: LogLevel;
  private readonly filePath: string;
  private readonly enableConsole: boolean;
  private readonly baseContext: LogContext;
  private readonly logLevelNames = ['DEBUG', 'INFO', 'WARN', 'ERROR'];
  // 파일 쓰기 순서 보장을 위한 체인 (withContext로 만든 Logger와 공유)
  private readonly writeQueue: { pending: Promise<void> };

  constructor(options: LoggerOptions, writeQueue?: { pending: Promise<void> }) {
    this.writeQueue = writeQueue ?? { pending: Promise.resolve() };
    this.level = options.level;
    this.filePath = options.filePath || '';
    this.enableConsole = options.enableConsole ?? true;
    this.baseContext = options.baseContext ?? {};
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log(LogLevel.ERROR, message, context);
  }

  /**
   * 같은 출력 설정을 공유하면서 고정 컨텍스트를 추가한 Logger를 반환
   */
  withContext(context: LogContext): Logger {
    return new Logger({
      level: this.level,
      filePath: this.filePath,
      enableConsole: this.enableConsole,
      baseContext: { ...this.baseContext, ...context }
    }, this.writeQueue);
  }

  /**
   * 대기 중인 파일 쓰기가 모두 끝날 때까지 기다림
   */
  async flush(): Promise<void> {
    await this.writeQueue.pending;
  }

  formatLine(level: LogLevel, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const levelName = this.logLevelNames[level] || 'UNKNOWN';
    const merged = { ...this.baseContext, ...context };
    const contextStr = Object.keys(merged).length > 0 ? this.formatContext(merged) : '';
    return `${timestamp} [${levelName}] ${message}${contextStr}`;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    // 설정된 로그 레벨보다 낮은 레벨은 무시
    if (level < this.level) {
      return;
    }

    const logMessage = this.formatLine(level, message, context);

    // stdout은 CLI 결과(JSON) 전용이므로 콘솔 로그는 stderr로 출력
    if (this.enableConsole) {
      console.error(logMessage);
    }

    if (this.filePath) {
      this.writeQueue.pending = this.writeQueue.pending.then(() => this.writeToFile(logMessage));
    }
  }

  private formatContext(context: LogContext): string {
    try {
      return ` ${JSON.stringify(context, this.errorReplacer)}`;
    } catch (error) {
      // 순환 참조 등의 오류 처리
      return ` [Context serialization failed: ${error instanceof Error ? error.message : 'Unknown error'}]`;
    }
  }

  private errorReplacer(_key: string, value: unknown): unknown {
    // Error 객체를 직렬화 가능한 형태로 변환
    if (value instanceof Error) {
      return {
        name: value.name,
        message: value.message
      };
    }
    return value;
  }

  private async writeToFile(message: string): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.appendFile(this.filePath, `${message}\n`);
    } catch (error) {
      // 파일 쓰기 실패 시 콘솔에만 경고 출력 (순환 참조 방지)
      if (this.enableConsole) {
        console.warn(`Failed to write to log file: ${error instanceof Error ? error.message : 'Unknown error'}`);
      }
    }
  }

  static parseLevel(level: string | undefined): LogLevel {
    switch ((level || '').toLowerCase()) {
      case 'debug': return LogLevel.DEBUG;
      case 'info': return LogLevel.INFO;
      case 'warn': return LogLevel.WARN;
      case 'error': return LogLevel.ERROR;
      default: return LogLevel.INFO;
    }
  }

  // 정적 팩토리 메서드들
  static createConsoleLogger(level: LogLevel = LogLevel.INFO): Logger {
    return new Logger({
      level,
      enableConsole: true
    });
  }

  static createSilentLogger(): Logger {
    return new Logger({
      level: LogLevel.ERROR,
      enableConsole: false
    });
  }
}
