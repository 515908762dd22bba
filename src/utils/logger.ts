import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { getConfigManager, LogLevel } from '../core/config';

// 개발 모드 여부
const isDev = process.env.NODE_ENV === 'development';

// 로그 포맷 정의
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
    let log = `[${timestamp}] [${level.toUpperCase()}] ${message}`;
    if (Object.keys(meta).length > 0) {
      log += ` ${JSON.stringify(meta)}`;
    }
    if (stack) {
      log += `\n${stack}`;
    }
    return log;
  })
);

// 콘솔용 컬러 포맷 (경고/에러는 stderr)
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.printf(({ level, message, ...meta }) => {
    let log = `${level}: ${message}`;
    if (Object.keys(meta).length > 0) {
      log += ` ${JSON.stringify(meta)}`;
    }
    return log;
  })
);

function createConsoleTransport(): winston.transport {
  return new winston.transports.Console({
    format: consoleFormat,
    stderrLevels: ['error', 'warn'],
  });
}

class Logger {
  private logger: winston.Logger;
  private initialized = false;

  constructor() {
    // 기본 로거 생성 (초기화 전 사용)
    this.logger = winston.createLogger({
      level: 'info',
      format: logFormat,
      transports: [createConsoleTransport()],
    });
  }

  /**
   * 로거를 초기화합니다. ConfigManager에서 로그 경로를 가져옵니다.
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    const configManager = getConfigManager();
    await configManager.ensureDirectories();
    const logsDir = configManager.getLogsDir();

    const fileTransport = new DailyRotateFile({
      dirname: logsDir,
      filename: 'app-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '30d',
      format: logFormat,
    });

    const errorFileTransport = new DailyRotateFile({
      dirname: logsDir,
      filename: 'error-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '30d',
      level: 'error',
      format: logFormat,
    });

    this.logger = winston.createLogger({
      level: isDev ? 'debug' : this.logger.level,
      format: logFormat,
      transports: [createConsoleTransport(), fileTransport, errorFileTransport],
    });

    this.initialized = true;
    this.debug('로거 초기화 완료', { logsDir });
  }

  /**
   * 로그 레벨 변경 (--verbose 등)
   */
  setLevel(level: LogLevel): void {
    this.logger.level = level;
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta);
  }

  /**
   * 에러 객체를 로깅합니다.
   */
  logError(error: Error, context?: string): void {
    this.error(context ? `${context}: ${error.message}` : error.message, {
      stack: error.stack,
      name: error.name,
    });
  }

  /**
   * 파일 트랜스포트를 닫습니다. CLI 종료 전에 호출합니다.
   */
  async close(): Promise<void> {
    const finished = new Promise<void>((resolve) => this.logger.on('finish', () => resolve()));
    this.logger.end();
    await finished;
  }
}

// 싱글톤 인스턴스
const logger = new Logger();

export { logger, Logger };
export default logger;
