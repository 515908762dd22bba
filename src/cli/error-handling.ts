/**
 * Commander 액션용 에러 처리
 * 프로세스 종료 코드와 stderr 출력은 CLI에서만 다룹니다.
 */

import chalk from 'chalk';
import { NativePkgError } from '../core/errors';
import logger from '../utils/logger';

export interface CommandResult {
  success: boolean;
  error?: string;
}

/**
 * 던져진 값을 사용자에게 보여줄 결과로 변환합니다.
 * nativepkg 에러의 상세 정보는 debug 레벨로만 기록하고 (--verbose),
 * 그 밖의 에러는 스택과 함께 error 레벨로 기록합니다.
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof NativePkgError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    return { success: false, error: error.message };
  }
  if (error instanceof Error) {
    logger.logError(error, '예상하지 못한 오류');
    return { success: false, error: error.message };
  }
  logger.debug('알 수 없는 오류', { error });
  return { success: false, error: 'An unknown error occurred' };
}

/**
 * 액션에서 발생한 오류를 빨간색으로 출력하고 종료 코드를 1로 설정합니다.
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      console.error(chalk.red(`오류: ${result.error}`));
      process.exitCode = 1;
    }
  };
}
