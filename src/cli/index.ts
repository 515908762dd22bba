#!/usr/bin/env node

import { Command, InvalidArgumentError as CommanderArgumentError } from 'commander';
import chalk from 'chalk';
import { getConfigManager } from '../core/config';
import { getBuildSystemIds } from '../core/generators/buildSystemRegistry';
import { PLATFORM_KINDS } from '../core/platform/registry';
import logger from '../utils/logger';
import type { GenerateCommandOptions } from './commands/generate';
import { handleError, withErrorHandling } from './error-handling';

// 버전 정보
const VERSION = '1.0.0';

function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new CommanderArgumentError('양의 정수가 필요합니다.');
  }
  return parsed;
}

// 메인 프로그램
const program = new Command();

program
  .name('nativepkg')
  .description(chalk.cyan('nativepkg - 프리빌트 네이티브 라이브러리 빌드 시스템 통합 생성기'))
  .version(VERSION, '-v, --version', '버전 정보 표시')
  .helpOption('-h, --help', '도움말 표시')
  .option('--verbose', '디버그 로그 출력')
  .hook('preAction', () => {
    if (program.opts<{ verbose?: boolean }>().verbose) {
      logger.setLevel('debug');
    }
  });

// generate 명령어
program
  .command('generate')
  .description('패키지의 빌드 시스템 통합 파일 생성')
  .argument('<packages...>', '패키지 디렉토리')
  .requiredOption('-o, --output <path>', '출력 경로')
  .option('--build-system <name>', `빌드 시스템 (${getBuildSystemIds().join(', ')})`)
  .option('--platform <name>', `대상 플랫폼 (${PLATFORM_KINDS.join(', ')})`)
  .option('--abi <abi>', '대상 ABI (Android에서 생략하면 모든 ABI)')
  .option('--os-version <version>', '대상 OS 버전 (Android API 레벨 또는 glibc 버전)')
  .option('--stl <stl>', 'Android STL')
  .option('--ndk-version <version>', 'Android NDK 메이저 버전', parsePositiveInteger)
  .option('--concurrency <num>', '동시에 읽을 패키지 수', parsePositiveInteger, 4)
  .action(
    withErrorHandling(async (packages: string[], options: GenerateCommandOptions) => {
      const { generateCommand } = await import('./commands/generate');
      await generateCommand(packages, options);
    })
  );

// config 명령어
program
  .command('config')
  .description('설정 관리')
  .addCommand(
    new Command('get')
      .description('설정값 조회')
      .argument('[key]', '설정 키')
      .action(
        withErrorHandling(async (key?: string) => {
          const { configGet } = await import('./commands/config');
          await configGet(key);
        })
      )
  )
  .addCommand(
    new Command('set')
      .description('설정값 변경')
      .argument('<key>', '설정 키')
      .argument('<value>', '설정값')
      .action(
        withErrorHandling(async (key: string, value: string) => {
          const { configSet } = await import('./commands/config');
          await configSet(key, value);
        })
      )
  )
  .addCommand(
    new Command('list')
      .description('모든 설정 표시')
      .action(
        withErrorHandling(async () => {
          const { configList } = await import('./commands/config');
          await configList();
        })
      )
  )
  .addCommand(
    new Command('reset')
      .description('설정 초기화')
      .action(
        withErrorHandling(async () => {
          const { configReset } = await import('./commands/config');
          await configReset();
        })
      )
  );

// 에러 핸들링
program.exitOverride((err) => {
  if (err.code === 'commander.help' || err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  console.error(chalk.red(`오류: ${err.message}`));
  process.exit(1);
});

async function main(): Promise<void> {
  // 명령어가 없으면 도움말 표시
  if (process.argv.length <= 2) {
    console.log(chalk.cyan('\n  nativepkg - 프리빌트 네이티브 라이브러리 빌드 시스템 통합 생성기\n'));
    console.log('  사용법: nativepkg <명령어> [옵션]\n');
    console.log('  명령어:');
    console.log('    generate    CMake / ndk-build 통합 파일 생성');
    console.log('    config      설정 관리');
    console.log('\n  예시:');
    console.log(chalk.gray('    nativepkg generate --build-system cmake --platform android --abi arm64-v8a --os-version 21 -o out ./curl'));
    console.log(chalk.gray('    nativepkg generate --build-system ndk-build --os-version 24 -o out ./openssl ./curl'));
    console.log(chalk.gray('    nativepkg config set defaultStl c++_static'));
    console.log('\n  자세한 내용: nativepkg --help\n');
    return;
  }

  try {
    logger.setLevel(getConfigManager().getConfig().logLevel);
    await logger.initialize();
  } catch (error) {
    console.error(chalk.red(`오류: ${handleError(error).error}`));
    process.exitCode = 1;
    return;
  }

  await program.parseAsync(process.argv);
  await logger.close();
}

main().catch((error: unknown) => {
  console.error(chalk.red(`오류: ${handleError(error).error}`));
  process.exitCode = 1;
});
