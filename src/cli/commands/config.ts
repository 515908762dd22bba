import chalk from 'chalk';
import Table from 'cli-table3';
import { ConfigKey, getConfigManager, isConfigKey } from '../../core/config';
import { ConfigError } from '../../core/errors';

const DESCRIPTIONS: Readonly<Record<ConfigKey, string>> = {
  defaultBuildSystem: 'generate 기본 빌드 시스템',
  defaultPlatform: '기본 대상 플랫폼',
  defaultStl: 'Android 기본 STL',
  defaultNdkVersion: 'Android 기본 NDK 메이저 버전',
  logLevel: '로그 레벨',
};

/**
 * 설정값 조회
 */
export async function configGet(key?: string): Promise<void> {
  const config = getConfigManager().getConfig();

  if (key === undefined) {
    console.log(chalk.cyan('\n현재 설정:'));
    console.log(JSON.stringify(config, null, 2));
    return;
  }
  if (!isConfigKey(key)) {
    throw new ConfigError(`Unknown setting "${key}"`, { key });
  }
  console.log(chalk.cyan(`${key}: `) + chalk.white(JSON.stringify(config[key])));
}

/**
 * 설정값 변경
 */
export async function configSet(key: string, value: string): Promise<void> {
  const config = getConfigManager().set(key, value);
  const saved = isConfigKey(key) ? config[key] : value;
  console.log(chalk.green(`✓ 설정이 저장되었습니다: ${key} = ${JSON.stringify(saved)}`));
}

/**
 * 모든 설정 표시
 */
export async function configList(): Promise<void> {
  const configManager = getConfigManager();
  const config = configManager.getConfig();

  const table = new Table({
    head: [chalk.cyan('설정'), chalk.cyan('값'), chalk.cyan('설명')],
    colWidths: [22, 16, 34],
  });

  for (const [key, description] of Object.entries(DESCRIPTIONS)) {
    const value = isConfigKey(key) ? String(config[key]) : '-';
    table.push([key, value, description]);
  }

  console.log(chalk.cyan('\n설정 목록:\n'));
  console.log(table.toString());
  console.log(chalk.gray(`설정 파일: ${configManager.getConfigPath()}`));
}

/**
 * 설정 초기화
 */
export async function configReset(): Promise<void> {
  getConfigManager().reset();
  console.log(chalk.green('✓ 설정이 초기화되었습니다'));
}
