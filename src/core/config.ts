import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';
import { ConfigError } from './errors';
import { getBuildSystemIds } from './generators/buildSystemRegistry';
import { ANDROID_STLS } from './platform/android';
import { PLATFORM_KINDS } from './platform/registry';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

// 설정 인터페이스 정의
export interface Config {
  /** generate 명령의 기본 빌드 시스템 */
  defaultBuildSystem: string;
  /** 기본 대상 플랫폼 */
  defaultPlatform: string;
  /** Android 기본 STL */
  defaultStl: string;
  /** Android 기본 NDK 메이저 버전 */
  defaultNdkVersion: number;
  logLevel: LogLevel;
}

// 기본 설정값
export const DEFAULT_CONFIG: Config = {
  defaultBuildSystem: 'cmake',
  defaultPlatform: 'android',
  defaultStl: 'c++_shared',
  defaultNdkVersion: 21,
  logLevel: 'info',
};

export type ConfigKey = keyof Config;

const CONFIG_KEYS: readonly ConfigKey[] = [
  'defaultBuildSystem',
  'defaultPlatform',
  'defaultStl',
  'defaultNdkVersion',
  'logLevel',
];

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((k) => k === key);
}

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** 정해진 값 중 하나만 허용하는 설정 */
type ChoiceKey = 'defaultBuildSystem' | 'defaultPlatform' | 'defaultStl';

// generators/platform과 순환 import이므로 모듈 최상위에서 계산하지 않음
function allowedValues(key: ChoiceKey): readonly string[] {
  switch (key) {
    case 'defaultBuildSystem':
      return getBuildSystemIds();
    case 'defaultPlatform':
      return PLATFORM_KINDS;
    case 'defaultStl':
      return ANDROID_STLS.map((stl) => stl.name);
  }
}

function knownValue(key: ChoiceKey, value: unknown): string | undefined {
  return typeof value === 'string' && allowedValues(key).includes(value) ? value : undefined;
}

/**
 * 저장된 값과 기본값을 필드 단위로 병합합니다.
 * 형식이 맞지 않거나 알 수 없는 값인 필드는 기본값을 사용합니다.
 */
export function normalizeConfig(raw: unknown): Config {
  if (!isRecord(raw)) {
    return { ...DEFAULT_CONFIG };
  }
  const ndkVersion = raw.defaultNdkVersion;
  return {
    defaultBuildSystem: knownValue('defaultBuildSystem', raw.defaultBuildSystem) ?? DEFAULT_CONFIG.defaultBuildSystem,
    defaultPlatform: knownValue('defaultPlatform', raw.defaultPlatform) ?? DEFAULT_CONFIG.defaultPlatform,
    defaultStl: knownValue('defaultStl', raw.defaultStl) ?? DEFAULT_CONFIG.defaultStl,
    defaultNdkVersion:
      typeof ndkVersion === 'number' && Number.isInteger(ndkVersion) && ndkVersion > 0
        ? ndkVersion
        : DEFAULT_CONFIG.defaultNdkVersion,
    logLevel: isLogLevel(raw.logLevel) ? raw.logLevel : DEFAULT_CONFIG.logLevel,
  };
}

function requireKnown(key: ChoiceKey, value: string): string {
  const known = knownValue(key, value);
  if (known === undefined) {
    throw new ConfigError(`${key} must be one of ${allowedValues(key).join(', ')}, got "${value}"`, { key, value });
  }
  return known;
}

/**
 * CLI 문자열 값을 설정 키에 맞는 타입으로 변환해 적용합니다.
 */
export function applyConfigValue(config: Config, key: ConfigKey, value: string): Config {
  switch (key) {
    case 'defaultNdkVersion': {
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new ConfigError(`${key} must be a positive integer, got "${value}"`, { key, value });
      }
      return { ...config, defaultNdkVersion: parsed };
    }
    case 'logLevel':
      if (!isLogLevel(value)) {
        throw new ConfigError(`logLevel must be one of ${LOG_LEVELS.join(', ')}, got "${value}"`, { key, value });
      }
      return { ...config, logLevel: value };
    case 'defaultBuildSystem':
      return { ...config, defaultBuildSystem: requireKnown(key, value) };
    case 'defaultPlatform':
      return { ...config, defaultPlatform: requireKnown(key, value) };
    case 'defaultStl':
      return { ...config, defaultStl: requireKnown(key, value) };
  }
}

export class ConfigManager {
  private configDir: string;
  private configPath: string;
  private logsDir: string;

  constructor(configDir: string = process.env.NATIVEPKG_HOME || path.join(os.homedir(), '.nativepkg')) {
    this.configDir = configDir;
    this.configPath = path.join(this.configDir, 'settings.json');
    this.logsDir = path.join(this.configDir, 'logs');
  }

  /**
   * 필요한 디렉토리들을 생성합니다.
   */
  async ensureDirectories(): Promise<void> {
    await fs.ensureDir(this.configDir);
    await fs.ensureDir(this.logsDir);
  }

  getConfigDir(): string {
    return this.configDir;
  }

  getLogsDir(): string {
    return this.logsDir;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * 설정을 동기적으로 로드합니다 (CLI용).
   * 파일이 없으면 기본값을 반환합니다.
   */
  getConfig(): Config {
    if (!fs.pathExistsSync(this.configPath)) {
      return { ...DEFAULT_CONFIG };
    }
    let raw: unknown;
    try {
      raw = fs.readJsonSync(this.configPath);
    } catch (error) {
      throw new ConfigError(
        `Unable to read ${this.configPath}: ${error instanceof Error ? error.message : String(error)}`,
        { configPath: this.configPath }
      );
    }
    return normalizeConfig(raw);
  }

  /**
   * 설정값을 동기적으로 설정합니다 (CLI용).
   */
  set(key: string, value: string): Config {
    if (!isConfigKey(key)) {
      throw new ConfigError(`Unknown setting "${key}". Known settings: ${CONFIG_KEYS.join(', ')}`, { key });
    }
    const config = applyConfigValue(this.getConfig(), key, value);
    fs.ensureDirSync(this.configDir);
    fs.writeJsonSync(this.configPath, config, { spaces: 2 });
    return config;
  }

  /**
   * 설정을 동기적으로 초기화합니다 (CLI용).
   */
  reset(): void {
    fs.ensureDirSync(this.configDir);
    fs.writeJsonSync(this.configPath, DEFAULT_CONFIG, { spaces: 2 });
  }
}

// 싱글톤 인스턴스
let configManagerInstance: ConfigManager | null = null;

export function getConfigManager(): ConfigManager {
  if (!configManagerInstance) {
    configManagerInstance = new ConfigManager();
  }
  return configManagerInstance;
}
