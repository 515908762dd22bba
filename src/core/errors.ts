/**
 * nativepkg 에러 정의
 * 파싱/스키마 오류, 패키지 구조 오류, 라이브러리 해석 오류를 구분합니다.
 */

import * as path from 'path';
import type { Module, ModuleDescriptor } from './package/module';
import type { PrebuiltLibrary } from './package/prebuilt-library';

/** 에러 코드 */
export const ErrorCodes = {
  PARSE_ERROR: 'PARSE_ERROR',
  METADATA_ERROR: 'METADATA_ERROR',
  INVALID_REFERENCE: 'INVALID_REFERENCE',
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',
  PACKAGE_LAYOUT_ERROR: 'PACKAGE_LAYOUT_ERROR',
  NO_MATCHING_LIBRARY: 'NO_MATCHING_LIBRARY',
  MODULE_INCONSISTENCY: 'MODULE_INCONSISTENCY',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  CONFIG_ERROR: 'CONFIG_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * 모든 nativepkg 에러의 기본 클래스
 */
export class NativePkgError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

// ============================================
// 파싱 / 스키마 에러
// ============================================

/** ABI, STL 등 알 수 없는 토큰이나 잘못된 값 */
export class ParseError extends NativePkgError {
  constructor(message: string, details?: Record<string, unknown>, code: ErrorCode = ErrorCodes.PARSE_ERROR) {
    super(message, code, details);
  }
}

/** 메타데이터 파일(prefab.json, module.json, abi.json) 오류 */
export class MetadataError extends ParseError {
  constructor(message: string, filePath?: string) {
    super(filePath ? `${filePath}: ${message}` : message, { filePath }, ErrorCodes.METADATA_ERROR);
  }
}

/** 잘못된 라이브러리 참조 문법 */
export class LibraryReferenceError extends ParseError {
  constructor(message: string, reference: string) {
    super(`${message}: "${reference}"`, { reference }, ErrorCodes.INVALID_REFERENCE);
  }
}

/** 참조한 모듈을 주어진 패키지들에서 찾을 수 없음 */
export class UnresolvedReferenceError extends NativePkgError {
  constructor(reference: string, module: Module) {
    super(
      `${module.canonicalName} exports ${reference} but no module matching it was found`,
      ErrorCodes.INVALID_REFERENCE,
      { reference, module: module.canonicalName }
    );
  }
}

/** 호출 계약 위반 (프로그래머 오류) */
export class InvalidArgumentError extends NativePkgError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.INVALID_ARGUMENT, details);
  }
}

// ============================================
// 패키지 구조 에러
// ============================================

const DIRECTORY_NAME_FORMAT =
  'It should have the name format <platform ID>.<artifact ID> e.g. android.x86';

export class InvalidDirectoryNameError extends NativePkgError {
  constructor(module: ModuleDescriptor, artifactDirectory: string) {
    super(
      `${module.canonicalName} artifact directory ${artifactDirectory} has an invalid name. ${DIRECTORY_NAME_FORMAT}`,
      ErrorCodes.PACKAGE_LAYOUT_ERROR,
      { module: module.canonicalName, artifactDirectory }
    );
  }
}

export class MissingPlatformIdError extends NativePkgError {
  constructor(module: ModuleDescriptor, artifactDirectory: string) {
    super(
      `${module.canonicalName} artifact directory ${artifactDirectory} does not contain a platform ID. ${DIRECTORY_NAME_FORMAT}`,
      ErrorCodes.PACKAGE_LAYOUT_ERROR,
      { module: module.canonicalName, artifactDirectory }
    );
  }
}

export class MissingArtifactIdError extends NativePkgError {
  constructor(module: ModuleDescriptor, artifactDirectory: string) {
    super(
      `${module.canonicalName} artifact directory ${artifactDirectory} is missing an artifact ID. ${DIRECTORY_NAME_FORMAT}`,
      ErrorCodes.PACKAGE_LAYOUT_ERROR,
      { module: module.canonicalName, artifactDirectory }
    );
  }
}

export class UnsupportedPlatformError extends NativePkgError {
  constructor(module: ModuleDescriptor, platformName: string) {
    super(
      `${module.canonicalName} contains artifacts for an unsupported platform "${platformName}"`,
      ErrorCodes.PACKAGE_LAYOUT_ERROR,
      { module: module.canonicalName, platformName }
    );
  }
}

/** 패키지 디렉토리 구조 오류 */
export class PackageLayoutError extends NativePkgError {
  constructor(message: string, directory: string) {
    super(`${message}: ${directory}`, ErrorCodes.PACKAGE_LAYOUT_ERROR, { directory });
  }
}

/** 라이브러리 디렉토리에 아티팩트가 없거나 여러 개 */
export class LibraryArtifactError extends PackageLayoutError {}

// ============================================
// 라이브러리 해석 에러
// ============================================

/** 거부된 라이브러리와 그 사유 */
export interface LibraryRejection {
  library: PrebuiltLibrary;
  reason: string;
}

/**
 * 사용자 요구사항과 호환되는 라이브러리가 모듈에 없음
 * 거부 목록은 라이브러리 디렉토리 이름 순으로 정렬됩니다.
 */
export class NoMatchingLibraryError extends NativePkgError {
  readonly module: Module;
  readonly rejections: readonly LibraryRejection[];

  constructor(module: Module, rejections: readonly LibraryRejection[]) {
    const sorted = [...rejections].sort((a, b) =>
      compareStrings(path.basename(a.library.directory), path.basename(b.library.directory))
    );
    super(
      `No compatible library found for ${module.canonicalName}. Rejected the following libraries:\n` +
        sorted.map((r) => `${path.basename(r.library.directory)}: ${r.reason}`).join('\n'),
      ErrorCodes.NO_MATCHING_LIBRARY,
      { module: module.canonicalName }
    );
    this.module = module;
    this.rejections = sorted;
  }
}

/** 툴체인 버전별 변형이 있으나 clamp된 버전에 정확히 맞는 변형이 없음 */
export class MissingToolchainVariantError extends NativePkgError {
  constructor(moduleName: string, toolchainVersion: number) {
    super(
      `${moduleName} contains a library per NDK version but no match was found for ${toolchainVersion}`,
      ErrorCodes.MODULE_INCONSISTENCY,
      { module: moduleName, toolchainVersion }
    );
  }
}

/** 선택 기준으로 구별할 수 없는 변형이 둘 이상 */
export class RedundantLibrariesError extends NativePkgError {
  readonly directories: readonly string[];

  constructor(moduleName: string, directories: readonly string[]) {
    super(
      `Unable to resolve a single library match for ${moduleName}. The following libraries are redundant:\n` +
        directories.join('\n'),
      ErrorCodes.MODULE_INCONSISTENCY,
      { module: moduleName }
    );
    this.directories = directories;
  }
}

// ============================================
// 생성 설정 에러
// ============================================

export class DuplicatePackageNameError extends NativePkgError {
  constructor(name: string, firstPath: string, secondPath: string) {
    super(
      `Multiple packages named ${name} found: ${firstPath} and ${secondPath}.`,
      ErrorCodes.CONFIGURATION_ERROR,
      { name, firstPath, secondPath }
    );
  }
}

export class UnknownDependencyError extends NativePkgError {
  constructor(packageName: string, dependency: string) {
    super(
      `${packageName} depends on unknown dependency ${dependency}`,
      ErrorCodes.CONFIGURATION_ERROR,
      { packageName, dependency }
    );
  }
}

export class DuplicateModuleNameError extends NativePkgError {
  constructor(first: Module, second: Module) {
    super(
      `Duplicate module name found (${first.canonicalName} and ${second.canonicalName}). ` +
        'ndk-build does not support fully qualified module names.',
      ErrorCodes.CONFIGURATION_ERROR,
      { first: first.canonicalName, second: second.canonicalName }
    );
  }
}

/** 빌드 시스템이 지원하지 않는 대상 조합 */
export class UnsupportedTargetError extends NativePkgError {
  constructor(message: string) {
    super(message, ErrorCodes.CONFIGURATION_ERROR);
  }
}

export class UnknownBuildSystemError extends NativePkgError {
  constructor(identifier: string, known: readonly string[]) {
    super(
      `Unsupported build system "${identifier}". Supported build systems: ${known.join(', ')}`,
      ErrorCodes.CONFIGURATION_ERROR,
      { identifier }
    );
  }
}

export class ConfigError extends NativePkgError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
  }
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
