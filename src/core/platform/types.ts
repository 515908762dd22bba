/**
 * 플랫폼 식별 및 호환성 판정 공통 타입
 */

import type { ModuleDescriptor } from '../package/module';
import type { PrebuiltLibrary } from '../package/prebuilt-library';
import type { SchemaVersion } from '../metadata/schema-version';

/** 지원 플랫폼 식별자 (라이브러리 디렉토리 이름의 앞부분) */
export type PlatformKind = 'android' | 'gnulinux';

/**
 * 라이브러리 사용 가능 여부 판정 결과
 * 비호환은 예외가 아니라 사유를 담은 값입니다.
 */
export type LibraryUsabilityResult =
  | { readonly type: 'compatible' }
  | { readonly type: 'incompatible'; readonly reason: string };

export const COMPATIBLE_LIBRARY: LibraryUsabilityResult = { type: 'compatible' };

export function incompatibleLibrary(reason: string): LibraryUsabilityResult {
  return { type: 'incompatible', reason };
}

export function isCompatible(result: LibraryUsabilityResult): boolean {
  return result.type === 'compatible';
}

/**
 * 사용자 요구사항 또는 라이브러리가 선언한 빌드 플랫폼
 */
export interface PlatformIdentity {
  readonly kind: PlatformKind;
  /** 라이브러리 아키텍처 기준 target triple */
  readonly targetTriple: string;

  /**
   * 이 요구사항으로 주어진 라이브러리를 사용할 수 있는지 판정합니다.
   */
  checkIfUsable(library: PrebuiltLibrary): LibraryUsabilityResult;

  /**
   * 호환 판정을 통과한 같은 모듈의 라이브러리 중 최적의 하나를 고릅니다.
   * 입력이 비었거나 호환되지 않는 라이브러리가 섞여 있으면 InvalidArgumentError를 던집니다.
   */
  findBestMatch(libraries: readonly PrebuiltLibrary[]): PrebuiltLibrary;

  toString(): string;
}

/**
 * 모듈을 만들기 전에 읽은 라이브러리 디렉토리
 * Module 생성자가 이것으로 PrebuiltLibrary를 만듭니다.
 */
export interface PrebuiltLibrarySource {
  readonly path: string;
  readonly platform: PlatformIdentity;
  /** 디렉토리별 include가 없으면 생략 (모듈 include 사용) */
  readonly includePath?: string;
}

/** CLI에서 받은 대상 플랫폼 인자 */
export interface PlatformArgs {
  abi?: string;
  osVersion?: string;
  stl?: string;
  ndkVersion?: number;
}

/**
 * 플랫폼별 팩토리
 * 라이브러리 디렉토리 로드와 CLI 요구사항 생성을 담당합니다.
 */
export interface PlatformFactory {
  readonly identifier: PlatformKind;

  /**
   * 라이브러리 디렉토리(abi.json 포함)를 읽어 라이브러리 파일과 플랫폼을 찾습니다.
   */
  librarySourceFromDirectory(
    directory: string,
    module: ModuleDescriptor,
    schemaVersion: SchemaVersion
  ): Promise<PrebuiltLibrarySource>;

  /** 확장자를 제외한 라이브러리 파일 이름 */
  libraryNameFor(module: ModuleDescriptor): string;

  fromCommandLineArgs(args: PlatformArgs): PlatformIdentity[];
}
