/**
 * 빌드 시스템 생성기 공통 인터페이스
 */

import * as fs from 'fs-extra';
import { UnresolvedReferenceError } from '../errors';
import { ExternalReference, LocalReference, libraryReferenceToString } from '../package/library-reference';
import type { Module } from '../package/module';
import type { Package } from '../package/package';
import type { PlatformIdentity } from '../platform/types';

/** 호환되는 라이브러리가 없어 건너뛴 모듈 */
export interface SkippedModule {
  module: string;
  requirement: string;
  reason: string;
}

export interface GenerationResult {
  /** 생성한 파일 경로 */
  files: string[];
  skipped: SkippedModule[];
}

export interface BuildSystemGenerator {
  readonly identifier: string;
  readonly outputDirectory: string;
  readonly packages: readonly Package[];

  /**
   * 요구사항별로 패키지의 빌드 시스템 통합 파일을 출력 디렉토리에 생성합니다.
   */
  generate(requirements: readonly PlatformIdentity[]): Promise<GenerationResult>;
}

export interface BuildSystemFactory {
  /** --build-system 인자와 일치하는 이름 */
  readonly identifier: string;
  create(outputDirectory: string, packages: readonly Package[]): BuildSystemGenerator;
}

/**
 * 출력 디렉토리가 존재하고 비어 있도록 만듭니다.
 */
export async function prepareOutputDirectory(outputDirectory: string): Promise<void> {
  await fs.emptyDir(outputDirectory);
}

/**
 * Local/External 참조가 가리키는 모듈을 찾습니다.
 */
export function findReferredModule(
  reference: LocalReference | ExternalReference,
  currentModule: Module,
  packages: readonly Package[]
): Module {
  const packageName = reference.kind === 'local' ? currentModule.packageName : reference.pkg;
  const moduleName = reference.kind === 'local' ? reference.name : reference.module;
  const found = packages.find((pkg) => pkg.name === packageName)?.modules.find((m) => m.name === moduleName);
  if (!found) {
    throw new UnresolvedReferenceError(libraryReferenceToString(reference), currentModule);
  }
  return found;
}

/** 모듈 이름 순 정렬 (코드 유닛 기준) */
export function sortModulesByName(modules: readonly Module[]): Module[] {
  return [...modules].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}
