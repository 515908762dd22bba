/**
 * ndk-build Android.mk 생성기
 *
 * 패키지마다 <output>/<package>/Android.mk를 만들고, ABI별 ifeq 블록 안에
 * 모듈 정의를 넣습니다. ndk-build는 패키지로 한정된 모듈 이름을 지원하지 않으므로
 * 모든 패키지에서 모듈 이름이 유일해야 합니다.
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { DuplicateModuleNameError, UnsupportedTargetError } from '../errors';
import type { Module } from '../package/module';
import type { Package } from '../package/package';
import { Android } from '../platform/android';
import type { PlatformIdentity } from '../platform/types';
import { tryResolveLibrary } from '../resolver/moduleResolver';
import { toUnixPath } from '../shared/path-utils';
import logger from '../../utils/logger';
import {
  BuildSystemFactory,
  BuildSystemGenerator,
  GenerationResult,
  findReferredModule,
  prepareOutputDirectory,
  sortModulesByName,
} from './buildSystem';

/** `:=` 뒤에 붙는 공백 구분 목록 (비어 있으면 빈 문자열) */
function exportList(items: readonly string[]): string {
  return items.map((item) => ` ${item}`).join('');
}

function isAndroid(requirement: PlatformIdentity): requirement is Android {
  return requirement instanceof Android;
}

export class NdkBuildGenerator implements BuildSystemGenerator {
  readonly identifier = 'ndk-build';

  constructor(
    readonly outputDirectory: string,
    readonly packages: readonly Package[]
  ) {}

  async generate(requirements: readonly PlatformIdentity[]): Promise<GenerationResult> {
    const androidRequirements = requirements.filter(isAndroid);
    if (androidRequirements.length !== requirements.length) {
      throw new UnsupportedTargetError('ndk-build only supports Android targets');
    }

    this.checkModuleNamesAreUnique();

    await prepareOutputDirectory(this.outputDirectory);

    const result: GenerationResult = { files: [], skipped: [] };
    for (const pkg of this.packages) {
      const packageDirectory = path.join(this.outputDirectory, pkg.name);
      await fs.ensureDir(packageDirectory);
      const androidMk = path.join(packageDirectory, 'Android.mk');
      await fs.writeFile(androidMk, this.renderPackage(pkg, androidRequirements, result));
      result.files.push(androidMk);
      logger.info('Android.mk 생성', { path: androidMk });
    }
    return result;
  }

  private checkModuleNamesAreUnique(): void {
    const seen = new Map<string, Module>();
    for (const pkg of this.packages) {
      for (const module of pkg.modules) {
        const duplicate = seen.get(module.name);
        if (duplicate) {
          throw new DuplicateModuleNameError(module, duplicate);
        }
        seen.set(module.name, module);
      }
    }
  }

  private renderPackage(pkg: Package, requirements: readonly Android[], result: GenerationResult): string {
    const lines: string[] = ['LOCAL_PATH := $(call my-dir)', ''];

    for (const requirement of requirements) {
      const abi = requirement.abi.targetArchAbi;
      lines.push(`ifeq ($(TARGET_ARCH_ABI),${abi})`, '');
      for (const module of sortModulesByName(pkg.modules)) {
        const block = this.emitModule(module, requirement, result);
        if (block) {
          lines.push(...block);
        }
      }
      lines.push(`endif  # ${abi}`, '');
    }

    for (const dependency of [...pkg.dependencies].sort()) {
      lines.push(`$(call import-module,prefab/${dependency})`);
    }

    return lines.map((line) => `${line}\n`).join('');
  }

  private skip(module: Module, requirement: Android, reason: string, result: GenerationResult): null {
    logger.warn(reason, { requirement: requirement.toString() });
    result.skipped.push({ module: module.canonicalName, requirement: requirement.toString(), reason });
    return null;
  }

  private emitModule(module: Module, requirement: Android, result: GenerationResult): string[] | null {
    const ldLibs: string[] = [];
    const sharedLibraries: string[] = [];
    const staticLibraries: string[] = [];

    for (const reference of module.linkLibsForPlatform(requirement)) {
      if (reference.kind === 'literal') {
        ldLibs.push(reference.arg);
        continue;
      }
      const referred = findReferredModule(reference, module, this.packages);
      if (referred.isHeaderOnly) {
        staticLibraries.push(referred.name);
        continue;
      }
      const outcome = tryResolveLibrary(referred, requirement);
      if (outcome.type === 'unresolved') {
        return this.skip(
          module,
          requirement,
          `Skipping ${module.canonicalName} because ${referred.canonicalName} has no compatible library`,
          result
        );
      }
      (outcome.library.isStatic ? staticLibraries : sharedLibraries).push(referred.name);
    }

    const exports = [
      `LOCAL_EXPORT_SHARED_LIBRARIES :=${exportList(sharedLibraries)}`,
      `LOCAL_EXPORT_STATIC_LIBRARIES :=${exportList(staticLibraries)}`,
      `LOCAL_EXPORT_LDLIBS :=${exportList(ldLibs)}`,
    ];

    // ndk-build에는 헤더 전용 타입이 없어 소스 없는 정적 라이브러리로 표현
    if (module.isHeaderOnly) {
      return [
        'include $(CLEAR_VARS)',
        `LOCAL_MODULE := ${module.name}`,
        `LOCAL_EXPORT_C_INCLUDES := ${toUnixPath(module.includePath)}`,
        ...exports,
        'include $(BUILD_STATIC_LIBRARY)',
        '',
      ];
    }

    const outcome = tryResolveLibrary(module, requirement);
    if (outcome.type === 'unresolved') {
      return this.skip(module, requirement, outcome.error.message, result);
    }

    const library = outcome.library;
    const prebuiltType = library.isStatic ? 'PREBUILT_STATIC_LIBRARY' : 'PREBUILT_SHARED_LIBRARY';
    return [
      'include $(CLEAR_VARS)',
      `LOCAL_MODULE := ${module.name}`,
      `LOCAL_SRC_FILES := ${toUnixPath(library.path)}`,
      `LOCAL_EXPORT_C_INCLUDES := ${toUnixPath(library.includePath)}`,
      ...exports,
      `include $(${prebuiltType})`,
      '',
    ];
  }
}

export const ndkBuildFactory: BuildSystemFactory = {
  identifier: 'ndk-build',
  create(outputDirectory, packages) {
    return new NdkBuildGenerator(outputDirectory, packages);
  },
};
