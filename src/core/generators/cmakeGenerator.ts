/**
 * CMake 패키지 설정 파일 생성기
 * find_package()가 읽는 <package>-config.cmake / <package>-config-version.cmake를 생성
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { UnsupportedTargetError } from '../errors';
import type { Module } from '../package/module';
import type { Package } from '../package/package';
import type { PlatformIdentity } from '../platform/types';
import { tryResolveLibrary } from '../resolver/moduleResolver';
import { toUnixPath } from '../shared/path-utils';
import logger from '../../utils/logger';
import {
  BuildSystemFactory,
  BuildSystemGenerator,
  GenerationResult,
  prepareOutputDirectory,
  sortModulesByName,
} from './buildSystem';

export class CMakeGenerator implements BuildSystemGenerator {
  readonly identifier = 'cmake';

  constructor(
    readonly outputDirectory: string,
    readonly packages: readonly Package[]
  ) {}

  async generate(requirements: readonly PlatformIdentity[]): Promise<GenerationResult> {
    if (requirements.length !== 1) {
      throw new UnsupportedTargetError('CMake cannot generate multiple targets to a single directory');
    }
    const [requirement] = requirements;

    await prepareOutputDirectory(this.outputDirectory);

    const result: GenerationResult = { files: [], skipped: [] };
    for (const pkg of this.packages) {
      await this.generatePackage(pkg, requirement, result);
    }
    return result;
  }

  private async generatePackage(pkg: Package, requirement: PlatformIdentity, result: GenerationResult): Promise<void> {
    const lines: string[] = [];

    for (const dependency of [...pkg.dependencies].sort()) {
      lines.push(`find_package(${dependency} REQUIRED)`, '');
    }

    for (const module of sortModulesByName(pkg.modules)) {
      const block = this.emitModule(pkg, module, requirement, result);
      if (block) {
        lines.push(...block);
      }
    }

    const configFile = path.join(this.outputDirectory, `${pkg.name}-config.cmake`);
    await fs.writeFile(configFile, lines.map((line) => `${line}\n`).join(''));
    result.files.push(configFile);
    logger.info('CMake 설정 파일 생성', { path: configFile });

    if (pkg.version !== undefined) {
      const versionFile = path.join(this.outputDirectory, `${pkg.name}-config-version.cmake`);
      await fs.writeFile(versionFile, renderVersionFile(pkg.version));
      result.files.push(versionFile);
      logger.info('CMake 버전 파일 생성', { path: versionFile });
    }
  }

  private emitModule(
    pkg: Package,
    module: Module,
    requirement: PlatformIdentity,
    result: GenerationResult
  ): string[] | null {
    const references = module.linkLibsForPlatform(requirement);
    const literals: string[] = [];
    const locals: string[] = [];
    const externals: string[] = [];
    for (const reference of references) {
      switch (reference.kind) {
        case 'literal':
          literals.push(reference.arg);
          break;
        case 'local':
          locals.push(`${pkg.name}::${reference.name}`);
          break;
        case 'external':
          externals.push(`${reference.pkg}::${reference.module}`);
          break;
      }
    }
    const libraries = [...literals, ...locals, ...externals].join(';');
    const target = `${pkg.name}::${module.name}`;

    if (module.isHeaderOnly) {
      return [
        `add_library(${target} INTERFACE)`,
        `set_target_properties(${target} PROPERTIES`,
        `    INTERFACE_INCLUDE_DIRECTORIES "${toUnixPath(module.includePath)}"`,
        `    INTERFACE_LINK_LIBRARIES "${libraries}"`,
        ')',
        '',
      ];
    }

    const outcome = tryResolveLibrary(module, requirement);
    if (outcome.type === 'unresolved') {
      logger.warn(outcome.error.message, { requirement: requirement.toString() });
      result.skipped.push({
        module: module.canonicalName,
        requirement: requirement.toString(),
        reason: outcome.error.message,
      });
      return null;
    }

    const library = outcome.library;
    const linkage = library.isStatic ? 'STATIC' : 'SHARED';
    return [
      `add_library(${target} ${linkage} IMPORTED)`,
      `set_target_properties(${target} PROPERTIES`,
      `    IMPORTED_LOCATION "${toUnixPath(library.path)}"`,
      `    INTERFACE_INCLUDE_DIRECTORIES "${toUnixPath(library.includePath)}"`,
      `    INTERFACE_LINK_LIBRARIES "${libraries}"`,
      ')',
      '',
    ];
  }
}

/**
 * find_package(<name> <version>) 요청 버전과 비교하는 버전 파일
 */
export function renderVersionFile(version: string): string {
  return [
    `set(PACKAGE_VERSION ${version})`,
    'if("${PACKAGE_VERSION}" VERSION_LESS "${PACKAGE_FIND_VERSION}")',
    '    set(PACKAGE_VERSION_COMPATIBLE FALSE)',
    'else()',
    '    set(PACKAGE_VERSION_COMPATIBLE TRUE)',
    '    if("${PACKAGE_VERSION}" VERSION_EQUAL "${PACKAGE_FIND_VERSION}")',
    '        set(PACKAGE_VERSION_EXACT TRUE)',
    '    endif()',
    'endif()',
    '',
  ].join('\n');
}

export const cmakeFactory: BuildSystemFactory = {
  identifier: 'cmake',
  create(outputDirectory, packages) {
    return new CMakeGenerator(outputDirectory, packages);
  },
};
