/**
 * 패키지 내 모듈 (modules/<name>/)
 */

import * as fs from 'fs-extra';
import { basename, join } from 'path';
import {
  InvalidDirectoryNameError,
  MissingArtifactIdError,
  MissingPlatformIdError,
  UnsupportedPlatformError,
} from '../errors';
import { ModuleMetadataV1, PlatformSpecificModuleMetadataV1, moduleMetadataLoader } from '../metadata/module-metadata';
import type { SchemaVersion } from '../metadata/schema-version';
import { findPlatformFactory } from '../platform/registry';
import type { PlatformIdentity, PlatformKind, PrebuiltLibrarySource } from '../platform/types';
import { LibraryReference, parseLibraryReference } from './library-reference';
import { PrebuiltLibrary } from './prebuilt-library';
import logger from '../../utils/logger';

/**
 * libs/를 읽기 전에 module.json만으로 정해지는 모듈 정보
 * 플랫폼 팩토리는 이 정보로 라이브러리 파일 이름을 정합니다.
 */
export class ModuleDescriptor {
  /** 모듈 디렉토리 이름 */
  readonly name: string;
  /** `//<package>/<module>` */
  readonly canonicalName: string;
  /**
   * 모듈 공통 include 디렉토리
   * 헤더 전용 모듈이 아니라면 PrebuiltLibrary.includePath를 사용해야 합니다.
   */
  readonly includePath: string;

  constructor(
    readonly path: string,
    readonly packageName: string,
    readonly metadata: ModuleMetadataV1
  ) {
    this.name = basename(this.path);
    this.canonicalName = `//${packageName}/${this.name}`;
    this.includePath = join(this.path, 'include');
  }

  private platformMetadata(kind: PlatformKind): PlatformSpecificModuleMetadataV1 {
    switch (kind) {
      case 'android':
        return this.metadata.android;
      case 'gnulinux':
        return this.metadata.gnulinux;
    }
  }

  /**
   * 사용자에게 함께 내보낼 링크 참조 목록
   * 플랫폼별 export_libraries가 있으면 그것을 사용합니다.
   */
  linkLibsForPlatform(platform: PlatformIdentity | PlatformKind): LibraryReference[] {
    const kind = typeof platform === 'string' ? platform : platform.kind;
    const references = this.platformMetadata(kind).exportLibraries ?? this.metadata.exportLibraries;
    return references.map(parseLibraryReference);
  }

  /**
   * 확장자를 제외한 라이브러리 파일 이름
   * 플랫폼별 library_name → 모듈 library_name → `lib<module>` 순
   */
  libraryNameForPlatform(kind: PlatformKind): string {
    return this.platformMetadata(kind).libraryName ?? this.metadata.libraryName ?? `lib${this.name}`;
  }

  toString(): string {
    return this.canonicalName;
  }
}

export class Module extends ModuleDescriptor {
  /** libs/ 아래 디렉토리 이름 순 */
  readonly libraries: readonly PrebuiltLibrary[];

  constructor(
    path: string,
    packageName: string,
    metadata: ModuleMetadataV1,
    sources: readonly PrebuiltLibrarySource[] = []
  ) {
    super(path, packageName, metadata);
    this.libraries = sources.map(
      (source) => new PrebuiltLibrary(source.path, this, source.platform, source.includePath)
    );
  }

  get isHeaderOnly(): boolean {
    return this.libraries.length === 0;
  }

  /**
   * module.json과 libs/<platform>.<artifact>/ 디렉토리를 모두 읽은 뒤 모듈을 만듭니다.
   */
  static async load(modulePath: string, packageName: string, schemaVersion: SchemaVersion): Promise<Module> {
    const metadata = await moduleMetadataLoader.loadAndMigrate(schemaVersion, modulePath, undefined);
    const descriptor = new ModuleDescriptor(modulePath, packageName, metadata);

    const libsDir = join(modulePath, 'libs');
    if (!(await fs.pathExists(libsDir))) {
      logger.debug('헤더 전용 모듈', { module: descriptor.canonicalName });
      return new Module(modulePath, packageName, metadata);
    }

    const sources: PrebuiltLibrarySource[] = [];
    for (const entry of await listDirectories(libsDir)) {
      const directory = join(libsDir, entry);
      const separator = entry.indexOf('.');
      if (separator < 0) {
        throw new InvalidDirectoryNameError(descriptor, directory);
      }
      const platformName = entry.substring(0, separator);
      if (platformName.length === 0) {
        throw new MissingPlatformIdError(descriptor, directory);
      }
      if (separator === entry.length - 1) {
        throw new MissingArtifactIdError(descriptor, directory);
      }

      const factory = findPlatformFactory(platformName);
      if (!factory) {
        throw new UnsupportedPlatformError(descriptor, platformName);
      }
      sources.push(await factory.librarySourceFromDirectory(directory, descriptor, schemaVersion));
    }

    const module = new Module(modulePath, packageName, metadata, sources);
    logger.debug('모듈 로드 완료', { module: module.canonicalName, libraries: module.libraries.length });
    return module;
  }
}

/**
 * 하위 디렉토리 이름을 정렬해 반환합니다.
 */
export async function listDirectories(directory: string): Promise<string[]> {
  const entries = await fs.readdir(directory, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();
}
