/**
 * 테스트용 패키지 트리 생성 유틸리티
 * 임시 디렉토리에 prefab.json / module.json / abi.json 구조를 만듭니다.
 */

import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import type { ModuleMetadataV1 } from '../core/metadata/module-metadata';
import { Module } from '../core/package/module';
import { PrebuiltLibrary } from '../core/package/prebuilt-library';
import { Android } from '../core/platform/android';
import type { PlatformIdentity } from '../core/platform/types';

/** 라이브러리 파일 생성 방식 (auto: static 여부에 따라 .a 또는 .so) */
export type LibraryFileFixture = 'auto' | 'shared' | 'static' | 'both' | 'none';

export interface AndroidVariantFixture {
  platform: 'android';
  /** libs/ 아래 디렉토리 이름 */
  directory: string;
  abi: string;
  api: number;
  ndk: number;
  stl: string;
  /** 스키마 2에서만 abi.json에 기록 */
  static?: boolean;
  libraryFile?: LibraryFileFixture;
  include?: boolean;
}

export interface GnuLinuxVariantFixture {
  platform: 'gnulinux';
  directory: string;
  arch: string;
  glibcVersion: string;
  libraryFile?: LibraryFileFixture;
  include?: boolean;
}

export type VariantFixture = AndroidVariantFixture | GnuLinuxVariantFixture;

export interface ModuleFixture {
  name: string;
  exportLibraries?: string[];
  libraryName?: string;
  android?: { exportLibraries?: string[]; libraryName?: string };
  gnulinux?: { exportLibraries?: string[]; libraryName?: string };
  /** 모듈 include/ 생성 여부 (기본 true) */
  include?: boolean;
  variants?: VariantFixture[];
}

export interface PackageFixture {
  name: string;
  schemaVersion?: number;
  dependencies?: string[];
  version?: string;
  modules: ModuleFixture[];
}

export async function createTempDir(prefix = 'nativepkg-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.remove(dir);
}

function platformSection(section: { exportLibraries?: string[]; libraryName?: string } | undefined): Record<string, unknown> | undefined {
  if (!section) {
    return undefined;
  }
  return { export_libraries: section.exportLibraries, library_name: section.libraryName };
}

function libraryNameOf(module: ModuleFixture, variant: VariantFixture): string {
  const override = variant.platform === 'android' ? module.android?.libraryName : module.gnulinux?.libraryName;
  return override ?? module.libraryName ?? `lib${module.name}`;
}

function libraryExtensions(variant: VariantFixture): string[] {
  const mode = variant.libraryFile ?? 'auto';
  switch (mode) {
    case 'auto':
      return [variant.platform === 'android' && variant.static ? '.a' : '.so'];
    case 'shared':
      return ['.so'];
    case 'static':
      return ['.a'];
    case 'both':
      return ['.a', '.so'];
    case 'none':
      return [];
  }
}

async function writeVariant(libsDir: string, module: ModuleFixture, variant: VariantFixture, schemaVersion: number): Promise<void> {
  const directory = path.join(libsDir, variant.directory);
  await fs.ensureDir(directory);

  const abiJson =
    variant.platform === 'android'
      ? {
          abi: variant.abi,
          api: variant.api,
          ndk: variant.ndk,
          stl: variant.stl,
          ...(schemaVersion >= 2 && variant.static !== undefined ? { static: variant.static } : {}),
        }
      : { arch: variant.arch, glibc_version: variant.glibcVersion };
  await fs.writeJson(path.join(directory, 'abi.json'), abiJson);

  for (const extension of libraryExtensions(variant)) {
    await fs.writeFile(path.join(directory, `${libraryNameOf(module, variant)}${extension}`), '');
  }
  if (variant.include) {
    await fs.ensureDir(path.join(directory, 'include'));
  }
}

/**
 * root/<name> 아래에 패키지를 만들고 그 경로를 반환합니다.
 */
export async function writePackage(root: string, fixture: PackageFixture): Promise<string> {
  const schemaVersion = fixture.schemaVersion ?? 2;
  const packageDir = path.join(root, fixture.name);
  await fs.ensureDir(path.join(packageDir, 'modules'));
  await fs.writeJson(path.join(packageDir, 'prefab.json'), {
    name: fixture.name,
    schema_version: schemaVersion,
    dependencies: fixture.dependencies ?? [],
    ...(fixture.version !== undefined ? { version: fixture.version } : {}),
  });

  for (const module of fixture.modules) {
    const moduleDir = path.join(packageDir, 'modules', module.name);
    await fs.ensureDir(moduleDir);
    await fs.writeJson(path.join(moduleDir, 'module.json'), {
      export_libraries: module.exportLibraries ?? [],
      library_name: module.libraryName,
      android: platformSection(module.android),
      gnulinux: platformSection(module.gnulinux),
    });
    if (module.include ?? true) {
      await fs.ensureDir(path.join(moduleDir, 'include'));
    }
    for (const variant of module.variants ?? []) {
      await writeVariant(path.join(moduleDir, 'libs'), module, variant, schemaVersion);
    }
  }
  return packageDir;
}

/**
 * 디스크 없이 사용하는 메모리상의 모듈
 */
export function memoryModule(packageName: string, name: string, metadata: Partial<ModuleMetadataV1> = {}): Module {
  return new Module(path.join('/packages', packageName, 'modules', name), packageName, {
    exportLibraries: metadata.exportLibraries ?? [],
    libraryName: metadata.libraryName,
    android: metadata.android ?? {},
    gnulinux: metadata.gnulinux ?? {},
  });
}

/**
 * module/libs/<directory>/<library name>.{a,so} 경로의 메모리상 라이브러리
 * Android 플랫폼이 정적 라이브러리를 기술하면 .a 확장자를 사용합니다.
 */
export function memoryLibrary(module: Module, directory: string, platform: PlatformIdentity): PrebuiltLibrary {
  const isStatic = platform instanceof Android && platform.isStatic;
  const fileName = `${module.libraryNameForPlatform(platform.kind)}${isStatic ? '.a' : '.so'}`;
  return new PrebuiltLibrary(path.join(module.path, 'libs', directory, fileName), module, platform);
}
