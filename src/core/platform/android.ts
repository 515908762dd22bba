/**
 * Android 플랫폼 요구사항 및 라이브러리 호환성 판정
 */

import * as path from 'path';
import { InvalidArgumentError, MetadataError, MissingToolchainVariantError, ParseError, RedundantLibrariesError, UnsupportedTargetError } from '../errors';
import { ABI_METADATA_FILE, androidAbiMetadataLoader } from '../metadata/android-abi-metadata';
import { SHARED_LIBRARY_EXTENSION, STATIC_LIBRARY_EXTENSION } from '../package/elf';
import { PrebuiltLibrary } from '../package/prebuilt-library';
import type { ModuleDescriptor } from '../package/module';
import logger from '../../utils/logger';
import {
  COMPATIBLE_LIBRARY,
  LibraryUsabilityResult,
  PlatformArgs,
  PlatformFactory,
  PlatformIdentity,
  incompatibleLibrary,
  isCompatible,
} from './types';

/**
 * Android ABI
 * triple은 정확한 타깃이 아니라 라이브러리 아키텍처 기준 (32비트 Arm은 arm-linux-androideabi)
 */
export interface AndroidAbi {
  /** APP_ABI / ANDROID_ABI 값 */
  readonly targetArchAbi: string;
  readonly triple: string;
  /** 64비트 ABI는 API 21부터 지원 */
  readonly is64Bit: boolean;
}

export const ANDROID_ABIS: readonly AndroidAbi[] = [
  { targetArchAbi: 'armeabi-v7a', triple: 'arm-linux-androideabi', is64Bit: false },
  { targetArchAbi: 'arm64-v8a', triple: 'aarch64-linux-android', is64Bit: true },
  { targetArchAbi: 'x86', triple: 'i686-linux-android', is64Bit: false },
  { targetArchAbi: 'x86_64', triple: 'x86_64-linux-android', is64Bit: true },
];

/** 64비트 ABI가 도입된 API 레벨 */
export const MIN_64_BIT_API = 21;

/**
 * STL 패밀리
 * 'no STL'은 none과 system을 함께 가리킵니다 (링크 제약 없음).
 */
export type StlFamily = 'libc++' | 'libstdc++' | 'no STL' | 'STLport';

export interface AndroidStl {
  readonly name: string;
  readonly family: StlFamily;
  readonly isShared: boolean;
}

// 현재 NDK가 지원하지 않는 STL도 예전 아티팩트 호환을 위해 포함
export const ANDROID_STLS: readonly AndroidStl[] = [
  { name: 'c++_shared', family: 'libc++', isShared: true },
  { name: 'c++_static', family: 'libc++', isShared: false },
  { name: 'gnustl_shared', family: 'libstdc++', isShared: true },
  { name: 'gnustl_static', family: 'libstdc++', isShared: false },
  { name: 'none', family: 'no STL', isShared: false },
  { name: 'stlport_shared', family: 'STLport', isShared: true },
  { name: 'stlport_static', family: 'STLport', isShared: false },
  { name: 'system', family: 'no STL', isShared: true },
];

export const DEFAULT_ANDROID_STL = 'c++_shared';
export const DEFAULT_NDK_VERSION = 21;

function failParse(message: string, value: string, filePath?: string): never {
  if (filePath) {
    throw new MetadataError(message, filePath);
  }
  throw new ParseError(message, { value });
}

export function abiFromString(value: string, filePath?: string): AndroidAbi {
  return ANDROID_ABIS.find((abi) => abi.targetArchAbi === value) ?? failParse(`Unknown ABI: ${value}`, value, filePath);
}

export function stlFromString(value: string, filePath?: string): AndroidStl {
  return ANDROID_STLS.find((stl) => stl.name === value) ?? failParse(`Unknown STL: ${value}`, value, filePath);
}

/**
 * Android 빌드 요구사항 (사용자 대상 또는 라이브러리가 선언한 플랫폼)
 */
export class Android implements PlatformIdentity {
  readonly kind = 'android' as const;
  readonly targetTriple: string;
  /** 64비트 ABI는 최소 21로 올린 유효 API 레벨 */
  readonly api: number;

  constructor(
    readonly abi: AndroidAbi,
    api: number,
    readonly stl: AndroidStl,
    readonly ndkMajorVersion: number,
    /** 이 플랫폼이 기술하는 라이브러리가 정적 라이브러리인지 (사용자 요구사항에서는 false) */
    readonly isStatic: boolean = false
  ) {
    this.targetTriple = abi.triple;
    this.api = abi.is64Bit ? Math.max(api, MIN_64_BIT_API) : api;
  }

  toString(): string {
    return `Android(${this.abi.targetArchAbi}, ${this.api}, ${this.stl.name})`;
  }

  // 사용자가 정적 STL을 쓰면서 버전 스크립트로 심볼을 숨기는 경우는 감지할 수 없음.
  // 그런 사용자는 STL을 none으로 지정해야 함.
  private stlsAreCompatible(library: Android): LibraryUsabilityResult {
    if (library.stl.family === 'no STL') {
      return COMPATIBLE_LIBRARY;
    }

    // 사용자가 none/system이어도 의존성이 STL을 쓰면 거부됨
    if (this.stl.family !== library.stl.family) {
      return incompatibleLibrary(`User requested ${this.stl.family} but library requires ${library.stl.family}`);
    }

    // 정적 라이브러리는 최종 링크하는 쪽의 STL을 따름
    if (library.isStatic) {
      return COMPATIBLE_LIBRARY;
    }

    if (!library.stl.isShared) {
      return incompatibleLibrary(
        'Library is a shared library with a statically linked STL and cannot be used with any library using the STL'
      );
    }

    if (!this.stl.isShared) {
      return incompatibleLibrary('User is using a static STL but library requires a shared STL');
    }

    return COMPATIBLE_LIBRARY;
  }

  checkIfUsable(library: PrebuiltLibrary): LibraryUsabilityResult {
    const platform = library.platform;
    if (!(platform instanceof Android)) {
      return incompatibleLibrary('Library is not an Android library');
    }

    if (this.abi.targetArchAbi !== platform.abi.targetArchAbi) {
      return incompatibleLibrary(
        `User is targeting ${this.abi.targetArchAbi} but library is for ${platform.abi.targetArchAbi}`
      );
    }

    if (this.api < platform.api) {
      return incompatibleLibrary(`User has minSdkVersion ${this.api} but library was built for ${platform.api}`);
    }

    return this.stlsAreCompatible(platform);
  }

  /**
   * 1단계: 가장 높은 API 레벨로 빌드된 라이브러리만 남깁니다.
   * 2단계: 사용자 NDK 버전을 남은 라이브러리의 [min, max] 범위로 clamp한 뒤 정확히 일치하는 것을 고릅니다.
   */
  findBestMatch(libraries: readonly PrebuiltLibrary[]): PrebuiltLibrary {
    const candidates = this.validateCandidates(libraries);
    const moduleName = candidates[0].library.module.canonicalName;

    const bestApi = Math.max(...candidates.map((c) => c.platform.api));
    const bestApiMatches = candidates.filter((c) => c.platform.api === bestApi);
    if (bestApiMatches.length === 1) {
      logger.debug('API 레벨로 라이브러리 선택', { module: moduleName, api: bestApi });
      return bestApiMatches[0].library;
    }

    const ndkVersions = bestApiMatches.map((c) => c.platform.ndkMajorVersion);
    const minNdk = Math.min(...ndkVersions);
    const maxNdk = Math.max(...ndkVersions);
    const clamped = Math.min(Math.max(this.ndkMajorVersion, minNdk), maxNdk);
    const ndkMatches = bestApiMatches.filter((c) => c.platform.ndkMajorVersion === clamped);

    if (ndkMatches.length === 0) {
      throw new MissingToolchainVariantError(moduleName, this.ndkMajorVersion);
    }
    if (ndkMatches.length > 1) {
      throw new RedundantLibrariesError(
        moduleName,
        ndkMatches.map((c) => c.library.directory)
      );
    }

    logger.debug('NDK 버전으로 라이브러리 선택', {
      module: moduleName,
      api: bestApi,
      requested: this.ndkMajorVersion,
      selected: clamped,
    });
    return ndkMatches[0].library;
  }

  private validateCandidates(
    libraries: readonly PrebuiltLibrary[]
  ): Array<{ library: PrebuiltLibrary; platform: Android }> {
    if (libraries.length === 0) {
      throw new InvalidArgumentError('libraries must be non-empty');
    }
    const module = libraries[0].module;
    return libraries.map((library) => {
      const platform = library.platform;
      if (!(platform instanceof Android) || !isCompatible(this.checkIfUsable(library))) {
        throw new InvalidArgumentError('all libraries must be compatible', { library: library.path });
      }
      if (library.module !== module) {
        throw new InvalidArgumentError('all libraries must belong to the same module', { library: library.path });
      }
      return { library, platform };
    });
  }
}

function parseApiLevel(value: string | undefined): number {
  if (value === undefined) {
    throw new UnsupportedTargetError('--os-version is required when targeting Android');
  }
  if (!/^\d+$/.test(value)) {
    throw new ParseError(`Invalid Android API level: ${value}`, { value });
  }
  return Number(value);
}

export const androidFactory: PlatformFactory = {
  identifier: 'android',

  async librarySourceFromDirectory(directory, module, schemaVersion) {
    const metadata = await androidAbiMetadataLoader.loadAndMigrate(schemaVersion, directory, { module });
    const metadataPath = path.join(directory, ABI_METADATA_FILE);
    const platform = new Android(
      abiFromString(metadata.abi, metadataPath),
      metadata.api,
      stlFromString(metadata.stl, metadataPath),
      metadata.ndk,
      metadata.isStatic
    );
    const extension = metadata.isStatic ? STATIC_LIBRARY_EXTENSION : SHARED_LIBRARY_EXTENSION;
    return {
      path: path.join(directory, `${this.libraryNameFor(module)}${extension}`),
      platform,
      includePath: await PrebuiltLibrary.findIncludePath(directory),
    };
  },

  libraryNameFor(module: ModuleDescriptor): string {
    return module.libraryNameForPlatform('android');
  },

  fromCommandLineArgs(args: PlatformArgs): Android[] {
    const api = parseApiLevel(args.osVersion);
    const stl = stlFromString(args.stl ?? DEFAULT_ANDROID_STL);
    const ndkVersion = args.ndkVersion ?? DEFAULT_NDK_VERSION;
    const abis = args.abi === undefined ? ANDROID_ABIS : [abiFromString(args.abi)];
    return abis.map((abi) => new Android(abi, api, stl, ndkVersion));
  },
};
