/**
 * GNU/Linux 플랫폼 요구사항
 */

import * as path from 'path';
import { InvalidArgumentError, MetadataError, ParseError, RedundantLibrariesError, UnsupportedTargetError } from '../errors';
import { ABI_METADATA_FILE } from '../metadata/android-abi-metadata';
import { gnuLinuxAbiMetadataLoader } from '../metadata/gnulinux-abi-metadata';
import { findElfLibrary } from '../package/elf';
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

/** Ubuntu 지원 아키텍처 목록 기준 */
export type GnuLinuxArch = 'amd64' | 'arm64' | 'armhf' | 'i386' | 'ppc64el';

export const GNULINUX_ARCHES: readonly GnuLinuxArch[] = ['amd64', 'arm64', 'armhf', 'i386', 'ppc64el'];

const ARCH_TRIPLES: Readonly<Record<GnuLinuxArch, string>> = {
  amd64: 'x86_64-linux-gnu',
  arm64: 'aarch64-linux-gnu',
  armhf: 'arm-linux-gnueabihf',
  i386: 'i386-linux-gnu',
  ppc64el: 'powerpc64le-linux-gnu',
};

export interface GlibcVersion {
  readonly major: number;
  readonly minor: number;
}

function fail(message: string, value: string, filePath?: string): never {
  if (filePath) {
    throw new MetadataError(message, filePath);
  }
  throw new ParseError(message, { value });
}

export function archFromString(value: string, filePath?: string): GnuLinuxArch {
  return GNULINUX_ARCHES.find((arch) => arch === value) ?? fail(`Unknown architecture: ${value}`, value, filePath);
}

/**
 * "major.minor" 형식의 glibc 버전을 파싱합니다.
 */
export function parseGlibcVersion(value: string, filePath?: string): GlibcVersion {
  const match = /^(\d+)\.(\d+)$/.exec(value);
  if (!match) {
    return fail(`Expected a glibc version of the form major.minor, got "${value}"`, value, filePath);
  }
  return { major: Number(match[1]), minor: Number(match[2]) };
}

export function compareGlibcVersions(a: GlibcVersion, b: GlibcVersion): number {
  return a.major !== b.major ? a.major - b.major : a.minor - b.minor;
}

export function formatGlibcVersion(version: GlibcVersion): string {
  return `${version.major}.${version.minor}`;
}

export class GnuLinux implements PlatformIdentity {
  readonly kind = 'gnulinux' as const;
  readonly targetTriple: string;

  constructor(
    readonly arch: GnuLinuxArch,
    readonly glibcVersion: GlibcVersion
  ) {
    this.targetTriple = ARCH_TRIPLES[arch];
  }

  toString(): string {
    return `GnuLinux(${this.arch}, ${formatGlibcVersion(this.glibcVersion)})`;
  }

  checkIfUsable(library: PrebuiltLibrary): LibraryUsabilityResult {
    const platform = library.platform;
    if (!(platform instanceof GnuLinux)) {
      return incompatibleLibrary('Library is not a GNU/Linux library');
    }
    if (this.arch !== platform.arch) {
      return incompatibleLibrary(`User is targeting ${this.arch} but library is for ${platform.arch}`);
    }
    if (compareGlibcVersions(this.glibcVersion, platform.glibcVersion) < 0) {
      return incompatibleLibrary(
        `User has glibc ${formatGlibcVersion(this.glibcVersion)} but library was built for ` +
          formatGlibcVersion(platform.glibcVersion)
      );
    }
    return COMPATIBLE_LIBRARY;
  }

  /**
   * 가장 최신 glibc로 빌드된 라이브러리를 고릅니다.
   */
  findBestMatch(libraries: readonly PrebuiltLibrary[]): PrebuiltLibrary {
    if (libraries.length === 0) {
      throw new InvalidArgumentError('libraries must be non-empty');
    }
    const module = libraries[0].module;
    const candidates = libraries.map((library) => {
      const platform = library.platform;
      if (!(platform instanceof GnuLinux) || !isCompatible(this.checkIfUsable(library))) {
        throw new InvalidArgumentError('all libraries must be compatible', { library: library.path });
      }
      if (library.module !== module) {
        throw new InvalidArgumentError('all libraries must belong to the same module', { library: library.path });
      }
      return { library, platform };
    });

    const best = candidates.reduce((a, b) =>
      compareGlibcVersions(a.platform.glibcVersion, b.platform.glibcVersion) >= 0 ? a : b
    ).platform.glibcVersion;
    const matches = candidates.filter((c) => compareGlibcVersions(c.platform.glibcVersion, best) === 0);
    if (matches.length > 1) {
      throw new RedundantLibrariesError(
        module.canonicalName,
        matches.map((c) => c.library.directory)
      );
    }

    logger.debug('glibc 버전으로 라이브러리 선택', {
      module: module.canonicalName,
      glibc: formatGlibcVersion(best),
    });
    return matches[0].library;
  }
}

export const gnuLinuxFactory: PlatformFactory = {
  identifier: 'gnulinux',

  async librarySourceFromDirectory(directory, module, schemaVersion) {
    const metadata = await gnuLinuxAbiMetadataLoader.loadAndMigrate(schemaVersion, directory, undefined);
    const metadataPath = path.join(directory, ABI_METADATA_FILE);
    const platform = new GnuLinux(
      archFromString(metadata.arch, metadataPath),
      parseGlibcVersion(metadata.glibcVersion, metadataPath)
    );
    return {
      path: await findElfLibrary(directory, this.libraryNameFor(module)),
      platform,
      includePath: await PrebuiltLibrary.findIncludePath(directory),
    };
  },

  libraryNameFor(module: ModuleDescriptor): string {
    return module.libraryNameForPlatform('gnulinux');
  },

  fromCommandLineArgs(args: PlatformArgs): GnuLinux[] {
    if (args.abi === undefined) {
      throw new UnsupportedTargetError('GNU/Linux targets require an ABI');
    }
    if (args.osVersion === undefined) {
      throw new UnsupportedTargetError('GNU/Linux targets require an OS version');
    }
    return [new GnuLinux(archFromString(args.abi), parseGlibcVersion(args.osVersion))];
  },
};
