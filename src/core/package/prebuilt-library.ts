import * as fs from 'fs-extra';
import { dirname, join } from 'path';
import type { PlatformIdentity } from '../platform/types';
import type { Module } from './module';
import { isStaticLibraryPath } from './elf';

/**
 * 모듈에 포함된 플랫폼별 프리빌트 라이브러리 (LibraryVariant)
 */
export class PrebuiltLibrary {
  /** 라이브러리 파일이 들어 있는 플랫폼별 디렉토리 */
  readonly directory: string;
  /** 헤더 경로. 디렉토리별 include가 없으면 모듈의 include */
  readonly includePath: string;

  constructor(
    readonly path: string,
    readonly module: Module,
    readonly platform: PlatformIdentity,
    includePath?: string
  ) {
    this.directory = dirname(this.path);
    this.includePath = includePath ?? module.includePath;
  }

  get isStatic(): boolean {
    return isStaticLibraryPath(this.path);
  }

  toString(): string {
    return this.path;
  }

  /**
   * 라이브러리 디렉토리의 include 경로 (없으면 undefined)
   */
  static async findIncludePath(directory: string): Promise<string | undefined> {
    const variantInclude = join(directory, 'include');
    return (await fs.pathExists(variantInclude)) ? variantInclude : undefined;
  }
}
