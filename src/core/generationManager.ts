import PQueue from 'p-queue';
import { EventEmitter } from 'eventemitter3';
import * as fs from 'fs-extra';
import * as path from 'path';
import {
  DuplicatePackageNameError,
  InvalidArgumentError,
  PackageLayoutError,
  UnknownBuildSystemError,
  UnknownDependencyError,
  UnsupportedTargetError,
} from './errors';
import type { GenerationResult } from './generators/buildSystem';
import { createBuildSystem, findBuildSystem, getBuildSystemIds } from './generators/buildSystemRegistry';
import { Package } from './package/package';
import { PLATFORM_KINDS, findPlatformFactory } from './platform/registry';
import type { PlatformArgs, PlatformIdentity } from './platform/types';
import logger from '../utils/logger';

// 생성 옵션
export interface GenerateOptions {
  buildSystem: string;
  outputPath: string;
  platform: string;
  packagePaths: string[];
  platformArgs: PlatformArgs;
  /** 동시에 읽을 패키지 수 */
  concurrency?: number;
}

// 생성 결과
export interface GenerateSummary extends GenerationResult {
  buildSystem: string;
  outputPath: string;
  packages: string[];
  requirements: string[];
  duration: number;
}

// 이벤트 타입
export interface GenerationManagerEvents {
  packageLoaded: (pkg: Package) => void;
  complete: (summary: GenerateSummary) => void;
}

export class GenerationManager extends EventEmitter<GenerationManagerEvents> {
  /**
   * 대상 플랫폼 요구사항 생성
   */
  createRequirements(platform: string, args: PlatformArgs): PlatformIdentity[] {
    const factory = findPlatformFactory(platform);
    if (!factory) {
      throw new UnsupportedTargetError(
        `Unsupported platform "${platform}". Supported platforms: ${PLATFORM_KINDS.join(', ')}`
      );
    }
    return factory.fromCommandLineArgs(args);
  }

  /**
   * 패키지 디렉토리들을 읽습니다. 같은 경로는 한 번만 읽고 입력 순서를 유지합니다.
   */
  async loadPackages(packagePaths: readonly string[], concurrency = 4): Promise<Package[]> {
    if (packagePaths.length === 0) {
      throw new InvalidArgumentError('must provide at least one package');
    }

    const uniquePaths = [...new Set(packagePaths.map((p) => path.resolve(p)))];
    for (const packagePath of uniquePaths) {
      const stat = await fs.stat(packagePath).catch(() => null);
      if (!stat?.isDirectory()) {
        throw new PackageLayoutError('Package path is not a directory', packagePath);
      }
    }

    const queue = new PQueue({ concurrency });
    return Promise.all(
      uniquePaths.map((packagePath) =>
        queue.add(async () => {
          const pkg = await Package.load(packagePath);
          this.emit('packageLoaded', pkg);
          return pkg;
        })
      )
    );
  }

  /**
   * 패키지 이름 중복과 알 수 없는 의존성을 검사합니다.
   */
  validatePackages(packages: readonly Package[]): void {
    const seen = new Map<string, Package>();
    for (const pkg of packages) {
      const existing = seen.get(pkg.name);
      if (existing) {
        throw new DuplicatePackageNameError(pkg.name, pkg.path, existing.path);
      }
      seen.set(pkg.name, pkg);
    }

    for (const pkg of packages) {
      for (const dependency of pkg.dependencies) {
        if (!seen.has(dependency)) {
          throw new UnknownDependencyError(pkg.name, dependency);
        }
      }
    }
  }

  /**
   * 패키지를 읽고 검증한 뒤 빌드 시스템 통합 파일을 생성합니다.
   */
  async generate(options: GenerateOptions): Promise<GenerateSummary> {
    const startTime = Date.now();

    const requirements = this.createRequirements(options.platform, options.platformArgs);
    if (!findBuildSystem(options.buildSystem)) {
      throw new UnknownBuildSystemError(options.buildSystem, getBuildSystemIds());
    }

    const packages = await this.loadPackages(options.packagePaths, options.concurrency);
    this.validatePackages(packages);

    logger.info('빌드 시스템 통합 생성 시작', {
      buildSystem: options.buildSystem,
      packages: packages.map((p) => p.name),
      requirements: requirements.map((r) => r.toString()),
    });

    const generator = createBuildSystem(options.buildSystem, options.outputPath, packages);
    const result = await generator.generate(requirements);

    const summary: GenerateSummary = {
      ...result,
      buildSystem: options.buildSystem,
      outputPath: options.outputPath,
      packages: packages.map((p) => p.name),
      requirements: requirements.map((r) => r.toString()),
      duration: Date.now() - startTime,
    };
    this.emit('complete', summary);
    return summary;
  }
}

// 싱글톤 인스턴스
let generationManagerInstance: GenerationManager | null = null;

export function getGenerationManager(): GenerationManager {
  if (!generationManagerInstance) {
    generationManagerInstance = new GenerationManager();
  }
  return generationManagerInstance;
}
