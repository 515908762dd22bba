import { UnknownBuildSystemError } from '../errors';
import type { Package } from '../package/package';
import type { BuildSystemFactory, BuildSystemGenerator } from './buildSystem';
import { cmakeFactory } from './cmakeGenerator';
import { ndkBuildFactory } from './ndkBuildGenerator';

const BUILD_SYSTEMS: readonly BuildSystemFactory[] = [cmakeFactory, ndkBuildFactory];

export function getBuildSystemIds(): string[] {
  return BUILD_SYSTEMS.map((factory) => factory.identifier);
}

export function findBuildSystem(identifier: string): BuildSystemFactory | undefined {
  return BUILD_SYSTEMS.find((factory) => factory.identifier === identifier);
}

/**
 * --build-system 이름으로 생성기를 만듭니다.
 */
export function createBuildSystem(
  identifier: string,
  outputDirectory: string,
  packages: readonly Package[]
): BuildSystemGenerator {
  const factory = findBuildSystem(identifier);
  if (!factory) {
    throw new UnknownBuildSystemError(identifier, getBuildSystemIds());
  }
  return factory.create(outputDirectory, packages);
}
