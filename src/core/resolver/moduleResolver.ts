/**
 * 모듈 단위 라이브러리 해석
 *
 * 모듈의 라이브러리 변형을 사용자 요구사항으로 걸러낸 뒤 최적의 하나를 고릅니다.
 * 호환되는 변형이 없으면 모든 거부 사유를 담은 NoMatchingLibraryError를 던집니다.
 */

import { InvalidArgumentError, LibraryRejection, NoMatchingLibraryError } from '../errors';
import type { Module } from '../package/module';
import type { PrebuiltLibrary } from '../package/prebuilt-library';
import type { LibraryUsabilityResult, PlatformIdentity } from '../platform/types';
import logger from '../../utils/logger';

export function checkIfUsable(requirement: PlatformIdentity, candidate: PrebuiltLibrary): LibraryUsabilityResult {
  return requirement.checkIfUsable(candidate);
}

export function findBestMatch(requirement: PlatformIdentity, candidates: readonly PrebuiltLibrary[]): PrebuiltLibrary {
  return requirement.findBestMatch(candidates);
}

/**
 * 사용자 요구사항에 맞는 모듈의 라이브러리를 찾습니다.
 * 헤더 전용 모듈은 호출 전에 걸러야 합니다.
 */
export function resolveLibrary(module: Module, requirement: PlatformIdentity): PrebuiltLibrary {
  if (module.isHeaderOnly) {
    throw new InvalidArgumentError(`${module.canonicalName} is header only and has no libraries to resolve`, {
      module: module.canonicalName,
    });
  }

  const compatible: PrebuiltLibrary[] = [];
  const rejections: LibraryRejection[] = [];
  for (const library of module.libraries) {
    const result = requirement.checkIfUsable(library);
    if (result.type === 'compatible') {
      compatible.push(library);
    } else {
      rejections.push({ library, reason: result.reason });
    }
  }

  if (compatible.length === 0) {
    throw new NoMatchingLibraryError(module, rejections);
  }

  const selected = requirement.findBestMatch(compatible);
  logger.debug('라이브러리 선택', {
    module: module.canonicalName,
    requirement: requirement.toString(),
    library: selected.path,
    candidates: compatible.length,
    rejected: rejections.length,
  });
  return selected;
}

export type ResolutionOutcome =
  | { readonly type: 'resolved'; readonly requirement: PlatformIdentity; readonly library: PrebuiltLibrary }
  | { readonly type: 'unresolved'; readonly requirement: PlatformIdentity; readonly error: NoMatchingLibraryError };

/**
 * resolveLibrary와 같지만 호환되는 라이브러리가 없으면 예외 대신 거부 정보를 반환합니다.
 * 모듈 불일치(중복/누락 변형) 오류는 그대로 던집니다.
 */
export function tryResolveLibrary(module: Module, requirement: PlatformIdentity): ResolutionOutcome {
  try {
    return { type: 'resolved', requirement, library: resolveLibrary(module, requirement) };
  } catch (error) {
    if (error instanceof NoMatchingLibraryError) {
      return { type: 'unresolved', requirement, error };
    }
    throw error;
  }
}
