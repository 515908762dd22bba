import { androidFactory } from './android';
import { gnuLinuxFactory } from './gnu-linux';
import type { PlatformFactory, PlatformKind } from './types';

/** 라이브러리 디렉토리 이름의 플랫폼 ID → 팩토리 */
export const PLATFORM_FACTORIES: Readonly<Record<PlatformKind, PlatformFactory>> = {
  android: androidFactory,
  gnulinux: gnuLinuxFactory,
};

export const PLATFORM_KINDS: readonly PlatformKind[] = ['android', 'gnulinux'];

export function isPlatformKind(value: string): value is PlatformKind {
  return PLATFORM_KINDS.some((kind) => kind === value);
}

export function findPlatformFactory(identifier: string): PlatformFactory | undefined {
  return isPlatformKind(identifier) ? PLATFORM_FACTORIES[identifier] : undefined;
}
