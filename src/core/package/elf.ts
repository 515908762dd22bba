import * as fs from 'fs-extra';
import * as path from 'path';
import { LibraryArtifactError } from '../errors';

/** ELF 라이브러리 확장자 */
export const STATIC_LIBRARY_EXTENSION = '.a';
export const SHARED_LIBRARY_EXTENSION = '.so';

/**
 * 라이브러리 디렉토리에서 `<name>.a` 또는 `<name>.so` 중 정확히 하나를 찾습니다.
 */
export async function findElfLibrary(directory: string, name: string): Promise<string> {
  const candidates = [
    path.join(directory, `${name}${STATIC_LIBRARY_EXTENSION}`),
    path.join(directory, `${name}${SHARED_LIBRARY_EXTENSION}`),
  ];
  const found: string[] = [];
  for (const candidate of candidates) {
    if (await fs.pathExists(candidate)) {
      found.push(candidate);
    }
  }

  if (found.length > 1) {
    throw new LibraryArtifactError('Prebuilt directory contains multiple library artifacts', directory);
  }
  if (found.length === 0) {
    throw new LibraryArtifactError('Prebuilt directory contains no library artifacts', directory);
  }
  return found[0];
}

export function isStaticLibraryPath(libraryPath: string): boolean {
  return path.extname(libraryPath) === STATIC_LIBRARY_EXTENSION;
}
