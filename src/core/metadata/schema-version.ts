/**
 * 패키지 스키마 버전
 *
 * - 1: 최초 스키마. abi.json에 static 여부가 없어 라이브러리 파일 확장자로 판단
 * - 2: abi.json에 `static` 필드 추가. 라이브러리가 빌드되기 전에도 처리 가능
 */

import { MetadataError } from '../errors';
import { readJsonObject, requireInteger } from './metadata-loader';

export type SchemaVersion = 1 | 2;

export const SCHEMA_VERSIONS: readonly SchemaVersion[] = [1, 2];

export const LATEST_SCHEMA_VERSION: SchemaVersion = 2;

/** 패키지 메타데이터 파일 이름 */
export const PACKAGE_METADATA_FILE = 'prefab.json';

/**
 * 정수 버전을 SchemaVersion으로 변환합니다.
 */
export function schemaVersionFrom(version: number, filePath?: string): SchemaVersion {
  const found = SCHEMA_VERSIONS.find((v) => v === version);
  if (found === undefined) {
    throw new MetadataError(
      `schema_version must be between ${SCHEMA_VERSIONS[0]} and ${LATEST_SCHEMA_VERSION}. ` +
        `Package uses version ${version}.`,
      filePath
    );
  }
  return found;
}

/**
 * 패키지 디렉토리의 prefab.json에서 schema_version만 읽습니다.
 * 버전을 알아야 어떤 형태로 나머지를 읽을지 정할 수 있으므로 별도로 처리합니다.
 */
export async function readSchemaVersion(packageDirectory: string): Promise<SchemaVersion> {
  const { filePath, data } = await readJsonObject(packageDirectory, PACKAGE_METADATA_FILE);
  return schemaVersionFrom(requireInteger(data, 'schema_version', filePath), filePath);
}
