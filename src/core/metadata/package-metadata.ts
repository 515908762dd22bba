/**
 * prefab.json (패키지 메타데이터)
 */

import { MetadataError } from '../errors';
import {
  MetadataLoader,
  VersionedMetadataLoader,
  optionalString,
  readJsonObject,
  requireInteger,
  requireString,
  requireStringArray,
} from './metadata-loader';
import { PACKAGE_METADATA_FILE, SchemaVersion } from './schema-version';

/**
 * 패키지 메타데이터 V1
 * 스키마 1, 2 모두 같은 형태를 사용합니다.
 */
export interface PackageMetadataV1 {
  readonly name: string;
  readonly schemaVersion: number;
  /** 이 패키지가 필요로 하는 다른 패키지 이름 */
  readonly dependencies: readonly string[];
  /** CMake 호환을 위해 major[.minor[.patch[.tweak]]] 숫자 형식이어야 함 */
  readonly version?: string;
}

const PACKAGE_VERSION_PATTERN = /^\d+(\.\d+){0,3}$/;

export const packageMetadataV1Loader: VersionedMetadataLoader<PackageMetadataV1> = {
  async load(directory: string): Promise<PackageMetadataV1> {
    const { filePath, data } = await readJsonObject(directory, PACKAGE_METADATA_FILE);
    const version = optionalString(data, 'version', filePath);
    if (version !== undefined && !PACKAGE_VERSION_PATTERN.test(version)) {
      throw new MetadataError(
        `version must be formatted as major[.minor[.patch[.tweak]]] with all components numeric, got "${version}"`,
        filePath
      );
    }
    return {
      name: requireString(data, 'name', filePath),
      schemaVersion: requireInteger(data, 'schema_version', filePath),
      dependencies: requireStringArray(data, 'dependencies', filePath),
      version,
    };
  },
};

const PACKAGE_METADATA_LOADERS: Readonly<Record<SchemaVersion, VersionedMetadataLoader<PackageMetadataV1>>> = {
  1: packageMetadataV1Loader,
  2: packageMetadataV1Loader,
};

export const packageMetadataLoader: MetadataLoader<PackageMetadataV1, PackageMetadataV1, void> = {
  loaderFor(schemaVersion) {
    return PACKAGE_METADATA_LOADERS[schemaVersion];
  },

  async loadAndMigrate(schemaVersion, directory) {
    return this.loaderFor(schemaVersion).load(directory);
  },
};
