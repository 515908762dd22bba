/**
 * module.json (모듈 메타데이터)
 */

import { MetadataError } from '../errors';
import {
  JsonObject,
  MetadataLoader,
  VersionedMetadataLoader,
  isJsonObject,
  optionalString,
  optionalStringArray,
  readJsonObject,
  requireStringArray,
} from './metadata-loader';
import type { SchemaVersion } from './schema-version';

export const MODULE_METADATA_FILE = 'module.json';

/**
 * 플랫폼별로 덮어쓸 수 있는 모듈 메타데이터
 */
export interface PlatformSpecificModuleMetadataV1 {
  readonly exportLibraries?: readonly string[];
  readonly libraryName?: string;
}

/**
 * module.json V1
 * 스키마 1, 2 모두 같은 형태를 사용합니다.
 */
export interface ModuleMetadataV1 {
  /** 이 모듈 외에 사용자가 함께 링크해야 하는 라이브러리 참조 */
  readonly exportLibraries: readonly string[];
  /** 확장자를 제외한 라이브러리 파일 이름 */
  readonly libraryName?: string;
  readonly android: PlatformSpecificModuleMetadataV1;
  readonly gnulinux: PlatformSpecificModuleMetadataV1;
}

function parsePlatformSection(data: JsonObject, key: string, filePath: string): PlatformSpecificModuleMetadataV1 {
  const section = data[key];
  if (section === undefined || section === null) {
    return {};
  }
  if (!isJsonObject(section)) {
    throw new MetadataError(`"${key}" must be an object`, filePath);
  }
  return {
    exportLibraries: optionalStringArray(section, 'export_libraries', filePath),
    libraryName: optionalString(section, 'library_name', filePath),
  };
}

export const moduleMetadataV1Loader: VersionedMetadataLoader<ModuleMetadataV1> = {
  async load(directory: string): Promise<ModuleMetadataV1> {
    const { filePath, data } = await readJsonObject(directory, MODULE_METADATA_FILE);
    return {
      exportLibraries: requireStringArray(data, 'export_libraries', filePath),
      libraryName: optionalString(data, 'library_name', filePath),
      android: parsePlatformSection(data, 'android', filePath),
      gnulinux: parsePlatformSection(data, 'gnulinux', filePath),
    };
  },
};

const MODULE_METADATA_LOADERS: Readonly<Record<SchemaVersion, VersionedMetadataLoader<ModuleMetadataV1>>> = {
  1: moduleMetadataV1Loader,
  2: moduleMetadataV1Loader,
};

export const moduleMetadataLoader: MetadataLoader<ModuleMetadataV1, ModuleMetadataV1, void> = {
  loaderFor(schemaVersion) {
    return MODULE_METADATA_LOADERS[schemaVersion];
  },

  async loadAndMigrate(schemaVersion, directory) {
    return this.loaderFor(schemaVersion).load(directory);
  },
};
