/**
 * Android abi.json (라이브러리 디렉토리별 플랫폼 메타데이터)
 *
 * V1에는 static 여부가 없어 디렉토리의 라이브러리 파일 확장자로 추론합니다.
 * V2는 `static` 필드를 기록하므로 라이브러리가 아직 빌드되지 않았어도 읽을 수 있습니다.
 */

import type { ModuleDescriptor } from '../package/module';
import { findElfLibrary, isStaticLibraryPath } from '../package/elf';
import {
  MetadataLoader,
  VersionedMetadataLoader,
  optionalBoolean,
  readJsonObject,
  requireInteger,
  requireString,
} from './metadata-loader';
import type { SchemaVersion } from './schema-version';

export const ABI_METADATA_FILE = 'abi.json';

export interface AndroidAbiMetadataV1 {
  readonly schemaVersion: 1;
  /** ABI 이름 (armeabi-v7a, arm64-v8a, x86, x86_64) */
  readonly abi: string;
  /** 라이브러리의 minSdkVersion */
  readonly api: number;
  /** 빌드에 사용한 NDK 메이저 버전 */
  readonly ndk: number;
  readonly stl: string;
}

export interface AndroidAbiMetadataV2 {
  readonly schemaVersion: 2;
  readonly abi: string;
  readonly api: number;
  readonly ndk: number;
  readonly stl: string;
  /** 정적 라이브러리 여부 (JSON의 `static`, 기본 false) */
  readonly isStatic: boolean;
}

export type AndroidAbiMetadata = AndroidAbiMetadataV1 | AndroidAbiMetadataV2;

/** V1 → V2 마이그레이션에 필요한 정보 */
export interface AbiMigrationContext {
  /** 라이브러리가 속한 모듈 (라이브러리 파일 이름 결정용) */
  readonly module: ModuleDescriptor;
}

export const androidAbiMetadataV1Loader: VersionedMetadataLoader<AndroidAbiMetadataV1> = {
  async load(directory: string): Promise<AndroidAbiMetadataV1> {
    const { filePath, data } = await readJsonObject(directory, ABI_METADATA_FILE);
    return {
      schemaVersion: 1,
      abi: requireString(data, 'abi', filePath),
      api: requireInteger(data, 'api', filePath),
      ndk: requireInteger(data, 'ndk', filePath),
      stl: requireString(data, 'stl', filePath),
    };
  },
};

export const androidAbiMetadataV2Loader: VersionedMetadataLoader<AndroidAbiMetadataV2> = {
  async load(directory: string): Promise<AndroidAbiMetadataV2> {
    const { filePath, data } = await readJsonObject(directory, ABI_METADATA_FILE);
    return {
      schemaVersion: 2,
      abi: requireString(data, 'abi', filePath),
      api: requireInteger(data, 'api', filePath),
      ndk: requireInteger(data, 'ndk', filePath),
      stl: requireString(data, 'stl', filePath),
      isStatic: optionalBoolean(data, 'static', filePath) ?? false,
    };
  },
};

const ABI_METADATA_LOADERS: Readonly<Record<SchemaVersion, VersionedMetadataLoader<AndroidAbiMetadata>>> = {
  1: androidAbiMetadataV1Loader,
  2: androidAbiMetadataV2Loader,
};

/**
 * 디스크 레코드를 최신(V2) 형태로 마이그레이션합니다.
 * V1은 라이브러리 파일을 찾아야 하므로 디렉토리와 모듈 정보가 필요합니다.
 */
export async function migrateAndroidAbiMetadata(
  metadata: AndroidAbiMetadata,
  directory: string,
  context: AbiMigrationContext
): Promise<AndroidAbiMetadataV2> {
  switch (metadata.schemaVersion) {
    case 1: {
      const library = await findElfLibrary(directory, context.module.libraryNameForPlatform('android'));
      return {
        schemaVersion: 2,
        abi: metadata.abi,
        api: metadata.api,
        ndk: metadata.ndk,
        stl: metadata.stl,
        isStatic: isStaticLibraryPath(library),
      };
    }
    case 2:
      return { ...metadata };
  }
}

export const androidAbiMetadataLoader: MetadataLoader<AndroidAbiMetadata, AndroidAbiMetadataV2, AbiMigrationContext> = {
  loaderFor(schemaVersion) {
    return ABI_METADATA_LOADERS[schemaVersion];
  },

  async loadAndMigrate(schemaVersion, directory, context) {
    const diskMetadata = await this.loaderFor(schemaVersion).load(directory);
    return migrateAndroidAbiMetadata(diskMetadata, directory, context);
  },
};
