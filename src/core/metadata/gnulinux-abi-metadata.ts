/**
 * GNU/Linux abi.json
 */

import { MetadataLoader, VersionedMetadataLoader, readJsonObject, requireString } from './metadata-loader';
import { ABI_METADATA_FILE } from './android-abi-metadata';
import type { SchemaVersion } from './schema-version';

export interface GnuLinuxAbiMetadataV1 {
  /** 아키텍처 이름 (amd64, arm64, armhf, i386, ppc64el) */
  readonly arch: string;
  /** major.minor 형식의 glibc 버전 */
  readonly glibcVersion: string;
}

export const gnuLinuxAbiMetadataV1Loader: VersionedMetadataLoader<GnuLinuxAbiMetadataV1> = {
  async load(directory: string): Promise<GnuLinuxAbiMetadataV1> {
    const { filePath, data } = await readJsonObject(directory, ABI_METADATA_FILE);
    return {
      arch: requireString(data, 'arch', filePath),
      glibcVersion: requireString(data, 'glibc_version', filePath),
    };
  },
};

const GNULINUX_ABI_METADATA_LOADERS: Readonly<Record<SchemaVersion, VersionedMetadataLoader<GnuLinuxAbiMetadataV1>>> = {
  1: gnuLinuxAbiMetadataV1Loader,
  2: gnuLinuxAbiMetadataV1Loader,
};

export const gnuLinuxAbiMetadataLoader: MetadataLoader<GnuLinuxAbiMetadataV1, GnuLinuxAbiMetadataV1, void> = {
  loaderFor(schemaVersion) {
    return GNULINUX_ABI_METADATA_LOADERS[schemaVersion];
  },

  async loadAndMigrate(schemaVersion, directory) {
    return this.loaderFor(schemaVersion).load(directory);
  },
};
