/**
 * 프리빌트 패키지 (prefab.json + modules/)
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { PackageLayoutError } from '../errors';
import { PackageMetadataV1, packageMetadataLoader } from '../metadata/package-metadata';
import { SchemaVersion, readSchemaVersion } from '../metadata/schema-version';
import { Module, listDirectories } from './module';
import logger from '../../utils/logger';

export class Package {
  constructor(
    readonly path: string,
    readonly schemaVersion: SchemaVersion,
    private readonly metadata: PackageMetadataV1,
    /** 모듈 디렉토리 이름 순 */
    readonly modules: readonly Module[]
  ) {}

  get name(): string {
    return this.metadata.name;
  }

  /** 이 패키지가 필요로 하는 다른 패키지 이름 */
  get dependencies(): readonly string[] {
    return this.metadata.dependencies;
  }

  get version(): string | undefined {
    return this.metadata.version;
  }

  toString(): string {
    return `${this.name} (${this.path})`;
  }

  /**
   * 패키지 디렉토리를 읽습니다.
   * prefab.json의 schema_version을 먼저 읽어 나머지 메타데이터의 형태를 결정합니다.
   */
  static async load(packagePath: string): Promise<Package> {
    const schemaVersion = await readSchemaVersion(packagePath);
    const metadata = await packageMetadataLoader.loadAndMigrate(schemaVersion, packagePath, undefined);

    const modulesDir = path.join(packagePath, 'modules');
    if (!(await fs.pathExists(modulesDir))) {
      throw new PackageLayoutError('Package has no modules directory', modulesDir);
    }

    const modules: Module[] = [];
    for (const name of await listDirectories(modulesDir)) {
      modules.push(await Module.load(path.join(modulesDir, name), metadata.name, schemaVersion));
    }

    logger.debug('패키지 로드 완료', {
      name: metadata.name,
      schemaVersion,
      modules: modules.map((m) => m.name),
    });
    return new Package(packagePath, schemaVersion, metadata, modules);
  }
}
