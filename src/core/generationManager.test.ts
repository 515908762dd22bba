import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as path from 'path';
import { GenerationManager, GenerateSummary } from './generationManager';
import { Package } from './package/package';
import { ANDROID_ABIS } from './platform/android';
import {
  DuplicatePackageNameError,
  InvalidArgumentError,
  PackageLayoutError,
  UnknownBuildSystemError,
  UnknownDependencyError,
  UnsupportedTargetError,
} from './errors';
import { createTempDir, removeTempDir, writePackage } from '../test-utils/package-fixtures';

describe('GenerationManager', () => {
  let tempDir: string;
  let manager: GenerationManager;

  beforeEach(async () => {
    tempDir = await createTempDir();
    manager = new GenerationManager();
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  describe('createRequirements', () => {
    it('알 수 없는 플랫폼은 UnsupportedTargetError', () => {
      expect(() => manager.createRequirements('ios', {})).toThrow(
        'Unsupported platform "ios". Supported platforms: android, gnulinux'
      );
    });

    it('Android ABI를 지정하지 않으면 모든 ABI', () => {
      const requirements = manager.createRequirements('android', { osVersion: '21' });
      expect(requirements).toHaveLength(ANDROID_ABIS.length);
    });
  });

  describe('loadPackages', () => {
    it('패키지가 없으면 InvalidArgumentError', async () => {
      await expect(manager.loadPackages([])).rejects.toThrow(InvalidArgumentError);
    });

    it('같은 경로는 한 번만 읽고 순서 유지', async () => {
      const foo = await writePackage(tempDir, { name: 'foo', modules: [] });
      const bar = await writePackage(tempDir, { name: 'bar', modules: [] });
      const loaded: string[] = [];
      manager.on('packageLoaded', (pkg: Package) => loaded.push(pkg.name));

      const packages = await manager.loadPackages([foo, bar, path.join(foo, '.')], 1);

      expect(packages.map((p) => p.name)).toEqual(['foo', 'bar']);
      expect(loaded).toEqual(['foo', 'bar']);
    });

    it('디렉토리가 아니면 PackageLayoutError', async () => {
      const missing = path.join(tempDir, 'missing');
      await expect(manager.loadPackages([missing])).rejects.toThrow(PackageLayoutError);
      await expect(manager.loadPackages([missing])).rejects.toThrow(`Package path is not a directory: ${missing}`);
    });
  });

  describe('validatePackages', () => {
    it('이름이 같은 패키지는 DuplicatePackageNameError', async () => {
      const first = await writePackage(path.join(tempDir, 'a'), { name: 'foo', modules: [] });
      const second = await writePackage(path.join(tempDir, 'b'), { name: 'foo', modules: [] });
      const packages = await manager.loadPackages([first, second]);

      expect(() => manager.validatePackages(packages)).toThrow(DuplicatePackageNameError);
      expect(() => manager.validatePackages(packages)).toThrow(
        `Multiple packages named foo found: ${second} and ${first}.`
      );
    });

    it('주어지지 않은 의존성은 UnknownDependencyError', async () => {
      const foo = await writePackage(tempDir, { name: 'foo', dependencies: ['bar'], modules: [] });
      const packages = await manager.loadPackages([foo]);

      expect(() => manager.validatePackages(packages)).toThrow(UnknownDependencyError);
      expect(() => manager.validatePackages(packages)).toThrow('foo depends on unknown dependency bar');
    });
  });

  describe('generate', () => {
    it('알 수 없는 빌드 시스템은 패키지를 읽기 전에 거부', async () => {
      await expect(
        manager.generate({
          buildSystem: 'meson',
          outputPath: path.join(tempDir, 'out'),
          platform: 'android',
          packagePaths: [path.join(tempDir, 'missing')],
          platformArgs: { osVersion: '21' },
        })
      ).rejects.toThrow(UnknownBuildSystemError);
    });

    it('GNU/Linux 대상 CMake 파일 생성', async () => {
      const zlib = await writePackage(path.join(tempDir, 'packages'), {
        name: 'zlib',
        modules: [
          {
            name: 'z',
            variants: [
              { platform: 'gnulinux', directory: 'gnulinux.arm64', arch: 'arm64', glibcVersion: '2.31' },
              { platform: 'gnulinux', directory: 'gnulinux.new', arch: 'amd64', glibcVersion: '2.31' },
              { platform: 'gnulinux', directory: 'gnulinux.newest', arch: 'amd64', glibcVersion: '2.35' },
              { platform: 'gnulinux', directory: 'gnulinux.old', arch: 'amd64', glibcVersion: '2.27' },
            ],
          },
        ],
      });
      const outputPath = path.join(tempDir, 'out');
      const completed: GenerateSummary[] = [];
      manager.on('complete', (summary: GenerateSummary) => completed.push(summary));

      const summary = await manager.generate({
        buildSystem: 'cmake',
        outputPath,
        platform: 'gnulinux',
        packagePaths: [zlib],
        platformArgs: { abi: 'amd64', osVersion: '2.31' },
      });

      const configFile = path.join(outputPath, 'zlib-config.cmake');
      expect(summary.buildSystem).toBe('cmake');
      expect(summary.packages).toEqual(['zlib']);
      expect(summary.requirements).toEqual(['GnuLinux(amd64, 2.31)']);
      expect(summary.files).toEqual([configFile]);
      expect(summary.skipped).toEqual([]);
      expect(completed).toEqual([summary]);

      expect(await fs.readFile(configFile, 'utf-8')).toBe(
        [
          'add_library(zlib::z SHARED IMPORTED)',
          'set_target_properties(zlib::z PROPERTIES',
          `    IMPORTED_LOCATION "${zlib}/modules/z/libs/gnulinux.new/libz.so"`,
          `    INTERFACE_INCLUDE_DIRECTORIES "${zlib}/modules/z/include"`,
          '    INTERFACE_LINK_LIBRARIES ""',
          ')',
          '',
        ].join('\n') + '\n'
      );
    });

    it('CMake는 여러 ABI 대상을 거부', async () => {
      const foo = await writePackage(tempDir, { name: 'foo', modules: [] });
      await expect(
        manager.generate({
          buildSystem: 'cmake',
          outputPath: path.join(tempDir, 'out'),
          platform: 'android',
          packagePaths: [foo],
          platformArgs: { osVersion: '21' },
        })
      ).rejects.toThrow(UnsupportedTargetError);
    });
  });
});
