import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as path from 'path';
import { CMakeGenerator, renderVersionFile } from './cmakeGenerator';
import { Package } from '../package/package';
import { Android, abiFromString, stlFromString } from '../platform/android';
import { UnsupportedTargetError } from '../errors';
import { createTempDir, removeTempDir, writePackage } from '../../test-utils/package-fixtures';

function x86(api = 21): Android {
  return new Android(abiFromString('x86'), api, stlFromString('c++_shared'), 21);
}

describe('CMakeGenerator', () => {
  let tempDir: string;
  let outputDir: string;
  let fooPath: string;
  let barPath: string;
  let packages: Package[];

  beforeEach(async () => {
    tempDir = await createTempDir();
    outputDir = path.join(tempDir, 'out');
    fooPath = await writePackage(path.join(tempDir, 'packages'), {
      name: 'foo',
      version: '1.2.3',
      dependencies: ['bar'],
      modules: [
        {
          name: 'lib',
          exportLibraries: ['-landroid', ':hdr', '//bar:qux'],
          variants: [
            { platform: 'android', directory: 'android.x86', abi: 'x86', api: 21, ndk: 21, stl: 'c++_shared', static: true },
          ],
        },
        { name: 'hdr' },
        {
          name: 'arm',
          variants: [
            { platform: 'android', directory: 'android.arm64', abi: 'arm64-v8a', api: 21, ndk: 21, stl: 'c++_shared' },
          ],
        },
      ],
    });
    barPath = await writePackage(path.join(tempDir, 'packages'), {
      name: 'bar',
      modules: [
        {
          name: 'qux',
          variants: [
            { platform: 'android', directory: 'android.x86', abi: 'x86', api: 19, ndk: 21, stl: 'c++_shared', include: true },
          ],
        },
      ],
    });
    packages = [await Package.load(fooPath), await Package.load(barPath)];
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  it('패키지별 설정 파일과 버전 파일 생성', async () => {
    const generator = new CMakeGenerator(outputDir, packages);
    const result = await generator.generate([x86()]);

    expect(result.files).toEqual([
      path.join(outputDir, 'foo-config.cmake'),
      path.join(outputDir, 'foo-config-version.cmake'),
      path.join(outputDir, 'bar-config.cmake'),
    ]);

    const fooConfig = await fs.readFile(path.join(outputDir, 'foo-config.cmake'), 'utf-8');
    expect(fooConfig).toBe(
      [
        'find_package(bar REQUIRED)',
        '',
        'add_library(foo::hdr INTERFACE)',
        'set_target_properties(foo::hdr PROPERTIES',
        `    INTERFACE_INCLUDE_DIRECTORIES "${fooPath}/modules/hdr/include"`,
        '    INTERFACE_LINK_LIBRARIES ""',
        ')',
        '',
        'add_library(foo::lib STATIC IMPORTED)',
        'set_target_properties(foo::lib PROPERTIES',
        `    IMPORTED_LOCATION "${fooPath}/modules/lib/libs/android.x86/liblib.a"`,
        `    INTERFACE_INCLUDE_DIRECTORIES "${fooPath}/modules/lib/include"`,
        '    INTERFACE_LINK_LIBRARIES "-landroid;foo::hdr;bar::qux"',
        ')',
        '',
      ].join('\n') + '\n'
    );

    const barConfig = await fs.readFile(path.join(outputDir, 'bar-config.cmake'), 'utf-8');
    expect(barConfig).toBe(
      [
        'add_library(bar::qux SHARED IMPORTED)',
        'set_target_properties(bar::qux PROPERTIES',
        `    IMPORTED_LOCATION "${barPath}/modules/qux/libs/android.x86/libqux.so"`,
        `    INTERFACE_INCLUDE_DIRECTORIES "${barPath}/modules/qux/libs/android.x86/include"`,
        '    INTERFACE_LINK_LIBRARIES ""',
        ')',
        '',
      ].join('\n') + '\n'
    );

    const versionFile = await fs.readFile(path.join(outputDir, 'foo-config-version.cmake'), 'utf-8');
    expect(versionFile).toBe(renderVersionFile('1.2.3'));
    expect(await fs.pathExists(path.join(outputDir, 'bar-config-version.cmake'))).toBe(false);
  });

  it('호환되는 라이브러리가 없는 모듈은 건너뛰고 기록', async () => {
    const result = await new CMakeGenerator(outputDir, packages).generate([x86()]);

    expect(result.skipped).toEqual([
      {
        module: '//foo/arm',
        requirement: 'Android(x86, 21, c++_shared)',
        reason:
          'No compatible library found for //foo/arm. Rejected the following libraries:\n' +
          'android.arm64: User is targeting x86 but library is for arm64-v8a',
      },
    ]);
  });

  it('모든 모듈을 건너뛰어도 설정 파일은 생성', async () => {
    const arm = new Android(abiFromString('armeabi-v7a'), 21, stlFromString('c++_shared'), 21);
    const result = await new CMakeGenerator(outputDir, [packages[1]]).generate([arm]);

    expect(result.skipped).toHaveLength(1);
    expect(await fs.readFile(path.join(outputDir, 'bar-config.cmake'), 'utf-8')).toBe('');
  });

  it('출력 디렉토리의 기존 파일 제거', async () => {
    await fs.outputFile(path.join(outputDir, 'stale.cmake'), 'old');
    await new CMakeGenerator(outputDir, packages).generate([x86()]);

    expect(await fs.pathExists(path.join(outputDir, 'stale.cmake'))).toBe(false);
  });

  it('요구사항이 하나가 아니면 UnsupportedTargetError', async () => {
    const generator = new CMakeGenerator(outputDir, packages);
    await expect(generator.generate([x86(), x86(24)])).rejects.toThrow(UnsupportedTargetError);
    await expect(generator.generate([])).rejects.toThrow(
      'CMake cannot generate multiple targets to a single directory'
    );
  });

  it('renderVersionFile', () => {
    expect(renderVersionFile('2.0')).toBe(
      'set(PACKAGE_VERSION 2.0)\n' +
        'if("${PACKAGE_VERSION}" VERSION_LESS "${PACKAGE_FIND_VERSION}")\n' +
        '    set(PACKAGE_VERSION_COMPATIBLE FALSE)\n' +
        'else()\n' +
        '    set(PACKAGE_VERSION_COMPATIBLE TRUE)\n' +
        '    if("${PACKAGE_VERSION}" VERSION_EQUAL "${PACKAGE_FIND_VERSION}")\n' +
        '        set(PACKAGE_VERSION_EXACT TRUE)\n' +
        '    endif()\n' +
        'endif()\n'
    );
  });
});
