import { describe, it, expect } from 'vitest';
import * as path from 'path';
import { Android, ANDROID_ABIS, abiFromString, androidFactory, stlFromString } from './android';
import { GnuLinux } from './gnu-linux';
import { memoryLibrary, memoryModule } from '../../test-utils/package-fixtures';
import {
  InvalidArgumentError,
  MissingToolchainVariantError,
  ParseError,
  RedundantLibrariesError,
  UnsupportedTargetError,
} from '../errors';
import type { PrebuiltLibrary } from '../package/prebuilt-library';

const arm32 = abiFromString('armeabi-v7a');
const arm64 = abiFromString('arm64-v8a');
const x86 = abiFromString('x86');
const x86_64 = abiFromString('x86_64');

const cxxShared = stlFromString('c++_shared');
const cxxStatic = stlFromString('c++_static');
const gnustlShared = stlFromString('gnustl_shared');
const none = stlFromString('none');
const system = stlFromString('system');

const module = memoryModule('foo', 'bar');
const moduleDir = path.join('/packages', 'foo', 'modules', 'bar');

function library(directory: string, platform: Android): PrebuiltLibrary {
  return memoryLibrary(module, directory, platform);
}

function compatibleOnly(requirement: Android, libraries: PrebuiltLibrary[]): PrebuiltLibrary[] {
  return libraries.filter((lib) => requirement.checkIfUsable(lib).type === 'compatible');
}

describe('Android', () => {
  describe('ABI / STL 토큰', () => {
    it('ABI 이름과 target triple', () => {
      expect(ANDROID_ABIS.map((abi) => abi.targetArchAbi)).toEqual(['armeabi-v7a', 'arm64-v8a', 'x86', 'x86_64']);
      expect(arm32.triple).toBe('arm-linux-androideabi');
      expect(arm64.triple).toBe('aarch64-linux-android');
      expect(x86.triple).toBe('i686-linux-android');
      expect(x86_64.triple).toBe('x86_64-linux-android');
    });

    it('STL 패밀리와 링크 방식', () => {
      expect(cxxShared).toEqual({ name: 'c++_shared', family: 'libc++', isShared: true });
      expect(stlFromString('gnustl_static')).toEqual({ name: 'gnustl_static', family: 'libstdc++', isShared: false });
      expect(stlFromString('stlport_shared')).toEqual({ name: 'stlport_shared', family: 'STLport', isShared: true });
      expect(none).toEqual({ name: 'none', family: 'no STL', isShared: false });
      expect(system).toEqual({ name: 'system', family: 'no STL', isShared: true });
    });

    it('알 수 없는 ABI는 ParseError', () => {
      expect(() => abiFromString('mips')).toThrow(ParseError);
      expect(() => abiFromString('mips')).toThrow('Unknown ABI: mips');
    });

    it('알 수 없는 STL은 ParseError', () => {
      expect(() => stlFromString('libc++')).toThrow('Unknown STL: libc++');
    });
  });

  describe('유효 API 레벨', () => {
    it('64비트 ABI는 최소 21로 올림', () => {
      expect(new Android(arm64, 16, cxxShared, 21).api).toBe(21);
      expect(new Android(x86_64, 19, cxxShared, 21).api).toBe(21);
      expect(new Android(arm64, 24, cxxShared, 21).api).toBe(24);
    });

    it('32비트 ABI는 요청값 그대로', () => {
      expect(new Android(arm32, 16, cxxShared, 21).api).toBe(16);
      expect(new Android(x86, 16, cxxShared, 21).api).toBe(16);
    });

    it('toString은 유효 API 레벨을 표시', () => {
      expect(new Android(arm64, 16, cxxShared, 21).toString()).toBe('Android(arm64-v8a, 21, c++_shared)');
      expect(new Android(arm64, 16, cxxShared, 21).targetTriple).toBe('aarch64-linux-android');
    });
  });

  describe('checkIfUsable', () => {
    it('Android가 아닌 라이브러리는 거부', () => {
      const linuxLib = memoryLibrary(module, 'gnulinux.amd64', new GnuLinux('amd64', { major: 2, minor: 17 }));
      expect(new Android(arm64, 21, cxxShared, 21).checkIfUsable(linuxLib)).toEqual({
        type: 'incompatible',
        reason: 'Library is not an Android library',
      });
    });

    it('ABI가 다르면 양방향 모두 거부', () => {
      const arm64Lib = library('android.arm64-v8a', new Android(arm64, 21, cxxShared, 21));
      const arm32Lib = library('android.armeabi-v7a', new Android(arm32, 21, cxxShared, 21));

      expect(new Android(arm32, 21, cxxShared, 21).checkIfUsable(arm64Lib)).toEqual({
        type: 'incompatible',
        reason: 'User is targeting armeabi-v7a but library is for arm64-v8a',
      });
      expect(new Android(arm64, 21, cxxShared, 21).checkIfUsable(arm32Lib)).toEqual({
        type: 'incompatible',
        reason: 'User is targeting arm64-v8a but library is for armeabi-v7a',
      });
    });

    it('ABI는 객체가 아니라 값으로 비교', () => {
      const lib = library('android.arm64-v8a', new Android(arm64, 21, cxxShared, 21));
      const sameAbi = { targetArchAbi: 'arm64-v8a', triple: 'aarch64-linux-android', is64Bit: true };

      expect(new Android(sameAbi, 21, cxxShared, 21).checkIfUsable(lib)).toEqual({ type: 'compatible' });
    });

    it('라이브러리 API 레벨이 더 높으면 거부, 낮거나 같으면 허용', () => {
      const oldLib = library('android.old', new Android(arm32, 19, cxxShared, 21));
      const newLib = library('android.new', new Android(arm32, 21, cxxShared, 21));
      const oldUser = new Android(arm32, 19, cxxShared, 21);
      const newUser = new Android(arm32, 21, cxxShared, 21);

      expect(newUser.checkIfUsable(oldLib)).toEqual({ type: 'compatible' });
      expect(newUser.checkIfUsable(newLib)).toEqual({ type: 'compatible' });
      expect(oldUser.checkIfUsable(oldLib)).toEqual({ type: 'compatible' });
      expect(oldUser.checkIfUsable(newLib)).toEqual({
        type: 'incompatible',
        reason: 'User has minSdkVersion 19 but library was built for 21',
      });
    });

    it('64비트 사용자는 유효 API 21로 비교', () => {
      const lib = library('android.arm64-v8a', new Android(arm64, 21, cxxShared, 21));
      expect(new Android(arm64, 16, cxxShared, 21).checkIfUsable(lib)).toEqual({ type: 'compatible' });
    });
  });

  describe('STL 호환성', () => {
    const users = {
      cxxShared: new Android(arm32, 21, cxxShared, 21),
      cxxStatic: new Android(arm32, 21, cxxStatic, 21),
      gnustlShared: new Android(arm32, 21, gnustlShared, 21),
      none: new Android(arm32, 21, none, 21),
      system: new Android(arm32, 21, system, 21),
    };

    it('정적 라이브러리는 같은 패밀리의 모든 STL과 호환', () => {
      const staticLib = library('android.static', new Android(arm32, 21, cxxStatic, 21, true));
      expect(staticLib.path.endsWith('libbar.a')).toBe(true);

      expect(users.cxxShared.checkIfUsable(staticLib)).toEqual({ type: 'compatible' });
      expect(users.cxxStatic.checkIfUsable(staticLib)).toEqual({ type: 'compatible' });

      const sharedStlStaticLib = library('android.static-shared-stl', new Android(arm32, 21, cxxShared, 21, true));
      expect(users.cxxStatic.checkIfUsable(sharedStlStaticLib)).toEqual({ type: 'compatible' });
    });

    it('패밀리가 다르면 링크 방식과 무관하게 거부', () => {
      const staticLib = library('android.static', new Android(arm32, 21, cxxStatic, 21, true));
      expect(users.gnustlShared.checkIfUsable(staticLib)).toEqual({
        type: 'incompatible',
        reason: 'User requested libstdc++ but library requires libc++',
      });
      expect(users.none.checkIfUsable(staticLib)).toEqual({
        type: 'incompatible',
        reason: 'User requested no STL but library requires libc++',
      });
      expect(users.system.checkIfUsable(staticLib)).toEqual({
        type: 'incompatible',
        reason: 'User requested no STL but library requires libc++',
      });
    });

    it('공유 STL을 쓰는 공유 라이브러리는 공유 STL 사용자만 허용', () => {
      const sharedLib = library('android.shared', new Android(arm32, 21, cxxShared, 21));

      expect(users.cxxShared.checkIfUsable(sharedLib)).toEqual({ type: 'compatible' });
      expect(users.cxxStatic.checkIfUsable(sharedLib)).toEqual({
        type: 'incompatible',
        reason: 'User is using a static STL but library requires a shared STL',
      });
      expect(users.gnustlShared.checkIfUsable(sharedLib)).toEqual({
        type: 'incompatible',
        reason: 'User requested libstdc++ but library requires libc++',
      });
    });

    it('STL을 정적으로 링크한 공유 라이브러리는 항상 거부', () => {
      const sharedLib = library('android.shared-static-stl', new Android(arm32, 21, cxxStatic, 21));
      const reason =
        'Library is a shared library with a statically linked STL and cannot be used with any library using the STL';

      expect(users.cxxShared.checkIfUsable(sharedLib)).toEqual({ type: 'incompatible', reason });
      expect(users.cxxStatic.checkIfUsable(sharedLib)).toEqual({ type: 'incompatible', reason });
    });

    it('none / system 라이브러리는 모든 사용자와 호환', () => {
      const noneLib = library('android.none', new Android(arm32, 21, none, 21));
      const systemLib = library('android.system', new Android(arm32, 21, system, 21));

      for (const user of Object.values(users)) {
        expect(user.checkIfUsable(noneLib)).toEqual({ type: 'compatible' });
        expect(user.checkIfUsable(systemLib)).toEqual({ type: 'compatible' });
      }
    });
  });

  describe('findBestMatch', () => {
    const apiLibraries = [21, 23, 24, 28].map((api) =>
      library(`android.api${api}`, new Android(arm32, api, cxxShared, 21))
    );

    it('호환되는 라이브러리 중 가장 높은 API 레벨 선택', () => {
      const user = new Android(arm32, 24, cxxShared, 21);
      expect(user.findBestMatch(compatibleOnly(user, apiLibraries))).toBe(apiLibraries[2]);
    });

    it('사용자 API가 사이에 있으면 그 이하 중 최신 선택', () => {
      const user = new Android(arm32, 26, cxxShared, 21);
      expect(user.findBestMatch(compatibleOnly(user, apiLibraries))).toBe(apiLibraries[2]);
    });

    it('API로 하나만 남으면 NDK 버전이 달라도 선택', () => {
      const libs = [
        library('android.old', new Android(arm32, 21, cxxShared, 18)),
        library('android.new', new Android(arm32, 24, cxxShared, 25)),
      ];
      expect(new Android(arm32, 24, cxxShared, 21).findBestMatch(libs)).toBe(libs[1]);
    });

    describe('NDK 버전 clamp', () => {
      const ndkLibraries = [18, 19, 20, 21].map((ndk) =>
        library(`android.ndk${ndk}`, new Android(arm32, 21, cxxShared, ndk))
      );

      it('정확히 일치하는 NDK 버전 선택', () => {
        expect(new Android(arm32, 21, cxxShared, 20).findBestMatch(ndkLibraries)).toBe(ndkLibraries[2]);
      });

      it('더 새로운 NDK는 최대값으로 clamp (22 → 21)', () => {
        expect(new Android(arm32, 21, cxxShared, 22).findBestMatch(ndkLibraries)).toBe(ndkLibraries[3]);
      });

      it('더 오래된 NDK는 최소값으로 clamp (17 → 18)', () => {
        expect(new Android(arm32, 21, cxxShared, 17).findBestMatch(ndkLibraries)).toBe(ndkLibraries[0]);
      });
    });

    it('clamp한 NDK 버전에 정확한 변형이 없으면 MissingToolchainVariantError', () => {
      const libs = [
        library('android.ndk18', new Android(arm32, 21, cxxShared, 18)),
        library('android.ndk21', new Android(arm32, 21, cxxShared, 21)),
      ];
      const user = new Android(arm32, 21, cxxShared, 19);

      expect(() => user.findBestMatch(libs)).toThrow(MissingToolchainVariantError);
      expect(() => user.findBestMatch(libs)).toThrow(
        '//foo/bar contains a library per NDK version but no match was found for 19'
      );
    });

    it('구별할 수 없는 변형이 둘 이상이면 RedundantLibrariesError', () => {
      const libs = [
        library('android.shared', new Android(arm32, 21, cxxShared, 21)),
        library('android.static', new Android(arm32, 21, cxxShared, 21, true)),
      ];
      const user = new Android(arm32, 21, cxxShared, 21);

      expect(() => user.findBestMatch(libs)).toThrow(RedundantLibrariesError);
      expect(() => user.findBestMatch(libs)).toThrow(
        'Unable to resolve a single library match for //foo/bar. The following libraries are redundant:\n' +
          `${path.join(moduleDir, 'libs', 'android.shared')}\n${path.join(moduleDir, 'libs', 'android.static')}`
      );
    });

    it('빈 목록은 InvalidArgumentError', () => {
      expect(() => new Android(arm32, 21, cxxShared, 21).findBestMatch([])).toThrow(
        new InvalidArgumentError('libraries must be non-empty')
      );
    });

    it('호환되지 않는 라이브러리가 섞이면 InvalidArgumentError', () => {
      const user = new Android(arm32, 21, cxxShared, 21);
      expect(() => user.findBestMatch(apiLibraries)).toThrow('all libraries must be compatible');
    });

    it('다른 모듈의 라이브러리가 섞이면 InvalidArgumentError', () => {
      const other = memoryModule('foo', 'baz');
      const libs = [
        library('android.a', new Android(arm32, 21, cxxShared, 21)),
        memoryLibrary(other, 'android.a', new Android(arm32, 21, cxxShared, 21)),
      ];
      expect(() => new Android(arm32, 21, cxxShared, 21).findBestMatch(libs)).toThrow(
        'all libraries must belong to the same module'
      );
    });
  });

  describe('fromCommandLineArgs', () => {
    it('ABI를 생략하면 모든 ABI에 대한 요구사항 생성', () => {
      const requirements = androidFactory.fromCommandLineArgs({ osVersion: '21' });
      expect(requirements.map((r) => r.toString())).toEqual([
        'Android(armeabi-v7a, 21, c++_shared)',
        'Android(arm64-v8a, 21, c++_shared)',
        'Android(x86, 21, c++_shared)',
        'Android(x86_64, 21, c++_shared)',
      ]);
    });

    it('ABI, STL, NDK 버전 지정', () => {
      const [requirement, ...rest] = androidFactory.fromCommandLineArgs({
        abi: 'x86',
        osVersion: '16',
        stl: 'c++_static',
        ndkVersion: 25,
      });
      expect(rest).toHaveLength(0);
      expect(requirement).toBeInstanceOf(Android);
      expect(requirement.toString()).toBe('Android(x86, 16, c++_static)');
      expect(requirement instanceof Android && requirement.ndkMajorVersion).toBe(25);
    });

    it('OS 버전이 없으면 UnsupportedTargetError', () => {
      expect(() => androidFactory.fromCommandLineArgs({ abi: 'x86' })).toThrow(UnsupportedTargetError);
    });

    it('숫자가 아닌 OS 버전은 ParseError', () => {
      expect(() => androidFactory.fromCommandLineArgs({ osVersion: 'abc' })).toThrow(
        'Invalid Android API level: abc'
      );
    });

    it('알 수 없는 STL은 ParseError', () => {
      expect(() => androidFactory.fromCommandLineArgs({ osVersion: '21', stl: 'foo' })).toThrow('Unknown STL: foo');
    });
  });
});
