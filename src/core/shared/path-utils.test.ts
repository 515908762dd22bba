/**
 * 경로 처리 유틸리티 테스트
 */

import { describe, it, expect } from 'vitest';
import { toUnixPath } from './path-utils';

describe('path-utils', () => {
  describe('toUnixPath', () => {
    it('Windows 경로를 forward slash로 변환', () => {
      expect(toUnixPath('C:\\Users\\test\\libs\\android.arm64\\libfoo.so')).toBe(
        'C:/Users/test/libs/android.arm64/libfoo.so'
      );
    });

    it('Unix 경로는 그대로 유지', () => {
      expect(toUnixPath('/home/user/foo/include')).toBe('/home/user/foo/include');
    });

    it('혼합 경로를 변환', () => {
      expect(toUnixPath('C:\\Users/test\\include')).toBe('C:/Users/test/include');
    });
  });
});
