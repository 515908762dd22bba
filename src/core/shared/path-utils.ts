/**
 * 빌드 파일용 경로 처리 유틸리티
 */

/**
 * 경로를 Unix 스타일(슬래시)로 변환
 * Windows에서도 CMake와 ndk-build 파일에는 forward slash를 사용합니다.
 */
export function toUnixPath(p: string): string {
  return p.replace(/\\/g, '/');
}
