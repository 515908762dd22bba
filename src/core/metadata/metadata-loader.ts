/**
 * 버전별 메타데이터 로더 공통 인터페이스와 JSON 필드 검증 헬퍼
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { MetadataError } from '../errors';
import type { SchemaVersion } from './schema-version';

/**
 * 특정 스키마 버전의 디스크 레코드를 마이그레이션 없이 읽는 로더
 */
export interface VersionedMetadataLoader<T> {
  load(directory: string): Promise<T>;
}

/**
 * 스키마 버전 → 로더 디스패치와 최신 형태로의 마이그레이션
 *
 * @typeParam Base 모든 버전 레코드의 공통 타입
 * @typeParam Current 최신 버전 레코드 타입
 * @typeParam Context 이전 버전 마이그레이션에 필요한 추가 정보
 */
export interface MetadataLoader<Base, Current extends Base, Context> {
  loaderFor(schemaVersion: SchemaVersion): VersionedMetadataLoader<Base>;
  loadAndMigrate(schemaVersion: SchemaVersion, directory: string, context: Context): Promise<Current>;
}

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 디렉토리의 JSON 파일을 객체로 읽습니다.
 */
export async function readJsonObject(directory: string, fileName: string): Promise<{ filePath: string; data: JsonObject }> {
  const filePath = path.join(directory, fileName);
  if (!(await fs.pathExists(filePath))) {
    throw new MetadataError('file not found', filePath);
  }
  let data: unknown;
  try {
    data = await fs.readJson(filePath);
  } catch (error) {
    throw new MetadataError(
      `malformed JSON: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }
  if (!isJsonObject(data)) {
    throw new MetadataError('expected a JSON object', filePath);
  }
  return { filePath, data };
}

export function requireString(data: JsonObject, key: string, filePath: string): string {
  const value = data[key];
  if (typeof value !== 'string') {
    throw new MetadataError(`"${key}" must be a string`, filePath);
  }
  return value;
}

export function optionalString(data: JsonObject, key: string, filePath: string): string | undefined {
  const value = data[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new MetadataError(`"${key}" must be a string`, filePath);
  }
  return value;
}

export function requireInteger(data: JsonObject, key: string, filePath: string): number {
  const value = data[key];
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new MetadataError(`"${key}" must be an integer`, filePath);
  }
  return value;
}

export function optionalBoolean(data: JsonObject, key: string, filePath: string): boolean | undefined {
  const value = data[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new MetadataError(`"${key}" must be a boolean`, filePath);
  }
  return value;
}

export function optionalStringArray(data: JsonObject, key: string, filePath: string): string[] | undefined {
  const value = data[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new MetadataError(`"${key}" must be an array of strings`, filePath);
  }
  const result: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') {
      throw new MetadataError(`"${key}" must be an array of strings`, filePath);
    }
    result.push(item);
  }
  return result;
}

export function requireStringArray(data: JsonObject, key: string, filePath: string): string[] {
  const value = optionalStringArray(data, key, filePath);
  if (value === undefined) {
    throw new MetadataError(`"${key}" is required`, filePath);
  }
  return value;
}
