/**
 * 모듈이 사용자에게 내보내는 링크 참조
 *
 * - Literal: 그대로 사용하는 링크 플래그 (예: "-llog")
 * - Local: 같은 패키지의 다른 모듈 (예: ":foo")
 * - External: 다른 패키지의 모듈 (예: "//bar:baz")
 */

import { LibraryReferenceError } from '../errors';

export type LibraryReference =
  | { readonly kind: 'literal'; readonly arg: string }
  | { readonly kind: 'local'; readonly name: string }
  | { readonly kind: 'external'; readonly pkg: string; readonly module: string };

export type LiteralReference = Extract<LibraryReference, { kind: 'literal' }>;
export type LocalReference = Extract<LibraryReference, { kind: 'local' }>;
export type ExternalReference = Extract<LibraryReference, { kind: 'external' }>;

export function literalReference(arg: string): LiteralReference {
  return { kind: 'literal', arg };
}

export function localReference(name: string): LocalReference {
  return { kind: 'local', name };
}

export function externalReference(pkg: string, module: string): ExternalReference {
  return { kind: 'external', pkg, module };
}

function countColons(value: string): number {
  return value.split(':').length - 1;
}

function parseLiteral(reference: string): LiteralReference {
  if (reference.length === 0) {
    throw new LibraryReferenceError('Literal library reference must not be empty', reference);
  }
  return literalReference(reference);
}

function parseLocal(reference: string): LocalReference {
  if (countColons(reference) !== 1) {
    throw new LibraryReferenceError('Expected exactly one : in local library reference', reference);
  }
  const name = reference.substring(1);
  if (name.length === 0) {
    throw new LibraryReferenceError('Expected a module name after : in local library reference', reference);
  }
  return localReference(name);
}

function parseExternal(reference: string): ExternalReference {
  if (countColons(reference) !== 1) {
    throw new LibraryReferenceError('Expected exactly one : in external library reference', reference);
  }
  const body = reference.substring(2);
  if (body.includes('/')) {
    throw new LibraryReferenceError('Expected no / after leading // in external library reference', reference);
  }
  const [pkg, module] = body.split(':');
  if (pkg.length === 0 || module.length === 0) {
    throw new LibraryReferenceError('Expected //<package>:<module> in external library reference', reference);
  }
  return externalReference(pkg, module);
}

/**
 * module.json의 export_libraries 항목을 분류합니다.
 * Local/External 문법이 잘못되면 LibraryReferenceError를 던집니다.
 */
export function parseLibraryReference(reference: string): LibraryReference {
  if (reference.startsWith('//')) {
    return parseExternal(reference);
  }
  if (reference.startsWith(':')) {
    return parseLocal(reference);
  }
  return parseLiteral(reference);
}

export function libraryReferenceToString(reference: LibraryReference): string {
  switch (reference.kind) {
    case 'literal':
      return reference.arg;
    case 'local':
      return `:${reference.name}`;
    case 'external':
      return `//${reference.pkg}:${reference.module}`;
  }
}
