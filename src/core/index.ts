// Core module exports for nativepkg

// Errors
export * from './errors';

// Platforms
export type {
  PlatformIdentity,
  PlatformFactory,
  PlatformArgs,
  PlatformKind,
  LibraryUsabilityResult,
  PrebuiltLibrarySource,
} from './platform/types';
export { COMPATIBLE_LIBRARY, incompatibleLibrary, isCompatible } from './platform/types';
export { Android, ANDROID_ABIS, ANDROID_STLS, abiFromString, stlFromString, androidFactory } from './platform/android';
export type { AndroidAbi, AndroidStl, StlFamily } from './platform/android';
export { GnuLinux, GNULINUX_ARCHES, archFromString, parseGlibcVersion, compareGlibcVersions, gnuLinuxFactory } from './platform/gnu-linux';
export type { GnuLinuxArch, GlibcVersion } from './platform/gnu-linux';
export { PLATFORM_FACTORIES, PLATFORM_KINDS, findPlatformFactory } from './platform/registry';

// Metadata
export { SCHEMA_VERSIONS, LATEST_SCHEMA_VERSION, schemaVersionFrom, readSchemaVersion } from './metadata/schema-version';
export type { SchemaVersion } from './metadata/schema-version';
export { packageMetadataLoader } from './metadata/package-metadata';
export type { PackageMetadataV1 } from './metadata/package-metadata';
export { moduleMetadataLoader } from './metadata/module-metadata';
export type { ModuleMetadataV1 } from './metadata/module-metadata';
export { androidAbiMetadataLoader, migrateAndroidAbiMetadata } from './metadata/android-abi-metadata';
export type { AndroidAbiMetadata, AndroidAbiMetadataV1, AndroidAbiMetadataV2 } from './metadata/android-abi-metadata';
export { gnuLinuxAbiMetadataLoader } from './metadata/gnulinux-abi-metadata';
export type { GnuLinuxAbiMetadataV1 } from './metadata/gnulinux-abi-metadata';

// Package model
export { Package } from './package/package';
export { Module, ModuleDescriptor } from './package/module';
export { PrebuiltLibrary } from './package/prebuilt-library';
export { parseLibraryReference, libraryReferenceToString } from './package/library-reference';
export type { LibraryReference } from './package/library-reference';

// Resolution
export { checkIfUsable, findBestMatch, resolveLibrary, tryResolveLibrary } from './resolver/moduleResolver';
export type { ResolutionOutcome } from './resolver/moduleResolver';

// Build systems
export { CMakeGenerator } from './generators/cmakeGenerator';
export { NdkBuildGenerator } from './generators/ndkBuildGenerator';
export { createBuildSystem, findBuildSystem, getBuildSystemIds } from './generators/buildSystemRegistry';
export type { BuildSystemGenerator, BuildSystemFactory, GenerationResult, SkippedModule } from './generators/buildSystem';

// Generation Manager
export { GenerationManager, getGenerationManager } from './generationManager';
export type { GenerateOptions, GenerateSummary, GenerationManagerEvents } from './generationManager';

// Config
export { ConfigManager, getConfigManager } from './config';
export type { Config, ConfigKey, LogLevel } from './config';
