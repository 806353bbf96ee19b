// waypost — Public API Surface
export { Plugin, PluginSpec, isPluginClass, classFactory } from './plugins/types.js';
export { FunctionPlugin, FunctionPluginRegistry, defaultFunctionPlugins, plugin } from './plugins/function-plugin.js';
export { PluginSpecResolver } from './plugins/resolver.js';
export { PluginSpecMatcher, MatchingPluginFilter, defaultPluginFilter, configurePluginFilter } from './plugins/filter.js';
export {
    PluginError,
    PluginDisabledError,
    PluginNotFoundError,
    PluginResolutionError,
    DuplicateEntryPointError,
    EntryPointParseError,
    ConfigError,
} from './plugins/errors.js';
export { LifecycleNotifier } from './hooks/notifier.js';
export { CompositePluginLifecycleListener } from './hooks/composite.js';
export { PluginContainer } from './manager/container.js';
export { PluginManager } from './manager/manager.js';
export {
    parseLocator,
    formatLocator,
    specToEntryPoint,
    toEntryPointMapping,
    discoverEntryPoints,
} from './entrypoints/convert.js';
export {
    parseEntryPointsText,
    serializeEntryPointsText,
    buildEntryPointIndex,
    entryPointIndexToMapping,
    mappingToEntryPoints,
} from './entrypoints/text.js';
export {
    MetadataEntryPointsResolver,
    DistributionResolver,
    listDistributions,
    resolveEntryPoints,
    ENTRY_POINTS_FILE,
    EDITABLE_REDIRECT_FILE,
} from './entrypoints/metadata.js';
export { EntryPointsCache } from './entrypoints/cache.js';
export { ModuleCodeLoader } from './finders/loader.js';
export { MetadataPluginFinder } from './finders/metadata.js';
export { ModuleScanningPluginFinder, PackagePathPluginFinder } from './finders/scanner.js';
export { PluginIndexBuilder, renderIndex } from './finders/index-builder.js';
export { ConfigLoader } from './config/loader.js';
export { WaypostConfigSchema, mergeConfig } from './config/schema.js';
export { getLogger, setLogLevel } from './utils/logger.js';
export { getUserCacheDir, getWaypostCacheDir, defaultSearchPath } from './utils/paths.js';
export { createCLI } from './cli/index.js';

// Types
export type { PluginIdentity, PluginFactory, PluginClass, PluginFinder } from './plugins/types.js';
export type { FunctionPluginOptions, LoadCondition } from './plugins/function-plugin.js';
export type { PluginSource } from './plugins/resolver.js';
export type { PluginFilter, PluginSpecPattern } from './plugins/filter.js';
export type { PluginLifecycleListener, LifecycleHook } from './hooks/types.js';
export type { PluginManagerOptions } from './manager/manager.js';
export type { EntryPoint, EntryPointIndex, EntryPointMapping, EntryPointsResolver } from './entrypoints/types.js';
export type { Locator } from './entrypoints/convert.js';
export type { Distribution } from './entrypoints/metadata.js';
export type { EntryPointsCacheOptions, RuntimeIdentity, SearchPathResolver } from './entrypoints/cache.js';
export type { CodeLoader, ImportModule } from './finders/loader.js';
export type { MetadataPluginFinderOptions, ResolveExceptionCallback } from './finders/metadata.js';
export type { ScannedModule, PackagePathPluginFinderOptions } from './finders/scanner.js';
export type { IndexFormat, BuiltIndex } from './finders/index-builder.js';
export type { WaypostConfig } from './config/schema.js';
