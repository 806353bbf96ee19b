import { z } from 'zod';

/**
 * Glob list, either as an array or as a comma separated string
 */
const GlobListSchema = z.union([
    z.array(z.string()),
    z.string().transform(value => value.split(',').map(item => item.trim()).filter(Boolean)),
]);

export const PluginPatternSchema = z.object({
    namespace: z.string().optional(),
    name: z.string().optional(),
    value: z.string().optional(),
}).strict().refine(
    pattern => Boolean(pattern.namespace || pattern.name || pattern.value),
    { message: 'a disabled entry needs at least one of namespace, name or value' }
);

export const WaypostConfigSchema = z.object({
    /** Directory scanned by `discover` and `entrypoints` */
    path: z.string().default('.'),
    include: GlobListSchema.default([]),
    exclude: GlobListSchema.default([]),
    /** Name of the entry point declaration file */
    entrypointStaticFile: z.string().min(1).default('entry_points.ini'),
    cacheDir: z.string().optional(),
    logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    /** Plugins excluded from loading */
    disabled: z.array(PluginPatternSchema).default([]),
});

export type WaypostConfig = z.infer<typeof WaypostConfigSchema>;

export const CONFIG_KEYS: readonly string[] = Object.keys(WaypostConfigSchema.shape);

export type ConfigOverrides = Partial<Pick<WaypostConfig, 'path' | 'include' | 'exclude' | 'entrypointStaticFile' | 'cacheDir' | 'logLevel'>>;

/**
 * Apply command line overrides. Scalars replace the configured value when given;
 * `include` and `exclude` are added to the configured globs.
 */
export function mergeConfig(config: WaypostConfig, overrides: ConfigOverrides): WaypostConfig {
    return {
        ...config,
        path: overrides.path ?? config.path,
        entrypointStaticFile: overrides.entrypointStaticFile ?? config.entrypointStaticFile,
        cacheDir: overrides.cacheDir ?? config.cacheDir,
        logLevel: overrides.logLevel ?? config.logLevel,
        include: union(config.include, overrides.include),
        exclude: union(config.exclude, overrides.exclude),
    };
}

function union(base: string[], extra: string[] = []): string[] {
    return [...new Set([...base, ...extra])];
}
