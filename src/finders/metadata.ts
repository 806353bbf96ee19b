import type { PluginFinder, PluginSpec } from '../plugins/types.js';
import type { EntryPoint, EntryPointsResolver } from '../entrypoints/types.js';
import { PluginSpecResolver } from '../plugins/resolver.js';
import { EntryPointsCache } from '../entrypoints/cache.js';
import { ModuleCodeLoader, type CodeLoader } from './loader.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { toError } from '../utils/errors.js';

export type ResolveExceptionCallback = (namespace: string, entryPoint: EntryPoint, error: Error) => void | Promise<void>;

export interface MetadataPluginFinderOptions {
    /** Called for each entry point that could not be loaded or resolved */
    onResolveException?: ResolveExceptionCallback;
    specResolver?: PluginSpecResolver;
    entryPointsResolver?: EntryPointsResolver;
    codeLoader?: CodeLoader;
    logger?: Logger;
}

/**
 * Finds the plugins of a namespace through the entry points of installed packages
 */
export class MetadataPluginFinder implements PluginFinder {
    private onResolveException?: ResolveExceptionCallback;
    private specResolver: PluginSpecResolver;
    private entryPointsResolver: EntryPointsResolver;
    private codeLoader: CodeLoader;
    private logger: Logger;

    constructor(readonly namespace: string, options: MetadataPluginFinderOptions = {}) {
        this.onResolveException = options.onResolveException;
        this.specResolver = options.specResolver ?? new PluginSpecResolver();
        this.entryPointsResolver = options.entryPointsResolver ?? EntryPointsCache.instance();
        this.codeLoader = options.codeLoader ?? new ModuleCodeLoader();
        this.logger = options.logger ?? getLogger('finder');
    }

    async findPlugins(): Promise<PluginSpec[]> {
        const index = await this.entryPointsResolver.getEntryPoints();
        const entryPoints = index.get(this.namespace) ?? [];

        const specs: PluginSpec[] = [];
        for (const ep of entryPoints) {
            const spec = await this.toPluginSpec(ep);
            if (spec) specs.push(spec);
        }
        return specs;
    }

    private async toPluginSpec(ep: EntryPoint): Promise<PluginSpec | undefined> {
        try {
            const source = await this.codeLoader.load(ep.value);
            return this.specResolver.resolve(source, ep.value);
        } catch (thrown) {
            const err = toError(thrown);
            this.logger.debug('could not resolve entry point %s = %s: %s', ep.name, ep.value, err.message);
            await this.onResolveException?.(this.namespace, ep, err);
            return undefined;
        }
    }
}
