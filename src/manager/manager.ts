import PQueue from 'p-queue';
import type { Plugin, PluginFinder, PluginSpec } from '../plugins/types.js';
import type { PluginFilter } from '../plugins/filter.js';
import { defaultPluginFilter } from '../plugins/filter.js';
import { PluginError, PluginDisabledError, PluginNotFoundError } from '../plugins/errors.js';
import type { PluginLifecycleListener } from '../hooks/types.js';
import { LifecycleNotifier } from '../hooks/notifier.js';
import { MetadataPluginFinder } from '../finders/metadata.js';
import { PluginContainer } from './container.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { toError } from '../utils/errors.js';

const FILTERED_REASON = 'a plugin filter disabled this plugin before it was initialized';
const CONDITION_REASON = 'load condition for plugin was false';

export interface PluginManagerOptions<P extends Plugin> {
    /** Arguments passed to `plugin.load()` */
    loadArgs?: readonly unknown[];
    listener?: PluginLifecycleListener | PluginLifecycleListener[];
    /** Where plugins come from (default: entry points of installed packages) */
    finder?: PluginFinder;
    /** Default: the process-wide default filter */
    filters?: PluginFilter[];
    /** Every plugin must be an instance of this class, otherwise it fails to initialize */
    pluginType?: abstract new (...args: never[]) => P;
    logger?: Logger;
}

/**
 * Plugin Manager — discovers, initializes and loads the plugins of one namespace
 *
 * Plugins are resolved lazily on first access, and each plugin is instantiated and loaded
 * at most once no matter how many callers ask for it concurrently:
 *
 * ```ts
 * const manager = new PluginManager('demo.greeters', { loadArgs: [config] });
 * const greeter = await manager.load('hello');
 * ```
 */
export class PluginManager<P extends Plugin = Plugin> {
    readonly namespace: string;
    readonly loadArgs: readonly unknown[];
    filters: PluginFilter[];

    private listeners: PluginLifecycleListener[];
    private notifier: LifecycleNotifier;
    private finder: PluginFinder;
    private pluginType?: abstract new (...args: never[]) => P;
    private logger: Logger;

    private index?: Map<string, PluginContainer<P>>;
    private initLock = new PQueue({ concurrency: 1 });

    constructor(namespace: string, options: PluginManagerOptions<P> = {}) {
        this.namespace = namespace;
        this.loadArgs = options.loadArgs ?? [];
        this.filters = options.filters ?? [defaultPluginFilter];
        this.pluginType = options.pluginType;
        this.logger = options.logger ?? getLogger('manager');

        const { listener } = options;
        this.listeners = listener === undefined ? [] : Array.isArray(listener) ? [...listener] : [listener];
        this.notifier = new LifecycleNotifier(this.listeners, this.logger);

        this.finder = options.finder ?? new MetadataPluginFinder(namespace, {
            onResolveException: (ns, entryPoint, error) => this.notifier.fireResolveException(ns, entryPoint, error),
            logger: this.logger,
        });
    }

    addListener(listener: PluginLifecycleListener): void {
        this.listeners.push(listener);
    }

    // ─── Loading ────────────────────────────────────────────────────────────

    /**
     * Load a plugin by name and return its instance
     */
    async load(name: string): Promise<P> {
        const container = await this.requireContainer(name);

        if (container.isDisabled) {
            throw this.disabledError(container);
        }

        if (!container.isLoaded) {
            await container.withLock(() => this.loadContainer(container));
        }

        return this.outcome(container);
    }

    /**
     * Load every plugin of the namespace in discovery order. Plugins that fail are skipped
     * unless `propagateExceptions` is set, in which case the first failure is thrown.
     */
    async loadAll(propagateExceptions = false): Promise<P[]> {
        const plugins: P[] = [];

        for (const container of await this.listContainers()) {
            if (container.isLoaded && container.plugin) {
                plugins.push(container.plugin);
                continue;
            }

            try {
                plugins.push(await this.load(container.name));
            } catch (thrown) {
                const err = toError(thrown);
                if (err instanceof PluginDisabledError) {
                    this.logger.debug('%s', err.message);
                    continue;
                }
                if (propagateExceptions) {
                    throw thrown;
                }
                if (this.logger.isLevelEnabled('debug')) {
                    this.logger.error({ err }, 'error loading plugin %s:%s', this.namespace, container.name);
                } else {
                    this.logger.error('error loading plugin %s:%s: %s', this.namespace, container.name, err.message);
                }
            }
        }

        return plugins;
    }

    private async loadContainer(container: PluginContainer<P>): Promise<void> {
        // another caller may have finished while we waited for the lock
        if (container.isLoaded || container.initError || container.loadError) {
            return;
        }
        if (container.isDisabled) {
            throw this.disabledError(container);
        }

        try {
            await this.runLifecycle(container);
        } catch (thrown) {
            if (thrown instanceof PluginDisabledError) {
                container.disable(thrown.reason);
            }
            throw thrown;
        }
    }

    private async runLifecycle(container: PluginContainer<P>): Promise<void> {
        const { spec } = container;

        for (const filter of this.filters) {
            if (filter.excludes(spec)) {
                throw new PluginDisabledError(spec.namespace, spec.name, FILTERED_REASON);
            }
        }

        if (!container.isInit) {
            try {
                const created = await this.instantiate(spec);
                container.markInitialized(created);
                await this.notifier.fireInitAfter(spec, created);
            } catch (thrown) {
                if (thrown instanceof PluginDisabledError) throw thrown;

                const err = toError(thrown);
                this.logger.debug('error initializing plugin %s: %s', spec.toString(), err.message);
                container.recordInitError(err);
                await this.notifier.fireInitException(spec, err);
                return;
            }
        }

        const plugin = container.plugin;
        if (!plugin) return;

        let shouldLoad: boolean;
        try {
            shouldLoad = await plugin.shouldLoad();
        } catch (thrown) {
            if (thrown instanceof PluginDisabledError) throw thrown;
            await this.recordLoadFailure(container, plugin, toError(thrown));
            return;
        }
        if (!shouldLoad) {
            throw new PluginDisabledError(spec.namespace, spec.name, CONDITION_REASON);
        }

        try {
            await this.notifier.fireLoadBefore(spec, plugin, this.loadArgs);
            const result: unknown = await plugin.load(...this.loadArgs);
            await this.notifier.fireLoadAfter(spec, plugin, result);
            container.markLoaded(result);
        } catch (thrown) {
            if (thrown instanceof PluginDisabledError) throw thrown;
            await this.recordLoadFailure(container, plugin, toError(thrown));
        }
    }

    private async instantiate(spec: PluginSpec): Promise<P> {
        const created = await spec.factory();
        if (!this.accepts(created)) {
            throw new PluginError(
                `plugin ${spec.namespace}:${spec.name} is not an instance of ${this.pluginType?.name}`,
                spec.namespace,
                spec.name
            );
        }
        return created;
    }

    private accepts(plugin: Plugin): plugin is P {
        return this.pluginType ? plugin instanceof this.pluginType : true;
    }

    private async recordLoadFailure(container: PluginContainer<P>, plugin: P, err: Error): Promise<void> {
        this.logger.debug('error loading plugin %s: %s', container.spec.toString(), err.message);
        container.recordLoadError(err);
        await this.notifier.fireLoadException(container.spec, plugin, err);
    }

    private outcome(container: PluginContainer<P>): P {
        if (container.isDisabled) {
            throw this.disabledError(container);
        }
        if (container.initError) {
            throw container.initError;
        }
        if (container.loadError) {
            throw container.loadError;
        }
        if (!container.isLoaded || !container.plugin) {
            throw new PluginError('plugin did not load correctly', this.namespace, container.name);
        }
        return container.plugin;
    }

    private disabledError(container: PluginContainer<P>): PluginDisabledError {
        return new PluginDisabledError(this.namespace, container.name, container.disabledReason);
    }

    // ─── Inspection ─────────────────────────────────────────────────────────

    async listPluginSpecs(): Promise<PluginSpec[]> {
        return (await this.listContainers()).map(container => container.spec);
    }

    async listNames(): Promise<string[]> {
        return [...(await this.getIndex()).keys()];
    }

    async listContainers(): Promise<PluginContainer<P>[]> {
        return [...(await this.getIndex()).values()];
    }

    /**
     * Get the container of a plugin, throwing PluginNotFoundError for unknown names
     */
    async getContainer(name: string): Promise<PluginContainer<P>> {
        return this.requireContainer(name);
    }

    async exists(name: string): Promise<boolean> {
        return (await this.getIndex()).has(name);
    }

    async isLoaded(name: string): Promise<boolean> {
        return (await this.requireContainer(name)).isLoaded;
    }

    private async requireContainer(name: string): Promise<PluginContainer<P>> {
        const container = (await this.getIndex()).get(name);
        if (!container) {
            throw new PluginNotFoundError(this.namespace, name);
        }
        return container;
    }

    // ─── Index ──────────────────────────────────────────────────────────────

    private async getIndex(): Promise<Map<string, PluginContainer<P>>> {
        if (this.index) return this.index;

        return this.initLock.add(async () => {
            if (this.index) return this.index;
            const index = await this.buildIndex();
            this.index = index;
            return index;
        }, { throwOnTimeout: true });
    }

    private async buildIndex(): Promise<Map<string, PluginContainer<P>>> {
        const specs = await this.finder.findPlugins();
        const index: Map<string, PluginContainer<P>> = new Map();

        for (const spec of specs) {
            await this.notifier.fireResolveAfter(spec);

            if (spec.namespace !== this.namespace) {
                this.logger.debug('skipping plugin %s of another namespace', spec.toString());
                continue;
            }

            if (index.has(spec.name)) {
                this.logger.warn('ignoring duplicate plugin %s', spec.toString());
                continue;
            }
            index.set(spec.name, new PluginContainer<P>(spec));
        }

        this.logger.debug('resolved %d plugins in namespace %s', index.size, this.namespace);
        return index;
    }
}
