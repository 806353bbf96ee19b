/**
 * Plugin System — Types
 *
 * A plugin is code registered under a namespace (an extension point) that a
 * PluginManager discovers, instantiates and loads on demand. Plugins defer their
 * expensive work into `load()`, which receives the arguments the manager for that
 * namespace agrees on with its plugins.
 */

export interface PluginIdentity {
    namespace: string;
    name: string;
}

/**
 * Base class of every plugin.
 *
 * Subclasses declare their identity through the statics `namespace` and `pluginName`
 * (`name` is reserved on functions), or receive it through the constructor.
 */
export abstract class Plugin {
    static readonly namespace?: string;
    static readonly pluginName?: string;

    readonly namespace: string;
    readonly name: string;

    constructor(identity?: PluginIdentity) {
        this.namespace = identity?.namespace ?? new.target.namespace ?? '';
        this.name = identity?.name ?? new.target.pluginName ?? '';
    }

    /**
     * Whether the plugin should be loaded at all
     */
    shouldLoad(): boolean | Promise<boolean> {
        return true;
    }

    /**
     * Called by a PluginManager when it loads the plugin
     */
    load(..._args: unknown[]): unknown {
        return undefined;
    }
}

export type PluginFactory<P extends Plugin = Plugin> = () => P | Promise<P>;

/**
 * A constructor usable as a plugin source
 */
export type PluginClass<P extends Plugin = Plugin> = (new () => P) & {
    readonly namespace: string;
    readonly pluginName: string;
};

/**
 * Describes a plugin through its namespace, its unique name within that namespace, and
 * the factory that instantiates it. `locator` records where the factory was found
 * (`module:export`), which is what gets written into entry point files.
 */
export class PluginSpec<P extends Plugin = Plugin> {
    constructor(
        readonly namespace: string,
        readonly name: string,
        readonly factory: PluginFactory<P>,
        readonly locator?: string
    ) {}

    withLocator(locator: string): PluginSpec<P> {
        return new PluginSpec(this.namespace, this.name, this.factory, locator);
    }

    equals(other: PluginSpec): boolean {
        return this.namespace === other.namespace
            && this.name === other.name
            && this.factory === other.factory;
    }

    toString(): string {
        const target = this.locator ?? (this.factory.name || '<anonymous>');
        return `PluginSpec(${this.namespace}.${this.name} = ${target})`;
    }
}

/**
 * Finds plugins, either at build time by scanning modules or at run time from entry points
 */
export interface PluginFinder {
    findPlugins(): Promise<PluginSpec[]>;
}

export function isPluginClass(value: unknown): value is PluginClass {
    return typeof value === 'function'
        && value.prototype instanceof Plugin
        && 'namespace' in value && typeof value.namespace === 'string'
        && 'pluginName' in value && typeof value.pluginName === 'string';
}

const classFactories = new WeakMap<PluginClass, PluginFactory>();

/**
 * The factory of a plugin class. Memoized so that specs resolved from the same class are equal.
 */
export function classFactory(pluginClass: PluginClass): PluginFactory {
    const existing = classFactories.get(pluginClass);
    if (existing) return existing;

    const factory: PluginFactory = () => new pluginClass();
    classFactories.set(pluginClass, factory);
    return factory;
}
