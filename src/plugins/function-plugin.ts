import { Plugin, PluginSpec, type PluginIdentity } from './types.js';
import { PluginResolutionError } from './errors.js';

export type LoadCondition = boolean | (() => boolean | Promise<boolean>);

export interface FunctionPluginOptions {
    /** Plugin name, defaults to the function's own name */
    name?: string;
    /** Literal or predicate deciding whether the plugin loads (default: always) */
    shouldLoad?: LoadCondition;
    /** Custom load routine, receives the manager's load arguments */
    load?(...args: unknown[]): unknown;
}

/**
 * Exposes a plain function as a Plugin. `invoke()` forwards to the wrapped function.
 */
export class FunctionPlugin<A extends unknown[] = unknown[], R = unknown> extends Plugin {
    constructor(
        readonly fn: (...args: A) => R,
        identity: PluginIdentity,
        private readonly condition?: LoadCondition,
        private readonly loader?: (...args: unknown[]) => unknown
    ) {
        super(identity);
    }

    invoke(...args: A): R {
        return this.fn(...args);
    }

    override shouldLoad(): boolean | Promise<boolean> {
        if (this.condition === undefined) return true;
        if (typeof this.condition === 'boolean') return this.condition;
        return this.condition();
    }

    override load(...args: unknown[]): unknown {
        return this.loader?.(...args);
    }
}

/**
 * Registry that turns functions into discoverable plugins.
 *
 * ```ts
 * export const greet = functionPlugins.register('demo.greeters', function greet(who: string) {
 *     return `hello ${who}`;
 * });
 * ```
 *
 * `register` returns the function untouched, so it stays callable and can be exported
 * for module scanning; the spec it recorded is looked up again during resolution.
 */
export class FunctionPluginRegistry {
    private specs: WeakMap<object, PluginSpec> = new WeakMap();
    private registered: PluginSpec[] = [];

    /**
     * Register a function as a plugin in a namespace
     */
    register<A extends unknown[], R>(
        namespace: string,
        fn: (...args: A) => R,
        options: FunctionPluginOptions = {}
    ): (...args: A) => R {
        const name = options.name ?? fn.name;
        if (!name) {
            throw new PluginResolutionError(`cannot register an anonymous function as plugin in ${namespace} without a name`);
        }

        const factory = (): FunctionPlugin<A, R> =>
            new FunctionPlugin(fn, { namespace, name }, options.shouldLoad, options.load);

        const spec = new PluginSpec(namespace, name, factory);
        this.specs.set(fn, spec);
        this.registered.push(spec);
        return fn;
    }

    /**
     * Get the spec recorded for a function
     */
    specFor(fn: unknown): PluginSpec | undefined {
        if (typeof fn !== 'function') return undefined;
        return this.specs.get(fn);
    }

    /**
     * List all registered specs
     */
    list(): PluginSpec[] {
        return [...this.registered];
    }

    get size(): number {
        return this.registered.length;
    }
}

export const defaultFunctionPlugins = new FunctionPluginRegistry();

/**
 * Register a function with the default registry
 */
export function plugin<A extends unknown[], R>(
    namespace: string,
    fn: (...args: A) => R,
    options?: FunctionPluginOptions
): (...args: A) => R {
    return defaultFunctionPlugins.register(namespace, fn, options);
}
