import { PluginSpec, classFactory, isPluginClass, type PluginClass } from './types.js';
import { defaultFunctionPlugins, type FunctionPluginRegistry } from './function-plugin.js';
import { PluginResolutionError } from './errors.js';

/**
 * The kinds of values a PluginSpec can be resolved from
 */
export type PluginSource =
    | { kind: 'spec'; spec: PluginSpec }
    | { kind: 'class'; pluginClass: PluginClass }
    | { kind: 'function'; fn: object; spec: PluginSpec };

/**
 * Plugin Spec Resolver — turns discovered values into PluginSpecs
 *
 * Supported sources are PluginSpec instances, Plugin subclasses declaring the statics
 * `namespace` and `pluginName`, and functions registered with a FunctionPluginRegistry.
 */
export class PluginSpecResolver {
    constructor(private readonly functionPlugins: FunctionPluginRegistry = defaultFunctionPlugins) {}

    /**
     * Classify a value, or return undefined if it is not a plugin source
     */
    classify(value: unknown): PluginSource | undefined {
        if (value instanceof PluginSpec) {
            return { kind: 'spec', spec: value };
        }
        if (isPluginClass(value)) {
            return { kind: 'class', pluginClass: value };
        }
        if (typeof value === 'function') {
            const spec = this.functionPlugins.specFor(value);
            if (spec) return { kind: 'function', fn: value, spec };
        }
        return undefined;
    }

    /**
     * Resolve a PluginSpec from a value. `locator` names where the value was found.
     */
    resolve(value: unknown, locator?: string): PluginSpec {
        const source = this.classify(value);
        if (!source) {
            throw new PluginResolutionError(`cannot resolve plugin specification from ${describe(value)}`);
        }
        return this.resolveSource(source, locator);
    }

    /**
     * Resolve, returning undefined instead of throwing
     */
    tryResolve(value: unknown, locator?: string): PluginSpec | undefined {
        const source = this.classify(value);
        return source ? this.resolveSource(source, locator) : undefined;
    }

    resolveSource(source: PluginSource, locator?: string): PluginSpec {
        switch (source.kind) {
            case 'spec':
            case 'function':
                return locator && !source.spec.locator ? source.spec.withLocator(locator) : source.spec;
            case 'class': {
                const cls = source.pluginClass;
                return new PluginSpec(cls.namespace, cls.pluginName, classFactory(cls), locator);
            }
        }
    }
}

function describe(value: unknown): string {
    if (typeof value === 'function') {
        return `function ${value.name || '<anonymous>'}`;
    }
    if (value === null || typeof value !== 'object') {
        return String(value);
    }
    return `object ${value.constructor?.name ?? 'Object'}`;
}
