import { describe, it, expect, vi } from 'vitest';
import { MetadataPluginFinder, type ResolveExceptionCallback } from './metadata.js';
import type { CodeLoader } from './loader.js';
import { PluginSpecResolver } from '../plugins/resolver.js';
import { FunctionPluginRegistry } from '../plugins/function-plugin.js';
import { Plugin } from '../plugins/types.js';
import { PluginResolutionError } from '../plugins/errors.js';
import { buildEntryPointIndex } from '../entrypoints/text.js';
import type { EntryPoint, EntryPointsResolver } from '../entrypoints/types.js';
import { silentLogger } from '../testing/logger.js';

class HelloPlugin extends Plugin {
    static readonly namespace = 'demo.greeters';
    static readonly pluginName = 'hello';
}

const good: EntryPoint = { group: 'demo.greeters', name: 'hello', value: 'demo-pkg/plugins.js:HelloPlugin' };
const missing: EntryPoint = { group: 'demo.greeters', name: 'gone', value: 'removed-pkg/plugins.js:Gone' };
const notAPlugin: EntryPoint = { group: 'demo.greeters', name: 'helper', value: 'demo-pkg/plugins.js:helper' };

const entryPoints: EntryPointsResolver = {
    getEntryPoints: async () => buildEntryPointIndex([good, missing, notAPlugin]),
};

const codeLoader: CodeLoader = {
    async load(locator) {
        if (locator === good.value) return HelloPlugin;
        if (locator === notAPlugin.value) return () => 'not a plugin';
        throw new Error(`Cannot find package 'removed-pkg'`);
    },
};

function createFinder(namespace: string, onResolveException: ResolveExceptionCallback = vi.fn()) {
    return new MetadataPluginFinder(namespace, {
        entryPointsResolver: entryPoints,
        codeLoader,
        specResolver: new PluginSpecResolver(new FunctionPluginRegistry()),
        onResolveException,
        logger: silentLogger(),
    });
}

describe('MetadataPluginFinder', () => {
    it('resolves the entry points of its namespace', async () => {
        const specs = await createFinder('demo.greeters').findPlugins();

        expect(specs).toHaveLength(1);
        expect(specs[0].name).toBe('hello');
        expect(specs[0].namespace).toBe('demo.greeters');
        expect(specs[0].locator).toBe('demo-pkg/plugins.js:HelloPlugin');
    });

    it('reports entry points that cannot be loaded or resolved', async () => {
        const onResolveException = vi.fn();
        await createFinder('demo.greeters', onResolveException).findPlugins();

        expect(onResolveException).toHaveBeenCalledTimes(2);

        const [namespace, entryPoint, error] = onResolveException.mock.calls[0];
        expect(namespace).toBe('demo.greeters');
        expect(entryPoint).toEqual(missing);
        expect(error).toEqual(new Error(`Cannot find package 'removed-pkg'`));

        expect(onResolveException.mock.calls[1][1]).toEqual(notAPlugin);
        expect(onResolveException.mock.calls[1][2]).toBeInstanceOf(PluginResolutionError);
    });

    it('finds nothing in an unknown namespace', async () => {
        await expect(createFinder('unknown.namespace').findPlugins()).resolves.toEqual([]);
    });

    it('waits for async failure callbacks', async () => {
        const reported: string[] = [];
        const onResolveException = vi.fn(async (_ns: string, ep: EntryPoint) => {
            await new Promise(resolve => setTimeout(resolve, 5));
            reported.push(ep.name);
        });

        await createFinder('demo.greeters', onResolveException).findPlugins();
        expect(reported).toEqual(['gone', 'helper']);
    });
});
