import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { ModuleScanningPluginFinder, PackagePathPluginFinder } from './scanner.js';
import { PluginSpecResolver } from '../plugins/resolver.js';
import { FunctionPluginRegistry } from '../plugins/function-plugin.js';
import { Plugin } from '../plugins/types.js';
import { captureLogger, silentLogger } from '../testing/logger.js';
import { makeTempDir, removeDir, writeFiles } from '../testing/fs.js';

class HelloPlugin extends Plugin {
    static readonly namespace = 'demo.greeters';
    static readonly pluginName = 'hello';
}

class ByePlugin extends Plugin {
    static readonly namespace = 'demo.greeters';
    static readonly pluginName = 'bye';
}

describe('ModuleScanningPluginFinder', () => {
    it('finds plugins among module exports', async () => {
        const registry = new FunctionPluginRegistry();
        const shout = registry.register('demo.formatters', function shout(text: string) {
            return text.toUpperCase();
        });

        const finder = new ModuleScanningPluginFinder([
            { id: 'demo-pkg/plugins.js', exports: { HelloPlugin, VERSION: '1.0.0', helper: () => 1 } },
            { id: 'demo-pkg/formatters.js', exports: { shout } },
        ], new PluginSpecResolver(registry));

        const specs = await finder.findPlugins();

        expect(specs.map(spec => [spec.namespace, spec.name, spec.locator])).toEqual([
            ['demo.greeters', 'hello', 'demo-pkg/plugins.js:HelloPlugin'],
            ['demo.formatters', 'shout', 'demo-pkg/formatters.js:shout'],
        ]);
    });

    it('keeps the first location of a re-exported plugin', async () => {
        const finder = new ModuleScanningPluginFinder([
            { id: 'demo-pkg/plugins.js', exports: { HelloPlugin } },
            { id: 'demo-pkg/index.js', exports: { HelloPlugin, Alias: HelloPlugin } },
        ], new PluginSpecResolver(new FunctionPluginRegistry()));

        const specs = await finder.findPlugins();

        expect(specs).toHaveLength(1);
        expect(specs[0].locator).toBe('demo-pkg/plugins.js:HelloPlugin');
    });
});

describe('PackagePathPluginFinder', () => {
    let root: string;
    const modules = new Map<string, object>();

    async function importModule(url: string): Promise<unknown> {
        const exports = modules.get(url);
        if (!exports) throw new Error(`broken module ${path.basename(url)}`);
        return exports;
    }

    function urlOf(relative: string): string {
        return pathToFileURL(path.join(root, relative)).href;
    }

    beforeEach(async () => {
        root = await makeTempDir();
        await writeFiles(root, {
            'dist/hello.js': '',
            'dist/nested/bye.mjs': '',
            'dist/broken.cjs': '',
            'dist/skipped.js': '',
            'node_modules/dep/index.js': '',
            'README.md': '',
        });
        modules.clear();
        modules.set(urlOf('dist/hello.js'), { HelloPlugin });
        modules.set(urlOf('dist/nested/bye.mjs'), { ByePlugin });
        modules.set(urlOf('dist/skipped.js'), { HelloPlugin });
        modules.set(urlOf('node_modules/dep/index.js'), { ByePlugin });
    });

    afterEach(async () => {
        await removeDir(root);
    });

    it('lists JavaScript modules outside node_modules', async () => {
        const finder = new PackagePathPluginFinder({ path: root, exclude: ['dist/skipped.js'], importModule, logger: silentLogger() });

        expect(await finder.listModules()).toEqual(['dist/broken.cjs', 'dist/hello.js', 'dist/nested/bye.mjs']);
    });

    it('restricts scanning to included globs', async () => {
        const finder = new PackagePathPluginFinder({ path: root, include: ['dist/nested/**'], importModule, logger: silentLogger() });

        expect(await finder.listModules()).toEqual(['dist/nested/bye.mjs']);
    });

    it('addresses modules by package name', async () => {
        await writeFiles(root, { 'package.json': JSON.stringify({ name: 'demo-pkg' }) });
        const finder = new PackagePathPluginFinder({
            path: root,
            exclude: ['dist/skipped.js'],
            importModule,
            specResolver: new PluginSpecResolver(new FunctionPluginRegistry()),
            logger: silentLogger(),
        });

        const specs = await finder.findPlugins();

        expect(specs.map(spec => spec.locator)).toEqual([
            'demo-pkg/dist/hello.js:HelloPlugin',
            'demo-pkg/dist/nested/bye.mjs:ByePlugin',
        ]);
    });

    it('addresses modules relative to the directory without a package name', async () => {
        const finder = new PackagePathPluginFinder({ path: root, include: ['dist/hello.js'], importModule, logger: silentLogger() });

        const specs = await finder.findPlugins();

        expect(specs.map(spec => spec.locator)).toEqual(['./dist/hello.js:HelloPlugin']);
    });

    it('logs modules that fail to import and goes on', async () => {
        const { logger, lines } = captureLogger();
        const finder = new PackagePathPluginFinder({ path: root, exclude: ['dist/skipped.js'], importModule, logger });

        const specs = await finder.findPlugins();

        expect(specs.map(spec => spec.name)).toEqual(['hello', 'bye']);
        expect(lines.filter(line => line.level === 50).map(line => line.msg)).toEqual([
            'error importing module ./dist/broken.cjs: broken module broken.cjs',
        ]);
    });
});
