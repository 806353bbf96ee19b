import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { glob } from 'glob';
import type { PluginFinder, PluginSpec } from '../plugins/types.js';
import { PluginSpecResolver } from '../plugins/resolver.js';
import type { ImportModule } from './loader.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { toError } from '../utils/errors.js';

/**
 * A module and its exports. `id` is the specifier written into locators.
 */
export interface ScannedModule {
    id: string;
    exports: object;
}

/**
 * Finds plugins among the exports of already imported modules
 */
export class ModuleScanningPluginFinder implements PluginFinder {
    constructor(
        private readonly modules: readonly ScannedModule[],
        private readonly specResolver: PluginSpecResolver = new PluginSpecResolver()
    ) {}

    async findPlugins(): Promise<PluginSpec[]> {
        const specs: PluginSpec[] = [];

        for (const mod of this.modules) {
            for (const [exportName, value] of Object.entries(mod.exports)) {
                const spec = this.specResolver.tryResolve(value, `${mod.id}:${exportName}`);
                if (!spec) continue;
                // the same plugin re-exported from another module
                if (specs.some(existing => existing.equals(spec))) continue;
                specs.push(spec);
            }
        }

        return specs;
    }
}

export interface PackagePathPluginFinderOptions {
    /** Directory to scan */
    path: string;
    /** Globs of modules to scan, relative to `path` (default: all JavaScript modules) */
    include?: string[];
    /** Globs of modules to skip */
    exclude?: string[];
    importModule?: ImportModule;
    specResolver?: PluginSpecResolver;
    logger?: Logger;
}

const DEFAULT_INCLUDE = ['**/*.{js,mjs,cjs}'];

/**
 * Imports every module below a directory and finds the plugins they export.
 * Used at build time to generate the entry point declaration of a package.
 */
export class PackagePathPluginFinder implements PluginFinder {
    private root: string;
    private include: string[];
    private exclude: string[];
    private importModule: ImportModule;
    private specResolver: PluginSpecResolver;
    private logger: Logger;

    constructor(options: PackagePathPluginFinderOptions) {
        this.root = path.resolve(options.path);
        this.include = options.include?.length ? options.include : DEFAULT_INCLUDE;
        this.exclude = options.exclude ?? [];
        this.importModule = options.importModule ?? (specifier => import(specifier));
        this.specResolver = options.specResolver ?? new PluginSpecResolver();
        this.logger = options.logger ?? getLogger('scanner');
    }

    async findPlugins(): Promise<PluginSpec[]> {
        const modules = await this.importModules();
        return new ModuleScanningPluginFinder(modules, this.specResolver).findPlugins();
    }

    /**
     * Relative paths of the modules that will be scanned, sorted
     */
    async listModules(): Promise<string[]> {
        const files = await glob(this.include, {
            cwd: this.root,
            nodir: true,
            posix: true,
            ignore: ['**/node_modules/**', ...this.exclude],
        });
        return files.sort();
    }

    private async importModules(): Promise<ScannedModule[]> {
        const packageName = await this.readPackageName();
        const modules: ScannedModule[] = [];

        for (const file of await this.listModules()) {
            const id = packageName ? `${packageName}/${file}` : `./${file}`;
            try {
                const exports = await this.importModule(pathToFileURL(path.join(this.root, file)).href);
                if (typeof exports === 'object' && exports !== null) {
                    modules.push({ id, exports });
                }
            } catch (err) {
                this.logger.error('error importing module %s: %s', id, toError(err).message);
            }
        }

        this.logger.debug('scanned %d modules in %s', modules.length, this.root);
        return modules;
    }

    private async readPackageName(): Promise<string | undefined> {
        try {
            const manifest: unknown = JSON.parse(await readFile(path.join(this.root, 'package.json'), 'utf-8'));
            if (typeof manifest === 'object' && manifest !== null && 'name' in manifest && typeof manifest.name === 'string') {
                return manifest.name;
            }
        } catch {
            // no package.json: modules are addressed relative to the scanned directory
        }
        return undefined;
    }
}
