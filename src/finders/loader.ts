import { createRequire } from 'node:module';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { parseLocator } from '../entrypoints/convert.js';
import { PluginResolutionError } from '../plugins/errors.js';

export type ImportModule = (specifier: string) => Promise<unknown>;

/**
 * Loads the object a locator points to
 */
export interface CodeLoader {
    load(locator: string): Promise<unknown>;
}

const defaultImport: ImportModule = specifier => import(specifier);

/**
 * Resolves locators from a base directory and loads them with dynamic `import()`
 *
 * `my-pkg/dist/plugins.js:GreeterPlugin` imports `my-pkg/dist/plugins.js` as it would be
 * imported from a module in `baseDir` and returns its `GreeterPlugin` export. Relative
 * specifiers are relative to `baseDir`. Without an export path the default export is used.
 */
export class ModuleCodeLoader implements CodeLoader {
    constructor(
        private readonly baseDir: string = process.cwd(),
        private readonly importModule: ImportModule = defaultImport
    ) {}

    async load(locator: string): Promise<unknown> {
        const { specifier, exportPath } = parseLocator(locator);
        const mod = await this.importModule(this.resolveSpecifier(specifier));

        let current: unknown = mod;
        for (let i = 0; i < exportPath.length; i++) {
            const key = exportPath[i];
            if (current === null || (typeof current !== 'object' && typeof current !== 'function') || !(key in current)) {
                throw new PluginResolutionError(
                    `module ${specifier} has no export ${exportPath.slice(0, i + 1).join('.')}`
                );
            }
            current = Reflect.get(current, key);
        }
        return current;
    }

    /**
     * The URL or specifier passed to `import()`
     */
    resolveSpecifier(specifier: string): string {
        if (specifier.startsWith('node:')) {
            return specifier;
        }

        const require = createRequire(path.join(this.baseDir, 'noop.js'));
        try {
            return pathToFileURL(require.resolve(specifier)).href;
        } catch {
            // ESM-only packages may have no `require` export condition
            if (specifier.startsWith('.') || path.isAbsolute(specifier)) {
                return pathToFileURL(path.resolve(this.baseDir, specifier)).href;
            }
            return specifier;
        }
    }
}
