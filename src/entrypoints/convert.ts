import type { PluginFinder, PluginSpec } from '../plugins/types.js';
import type { EntryPoint, EntryPointMapping } from './types.js';
import { DuplicateEntryPointError, PluginResolutionError } from '../plugins/errors.js';

export interface Locator {
    /** Module specifier, as passed to `import()` */
    specifier: string;
    /** Export path within the module; `['default']` when the locator names none */
    exportPath: string[];
}

/**
 * Split a locator `module:export.path` into its parts.
 * `node:` builtins keep their prefix: `node:path:basename`.
 */
export function parseLocator(locator: string): Locator {
    const offset = locator.startsWith('node:') ? 'node:'.length : 0;
    const colon = locator.lastIndexOf(':');

    if (colon >= offset) {
        const exportPart = locator.slice(colon + 1);
        // a drive letter or URL scheme is followed by a path, never by an identifier
        if (exportPart && !/[\\/]/.test(exportPart)) {
            return { specifier: locator.slice(0, colon), exportPath: exportPart.split('.') };
        }
    }
    return { specifier: locator, exportPath: ['default'] };
}

export function formatLocator(specifier: string, exportPath: readonly string[]): string {
    return `${specifier}:${exportPath.join('.')}`;
}

/**
 * Turn a spec into an entry point. Only specs that know where they were found can be written.
 */
export function specToEntryPoint(spec: PluginSpec): EntryPoint {
    if (!spec.locator) {
        throw new PluginResolutionError(
            `cannot create an entry point for ${spec.namespace}:${spec.name}: the plugin was not discovered through an exported symbol`
        );
    }
    return { group: spec.namespace, name: spec.name, value: spec.locator };
}

export function toEntryPointMapping(entryPoints: Iterable<EntryPoint>): EntryPointMapping {
    const mapping: EntryPointMapping = {};
    const seen = new Map<string, Set<string>>();

    for (const ep of entryPoints) {
        let names = seen.get(ep.group);
        if (!names) {
            names = new Set();
            seen.set(ep.group, names);
            mapping[ep.group] = [];
        }
        if (names.has(ep.name)) {
            throw new DuplicateEntryPointError(ep.group, ep.name);
        }
        names.add(ep.name);
        mapping[ep.group].push(`${ep.name}=${ep.value}`);
    }

    return mapping;
}

/**
 * Run a finder and build the entry point mapping of everything it found
 */
export async function discoverEntryPoints(finder: PluginFinder): Promise<EntryPointMapping> {
    const specs = await finder.findPlugins();
    return toEntryPointMapping(specs.map(specToEntryPoint));
}
