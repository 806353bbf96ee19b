import { readFile, readdir, access, stat } from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { PluginSpec } from '../plugins/types.js';
import type { EntryPoint, EntryPointIndex, EntryPointsResolver } from './types.js';
import { parseEntryPointsText, buildEntryPointIndex } from './text.js';
import { parseLocator } from './convert.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { defaultSearchPath } from '../utils/paths.js';
import { isNotFound, toError } from '../utils/errors.js';

export const ENTRY_POINTS_FILE = 'entry_points.ini';
export const EDITABLE_REDIRECT_FILE = 'entry_points_editable.txt';

const PackageJsonSchema = z.object({
    name: z.string().optional(),
    version: z.string().optional(),
}).passthrough();

/**
 * An installed package found on the search path
 */
export interface Distribution {
    name: string;
    version?: string;
    /** Package root directory */
    path: string;
}

// ─── Distributions ──────────────────────────────────────────────────────────

/**
 * List the packages installed in each search path entry, in search path order.
 * Entries that do not exist are skipped.
 */
export async function listDistributions(searchPath: readonly string[]): Promise<Distribution[]> {
    const distributions: Distribution[] = [];

    for (const entry of searchPath) {
        for (const dir of await listPackageDirs(entry)) {
            const dist = await readDistribution(dir);
            if (dist) distributions.push(dist);
        }
    }

    return distributions;
}

/**
 * Read the package at a directory, or null if it has no readable package.json
 */
export async function readDistribution(dir: string): Promise<Distribution | null> {
    let content: string;
    try {
        content = await readFile(path.join(dir, 'package.json'), 'utf-8');
    } catch {
        return null; // not a package
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(content);
    } catch {
        return null;
    }

    const manifest = PackageJsonSchema.safeParse(parsed);
    if (!manifest.success) return null;

    return {
        name: manifest.data.name ?? packageNameFromDir(dir),
        version: manifest.data.version,
        path: dir,
    };
}

/**
 * Package directories of one search path entry: `<entry>/<name>` and `<entry>/@scope/<name>`, sorted
 */
export async function listPackageDirs(entry: string): Promise<string[]> {
    const names = await listDirectories(entry);
    const dirs: string[] = [];

    for (const name of names) {
        if (name.startsWith('.')) continue;

        if (name.startsWith('@')) {
            for (const scoped of await listDirectories(path.join(entry, name))) {
                dirs.push(path.join(entry, name, scoped));
            }
        } else {
            dirs.push(path.join(entry, name));
        }
    }

    return dirs;
}

async function listDirectories(dir: string): Promise<string[]> {
    let entries: Dirent[];
    try {
        entries = await readdir(dir, { withFileTypes: true });
    } catch (err) {
        if (isNotFound(err)) return [];
        throw err;
    }

    const names: string[] = [];
    for (const entry of entries) {
        if (entry.isDirectory()) {
            names.push(entry.name);
        } else if (entry.isSymbolicLink() && await isDirectory(path.join(dir, entry.name))) {
            // linked workspace packages
            names.push(entry.name);
        }
    }
    return names.sort();
}

async function isDirectory(target: string): Promise<boolean> {
    try {
        return (await stat(target)).isDirectory();
    } catch {
        return false;
    }
}

function packageNameFromDir(dir: string): string {
    const base = path.basename(dir);
    const parent = path.basename(path.dirname(dir));
    return parent.startsWith('@') ? `${parent}/${base}` : base;
}

// ─── Entry point files ──────────────────────────────────────────────────────

/**
 * The entry point file a redirect file in `dir` points to, if it points to an existing file
 */
export async function readEditableRedirect(dir: string): Promise<string | undefined> {
    let content: string;
    try {
        content = await readFile(path.join(dir, EDITABLE_REDIRECT_FILE), 'utf-8');
    } catch {
        return undefined;
    }

    const target = content.trim();
    if (!target) return undefined;

    const resolved = path.resolve(dir, target);
    try {
        await access(resolved);
        return resolved;
    } catch {
        return undefined;
    }
}

export interface ResolveEntryPointsOptions {
    fileName?: string;
    logger?: Logger;
}

/**
 * Collect the entry points declared by distributions. A redirect file takes precedence over the
 * package's own declaration file. Repeats of the same (name, value, group) are dropped.
 */
export async function resolveEntryPoints(
    distributions: readonly Distribution[],
    options: ResolveEntryPointsOptions = {}
): Promise<EntryPoint[]> {
    const fileName = options.fileName ?? ENTRY_POINTS_FILE;
    const logger = options.logger ?? getLogger('metadata');

    const seen = new Set<string>();
    const result: EntryPoint[] = [];

    for (const dist of distributions) {
        const file = await readEditableRedirect(dist.path) ?? path.join(dist.path, fileName);

        let text: string;
        try {
            text = await readFile(file, 'utf-8');
        } catch (err) {
            if (isNotFound(err)) continue;
            throw err;
        }

        let entryPoints: EntryPoint[];
        try {
            entryPoints = parseEntryPointsText(text);
        } catch (err) {
            logger.warn('ignoring invalid entry points of %s in %s: %s', dist.name, file, toError(err).message);
            continue;
        }

        for (const ep of entryPoints) {
            const key = `${ep.group}\0${ep.name}\0${ep.value}`;
            if (seen.has(key)) continue;
            seen.add(key);
            result.push(ep);
        }
    }

    return result;
}

// ─── Resolvers ──────────────────────────────────────────────────────────────

export interface MetadataResolverOptions {
    /** Directories to search for packages (default: the module lookup chain of the cwd) */
    searchPath?: string[];
    /** Name of the declaration file in each package */
    fileName?: string;
    logger?: Logger;
}

/**
 * Reads the entry points of all installed packages on every call, without caching
 */
export class MetadataEntryPointsResolver implements EntryPointsResolver {
    private searchPath?: string[];
    private fileName: string;
    private logger: Logger;

    constructor(options: MetadataResolverOptions = {}) {
        this.searchPath = options.searchPath;
        this.fileName = options.fileName ?? ENTRY_POINTS_FILE;
        this.logger = options.logger ?? getLogger('metadata');
    }

    async resolve(searchPath: readonly string[]): Promise<EntryPointIndex> {
        const distributions = await listDistributions(searchPath);
        this.logger.debug('found %d distributions on %d search path entries', distributions.length, searchPath.length);
        const entryPoints = await resolveEntryPoints(distributions, { fileName: this.fileName, logger: this.logger });
        return buildEntryPointIndex(entryPoints);
    }

    getEntryPoints(): Promise<EntryPointIndex> {
        return this.resolve(this.searchPath ?? defaultSearchPath());
    }
}

/**
 * Maps plugins to the installed package that ships them
 */
export class DistributionResolver {
    private cache: Map<string, Distribution | null> = new Map();

    constructor(private readonly searchPath: readonly string[] = defaultSearchPath()) {}

    /**
     * The distribution of a spec, or undefined if its locator is relative, a builtin or unknown
     */
    async resolve(spec: PluginSpec): Promise<Distribution | undefined> {
        if (!spec.locator) return undefined;

        const name = packageNameOf(parseLocator(spec.locator).specifier);
        if (!name) return undefined;

        if (!this.cache.has(name)) {
            this.cache.set(name, await this.find(name));
        }
        return this.cache.get(name) ?? undefined;
    }

    private async find(name: string): Promise<Distribution | null> {
        for (const entry of this.searchPath) {
            const dist = await readDistribution(path.join(entry, name));
            if (dist) return dist;
        }
        return null;
    }
}

/**
 * Package name of a bare module specifier: `pkg/x.js` → `pkg`, `@scope/pkg/x.js` → `@scope/pkg`
 */
export function packageNameOf(specifier: string): string | undefined {
    if (!specifier || specifier.startsWith('.') || specifier.startsWith('node:') || path.isAbsolute(specifier)) {
        return undefined;
    }
    if (/^[a-zA-Z][a-zA-Z0-9+.-]*:/.test(specifier)) {
        return undefined; // URL
    }

    const segments = specifier.split('/');
    if (specifier.startsWith('@')) {
        return segments.length >= 2 ? `${segments[0]}/${segments[1]}` : undefined;
    }
    return segments[0];
}
