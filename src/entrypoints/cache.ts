import { createHash, type Hash } from 'node:crypto';
import { readFile, writeFile, mkdir, stat } from 'node:fs/promises';
import path from 'node:path';
import { glob } from 'glob';
import type { EntryPointIndex, EntryPointsResolver } from './types.js';
import { parseEntryPointsText, serializeEntryPointsText, buildEntryPointIndex } from './text.js';
import { MetadataEntryPointsResolver, readEditableRedirect, ENTRY_POINTS_FILE, EDITABLE_REDIRECT_FILE } from './metadata.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { defaultSearchPath, getWaypostCacheDir } from '../utils/paths.js';
import { isNotFound, toError } from '../utils/errors.js';

/**
 * Identifies the Node.js installation the cache was built for
 */
export interface RuntimeIdentity {
    execPath: string;
    version: string;
}

/**
 * Builds an index for a search path, bypassing any cache
 */
export interface SearchPathResolver {
    resolve(searchPath: readonly string[]): Promise<EntryPointIndex>;
}

export interface EntryPointsCacheOptions {
    cacheDir?: string;
    /** Search path used by `getEntryPoints()` (default: the module lookup chain of the cwd) */
    searchPath?: string[];
    resolver?: SearchPathResolver;
    runtime?: RuntimeIdentity;
    /** Name of the declaration file in each package */
    fileName?: string;
    logger?: Logger;
}

const MISSING_MTIME = -1;

/**
 * Entry Points Cache — avoids scanning every installed package on each start
 *
 * Indexes are stored in `<cacheDir>/<hash>.entry_points.ini`, where the hash covers the
 * Node.js installation and the modification times of every search path entry and every
 * entry point file below it. Installing, removing or editing a package changes the hash,
 * which makes the old file unreachable.
 *
 * Within one process, results are additionally kept in memory per search path.
 */
export class EntryPointsCache implements EntryPointsResolver {
    private static shared?: EntryPointsCache;

    private memo: Map<string, Promise<EntryPointIndex>> = new Map();
    private cacheDir: string;
    private searchPath?: string[];
    private resolver: SearchPathResolver;
    private runtime: RuntimeIdentity;
    private fileName: string;
    private logger: Logger;

    constructor(options: EntryPointsCacheOptions = {}) {
        this.cacheDir = options.cacheDir ?? getWaypostCacheDir();
        this.searchPath = options.searchPath;
        this.fileName = options.fileName ?? ENTRY_POINTS_FILE;
        this.logger = options.logger ?? getLogger('cache');
        this.resolver = options.resolver ?? new MetadataEntryPointsResolver({ fileName: this.fileName, logger: this.logger });
        this.runtime = options.runtime ?? { execPath: process.execPath, version: process.version };
    }

    /**
     * Process-wide instance with default settings
     */
    static instance(): EntryPointsCache {
        if (!EntryPointsCache.shared) {
            EntryPointsCache.shared = new EntryPointsCache();
        }
        return EntryPointsCache.shared;
    }

    getEntryPoints(): Promise<EntryPointIndex> {
        return this.get(this.searchPath ?? defaultSearchPath());
    }

    /**
     * Get the index of a search path. Concurrent calls for the same path share one build.
     */
    get(searchPath: readonly string[]): Promise<EntryPointIndex> {
        const key = JSON.stringify(searchPath);

        const pending = this.memo.get(key);
        if (pending) return pending;

        const build = this.buildAndStoreIndex(searchPath).catch((err: unknown) => {
            // forget failed builds so the next call retries
            this.memo.delete(key);
            throw err;
        });
        this.memo.set(key, build);
        return build;
    }

    /**
     * Forget everything held in memory (the files on disk are kept)
     */
    clear(): void {
        this.memo.clear();
    }

    /**
     * Path of the cache file for a search path in its current state
     */
    async cacheFile(searchPath: readonly string[]): Promise<string> {
        const hash = await this.calculateHashKey(searchPath);
        return path.join(this.cacheDir, `${hash}.entry_points.ini`);
    }

    async buildAndStoreIndex(searchPath: readonly string[]): Promise<EntryPointIndex> {
        const file = await this.cacheFile(searchPath);

        const cached = await this.readCacheFile(file);
        if (cached) {
            this.logger.debug('using entry points cache %s', file);
            return cached;
        }

        this.logger.debug('building entry points cache %s', file);
        const index = await this.resolver.resolve(searchPath);

        try {
            await mkdir(path.dirname(file), { recursive: true });
            await writeFile(file, serializeEntryPointsText(index), 'utf-8');
        } catch (err) {
            this.logger.warn('could not write entry points cache %s: %s', file, toError(err).message);
        }

        return index;
    }

    async calculateHashKey(searchPath: readonly string[]): Promise<string> {
        const hash = createHash('sha256');
        update(hash, this.runtime.execPath);
        update(hash, this.runtime.version);

        for (const entry of searchPath) {
            update(hash, entry);
            updateMtime(hash, await mtimeOf(entry));

            for (const file of await this.iterEntryPointFiles(entry)) {
                update(hash, file);
                updateMtime(hash, await mtimeOf(file));
            }
        }

        return hash.digest('hex');
    }

    /**
     * Every entry point file of the packages in a search path entry, including redirect targets, sorted
     */
    async iterEntryPointFiles(entry: string): Promise<string[]> {
        const options = { cwd: entry, absolute: true };
        const declared = await glob([`*/${this.fileName}`, `@*/*/${this.fileName}`], options);
        const redirects = await glob([`*/${EDITABLE_REDIRECT_FILE}`, `@*/*/${EDITABLE_REDIRECT_FILE}`], options);

        const files = new Set(declared);
        for (const redirect of redirects) {
            const target = await readEditableRedirect(path.dirname(redirect));
            if (target) files.add(target);
        }
        return [...files].sort();
    }

    private async readCacheFile(file: string): Promise<EntryPointIndex | undefined> {
        try {
            const text = await readFile(file, 'utf-8');
            return buildEntryPointIndex(parseEntryPointsText(text));
        } catch (err) {
            if (!isNotFound(err)) {
                this.logger.warn('ignoring unreadable entry points cache %s: %s', file, toError(err).message);
            }
            return undefined;
        }
    }
}

function update(hash: Hash, value: string): void {
    hash.update(value, 'utf-8');
    hash.update('\0');
}

function updateMtime(hash: Hash, mtimeMs: number): void {
    const buf = Buffer.alloc(8);
    buf.writeDoubleLE(mtimeMs);
    hash.update(buf);
}

async function mtimeOf(target: string): Promise<number> {
    try {
        return (await stat(target)).mtimeMs;
    } catch {
        return MISSING_MTIME;
    }
}
