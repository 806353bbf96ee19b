import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { readFile, writeFile, utimes, mkdir } from 'node:fs/promises';
import path from 'node:path';
import { EntryPointsCache, type SearchPathResolver } from './cache.js';
import { MetadataEntryPointsResolver } from './metadata.js';
import { buildEntryPointIndex } from './text.js';
import type { EntryPointIndex } from './types.js';
import { silentLogger } from '../testing/logger.js';
import { makeTempDir, removeDir, writeFiles, packageJson } from '../testing/fs.js';

const runtime = { execPath: '/opt/node/bin/node', version: 'v20.0.0' };

describe('EntryPointsCache', () => {
    let root: string;
    let modules: string;
    let cacheDir: string;

    function createCache(resolver?: SearchPathResolver, options: { version?: string } = {}): EntryPointsCache {
        return new EntryPointsCache({
            cacheDir,
            searchPath: [modules],
            resolver: resolver ?? new MetadataEntryPointsResolver({ logger: silentLogger() }),
            runtime: { ...runtime, version: options.version ?? runtime.version },
            logger: silentLogger(),
        });
    }

    function spyResolver(): { resolve: Mock<(searchPath: readonly string[]) => Promise<EntryPointIndex>> } {
        return {
            resolve: vi.fn(async (_searchPath: readonly string[]): Promise<EntryPointIndex> =>
                buildEntryPointIndex([{ group: 'g', name: 'spy', value: 'spy-pkg/x.js:Spy' }])
            ),
        };
    }

    beforeEach(async () => {
        root = await makeTempDir();
        modules = path.join(root, 'node_modules');
        cacheDir = path.join(root, 'cache');
        await writeFiles(modules, {
            'a-pkg/package.json': packageJson('a-pkg'),
            'a-pkg/entry_points.ini': '[demo.greeters]\nhello = a-pkg/plugins.js:Hello\n',
            '@scope/b-pkg/package.json': packageJson('@scope/b-pkg'),
            '@scope/b-pkg/entry_points.ini': '[demo.greeters]\nbye = @scope/b-pkg/plugins.js:Bye\n',
        });
    });

    afterEach(async () => {
        await removeDir(root);
    });

    it('builds the index and writes it to the cache directory', async () => {
        const cache = createCache();

        const index = await cache.getEntryPoints();

        expect(index.get('demo.greeters')).toEqual([
            { group: 'demo.greeters', name: 'bye', value: '@scope/b-pkg/plugins.js:Bye' },
            { group: 'demo.greeters', name: 'hello', value: 'a-pkg/plugins.js:Hello' },
        ]);

        const file = await cache.cacheFile([modules]);
        expect(path.dirname(file)).toBe(cacheDir);
        expect(path.basename(file)).toMatch(/^[0-9a-f]{64}\.entry_points\.ini$/);
        expect(await readFile(file, 'utf-8')).toBe(
            '[demo.greeters]\nbye = @scope/b-pkg/plugins.js:Bye\nhello = a-pkg/plugins.js:Hello\n\n'
        );
    });

    it('reads an existing cache file instead of scanning', async () => {
        const first = spyResolver();
        await createCache(first).getEntryPoints();

        const second = spyResolver();
        const index = await createCache(second).getEntryPoints();

        expect(first.resolve).toHaveBeenCalledOnce();
        expect(second.resolve).not.toHaveBeenCalled();
        expect(index.get('g')).toEqual([{ group: 'g', name: 'spy', value: 'spy-pkg/x.js:Spy' }]);
    });

    it('changes the hash when a declaration file is modified', async () => {
        const cache = createCache();
        const before = await cache.calculateHashKey([modules]);
        expect(await cache.calculateHashKey([modules])).toBe(before);

        const stamp = new Date('2021-03-04T05:06:07.891Z');
        await utimes(path.join(modules, 'a-pkg', 'entry_points.ini'), stamp, stamp);

        expect(await cache.calculateHashKey([modules])).not.toBe(before);
    });

    it('changes the hash when a package is added', async () => {
        const cache = createCache();
        const before = await cache.calculateHashKey([modules]);

        await writeFiles(modules, {
            'c-pkg/package.json': packageJson('c-pkg'),
            'c-pkg/entry_points.ini': '[g]\nc = c-pkg/x.js\n',
        });
        const stamp = new Date('2022-01-01T00:00:00.000Z');
        await utimes(modules, stamp, stamp);

        expect(await cache.calculateHashKey([modules])).not.toBe(before);
    });

    it('changes the hash with the Node.js runtime', async () => {
        const current = await createCache().calculateHashKey([modules]);
        const upgraded = await createCache(undefined, { version: 'v20.1.0' }).calculateHashKey([modules]);

        expect(upgraded).not.toBe(current);
    });

    it('covers declaration files and redirect targets', async () => {
        const target = path.join(root, 'src', 'entry_points.ini');
        await writeFiles(root, { 'src/entry_points.ini': '[g]\nlocal = ./src/x.js\n' });
        await writeFiles(modules, {
            'dev-pkg/package.json': packageJson('dev-pkg'),
            'dev-pkg/entry_points_editable.txt': target,
        });

        const files = await createCache().iterEntryPointFiles(modules);

        expect(files).toEqual([
            path.join(modules, '@scope', 'b-pkg', 'entry_points.ini'),
            path.join(modules, 'a-pkg', 'entry_points.ini'),
            target,
        ].sort());
    });

    it('shares one build between concurrent callers', async () => {
        const resolver = spyResolver();
        const cache = createCache(resolver);

        const [first, second] = await Promise.all([cache.getEntryPoints(), cache.getEntryPoints()]);

        expect(first).toBe(second);
        expect(resolver.resolve).toHaveBeenCalledOnce();
    });

    it('forgets failed builds', async () => {
        const resolver = spyResolver();
        resolver.resolve.mockRejectedValueOnce(new Error('scan failed'));
        const cache = createCache(resolver);

        await expect(cache.getEntryPoints()).rejects.toThrow('scan failed');
        expect((await cache.getEntryPoints()).get('g')).toHaveLength(1);
        expect(resolver.resolve).toHaveBeenCalledTimes(2);
    });

    it('rebuilds when the cache file is not readable', async () => {
        const resolver = spyResolver();
        const cache = createCache(resolver);
        const file = await cache.cacheFile([modules]);
        await mkdir(cacheDir, { recursive: true });
        await writeFile(file, 'not an entry points file', 'utf-8');

        const index = await cache.getEntryPoints();

        expect(resolver.resolve).toHaveBeenCalledOnce();
        expect(index.get('g')).toHaveLength(1);
        expect(await readFile(file, 'utf-8')).toBe('[g]\nspy = spy-pkg/x.js:Spy\n\n');
    });

    it('returns one process-wide instance', () => {
        expect(EntryPointsCache.instance()).toBe(EntryPointsCache.instance());
    });
});
