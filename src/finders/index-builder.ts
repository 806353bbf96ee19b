import { writeFile, mkdir } from 'node:fs/promises';
import path from 'node:path';
import type { PluginFinder } from '../plugins/types.js';
import type { EntryPointMapping } from '../entrypoints/types.js';
import { discoverEntryPoints } from '../entrypoints/convert.js';
import { serializeEntryPointsText, buildEntryPointIndex, mappingToEntryPoints } from '../entrypoints/text.js';

export type IndexFormat = 'json' | 'ini';

export interface BuiltIndex {
    mapping: EntryPointMapping;
    content: string;
}

/**
 * Builds the entry point declaration of a package from the plugins a finder discovers
 */
export class PluginIndexBuilder {
    constructor(private readonly finder: PluginFinder) {}

    async build(format: IndexFormat = 'json'): Promise<BuiltIndex> {
        const mapping = await discoverEntryPoints(this.finder);
        return { mapping, content: renderIndex(mapping, format) };
    }

    /**
     * Build and write the index to a file
     */
    async write(target: string, format: IndexFormat = 'json'): Promise<EntryPointMapping> {
        const { mapping, content } = await this.build(format);
        await mkdir(path.dirname(target), { recursive: true });
        await writeFile(target, content, 'utf-8');
        return mapping;
    }
}

export function renderIndex(mapping: EntryPointMapping, format: IndexFormat): string {
    if (format === 'ini') {
        return serializeEntryPointsText(buildEntryPointIndex(mappingToEntryPoints(mapping)));
    }

    const sorted: EntryPointMapping = {};
    for (const group of Object.keys(mapping).sort()) {
        sorted[group] = [...mapping[group]].sort();
    }
    return JSON.stringify(sorted, null, 2) + '\n';
}
