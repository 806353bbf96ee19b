import type { EntryPoint, EntryPointIndex, EntryPointMapping } from './types.js';
import { EntryPointParseError } from '../plugins/errors.js';

const SECTION = /^\[([^\]]+)\]$/;

/**
 * Parse the contents of an `entry_points.ini` file.
 *
 * ```ini
 * [demo.greeters]
 * hello = demo-pkg/dist/plugins.js:HelloPlugin
 * ```
 */
export function parseEntryPointsText(text: string): EntryPoint[] {
    const entryPoints: EntryPoint[] = [];
    let group: string | undefined;

    const lines = text.split(/\r?\n/);
    for (let i = 0; i < lines.length; i++) {
        const line = lines[i].trim();
        if (!line || line.startsWith('#') || line.startsWith(';')) continue;

        const section = SECTION.exec(line);
        if (section) {
            group = section[1].trim();
            continue;
        }

        const eq = line.indexOf('=');
        if (eq <= 0) {
            throw new EntryPointParseError(`expected "name = value", got "${line}"`, i + 1);
        }
        if (group === undefined) {
            throw new EntryPointParseError('entry point declared outside of a section', i + 1);
        }

        entryPoints.push({
            group,
            name: line.slice(0, eq).trim(),
            value: line.slice(eq + 1).trim(),
        });
    }

    return entryPoints;
}

/**
 * Write an index as INI text. Sections and entries are sorted, so equal indexes produce equal files.
 */
export function serializeEntryPointsText(index: EntryPointIndex): string {
    let out = '';
    for (const group of [...index.keys()].sort()) {
        const entries = [...(index.get(group) ?? [])].sort((a, b) => compare(a.name, b.name));
        out += `[${group}]\n`;
        for (const ep of entries) {
            out += `${ep.name} = ${ep.value}\n`;
        }
        out += '\n';
    }
    return out;
}

/**
 * Group entry points by their group. A name seen twice within a group keeps the first.
 */
export function buildEntryPointIndex(entryPoints: Iterable<EntryPoint>): EntryPointIndex {
    const index: EntryPointIndex = new Map();
    for (const ep of entryPoints) {
        const group = index.get(ep.group);
        if (!group) {
            index.set(ep.group, [ep]);
        } else if (!group.some(existing => existing.name === ep.name)) {
            group.push(ep);
        }
    }
    return index;
}

export function entryPointIndexToMapping(index: EntryPointIndex): EntryPointMapping {
    const mapping: EntryPointMapping = {};
    for (const [group, entryPoints] of index) {
        mapping[group] = entryPoints.map(ep => `${ep.name}=${ep.value}`);
    }
    return mapping;
}

export function mappingToEntryPoints(mapping: EntryPointMapping): EntryPoint[] {
    const entryPoints: EntryPoint[] = [];
    for (const [group, lines] of Object.entries(mapping)) {
        for (const line of lines) {
            const eq = line.indexOf('=');
            if (eq <= 0) {
                throw new EntryPointParseError(`expected "name=value" in group ${group}, got "${line}"`, 0);
            }
            entryPoints.push({ group, name: line.slice(0, eq).trim(), value: line.slice(eq + 1).trim() });
        }
    }
    return entryPoints;
}

function compare(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}
