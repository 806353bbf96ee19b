import { minimatch } from 'minimatch';
import type { PluginSpec } from './types.js';
import { getLogger, type Logger } from '../utils/logger.js';

/**
 * Decides whether a plugin must be disabled before it is initialized
 */
export interface PluginFilter {
    /** True if the plugin should be disabled */
    excludes(spec: PluginSpec): boolean;
}

export interface PluginSpecPattern {
    /** Glob over the namespace */
    namespace?: string;
    /** Glob over the plugin name */
    name?: string;
    /** Glob over the entry point locator. `*` stops at `/`, so use `my-pkg/**` to match a whole package */
    value?: string;
}

/**
 * Matches a spec when every configured pattern matches
 */
export class PluginSpecMatcher {
    constructor(readonly pattern: PluginSpecPattern) {}

    matches(spec: PluginSpec): boolean {
        const { namespace, name, value } = this.pattern;

        if (namespace && !glob(spec.namespace, namespace)) {
            return false;
        }
        if (name && !glob(spec.name, name)) {
            return false;
        }
        if (value) {
            // a spec that was never discovered through an export has no locator to match
            if (!spec.locator || !glob(spec.locator, value)) {
                return false;
            }
        }
        return true;
    }

    toString(): string {
        return `PluginSpecMatcher(${JSON.stringify(this.pattern)})`;
    }
}

/**
 * Excludes every plugin that matches any of its exclusion patterns
 *
 * ```ts
 * // all plugins in "some.namespace.a", "some.namespace.b", ...
 * filter.addExclusion({ namespace: 'some.namespace.*' });
 * // all plugins shipped by one package
 * filter.addExclusion({ value: 'my-package/**' });
 * ```
 */
export class MatchingPluginFilter implements PluginFilter {
    private exclusions: PluginSpecMatcher[] = [];
    private logger: Logger;

    constructor(logger?: Logger) {
        this.logger = logger ?? getLogger('filter');
    }

    /**
     * Add a pattern; combined fields form an AND clause
     */
    addExclusion(pattern: PluginSpecPattern): void {
        this.exclusions.push(new PluginSpecMatcher(pattern));
    }

    excludes(spec: PluginSpec): boolean {
        for (const matcher of this.exclusions) {
            if (matcher.matches(spec)) {
                this.logger.debug('filter rule %s matched %s', matcher.toString(), spec.toString());
                return true;
            }
        }
        return false;
    }

    list(): PluginSpecPattern[] {
        return this.exclusions.map(matcher => matcher.pattern);
    }

    clear(): void {
        this.exclusions = [];
    }

    get size(): number {
        return this.exclusions.length;
    }
}

/**
 * Process-wide filter used by managers that are given no filters. Empty until the host adds exclusions.
 */
export const defaultPluginFilter = new MatchingPluginFilter();

/**
 * Add configured exclusions to a filter
 */
export function configurePluginFilter(filter: MatchingPluginFilter, patterns: PluginSpecPattern[]): MatchingPluginFilter {
    for (const pattern of patterns) {
        filter.addExclusion(pattern);
    }
    return filter;
}

function glob(subject: string, pattern: string): boolean {
    return minimatch(subject, pattern, { dot: true, nonegate: true, nocomment: true });
}
