import { describe, it, expect } from 'vitest';
import { WaypostConfigSchema, mergeConfig } from './schema.js';

describe('mergeConfig', () => {
    const config = WaypostConfigSchema.parse({
        path: 'dist',
        include: ['dist/**/*.js'],
        exclude: ['dist/tests/**'],
    });

    it('replaces given scalars and keeps the rest', () => {
        const merged = mergeConfig(config, { path: 'lib', logLevel: 'debug' });

        expect(merged.path).toBe('lib');
        expect(merged.logLevel).toBe('debug');
        expect(merged.entrypointStaticFile).toBe('entry_points.ini');
    });

    it('adds globs to the configured ones', () => {
        const merged = mergeConfig(config, { exclude: ['dist/fixtures/**', 'dist/tests/**'] });

        expect(merged.exclude).toEqual(['dist/tests/**', 'dist/fixtures/**']);
        expect(merged.include).toEqual(['dist/**/*.js']);
    });

    it('changes nothing without overrides', () => {
        expect(mergeConfig(config, {})).toEqual(config);
    });
});
