import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { WaypostConfigSchema, CONFIG_KEYS, type WaypostConfig } from './schema.js';
import { ConfigError } from '../plugins/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { isNotFound, toError } from '../utils/errors.js';

export const CONFIG_FILES = ['waypost.yaml', 'waypost.yml'];

interface RawConfig {
    source: string;
    data: unknown;
}

/**
 * Config Loader — reads the project configuration of a working directory
 *
 * Looked up in order:
 * 1. `waypost.yaml` / `waypost.yml`
 * 2. the `waypost` key of `package.json`
 * 3. built-in defaults
 */
export class ConfigLoader {
    private logger: Logger;

    constructor(private readonly workDir: string = process.cwd(), logger?: Logger) {
        this.logger = logger ?? getLogger('config');
    }

    /**
     * Load and validate the configuration
     */
    async load(): Promise<WaypostConfig> {
        const raw = await this.readRaw();
        if (!raw) {
            return WaypostConfigSchema.parse({});
        }
        this.logger.debug('loading configuration from %s', raw.source);
        return this.validate(raw.data ?? {}, raw.source);
    }

    /**
     * Validate a raw configuration object. Unknown keys are dropped with a warning.
     */
    validate(data: unknown, source = 'configuration'): WaypostConfig {
        if (typeof data !== 'object' || data === null || Array.isArray(data)) {
            throw new ConfigError(`invalid configuration in ${source}: expected a mapping`, source);
        }

        for (const key of Object.keys(data)) {
            if (!CONFIG_KEYS.includes(key)) {
                this.logger.warn('ignoring unknown configuration key "%s" in %s', key, source);
            }
        }

        const result = WaypostConfigSchema.safeParse(data);
        if (!result.success) {
            const issues = result.error.issues
                .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
                .join('; ');
            throw new ConfigError(`invalid configuration in ${source}: ${issues}`, source, { cause: result.error });
        }
        return result.data;
    }

    /**
     * Absolute cache directory, if one is configured
     */
    resolveCacheDir(config: WaypostConfig): string | undefined {
        return config.cacheDir ? path.resolve(this.workDir, config.cacheDir) : undefined;
    }

    private async readRaw(): Promise<RawConfig | undefined> {
        for (const name of CONFIG_FILES) {
            const file = path.join(this.workDir, name);
            const content = await readOptional(file);
            if (content === undefined) continue;

            try {
                return { source: name, data: parseYaml(content) };
            } catch (err) {
                throw new ConfigError(`could not parse ${name}: ${toError(err).message}`, name, { cause: err });
            }
        }

        const pkgContent = await readOptional(path.join(this.workDir, 'package.json'));
        if (pkgContent === undefined) return undefined;

        let manifest: unknown;
        try {
            manifest = JSON.parse(pkgContent);
        } catch (err) {
            throw new ConfigError(`could not parse package.json: ${toError(err).message}`, 'package.json', { cause: err });
        }
        if (typeof manifest === 'object' && manifest !== null && 'waypost' in manifest) {
            return { source: 'package.json#waypost', data: manifest.waypost };
        }
        return undefined;
    }
}

async function readOptional(file: string): Promise<string | undefined> {
    try {
        return await readFile(file, 'utf-8');
    } catch (err) {
        if (isNotFound(err)) return undefined;
        throw err;
    }
}
