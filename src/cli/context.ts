import type { Command } from 'commander';
import { ConfigLoader } from '../config/loader.js';
import { mergeConfig, type ConfigOverrides, type WaypostConfig } from '../config/schema.js';
import { setLogLevel, parseLogLevel } from '../utils/logger.js';

export type GlobalOptions = {
    workdir?: string;
    verbose?: boolean;
};

export interface ProjectContext {
    workDir: string;
    config: WaypostConfig;
    loader: ConfigLoader;
}

/**
 * Load the configuration of the working directory and apply its log level.
 * `--verbose` and WAYPOST_LOG_LEVEL take precedence over the configured level.
 */
export async function loadProjectContext(command: Command, overrides: ConfigOverrides = {}): Promise<ProjectContext> {
    const globals = command.optsWithGlobals<GlobalOptions>();
    const workDir = process.cwd();
    const loader = new ConfigLoader(workDir);
    const config = mergeConfig(await loader.load(), overrides);

    if (globals.verbose) {
        setLogLevel('debug');
    } else {
        setLogLevel(parseLogLevel(process.env.WAYPOST_LOG_LEVEL) ?? config.logLevel);
    }

    return { workDir, config, loader };
}
