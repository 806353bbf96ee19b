import { createRequire } from 'node:module';
import os from 'node:os';
import path from 'node:path';

export interface CacheDirEnvironment {
    platform: NodeJS.Platform;
    env: NodeJS.ProcessEnv;
    homeDir: string;
}

/**
 * Get the user's cache directory:
 *   Windows → %LOCALAPPDATA%\cache
 *   macOS   → ~/Library/Caches
 *   Linux   → $XDG_CACHE_HOME (when absolute), otherwise ~/.cache
 */
export function getUserCacheDir(environment: Partial<CacheDirEnvironment> = {}): string {
    const platform = environment.platform ?? process.platform;
    const env = environment.env ?? process.env;
    const homeDir = environment.homeDir ?? os.homedir();

    if (platform === 'win32') {
        return path.win32.join(env.LOCALAPPDATA ?? path.win32.join(homeDir, 'AppData', 'Local'), 'cache');
    }
    if (platform === 'darwin') {
        return path.join(homeDir, 'Library', 'Caches');
    }

    const xdg = env.XDG_CACHE_HOME;
    if (xdg && path.isAbsolute(xdg)) {
        return xdg;
    }
    return path.join(homeDir, '.cache');
}

/**
 * Directory holding the entry point cache files
 */
export function getWaypostCacheDir(env: NodeJS.ProcessEnv = process.env): string {
    return env.WAYPOST_CACHE_DIR ?? path.join(getUserCacheDir({ env }), 'waypost');
}

/**
 * The module lookup chain of a directory: every node_modules folder from `baseDir`
 * up to the root, followed by the global folders Node.js searches.
 */
export function defaultSearchPath(baseDir: string = process.cwd()): string[] {
    const require = createRequire(path.join(baseDir, 'noop.js'));
    return require.resolve.paths('waypost-search-probe') ?? [];
}
