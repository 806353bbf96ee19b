/**
 * Entry Points — Types
 *
 * An entry point is the serialized form of a plugin: `group` is the plugin namespace,
 * `name` the plugin name and `value` the locator of its source (`module:export.path`).
 */

export interface EntryPoint {
    readonly group: string;
    readonly name: string;
    readonly value: string;
}

/** group → entry points, in discovery order */
export type EntryPointIndex = Map<string, EntryPoint[]>;

/** group → `name=value` lines */
export type EntryPointMapping = Record<string, string[]>;

/**
 * Supplies the entry points visible to the running process
 */
export interface EntryPointsResolver {
    getEntryPoints(): Promise<EntryPointIndex>;
}
