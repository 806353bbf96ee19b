/**
 * Plugin System — Errors
 *
 * `PluginError` and its subclasses form the plugin exception family. Lifecycle listeners may
 * throw them to veto a plugin; every other listener error is contained where it is raised.
 */

export class PluginError extends Error {
    constructor(
        message: string,
        readonly namespace?: string,
        readonly pluginName?: string,
        options?: ErrorOptions
    ) {
        super(message, options);
        this.name = 'PluginError';
    }
}

/**
 * A plugin was excluded from loading. Sticky once recorded on a container.
 */
export class PluginDisabledError extends PluginError {
    readonly reason?: string;

    constructor(namespace: string, name: string, reason?: string) {
        let message = `plugin ${namespace}:${name} is disabled`;
        if (reason) {
            message = `${message}, reason: ${reason}`;
        }
        super(message, namespace, name);
        this.name = 'PluginDisabledError';
        this.reason = reason;
    }
}

/**
 * The requested plugin name does not exist in the manager's namespace
 */
export class PluginNotFoundError extends Error {
    constructor(readonly namespace: string, readonly pluginName: string) {
        super(`no plugin named ${pluginName} in namespace ${namespace}`);
        this.name = 'PluginNotFoundError';
    }
}

/**
 * A discovered value could not be turned into a PluginSpec
 */
export class PluginResolutionError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'PluginResolutionError';
    }
}

export class DuplicateEntryPointError extends Error {
    constructor(readonly group: string, readonly entryPointName: string) {
        super(`Duplicate entry point ${group} ${entryPointName}`);
        this.name = 'DuplicateEntryPointError';
    }
}

export class EntryPointParseError extends Error {
    constructor(message: string, readonly line: number) {
        super(`${message} (line ${line})`);
        this.name = 'EntryPointParseError';
    }
}

/**
 * The configuration file could not be read or failed validation
 */
export class ConfigError extends Error {
    constructor(message: string, readonly source?: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'ConfigError';
    }
}
