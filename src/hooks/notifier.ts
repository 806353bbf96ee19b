import type { Plugin, PluginSpec } from '../plugins/types.js';
import type { EntryPoint } from '../entrypoints/types.js';
import type { PluginLifecycleListener, LifecycleHook } from './types.js';
import { PluginError } from '../plugins/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { toError } from '../utils/errors.js';

type HookResult = void | Promise<void>;

/**
 * Lifecycle Notifier — dispatches lifecycle events to listeners
 *
 * Listeners run in registration order and are awaited one by one. A listener that throws
 * is logged and skipped, so one broken listener cannot break the manager or the other
 * listeners. Errors of the PluginError family are the exception: they propagate, which is
 * how listeners veto plugins.
 */
export class LifecycleNotifier {
    constructor(
        private readonly listeners: PluginLifecycleListener[],
        private readonly logger: Logger = getLogger('lifecycle')
    ) {}

    fireResolveException(namespace: string, entryPoint: EntryPoint, error: Error): Promise<void> {
        return this.dispatch('onResolveException', l => l.onResolveException?.(namespace, entryPoint, error));
    }

    fireResolveAfter(spec: PluginSpec): Promise<void> {
        return this.dispatch('onResolveAfter', l => l.onResolveAfter?.(spec));
    }

    fireInitException(spec: PluginSpec, error: Error): Promise<void> {
        return this.dispatch('onInitException', l => l.onInitException?.(spec, error));
    }

    fireInitAfter(spec: PluginSpec, plugin: Plugin): Promise<void> {
        return this.dispatch('onInitAfter', l => l.onInitAfter?.(spec, plugin));
    }

    fireLoadBefore(spec: PluginSpec, plugin: Plugin, loadArgs: readonly unknown[]): Promise<void> {
        return this.dispatch('onLoadBefore', l => l.onLoadBefore?.(spec, plugin, loadArgs));
    }

    fireLoadAfter(spec: PluginSpec, plugin: Plugin, result: unknown): Promise<void> {
        return this.dispatch('onLoadAfter', l => l.onLoadAfter?.(spec, plugin, result));
    }

    fireLoadException(spec: PluginSpec, plugin: Plugin, error: Error): Promise<void> {
        return this.dispatch('onLoadException', l => l.onLoadException?.(spec, plugin, error));
    }

    private async dispatch(
        hook: LifecycleHook,
        invoke: (listener: PluginLifecycleListener) => HookResult | undefined
    ): Promise<void> {
        for (const listener of this.listeners) {
            try {
                await invoke(listener);
            } catch (thrown) {
                if (thrown instanceof PluginError) {
                    throw thrown;
                }
                this.report(hook, toError(thrown));
            }
        }
    }

    private report(hook: LifecycleHook, err: Error): void {
        const message = `error while calling lifecycle listener ${hook}`;
        if (this.logger.isLevelEnabled('debug')) {
            this.logger.error({ err }, message);
        } else {
            this.logger.error(`${message}: ${err.message}`);
        }
    }
}
