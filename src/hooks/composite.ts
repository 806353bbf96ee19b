import type { Plugin, PluginSpec } from '../plugins/types.js';
import type { EntryPoint } from '../entrypoints/types.js';
import type { PluginLifecycleListener } from './types.js';
import { LifecycleNotifier } from './notifier.js';
import type { Logger } from '../utils/logger.js';

/**
 * Fans every lifecycle event out to a list of delegate listeners
 */
export class CompositePluginLifecycleListener implements PluginLifecycleListener {
    private listeners: PluginLifecycleListener[];
    private notifier: LifecycleNotifier;

    constructor(listeners: PluginLifecycleListener[] = [], logger?: Logger) {
        this.listeners = [...listeners];
        this.notifier = new LifecycleNotifier(this.listeners, logger);
    }

    addListener(listener: PluginLifecycleListener): void {
        this.listeners.push(listener);
    }

    list(): PluginLifecycleListener[] {
        return [...this.listeners];
    }

    get size(): number {
        return this.listeners.length;
    }

    onResolveException(namespace: string, entryPoint: EntryPoint, error: Error): Promise<void> {
        return this.notifier.fireResolveException(namespace, entryPoint, error);
    }

    onResolveAfter(spec: PluginSpec): Promise<void> {
        return this.notifier.fireResolveAfter(spec);
    }

    onInitException(spec: PluginSpec, error: Error): Promise<void> {
        return this.notifier.fireInitException(spec, error);
    }

    onInitAfter(spec: PluginSpec, plugin: Plugin): Promise<void> {
        return this.notifier.fireInitAfter(spec, plugin);
    }

    onLoadBefore(spec: PluginSpec, plugin: Plugin, loadArgs: readonly unknown[]): Promise<void> {
        return this.notifier.fireLoadBefore(spec, plugin, loadArgs);
    }

    onLoadAfter(spec: PluginSpec, plugin: Plugin, result: unknown): Promise<void> {
        return this.notifier.fireLoadAfter(spec, plugin, result);
    }

    onLoadException(spec: PluginSpec, plugin: Plugin, error: Error): Promise<void> {
        return this.notifier.fireLoadException(spec, plugin, error);
    }
}
