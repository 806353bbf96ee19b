import PQueue from 'p-queue';
import type { Plugin, PluginSpec } from '../plugins/types.js';

/**
 * Holds the lifecycle state of one plugin within a PluginManager.
 *
 * State only moves forward (init → loaded, or into an error or disabled state) and is
 * only changed by the manager while it holds `lock`.
 */
export class PluginContainer<P extends Plugin = Plugin> {
    readonly lock: PQueue = new PQueue({ concurrency: 1 });

    plugin?: P;
    loadValue?: unknown;

    isInit = false;
    isLoaded = false;
    isDisabled = false;

    initError?: Error;
    loadError?: Error;
    disabledReason?: string;

    constructor(readonly spec: PluginSpec) {}

    get name(): string {
        return this.spec.name;
    }

    get namespace(): string {
        return this.spec.namespace;
    }

    /**
     * Run a task while holding the container's lock
     */
    withLock<T>(task: () => Promise<T>): Promise<T> {
        return this.lock.add(task, { throwOnTimeout: true });
    }

    markInitialized(plugin: P): void {
        this.plugin = plugin;
        this.isInit = true;
    }

    markLoaded(value: unknown): void {
        this.loadValue = value;
        this.isLoaded = true;
    }

    recordInitError(err: Error): void {
        this.initError = err;
    }

    recordLoadError(err: Error): void {
        this.loadError = err;
    }

    disable(reason?: string): void {
        this.isDisabled = true;
        this.disabledReason = reason;
    }

    toString(): string {
        return `PluginContainer(${this.namespace}:${this.name})`;
    }
}
