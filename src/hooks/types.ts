/**
 * Hook System — Types
 *
 * Lifecycle listeners observe a PluginManager at each transition of a plugin:
 * resolve → init → load. Every hook is optional, so listeners only implement what
 * they need. A listener vetoes a plugin by throwing a PluginDisabledError from
 * `onInitAfter` or `onLoadBefore`.
 */

import type { Plugin, PluginSpec } from '../plugins/types.js';
import type { EntryPoint } from '../entrypoints/types.js';

type HookResult = void | Promise<void>;

export interface PluginLifecycleListener {
    /** An entry point could not be loaded or resolved into a spec */
    onResolveException?(namespace: string, entryPoint: EntryPoint, error: Error): HookResult;
    /** A spec was found by the manager's finder */
    onResolveAfter?(spec: PluginSpec): HookResult;
    /** The plugin's factory threw */
    onInitException?(spec: PluginSpec, error: Error): HookResult;
    /** The plugin was instantiated */
    onInitAfter?(spec: PluginSpec, plugin: Plugin): HookResult;
    /** About to call `plugin.load(...loadArgs)` */
    onLoadBefore?(spec: PluginSpec, plugin: Plugin, loadArgs: readonly unknown[]): HookResult;
    /** `load` returned (the value is awaited first) */
    onLoadAfter?(spec: PluginSpec, plugin: Plugin, result: unknown): HookResult;
    /** `load` threw */
    onLoadException?(spec: PluginSpec, plugin: Plugin, error: Error): HookResult;
}

export type LifecycleHook = keyof PluginLifecycleListener;
