import { describe, it, expect, vi } from 'vitest';
import { LifecycleNotifier } from './notifier.js';
import { CompositePluginLifecycleListener } from './composite.js';
import type { PluginLifecycleListener } from './types.js';
import { Plugin, PluginSpec } from '../plugins/types.js';
import { PluginDisabledError } from '../plugins/errors.js';
import { captureLogger, silentLogger } from '../testing/logger.js';

class NoopPlugin extends Plugin {}

const spec = new PluginSpec('ns', 'a', () => new NoopPlugin({ namespace: 'ns', name: 'a' }));
const plugin = new NoopPlugin({ namespace: 'ns', name: 'a' });

describe('LifecycleNotifier', () => {
    it('calls listeners in order and waits for async hooks', async () => {
        const calls: string[] = [];
        const listeners: PluginLifecycleListener[] = [
            {
                async onInitAfter() {
                    await new Promise(resolve => setTimeout(resolve, 5));
                    calls.push('first');
                },
            },
            { onInitAfter: () => { calls.push('second'); } },
            {},
        ];

        await new LifecycleNotifier(listeners, silentLogger()).fireInitAfter(spec, plugin);
        expect(calls).toEqual(['first', 'second']);
    });

    it('logs and contains listener errors', async () => {
        const { logger, lines } = captureLogger();
        const after = vi.fn();
        const notifier = new LifecycleNotifier([
            { onLoadAfter: () => { throw new Error('boom'); } },
            { onLoadAfter: after },
        ], logger);

        await notifier.fireLoadAfter(spec, plugin, 'value');

        expect(after).toHaveBeenCalledWith(spec, plugin, 'value');
        expect(lines.map(line => [line.level, line.msg])).toEqual([
            [50, 'error while calling lifecycle listener onLoadAfter: boom'],
        ]);
    });

    it('logs the error object when debug logging is enabled', async () => {
        const { logger, lines } = captureLogger('debug');
        const notifier = new LifecycleNotifier([{ onResolveAfter: () => { throw new Error('boom'); } }], logger);

        await notifier.fireResolveAfter(spec);

        expect(lines).toHaveLength(1);
        expect(lines[0].msg).toBe('error while calling lifecycle listener onResolveAfter');
        expect(lines[0].err).toMatchObject({ message: 'boom' });
    });

    it('propagates plugin errors and stops dispatching', async () => {
        const after = vi.fn();
        const notifier = new LifecycleNotifier([
            { onLoadBefore: () => { throw new PluginDisabledError('ns', 'a', 'vetoed'); } },
            { onLoadBefore: after },
        ], silentLogger());

        await expect(notifier.fireLoadBefore(spec, plugin, [])).rejects.toThrow(PluginDisabledError);
        expect(after).not.toHaveBeenCalled();
    });

    it('passes every argument of each hook', async () => {
        const listener = {
            onResolveException: vi.fn(),
            onInitException: vi.fn(),
            onLoadException: vi.fn(),
        };
        const notifier = new LifecycleNotifier([listener], silentLogger());
        const entryPoint = { group: 'ns', name: 'a', value: 'pkg:a' };
        const error = new Error('failed');

        await notifier.fireResolveException('ns', entryPoint, error);
        await notifier.fireInitException(spec, error);
        await notifier.fireLoadException(spec, plugin, error);

        expect(listener.onResolveException).toHaveBeenCalledWith('ns', entryPoint, error);
        expect(listener.onInitException).toHaveBeenCalledWith(spec, error);
        expect(listener.onLoadException).toHaveBeenCalledWith(spec, plugin, error);
    });
});

describe('CompositePluginLifecycleListener', () => {
    it('fans events out to every delegate, including ones added later', async () => {
        const first = { onInitAfter: vi.fn() };
        const second = { onInitAfter: vi.fn() };
        const composite = new CompositePluginLifecycleListener([first], silentLogger());
        composite.addListener(second);

        await composite.onInitAfter(spec, plugin);

        expect(composite.size).toBe(2);
        expect(first.onInitAfter).toHaveBeenCalledWith(spec, plugin);
        expect(second.onInitAfter).toHaveBeenCalledWith(spec, plugin);
    });

    it('contains delegate errors like a notifier', async () => {
        const second = { onLoadBefore: vi.fn() };
        const composite = new CompositePluginLifecycleListener([
            { onLoadBefore: () => { throw new TypeError('bad listener'); } },
            second,
        ], silentLogger());

        await expect(composite.onLoadBefore(spec, plugin, ['arg'])).resolves.toBeUndefined();
        expect(second.onLoadBefore).toHaveBeenCalledWith(spec, plugin, ['arg']);
    });
});
