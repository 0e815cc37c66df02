import { describe, expect, test } from 'vitest';
import { TaskRegistry } from './registry.js';
import { completed, RUNNING } from './types.js';

describe('TaskRegistry', () => {
    test('assigns dense ids in input order', () => {
        const registry = new TaskRegistry(['echo a', 'echo b', 'echo c'], 3);
        expect(registry.ids()).toEqual([0, 1, 2]);
        expect(registry.snapshot().map((task) => task.command)).toEqual(['echo a', 'echo b', 'echo c']);
        expect(registry.snapshot().every((task) => task.status.state === 'pending')).toBe(true);
    });

    test('reports the transition into completed', () => {
        const registry = new TaskRegistry(['true'], 3);
        expect(registry.apply({ type: 'update', id: 0, status: RUNNING })).toBe(false);
        expect(registry.apply({ type: 'update', id: 0, status: completed({ kind: 'success' }) })).toBe(true);
        expect(registry.get(0).status).toEqual({ state: 'completed', outcome: { kind: 'success' } });
    });

    test('ignores status changes that do not move forward', () => {
        const registry = new TaskRegistry(['false'], 3);
        registry.apply({ type: 'update', id: 0, status: completed({ kind: 'failed', exitCode: 1 }) });
        expect(registry.apply({ type: 'update', id: 0, status: RUNNING })).toBe(false);
        expect(registry.apply({ type: 'update', id: 0, status: completed({ kind: 'success' }) })).toBe(false);
        expect(registry.get(0).status).toEqual({ state: 'completed', outcome: { kind: 'failed', exitCode: 1 } });
    });

    test('keeps only the configured number of stderr lines', () => {
        const registry = new TaskRegistry(['noisy'], 2);
        for (const line of ['one', 'two', 'three']) {
            registry.apply({ type: 'stderr', id: 0, line });
        }
        expect(registry.get(0).recentStderr).toEqual(['two', 'three']);
    });

    test('replaces stdout wholesale', () => {
        const registry = new TaskRegistry(['echo'], 3);
        registry.apply({ type: 'stdout', id: 0, content: 'first\n' });
        registry.apply({ type: 'stdout', id: 0, content: 'second\n' });
        expect(registry.get(0).stdout).toBe('second\n');
    });

    test('rejects unknown ids', () => {
        const registry = new TaskRegistry(['echo'], 3);
        expect(() => registry.apply({ type: 'stdout', id: 4, content: '' })).toThrow('unknown task id 4');
    });
});
