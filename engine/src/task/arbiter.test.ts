import { describe, expect, test } from 'vitest';
import { listenForInterrupt, raceCompletion, settleWithin } from './arbiter.js';

const never = new Promise<never>(() => undefined);

describe('listenForInterrupt', () => {
    test('resolves when the abort signal fires', async () => {
        const controller = new AbortController();
        const interrupt = listenForInterrupt({ signals: [], abortSignal: controller.signal });
        controller.abort();
        await expect(interrupt.promise).resolves.toBe('abort');
        interrupt.dispose();
    });

    test('dispose removes the process signal handlers', () => {
        const before = process.listenerCount('SIGTERM');
        const interrupt = listenForInterrupt();
        expect(process.listenerCount('SIGTERM')).toBe(before + 1);
        interrupt.dispose();
        expect(process.listenerCount('SIGTERM')).toBe(before);
    });
});

describe('raceCompletion', () => {
    test('reports the first source to settle', async () => {
        await expect(raceCompletion(never, Promise.resolve(), never)).resolves.toEqual({ kind: 'pool' });
        await expect(raceCompletion(never, never, Promise.resolve())).resolves.toEqual({ kind: 'reporter' });
        await expect(raceCompletion(Promise.resolve('SIGINT'), never, never)).resolves.toEqual({
            kind: 'interrupt',
            signal: 'SIGINT'
        });
    });
});

describe('settleWithin', () => {
    test('reports whether the promise settled in time', async () => {
        await expect(settleWithin(Promise.resolve(), 50)).resolves.toBe(true);
        await expect(settleWithin(Promise.reject(new Error('boom')), 50)).resolves.toBe(true);
        await expect(settleWithin(never, 20)).resolves.toBe(false);
    });
});
