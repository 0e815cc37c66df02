import { describe, expect, test } from 'vitest';
import { LineRing } from './ringBuffer.js';

describe('LineRing', () => {
    test('keeps lines in arrival order below capacity', () => {
        const ring = new LineRing(3);
        ring.push('a');
        ring.push('b');
        expect(ring.read()).toEqual(['a', 'b']);
    });

    test('evicts the oldest line once over capacity', () => {
        const ring = new LineRing(3);
        for (const line of ['1', '2', '3', '4', '5']) {
            ring.push(line);
        }
        expect(ring.read()).toEqual(['3', '4', '5']);
    });

    test('wraps exactly at capacity', () => {
        const ring = new LineRing(2);
        ring.push('x');
        ring.push('y');
        expect(ring.read()).toEqual(['x', 'y']);
        ring.push('z');
        expect(ring.read()).toEqual(['y', 'z']);
    });

    test('capacity zero retains nothing', () => {
        const ring = new LineRing(0);
        ring.push('ignored');
        expect(ring.read()).toEqual([]);
    });

    test('a capacity beyond any array length still works', () => {
        const ring = new LineRing(2 ** 32);
        ring.push('a');
        ring.push('b');
        expect(ring.read()).toEqual(['a', 'b']);
    });

    test('read returns a copy', () => {
        const ring = new LineRing(2);
        ring.push('a');
        const copy = ring.read();
        copy.push('mutated');
        expect(ring.read()).toEqual(['a']);
    });
});
