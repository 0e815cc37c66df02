import pc from 'picocolors';
import { describe, expect, test } from 'vitest';
import type { TaskRecord } from '../task/types.js';
import { formatDashboard, formatStatus, TerminalDashboard } from './dashboard.js';

const tasks: TaskRecord[] = [
    {
        id: 0,
        command: '  echo hi ',
        status: { state: 'completed', outcome: { kind: 'success' } },
        recentStderr: ['warn'],
        stdout: 'hi\n'
    },
    { id: 1, command: 'sleep 1', status: { state: 'running' }, recentStderr: [], stdout: '' }
];

const frame = [
    '⇒ (0) echo hi',
    ' ↳ Status: SUCCESS (0)',
    ' ↳ Stderr:',
    '   |> warn',
    '⇒ (1) sleep 1',
    ' ↳ Status: RUNNING',
    '',
    '1/2 completed'
].join('\n');

function sink(isTTY?: boolean) {
    const chunks: string[] = [];
    return { chunks, out: { isTTY, write: (chunk: string) => chunks.push(chunk) } };
}

describe('formatDashboard', () => {
    test('lists each task with its status, stderr tail and a progress footer', () => {
        expect(formatDashboard(tasks, false)).toBe(`${frame}\n`);
    });

    test('marks the final draw as done', () => {
        expect(formatDashboard([], true)).toBe('\n0/0 completed DONE\n');
    });
});

describe('formatStatus', () => {
    const plain = pc.createColors(false);

    test('labels every state', () => {
        expect(formatStatus({ state: 'pending' }, plain)).toBe('PENDING');
        expect(formatStatus({ state: 'completed', outcome: { kind: 'failed', exitCode: 2 } }, plain)).toBe('FAILED (2)');
        expect(formatStatus({ state: 'completed', outcome: { kind: 'failed', exitCode: null } }, plain)).toBe('FAILED (signal)');
    });

    test('colours outcomes when enabled', () => {
        const colors = pc.createColors(true);
        expect(formatStatus({ state: 'completed', outcome: { kind: 'success' } }, colors)).toBe('\x1b[32mSUCCESS (0)\x1b[39m');
        expect(formatStatus({ state: 'completed', outcome: { kind: 'failed', exitCode: 1 } }, colors)).toBe('\x1b[31mFAILED (1)\x1b[39m');
    });
});

describe('TerminalDashboard', () => {
    test('writes only the final state to a stream that is not a terminal', () => {
        const { chunks, out } = sink();
        const dashboard = new TerminalDashboard(out);
        dashboard.begin();
        dashboard.render(tasks);
        dashboard.finish(tasks);
        expect(chunks).toEqual([`${frame} DONE\n`]);
    });

    test('redraws inside the alternate screen when live', () => {
        const { chunks, out } = sink(true);
        const dashboard = new TerminalDashboard(out, { colors: false });
        dashboard.begin();
        dashboard.render(tasks);
        dashboard.finish(tasks);
        expect(chunks).toEqual(['\x1b[?1049h', `\x1b[2J\x1b[H${frame}\n`, '\x1b[?1049l', `${frame} DONE\n`]);
    });

    test('close leaves the alternate screen without a final draw', () => {
        const { chunks, out } = sink();
        const dashboard = new TerminalDashboard(out, { live: true, colors: false });
        dashboard.begin();
        dashboard.close();
        dashboard.render(tasks);
        dashboard.close();
        expect(chunks).toEqual(['\x1b[?1049h', '\x1b[?1049l']);
    });
});
