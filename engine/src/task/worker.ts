import { spawn as spawnDefault } from 'node:child_process';
import { createInterface } from 'node:readline';
import { finished } from 'node:stream/promises';
import { logger } from '../core/logger.js';
import type { Sender } from './channel.js';
import { terminateProcessTree } from './processUtils.js';
import { classifyExit, completed, RUNNING, type TaskEvent, type TaskOutcome } from './types.js';

export interface WorkerOptions {
    /** Interpreter and its fixed flags; the command is appended as the last argument. */
    program: readonly string[];
    killGraceMs: number;
    spawn?: typeof spawnDefault;
}

interface Exit {
    code: number | null;
    signal: NodeJS.Signals | null;
}

const FAILED_WITHOUT_CODE: TaskOutcome = { kind: 'failed', exitCode: null };

function toError(error: unknown) {
    return error instanceof Error ? error : new Error(String(error));
}

function startChild(spawn: typeof spawnDefault, file: string, args: string[]) {
    try {
        return spawn(file, args, {
            stdio: ['ignore', 'pipe', 'pipe'],
            // own process group, so an interrupt can reach grandchildren
            detached: process.platform !== 'win32',
            windowsHide: true
        });
    } catch (error) {
        return toError(error);
    }
}

/**
 * Runs one command to completion, reporting through `events`:
 * running, then each stderr line as it arrives, then the whole stdout, then
 * the terminal status. Never throws; spawn and I/O failures become a failed
 * outcome without an exit code.
 */
export async function runTask(
    id: number,
    command: string,
    options: WorkerOptions,
    events: Sender<TaskEvent>,
    signal: AbortSignal
): Promise<void> {
    if (signal.aborted) {
        return;
    }
    events.send({ type: 'update', id, status: RUNNING });
    const outcome = await execute(id, command, options, events, signal);
    events.send({ type: 'update', id, status: completed(outcome) });
}

async function execute(
    id: number,
    command: string,
    options: WorkerOptions,
    events: Sender<TaskEvent>,
    signal: AbortSignal
): Promise<TaskOutcome> {
    const [file, ...args] = options.program;
    if (file === undefined) {
        logger.warn('worker: empty program prefix', { id });
        return FAILED_WITHOUT_CODE;
    }
    const child = startChild(options.spawn ?? spawnDefault, file, [...args, command]);
    if (child instanceof Error) {
        logger.warn('worker: spawn failed', { id, error: child.message });
        return FAILED_WITHOUT_CODE;
    }
    logger.debug('worker: spawned', { id, pid: child.pid, command });

    const onAbort = () => terminateProcessTree(child, options.killGraceMs);
    signal.addEventListener('abort', onAbort, { once: true });

    const failure = new Promise<Error>((resolve) => child.on('error', resolve));
    const exited = new Promise<Exit>((resolve) => child.once('exit', (code, sig) => resolve({ code, signal: sig })));

    const chunks: Buffer[] = [];
    child.stdout.on('data', (chunk: Buffer) => chunks.push(chunk));
    const lines = createInterface({ input: child.stderr, crlfDelay: Infinity });
    let linesOpen = true;
    lines.on('line', (line) => events.send({ type: 'stderr', id, line }));
    const stderrClosed = new Promise<void>((resolve) =>
        lines.once('close', () => {
            linesOpen = false;
            resolve();
        })
    );

    const drained = Promise.all([finished(child.stdout), finished(child.stderr), stderrClosed]).then(
        () => ({ ok: true as const }),
        (error: unknown) => ({ ok: false as const, error: toError(error) })
    );

    try {
        const drain = await Promise.race([drained, failure]);
        if (drain instanceof Error) {
            logger.warn('worker: spawn failed', { id, error: drain.message });
            return FAILED_WITHOUT_CODE;
        }
        if (!drain.ok) {
            logger.warn('worker: output could not be read', { id, error: drain.error.message });
            await Promise.race([exited, failure]);
            return FAILED_WITHOUT_CODE;
        }
        events.send({ type: 'stdout', id, content: Buffer.concat(chunks).toString('utf8') });

        const exit = await Promise.race([exited, failure]);
        if (exit instanceof Error) {
            logger.warn('worker: wait failed', { id, error: exit.message });
            return FAILED_WITHOUT_CODE;
        }
        logger.debug('worker: exited', { id, code: exit.code, signal: exit.signal });
        return classifyExit(exit.code, exit.signal);
    } finally {
        signal.removeEventListener('abort', onAbort);
        if (linesOpen) lines.close();
    }
}
