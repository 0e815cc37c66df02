import type { spawn } from 'node:child_process';
import { type EngineConfig, type EngineConfigInput, parseEngineConfig } from '../core/config.js';
import { logger } from '../core/logger.js';
import { InterruptedError } from '../core/utils.js';
import { type Renderer, TerminalDashboard } from '../render/dashboard.js';
import { listenForInterrupt, raceCompletion, settleWithin } from './arbiter.js';
import { EventChannel } from './channel.js';
import { TaskRegistry } from './registry.js';
import { Reporter } from './reporter.js';
import { assembleResult } from './result.js';
import type { MultiplexerResult, TaskEvent } from './types.js';
import { runTask, type WorkerOptions } from './worker.js';
import { WorkerPool } from './workerPool.js';

// time allowed after the kill grace period for killed children to be reaped
const REAP_MARGIN_MS = 250;

export interface MultiplexerHooks {
    renderer?: Renderer;
    /** Ends the run as interrupted when aborted, like SIGINT would. */
    signal?: AbortSignal;
    spawn?: typeof spawn;
}

/**
 * Runs every command once under the program prefix, at most `parallelism`
 * at a time, and resolves with the captured stdout of each task. Rejects with
 * an InterruptedError, and produces no result, when interrupted first.
 */
export class Multiplexer {
    readonly config: EngineConfig;
    private readonly commands: readonly string[];
    private readonly hooks: MultiplexerHooks;
    private started = false;

    constructor(commands: readonly string[], config: EngineConfigInput, hooks: MultiplexerHooks = {}) {
        this.commands = [...commands];
        this.config = parseEngineConfig(config);
        this.hooks = hooks;
    }

    get parallelism() {
        return this.config.parallelism ?? Math.max(1, this.commands.length);
    }

    async run(): Promise<MultiplexerResult> {
        if (this.started) {
            throw new Error('a multiplexer can only run once');
        }
        this.started = true;

        const startedAt = new Date();
        const registry = new TaskRegistry(this.commands, this.config.stderrLines);
        const renderer = this.hooks.renderer ?? new TerminalDashboard(process.stderr);
        const channel = new EventChannel<TaskEvent>();
        const pool = new WorkerPool(this.parallelism);
        const workerOptions: WorkerOptions = {
            program: this.config.program,
            killGraceMs: this.config.killGraceMs,
            spawn: this.hooks.spawn
        };

        logger.info('multiplexer: starting run', {
            tasks: registry.size,
            parallelism: pool.concurrency,
            program: this.config.program
        });

        // keeps the channel open until every worker holds its own sender
        const scheduling = channel.sender();
        this.commands.forEach((command, id) => {
            const events = channel.sender();
            pool.enqueue(async (signal) => {
                try {
                    await runTask(id, command, workerOptions, events, signal);
                } finally {
                    events.close();
                }
            });
        });
        scheduling.close();

        const reporter = new Reporter(registry, renderer);
        const reporterDone = reporter.run(channel);
        const interrupt = listenForInterrupt({
            signals: this.config.handleSignals ? undefined : [],
            abortSignal: this.hooks.signal
        });

        try {
            const winner = await raceCompletion(interrupt.promise, pool.drained(), reporterDone);
            const endedAt = new Date();
            if (winner.kind === 'interrupt') {
                reporter.detach();
                renderer.close();
                pool.cancelAll(new InterruptedError(winner.signal));
                const reaped = await settleWithin(pool.drained(), this.config.killGraceMs + REAP_MARGIN_MS);
                if (!reaped) {
                    logger.warn('multiplexer: children still running after interrupt', {
                        running: pool.runningCount()
                    });
                }
                throw new InterruptedError(winner.signal);
            }
            // a drained pool may still have events queued for the reporter
            await reporterDone;
            logger.info('multiplexer: run completed', { winner: winner.kind });
            return assembleResult(registry, startedAt, endedAt);
        } finally {
            interrupt.dispose();
        }
    }
}

export async function multiplex(
    commands: readonly string[],
    config: EngineConfigInput,
    hooks?: MultiplexerHooks
): Promise<MultiplexerResult> {
    return new Multiplexer(commands, config, hooks).run();
}
