import type { TaskRegistry } from './registry.js';
import type { MultiplexerResult } from './types.js';

/** Snapshot of every task's captured stdout, keyed by decimal task id. */
export function assembleResult(registry: TaskRegistry, started: Date, ended: Date): MultiplexerResult {
    const tasks: MultiplexerResult['tasks'] = {};
    for (const task of registry.snapshot()) {
        tasks[String(task.id)] = { stdout: task.stdout };
    }
    return Object.freeze({
        metadata: Object.freeze({ started: started.toISOString(), ended: ended.toISOString() }),
        tasks: Object.freeze(tasks)
    });
}
