import { logger } from '../core/logger.js';
import { LineRing } from './ringBuffer.js';
import { PENDING, type TaskEvent, type TaskRecord, type TaskStatus } from './types.js';

interface Entry {
    command: string;
    status: TaskStatus;
    stderr: LineRing;
    stdout: string;
}

const stateOrder: Record<TaskStatus['state'], number> = {
    pending: 0,
    running: 1,
    completed: 2
};

/**
 * Ordered task table keyed by input position. Only the reporter writes to it
 * while a run is live; the result assembler reads it once afterwards.
 */
export class TaskRegistry {
    private readonly entries: Entry[];

    constructor(commands: readonly string[], readonly stderrLines: number) {
        this.entries = commands.map((command) => ({
            command,
            status: PENDING,
            stderr: new LineRing(stderrLines),
            stdout: ''
        }));
    }

    get size() {
        return this.entries.length;
    }

    ids() {
        return this.entries.map((_, id) => id);
    }

    /** Applies one worker event and reports whether it moved the task to completed. */
    apply(event: TaskEvent): boolean {
        const entry = this.require(event.id);
        switch (event.type) {
            case 'update': {
                if (stateOrder[event.status.state] <= stateOrder[entry.status.state]) {
                    logger.warn('registry: ignoring non-forward status change', {
                        id: event.id,
                        from: entry.status.state,
                        to: event.status.state
                    });
                    return false;
                }
                entry.status = event.status;
                return event.status.state === 'completed';
            }
            case 'stderr':
                entry.stderr.push(event.line);
                return false;
            case 'stdout':
                entry.stdout = event.content;
                return false;
        }
    }

    get(id: number): TaskRecord {
        const entry = this.require(id);
        return {
            id,
            command: entry.command,
            status: entry.status,
            recentStderr: entry.stderr.read(),
            stdout: entry.stdout
        };
    }

    snapshot(): TaskRecord[] {
        return this.ids().map((id) => this.get(id));
    }

    private require(id: number): Entry {
        const entry = this.entries[id];
        if (!entry) {
            throw new RangeError(`unknown task id ${id}`);
        }
        return entry;
    }
}
