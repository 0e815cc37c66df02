export type TaskOutcome =
    | { kind: 'success' }
    // exitCode is null when the child was ended by a signal or never ran
    | { kind: 'failed'; exitCode: number | null };

export type TaskStatus =
    | { state: 'pending' }
    | { state: 'running' }
    | { state: 'completed'; outcome: TaskOutcome };

export interface TaskRecord {
    id: number;
    command: string;
    status: TaskStatus;
    recentStderr: string[];
    stdout: string;
}

export type TaskEvent =
    | { type: 'update'; id: number; status: TaskStatus }
    | { type: 'stderr'; id: number; line: string }
    | { type: 'stdout'; id: number; content: string };

export interface ResultMetadata {
    started: string;
    ended: string;
}

export interface ResultTask {
    stdout: string;
}

export interface MultiplexerResult {
    metadata: ResultMetadata;
    tasks: Record<string, ResultTask>;
}

export const PENDING: TaskStatus = { state: 'pending' };
export const RUNNING: TaskStatus = { state: 'running' };

export function completed(outcome: TaskOutcome): TaskStatus {
    return { state: 'completed', outcome };
}

export function classifyExit(code: number | null, signal: NodeJS.Signals | null): TaskOutcome {
    if (code === 0 && signal === null) {
        return { kind: 'success' };
    }
    return { kind: 'failed', exitCode: signal === null ? code : null };
}
