import pc from 'picocolors';
import type { TaskRecord, TaskStatus } from '../task/types.js';

type Colors = ReturnType<typeof pc.createColors>;

export interface DashboardOutput {
    write(chunk: string): unknown;
    isTTY?: boolean;
}

/** Receives the registry after every applied event. */
export interface Renderer {
    begin(): void;
    render(tasks: readonly TaskRecord[]): void;
    /** Leaves live mode and draws the final state once. */
    finish(tasks: readonly TaskRecord[]): void;
    /** Leaves live mode without a final draw (interrupted runs). */
    close(): void;
}

const ENTER_ALTERNATE_SCREEN = '\x1b[?1049h';
const LEAVE_ALTERNATE_SCREEN = '\x1b[?1049l';
const CLEAR_AND_HOME = '\x1b[2J\x1b[H';

export function formatStatus(status: TaskStatus, colors: Colors) {
    switch (status.state) {
        case 'pending':
            return colors.yellow('PENDING');
        case 'running':
            return colors.yellow('RUNNING');
        case 'completed': {
            const outcome = status.outcome;
            if (outcome.kind === 'success') {
                return colors.green('SUCCESS (0)');
            }
            return colors.red(`FAILED (${outcome.exitCode ?? 'signal'})`);
        }
    }
}

export function formatDashboard(tasks: readonly TaskRecord[], done: boolean, colors: Colors = pc.createColors(false)) {
    const lines: string[] = [];
    let finished = 0;
    for (const task of tasks) {
        if (task.status.state === 'completed') finished += 1;
        lines.push(`⇒ (${task.id}) ${task.command.trim()}`);
        lines.push(` ↳ Status: ${formatStatus(task.status, colors)}`);
        if (task.recentStderr.length > 0) {
            lines.push(' ↳ Stderr:');
            for (const line of task.recentStderr) {
                lines.push(`   |> ${line}`);
            }
        }
    }
    lines.push('');
    lines.push(`${finished}/${tasks.length} completed${done ? ' DONE' : ''}`);
    return lines.join('\n') + '\n';
}

/**
 * Terminal dashboard. On a TTY it redraws inside the alternate screen; on any
 * other stream only the final state is written.
 */
export class TerminalDashboard implements Renderer {
    private readonly live: boolean;
    private readonly colors: Colors;
    private active = false;

    constructor(private readonly out: DashboardOutput, options: { live?: boolean; colors?: boolean } = {}) {
        this.live = options.live ?? out.isTTY === true;
        this.colors = pc.createColors(options.colors ?? this.live);
    }

    begin() {
        if (!this.live || this.active) return;
        this.active = true;
        this.out.write(ENTER_ALTERNATE_SCREEN);
    }

    render(tasks: readonly TaskRecord[]) {
        if (!this.active) return;
        this.out.write(CLEAR_AND_HOME + formatDashboard(tasks, false, this.colors));
    }

    finish(tasks: readonly TaskRecord[]) {
        this.close();
        this.out.write(formatDashboard(tasks, true, this.colors));
    }

    close() {
        if (!this.active) return;
        this.active = false;
        this.out.write(LEAVE_ALTERNATE_SCREEN);
    }
}
