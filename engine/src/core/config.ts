import { z } from 'zod';
import { DEFAULT_KILL_GRACE_MS } from '../task/processUtils.js';
import { readIntegerEnv, StructuredError } from './utils.js';

export const DEFAULT_PROGRAM = '/bin/sh -c';
export const DEFAULT_STDERR_LINES = 3;

export const engineConfigSchema = z.object({
    program: z.array(z.string().min(1)).min(1, 'program prefix must not be empty'),
    stderrLines: z.number().int().nonnegative().default(DEFAULT_STDERR_LINES),
    // absent means one permit per task
    parallelism: z.number().int().positive().optional(),
    killGraceMs: z
        .number()
        .int()
        .nonnegative()
        .default(() => readIntegerEnv('CMDMUX_KILL_GRACE_MS', DEFAULT_KILL_GRACE_MS)),
    handleSignals: z.boolean().default(true)
});

export type EngineConfigInput = z.input<typeof engineConfigSchema>;
export type EngineConfig = z.output<typeof engineConfigSchema>;

export function describeIssues(error: z.ZodError) {
    return error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}

export function parseEngineConfig(input: unknown): EngineConfig {
    const parsed = engineConfigSchema.safeParse(input);
    if (!parsed.success) {
        throw new StructuredError('invalid_config', `invalid engine configuration: ${describeIssues(parsed.error)}`);
    }
    return parsed.data;
}
