import { z } from 'zod';
import { type EngineConfigInput, StructuredError, tokenizeCommandLine } from '../../engine/src/index.js';
import { OUTPUT_FORMATS } from '../formats/index.js';
import { SHELLS } from './completion.js';
import { MANUAL_FORMATS } from './manual.js';

const count = z
    .string()
    .trim()
    .regex(/^\d+$/, 'must be a non-negative integer')
    .transform((value) => Number(value))
    .refine(Number.isSafeInteger, 'must be at most 9007199254740991');

export const cliOptionsSchema = z.object({
    experimental: z.boolean().default(false),
    program: z.string(),
    stderr: count,
    stdout: z.enum(OUTPUT_FORMATS).optional(),
    parallelism: count.refine((value) => value > 0, 'must be a positive integer').optional(),
    command: z.array(z.string()).default([]),
    file: z.array(z.string()).default([])
});

export type CliOptions = z.output<typeof cliOptionsSchema>;

export const manualOptionsSchema = z.object({
    out: z.string().min(1),
    format: z.enum(MANUAL_FORMATS)
});

export const completionOptionsSchema = z.object({
    out: z.string().min(1),
    shell: z.enum(SHELLS)
});

function validate<T extends z.ZodTypeAny>(schema: T, raw: unknown): z.output<T> {
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const option = issue && issue.path.length > 0 ? `option '--${issue.path.join('.')}'` : 'options';
        throw new StructuredError('invalid_config', `invalid ${option}: ${issue?.message ?? 'unknown problem'}`);
    }
    return parsed.data;
}

export function parseManualOptions(raw: unknown) {
    return validate(manualOptionsSchema, raw);
}

export function parseCompletionOptions(raw: unknown) {
    return validate(completionOptionsSchema, raw);
}

export function parseCliOptions(raw: unknown): CliOptions {
    const options = validate(cliOptionsSchema, raw);
    // --stdout and --parallelism require -e
    if (!options.experimental) {
        if (options.stdout !== undefined) {
            throw new StructuredError('experimental', 'experimental flag (stdout)');
        }
        if (options.parallelism !== undefined) {
            throw new StructuredError('experimental', 'experimental flag (parallelism)');
        }
    }
    return options;
}

export function toEngineConfig(options: CliOptions): EngineConfigInput {
    return {
        program: tokenizeCommandLine(options.program),
        stderrLines: options.stderr,
        parallelism: options.parallelism
    };
}
