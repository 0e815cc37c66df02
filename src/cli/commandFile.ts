import fs from 'node:fs/promises';
import { z } from 'zod';
import { describeIssues, formatError, logger, StructuredError } from '../../engine/src/index.js';
import { codecForPath } from '../formats/index.js';

export const commandListSchema = z.object({
    commands: z.array(z.object({ command: z.string() }))
});

export type CommandList = z.infer<typeof commandListSchema>;

/** Reads one command-list file with the codec for its extension. */
export async function loadCommandFile(file: string): Promise<string[]> {
    const codec = codecForPath(file);
    let text: string;
    try {
        text = await fs.readFile(file, 'utf8');
    } catch (error) {
        throw new StructuredError('command_file', `${file}: ${formatError(error)}`);
    }
    let data: unknown;
    try {
        data = codec.parse(text);
    } catch (error) {
        throw new StructuredError('command_file', `${file}: invalid ${codec.name}: ${formatError(error)}`);
    }
    const parsed = commandListSchema.safeParse(data);
    if (!parsed.success) {
        throw new StructuredError('command_file', `${file}: ${describeIssues(parsed.error)}`);
    }
    logger.debug('config: loaded command file', { file, format: codec.name, commands: parsed.data.commands.length });
    return parsed.data.commands.map((entry) => entry.command);
}

/** Inline commands first, then each file's commands in the order the files were given. */
export async function resolveCommands(inline: readonly string[], files: readonly string[]): Promise<string[]> {
    const commands = [...inline];
    for (const file of files) {
        commands.push(...(await loadCommandFile(file)));
    }
    return commands;
}
